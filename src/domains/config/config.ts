import fs from 'fs/promises';
import path from 'path';
import { z } from 'zod';
import { ValidationError } from '../device/errors';
import { MAX_MOVE_TIME_MS } from '../protocol/codec';
import type { Logger } from '../observability/types';

export const LinkConfigSchema = z.object({
  /** Serial device path; discovered when absent */
  path: z.string().min(1).optional(),
  baudRate: z.number().int().positive().default(115200),
  writeTimeoutMs: z.number().int().positive().default(1000),
  pollIntervalMs: z.number().int().positive().max(10).default(5),
  readerJoinTimeoutMs: z.number().int().positive().default(1000),
  inboxCapacity: z.number().int().nonnegative().default(1024),
  /** Time the board needs after the port opens before it answers */
  startupDelayMs: z.number().int().nonnegative().default(2000),
});

export const GripperConfigSchema = z.object({
  servoId: z.number().int().positive().default(1),
  angleMin: z.number().default(101),
  angleMax: z.number().default(147),
  defaultMoveTimeMs: z.number().int().positive().max(MAX_MOVE_TIME_MS).default(2000),
  statusTimeoutMs: z.number().int().positive().default(5000),
  positionTimeoutMs: z.number().int().positive().default(5000),
  ackTimeoutMs: z.number().int().positive().default(3000),
  probeTimeoutMs: z.number().int().positive().default(3000),
  moveTimeoutSlackMs: z.number().int().nonnegative().default(5000),
  calibrationMoveTimeMs: z.number().int().positive().max(MAX_MOVE_TIME_MS).default(3000),
  calibrationSettleMs: z.number().int().nonnegative().default(1000),
  testStepPauseMs: z.number().int().nonnegative().default(500),
}).refine(g => g.angleMin < g.angleMax, {
  message: 'angleMin must be smaller than angleMax',
  path: ['angleMax'],
});

export const LogConfigSchema = z.object({
  level: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
  format: z.enum(['json', 'pretty']).default('pretty'),
});

export const AppConfigSchema = z.object({
  link: LinkConfigSchema.default({}),
  gripper: GripperConfigSchema.default({}),
  log: LogConfigSchema.default({}),
  /** Use the simulated firmware instead of a serial port */
  mock: z.boolean().default(false),
});

export type LinkConfig = z.infer<typeof LinkConfigSchema>;
export type GripperConfig = z.infer<typeof GripperConfigSchema>;
export type AppConfig = z.infer<typeof AppConfigSchema>;

export interface LoadConfigOptions {
  configPath?: string;
  env?: NodeJS.ProcessEnv;
  logger?: Logger;
}

type RawConfig = Record<string, unknown>;

function isRecord(value: unknown): value is RawConfig {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function section(raw: RawConfig, key: string): RawConfig {
  const value = raw[key];
  return isRecord(value) ? { ...value } : {};
}

function envNumber(value: string | undefined): number | string | undefined {
  if (value === undefined || value.trim() === '') return undefined;
  const parsed = Number(value);
  // keep the raw string so validation reports it
  return Number.isFinite(parsed) ? parsed : value;
}

function envBoolean(value: string | undefined): boolean | undefined {
  if (value === undefined) return undefined;
  return value === 'true' || value === '1';
}

function applyEnv(raw: RawConfig, env: NodeJS.ProcessEnv): RawConfig {
  const link = section(raw, 'link');
  const gripper = section(raw, 'gripper');
  const log = section(raw, 'log');

  if (env.GRIPPER_PORT) link.path = env.GRIPPER_PORT;
  const baudRate = envNumber(env.GRIPPER_BAUD_RATE);
  if (baudRate !== undefined) link.baudRate = baudRate;
  const servoId = envNumber(env.GRIPPER_SERVO_ID);
  if (servoId !== undefined) gripper.servoId = servoId;
  if (env.LOG_LEVEL) log.level = env.LOG_LEVEL;
  if (env.LOG_FORMAT) log.format = env.LOG_FORMAT;

  const mock = envBoolean(env.GRIPPER_MOCK_DEVICE);
  return {
    ...raw,
    link,
    gripper,
    log,
    ...(mock === undefined ? {} : { mock }),
  };
}

export function parseConfig(raw: unknown): AppConfig {
  const result = AppConfigSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues
      .map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new ValidationError(`Invalid configuration: ${issues}`);
  }
  return result.data;
}

async function readConfigFile(configPath: string, logger?: Logger): Promise<RawConfig> {
  let content: string;
  try {
    content = await fs.readFile(configPath, 'utf-8');
  } catch (e) {
    logger?.debug('No config file loaded', { configPath, reason: e instanceof Error ? e.message : String(e) });
    return {};
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch (parseErr) {
    logger?.error(`Invalid JSON in config file ${configPath}`, parseErr);
    return {};
  }
  if (!isRecord(parsed)) {
    logger?.warn('Config file does not contain an object; ignoring it', { configPath });
    return {};
  }
  return parsed;
}

/**
 * Build the configuration from `config/gripper.json` (optional) and
 * environment overrides, then validate it.
 */
export async function loadConfig(options: LoadConfigOptions = {}): Promise<AppConfig> {
  const configPath = options.configPath ?? path.join(process.cwd(), 'config', 'gripper.json');
  const fromFile = await readConfigFile(configPath, options.logger);
  return parseConfig(applyEnv(fromFile, options.env ?? process.env));
}
