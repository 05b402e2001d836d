import { ValidationError } from '../device/errors';

/**
 * Text protocol spoken by the gripper firmware.
 *
 * Outgoing: one command per line, `<name> <servo_id> [<arg>...]`.
 * Incoming replies are free-form log lines; the parsers below pick the
 * values out by pattern and return null for anything else, so callers can
 * scan every line a request produced.
 */

export const STATUS_MARKER = '状态:';
export const POSITION_MARKER = '实时位置:';
export const RESULT_MARKER = 'GRIPPER_RESULT:';
export const ERROR_MARKER = 'ERROR:';
export const PROBE_MARKER = 'Available commands:';

export const ANGLE_RANGE = { min: 0, max: 240 } as const;
export const ANGLE_MOVE_TIME_RANGE = { min: 20, max: 30000 } as const;
/** Longest move the firmware accepts */
export const MAX_MOVE_TIME_MS = ANGLE_MOVE_TIME_RANGE.max;

export type CommandArg = string | number;

export interface Command {
  readonly name: string;
  readonly args: readonly CommandArg[];
}

export interface ServoStatus {
  angle: number;
  temperature: number;
  voltage: number;
}

export type ReplyKind = 'status' | 'position' | 'result' | 'error' | 'unrecognized';

const STATUS_PATTERN = /角度=([\d.]+)°.*温度=(\d+)°C.*电压=([\d.]+)V/;
const ANGLE_PATTERN = /角度=([\d.]+)°/;
const RESULT_PATTERN = /GRIPPER_RESULT:([\d.]+)/;
const ACK_PATTERN = /\bSuccessfully\b/;
const NACK_PATTERN = /\b(Failed|Invalid|Usage:)/;

export function createCommand(name: string, ...args: CommandArg[]): Command {
  if (!/^\S+$/.test(name)) {
    throw new ValidationError(`Invalid command name: "${name}"`);
  }
  for (const arg of args) {
    if (typeof arg === 'number' ? !Number.isFinite(arg) : !/^\S+$/.test(arg)) {
      throw new ValidationError(`Invalid argument for ${name}: "${String(arg)}"`);
    }
  }
  return Object.freeze({ name, args: Object.freeze([...args]) });
}

export function formatCommand(command: Command): string {
  return [command.name, ...command.args.map(String)].join(' ');
}

function assertServoId(servoId: number) {
  if (!Number.isInteger(servoId) || servoId <= 0) {
    throw new ValidationError(`Servo id must be a positive integer, got ${servoId}`);
  }
}

function assertMoveTime(moveTimeMs: number) {
  if (!Number.isInteger(moveTimeMs) || moveTimeMs <= 0) {
    throw new ValidationError(`Move time must be a positive integer (ms), got ${moveTimeMs}`);
  }
  if (moveTimeMs > MAX_MOVE_TIME_MS) {
    throw new ValidationError(`Move time must be at most ${MAX_MOVE_TIME_MS}ms, got ${moveTimeMs}`);
  }
}

export function assertNormalized(value: number) {
  if (!Number.isFinite(value) || value < 0 || value > 1) {
    throw new ValidationError(`Normalized value must be within 0.0~1.0, got ${value}`);
  }
}

export function formatMove(servoId: number, normalizedValue: number, moveTimeMs: number): string {
  assertServoId(servoId);
  assertNormalized(normalizedValue);
  assertMoveTime(moveTimeMs);
  return formatCommand(createCommand('gripper_control', servoId, normalizedValue.toFixed(3), moveTimeMs));
}

export function formatStatusQuery(servoId: number): string {
  assertServoId(servoId);
  return formatCommand(createCommand('servo_status', servoId));
}

export function formatPositionQuery(servoId: number): string {
  assertServoId(servoId);
  return formatCommand(createCommand('servo_read_now_position', servoId));
}

export function formatHelp(): string {
  return formatCommand(createCommand('help'));
}

export function formatLoad(servoId: number, loaded: boolean): string {
  assertServoId(servoId);
  return formatCommand(createCommand('servo_load', servoId, loaded ? 1 : 0));
}

export function formatAngleMove(servoId: number, angle: number, timeMs: number): string {
  assertServoId(servoId);
  if (!Number.isFinite(angle) || angle < ANGLE_RANGE.min || angle > ANGLE_RANGE.max) {
    throw new ValidationError(`Angle must be within ${ANGLE_RANGE.min}-${ANGLE_RANGE.max}, got ${angle}`);
  }
  if (!Number.isInteger(timeMs) || timeMs < ANGLE_MOVE_TIME_RANGE.min || timeMs > ANGLE_MOVE_TIME_RANGE.max) {
    throw new ValidationError(
      `Move time must be within ${ANGLE_MOVE_TIME_RANGE.min}-${ANGLE_MOVE_TIME_RANGE.max}ms, got ${timeMs}`
    );
  }
  return formatCommand(createCommand('servo_position', servoId, angle.toFixed(1), timeMs));
}

function toNumber(raw: string | undefined): number | null {
  if (raw === undefined) return null;
  const value = Number(raw);
  return Number.isFinite(value) ? value : null;
}

export function parseStatus(line: string): ServoStatus | null {
  const match = STATUS_PATTERN.exec(line);
  if (!match) return null;
  const angle = toNumber(match[1]);
  const temperature = toNumber(match[2]);
  const voltage = toNumber(match[3]);
  if (angle === null || temperature === null || voltage === null) return null;
  return { angle, temperature, voltage };
}

export function parsePosition(line: string): number | null {
  return toNumber(ANGLE_PATTERN.exec(line)?.[1]);
}

export function parseMoveResult(line: string): number | null {
  return toNumber(RESULT_PATTERN.exec(line)?.[1]);
}

export function isErrorLine(line: string): boolean {
  return line.includes(ERROR_MARKER);
}

/** true for an acknowledgement, false for a rejection, null for anything else. */
export function parseAck(line: string): boolean | null {
  if (ACK_PATTERN.test(line)) return true;
  if (NACK_PATTERN.test(line)) return false;
  return null;
}

export function classifyLine(line: string): ReplyKind {
  if (parseStatus(line) !== null) return 'status';
  if (line.includes(POSITION_MARKER) && parsePosition(line) !== null) return 'position';
  if (parseMoveResult(line) !== null) return 'result';
  if (isErrorLine(line)) return 'error';
  return 'unrecognized';
}
