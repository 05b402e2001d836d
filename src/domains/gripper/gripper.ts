import type { GripperConfig } from '../config/config';
import { ValidationError } from '../device/errors';
import type { Logger } from '../observability/types';
import {
  formatAngleMove,
  formatHelp,
  formatLoad,
  formatMove,
  formatPositionQuery,
  formatStatusQuery,
  isErrorLine,
  parseAck,
  parseMoveResult,
  parsePosition,
  parseStatus,
  POSITION_MARKER,
  PROBE_MARKER,
  RESULT_MARKER,
  STATUS_MARKER,
  type ServoStatus,
} from '../protocol/codec';
import type { LinkSession } from '../session/session';

export interface NormalizedPosition {
  angle: number;
  /** 0 = fully open, 1 = fully closed */
  normalized: number;
}

export interface CalibrationResult {
  open: number | null;
  closed: number | null;
}

export interface SequenceStep {
  target: number;
  actual: number | null;
  error: number | null;
}

// help 列表在标记行之后继续输出
const HELP_SETTLE_MS = 200;

const sleep = (ms: number) => new Promise<void>(resolve => setTimeout(resolve, ms));

/**
 * Gripper operations on top of a link session.
 *
 * Timeouts and unparseable replies come back as null. Argument errors throw
 * `ValidationError` before anything is written; `SendFailedError` from the
 * session is passed through.
 */
export class GripperController {
  constructor(
    private readonly session: LinkSession,
    private readonly config: GripperConfig,
    private readonly logger: Logger,
  ) {}

  get servoId(): number {
    return this.config.servoId;
  }

  /** Check the board answers at all; used right after connecting. */
  async probe(): Promise<boolean> {
    const lines = await this.session.sendAndAwait(
      formatHelp(),
      line => line.includes(PROBE_MARKER),
      this.config.probeTimeoutMs,
    );
    return lines.some(line => line.includes(PROBE_MARKER));
  }

  async help(): Promise<string[]> {
    const lines = await this.session.sendAndAwait(
      formatHelp(),
      line => line.includes(PROBE_MARKER),
      this.config.probeTimeoutMs,
    );
    await sleep(HELP_SETTLE_MS);
    return [...lines, ...this.session.getBufferedLines()];
  }

  async getStatus(): Promise<ServoStatus | null> {
    const lines = await this.session.sendAndAwait(
      formatStatusQuery(this.config.servoId),
      line => line.includes(STATUS_MARKER),
      this.config.statusTimeoutMs,
    );

    for (const line of lines) {
      if (!line.includes(STATUS_MARKER)) continue;
      const status = parseStatus(line);
      if (status) return status;
    }

    this.logger.warn('Could not read servo status', { servoId: this.config.servoId, received: lines.length });
    return null;
  }

  /** Current servo angle in degrees. */
  async readPosition(): Promise<number | null> {
    const lines = await this.session.sendAndAwait(
      formatPositionQuery(this.config.servoId),
      line => line.includes(POSITION_MARKER),
      this.config.positionTimeoutMs,
    );

    for (const line of lines) {
      if (!line.includes(POSITION_MARKER)) continue;
      const angle = parsePosition(line);
      if (angle !== null) return angle;
    }

    this.logger.warn('Could not read servo position', { servoId: this.config.servoId, received: lines.length });
    return null;
  }

  async readNormalizedPosition(): Promise<NormalizedPosition | null> {
    const angle = await this.readPosition();
    if (angle === null) return null;
    return { angle, normalized: this.angleToNormalized(angle) };
  }

  angleToNormalized(angle: number): number {
    const { angleMin, angleMax } = this.config;
    const normalized = (angle - angleMin) / (angleMax - angleMin);
    return Math.max(0, Math.min(1, normalized));
  }

  /**
   * Move to a normalized position and resolve with the position the firmware
   * reports as reached. The reply may take up to 2x the move time plus slack.
   */
  async moveTo(normalizedValue: number, moveTimeMs: number = this.config.defaultMoveTimeMs): Promise<number | null> {
    const command = formatMove(this.config.servoId, normalizedValue, moveTimeMs);
    const timeoutMs = moveTimeMs * 2 + this.config.moveTimeoutSlackMs;

    const lines = await this.session.sendAndAwait(
      command,
      line => line.includes(RESULT_MARKER) || isErrorLine(line),
      timeoutMs,
    );

    for (const line of lines) {
      const reached = parseMoveResult(line);
      if (reached !== null) {
        this.logger.info('Gripper move finished', { target: normalizedValue, reached });
        return reached;
      }
    }

    const failure = lines.find(isErrorLine);
    if (failure) {
      this.logger.warn('Gripper move rejected', { target: normalizedValue, reply: failure });
    } else {
      this.logger.warn('Gripper move timed out', { target: normalizedValue, timeoutMs });
    }
    return null;
  }

  /** Drive to fully open, then fully closed, and report what the firmware reached. */
  async calibrate(): Promise<CalibrationResult> {
    this.logger.info('Calibrating gripper', { servoId: this.config.servoId });
    const open = await this.moveTo(0, this.config.calibrationMoveTimeMs);
    await sleep(this.config.calibrationSettleMs);
    const closed = await this.moveTo(1, this.config.calibrationMoveTimeMs);
    this.logger.info('Calibration finished', { open, closed });
    return { open, closed };
  }

  /** Step evenly from open to closed, recording the error of every step. */
  async runTestSequence(steps = 5, moveTimeMs = this.config.defaultMoveTimeMs): Promise<SequenceStep[]> {
    if (!Number.isInteger(steps) || steps < 2) {
      throw new ValidationError(`A test sequence needs at least 2 steps, got ${steps}`);
    }

    const results: SequenceStep[] = [];
    for (let i = 0; i < steps; i++) {
      const target = i / (steps - 1);
      const actual = await this.moveTo(target, moveTimeMs);
      results.push({
        target,
        actual,
        error: actual === null ? null : Math.abs(actual - target),
      });
      if (i < steps - 1) await sleep(this.config.testStepPauseMs);
    }
    return results;
  }

  /** Power the servo on (true) or let it go limp (false). */
  async setLoad(loaded: boolean): Promise<boolean | null> {
    return this.awaitAck(formatLoad(this.config.servoId, loaded));
  }

  /** Raw servo move in degrees, bypassing the gripper's normalized range. */
  async moveToAngle(angle: number, timeMs: number): Promise<boolean | null> {
    return this.awaitAck(formatAngleMove(this.config.servoId, angle, timeMs));
  }

  isHealthy(): boolean {
    const health = this.session.health();
    return health.state === 'connected' && health.readerRunning;
  }

  private async awaitAck(command: string): Promise<boolean | null> {
    const lines = await this.session.sendAndAwait(
      command,
      line => parseAck(line) !== null,
      this.config.ackTimeoutMs,
    );
    for (const line of lines) {
      const ack = parseAck(line);
      if (ack !== null) {
        if (!ack) this.logger.warn('Command rejected', { command, reply: line });
        return ack;
      }
    }
    this.logger.warn('No acknowledgement', { command });
    return null;
  }
}
