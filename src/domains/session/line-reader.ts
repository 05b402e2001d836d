import mitt, { type Emitter } from 'mitt';
import type { Link } from '../device/drivers/types';
import { LinkReadError } from '../device/errors';
import type { Logger } from '../observability/types';
import type { Inbox } from './inbox';

export type LineReaderStopReason = 'stopped' | 'error';

type LineReaderEvents = {
  stopped: { reason: LineReaderStopReason; error?: LinkReadError };
};

export interface LineReaderOptions {
  /** Sleep between polls when nothing arrived. Bounds the added reply latency. */
  pollIntervalMs: number;
  /** A run of bytes this long without a newline is passed on as a line. Default 4096. */
  maxLineLength?: number;
}

const DEFAULT_MAX_LINE_LENGTH = 4096;

const sleep = (ms: number) => new Promise<void>(resolve => setTimeout(resolve, ms));

/**
 * Background loop draining the link into the inbox, one decoded line at a time.
 *
 * Runs until `stop()` or the first read error. A read error ends the loop
 * without throwing anywhere: it is logged, kept in `lastError` and announced
 * through the `stopped` event.
 */
export class LineReader {
  public readonly events: Emitter<LineReaderEvents> = mitt<LineReaderEvents>();

  private running = false;
  private loop: Promise<void> | null = null;
  private partial = '';
  // 非法字节替换为 U+FFFD，不中断读取
  private decoder = new TextDecoder('utf-8');
  private failure: LinkReadError | null = null;

  constructor(
    private readonly link: Link,
    private readonly inbox: Inbox,
    private readonly logger: Logger,
    private readonly options: LineReaderOptions,
  ) {}

  get isRunning(): boolean {
    return this.running;
  }

  get lastError(): LinkReadError | null {
    return this.failure;
  }

  start(): void {
    if (this.loop) return;
    this.running = true;
    this.loop = this.run();
  }

  /**
   * Ask the loop to finish and wait for it at most `joinTimeoutMs`.
   * Resolves false when the loop did not finish in time; shutdown goes on regardless.
   */
  async stop(joinTimeoutMs: number): Promise<boolean> {
    this.running = false;
    const loop = this.loop;
    if (!loop) return true;

    let timer: NodeJS.Timeout | undefined;
    const expired = new Promise<boolean>(resolve => {
      timer = setTimeout(() => resolve(false), joinTimeoutMs);
    });
    try {
      const joined = await Promise.race([loop.then(() => true), expired]);
      if (!joined) {
        this.logger.warn('Line reader did not stop in time', { joinTimeoutMs });
      }
      return joined;
    } finally {
      clearTimeout(timer);
    }
  }

  private async run(): Promise<void> {
    this.logger.debug('Line reader started');
    let reason: LineReaderStopReason = 'stopped';

    while (this.running) {
      let chunk: Buffer | null = null;
      try {
        if (this.link.bytesAvailable() > 0) {
          chunk = this.link.readAvailable();
        }
      } catch (e) {
        this.failure = e instanceof LinkReadError
          ? e
          : new LinkReadError(`Read from ${this.link.id} failed`, { cause: e });
        this.logger.error('Line reader stopped on read error', this.failure, { link: this.link.id });
        reason = 'error';
        break;
      }

      if (chunk && chunk.length > 0) {
        this.consume(chunk);
      } else {
        await sleep(this.options.pollIntervalMs);
      }
    }

    this.running = false;
    this.partial = '';
    this.logger.debug('Line reader stopped', { reason });
    this.events.emit('stopped', reason === 'error' && this.failure ? { reason, error: this.failure } : { reason });
  }

  private consume(chunk: Buffer) {
    const text = this.partial + this.decoder.decode(chunk, { stream: true });
    const parts = text.split('\n');
    this.partial = parts.pop() ?? '';

    const maxLineLength = this.options.maxLineLength ?? DEFAULT_MAX_LINE_LENGTH;
    if (this.partial.length >= maxLineLength) {
      this.logger.warn('Passing on an unterminated line', { length: this.partial.length, maxLineLength });
      parts.push(this.partial);
      this.partial = '';
    }

    for (const raw of parts) {
      const line = raw.trim();
      if (!line) continue;
      this.inbox.push(line);
      this.logger.debug('Received', { line });
    }
  }
}
