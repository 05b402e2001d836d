import type { Link } from '../device/drivers/types';
import { describeError, SendFailedError } from '../device/errors';
import type { Logger } from '../observability/types';
import type { Inbox } from './inbox';

export type LinePredicate = (line: string) => boolean;

export interface CorrelatorOptions {
  writeTimeoutMs: number;
}

/**
 * Request/response engine over a line inbox.
 *
 * The protocol carries no request ids, so a request owns the whole inbox
 * while it waits: calls are serialized, and each one starts by discarding
 * whatever is still pending from earlier traffic.
 */
export class Correlator {
  // exchanges run one after another in call order
  private tail: Promise<void> = Promise.resolve();
  private pending = 0;

  constructor(
    private readonly link: Link,
    private readonly inbox: Inbox,
    private readonly logger: Logger,
    private readonly options: CorrelatorOptions,
  ) {}

  get busy(): boolean {
    return this.pending > 0;
  }

  /**
   * Write `commandLine` and collect reply lines until one satisfies `match`
   * or `timeoutMs` elapses. Resolves with every line taken, in arrival order;
   * on a match the matching line is the last one. A timeout is not an error.
   */
  sendAndAwait(commandLine: string, match: LinePredicate, timeoutMs: number): Promise<string[]> {
    this.pending++;
    const exchange = this.tail.then(() => this.exchange(commandLine, match, timeoutMs));
    // the caller sees the failure through `exchange`; the queue only needs it settled
    this.tail = exchange.then(() => undefined, () => undefined);
    return exchange.finally(() => {
      this.pending--;
    });
  }

  private async exchange(commandLine: string, match: LinePredicate, timeoutMs: number): Promise<string[]> {
    const stale = this.inbox.drain();
    if (stale.length > 0) {
      this.logger.debug('Discarded stale lines', { count: stale.length });
    }

    const line = commandLine.endsWith('\n') ? commandLine : `${commandLine}\n`;
    try {
      await this.link.write(Buffer.from(line, 'utf-8'), this.options.writeTimeoutMs);
    } catch (e) {
      throw new SendFailedError(`Failed to send "${line.trim()}": ${describeError(e)}`, { cause: e });
    }
    this.logger.debug('Sent', { command: line.trim() });

    const deadline = Date.now() + timeoutMs;
    const lines: string[] = [];
    for (;;) {
      const remaining = deadline - Date.now();
      if (remaining <= 0) break;

      const next = await this.inbox.take(remaining);
      if (next === undefined) break;

      lines.push(next);
      if (match(next)) return lines;
    }

    this.logger.debug('No matching reply before deadline', { command: line.trim(), timeoutMs, received: lines.length });
    return lines;
  }
}
