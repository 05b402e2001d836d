import mitt, { type Emitter } from 'mitt';
import type { Link, LinkFactory } from '../device/drivers/types';
import { ConnectError, describeError, SendFailedError, type LinkReadError } from '../device/errors';
import type { Logger } from '../observability/types';
import { Correlator, type LinePredicate } from './correlator';
import { Inbox } from './inbox';
import { LineReader } from './line-reader';

export type SessionState = 'disconnected' | 'connecting' | 'connected';

export interface SessionOptions {
  path: string;
  baudRate: number;
  writeTimeoutMs: number;
  pollIntervalMs: number;
  readerJoinTimeoutMs: number;
  /** 0 = unbounded */
  inboxCapacity: number;
}

export interface SessionHealth {
  state: SessionState;
  linkOpen: boolean;
  readerRunning: boolean;
  readerError: string | null;
  droppedLines: number;
}

type SessionEvents = {
  'state:changed': { from: SessionState; to: SessionState };
  'reader:stopped': { error: LinkReadError };
};

interface ActiveConnection {
  link: Link;
  inbox: Inbox;
  reader: LineReader;
  correlator: Correlator;
}

/**
 * One connection to the device: the link, its line reader, the inbox between
 * them and the correlator on top.
 *
 * A reader that dies on an I/O error leaves the session in `connected`:
 * requests keep timing out until the caller disconnects. `health()` and the
 * `reader:stopped` event are how that becomes visible.
 */
export class LinkSession {
  public readonly events: Emitter<SessionEvents> = mitt<SessionEvents>();

  private state: SessionState = 'disconnected';
  private active: ActiveConnection | null = null;
  // bumped by disconnect() so a connect still opening the link knows it was cancelled
  private generation = 0;

  constructor(
    private readonly linkFactory: LinkFactory,
    private readonly options: SessionOptions,
    private readonly logger: Logger,
  ) {}

  get currentState(): SessionState {
    return this.state;
  }

  get path(): string {
    return this.options.path;
  }

  async connect(): Promise<void> {
    if (this.state === 'connected') return;
    if (this.state === 'connecting') {
      throw new ConnectError(`Already connecting to ${this.options.path}`);
    }

    this.setState('connecting');
    const generation = this.generation;
    const link = this.linkFactory(this.options.path);
    try {
      await link.open({ baudRate: this.options.baudRate });
    } catch (e) {
      await link.close();
      if (generation === this.generation) this.setState('disconnected');
      throw new ConnectError(`Failed to open ${this.options.path}: ${describeError(e)}`, { cause: e });
    }

    if (generation !== this.generation) {
      await link.close();
      throw new ConnectError(`Connection to ${this.options.path} was cancelled by disconnect`);
    }

    const inbox = new Inbox(this.options.inboxCapacity);
    const reader = new LineReader(link, inbox, this.logger.child({ component: 'LineReader' }), {
      pollIntervalMs: this.options.pollIntervalMs,
    });
    const correlator = new Correlator(link, inbox, this.logger.child({ component: 'Correlator' }), {
      writeTimeoutMs: this.options.writeTimeoutMs,
    });

    reader.events.on('stopped', ({ reason, error }) => {
      if (reason === 'error' && error) {
        this.logger.warn('Link is no longer being read; requests will time out until reconnect', {
          path: this.options.path,
        });
        this.events.emit('reader:stopped', { error });
      }
    });

    this.active = { link, inbox, reader, correlator };
    reader.start();
    this.setState('connected');
    this.logger.info('Connected', { path: this.options.path, baudRate: this.options.baudRate });
  }

  /**
   * Send one command line and collect reply lines until `match` or timeout.
   * Throws `SendFailedError` when not connected or when the write fails.
   */
  async sendAndAwait(commandLine: string, match: LinePredicate, timeoutMs: number): Promise<string[]> {
    const active = this.active;
    if (!active || this.state !== 'connected') {
      throw new SendFailedError(`Device ${this.options.path} is not connected`);
    }
    return active.correlator.sendAndAwait(commandLine, match, timeoutMs);
  }

  /** Take every line received since the last request, e.g. unsolicited device output. */
  getBufferedLines(): string[] {
    return this.active?.inbox.drain() ?? [];
  }

  /** Safe to call repeatedly, and when never connected. */
  async disconnect(): Promise<void> {
    this.generation++;
    const active = this.active;
    if (!active) {
      if (this.state !== 'disconnected') this.setState('disconnected');
      return;
    }
    this.active = null;

    await active.reader.stop(this.options.readerJoinTimeoutMs);
    active.inbox.close();
    await active.link.close();
    active.reader.events.all.clear();

    this.setState('disconnected');
    this.logger.info('Disconnected', { path: this.options.path });
  }

  health(): SessionHealth {
    const active = this.active;
    return {
      state: this.state,
      linkOpen: active?.link.isOpen ?? false,
      readerRunning: active?.reader.isRunning ?? false,
      readerError: active?.reader.lastError?.message ?? null,
      droppedLines: active?.inbox.dropped ?? 0,
    };
  }

  private setState(to: SessionState) {
    const from = this.state;
    if (from === to) return;
    this.state = to;
    this.events.emit('state:changed', { from, to });
  }
}
