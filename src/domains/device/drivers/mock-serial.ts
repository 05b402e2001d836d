import type { Logger } from '../../observability/types';
import { LinkReadError } from '../errors';
import type { Link, LinkOpenOptions } from './types';

export type MockReply = string | string[];

export interface MockScenarioStep {
  match: string | RegExp;
  /**
   * A string is sent as-is; an array is sent as CRLF-terminated lines.
   * A function may return null to stay silent for that command.
   */
  reply: MockReply | ((command: string) => MockReply | null);
  delay?: number | ((command: string) => number);
}

function encodeReply(reply: MockReply): Buffer {
  if (typeof reply === 'string') return Buffer.from(reply, 'utf-8');
  return Buffer.from(reply.map(line => `${line}\r\n`).join(''), 'utf-8');
}

/**
 * In-process link that answers written commands from a scenario.
 * Used by the test suites and by mock mode.
 */
export class MockSerialLink implements Link {
  public readonly id: string;
  public readonly type = 'mock-serial';

  private connected = false;
  private scenario: MockScenarioStep[];
  private received: Buffer[] = [];
  private timers = new Set<NodeJS.Timeout>();
  private openError: Error | null = null;
  private writeError: Error | null = null;
  private readError: Error | null = null;

  /** Every command written, decoded and without its terminator. */
  public readonly written: string[] = [];
  public closeCount = 0;

  constructor(deviceId: string, scenario: MockScenarioStep[] = [], private readonly logger?: Logger) {
    this.id = deviceId;
    this.scenario = scenario;
  }

  get isOpen(): boolean {
    return this.connected;
  }

  async open(options: LinkOpenOptions): Promise<void> {
    if (this.openError) throw this.openError;
    this.connected = true;
    this.readError = null;
    this.logger?.debug('Mock link opened', { id: this.id, baudRate: options.baudRate });
  }

  async close(): Promise<void> {
    this.closeCount++;
    if (!this.connected) return;
    this.connected = false;
    for (const timer of this.timers) clearTimeout(timer);
    this.timers.clear();
    this.received = [];
    this.logger?.debug('Mock link closed', { id: this.id });
  }

  async write(data: Uint8Array, _timeoutMs: number): Promise<void> {
    if (!this.connected) {
      throw new Error(`Device ${this.id} is not connected`);
    }
    if (this.writeError) throw this.writeError;

    const input = Buffer.from(data).toString('utf-8');
    const command = input.trim();
    this.written.push(command);
    this.logger?.debug('Mock link written', { id: this.id, command });

    // First matching step wins
    for (const step of this.scenario) {
      const matched = typeof step.match === 'string'
        ? input.includes(step.match)
        : step.match.test(input);
      if (!matched) continue;

      const reply = typeof step.reply === 'function' ? step.reply(command) : step.reply;
      if (reply !== null) {
        const delay = typeof step.delay === 'function' ? step.delay(command) : step.delay;
        this.schedule(encodeReply(reply), delay ?? 0);
      }
      break;
    }
  }

  bytesAvailable(): number {
    if (this.readError) throw new LinkReadError(`Mock link ${this.id} failed: ${this.readError.message}`, { cause: this.readError });
    return this.received.reduce((total, chunk) => total + chunk.length, 0);
  }

  readAvailable(): Buffer {
    const chunk = Buffer.concat(this.received);
    this.received = [];
    return chunk;
  }

  /** Simulate unsolicited bytes from the device. */
  simulateIncoming(data: string | Buffer) {
    if (this.connected) {
      this.received.push(typeof data === 'string' ? Buffer.from(data, 'utf-8') : data);
    }
  }

  failOpen(error: Error) {
    this.openError = error;
  }

  failWrites(error: Error | null) {
    this.writeError = error;
  }

  failReads(error: Error) {
    this.readError = error;
  }

  setScenario(scenario: MockScenarioStep[]) {
    this.scenario = scenario;
  }

  private schedule(bytes: Buffer, delay: number) {
    const timer = setTimeout(() => {
      this.timers.delete(timer);
      this.simulateIncoming(bytes);
    }, delay);
    this.timers.add(timer);
  }
}
