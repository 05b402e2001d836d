import { SerialPort } from 'serialport';
import type { Logger } from '../../observability/types';
import { LinkReadError } from '../errors';
import type { Link, LinkOpenOptions } from './types';

export class NativeSerialLink implements Link {
  public readonly id: string;
  public readonly type = 'serial';

  private port: SerialPort | null = null;
  private received: Buffer[] = [];
  private receivedBytes = 0;
  private readError: LinkReadError | null = null;
  private closing = false;

  constructor(private readonly path: string, private readonly logger: Logger) {
    this.id = path;
  }

  get isOpen(): boolean {
    return this.port?.isOpen ?? false;
  }

  async open(options: LinkOpenOptions): Promise<void> {
    const port = new SerialPort({
      path: this.path,
      baudRate: options.baudRate,
      autoOpen: false,
    });

    await new Promise<void>((resolve, reject) => {
      port.open((err) => {
        if (err) reject(err);
        else resolve();
      });
    });

    this.port = port;
    this.received = [];
    this.receivedBytes = 0;
    this.readError = null;
    this.closing = false;

    port.on('data', (chunk: Buffer) => {
      this.received.push(chunk);
      this.receivedBytes += chunk.length;
    });

    port.on('error', (err: Error) => {
      this.logger.warn('Serial port error', { path: this.path, message: err.message });
      this.readError ??= new LinkReadError(`Serial port ${this.path} failed: ${err.message}`, { cause: err });
    });

    port.on('close', () => {
      if (!this.closing) {
        this.readError ??= new LinkReadError(`Serial port ${this.path} closed unexpectedly`);
      }
    });
  }

  async write(data: Uint8Array, timeoutMs: number): Promise<void> {
    const port = this.port;
    if (!port || !port.isOpen) throw new Error('Port not open');

    const flushed = new Promise<void>((resolve, reject) => {
      port.write(Buffer.from(data), (err) => {
        if (err) {
          reject(err);
          return;
        }
        port.drain((drainErr) => {
          if (drainErr) reject(drainErr);
          else resolve();
        });
      });
    });

    let timer: NodeJS.Timeout | undefined;
    const expired = new Promise<never>((_, reject) => {
      timer = setTimeout(() => reject(new Error(`Write timed out after ${timeoutMs}ms`)), timeoutMs);
    });

    try {
      await Promise.race([flushed, expired]);
    } finally {
      clearTimeout(timer);
    }
  }

  bytesAvailable(): number {
    if (this.readError) throw this.readError;
    if (!this.port) throw new LinkReadError(`Serial port ${this.path} is not open`);
    return this.receivedBytes;
  }

  readAvailable(): Buffer {
    const chunk = Buffer.concat(this.received);
    this.received = [];
    this.receivedBytes = 0;
    return chunk;
  }

  async close(): Promise<void> {
    const port = this.port;
    if (!port) return;
    this.port = null;
    this.closing = true;

    if (!port.isOpen) return;
    await new Promise<void>((resolve) => {
      port.close((err) => {
        if (err) {
          this.logger.warn('Failed to close serial port', { path: this.path, message: err.message });
        }
        resolve();
      });
    });
  }
}
