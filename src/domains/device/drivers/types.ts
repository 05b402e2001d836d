export interface LinkOpenOptions {
  baudRate: number;
}

/**
 * Byte-stream connection to the microcontroller.
 *
 * Reads are polled: received bytes accumulate inside the link until
 * `readAvailable()` hands them out. Only the line reader reads and only the
 * correlator writes, so a link never sees concurrent reads or writes.
 */
export interface Link {
  readonly id: string;
  readonly type: string;
  readonly isOpen: boolean;

  open(options: LinkOpenOptions): Promise<void>;
  /** Idempotent; never rejects. */
  close(): Promise<void>;

  write(data: Uint8Array, timeoutMs: number): Promise<void>;

  /** Throws `LinkReadError` once the underlying port failed. */
  bytesAvailable(): number;
  readAvailable(): Buffer;
}

export type LinkFactory = (path: string) => Link;
