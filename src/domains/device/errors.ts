export type GripperErrorCode =
  | 'CONNECT_FAILED'
  | 'SEND_FAILED'
  | 'LINK_READ'
  | 'VALIDATION';

export class GripperError extends Error {
  readonly code: GripperErrorCode;

  constructor(code: GripperErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/** 串口打开失败；不做重试，由调用方决定 */
export class ConnectError extends GripperError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('CONNECT_FAILED', message, options);
  }
}

export class SendFailedError extends GripperError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('SEND_FAILED', message, options);
  }
}

/** Raised by a link once the port reported an error or closed underneath the reader. */
export class LinkReadError extends GripperError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('LINK_READ', message, options);
  }
}

export class ValidationError extends GripperError {
  constructor(message: string) {
    super('VALIDATION', message);
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
