/**
 * Error classes raised by channels, the driver and the servers
 */

export type EchoErrorCode =
  | 'CONNECT_TIMEOUT'
  | 'CONNECT_REFUSED'
  | 'IO_ERROR'
  | 'SHORT_READ'
  | 'READ_TIMEOUT'
  | 'WRITE_TIMEOUT'
  | 'ECHO_MISMATCH'
  | 'PROTOCOL_ERROR'
  | 'PAYLOAD_TOO_LARGE';

export class EchoError extends Error {
  readonly code: EchoErrorCode;

  constructor(code: EchoErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.code = code;
    this.name = 'EchoError';
  }
}

export class ConnectTimeoutError extends EchoError {
  constructor(host: string, port: number, timeoutMs: number) {
    super('CONNECT_TIMEOUT', `Connection to ${host}:${port} timed out after ${timeoutMs}ms`);
    this.name = 'ConnectTimeoutError';
  }
}

export class ConnectRefusedError extends EchoError {
  constructor(host: string, port: number, cause?: unknown) {
    super('CONNECT_REFUSED', `Connection to ${host}:${port} refused`, { cause });
    this.name = 'ConnectRefusedError';
  }
}

export class IOError extends EchoError {
  constructor(message: string, cause?: unknown) {
    super('IO_ERROR', message, { cause });
    this.name = 'IOError';
  }
}

export class ShortReadError extends EchoError {
  constructor(expected: number, received: number) {
    super('SHORT_READ', `Peer closed mid-frame: expected ${expected} bytes, got ${received}`);
    this.name = 'ShortReadError';
  }
}

export class ReadTimeoutError extends EchoError {
  constructor(timeoutMs: number) {
    super('READ_TIMEOUT', `No data received within ${timeoutMs}ms`);
    this.name = 'ReadTimeoutError';
  }
}

export class WriteTimeoutError extends EchoError {
  constructor(timeoutMs: number) {
    super('WRITE_TIMEOUT', `Peer did not accept data within ${timeoutMs}ms`);
    this.name = 'WriteTimeoutError';
  }
}

export class EchoMismatchError extends EchoError {
  constructor(size: number) {
    super('ECHO_MISMATCH', `Echoed message of ${size} bytes does not match the original`);
    this.name = 'EchoMismatchError';
  }
}

export class ProtocolError extends EchoError {
  constructor(message: string) {
    super('PROTOCOL_ERROR', message);
    this.name = 'ProtocolError';
  }
}

export class PayloadTooLargeError extends EchoError {
  constructor(size: number, limit: number) {
    super('PAYLOAD_TOO_LARGE', `Payload of ${size} bytes exceeds the ${limit} byte limit`);
    this.name = 'PayloadTooLargeError';
  }
}

/**
 * Wrap anything thrown by a socket or stream as an EchoError
 */
export function toEchoError(err: unknown): EchoError {
  if (err instanceof EchoError) {
    return err;
  }
  const message = err instanceof Error ? err.message : String(err);
  return new IOError(message, err);
}
