import { ErrorCode, OpenFailureReason } from '../types';

export class LaserLinkError extends Error {
  constructor(
    readonly code: ErrorCode,
    message: string,
    readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = new.target.name;
  }
}

/** Command parameters cannot be represented in a frame. Fatal to that command only. */
export class EncodeError extends LaserLinkError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(ErrorCode.Encode, message, details);
  }
}

export class DecodeError extends LaserLinkError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(ErrorCode.Decode, message, details);
  }
}

export class TransportOpenError extends LaserLinkError {
  constructor(
    readonly reason: OpenFailureReason,
    message: string,
    details?: Record<string, unknown>
  ) {
    super(ErrorCode.TransportOpen, message, { ...details, reason });
  }
}

/** Mid-session failure: broken pipe, timeout or stall. */
export class TransportIOError extends LaserLinkError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(ErrorCode.TransportIO, message, details);
  }
}

export class BufferFullError extends LaserLinkError {
  constructor(
    readonly requestedBytes: number,
    readonly bufferedBytes: number,
    readonly maxBufferBytes: number
  ) {
    super(
      ErrorCode.BufferFull,
      `Send buffer full: ${bufferedBytes} + ${requestedBytes} > ${maxBufferBytes} bytes`,
      { requestedBytes, bufferedBytes, maxBufferBytes }
    );
  }
}

export class ConfigError extends LaserLinkError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(ErrorCode.Config, message, details);
  }
}

export class InvalidStateError extends LaserLinkError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(ErrorCode.InvalidState, message, details);
  }
}

export class ErrorHandler {
  static toError(error: unknown): Error {
    if (error instanceof Error) return error;
    return new Error(typeof error === 'string' ? error : JSON.stringify(error));
  }

  static isTransportError(error: unknown): error is TransportOpenError | TransportIOError {
    return error instanceof TransportOpenError || error instanceof TransportIOError;
  }

  /** Only mid-session transport failures are retried automatically. */
  static isRetryable(error: unknown): error is TransportIOError {
    return error instanceof TransportIOError;
  }

  static asTransportIOError(error: unknown, context: string): TransportIOError {
    if (error instanceof TransportIOError) return error;
    const cause = ErrorHandler.toError(error);
    return new TransportIOError(`${context}: ${cause.message}`, { cause: cause.message });
  }

  static errnoCode(error: unknown): string | undefined {
    if (typeof error === 'object' && error !== null && 'code' in error) {
      const code = error.code;
      return typeof code === 'string' ? code : undefined;
    }
    return undefined;
  }

  static formatError(error: Error): string {
    if (error instanceof TransportOpenError) {
      return `[${error.code}:${error.reason}] ${error.message}`;
    }
    if (error instanceof LaserLinkError) {
      return `[${error.code}] ${error.message}`;
    }
    return error.message;
  }
}
