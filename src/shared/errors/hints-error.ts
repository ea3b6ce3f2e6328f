/**
 * Error Types
 *
 * Structured error types shared by the hint engine, the protocol layer and the daemon
 */

import { ErrorCode, ErrorSeverity } from './error-codes.js';

/**
 * Structured form of a HintsError, used for log context and CLI reports
 */
export interface StructuredError {
  error: string;
  code: ErrorCode;
  severity: ErrorSeverity;
  details?: Record<string, unknown>;
  stack?: string;
}

/**
 * Base error class
 *
 * Extends Error with a code, a severity and optional details
 */
export class HintsError extends Error {
  constructor(
    message: string,
    public readonly code: ErrorCode = ErrorCode.UNKNOWN_ERROR,
    public readonly severity: ErrorSeverity = ErrorSeverity.ERROR,
    public readonly details?: Record<string, unknown>,
    public readonly cause?: Error,
  ) {
    super(message);
    this.name = 'HintsError';

    // Maintain proper stack trace for where error was thrown (V8 only)
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, HintsError);
    }
  }

  toStructured(): StructuredError {
    return {
      error: this.message,
      code: this.code,
      severity: this.severity,
      details: this.details,
      stack: this.stack,
    };
  }

  /**
   * Wrap a standard Error
   */
  static fromError(
    error: Error,
    code: ErrorCode = ErrorCode.UNKNOWN_ERROR,
    severity: ErrorSeverity = ErrorSeverity.ERROR,
  ): HintsError {
    return new HintsError(error.message, code, severity, undefined, error);
  }

  static isHintsError(error: unknown): error is HintsError {
    return error instanceof HintsError;
  }
}

/**
 * Domain-specific error classes
 */

export class AllocationError extends HintsError {
  constructor(
    message: string,
    code: ErrorCode = ErrorCode.TOO_MANY_ELEMENTS,
    details?: Record<string, unknown>,
  ) {
    super(message, code, ErrorSeverity.WARNING, details);
    this.name = 'AllocationError';
  }

  static tooManyElements(count: number, capacity: number, maxLength: number): AllocationError {
    return new AllocationError(
      `Cannot label ${count} elements: at most ${capacity} labels fit in ${maxLength} characters`,
      ErrorCode.TOO_MANY_ELEMENTS,
      { count, capacity, maxLength },
    );
  }
}

export class ProtocolError extends HintsError {
  constructor(
    message: string,
    code: ErrorCode = ErrorCode.MALFORMED_FRAME,
    details?: Record<string, unknown>,
  ) {
    super(message, code, ErrorSeverity.WARNING, details);
    this.name = 'ProtocolError';
  }
}

export class TransportError extends HintsError {
  constructor(
    message: string,
    code: ErrorCode = ErrorCode.CONNECTION_CLOSED,
    details?: Record<string, unknown>,
    cause?: Error,
  ) {
    super(message, code, ErrorSeverity.ERROR, details, cause);
    this.name = 'TransportError';
  }
}

export class DeviceError extends HintsError {
  constructor(
    message: string,
    code: ErrorCode = ErrorCode.DEVICE_UNAVAILABLE,
    details?: Record<string, unknown>,
    cause?: Error,
  ) {
    super(
      message,
      code,
      code === ErrorCode.DEVICE_UNAVAILABLE ? ErrorSeverity.ERROR : ErrorSeverity.CRITICAL,
      details,
      cause,
    );
    this.name = 'DeviceError';
  }

  /**
   * Device loss and stalled writes leave the daemon unable to serve anything
   */
  get isFatal(): boolean {
    return this.code === ErrorCode.DEVICE_LOST || this.code === ErrorCode.DEVICE_STALLED;
  }

  static unavailable(device: string, cause?: Error): DeviceError {
    return new DeviceError(
      `Input device "${device}" is unavailable${cause ? `: ${cause.message}` : ''}`,
      ErrorCode.DEVICE_UNAVAILABLE,
      { device },
      cause,
    );
  }

  static lost(device: string, cause?: Error): DeviceError {
    return new DeviceError(
      `Input device "${device}" was lost${cause ? `: ${cause.message}` : ''}`,
      ErrorCode.DEVICE_LOST,
      { device },
      cause,
    );
  }

  static stalled(device: string, timeoutMs: number): DeviceError {
    return new DeviceError(
      `Write to input device "${device}" did not complete within ${timeoutMs}ms`,
      ErrorCode.DEVICE_STALLED,
      { device, timeoutMs },
    );
  }

  static isDeviceError(error: unknown): error is DeviceError {
    return error instanceof DeviceError;
  }
}

export class RangeCheckError extends HintsError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, ErrorCode.OUT_OF_RANGE, ErrorSeverity.WARNING, details);
    this.name = 'RangeCheckError';
  }
}

export class ScanError extends HintsError {
  constructor(
    message: string,
    code: ErrorCode = ErrorCode.SCAN_FAILED,
    details?: Record<string, unknown>,
    cause?: Error,
  ) {
    super(message, code, ErrorSeverity.ERROR, details, cause);
    this.name = 'ScanError';
  }
}

export class ConfigError extends HintsError {
  constructor(message: string, details?: Record<string, unknown>, cause?: Error) {
    super(message, ErrorCode.INVALID_CONFIG, ErrorSeverity.ERROR, details, cause);
    this.name = 'ConfigError';
  }
}
