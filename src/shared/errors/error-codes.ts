/**
 * Error Codes
 *
 * Stable identifiers for every failure the engine, protocol and daemon can surface.
 */

export enum ErrorCode {
  // Label allocation
  TOO_MANY_ELEMENTS = 'TOO_MANY_ELEMENTS',
  INVALID_ALPHABET = 'INVALID_ALPHABET',

  // Wire protocol
  MALFORMED_FRAME = 'MALFORMED_FRAME',
  UNSUPPORTED_VERSION = 'UNSUPPORTED_VERSION',
  FRAME_TOO_LARGE = 'FRAME_TOO_LARGE',

  // Transport (client side)
  SOCKET_NOT_FOUND = 'SOCKET_NOT_FOUND',
  CONNECTION_REFUSED = 'CONNECTION_REFUSED',
  CONNECTION_CLOSED = 'CONNECTION_CLOSED',

  // Injection device
  DEVICE_UNAVAILABLE = 'DEVICE_UNAVAILABLE',
  DEVICE_LOST = 'DEVICE_LOST',
  DEVICE_STALLED = 'DEVICE_STALLED',
  OUT_OF_RANGE = 'OUT_OF_RANGE',

  // Command outcome reported by the daemon
  COMMAND_FAILED = 'COMMAND_FAILED',

  // Scanning
  NO_ELEMENTS = 'NO_ELEMENTS',
  SCAN_FAILED = 'SCAN_FAILED',

  // Configuration
  INVALID_CONFIG = 'INVALID_CONFIG',

  UNKNOWN_ERROR = 'UNKNOWN_ERROR',
}

export enum ErrorSeverity {
  DEBUG = 'debug',
  INFO = 'info',
  WARNING = 'warning',
  ERROR = 'error',
  CRITICAL = 'critical',
}
