/**
 * Error Type Unit Tests
 */

import { describe, it, expect } from 'vitest';
import {
  DeviceError,
  ErrorCode,
  ErrorSeverity,
  HintsError,
  ScanError,
  createStructuredError,
  formatErrorReport,
  toHintsError,
} from '../../../src/shared/errors/index.js';

describe('DeviceError', () => {
  it('should treat only loss and stalls as fatal', () => {
    expect(DeviceError.unavailable('ydotool').isFatal).toBe(false);
    expect(DeviceError.lost('ydotool').isFatal).toBe(true);
    expect(DeviceError.stalled('ydotool', 100).isFatal).toBe(true);
  });

  it('should carry the cause message', () => {
    const error = DeviceError.unavailable('ydotool', new Error('socket missing'));

    expect(error.message).toBe('Input device "ydotool" is unavailable: socket missing');
    expect(error.severity).toBe(ErrorSeverity.ERROR);
    expect(error.details).toEqual({ device: 'ydotool' });
  });
});

describe('toHintsError', () => {
  it('should pass HintsErrors through and wrap everything else', () => {
    const scan = new ScanError('nothing found', ErrorCode.NO_ELEMENTS);
    expect(toHintsError(scan)).toBe(scan);

    const wrapped = toHintsError(new Error('plain'));
    expect(wrapped).toBeInstanceOf(HintsError);
    expect(wrapped.code).toBe(ErrorCode.UNKNOWN_ERROR);

    expect(toHintsError('text').message).toBe('text');
  });
});

describe('createStructuredError', () => {
  it('should omit the stack when asked to', () => {
    const structured = createStructuredError(new ScanError('nothing found'), false);

    expect(structured).toEqual({
      error: 'nothing found',
      code: ErrorCode.SCAN_FAILED,
      severity: ErrorSeverity.ERROR,
      details: undefined,
    });
  });
});

describe('formatErrorReport', () => {
  it('should list message, code, severity and details', () => {
    const report = formatErrorReport(DeviceError.stalled('ydotool', 5000));

    expect(report).toBe(
      [
        'Error: Write to input device "ydotool" did not complete within 5000ms',
        'Code: DEVICE_STALLED',
        'Severity: critical',
        'Details: {"device":"ydotool","timeoutMs":5000}',
      ].join('\n')
    );
  });
});
