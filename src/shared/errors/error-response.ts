/**
 * Error Report Utilities
 *
 * Turns thrown values into structured errors and human-readable reports for the CLIs
 */

import { ErrorCode } from './error-codes.js';
import { HintsError, type StructuredError } from './hints-error.js';

/**
 * Normalize any thrown value into a HintsError
 */
export function toHintsError(error: unknown): HintsError {
  if (error instanceof HintsError) {
    return error;
  }
  if (error instanceof Error) {
    return HintsError.fromError(error);
  }
  return new HintsError(String(error), ErrorCode.UNKNOWN_ERROR);
}

/**
 * Create a structured error object
 *
 * @param error - Error to convert
 * @param includeStack - Whether to include stack trace (default: process.env.NODE_ENV !== 'production')
 */
export function createStructuredError(
  error: unknown,
  includeStack: boolean = process.env.NODE_ENV !== 'production',
): StructuredError {
  const structured = toHintsError(error).toStructured();

  if (!includeStack) {
    delete structured.stack;
  }

  return structured;
}

/**
 * Format an error as the multi-line report printed by the CLIs
 *
 * @param error - Error to describe
 * @param includeStack - Whether to append the stack trace
 */
export function formatErrorReport(error: unknown, includeStack = false): string {
  const structured = createStructuredError(error, includeStack);

  const textParts: string[] = [
    `Error: ${structured.error}`,
    `Code: ${structured.code}`,
    `Severity: ${structured.severity}`,
  ];

  if (structured.details && Object.keys(structured.details).length > 0) {
    textParts.push(`Details: ${JSON.stringify(structured.details)}`);
  }

  if (includeStack && structured.stack) {
    textParts.push(`\nStack trace:\n${structured.stack}`);
  }

  return textParts.join('\n');
}
