/**
 * Error Handling
 *
 * Exports error types, codes, and report utilities
 */

export * from './error-codes.js';
export * from './hints-error.js';
export * from './error-response.js';
