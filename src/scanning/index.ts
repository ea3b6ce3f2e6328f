/**
 * Element Scanning
 */

export * from './scanner.interface.js';
export * from './json-element-scanner.js';
export * from './fallback-scanner.js';
