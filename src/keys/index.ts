/**
 * Keystroke Sources
 */

export * from './keys.types.js';
export * from './terminal-keystroke-source.js';
