/**
 * Hint Resolution Engine
 *
 * Label allocation, keystroke matching and modifier -> action policy
 */

export * from './types.js';
export * from './action.types.js';
export * from './label-allocator.js';
export * from './keystroke-matcher.js';
export * from './action-policy.js';
export * from './hint-session.js';
