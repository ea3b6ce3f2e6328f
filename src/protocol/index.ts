/**
 * Command Protocol
 */

export * from './protocol.types.js';
export * from './protocol.schemas.js';
export * from './codec.js';
export * from './framing.js';
