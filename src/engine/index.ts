export * from './engine.types.js';
export * from './hint-engine.js';
