export * from './dispatch.types.js';
export * from './action-dispatcher.js';
