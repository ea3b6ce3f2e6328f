/**
 * Execution Daemon
 */

export * from './daemon.types.js';
export * from './input-device.interface.js';
export * from './execution-queue.js';
export * from './command-executor.js';
export * from './ydotool-device.js';
export * from './daemon-server.js';
