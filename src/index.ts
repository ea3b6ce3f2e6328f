/**
 * keyhints
 *
 * Keyboard hint-driven pointer control: label allocation, keystroke
 * matching, action dispatch, and the execution daemon's command protocol.
 */

export * from './shared/types/index.js';
export * from './shared/schemas/index.js';
export * from './shared/errors/index.js';
export {
  LoggingService,
  createLogger,
  getLogger,
  setLogger,
  type Logger,
  type LogLevel,
} from './shared/services/logging.service.js';
export * from './hints/index.js';
export * from './keys/index.js';
export * from './protocol/index.js';
export * from './client/index.js';
export * from './dispatch/index.js';
export * from './scanning/index.js';
export * from './engine/index.js';
export * from './daemon/index.js';
export * from './config/index.js';
