/**
 * Dispatch Types
 */

import type { Action } from '../hints/index.js';
import type { CommandRequest, CommandResponse } from '../protocol/index.js';

export interface DispatcherOptions {
  /** Pixels per step of a directional move (default: 10) */
  movePixels?: number;
}

/**
 * Result of dispatching one action
 */
export interface DispatchOutcome {
  action: Action;
  request: CommandRequest;
  response: CommandResponse;
}
