/**
 * Execution Daemon Types
 */

import type { ScreenSize } from '../shared/schemas/index.js';
import type { CommandRequestType, CommandResponse } from '../protocol/index.js';
import type { DeviceError } from '../shared/errors/index.js';

/**
 * Pauses inserted between device writes so compositors register each step
 */
export interface ExecutionTiming {
  /** After positioning the pointer, before button transitions */
  settleMs: number;
  /** Between consecutive button transitions */
  buttonPauseMs: number;
  /** Between consecutive move or scroll steps */
  stepPauseMs: number;
}

export interface CommandExecutorConfig extends ExecutionTiming {
  /** Logical -> device pixel multiplier */
  scaleFactor: number;
  /** Display bounds in logical pixels; absolute targets outside are rejected */
  screen?: ScreenSize;
  /** A device write taking longer than this is fatal */
  writeStallMs: number;
}

export interface DaemonServerConfig {
  socketPath: string;
  maxFrameBytes: number;
}

/**
 * Events emitted by DaemonServer
 */
export interface DaemonServerEvents {
  listening: { socketPath: string };
  request: { connectionId: number; type: CommandRequestType };
  response: { connectionId: number; response: CommandResponse };
  fatal: { error: DeviceError };
  closed: { socketPath: string };
}
