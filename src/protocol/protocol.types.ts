/**
 * Command Protocol Types
 *
 * Request/response contract between the hint UI and the execution daemon.
 */

import type { Direction, MouseButton } from '../shared/types/index.js';

/** Wire format version carried in byte 0 of every payload */
export const PROTOCOL_VERSION = 1;

/** Largest payload accepted by default */
export const DEFAULT_MAX_FRAME_BYTES = 64 * 1024;

/** Length prefix size in bytes */
export const FRAME_HEADER_BYTES = 4;

export type ButtonState = 'down' | 'up';

/**
 * Button transitions at a position.
 *
 * With `absolute` the pointer is first moved to (x, y) in screen pixels;
 * otherwise (x, y) is a relative delta. `buttonStates` is the fully expanded
 * sequence and `repeat` the number of click units it contains.
 */
export interface ClickRequest {
  type: 'click';
  x: number;
  y: number;
  button: MouseButton;
  buttonStates: ButtonState[];
  repeat: number;
  absolute: boolean;
}

/**
 * `steps` relative pointer motions of (dx, dy)
 */
export interface MoveRequest {
  type: 'move';
  dx: number;
  dy: number;
  steps: number;
}

/**
 * `steps` wheel notches in a direction
 */
export interface ScrollRequest {
  type: 'scroll';
  direction: Direction;
  steps: number;
}

/**
 * Absolute pointer move without button events
 */
export interface MoveToRequest {
  type: 'move-to';
  x: number;
  y: number;
}

export type CommandRequest = ClickRequest | MoveRequest | ScrollRequest | MoveToRequest;

export type CommandRequestType = CommandRequest['type'];

export type CommandErrorKind =
  | 'malformed'
  | 'device-unavailable'
  | 'out-of-range'
  | 'unsupported-version';

export type CommandResponse =
  | { outcome: 'ok' }
  | { outcome: 'error'; kind: CommandErrorKind };

export const OK_RESPONSE: CommandResponse = { outcome: 'ok' };

export function errorResponse(kind: CommandErrorKind): CommandResponse {
  return { outcome: 'error', kind };
}
