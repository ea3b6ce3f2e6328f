/**
 * Shared base types used across all domains
 */

/**
 * Axis-aligned rectangle in absolute screen pixels
 */
export interface BoundingBox {
  x: number;
  y: number;
  width: number;
  height: number;
}

export interface Point {
  x: number;
  y: number;
}

/**
 * A candidate on-screen target produced by a scanning backend.
 * Immutable once produced; discarded when its hint session ends.
 */
export interface Element {
  /** Opaque handle assigned by the backend */
  readonly id: string;
  readonly boundingBox: BoundingBox;
  /** Backend role name, e.g. "PushButton" */
  readonly role: string;
}

export type MouseButton = 'left' | 'right' | 'middle';

export type Direction = 'up' | 'down' | 'left' | 'right';

export const DIRECTIONS: readonly Direction[] = ['up', 'down', 'left', 'right'];

/**
 * Modifier keys that influence how a committed label is acted upon
 */
export type Modifier = 'shift' | 'alt' | 'ctrl';

/**
 * Centre of a bounding box, truncated to whole pixels
 */
export function centerOf(box: BoundingBox): Point {
  return {
    x: Math.floor(box.x + box.width / 2),
    y: Math.floor(box.y + box.height / 2),
  };
}

/**
 * Unit vector for a direction in screen space (y grows downward)
 */
export function directionVector(direction: Direction): Point {
  switch (direction) {
    case 'up':
      return { x: 0, y: -1 };
    case 'down':
      return { x: 0, y: 1 };
    case 'left':
      return { x: -1, y: 0 };
    case 'right':
      return { x: 1, y: 0 };
  }
}
