/**
 * Action Types
 *
 * A committed Action carries everything the dispatcher needs to build a
 * command request without further lookups.
 */

import type { Direction, Element, MouseButton } from '../shared/types/index.js';

export interface ClickAction {
  kind: 'click';
  button: MouseButton;
  /** Number of click units (press + release), at least 1 */
  repeat: number;
  target: Element;
}

export interface DoubleClickAction {
  kind: 'double-click';
  target: Element;
}

/**
 * First phase of a drag: press and hold at the target
 */
export interface DragAction {
  kind: 'drag';
  button: MouseButton;
  target: Element;
}

/**
 * Second phase of a drag: release the held button, at a target element or
 * at the current pointer position when no target is given
 */
export interface ReleaseAction {
  kind: 'release';
  button: MouseButton;
  target?: Element;
}

export interface HoverAction {
  kind: 'hover';
  target: Element;
}

export interface MoveAction {
  kind: 'move';
  direction: Direction;
  steps: number;
}

export interface ScrollAction {
  kind: 'scroll';
  direction: Direction;
  steps: number;
}

export type Action =
  | ClickAction
  | DoubleClickAction
  | DragAction
  | ReleaseAction
  | HoverAction
  | MoveAction
  | ScrollAction;

export type ActionKind = Action['kind'];

/**
 * What a label commit does, as bound to a modifier
 */
export type LabelActionBinding =
  | 'left-click'
  | 'right-click'
  | 'middle-click'
  | 'double-click'
  | 'drag'
  | 'hover';

/**
 * Modifier -> label action table
 */
export interface ModifierBindings {
  none: LabelActionBinding;
  shift: LabelActionBinding;
  alt: LabelActionBinding;
  ctrl: LabelActionBinding;
}

export const DEFAULT_MODIFIER_BINDINGS: Readonly<ModifierBindings> = {
  none: 'left-click',
  shift: 'right-click',
  alt: 'drag',
  ctrl: 'hover',
};
