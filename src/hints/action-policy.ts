/**
 * Action Policy
 *
 * Pure mapping from (modifiers, repeat, target) to the Action a commit
 * resolves to.
 */

import type { Direction, Element, Modifier } from '../shared/types/index.js';
import {
  DEFAULT_MODIFIER_BINDINGS,
  type Action,
  type LabelActionBinding,
  type ModifierBindings,
  type MoveAction,
  type ScrollAction,
} from './action.types.js';

/** Modifier priority when several are held */
const MODIFIER_PRIORITY: readonly Modifier[] = ['shift', 'alt', 'ctrl'];

/**
 * Pick the binding that applies to a modifier set
 */
export function bindingFor(
  modifiers: ReadonlySet<Modifier>,
  bindings: ModifierBindings = DEFAULT_MODIFIER_BINDINGS,
): LabelActionBinding {
  for (const modifier of MODIFIER_PRIORITY) {
    if (modifiers.has(modifier)) {
      return bindings[modifier];
    }
  }
  return bindings.none;
}

/**
 * Resolve a completed label to an Action.
 *
 * Repeat applies to click bindings only; drag, hover and double-click ignore it.
 */
export function resolveLabelAction(
  target: Element,
  modifiers: ReadonlySet<Modifier>,
  repeat: number,
  bindings: ModifierBindings = DEFAULT_MODIFIER_BINDINGS,
): Action {
  const count = Math.max(1, repeat);

  switch (bindingFor(modifiers, bindings)) {
    case 'left-click':
      return { kind: 'click', button: 'left', repeat: count, target };
    case 'right-click':
      return { kind: 'click', button: 'right', repeat: count, target };
    case 'middle-click':
      return { kind: 'click', button: 'middle', repeat: count, target };
    case 'double-click':
      return { kind: 'double-click', target };
    case 'drag':
      return { kind: 'drag', button: 'left', target };
    case 'hover':
      return { kind: 'hover', target };
  }
}

/**
 * Resolve a direction key: Shift scrolls, anything else moves the pointer
 */
export function resolveDirectionAction(
  direction: Direction,
  modifiers: ReadonlySet<Modifier>,
  repeat: number,
): MoveAction | ScrollAction {
  const steps = Math.max(1, repeat);
  return modifiers.has('shift')
    ? { kind: 'scroll', direction, steps }
    : { kind: 'move', direction, steps };
}
