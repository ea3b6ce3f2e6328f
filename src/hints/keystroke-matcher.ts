/**
 * Keystroke Matcher
 *
 * Single-session state machine that consumes one keystroke at a time and
 * either stays pending or commits to a label, a direction, or a confirmation.
 * Every transition is synchronous; keystrokes are never reordered.
 */

import type { Direction, Modifier } from '../shared/types/index.js';
import type { KeyEvent } from '../keys/keys.types.js';
import type { MatchResult, MatcherCommit, MatcherPhase, PendingInput } from './types.js';

/** Arrow keys always move, whatever the letter bindings are */
export const ARROW_KEY_DIRECTIONS: Readonly<Record<string, Direction>> = {
  ArrowLeft: 'left',
  ArrowDown: 'down',
  ArrowUp: 'up',
  ArrowRight: 'right',
};

export const DEFAULT_DIRECTION_KEYS: Readonly<Record<string, Direction>> = {
  h: 'left',
  j: 'down',
  k: 'up',
  l: 'right',
  ...ARROW_KEY_DIRECTIONS,
};

export const DEFAULT_MAX_REPEAT = 999;

export interface KeystrokeMatcherOptions {
  /** Key -> direction table (default: h/j/k/l and arrows) */
  directionKeys?: Readonly<Record<string, Direction>>;
  /** Largest accepted repeat prefix (default: 999) */
  maxRepeat?: number;
  /** Whether Enter commits a confirmation (default: false) */
  confirmEnabled?: boolean;
}

const MODIFIER_KEYS: Readonly<Record<string, Modifier>> = {
  Shift: 'shift',
  Alt: 'alt',
  Control: 'ctrl',
};

/**
 * Split a raw key event into its normalized key and the modifiers it carries.
 * An uppercase letter counts as Shift held.
 */
export function normalizeKey(event: KeyEvent): { key: string; modifiers: Modifier[] } {
  const modifiers: Modifier[] = [];
  let key = event.key;

  if (key.length === 1 && key !== key.toLowerCase()) {
    key = key.toLowerCase();
    modifiers.push('shift');
  } else if (event.shift) {
    modifiers.push('shift');
  }
  if (event.alt) modifiers.push('alt');
  if (event.ctrl) modifiers.push('ctrl');

  return { key, modifiers };
}

function isDigit(key: string): boolean {
  return key.length === 1 && key >= '0' && key <= '9';
}

export class KeystrokeMatcher {
  private readonly labels: readonly string[];
  private readonly directionKeys: Readonly<Record<string, Direction>>;
  private readonly maxRepeat: number;
  private confirmEnabled: boolean;

  private _phase: MatcherPhase = 'idle';
  private digits = '';
  private buffer = '';
  private readonly modifiers = new Set<Modifier>();

  /**
   * @param labels - Active labels of the session
   */
  constructor(labels: Iterable<string>, options: KeystrokeMatcherOptions = {}) {
    this.labels = Array.from(labels);
    this.directionKeys = options.directionKeys ?? DEFAULT_DIRECTION_KEYS;
    this.maxRepeat = options.maxRepeat ?? DEFAULT_MAX_REPEAT;
    this.confirmEnabled = options.confirmEnabled ?? false;
  }

  get phase(): MatcherPhase {
    return this._phase;
  }

  get isTerminal(): boolean {
    return this._phase === 'committed' || this._phase === 'cancelled';
  }

  /**
   * Current accumulated input (copies; safe to keep)
   */
  get pending(): PendingInput {
    return {
      repeatCount: this.digits ? Number.parseInt(this.digits, 10) : undefined,
      modifiers: new Set(this.modifiers),
      labelBuffer: this.buffer,
    };
  }

  /**
   * Labels still reachable from the current buffer
   */
  candidates(): string[] {
    return this.labels.filter((label) => label.startsWith(this.buffer));
  }

  setConfirmEnabled(enabled: boolean): void {
    this.confirmEnabled = enabled;
  }

  /**
   * Discard all accumulated input and return to idle
   */
  reset(): void {
    this._phase = 'idle';
    this.digits = '';
    this.buffer = '';
    this.modifiers.clear();
  }

  /**
   * Consume one keystroke
   */
  feed(event: KeyEvent): MatchResult {
    if (this.isTerminal) {
      return { status: 'ignored' };
    }

    if (event.key === 'Escape') {
      this.reset();
      this._phase = 'cancelled';
      return { status: 'cancelled' };
    }

    const modifierKey = MODIFIER_KEYS[event.key];
    if (modifierKey) {
      this.modifiers.add(modifierKey);
      return { status: 'pending', phase: this._phase };
    }

    const { key, modifiers } = normalizeKey(event);

    if (key === 'Backspace') {
      return this.erase();
    }

    if (key === 'Enter') {
      if (!this.confirmEnabled || this.buffer) {
        return { status: 'rejected', reason: 'nothing to confirm' };
      }
      this.acceptModifiers(modifiers);
      return this.commit({ type: 'confirm', modifiers: new Set(this.modifiers), repeat: this.repeat() });
    }

    if (isDigit(key)) {
      return this.appendDigit(key, modifiers);
    }

    const direction = this.directionKeys[key];
    if (direction && !this.buffer && !this.labels.some((label) => label.startsWith(key))) {
      this.acceptModifiers(modifiers);
      return this.commit({
        type: 'direction',
        direction,
        modifiers: new Set(this.modifiers),
        repeat: this.repeat(),
      });
    }

    if (key.length !== 1) {
      return { status: 'rejected', reason: `unhandled key "${key}"` };
    }

    return this.appendLabelCharacter(key, modifiers);
  }

  private appendDigit(digit: string, modifiers: Modifier[]): MatchResult {
    if (this._phase !== 'idle' && this._phase !== 'count') {
      return { status: 'rejected', reason: 'repeat count must precede the label' };
    }
    if (!this.digits && digit === '0') {
      return { status: 'rejected', reason: 'repeat count cannot start with 0' };
    }

    const next = this.digits + digit;
    if (Number.parseInt(next, 10) > this.maxRepeat) {
      return { status: 'rejected', reason: `repeat count exceeds ${this.maxRepeat}` };
    }

    this.digits = next;
    this.acceptModifiers(modifiers);
    this._phase = 'count';
    return { status: 'pending', phase: this._phase };
  }

  private appendLabelCharacter(ch: string, modifiers: Modifier[]): MatchResult {
    const candidate = this.buffer + ch;
    const matches = this.labels.filter((label) => label.startsWith(candidate));

    if (matches.length === 0) {
      return { status: 'rejected', reason: `no label starts with "${candidate}"` };
    }

    this.buffer = candidate;
    this.acceptModifiers(modifiers);

    if (matches.length === 1 && matches[0] === candidate) {
      return this.commit({
        type: 'label',
        label: candidate,
        modifiers: new Set(this.modifiers),
        repeat: this.repeat(),
      });
    }

    this._phase = 'label';
    return { status: 'pending', phase: this._phase };
  }

  private erase(): MatchResult {
    if (this.buffer) {
      this.buffer = this.buffer.slice(0, -1);
    } else if (this.digits) {
      this.digits = this.digits.slice(0, -1);
    } else {
      return { status: 'rejected', reason: 'nothing to erase' };
    }

    if (!this.buffer) {
      this._phase = this.digits ? 'count' : 'idle';
    }
    return { status: 'pending', phase: this._phase };
  }

  private acceptModifiers(modifiers: Modifier[]): void {
    for (const modifier of modifiers) {
      this.modifiers.add(modifier);
    }
  }

  private repeat(): number {
    return this.digits ? Number.parseInt(this.digits, 10) : 1;
  }

  private commit(commit: MatcherCommit): MatchResult {
    this._phase = 'committed';
    return { status: 'committed', commit };
  }
}
