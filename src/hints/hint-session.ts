/**
 * Hint Session
 *
 * One active label -> element mapping plus the keystroke matcher that
 * interprets input against it. A session lives from "hints shown" to
 * "action committed or cancelled"; an open drag keeps it alive until the
 * release has been committed.
 */

import type { Element, MouseButton } from '../shared/types/index.js';
import type { KeyEvent } from '../keys/keys.types.js';
import { KeystrokeMatcher, type KeystrokeMatcherOptions } from './keystroke-matcher.js';
import { resolveDirectionAction, resolveLabelAction } from './action-policy.js';
import {
  DEFAULT_MODIFIER_BINDINGS,
  type Action,
  type ModifierBindings,
  type ReleaseAction,
} from './action.types.js';
import type { MatcherCommit, PendingInput } from './types.js';

export type SessionStatus = 'active' | 'committed' | 'cancelled';

export interface HintSessionOptions extends Omit<KeystrokeMatcherOptions, 'confirmEnabled'> {
  bindings?: ModifierBindings;
}

/**
 * A drag whose button is still held
 */
export interface OpenDrag {
  button: MouseButton;
  origin: Element;
}

/**
 * Outcome of feeding one keystroke to a session
 */
export type SessionStep =
  | { kind: 'pending'; pending: PendingInput; candidates: string[] }
  | { kind: 'rejected'; reason: string }
  | { kind: 'ignored' }
  /** `done` is true when the session ended with this action */
  | { kind: 'action'; action: Action; done: boolean }
  /** `release` is set when cancelling had to let go of an open drag */
  | { kind: 'cancelled'; release?: ReleaseAction };

export class HintSession {
  readonly labels: ReadonlyMap<string, Element>;

  private readonly matcher: KeystrokeMatcher;
  private readonly bindings: ModifierBindings;
  private _status: SessionStatus;
  private _openDrag: OpenDrag | null = null;

  constructor(labels: ReadonlyMap<string, Element>, options: HintSessionOptions = {}) {
    this.labels = labels;
    this.bindings = options.bindings ?? DEFAULT_MODIFIER_BINDINGS;
    this.matcher = new KeystrokeMatcher(labels.keys(), {
      directionKeys: options.directionKeys,
      maxRepeat: options.maxRepeat,
    });
    // An empty session has nothing to act on
    this._status = labels.size === 0 ? 'cancelled' : 'active';
  }

  get status(): SessionStatus {
    return this._status;
  }

  get isEmpty(): boolean {
    return this.labels.size === 0;
  }

  get openDrag(): OpenDrag | null {
    return this._openDrag;
  }

  get pending(): PendingInput {
    return this.matcher.pending;
  }

  /**
   * Labels still reachable from the typed prefix
   */
  candidates(): string[] {
    return this.matcher.candidates();
  }

  /**
   * Feed one keystroke
   */
  handleKey(event: KeyEvent): SessionStep {
    if (this._status !== 'active') {
      return { kind: 'ignored' };
    }

    const result = this.matcher.feed(event);

    switch (result.status) {
      case 'ignored':
        return { kind: 'ignored' };
      case 'rejected':
        return { kind: 'rejected', reason: result.reason };
      case 'pending':
        return {
          kind: 'pending',
          pending: this.matcher.pending,
          candidates: this.matcher.candidates(),
        };
      case 'cancelled':
        return this.cancel();
      case 'committed':
        return this.resolve(result.commit);
    }
  }

  private resolve(commit: MatcherCommit): SessionStep {
    const drag = this._openDrag;

    if (commit.type === 'direction') {
      return this.continueWith(resolveDirectionAction(commit.direction, commit.modifiers, commit.repeat));
    }

    if (commit.type === 'confirm') {
      // The matcher only commits Enter while a drag is open
      return drag ? this.finishWith({ kind: 'release', button: drag.button }) : { kind: 'ignored' };
    }

    const target = this.labels.get(commit.label);
    if (!target) {
      return { kind: 'rejected', reason: `unknown label "${commit.label}"` };
    }

    if (drag) {
      return this.finishWith({ kind: 'release', button: drag.button, target });
    }

    const action = resolveLabelAction(target, commit.modifiers, commit.repeat, this.bindings);
    if (action.kind === 'drag') {
      this._openDrag = { button: action.button, origin: target };
      return this.continueWith(action);
    }

    return this.finishWith(action);
  }

  /**
   * Commit an action and keep the session open for follow-up input
   */
  private continueWith(action: Action): SessionStep {
    this.matcher.reset();
    this.matcher.setConfirmEnabled(this._openDrag !== null);
    return { kind: 'action', action, done: false };
  }

  private finishWith(action: Action): SessionStep {
    this._openDrag = null;
    this._status = 'committed';
    return { kind: 'action', action, done: true };
  }

  private cancel(): SessionStep {
    const drag = this._openDrag;
    this._openDrag = null;
    this._status = 'cancelled';
    if (drag) {
      return { kind: 'cancelled', release: { kind: 'release', button: drag.button } };
    }
    return { kind: 'cancelled' };
  }
}
