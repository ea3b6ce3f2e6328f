/**
 * Hint Resolution Types
 */

import type { Direction, Modifier } from '../shared/types/index.js';

/**
 * Keystroke matcher phases
 *
 * idle -> count (digits) -> label (label characters) -> committed | cancelled
 */
export type MatcherPhase = 'idle' | 'count' | 'label' | 'committed' | 'cancelled';

/**
 * Accumulated interpretation state of a matcher
 */
export interface PendingInput {
  /** Parsed repeat prefix, undefined when no digit was typed */
  repeatCount?: number;
  modifiers: ReadonlySet<Modifier>;
  labelBuffer: string;
}

/**
 * What a committing keystroke resolved to, before the action policy applies
 */
export type MatcherCommit =
  | {
      type: 'label';
      label: string;
      modifiers: ReadonlySet<Modifier>;
      repeat: number;
    }
  | {
      type: 'direction';
      direction: Direction;
      modifiers: ReadonlySet<Modifier>;
      repeat: number;
    }
  | {
      /** Enter with an empty buffer, only while confirmation is enabled */
      type: 'confirm';
      modifiers: ReadonlySet<Modifier>;
      repeat: number;
    };

export type MatchResult =
  | { status: 'pending'; phase: MatcherPhase }
  | { status: 'rejected'; reason: string }
  | { status: 'committed'; commit: MatcherCommit }
  | { status: 'cancelled' }
  /** The matcher is already in a terminal phase */
  | { status: 'ignored' };
