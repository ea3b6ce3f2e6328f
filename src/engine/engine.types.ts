/**
 * Hint Engine Types
 */

import type { Element, Point } from '../shared/types/index.js';
import type { AllocatorOptions, HintSessionOptions, SessionStatus } from '../hints/index.js';
import type { DispatchOutcome } from '../dispatch/index.js';

export interface HintEngineConfig {
  allocator: AllocatorOptions;
  session?: HintSessionOptions;
  /** Truncation keeps the elements closest to this point (default: 0,0) */
  origin?: Point;
}

/**
 * How a session ended, and what it sent to the daemon
 */
export interface SessionSummary {
  status: Exclude<SessionStatus, 'active'>;
  outcomes: DispatchOutcome[];
}

/**
 * Events emitted by HintEngine
 */
export interface HintEngineEvents {
  'session-started': { labels: ReadonlyMap<string, Element>; truncated: number };
  'key-rejected': { key: string; reason: string };
  'action-dispatched': { outcome: DispatchOutcome };
  'session-ended': SessionSummary;
}
