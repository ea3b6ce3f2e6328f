/**
 * Element Scanner Interface
 *
 * A scanning backend produces the on-screen candidates for one hint session.
 */

import type { Element } from '../shared/types/index.js';

export interface ElementScanner {
  /** Backend name for logs */
  readonly name: string;

  /**
   * Produce the current candidates, in backend order.
   * Called once per session start; must settle before labels are allocated.
   */
  scan(): Promise<Element[]>;
}
