/**
 * CLI Output
 *
 * Plain-text rendering of labels and dispatch outcomes for the terminal.
 */

import { centerOf, type Element } from '../shared/types/index.js';
import type { DispatchOutcome } from '../dispatch/index.js';

/**
 * One line per label: label, centre, role, id
 */
export function formatLabelTable(labels: ReadonlyMap<string, Element>, truncated = 0): string {
  if (labels.size === 0) {
    return 'No elements to label.';
  }

  const width = Math.max(...Array.from(labels.keys(), (label) => label.length));
  const lines = Array.from(labels, ([label, element]) => {
    const { x, y } = centerOf(element.boundingBox);
    return `${label.padEnd(width)}  (${x}, ${y})  ${element.role}  ${element.id}`;
  });

  if (truncated > 0) {
    lines.push(`(${truncated} more elements not labelled)`);
  }
  return lines.join('\n');
}

export function formatOutcome(outcome: DispatchOutcome): string {
  const result = outcome.response.outcome === 'ok' ? 'ok' : `error: ${outcome.response.kind}`;
  return `${outcome.action.kind} -> ${result}`;
}
