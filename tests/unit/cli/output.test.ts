/**
 * CLI Output Tests
 */

import { describe, it, expect } from 'vitest';
import { formatLabelTable, formatOutcome } from '../../../src/cli/output.js';
import { buildCommandRequest } from '../../../src/dispatch/action-dispatcher.js';
import { makeElement } from '../../helpers/test-utils.js';

describe('formatLabelTable', () => {
  it('should say when there is nothing to label', () => {
    expect(formatLabelTable(new Map())).toBe('No elements to label.');
  });

  it('should align labels and show element centres', () => {
    const labels = new Map([
      ['a', makeElement('ok', 0, 0)],
      ['sd', makeElement('cancel', 100, 20, 40, 20)],
    ]);

    expect(formatLabelTable(labels, 2)).toBe(
      [
        'a   (5, 5)  PushButton  ok',
        'sd  (120, 30)  PushButton  cancel',
        '(2 more elements not labelled)',
      ].join('\n')
    );
  });
});

describe('formatOutcome', () => {
  it('should render ok and error responses', () => {
    const action = { kind: 'hover' as const, target: makeElement('1', 0, 0) };
    const request = buildCommandRequest(action);

    expect(formatOutcome({ action, request, response: { outcome: 'ok' } })).toBe('hover -> ok');
    expect(
      formatOutcome({ action, request, response: { outcome: 'error', kind: 'out-of-range' } })
    ).toBe('hover -> error: out-of-range');
  });
});
