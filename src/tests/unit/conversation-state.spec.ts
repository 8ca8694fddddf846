import { describe, expect, it } from 'vitest';

import type { OperationResult } from '../../types.js';

import { formatOperationResult, rejectedOperationResult, RESULT_OUTPUT_MAX_BYTES } from '../../conversation/prompt-builder.js';
import { ConversationStateMachine, IllegalTransitionError } from '../../conversation/state-machine.js';
import { ALTERNATIVES_EXHAUSTED } from '../../operations/resilient-invoker.js';

const result = (overrides: Partial<OperationResult>): OperationResult => ({
  success: true,
  executionTimeMs: 5,
  totalAttempts: 1,
  methodUsed: 'primary',
  hasMoreAlternatives: false,
  ...overrides,
});

describe('ConversationStateMachine', () => {
  it('records the states it visits', () => {
    const machine = new ConversationStateMachine();
    machine.transition('awaiting_decision');
    machine.transition('invoking_operation');
    machine.transition('awaiting_decision');
    machine.transition('completed');
    expect(machine.history).toEqual(['started', 'awaiting_decision', 'invoking_operation', 'awaiting_decision', 'completed']);
    expect(machine.isTerminal).toBe(true);
  });

  it('rejects transitions the loop never makes', () => {
    const machine = new ConversationStateMachine();
    expect(() => { machine.transition('completed'); }).toThrow(new IllegalTransitionError('started', 'completed'));
    machine.transition('aborted');
    expect(() => { machine.transition('awaiting_decision'); }).toThrow('illegal conversation transition aborted -> awaiting_decision');
    expect(machine.current).toBe('aborted');
  });
});

describe('formatOperationResult', () => {
  it('narrates a success with its output', () => {
    expect(formatOperationResult('FileRead', result({ output: { lines: 2 } })))
      .toBe('FileRead succeeded (method: primary, 1 attempt)\nOutput:\n{\n  "lines": 2\n}');
  });

  it('narrates a failure with its kind', () => {
    expect(formatOperationResult('Download', result({ success: false, errorKind: 'timeout', errorMessage: 'slow', totalAttempts: 2 })))
      .toBe('Download failed (timeout, 2 attempts)\nError: slow');
  });

  it('says when every alternative was tried', () => {
    const exhausted = result({ success: false, methodUsed: ALTERNATIVES_EXHAUSTED, totalAttempts: 4, errorMessage: 'All methods failed. primary: p' });
    expect(formatOperationResult('GitHubDownloader', exhausted))
      .toBe('GitHubDownloader failed after trying every alternative method (4 attempts)\nError: All methods failed. primary: p');
  });

  it('truncates long output', () => {
    const text = formatOperationResult('FileRead', result({ output: 'x'.repeat(RESULT_OUTPUT_MAX_BYTES * 2) }));
    expect(text).toContain('TRUNCATED');
    expect(Buffer.byteLength(text, 'utf8')).toBeLessThan(RESULT_OUTPUT_MAX_BYTES + 100);
  });

  it('builds results for requests that never ran', () => {
    expect(rejectedOperationResult('unknown_operation', 'no such thing')).toEqual({
      success: false,
      errorMessage: 'no such thing',
      errorKind: 'unknown_operation',
      executionTimeMs: 0,
      totalAttempts: 0,
      methodUsed: 'primary',
      hasMoreAlternatives: false,
    });
  });
});
