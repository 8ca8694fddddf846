import { describe, expect, it } from 'vitest';

import {
  DEFAULT_REASONING,
  DEFAULT_RESPONSE,
  impliesOperationUse,
  inferOperationName,
  lookupDecisionField,
  normalizeDecision,
} from '../../response/response-normalizer.js';

const LONG_REASONING = 'The output directory does not exist yet, so it has to be created first';

describe('lookupDecisionField', () => {
  it('ignores case and separators', () => {
    expect(lookupDecisionField('Task_Completed')).toBe('taskCompleted');
    expect(lookupDecisionField('task-complete')).toBe('taskCompleted');
    expect(lookupDecisionField('Tool Name')).toBe('operationName');
    expect(lookupDecisionField('final_answer')).toBe('response');
    expect(lookupDecisionField('colour')).toBeUndefined();
  });
});

describe('normalizeDecision', () => {
  it('reads the canonical nested shape', () => {
    const { decision, statedReasoning, warnings } = normalizeDecision({
      taskCompleted: false,
      reasoning: LONG_REASONING,
      nextStep: {
        requiresOperation: true,
        operationName: 'DirectoryCreate',
        parameters: { path: 'out' },
        confidence: 0.9,
      },
      response: 'Creating the directory',
    });
    expect(decision).toEqual({
      taskCompleted: false,
      reasoning: LONG_REASONING,
      nextStep: {
        requiresOperation: true,
        operationName: 'DirectoryCreate',
        parameters: { path: 'out' },
        confidence: 0.9,
        assumptions: [],
        risks: [],
      },
      response: 'Creating the directory',
    });
    expect(statedReasoning).toBe(LONG_REASONING);
    expect(warnings).toEqual([]);
  });

  it('maps synonyms and loose values', () => {
    const { decision } = normalizeDecision({
      done: 'yes',
      thought: 'All files were written as the user requested',
      answer: { message: 'Wrote 3 files' },
      certainty: '90%',
    });
    expect(decision).toEqual({
      taskCompleted: true,
      reasoning: 'All files were written as the user requested',
      nextStep: null,
      response: 'Wrote 3 files',
      confidence: 0.9,
    });
  });

  it('builds a nextStep from flattened top-level fields', () => {
    const { decision } = normalizeDecision({
      Task_Complete: false,
      Tool: 'FileRead',
      Params: { path: 'a.txt' },
      Risks: 'file may be large',
    });
    expect(decision.nextStep).toEqual({
      requiresOperation: true,
      operationName: 'FileRead',
      parameters: { path: 'a.txt' },
      confidence: 0.5,
      assumptions: [],
      risks: ['file may be large'],
    });
  });

  it('serializes an object response without a message', () => {
    const { decision } = normalizeDecision({ result: { files: 2 } });
    expect(decision.response).toBe('{"files":2}');
  });

  it('keeps the first synonym for a field', () => {
    const { decision } = normalizeDecision({ response: 'first', answer: 'second' });
    expect(decision.response).toBe('first');
  });

  it('treats completion with a non-null nextStep as not complete', () => {
    const { decision, warnings } = normalizeDecision({
      taskCompleted: true,
      nextStep: { requiresOperation: false },
      response: 'x',
    });
    expect(decision.taskCompleted).toBe(false);
    expect(warnings).toEqual(['taskCompleted was set together with a nextStep; treating the task as not complete']);
  });

  it('does not complete when the nextStep only carries a confidence', () => {
    const { decision } = normalizeDecision({ taskCompleted: true, nextStep: { confidence: 0.5 } });
    expect(decision.taskCompleted).toBe(false);
    expect(decision.nextStep?.confidence).toBe(0.5);
  });

  it('completes with an explicit null nextStep', () => {
    const { decision } = normalizeDecision({ taskCompleted: true, nextStep: null, response: 'done' });
    expect(decision.taskCompleted).toBe(true);
    expect(decision.nextStep).toBeNull();
  });

  it('turns a string nextStep into reasoning and treats "none" as empty', () => {
    const described = normalizeDecision({ taskCompleted: false, nextStep: 'Check the output directory next' });
    expect(described.decision.nextStep).toEqual({
      requiresOperation: false,
      parameters: {},
      confidence: 0.5,
      assumptions: [],
      risks: [],
      reasoning: 'Check the output directory next',
    });
    expect(described.statedReasoning).toBe('Check the output directory next');
    expect(described.decision.reasoning).toBe('Check the output directory next');

    const empty = normalizeDecision({ taskCompleted: true, nextStep: 'none' });
    expect(empty.decision.nextStep).toBeNull();
    expect(empty.decision.taskCompleted).toBe(true);
  });

  it('infers an operation the reasoning narrates', () => {
    const { decision, warnings } = normalizeDecision({
      taskCompleted: false,
      reasoning: 'I will use the mkdir tool to create the folder',
    });
    expect(decision.nextStep?.requiresOperation).toBe(true);
    expect(decision.nextStep?.operationName).toBe('DirectoryCreate');
    expect(warnings).toEqual(["inferred operation 'DirectoryCreate' from the reasoning text"]);
  });

  it('does not infer when requiresOperation was stated', () => {
    const { decision } = normalizeDecision({ requiresOperation: false, reasoning: 'No need to use the math tool here at all' });
    expect(decision.nextStep?.requiresOperation).toBe(false);
    expect(decision.nextStep?.operationName).toBeUndefined();
  });

  it('does not infer without a known keyword', () => {
    const { decision } = normalizeDecision({ reasoning: 'I should use a tool for this' });
    expect(decision.nextStep).toBeNull();
  });

  it('falls back to defaults', () => {
    const { decision, statedReasoning } = normalizeDecision({});
    expect(decision).toEqual({ taskCompleted: false, reasoning: DEFAULT_REASONING, nextStep: null, response: DEFAULT_RESPONSE });
    expect(statedReasoning).toBeUndefined();
  });
});

describe('operation inference helpers', () => {
  it('recognizes invocation phrasing', () => {
    expect(impliesOperationUse('Let me use the download tool')).toBe(true);
    expect(impliesOperationUse('We should USE operations here')).toBe(true);
    expect(impliesOperationUse('the tool is useful')).toBe(false);
  });

  it('picks the first matching keyword', () => {
    expect(inferOperationName('download the github repo')).toBe('GitHubDownloader');
    expect(inferOperationName('calculate 2+2')).toBe('MathEvaluator');
    expect(inferOperationName('read file notes.txt')).toBe('FileRead');
    expect(inferOperationName('nothing relevant')).toBeUndefined();
  });
});
