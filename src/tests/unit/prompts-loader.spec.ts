import { describe, expect, it } from 'vitest';

import {
  renderContinuePrompt,
  renderInitialPrompt,
  renderOperationResultPrompt,
  renderSystemPrompt,
  renderValidationErrorPrompt,
} from '../../prompts/loader.js';

describe('prompt templates', () => {
  it('renders the initial prompt', () => {
    expect(renderInitialPrompt('make a folder', 's1', '.')).toBe(
      'User Query: make a folder\n\nSession: s1\nWorking directory: .\n\n'
      + 'Decide the next step and reply with the JSON object described in the instructions.',
    );
  });

  it('keeps replacement patterns in values literal', () => {
    expect(renderOperationResultPrompt('cost is $& and $1'))
      .toBe('Operation execution completed. Result: cost is $& and $1. What should I do next?');
  });

  it('drops the trailing space when there is no reasoning to continue from', () => {
    expect(renderContinuePrompt('')).toBe('Please continue working on the task.');
    expect(renderContinuePrompt('Check the output next'))
      .toBe('Please continue working on the task. Check the output next');
  });

  it('states the issue and the reasoning minimum', () => {
    expect(renderValidationErrorPrompt('reasoning is too short', 30)).toBe(
      'Your previous response could not be used: reasoning is too short.\n'
      + 'Reply again with a single JSON object in the required format, with reasoning of at least 30 characters.',
    );
  });

  it('fills every placeholder of the system prompt', () => {
    const prompt = renderSystemPrompt({
      sessionId: 's1',
      operations: '- Echo(text: string): echoes',
      minCompletionConfidence: 0.8,
      minReasoningLength: 30,
    });
    expect(prompt).toContain('Session: s1\n');
    expect(prompt).toContain('AVAILABLE OPERATIONS\n- Echo(text: string): echoes\n');
    expect(prompt).toContain('in at least 30 characters');
    expect(prompt).toContain('at least 0.8;');
    expect(prompt).not.toContain('{{{');
  });
});
