/**
 * Prompt loader. Every template is read synchronously when the module is
 * imported; rendering only substitutes `{{{placeholder}}}` markers.
 */
import { readFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);
const PROMPTS_DIR = __dirname;

function loadPromptSync(fileName: string): string {
  const filePath = join(PROMPTS_DIR, fileName);
  try {
    return readFileSync(filePath, 'utf-8').trimEnd();
  } catch (error) {
    const errorMessage = error instanceof Error ? error.message : String(error);
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      throw new Error(`prompt file not found: ${filePath}`);
    }
    throw new Error(`failed to read prompt file: ${filePath} - ${errorMessage}`);
  }
}

const SYSTEM_TEMPLATE = loadPromptSync('system.md');
const INITIAL_TEMPLATE = loadPromptSync('initial.md');
const OPERATION_RESULT_TEMPLATE = loadPromptSync('operation-result.md');
const CONTINUE_TEMPLATE = loadPromptSync('continue.md');
const VALIDATION_ERROR_TEMPLATE = loadPromptSync('validation-error.md');

// Function replacer, so `$&` and friends in values stay literal
function fill(template: string, values: Readonly<Record<string, string>>): string {
  return template.replace(/\{\{\{(\w+)\}\}\}/g, (marker: string, key: string) => values[key] ?? marker);
}

export interface SystemPromptValues {
  sessionId: string;
  operations: string;
  minCompletionConfidence: number;
  minReasoningLength: number;
}

export function renderSystemPrompt(values: SystemPromptValues): string {
  return fill(SYSTEM_TEMPLATE, {
    sessionId: values.sessionId,
    operations: values.operations,
    minCompletionConfidence: String(values.minCompletionConfidence),
    minReasoningLength: String(values.minReasoningLength),
  });
}

export function renderInitialPrompt(query: string, sessionId: string, workingDirectory: string): string {
  return fill(INITIAL_TEMPLATE, { query, sessionId, workingDirectory });
}

export function renderOperationResultPrompt(result: string): string {
  return fill(OPERATION_RESULT_TEMPLATE, { result });
}

export function renderContinuePrompt(nextStepReasoning: string): string {
  return fill(CONTINUE_TEMPLATE, { nextStepReasoning }).trimEnd();
}

export function renderValidationErrorPrompt(issue: string, minReasoningLength: number): string {
  return fill(VALIDATION_ERROR_TEMPLATE, { issue, minReasoningLength: String(minReasoningLength) });
}
