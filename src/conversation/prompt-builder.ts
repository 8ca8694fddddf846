import type { OperationResult } from '../types.js';

import { ALTERNATIVES_EXHAUSTED } from '../operations/resilient-invoker.js';
import { truncateToBytes } from '../truncation.js';

/** Cap on operation output echoed back to the backend. */
export const RESULT_OUTPUT_MAX_BYTES = 16 * 1024;

function renderOutput(output: unknown): string | undefined {
  if (output === undefined || output === null) return undefined;
  if (typeof output === 'string') return output;
  try {
    return JSON.stringify(output, null, 2);
  } catch {
    return String(output);
  }
}

/** Plain-text narration of an OperationResult, inserted into the follow-up prompt. */
export function formatOperationResult(operationName: string, result: OperationResult): string {
  const lines: string[] = [];
  const attempts = `${String(result.totalAttempts)} attempt${result.totalAttempts === 1 ? '' : 's'}`;
  if (result.success) {
    lines.push(`${operationName} succeeded (method: ${result.methodUsed}, ${attempts})`);
  } else if (result.methodUsed === ALTERNATIVES_EXHAUSTED) {
    lines.push(`${operationName} failed after trying every alternative method (${attempts})`);
  } else {
    lines.push(`${operationName} failed (${result.errorKind ?? 'execution_error'}, ${attempts})`);
  }
  if (!result.success && result.errorMessage !== undefined) {
    lines.push(`Error: ${result.errorMessage}`);
  }
  const output = renderOutput(result.output);
  if (output !== undefined && output.length > 0) {
    lines.push(`Output:\n${truncateToBytes(output, RESULT_OUTPUT_MAX_BYTES)}`);
  }
  return lines.join('\n');
}

/** Result for a request that never reached the invoker: unknown name, bad parameters, rejected path. */
export function rejectedOperationResult(errorKind: NonNullable<OperationResult['errorKind']>, errorMessage: string): OperationResult {
  return {
    success: false,
    errorMessage,
    errorKind,
    executionTimeMs: 0,
    totalAttempts: 0,
    methodUsed: 'primary',
    hasMoreAlternatives: false,
  };
}
