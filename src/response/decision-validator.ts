import type { Decision } from '../types.js';

export const MIN_CONFIDENCE = 0.1;
export const MAX_CONFIDENCE = 1;

export interface ValidationThresholds {
  minCompletionConfidence: number;
  minReasoningLength: number;
}

export const DEFAULT_THRESHOLDS: ValidationThresholds = {
  minCompletionConfidence: 0.8,
  minReasoningLength: 30,
};

export type ValidationOutcome =
  | { ok: true; decision: Decision; warnings: string[] }
  | { ok: false; decision: Decision; reason: string; warnings: string[] };

/** Not-complete Decision standing in for a response that could not be used. */
export function createErrorDecision(reason: string): Decision {
  return {
    taskCompleted: false,
    reasoning: `Error encountered: ${reason}. Need to reassess the situation.`,
    nextStep: null,
    response: `I encountered an issue: ${reason}. Let me reconsider the approach.`,
    confidence: MIN_CONFIDENCE,
  };
}

const clamp = (value: number): number => Math.min(MAX_CONFIDENCE, Math.max(MIN_CONFIDENCE, value));

/**
 * Pessimistic acceptance: a completion without enough stated confidence is
 * downgraded, and reasoning that is present but too short, or an operation
 * request without a name, replaces the decision with an error decision.
 */
export function validateDecision(
  decision: Decision,
  statedReasoning: string | undefined,
  thresholds: ValidationThresholds = DEFAULT_THRESHOLDS,
): ValidationOutcome {
  const warnings: string[] = [];
  const validated: Decision = { ...decision, nextStep: decision.nextStep !== null ? { ...decision.nextStep } : null };

  if (validated.nextStep !== null) {
    const { confidence } = validated.nextStep;
    if (confidence < MIN_CONFIDENCE || confidence > MAX_CONFIDENCE) {
      validated.nextStep.confidence = clamp(confidence);
      warnings.push(`nextStep confidence ${String(confidence)} clamped to ${String(validated.nextStep.confidence)}`);
    }
  }
  if (validated.confidence !== undefined && (validated.confidence < MIN_CONFIDENCE || validated.confidence > MAX_CONFIDENCE)) {
    const original = validated.confidence;
    validated.confidence = clamp(original);
    warnings.push(`confidence ${String(original)} clamped to ${String(validated.confidence)}`);
  }

  if (validated.taskCompleted && validated.confidence !== undefined && validated.confidence < thresholds.minCompletionConfidence) {
    validated.taskCompleted = false;
    warnings.push(`task marked complete with confidence ${String(validated.confidence)} below ${String(thresholds.minCompletionConfidence)}; continuing`);
  }

  if (statedReasoning !== undefined && statedReasoning.length > 0 && statedReasoning.length < thresholds.minReasoningLength) {
    const reason = 'Reasoning must be more detailed and thorough';
    return { ok: false, decision: createErrorDecision(reason), reason, warnings };
  }

  if (validated.nextStep?.requiresOperation === true
    && (validated.nextStep.operationName === undefined || validated.nextStep.operationName.trim().length === 0)) {
    const reason = 'An operation was requested without an operation name';
    return { ok: false, decision: createErrorDecision(reason), reason, warnings };
  }

  return { ok: true, decision: validated, warnings };
}
