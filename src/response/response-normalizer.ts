import type { Decision, NextStep } from '../types.js';

import { isPlainObject } from '../utils.js';

export const DEFAULT_REASONING = 'Processing user request';
export const DEFAULT_RESPONSE = 'Processing...';
export const DEFAULT_CONFIDENCE = 0.5;

type CanonicalField =
  | 'taskCompleted'
  | 'reasoning'
  | 'nextStep'
  | 'requiresOperation'
  | 'operationName'
  | 'parameters'
  | 'confidence'
  | 'assumptions'
  | 'risks'
  | 'response';

const FIELD_SYNONYMS: readonly (readonly [CanonicalField, readonly string[]])[] = [
  ['taskCompleted', ['taskcompleted', 'taskcomplete', 'complete', 'completed', 'iscomplete', 'finished', 'done', 'taskstatus']],
  ['reasoning', ['reasoning', 'reason', 'thought', 'thoughts', 'analysis', 'rationale']],
  ['nextStep', ['nextstep', 'nextaction', 'action', 'step', 'next']],
  ['requiresOperation', ['requiresoperation', 'requirestool', 'needstool', 'usetool', 'toolrequired', 'needsoperation']],
  ['operationName', ['operationname', 'operation', 'tool', 'toolname']],
  ['parameters', ['parameters', 'params', 'args', 'arguments', 'input']],
  ['confidence', ['confidence', 'certainty', 'probability']],
  ['assumptions', ['assumptions', 'assumption']],
  ['risks', ['risks', 'risk', 'concerns', 'issues']],
  ['response', ['response', 'answer', 'result', 'message', 'output', 'finalanswer']],
];

/** Canonicalized property name to Decision field. */
const SYNONYM_TABLE: ReadonlyMap<string, CanonicalField> = new Map(
  FIELD_SYNONYMS.flatMap(([field, synonyms]) => synonyms.map((synonym): [string, CanonicalField] => [synonym, field])),
);

export const canonicalPropertyName = (name: string): string => name.toLowerCase().replace(/[\s_-]/g, '');

export function lookupDecisionField(propertyName: string): CanonicalField | undefined {
  return SYNONYM_TABLE.get(canonicalPropertyName(propertyName));
}

/** Keyword to operation name, first match wins. */
const OPERATION_KEYWORDS: readonly (readonly [string, string])[] = [
  ['directorycreate', 'DirectoryCreate'],
  ['create directory', 'DirectoryCreate'],
  ['mkdir', 'DirectoryCreate'],
  ['github', 'GitHubDownloader'],
  ['download', 'Download'],
  ['mathevaluator', 'MathEvaluator'],
  ['math', 'MathEvaluator'],
  ['calculate', 'MathEvaluator'],
  ['externalcommand', 'ExternalCommandExecutor'],
  ['command', 'ExternalCommandExecutor'],
  ['execute', 'ExternalCommandExecutor'],
  ['read file', 'FileRead'],
  ['write file', 'FileWrite'],
  ['list', 'DirectoryList'],
];

const OPERATION_INVOCATION = /\buse\b[\s\S]*\b(?:tool|operation)s?\b/i;

export function inferOperationName(text: string): string | undefined {
  const lowered = text.toLowerCase();
  return OPERATION_KEYWORDS.find(([keyword]) => lowered.includes(keyword))?.[1];
}

export function impliesOperationUse(text: string): boolean {
  return OPERATION_INVOCATION.test(text);
}

interface CollectedFields {
  taskCompleted?: boolean;
  reasoning?: string;
  nextStep?: unknown;
  hasNextStep: boolean;
  requiresOperation?: boolean;
  operationName?: string;
  parameters?: Record<string, unknown>;
  confidence?: number;
  assumptions?: string[];
  risks?: string[];
  response?: string;
}

const EMPTY_STEP_WORDS = new Set(['', 'none', 'null', 'n/a', 'nothing']);

const TRUTHY_WORDS = new Set(['true', 'yes', 'y', '1', 'done', 'complete', 'completed', 'finished', 'success']);
const FALSY_WORDS = new Set(['false', 'no', 'n', '0', 'pending', 'incomplete', 'inprogress', 'in_progress', 'in progress', 'ongoing']);

function toBoolean(value: unknown): boolean | undefined {
  if (typeof value === 'boolean') return value;
  if (typeof value === 'number') return value !== 0;
  if (typeof value === 'string') {
    const lowered = value.trim().toLowerCase();
    if (TRUTHY_WORDS.has(lowered)) return true;
    if (FALSY_WORDS.has(lowered)) return false;
  }
  return undefined;
}

function toNumber(value: unknown): number | undefined {
  if (typeof value === 'number' && Number.isFinite(value)) return value;
  if (typeof value === 'string') {
    const trimmed = value.trim();
    const percent = /^(-?\d+(?:\.\d+)?)\s*%$/.exec(trimmed);
    if (percent !== null) return Number(percent[1]) / 100;
    const parsed = Number(trimmed);
    if (trimmed.length > 0 && Number.isFinite(parsed)) return parsed;
  }
  return undefined;
}

function toText(value: unknown): string | undefined {
  if (typeof value === 'string') return value;
  if (typeof value === 'number' || typeof value === 'boolean') return String(value);
  return undefined;
}

function toStringList(value: unknown): string[] | undefined {
  if (Array.isArray(value)) {
    return value.map((item) => (typeof item === 'string' ? item : JSON.stringify(item)));
  }
  if (typeof value === 'string' && value.trim().length > 0) return [value];
  return undefined;
}

// An object response contributes its message, anything else is serialized
function toResponseText(value: unknown): string | undefined {
  if (typeof value === 'string') return value;
  if (value === null || value === undefined) return undefined;
  if (isPlainObject(value)) {
    const message = value.message ?? value.Message;
    if (typeof message === 'string') return message;
  }
  return typeof value === 'object' ? JSON.stringify(value) : String(value);
}

function toParameters(value: unknown): Record<string, unknown> | undefined {
  if (isPlainObject(value)) return { ...value };
  return undefined;
}

/** First synonym present wins; later synonyms for the same field are ignored. */
function collectFields(source: Record<string, unknown>): CollectedFields {
  const fields: CollectedFields = { hasNextStep: false };
  Object.entries(source).forEach(([key, value]) => {
    const field = lookupDecisionField(key);
    switch (field) {
      case 'taskCompleted':
        fields.taskCompleted ??= toBoolean(value);
        break;
      case 'reasoning':
        fields.reasoning ??= toText(value);
        break;
      case 'nextStep':
        if (!fields.hasNextStep) {
          fields.hasNextStep = true;
          fields.nextStep = value;
        }
        break;
      case 'requiresOperation':
        fields.requiresOperation ??= toBoolean(value);
        break;
      case 'operationName': {
        const name = toText(value)?.trim();
        if (name !== undefined && name.length > 0) fields.operationName ??= name;
        break;
      }
      case 'parameters':
        fields.parameters ??= toParameters(value);
        break;
      case 'confidence':
        fields.confidence ??= toNumber(value);
        break;
      case 'assumptions':
        fields.assumptions ??= toStringList(value);
        break;
      case 'risks':
        fields.risks ??= toStringList(value);
        break;
      case 'response':
        fields.response ??= toResponseText(value);
        break;
      case undefined:
        break;
    }
  });
  return fields;
}

export interface NormalizedDecision {
  decision: Decision;
  /** Reasoning the backend actually wrote: nextStep.reasoning first, then the top level. */
  statedReasoning?: string;
  warnings: string[];
}

function buildNextStep(primary: CollectedFields, fallback: CollectedFields | undefined, reasoning: string | undefined): NextStep {
  const operationName = primary.operationName ?? fallback?.operationName;
  const step: NextStep = {
    requiresOperation: primary.requiresOperation ?? fallback?.requiresOperation ?? operationName !== undefined,
    parameters: primary.parameters ?? fallback?.parameters ?? {},
    confidence: primary.confidence ?? fallback?.confidence ?? DEFAULT_CONFIDENCE,
    assumptions: primary.assumptions ?? fallback?.assumptions ?? [],
    risks: primary.risks ?? fallback?.risks ?? [],
  };
  if (operationName !== undefined) step.operationName = operationName;
  if (reasoning !== undefined) step.reasoning = reasoning;
  return step;
}

/**
 * Maps a parsed backend object onto a Decision through the synonym table.
 * A nested nextStep object is read with the same table before the top-level
 * (flattened) fields are consulted. A completion flag that arrives together
 * with a non-null nextStep means more work is implied, so the decision is
 * not complete.
 */
export function normalizeDecision(source: Record<string, unknown>): NormalizedDecision {
  const warnings: string[] = [];
  const top = collectFields(source);
  const explicitRequires = top.requiresOperation !== undefined;

  let nextStep: NextStep | null = null;
  let nestedExplicitRequires = false;
  if (isPlainObject(top.nextStep)) {
    const nested = collectFields(top.nextStep);
    nestedExplicitRequires = nested.requiresOperation !== undefined;
    nextStep = buildNextStep(nested, top, nested.reasoning);
  } else if (typeof top.nextStep === 'string' && !EMPTY_STEP_WORDS.has(top.nextStep.trim().toLowerCase())) {
    nextStep = buildNextStep(top, undefined, top.nextStep);
  } else if (top.hasNextStep && top.requiresOperation !== true) {
    nextStep = null;
  } else if (top.requiresOperation !== undefined || top.operationName !== undefined || top.parameters !== undefined) {
    nextStep = buildNextStep(top, undefined, undefined);
  }

  let taskCompleted = top.taskCompleted ?? false;
  if (taskCompleted && nextStep !== null) {
    taskCompleted = false;
    warnings.push('taskCompleted was set together with a nextStep; treating the task as not complete');
  }

  const reasoning = top.reasoning ?? nextStep?.reasoning;
  const statedReasoning = nextStep?.reasoning !== undefined && nextStep.reasoning.length > 0
    ? nextStep.reasoning
    : top.reasoning;

  if (!taskCompleted && !explicitRequires && !nestedExplicitRequires && reasoning !== undefined && impliesOperationUse(reasoning)) {
    const inferred = nextStep?.operationName ?? inferOperationName(reasoning);
    if (inferred !== undefined) {
      nextStep = nextStep ?? buildNextStep(top, undefined, undefined);
      nextStep.requiresOperation = true;
      nextStep.operationName = inferred;
      warnings.push(`inferred operation '${inferred}' from the reasoning text`);
    }
  }

  const decision: Decision = {
    taskCompleted,
    reasoning: reasoning !== undefined && reasoning.trim().length > 0 ? reasoning : DEFAULT_REASONING,
    nextStep,
    response: top.response ?? DEFAULT_RESPONSE,
  };
  if (top.confidence !== undefined) decision.confidence = top.confidence;
  return statedReasoning !== undefined ? { decision, statedReasoning, warnings } : { decision, warnings };
}
