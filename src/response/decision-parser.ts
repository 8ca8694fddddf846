import type { Decision, DecisionSource } from '../types.js';

import { MalformedResponseError } from '../errors.js';
import { parseJsonRecordDetailed } from '../utils.js';

import { createErrorDecision, validateDecision, DEFAULT_THRESHOLDS, type ValidationThresholds } from './decision-validator.js';
import { parseWithFallbacks } from './fallback-parsers.js';
import { extractJsonCandidates } from './json-extractor.js';
import { lookupDecisionField, normalizeDecision } from './response-normalizer.js';

export interface ParsedRecord {
  record: Record<string, unknown>;
  source: Exclude<DecisionSource, 'synthetic'>;
  repairs: string[];
}

export interface InterpretedResponse {
  decision: Decision;
  source: DecisionSource;
  /** True when the response could not be used and `decision` is synthetic. */
  malformed: boolean;
  /** Why the response was rejected, when it was. */
  issue?: string;
  warnings: string[];
  repairs: string[];
}

const FENCED_BLOCK = /```[\w-]*\s*\n?([\s\S]*?)```/g;

const looksLikeDecision = (record: Record<string, unknown>): boolean => (
  Object.keys(record).some((key) => lookupDecisionField(key) !== undefined)
);

/**
 * Finds the structured object in a backend response: JSON inside fences
 * first, then JSON anywhere in the text, then the YAML, key-value, markdown
 * and plain-text fallbacks. Throws MalformedResponseError when the text is
 * empty or opens a JSON object that cannot be recovered.
 */
export function parseResponseRecord(rawText: string): ParsedRecord {
  const text = rawText.trim();
  if (text.length === 0) {
    throw new MalformedResponseError('Empty response', rawText);
  }

  const fenced = [...text.matchAll(FENCED_BLOCK)].map((match) => match[1]);
  const sources = [...fenced, text];
  let firstRecord: ParsedRecord | undefined;
  for (const source of sources) {
    for (const candidate of extractJsonCandidates(source)) {
      const parsed = parseJsonRecordDetailed(candidate);
      if (parsed.value === undefined) continue;
      const found: ParsedRecord = { record: parsed.value, source: 'json', repairs: parsed.repairs };
      if (looksLikeDecision(parsed.value)) return found;
      firstRecord ??= found;
    }
  }

  const opensObject = text.startsWith('{') || fenced.some((block) => block.trim().startsWith('{'));
  if (opensObject && firstRecord === undefined) {
    // Truncated output never closes its braces; let the repair pass close them
    const tail = text.slice(text.indexOf('{'));
    const repaired = parseJsonRecordDetailed(tail);
    if (repaired.value !== undefined) {
      return { record: repaired.value, source: 'json', repairs: repaired.repairs };
    }
    throw new MalformedResponseError('Response must be valid JSON', rawText);
  }

  const fallback = parseWithFallbacks(text);
  if (fallback.source === 'plain_text' && firstRecord !== undefined) return firstRecord;
  return { record: fallback.record, source: fallback.source, repairs: [] };
}

/** Raw backend text to a validated Decision; never throws. */
export function interpretResponse(rawText: string, thresholds: ValidationThresholds = DEFAULT_THRESHOLDS): InterpretedResponse {
  let parsed: ParsedRecord;
  try {
    parsed = parseResponseRecord(rawText);
  } catch (error) {
    const issue = error instanceof Error ? error.message : String(error);
    return { decision: createErrorDecision(issue), source: 'synthetic', malformed: true, issue, warnings: [], repairs: [] };
  }

  const normalized = normalizeDecision(parsed.record);
  const validation = validateDecision(normalized.decision, normalized.statedReasoning, thresholds);
  const warnings = [...normalized.warnings, ...validation.warnings];
  if (!validation.ok) {
    return {
      decision: validation.decision,
      source: 'synthetic',
      malformed: true,
      issue: validation.reason,
      warnings,
      repairs: parsed.repairs,
    };
  }
  return { decision: validation.decision, source: parsed.source, malformed: false, warnings, repairs: parsed.repairs };
}
