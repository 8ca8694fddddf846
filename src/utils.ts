import { jsonrepair } from 'jsonrepair';

import { extractJson, sanitizeJsonCandidate } from './response/json-extractor.js';

export const isPlainObject = (value: unknown): value is Record<string, unknown> => (
  value !== null && typeof value === 'object' && !Array.isArray(value)
);

const tryParseJson = (value: string): unknown => {
  try {
    return JSON.parse(value);
  } catch {
    return undefined;
  }
};

const stripSurroundingCodeFence = (value: string): string | undefined => {
  const match = /^```(?:json|javascript|js)?\s*([\s\S]*?)\s*```$/iu.exec(value);
  return match !== null ? match[1] : undefined;
};

const stripTrailingEllipsis = (value: string): string | undefined => {
  const trimmed = value.replace(/(?:,\s*)?(?:\.{3}|…)(?:\s*\([^)]*\))?\s*$/u, '');
  return trimmed.length !== value.length ? trimmed : undefined;
};

// Appends the closers a truncated response never got to write.
const closeDanglingJson = (value: string): string | undefined => {
  let inString = false;
  let escapeNext = false;
  const stack: string[] = [];
  for (let i = 0; i < value.length; i += 1) {
    const ch = value[i];
    if (inString) {
      if (escapeNext) {
        escapeNext = false;
        continue;
      }
      if (ch === '\\') {
        escapeNext = true;
        continue;
      }
      if (ch === '"') {
        inString = false;
      }
      continue;
    }
    if (ch === '"') {
      inString = true;
      continue;
    }
    if (ch === '{' || ch === '[') {
      stack.push(ch);
      continue;
    }
    if (ch === '}' || ch === ']') {
      if (stack.length === 0) {
        return undefined;
      }
      const expected = stack.pop();
      if ((ch === '}' && expected !== '{') || (ch === ']' && expected !== '[')) {
        return undefined;
      }
    }
  }
  if (inString || stack.length === 0) {
    return undefined;
  }
  const trimmed = value.replace(/[\s,]*$/u, '');
  const closers = stack.reverse().map((token) => (token === '{' ? '}' : ']')).join('');
  return `${trimmed}${closers}`;
};

export interface JsonParseDiagnostics {
  value?: unknown;
  repairs: string[];
  error?: string;
  originalText?: string;
  repairedText?: string;
}

const attemptRepairs = (text: string): { value?: unknown; repairedText?: string; steps: string[] } => {
  const parsed = tryParseJson(text);
  if (parsed !== undefined) {
    return { value: parsed, repairedText: text, steps: [] };
  }
  try {
    const repaired = jsonrepair(text);
    const reparsed = tryParseJson(repaired);
    if (reparsed !== undefined) {
      return { value: reparsed, repairedText: repaired, steps: ['jsonrepair'] };
    }
  } catch {
    // jsonrepair throws on input it cannot fix; the caller tries other candidates
  }
  return { steps: [] };
};

/**
 * Parses near-JSON text, breadth-first over a small set of rewrites
 * (fence stripping, comment removal, embedded object extraction, closing
 * dangling brackets), each candidate also going through jsonrepair.
 */
export const parseJsonValueDetailed = (raw: unknown): JsonParseDiagnostics => {
  if (isPlainObject(raw) || Array.isArray(raw)) {
    return { value: raw, repairs: [] };
  }
  if (typeof raw !== 'string') {
    return { repairs: [], error: 'non_string' };
  }
  const originalText = raw.trim();
  if (originalText.length === 0) {
    return { repairs: [], error: 'empty', originalText };
  }

  const enqueue = (target: string | undefined, steps: string[]): { text: string; steps: string[] } | undefined => {
    if (target === undefined) return undefined;
    const normalized = target.trim();
    if (normalized.length === 0) return undefined;
    return { text: normalized, steps };
  };

  const queue: { text: string; steps: string[] }[] = [];
  const seen = new Set<string>();

  const sanitized = sanitizeJsonCandidate(originalText);
  const baseCandidates = [
    enqueue(originalText, []),
    enqueue(stripSurroundingCodeFence(originalText), ['stripCodeFence']),
    enqueue(sanitized !== originalText ? sanitized : undefined, ['sanitize']),
    enqueue(stripTrailingEllipsis(originalText), ['stripTrailingEllipsis']),
  ].filter((v): v is { text: string; steps: string[] } => v !== undefined);
  queue.push(...baseCandidates);

  let lastError: string | undefined;
  while (queue.length > 0) {
    const candidate = queue.shift();
    if (candidate === undefined) break;
    if (seen.has(candidate.text)) continue;
    seen.add(candidate.text);

    const attempt = attemptRepairs(candidate.text);
    if (attempt.value !== undefined) {
      return {
        value: attempt.value,
        repairs: [...candidate.steps, ...attempt.steps],
        originalText,
        repairedText: attempt.repairedText,
      };
    }

    const extracted = extractJson(candidate.text);
    if (extracted !== undefined) {
      const enriched = enqueue(extracted, [...candidate.steps, 'extractFirstObject']);
      if (enriched !== undefined) queue.push(enriched);
    }
    const closed = closeDanglingJson(candidate.text);
    if (closed !== undefined) {
      const enriched = enqueue(closed, [...candidate.steps, 'closeDangling']);
      if (enriched !== undefined) queue.push(enriched);
    }
    lastError = 'parse_failed';
    if (queue.length > 40) {
      break;
    }
  }

  return { repairs: [], error: lastError ?? 'parse_failed', originalText };
};

export const parseJsonRecordDetailed = (raw: unknown): JsonParseDiagnostics & { value?: Record<string, unknown> } => {
  const detailed = parseJsonValueDetailed(raw);
  const value = isPlainObject(detailed.value) ? detailed.value : undefined;
  return { ...detailed, value };
};

// Compact request line for logs, e.g. FileWrite(path:notes.txt, content:hello)
export function formatOperationRequestCompact(name: string, parameters: Readonly<Record<string, unknown>>): string {
  const fmtVal = (v: unknown): string => {
    if (v === null) return 'null';
    if (v === undefined) return 'undefined';
    if (typeof v === 'string') {
      const s = v.replace(/[\r\n]+/g, ' ').trim();
      return s.length > 160 ? `${s.slice(0, 160)}…` : s;
    }
    if (typeof v === 'number' || typeof v === 'bigint') return v.toString();
    if (typeof v === 'boolean') return v ? 'true' : 'false';
    if (Array.isArray(v)) return `[${String(v.length)}]`;
    return '{…}';
  };
  const entries = Object.entries(parameters);
  const paramStr = entries.length > 0
    ? '(' + entries.map(([k, v]) => `${k}:${fmtVal(v)}`).join(', ') + ')'
    : '()';
  return `${name}${paramStr}`;
}

export type SleepOutcome = 'completed' | 'aborted';

/** Timer-based wait that settles early when `signal` aborts. */
export async function sleepWithAbort(ms: number, signal?: AbortSignal): Promise<SleepOutcome> {
  if (signal?.aborted === true) return 'aborted';
  if (ms <= 0) return 'completed';
  return await new Promise((resolve) => {
    let settled = false;
    let timer: ReturnType<typeof setTimeout> | undefined;
    const onAbort = (): void => {
      finish('aborted');
    };
    const finish = (result: SleepOutcome): void => {
      if (settled) return;
      settled = true;
      if (timer !== undefined) clearTimeout(timer);
      signal?.removeEventListener('abort', onAbort);
      resolve(result);
    };
    timer = setTimeout(() => { finish('completed'); }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

let warningSink: ((message: string) => void) | undefined;

export function setWarningSink(handler?: (message: string) => void): void {
  warningSink = handler;
}

// Routed through an injectable sink so library code never writes to stdio
export function warn(message: string): void {
  const sink = warningSink;
  if (sink === undefined) {
    return;
  }
  try {
    sink(message);
  } catch {
    // sink errors are dropped
  }
}
