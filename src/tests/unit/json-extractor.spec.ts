import { describe, expect, it } from 'vitest';

import { extractJson, extractJsonCandidates, sanitizeJsonCandidate } from '../../response/json-extractor.js';
import { parseJsonRecordDetailed } from '../../utils.js';

describe('extractJson', () => {
  it('ignores braces inside string values', () => {
    const text = 'prefix text {"a": "text with { and } inside"} suffix';
    expect(extractJson(text)).toBe('{"a": "text with { and } inside"}');
  });

  it('handles escaped quotes inside strings', () => {
    const text = 'x {"code": "say \\"}\\" now", "n": {"m": 1}} y';
    expect(extractJson(text)).toBe('{"code": "say \\"}\\" now", "n": {"m": 1}}');
  });

  it('returns undefined when no brace opens or none closes', () => {
    expect(extractJson('no json here')).toBeUndefined();
    expect(extractJson('{"a": {"b": 1}')).toBeUndefined();
  });

  it('returns the first region of several', () => {
    expect(extractJson('{"a":1} and {"b":2}')).toBe('{"a":1}');
  });
});

describe('extractJsonCandidates', () => {
  it('lists every balanced region in order', () => {
    expect(extractJsonCandidates('see {x} then {"ok": true}')).toEqual(['{x}', '{"ok": true}']);
  });

  it('skips an unclosed opener and keeps scanning', () => {
    expect(extractJsonCandidates('{ broken then {"a":1}')).toEqual(['{"a":1}']);
  });

  it('stops at the limit', () => {
    expect(extractJsonCandidates('{} {} {}', 2)).toEqual(['{}', '{}']);
  });
});

describe('sanitizeJsonCandidate', () => {
  it('drops comments outside strings only', () => {
    const input = '{"url": "http://x", // note\n"n": 1 /* block */}';
    expect(sanitizeJsonCandidate(input)).toBe('{"url": "http://x", \n"n": 1 }');
  });

  it('escapes raw line breaks inside strings', () => {
    expect(sanitizeJsonCandidate('{"t": "a\nb"}')).toBe('{"t": "a\\nb"}');
  });
});

describe('parseJsonRecordDetailed', () => {
  it('parses valid JSON without repairs', () => {
    const result = parseJsonRecordDetailed('{"taskCompleted": true}');
    expect(result.value).toEqual({ taskCompleted: true });
    expect(result.repairs).toEqual([]);
  });

  it('repairs a trailing comma', () => {
    const result = parseJsonRecordDetailed('{"a":1,}');
    expect(result.value).toEqual({ a: 1 });
    expect(result.repairs).toContain('jsonrepair');
  });

  it('strips a surrounding code fence', () => {
    const result = parseJsonRecordDetailed('```json\n{"a": 2}\n```');
    expect(result.value).toEqual({ a: 2 });
  });

  it('reports arrays as no record', () => {
    expect(parseJsonRecordDetailed('[1, 2]').value).toBeUndefined();
  });
});
