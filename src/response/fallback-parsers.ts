import * as yaml from 'js-yaml';

import type { DecisionSource } from '../types.js';

import { isPlainObject } from '../utils.js';

import { lookupDecisionField } from './response-normalizer.js';

export interface FallbackParse {
  source: Exclude<DecisionSource, 'json' | 'synthetic'>;
  record: Record<string, unknown>;
}

const COMPLETION_PHRASES = [
  'task completed',
  'task is complete',
  'task is completed',
  'task complete',
  'finished',
  'done',
  'final answer',
];

const hasDecisionField = (record: Record<string, unknown>): boolean => (
  Object.keys(record).some((key) => lookupDecisionField(key) !== undefined)
);

const stripFences = (text: string): string => text.replace(/^```[\w-]*\s*$/gm, '').trim();

// Scalars written the way a backend writes them in prose: true, 0.9, [..], {..}
function parseLooseScalar(raw: string): unknown {
  const value = raw.trim().replace(/,$/, '');
  const quoted = /^(["'])([\s\S]*)\1$/.exec(value);
  if (quoted !== null) return quoted[2];
  if (/^(?:true|false|null|-?\d+(?:\.\d+)?)$/i.test(value)) {
    const parsed: unknown = JSON.parse(value.toLowerCase());
    return parsed;
  }
  if (/^[[{]/.test(value)) {
    try {
      const parsed: unknown = JSON.parse(value);
      return parsed;
    } catch {
      return value;
    }
  }
  return value;
}

export function parseYamlDecision(text: string): Record<string, unknown> | undefined {
  let loaded: unknown;
  try {
    loaded = yaml.load(stripFences(text));
  } catch {
    return undefined;
  }
  if (!isPlainObject(loaded) || !hasDecisionField(loaded)) return undefined;
  return loaded;
}

const KEY_VALUE_LINE = /^\s*(?:[-*]\s+)?\**["']?([A-Za-z][\w \t-]{0,40}?)["']?\**\s*[:=]\s*\**\s*(.*)$/;

/** `key: value` or `key = value` lines; only keys the synonym table knows are kept. */
export function parseKeyValueDecision(text: string): Record<string, unknown> | undefined {
  const record: Record<string, unknown> = {};
  stripFences(text).split(/\r?\n/).forEach((line) => {
    const match = KEY_VALUE_LINE.exec(line);
    if (match === null) return;
    const key = match[1].trim();
    if (lookupDecisionField(key) === undefined || key in record) return;
    const value = match[2].trim();
    if (value.length === 0) return;
    record[key] = parseLooseScalar(value);
  });
  return Object.keys(record).length > 0 ? record : undefined;
}

const MARKDOWN_HEADING = /^\s{0,3}#{1,6}\s+(.+?)\s*#*\s*$/;

/** `## Heading` sections, the heading naming the field and the body its value. */
export function parseMarkdownDecision(text: string): Record<string, unknown> | undefined {
  const record: Record<string, unknown> = {};
  let currentKey: string | undefined;
  let body: string[] = [];
  const flush = (): void => {
    if (currentKey === undefined) return;
    const content = body.join('\n').trim();
    if (content.length > 0 && !(currentKey in record)) {
      record[currentKey] = content.includes('\n') ? content : parseLooseScalar(content);
    }
  };
  text.split(/\r?\n/).forEach((line) => {
    const heading = MARKDOWN_HEADING.exec(line);
    if (heading !== null) {
      flush();
      const title = heading[1].replace(/[:*`]/g, '').trim();
      currentKey = lookupDecisionField(title) !== undefined ? title : undefined;
      body = [];
      return;
    }
    if (currentKey !== undefined) body.push(line);
  });
  flush();
  return Object.keys(record).length > 0 ? record : undefined;
}

export function detectsCompletion(text: string): boolean {
  const lowered = text.toLowerCase();
  return COMPLETION_PHRASES.some((phrase) => (
    new RegExp(`\\b${phrase}\\b`).test(lowered) && !new RegExp(`(?:\\bnot|n't)\\s+(?:yet\\s+)?${phrase}\\b`).test(lowered)
  ));
}

/** Last resort: the whole text is the response. */
export function parsePlainTextDecision(text: string): Record<string, unknown> {
  return { taskCompleted: detectsCompletion(text), response: text.trim() };
}

/** Runs the fallback parsers in order: YAML, key-value lines, markdown sections, plain text. */
export function parseWithFallbacks(text: string): FallbackParse {
  const yamlRecord = parseYamlDecision(text);
  if (yamlRecord !== undefined) return { source: 'yaml', record: yamlRecord };
  const keyValue = parseKeyValueDecision(text);
  if (keyValue !== undefined) return { source: 'key_value', record: keyValue };
  const markdown = parseMarkdownDecision(text);
  if (markdown !== undefined) return { source: 'markdown', record: markdown };
  return { source: 'plain_text', record: parsePlainTextDecision(text) };
}
