import fs from 'node:fs';
import path from 'node:path';

import * as yaml from 'js-yaml';

import type { ConversationMessage } from '../types.js';
import type { Backend } from './types.js';

import { BackendError, CancelledError } from '../errors.js';
import { isPlainObject } from '../utils.js';

export interface ScriptedExchange {
  prompt: string;
  historyLength: number;
}

// Entries may be plain strings or objects, which are sent back as JSON text
function toResponseText(entry: unknown, index: number, source: string): string {
  if (typeof entry === 'string') return entry;
  if (isPlainObject(entry) || Array.isArray(entry)) return JSON.stringify(entry);
  throw new Error(`${source}: response #${String(index + 1)} must be a string or an object`);
}

/**
 * Reads a script file: a YAML or JSON list of responses, or a mapping with
 * a `responses` list.
 */
export function loadScript(filePath: string): string[] {
  const raw = fs.readFileSync(filePath, 'utf8');
  const ext = path.extname(filePath).toLowerCase();
  const loaded: unknown = ext === '.json' ? JSON.parse(raw) : yaml.load(raw);
  const list = isPlainObject(loaded) ? loaded.responses : loaded;
  if (!Array.isArray(list)) {
    throw new Error(`${filePath}: expected a list of responses`);
  }
  return list.map((entry, index) => toResponseText(entry, index, filePath));
}

/** Replays fixed responses in order; sending past the end throws. */
export class ScriptedBackend implements Backend {
  readonly name = 'scripted';
  /** Every prompt received, for assertions. */
  readonly exchanges: ScriptedExchange[] = [];
  private readonly responses: readonly string[];
  private cursor = 0;

  constructor(responses: readonly (string | Record<string, unknown>)[]) {
    this.responses = responses.map((entry, index) => toResponseText(entry, index, 'script'));
  }

  static fromFile(filePath: string): ScriptedBackend {
    return new ScriptedBackend(loadScript(filePath));
  }

  get remaining(): number {
    return this.responses.length - this.cursor;
  }

  send(prompt: string, history: readonly ConversationMessage[], signal?: AbortSignal): Promise<string> {
    if (signal?.aborted === true) {
      return Promise.reject(new CancelledError('backend request cancelled', 'signal'));
    }
    this.exchanges.push({ prompt, historyLength: history.length });
    if (this.cursor >= this.responses.length) {
      return Promise.reject(new BackendError(this.name, `script exhausted after ${String(this.responses.length)} responses`));
    }
    const response = this.responses[this.cursor];
    this.cursor += 1;
    return Promise.resolve(response);
  }
}
