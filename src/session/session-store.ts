import crypto from 'node:crypto';
import fs from 'node:fs';
import path from 'node:path';

import type { LogCallback } from '../types.js';

import { isNotFound, isValidSessionId, SessionScope } from './session-scope.js';

export interface SessionStoreOptions {
  cacheRoot: string;
  caseInsensitive?: boolean;
  onLog?: LogCallback;
}

const pad = (value: number): string => String(value).padStart(2, '0');

/** `session_<yyyyMMdd_HHmmss>_<8 hex>` in local time. */
export function generateSessionId(now: Date = new Date()): string {
  const stamp = `${String(now.getFullYear())}${pad(now.getMonth() + 1)}${pad(now.getDate())}_${pad(now.getHours())}${pad(now.getMinutes())}${pad(now.getSeconds())}`;
  return `session_${stamp}_${crypto.randomBytes(4).toString('hex')}`;
}

/**
 * Per-id registry of session scopes. Each store is owned by its caller;
 * two stores over the same cache root share directories, not scope state.
 */
export class SessionStore {
  readonly cacheRoot: string;
  private readonly scopes = new Map<string, SessionScope>();
  private readonly caseInsensitive?: boolean;
  private readonly onLog?: LogCallback;

  constructor(options: SessionStoreOptions) {
    this.cacheRoot = path.resolve(options.cacheRoot);
    this.caseInsensitive = options.caseInsensitive;
    this.onLog = options.onLog;
  }

  /** Returns the scope for `sessionId`, creating it on first use. */
  get(sessionId: string): SessionScope {
    const existing = this.scopes.get(sessionId);
    if (existing !== undefined) return existing;
    const scope = new SessionScope({
      cacheRoot: this.cacheRoot,
      sessionId,
      caseInsensitive: this.caseInsensitive,
      onLog: this.onLog,
    });
    this.scopes.set(sessionId, scope);
    return scope;
  }

  has(sessionId: string): boolean {
    return this.scopes.has(sessionId);
  }

  async cleanup(sessionId: string): Promise<void> {
    const scope = this.scopes.get(sessionId) ?? new SessionScope({
      cacheRoot: this.cacheRoot,
      sessionId,
      caseInsensitive: this.caseInsensitive,
      onLog: this.onLog,
    });
    await scope.cleanup();
    this.scopes.delete(sessionId);
  }

  /** Session directories present under the cache root, sorted by name. */
  async list(): Promise<string[]> {
    let entries: fs.Dirent[];
    try {
      entries = await fs.promises.readdir(this.cacheRoot, { withFileTypes: true });
    } catch (error) {
      if (isNotFound(error)) return [];
      throw error;
    }
    return entries
      .filter((entry) => entry.isDirectory() && isValidSessionId(entry.name))
      .map((entry) => entry.name)
      .sort();
  }
}
