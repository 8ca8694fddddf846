import fs from 'node:fs';
import path from 'node:path';

import type { LogCallback } from '../types.js';

import { BoundaryViolationError } from '../errors.js';

import { isCaseInsensitivePlatform, isWithinRoot, resolveWithin, toDisplayPath, type BoundaryOptions } from './path-boundary.js';

const SESSION_ID_PATTERN = /^[A-Za-z0-9][A-Za-z0-9._-]{0,127}$/;

export function isValidSessionId(sessionId: string): boolean {
  return SESSION_ID_PATTERN.test(sessionId) && !sessionId.includes('..');
}

export interface SessionScopeOptions {
  cacheRoot: string;
  sessionId: string;
  caseInsensitive?: boolean;
  onLog?: LogCallback;
}

/**
 * One conversation's sandbox: a root directory under the cache root and a
 * working directory that never leaves it.
 */
export class SessionScope {
  readonly sessionId: string;
  readonly sessionRoot: string;
  private cwd: string;
  private readonly boundary: BoundaryOptions;
  private readonly onLog?: LogCallback;

  constructor(options: SessionScopeOptions) {
    if (!isValidSessionId(options.sessionId)) {
      throw new Error(`invalid session id '${options.sessionId}': use letters, digits, '.', '_' or '-' (max 128)`);
    }
    this.sessionId = options.sessionId;
    this.sessionRoot = path.resolve(options.cacheRoot, options.sessionId);
    this.cwd = this.sessionRoot;
    this.boundary = { caseInsensitive: options.caseInsensitive ?? isCaseInsensitivePlatform() };
    this.onLog = options.onLog;
  }

  get workingDirectory(): string {
    return this.cwd;
  }

  async ensureRoot(): Promise<string> {
    await fs.promises.mkdir(this.sessionRoot, { recursive: true });
    return this.sessionRoot;
  }

  /** Pure resolution against the working directory (or `from`), no filesystem access. */
  resolvePath(relativePath: string, from?: string): string {
    return resolveWithin({
      sessionId: this.sessionId,
      sessionRoot: this.sessionRoot,
      workingDirectory: from ?? this.cwd,
      requestedPath: relativePath,
    }, this.boundary);
  }

  /** Resolves and makes sure the session root exists. */
  async resolve(relativePath: string, from?: string): Promise<string> {
    const resolved = this.resolvePath(relativePath, from);
    await this.ensureRoot();
    return resolved;
  }

  /**
   * Moves the working directory, creating the target when missing. A single
   * `..` at the root is a no-op; anything else escaping the root throws and
   * leaves the working directory unchanged. `from` defaults to the current
   * working directory.
   */
  async navigate(relativePath: string, from?: string): Promise<string> {
    const trimmed = relativePath.trim();
    const origin = from ?? this.cwd;
    if (trimmed === '..' && this.toDisplayPath(origin) === '.') {
      this.log('WRN', 'navigation above the session root ignored');
      this.cwd = origin;
      return origin;
    }
    const target = this.resolvePath(trimmed, origin);
    const existing = await fs.promises.stat(target).catch((error: unknown) => {
      if (isNotFound(error)) return undefined;
      throw error;
    });
    if (existing === undefined) {
      await fs.promises.mkdir(target, { recursive: true });
    } else if (!existing.isDirectory()) {
      throw new Error(`not a directory: ${this.toDisplayPath(target)}`);
    }
    this.cwd = target;
    this.log('VRB', `working directory is now ${this.toDisplayPath(target)}`);
    return target;
  }

  contains(absolutePath: string): boolean {
    return isWithinRoot(this.sessionRoot, absolutePath, this.boundary);
  }

  toDisplayPath(absolutePath: string): string {
    return toDisplayPath(this.sessionRoot, absolutePath, this.boundary);
  }

  isAtRoot(): boolean {
    return this.toDisplayPath(this.cwd) === '.';
  }

  /** Rejects any operation that would act on the root itself (e.g. deleting it). */
  assertNotRoot(absolutePath: string, requestedPath: string): void {
    if (this.toDisplayPath(absolutePath) === '.') {
      throw new BoundaryViolationError(this.sessionId, requestedPath, 'targets the session root itself');
    }
  }

  /** Working directory plus its first entries, appended to filesystem operation output. */
  async describeCursor(limit = 10): Promise<string> {
    const lines = ['--- Cursor Context ---', `Working directory: ${this.toDisplayPath(this.cwd)}`];
    let entries: fs.Dirent[] = [];
    try {
      entries = await fs.promises.readdir(this.cwd, { withFileTypes: true });
    } catch (error) {
      if (!isNotFound(error)) throw error;
    }
    const sorted = [...entries].sort((a, b) => a.name.localeCompare(b.name));
    sorted.slice(0, limit).forEach((entry) => {
      lines.push(entry.isDirectory() ? `  ${entry.name}/` : `  ${entry.name}`);
    });
    if (sorted.length > limit) {
      lines.push(`  ... (${String(sorted.length - limit)} more)`);
    }
    if (sorted.length === 0) {
      lines.push('  (empty)');
    }
    return lines.join('\n');
  }

  /** Removes the session subtree. Safe to call when it is already gone. */
  async cleanup(): Promise<void> {
    await fs.promises.rm(this.sessionRoot, { recursive: true, force: true });
    this.cwd = this.sessionRoot;
    this.log('VRB', 'session directory removed');
  }

  private log(severity: 'VRB' | 'WRN', message: string): void {
    this.onLog?.({
      timestamp: Date.now(),
      severity,
      step: 0,
      direction: 'response',
      type: 'session',
      remoteIdentifier: `session:${this.sessionId}`,
      fatal: false,
      message,
      sessionId: this.sessionId,
    });
  }
}

export function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
