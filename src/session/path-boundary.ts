import path from 'node:path';

import { BoundaryViolationError } from '../errors.js';

/** Shown instead of any host path that lies outside a session root. */
export const OUTSIDE_SESSION_SENTINEL = 'path outside session';

export const isCaseInsensitivePlatform = (platform: NodeJS.Platform = process.platform): boolean => (
  platform === 'win32' || platform === 'darwin'
);

export interface BoundaryOptions {
  caseInsensitive?: boolean;
}

const foldCase = (value: string, options: BoundaryOptions): string => {
  const insensitive = options.caseInsensitive ?? isCaseInsensitivePlatform();
  return insensitive ? value.toLowerCase() : value;
};

/** True when `candidate` equals `root` or lies below it. Both are resolved first. */
export function isWithinRoot(root: string, candidate: string, options: BoundaryOptions = {}): boolean {
  const normalizedRoot = foldCase(path.resolve(root), options);
  const normalizedCandidate = foldCase(path.resolve(candidate), options);
  if (normalizedCandidate === normalizedRoot) return true;
  const prefix = normalizedRoot.endsWith(path.sep) ? normalizedRoot : `${normalizedRoot}${path.sep}`;
  return normalizedCandidate.startsWith(prefix);
}

export interface ResolveRequest {
  sessionId: string;
  sessionRoot: string;
  workingDirectory: string;
  requestedPath: string;
}

/**
 * Resolves `requestedPath` against the working directory and returns an
 * absolute path inside the session root, or throws BoundaryViolationError.
 * Absolute inputs are always rejected, even when they point inside the root.
 */
export function resolveWithin(request: ResolveRequest, options: BoundaryOptions = {}): string {
  const { sessionId, sessionRoot, workingDirectory, requestedPath } = request;
  if (requestedPath.includes('\0')) {
    throw new BoundaryViolationError(sessionId, requestedPath.replace(/\0/g, '\\0'), 'contains a NUL byte');
  }
  if (!isWithinRoot(sessionRoot, workingDirectory, options)) {
    throw new BoundaryViolationError(sessionId, OUTSIDE_SESSION_SENTINEL, 'working directory is outside the session root');
  }
  const trimmed = requestedPath.trim();
  if (trimmed.length === 0 || trimmed === '.') {
    return path.resolve(workingDirectory);
  }
  if (path.isAbsolute(trimmed) || path.win32.isAbsolute(trimmed)) {
    throw new BoundaryViolationError(sessionId, trimmed, 'is absolute; only session-relative paths are allowed');
  }
  const resolved = path.resolve(workingDirectory, trimmed);
  if (!isWithinRoot(sessionRoot, resolved, options)) {
    throw new BoundaryViolationError(sessionId, trimmed);
  }
  return resolved;
}

/** Session-relative rendering with `/` separators; `.` is the root itself. */
export function toDisplayPath(sessionRoot: string, absolutePath: string, options: BoundaryOptions = {}): string {
  if (!isWithinRoot(sessionRoot, absolutePath, options)) {
    return OUTSIDE_SESSION_SENTINEL;
  }
  // Sliced rather than path.relative so a case-folded match keeps its spelling
  const base = path.resolve(sessionRoot);
  const relative = path.resolve(absolutePath).slice(base.length).replace(/^[\\/]+/, '');
  if (relative.length === 0) return '.';
  return relative.split(path.sep).join('/');
}
