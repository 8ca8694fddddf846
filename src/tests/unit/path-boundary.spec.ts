import path from 'node:path';

import { describe, expect, it } from 'vitest';

import { BoundaryViolationError } from '../../errors.js';
import { isWithinRoot, OUTSIDE_SESSION_SENTINEL, resolveWithin, toDisplayPath } from '../../session/path-boundary.js';

const ROOT = path.resolve('/tmp/cache/session_a');
const request = (requestedPath: string, workingDirectory = ROOT) => ({
  sessionId: 'session_a',
  sessionRoot: ROOT,
  workingDirectory,
  requestedPath,
});

describe('isWithinRoot', () => {
  it('accepts the root itself and its descendants', () => {
    expect(isWithinRoot(ROOT, ROOT)).toBe(true);
    expect(isWithinRoot(ROOT, path.join(ROOT, 'a', 'b'))).toBe(true);
  });

  it('rejects siblings that share the root as a string prefix', () => {
    expect(isWithinRoot(ROOT, `${ROOT}-other`)).toBe(false);
    expect(isWithinRoot(ROOT, path.dirname(ROOT))).toBe(false);
  });

  it('folds case only when asked to', () => {
    const upper = path.join(ROOT.toUpperCase(), 'x');
    expect(isWithinRoot(ROOT, upper, { caseInsensitive: true })).toBe(true);
    expect(isWithinRoot(ROOT, upper, { caseInsensitive: false })).toBe(false);
  });
});

describe('resolveWithin', () => {
  it('resolves relative paths against the working directory', () => {
    const cwd = path.join(ROOT, 'src');
    expect(resolveWithin(request('lib/a.txt', cwd))).toBe(path.join(ROOT, 'src', 'lib', 'a.txt'));
    expect(resolveWithin(request('../b.txt', cwd))).toBe(path.join(ROOT, 'b.txt'));
  });

  it('returns the working directory for empty and dot paths', () => {
    expect(resolveWithin(request(''))).toBe(ROOT);
    expect(resolveWithin(request(' . '))).toBe(ROOT);
  });

  it('never returns a path outside the root for any ../ depth', () => {
    const cwd = path.join(ROOT, 'a', 'b');
    for (let depth = 1; depth <= 6; depth += 1) {
      const rel = `${'../'.repeat(depth)}x`;
      let resolved: string | undefined;
      try {
        resolved = resolveWithin(request(rel, cwd));
      } catch (error) {
        expect(error).toBeInstanceOf(BoundaryViolationError);
        continue;
      }
      expect(isWithinRoot(ROOT, resolved)).toBe(true);
    }
  });

  it('treats a/../../x as an escape', () => {
    expect(() => resolveWithin(request('a/../../x'))).toThrow(BoundaryViolationError);
  });

  it('rejects absolute paths even inside the root', () => {
    expect(() => resolveWithin(request(path.join(ROOT, 'inside.txt')))).toThrow(/is absolute/);
    expect(() => resolveWithin(request('C:\\Windows'))).toThrow(BoundaryViolationError);
  });

  it('rejects NUL bytes', () => {
    expect(() => resolveWithin(request('a\0b'))).toThrow(/NUL byte/);
  });

  it('rejects a working directory outside the root', () => {
    expect(() => resolveWithin(request('x', path.dirname(ROOT)))).toThrow(/working directory is outside/);
  });
});

describe('toDisplayPath', () => {
  it('renders session-relative paths with forward slashes', () => {
    expect(toDisplayPath(ROOT, ROOT)).toBe('.');
    expect(toDisplayPath(ROOT, path.join(ROOT, 'a', 'b.txt'))).toBe('a/b.txt');
  });

  it('hides paths outside the session', () => {
    expect(toDisplayPath(ROOT, '/etc/passwd')).toBe(OUTSIDE_SESSION_SENTINEL);
    expect(toDisplayPath(ROOT, `${ROOT}-other/file`)).toBe(OUTSIDE_SESSION_SENTINEL);
  });
});
