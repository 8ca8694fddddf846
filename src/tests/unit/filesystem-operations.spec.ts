import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';

import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import type { OperationContext, OperationOutcome } from '../../types.js';

import { BoundaryViolationError } from '../../errors.js';
import {
  DirectoryCopyOperation,
  DirectoryCreateOperation,
  DirectoryDeleteOperation,
  DirectoryListOperation,
  DirectoryMoveOperation,
} from '../../operations/builtin/directory-operations.js';
import {
  FileAttributesOperation,
  FileCopyOperation,
  FileDeleteOperation,
  FileMoveOperation,
  FileReadOperation,
  FileWriteOperation,
} from '../../operations/builtin/file-operations.js';
import { CursorNavigationOperation, PrintWorkingDirectoryOperation } from '../../operations/builtin/navigation-operations.js';
import { formatFileSize } from '../../operations/filesystem-operation.js';
import { SessionStore } from '../../session/session-store.js';

let cacheRoot: string;
let store: SessionStore;
const lookup = (id: string) => store.get(id);

const context = (parameters: Record<string, unknown>, workingDirectory?: string): OperationContext => ({
  parameters,
  state: {},
  sessionId: 's1',
  workingDirectory,
  retryAttempt: 0,
  executionHistory: [],
});

const outputOf = (outcome: OperationOutcome): string => {
  if (!outcome.success) throw new Error(`expected success, got: ${outcome.errorMessage}`);
  return typeof outcome.output === 'string' ? outcome.output : JSON.stringify(outcome.output);
};

const sessionPath = (...parts: string[]): string => path.join(cacheRoot, 's1', ...parts);

const seed = (relative: string, content: string): void => {
  const target = sessionPath(relative);
  fs.mkdirSync(path.dirname(target), { recursive: true });
  fs.writeFileSync(target, content);
};

beforeEach(() => {
  cacheRoot = fs.mkdtempSync(path.join(os.tmpdir(), 'fsops-spec-'));
  store = new SessionStore({ cacheRoot });
});

afterEach(() => {
  fs.rmSync(cacheRoot, { recursive: true, force: true });
});

describe('formatFileSize', () => {
  it('uses binary units', () => {
    expect(formatFileSize(3)).toBe('3 B');
    expect(formatFileSize(2048)).toBe('2.0 KB');
    expect(formatFileSize(1536 * 1024)).toBe('1.5 MB');
  });
});

describe('DirectoryCreate', () => {
  const op = new DirectoryCreateOperation(lookup);

  it('creates the directory and appends the cursor context', async () => {
    const output = outputOf(await op.run(context({ path: 'out' })));
    expect(output).toBe('Created directory: out\n\n--- Cursor Context ---\nWorking directory: .\n  out/');
    expect(fs.statSync(sessionPath('out')).isDirectory()).toBe(true);
  });

  it('is idempotent', async () => {
    await op.run(context({ path: 'out' }));
    expect(outputOf(await op.run(context({ path: 'out' })))).toMatch(/^Directory already exists: out\n/);
  });

  it('moves the cursor first when asked', async () => {
    const output = outputOf(await op.run(context({ path: 'b', cd: 'a' })));
    expect(output).toBe('Changed directory to: a\n\nCreated directory: a/b\n\n--- Cursor Context ---\nWorking directory: a\n  b/');
    expect(store.get('s1').toDisplayPath(store.get('s1').workingDirectory)).toBe('a');
  });

  it('repeats the same navigation on a retry with the same context', async () => {
    const base = store.get('s1').workingDirectory;
    const ctx = context({ path: 'x', cd: 'deep' }, base);
    await op.run(ctx);
    const second = outputOf(await op.run(ctx));
    expect(second).toMatch(/^Changed directory to: deep\n\nDirectory already exists: deep\/x\n/);
  });

  it('fails when a file occupies the path', async () => {
    seed('out', 'x');
    await expect(op.run(context({ path: 'out' }))).resolves.toEqual({ success: false, errorMessage: 'A file already exists at out' });
  });

  it('throws a boundary violation for paths leaving the session', async () => {
    await expect(op.run(context({ path: '../elsewhere' }))).rejects.toBeInstanceOf(BoundaryViolationError);
    expect(fs.existsSync(path.join(cacheRoot, 'elsewhere'))).toBe(false);
  });
});

describe('DirectoryList', () => {
  const op = new DirectoryListOperation(lookup);

  it('lists directories first and skips hidden entries', async () => {
    seed('a.txt', 'abc');
    seed('.hidden', 'h');
    fs.mkdirSync(sessionPath('sub'));
    const output = outputOf(await op.run(context({})));
    expect(output).toBe('Directory: .\n[DIR]  sub/\n[FILE] a.txt (3 B)\nTotal: 1 directories, 1 files');
  });

  it('walks subdirectories when recursive', async () => {
    seed('sub/inner.txt', 'hello');
    const output = outputOf(await op.run(context({ recursive: true, includeHidden: true })));
    expect(output.split('\n')).toEqual([
      'Directory: .',
      '[DIR]  sub/',
      '[FILE] sub/inner.txt (5 B)',
      'Total: 1 directories, 1 files',
    ]);
  });

  it('reports a missing directory', async () => {
    await expect(op.run(context({ path: 'missing' }))).resolves.toEqual({ success: false, errorMessage: 'Directory not found: missing' });
  });
});

describe('DirectoryDelete', () => {
  const op = new DirectoryDeleteOperation(lookup);

  it('refuses to delete the session root', async () => {
    await expect(op.run(context({ path: '.' }))).rejects.toBeInstanceOf(BoundaryViolationError);
  });

  it('needs recursive for a non-empty directory', async () => {
    seed('d/f.txt', 'x');
    await expect(op.run(context({ path: 'd' }))).resolves.toEqual({
      success: false,
      errorMessage: 'Directory not empty: d (1 entries). Use recursive=true to delete it with its contents',
    });
    expect(outputOf(await op.run(context({ path: 'd', recursive: true })))).toMatch(/^Deleted directory: d\n/);
    expect(fs.existsSync(sessionPath('d'))).toBe(false);
  });
});

describe('DirectoryCopy and DirectoryMove', () => {
  it('copies a tree and refuses to copy into itself', async () => {
    const op = new DirectoryCopyOperation(lookup);
    seed('src/a.txt', 'a');
    expect(outputOf(await op.run(context({ source: 'src', destination: 'dst' })))).toMatch(/^Copied directory src to dst\n/);
    expect(fs.readFileSync(sessionPath('dst', 'a.txt'), 'utf8')).toBe('a');
    await expect(op.run(context({ source: 'src', destination: 'src/inner' }))).resolves.toEqual({
      success: false,
      errorMessage: 'Cannot copy src into itself',
    });
  });

  it('moves a directory and refuses an existing destination without overwrite', async () => {
    const op = new DirectoryMoveOperation(lookup);
    seed('one/a.txt', 'a');
    fs.mkdirSync(sessionPath('two'));
    await expect(op.run(context({ source: 'one', destination: 'two' }))).resolves.toEqual({
      success: false,
      errorMessage: 'Destination already exists: two. Use overwrite=true to replace it',
    });
    expect(outputOf(await op.run(context({ source: 'one', destination: 'two', overwrite: true })))).toMatch(/^Moved directory one to two\n/);
    expect(fs.existsSync(sessionPath('one'))).toBe(false);
    expect(fs.readFileSync(sessionPath('two', 'a.txt'), 'utf8')).toBe('a');
  });
});

describe.each([
  ['DirectoryMove', new DirectoryMoveOperation(lookup)],
  ['DirectoryCopy', new DirectoryCopyOperation(lookup)],
])('%s with overwrite', (_name, op) => {
  beforeEach(() => {
    seed('data/f.txt', 'f');
    seed('keep.txt', 'k');
  });

  const expectSessionIntact = (): void => {
    expect(fs.readFileSync(sessionPath('data', 'f.txt'), 'utf8')).toBe('f');
    expect(fs.readFileSync(sessionPath('keep.txt'), 'utf8')).toBe('k');
  };

  it('refuses the session root as the destination', async () => {
    await expect(op.run(context({ source: 'data', destination: '.', overwrite: true })))
      .rejects.toThrow(new BoundaryViolationError('s1', '.', 'targets the session root itself'));
    expectSessionIntact();
  });

  it('refuses a destination that contains the source', async () => {
    seed('outer/inner/g.txt', 'g');
    await expect(op.run(context({ source: 'outer/inner', destination: 'outer', overwrite: true }))).resolves.toEqual({
      success: false,
      errorMessage: 'Cannot replace outer: it contains outer/inner',
    });
    expect(fs.readFileSync(sessionPath('outer', 'inner', 'g.txt'), 'utf8')).toBe('g');
    expectSessionIntact();
  });

  it('refuses a destination that contains the working directory', async () => {
    seed('work/sub/x.txt', 'x');
    const outcome = await op.run(context({ source: '../../data', destination: '..', overwrite: true }, sessionPath('work', 'sub')));
    expect(outcome).toEqual({ success: false, errorMessage: 'Cannot replace work: it contains the working directory' });
    expect(fs.readFileSync(sessionPath('work', 'sub', 'x.txt'), 'utf8')).toBe('x');
    expectSessionIntact();
  });
});

describe('FileWrite and FileRead', () => {
  const write = new FileWriteOperation(lookup);
  const read = new FileReadOperation(lookup);

  it('writes with parent creation, then reads a line range', async () => {
    const written = outputOf(await write.run(context({ path: 'notes/a.txt', content: 'one\ntwo\nthree\n' })));
    expect(written).toMatch(/^Created file: notes\/a\.txt \(14 bytes written\)\n/);

    const output = outputOf(await read.run(context({ path: 'notes/a.txt', startLine: 2, maxLines: 1, showLineNumbers: true })));
    const lines = output.split('\n');
    expect(lines[0]).toBe('File: notes/a.txt');
    expect(lines[1]).toBe('Size: 14 B');
    expect(lines[3]).toBe('Lines: 2 to 2 of 3');
    expect(lines[5]).toBe('     2: two');
    expect(lines[6]).toBe('... (1 more lines)');
  });

  it('appends and reports overwrites', async () => {
    await write.run(context({ path: 'a.txt', content: 'x' }));
    expect(outputOf(await write.run(context({ path: 'a.txt', content: 'y', append: true })))).toMatch(/^Appended file: a\.txt \(1 bytes written\)/);
    expect(outputOf(await write.run(context({ path: 'a.txt', content: 'zz' })))).toMatch(/^Overwrote file: a\.txt \(2 bytes written\)/);
    expect(fs.readFileSync(sessionPath('a.txt'), 'utf8')).toBe('zz');
  });

  it('refuses a missing parent when directory creation is off', async () => {
    await expect(write.run(context({ path: 'no/such/a.txt', content: 'x', createDirectories: false }))).resolves.toEqual({
      success: false,
      errorMessage: 'Parent directory does not exist: no/such',
    });
  });

  it('reports a missing file', async () => {
    await expect(read.run(context({ path: 'nope.txt' }))).resolves.toEqual({ success: false, errorMessage: 'File not found: nope.txt' });
  });
});

describe('FileCopy, FileMove and FileDelete', () => {
  it('copies into an existing directory under the source name', async () => {
    seed('a.txt', 'abc');
    fs.mkdirSync(sessionPath('sub'));
    const output = outputOf(await new FileCopyOperation(lookup).run(context({ source: 'a.txt', destination: 'sub' })));
    expect(output).toMatch(/^Copied a\.txt to sub\/a\.txt \(3 B\)\n/);
    expect(fs.existsSync(sessionPath('a.txt'))).toBe(true);
  });

  it('moves a file and refuses to overwrite by default', async () => {
    seed('a.txt', 'abc');
    seed('b.txt', 'b');
    const move = new FileMoveOperation(lookup);
    await expect(move.run(context({ source: 'a.txt', destination: 'b.txt' }))).resolves.toEqual({
      success: false,
      errorMessage: 'Destination already exists: b.txt. Use overwrite=true to replace it',
    });
    expect(outputOf(await move.run(context({ source: 'a.txt', destination: 'c.txt' })))).toMatch(/^Moved a\.txt to c\.txt \(3 B\)\n/);
    expect(fs.existsSync(sessionPath('a.txt'))).toBe(false);
  });

  it('deletes files only', async () => {
    seed('a.txt', 'abc');
    fs.mkdirSync(sessionPath('sub'));
    const del = new FileDeleteOperation(lookup);
    expect(outputOf(await del.run(context({ path: 'a.txt' })))).toMatch(/^Deleted file: a\.txt \(3 B\)\n/);
    await expect(del.run(context({ path: 'sub' }))).resolves.toEqual({
      success: false,
      errorMessage: 'Not a file: sub. Use DirectoryDelete for directories',
    });
  });
});

describe('FileAttributes', () => {
  it('toggles read-only', async () => {
    seed('a.txt', 'abc');
    fs.chmodSync(sessionPath('a.txt'), 0o644);
    const op = new FileAttributesOperation(lookup);
    const output = outputOf(await op.run(context({ path: 'a.txt', setReadOnly: true })));
    const lines = output.split('\n');
    expect(lines.slice(0, 6)).toEqual([
      'Path: a.txt',
      'Type: file',
      'Size: 3 B',
      'Mode: 444',
      'Read-only: yes',
      'Hidden: no',
    ]);
    expect(lines).toContain('Changes: read-only set');
    fs.chmodSync(sessionPath('a.txt'), 0o644);
  });
});

describe('CursorNavigation and PrintWorkingDirectory', () => {
  it('moves the session cursor and reports it', async () => {
    const moved = outputOf(await new CursorNavigationOperation(lookup).run(context({ path: 'x/y' })));
    expect(moved).toMatch(/^Changed directory from \. to x\/y\n/);
    const pwd = outputOf(await new PrintWorkingDirectoryOperation(lookup).run(context({})));
    expect(pwd).toBe('Current directory: x/y\n\n--- Cursor Context ---\nWorking directory: x/y\n  (empty)');
  });

  it('stays put on ".." at the root', async () => {
    const output = outputOf(await new CursorNavigationOperation(lookup).run(context({ path: '..' })));
    expect(output).toMatch(/^Working directory unchanged: \.\n/);
  });
});
