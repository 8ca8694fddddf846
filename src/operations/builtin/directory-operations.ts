import fs from 'node:fs';
import path from 'node:path';

import type { OperationOutcome } from '../../types.js';

import { isNotFound } from '../../session/session-scope.js';
import {
  FileSystemOperation,
  boolParam,
  formatFileSize,
  requireStringParam,
  stringParam,
  NAVIGATION_SCHEMA_PROPERTIES,
  type FileSystemRun,
} from '../filesystem-operation.js';
import { fail, succeed } from '../types.js';

const LIST_MAX_ENTRIES = 500;
const LIST_MAX_DEPTH = 5;

async function statOrUndefined(target: string): Promise<fs.Stats | undefined> {
  try {
    return await fs.promises.stat(target);
  } catch (error) {
    if (isNotFound(error)) return undefined;
    throw error;
  }
}

const isInside = (parent: string, child: string): boolean => {
  const relative = path.relative(parent, child);
  return relative.length > 0 && !relative.startsWith('..') && !path.isAbsolute(relative);
};

/**
 * Overwriting `destination` must not take the session root, the source or
 * the working directory with it. The root is a boundary violation; the
 * other two are refused.
 */
function replacementConflict(run: FileSystemRun, source: string, destination: string, requested: string): string | undefined {
  run.scope.assertNotRoot(destination, requested);
  if (isInside(destination, source)) {
    return `Cannot replace ${run.display(destination)}: it contains ${run.display(source)}`;
  }
  const workingDirectories = [run.cwd, run.scope.workingDirectory];
  if (workingDirectories.some((dir) => dir === destination || isInside(destination, dir))) {
    return `Cannot replace ${run.display(destination)}: it contains the working directory`;
  }
  return undefined;
}

export class DirectoryCreateOperation extends FileSystemOperation {
  readonly name = 'DirectoryCreate';
  readonly description = 'Creates a directory (and missing parents) inside the session';
  override readonly aliases = ['mkdir', 'CreateDirectory'];
  readonly capabilities = ['directory:create', 'fs:mkdir', 'cursor:navigate'];
  readonly inputSchema = {
    type: 'object',
    properties: { path: { type: 'string', minLength: 1 }, ...NAVIGATION_SCHEMA_PROPERTIES },
    required: ['path'],
  };

  protected async execute(run: FileSystemRun): Promise<OperationOutcome> {
    const requested = requireStringParam(run.context.parameters, 'path');
    const target = run.resolve(requested);
    const existing = await statOrUndefined(target);
    if (existing !== undefined && !existing.isDirectory()) {
      return fail(`A file already exists at ${run.display(target)}`);
    }
    if (existing !== undefined) {
      return succeed(`Directory already exists: ${run.display(target)}`);
    }
    await fs.promises.mkdir(target, { recursive: true });
    return succeed(`Created directory: ${run.display(target)}`);
  }
}

type SortKey = 'name' | 'size' | 'date';

interface ListedEntry {
  relative: string;
  isDirectory: boolean;
  size: number;
  modified: number;
}

export class DirectoryListOperation extends FileSystemOperation {
  readonly name = 'DirectoryList';
  readonly description = 'Lists directory contents (like ls or dir)';
  override readonly aliases = ['ls', 'ListDirectory'];
  readonly capabilities = ['directory:list', 'fs:ls', 'fs:dir', 'cursor:navigate'];
  readonly inputSchema = {
    type: 'object',
    properties: {
      path: { type: 'string' },
      recursive: { type: 'boolean', default: false },
      includeHidden: { type: 'boolean', default: false },
      sortBy: { type: 'string', enum: ['name', 'size', 'date'], default: 'name' },
      ...NAVIGATION_SCHEMA_PROPERTIES,
    },
  };

  protected override includeCursorContext(): boolean {
    return false;
  }

  protected async execute(run: FileSystemRun): Promise<OperationOutcome> {
    const params = run.context.parameters;
    const target = run.resolve(stringParam(params, 'path') ?? '.');
    const recursive = boolParam(params, 'recursive', false);
    const includeHidden = boolParam(params, 'includeHidden', false);
    const sortRaw = stringParam(params, 'sortBy');
    const sortBy: SortKey = sortRaw === 'size' || sortRaw === 'date' ? sortRaw : 'name';

    const stat = await statOrUndefined(target);
    if (stat === undefined) return fail(`Directory not found: ${run.display(target)}`);
    if (!stat.isDirectory()) return fail(`Not a directory: ${run.display(target)}`);

    const entries: ListedEntry[] = [];
    await this.collect(target, target, recursive ? LIST_MAX_DEPTH : 0, includeHidden, entries);
    entries.sort((a, b) => {
      if (sortBy === 'size') return b.size - a.size || a.relative.localeCompare(b.relative);
      if (sortBy === 'date') return b.modified - a.modified || a.relative.localeCompare(b.relative);
      if (a.isDirectory !== b.isDirectory) return a.isDirectory ? -1 : 1;
      return a.relative.localeCompare(b.relative);
    });

    const lines = [`Directory: ${run.display(target)}`];
    entries.forEach((entry) => {
      lines.push(entry.isDirectory
        ? `[DIR]  ${entry.relative}/`
        : `[FILE] ${entry.relative} (${formatFileSize(entry.size)})`);
    });
    const dirs = entries.filter((entry) => entry.isDirectory).length;
    lines.push(`Total: ${String(dirs)} directories, ${String(entries.length - dirs)} files`);
    if (entries.length >= LIST_MAX_ENTRIES) lines.push(`(listing capped at ${String(LIST_MAX_ENTRIES)} entries)`);
    return succeed(lines.join('\n'));
  }

  private async collect(base: string, dir: string, depth: number, includeHidden: boolean, out: ListedEntry[]): Promise<void> {
    const dirents = await fs.promises.readdir(dir, { withFileTypes: true });
    for (const dirent of dirents) {
      if (out.length >= LIST_MAX_ENTRIES) return;
      if (!includeHidden && dirent.name.startsWith('.')) continue;
      const full = path.join(dir, dirent.name);
      const stat = await fs.promises.lstat(full);
      out.push({
        relative: path.relative(base, full).split(path.sep).join('/'),
        isDirectory: stat.isDirectory(),
        size: stat.isDirectory() ? 0 : stat.size,
        modified: stat.mtimeMs,
      });
      if (depth > 0 && stat.isDirectory()) {
        await this.collect(base, full, depth - 1, includeHidden, out);
      }
    }
  }
}

export class DirectoryDeleteOperation extends FileSystemOperation {
  readonly name = 'DirectoryDelete';
  readonly description = 'Deletes a directory; non-empty directories need recursive=true';
  override readonly aliases = ['rmdir', 'DeleteDirectory'];
  readonly capabilities = ['directory:delete', 'fs:rmdir', 'cursor:navigate'];
  readonly inputSchema = {
    type: 'object',
    properties: {
      path: { type: 'string', minLength: 1 },
      recursive: { type: 'boolean', default: false },
      ...NAVIGATION_SCHEMA_PROPERTIES,
    },
    required: ['path'],
  };

  protected async execute(run: FileSystemRun): Promise<OperationOutcome> {
    const requested = requireStringParam(run.context.parameters, 'path');
    const recursive = boolParam(run.context.parameters, 'recursive', false);
    const target = run.resolve(requested);
    run.scope.assertNotRoot(target, requested);
    const stat = await statOrUndefined(target);
    if (stat === undefined) return fail(`Directory not found: ${run.display(target)}`);
    if (!stat.isDirectory()) return fail(`Not a directory: ${run.display(target)}`);
    if (isInside(target, run.scope.workingDirectory) || target === run.scope.workingDirectory) {
      return fail(`Cannot delete ${run.display(target)}: it contains the working directory`);
    }
    const children = await fs.promises.readdir(target);
    if (children.length > 0 && !recursive) {
      return fail(`Directory not empty: ${run.display(target)} (${String(children.length)} entries). Use recursive=true to delete it with its contents`);
    }
    await fs.promises.rm(target, { recursive: true, force: false });
    return succeed(`Deleted directory: ${run.display(target)}`);
  }
}

export class DirectoryCopyOperation extends FileSystemOperation {
  readonly name = 'DirectoryCopy';
  readonly description = 'Copies a directory tree to a new location inside the session';
  override readonly aliases = ['CopyDirectory'];
  readonly capabilities = ['directory:copy', 'fs:xcopy', 'cursor:navigate'];
  readonly inputSchema = {
    type: 'object',
    properties: {
      source: { type: 'string', minLength: 1 },
      destination: { type: 'string', minLength: 1 },
      overwrite: { type: 'boolean', default: false },
      ...NAVIGATION_SCHEMA_PROPERTIES,
    },
    required: ['source', 'destination'],
  };

  protected async execute(run: FileSystemRun): Promise<OperationOutcome> {
    const params = run.context.parameters;
    const source = run.resolve(requireStringParam(params, 'source'));
    const destinationRequested = requireStringParam(params, 'destination');
    const destination = run.resolve(destinationRequested);
    const overwrite = boolParam(params, 'overwrite', false);
    const stat = await statOrUndefined(source);
    if (stat === undefined) return fail(`Source directory not found: ${run.display(source)}`);
    if (!stat.isDirectory()) return fail(`Source is not a directory: ${run.display(source)}`);
    if (destination === source || isInside(source, destination)) {
      return fail(`Cannot copy ${run.display(source)} into itself`);
    }
    if (await statOrUndefined(destination) !== undefined) {
      if (!overwrite) {
        return fail(`Destination already exists: ${run.display(destination)}. Use overwrite=true to replace it`);
      }
      const conflict = replacementConflict(run, source, destination, destinationRequested);
      if (conflict !== undefined) return fail(conflict);
    }
    await fs.promises.cp(source, destination, { recursive: true, force: overwrite, errorOnExist: !overwrite });
    return succeed(`Copied directory ${run.display(source)} to ${run.display(destination)}`);
  }
}

export class DirectoryMoveOperation extends FileSystemOperation {
  readonly name = 'DirectoryMove';
  readonly description = 'Moves or renames a directory inside the session';
  override readonly aliases = ['MoveDirectory'];
  readonly capabilities = ['directory:move', 'fs:move', 'cursor:navigate'];
  readonly inputSchema = {
    type: 'object',
    properties: {
      source: { type: 'string', minLength: 1 },
      destination: { type: 'string', minLength: 1 },
      overwrite: { type: 'boolean', default: false },
      ...NAVIGATION_SCHEMA_PROPERTIES,
    },
    required: ['source', 'destination'],
  };

  protected async execute(run: FileSystemRun): Promise<OperationOutcome> {
    const params = run.context.parameters;
    const sourceRequested = requireStringParam(params, 'source');
    const source = run.resolve(sourceRequested);
    const destinationRequested = requireStringParam(params, 'destination');
    const destination = run.resolve(destinationRequested);
    const overwrite = boolParam(params, 'overwrite', false);
    run.scope.assertNotRoot(source, sourceRequested);
    const stat = await statOrUndefined(source);
    if (stat === undefined) return fail(`Source directory not found: ${run.display(source)}`);
    if (!stat.isDirectory()) return fail(`Source is not a directory: ${run.display(source)}`);
    if (destination === source || isInside(source, destination)) {
      return fail(`Cannot move ${run.display(source)} into itself`);
    }
    if (isInside(source, run.scope.workingDirectory)) {
      return fail(`Cannot move ${run.display(source)}: it contains the working directory`);
    }
    if (await statOrUndefined(destination) !== undefined) {
      if (!overwrite) {
        return fail(`Destination already exists: ${run.display(destination)}. Use overwrite=true to replace it`);
      }
      const conflict = replacementConflict(run, source, destination, destinationRequested);
      if (conflict !== undefined) return fail(conflict);
      await fs.promises.rm(destination, { recursive: true, force: true });
    }
    await fs.promises.mkdir(path.dirname(destination), { recursive: true });
    await fs.promises.rename(source, destination);
    return succeed(`Moved directory ${run.display(source)} to ${run.display(destination)}`);
  }
}
