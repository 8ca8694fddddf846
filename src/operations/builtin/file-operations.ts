import fs from 'node:fs';
import path from 'node:path';

import type { OperationOutcome } from '../../types.js';

import { isNotFound } from '../../session/session-scope.js';
import {
  FileSystemOperation,
  boolParam,
  formatFileSize,
  numberParam,
  requireStringParam,
  NAVIGATION_SCHEMA_PROPERTIES,
  type FileSystemRun,
} from '../filesystem-operation.js';
import { fail, succeed } from '../types.js';

const READ_MAX_LINES = 400;

async function statOrUndefined(target: string): Promise<fs.Stats | undefined> {
  try {
    return await fs.promises.stat(target);
  } catch (error) {
    if (isNotFound(error)) return undefined;
    throw error;
  }
}

const formatTimestamp = (date: Date): string => date.toISOString().replace('T', ' ').slice(0, 19);

export class FileReadOperation extends FileSystemOperation {
  readonly name = 'FileRead';
  readonly description = 'Reads file contents (like cat or type), optionally a line range';
  override readonly aliases = ['cat', 'ReadFile'];
  readonly capabilities = ['file:read', 'file:content', 'fs:cat', 'cursor:navigate'];
  readonly inputSchema = {
    type: 'object',
    properties: {
      path: { type: 'string', minLength: 1 },
      startLine: { type: 'integer', minimum: 1, default: 1 },
      maxLines: { type: 'integer', minimum: 1 },
      showLineNumbers: { type: 'boolean', default: false },
      ...NAVIGATION_SCHEMA_PROPERTIES,
    },
    required: ['path'],
  };

  protected async execute(run: FileSystemRun): Promise<OperationOutcome> {
    const params = run.context.parameters;
    const target = run.resolve(requireStringParam(params, 'path'));
    const stat = await statOrUndefined(target);
    if (stat === undefined) return fail(`File not found: ${run.display(target)}`);
    if (!stat.isFile()) return fail(`Not a file: ${run.display(target)}`);

    const content = await fs.promises.readFile(target, 'utf8');
    const allLines = content.split(/\r?\n/);
    if (allLines.length > 1 && allLines[allLines.length - 1] === '') allLines.pop();
    const startLine = Math.max(1, Math.trunc(numberParam(params, 'startLine') ?? 1));
    const maxLines = Math.min(READ_MAX_LINES, Math.trunc(numberParam(params, 'maxLines') ?? READ_MAX_LINES));
    const showLineNumbers = boolParam(params, 'showLineNumbers', false);
    const slice = allLines.slice(startLine - 1, startLine - 1 + maxLines);
    const lastLine = startLine + slice.length - 1;

    const lines = [
      `File: ${run.display(target)}`,
      `Size: ${formatFileSize(stat.size)}`,
      `Modified: ${formatTimestamp(stat.mtime)}`,
      slice.length < allLines.length
        ? `Lines: ${String(startLine)} to ${String(lastLine)} of ${String(allLines.length)}`
        : `Lines: ${String(allLines.length)}`,
      '',
    ];
    slice.forEach((line, index) => {
      lines.push(showLineNumbers ? `${String(startLine + index).padStart(6)}: ${line}` : line);
    });
    if (lastLine < allLines.length) {
      lines.push(`... (${String(allLines.length - lastLine)} more lines)`);
    }
    return succeed(lines.join('\n'));
  }
}

export class FileWriteOperation extends FileSystemOperation {
  readonly name = 'FileWrite';
  readonly description = 'Writes or appends text content to a file';
  override readonly aliases = ['WriteFile'];
  readonly capabilities = ['file:write', 'file:create', 'fs:echo', 'cursor:navigate'];
  readonly inputSchema = {
    type: 'object',
    properties: {
      path: { type: 'string', minLength: 1 },
      content: { type: 'string' },
      append: { type: 'boolean', default: false },
      createDirectories: { type: 'boolean', default: true },
      ...NAVIGATION_SCHEMA_PROPERTIES,
    },
    required: ['path', 'content'],
  };

  protected async execute(run: FileSystemRun): Promise<OperationOutcome> {
    const params = run.context.parameters;
    const target = run.resolve(requireStringParam(params, 'path'));
    const content = typeof params.content === 'string' ? params.content : JSON.stringify(params.content ?? '');
    const append = boolParam(params, 'append', false);
    const createDirectories = boolParam(params, 'createDirectories', true);
    const parent = path.dirname(target);
    if (await statOrUndefined(parent) === undefined) {
      if (!createDirectories) return fail(`Parent directory does not exist: ${run.display(parent)}`);
      await fs.promises.mkdir(parent, { recursive: true });
    }
    const existing = await statOrUndefined(target);
    if (existing?.isDirectory() === true) return fail(`A directory exists at ${run.display(target)}`);
    if (append) {
      await fs.promises.appendFile(target, content, 'utf8');
    } else {
      await fs.promises.writeFile(target, content, 'utf8');
    }
    const bytes = Buffer.byteLength(content, 'utf8');
    const verb = append ? 'Appended' : existing !== undefined ? 'Overwrote' : 'Created';
    return succeed(`${verb} file: ${run.display(target)} (${String(bytes)} bytes written)`);
  }
}

abstract class FileTransferOperation extends FileSystemOperation {
  readonly inputSchema = {
    type: 'object',
    properties: {
      source: { type: 'string', minLength: 1 },
      destination: { type: 'string', minLength: 1 },
      overwrite: { type: 'boolean', default: false },
      createDirectories: { type: 'boolean', default: true },
      ...NAVIGATION_SCHEMA_PROPERTIES,
    },
    required: ['source', 'destination'],
  };

  protected abstract transfer(source: string, destination: string): Promise<void>;
  protected abstract readonly verb: string;

  protected async execute(run: FileSystemRun): Promise<OperationOutcome> {
    const params = run.context.parameters;
    const source = run.resolve(requireStringParam(params, 'source'));
    let destination = run.resolve(requireStringParam(params, 'destination'));
    const overwrite = boolParam(params, 'overwrite', false);
    const createDirectories = boolParam(params, 'createDirectories', true);
    const sourceStat = await statOrUndefined(source);
    if (sourceStat === undefined) return fail(`Source file not found: ${run.display(source)}`);
    if (!sourceStat.isFile()) return fail(`Source is not a file: ${run.display(source)}`);

    const destinationStat = await statOrUndefined(destination);
    if (destinationStat?.isDirectory() === true) {
      destination = path.join(destination, path.basename(source));
    }
    if (destination === source) return fail(`Source and destination are the same: ${run.display(source)}`);
    if (!overwrite && await statOrUndefined(destination) !== undefined) {
      return fail(`Destination already exists: ${run.display(destination)}. Use overwrite=true to replace it`);
    }
    const parent = path.dirname(destination);
    if (await statOrUndefined(parent) === undefined) {
      if (!createDirectories) return fail(`Destination directory does not exist: ${run.display(parent)}`);
      await fs.promises.mkdir(parent, { recursive: true });
    }
    await this.transfer(source, destination);
    return succeed(`${this.verb} ${run.display(source)} to ${run.display(destination)} (${formatFileSize(sourceStat.size)})`);
  }
}

export class FileCopyOperation extends FileTransferOperation {
  readonly name = 'FileCopy';
  readonly description = 'Copies a file inside the session';
  override readonly aliases = ['cp', 'CopyFile'];
  readonly capabilities = ['file:copy', 'fs:copy', 'cursor:navigate'];
  protected readonly verb = 'Copied';

  protected async transfer(source: string, destination: string): Promise<void> {
    await fs.promises.copyFile(source, destination);
  }
}

export class FileMoveOperation extends FileTransferOperation {
  readonly name = 'FileMove';
  readonly description = 'Moves or renames a file inside the session';
  override readonly aliases = ['mv', 'MoveFile', 'FileRename'];
  readonly capabilities = ['file:move', 'file:rename', 'fs:move', 'cursor:navigate'];
  protected readonly verb = 'Moved';

  protected async transfer(source: string, destination: string): Promise<void> {
    await fs.promises.rename(source, destination);
  }
}

export class FileDeleteOperation extends FileSystemOperation {
  readonly name = 'FileDelete';
  readonly description = 'Deletes a file';
  override readonly aliases = ['rm', 'del', 'DeleteFile'];
  readonly capabilities = ['file:delete', 'fs:del', 'cursor:navigate'];
  readonly inputSchema = {
    type: 'object',
    properties: { path: { type: 'string', minLength: 1 }, ...NAVIGATION_SCHEMA_PROPERTIES },
    required: ['path'],
  };

  protected async execute(run: FileSystemRun): Promise<OperationOutcome> {
    const target = run.resolve(requireStringParam(run.context.parameters, 'path'));
    const stat = await statOrUndefined(target);
    if (stat === undefined) return fail(`File not found: ${run.display(target)}`);
    if (!stat.isFile()) return fail(`Not a file: ${run.display(target)}. Use DirectoryDelete for directories`);
    await fs.promises.unlink(target);
    return succeed(`Deleted file: ${run.display(target)} (${formatFileSize(stat.size)})`);
  }
}

const WRITE_BITS = 0o222;

export class FileAttributesOperation extends FileSystemOperation {
  readonly name = 'FileAttributes';
  readonly description = 'Shows file attributes; setReadOnly toggles the write permission';
  override readonly aliases = ['attrib', 'stat'];
  readonly capabilities = ['file:attributes', 'fs:attrib', 'cursor:navigate'];
  readonly inputSchema = {
    type: 'object',
    properties: {
      path: { type: 'string', minLength: 1 },
      setReadOnly: { type: 'boolean' },
      ...NAVIGATION_SCHEMA_PROPERTIES,
    },
    required: ['path'],
  };

  protected async execute(run: FileSystemRun): Promise<OperationOutcome> {
    const params = run.context.parameters;
    const target = run.resolve(requireStringParam(params, 'path'));
    let stat = await statOrUndefined(target);
    if (stat === undefined) return fail(`Path not found: ${run.display(target)}`);

    const changes: string[] = [];
    if (typeof params.setReadOnly === 'boolean') {
      const mode = stat.mode & 0o777;
      const next = params.setReadOnly ? mode & ~WRITE_BITS : mode | 0o200;
      if (next !== mode) {
        await fs.promises.chmod(target, next);
        changes.push(params.setReadOnly ? 'read-only set' : 'read-only cleared');
      }
      stat = await fs.promises.stat(target);
    }

    const mode = stat.mode & 0o777;
    const lines = [
      `Path: ${run.display(target)}`,
      `Type: ${stat.isDirectory() ? 'directory' : 'file'}`,
      `Size: ${formatFileSize(stat.size)}`,
      `Mode: ${mode.toString(8).padStart(3, '0')}`,
      `Read-only: ${(mode & WRITE_BITS) === 0 ? 'yes' : 'no'}`,
      `Hidden: ${path.basename(target).startsWith('.') ? 'yes' : 'no'}`,
      `Created: ${formatTimestamp(stat.birthtime)}`,
      `Modified: ${formatTimestamp(stat.mtime)}`,
    ];
    if (changes.length > 0) lines.push(`Changes: ${changes.join(', ')}`);
    return succeed(lines.join('\n'));
  }
}
