import type { OperationOutcome } from '../../types.js';

import { FileSystemOperation, stringParam, type FileSystemRun } from '../filesystem-operation.js';
import { succeed } from '../types.js';

export class CursorNavigationOperation extends FileSystemOperation {
  readonly name = 'CursorNavigation';
  readonly description = 'Changes the working directory (like cd); missing directories are created';
  override readonly aliases = ['cd', 'ChangeDirectory', 'Navigate'];
  readonly capabilities = ['cursor:navigate', 'fs:cd', 'directory:change'];
  readonly inputSchema = {
    type: 'object',
    properties: {
      path: { type: 'string' },
      cd: { type: 'string' },
    },
  };

  protected override appliesNavigationParameters(): boolean {
    return false;
  }

  protected async execute(run: FileSystemRun): Promise<OperationOutcome> {
    const target = stringParam(run.context.parameters, 'path') ?? stringParam(run.context.parameters, 'cd') ?? '.';
    const before = run.display(run.cwd);
    const moved = await run.scope.navigate(target, run.cwd);
    const after = run.display(moved);
    return succeed(before === after
      ? `Working directory unchanged: ${after}`
      : `Changed directory from ${before} to ${after}`);
  }
}

export class PrintWorkingDirectoryOperation extends FileSystemOperation {
  readonly name = 'PrintWorkingDirectory';
  readonly description = 'Shows the current working directory inside the session (like pwd)';
  override readonly aliases = ['pwd'];
  readonly capabilities = ['cursor:location', 'fs:pwd'];
  readonly inputSchema = { type: 'object', properties: {} };

  protected execute(run: FileSystemRun): Promise<OperationOutcome> {
    return Promise.resolve(succeed(`Current directory: ${run.display(run.cwd)}`));
  }
}
