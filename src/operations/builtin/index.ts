import type { SessionLookup } from '../filesystem-operation.js';
import type { Operation } from '../types.js';

import { OperationRegistry } from '../registry.js';

import {
  DirectoryCopyOperation,
  DirectoryCreateOperation,
  DirectoryDeleteOperation,
  DirectoryListOperation,
  DirectoryMoveOperation,
} from './directory-operations.js';
import { ExternalCommandExecutorOperation } from './external-command.js';
import {
  FileAttributesOperation,
  FileCopyOperation,
  FileDeleteOperation,
  FileMoveOperation,
  FileReadOperation,
  FileWriteOperation,
} from './file-operations.js';
import { MathEvaluatorOperation } from './math-evaluator.js';
import { CursorNavigationOperation, PrintWorkingDirectoryOperation } from './navigation-operations.js';
import { DownloadOperation, GitHubDownloaderOperation, type DownloadDependencies } from './repository-download.js';

export interface BuiltinOperationOptions {
  /** Leave out operations that need the network. */
  offline?: boolean;
  download?: DownloadDependencies;
}

export function createBuiltinOperations(sessions: SessionLookup, options: BuiltinOperationOptions = {}): Operation[] {
  const operations: Operation[] = [
    new DirectoryCreateOperation(sessions),
    new DirectoryListOperation(sessions),
    new DirectoryDeleteOperation(sessions),
    new DirectoryCopyOperation(sessions),
    new DirectoryMoveOperation(sessions),
    new FileReadOperation(sessions),
    new FileWriteOperation(sessions),
    new FileCopyOperation(sessions),
    new FileMoveOperation(sessions),
    new FileDeleteOperation(sessions),
    new FileAttributesOperation(sessions),
    new CursorNavigationOperation(sessions),
    new PrintWorkingDirectoryOperation(sessions),
    new MathEvaluatorOperation(),
    new ExternalCommandExecutorOperation(sessions),
  ];
  if (options.offline !== true) {
    operations.push(
      new GitHubDownloaderOperation(sessions, options.download),
      new DownloadOperation(sessions, options.download),
    );
  }
  return operations;
}

/** A frozen registry holding every builtin operation. */
export function createDefaultRegistry(sessions: SessionLookup, options: BuiltinOperationOptions = {}): OperationRegistry {
  const registry = new OperationRegistry();
  createBuiltinOperations(sessions, options).forEach((operation) => registry.register(operation));
  return registry.freeze();
}
