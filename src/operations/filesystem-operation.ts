import type { SessionScope } from '../session/session-scope.js';
import type { OperationContext, OperationOutcome } from '../types.js';

import { OperationExecutionError } from './operation-errors.js';
import { BaseOperation } from './types.js';

export type SessionLookup = (sessionId: string) => SessionScope;

/** Parameters any filesystem operation accepts to move the cursor before it runs. */
export const NAVIGATION_PARAMETERS = ['cd', 'changeDirectory', 'navigate'] as const;

export const NAVIGATION_SCHEMA_PROPERTIES = {
  cd: { type: 'string' },
  changeDirectory: { type: 'string' },
  navigate: { type: 'string' },
} as const;

export interface FileSystemRun {
  scope: SessionScope;
  context: Readonly<OperationContext>;
  /** Directory relative paths resolve against for this run. */
  cwd: string;
  resolve: (relativePath: string) => string;
  display: (absolutePath: string) => string;
}

export function stringParam(parameters: Readonly<Record<string, unknown>>, key: string): string | undefined {
  const value = parameters[key];
  if (typeof value === 'string' && value.trim().length > 0) return value;
  if (typeof value === 'number') return String(value);
  return undefined;
}

export function requireStringParam(parameters: Readonly<Record<string, unknown>>, key: string): string {
  const value = stringParam(parameters, key);
  if (value === undefined) {
    throw new OperationExecutionError('invalid_parameters', `invalid_parameters: '${key}' (string) is required`);
  }
  return value;
}

export function boolParam(parameters: Readonly<Record<string, unknown>>, key: string, fallback: boolean): boolean {
  const value = parameters[key];
  if (typeof value === 'boolean') return value;
  if (typeof value === 'string') {
    const lowered = value.trim().toLowerCase();
    if (lowered === 'true' || lowered === 'yes' || lowered === '1') return true;
    if (lowered === 'false' || lowered === 'no' || lowered === '0') return false;
  }
  return fallback;
}

export function numberParam(parameters: Readonly<Record<string, unknown>>, key: string): number | undefined {
  const value = parameters[key];
  if (typeof value === 'number' && Number.isFinite(value)) return value;
  if (typeof value === 'string' && value.trim().length > 0) {
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : undefined;
  }
  return undefined;
}

export function formatFileSize(bytes: number): string {
  const units = ['B', 'KB', 'MB', 'GB'];
  let size = bytes;
  let unit = 0;
  while (size >= 1024 && unit < units.length - 1) {
    size /= 1024;
    unit += 1;
  }
  return unit === 0 ? `${String(bytes)} B` : `${size.toFixed(1)} ${units[unit]}`;
}

/**
 * Shared shape of operations that touch the session directory: optional
 * cursor movement first, then the operation body, then a Cursor Context
 * block on success. Every path goes through the session scope.
 */
export abstract class FileSystemOperation extends BaseOperation {
  override readonly requiresFileSystem: boolean = true;

  constructor(protected readonly sessions: SessionLookup) {
    super();
  }

  run(context: Readonly<OperationContext>): Promise<OperationOutcome> {
    return this.perform(context, (run) => this.execute(run));
  }

  override runAlternative(method: string, context: Readonly<OperationContext>): Promise<OperationOutcome> {
    if (!this.alternativeMethods().includes(method)) return super.runAlternative(method, context);
    return this.perform(context, (run) => this.executeAlternative(method, run));
  }

  protected abstract execute(run: FileSystemRun): Promise<OperationOutcome>;

  protected executeAlternative(method: string, run: FileSystemRun): Promise<OperationOutcome> {
    return super.runAlternative(method, run.context);
  }

  protected includeCursorContext(): boolean {
    return true;
  }

  protected appliesNavigationParameters(): boolean {
    return true;
  }

  /**
   * Relative paths (including navigation parameters) resolve against the
   * working directory the context was built with, so a retry or an
   * alternative repeats the first attempt instead of moving further.
   */
  private async perform(
    context: Readonly<OperationContext>,
    body: (run: FileSystemRun) => Promise<OperationOutcome>,
  ): Promise<OperationOutcome> {
    const scope = this.sessions(context.sessionId);
    await scope.ensureRoot();
    const base = context.workingDirectory !== undefined
      ? scope.resolvePath('.', context.workingDirectory)
      : scope.workingDirectory;
    const target = this.appliesNavigationParameters() ? navigationTarget(context.parameters) : undefined;
    const cwd = target !== undefined ? await scope.navigate(target, base) : base;
    const outcome = await body({
      scope,
      context,
      cwd,
      resolve: (relativePath: string) => scope.resolvePath(relativePath, cwd),
      display: (absolutePath: string) => scope.toDisplayPath(absolutePath),
    });
    if (!outcome.success || typeof outcome.output !== 'string' || !this.includeCursorContext()) {
      return outcome;
    }
    const sections = [outcome.output];
    if (target !== undefined) sections.unshift(`Changed directory to: ${scope.toDisplayPath(cwd)}`);
    sections.push(await scope.describeCursor());
    return { success: true, output: sections.join('\n\n') };
  }
}

function navigationTarget(parameters: Readonly<Record<string, unknown>>): string | undefined {
  return NAVIGATION_PARAMETERS
    .map((key) => stringParam(parameters, key))
    .find((value): value is string => value !== undefined);
}
