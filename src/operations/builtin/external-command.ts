import { spawn } from 'node:child_process';

import type { OperationOutcome } from '../../types.js';

import { TruncatingCollector, truncateToBytes } from '../../truncation.js';
import {
  FileSystemOperation,
  numberParam,
  requireStringParam,
  NAVIGATION_SCHEMA_PROPERTIES,
  type FileSystemRun,
  type SessionLookup,
} from '../filesystem-operation.js';
import { fail, succeed } from '../types.js';

export const COMMAND_OUTPUT_MAX_BYTES = 8 * 1024;
const DEFAULT_TIMEOUT_SECONDS = 30;
const KILL_GRACE_MS = 2000;

export interface CommandRunResult {
  exitCode: number | null;
  output: string;
  timedOut: boolean;
}

export interface CommandSpec {
  file: string;
  args: string[];
  shell: boolean;
  cwd: string;
  timeoutMs: number;
}

/** Splits a command line on whitespace, honouring single and double quotes. */
export function splitCommandLine(line: string): string[] {
  const parts: string[] = [];
  let current = '';
  let quote: '"' | "'" | undefined;
  let pending = false;
  for (const ch of line) {
    if (quote !== undefined) {
      if (ch === quote) quote = undefined;
      else current += ch;
      continue;
    }
    if (ch === '"' || ch === "'") {
      quote = ch;
      pending = true;
    } else if (/\s/.test(ch)) {
      if (pending || current.length > 0) parts.push(current);
      current = '';
      pending = false;
    } else {
      current += ch;
    }
  }
  if (pending || current.length > 0) parts.push(current);
  return parts;
}

const quoteForShell = (arg: string): string => (/^[\w./:=@%+-]+$/.test(arg) ? arg : `'${arg.replace(/'/g, `'\\''`)}'`);

function argsParam(value: unknown): string[] {
  if (Array.isArray(value)) return value.map((item) => String(item));
  if (typeof value === 'string' && value.trim().length > 0) return splitCommandLine(value);
  return [];
}

export function runProcess(spec: CommandSpec): Promise<CommandRunResult> {
  return new Promise((resolve, reject) => {
    const child = spawn(spec.file, spec.args, {
      cwd: spec.cwd,
      shell: spec.shell,
      stdio: ['ignore', 'pipe', 'pipe'],
      windowsHide: true,
    });
    const output = new TruncatingCollector(COMMAND_OUTPUT_MAX_BYTES);
    let timedOut = false;
    const timer = setTimeout(() => {
      timedOut = true;
      child.kill('SIGTERM');
      setTimeout(() => { child.kill('SIGKILL'); }, KILL_GRACE_MS).unref();
    }, spec.timeoutMs);
    child.stdout.on('data', (chunk: Buffer) => { output.push(chunk); });
    child.stderr.on('data', (chunk: Buffer) => { output.push(chunk); });
    child.on('error', (error) => {
      clearTimeout(timer);
      reject(error);
    });
    child.on('close', (code) => {
      clearTimeout(timer);
      resolve({ exitCode: code, output: output.toString(), timedOut });
    });
  });
}

/**
 * Runs a process inside the session's working directory. The primary method
 * goes through a shell; `direct_binary_execution` spawns the binary with
 * split arguments and `shell_retry` repeats the shell run with twice the
 * timeout.
 */
export class ExternalCommandExecutorOperation extends FileSystemOperation {
  readonly name = 'ExternalCommandExecutor';
  readonly description = 'Runs an external command (git, curl, tar, ...) inside the session working directory';
  override readonly aliases = ['exec', 'shell', 'RunCommand'];
  readonly capabilities = ['command:execute', 'system:external', 'fallback:operations'];
  readonly inputSchema = {
    type: 'object',
    properties: {
      command: { type: 'string', minLength: 1 },
      args: { type: ['array', 'string'], items: { type: 'string' } },
      timeoutSeconds: { type: 'number', exclusiveMinimum: 0, default: DEFAULT_TIMEOUT_SECONDS },
      ...NAVIGATION_SCHEMA_PROPERTIES,
    },
    required: ['command'],
  };

  constructor(
    sessions: SessionLookup,
    private readonly runner: (spec: CommandSpec) => Promise<CommandRunResult> = runProcess,
  ) {
    super(sessions);
  }

  override alternativeMethods(): readonly string[] {
    return ['direct_binary_execution', 'shell_retry'];
  }

  protected execute(run: FileSystemRun): Promise<OperationOutcome> {
    return this.runShell(run, 1);
  }

  protected override executeAlternative(method: string, run: FileSystemRun): Promise<OperationOutcome> {
    if (method === 'direct_binary_execution') return this.runDirect(run);
    if (method === 'shell_retry') return this.runShell(run, 2);
    return super.executeAlternative(method, run);
  }

  private runShell(run: FileSystemRun, timeoutFactor: number): Promise<OperationOutcome> {
    const command = requireStringParam(run.context.parameters, 'command');
    const args = argsParam(run.context.parameters.args);
    const line = [command, ...args.map(quoteForShell)].join(' ');
    return this.launch(run, { file: line, args: [], shell: true, cwd: run.cwd, timeoutMs: this.timeoutMs(run) * timeoutFactor }, line);
  }

  private runDirect(run: FileSystemRun): Promise<OperationOutcome> {
    const command = requireStringParam(run.context.parameters, 'command');
    const extra = argsParam(run.context.parameters.args);
    const [file, ...commandArgs] = splitCommandLine(command);
    if (file === undefined) return Promise.resolve(fail('Command is empty', 'invalid_parameters'));
    const args = [...commandArgs, ...extra];
    const line = [file, ...args.map(quoteForShell)].join(' ');
    return this.launch(run, { file, args, shell: false, cwd: run.cwd, timeoutMs: this.timeoutMs(run) }, line);
  }

  private timeoutMs(run: FileSystemRun): number {
    const seconds = numberParam(run.context.parameters, 'timeoutSeconds') ?? DEFAULT_TIMEOUT_SECONDS;
    return Math.max(1, seconds) * 1000;
  }

  private async launch(run: FileSystemRun, spec: CommandSpec, line: string): Promise<OperationOutcome> {
    let result: CommandRunResult;
    try {
      result = await this.runner(spec);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      return fail(`Failed to start command '${line}': ${message}`);
    }
    const output = truncateToBytes(result.output.trimEnd(), COMMAND_OUTPUT_MAX_BYTES);
    if (result.timedOut) {
      return fail(`Command timed out after ${String(spec.timeoutMs / 1000)}s: ${line}`, 'timeout');
    }
    if (result.exitCode !== 0) {
      const code = result.exitCode === null ? 'signal' : String(result.exitCode);
      return fail(`Command failed with exit code ${code}: ${output.length > 0 ? output : '(no output)'}`);
    }
    return succeed([
      `$ ${line}`,
      `Working directory: ${run.display(run.cwd)}`,
      'Exit code: 0',
      output.length > 0 ? output : '(no output)',
    ].join('\n'));
  }
}
