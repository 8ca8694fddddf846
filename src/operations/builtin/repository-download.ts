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
  type SessionLookup,
} from '../filesystem-operation.js';
import { OperationExecutionError } from '../operation-errors.js';
import { fail, succeed } from '../types.js';

import { runProcess, type CommandRunResult, type CommandSpec } from './external-command.js';

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export interface DownloadDependencies {
  fetch?: FetchLike;
  runCommand?: (spec: CommandSpec) => Promise<CommandRunResult>;
  /** Per-request timeout. */
  timeoutMs?: number;
}

const DEFAULT_DOWNLOAD_TIMEOUT_MS = 120_000;
const GIT_CLONE_TIMEOUT_MS = 300_000;
const DOWNLOADS_DIRECTORY = 'downloads';

export interface GitHubRepository {
  owner: string;
  repo: string;
}

const NAME_SEGMENT = /^[A-Za-z0-9._-]+$/;

/**
 * Accepts `https://github.com/owner/repo[.git][/...]`, `git@github.com:owner/repo.git`
 * and the bare `owner/repo` form.
 */
export function parseGitHubRepository(value: string): GitHubRepository | undefined {
  const trimmed = value.trim();
  const ssh = /^git@github\.com:([^/]+)\/([^/]+?)(?:\.git)?$/.exec(trimmed);
  if (ssh !== null) return toRepository(ssh[1], ssh[2]);
  const bare = /^([^/\s:]+)\/([^/\s:]+?)(?:\.git)?$/.exec(trimmed);
  if (bare !== null && !bare[1].includes('.')) return toRepository(bare[1], bare[2]);
  let url: URL;
  try {
    url = new URL(trimmed);
  } catch {
    return undefined;
  }
  if (url.hostname !== 'github.com' && url.hostname !== 'www.github.com') return undefined;
  const [owner, repo] = url.pathname.split('/').filter((segment) => segment.length > 0);
  if (owner === undefined || repo === undefined) return undefined;
  return toRepository(owner, repo.replace(/\.git$/, ''));
}

function toRepository(owner: string, repo: string): GitHubRepository | undefined {
  if (!NAME_SEGMENT.test(owner) || !NAME_SEGMENT.test(repo)) return undefined;
  return { owner, repo };
}

export function githubArchiveUrl(repository: GitHubRepository, branch: string): string {
  return `https://github.com/${repository.owner}/${repository.repo}/archive/refs/heads/${encodeURIComponent(branch)}.zip`;
}

/** `https://github.com/owner/repo` with nothing after it: a repository page, not a file. */
function isRepositoryPageUrl(value: string): boolean {
  try {
    const url = new URL(value);
    if (url.hostname !== 'github.com' && url.hostname !== 'www.github.com') return false;
    return url.pathname.split('/').filter((segment) => segment.length > 0).length === 2;
  } catch {
    return false;
  }
}

async function exists(target: string): Promise<boolean> {
  try {
    await fs.promises.stat(target);
    return true;
  } catch (error) {
    if (isNotFound(error)) return false;
    throw error;
  }
}

async function fetchToFile(fetchImpl: FetchLike, url: string, destination: string, timeoutMs: number): Promise<number> {
  const controller = new AbortController();
  const timer = setTimeout(() => { controller.abort(); }, timeoutMs);
  try {
    const response = await fetchImpl(url, { signal: controller.signal, redirect: 'follow' });
    if (!response.ok) {
      throw new OperationExecutionError('execution_error', `HTTP ${String(response.status)} downloading ${url}`);
    }
    const body = Buffer.from(await response.arrayBuffer());
    await fs.promises.mkdir(path.dirname(destination), { recursive: true });
    await fs.promises.writeFile(destination, body);
    return body.length;
  } catch (error) {
    if (controller.signal.aborted) {
      throw new OperationExecutionError('timeout', `download of ${url} timed out after ${String(timeoutMs)}ms`);
    }
    throw error;
  } finally {
    clearTimeout(timer);
  }
}

function safeFileName(name: string): string | undefined {
  const base = path.basename(name.trim());
  if (base.length === 0 || base === '.' || base === '..') return undefined;
  return base;
}

function fileNameFromUrl(url: URL): string {
  const last = url.pathname.split('/').filter((segment) => segment.length > 0).pop();
  if (last === undefined) return 'download';
  try {
    return safeFileName(decodeURIComponent(last)) ?? 'download';
  } catch {
    return safeFileName(last) ?? 'download';
  }
}

export class DownloadOperation extends FileSystemOperation {
  readonly name = 'Download';
  readonly description = 'Downloads a file over HTTP(S) into the session; GitHub repository URLs fetch the repository archive';
  override readonly aliases = ['wget', 'curl', 'FileDownload'];
  readonly capabilities = ['network:download', 'http:get', 'file:create'];
  override readonly requiresNetwork: boolean = true;
  readonly inputSchema = {
    type: 'object',
    properties: {
      url: { type: 'string', minLength: 1 },
      targetDirectory: { type: 'string', default: DOWNLOADS_DIRECTORY },
      filename: { type: 'string' },
      overwrite: { type: 'boolean', default: false },
      ...NAVIGATION_SCHEMA_PROPERTIES,
    },
    required: ['url'],
  };

  private readonly fetchImpl: FetchLike;
  private readonly timeoutMs: number;

  constructor(sessions: SessionLookup, deps: DownloadDependencies = {}) {
    super(sessions);
    this.fetchImpl = deps.fetch ?? fetch;
    this.timeoutMs = deps.timeoutMs ?? DEFAULT_DOWNLOAD_TIMEOUT_MS;
  }

  protected async execute(run: FileSystemRun): Promise<OperationOutcome> {
    const params = run.context.parameters;
    const requested = requireStringParam(params, 'url');
    let url: URL;
    try {
      url = new URL(requested);
    } catch {
      return fail(`Invalid URL: ${requested}`, 'invalid_parameters');
    }
    if (url.protocol !== 'http:' && url.protocol !== 'https:') {
      return fail(`Unsupported URL scheme '${url.protocol}': only http and https are allowed`, 'invalid_parameters');
    }

    let source = url.toString();
    let defaultName = fileNameFromUrl(url);
    const repository = isRepositoryPageUrl(requested) ? parseGitHubRepository(requested) : undefined;
    if (repository !== undefined) {
      source = githubArchiveUrl(repository, 'main');
      defaultName = `${repository.repo}-main.zip`;
    }

    const requestedName = stringParam(params, 'filename');
    const fileName = requestedName !== undefined ? safeFileName(requestedName) : defaultName;
    if (fileName === undefined) return fail(`Invalid filename: ${String(requestedName)}`, 'invalid_parameters');
    const directory = run.resolve(stringParam(params, 'targetDirectory') ?? DOWNLOADS_DIRECTORY);
    const destination = run.scope.resolvePath(fileName, directory);
    if (!boolParam(params, 'overwrite', false) && await exists(destination)) {
      return fail(`File already exists: ${run.display(destination)}. Use overwrite=true to replace it`);
    }

    const bytes = await fetchToFile(this.fetchImpl, source, destination, this.timeoutMs);
    const rewritten = source !== url.toString() ? ` (repository archive ${source})` : '';
    return succeed(`Downloaded ${requested}${rewritten} to ${run.display(destination)} (${formatFileSize(bytes)})`);
  }
}

/**
 * Fetches a GitHub repository into `downloads/`. The primary method takes the
 * requested branch (main when none is given) as a zip archive; alternatives
 * try main, then master, then a shallow `git clone`.
 */
export class GitHubDownloaderOperation extends FileSystemOperation {
  readonly name = 'GitHubDownloader';
  readonly description = 'Downloads a GitHub repository archive into the session downloads directory';
  override readonly aliases = ['GitHubDownload', 'GitClone'];
  readonly capabilities = ['github:download', 'repository:clone', 'network:download'];
  override readonly requiresNetwork: boolean = true;
  readonly inputSchema = {
    type: 'object',
    properties: {
      repoUrl: { type: 'string', minLength: 1 },
      branch: { type: 'string' },
      ...NAVIGATION_SCHEMA_PROPERTIES,
    },
    required: ['repoUrl'],
  };

  private readonly fetchImpl: FetchLike;
  private readonly runCommand: (spec: CommandSpec) => Promise<CommandRunResult>;
  private readonly timeoutMs: number;

  constructor(sessions: SessionLookup, deps: DownloadDependencies = {}) {
    super(sessions);
    this.fetchImpl = deps.fetch ?? fetch;
    this.runCommand = deps.runCommand ?? runProcess;
    this.timeoutMs = deps.timeoutMs ?? DEFAULT_DOWNLOAD_TIMEOUT_MS;
  }

  override alternativeMethods(): readonly string[] {
    return ['direct_main', 'direct_master', 'git_clone_fallback'];
  }

  protected execute(run: FileSystemRun): Promise<OperationOutcome> {
    return this.downloadArchive(run, stringParam(run.context.parameters, 'branch') ?? 'main');
  }

  protected override executeAlternative(method: string, run: FileSystemRun): Promise<OperationOutcome> {
    if (method === 'direct_main') return this.downloadArchive(run, 'main');
    if (method === 'direct_master') return this.downloadArchive(run, 'master');
    if (method === 'git_clone_fallback') return this.gitClone(run);
    return super.executeAlternative(method, run);
  }

  private repository(run: FileSystemRun): GitHubRepository {
    const repoUrl = requireStringParam(run.context.parameters, 'repoUrl');
    const repository = parseGitHubRepository(repoUrl);
    if (repository === undefined) {
      throw new OperationExecutionError('invalid_parameters', `invalid_parameters: '${repoUrl}' is not a GitHub repository URL`);
    }
    return repository;
  }

  private async downloadArchive(run: FileSystemRun, branch: string): Promise<OperationOutcome> {
    const repository = this.repository(run);
    const directory = run.resolve(DOWNLOADS_DIRECTORY);
    const destination = run.scope.resolvePath(`${repository.repo}-${branch.replace(/[^A-Za-z0-9._-]/g, '_')}.zip`, directory);
    const bytes = await fetchToFile(this.fetchImpl, githubArchiveUrl(repository, branch), destination, this.timeoutMs);
    return succeed(`Downloaded ${repository.owner}/${repository.repo} (branch ${branch}) to ${run.display(destination)} (${formatFileSize(bytes)})`);
  }

  private async gitClone(run: FileSystemRun): Promise<OperationOutcome> {
    const repository = this.repository(run);
    const destination = run.resolve(`${DOWNLOADS_DIRECTORY}/${repository.repo}`);
    if (await exists(destination)) {
      return fail(`Clone target already exists: ${run.display(destination)}`);
    }
    await fs.promises.mkdir(path.dirname(destination), { recursive: true });
    const branch = stringParam(run.context.parameters, 'branch');
    const args = ['clone', '--depth', '1', ...(branch !== undefined ? ['--branch', branch] : []),
      `https://github.com/${repository.owner}/${repository.repo}.git`, destination];
    const result = await this.runCommand({ file: 'git', args, shell: false, cwd: run.cwd, timeoutMs: GIT_CLONE_TIMEOUT_MS });
    if (result.timedOut) return fail(`git clone timed out after ${String(GIT_CLONE_TIMEOUT_MS / 1000)}s`, 'timeout');
    if (result.exitCode !== 0) {
      return fail(`git clone failed with exit code ${String(result.exitCode)}: ${result.output.trim()}`);
    }
    return succeed(`Cloned ${repository.owner}/${repository.repo} into ${run.display(destination)}`);
  }
}
