#!/usr/bin/env node
import fs from 'node:fs';
import path from 'node:path';
import { fileURLToPath } from 'node:url';

import { Command, InvalidArgumentError, Option } from 'commander';

import type { Configuration } from './config.js';
import type { ConversationOutcome, ConversationResult } from './conversation/conversation-loop.js';
import type { LogFormat } from './logging/structured-logger.js';
import type { CommanderError } from 'commander';

import { journalDirectory, resolveConfiguration } from './config-resolver.js';
import { makeTTYLogCallback } from './log-sink-tty.js';
import { LOG_FORMATS } from './logging/structured-logger.js';
import { createDefaultRegistry } from './operations/builtin/index.js';
import { AgentRuntime } from './runtime.js';
import { SessionJournal } from './session/session-journal.js';
import { generateSessionId, SessionStore } from './session/session-store.js';
import { ShutdownController } from './shutdown-controller.js';
import { setWarningSink } from './utils.js';

const EXIT_CODES: Record<ConversationOutcome | 'error', number> = {
  completed: 0,
  aborted: 2,
  cancelled: 130,
  error: 1,
};

// Single exit path, so every exit carries a reason on stderr
let hasExited = false;
function exitWith(code: number, reason?: string): never {
  if (reason !== undefined) {
    try { process.stderr.write(`${reason}\n`); } catch { /* stderr closed */ }
  }
  if (!hasExited) {
    hasExited = true;
    process.exit(code);
  }
  throw new Error('unreachable');
}

function readVersion(): string {
  // src/ and dist/ both sit one level below package.json
  const pkgPath = path.join(path.dirname(fileURLToPath(import.meta.url)), '..', 'package.json');
  try {
    const parsed: unknown = JSON.parse(fs.readFileSync(pkgPath, 'utf-8'));
    if (parsed !== null && typeof parsed === 'object' && 'version' in parsed && typeof parsed.version === 'string') {
      return parsed.version;
    }
  } catch { /* fall through */ }
  return '0.0.0';
}

const defaultWarningSink = (message: string): void => {
  const prefix = '[warn] ';
  const colored = process.stderr.isTTY ? `\x1b[33m${prefix}${message}\x1b[0m` : `${prefix}${message}`;
  try { process.stderr.write(`${colored}\n`); } catch { /* stderr closed */ }
};

setWarningSink(defaultWarningSink);

function parseInteger(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 0) {
    throw new InvalidArgumentError('expected a non-negative integer');
  }
  return parsed;
}

interface ConfigFlags {
  config?: string;
}

interface RunFlags extends ConfigFlags {
  session?: string;
  model?: string;
  backend?: Configuration['backend']['type'];
  baseUrl?: string;
  maxIterations?: number;
  maxRetries?: number;
  script?: string;
  format?: LogFormat;
  verbose?: boolean;
  traceBackend?: boolean;
  journal: boolean;
  offline?: boolean;
  cleanup?: boolean;
}

interface CleanupFlags extends ConfigFlags {
  keepJournal?: boolean;
}

/** CLI flags as a partial configuration; unset flags stay undefined. */
function flagsToOverrides(flags: RunFlags): Record<string, unknown> {
  const backendType = flags.backend ?? (flags.script !== undefined ? 'scripted' : undefined);
  return {
    maxIterations: flags.maxIterations,
    maxRetries: flags.maxRetries,
    offline: flags.offline === true ? true : undefined,
    backend: {
      type: backendType,
      model: flags.model,
      baseUrl: flags.baseUrl,
      script: flags.script !== undefined ? path.resolve(flags.script) : undefined,
    },
    journal: { enabled: flags.journal ? undefined : false },
    log: {
      format: flags.format,
      verbose: flags.verbose === true ? true : undefined,
      traceBackend: flags.traceBackend === true ? true : undefined,
    },
  };
}

async function runCommand(queryParts: string[], flags: RunFlags): Promise<void> {
  const { config } = resolveConfiguration({ configPath: flags.config, overrides: flagsToOverrides(flags) });
  const onLog = makeTTYLogCallback({
    format: config.log.format,
    verbose: config.log.verbose,
    traceBackend: config.log.traceBackend,
  });
  const shutdown = new ShutdownController();
  const runtime = new AgentRuntime(config, { onLog });
  const sessionId = flags.session ?? generateSessionId();

  const signals: NodeJS.Signals[] = ['SIGINT', 'SIGTERM'];
  const handlers = new Map<NodeJS.Signals, () => void>();
  signals.forEach((sig) => {
    const handler = (): void => {
      defaultWarningSink(`received ${sig}, stopping`);
      shutdown.shutdown(onLog).catch((error: unknown) => {
        defaultWarningSink(`shutdown failed: ${error instanceof Error ? error.message : String(error)}`);
      });
    };
    handlers.set(sig, handler);
    process.once(sig, handler);
  });
  // Tasks run newest first: journals, then the session, then the handlers
  shutdown.register('signal handlers', () => {
    handlers.forEach((handler, sig) => {
      process.removeListener(sig, handler);
    });
  });
  if (flags.cleanup === true) {
    shutdown.register('session cleanup', () => runtime.sessions.cleanup(sessionId));
  }
  shutdown.register('journal flush', () => runtime.flushJournals());

  let result: ConversationResult;
  try {
    result = await runtime.run(queryParts.join(' '), { sessionId, signal: shutdown.signal });
  } finally {
    await shutdown.shutdown(onLog);
  }
  process.stdout.write(`${result.response}\n`);
  exitWith(EXIT_CODES[result.state], `session ${result.sessionId}: ${result.state} after ${String(result.iterations)} round trips`);
}

function operationsCommand(flags: ConfigFlags & { offline?: boolean }): void {
  const { config } = resolveConfiguration({
    configPath: flags.config,
    overrides: { offline: flags.offline === true ? true : undefined },
  });
  const sessions = new SessionStore({ cacheRoot: config.cacheRoot });
  const registry = createDefaultRegistry((id) => sessions.get(id), { offline: config.offline });
  process.stdout.write(`${registry.describe()}\n`);
}

async function sessionsCommand(flags: ConfigFlags): Promise<void> {
  const { config } = resolveConfiguration({ configPath: flags.config });
  const ids = await new SessionStore({ cacheRoot: config.cacheRoot }).list();
  if (ids.length === 0) {
    process.stderr.write(`no sessions under ${config.cacheRoot}\n`);
    return;
  }
  process.stdout.write(`${ids.join('\n')}\n`);
}

async function cleanupCommand(ids: string[], flags: CleanupFlags): Promise<void> {
  const { config } = resolveConfiguration({ configPath: flags.config });
  const store = new SessionStore({ cacheRoot: config.cacheRoot });
  for (const id of ids) {
    await store.cleanup(id);
    if (flags.keepJournal !== true) {
      await new SessionJournal({ dir: journalDirectory(config), sessionId: id }).remove();
    }
    process.stdout.write(`removed ${id}\n`);
  }
}

const program = new Command();

program
  .name('sandboxed-agent')
  .description('Run a backend-driven agent inside a per-session sandbox directory')
  .version(readVersion());

program.exitOverride((err: CommanderError) => {
  // --help and --version also come through here, with exit code 0
  exitWith(err.exitCode);
});

program
  .command('run')
  .description('Run one conversation and print the final response')
  .argument('<query...>', 'what to ask the agent')
  .option('--session <id>', 'session id (default: generated)')
  .option('--config <file>', 'configuration file (YAML or JSON)')
  .option('--model <name>', 'backend model')
  .addOption(new Option('--backend <type>', 'backend type').choices(['ollama', 'openai-compatible', 'scripted']))
  .option('--base-url <url>', 'backend base URL')
  .option('--max-iterations <n>', 'backend round trips before giving up', parseInteger)
  .option('--max-retries <n>', 'retries per operation and per backend request', parseInteger)
  .option('--script <file>', 'replay responses from a YAML or JSON file (implies --backend scripted)')
  .addOption(new Option('--format <format>', 'log format on stderr').choices(LOG_FORMATS))
  .option('--verbose', 'log every step')
  .option('--trace-backend', 'log backend requests and responses')
  .option('--no-journal', 'do not write the session journal')
  .option('--offline', 'leave out operations that need the network')
  .option('--cleanup', 'remove the session directory when the run ends')
  .action(async (query: string[], flags: RunFlags) => {
    await runCommand(query, flags);
  });

program
  .command('operations')
  .description('List the available operations')
  .option('--config <file>', 'configuration file (YAML or JSON)')
  .option('--offline', 'leave out operations that need the network')
  .action((flags: ConfigFlags & { offline?: boolean }) => {
    operationsCommand(flags);
  });

program
  .command('sessions')
  .description('List session directories under the cache root')
  .option('--config <file>', 'configuration file (YAML or JSON)')
  .action(async (flags: ConfigFlags) => {
    await sessionsCommand(flags);
  });

program
  .command('cleanup')
  .description('Remove session directories and their journals')
  .argument('<sessionId...>', 'sessions to remove')
  .option('--config <file>', 'configuration file (YAML or JSON)')
  .option('--keep-journal', 'keep the journal files')
  .action(async (ids: string[], flags: CleanupFlags) => {
    await cleanupCommand(ids, flags);
  });

program.parseAsync(process.argv).then(
  () => { exitWith(0); },
  (error: unknown) => {
    const message = error instanceof Error ? error.message : String(error);
    exitWith(EXIT_CODES.error, `error: ${message}`);
  },
);
