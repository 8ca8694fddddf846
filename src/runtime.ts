import type { Backend } from './backends/types.js';
import type { BackendConfig, Configuration } from './config.js';
import type { DownloadDependencies } from './operations/builtin/repository-download.js';
import type { OperationRegistry } from './operations/registry.js';
import type { LogCallback } from './types.js';

import { AiSdkBackend } from './backends/ai-sdk-backend.js';
import { ScriptedBackend } from './backends/scripted-backend.js';
import { journalDirectory } from './config-resolver.js';
import { ConversationLoop, type ConversationResult } from './conversation/conversation-loop.js';
import { createDefaultRegistry } from './operations/builtin/index.js';
import { SessionJournal } from './session/session-journal.js';
import { generateSessionId, SessionStore } from './session/session-store.js';

export function createBackend(config: BackendConfig, onLog?: LogCallback): Backend {
  switch (config.type) {
    case 'scripted':
      if (config.script === undefined) {
        throw new Error("backend type 'scripted' needs a script file (backend.script or --script)");
      }
      return ScriptedBackend.fromFile(config.script);
    case 'ollama':
    case 'openai-compatible':
      return new AiSdkBackend({
        type: config.type,
        model: config.model,
        baseUrl: config.baseUrl,
        apiKey: config.apiKey,
        headers: config.headers,
        timeoutMs: config.timeoutMs,
        temperature: config.temperature,
        onLog,
      });
  }
}

export interface RuntimeOptions {
  onLog?: LogCallback;
  /** Used instead of the configured backend. */
  backend?: Backend;
  download?: DownloadDependencies;
}

export interface RunQueryOptions {
  sessionId?: string;
  signal?: AbortSignal;
}

/**
 * Everything one process needs: the session store, the frozen operation
 * registry and the backend. Conversations share these; each gets its own
 * scope and journal.
 */
export class AgentRuntime {
  readonly sessions: SessionStore;
  readonly registry: OperationRegistry;
  readonly backend: Backend;
  private readonly openJournals = new Set<SessionJournal>();

  constructor(readonly config: Configuration, private readonly options: RuntimeOptions = {}) {
    this.sessions = new SessionStore({ cacheRoot: config.cacheRoot, onLog: options.onLog });
    const lookup = (sessionId: string) => this.sessions.get(sessionId);
    this.registry = createDefaultRegistry(lookup, { offline: config.offline, download: options.download });
    this.backend = options.backend ?? createBackend(config.backend, options.onLog);
  }

  async run(query: string, opts: RunQueryOptions = {}): Promise<ConversationResult> {
    const sessionId = opts.sessionId ?? generateSessionId();
    const journal = this.config.journal.enabled
      ? new SessionJournal({ dir: journalDirectory(this.config), sessionId })
      : undefined;
    const loop = new ConversationLoop({
      backend: this.backend,
      registry: this.registry,
      sessions: this.sessions,
      journal,
      onLog: this.options.onLog,
      settings: {
        maxIterations: this.config.maxIterations,
        maxRetries: this.config.maxRetries,
        baseDelayMs: this.config.baseDelayMs,
        minCompletionConfidence: this.config.minCompletionConfidence,
        minReasoningLength: this.config.minReasoningLength,
        operationTimeoutMs: this.config.operationTimeoutMs,
      },
    });
    if (journal !== undefined) this.openJournals.add(journal);
    try {
      return await loop.run(query, { sessionId, signal: opts.signal });
    } finally {
      if (journal !== undefined) {
        this.openJournals.delete(journal);
        await journal.flush();
      }
    }
  }

  /** Waits for the queued appends of every conversation still running. */
  async flushJournals(): Promise<void> {
    await Promise.all([...this.openJournals].map((journal) => journal.flush()));
  }
}
