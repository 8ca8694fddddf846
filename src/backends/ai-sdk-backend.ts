import { createOpenAICompatible } from '@ai-sdk/openai-compatible';
import { generateText } from 'ai';
import { createOllama } from 'ollama-ai-provider-v2';

import type { ConversationMessage, LogCallback } from '../types.js';
import type { Backend } from './types.js';
import type { LanguageModel, ModelMessage } from 'ai';

import { BackendError, CancelledError } from '../errors.js';
import { toErrorMessage } from '../operations/operation-errors.js';

export const DEFAULT_OLLAMA_BASE_URL = 'http://localhost:11434/api';
export const DEFAULT_OPENAI_COMPATIBLE_BASE_URL = 'http://localhost:1234/v1';
const DEFAULT_TIMEOUT_MS = 120_000;

export interface AiSdkBackendOptions {
  type: 'ollama' | 'openai-compatible';
  model: string;
  baseUrl?: string;
  apiKey?: string;
  headers?: Record<string, string>;
  timeoutMs?: number;
  temperature?: number;
  onLog?: LogCallback;
  /** Used instead of the provider-built model (tests, custom providers). */
  languageModel?: LanguageModel;
}

/** Ollama serves the ai-sdk protocol under /api; a /v1 suffix is rewritten. */
export function normalizeOllamaBaseUrl(url?: string): string {
  if (url === undefined || url.trim().length === 0) return DEFAULT_OLLAMA_BASE_URL;
  const v = url.trim().replace(/\/+$/, '');
  if (/\/v1$/.test(v)) return v.replace(/\/v1$/, '/api');
  if (/\/api$/.test(v)) return v;
  return `${v}/api`;
}

export function toModelMessages(history: readonly ConversationMessage[], prompt: string): ModelMessage[] {
  const messages = history.map((message): ModelMessage => {
    switch (message.role) {
      case 'system':
        return { role: 'system', content: message.content };
      case 'assistant':
        return { role: 'assistant', content: message.content };
      case 'user':
        return { role: 'user', content: message.content };
    }
  });
  messages.push({ role: 'user', content: prompt });
  return messages;
}

function buildModel(options: AiSdkBackendOptions): LanguageModel {
  if (options.languageModel !== undefined) return options.languageModel;
  if (options.type === 'ollama') {
    const prov = createOllama({ baseURL: normalizeOllamaBaseUrl(options.baseUrl), headers: options.headers });
    return prov(options.model);
  }
  const prov = createOpenAICompatible({
    name: 'openai-compatible',
    baseURL: options.baseUrl ?? DEFAULT_OPENAI_COMPATIBLE_BASE_URL,
    apiKey: options.apiKey,
    headers: options.headers,
  });
  return prov.chatModel(options.model);
}

/** Backend over the `ai` package: Ollama or any OpenAI-compatible server (LM Studio, vLLM, ...). */
export class AiSdkBackend implements Backend {
  readonly name: string;
  private readonly model: LanguageModel;
  private readonly timeoutMs: number;
  private readonly temperature?: number;
  private readonly onLog?: LogCallback;

  constructor(private readonly options: AiSdkBackendOptions) {
    this.name = `${options.type}:${options.model}`;
    this.model = buildModel(options);
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.temperature = options.temperature;
    this.onLog = options.onLog;
  }

  async send(prompt: string, history: readonly ConversationMessage[], signal?: AbortSignal): Promise<string> {
    if (signal?.aborted === true) throw new CancelledError('backend request cancelled', 'signal');
    // Combine the caller's abort signal with the request timeout
    const controller = new AbortController();
    let timedOut = false;
    const timer = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, this.timeoutMs);
    const onAbort = (): void => { controller.abort(); };
    signal?.addEventListener('abort', onAbort, { once: true });

    const messages = toModelMessages(history, prompt);
    const startedAt = Date.now();
    this.trace('request', `sending ${String(messages.length)} messages`, { chars: prompt.length });
    try {
      const result = await generateText({
        model: this.model,
        messages,
        ...(this.temperature !== undefined ? { temperature: this.temperature } : {}),
        abortSignal: controller.signal,
      });
      this.trace('response', `received ${String(result.text.length)} chars`, { latencyMs: Date.now() - startedAt });
      return result.text;
    } catch (error) {
      if (signal?.aborted) throw new CancelledError('backend request cancelled', 'signal');
      if (timedOut) throw new BackendError(this.name, `request timed out after ${String(this.timeoutMs)}ms`, { cause: error });
      throw new BackendError(this.name, toErrorMessage(error), { cause: error });
    } finally {
      clearTimeout(timer);
      signal?.removeEventListener('abort', onAbort);
    }
  }

  private trace(direction: 'request' | 'response', message: string, details: Record<string, number>): void {
    this.onLog?.({
      timestamp: Date.now(),
      severity: 'TRC',
      step: 0,
      direction,
      type: 'backend',
      remoteIdentifier: `${this.options.type}:${this.options.model}`,
      fatal: false,
      message,
      details,
    });
  }
}
