import os from 'node:os';
import path from 'node:path';

import { z } from 'zod';

import { warn } from './utils.js';

export function defaultCacheRoot(home: string = os.homedir()): string {
  return path.join(home, '.cache', 'sandboxed-agent', 'sessions');
}

const BackendConfigSchema = z.object({
  type: z.enum(['ollama', 'openai-compatible', 'scripted']).default('ollama'),
  model: z.string().min(1).default('llama3.1'),
  baseUrl: z.string().optional(),
  apiKey: z.string().optional(),
  headers: z.record(z.string(), z.string()).optional(),
  script: z.string().optional(),
  timeoutMs: z.number().int().positive().default(120_000),
  temperature: z.number().min(0).max(2).optional(),
});

const JournalConfigSchema = z.object({
  enabled: z.boolean().default(true),
  dir: z.string().optional(),
});

const LogConfigSchema = z.object({
  format: z.enum(['logfmt', 'json', 'console']).optional(),
  verbose: z.boolean().default(false),
  traceBackend: z.boolean().default(false),
});

export const ConfigurationSchema = z.object({
  cacheRoot: z.string().min(1).default(() => defaultCacheRoot()),
  maxRetries: z.number().int().min(0).max(10).default(3),
  baseDelayMs: z.number().int().min(0).default(1000),
  maxIterations: z.number().int().positive().default(10),
  minCompletionConfidence: z.number().min(0).max(1).default(0.8),
  minReasoningLength: z.number().int().min(0).default(30),
  operationTimeoutMs: z.number().int().positive().optional(),
  /** Leaves the network operations out of the registry. */
  offline: z.boolean().default(false),
  backend: BackendConfigSchema.prefault({}),
  journal: JournalConfigSchema.prefault({}),
  log: LogConfigSchema.prefault({}),
});

export type Configuration = z.infer<typeof ConfigurationSchema>;
export type BackendConfig = Configuration['backend'];

function expandEnv(str: string, env: NodeJS.ProcessEnv, origin: string): string {
  return str.replace(/\$\{([^}]+)\}/g, (_m: string, name: string) => {
    const value = env[name];
    if (value === undefined) {
      warn(`${origin}: environment variable '${name}' is not set; using an empty string`);
      return '';
    }
    return value;
  });
}

/** Expands `${VAR}` in every string value, keys untouched. */
export function expandDeep(obj: unknown, env: NodeJS.ProcessEnv, origin: string): unknown {
  if (typeof obj === 'string') return expandEnv(obj, env, origin);
  if (Array.isArray(obj)) return obj.map((v) => expandDeep(v, env, origin));
  if (obj !== null && typeof obj === 'object') {
    return Object.entries(obj).reduce<Record<string, unknown>>((acc, [k, v]) => {
      acc[k] = expandDeep(v, env, origin);
      return acc;
    }, {});
  }
  return obj;
}

export function parseConfiguration(raw: unknown, origin: string): Configuration {
  const parsed = ConfigurationSchema.safeParse(raw);
  if (!parsed.success) {
    const msgs = parsed.error.issues
      .map((issue) => `  ${issue.path.map((p) => String(p)).join('.')}: ${issue.message}`)
      .join('\n');
    throw new Error(`Configuration validation failed in ${origin}:\n${msgs}`);
  }
  return parsed.data;
}
