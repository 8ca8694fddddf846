import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';

import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import type { Backend } from '../../backends/types.js';

import { AiSdkBackend } from '../../backends/ai-sdk-backend.js';
import { ScriptedBackend } from '../../backends/scripted-backend.js';
import { parseConfiguration } from '../../config.js';
import { journalDirectory } from '../../config-resolver.js';
import { AgentRuntime, createBackend } from '../../runtime.js';
import { SessionJournal } from '../../session/session-journal.js';

let cacheRoot: string;

beforeEach(() => {
  cacheRoot = fs.mkdtempSync(path.join(os.tmpdir(), 'runtime-spec-'));
});

afterEach(() => {
  fs.rmSync(cacheRoot, { recursive: true, force: true });
});

const DONE = {
  taskCompleted: true,
  reasoning: 'Nothing has to be created for a simple greeting like this one',
  nextStep: null,
  response: 'Hello there',
  confidence: 0.9,
};

describe('createBackend', () => {
  it('needs a script for the scripted backend', () => {
    const config = parseConfiguration({ backend: { type: 'scripted' } }, 'test');
    expect(() => createBackend(config.backend)).toThrow("backend type 'scripted' needs a script file (backend.script or --script)");
  });

  it('builds a scripted backend from a file', () => {
    const script = path.join(cacheRoot, 'script.json');
    fs.writeFileSync(script, JSON.stringify([DONE]));
    const backend = createBackend(parseConfiguration({ backend: { type: 'scripted', script } }, 'test').backend);
    expect(backend).toBeInstanceOf(ScriptedBackend);
  });

  it('names network backends after type and model', () => {
    const backend = createBackend(parseConfiguration({ backend: { type: 'ollama', model: 'qwen' } }, 'test').backend);
    expect(backend).toBeInstanceOf(AiSdkBackend);
    expect(backend.name).toBe('ollama:qwen');
  });
});

describe('AgentRuntime', () => {
  it('runs a conversation inside a session under the cache root and journals it', async () => {
    const config = parseConfiguration({ cacheRoot }, 'test');
    const runtime = new AgentRuntime(config, { backend: new ScriptedBackend([DONE]) });
    const result = await runtime.run('say hello', { sessionId: 'greeting' });
    expect(result.completed).toBe(true);
    expect(result.response).toBe('Hello there');
    expect(result.iterations).toBe(1);
    expect(fs.statSync(path.join(cacheRoot, 'greeting')).isDirectory()).toBe(true);
    const records = await new SessionJournal({ dir: journalDirectory(config), sessionId: 'greeting' }).read();
    expect(records.map((record) => record.kind)).toEqual(['prompt', 'response', 'decision', 'completion']);
  });

  it('flushes the journal of a conversation that is still running', async () => {
    const config = parseConfiguration({ cacheRoot }, 'test');
    let kindsDuringRun: string[] = [];
    const inspecting: Backend = {
      name: 'inspecting',
      send: async () => {
        await runtime.flushJournals();
        const records = await new SessionJournal({ dir: journalDirectory(config), sessionId: 'live' }).read();
        kindsDuringRun = records.map((record) => record.kind);
        return JSON.stringify(DONE);
      },
    };
    const runtime = new AgentRuntime(config, { backend: inspecting });
    await runtime.run('say hello', { sessionId: 'live' });
    expect(kindsDuringRun).toEqual(['prompt']);
    await expect(runtime.flushJournals()).resolves.toBeUndefined();
  });

  it('leaves network operations out when offline', () => {
    const online = new AgentRuntime(parseConfiguration({ cacheRoot }, 'test'), { backend: new ScriptedBackend([]) });
    const offline = new AgentRuntime(parseConfiguration({ cacheRoot, offline: true }, 'test'), { backend: new ScriptedBackend([]) });
    expect(online.registry.resolve('GitHubDownloader')).toBeDefined();
    expect(offline.registry.resolve('GitHubDownloader')).toBeUndefined();
  });

  it('skips the journal when it is disabled', async () => {
    const config = parseConfiguration({ cacheRoot, journal: { enabled: false } }, 'test');
    await new AgentRuntime(config, { backend: new ScriptedBackend([DONE]) }).run('say hello', { sessionId: 'quiet' });
    expect(fs.existsSync(journalDirectory(config))).toBe(false);
  });
});
