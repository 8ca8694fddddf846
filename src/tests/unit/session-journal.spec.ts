import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';

import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { SessionJournal } from '../../session/session-journal.js';

let dir: string;

beforeEach(() => {
  dir = fs.mkdtempSync(path.join(os.tmpdir(), 'journal-spec-'));
});

afterEach(() => {
  fs.rmSync(dir, { recursive: true, force: true });
});

const fixedNow = (): Date => new Date('2026-01-02T03:04:05.000Z');

describe('SessionJournal', () => {
  it('appends JSON lines in call order', async () => {
    const journal = new SessionJournal({ dir: path.join(dir, 'nested'), sessionId: 's1', now: fixedNow });
    void journal.append(1, 'prompt', { text: 'hi' });
    void journal.append(1, 'response', 'raw');
    await journal.append(2, 'completion', { iterations: 2 });
    expect(journal.filePath).toBe(path.join(dir, 'nested', 's1.jsonl'));
    expect(fs.readFileSync(journal.filePath, 'utf8').split('\n')[0])
      .toBe('{"ts":"2026-01-02T03:04:05.000Z","step":1,"kind":"prompt","data":{"text":"hi"}}');
    expect(await journal.read()).toEqual([
      { ts: '2026-01-02T03:04:05.000Z', step: 1, kind: 'prompt', data: { text: 'hi' } },
      { ts: '2026-01-02T03:04:05.000Z', step: 1, kind: 'response', data: 'raw' },
      { ts: '2026-01-02T03:04:05.000Z', step: 2, kind: 'completion', data: { iterations: 2 } },
    ]);
  });

  it('reads a missing journal as empty and removes the file', async () => {
    const journal = new SessionJournal({ dir, sessionId: 's2', now: fixedNow });
    expect(await journal.read()).toEqual([]);
    await journal.append(1, 'abort', { reason: 'cancelled' });
    expect(fs.existsSync(journal.filePath)).toBe(true);
    await journal.remove();
    expect(fs.existsSync(journal.filePath)).toBe(false);
  });

  it('rejects a line with an unknown kind', async () => {
    const journal = new SessionJournal({ dir, sessionId: 's3' });
    fs.writeFileSync(journal.filePath, '{"ts":"x","step":1,"kind":"gossip","data":null}\n');
    await expect(journal.read()).rejects.toThrow('journal line is missing ts, step or kind');
  });
});
