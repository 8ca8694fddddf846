import fs from 'node:fs';
import path from 'node:path';

import { isPlainObject, warn } from '../utils.js';

export type JournalRecordKind = 'prompt' | 'response' | 'decision' | 'operation' | 'completion' | 'abort';

export interface JournalRecord {
  ts: string;
  step: number;
  kind: JournalRecordKind;
  data: unknown;
}

export interface SessionJournalOptions {
  dir: string;
  sessionId: string;
  now?: () => Date;
}

/**
 * Append-only JSONL audit trail for one session. Lives outside the session
 * root so operations cannot rewrite it. Write failures are reported through
 * warn() and never reach the conversation.
 */
export class SessionJournal {
  readonly filePath: string;
  private readonly now: () => Date;
  private pending: Promise<void> = Promise.resolve();

  constructor(options: SessionJournalOptions) {
    this.filePath = path.join(path.resolve(options.dir), `${options.sessionId}.jsonl`);
    this.now = options.now ?? (() => new Date());
  }

  /** Queues one record; appends keep their call order. */
  append(step: number, kind: JournalRecordKind, data: unknown): Promise<void> {
    const record: JournalRecord = { ts: this.now().toISOString(), step, kind, data };
    this.pending = this.pending.then(async () => {
      try {
        await fs.promises.mkdir(path.dirname(this.filePath), { recursive: true });
        await fs.promises.appendFile(this.filePath, `${JSON.stringify(record)}\n`, 'utf8');
      } catch (error: unknown) {
        const message = error instanceof Error ? error.message : String(error);
        warn(`session journal append failed: ${message}`);
      }
    });
    return this.pending;
  }

  async flush(): Promise<void> {
    await this.pending;
  }

  async read(): Promise<JournalRecord[]> {
    await this.flush();
    let raw: string;
    try {
      raw = await fs.promises.readFile(this.filePath, 'utf8');
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') return [];
      throw error;
    }
    return raw
      .split('\n')
      .filter((line) => line.trim().length > 0)
      .map((line): JournalRecord => {
        const parsed: unknown = JSON.parse(line);
        return toJournalRecord(parsed);
      });
  }

  async remove(): Promise<void> {
    await this.flush();
    await fs.promises.rm(this.filePath, { force: true });
  }
}

const RECORD_KINDS: readonly JournalRecordKind[] = ['prompt', 'response', 'decision', 'operation', 'completion', 'abort'];

function toJournalRecord(value: unknown): JournalRecord {
  if (!isPlainObject(value)) {
    throw new Error('journal line is not an object');
  }
  const { ts, step, kind, data } = value;
  const matchedKind = RECORD_KINDS.find((candidate) => candidate === kind);
  if (typeof ts !== 'string' || typeof step !== 'number' || matchedKind === undefined) {
    throw new Error('journal line is missing ts, step or kind');
  }
  return { ts, step, kind: matchedKind, data };
}
