import type { LogEntry } from '../types.js';

import { formatConsole } from './console-format.js';
import { formatLogfmt } from './logfmt.js';
import { buildStructuredLogEvent, type StructuredLogEvent } from './structured-log-event.js';

export type LogFormat = 'logfmt' | 'json' | 'console';

export const LOG_FORMATS: readonly LogFormat[] = ['logfmt', 'json', 'console'];

export interface StructuredLoggerOptions {
  format?: LogFormat;
  labels?: Record<string, string>;
  color?: boolean;
  writer?: (line: string) => void;
}

export class StructuredLogger {
  readonly format: LogFormat;
  private readonly labels: Record<string, string>;
  private readonly color: boolean;
  private readonly writer: (line: string) => void;

  constructor(options: StructuredLoggerOptions = {}) {
    this.format = options.format ?? 'logfmt';
    this.labels = options.labels ?? {};
    this.color = options.color ?? false;
    this.writer = options.writer ?? defaultWriter;
  }

  emit(entry: LogEntry): void {
    const event = buildStructuredLogEvent(entry, { labels: this.labels });
    this.writer(`${this.render(event)}\n`);
  }

  private render(event: StructuredLogEvent): string {
    switch (this.format) {
      case 'json':
        return JSON.stringify(buildJsonPayload(event));
      case 'console':
        return formatConsole(event, { color: this.color });
      case 'logfmt':
        return formatLogfmt(event, { color: this.color });
    }
  }
}

export function createStructuredLogger(options: StructuredLoggerOptions): StructuredLogger {
  return new StructuredLogger(options);
}

export function isLogFormat(value: string): value is LogFormat {
  return LOG_FORMATS.some((format) => format === value);
}

function defaultWriter(line: string): void {
  try {
    process.stderr.write(line);
  } catch {
    // stderr gone; nothing left to report to
  }
}

function buildJsonPayload(event: StructuredLogEvent): Record<string, unknown> {
  const entries: [string, unknown][] = [];
  const push = (key: string, value: unknown): void => {
    if (value === undefined) return;
    entries.push([key, value]);
  };

  push('ts', event.isoTimestamp);
  push('timestamp', event.timestamp);
  push('severity', event.severity);
  push('level', event.severity.toLowerCase());
  push('priority', event.priority);
  push('type', event.type);
  push('direction', event.direction);
  push('step', event.step);
  push('attempt', event.attempt);
  push('session', event.sessionId);
  push('remote', event.remoteIdentifier);
  push('backend', event.backend);
  push('model', event.model);
  push('operation', event.operation);
  push('fatal', event.fatal);
  if (Object.keys(event.labels).length > 0) push('labels', event.labels);
  push('stack', event.stack);

  entries.push(['message', event.message]);

  return Object.fromEntries(entries);
}
