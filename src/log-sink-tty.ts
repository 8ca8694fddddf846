import type { LogCallback, LogEntry } from './types.js';

import { createStructuredLogger, type LogFormat } from './logging/structured-logger.js';

export interface TTYLogOptions {
  color?: boolean;
  verbose?: boolean;
  traceBackend?: boolean;
  format?: LogFormat;
  labels?: Record<string, string>;
}

/** Severity filter applied before anything reaches stderr. */
export function shouldEmit(entry: LogEntry, opts: Pick<TTYLogOptions, 'verbose' | 'traceBackend'>): boolean {
  if (entry.severity === 'VRB') return opts.verbose === true;
  if (entry.severity === 'TRC') return opts.traceBackend === true && entry.type === 'backend';
  return true;
}

export function makeTTYLogCallback(opts: TTYLogOptions, write?: (s: string) => void): LogCallback {
  const writer = typeof write === 'function'
    ? write
    : (s: string) => {
        try {
          process.stderr.write(s);
        } catch {
          // stderr closed
        }
      };

  // Interactive console gets the compact format unless one was asked for
  const format: LogFormat = opts.format ?? (process.stderr.isTTY ? 'console' : 'logfmt');

  const logger = createStructuredLogger({
    format,
    color: opts.color ?? (process.stderr.isTTY && format !== 'json'),
    writer,
    labels: opts.labels,
  });

  return (entry: LogEntry) => {
    if (!shouldEmit(entry, opts)) return;
    logger.emit(entry);
  };
}
