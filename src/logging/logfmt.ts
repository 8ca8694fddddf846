import type { StructuredLogEvent } from './structured-log-event.js';

interface FormatOptions {
  color?: boolean;
}

export const ANSI_RESET = '\u001B[0m';
const ANSI_RED = '\u001B[31m';
const ANSI_YELLOW = '\u001B[33m';
const ANSI_CYAN = '\u001B[36m';
const ANSI_GRAY = '\u001B[90m';

export const COLOR_BY_SEVERITY: Record<StructuredLogEvent['severity'], string> = {
  ERR: ANSI_RED,
  WRN: ANSI_YELLOW,
  FIN: ANSI_CYAN,
  VRB: ANSI_GRAY,
  TRC: ANSI_GRAY,
};

function encodeValue(value: string): string {
  if (value === '') return '""';
  const flattened = value.replace(/\n/g, '\\n').replace(/\r/g, '\\r');
  const needsQuotes = /\s|=|"/.test(flattened);
  const escaped = flattened.replace(/"/g, '\\"');
  return needsQuotes ? `"${escaped}"` : escaped;
}

export function formatLogfmt(event: StructuredLogEvent, options: FormatOptions = {}): string {
  const pairs: [string, string][] = [];
  const seen = new Set<string>();
  const push = (key: string, value: string | undefined): void => {
    if (value === undefined || value.length === 0) return;
    if (seen.has(key)) return;
    pairs.push([key, value]);
    seen.add(key);
  };

  push('ts', event.isoTimestamp);
  push('level', event.severity.toLowerCase());
  push('priority', String(event.priority));
  push('type', event.type);
  push('direction', event.direction);
  push('step', String(event.step));
  if (event.attempt !== undefined) push('attempt', String(event.attempt));
  push('session', event.sessionId);
  push('remote', event.remoteIdentifier);
  push('backend', event.backend);
  push('model', event.model);
  push('operation', event.operation);
  if (event.fatal) push('fatal', 'true');

  Object.entries(event.labels).forEach(([key, value]) => {
    push(key, value);
  });

  // Free-form message last for readability
  push('message', event.message);

  let line = pairs.map(([key, value]) => `${key}=${encodeValue(value)}`).join(' ');
  if (options.color === true) {
    line = `${COLOR_BY_SEVERITY[event.severity]}${line}${ANSI_RESET}`;
  }
  return line;
}
