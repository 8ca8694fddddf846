import type { LogEntry } from '../types.js';

export interface StructuredLogEvent {
  timestamp: number;
  isoTimestamp: string;
  severity: LogEntry['severity'];
  priority: number;
  message: string;
  type: LogEntry['type'];
  direction: LogEntry['direction'];
  step: number;
  attempt?: number;
  sessionId?: string;
  remoteIdentifier?: string;
  backend?: string;
  model?: string;
  operation?: string;
  fatal: boolean;
  labels: Record<string, string>;
  stack?: string;
}

// syslog priorities
const PRIORITY_BY_SEVERITY: Record<LogEntry['severity'], number> = {
  ERR: 3,
  WRN: 4,
  FIN: 5,
  VRB: 6,
  TRC: 7,
};

const RESERVED_LABEL_KEYS = new Set([
  'severity',
  'type',
  'direction',
  'step',
  'attempt',
  'session',
  'remote',
  'backend',
  'model',
  'operation',
]);

export interface BuildStructuredEventOptions {
  labels?: Record<string, string>;
}

export function buildStructuredLogEvent(
  entry: LogEntry,
  options: BuildStructuredEventOptions = {}
): StructuredLogEvent {
  const labels: Record<string, string> = {};
  Object.entries(options.labels ?? {}).forEach(([key, value]) => {
    if (value.length > 0 && !RESERVED_LABEL_KEYS.has(key)) labels[key] = value;
  });
  if (entry.details !== undefined) {
    Object.entries(entry.details).forEach(([key, value]) => {
      if (RESERVED_LABEL_KEYS.has(key) || Object.prototype.hasOwnProperty.call(labels, key)) return;
      if (typeof value === 'string') {
        if (value.length > 0) labels[key] = value;
        return;
      }
      if (typeof value === 'number') {
        if (Number.isFinite(value)) labels[key] = String(value);
        return;
      }
      labels[key] = value ? 'true' : 'false';
    });
  }

  const parsed = parseRemoteIdentifier(entry.remoteIdentifier, entry.type);
  return {
    timestamp: entry.timestamp,
    isoTimestamp: new Date(entry.timestamp).toISOString(),
    severity: entry.severity,
    priority: PRIORITY_BY_SEVERITY[entry.severity],
    message: entry.message,
    type: entry.type,
    direction: entry.direction,
    step: entry.step,
    attempt: entry.attempt,
    sessionId: entry.sessionId,
    remoteIdentifier: entry.remoteIdentifier.length > 0 ? entry.remoteIdentifier : undefined,
    backend: parsed.backend,
    model: parsed.model,
    operation: parsed.operation,
    fatal: entry.fatal,
    labels,
    stack: entry.stack,
  };
}

/** `ollama:llama3` for backends, `operation:FileRead` for operations. */
export function parseRemoteIdentifier(
  identifier: string,
  type: LogEntry['type'],
): { backend?: string; model?: string; operation?: string } {
  if (identifier.length === 0) return {};
  const idx = identifier.indexOf(':');
  if (type === 'backend') {
    if (idx === -1) return { backend: identifier };
    return { backend: identifier.slice(0, idx), model: identifier.slice(idx + 1) };
  }
  if (type === 'operation' && idx !== -1 && identifier.slice(0, idx) === 'operation') {
    return { operation: identifier.slice(idx + 1) };
  }
  return {};
}
