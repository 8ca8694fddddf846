import type { OperationErrorKind } from './operations/operation-errors.js';

// Logging

export type LogSeverity = 'VRB' | 'WRN' | 'ERR' | 'TRC' | 'FIN';

export type LogDetailValue = string | number | boolean;

export interface LogEntry {
  timestamp: number;
  severity: LogSeverity;
  /** Backend round-trip ordinal within the conversation (0 before the first request). */
  step: number;
  /** Retry/fallback ordinal within one operation invocation. */
  attempt?: number;
  direction: 'request' | 'response';
  type: 'backend' | 'operation' | 'session';
  remoteIdentifier: string;
  fatal: boolean;
  message: string;
  sessionId?: string;
  details?: Record<string, LogDetailValue>;
  stack?: string;
}

export type LogCallback = (entry: LogEntry) => void;

// Conversation

export type ConversationRole = 'system' | 'user' | 'assistant';

export interface ConversationMessage {
  role: ConversationRole;
  content: string;
}

// Operation data model

export interface AttemptRecord {
  readonly method: string;
  readonly success: boolean;
  readonly errorMessage?: string;
  readonly durationMs: number;
  readonly attemptNumber: number;
}

export interface OperationContext {
  readonly parameters: Readonly<Record<string, unknown>>;
  /** Shared between chained operations of one conversation. */
  readonly state: Record<string, unknown>;
  readonly sessionId: string;
  readonly workingDirectory?: string;
  /** Set by the invoker before each attempt. */
  retryAttempt: number;
  readonly executionHistory: AttemptRecord[];
  /** Last failure message, visible to alternative methods. */
  previousFailureReason?: string;
}

/** What a single method run reports. The invoker adds timing and attempt bookkeeping. */
export type OperationOutcome =
  | { success: true; output: unknown }
  | { success: false; errorMessage: string; errorKind?: OperationErrorKind; output?: unknown };

export interface OperationResult {
  success: boolean;
  output?: unknown;
  errorMessage?: string;
  errorKind?: OperationErrorKind;
  /** Duration of the attempt that produced this result. */
  executionTimeMs: number;
  totalAttempts: number;
  methodUsed: string;
  hasMoreAlternatives: boolean;
}

// Decisions

export interface NextStep {
  requiresOperation: boolean;
  operationName?: string;
  parameters: Record<string, unknown>;
  confidence: number;
  assumptions: string[];
  risks: string[];
  reasoning?: string;
}

export interface Decision {
  taskCompleted: boolean;
  reasoning: string;
  nextStep: NextStep | null;
  response: string;
  /** Top-level confidence, present only when the backend stated one. */
  confidence?: number;
}

export type DecisionSource = 'json' | 'yaml' | 'key_value' | 'markdown' | 'plain_text' | 'synthetic';
