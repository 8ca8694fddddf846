export type OperationErrorKind =
  | 'unknown_operation'
  | 'invalid_parameters'
  | 'boundary_violation'
  | 'canceled'
  | 'timeout'
  | 'execution_error'
  | 'internal_error';

export interface OperationErrorMeaning {
  executed: boolean;
  retryable: boolean;
  summary: string;
}

export const OPERATION_ERROR_KIND_MEANINGS: Record<OperationErrorKind, OperationErrorMeaning> = {
  unknown_operation: {
    executed: false,
    retryable: false,
    summary: 'Operation name is not registered.',
  },
  invalid_parameters: {
    executed: false,
    retryable: false,
    summary: 'Parameter schema validation failed before execution.',
  },
  boundary_violation: {
    executed: false,
    retryable: false,
    summary: 'A path resolved outside the session root.',
  },
  canceled: {
    executed: false,
    retryable: false,
    summary: 'Invocation aborted between attempts.',
  },
  timeout: {
    executed: true,
    retryable: true,
    summary: 'Operation timed out after execution started.',
  },
  execution_error: {
    executed: true,
    retryable: true,
    summary: 'Operation failed after being invoked.',
  },
  internal_error: {
    executed: true,
    retryable: true,
    summary: 'Unexpected error during operation execution.',
  },
};

export class OperationExecutionError extends Error {
  readonly kind: OperationErrorKind;
  readonly code?: string;
  readonly details?: Record<string, unknown>;

  constructor(kind: OperationErrorKind, message: string, opts?: { code?: string; details?: Record<string, unknown> }) {
    super(message);
    this.name = 'OperationExecutionError';
    this.kind = kind;
    if (opts?.code !== undefined) {
      this.code = opts.code;
    }
    if (opts?.details !== undefined) {
      this.details = opts.details;
    }
  }
}

export const isOperationExecutionError = (value: unknown): value is OperationExecutionError =>
  value instanceof OperationExecutionError;

export const isRetryableErrorKind = (kind: OperationErrorKind): boolean =>
  OPERATION_ERROR_KIND_MEANINGS[kind].retryable;

export const toErrorMessage = (value: unknown): string => {
  if (value instanceof Error && typeof value.message === 'string') return value.message;
  if (typeof value === 'string') return value;
  if (typeof value === 'number' || typeof value === 'boolean' || typeof value === 'bigint') {
    return value.toString();
  }
  if (value === null) return 'null';
  if (typeof value === 'object') {
    try {
      return JSON.stringify(value);
    } catch {
      return '[unserializable-error]';
    }
  }
  return 'unknown_error';
};
