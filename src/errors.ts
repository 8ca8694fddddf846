/**
 * Errors that cross module boundaries. Operation failures stay inside
 * `OperationResult`; these are the ones that propagate.
 */

export class BoundaryViolationError extends Error {
  readonly sessionId: string;
  readonly requestedPath: string;

  constructor(sessionId: string, requestedPath: string, reason = 'path resolves outside the session root') {
    super(`boundary violation: '${requestedPath}' ${reason}`);
    this.name = 'BoundaryViolationError';
    this.sessionId = sessionId;
    this.requestedPath = requestedPath;
  }
}

export class CancelledError extends Error {
  readonly reason: 'signal' | 'timeout';

  constructor(message = 'operation cancelled', reason: 'signal' | 'timeout' = 'signal') {
    super(message);
    this.name = 'CancelledError';
    this.reason = reason;
  }
}

export class MalformedResponseError extends Error {
  readonly rawText: string;

  constructor(message: string, rawText: string) {
    super(message);
    this.name = 'MalformedResponseError';
    this.rawText = rawText;
  }
}

export class BackendError extends Error {
  readonly backend: string;

  constructor(backend: string, message: string, opts?: { cause?: unknown }) {
    super(message, opts?.cause !== undefined ? { cause: opts.cause } : undefined);
    this.name = 'BackendError';
    this.backend = backend;
  }
}

export const isBoundaryViolation = (value: unknown): value is BoundaryViolationError =>
  value instanceof BoundaryViolationError;

export const isCancelled = (value: unknown): value is CancelledError =>
  value instanceof CancelledError;
