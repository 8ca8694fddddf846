import type { AttemptRecord, LogCallback, LogEntry, OperationContext, OperationOutcome, OperationResult } from '../types.js';
import type { Operation } from './types.js';

import { CancelledError, isBoundaryViolation, isCancelled } from '../errors.js';
import { sleepWithAbort, type SleepOutcome } from '../utils.js';

import { isOperationExecutionError, isRetryableErrorKind, toErrorMessage } from './operation-errors.js';

export const PRIMARY_METHOD = 'primary';
export const ALTERNATIVES_EXHAUSTED = 'alternatives_exhausted';
export const BACKOFF_FACTOR = 1.5;

export interface RetryPolicy {
  maxRetries: number;
  baseDelayMs: number;
}

export interface InvokeOptions extends Partial<RetryPolicy> {
  signal?: AbortSignal;
  /** Overall deadline for the invocation, checked between attempts. */
  timeoutMs?: number;
  step?: number;
}

export interface ResilientInvokerOptions extends RetryPolicy {
  onLog?: LogCallback;
  sleep?: (ms: number, signal?: AbortSignal) => Promise<SleepOutcome>;
  now?: () => number;
}

/** Delay before retry number `attempt + 1`: baseDelay * 1.5^attempt. */
export function computeBackoffDelay(baseDelayMs: number, attempt: number): number {
  return Math.round(baseDelayMs * BACKOFF_FACTOR ** attempt);
}

interface AttemptOutcome {
  outcome: OperationOutcome;
  durationMs: number;
}

/**
 * Runs one logical operation invocation: the primary method with bounded
 * retries and exponential backoff, then each alternative method once, in
 * order. Boundary violations and cancellations are thrown, everything else
 * ends up in the returned result.
 */
export class ResilientInvoker {
  private readonly policy: RetryPolicy;
  private readonly onLog?: LogCallback;
  private readonly sleep: (ms: number, signal?: AbortSignal) => Promise<SleepOutcome>;
  private readonly now: () => number;

  constructor(options: ResilientInvokerOptions) {
    this.policy = { maxRetries: options.maxRetries, baseDelayMs: options.baseDelayMs };
    this.onLog = options.onLog;
    this.sleep = options.sleep ?? sleepWithAbort;
    this.now = options.now ?? Date.now;
  }

  async invoke(operation: Operation, context: OperationContext, options: InvokeOptions = {}): Promise<OperationResult> {
    const maxRetries = Math.max(0, Math.trunc(options.maxRetries ?? this.policy.maxRetries));
    const baseDelayMs = Math.max(0, options.baseDelayMs ?? this.policy.baseDelayMs);
    const deadline = options.timeoutMs !== undefined ? this.now() + options.timeoutMs : undefined;
    const step = options.step ?? 0;
    const alternatives = [...operation.alternativeMethods()];

    const checkpoint = (): void => {
      if (options.signal?.aborted === true) {
        throw new CancelledError(`${operation.name} cancelled`, 'signal');
      }
      if (deadline !== undefined && this.now() >= deadline) {
        throw new CancelledError(`${operation.name} timed out after ${String(options.timeoutMs)}ms`, 'timeout');
      }
    };

    let totalAttempts = 0;
    let primaryFailure: Extract<OperationOutcome, { success: false }> | undefined;
    let lastDurationMs = 0;

    for (let attempt = 0; attempt <= maxRetries; attempt += 1) {
      checkpoint();
      context.retryAttempt = attempt;
      const { outcome, durationMs } = await this.runAttempt(() => operation.run(context));
      totalAttempts += 1;
      lastDurationMs = durationMs;
      this.record(context.executionHistory, PRIMARY_METHOD, outcome, durationMs, totalAttempts);
      if (outcome.success) {
        return {
          success: true,
          output: outcome.output,
          executionTimeMs: durationMs,
          totalAttempts,
          methodUsed: PRIMARY_METHOD,
          hasMoreAlternatives: alternatives.length > 0,
        };
      }
      primaryFailure = outcome;
      context.previousFailureReason = outcome.errorMessage;
      if (outcome.errorKind !== undefined && !isRetryableErrorKind(outcome.errorKind)) {
        this.log(step, totalAttempts, 'WRN', operation.name, `${operation.name} failed without retry (${outcome.errorKind}): ${outcome.errorMessage}`);
        return this.failureResult(outcome, lastDurationMs, totalAttempts, PRIMARY_METHOD, false);
      }
      if (attempt < maxRetries) {
        const delay = computeBackoffDelay(baseDelayMs, attempt);
        this.log(step, totalAttempts, 'WRN', operation.name, `${operation.name} attempt ${String(attempt + 1)}/${String(maxRetries + 1)} failed: ${outcome.errorMessage}; retrying in ${String(delay)}ms`);
        await this.wait(delay, options.signal, deadline, operation.name, options.timeoutMs);
      }
    }

    // Loop ran at least once, so a primary failure exists here
    const primary = primaryFailure ?? { success: false as const, errorMessage: 'no attempt was made' };
    if (alternatives.length === 0) {
      this.log(step, totalAttempts, 'WRN', operation.name, `${operation.name} failed after ${String(totalAttempts)} attempts: ${primary.errorMessage}`);
      return this.failureResult(primary, lastDurationMs, totalAttempts, PRIMARY_METHOD, false);
    }

    const failures: string[] = [`primary: ${primary.errorMessage}`];
    let lastFailure = primary;
    for (const [index, method] of alternatives.entries()) {
      checkpoint();
      context.retryAttempt = totalAttempts;
      context.previousFailureReason = lastFailure.errorMessage;
      this.log(step, totalAttempts + 1, 'VRB', operation.name, `${operation.name} trying alternative '${method}'`);
      const { outcome, durationMs } = await this.runAttempt(() => operation.runAlternative(method, context));
      totalAttempts += 1;
      lastDurationMs = durationMs;
      this.record(context.executionHistory, method, outcome, durationMs, totalAttempts);
      if (outcome.success) {
        return {
          success: true,
          output: outcome.output,
          executionTimeMs: durationMs,
          totalAttempts,
          methodUsed: method,
          hasMoreAlternatives: index < alternatives.length - 1,
        };
      }
      failures.push(`${method}: ${outcome.errorMessage}`);
      lastFailure = outcome;
    }

    const errorMessage = `All methods failed. ${failures.join('; ')}`;
    this.log(step, totalAttempts, 'WRN', operation.name, `${operation.name} ${errorMessage}`);
    return {
      success: false,
      output: lastFailure.output,
      errorMessage,
      errorKind: lastFailure.errorKind ?? 'execution_error',
      executionTimeMs: lastDurationMs,
      totalAttempts,
      methodUsed: ALTERNATIVES_EXHAUSTED,
      hasMoreAlternatives: false,
    };
  }

  private async runAttempt(fn: () => Promise<OperationOutcome>): Promise<AttemptOutcome> {
    const started = this.now();
    try {
      const outcome = await fn();
      return { outcome, durationMs: this.now() - started };
    } catch (error) {
      if (isBoundaryViolation(error) || isCancelled(error)) throw error;
      const outcome: OperationOutcome = isOperationExecutionError(error)
        ? { success: false, errorMessage: error.message, errorKind: error.kind }
        : { success: false, errorMessage: toErrorMessage(error), errorKind: 'execution_error' };
      return { outcome, durationMs: this.now() - started };
    }
  }

  private async wait(delayMs: number, signal: AbortSignal | undefined, deadline: number | undefined, name: string, timeoutMs: number | undefined): Promise<void> {
    const remaining = deadline !== undefined ? deadline - this.now() : undefined;
    if (remaining !== undefined && remaining < delayMs) {
      throw new CancelledError(`${name} timed out after ${String(timeoutMs)}ms`, 'timeout');
    }
    const result = await this.sleep(delayMs, signal);
    if (result === 'aborted') {
      throw new CancelledError(`${name} cancelled`, 'signal');
    }
  }

  private record(history: AttemptRecord[], method: string, outcome: OperationOutcome, durationMs: number, attemptNumber: number): void {
    const entry: AttemptRecord = outcome.success
      ? { method, success: true, durationMs, attemptNumber }
      : { method, success: false, errorMessage: outcome.errorMessage, durationMs, attemptNumber };
    history.push(Object.freeze(entry));
  }

  private failureResult(
    outcome: Extract<OperationOutcome, { success: false }>,
    executionTimeMs: number,
    totalAttempts: number,
    methodUsed: string,
    hasMoreAlternatives: boolean,
  ): OperationResult {
    return {
      success: false,
      output: outcome.output,
      errorMessage: outcome.errorMessage,
      errorKind: outcome.errorKind ?? 'execution_error',
      executionTimeMs,
      totalAttempts,
      methodUsed,
      hasMoreAlternatives,
    };
  }

  private log(step: number, attempt: number, severity: LogEntry['severity'], operationName: string, message: string): void {
    this.onLog?.({
      timestamp: Date.now(),
      severity,
      step,
      attempt,
      direction: 'response',
      type: 'operation',
      remoteIdentifier: `operation:${operationName}`,
      fatal: false,
      message,
    });
  }
}
