import type { Backend } from '../backends/types.js';
import type { OperationRegistry } from '../operations/registry.js';
import type { SessionJournal } from '../session/session-journal.js';
import type { SessionStore } from '../session/session-store.js';
import type { ConversationMessage, Decision, LogCallback, LogEntry, OperationContext, OperationResult } from '../types.js';

import { CancelledError, isBoundaryViolation, isCancelled } from '../errors.js';
import { toErrorMessage } from '../operations/operation-errors.js';
import { computeBackoffDelay, ResilientInvoker } from '../operations/resilient-invoker.js';
import {
  renderContinuePrompt,
  renderInitialPrompt,
  renderOperationResultPrompt,
  renderSystemPrompt,
  renderValidationErrorPrompt,
} from '../prompts/loader.js';
import { interpretResponse } from '../response/decision-parser.js';
import { formatOperationRequestCompact, sleepWithAbort, type SleepOutcome } from '../utils.js';

import { formatOperationResult, rejectedOperationResult } from './prompt-builder.js';
import { ConversationStateMachine, type LoopState } from './state-machine.js';

export const ITERATION_LIMIT_MARKER = '[completion not confirmed: iteration limit reached]';
export const CANCELLED_MARKER = '[completion not confirmed: cancelled]';

export interface ConversationSettings {
  maxIterations: number;
  maxRetries: number;
  baseDelayMs: number;
  minCompletionConfidence: number;
  minReasoningLength: number;
  operationTimeoutMs?: number;
}

export const DEFAULT_CONVERSATION_SETTINGS: ConversationSettings = {
  maxIterations: 10,
  maxRetries: 3,
  baseDelayMs: 1000,
  minCompletionConfidence: 0.8,
  minReasoningLength: 30,
};

export interface ConversationLoopOptions {
  backend: Backend;
  registry: OperationRegistry;
  sessions: SessionStore;
  settings?: Partial<ConversationSettings>;
  journal?: SessionJournal;
  onLog?: LogCallback;
  /** Replaces the invoker built from `settings`. */
  invoker?: ResilientInvoker;
  sleep?: (ms: number, signal?: AbortSignal) => Promise<SleepOutcome>;
}

export interface RunOptions {
  sessionId: string;
  signal?: AbortSignal;
}

export type ConversationOutcome = 'completed' | 'aborted' | 'cancelled';

export interface ConversationResult {
  sessionId: string;
  success: boolean;
  completed: boolean;
  response: string;
  /** Backend round trips made. */
  iterations: number;
  state: ConversationOutcome;
  decisions: Decision[];
  /** Set when the response is partial. */
  marker?: string;
  transitions: readonly LoopState[];
}

interface RunState {
  sessionId: string;
  machine: ConversationStateMachine;
  history: ConversationMessage[];
  decisions: Decision[];
  /** Carried across every operation invocation of the conversation. */
  shared: Record<string, unknown>;
  iterations: number;
  lastResponse: string;
  signal?: AbortSignal;
}

/**
 * Drives one conversation: prompt, decision, optional operation, repeat,
 * until the backend confirms completion or the iteration cap is hit.
 * Malformed responses and failed operations become prompts; only backend
 * failures and cancellation end the loop early.
 */
export class ConversationLoop {
  private readonly backend: Backend;
  private readonly registry: OperationRegistry;
  private readonly sessions: SessionStore;
  private readonly settings: ConversationSettings;
  private readonly journal?: SessionJournal;
  private readonly onLog?: LogCallback;
  private readonly invoker: ResilientInvoker;
  private readonly sleep: (ms: number, signal?: AbortSignal) => Promise<SleepOutcome>;

  constructor(options: ConversationLoopOptions) {
    this.backend = options.backend;
    this.registry = options.registry;
    this.sessions = options.sessions;
    this.settings = { ...DEFAULT_CONVERSATION_SETTINGS, ...options.settings };
    this.journal = options.journal;
    this.onLog = options.onLog;
    this.sleep = options.sleep ?? sleepWithAbort;
    this.invoker = options.invoker ?? new ResilientInvoker({
      maxRetries: this.settings.maxRetries,
      baseDelayMs: this.settings.baseDelayMs,
      onLog: options.onLog,
      sleep: this.sleep,
    });
  }

  async run(query: string, options: RunOptions): Promise<ConversationResult> {
    const scope = this.sessions.get(options.sessionId);
    await scope.ensureRoot();
    const run: RunState = {
      sessionId: options.sessionId,
      machine: new ConversationStateMachine(),
      history: [{
        role: 'system',
        content: renderSystemPrompt({
          sessionId: options.sessionId,
          operations: this.registry.describe(),
          minCompletionConfidence: this.settings.minCompletionConfidence,
          minReasoningLength: this.settings.minReasoningLength,
        }),
      }],
      decisions: [],
      shared: {},
      iterations: 0,
      lastResponse: '',
      signal: options.signal,
    };

    let prompt = renderInitialPrompt(query, options.sessionId, scope.toDisplayPath(scope.workingDirectory));
    run.machine.transition('awaiting_decision');
    try {
      while (run.iterations < this.settings.maxIterations) {
        this.checkCancelled(run);
        run.iterations += 1;
        const step = run.iterations;
        const raw = await this.exchange(run, prompt, step);

        const interpreted = interpretResponse(raw, {
          minCompletionConfidence: this.settings.minCompletionConfidence,
          minReasoningLength: this.settings.minReasoningLength,
        });
        const { decision } = interpreted;
        run.decisions.push(decision);
        run.lastResponse = decision.response;
        interpreted.warnings.forEach((warning) => { this.log(run, step, 'WRN', 'backend', 'response', warning); });
        await this.journal?.append(step, 'decision', { source: interpreted.source, malformed: interpreted.malformed, issue: interpreted.issue, decision });

        if (interpreted.malformed) {
          this.log(run, step, 'WRN', 'backend', 'response', `unusable response: ${interpreted.issue ?? 'unknown issue'}`);
          prompt = renderValidationErrorPrompt(interpreted.issue ?? 'unknown issue', this.settings.minReasoningLength);
          run.machine.transition('awaiting_decision');
          continue;
        }

        if (decision.taskCompleted) {
          run.machine.transition('completed');
          await this.journal?.append(step, 'completion', { response: decision.response, iterations: step });
          this.log(run, step, 'FIN', 'session', 'response', `completed after ${String(step)} round trips`);
          return this.result(run, 'completed', decision.response);
        }

        const nextStep = decision.nextStep;
        if (nextStep?.requiresOperation === true && nextStep.operationName !== undefined) {
          // A requested operation is not run when no round trip is left to report it
          if (run.iterations >= this.settings.maxIterations) break;
          run.machine.transition('invoking_operation');
          const narration = await this.invokeOperation(run, step, nextStep.operationName, nextStep.parameters);
          prompt = renderOperationResultPrompt(narration);
          run.machine.transition('awaiting_decision');
          continue;
        }

        prompt = renderContinuePrompt(nextStep?.reasoning ?? '');
        run.machine.transition('awaiting_decision');
      }
    } catch (error) {
      if (isCancelled(error) || options.signal?.aborted === true) {
        run.machine.transition('aborted');
        await this.journal?.append(run.iterations, 'abort', { reason: 'cancelled', message: toErrorMessage(error) });
        this.log(run, run.iterations, 'WRN', 'session', 'response', `conversation cancelled: ${toErrorMessage(error)}`);
        return this.result(run, 'cancelled', this.withMarker(run.lastResponse, CANCELLED_MARKER), CANCELLED_MARKER);
      }
      run.machine.transition('aborted');
      await this.journal?.append(run.iterations, 'abort', { reason: 'error', message: toErrorMessage(error) });
      this.log(run, run.iterations, 'ERR', 'session', 'response', `conversation failed: ${toErrorMessage(error)}`, true);
      throw error;
    }

    run.machine.transition('aborted');
    await this.journal?.append(run.iterations, 'abort', { reason: 'iteration_limit', iterations: run.iterations });
    this.log(run, run.iterations, 'WRN', 'session', 'response', `iteration limit ${String(this.settings.maxIterations)} reached without confirmed completion`);
    return this.result(run, 'aborted', this.withMarker(run.lastResponse, ITERATION_LIMIT_MARKER), ITERATION_LIMIT_MARKER);
  }

  /** Sends one prompt with retries, then records both sides in the history. */
  private async exchange(run: RunState, prompt: string, step: number): Promise<string> {
    await this.journal?.append(step, 'prompt', { prompt });
    this.log(run, step, 'VRB', 'backend', 'request', `sending prompt (${String(prompt.length)} chars)`);
    const raw = await this.sendWithRetry(run, prompt, step);
    run.history.push({ role: 'user', content: prompt }, { role: 'assistant', content: raw });
    await this.journal?.append(step, 'response', { response: raw });
    this.log(run, step, 'VRB', 'backend', 'response', `received response (${String(raw.length)} chars)`);
    return raw;
  }

  private async sendWithRetry(run: RunState, prompt: string, step: number): Promise<string> {
    const { maxRetries, baseDelayMs } = this.settings;
    for (let attempt = 0; ; attempt += 1) {
      try {
        return await this.backend.send(prompt, run.history, run.signal);
      } catch (error) {
        if (isCancelled(error) || run.signal?.aborted === true || attempt >= maxRetries) throw error;
        const delay = computeBackoffDelay(baseDelayMs, attempt);
        this.log(run, step, 'WRN', 'backend', 'response', `backend request failed (attempt ${String(attempt + 1)}/${String(maxRetries + 1)}): ${toErrorMessage(error)}; retrying in ${String(delay)}ms`);
        const slept = await this.sleep(delay, run.signal);
        if (slept === 'aborted') throw new CancelledError('backend request cancelled', 'signal');
      }
    }
  }

  private async invokeOperation(run: RunState, step: number, requestedName: string, parameters: Record<string, unknown>): Promise<string> {
    const operation = this.registry.resolve(requestedName);
    let result: OperationResult;
    let displayName = requestedName;
    if (operation === undefined) {
      const known = this.registry.list().map((op) => op.name).join(', ');
      result = rejectedOperationResult('unknown_operation', `Unknown operation '${requestedName}'. Available operations: ${known}`);
    } else {
      displayName = operation.name;
      const validation = this.registry.validateParameters(operation, parameters);
      if (!validation.valid) {
        result = rejectedOperationResult('invalid_parameters', validation.message);
      } else {
        const scope = this.sessions.get(run.sessionId);
        const context: OperationContext = {
          parameters: validation.parameters,
          state: run.shared,
          sessionId: run.sessionId,
          workingDirectory: scope.workingDirectory,
          retryAttempt: 0,
          executionHistory: [],
        };
        this.log(run, step, 'VRB', 'operation', 'request', `invoking ${formatOperationRequestCompact(operation.name, validation.parameters)}`);
        try {
          result = await this.invoker.invoke(operation, context, {
            signal: run.signal,
            timeoutMs: this.settings.operationTimeoutMs,
            step,
          });
        } catch (error) {
          if (!isBoundaryViolation(error)) throw error;
          result = rejectedOperationResult('boundary_violation', `Rejected: ${error.message}`);
        }
        run.shared.lastOperation = operation.name;
        run.shared.lastOperationSucceeded = result.success;
      }
    }

    await this.journal?.append(step, 'operation', { name: displayName, parameters, result });
    this.log(
      run,
      step,
      result.success ? 'VRB' : 'WRN',
      'operation',
      'response',
      result.success
        ? `${displayName} succeeded via ${result.methodUsed} (${String(result.totalAttempts)} attempts)`
        : `${displayName} failed: ${result.errorMessage ?? 'unknown error'}`,
    );
    return formatOperationResult(displayName, result);
  }

  private checkCancelled(run: RunState): void {
    if (run.signal?.aborted === true) throw new CancelledError('conversation cancelled', 'signal');
  }

  private withMarker(response: string, marker: string): string {
    return response.length > 0 ? `${response}\n\n${marker}` : marker;
  }

  private result(run: RunState, state: ConversationOutcome, response: string, marker?: string): ConversationResult {
    const completed = state === 'completed';
    return {
      sessionId: run.sessionId,
      success: completed,
      completed,
      response,
      iterations: run.iterations,
      state,
      decisions: run.decisions,
      ...(marker !== undefined ? { marker } : {}),
      transitions: run.machine.history,
    };
  }

  private log(
    run: RunState,
    step: number,
    severity: LogEntry['severity'],
    type: LogEntry['type'],
    direction: LogEntry['direction'],
    message: string,
    fatal = false,
  ): void {
    this.onLog?.({
      timestamp: Date.now(),
      severity,
      step,
      direction,
      type,
      remoteIdentifier: type === 'backend' ? this.backend.name : `session:${run.sessionId}`,
      fatal,
      message,
      sessionId: run.sessionId,
    });
  }
}
