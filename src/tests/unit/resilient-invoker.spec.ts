import { describe, expect, it, vi } from 'vitest';

import type { OperationContext, OperationOutcome } from '../../types.js';

import { BoundaryViolationError, CancelledError } from '../../errors.js';
import { OperationExecutionError } from '../../operations/operation-errors.js';
import { ALTERNATIVES_EXHAUSTED, computeBackoffDelay, ResilientInvoker } from '../../operations/resilient-invoker.js';
import { BaseOperation, fail, succeed } from '../../operations/types.js';

class ScriptedOperation extends BaseOperation {
  readonly name = 'Scripted';
  readonly description = 'test operation';
  readonly capabilities = ['test'];
  readonly inputSchema = { type: 'object' };
  primaryCalls = 0;
  readonly alternativeCalls: string[] = [];

  constructor(
    private readonly primary: (attempt: number) => Promise<OperationOutcome>,
    private readonly alternatives: Record<string, () => Promise<OperationOutcome>> = {},
  ) {
    super();
  }

  run(context: Readonly<OperationContext>): Promise<OperationOutcome> {
    this.primaryCalls += 1;
    return this.primary(context.retryAttempt);
  }

  override alternativeMethods(): readonly string[] {
    return Object.keys(this.alternatives);
  }

  override runAlternative(method: string, context: Readonly<OperationContext>): Promise<OperationOutcome> {
    this.alternativeCalls.push(method);
    const impl = this.alternatives[method];
    return impl !== undefined ? impl() : super.runAlternative(method, context);
  }
}

const newContext = (): OperationContext => ({
  parameters: {},
  state: {},
  sessionId: 's1',
  retryAttempt: 0,
  executionHistory: [],
});

const recordingSleep = () => {
  const delays: number[] = [];
  const sleep = (ms: number) => {
    delays.push(ms);
    return Promise.resolve('completed' as const);
  };
  return { delays, sleep };
};

describe('computeBackoffDelay', () => {
  it('grows by 1.5 per attempt', () => {
    expect([0, 1, 2, 3].map((attempt) => computeBackoffDelay(100, attempt))).toEqual([100, 150, 225, 338]);
  });
});

describe('ResilientInvoker', () => {
  it('returns the first success with the primary method', async () => {
    const op = new ScriptedOperation((attempt) => Promise.resolve(attempt < 2 ? fail('flaky') : succeed('ok')));
    const { delays, sleep } = recordingSleep();
    const invoker = new ResilientInvoker({ maxRetries: 3, baseDelayMs: 100, sleep });
    const context = newContext();
    const result = await invoker.invoke(op, context);
    expect(result).toMatchObject({ success: true, output: 'ok', methodUsed: 'primary', totalAttempts: 3, hasMoreAlternatives: false });
    expect(delays).toEqual([100, 150]);
    expect(context.executionHistory.map((r) => [r.method, r.success, r.attemptNumber])).toEqual([
      ['primary', false, 1],
      ['primary', false, 2],
      ['primary', true, 3],
    ]);
  });

  it('calls an always-failing primary exactly maxRetries + 1 times and returns the last failure', async () => {
    let n = 0;
    const op = new ScriptedOperation(() => {
      n += 1;
      return Promise.resolve(fail(`failure ${String(n)}`));
    });
    const { delays, sleep } = recordingSleep();
    const invoker = new ResilientInvoker({ maxRetries: 3, baseDelayMs: 100, sleep });
    const result = await invoker.invoke(op, newContext());
    expect(op.primaryCalls).toBe(4);
    expect(delays).toEqual([100, 150, 225]);
    expect(result).toMatchObject({
      success: false,
      errorMessage: 'failure 4',
      errorKind: 'execution_error',
      methodUsed: 'primary',
      totalAttempts: 4,
    });
  });

  it('waits the backoff series in real time', async () => {
    vi.useFakeTimers();
    try {
      const op = new ScriptedOperation(() => Promise.resolve(fail('down')));
      const invoker = new ResilientInvoker({ maxRetries: 2, baseDelayMs: 100 });
      let settled = false;
      const pending = invoker.invoke(op, newContext()).then((result) => {
        settled = true;
        return result;
      });
      await vi.advanceTimersByTimeAsync(249);
      expect(settled).toBe(false);
      await vi.advanceTimersByTimeAsync(1);
      const result = await pending;
      expect(result.totalAttempts).toBe(3);
    } finally {
      vi.useRealTimers();
    }
  });

  it('tries alternatives in order after retries and records each attempt', async () => {
    const op = new ScriptedOperation(
      () => Promise.resolve(fail('primary broke')),
      {
        a: () => Promise.resolve(fail('a broke')),
        b: () => Promise.resolve(succeed('b worked')),
      },
    );
    const { sleep } = recordingSleep();
    const invoker = new ResilientInvoker({ maxRetries: 0, baseDelayMs: 10, sleep });
    const context = newContext();
    const result = await invoker.invoke(op, context);
    expect(result).toMatchObject({ success: true, output: 'b worked', methodUsed: 'b', totalAttempts: 3, hasMoreAlternatives: false });
    expect(context.executionHistory.map((r) => [r.method, r.success])).toEqual([
      ['primary', false],
      ['a', false],
      ['b', true],
    ]);
    expect(context.previousFailureReason).toBe('a broke');
  });

  it('reports more alternatives when an earlier one succeeds', async () => {
    const op = new ScriptedOperation(
      () => Promise.resolve(fail('primary broke')),
      { a: () => Promise.resolve(succeed('a worked')), b: () => Promise.resolve(succeed('unused')) },
    );
    const invoker = new ResilientInvoker({ maxRetries: 0, baseDelayMs: 0 });
    const result = await invoker.invoke(op, newContext());
    expect(result.methodUsed).toBe('a');
    expect(result.hasMoreAlternatives).toBe(true);
    expect(op.alternativeCalls).toEqual(['a']);
  });

  it('concatenates every failure when all alternatives fail', async () => {
    const op = new ScriptedOperation(
      () => Promise.resolve(fail('p')),
      { a: () => Promise.resolve(fail('x')), b: () => Promise.reject(new Error('y')) },
    );
    const invoker = new ResilientInvoker({ maxRetries: 1, baseDelayMs: 0 });
    const result = await invoker.invoke(op, newContext());
    expect(result).toMatchObject({
      success: false,
      methodUsed: ALTERNATIVES_EXHAUSTED,
      totalAttempts: 4,
      errorMessage: 'All methods failed. primary: p; a: x; b: y',
      errorKind: 'execution_error',
    });
  });

  it('treats a thrown error like a failed outcome', async () => {
    const op = new ScriptedOperation(() => Promise.reject(new Error('exploded')));
    const invoker = new ResilientInvoker({ maxRetries: 1, baseDelayMs: 0 });
    const result = await invoker.invoke(op, newContext());
    expect(op.primaryCalls).toBe(2);
    expect(result.errorMessage).toBe('exploded');
  });

  it('does not retry non-retryable error kinds', async () => {
    const op = new ScriptedOperation(
      () => Promise.reject(new OperationExecutionError('invalid_parameters', 'path is required')),
      { a: () => Promise.resolve(succeed('never')) },
    );
    const invoker = new ResilientInvoker({ maxRetries: 3, baseDelayMs: 0 });
    const result = await invoker.invoke(op, newContext());
    expect(op.primaryCalls).toBe(1);
    expect(op.alternativeCalls).toEqual([]);
    expect(result).toMatchObject({ success: false, errorKind: 'invalid_parameters', errorMessage: 'path is required' });
  });

  it('propagates boundary violations without retrying', async () => {
    const op = new ScriptedOperation(() => Promise.reject(new BoundaryViolationError('s1', '../x')));
    const invoker = new ResilientInvoker({ maxRetries: 3, baseDelayMs: 0 });
    await expect(invoker.invoke(op, newContext())).rejects.toBeInstanceOf(BoundaryViolationError);
    expect(op.primaryCalls).toBe(1);
  });

  it('cancels between attempts when the signal aborts during backoff', async () => {
    const controller = new AbortController();
    const op = new ScriptedOperation(() => {
      controller.abort();
      return Promise.resolve(fail('down'));
    });
    const invoker = new ResilientInvoker({ maxRetries: 3, baseDelayMs: 1000 });
    await expect(invoker.invoke(op, newContext(), { signal: controller.signal })).rejects.toBeInstanceOf(CancelledError);
    expect(op.primaryCalls).toBe(1);
  });

  it('does not start when the signal is already aborted', async () => {
    const controller = new AbortController();
    controller.abort();
    const op = new ScriptedOperation(() => Promise.resolve(succeed('x')));
    const invoker = new ResilientInvoker({ maxRetries: 0, baseDelayMs: 0 });
    await expect(invoker.invoke(op, newContext(), { signal: controller.signal })).rejects.toThrow('Scripted cancelled');
    expect(op.primaryCalls).toBe(0);
  });

  it('times out with a distinct cancellation when the deadline cannot fit the next delay', async () => {
    let clock = 0;
    const op = new ScriptedOperation(() => {
      clock += 50;
      return Promise.resolve(fail('slow'));
    });
    const invoker = new ResilientInvoker({ maxRetries: 3, baseDelayMs: 100, now: () => clock });
    const error: unknown = await invoker.invoke(op, newContext(), { timeoutMs: 120 }).catch((e: unknown) => e);
    expect(error).toBeInstanceOf(CancelledError);
    expect(error).toMatchObject({ reason: 'timeout' });
  });
});
