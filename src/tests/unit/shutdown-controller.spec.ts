import { describe, expect, it } from 'vitest';

import type { LogEntry } from '../../types.js';

import { ShutdownController } from '../../shutdown-controller.js';

describe('ShutdownController', () => {
  it('aborts the signal before running tasks newest first', async () => {
    const controller = new ShutdownController();
    const order: string[] = [];
    controller.register('first', () => { order.push('first'); });
    controller.register('second', () => { order.push(`second aborted=${String(controller.signal.aborted)}`); });
    expect(controller.signal.aborted).toBe(false);
    await controller.shutdown();
    expect(order).toEqual(['second aborted=true', 'first']);
  });

  it('logs a failing task and keeps going', async () => {
    const controller = new ShutdownController();
    const logs: LogEntry[] = [];
    let ran = false;
    controller.register('flush', () => { ran = true; });
    controller.register('close', () => Promise.reject(new Error('already closed')));
    await controller.shutdown((entry) => { logs.push(entry); });
    expect(ran).toBe(true);
    expect(logs.map((entry) => [entry.severity, entry.message])).toEqual([['WRN', "cleanup task 'close' failed: already closed"]]);
  });

  it('runs tasks once and honours unregistering', async () => {
    const controller = new ShutdownController();
    let runs = 0;
    controller.register('count', () => { runs += 1; });
    const unregister = controller.register('gone', () => { runs += 100; });
    unregister();
    await Promise.all([controller.shutdown(), controller.shutdown()]);
    expect(runs).toBe(1);
  });
});
