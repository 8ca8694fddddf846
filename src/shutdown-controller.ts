import type { LogCallback } from './types.js';

export type CleanupTask = () => Promise<void> | void;

interface NamedTask {
  name: string;
  task: CleanupTask;
}

/**
 * Process-wide stop switch for the CLI. `shutdown()` aborts `signal` first,
 * so a running conversation stops at its next suspension point, then runs
 * the cleanup tasks newest first. A failing task is logged and the rest
 * still run. Later calls wait on the first.
 */
export class ShutdownController {
  private readonly abortController = new AbortController();
  private readonly tasks: NamedTask[] = [];
  private running?: Promise<void>;

  get signal(): AbortSignal {
    return this.abortController.signal;
  }

  /** Returns a function that takes the task back out. */
  register(name: string, task: CleanupTask): () => void {
    const entry: NamedTask = { name, task };
    this.tasks.push(entry);
    return () => {
      const index = this.tasks.indexOf(entry);
      if (index >= 0) this.tasks.splice(index, 1);
    };
  }

  shutdown(logger?: LogCallback): Promise<void> {
    this.running ??= this.runTasks(logger);
    return this.running;
  }

  private async runTasks(logger?: LogCallback): Promise<void> {
    this.abortController.abort();
    for (const { name, task } of [...this.tasks].reverse()) {
      try {
        await task();
      } catch (error) {
        logger?.({
          timestamp: Date.now(),
          severity: 'WRN',
          step: 0,
          direction: 'response',
          type: 'session',
          remoteIdentifier: 'shutdown',
          fatal: false,
          message: `cleanup task '${name}' failed: ${error instanceof Error ? error.message : String(error)}`,
        });
      }
    }
  }
}
