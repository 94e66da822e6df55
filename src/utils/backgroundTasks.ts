import logger, { asyncLocalStorage } from "./logger";
import { withSpan } from "./span";

type QueuedTask = {
  name: string;
  meta: Record<string, unknown>;
  fn: () => Promise<void>;
  context: Map<string, string> | undefined;
};

export type BackgroundTaskStats = {
  running: number;
  queued: number;
};

/**
 * Bounded pool for work that must not hold up an HTTP response (store upserts
 * after a webhook reply). Tasks run FIFO, at most `concurrency` at a time.
 *
 * Failures are logged (span.error, with stack) and dropped; nothing is retried
 * and nothing is reported back to the request that enqueued the task.
 */
export class BackgroundTaskRunner {
  private readonly concurrency: number;
  private readonly queue: QueuedTask[] = [];
  private running = 0;
  private idleWaiters: Array<() => void> = [];

  constructor(concurrency = 4) {
    this.concurrency = Math.max(1, Math.trunc(concurrency));
  }

  enqueue(name: string, meta: Record<string, unknown>, fn: () => Promise<void>): void {
    this.queue.push({
      name,
      meta,
      fn,
      // Keep the request id so the task's log lines can be tied back to the webhook call.
      context: asyncLocalStorage.getStore(),
    });
    setImmediate(() => this.drain());
  }

  stats(): BackgroundTaskStats {
    return { running: this.running, queued: this.queue.length };
  }

  /** Resolves once nothing is queued or running. */
  onIdle(): Promise<void> {
    if (this.running === 0 && this.queue.length === 0) {
      return Promise.resolve();
    }
    return new Promise((resolve) => {
      this.idleWaiters.push(resolve);
    });
  }

  private drain(): void {
    while (this.running < this.concurrency && this.queue.length > 0) {
      const task = this.queue.shift();
      if (!task) break;
      this.running += 1;
      void this.run(task);
    }
  }

  private async run(task: QueuedTask): Promise<void> {
    const exec = () => withSpan(`task.${task.name}`, task.meta, task.fn);
    try {
      if (task.context) {
        await asyncLocalStorage.run(task.context, exec);
      } else {
        await exec();
      }
    } catch {
      // Already logged by withSpan; background failures never propagate.
      logger.warn("Background task dropped after failure", { task: task.name });
    } finally {
      this.running -= 1;
      this.drain();
      this.notifyIfIdle();
    }
  }

  private notifyIfIdle(): void {
    if (this.running !== 0 || this.queue.length !== 0) return;
    const waiters = this.idleWaiters;
    this.idleWaiters = [];
    for (const resolve of waiters) resolve();
  }
}
