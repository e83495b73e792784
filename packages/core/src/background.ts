/**
 * Background Task Queue
 *
 * Fire-and-forget work that must not delay a response (click accounting,
 * cache invalidation). Tasks run immediately; the queue only tracks them
 * so shutdown can wait and tests can drain. Failures go to the queue's
 * error channel and never reach the dispatcher.
 */

import type { Logger } from "@tinyhop/logger";

export type TaskErrorHandler = (name: string, err: unknown) => void;

export interface BackgroundTaskQueueOptions {
  logger?: Logger;
  /** Called after the failure is logged */
  onError?: TaskErrorHandler;
}

export class BackgroundTaskQueue {
  private readonly inFlight = new Set<Promise<void>>();
  private readonly logger?: Logger;
  private readonly onError?: TaskErrorHandler;
  private accepting = true;

  constructor(options: BackgroundTaskQueueOptions = {}) {
    this.logger = options.logger;
    this.onError = options.onError;
  }

  /** Tasks currently running */
  get size(): number {
    return this.inFlight.size;
  }

  get isAccepting(): boolean {
    return this.accepting;
  }

  /**
   * Start a task without waiting for it. Returns false once shut down.
   */
  dispatch(name: string, task: () => Promise<void>): boolean {
    if (!this.accepting) {
      this.logger?.warn({ task: name }, "Task dropped: queue is shut down");
      return false;
    }

    const tracked = this.run(name, task).finally(() => {
      this.inFlight.delete(tracked);
    });
    this.inFlight.add(tracked);
    return true;
  }

  /**
   * Run one step of a task, reporting its failure. Resolves to whether
   * the step succeeded, so later steps can still run.
   */
  async settle(name: string, step: () => Promise<unknown>): Promise<boolean> {
    try {
      await step();
      return true;
    } catch (err) {
      this.report(name, err);
      return false;
    }
  }

  /**
   * Wait until every task, including ones dispatched while waiting, is done.
   */
  async drain(): Promise<void> {
    while (this.inFlight.size > 0) {
      await Promise.all(this.inFlight);
    }
  }

  /**
   * Stop accepting tasks and wait up to `timeoutMs` for running ones.
   * Resolves to true when everything finished in time.
   */
  async shutdown(timeoutMs = 5000): Promise<boolean> {
    this.accepting = false;
    if (this.inFlight.size === 0) return true;

    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<false>((resolve) => {
      timer = setTimeout(() => resolve(false), timeoutMs);
    });

    try {
      const finished = await Promise.race([this.drain().then(() => true), timeout]);
      if (!finished) {
        this.logger?.warn({ pending: this.inFlight.size }, "Shutdown timed out with tasks still running");
      }
      return finished;
    } finally {
      clearTimeout(timer);
    }
  }

  private async run(name: string, task: () => Promise<void>): Promise<void> {
    try {
      await task();
    } catch (err) {
      this.report(name, err);
    }
  }

  private report(name: string, err: unknown): void {
    this.logger?.warn({ task: name, err }, "Background task failed");
    if (!this.onError) return;
    try {
      this.onError(name, err);
    } catch (hookErr) {
      this.logger?.error({ task: name, err: hookErr }, "Task error hook threw");
    }
  }
}
