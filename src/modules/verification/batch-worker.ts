import { moduleLogger } from '../../utils/logger';

const log = moduleLogger('batch-worker');

export interface BatchTaskProcessor {
  process(taskId: string): Promise<void>;
}

/**
 * In-process queue of batch task ids drained by at most `concurrency`
 * runners. A task id already queued or running is not queued twice.
 * Tasks left unfinished by a crash are re-enqueued at startup by the
 * orchestrator (see VerificationBatchService.resumeUnfinished).
 */
export class BatchWorker {
  private readonly queue: string[] = [];
  private readonly tracked = new Set<string>();
  private active = 0;
  private stopped = false;
  private idleWaiters: Array<() => void> = [];

  constructor(private readonly processor: BatchTaskProcessor, private readonly concurrency = 1) {
    if (!Number.isInteger(concurrency) || concurrency < 1) {
      throw new Error(`Batch worker concurrency must be a positive integer, got ${concurrency}`);
    }
  }

  enqueue(taskId: string): boolean {
    if (this.stopped) {
      log.warn({ taskId }, 'worker stopped, task not queued');
      return false;
    }
    if (this.tracked.has(taskId)) {
      return false;
    }
    this.tracked.add(taskId);
    this.queue.push(taskId);
    log.debug({ taskId, queued: this.queue.length }, 'task queued');
    this.drain();
    return true;
  }

  /** Resolves once nothing is queued or running. */
  onIdle(): Promise<void> {
    if (this.isIdle()) return Promise.resolve();
    return new Promise((resolve) => {
      this.idleWaiters.push(resolve);
    });
  }

  /** Stops taking new tasks; queued ones are dropped and picked up again by recovery. */
  async stop(): Promise<void> {
    this.stopped = true;
    for (const taskId of this.queue.splice(0)) {
      this.tracked.delete(taskId);
    }
    await this.onIdle();
  }

  private isIdle(): boolean {
    return this.active === 0 && this.queue.length === 0;
  }

  private drain(): void {
    while (!this.stopped && this.active < this.concurrency && this.queue.length > 0) {
      const taskId = this.queue.shift();
      if (taskId === undefined) break;
      this.active++;
      this.run(taskId).catch((error) => {
        log.error({ err: error, taskId }, 'batch runner crashed');
      });
    }
    this.notifyIfIdle();
  }

  private async run(taskId: string): Promise<void> {
    const startedAt = Date.now();
    try {
      await this.processor.process(taskId);
      log.info({ taskId, durationMs: Date.now() - startedAt }, 'batch task finished');
    } catch (error) {
      // Only when the task could not even be marked Failed; recovery resumes it on next start
      log.error({ err: error, taskId }, 'batch task aborted');
    } finally {
      this.active--;
      this.tracked.delete(taskId);
      this.drain();
    }
  }

  private notifyIfIdle(): void {
    if (!this.isIdle()) return;
    const waiters = this.idleWaiters;
    this.idleWaiters = [];
    for (const resolve of waiters) resolve();
  }
}
