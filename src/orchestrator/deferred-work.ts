import { env } from '../config/env';
import { logger } from '../observability/logger';
import { deferredJobs } from '../observability/metrics';

export type DeferredJob = () => Promise<void>;

interface QueuedJob {
  name: string;
  job: DeferredJob;
}

/**
 * In-process worker pool for work that must not delay the caller's response.
 * schedule() returns immediately; failures are logged and counted, never surfaced.
 */
export class DeferredWorkQueue {
  private readonly queue: QueuedJob[] = [];
  private active = 0;
  private idleWaiters: Array<() => void> = [];
  private readonly log = logger.child({ component: 'deferred-work' });

  constructor(private readonly concurrency: number = env.deferred.concurrency) {
    if (concurrency < 1) {
      throw new Error(`Deferred work concurrency must be at least 1, got ${concurrency}`);
    }
  }

  schedule(name: string, job: DeferredJob): void {
    this.queue.push({ name, job });
    // Start on a later tick so the caller's response is never waiting on the job
    setImmediate(() => this.pump());
  }

  /** Jobs queued or running */
  get pendingCount(): number {
    return this.queue.length + this.active;
  }

  /** Resolves once every scheduled job has settled. For shutdown and tests. */
  drain(): Promise<void> {
    if (this.pendingCount === 0) return Promise.resolve();
    return new Promise((resolve) => this.idleWaiters.push(resolve));
  }

  private pump(): void {
    while (this.active < this.concurrency) {
      const next = this.queue.shift();
      if (!next) break;
      this.active++;
      void this.execute(next).finally(() => {
        this.active--;
        this.pump();
      });
    }
    this.notifyIfIdle();
  }

  private async execute({ name, job }: QueuedJob): Promise<void> {
    const start = Date.now();
    try {
      await job();
      deferredJobs.inc({ job: name, status: 'ok' });
      this.log.debug({ job: name, durationMs: Date.now() - start }, 'Deferred job completed');
    } catch (err) {
      deferredJobs.inc({ job: name, status: 'error' });
      this.log.error({ err, job: name, durationMs: Date.now() - start }, 'Deferred job failed');
    }
  }

  private notifyIfIdle(): void {
    if (this.pendingCount > 0 || this.idleWaiters.length === 0) return;
    const waiters = this.idleWaiters;
    this.idleWaiters = [];
    for (const resolve of waiters) resolve();
  }
}
