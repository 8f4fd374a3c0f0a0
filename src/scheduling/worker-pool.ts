/**
 * WorkerPool — fixed-capacity, in-process executor.
 *
 * Jobs wait in a FIFO queue and at most `size` run at once. Shutdown has
 * two stages: `shutdown()` refuses new jobs but lets queued ones run;
 * `shutdownNow()` drops the queue and aborts the signal every job holds.
 */
import { ValidationError } from '@/core/errors.js';
import type { Logger } from '@/observability/logger.js';

// ─── Types ──────────────────────────────────────────────────────

export type PoolJob = (signal: AbortSignal) => Promise<void>;

export interface WorkerPoolOptions {
  size: number;
  logger: Logger;
  /** Included in log context to tell pools apart. */
  name?: string;
}

export interface WorkerPool {
  readonly size: number;
  activeCount(): number;
  queuedCount(): number;
  isShutdown(): boolean;
  /** Queue a job. Returns false once the pool has been shut down. */
  submit(job: PoolJob): boolean;
  /** Stop accepting jobs. Queued and running jobs continue. */
  shutdown(): void;
  /**
   * Resolve true as soon as nothing is queued or running,
   * or false once `timeoutMs` has passed.
   */
  awaitTermination(timeoutMs: number): Promise<boolean>;
  /**
   * Drop queued jobs and abort running ones.
   * Returns how many jobs were dropped or interrupted.
   */
  shutdownNow(): number;
}

// ─── Factory ────────────────────────────────────────────────────

export function createWorkerPool(options: WorkerPoolOptions): WorkerPool {
  const { size, logger, name = 'worker-pool' } = options;

  if (!Number.isInteger(size) || size < 1) {
    throw new ValidationError(`Worker pool size must be a positive integer, got ${size}`, {
      size,
      pool: name,
    });
  }

  const queue: PoolJob[] = [];
  const controller = new AbortController();
  let drainWaiters: (() => void)[] = [];
  let active = 0;
  let accepting = true;
  let halted = false;

  const isIdle = (): boolean => active === 0 && queue.length === 0;

  function notifyIfIdle(): void {
    if (!isIdle()) return;
    const waiters = drainWaiters;
    drainWaiters = [];
    for (const waiter of waiters) waiter();
  }

  async function execute(job: PoolJob): Promise<void> {
    active++;
    try {
      await job(controller.signal);
    } catch (error) {
      logger.error('Worker pool job failed', {
        component: 'worker-pool',
        pool: name,
        error: error instanceof Error ? error.message : String(error),
      });
    } finally {
      active--;
      pump();
      notifyIfIdle();
    }
  }

  function pump(): void {
    while (!halted && active < size) {
      const job = queue.shift();
      if (!job) return;
      void execute(job);
    }
  }

  return {
    size,

    activeCount: () => active,

    queuedCount: () => queue.length,

    isShutdown: () => !accepting,

    submit(job: PoolJob): boolean {
      if (!accepting) return false;
      queue.push(job);
      pump();
      return true;
    },

    shutdown(): void {
      accepting = false;
    },

    awaitTermination(timeoutMs: number): Promise<boolean> {
      if (isIdle()) return Promise.resolve(true);

      return new Promise<boolean>((resolve) => {
        const onDrain = (): void => {
          clearTimeout(timer);
          resolve(true);
        };
        const timer = setTimeout(() => {
          drainWaiters = drainWaiters.filter((waiter) => waiter !== onDrain);
          resolve(false);
        }, timeoutMs);
        drainWaiters.push(onDrain);
      });
    },

    shutdownNow(): number {
      accepting = false;
      halted = true;
      const dropped = queue.splice(0, queue.length).length;
      const interrupted = active;
      controller.abort();

      logger.debug('Worker pool halted', {
        component: 'worker-pool',
        pool: name,
        dropped,
        interrupted,
      });

      return dropped + interrupted;
    },
  };
}
