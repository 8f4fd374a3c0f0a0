/**
 * Starts a set of schedulers one after another and stops the started
 * ones on shutdown or when the run duration elapses.
 *
 * Shutdown aborts the run's pending waits, so no scheduler starts after it
 * and no timer outlives it.
 */
import type { Logger } from '@/observability/logger.js';
import type { RefreshScheduler } from './refresh-scheduler.js';

// ─── Types ──────────────────────────────────────────────────────

export interface SchedulerRunOptions {
  schedulers: readonly RefreshScheduler[];
  /** Delay between starting consecutive schedulers. */
  startStaggerMs: number;
  /** Shut down after this long. Runs until `shutdown()` when omitted. */
  runDurationMs?: number;
  logger: Logger;
}

export interface SchedulerRun {
  /** Settles when the start phase and the run duration, if any, are over. */
  readonly done: Promise<void>;
  /** Stop every running scheduler. Repeated calls share the first call's promise. */
  shutdown(): Promise<void>;
}

const COMPONENT = 'scheduler-run';

/** Wait `ms`; resolves false instead if the signal aborts first. */
function pause(ms: number, signal: AbortSignal): Promise<boolean> {
  return new Promise((resolve) => {
    if (signal.aborted) {
      resolve(false);
      return;
    }
    const onAbort = (): void => {
      clearTimeout(timer);
      resolve(false);
    };
    const timer = setTimeout(() => {
      signal.removeEventListener('abort', onAbort);
      resolve(true);
    }, ms);
    signal.addEventListener('abort', onAbort, { once: true });
  });
}

// ─── Factory ────────────────────────────────────────────────────

export function runSchedulers(options: SchedulerRunOptions): SchedulerRun {
  const { schedulers, startStaggerMs, runDurationMs, logger } = options;
  const lifetime = new AbortController();
  let shutdownPromise: Promise<void> | null = null;

  async function stopStarted(): Promise<void> {
    logger.info('Shutting down...', { component: COMPONENT });
    const started = schedulers.filter((scheduler) => scheduler.getState() === 'running');
    await Promise.all(started.map((scheduler) => scheduler.stop()));
    logger.info('All schedulers stopped', { component: COMPONENT, stopped: started.length });
  }

  function shutdown(): Promise<void> {
    if (!shutdownPromise) {
      lifetime.abort();
      shutdownPromise = stopStarted();
    }
    return shutdownPromise;
  }

  async function run(): Promise<void> {
    for (const [index, scheduler] of schedulers.entries()) {
      if (index > 0 && startStaggerMs > 0 && !(await pause(startStaggerMs, lifetime.signal))) {
        return;
      }
      if (lifetime.signal.aborted) return;
      scheduler.start();
    }

    if (runDurationMs !== undefined && (await pause(runDurationMs, lifetime.signal))) {
      await shutdown();
    }
  }

  return { done: run(), shutdown };
}
