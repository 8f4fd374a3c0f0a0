/**
 * RefreshScheduler — runs a project's refresh tasks at a fixed rate on
 * the scheduler's own worker pool.
 *
 * Firing k of a task is due at `start + initialDelay + k * period`,
 * however long earlier executions took. A failed execution is logged and
 * counted; the task fires again on its next tick. `stop()` blocks for at
 * most the shutdown grace window.
 */
import { SchedulerStateError, ShutdownTimeoutError, TaskExecutionError, ValidationError } from '@/core/errors.js';
import type { Project } from '@/core/types.js';
import { schedulerConfigSchema } from '@/config/schema.js';
import type { SchedulerConfig } from '@/config/types.js';
import type { Logger } from '@/observability/logger.js';
import { createWorkerPool } from './worker-pool.js';
import type { WorkerPool } from './worker-pool.js';
import type { RefreshTask, SchedulerState, StopReport, TaskStats } from './types.js';

// ─── Types ──────────────────────────────────────────────────────

export interface RefreshSchedulerOptions {
  project: Project;
  /** Refresh tasks, fired immediately and then every `reloadPeriodMs`. */
  tasks: readonly RefreshTask[];
  /** Fired after `statusInitialDelayMs`, then every `statusPeriodMs`. */
  statusTask?: RefreshTask;
  config?: Partial<SchedulerConfig>;
  logger: Logger;
}

export interface RefreshScheduler {
  readonly project: Project;
  /** The bound refresh tasks, status task excluded. */
  readonly tasks: readonly RefreshTask[];
  readonly poolSize: number;
  /** Throws SchedulerStateError unless the scheduler is fresh. */
  start(): void;
  /**
   * Rejects with SchedulerStateError before `start()`. Repeated calls
   * share the first call's report.
   */
  stop(): Promise<StopReport>;
  getState(): SchedulerState;
  /** Stats per task name, status task included. */
  getTaskStats(): Record<string, TaskStats>;
}

interface ScheduledUnit {
  task: RefreshTask;
  initialDelayMs: number;
  periodMs: number;
  inFlight: number;
  stats: TaskStats;
  timer?: ReturnType<typeof setTimeout>;
}

// ─── Constants ──────────────────────────────────────────────────

/** Smallest pool a scheduler gets when no size is configured. */
export const DEFAULT_POOL_SIZE = 4;

const COMPONENT = 'refresh-scheduler';

// ─── Config ─────────────────────────────────────────────────────

/**
 * Apply defaults and validate programmatic overrides with the same schema
 * the config file goes through. Keys set to `undefined` take the default.
 */
function resolveSchedulerConfig(
  project: Project,
  overrides: Partial<SchedulerConfig> = {},
): SchedulerConfig {
  const parsed = schedulerConfigSchema.safeParse(overrides);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => ({
      path: issue.path.join('.'),
      message: issue.message,
    }));
    throw new ValidationError(
      `Invalid scheduler configuration: ${issues.map((i) => `${i.path}: ${i.message}`).join('; ')}`,
      { projectId: project.id, issues },
    );
  }
  return parsed.data;
}

// ─── Factory ────────────────────────────────────────────────────

export function createRefreshScheduler(options: RefreshSchedulerOptions): RefreshScheduler {
  const { project, tasks, statusTask, logger } = options;
  const config = resolveSchedulerConfig(project, options.config);

  const units: ScheduledUnit[] = tasks.map((task) => ({
    task,
    initialDelayMs: 0,
    periodMs: config.reloadPeriodMs,
    inFlight: 0,
    stats: { executions: 0, failures: 0, skipped: 0 },
  }));
  if (statusTask) {
    units.push({
      task: statusTask,
      initialDelayMs: config.statusInitialDelayMs,
      periodMs: config.statusPeriodMs,
      inFlight: 0,
      stats: { executions: 0, failures: 0, skipped: 0 },
    });
  }

  const names = units.map((unit) => unit.task.name);
  const duplicate = names.find((name, index) => names.indexOf(name) !== index);
  if (duplicate !== undefined) {
    throw new ValidationError(`Duplicate refresh task name "${duplicate}"`, {
      projectId: project.id,
      taskNames: names,
    });
  }

  // One worker per unit, status task included, so no firing waits for a free worker.
  const poolSize = config.poolSize ?? Math.max(DEFAULT_POOL_SIZE, units.length);

  let state: SchedulerState = 'created';
  let pool: WorkerPool | null = null;
  let stopPromise: Promise<StopReport> | null = null;

  async function execute(unit: ScheduledUnit, signal: AbortSignal): Promise<void> {
    const { task, stats } = unit;
    stats.executions++;
    stats.lastStartedAt = new Date();
    try {
      await task.run(signal);
    } catch (error) {
      const failure = new TaskExecutionError(
        task.name,
        project.id,
        error instanceof Error ? error : new Error(String(error)),
      );
      stats.failures++;
      stats.lastError = failure.message;
      logger.error(failure.message, {
        component: COMPONENT,
        projectId: project.id,
        taskName: task.name,
        code: failure.code,
      });
    } finally {
      unit.inFlight--;
      stats.lastCompletedAt = new Date();
    }
  }

  function fire(unit: ScheduledUnit): void {
    const activePool = pool;
    if (state !== 'running' || !activePool) return;

    if (config.overlapPolicy === 'skip' && unit.inFlight > 0) {
      unit.stats.skipped++;
      logger.debug('Skipping firing, previous execution still in flight', {
        component: COMPONENT,
        projectId: project.id,
        taskName: unit.task.name,
      });
      return;
    }

    unit.inFlight++;
    if (!activePool.submit((signal) => execute(unit, signal))) {
      unit.inFlight--;
    }
  }

  function arm(unit: ScheduledUnit, anchor: number, firing: number): void {
    const dueAt = anchor + unit.initialDelayMs + firing * unit.periodMs;
    unit.timer = setTimeout(() => {
      fire(unit);
      arm(unit, anchor, firing + 1);
    }, Math.max(0, dueAt - Date.now()));
  }

  async function drainAndStop(activePool: WorkerPool): Promise<StopReport> {
    state = 'stopping';
    const began = Date.now();
    logger.info(`Stopping data refresh for project "${project.name}"`, {
      component: COMPONENT,
      projectId: project.id,
    });

    for (const unit of units) {
      clearTimeout(unit.timer);
      unit.timer = undefined;
    }
    activePool.shutdown();

    const drained = await activePool.awaitTermination(config.shutdownGraceMs);
    let cancelled = 0;
    if (!drained) {
      const outstanding = activePool.activeCount() + activePool.queuedCount();
      cancelled = activePool.shutdownNow();
      const timeout = new ShutdownTimeoutError(project.id, config.shutdownGraceMs, outstanding);
      logger.warn(timeout.message, {
        component: COMPONENT,
        projectId: project.id,
        code: timeout.code,
        cancelled,
      });
    }

    pool = null;
    state = 'stopped';

    const report: StopReport = { drained, cancelled, durationMs: Date.now() - began };
    logger.info('Data refresh stopped', {
      component: COMPONENT,
      projectId: project.id,
      ...report,
    });
    return report;
  }

  return {
    project,
    tasks,
    poolSize,

    start(): void {
      if (state !== 'created') {
        throw new SchedulerStateError('start', state, project.id);
      }

      logger.info(`Starting data refresh for project "${project.name}", type: ${project.type}`, {
        component: COMPONENT,
        projectId: project.id,
        projectType: project.type,
        tasks: names,
        poolSize,
      });

      pool = createWorkerPool({ size: poolSize, logger, name: `${COMPONENT}:${project.id}` });
      state = 'running';

      const anchor = Date.now();
      for (const unit of units) {
        arm(unit, anchor, 0);
      }
    },

    stop(): Promise<StopReport> {
      if (stopPromise) return stopPromise;

      const activePool = pool;
      if (state !== 'running' || !activePool) {
        return Promise.reject(new SchedulerStateError('stop', state, project.id));
      }

      stopPromise = drainAndStop(activePool);
      return stopPromise;
    },

    getState: () => state,

    getTaskStats(): Record<string, TaskStats> {
      const result: Record<string, TaskStats> = {};
      for (const unit of units) {
        result[unit.task.name] = { ...unit.stats };
      }
      return result;
    },
  };
}
