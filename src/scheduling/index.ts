// Scheduling module — refresh task types, factory, scheduler, and worker pool
export type {
  RefreshTask,
  RefreshTaskKind,
  SchedulerState,
  StopReport,
  TaskStats,
} from './types.js';

export { createSchedulerForProject, tasksForProject, DEFAULT_TASK_SETS } from './task-factory.js';
export type { SchedulerFactoryDeps, TaskBuilder, TaskSetMap } from './task-factory.js';

export { createRefreshScheduler, DEFAULT_POOL_SIZE } from './refresh-scheduler.js';
export type { RefreshScheduler, RefreshSchedulerOptions } from './refresh-scheduler.js';

export { createStatusReportTask } from './status-reporter.js';

export { createWorkerPool } from './worker-pool.js';
export type { PoolJob, WorkerPool, WorkerPoolOptions } from './worker-pool.js';

export { runSchedulers } from './scheduler-run.js';
export type { SchedulerRun, SchedulerRunOptions } from './scheduler-run.js';
