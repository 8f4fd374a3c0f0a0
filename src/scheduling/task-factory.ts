/**
 * Task factory — picks the refresh tasks for a project's type and builds
 * the project's scheduler around them.
 */
import { UnsupportedProjectTypeError } from '@/core/errors.js';
import type { Result } from '@/core/result.js';
import { err, isErr, ok } from '@/core/result.js';
import type { Project, ProjectType } from '@/core/types.js';
import type { SchedulerConfig } from '@/config/types.js';
import { createLastUpdateTimeLoader } from '@/loaders/last-update-time-loader.js';
import { createProjectDetailsLoader } from '@/loaders/project-details-loader.js';
import { createStatisticsLoader } from '@/loaders/statistics-loader.js';
import type { LoaderDeps } from '@/loaders/types.js';
import { createRefreshScheduler } from './refresh-scheduler.js';
import type { RefreshScheduler } from './refresh-scheduler.js';
import { createStatusReportTask } from './status-reporter.js';
import type { RefreshTask } from './types.js';

// ─── Types ──────────────────────────────────────────────────────

export type TaskBuilder = (project: Project, deps: LoaderDeps) => RefreshTask;

/** Ordered task builders per project type. A missing type is unsupported. */
export type TaskSetMap = Partial<Record<ProjectType, readonly TaskBuilder[]>>;

export interface SchedulerFactoryDeps extends LoaderDeps {
  config?: Partial<SchedulerConfig>;
  /** Replaces DEFAULT_TASK_SETS. */
  taskSets?: TaskSetMap;
}

// ─── Mapping ────────────────────────────────────────────────────

export const DEFAULT_TASK_SETS: TaskSetMap = {
  STATIC: [createStatisticsLoader],
  LIVE: [createProjectDetailsLoader, createLastUpdateTimeLoader, createStatisticsLoader],
};

// ─── Factory ────────────────────────────────────────────────────

/** Build fresh refresh tasks for the project, bound to it alone. */
export function tasksForProject(
  project: Project,
  deps: SchedulerFactoryDeps,
): Result<RefreshTask[], UnsupportedProjectTypeError> {
  const taskSets = deps.taskSets ?? DEFAULT_TASK_SETS;
  const builders = taskSets[project.type];
  if (!builders) {
    return err(new UnsupportedProjectTypeError(project.id, project.type, Object.keys(taskSets)));
  }
  return ok(builders.map((build) => build(project, deps)));
}

/**
 * Create a scheduler for the project. The scheduler is not started.
 * Fails with UnsupportedProjectTypeError when the type has no task set.
 */
export function createSchedulerForProject(
  project: Project,
  deps: SchedulerFactoryDeps,
): Result<RefreshScheduler, UnsupportedProjectTypeError> {
  const tasks = tasksForProject(project, deps);
  if (isErr(tasks)) return tasks;

  return ok(
    createRefreshScheduler({
      project,
      tasks: tasks.value,
      statusTask: createStatusReportTask(project, deps.logger),
      config: deps.config,
      logger: deps.logger,
    }),
  );
}
