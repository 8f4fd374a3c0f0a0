import type { Logger } from '@/observability/logger.js';
import type { ProjectId } from '@/core/types.js';

/** Login-server figures, before the fetch time is stamped on. */
export interface LoginStatisticsRecord {
  activeUsers: number;
  loginsLastHour: number;
  failedLoginsLastHour: number;
}

export interface ProjectDetailsRecord {
  description: string;
  owner: string;
  memberCount: number;
}

/**
 * The expensive external systems the cache shields callers from:
 * the login server and the project persistence store.
 */
export interface ProjectDataSource {
  fetchLoginStatistics(projectId: ProjectId, signal: AbortSignal): Promise<LoginStatisticsRecord>;
  fetchProjectDetails(projectId: ProjectId, signal: AbortSignal): Promise<ProjectDetailsRecord>;
  fetchLastUpdateTime(projectId: ProjectId, signal: AbortSignal): Promise<Date>;
}

/** Dependencies every loader is built with. */
export interface LoaderDeps {
  source: ProjectDataSource;
  logger: Logger;
  /** Clock used to stamp fetched slices. Defaults to `new Date()`. */
  now?: () => Date;
}
