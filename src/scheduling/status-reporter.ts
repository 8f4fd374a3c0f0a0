import type { Project } from '@/core/types.js';
import type { Logger } from '@/observability/logger.js';
import type { RefreshTask } from './types.js';

/** Periodically logs the project's cached state. Scheduled like any other task. */
export function createStatusReportTask(project: Project, logger: Logger): RefreshTask {
  return {
    name: 'status-report',
    kind: 'status-report',

    run(): Promise<void> {
      const snapshot = project.snapshot();
      logger.info(project.prettyPrint(), {
        component: 'status-report',
        projectId: project.id,
        projectType: project.type,
        detailsLoaded: snapshot.details !== undefined,
        statisticsLoaded: snapshot.loginStatistics !== undefined,
        lastUpdatedAt: snapshot.lastUpdatedAt?.toISOString(),
      });
      return Promise.resolve();
    },
  };
}
