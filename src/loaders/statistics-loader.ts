/**
 * StatisticsLoader — caches the login server's activity figures for a project.
 */
import type { Project } from '@/core/types.js';
import type { RefreshTask } from '@/scheduling/types.js';
import type { LoaderDeps } from './types.js';

export function createStatisticsLoader(project: Project, deps: LoaderDeps): RefreshTask {
  const { source, logger, now = () => new Date() } = deps;

  return {
    name: 'login-statistics',
    kind: 'login-statistics',

    async run(signal: AbortSignal): Promise<void> {
      const record = await source.fetchLoginStatistics(project.id, signal);
      // Interrupted by a forced stop: keep the previous slice.
      if (signal.aborted) return;

      project.updateLoginStatistics({ ...record, fetchedAt: now() });

      logger.debug('Login statistics refreshed', {
        component: 'statistics-loader',
        projectId: project.id,
        activeUsers: record.activeUsers,
      });
    },
  };
}
