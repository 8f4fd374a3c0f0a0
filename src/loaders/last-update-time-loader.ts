import type { Project } from '@/core/types.js';
import type { RefreshTask } from '@/scheduling/types.js';
import type { LoaderDeps } from './types.js';

/** Caches when the project's content last changed upstream. */
export function createLastUpdateTimeLoader(project: Project, deps: LoaderDeps): RefreshTask {
  const { source, logger } = deps;

  return {
    name: 'last-update-time',
    kind: 'last-update-time',

    async run(signal: AbortSignal): Promise<void> {
      const lastUpdatedAt = await source.fetchLastUpdateTime(project.id, signal);
      if (signal.aborted) return;

      project.updateLastUpdateTime(lastUpdatedAt);

      logger.debug('Last update time refreshed', {
        component: 'last-update-time-loader',
        projectId: project.id,
        lastUpdatedAt: lastUpdatedAt.toISOString(),
      });
    },
  };
}
