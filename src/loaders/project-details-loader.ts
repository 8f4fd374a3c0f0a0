import type { Project } from '@/core/types.js';
import type { RefreshTask } from '@/scheduling/types.js';
import type { LoaderDeps } from './types.js';

/** Caches the project's descriptive record from the persistence store. */
export function createProjectDetailsLoader(project: Project, deps: LoaderDeps): RefreshTask {
  const { source, logger, now = () => new Date() } = deps;

  return {
    name: 'project-details',
    kind: 'project-details',

    async run(signal: AbortSignal): Promise<void> {
      const record = await source.fetchProjectDetails(project.id, signal);
      if (signal.aborted) return;

      project.updateDetails({ ...record, fetchedAt: now() });

      logger.debug('Project details refreshed', {
        component: 'project-details-loader',
        projectId: project.id,
        owner: record.owner,
      });
    },
  };
}
