import type { Project, ProjectType } from '@/core/types.js';
import { createInMemoryProjectDataSource } from '@/infrastructure/in-memory-data-source.js';
import type { InMemoryProjectDataSource } from '@/infrastructure/in-memory-data-source.js';
import { createProject } from '@/projects/project.js';

/** Create a project with a fixed id so assertions can name it. */
export function createTestProject(
  type: ProjectType = 'LIVE',
  overrides?: { id?: string; name?: string },
): Project {
  return createProject({
    id: overrides?.id ?? 'proj-1',
    name: overrides?.name ?? 'Test Project',
    type,
  });
}

/** Data source seeded with every slice for the given projects. */
export function createSeededDataSource(...projects: Project[]): InMemoryProjectDataSource {
  const source = createInMemoryProjectDataSource();
  for (const project of projects) {
    source.seed(project.id, {
      details: { description: `${project.name} description`, owner: 'test-owner', memberCount: 4 },
      lastUpdatedAt: new Date('2026-01-01T00:00:00.000Z'),
      loginStatistics: { activeUsers: 7, loginsLastHour: 20, failedLoginsLastHour: 1 },
    });
  }
  return source;
}
