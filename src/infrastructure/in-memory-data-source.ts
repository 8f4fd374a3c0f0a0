/**
 * In-process ProjectDataSource backed by plain maps.
 *
 * Stands in for the login server and the project store when the refresher
 * runs without them (local runs, tests). An optional latency simulates
 * the round trip and honours the abort signal.
 */
import { setTimeout as delay } from 'node:timers/promises';
import { DataSourceError } from '@/core/errors.js';
import type { ProjectId } from '@/core/types.js';
import type {
  LoginStatisticsRecord,
  ProjectDataSource,
  ProjectDetailsRecord,
} from '@/loaders/types.js';

// ─── Types ──────────────────────────────────────────────────────

export interface ProjectDataSeed {
  details?: ProjectDetailsRecord;
  lastUpdatedAt?: Date;
  loginStatistics?: LoginStatisticsRecord;
}

export interface InMemoryProjectDataSourceOptions {
  /** Simulated round trip per fetch. Defaults to 0. */
  latencyMs?: number;
}

export interface InMemoryProjectDataSource extends ProjectDataSource {
  /** Register a project, or replace what is stored for it. */
  seed(projectId: ProjectId, data: ProjectDataSeed): void;
  /** Number of fetches served so far, across all projects and slices. */
  fetchCount(): number;
}

const SOURCE_NAME = 'in-memory';

const EMPTY_LOGIN_STATISTICS: LoginStatisticsRecord = {
  activeUsers: 0,
  loginsLastHour: 0,
  failedLoginsLastHour: 0,
};

// ─── Factory ────────────────────────────────────────────────────

export function createInMemoryProjectDataSource(
  options: InMemoryProjectDataSourceOptions = {},
): InMemoryProjectDataSource {
  const { latencyMs = 0 } = options;
  const records = new Map<ProjectId, ProjectDataSeed>();
  let fetches = 0;

  async function lookup(projectId: ProjectId, signal: AbortSignal): Promise<ProjectDataSeed> {
    if (latencyMs > 0) {
      await delay(latencyMs, undefined, { signal });
    }
    const record = records.get(projectId);
    if (!record) {
      throw new DataSourceError(SOURCE_NAME, `Unknown project ${projectId}`, { projectId });
    }
    fetches++;
    return record;
  }

  return {
    seed(projectId: ProjectId, data: ProjectDataSeed): void {
      records.set(projectId, { ...data });
    },

    fetchCount(): number {
      return fetches;
    },

    async fetchLoginStatistics(projectId, signal): Promise<LoginStatisticsRecord> {
      const record = await lookup(projectId, signal);
      return { ...(record.loginStatistics ?? EMPTY_LOGIN_STATISTICS) };
    },

    async fetchProjectDetails(projectId, signal): Promise<ProjectDetailsRecord> {
      const record = await lookup(projectId, signal);
      if (!record.details) {
        throw new DataSourceError(SOURCE_NAME, `No details stored for project ${projectId}`, {
          projectId,
        });
      }
      return { ...record.details };
    },

    async fetchLastUpdateTime(projectId, signal): Promise<Date> {
      const record = await lookup(projectId, signal);
      if (!record.lastUpdatedAt) {
        throw new DataSourceError(
          SOURCE_NAME,
          `No last update time stored for project ${projectId}`,
          { projectId },
        );
      }
      return new Date(record.lastUpdatedAt.getTime());
    },
  };
}
