/**
 * In-memory project — identity plus the cached state slices the refresh
 * tasks keep current. Each slice is replaced wholesale, never merged.
 */
import { nanoid } from 'nanoid';
import type {
  LoginStatistics,
  Project,
  ProjectDetails,
  ProjectId,
  ProjectSnapshot,
  ProjectType,
} from '@/core/types.js';

export interface CreateProjectInput {
  id?: string;
  name: string;
  type: ProjectType;
}

function formatDate(date: Date | undefined): string {
  return date ? date.toISOString() : 'never';
}

/** Render a snapshot as an indented, multi-line block. */
export function formatProjectSnapshot(snapshot: ProjectSnapshot): string {
  const lines = [`Project "${snapshot.name}" (${snapshot.id}), type: ${snapshot.type}`];

  const { details, loginStatistics } = snapshot;
  if (details) {
    lines.push(
      `  details: ${details.description} (owner: ${details.owner}, members: ${details.memberCount}, fetched: ${formatDate(details.fetchedAt)})`,
    );
  } else {
    lines.push('  details: not loaded');
  }

  lines.push(`  last updated: ${formatDate(snapshot.lastUpdatedAt)}`);

  if (loginStatistics) {
    lines.push(
      `  logins: ${loginStatistics.activeUsers} active, ${loginStatistics.loginsLastHour} in the last hour, ${loginStatistics.failedLoginsLastHour} failed (fetched: ${formatDate(loginStatistics.fetchedAt)})`,
    );
  } else {
    lines.push('  logins: not loaded');
  }

  return lines.join('\n');
}

/** Create a project with empty cached state. */
export function createProject(input: CreateProjectInput): Project {
  const id = (input.id ?? nanoid()) as ProjectId;
  const { name, type } = input;

  let loginStatistics: LoginStatistics | undefined;
  let details: ProjectDetails | undefined;
  let lastUpdatedAt: Date | undefined;

  const snapshot = (): ProjectSnapshot => ({
    id,
    name,
    type,
    loginStatistics: loginStatistics ? { ...loginStatistics } : undefined,
    details: details ? { ...details } : undefined,
    lastUpdatedAt,
  });

  return {
    id,
    name,
    type,

    updateLoginStatistics(stats: LoginStatistics): void {
      loginStatistics = { ...stats };
    },

    updateDetails(next: ProjectDetails): void {
      details = { ...next };
    },

    updateLastUpdateTime(next: Date): void {
      lastUpdatedAt = next;
    },

    snapshot,

    prettyPrint(): string {
      return formatProjectSnapshot(snapshot());
    },
  };
}
