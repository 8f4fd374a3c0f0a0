// ─── Branded ID Types ────────────────────────────────────────────

declare const __brand: unique symbol;
type Brand<T, B> = T & { readonly [__brand]: B };

export type ProjectId = Brand<string, 'ProjectId'>;

// ─── Project Type ───────────────────────────────────────────────

/** Every project type the refresher knows about. */
export const PROJECT_TYPES = ['STATIC', 'LIVE'] as const;

/** Decides which refresh tasks apply to a project. Fixed at creation. */
export type ProjectType = (typeof PROJECT_TYPES)[number];

// ─── Cached State Slices ────────────────────────────────────────

export interface LoginStatistics {
  activeUsers: number;
  loginsLastHour: number;
  failedLoginsLastHour: number;
  /** When the login server answered. */
  fetchedAt: Date;
}

export interface ProjectDetails {
  description: string;
  owner: string;
  memberCount: number;
  fetchedAt: Date;
}

/** Plain copy of a project's identity and cached state. */
export interface ProjectSnapshot {
  id: ProjectId;
  name: string;
  type: ProjectType;
  loginStatistics?: LoginStatistics;
  details?: ProjectDetails;
  lastUpdatedAt?: Date;
}

// ─── Project ────────────────────────────────────────────────────

/**
 * A project whose externally sourced data is cached in memory.
 * Identity is immutable; each state slice is written by one refresh task.
 */
export interface Project {
  readonly id: ProjectId;
  readonly name: string;
  readonly type: ProjectType;
  updateLoginStatistics(stats: LoginStatistics): void;
  updateDetails(details: ProjectDetails): void;
  updateLastUpdateTime(lastUpdatedAt: Date): void;
  snapshot(): ProjectSnapshot;
  /** Multi-line, human-readable rendering of the snapshot. */
  prettyPrint(): string;
}
