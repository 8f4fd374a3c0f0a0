/**
 * Refresh scheduling — types shared by the task factory, the scheduler,
 * and the worker pool.
 *
 * A scheduler moves through `created → running → stopping → stopped`
 * exactly once.
 */

// ─── Enums ──────────────────────────────────────────────────────

export type RefreshTaskKind =
  | 'login-statistics'
  | 'project-details'
  | 'last-update-time'
  | 'status-report';

export type SchedulerState = 'created' | 'running' | 'stopping' | 'stopped';

// ─── Refresh Task ───────────────────────────────────────────────

/** One periodic unit of work bound to a single project. */
export interface RefreshTask {
  /** Unique within a scheduler; keys the task's stats. */
  readonly name: string;
  readonly kind: RefreshTaskKind;
  /**
   * Execute one refresh cycle. The signal is aborted only when a stop
   * gives up waiting for in-flight work.
   */
  run(signal: AbortSignal): Promise<void>;
}

// ─── Observation ────────────────────────────────────────────────

export interface TaskStats {
  /** Executions started, failed ones included. */
  executions: number;
  failures: number;
  /** Firings dropped because the previous execution had not finished. */
  skipped: number;
  lastStartedAt?: Date;
  lastCompletedAt?: Date;
  lastError?: string;
}

export interface StopReport {
  /** True when every execution finished inside the grace window. */
  drained: boolean;
  /** Executions dropped from the queue or interrupted at the deadline. */
  cancelled: number;
  durationMs: number;
}
