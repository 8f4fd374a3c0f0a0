// ─── Logging ────────────────────────────────────────────────────

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'fatal';

export interface LogContext {
  projectId?: string;
  taskName?: string;
  component: string;
  [key: string]: unknown;
}
