/**
 * Base error class for all refresher errors.
 * Extends Error with a machine-readable code and structured context.
 */
export class RefresherError extends Error {
  public readonly code: string;
  public readonly context?: Record<string, unknown>;
  public readonly isOperational: boolean;

  constructor(params: {
    message: string;
    code: string;
    cause?: Error;
    context?: Record<string, unknown>;
    isOperational?: boolean;
  }) {
    super(params.message, { cause: params.cause });
    this.name = 'RefresherError';
    this.code = params.code;
    this.context = params.context;
    this.isOperational = params.isOperational ?? true;
  }
}

/** Returned by the task factory when no task set is registered for a project type. */
export class UnsupportedProjectTypeError extends RefresherError {
  constructor(projectId: string, projectType: string, supportedTypes: string[]) {
    super({
      message: `Unsupported project type "${projectType}" for project ${projectId}`,
      code: 'UNSUPPORTED_PROJECT_TYPE',
      context: { projectId, projectType, supportedTypes },
    });
    this.name = 'UnsupportedProjectTypeError';
  }
}

/** Wraps a failure raised inside a single task execution. */
export class TaskExecutionError extends RefresherError {
  constructor(taskName: string, projectId: string, cause?: Error) {
    super({
      message: `Refresh task "${taskName}" failed for project ${projectId}: ${cause?.message ?? 'unknown error'}`,
      code: 'TASK_EXECUTION_FAILED',
      cause,
      context: { taskName, projectId },
    });
    this.name = 'TaskExecutionError';
  }
}

/** Executions were still running when the shutdown grace window ran out. */
export class ShutdownTimeoutError extends RefresherError {
  constructor(projectId: string, graceMs: number, outstanding: number) {
    super({
      message: `Shutdown grace window of ${graceMs}ms elapsed for project ${projectId} with ${outstanding} execution(s) outstanding`,
      code: 'SHUTDOWN_TIMEOUT',
      context: { projectId, graceMs, outstanding },
    });
    this.name = 'ShutdownTimeoutError';
  }
}

/** Thrown on a start/stop call the scheduler's current state does not allow. */
export class SchedulerStateError extends RefresherError {
  constructor(operation: 'start' | 'stop', state: string, projectId: string) {
    super({
      message: `Cannot ${operation} scheduler for project ${projectId} in state '${state}'`,
      code: 'SCHEDULER_STATE',
      context: { operation, state, projectId },
    });
    this.name = 'SchedulerStateError';
  }
}

/** Thrown when input validation fails. */
export class ValidationError extends RefresherError {
  constructor(message: string, context?: Record<string, unknown>) {
    super({
      message,
      code: 'VALIDATION_ERROR',
      context,
    });
    this.name = 'ValidationError';
  }
}

/** Thrown when a project data source cannot serve a request. */
export class DataSourceError extends RefresherError {
  constructor(source: string, message: string, context?: Record<string, unknown>) {
    super({
      message: `Data source "${source}" error: ${message}`,
      code: 'DATA_SOURCE_ERROR',
      context: { source, ...context },
    });
    this.name = 'DataSourceError';
  }
}
