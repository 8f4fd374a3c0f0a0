// Core module — shared types, Result, and error hierarchy
export type {
  LoginStatistics,
  Project,
  ProjectDetails,
  ProjectId,
  ProjectSnapshot,
  ProjectType,
} from './types.js';
export { PROJECT_TYPES } from './types.js';

export type { Result } from './result.js';
export { ok, err, isOk, isErr, unwrap } from './result.js';

export {
  RefresherError,
  UnsupportedProjectTypeError,
  TaskExecutionError,
  ShutdownTimeoutError,
  SchedulerStateError,
  ValidationError,
  DataSourceError,
} from './errors.js';
