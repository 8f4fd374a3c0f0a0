// Loaders — refresh tasks that copy one slice of external data into a project
export type {
  LoaderDeps,
  LoginStatisticsRecord,
  ProjectDataSource,
  ProjectDetailsRecord,
} from './types.js';

export { createStatisticsLoader } from './statistics-loader.js';
export { createProjectDetailsLoader } from './project-details-loader.js';
export { createLastUpdateTimeLoader } from './last-update-time-loader.js';
