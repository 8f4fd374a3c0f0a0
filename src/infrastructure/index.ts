export { createInMemoryProjectDataSource } from './in-memory-data-source.js';
export type {
  InMemoryProjectDataSource,
  InMemoryProjectDataSourceOptions,
  ProjectDataSeed,
} from './in-memory-data-source.js';
