export { createProject, formatProjectSnapshot } from './project.js';
export type { CreateProjectInput } from './project.js';
