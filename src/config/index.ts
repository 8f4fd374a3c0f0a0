// ─── Types ──────────────────────────────────────────────────────
export type {
  OverlapPolicy,
  ProjectDefinition,
  RefresherConfig,
  SchedulerConfig,
} from './types.js';

// ─── Schemas ────────────────────────────────────────────────────
export {
  projectDefinitionSchema,
  projectSeedDetailsSchema,
  refresherConfigSchema,
  schedulerConfigSchema,
} from './schema.js';

// ─── Loader ─────────────────────────────────────────────────────
export {
  ConfigError,
  DEFAULT_SCHEDULER_CONFIG,
  loadRefresherConfig,
  resolveEnvVars,
} from './loader.js';
