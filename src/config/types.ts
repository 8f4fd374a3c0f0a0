import type { z } from 'zod';
import type {
  projectDefinitionSchema,
  refresherConfigSchema,
  schedulerConfigSchema,
} from './schema.js';

export type SchedulerConfig = z.infer<typeof schedulerConfigSchema>;

export type OverlapPolicy = SchedulerConfig['overlapPolicy'];

export type ProjectDefinition = z.infer<typeof projectDefinitionSchema>;

export type RefresherConfig = z.infer<typeof refresherConfigSchema>;
