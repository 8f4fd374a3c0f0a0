/**
 * Zod schemas for validating refresher configuration files.
 * Numeric fields are coerced so `${ENV_VAR}` placeholders, which resolve
 * to strings, can supply them.
 */
import { z } from 'zod';
import { PROJECT_TYPES } from '@/core/types.js';

// ─── Scheduler Config ───────────────────────────────────────────

/**
 * Timing and pool settings shared by every project's scheduler.
 * Omitted fields take the documented defaults.
 */
export const schedulerConfigSchema = z.object({
  reloadPeriodMs: z.coerce.number().int().positive('Reload period must be positive').default(15_000),
  statusInitialDelayMs: z.coerce.number().int().min(0).default(1_000),
  statusPeriodMs: z.coerce.number().int().positive('Status period must be positive').default(15_000),
  shutdownGraceMs: z.coerce.number().int().min(0).default(60_000),
  /** Fixed pool capacity. When omitted the scheduler sizes it from its task count. */
  poolSize: z.coerce.number().int().positive('Pool size must be a positive integer').optional(),
  overlapPolicy: z.enum(['skip', 'allow']).default('skip'),
});

// ─── Project Definition ─────────────────────────────────────────

/** Seed data for the in-memory data source. */
export const projectSeedDetailsSchema = z.object({
  description: z.string(),
  owner: z.string().min(1, 'Owner cannot be empty'),
  memberCount: z.number().int().min(0),
});

export const projectDefinitionSchema = z.object({
  id: z.string().min(1).optional(),
  name: z.string().min(1, 'Project name cannot be empty'),
  type: z.enum(PROJECT_TYPES),
  details: projectSeedDetailsSchema.optional(),
  lastUpdatedAt: z.coerce.date().optional(),
});

// ─── Refresher Config File ──────────────────────────────────────

export const refresherConfigSchema = z.object({
  scheduler: schedulerConfigSchema.default({}),
  /** Delay between starting consecutive projects' schedulers. */
  startStaggerMs: z.coerce.number().int().min(0).default(1_000),
  /** Stop every scheduler after this long. Runs until a signal when omitted. */
  runDurationMs: z.coerce.number().int().positive().optional(),
  projects: z.array(projectDefinitionSchema).default([]),
});
