import 'dotenv/config';
import { isErr } from '@/core/result.js';
import { loadRefresherConfig } from '@/config/loader.js';
import type { RefresherConfig } from '@/config/types.js';
import { createInMemoryProjectDataSource } from '@/infrastructure/in-memory-data-source.js';
import { createLogger } from '@/observability/logger.js';
import { createProject } from '@/projects/project.js';
import { runSchedulers } from '@/scheduling/scheduler-run.js';
import { createSchedulerForProject } from '@/scheduling/task-factory.js';
import type { RefreshScheduler } from '@/scheduling/refresh-scheduler.js';

const logger = createLogger();

function buildSchedulers(config: RefresherConfig): RefreshScheduler[] {
  const source = createInMemoryProjectDataSource();
  const schedulers: RefreshScheduler[] = [];

  for (const definition of config.projects) {
    const project = createProject(definition);
    source.seed(project.id, {
      details: definition.details,
      lastUpdatedAt: definition.lastUpdatedAt,
    });

    const result = createSchedulerForProject(project, {
      source,
      logger,
      config: config.scheduler,
    });
    if (isErr(result)) {
      logger.error(result.error.message, {
        component: 'main',
        code: result.error.code,
        projectName: definition.name,
      });
      continue;
    }
    schedulers.push(result.value);
  }

  return schedulers;
}

async function start(): Promise<void> {
  const configPath = process.env['REFRESHER_CONFIG'] ?? 'config/refresher.json';

  try {
    const configResult = await loadRefresherConfig(configPath);
    if (isErr(configResult)) {
      logger.fatal(configResult.error.message, {
        ...configResult.error.context,
        component: 'main',
      });
      process.exit(1);
    }
    const config = configResult.value;

    const schedulers = buildSchedulers(config);
    if (schedulers.length === 0) {
      logger.warn('No projects to refresh', { component: 'main', configPath });
      return;
    }

    const run = runSchedulers({
      schedulers,
      startStaggerMs: config.startStaggerMs,
      runDurationMs: config.runDurationMs,
      logger,
    });

    process.on('SIGTERM', () => void run.shutdown());
    process.on('SIGINT', () => void run.shutdown());

    await run.done;
  } catch (error: unknown) {
    logger.fatal('Failed to start refresher', {
      component: 'main',
      error: error instanceof Error ? error.message : String(error),
    });
    process.exit(1);
  }
}

void start();
