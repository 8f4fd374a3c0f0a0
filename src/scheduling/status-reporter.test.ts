import { describe, it, expect } from 'vitest';
import { createMockLogger } from '@/testing/fixtures/logger.js';
import { createTestProject } from '@/testing/fixtures/projects.js';
import { createStatusReportTask } from './status-reporter.js';

describe('createStatusReportTask', () => {
  it('is a named status-report task', () => {
    const task = createStatusReportTask(createTestProject(), createMockLogger());

    expect(task.name).toBe('status-report');
    expect(task.kind).toBe('status-report');
  });

  it('logs the pretty-printed project with a summary of what is loaded', async () => {
    const logger = createMockLogger();
    const project = createTestProject('STATIC');
    project.updateLastUpdateTime(new Date('2026-05-05T05:05:05.000Z'));
    const task = createStatusReportTask(project, logger);

    await task.run(new AbortController().signal);

    expect(logger.info).toHaveBeenCalledWith(
      [
        'Project "Test Project" (proj-1), type: STATIC',
        '  details: not loaded',
        '  last updated: 2026-05-05T05:05:05.000Z',
        '  logins: not loaded',
      ].join('\n'),
      {
        component: 'status-report',
        projectId: 'proj-1',
        projectType: 'STATIC',
        detailsLoaded: false,
        statisticsLoaded: false,
        lastUpdatedAt: '2026-05-05T05:05:05.000Z',
      },
    );
  });
});
