import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { UnsupportedProjectTypeError } from '@/core/errors.js';
import type { ProjectType } from '@/core/types.js';
import { unwrap } from '@/core/result.js';
import { createStatisticsLoader } from '@/loaders/statistics-loader.js';
import { createMockLogger } from '@/testing/fixtures/logger.js';
import { createSeededDataSource, createTestProject } from '@/testing/fixtures/projects.js';
import { createSchedulerForProject, tasksForProject } from './task-factory.js';

describe('task factory', () => {
  let logger: ReturnType<typeof createMockLogger>;

  beforeEach(() => {
    logger = createMockLogger();
  });

  // ─── tasksForProject ──────────────────────────────────────────

  describe('tasksForProject', () => {
    it('maps STATIC projects to login statistics only', () => {
      const project = createTestProject('STATIC');
      const tasks = unwrap(tasksForProject(project, { source: createSeededDataSource(), logger }));

      expect(tasks.map((task) => task.kind)).toEqual(['login-statistics']);
    });

    it('maps LIVE projects to details, last update time, and login statistics', () => {
      const project = createTestProject('LIVE');
      const tasks = unwrap(tasksForProject(project, { source: createSeededDataSource(), logger }));

      expect(tasks.map((task) => task.kind)).toEqual([
        'project-details',
        'last-update-time',
        'login-statistics',
      ]);
      expect(new Set(tasks.map((task) => task.name)).size).toBe(3);
    });

    it('builds fresh task instances on every call', () => {
      const project = createTestProject('STATIC');
      const deps = { source: createSeededDataSource(), logger };

      const first = unwrap(tasksForProject(project, deps));
      const second = unwrap(tasksForProject(project, deps));

      expect(first[0]).not.toBe(second[0]);
    });

    it('fails for a type with no task set', () => {
      const project = createTestProject('ARCHIVED' as ProjectType);

      const result = tasksForProject(project, { source: createSeededDataSource(), logger });

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error).toBeInstanceOf(UnsupportedProjectTypeError);
      expect(result.error.message).toBe('Unsupported project type "ARCHIVED" for project proj-1');
      expect(result.error.context).toEqual({
        projectId: 'proj-1',
        projectType: 'ARCHIVED',
        supportedTypes: ['STATIC', 'LIVE'],
      });
    });

    it('uses a caller-supplied task set map', () => {
      const taskSets = { STATIC: [createStatisticsLoader] };
      const deps = { source: createSeededDataSource(), logger, taskSets };

      expect(tasksForProject(createTestProject('STATIC'), deps).ok).toBe(true);

      const live = tasksForProject(createTestProject('LIVE'), deps);
      expect(live.ok).toBe(false);
      if (live.ok) return;
      expect(live.error.code).toBe('UNSUPPORTED_PROJECT_TYPE');
    });
  });

  // ─── createSchedulerForProject ────────────────────────────────

  describe('createSchedulerForProject', () => {
    beforeEach(() => {
      vi.useFakeTimers();
      vi.setSystemTime(new Date('2026-03-01T12:00:00.000Z'));
    });

    afterEach(() => {
      vi.useRealTimers();
    });

    it('returns an unstarted scheduler bound to the project', () => {
      const project = createTestProject('LIVE');
      const scheduler = unwrap(
        createSchedulerForProject(project, { source: createSeededDataSource(project), logger }),
      );

      expect(scheduler.getState()).toBe('created');
      expect(scheduler.project).toBe(project);
      expect(scheduler.tasks).toHaveLength(3);
      expect(scheduler.poolSize).toBe(4);
      expect(Object.keys(scheduler.getTaskStats())).toEqual([
        'project-details',
        'last-update-time',
        'login-statistics',
        'status-report',
      ]);
    });

    it('produces no scheduler for an unsupported type', () => {
      const project = createTestProject('ARCHIVED' as ProjectType);

      const result = createSchedulerForProject(project, { source: createSeededDataSource(), logger });

      expect(result.ok).toBe(false);
      expect('value' in result).toBe(false);
    });

    it('fills the project cache on start and reports status a second later', async () => {
      const project = createTestProject('LIVE');
      const scheduler = unwrap(
        createSchedulerForProject(project, { source: createSeededDataSource(project), logger }),
      );

      scheduler.start();
      await vi.advanceTimersByTimeAsync(1);

      const fetchedAt = new Date('2026-03-01T12:00:00.000Z');
      expect(project.snapshot()).toEqual({
        id: 'proj-1',
        name: 'Test Project',
        type: 'LIVE',
        details: {
          description: 'Test Project description',
          owner: 'test-owner',
          memberCount: 4,
          fetchedAt,
        },
        lastUpdatedAt: new Date('2026-01-01T00:00:00.000Z'),
        loginStatistics: {
          activeUsers: 7,
          loginsLastHour: 20,
          failedLoginsLastHour: 1,
          fetchedAt,
        },
      });

      await vi.advanceTimersByTimeAsync(999);
      expect(logger.info).toHaveBeenCalledWith(
        project.prettyPrint(),
        expect.objectContaining({ component: 'status-report', projectId: 'proj-1' }),
      );

      await scheduler.stop();
    });

    it('keeps each project to its own slices', async () => {
      const staticProject = createTestProject('STATIC', { id: 'proj-static' });
      const liveProject = createTestProject('LIVE', { id: 'proj-live' });
      const source = createSeededDataSource(staticProject, liveProject);

      const schedulers = [staticProject, liveProject].map((project) =>
        unwrap(createSchedulerForProject(project, { source, logger })),
      );
      for (const scheduler of schedulers) scheduler.start();
      await vi.advanceTimersByTimeAsync(1);

      const staticSnapshot = staticProject.snapshot();
      expect(staticSnapshot.loginStatistics?.activeUsers).toBe(7);
      expect(staticSnapshot.details).toBeUndefined();
      expect(staticSnapshot.lastUpdatedAt).toBeUndefined();

      const liveSnapshot = liveProject.snapshot();
      expect(liveSnapshot.details?.owner).toBe('test-owner');
      expect(liveSnapshot.lastUpdatedAt).toEqual(new Date('2026-01-01T00:00:00.000Z'));

      await Promise.all(schedulers.map((scheduler) => scheduler.stop()));
    });
  });
});
