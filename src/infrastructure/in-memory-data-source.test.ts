import { describe, it, expect } from 'vitest';
import { DataSourceError } from '@/core/errors.js';
import type { ProjectId } from '@/core/types.js';
import { createInMemoryProjectDataSource } from './in-memory-data-source.js';

const PROJECT_ID = 'proj-1' as ProjectId;

function liveSignal(): AbortSignal {
  return new AbortController().signal;
}

describe('createInMemoryProjectDataSource', () => {
  it('serves seeded slices', async () => {
    const source = createInMemoryProjectDataSource();
    source.seed(PROJECT_ID, {
      details: { description: 'Portal', owner: 'portal-team', memberCount: 12 },
      lastUpdatedAt: new Date('2026-10-01T08:00:00.000Z'),
      loginStatistics: { activeUsers: 3, loginsLastHour: 8, failedLoginsLastHour: 2 },
    });

    await expect(source.fetchProjectDetails(PROJECT_ID, liveSignal())).resolves.toEqual({
      description: 'Portal',
      owner: 'portal-team',
      memberCount: 12,
    });
    await expect(source.fetchLastUpdateTime(PROJECT_ID, liveSignal())).resolves.toEqual(
      new Date('2026-10-01T08:00:00.000Z'),
    );
    await expect(source.fetchLoginStatistics(PROJECT_ID, liveSignal())).resolves.toEqual({
      activeUsers: 3,
      loginsLastHour: 8,
      failedLoginsLastHour: 2,
    });
    expect(source.fetchCount()).toBe(3);
  });

  it('returns zeroed statistics when none are seeded', async () => {
    const source = createInMemoryProjectDataSource();
    source.seed(PROJECT_ID, {});

    await expect(source.fetchLoginStatistics(PROJECT_ID, liveSignal())).resolves.toEqual({
      activeUsers: 0,
      loginsLastHour: 0,
      failedLoginsLastHour: 0,
    });
  });

  it('returns copies the caller cannot use to change the store', async () => {
    const source = createInMemoryProjectDataSource();
    source.seed(PROJECT_ID, {
      details: { description: 'Portal', owner: 'portal-team', memberCount: 12 },
    });

    const first = await source.fetchProjectDetails(PROJECT_ID, liveSignal());
    first.memberCount = 0;

    const second = await source.fetchProjectDetails(PROJECT_ID, liveSignal());
    expect(second.memberCount).toBe(12);
  });

  it('rejects unknown projects', async () => {
    const source = createInMemoryProjectDataSource();

    const fetch = source.fetchLoginStatistics('missing' as ProjectId, liveSignal());

    await expect(fetch).rejects.toBeInstanceOf(DataSourceError);
    await expect(fetch).rejects.toThrow('Data source "in-memory" error: Unknown project missing');
    expect(source.fetchCount()).toBe(0);
  });

  it('rejects details that were never seeded', async () => {
    const source = createInMemoryProjectDataSource();
    source.seed(PROJECT_ID, {});

    await expect(source.fetchProjectDetails(PROJECT_ID, liveSignal())).rejects.toThrow(
      'No details stored for project proj-1',
    );
  });

  it('abandons a simulated round trip when the signal is aborted', async () => {
    const source = createInMemoryProjectDataSource({ latencyMs: 10_000 });
    source.seed(PROJECT_ID, {});
    const controller = new AbortController();
    controller.abort();

    await expect(source.fetchLoginStatistics(PROJECT_ID, controller.signal)).rejects.toMatchObject({
      name: 'AbortError',
    });
    expect(source.fetchCount()).toBe(0);
  });
});
