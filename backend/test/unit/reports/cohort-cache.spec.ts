import { describe, it, expect, vi } from 'vitest';
import { z } from 'zod';
import { CohortCache, cohortCacheKey } from '../../../src/modules/reports/cohort-cache';
import { InMemCache } from '../../../src/shared/cache/inmem-cache';
import { logger } from '../../../src/shared/logger/logger';

const schema = z.array(z.number());
const period = { start: '2024-01-01', end: '2024-01-31' };

describe('CohortCache', () => {
  it('loads once per (start, end) pair', async () => {
    const cohortCache = new CohortCache(new InMemCache(), { ttlSeconds: 60, logger });
    const load = vi.fn(() => Promise.resolve([1, 2]));

    await expect(cohortCache.getOrLoad({ kind: 'paid-within', period, schema, load })).resolves.toEqual([1, 2]);
    await expect(cohortCache.getOrLoad({ kind: 'paid-within', period, schema, load })).resolves.toEqual([1, 2]);
    expect(load).toHaveBeenCalledTimes(1);

    await cohortCache.getOrLoad({
      kind: 'paid-within',
      period: { start: '2024-01-01', end: '2024-01-30' },
      schema,
      load,
    });
    expect(load).toHaveBeenCalledTimes(2);
  });

  it('treats a value that fails the schema as a miss', async () => {
    const cache = new InMemCache();
    await cache.set(cohortCacheKey('paid-graph', period), JSON.stringify({ not: 'an array' }));

    const warn = vi.spyOn(logger, 'warn').mockImplementation(() => logger);
    const cohortCache = new CohortCache(cache, { ttlSeconds: 60, logger });

    const value = await cohortCache.getOrLoad({
      kind: 'paid-graph',
      period,
      schema,
      load: () => Promise.resolve([3]),
    });

    expect(value).toEqual([3]);
    expect(warn).toHaveBeenCalledWith('reports.cache.schema_mismatch', {
      key: 'cohort:paid-graph:2024-01-01:2024-01-31',
    });
    await expect(cache.get('cohort:paid-graph:2024-01-01:2024-01-31')).resolves.toBe('[3]');
  });
});
