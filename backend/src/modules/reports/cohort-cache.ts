/**
 * backend/src/modules/reports/cohort-cache.ts
 *
 * WHY:
 * - Period cohorts are recomputed from the whole ledger; reports ask for the
 *   same periods over and over.
 *
 * RULES:
 * - Keyed by the exact (start, end) pair. No normalization of the period.
 * - Values are JSON; a cached value that fails its schema counts as a miss.
 * - Entries expire by TTL only. Recording a payment does not evict.
 */

import type { ZodType, ZodTypeDef } from 'zod';

import type { Cache } from '../../shared/cache/cache';
import type { Logger } from '../../shared/logger/logger';
import type { ReportPeriod } from './report.types';

export type CohortKind = 'paid-within' | 'paid-graph';

export function cohortCacheKey(kind: CohortKind, period: ReportPeriod): string {
  return `cohort:${kind}:${period.start}:${period.end}`;
}

export class CohortCache {
  constructor(
    private readonly cache: Cache,
    private readonly opts: { ttlSeconds: number; logger: Logger },
  ) {}

  async getOrLoad<T>(params: {
    kind: CohortKind;
    period: ReportPeriod;
    schema: ZodType<T, ZodTypeDef, unknown>;
    load: () => Promise<T>;
  }): Promise<T> {
    const key = cohortCacheKey(params.kind, params.period);

    const hit = await this.read(key, params.schema);
    if (hit.found) return hit.value;

    const value = await params.load();
    await this.cache.set(key, JSON.stringify(value), { ttlSeconds: this.opts.ttlSeconds });

    return value;
  }

  private async read<T>(
    key: string,
    schema: ZodType<T, ZodTypeDef, unknown>,
  ): Promise<{ found: true; value: T } | { found: false }> {
    const raw = await this.cache.get(key);
    if (raw === null) return { found: false };

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch {
      this.opts.logger.warn('reports.cache.unparseable', { key });
      return { found: false };
    }

    const parsed = schema.safeParse(json);
    if (!parsed.success) {
      this.opts.logger.warn('reports.cache.schema_mismatch', { key });
      return { found: false };
    }

    return { found: true, value: parsed.data };
  }
}
