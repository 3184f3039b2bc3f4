/**
 * backend/src/modules/reports/report.module.ts
 *
 * WHY:
 * - Encapsulates Reports module wiring.
 *
 * RULES:
 * - No infra creation here (DI passes deps in).
 */

import type { FastifyInstance } from 'fastify';
import type { Cache } from '../../shared/cache/cache';
import type { Logger } from '../../shared/logger/logger';
import type { MemberStore } from '../members';

import { CohortCache } from './cohort-cache';
import { ReportController } from './report.controller';
import { registerReportRoutes } from './report.routes';
import { ReportService } from './report.service';

export type ReportModule = ReturnType<typeof createReportModule>;

export function createReportModule(deps: {
  store: MemberStore;
  cache: Cache;
  logger: Logger;
  cacheTtlSeconds: number;
  now?: () => Date;
}) {
  const cohortCache = new CohortCache(deps.cache, {
    ttlSeconds: deps.cacheTtlSeconds,
    logger: deps.logger,
  });
  const reportService = new ReportService(deps.store, cohortCache, deps.now);
  const controller = new ReportController(reportService);

  return {
    reportService,
    registerRoutes(app: FastifyInstance) {
      registerReportRoutes(app, controller);
    },
  };
}
