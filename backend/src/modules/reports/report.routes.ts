/**
 * backend/src/modules/reports/report.routes.ts
 */

import type { FastifyInstance } from 'fastify';
import type { ReportController } from './report.controller';

export function registerReportRoutes(app: FastifyInstance, controller: ReportController) {
  app.get('/reports/active', controller.active.bind(controller));
  app.get('/reports/with-debt', controller.withDebt.bind(controller));
  app.get('/reports/suspended-today', controller.suspendedToday.bind(controller));
  app.get('/reports/paid-within', controller.paidWithin.bind(controller));
  app.get('/reports/paid-graph', controller.paidGraph.bind(controller));
}
