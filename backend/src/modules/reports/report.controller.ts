/**
 * backend/src/modules/reports/report.controller.ts
 *
 * Maps HTTP -> ReportService. Validation only; no business rules.
 */

import type { FastifyReply, FastifyRequest } from 'fastify';

import { ReportErrors } from './report.errors';
import { reportPeriodQuerySchema, type ReportPeriodQuery } from './report.schemas';
import type { ReportService } from './report.service';

function parsePeriod(query: unknown): ReportPeriodQuery {
  const parsed = reportPeriodQuerySchema.safeParse(query);
  if (!parsed.success) {
    throw ReportErrors.invalidPeriod({ issues: parsed.error.issues });
  }
  return parsed.data;
}

export class ReportController {
  constructor(private readonly reportService: ReportService) {}

  async active(_req: FastifyRequest, reply: FastifyReply) {
    const members = await this.reportService.listActive();
    return reply.status(200).send({ members });
  }

  async withDebt(_req: FastifyRequest, reply: FastifyReply) {
    const members = await this.reportService.listWithDebt();
    return reply.status(200).send({ members });
  }

  async suspendedToday(_req: FastifyRequest, reply: FastifyReply) {
    const members = await this.reportService.listSuspendedToday();
    return reply.status(200).send({ members });
  }

  async paidWithin(req: FastifyRequest, reply: FastifyReply) {
    const period = parsePeriod(req.query);
    const members = await this.reportService.paidWithinPeriod(period);
    return reply.status(200).send({ period, members });
  }

  async paidGraph(req: FastifyRequest, reply: FastifyReply) {
    const period = parsePeriod(req.query);
    const points = await this.reportService.paidUsersGraph(period);
    return reply.status(200).send({ period, points });
  }
}
