/**
 * backend/src/modules/members/member.routes.ts
 *
 * Declares Members module endpoints. No business logic here.
 *
 * NOTE:
 * - Authentication happens upstream (admin gateway); these routes trust the caller.
 */

import type { FastifyInstance } from 'fastify';
import type { MemberController } from './member.controller';

export function registerMemberRoutes(app: FastifyInstance, controller: MemberController) {
  app.get('/members', controller.list.bind(controller));
  // static path before /:id
  app.get('/members/export', controller.export.bind(controller));
  app.get('/members/:id', controller.get.bind(controller));
  app.post('/members', controller.create.bind(controller));
  app.patch('/members/:id', controller.update.bind(controller));
  app.post('/members/:id/unsuspend', controller.unsuspend.bind(controller));
  app.get('/members/:id/payments', controller.listPayments.bind(controller));
  app.post('/members/:id/payments', controller.recordPayment.bind(controller));

  app.get('/tariffs', controller.listTariffs.bind(controller));
}
