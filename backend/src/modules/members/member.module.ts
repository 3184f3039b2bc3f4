/**
 * backend/src/modules/members/member.module.ts
 *
 * WHY:
 * - Encapsulates Members module wiring.
 *
 * RULES:
 * - No infra creation here (DI passes deps in).
 * - No globals/singletons here.
 */

import type { FastifyInstance } from 'fastify';
import type { Logger } from '../../shared/logger/logger';
import type { EventBus } from '../../shared/messaging/events';

import type { MemberStatusRules } from './member.constants';
import { MemberController } from './member.controller';
import { registerMemberRoutes } from './member.routes';
import { MemberService } from './member.service';
import type { MemberStore } from './member.store';

export type MemberModule = ReturnType<typeof createMemberModule>;

export function createMemberModule(deps: {
  store: MemberStore;
  events: EventBus;
  logger: Logger;
  rules: MemberStatusRules;
  now?: () => Date;
}) {
  const memberService = new MemberService(deps);
  const controller = new MemberController(memberService);

  return {
    memberService,
    registerRoutes(app: FastifyInstance) {
      registerMemberRoutes(app, controller);
    },
  };
}
