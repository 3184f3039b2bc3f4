/**
 * backend/src/modules/members/flows/member-flow.deps.ts
 *
 * Shared dependency bag for member flows.
 */

import type { Logger } from '../../../shared/logger/logger';
import type { EventBus } from '../../../shared/messaging/events';
import type { MemberStatusRules } from '../member.constants';
import type { MemberStore } from '../member.store';

export type MemberFlowDeps = {
  store: MemberStore;
  events: EventBus;
  logger: Logger;
  rules: MemberStatusRules;
  now: () => Date;
};
