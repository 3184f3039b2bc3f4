/**
 * backend/src/modules/members/flows/unsuspend-member-flow.ts
 *
 * WHY:
 * - Lifting a suspension is an explicit admin action, never automatic.
 * - The chat announcement is a side effect of the committed change, so it is
 *   published as `member.unsuspended` after the transaction.
 *
 * RULES:
 * - Status write path only (no profile validation, no suspension transition).
 * - Notification failures never reach the caller.
 */

import type { MemberUnsuspendedEvent } from '../../../shared/messaging/events';
import { MemberErrors } from '../member.errors';
import type { MemberView } from '../member.types';
import { fullName } from '../helpers/member-names';
import type { MemberFlowDeps } from './member-flow.deps';
import { loadMemberView } from './save-member-flow';

export async function executeUnsuspendMemberFlow(
  deps: MemberFlowDeps,
  params: { memberId: number; requestId: string | null },
): Promise<MemberView> {
  const now = deps.now();

  const view = await deps.store.transaction(async (store) => {
    const member = await store.getMemberById(params.memberId);
    if (!member) throw MemberErrors.memberNotFound({ memberId: params.memberId });

    await store.setMemberSuspension(member.id, { suspended: false, changedAt: now });

    return loadMemberView(deps, store, { ...member, suspended: false, suspensionChangedAt: now }, now);
  });

  deps.logger.info({
    msg: 'members.unsuspended',
    flow: 'members.unsuspend',
    requestId: params.requestId,
    memberId: view.id,
    paidUntil: view.paidUntil,
  });

  const event: MemberUnsuspendedEvent = {
    type: 'member.unsuspended',
    requestId: params.requestId,
    member: {
      id: view.id,
      fullName: fullName(view),
      telegramUsername: view.telegramUsername,
    },
    paidUntil: view.paidUntil,
  };

  await deps.events.publish(event);

  return view;
}
