/**
 * backend/src/modules/members/flows/save-member-flow.ts
 *
 * WHY:
 * - The profile write path: create (registration) and update (admin edit).
 * - Both end the same way: suspension transition inside the transaction,
 *   then `member.persisted` published after commit so subscribers (billing)
 *   see committed data.
 *
 * RULES:
 * - Validation errors block the write (nothing is persisted).
 * - Constraint violations raised by the write map to the same errors as the
 *   read-side checks.
 * - Subscriber problems come back as warnings; the write is never undone.
 */

import type { MemberPersistedEvent } from '../../../shared/messaging/events';
import type { MemberStore } from '../member.store';
import type { Member, MemberProfile, MemberProfilePatch, MemberView } from '../member.types';
import { MemberErrors } from '../member.errors';
import type { CreateMemberInput, UpdateMemberInput } from '../member.schemas';
import { assertProfileWritable } from '../helpers/assert-profile-writable';
import { buildMemberView } from '../helpers/build-member-view';
import { mapMemberWriteError } from '../helpers/map-member-write-error';
import { normalizeTelegramUsername } from '../helpers/normalize-telegram-username';
import { applySuspensionTransition } from './apply-suspension-transition';
import type { MemberFlowDeps } from './member-flow.deps';

export type SaveMemberResult = {
  member: MemberView;
  /** Non-fatal, operator-visible problems raised after the write. */
  warnings: string[];
};

export async function executeCreateMemberFlow(
  deps: MemberFlowDeps,
  params: { input: CreateMemberInput; requestId: string | null },
): Promise<SaveMemberResult> {
  const now = deps.now();

  const profile: MemberProfile = {
    ...params.input,
    email: params.input.email.toLowerCase(),
    telegramUsername: normalizeTelegramUsername(params.input.telegramUsername),
  };

  deps.logger.info({
    msg: 'members.create.start',
    flow: 'members.create',
    requestId: params.requestId,
  });

  const member = await deps.store.transaction(async (store) => {
    await assertProfileWritable({
      store,
      memberId: null,
      email: profile.email,
      guarantor1Id: profile.guarantor1Id,
      guarantor2Id: profile.guarantor2Id,
      tariffId: profile.tariffId,
    });

    const created = await store.insertMember(profile).catch((err: unknown) => {
      throw mapMemberWriteError(err);
    });

    return applySuspensionTransition({
      store,
      member: created,
      now,
      rules: deps.rules,
      logger: deps.logger,
      requestId: params.requestId,
    });
  });

  deps.logger.info({
    msg: 'members.create.success',
    flow: 'members.create',
    requestId: params.requestId,
    memberId: member.id,
  });

  return finishSave(deps, { member, now, requestId: params.requestId });
}

export async function executeUpdateMemberFlow(
  deps: MemberFlowDeps,
  params: { memberId: number; input: UpdateMemberInput; requestId: string | null },
): Promise<SaveMemberResult> {
  const now = deps.now();

  const patch: MemberProfilePatch = {
    ...params.input,
    email: params.input.email?.toLowerCase(),
    telegramUsername: normalizeTelegramUsername(params.input.telegramUsername),
  };

  deps.logger.info({
    msg: 'members.update.start',
    flow: 'members.update',
    requestId: params.requestId,
    memberId: params.memberId,
    fields: Object.keys(params.input),
  });

  const member = await deps.store.transaction(async (store) => {
    const existing = await store.getMemberById(params.memberId);
    if (!existing) throw MemberErrors.memberNotFound({ memberId: params.memberId });

    await assertProfileWritable({
      store,
      memberId: existing.id,
      email: patch.email ?? existing.email,
      guarantor1Id: patch.guarantor1Id !== undefined ? patch.guarantor1Id : existing.guarantor1Id,
      guarantor2Id: patch.guarantor2Id !== undefined ? patch.guarantor2Id : existing.guarantor2Id,
      tariffId: patch.tariffId !== undefined ? patch.tariffId : existing.tariffId,
    });

    const updated = await store
      .updateMemberProfile({
        memberId: existing.id,
        patch,
        updatedAt: now,
      })
      .catch((err: unknown) => {
        throw mapMemberWriteError(err);
      });
    if (!updated) throw MemberErrors.memberNotFound({ memberId: params.memberId });

    return applySuspensionTransition({
      store,
      member: updated,
      now,
      rules: deps.rules,
      logger: deps.logger,
      requestId: params.requestId,
    });
  });

  deps.logger.info({
    msg: 'members.update.success',
    flow: 'members.update',
    requestId: params.requestId,
    memberId: member.id,
    suspended: member.suspended,
  });

  return finishSave(deps, { member, now, requestId: params.requestId });
}

export async function loadMemberView(
  deps: Pick<MemberFlowDeps, 'rules'>,
  store: MemberStore,
  member: Member,
  now: Date,
): Promise<MemberView> {
  const tariff = member.tariffId === null ? undefined : await store.getTariffById(member.tariffId);
  const lastPayment = await store.getLastPayment(member.id);

  return buildMemberView({ member, tariff, lastPayment, now, rules: deps.rules });
}

async function finishSave(
  deps: MemberFlowDeps,
  params: { member: Member; now: Date; requestId: string | null },
): Promise<SaveMemberResult> {
  const view = await loadMemberView(deps, deps.store, params.member, params.now);

  const event: MemberPersistedEvent = {
    type: 'member.persisted',
    requestId: params.requestId,
    member: {
      id: view.id,
      email: view.email,
      firstName: view.firstName,
      lastName: view.lastName,
      monthlyPaymentAmount: view.monthlyPaymentAmount,
    },
  };

  const { warnings } = await deps.events.publish(event);

  return { member: view, warnings };
}
