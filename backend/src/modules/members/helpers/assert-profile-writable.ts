/**
 * backend/src/modules/members/helpers/assert-profile-writable.ts
 *
 * WHY:
 * - Write-time validation that needs the store: email uniqueness and the
 *   existence of referenced guarantors / tariff. Pure guarantor rules come
 *   from the policy.
 *
 * RULES:
 * - Receives a trx-bound store (caller owns the transaction).
 * - Throws MemberErrors; never writes.
 */

import type { MemberStore } from '../member.store';
import { MemberErrors } from '../member.errors';
import { assertGuarantorsValid, type GuarantorField } from '../policies/guarantor.policy';

export async function assertProfileWritable(params: {
  store: MemberStore;
  /** null on create. */
  memberId: number | null;
  email: string;
  guarantor1Id: number | null;
  guarantor2Id: number | null;
  tariffId: number | null;
}): Promise<void> {
  const { store, memberId } = params;

  assertGuarantorsValid({
    memberId,
    guarantor1Id: params.guarantor1Id,
    guarantor2Id: params.guarantor2Id,
  });

  const sameEmail = await store.getMemberByEmail(params.email);
  if (sameEmail && sameEmail.id !== memberId) {
    throw MemberErrors.emailTaken({ field: 'email' });
  }

  const guarantors: Array<[GuarantorField, number | null]> = [
    ['guarantor1Id', params.guarantor1Id],
    ['guarantor2Id', params.guarantor2Id],
  ];

  for (const [field, guarantorId] of guarantors) {
    if (guarantorId === null) continue;
    const guarantor = await store.getMemberById(guarantorId);
    if (!guarantor) throw MemberErrors.guarantorNotFound(field, { guarantorId });
  }

  if (params.tariffId !== null) {
    const tariff = await store.getTariffById(params.tariffId);
    if (!tariff) throw MemberErrors.tariffNotFound({ tariffId: params.tariffId });
  }
}
