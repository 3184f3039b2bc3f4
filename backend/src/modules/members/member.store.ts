/**
 * backend/src/modules/members/member.store.ts
 *
 * WHY:
 * - The one storage capability the member engine and reports need: members,
 *   their tariffs, their payment ledger and NFC keys.
 * - Services depend on this port; di.ts binds the Kysely implementation and
 *   tests bind an in-memory one.
 *
 * RULES:
 * - transaction() hands back a store bound to the same transaction.
 * - updateMemberProfile() and setMemberSuspension() are separate write paths.
 * - No business rules behind this interface.
 */

import type { IsoDate } from '../../shared/time/calendar-date';
import type { NewPayment, Payment } from '../payments/payment.types';
import type { Tariff } from '../tariffs/tariff.types';
import type {
  Member,
  MemberProfile,
  MemberProfilePatch,
  SuspensionChange,
} from './member.types';

export interface MemberStore {
  transaction<T>(fn: (store: MemberStore) => Promise<T>): Promise<T>;

  // ── members ───────────────────────────────────────────────
  getMemberById(memberId: number): Promise<Member | undefined>;
  getMemberByEmail(email: string): Promise<Member | undefined>;
  listMembers(): Promise<Member[]>;

  insertMember(profile: MemberProfile): Promise<Member>;
  updateMemberProfile(params: {
    memberId: number;
    patch: MemberProfilePatch;
    updatedAt: Date;
  }): Promise<Member | undefined>;
  setMemberSuspension(memberId: number, change: SuspensionChange): Promise<boolean>;

  // ── cohorts ───────────────────────────────────────────────
  listActiveMembers(): Promise<Member[]>;
  listSuspendedSince(since: Date): Promise<Member[]>;
  listMembersPaidWithin(params: { start: IsoDate; end: IsoDate }): Promise<Member[]>;

  // ── payment ledger ────────────────────────────────────────
  getLastPayment(memberId: number): Promise<Payment | undefined>;
  getLastPayments(memberIds: readonly number[]): Promise<Map<number, Payment>>;
  listPayments(memberId: number): Promise<Payment[]>;
  insertPayment(payment: NewPayment): Promise<Payment>;

  // ── tariffs ───────────────────────────────────────────────
  getTariffById(tariffId: number): Promise<Tariff | undefined>;
  getTariffByName(name: string): Promise<Tariff | undefined>;
  listTariffs(): Promise<Tariff[]>;
  insertTariff(params: { name: string; monthlyPrice: number; accessAllowed: boolean }): Promise<Tariff>;

  // ── nfc keys ──────────────────────────────────────────────
  getNfcKeys(memberIds: readonly number[]): Promise<Map<number, string[]>>;
}
