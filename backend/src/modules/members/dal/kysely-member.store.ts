/**
 * backend/src/modules/members/dal/kysely-member.store.ts
 *
 * WHY:
 * - PostgreSQL implementation of MemberStore, composed from the module
 *   query-sql/queries (reads) and repos (writes).
 *
 * RULES:
 * - Thin mapping only; no business rules.
 * - withDb() binds every repo to the same executor (transaction support).
 */

import type { DbExecutor } from '../../../shared/db/db';
import type { IsoDate } from '../../../shared/time/calendar-date';

import { PaymentRepo } from '../../payments/dal/payment.repo';
import {
  getLastPayment,
  getLastPaymentsByMember,
  listPaymentsForMember,
} from '../../payments/queries/payment.queries';
import type { NewPayment, Payment } from '../../payments/payment.types';

import { TariffRepo } from '../../tariffs/dal/tariff.repo';
import { getTariffById, getTariffByName, listTariffs } from '../../tariffs/queries/tariff.queries';
import type { Tariff } from '../../tariffs/tariff.types';

import type { MemberStore } from '../member.store';
import type { Member, MemberProfile, MemberProfilePatch, SuspensionChange } from '../member.types';
import {
  getMemberByEmail,
  getMemberById,
  getNfcKeysByMember,
  listActiveMembers,
  listMembers,
  listMembersPaidWithin,
  listSuspendedSince,
  toMember,
} from '../queries/member.queries';
import { MemberRepo } from './member.repo';

export class KyselyMemberStore implements MemberStore {
  private readonly memberRepo: MemberRepo;
  private readonly paymentRepo: PaymentRepo;
  private readonly tariffRepo: TariffRepo;

  constructor(private readonly db: DbExecutor) {
    this.memberRepo = new MemberRepo(db);
    this.paymentRepo = new PaymentRepo(db);
    this.tariffRepo = new TariffRepo(db);
  }

  withDb(db: DbExecutor): KyselyMemberStore {
    return new KyselyMemberStore(db);
  }

  transaction<T>(fn: (store: MemberStore) => Promise<T>): Promise<T> {
    return this.db.transaction().execute((trx) => fn(this.withDb(trx)));
  }

  // ── members ───────────────────────────────────────────────

  getMemberById(memberId: number): Promise<Member | undefined> {
    return getMemberById(this.db, memberId);
  }

  getMemberByEmail(email: string): Promise<Member | undefined> {
    return getMemberByEmail(this.db, email);
  }

  listMembers(): Promise<Member[]> {
    return listMembers(this.db);
  }

  async insertMember(profile: MemberProfile): Promise<Member> {
    return toMember(await this.memberRepo.insertMember(profile));
  }

  async updateMemberProfile(params: {
    memberId: number;
    patch: MemberProfilePatch;
    updatedAt: Date;
  }): Promise<Member | undefined> {
    const row = await this.memberRepo.updateProfile(params);
    return row ? toMember(row) : undefined;
  }

  setMemberSuspension(memberId: number, change: SuspensionChange): Promise<boolean> {
    return this.memberRepo.setSuspension({ memberId, change });
  }

  // ── cohorts ───────────────────────────────────────────────

  listActiveMembers(): Promise<Member[]> {
    return listActiveMembers(this.db);
  }

  listSuspendedSince(since: Date): Promise<Member[]> {
    return listSuspendedSince(this.db, since);
  }

  listMembersPaidWithin(params: { start: IsoDate; end: IsoDate }): Promise<Member[]> {
    return listMembersPaidWithin(this.db, params);
  }

  // ── payment ledger ────────────────────────────────────────

  getLastPayment(memberId: number): Promise<Payment | undefined> {
    return getLastPayment(this.db, memberId);
  }

  getLastPayments(memberIds: readonly number[]): Promise<Map<number, Payment>> {
    return getLastPaymentsByMember(this.db, memberIds);
  }

  listPayments(memberId: number): Promise<Payment[]> {
    return listPaymentsForMember(this.db, memberId);
  }

  async insertPayment(payment: NewPayment): Promise<Payment> {
    const { id } = await this.paymentRepo.insertPayment(payment);
    return { id, ...payment };
  }

  // ── tariffs ───────────────────────────────────────────────

  getTariffById(tariffId: number): Promise<Tariff | undefined> {
    return getTariffById(this.db, tariffId);
  }

  getTariffByName(name: string): Promise<Tariff | undefined> {
    return getTariffByName(this.db, name);
  }

  listTariffs(): Promise<Tariff[]> {
    return listTariffs(this.db);
  }

  async insertTariff(params: {
    name: string;
    monthlyPrice: number;
    accessAllowed: boolean;
  }): Promise<Tariff> {
    const { id } = await this.tariffRepo.insertTariff(params);
    const tariff = await getTariffById(this.db, id);
    if (!tariff) throw new Error(`tariff ${id} vanished after insert`);
    return tariff;
  }

  // ── nfc keys ──────────────────────────────────────────────

  getNfcKeys(memberIds: readonly number[]): Promise<Map<number, string[]>> {
    return getNfcKeysByMember(this.db, memberIds);
  }
}
