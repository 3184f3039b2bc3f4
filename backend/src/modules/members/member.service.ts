/**
 * backend/src/modules/members/member.service.ts
 *
 * WHY:
 * - Entry point for every member use-case. Thin: multi-step writes live in flows/.
 *
 * RULES:
 * - No raw DB access (MemberStore only).
 * - Writes go through a store transaction.
 * - Side effects are published as events, never called directly.
 */

import type { Logger } from '../../shared/logger/logger';
import type { EventBus } from '../../shared/messaging/events';
import { PaymentErrors } from '../payments/payment.errors';
import type { Payment } from '../payments/payment.types';
import type { Tariff } from '../tariffs/tariff.types';

import type { MemberStatusRules } from './member.constants';
import { MemberErrors } from './member.errors';
import type { CreateMemberInput, RecordPaymentInput, UpdateMemberInput } from './member.schemas';
import type { MemberStore } from './member.store';
import type { MemberView } from './member.types';
import { buildMemberExportRow, type MemberExportRow } from './helpers/build-export-row';
import { buildMemberView } from './helpers/build-member-view';
import { getMonthlyPaymentAmount, getPaidUntil } from './policies/member-status.policy';
import type { MemberFlowDeps } from './flows/member-flow.deps';
import {
  executeCreateMemberFlow,
  executeUpdateMemberFlow,
  loadMemberView,
  type SaveMemberResult,
} from './flows/save-member-flow';
import { executeUnsuspendMemberFlow } from './flows/unsuspend-member-flow';

export class MemberService {
  private readonly deps: MemberFlowDeps;

  constructor(deps: {
    store: MemberStore;
    events: EventBus;
    logger: Logger;
    rules: MemberStatusRules;
    now?: () => Date;
  }) {
    this.deps = { ...deps, now: deps.now ?? (() => new Date()) };
  }

  createMember(input: CreateMemberInput, requestId: string | null = null): Promise<SaveMemberResult> {
    return executeCreateMemberFlow(this.deps, { input, requestId });
  }

  updateMember(
    memberId: number,
    input: UpdateMemberInput,
    requestId: string | null = null,
  ): Promise<SaveMemberResult> {
    return executeUpdateMemberFlow(this.deps, { memberId, input, requestId });
  }

  unsuspendMember(memberId: number, requestId: string | null = null): Promise<MemberView> {
    return executeUnsuspendMemberFlow(this.deps, { memberId, requestId });
  }

  /**
   * Appends to the ledger (billing confirmation). Does not lift a suspension:
   * that stays an explicit admin action.
   */
  async recordPayment(
    memberId: number,
    input: RecordPaymentInput,
    requestId: string | null = null,
  ): Promise<Payment> {
    if (input.startDate > input.endDate) {
      throw PaymentErrors.invalidInterval({ memberId });
    }

    const payment = await this.deps.store.transaction(async (store) => {
      const member = await store.getMemberById(memberId);
      if (!member) throw PaymentErrors.memberNotFound({ memberId });

      return store.insertPayment({
        memberId: member.id,
        startDate: input.startDate,
        endDate: input.endDate,
        paidAt: input.paidAt ?? this.deps.now(),
        amount: input.amount,
      });
    });

    this.deps.logger.info({
      msg: 'payments.recorded',
      flow: 'payments.record',
      requestId,
      memberId,
      paymentId: payment.id,
      endDate: payment.endDate,
    });

    return payment;
  }

  async getMember(memberId: number): Promise<MemberView> {
    const member = await this.deps.store.getMemberById(memberId);
    if (!member) throw MemberErrors.memberNotFound({ memberId });

    return loadMemberView(this.deps, this.deps.store, member, this.deps.now());
  }

  async listPayments(memberId: number): Promise<Payment[]> {
    const member = await this.deps.store.getMemberById(memberId);
    if (!member) throw MemberErrors.memberNotFound({ memberId });

    return this.deps.store.listPayments(memberId);
  }

  async listMembers(): Promise<MemberView[]> {
    const { store, rules } = this.deps;
    const now = this.deps.now();

    const members = await store.listMembers();
    const tariffs = await this.tariffsById();
    const lastPayments = await store.getLastPayments(members.map((m) => m.id));

    return members.map((member) =>
      buildMemberView({
        member,
        tariff: member.tariffId === null ? undefined : tariffs.get(member.tariffId),
        lastPayment: lastPayments.get(member.id),
        now,
        rules,
      }),
    );
  }

  async exportMembers(opts: { withNfc: boolean }): Promise<MemberExportRow[]> {
    const { store } = this.deps;

    const members = await store.listMembers();
    const ids = members.map((m) => m.id);

    const byId = new Map(members.map((m) => [m.id, m]));
    const tariffs = await this.tariffsById();
    const lastPayments = await store.getLastPayments(ids);
    const nfcKeys = opts.withNfc ? await store.getNfcKeys(ids) : undefined;

    return members.map((member) =>
      buildMemberExportRow({
        member,
        monthlyPaymentAmount: getMonthlyPaymentAmount(
          member.tariffId === null ? undefined : tariffs.get(member.tariffId),
        ),
        paidUntil: getPaidUntil(lastPayments.get(member.id)) ?? null,
        guarantor1: member.guarantor1Id === null ? undefined : byId.get(member.guarantor1Id),
        guarantor2: member.guarantor2Id === null ? undefined : byId.get(member.guarantor2Id),
        nfcKeys: nfcKeys ? (nfcKeys.get(member.id) ?? []) : undefined,
      }),
    );
  }

  listTariffs(): Promise<Tariff[]> {
    return this.deps.store.listTariffs();
  }

  private async tariffsById(): Promise<Map<number, Tariff>> {
    const tariffs = await this.deps.store.listTariffs();
    return new Map(tariffs.map((t) => [t.id, t]));
  }
}
