import { describe, it, expect, vi } from 'vitest';
import { registerBillingSubscriber, BILL_CREATION_FAILED_WARNING } from '../../../src/modules/billing/billing.subscriber';
import { MEMBER_STATUS_RULES } from '../../../src/modules/members/member.constants';
import type { CreateMemberInput } from '../../../src/modules/members/member.schemas';
import { MemberService } from '../../../src/modules/members/member.service';
import { registerUnsuspensionSubscriber } from '../../../src/modules/notifications/unsuspension.subscriber';
import { AppError } from '../../../src/shared/http/errors';
import { logger } from '../../../src/shared/logger/logger';
import { InMemMemberStore } from '../../helpers/inmem-member-store';
import { RecordingEventBus } from '../../helpers/recording-event-bus';
import { RecordingBillingGateway, RecordingNotifier } from '../../helpers/recording-fakes';

const NOW = new Date(2024, 5, 15, 12, 0, 0);
const now = () => NOW;

function input(overrides: Partial<CreateMemberInput> = {}): CreateMemberInput {
  return {
    email: 'ada@example.com',
    firstName: 'Ada',
    lastName: 'Lovelace',
    hackerComment: null,
    bepaidNumber: null,
    telegramUsername: null,
    aliceGreeting: null,
    githubUsername: null,
    sshPublicKey: null,
    isLearner: false,
    roles: ['hacker'],
    guarantor1Id: null,
    guarantor2Id: null,
    tariffId: null,
    banned: false,
    ...overrides,
  };
}

function setup() {
  const store = new InMemMemberStore(now);
  const events = new RecordingEventBus();
  const service = new MemberService({ store, events, logger, rules: MEMBER_STATUS_RULES, now });
  return { store, events, service };
}

async function rejection(promise: Promise<unknown>): Promise<AppError> {
  try {
    await promise;
  } catch (err: unknown) {
    if (err instanceof AppError) return err;
    throw err;
  }
  throw new Error('expected the promise to reject');
}

describe('MemberService.createMember', () => {
  it('normalizes input, persists, and publishes member.persisted', async () => {
    const { store, events, service } = setup();
    const tariff = await store.insertTariff({ name: 'Standard', monthlyPrice: 50, accessAllowed: true });

    const result = await service.createMember(
      input({ email: 'Ada@Example.com', telegramUsername: '@ada', tariffId: tariff.id }),
      'req-1',
    );

    expect(result.warnings).toEqual([]);
    expect(result.member.email).toBe('ada@example.com');
    expect(result.member.telegramUsername).toBe('ada');
    expect(result.member.monthlyPaymentAmount).toBe(50);
    expect(result.member.paidUntil).toBeNull();
    expect(result.member.suspended).toBe(false);

    expect(events.published()).toEqual([
      {
        type: 'member.persisted',
        requestId: 'req-1',
        member: {
          id: result.member.id,
          email: 'ada@example.com',
          firstName: 'Ada',
          lastName: 'Lovelace',
          monthlyPaymentAmount: 50,
        },
      },
    ]);
  });

  it('rejects a taken email and persists nothing', async () => {
    const { store, events, service } = setup();
    store.seedMember({ email: 'ada@example.com' });

    const err = await rejection(service.createMember(input({ email: 'ADA@example.com' })));

    expect(err.code).toBe('CONFLICT');
    expect(err.message).toBe('Email has already been taken.');
    await expect(store.listMembers()).resolves.toHaveLength(1);
    expect(events.published()).toEqual([]);
  });

  it('rejects unknown guarantors and tariffs', async () => {
    const { service } = setup();

    const guarantorErr = await rejection(service.createMember(input({ guarantor1Id: 99 })));
    expect(guarantorErr.code).toBe('VALIDATION_ERROR');
    expect(guarantorErr.message).toBe('guarantor1Id does not reference an existing member');

    const tariffErr = await rejection(service.createMember(input({ tariffId: 42 })));
    expect(tariffErr.message).toBe('tariffId does not reference an existing tariff');
  });

  it('surfaces a billing failure as a warning without undoing the save', async () => {
    const { store, events, service } = setup();
    const gateway = new RecordingBillingGateway();
    gateway.failWith(500, 'upstream down');
    registerBillingSubscriber(events, {
      gateway,
      logger,
      config: { currency: 'BYN', description: 'Fee', notificationUrl: 'https://example.test/n', serviceNo: 1 },
    });

    const result = await service.createMember(input());

    expect(result.warnings).toEqual([BILL_CREATION_FAILED_WARNING]);
    expect(gateway.bills).toHaveLength(1);
    await expect(store.getMemberById(result.member.id)).resolves.toMatchObject({ email: 'ada@example.com' });
  });
});

describe('MemberService constraint violations from the database', () => {
  // Another request commits the same email between the read check and the write.
  it('maps a duplicate email caught on insert to CONFLICT', async () => {
    const { store, events, service } = setup();
    store.seedMember({ email: 'ada@example.com' });
    vi.spyOn(store, 'getMemberByEmail').mockResolvedValue(undefined);

    const err = await rejection(service.createMember(input({ email: 'Ada@example.com' })));

    expect(err.code).toBe('CONFLICT');
    expect(err.status).toBe(409);
    expect(err.message).toBe('Email has already been taken.');
    expect(err.meta).toEqual({ field: 'email', constraint: 'members_email_key' });
    await expect(store.listMembers()).resolves.toHaveLength(1);
    expect(events.published()).toEqual([]);
  });

  it('maps a duplicate email caught on update to CONFLICT and keeps the row', async () => {
    const { store, service } = setup();
    store.seedMember({ email: 'ada@example.com' });
    const grace = store.seedMember({ email: 'grace@example.com' });
    vi.spyOn(store, 'getMemberByEmail').mockResolvedValue(undefined);

    const err = await rejection(service.updateMember(grace.id, { email: 'ada@example.com' }));

    expect(err.code).toBe('CONFLICT');
    await expect(store.getMemberById(grace.id)).resolves.toMatchObject({ email: 'grace@example.com' });
  });
});

describe('MemberService.updateMember', () => {
  it('rejects a member vouching for itself and leaves the row untouched', async () => {
    const { store, service } = setup();
    const member = store.seedMember({ email: 'ada@example.com', firstName: 'Ada' });

    const err = await rejection(
      service.updateMember(member.id, { firstName: 'Changed', guarantor1Id: member.id }),
    );

    expect(err.code).toBe('VALIDATION_ERROR');
    expect(err.message).toBe('guarantor1Id is invalid');
    await expect(store.getMemberById(member.id)).resolves.toMatchObject({ firstName: 'Ada' });
  });

  it('suspends a member who never paid within a month of registration', async () => {
    const { store, service } = setup();
    const member = store.seedMember({ email: 'ada@example.com', createdAt: new Date(2024, 4, 6) });

    const { member: saved } = await service.updateMember(member.id, { hackerComment: 'hi' });

    expect(saved.suspended).toBe(true);
    expect(saved.suspensionChangedAt).toEqual(NOW);
    expect(saved.active).toBe(false);
  });

  it('suspends only when paidUntil is more than 15 days behind', async () => {
    const { store, service } = setup();
    const onTime = store.seedMember({ email: 'on-time@example.com', createdAt: new Date(2023, 0, 1) });
    const late = store.seedMember({ email: 'late@example.com', createdAt: new Date(2023, 0, 1) });
    store.seedPayment({ memberId: onTime.id, startDate: '2024-05-02', endDate: '2024-06-01' });
    store.seedPayment({ memberId: late.id, startDate: '2024-04-30', endDate: '2024-05-30' });

    const a = await service.updateMember(onTime.id, {});
    const b = await service.updateMember(late.id, {});

    expect(a.member.suspended).toBe(false);
    expect(b.member.suspended).toBe(true);
  });

  it('returns 404-style error for an unknown member', async () => {
    const { service } = setup();

    const err = await rejection(service.updateMember(123, { firstName: 'X' }));

    expect(err.code).toBe('NOT_FOUND');
    expect(err.status).toBe(404);
  });
});

describe('MemberService.unsuspendMember', () => {
  it('lifts the suspension and announces it', async () => {
    const { store, events, service } = setup();
    const notifier = new RecordingNotifier();
    registerUnsuspensionSubscriber(events, { notifier, logger });

    const member = store.seedMember({
      email: 'ada@example.com',
      firstName: 'Ada',
      lastName: 'Lovelace',
      telegramUsername: 'ada',
      suspended: true,
      suspensionChangedAt: new Date(2024, 4, 1),
    });
    store.seedPayment({ memberId: member.id, startDate: '2024-06-10', endDate: '2024-07-09' });

    const view = await service.unsuspendMember(member.id, 'req-9');

    expect(view.suspended).toBe(false);
    expect(view.suspensionChangedAt).toEqual(NOW);
    expect(view.paidUntil).toBe('2024-07-09');
    expect(notifier.messages).toEqual([
      'Member #1 (Ada Lovelace @ada) is back with us! Paid until 2024-07-09.',
    ]);
  });
});

describe('MemberService.recordPayment', () => {
  it('appends to the ledger and moves paidUntil', async () => {
    const { store, service } = setup();
    const member = store.seedMember({ email: 'ada@example.com' });

    const payment = await service.recordPayment(member.id, {
      startDate: '2024-06-01',
      endDate: '2024-06-30',
      amount: 50,
    });

    expect(payment).toEqual({
      id: 1,
      memberId: member.id,
      startDate: '2024-06-01',
      endDate: '2024-06-30',
      paidAt: NOW,
      amount: 50,
    });
    await expect(service.getMember(member.id)).resolves.toMatchObject({
      paidUntil: '2024-06-30',
      // -15 days: 0 + ceil2(0) with no tariff
      expectedPaymentAmount: 0,
    });
  });

  it('rejects unknown members and inverted intervals', async () => {
    const { store, service } = setup();
    const member = store.seedMember({ email: 'ada@example.com' });

    const unknown = await rejection(
      service.recordPayment(99, { startDate: '2024-06-01', endDate: '2024-06-30', amount: null }),
    );
    expect(unknown.code).toBe('NOT_FOUND');

    const inverted = await rejection(
      service.recordPayment(member.id, { startDate: '2024-07-01', endDate: '2024-06-30', amount: null }),
    );
    expect(inverted.code).toBe('VALIDATION_ERROR');
  });
});

describe('MemberService.listMembers / exportMembers', () => {
  it('derives status per member', async () => {
    const { store, service } = setup();
    const tariff = await store.insertTariff({ name: 'Standard', monthlyPrice: 50, accessAllowed: true });
    const ada = store.seedMember({ email: 'ada@example.com', tariffId: tariff.id });
    store.seedMember({ email: 'grace@example.com', banned: true });
    store.seedPayment({ memberId: ada.id, startDate: '2024-05-06', endDate: '2024-06-05' });

    const members = await service.listMembers();

    expect(members.map((m) => [m.email, m.expectedPaymentAmount, m.active, m.accessAllowed])).toEqual([
      ['ada@example.com', 66.67, true, true],
      ['grace@example.com', null, false, false],
    ]);
  });

  it('renders guarantors and NFC keys', async () => {
    const { store, service } = setup();
    const grace = store.seedMember({ email: 'grace@example.com', firstName: 'Grace', lastName: 'Hopper' });
    const ada = store.seedMember({ email: 'ada@example.com', guarantor2Id: grace.id });
    store.seedNfcKey(ada.id, '04A1');
    store.seedNfcKey(ada.id, '04B2');

    const plain = await service.exportMembers({ withNfc: false });
    const withNfc = await service.exportMembers({ withNfc: true });

    expect(plain[1]?.guarantor2).toBe('1. Grace Hopper');
    expect(plain[1]?.nfcKeys).toBeUndefined();
    expect(withNfc.map((row) => row.nfcKeys)).toEqual(['', '04A1 04B2']);
  });
});
