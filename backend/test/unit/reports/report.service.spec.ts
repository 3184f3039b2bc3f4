import { describe, it, expect, vi } from 'vitest';
import { CohortCache } from '../../../src/modules/reports/cohort-cache';
import { ReportService } from '../../../src/modules/reports/report.service';
import { InMemCache } from '../../../src/shared/cache/inmem-cache';
import { logger } from '../../../src/shared/logger/logger';
import { InMemMemberStore } from '../../helpers/inmem-member-store';

const NOW = new Date(2024, 5, 15, 12, 0, 0);
const now = () => NOW;

function setup() {
  const store = new InMemMemberStore(now);
  const service = new ReportService(store, new CohortCache(new InMemCache(), { ttlSeconds: 60, logger }), now);
  return { store, service };
}

describe('ReportService current-state cohorts', () => {
  it('lists active members: paid or signed in, neither suspended nor banned', async () => {
    const { store, service } = setup();
    const payer = store.seedMember({ email: 'payer@example.com', firstName: 'Pay', lastName: 'Er' });
    store.seedMember({ email: 'signed@example.com', lastSignInAt: new Date(2024, 5, 1) });
    store.seedMember({ email: 'ghost@example.com' });
    const suspended = store.seedMember({ email: 'suspended@example.com', suspended: true });
    const banned = store.seedMember({ email: 'banned@example.com', banned: true });
    store.seedPayment({ memberId: payer.id, startDate: '2024-06-01', endDate: '2024-06-30' });
    store.seedPayment({ memberId: suspended.id, startDate: '2024-06-01', endDate: '2024-06-30' });
    store.seedPayment({ memberId: banned.id, startDate: '2024-06-01', endDate: '2024-06-30' });

    await expect(service.listActive()).resolves.toEqual([
      { id: 1, fullName: 'Pay Er', email: 'payer@example.com' },
      { id: 2, fullName: ' ', email: 'signed@example.com' },
    ]);
  });

  it('lists debtors whose paidUntil is strictly before today', async () => {
    const { store, service } = setup();
    const yesterday = store.seedMember({ email: 'yesterday@example.com' });
    const today = store.seedMember({ email: 'today@example.com' });
    store.seedMember({ email: 'never@example.com', lastSignInAt: new Date(2024, 5, 1) });
    store.seedPayment({ memberId: yesterday.id, startDate: '2024-05-15', endDate: '2024-06-14' });
    store.seedPayment({ memberId: today.id, startDate: '2024-05-16', endDate: '2024-06-15' });

    const debtors = await service.listWithDebt();

    expect(debtors.map((d) => [d.email, d.paidUntil])).toEqual([['yesterday@example.com', '2024-06-14']]);
  });

  it('lists members suspended within the last 24 hours', async () => {
    const { store, service } = setup();
    store.seedMember({
      email: 'recent@example.com',
      suspended: true,
      suspensionChangedAt: new Date(2024, 5, 15, 10, 0, 0),
    });
    store.seedMember({
      email: 'old@example.com',
      suspended: true,
      suspensionChangedAt: new Date(2024, 5, 13, 12, 0, 0),
    });

    const members = await service.listSuspendedToday();

    expect(members.map((m) => m.email)).toEqual(['recent@example.com']);
  });
});

describe('ReportService period cohorts', () => {
  it('counts overlapping payments once per member and caches per (start, end)', async () => {
    const { store, service } = setup();
    const ada = store.seedMember({ email: 'ada@example.com' });
    store.seedPayment({ memberId: ada.id, startDate: '2024-01-01', endDate: '2024-01-31' });
    store.seedPayment({ memberId: ada.id, startDate: '2024-02-01', endDate: '2024-02-29' });

    const spy = vi.spyOn(store, 'listMembersPaidWithin');

    const first = await service.paidWithinPeriod({ start: '2024-01-15', end: '2024-02-15' });
    const second = await service.paidWithinPeriod({ start: '2024-01-15', end: '2024-02-15' });

    expect(first.map((m) => m.email)).toEqual(['ada@example.com']);
    expect(second).toEqual(first);
    expect(spy).toHaveBeenCalledTimes(1);
  });

  it('includes payments touching either end of the period', async () => {
    const { store, service } = setup();
    const before = store.seedMember({ email: 'before@example.com' });
    const after = store.seedMember({ email: 'after@example.com' });
    const outside = store.seedMember({ email: 'outside@example.com' });
    store.seedPayment({ memberId: before.id, startDate: '2023-12-01', endDate: '2024-01-01' });
    store.seedPayment({ memberId: after.id, startDate: '2024-01-31', endDate: '2024-03-01' });
    store.seedPayment({ memberId: outside.id, startDate: '2024-02-01', endDate: '2024-02-29' });

    const members = await service.paidWithinPeriod({ start: '2024-01-01', end: '2024-01-31' });

    expect(members.map((m) => m.email)).toEqual(['before@example.com', 'after@example.com']);
  });

  it('builds one graph point per month', async () => {
    const { store, service } = setup();
    const m1 = store.seedMember({ email: 'm1@example.com' });
    const m2 = store.seedMember({ email: 'm2@example.com' });
    store.seedPayment({ memberId: m1.id, startDate: '2024-01-01', endDate: '2024-02-01' });
    store.seedPayment({ memberId: m2.id, startDate: '2024-02-10', endDate: '2024-03-05' });

    const points = await service.paidUsersGraph({ start: '2024-01-15', end: '2024-03-10' });

    expect(points).toEqual([
      { date: '2024-01-01', count: 1 },
      { date: '2024-02-01', count: 2 },
      { date: '2024-03-01', count: 1 },
    ]);
  });
});
