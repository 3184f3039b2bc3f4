import { describe, it, expect, vi } from 'vitest';
import { buildTestApp } from '../helpers/build-test-app';

const NOW = new Date(2024, 5, 15, 12, 0, 0);

describe('reports API', () => {
  it('serves cohorts and the monthly graph', async () => {
    const { app, close, store } = await buildTestApp({}, { now: () => NOW });
    const ada = store.seedMember({ email: 'ada@example.com', firstName: 'Ada', lastName: 'Lovelace' });
    store.seedPayment({ memberId: ada.id, startDate: '2024-05-02', endDate: '2024-06-10' });

    try {
      const active = await app.inject({ method: 'GET', url: '/reports/active' });
      expect(active.json()).toEqual({
        members: [{ id: 1, fullName: 'Ada Lovelace', email: 'ada@example.com' }],
      });

      const debt = await app.inject({ method: 'GET', url: '/reports/with-debt' });
      expect(debt.json()).toEqual({
        members: [{ id: 1, fullName: 'Ada Lovelace', email: 'ada@example.com', paidUntil: '2024-06-10' }],
      });

      const suspended = await app.inject({ method: 'GET', url: '/reports/suspended-today' });
      expect(suspended.json()).toEqual({ members: [] });

      const within = await app.inject({
        method: 'GET',
        url: '/reports/paid-within?start=2024-06-01&end=2024-06-30',
      });
      expect(within.json().members).toHaveLength(1);

      const graph = await app.inject({
        method: 'GET',
        url: '/reports/paid-graph?start=2024-04-10&end=2024-06-20',
      });
      expect(graph.json()).toEqual({
        period: { start: '2024-04-10', end: '2024-06-20' },
        points: [
          { date: '2024-04-01', count: 0 },
          { date: '2024-05-01', count: 1 },
          { date: '2024-06-01', count: 1 },
        ],
      });
    } finally {
      await close();
    }
  });

  it('rejects a malformed or inverted period', async () => {
    const { app, close } = await buildTestApp();

    try {
      const missing = await app.inject({ method: 'GET', url: '/reports/paid-within?start=2024-01-01' });
      expect(missing.statusCode).toBe(400);
      expect(missing.json()).toEqual({
        error: { code: 'VALIDATION_ERROR', message: 'Invalid report period.' },
      });

      const inverted = await app.inject({
        method: 'GET',
        url: '/reports/paid-graph?start=2024-03-01&end=2024-01-01',
      });
      expect(inverted.statusCode).toBe(400);
    } finally {
      await close();
    }
  });

  it('refuses a paid-graph period longer than the month cap', async () => {
    const { app, close, store } = await buildTestApp();
    const listMembersPaidWithin = vi.spyOn(store, 'listMembersPaidWithin');

    try {
      const res = await app.inject({
        method: 'GET',
        url: '/reports/paid-graph?start=0001-01-01&end=9999-12-31',
      });

      expect(res.statusCode).toBe(400);
      expect(res.json()).toEqual({
        error: { code: 'VALIDATION_ERROR', message: 'Invalid report period.' },
      });
      expect(listMembersPaidWithin).not.toHaveBeenCalled();
    } finally {
      await close();
    }
  });
});
