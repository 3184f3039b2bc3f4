import { describe, it, expect } from 'vitest';
import { buildTestApp } from '../helpers/build-test-app';
import { runDevSeed } from '../../src/shared/db/seed/dev-seed';

describe('dev seed', () => {
  it('is idempotent (tariff + admin member)', async () => {
    const options = { adminEmail: 'Admin@Example.com', tariffName: 'Standard', tariffPrice: 50 };

    const { deps, close } = await buildTestApp();

    try {
      await runDevSeed({ store: deps.store, memberService: deps.members.memberService, options });
      await runDevSeed({ store: deps.store, memberService: deps.members.memberService, options });

      const tariffs = await deps.store.listTariffs();
      expect(tariffs.map((t) => [t.name, t.monthlyPrice])).toEqual([['Standard', 50]]);

      const members = await deps.store.listMembers();
      expect(members).toHaveLength(1);
      expect(members[0]?.email).toBe('admin@example.com');
      expect(members[0]?.roles).toEqual(['hacker', 'admin']);
      expect(members[0]?.tariffId).toBe(tariffs[0]?.id);
    } finally {
      await close();
    }
  });

  it('runs on build when enabled', async () => {
    const { deps, close } = await buildTestApp({
      seed: { enabled: true, adminEmail: 'seed@example.com', tariffName: 'Basic', tariffPrice: 30 },
    });

    try {
      await expect(deps.store.getMemberByEmail('seed@example.com')).resolves.toMatchObject({
        firstName: 'Admin',
      });
    } finally {
      await close();
    }
  });
});
