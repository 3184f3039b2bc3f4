import { describe, it, expect } from 'vitest';
import { buildConfig } from '../../../src/app/config';

const baseEnv = {
  NODE_ENV: 'test',
  DATABASE_URL: 'postgres://localhost/members_test',
  REDIS_URL: 'redis://localhost:6379',
};

describe('buildConfig', () => {
  it('leaves optional integrations off by default', () => {
    const config = buildConfig({ ...baseEnv });

    expect(config.billing).toBeNull();
    expect(config.telegram).toBeNull();
    expect(config.seed.enabled).toBe(false);
    expect(config.statusRules).toEqual({
      prorationGraceDays: 14,
      prorationPeriodDays: 30,
      suspensionOverdueDays: 15,
      neverPaidGraceMonths: 1,
    });
  });

  it('reads "false" as false for flags', () => {
    expect(buildConfig({ ...baseEnv, SEED_ON_START: 'false' }).seed.enabled).toBe(false);
    expect(buildConfig({ ...baseEnv, SEED_ON_START: 'true' }).seed.enabled).toBe(true);
  });

  it('builds billing and telegram settings when credentials are present', () => {
    const config = buildConfig({
      ...baseEnv,
      BEPAID_SHOP_ID: '361',
      BEPAID_SECRET: 'test-secret',
      BEPAID_SERVICE_NO: '248',
      TELEGRAM_BOT_TOKEN: 'test-token',
      TELEGRAM_CHAT_IDS: '-100, -200 ,',
    });

    expect(config.billing).toEqual({
      baseUrl: 'https://api.bepaid.by',
      shopId: '361',
      secret: 'test-secret',
      serviceNo: 248,
      currency: 'BYN',
      description: 'Hackerspace membership fee',
      notificationUrl: 'http://localhost:3000/billing/notify',
    });
    expect(config.telegram).toEqual({ botToken: 'test-token', chatIds: ['-100', '-200'] });
  });

  it('overrides each status threshold independently', () => {
    const config = buildConfig({ ...baseEnv, SUSPENSION_OVERDUE_DAYS: '30' });

    expect(config.statusRules.suspensionOverdueDays).toBe(30);
    expect(config.statusRules.prorationGraceDays).toBe(14);
  });

  it('fails fast without a database url', () => {
    expect(() => buildConfig({ NODE_ENV: 'test', REDIS_URL: 'redis://localhost:6379' })).toThrow();
  });
});
