/**
 * backend/src/app/config.ts
 *
 * WHY:
 * - Central place for env parsing + validation (12-factor friendly).
 * - Prevents "undefined env var" bugs at runtime.
 *
 * HOW TO USE:
 * - In dev, we load backend/.env via dotenv.
 * - In prod, the platform injects env vars (no file).
 *
 * TYPING:
 * - nodeEnv is a union ('development' | 'test' | 'production'), not a plain string,
 *   so the environment checks in di.ts cannot silently fall through on 'prod'.
 * - Optional integrations (bePaid, Telegram) come out as `null` when not configured.
 */

import 'dotenv/config';
import { z } from 'zod';

import type { BillingConfig } from '../modules/billing';
import { MEMBER_STATUS_RULES, type MemberStatusRules } from '../modules/members';

const NodeEnvSchema = z.enum(['development', 'test', 'production']).default('development');

// z.coerce.boolean() turns "false" into true
const envFlag = z
  .enum(['true', 'false', '1', '0'])
  .default('false')
  .transform((v) => v === 'true' || v === '1');

const optionalString = z
  .string()
  .optional()
  .transform((v) => (v && v.trim() ? v.trim() : undefined));

const ConfigSchema = z.object({
  NODE_ENV: NodeEnvSchema,
  PORT: z.coerce.number().default(3000),

  DATABASE_URL: z.string().min(1),
  REDIS_URL: z.string().min(1),

  // Logging / service identity
  LOG_LEVEL: z.enum(['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly']).default('info'),
  SERVICE_NAME: z.string().default('hackerspace-members'),

  // bePaid (ERIP bills)
  BEPAID_BASE_URL: z.string().url().default('https://api.bepaid.by'),
  BEPAID_SHOP_ID: optionalString,
  BEPAID_SECRET: optionalString,
  BEPAID_SERVICE_NO: z.coerce.number().int().positive().default(1),
  BILLING_CURRENCY: z.string().length(3).default('BYN'),
  BILLING_DESCRIPTION: z.string().default('Hackerspace membership fee'),
  BILLING_NOTIFICATION_URL: z.string().url().default('http://localhost:3000/billing/notify'),

  // Telegram
  TELEGRAM_BOT_TOKEN: optionalString,
  TELEGRAM_CHAT_IDS: z
    .string()
    .default('')
    .transform((v) =>
      v
        .split(',')
        .map((id) => id.trim())
        .filter(Boolean),
    ),

  // Status thresholds (independent of each other)
  PRORATION_GRACE_DAYS: z.coerce.number().int().min(0).default(MEMBER_STATUS_RULES.prorationGraceDays),
  SUSPENSION_OVERDUE_DAYS: z.coerce
    .number()
    .int()
    .min(0)
    .default(MEMBER_STATUS_RULES.suspensionOverdueDays),
  NEVER_PAID_GRACE_MONTHS: z.coerce
    .number()
    .int()
    .min(0)
    .default(MEMBER_STATUS_RULES.neverPaidGraceMonths),

  REPORT_CACHE_TTL_SECONDS: z.coerce.number().int().min(1).default(3600),

  // DEV seed bootstrap (idempotent)
  SEED_ON_START: envFlag,
  SEED_ADMIN_EMAIL: z.string().email().default('admin@example.com'),
  SEED_TARIFF_NAME: z.string().min(1).default('Standard'),
  SEED_TARIFF_PRICE: z.coerce.number().nonnegative().default(50),
});

export type NodeEnv = z.infer<typeof NodeEnvSchema>;

export type AppConfig = {
  nodeEnv: NodeEnv;
  port: number;
  databaseUrl: string;
  redisUrl: string;

  logLevel: string;
  serviceName: string;

  /** null when bePaid credentials are missing. */
  billing: BillingConfig | null;

  /** null when no bot token is set. */
  telegram: {
    botToken: string;
    chatIds: string[];
  } | null;

  statusRules: MemberStatusRules;

  reports: {
    cacheTtlSeconds: number;
  };

  seed: {
    enabled: boolean;
    adminEmail: string;
    tariffName: string;
    tariffPrice: number;
  };
};

export function buildConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = ConfigSchema.parse(env);

  const billing: BillingConfig | null =
    parsed.BEPAID_SHOP_ID && parsed.BEPAID_SECRET
      ? {
          baseUrl: parsed.BEPAID_BASE_URL,
          shopId: parsed.BEPAID_SHOP_ID,
          secret: parsed.BEPAID_SECRET,
          serviceNo: parsed.BEPAID_SERVICE_NO,
          currency: parsed.BILLING_CURRENCY,
          description: parsed.BILLING_DESCRIPTION,
          notificationUrl: parsed.BILLING_NOTIFICATION_URL,
        }
      : null;

  return {
    nodeEnv: parsed.NODE_ENV,
    port: parsed.PORT,
    databaseUrl: parsed.DATABASE_URL,
    redisUrl: parsed.REDIS_URL,

    logLevel: parsed.LOG_LEVEL,
    serviceName: parsed.SERVICE_NAME,

    billing,

    telegram: parsed.TELEGRAM_BOT_TOKEN
      ? { botToken: parsed.TELEGRAM_BOT_TOKEN, chatIds: parsed.TELEGRAM_CHAT_IDS }
      : null,

    statusRules: {
      prorationGraceDays: parsed.PRORATION_GRACE_DAYS,
      prorationPeriodDays: MEMBER_STATUS_RULES.prorationPeriodDays,
      suspensionOverdueDays: parsed.SUSPENSION_OVERDUE_DAYS,
      neverPaidGraceMonths: parsed.NEVER_PAID_GRACE_MONTHS,
    },

    reports: {
      cacheTtlSeconds: parsed.REPORT_CACHE_TTL_SECONDS,
    },

    seed: {
      enabled: parsed.SEED_ON_START,
      adminEmail: parsed.SEED_ADMIN_EMAIL,
      tariffName: parsed.SEED_TARIFF_NAME,
      tariffPrice: parsed.SEED_TARIFF_PRICE,
    },
  };
}
