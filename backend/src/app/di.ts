/**
 * src/app/di.ts
 *
 * WHY:
 * - Single dependency graph for the whole app.
 * - Creates infra clients ONCE (db, redis) and shares them safely.
 * - Keeps modules testable: tests pass in-memory infra through `overrides`.
 *
 * RULES:
 * - No business logic here.
 * - No HTTP logic here.
 * - Environment-dependent decisions (e.g. no billing in test) belong HERE,
 *   not inside the classes themselves (DIP).
 */

import type { AppConfig } from './config';
import { createDb, type Db } from '../shared/db/db';

import { RedisCache } from '../shared/cache/redis-cache';
import type { Cache } from '../shared/cache/cache';

import { logger } from '../shared/logger/logger';
import type { Logger } from '../shared/logger/logger';

import type { EventBus } from '../shared/messaging/events';
import { InMemEventBus } from '../shared/messaging/inmem-event-bus';

import { createMemberModule, type MemberModule, type MemberStore } from '../modules/members';
import { KyselyMemberStore } from '../modules/members/dal/kysely-member.store';
import { createReportModule, type ReportModule } from '../modules/reports';
import { BePaidClient, registerBillingSubscriber, type BillingGateway } from '../modules/billing';
import {
  LogNotifier,
  TelegramNotifier,
  registerUnsuspensionSubscriber,
  type Notifier,
} from '../modules/notifications';

export type InfraOverrides = {
  store?: MemberStore;
  cache?: Cache;
  billingGateway?: BillingGateway;
  notifier?: Notifier;
  now?: () => Date;
};

export type AppDeps = {
  /** null when the store was injected. */
  db: Db | null;
  store: MemberStore;
  cache: Cache;

  logger: Logger;

  // messaging
  events: EventBus;

  // modules
  members: MemberModule;
  reports: ReportModule;

  // lifecycle
  close: () => Promise<void>;
};

export async function buildDeps(config: AppConfig, overrides: InfraOverrides = {}): Promise<AppDeps> {
  let db: Db | null = null;
  let store: MemberStore;
  if (overrides.store) {
    store = overrides.store;
  } else {
    db = createDb(config.databaseUrl);
    store = new KyselyMemberStore(db);
  }

  // Redis is mandatory outside tests
  let redis: RedisCache | null = null;
  let cache: Cache;
  if (overrides.cache) {
    cache = overrides.cache;
  } else {
    redis = await RedisCache.connect(config.redisUrl);
    cache = redis;
  }

  const events = new InMemEventBus();

  // Composition root decides when bills are created.
  // The subscriber itself has no knowledge of environments.
  if (config.nodeEnv !== 'test' && config.billing) {
    registerBillingSubscriber(events, {
      gateway: overrides.billingGateway ?? new BePaidClient(config.billing),
      logger,
      config: config.billing,
    });
  } else {
    logger.info('billing.disabled', { env: config.nodeEnv, configured: config.billing !== null });
  }

  const notifier: Notifier =
    overrides.notifier ??
    (config.telegram ? new TelegramNotifier(config.telegram) : new LogNotifier(logger));
  registerUnsuspensionSubscriber(events, { notifier, logger });

  // modules (no HTTP / no business logic here)
  const members = createMemberModule({
    store,
    events,
    logger,
    rules: config.statusRules,
    now: overrides.now,
  });

  const reports = createReportModule({
    store,
    cache,
    logger,
    cacheTtlSeconds: config.reports.cacheTtlSeconds,
    now: overrides.now,
  });

  return {
    db,
    store,
    cache,
    logger,
    events,
    members,
    reports,
    close: async () => {
      await redis?.close();
      await db?.destroy();
    },
  };
}
