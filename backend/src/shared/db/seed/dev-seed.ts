/**
 * backend/src/shared/db/seed/dev-seed.ts
 *
 * DEV-ONLY seed bootstrap.
 *
 * Creates:
 * - a tariff (if missing)
 * - an admin member on that tariff (if missing)
 *
 * Idempotent: safe to run on every start.
 *
 * The admin goes through MemberService so the usual write path (validation,
 * suspension transition, member.persisted) applies.
 */

import type { MemberService } from '../../../modules/members/member.service';
import type { MemberStore } from '../../../modules/members';
import { logger } from '../../logger/logger';

type DevSeedOptions = {
  adminEmail: string;
  tariffName: string;
  tariffPrice: number;
};

export async function runDevSeed(opts: {
  store: MemberStore;
  memberService: MemberService;
  options: DevSeedOptions;
}): Promise<void> {
  const { store, memberService, options } = opts;

  const flow = 'seed.dev';

  // 1) Ensure tariff exists
  let tariff = await store.getTariffByName(options.tariffName);

  if (!tariff) {
    tariff = await store.insertTariff({
      name: options.tariffName,
      monthlyPrice: options.tariffPrice,
      accessAllowed: true,
    });
    logger.info('seed.tariff_created', { flow, tariffId: tariff.id, name: tariff.name });
  } else {
    logger.info('seed.tariff_exists', { flow, tariffId: tariff.id, name: tariff.name });
  }

  // 2) Ensure admin member exists
  const adminEmail = options.adminEmail.toLowerCase();
  const existingAdmin = await store.getMemberByEmail(adminEmail);

  if (existingAdmin) {
    logger.info('seed.admin_exists', { flow, memberId: existingAdmin.id });
    return;
  }

  const { member, warnings } = await memberService.createMember({
    email: adminEmail,
    firstName: 'Admin',
    lastName: null,
    hackerComment: null,
    bepaidNumber: null,
    telegramUsername: null,
    aliceGreeting: null,
    githubUsername: null,
    sshPublicKey: null,
    isLearner: false,
    roles: ['hacker', 'admin'],
    guarantor1Id: null,
    guarantor2Id: null,
    tariffId: tariff.id,
    banned: false,
  });

  logger.info('seed.admin_created', { flow, memberId: member.id, warnings });
}
