/**
 * backend/src/modules/members/helpers/map-member-write-error.ts
 *
 * WHY:
 * - assertProfileWritable reads before writing, so two concurrent saves can
 *   both pass it. The table constraints catch the loser; this turns the pg
 *   error into the same AppError the read-side check would have thrown.
 *
 * RULES:
 * - Anything unrecognized is rethrown untouched.
 */

import { checkViolationConstraint, isUniqueViolation } from '../../../shared/db/pg-errors';
import { MemberErrors } from '../member.errors';
import type { GuarantorViolation } from '../policies/guarantor.policy';

const EMAIL_UNIQUE_CONSTRAINT = 'members_email_key';

const GUARANTOR_CHECKS = new Map<string, GuarantorViolation>([
  ['members_guarantor1_not_self', { field: 'guarantor1Id', message: 'is invalid' }],
  ['members_guarantor2_not_self', { field: 'guarantor2Id', message: 'is invalid' }],
  ['members_guarantors_distinct', { field: 'guarantor1Id', message: "shouldn't be same as Guarantor2" }],
]);

export function mapMemberWriteError(err: unknown): unknown {
  if (isUniqueViolation(err, EMAIL_UNIQUE_CONSTRAINT)) {
    return MemberErrors.emailTaken({ field: 'email', constraint: EMAIL_UNIQUE_CONSTRAINT });
  }

  const check = checkViolationConstraint(err);
  if (check !== null) {
    const violation = GUARANTOR_CHECKS.get(check);
    return violation
      ? MemberErrors.invalidGuarantors([violation])
      : MemberErrors.invalidInput({ constraint: check });
  }

  return err;
}
