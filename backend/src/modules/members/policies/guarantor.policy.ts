/**
 * backend/src/modules/members/policies/guarantor.policy.ts
 *
 * WHY:
 * - A member may name up to two guarantors (other members vouching for them).
 * - Pure logic (no DB / no I/O) => easy to unit test.
 *
 * RULES:
 * - A guarantor is never the member itself.
 * - guarantor1 and guarantor2 differ when both are present.
 * - Existence of the referenced members is checked by the caller (needs DB).
 */

import { MemberErrors } from '../member.errors';

export type GuarantorField = 'guarantor1Id' | 'guarantor2Id';

export type GuarantorViolation = {
  field: GuarantorField;
  message: string;
};

export function getGuarantorViolations(params: {
  /** null while the member is being created (no id yet). */
  memberId: number | null;
  guarantor1Id: number | null;
  guarantor2Id: number | null;
}): GuarantorViolation[] {
  const { memberId, guarantor1Id, guarantor2Id } = params;
  const violations: GuarantorViolation[] = [];

  if (guarantor1Id !== null && guarantor1Id === memberId) {
    violations.push({ field: 'guarantor1Id', message: 'is invalid' });
  }
  if (guarantor2Id !== null && guarantor2Id === memberId) {
    violations.push({ field: 'guarantor2Id', message: 'is invalid' });
  }
  if (guarantor1Id !== null && guarantor1Id === guarantor2Id) {
    violations.push({ field: 'guarantor1Id', message: "shouldn't be same as Guarantor2" });
  }

  return violations;
}

export function assertGuarantorsValid(params: {
  memberId: number | null;
  guarantor1Id: number | null;
  guarantor2Id: number | null;
}): void {
  const violations = getGuarantorViolations(params);
  if (violations.length > 0) {
    throw MemberErrors.invalidGuarantors(violations);
  }
}
