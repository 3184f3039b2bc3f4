import { describe, it, expect } from 'vitest';
import {
  assertGuarantorsValid,
  getGuarantorViolations,
} from '../../../src/modules/members/policies/guarantor.policy';
import { AppError } from '../../../src/shared/http/errors';

describe('getGuarantorViolations', () => {
  it('accepts no guarantors, one guarantor, or two different ones', () => {
    expect(getGuarantorViolations({ memberId: null, guarantor1Id: null, guarantor2Id: null })).toEqual([]);
    expect(getGuarantorViolations({ memberId: 5, guarantor1Id: 3, guarantor2Id: null })).toEqual([]);
    expect(getGuarantorViolations({ memberId: 5, guarantor1Id: 3, guarantor2Id: 4 })).toEqual([]);
  });

  it('rejects a member vouching for itself', () => {
    expect(getGuarantorViolations({ memberId: 5, guarantor1Id: 5, guarantor2Id: null })).toEqual([
      { field: 'guarantor1Id', message: 'is invalid' },
    ]);
    expect(getGuarantorViolations({ memberId: 5, guarantor1Id: null, guarantor2Id: 5 })).toEqual([
      { field: 'guarantor2Id', message: 'is invalid' },
    ]);
  });

  it('rejects the same guarantor twice', () => {
    expect(getGuarantorViolations({ memberId: 5, guarantor1Id: 3, guarantor2Id: 3 })).toEqual([
      { field: 'guarantor1Id', message: "shouldn't be same as Guarantor2" },
    ]);
  });
});

describe('assertGuarantorsValid', () => {
  it('throws a validation AppError naming the first violation', () => {
    let caught: unknown;
    try {
      assertGuarantorsValid({ memberId: 5, guarantor1Id: 5, guarantor2Id: 5 });
    } catch (err: unknown) {
      caught = err;
    }

    expect(caught).toBeInstanceOf(AppError);
    if (!(caught instanceof AppError)) return;

    expect(caught.code).toBe('VALIDATION_ERROR');
    expect(caught.status).toBe(400);
    expect(caught.message).toBe('guarantor1Id is invalid');
  });
});
