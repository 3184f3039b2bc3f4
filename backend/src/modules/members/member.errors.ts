/**
 * backend/src/modules/members/member.errors.ts
 *
 * WHY:
 * - Members module owns its domain semantics.
 * - Keeps shared/http/errors.ts small and stable.
 *
 * RULES:
 * - Use AppError as the transport primitive.
 * - Every validation error names the offending field in meta.field.
 */

import { AppError, type AppErrorMeta } from '../../shared/http/errors';

export const MemberErrors = {
  memberNotFound(meta?: AppErrorMeta) {
    return AppError.notFound('Member not found.', meta);
  },

  emailTaken(meta?: AppErrorMeta) {
    return AppError.conflict('Email has already been taken.', meta);
  },

  invalidInput(meta?: AppErrorMeta) {
    return AppError.validationError('Invalid member data.', meta);
  },

  invalidGuarantors(violations: ReadonlyArray<{ field: string; message: string }>) {
    const first = violations[0];
    return AppError.validationError(first ? `${first.field} ${first.message}` : 'Invalid guarantors', {
      violations,
    });
  },

  guarantorNotFound(field: 'guarantor1Id' | 'guarantor2Id', meta?: AppErrorMeta) {
    return AppError.validationError(`${field} does not reference an existing member`, {
      field,
      ...meta,
    });
  },

  tariffNotFound(meta?: AppErrorMeta) {
    return AppError.validationError('tariffId does not reference an existing tariff', {
      field: 'tariffId',
      ...meta,
    });
  },
} as const;
