/**
 * backend/src/modules/members/member.schemas.ts
 *
 * WHY:
 * - Centralizes request validation for the Members module.
 * - Prevents invalid payloads from reaching services.
 *
 * RULES:
 * - Use Zod for runtime validation.
 * - Suspension fields are not accepted here: only the status engine writes them.
 */

import { z } from 'zod';
import { isIsoDate } from '../../shared/time/calendar-date';
import { MEMBER_EMAIL_MAX_LENGTH } from './member.constants';
import { MEMBER_ROLES } from './member.types';

const emailField = z
  .string()
  .trim()
  .min(1, "can't be blank")
  .max(MEMBER_EMAIL_MAX_LENGTH)
  .email();

const textField = z.string().trim().nullable();
const memberRefField = z.number().int().positive().nullable();

export const createMemberSchema = z.object({
  email: emailField,
  firstName: textField.default(null),
  lastName: textField.default(null),
  hackerComment: textField.default(null),
  bepaidNumber: z.number().int().nullable().default(null),
  telegramUsername: z.string().nullable().default(null),
  aliceGreeting: textField.default(null),
  githubUsername: textField.default(null),
  sshPublicKey: z.string().nullable().default(null),
  isLearner: z.boolean().default(false),
  roles: z.array(z.enum(MEMBER_ROLES)).default(['hacker']),
  guarantor1Id: memberRefField.default(null),
  guarantor2Id: memberRefField.default(null),
  tariffId: memberRefField.default(null),
  banned: z.boolean().default(false),
});

export const updateMemberSchema = z
  .object({
    email: emailField,
    firstName: textField,
    lastName: textField,
    hackerComment: textField,
    bepaidNumber: z.number().int().nullable(),
    telegramUsername: z.string().nullable(),
    aliceGreeting: textField,
    githubUsername: textField,
    sshPublicKey: z.string().nullable(),
    isLearner: z.boolean(),
    roles: z.array(z.enum(MEMBER_ROLES)),
    guarantor1Id: memberRefField,
    guarantor2Id: memberRefField,
    tariffId: memberRefField,
    banned: z.boolean(),
  })
  .partial()
  .strict();

export const memberIdParamsSchema = z.object({
  id: z.coerce.number().int().positive(),
});

const isoDateField = z.string().refine(isIsoDate, 'Expected a YYYY-MM-DD date');

export const recordPaymentSchema = z
  .object({
    startDate: isoDateField,
    endDate: isoDateField,
    paidAt: z.coerce.date().optional(),
    amount: z.number().nonnegative().nullable().default(null),
  })
  .refine((v) => v.startDate <= v.endDate, {
    message: 'startDate must not be after endDate',
    path: ['endDate'],
  });

export const exportMembersQuerySchema = z.object({
  withNfc: z
    .enum(['true', 'false'])
    .default('false')
    .transform((v) => v === 'true'),
});

export type CreateMemberInput = z.infer<typeof createMemberSchema>;
export type UpdateMemberInput = z.infer<typeof updateMemberSchema>;
export type RecordPaymentInput = z.infer<typeof recordPaymentSchema>;
