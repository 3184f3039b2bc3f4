/**
 * backend/src/modules/members/member.controller.ts
 *
 * WHY:
 * - Maps HTTP -> service call.
 * - Validates request payload and returns response.
 *
 * RULES:
 * - No DB access here.
 * - No business rules here.
 * - Validate with Zod and throw AppError.
 */

import type { FastifyReply, FastifyRequest } from 'fastify';
import type { ZodType, ZodTypeDef } from 'zod';

import { MemberErrors } from './member.errors';
import {
  createMemberSchema,
  exportMembersQuerySchema,
  memberIdParamsSchema,
  recordPaymentSchema,
  updateMemberSchema,
} from './member.schemas';
import type { MemberService } from './member.service';

function parseOrThrow<T>(schema: ZodType<T, ZodTypeDef, unknown>, value: unknown): T {
  const parsed = schema.safeParse(value);
  if (!parsed.success) {
    throw MemberErrors.invalidInput({ issues: parsed.error.issues });
  }
  return parsed.data;
}

export class MemberController {
  constructor(private readonly memberService: MemberService) {}

  async list(_req: FastifyRequest, reply: FastifyReply) {
    const members = await this.memberService.listMembers();
    return reply.status(200).send({ members });
  }

  async get(req: FastifyRequest, reply: FastifyReply) {
    const { id } = parseOrThrow(memberIdParamsSchema, req.params);
    const member = await this.memberService.getMember(id);
    return reply.status(200).send({ member });
  }

  async create(req: FastifyRequest, reply: FastifyReply) {
    const input = parseOrThrow(createMemberSchema, req.body);
    const result = await this.memberService.createMember(input, req.requestContext.requestId);
    return reply.status(201).send(result);
  }

  async update(req: FastifyRequest, reply: FastifyReply) {
    const { id } = parseOrThrow(memberIdParamsSchema, req.params);
    const input = parseOrThrow(updateMemberSchema, req.body);
    const result = await this.memberService.updateMember(id, input, req.requestContext.requestId);
    return reply.status(200).send(result);
  }

  async unsuspend(req: FastifyRequest, reply: FastifyReply) {
    const { id } = parseOrThrow(memberIdParamsSchema, req.params);
    const member = await this.memberService.unsuspendMember(id, req.requestContext.requestId);
    return reply.status(200).send({ member });
  }

  async listPayments(req: FastifyRequest, reply: FastifyReply) {
    const { id } = parseOrThrow(memberIdParamsSchema, req.params);
    const payments = await this.memberService.listPayments(id);
    return reply.status(200).send({ payments });
  }

  async recordPayment(req: FastifyRequest, reply: FastifyReply) {
    const { id } = parseOrThrow(memberIdParamsSchema, req.params);
    const input = parseOrThrow(recordPaymentSchema, req.body);
    const payment = await this.memberService.recordPayment(id, input, req.requestContext.requestId);
    return reply.status(201).send({ payment });
  }

  async export(req: FastifyRequest, reply: FastifyReply) {
    const { withNfc } = parseOrThrow(exportMembersQuerySchema, req.query);
    const rows = await this.memberService.exportMembers({ withNfc });
    return reply.status(200).send({ rows });
  }

  async listTariffs(_req: FastifyRequest, reply: FastifyReply) {
    const tariffs = await this.memberService.listTariffs();
    return reply.status(200).send({ tariffs });
  }
}
