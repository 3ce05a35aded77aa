/**
 * src/modules/tenants/tenant.controller.ts
 *
 * WHY:
 * - Maps HTTP → TenantService.
 *
 * RULES:
 * - No DB access here.
 * - No business rules here.
 */

import type { FastifyReply, FastifyRequest } from 'fastify';

import { AppError } from '../../shared/http/errors';
import { requireActingContext } from '../../shared/http/require-auth-context';
import { directorySearchQuerySchema } from './tenant.schemas';
import type { TenantService } from './tenant.service';

export class TenantController {
  constructor(private readonly tenantService: TenantService) {}

  async searchDirectory(req: FastifyRequest, reply: FastifyReply) {
    const ctx = requireActingContext(req);

    const parsed = directorySearchQuerySchema.safeParse(req.query);
    if (!parsed.success) {
      throw AppError.validationError('Invalid query', { issues: parsed.error.issues });
    }

    const results = await this.tenantService.searchDirectory(ctx, parsed.data.q);
    return reply.status(200).send({ results });
  }
}
