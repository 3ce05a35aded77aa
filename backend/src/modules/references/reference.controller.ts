/**
 * src/modules/references/reference.controller.ts
 *
 * WHY:
 * - Maps HTTP → one ReferenceLibraryService. One controller instance per kind.
 *
 * RULES:
 * - No DB access here.
 * - No business rules here.
 */

import type { FastifyReply, FastifyRequest } from 'fastify';

import { requireActingContext } from '../../shared/http/require-auth-context';
import { parseRequest } from '../../shared/http/parse-request';
import { referenceIdParamsSchema } from './reference.schemas';
import type { ReferenceLibraryService } from './reference.service';

export type ReferenceBodyParsers<TFields> = {
  create(body: unknown): TFields;
  update(body: unknown): Partial<TFields>;
};

export class ReferenceController<
  TFields extends Record<TField, string> & { name: string },
  TField extends string,
> {
  constructor(
    private readonly service: ReferenceLibraryService<TFields, TField>,
    private readonly parse: ReferenceBodyParsers<TFields>,
  ) {}

  async list(req: FastifyRequest, reply: FastifyReply) {
    const ctx = requireActingContext(req);
    const items = await this.service.list(ctx);
    return reply.status(200).send({ items });
  }

  async create(req: FastifyRequest, reply: FastifyReply) {
    const ctx = requireActingContext(req);
    const fields = this.parse.create(req.body);

    const item = await this.service.create(ctx, fields);
    return reply.status(201).send(item);
  }

  async update(req: FastifyRequest, reply: FastifyReply) {
    const ctx = requireActingContext(req);
    const { id } = parseRequest(referenceIdParamsSchema, req.params, 'Invalid path parameters');
    const patch = this.parse.update(req.body);

    const item = await this.service.update(ctx, id, patch);
    return reply.status(200).send(item);
  }

  async delete(req: FastifyRequest, reply: FastifyReply) {
    const ctx = requireActingContext(req);
    const { id } = parseRequest(referenceIdParamsSchema, req.params, 'Invalid path parameters');

    await this.service.delete(ctx, id);
    return reply.status(204).send();
  }
}
