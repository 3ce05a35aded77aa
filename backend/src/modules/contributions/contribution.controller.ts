/**
 * src/modules/contributions/contribution.controller.ts
 *
 * WHY:
 * - Maps HTTP → ContributionService.
 *
 * RULES:
 * - No DB access here.
 * - No business rules here (party and state checks live in the service/policies).
 */

import type { FastifyReply, FastifyRequest } from 'fastify';

import { requireActingContext } from '../../shared/http/require-auth-context';
import { parseRequest } from '../../shared/http/parse-request';
import {
  assignParamsSchema,
  assignSupplierSchema,
  commentSchema,
  declineSchema,
  requestParamsSchema,
  reviewSchema,
  saveDraftSchema,
} from './contribution.schemas';
import type { ContributionService } from './contribution.service';

const PARAMS_MESSAGE = 'Invalid path parameters';

export class ContributionController {
  constructor(private readonly contributionService: ContributionService) {}

  async assign(req: FastifyRequest, reply: FastifyReply) {
    const ctx = requireActingContext(req);
    const { productId } = parseRequest(assignParamsSchema, req.params, PARAMS_MESSAGE);
    const input = parseRequest(assignSupplierSchema, req.body);

    const request = await this.contributionService.assignSupplier(ctx, productId, input);
    return reply.status(201).send(request);
  }

  async accept(req: FastifyRequest, reply: FastifyReply) {
    const ctx = requireActingContext(req);
    const { requestId } = parseRequest(requestParamsSchema, req.params, PARAMS_MESSAGE);

    const request = await this.contributionService.accept(ctx, requestId);
    return reply.status(200).send(request);
  }

  async decline(req: FastifyRequest, reply: FastifyReply) {
    const ctx = requireActingContext(req);
    const { requestId } = parseRequest(requestParamsSchema, req.params, PARAMS_MESSAGE);
    const { note } = parseRequest(declineSchema, req.body ?? {});

    const request = await this.contributionService.decline(ctx, requestId, note);
    return reply.status(200).send(request);
  }

  async saveDraft(req: FastifyRequest, reply: FastifyReply) {
    const ctx = requireActingContext(req);
    const { requestId } = parseRequest(requestParamsSchema, req.params, PARAMS_MESSAGE);
    const input = parseRequest(saveDraftSchema, req.body);

    const result = await this.contributionService.saveDraft(ctx, requestId, input);
    return reply.status(200).send({
      request: result.request,
      version: result.version,
      artifacts: result.artifacts,
    });
  }

  async submit(req: FastifyRequest, reply: FastifyReply) {
    const ctx = requireActingContext(req);
    const { requestId } = parseRequest(requestParamsSchema, req.params, PARAMS_MESSAGE);

    const request = await this.contributionService.submit(ctx, requestId);
    return reply.status(200).send(request);
  }

  async review(req: FastifyRequest, reply: FastifyReply) {
    const ctx = requireActingContext(req);
    const { requestId } = parseRequest(requestParamsSchema, req.params, PARAMS_MESSAGE);
    const input = parseRequest(reviewSchema, req.body);

    const result = await this.contributionService.review(ctx, requestId, input);
    return reply.status(200).send(result);
  }

  async cancel(req: FastifyRequest, reply: FastifyReply) {
    const ctx = requireActingContext(req);
    const { requestId } = parseRequest(requestParamsSchema, req.params, PARAMS_MESSAGE);

    const request = await this.contributionService.cancel(ctx, requestId);
    return reply.status(200).send(request);
  }

  async get(req: FastifyRequest, reply: FastifyReply) {
    const ctx = requireActingContext(req);
    const { requestId } = parseRequest(requestParamsSchema, req.params, PARAMS_MESSAGE);

    const detail = await this.contributionService.getRequest(ctx, requestId);
    return reply.status(200).send(detail);
  }

  async listIncoming(req: FastifyRequest, reply: FastifyReply) {
    const ctx = requireActingContext(req);
    const requests = await this.contributionService.listIncoming(ctx);
    return reply.status(200).send({ requests });
  }

  async listPendingReviews(req: FastifyRequest, reply: FastifyReply) {
    const ctx = requireActingContext(req);
    const requests = await this.contributionService.listPendingReviews(ctx);
    return reply.status(200).send({ requests });
  }

  async addComment(req: FastifyRequest, reply: FastifyReply) {
    const ctx = requireActingContext(req);
    const { requestId } = parseRequest(requestParamsSchema, req.params, PARAMS_MESSAGE);
    const { body } = parseRequest(commentSchema, req.body);

    const comment = await this.contributionService.addComment(ctx, requestId, body);
    return reply.status(201).send(comment);
  }
}
