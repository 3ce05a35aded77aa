/**
 * src/modules/connections/connection.controller.ts
 *
 * WHY:
 * - Maps HTTP → ConnectionService.
 *
 * RULES:
 * - No DB access here.
 * - No business rules here.
 * - validateToken is the only public (session-less) endpoint of the module.
 */

import type { FastifyReply, FastifyRequest } from 'fastify';

import { requireActingContext } from '../../shared/http/require-auth-context';
import { parseRequest } from '../../shared/http/parse-request';
import {
  connectionParamsSchema,
  createConnectionSchema,
  profileParamsSchema,
  reinviteSchema,
  respondSchema,
  updateProfileSchema,
  validateTokenQuerySchema,
} from './connection.schemas';
import type { ConnectionService } from './connection.service';

const PARAMS_MESSAGE = 'Invalid path parameters';

export class ConnectionController {
  constructor(private readonly connectionService: ConnectionService) {}

  async create(req: FastifyRequest, reply: FastifyReply) {
    const ctx = requireActingContext(req);
    const input = parseRequest(createConnectionSchema, req.body);

    const result = await this.connectionService.createConnection(ctx, input);
    return reply.status(201).send(result);
  }

  async reinvite(req: FastifyRequest, reply: FastifyReply) {
    const ctx = requireActingContext(req);
    const { profileId } = parseRequest(profileParamsSchema, req.params, PARAMS_MESSAGE);
    const input = parseRequest(reinviteSchema, req.body ?? {});

    const result = await this.connectionService.reinvite(ctx, profileId, input);
    return reply.status(200).send(result);
  }

  async respond(req: FastifyRequest, reply: FastifyReply) {
    const ctx = requireActingContext(req);
    const { connectionId } = parseRequest(connectionParamsSchema, req.params, PARAMS_MESSAGE);
    const { accept } = parseRequest(respondSchema, req.body);

    const connection = await this.connectionService.respond(ctx, connectionId, accept);
    return reply.status(200).send(connection);
  }

  async disconnect(req: FastifyRequest, reply: FastifyReply) {
    const ctx = requireActingContext(req);
    const { profileId } = parseRequest(profileParamsSchema, req.params, PARAMS_MESSAGE);

    const result = await this.connectionService.disconnect(ctx, profileId);
    return reply.status(200).send(result);
  }

  async validateToken(req: FastifyRequest, reply: FastifyReply) {
    const { token } = parseRequest(validateTokenQuerySchema, req.query, 'Invalid query');

    const preview = await this.connectionService.validateToken(
      token,
      req.requestContext.requestId,
    );
    return reply.status(200).send(preview);
  }

  async listProfiles(req: FastifyRequest, reply: FastifyReply) {
    const ctx = requireActingContext(req);
    const profiles = await this.connectionService.listProfiles(ctx);
    return reply.status(200).send({ profiles });
  }

  async getProfile(req: FastifyRequest, reply: FastifyReply) {
    const ctx = requireActingContext(req);
    const { profileId } = parseRequest(profileParamsSchema, req.params, PARAMS_MESSAGE);

    const profile = await this.connectionService.getProfile(ctx, profileId);
    return reply.status(200).send(profile);
  }

  async updateProfile(req: FastifyRequest, reply: FastifyReply) {
    const ctx = requireActingContext(req);
    const { profileId } = parseRequest(profileParamsSchema, req.params, PARAMS_MESSAGE);
    const input = parseRequest(updateProfileSchema, req.body);

    const profile = await this.connectionService.updateProfile(ctx, profileId, input);
    return reply.status(200).send(profile);
  }

  async listIncoming(req: FastifyRequest, reply: FastifyReply) {
    const ctx = requireActingContext(req);
    const requests = await this.connectionService.listIncoming(ctx);
    return reply.status(200).send({ requests });
  }
}
