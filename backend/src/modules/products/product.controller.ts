/**
 * src/modules/products/product.controller.ts
 *
 * WHY:
 * - Maps HTTP → ProductService.
 *
 * RULES:
 * - No DB access here.
 * - No business rules here.
 */

import type { FastifyReply, FastifyRequest } from 'fastify';

import { requireActingContext } from '../../shared/http/require-auth-context';
import { parseRequest } from '../../shared/http/parse-request';
import {
  createNextVersionSchema,
  createProductSchema,
  mediaInputSchema,
  mediaParamsSchema,
  productParamsSchema,
  updateProductSchema,
  updateVersionSchema,
  versionParamsSchema,
} from './product.schemas';
import type { ProductService } from './product.service';

const PARAMS_MESSAGE = 'Invalid path parameters';

export class ProductController {
  constructor(private readonly productService: ProductService) {}

  async create(req: FastifyRequest, reply: FastifyReply) {
    const ctx = requireActingContext(req);
    const input = parseRequest(createProductSchema, req.body);

    const product = await this.productService.createProduct(ctx, input);
    return reply.status(201).send(product);
  }

  async list(req: FastifyRequest, reply: FastifyReply) {
    const ctx = requireActingContext(req);
    const products = await this.productService.listProducts(ctx);
    return reply.status(200).send({ products });
  }

  async get(req: FastifyRequest, reply: FastifyReply) {
    const ctx = requireActingContext(req);
    const { productId } = parseRequest(productParamsSchema, req.params, PARAMS_MESSAGE);

    const product = await this.productService.getProduct(ctx, productId);
    return reply.status(200).send(product);
  }

  async update(req: FastifyRequest, reply: FastifyReply) {
    const ctx = requireActingContext(req);
    const { productId } = parseRequest(productParamsSchema, req.params, PARAMS_MESSAGE);
    const input = parseRequest(updateProductSchema, req.body);

    const product = await this.productService.updateProduct(ctx, productId, input);
    return reply.status(200).send(product);
  }

  async updateVersion(req: FastifyRequest, reply: FastifyReply) {
    const ctx = requireActingContext(req);
    const { productId, versionId } = parseRequest(versionParamsSchema, req.params, PARAMS_MESSAGE);
    const input = parseRequest(updateVersionSchema, req.body);

    const version = await this.productService.updateVersion(ctx, productId, versionId, input);
    return reply.status(200).send(version);
  }

  async createNextVersion(req: FastifyRequest, reply: FastifyReply) {
    const ctx = requireActingContext(req);
    const { productId } = parseRequest(productParamsSchema, req.params, PARAMS_MESSAGE);
    const input = parseRequest(createNextVersionSchema, req.body ?? {});

    const product = await this.productService.createNextVersion(ctx, productId, input);
    return reply.status(201).send(product);
  }

  async addMedia(req: FastifyRequest, reply: FastifyReply) {
    const ctx = requireActingContext(req);
    const { productId } = parseRequest(productParamsSchema, req.params, PARAMS_MESSAGE);
    const input = parseRequest(mediaInputSchema, req.body);

    const media = await this.productService.addMedia(ctx, productId, input);
    return reply.status(201).send(media);
  }

  async setMainMedia(req: FastifyRequest, reply: FastifyReply) {
    const ctx = requireActingContext(req);
    const { productId, mediaId } = parseRequest(mediaParamsSchema, req.params, PARAMS_MESSAGE);

    const media = await this.productService.setMainMedia(ctx, productId, mediaId);
    return reply.status(200).send(media);
  }

  async deleteMedia(req: FastifyRequest, reply: FastifyReply) {
    const ctx = requireActingContext(req);
    const { productId, mediaId } = parseRequest(mediaParamsSchema, req.params, PARAMS_MESSAGE);

    await this.productService.deleteMedia(ctx, productId, mediaId);
    return reply.status(204).send();
  }
}
