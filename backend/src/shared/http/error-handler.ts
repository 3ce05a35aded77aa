/**
 * src/shared/http/error-handler.ts
 *
 * WHY:
 * - Fastify's default error handler doesn't understand AppError.
 * - We need consistent error responses across all endpoints.
 * - Internal details (meta, stack traces) must never leak to clients.
 *
 * RESPONSIBILITIES:
 * - AppError → map .status and .code to structured HTTP response.
 * - RateLimitError → 429 response.
 * - Zod validation errors → 400 (safety net if controller misses).
 * - Postgres unique violations (23505) → 409 CONFLICT.
 * - Fastify client errors (malformed JSON, body over the upload limit) → their 4xx status.
 * - Unexpected errors → 500 with generic message.
 * - Log all errors with request context for debugging.
 *
 * RULES:
 * - No business logic here.
 * - Never expose .meta or stack traces in responses.
 * - Log full error details (including REDACTED meta) for observability.
 */

import type { FastifyError, FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import { ZodError } from 'zod';
import { AppError } from './errors';
import { RateLimitError } from '../security/rate-limit';
import { isUniqueViolation } from '../db/db-errors';
import { withRequestContext } from '../logger/with-context';

type ErrorResponseBody = {
  error: {
    code: string;
    message: string;
  };
};

const SENSITIVE_META_KEYS = new Set([
  'token',
  'sessionId',
  'password',
  'passwordHash',
  'invitationToken',
  'tokenHash',
  'secret',
  'dataBase64',
]);

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Redacts sensitive keys at any depth (draft payloads nest certificate uploads). */
function redactMeta(meta: unknown): unknown {
  if (Array.isArray(meta)) return meta.map(redactMeta);
  if (!isRecord(meta)) return meta;

  const out: Record<string, unknown> = {};
  for (const [k, v] of Object.entries(meta)) {
    out[k] = SENSITIVE_META_KEYS.has(k) ? '[REDACTED]' : redactMeta(v);
  }
  return out;
}

function buildResponse(code: string, message: string): ErrorResponseBody {
  return { error: { code, message } };
}

// Fastify's own 4xx errors, by FastifyError.code.
const CLIENT_ERROR_MESSAGES: Record<string, string> = {
  FST_ERR_CTP_BODY_TOO_LARGE: 'Request body is too large.',
  FST_ERR_CTP_INVALID_MEDIA_TYPE: 'Unsupported content type.',
  FST_ERR_CTP_EMPTY_JSON_BODY: 'Request body must not be empty.',
};

function clientErrorMessage(err: FastifyError): string {
  const known = CLIENT_ERROR_MESSAGES[err.code];
  if (known) return known;
  return err instanceof SyntaxError ? 'Malformed JSON body.' : 'Invalid request';
}

function isClientError(err: FastifyError): err is FastifyError & { statusCode: number } {
  return typeof err.statusCode === 'number' && err.statusCode >= 400 && err.statusCode < 500;
}

export function registerErrorHandler(app: FastifyInstance): void {
  app.setErrorHandler((err: FastifyError, req: FastifyRequest, reply: FastifyReply) => {
    const log = withRequestContext(req);

    // 1) Known application errors
    if (err instanceof AppError) {
      log.warn('app_error', {
        flow: 'http.error',
        code: err.code,
        status: err.status,
        message: err.message,
        meta: redactMeta(err.meta),
      });

      return reply.status(err.status).send(buildResponse(err.code, err.message));
    }

    // 2) Rate limit errors
    if (err instanceof RateLimitError) {
      log.warn('rate_limit', {
        flow: 'http.error',
        key: err.key,
        limit: err.limit,
        windowSeconds: err.windowSeconds,
      });

      return reply
        .status(429)
        .send(buildResponse('RATE_LIMITED', 'Too many requests. Try again later.'));
    }

    // 3) Schema errors that escaped a controller
    if (err instanceof ZodError) {
      log.warn('validation_error', { flow: 'http.error', issues: err.issues });
      return reply.status(400).send(buildResponse('VALIDATION_ERROR', 'Invalid request'));
    }

    // 4) A unique constraint caught a concurrent duplicate the service check missed
    if (isUniqueViolation(err)) {
      log.warn('unique_violation', { flow: 'http.error', constraint: err.constraint });
      return reply
        .status(409)
        .send(buildResponse('CONFLICT', 'This record already exists.'));
    }

    // 5) Fastify client errors (malformed JSON, oversized upload, ...)
    if (isClientError(err)) {
      log.warn('client_error', { flow: 'http.error', code: err.code, status: err.statusCode });
      return reply
        .status(err.statusCode)
        .send(buildResponse('VALIDATION_ERROR', clientErrorMessage(err)));
    }

    // 6) Unexpected errors — never leak internals
    log.error('unhandled_error', {
      flow: 'http.error',
      message: err.message,
      stack: err.stack,
    });

    return reply.status(500).send(buildResponse('INTERNAL', 'Internal server error'));
  });
}
