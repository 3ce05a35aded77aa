/**
 * backend/src/shared/http/parse-request.ts
 *
 * WHY:
 * - Every controller turns an unknown body/query/params into a typed value or a 400.
 *
 * RULES:
 * - HTTP-only helper: throws AppError.validationError with the zod issues as meta.
 */

import type { z } from 'zod';
import { AppError } from './errors';

export function parseRequest<S extends z.ZodTypeAny>(
  schema: S,
  input: unknown,
  message = 'Invalid request body',
): z.output<S> {
  const parsed = schema.safeParse(input);
  if (!parsed.success) {
    throw AppError.validationError(message, { issues: parsed.error.issues });
  }
  return parsed.data;
}
