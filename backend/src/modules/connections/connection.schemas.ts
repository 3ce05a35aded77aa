/**
 * src/modules/connections/connection.schemas.ts
 *
 * WHY:
 * - Request validation for the connection workflow.
 *
 * RULES:
 * - A connection request names exactly one target: a handle (slug) or an email.
 * - Emails are lowercased here so lookups and uniqueness agree.
 */

import { z } from 'zod';

const optionalText = (max: number) => z.string().trim().max(max).nullable().optional();
const email = z
  .string()
  .email('Invalid email address')
  .transform((v) => v.toLowerCase());

const profileFields = {
  description: optionalText(2000),
  locationCountry: z
    .string()
    .length(2)
    .transform((v) => v.toUpperCase())
    .nullable()
    .optional(),
  contactName: optionalText(200),
  contactEmail: email.nullable().optional(),
};

export const createConnectionSchema = z
  .object({
    handle: z.string().trim().min(1).max(120).optional(),
    email: email.optional(),
    name: z.string().trim().min(1).max(200).optional(),
    note: optionalText(2000),
    ...profileFields,
  })
  .refine((v) => (v.handle === undefined) !== (v.email === undefined), {
    message: 'Provide either a handle or an email',
  });

export type CreateConnectionInput = z.infer<typeof createConnectionSchema>;

export const reinviteSchema = z.object({
  email: email.optional(),
  note: optionalText(2000),
});

export type ReinviteInput = z.infer<typeof reinviteSchema>;

export const respondSchema = z.object({
  accept: z.boolean(),
});

export const updateProfileSchema = z
  .object({
    name: z.string().trim().min(1).max(200).optional(),
    ...profileFields,
  })
  .refine((v) => Object.values(v).some((x) => x !== undefined), {
    message: 'At least one field must be provided',
  });

export type UpdateProfileInput = z.infer<typeof updateProfileSchema>;

export const validateTokenQuerySchema = z.object({
  token: z.string().min(20).max(200),
});

export const profileParamsSchema = z.object({
  profileId: z.string().uuid(),
});

export const connectionParamsSchema = z.object({
  connectionId: z.string().uuid(),
});
