/**
 * src/modules/references/reference.schemas.ts
 *
 * WHY:
 * - Request validation for the four reference kinds.
 *
 * RULES:
 * - Create schemas produce the full field set (optional text defaults to null).
 * - Update schemas accept any non-empty subset.
 */

import { z } from 'zod';

const optionalText = (max: number) => z.string().trim().max(max).nullable().default(null);
const requiredText = (max: number) => z.string().trim().min(1).max(max);

function nonEmptyPatch<T extends z.ZodRawShape>(schema: z.ZodObject<T>) {
  return schema
    .partial()
    .refine((patch) => Object.values(patch).some((v) => v !== undefined), {
      message: 'At least one field must be provided',
    });
}

export const createMaterialSchema = z.object({
  name: requiredText(200),
  code: requiredText(50),
  materialType: optionalText(100),
  description: optionalText(2000),
});

export const updateMaterialSchema = nonEmptyPatch(createMaterialSchema);

export const createCertificationSchema = z.object({
  name: requiredText(200),
  code: requiredText(50),
  issuer: optionalText(200),
  description: optionalText(2000),
});

export const updateCertificationSchema = nonEmptyPatch(createCertificationSchema);

export const createCertificateDefinitionSchema = z.object({
  name: requiredText(200),
  issuerAuthority: optionalText(200),
  category: optionalText(100),
  description: optionalText(2000),
});

export const updateCertificateDefinitionSchema = nonEmptyPatch(createCertificateDefinitionSchema);

export const createMaterialDefinitionSchema = z.object({
  name: requiredText(200),
  code: requiredText(50),
  materialType: optionalText(100),
  defaultCarbonFootprint: z.number().nonnegative().nullable().default(null),
});

export const updateMaterialDefinitionSchema = nonEmptyPatch(createMaterialDefinitionSchema);

export const referenceIdParamsSchema = z.object({
  id: z.string().uuid(),
});
