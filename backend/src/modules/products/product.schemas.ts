/**
 * src/modules/products/product.schemas.ts
 *
 * WHY:
 * - Request validation for products, versions and media.
 *
 * RULES:
 * - SKUs are trimmed; uniqueness (case-insensitive, per tenant) is a service concern.
 * - Patches must carry at least one field.
 */

import { z } from 'zod';
import { LIFECYCLE_STATUSES } from './product.types';

const optionalText = (max: number) => z.string().trim().max(max).nullable().optional();
const requiredText = (max: number) => z.string().trim().min(1).max(max);
const measure = z.number().nonnegative().nullable().optional();

function atLeastOneField(value: Record<string, unknown>): boolean {
  return Object.values(value).some((v) => v !== undefined);
}

export const mediaInputSchema = z.object({
  fileUrl: z.string().trim().min(1).max(2000),
  fileName: optionalText(255),
  contentType: optionalText(100),
  isMain: z.boolean().optional(),
});

export type MediaInput = z.infer<typeof mediaInputSchema>;

export const createProductSchema = z.object({
  sku: requiredText(100),
  gtin: optionalText(50),
  name: requiredText(200),
  category: requiredText(100),
  description: optionalText(5000),
  versionName: requiredText(100).optional(),
  images: z.array(mediaInputSchema).max(20).optional(),
});

export type CreateProductInput = z.infer<typeof createProductSchema>;

export const updateProductSchema = z
  .object({
    gtin: optionalText(50),
    name: requiredText(200).optional(),
    category: requiredText(100).optional(),
    description: optionalText(5000),
    lifecycleStatus: z.enum(LIFECYCLE_STATUSES).optional(),
  })
  .refine(atLeastOneField, { message: 'At least one field must be provided' });

export type UpdateProductInput = z.infer<typeof updateProductSchema>;

export const updateVersionSchema = z
  .object({
    versionName: requiredText(100).optional(),
    productName: requiredText(200).optional(),
    category: requiredText(100).optional(),
    description: optionalText(5000),
    manufacturingCountry: z
      .string()
      .length(2)
      .transform((v) => v.toUpperCase())
      .nullable()
      .optional(),
    totalCarbonFootprintKg: measure,
    totalWaterUsageLiters: measure,
    totalEnergyMj: measure,
    recyclingInstructions: optionalText(5000),
    recyclabilityClass: optionalText(50),
  })
  .refine(atLeastOneField, { message: 'At least one field must be provided' });

export type UpdateVersionInput = z.infer<typeof updateVersionSchema>;

export const createNextVersionSchema = z.object({
  versionName: requiredText(100).optional(),
});

export const productParamsSchema = z.object({
  productId: z.string().uuid(),
});

export const versionParamsSchema = productParamsSchema.extend({
  versionId: z.string().uuid(),
});

export const mediaParamsSchema = productParamsSchema.extend({
  mediaId: z.string().uuid(),
});
