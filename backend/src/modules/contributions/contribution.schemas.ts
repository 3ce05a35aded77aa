/**
 * src/modules/contributions/contribution.schemas.ts
 *
 * WHY:
 * - Request validation for the contribution workflow.
 *
 * RULES:
 * - Draft scalars are optional and nullable; null means "leave as is" (merge-patch).
 * - Draft child lists are optional; a missing list is saved as an empty one.
 * - A certificate entry carries exactly one source: an upload or a fileUrl.
 */

import { z } from 'zod';

const optionalText = (max: number) => z.string().trim().max(max).nullable().optional();
const requiredText = (max: number) => z.string().trim().min(1).max(max);
const country = z
  .string()
  .trim()
  .length(2)
  .transform((v) => v.toUpperCase());
const optionalId = z.string().uuid().nullable().optional();
const measure = z.number().nonnegative().nullable().optional();

export const assignSupplierSchema = z.object({
  supplierProfileId: z.string().uuid(),
  dueDate: z.coerce.date().nullable().optional(),
  note: optionalText(2000),
});

export type AssignSupplierInput = z.infer<typeof assignSupplierSchema>;

export const declineSchema = z.object({
  note: optionalText(2000),
});

export const draftMaterialSchema = z.object({
  materialId: optionalId,
  materialDefinitionId: optionalId,
  name: requiredText(200),
  percentage: z.number().min(0).max(100),
  originCountry: country,
  transportMethod: optionalText(100),
});

export const draftSupplierSchema = z.object({
  supplierProfileId: optionalId,
  name: requiredText(200),
  role: requiredText(100),
  country,
});

export const uploadSchema = z.object({
  fileName: requiredText(255),
  contentType: optionalText(100),
  dataBase64: z.string().min(1),
});

export type DraftUpload = z.infer<typeof uploadSchema>;

export const draftCertificationSchema = z
  .object({
    certificationId: optionalId,
    certificateDefinitionId: optionalId,
    name: requiredText(200),
    upload: uploadSchema.optional(),
    fileUrl: z.string().trim().min(1).max(2000).optional(),
    fileName: optionalText(255),
    validUntil: z.coerce.date().nullable().optional(),
    referenceNumber: optionalText(100),
  })
  .refine((c) => (c.upload === undefined) !== (c.fileUrl === undefined), {
    message: 'Provide either an upload or a fileUrl',
  });

export type DraftCertificationInput = z.infer<typeof draftCertificationSchema>;

export const saveDraftSchema = z.object({
  manufacturingCountry: country.nullable().optional(),
  totalCarbonFootprintKg: measure,
  totalWaterUsageLiters: measure,
  totalEnergyMj: measure,
  recyclingInstructions: optionalText(5000),
  recyclabilityClass: optionalText(50),

  materials: z.array(draftMaterialSchema).max(200).optional(),
  suppliers: z.array(draftSupplierSchema).max(200).optional(),
  certifications: z.array(draftCertificationSchema).max(100).optional(),
});

export type SaveDraftInput = z.infer<typeof saveDraftSchema>;

export const reviewSchema = z.object({
  approve: z.boolean(),
  comment: optionalText(5000),
});

export type ReviewInput = z.infer<typeof reviewSchema>;

export const commentSchema = z.object({
  body: requiredText(5000),
});

export const requestParamsSchema = z.object({
  requestId: z.string().uuid(),
});

export const assignParamsSchema = z.object({
  productId: z.string().uuid(),
});
