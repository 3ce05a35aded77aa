/**
 * src/modules/auth/auth.schemas.ts
 *
 * WHY:
 * - Centralizes request validation for the Auth module.
 * - Prevents invalid payloads from reaching services.
 *
 * RULES:
 * - Email is normalized to lowercase in the flows, not here.
 * - Company names are trimmed here; uniqueness is the flow's job.
 */

import { z } from 'zod';
import { SIGNUP_TENANT_TYPES } from '../tenants/tenant.types';

export const signupSchema = z.object({
  firstName: z.string().trim().min(1, 'First name is required').max(50),
  lastName: z.string().trim().min(1, 'Last name is required').max(50),
  email: z.string().email('Invalid email address'),
  password: z
    .string()
    .min(8, 'Password must be at least 8 characters')
    .max(128, 'Password must be at most 128 characters'),
  companyName: z.string().trim().min(2, 'Company name is too short').max(100),
  locationCountry: z
    .string()
    .length(2, 'Use a two-letter country code')
    .transform((v) => v.toUpperCase()),
  accountType: z.enum(SIGNUP_TENANT_TYPES),
  invitationToken: z.string().min(20, 'Invalid invitation token').optional(),
});

export type SignupInput = z.infer<typeof signupSchema>;

export const loginSchema = z.object({
  email: z.string().email('Invalid email address'),
  password: z.string().min(1, 'Password is required'),
  /** Organization to open; defaults to the first active membership. */
  tenantId: z.string().uuid().optional(),
});

export type LoginInput = z.infer<typeof loginSchema>;

export const switchTenantSchema = z.object({
  tenantId: z.string().uuid(),
});

export type SwitchTenantInput = z.infer<typeof switchTenantSchema>;
