/**
 * src/modules/tenants/tenant.schemas.ts
 *
 * WHY:
 * - Validates directory search input before it reaches the service.
 */

import { z } from 'zod';

export const directorySearchQuerySchema = z.object({
  q: z.string().trim().min(1, 'Search text is required').max(100),
});

export type DirectorySearchQuery = z.infer<typeof directorySearchQuerySchema>;
