/**
 * src/modules/tenants/tenant.service.ts
 *
 * WHY:
 * - Directory search: a brand looks up supplier organizations by name or handle
 *   before sending a connection request.
 *
 * RULES:
 * - Only supplier-capable, ACTIVE tenants are listed.
 * - The acting tenant never appears in its own results.
 * - Results are public cards (no status, no timestamps).
 */

import type { Logger } from '../../shared/logger/logger';
import type { ActingContext } from '../../shared/http/require-auth-context';
import type { AppUnitOfWork } from '../_shared/persistence/repos';

import { SUPPLIER_CAPABLE_TYPES } from './policies/tenant-capability.policy';
import type { DirectoryEntry, Tenant } from './tenant.types';

export const DIRECTORY_SEARCH_LIMIT = 10;

export function toDirectoryEntry(tenant: Tenant): DirectoryEntry {
  return {
    id: tenant.id,
    name: tenant.name,
    slug: tenant.slug,
    type: tenant.type,
    locationCountry: tenant.locationCountry,
  };
}

export class TenantService {
  constructor(
    private readonly deps: {
      uow: AppUnitOfWork;
      logger: Logger;
    },
  ) {}

  async searchDirectory(ctx: ActingContext, query: string): Promise<DirectoryEntry[]> {
    this.deps.logger.info({
      msg: 'tenants.directory.search',
      flow: 'tenants.directory',
      requestId: ctx.requestId,
      tenantId: ctx.tenantId,
    });

    const tenants = await this.deps.uow.transaction((repos) =>
      repos.tenants.search({
        query,
        types: SUPPLIER_CAPABLE_TYPES,
        excludeTenantId: ctx.tenantId,
        limit: DIRECTORY_SEARCH_LIMIT,
      }),
    );

    return tenants.map(toDirectoryEntry);
  }
}
