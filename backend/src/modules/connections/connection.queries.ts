/**
 * backend/src/modules/connections/connection.queries.ts
 *
 * WHY:
 * - Shapes DB rows into Connections domain types.
 *
 * RULES:
 * - Pure mapping only.
 * - Unknown statuses map to DISCONNECTED (the most restrictive state).
 */

import type { Selectable } from 'kysely';
import type { SupplierProfilesTable, TenantConnectionsTable } from '../../shared/db/tables';
import {
  CONNECTION_STATUSES,
  type ConnectionStatus,
  type SupplierProfile,
  type TenantConnection,
} from './connection.types';

export type ConnectionRow = Selectable<TenantConnectionsTable>;
export type SupplierProfileRow = Selectable<SupplierProfilesTable>;

export function parseConnectionStatus(value: string): ConnectionStatus {
  return CONNECTION_STATUSES.find((s) => s === value) ?? 'DISCONNECTED';
}

export function toConnection(row: ConnectionRow): TenantConnection {
  return {
    id: row.id,
    requesterTenantId: row.requester_tenant_id,
    targetTenantId: row.target_tenant_id,
    invitationEmail: row.invitation_email,
    status: parseConnectionStatus(row.status),
    invitationTokenHash: row.invitation_token_hash,
    requestNote: row.request_note,
    retryCount: row.retry_count,
    lastInvitedAt: row.last_invited_at,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

export function toSupplierProfile(row: SupplierProfileRow): SupplierProfile {
  return {
    id: row.id,
    tenantId: row.tenant_id,
    connectionId: row.connection_id,

    name: row.name,
    description: row.description,
    locationCountry: row.location_country,
    contactName: row.contact_name,
    contactEmail: row.contact_email,

    connectionStatus: row.connection_status ? parseConnectionStatus(row.connection_status) : null,
    retryCount: row.retry_count,
    invitationEmail: row.invitation_email,
    supplierTenantId: row.supplier_tenant_id,
    slug: row.slug,

    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}
