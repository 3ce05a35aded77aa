/**
 * backend/src/modules/connections/connection.types.ts
 *
 * WHY:
 * - TenantConnection is the Brand ↔ Supplier handshake (source of truth for status).
 * - SupplierProfile is the Brand's address-book card for one connection.
 *
 * RULES:
 * - Profile "sync" fields mirror the connection and are written only by syncProfile.
 * - Only the hash of an invitation token is ever stored.
 */

export const CONNECTION_STATUSES = [
  'PENDING',
  'ACTIVE',
  'REJECTED',
  'SUSPENDED',
  'DISCONNECTED',
] as const;
export type ConnectionStatus = (typeof CONNECTION_STATUSES)[number];

export type TenantConnection = {
  id: string;
  requesterTenantId: string;
  targetTenantId: string | null;
  invitationEmail: string | null;
  status: ConnectionStatus;
  invitationTokenHash: string | null;
  requestNote: string | null;
  retryCount: number;
  lastInvitedAt: Date;

  createdAt: Date;
  updatedAt: Date;
};

export type NewConnection = {
  requesterTenantId: string;
  targetTenantId: string | null;
  invitationEmail: string | null;
  invitationTokenHash: string;
  requestNote: string | null;
  lastInvitedAt: Date;
};

export type ConnectionPatch = Partial<
  Pick<
    TenantConnection,
    | 'targetTenantId'
    | 'invitationEmail'
    | 'status'
    | 'invitationTokenHash'
    | 'requestNote'
    | 'retryCount'
    | 'lastInvitedAt'
  >
>;

/** Fields of a profile that mirror its connection. */
export type ProfileSyncFields = {
  connectionStatus: ConnectionStatus | null;
  retryCount: number;
  invitationEmail: string | null;
  supplierTenantId: string | null;
  slug: string | null;
};

/** Fields of a profile the Brand edits directly. */
export type ProfileOwnFields = {
  name: string;
  description: string | null;
  locationCountry: string | null;
  contactName: string | null;
  contactEmail: string | null;
};

export type SupplierProfile = ProfileOwnFields &
  ProfileSyncFields & {
    id: string;
    tenantId: string;
    connectionId: string | null;

    createdAt: Date;
    updatedAt: Date;
  };

export type NewSupplierProfile = ProfileOwnFields & {
  tenantId: string;
  connectionId: string;
};

/** What an invited party sees when it opens an invitation link. */
export type InvitationPreview = {
  connectionId: string;
  requester: { id: string; name: string; slug: string };
  requestNote: string | null;
  invitationEmail: string | null;
};

/** A PENDING request, as seen by its target. */
export type IncomingConnection = {
  id: string;
  requester: { id: string; name: string; slug: string };
  requestNote: string | null;
  lastInvitedAt: Date;
};

/** A connection as returned over HTTP (the token hash never leaves the server). */
export type ConnectionView = Omit<TenantConnection, 'invitationTokenHash'>;

export function toConnectionView(connection: TenantConnection): ConnectionView {
  const { invitationTokenHash: _hash, ...view } = connection;
  return view;
}
