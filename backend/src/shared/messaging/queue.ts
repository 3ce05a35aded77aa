/**
 * src/shared/messaging/queue.ts
 *
 * WHY:
 * - Decouples "a tenant must be told about something" from "how it is delivered".
 *   Services enqueue messages; the transport is wired at the DI layer only.
 *
 * RULES:
 * - Queue interface depends on nothing else in this codebase (shared → nothing).
 * - Message types are discriminated unions on the `type` field.
 * - Messages must be JSON-serializable.
 * - The raw invitation token is allowed here ONLY inside invitationLink; it is
 *   never stored anywhere.
 * - Services enqueue AFTER the unit of work commits, never inside it.
 */

// ── Message types ─────────────────────────────────────────────

export type InvitationDestination = { kind: 'email'; email: string } | { kind: 'tenant'; tenantId: string };

export type ConnectionInvitationMessage = {
  type: 'connections.invitation';
  connectionId: string;
  requesterTenantId: string;
  destination: InvitationDestination;
  /**
   * Link format: {PUBLIC_APP_URL}/invitations/accept?token={rawToken}
   */
  invitationLink: string;
  /** 0 for the first invitation, then 1..max for reinvites. */
  retryCount: number;
};

export type ContributionStatusMessage = {
  type: 'contributions.status_changed';
  requestId: string;
  productId: string;
  status: string;
  /** The party that should hear about the change (the other side of the request). */
  notifyTenantId: string;
};

// Union — add new message types as modules grow.
export type QueueMessage = ConnectionInvitationMessage | ContributionStatusMessage;

export type QueueMessageType = QueueMessage['type'];

// ── Queue interface ───────────────────────────────────────────

export interface Queue {
  enqueue(message: QueueMessage): Promise<void>;
}
