/**
 * backend/src/modules/connections/helpers/link-pending-invitations.ts
 *
 * WHY:
 * - A brand can invite a supplier by email before that supplier has an account.
 *   When the supplier signs up, those invitations must point at the new tenant so the
 *   supplier sees them as incoming requests.
 *
 * RULES:
 * - Runs inside the signup unit of work.
 * - Status stays PENDING: the supplier still accepts or declines explicitly.
 * - An invitation token presented at signup links that one invitation too, even when
 *   it was sent to a different address. An unknown or used token is ignored.
 * - Every linked connection is re-synced to its profile.
 */

import type { Repos } from '../../_shared/persistence/repos';
import type { TenantConnection } from '../connection.types';
import { syncProfile } from './sync-profile';

export type LinkPendingInvitationsParams = {
  email: string;
  tenantId: string;
  invitationTokenHash: string | null;
};

export async function linkPendingInvitations(
  repos: Pick<Repos, 'connections' | 'tenants' | 'supplierProfiles'>,
  params: LinkPendingInvitationsParams,
): Promise<TenantConnection[]> {
  const candidates = await repos.connections.listUnlinkedPendingByEmail(params.email);

  if (params.invitationTokenHash) {
    const byToken = await repos.connections.findByTokenHash(params.invitationTokenHash);
    if (
      byToken &&
      byToken.status === 'PENDING' &&
      byToken.targetTenantId === null &&
      !candidates.some((c) => c.id === byToken.id)
    ) {
      candidates.push(byToken);
    }
  }

  const linked: TenantConnection[] = [];
  for (const candidate of candidates) {
    // A brand never becomes its own supplier through an email invitation.
    if (candidate.requesterTenantId === params.tenantId) continue;

    const updated = await repos.connections.update(candidate.id, {
      targetTenantId: params.tenantId,
    });
    await syncProfile(repos, updated);
    linked.push(updated);
  }

  return linked;
}
