/**
 * src/modules/connections/connection.service.ts
 *
 * WHY:
 * - Orchestrates the Brand ↔ Supplier invitation workflow:
 *   create → (reinvite)* → respond → disconnect, plus public token validation.
 * - Only place in the module that opens units of work.
 *
 * RULES:
 * - Every status change goes through connection-state.policy.
 * - Every connection write is followed by syncProfile inside the same unit of work.
 * - Raw tokens exist only in memory and inside the invitation link; only hashes are stored.
 * - Audit + invitation messages are dispatched after commit, never inside it.
 */

import type { Logger } from '../../shared/logger/logger';
import type { ActingContext } from '../../shared/http/require-auth-context';
import type { AuditSink } from '../../shared/audit/audit.sink';
import { AuditWriter } from '../../shared/audit/audit.writer';
import type { Queue, ConnectionInvitationMessage } from '../../shared/messaging/queue';
import type { TokenHasher } from '../../shared/security/token-hasher';
import { generateSecureToken } from '../../shared/security/token';
import type { AppUnitOfWork, Repos } from '../_shared/persistence/repos';

import {
  assertBrandCapable,
  assertTenantExists,
  isSupplierCapable,
} from '../tenants/policies/tenant-capability.policy';

import { ConnectionErrors } from './connection.errors';
import {
  auditConnectionCreated,
  auditConnectionRemoved,
  auditConnectionStatusChanged,
  auditProfileUpdated,
} from './connection.audit';
import {
  toConnectionView,
  type ConnectionView,
  type IncomingConnection,
  type InvitationPreview,
  type ProfileOwnFields,
  type SupplierProfile,
  type TenantConnection,
} from './connection.types';
import type {
  CreateConnectionInput,
  ReinviteInput,
  UpdateProfileInput,
} from './connection.schemas';
import type { ConnectionTarget } from './dal/connection.repo';
import {
  assertCanReinvite,
  assertConnectionPending,
  assertConnectionTransition,
  assertIsConnectionTarget,
  decideDisconnect,
  type DisconnectOutcome,
} from './policies/connection-state.policy';
import { syncProfile } from './helpers/sync-profile';

export type ConnectionServiceDeps = {
  uow: AppUnitOfWork;
  logger: Logger;
  auditSink: AuditSink;
  queue: Queue;
  tokenHasher: TokenHasher;
  publicAppUrl: string;
  maxRetries: number;
};

export type InvitationResult = {
  profile: SupplierProfile;
  connection: ConnectionView;
  /** Carries the raw single-use token. Returned once; never stored. */
  invitationLink: string;
};

export class ConnectionService {
  constructor(private readonly deps: ConnectionServiceDeps) {}

  private buildInvitationLink(rawToken: string): string {
    const base = this.deps.publicAppUrl.replace(/\/+$/, '');
    return `${base}/invitations/accept?token=${encodeURIComponent(rawToken)}`;
  }

  private issueToken(): { raw: string; hash: string } {
    const raw = generateSecureToken();
    return { raw, hash: this.deps.tokenHasher.hash(raw) };
  }

  private async enqueueInvitation(
    connection: TenantConnection,
    invitationLink: string,
  ): Promise<void> {
    const destination: ConnectionInvitationMessage['destination'] = connection.targetTenantId
      ? { kind: 'tenant', tenantId: connection.targetTenantId }
      : { kind: 'email', email: connection.invitationEmail ?? '' };

    await this.deps.queue.enqueue({
      type: 'connections.invitation',
      connectionId: connection.id,
      requesterTenantId: connection.requesterTenantId,
      destination,
      invitationLink,
      retryCount: connection.retryCount,
    });
  }

  /** Loads a profile of the acting brand; anything else is NOT_FOUND. */
  private async loadOwnProfile(repos: Repos, ctx: ActingContext, profileId: string) {
    const profile = await repos.supplierProfiles.findById(profileId);
    if (!profile || profile.tenantId !== ctx.tenantId) {
      throw ConnectionErrors.profileNotFound({ profileId });
    }
    return profile;
  }

  private async reloadProfile(repos: Repos, profileId: string): Promise<SupplierProfile> {
    const profile = await repos.supplierProfiles.findById(profileId);
    if (!profile) throw ConnectionErrors.profileNotFound({ profileId });
    return profile;
  }

  async createConnection(
    ctx: ActingContext,
    input: CreateConnectionInput,
  ): Promise<InvitationResult> {
    this.deps.logger.info({
      msg: 'connections.create.start',
      flow: 'connections.create',
      requestId: ctx.requestId,
      tenantId: ctx.tenantId,
      byHandle: input.handle !== undefined,
    });

    const audit = new AuditWriter(ctx);
    const token = this.issueToken();
    const now = new Date();

    const { profile, connection } = await this.deps.uow.transaction(async (repos) => {
      const requester = await repos.tenants.findById(ctx.tenantId);
      assertTenantExists(requester, ctx.tenantId);
      assertBrandCapable(requester);

      let target: ConnectionTarget;
      let defaultName: string;

      if (input.handle !== undefined) {
        const tenant = await repos.tenants.findBySlug(input.handle);
        if (!tenant) throw ConnectionErrors.targetNotFound({ handle: input.handle });
        if (tenant.id === ctx.tenantId) throw ConnectionErrors.cannotConnectToSelf();
        if (!isSupplierCapable(tenant.type)) {
          throw ConnectionErrors.targetNotSupplier({ targetTenantId: tenant.id });
        }
        target = { tenantId: tenant.id };
        defaultName = tenant.name;
      } else if (input.email !== undefined) {
        target = { email: input.email };
        defaultName = input.email;
      } else {
        throw ConnectionErrors.targetNotFound();
      }

      const existing = await repos.connections.findOpenToTarget(ctx.tenantId, target);
      if (existing) {
        throw ConnectionErrors.alreadyConnected({
          connectionId: existing.id,
          status: existing.status,
        });
      }

      const name = input.name ?? defaultName;
      if (await repos.supplierProfiles.findByName(ctx.tenantId, name)) {
        throw ConnectionErrors.profileNameTaken(name);
      }

      const connection = await repos.connections.insert({
        requesterTenantId: ctx.tenantId,
        targetTenantId: 'tenantId' in target ? target.tenantId : null,
        invitationEmail: 'email' in target ? target.email : null,
        invitationTokenHash: token.hash,
        requestNote: input.note ?? null,
        lastInvitedAt: now,
      });

      const created = await repos.supplierProfiles.insert({
        tenantId: ctx.tenantId,
        connectionId: connection.id,
        name,
        description: input.description ?? null,
        locationCountry: input.locationCountry ?? null,
        contactName: input.contactName ?? null,
        contactEmail: input.contactEmail ?? input.email ?? null,
      });

      await syncProfile(repos, connection);
      const profile = await this.reloadProfile(repos, created.id);

      auditConnectionCreated(audit, { connection, profile });
      return { profile, connection };
    });

    this.deps.auditSink.dispatch(audit.drain());

    const invitationLink = this.buildInvitationLink(token.raw);
    await this.enqueueInvitation(connection, invitationLink);

    this.deps.logger.info({
      msg: 'connections.create.success',
      flow: 'connections.create',
      requestId: ctx.requestId,
      tenantId: ctx.tenantId,
      connectionId: connection.id,
      profileId: profile.id,
    });

    return { profile, connection: toConnectionView(connection), invitationLink };
  }

  /**
   * Sends a fresh invitation. The previous link stops working (token rotated).
   * Bounded by maxRetries: with the default of 3, the 3rd reinvite succeeds and the 4th fails.
   */
  async reinvite(
    ctx: ActingContext,
    profileId: string,
    input: ReinviteInput,
  ): Promise<InvitationResult> {
    this.deps.logger.info({
      msg: 'connections.reinvite.start',
      flow: 'connections.reinvite',
      requestId: ctx.requestId,
      tenantId: ctx.tenantId,
      profileId,
    });

    const audit = new AuditWriter(ctx);
    const token = this.issueToken();

    const { profile, connection } = await this.deps.uow.transaction(async (repos) => {
      const current = await this.loadOwnProfile(repos, ctx, profileId);
      const before = current.connectionId
        ? await repos.connections.findById(current.connectionId)
        : undefined;
      if (!before) throw ConnectionErrors.connectionNotFound({ profileId });

      assertCanReinvite(before, this.deps.maxRetries);
      assertConnectionTransition(before, 'PENDING');

      const connection = await repos.connections.update(before.id, {
        status: 'PENDING',
        invitationTokenHash: token.hash,
        retryCount: before.retryCount + 1,
        lastInvitedAt: new Date(),
        invitationEmail: input.email,
        requestNote: input.note,
      });

      await syncProfile(repos, connection);
      const profile = await this.reloadProfile(repos, current.id);

      auditConnectionStatusChanged(audit, { before, after: connection, action: 'reinvite' });
      return { profile, connection };
    });

    this.deps.auditSink.dispatch(audit.drain());

    const invitationLink = this.buildInvitationLink(token.raw);
    await this.enqueueInvitation(connection, invitationLink);

    this.deps.logger.info({
      msg: 'connections.reinvite.success',
      flow: 'connections.reinvite',
      requestId: ctx.requestId,
      tenantId: ctx.tenantId,
      connectionId: connection.id,
      retryCount: connection.retryCount,
    });

    return { profile, connection: toConnectionView(connection), invitationLink };
  }

  /** Accept or decline, by the target tenant only. */
  async respond(
    ctx: ActingContext,
    connectionId: string,
    accept: boolean,
  ): Promise<ConnectionView> {
    const flow = accept ? 'connections.accept' : 'connections.decline';
    this.deps.logger.info({
      msg: `${flow}.start`,
      flow,
      requestId: ctx.requestId,
      tenantId: ctx.tenantId,
      connectionId,
    });

    const audit = new AuditWriter(ctx);

    const connection = await this.deps.uow.transaction(async (repos) => {
      const before = await repos.connections.findById(connectionId);
      if (!before) throw ConnectionErrors.connectionNotFound({ connectionId });

      assertIsConnectionTarget(before, ctx.tenantId);
      assertConnectionPending(before);

      if (accept) {
        const self = await repos.tenants.findById(ctx.tenantId);
        assertTenantExists(self, ctx.tenantId);
        if (!isSupplierCapable(self.type)) {
          throw ConnectionErrors.targetNotSupplier({ targetTenantId: self.id });
        }
      }

      const to = accept ? 'ACTIVE' : 'REJECTED';
      assertConnectionTransition(before, to);

      // Accept consumes the token. Decline keeps it; validation fails anyway (not PENDING).
      const after = await repos.connections.update(before.id, {
        status: to,
        invitationTokenHash: accept ? null : undefined,
      });

      await syncProfile(repos, after);

      auditConnectionStatusChanged(audit, { before, after, action: accept ? 'accept' : 'decline' });
      return after;
    });

    this.deps.auditSink.dispatch(audit.drain());

    this.deps.logger.info({
      msg: `${flow}.success`,
      flow,
      requestId: ctx.requestId,
      tenantId: ctx.tenantId,
      connectionId: connection.id,
      status: connection.status,
    });

    return toConnectionView(connection);
  }

  /**
   * Unanswered or dead connections are removed with their profile.
   * Live ones (ACTIVE/SUSPENDED) become DISCONNECTED and keep the profile as history.
   */
  async disconnect(
    ctx: ActingContext,
    profileId: string,
  ): Promise<{ outcome: DisconnectOutcome; profile: SupplierProfile | null }> {
    this.deps.logger.info({
      msg: 'connections.disconnect.start',
      flow: 'connections.disconnect',
      requestId: ctx.requestId,
      tenantId: ctx.tenantId,
      profileId,
    });

    const audit = new AuditWriter(ctx);

    const result = await this.deps.uow.transaction(async (repos) => {
      const profile = await this.loadOwnProfile(repos, ctx, profileId);
      const connection = profile.connectionId
        ? await repos.connections.findById(profile.connectionId)
        : undefined;

      const outcome = decideDisconnect(connection);

      if (outcome === 'DELETE') {
        await repos.supplierProfiles.delete(profile.id);
        if (connection) await repos.connections.delete(connection.id);

        auditConnectionRemoved(audit, { profile, connection });
        return { outcome, profile: null };
      }

      if (!connection) throw ConnectionErrors.connectionNotFound({ profileId });
      assertConnectionTransition(connection, 'DISCONNECTED');

      const after = await repos.connections.update(connection.id, {
        status: 'DISCONNECTED',
        invitationTokenHash: null,
      });
      await syncProfile(repos, after);

      auditConnectionStatusChanged(audit, { before: connection, after, action: 'disconnect' });
      return { outcome, profile: await this.reloadProfile(repos, profile.id) };
    });

    this.deps.auditSink.dispatch(audit.drain());

    this.deps.logger.info({
      msg: 'connections.disconnect.success',
      flow: 'connections.disconnect',
      requestId: ctx.requestId,
      tenantId: ctx.tenantId,
      profileId,
      outcome: result.outcome,
    });

    return result;
  }

  /** Public: what an invitation link points at. Only PENDING invitations resolve. */
  async validateToken(rawToken: string, requestId: string): Promise<InvitationPreview> {
    this.deps.logger.info({
      msg: 'connections.validate_token.start',
      flow: 'connections.validate_token',
      requestId,
    });

    const tokenHash = this.deps.tokenHasher.hash(rawToken);

    return this.deps.uow.transaction(async (repos) => {
      const connection = await repos.connections.findByTokenHash(tokenHash);
      if (!connection || connection.status !== 'PENDING') {
        throw ConnectionErrors.invitationNotFound();
      }

      const requester = await repos.tenants.findById(connection.requesterTenantId);
      if (!requester) throw ConnectionErrors.invitationNotFound();

      return {
        connectionId: connection.id,
        requester: { id: requester.id, name: requester.name, slug: requester.slug },
        requestNote: connection.requestNote,
        invitationEmail: connection.invitationEmail,
      };
    });
  }

  async listProfiles(ctx: ActingContext): Promise<SupplierProfile[]> {
    return this.deps.uow.transaction((repos) => repos.supplierProfiles.listForTenant(ctx.tenantId));
  }

  async getProfile(ctx: ActingContext, profileId: string): Promise<SupplierProfile> {
    return this.deps.uow.transaction((repos) => this.loadOwnProfile(repos, ctx, profileId));
  }

  async updateProfile(
    ctx: ActingContext,
    profileId: string,
    input: UpdateProfileInput,
  ): Promise<SupplierProfile> {
    this.deps.logger.info({
      msg: 'connections.update_profile.start',
      flow: 'connections.update_profile',
      requestId: ctx.requestId,
      tenantId: ctx.tenantId,
      profileId,
    });

    const audit = new AuditWriter(ctx);

    const profile = await this.deps.uow.transaction(async (repos) => {
      const current = await this.loadOwnProfile(repos, ctx, profileId);

      if (input.name !== undefined) {
        const clash = await repos.supplierProfiles.findByName(ctx.tenantId, input.name, current.id);
        if (clash) throw ConnectionErrors.profileNameTaken(input.name);
      }

      const patch: Partial<ProfileOwnFields> = {
        name: input.name,
        description: input.description,
        locationCountry: input.locationCountry,
        contactName: input.contactName,
        contactEmail: input.contactEmail,
      };

      const updated = await repos.supplierProfiles.updateOwnFields(current.id, patch);
      auditProfileUpdated(audit, { profileId: updated.id, changes: { ...input } });
      return updated;
    });

    this.deps.auditSink.dispatch(audit.drain());
    return profile;
  }

  /** PENDING requests addressed to the acting tenant. */
  async listIncoming(ctx: ActingContext): Promise<IncomingConnection[]> {
    return this.deps.uow.transaction(async (repos) => {
      const pending = await repos.connections.listPendingForTarget(ctx.tenantId);
      const requesters = await repos.tenants.findManyByIds(
        pending.map((c) => c.requesterTenantId),
      );
      const byId = new Map(requesters.map((t) => [t.id, t]));

      return pending.flatMap((connection) => {
        const requester = byId.get(connection.requesterTenantId);
        if (!requester) return [];
        return [
          {
            id: connection.id,
            requester: { id: requester.id, name: requester.name, slug: requester.slug },
            requestNote: connection.requestNote,
            lastInvitedAt: connection.lastInvitedAt,
          },
        ];
      });
    });
  }
}
