/**
 * src/modules/references/reference.service.ts
 *
 * WHY:
 * - The reference library resolver: which rows a tenant sees, which it may change,
 *   and what happens to product versions when a row is deleted.
 * - Written once (ReferenceLibraryService); each kind only names its repo, its unique
 *   fields and its delete rule.
 *
 * RULES:
 * - Create always stamps the acting tenant (nobody creates System Global rows here).
 * - Uniqueness spans System Global + own rows, case-insensitively, per unique field.
 * - Update/Delete: system row → FORBIDDEN; other tenant's or missing row → NOT_FOUND.
 * - One unit of work per operation; audit dispatched after commit.
 */

import type { Logger } from '../../shared/logger/logger';
import type { ActingContext } from '../../shared/http/require-auth-context';
import type { AuditSink } from '../../shared/audit/audit.sink';
import type { AuditChanges } from '../../shared/audit/audit.types';
import { AuditWriter } from '../../shared/audit/audit.writer';
import type { AppUnitOfWork, Repos } from '../_shared/persistence/repos';

import type { ReferenceRepo } from './dal/reference.repo';
import { assertEditableByTenant } from './policies/reference-ownership.policy';
import { ReferenceErrors } from './reference.errors';
import {
  ownerOf,
  type CertificateDefinitionFields,
  type CertificateDefinitionUniqueField,
  type CertificationFields,
  type CertificationUniqueField,
  type LibraryOwner,
  type MaterialDefinitionFields,
  type MaterialDefinitionUniqueField,
  type MaterialFields,
  type MaterialUniqueField,
  type ReferenceItem,
  type ReferenceKind,
} from './reference.types';

export type ReferenceServiceDeps = {
  uow: AppUnitOfWork;
  logger: Logger;
  auditSink: AuditSink;
};

/** A row as listed to a tenant: who owns it and whether the tenant may change it. */
export type ReferenceView<TFields> = ReferenceItem<TFields> & {
  owner: LibraryOwner;
  isEditable: boolean;
};

function toView<TFields>(item: ReferenceItem<TFields>, tenantId: string): ReferenceView<TFields> {
  return { ...item, owner: ownerOf(item), isEditable: item.tenantId === tenantId };
}

export abstract class ReferenceLibraryService<
  TFields extends Record<TField, string> & { name: string },
  TField extends string,
> {
  constructor(
    protected readonly deps: ReferenceServiceDeps,
    readonly kind: ReferenceKind<TField>,
  ) {}

  protected abstract repo(repos: Repos): ReferenceRepo<TFields, TField>;

  /** Product-version rows that link the item. */
  protected countLinks(_repos: Repos, _id: string): Promise<number> {
    return Promise.resolve(0);
  }

  /**
   * Makes the item deletable. Default: refuse while anything links it.
   * Returns extra audit changes for the DELETE event.
   */
  protected async releaseLinks(repos: Repos, item: ReferenceItem<TFields>): Promise<AuditChanges> {
    const links = await this.countLinks(repos, item.id);
    if (links > 0) {
      throw ReferenceErrors.inUse(this.kind.label, links, { id: item.id });
    }
    return {};
  }

  private async assertUnique(
    repo: ReferenceRepo<TFields, TField>,
    tenantId: string,
    fields: Partial<TFields>,
    excludeId?: string,
  ): Promise<void> {
    for (const field of this.kind.uniqueFields) {
      const value: string | undefined = fields[field];
      if (value === undefined) continue;

      const clash = await repo.findVisibleByField(tenantId, field, value, excludeId);
      if (clash) {
        throw ReferenceErrors.duplicate(this.kind.label, field, value, ownerOf(clash), {
          conflictingId: clash.id,
        });
      }
    }
  }

  private flow(op: string): string {
    return `references.${this.kind.entityType}.${op}`;
  }

  async list(ctx: ActingContext): Promise<ReferenceView<TFields>[]> {
    const items = await this.deps.uow.transaction((repos) =>
      this.repo(repos).listVisible(ctx.tenantId),
    );
    return items.map((item) => toView(item, ctx.tenantId));
  }

  async create(ctx: ActingContext, fields: TFields): Promise<ReferenceView<TFields>> {
    this.deps.logger.info({
      msg: `${this.flow('create')}.start`,
      flow: this.flow('create'),
      requestId: ctx.requestId,
      tenantId: ctx.tenantId,
    });

    const audit = new AuditWriter(ctx);

    const created = await this.deps.uow.transaction(async (repos) => {
      const repo = this.repo(repos);
      await this.assertUnique(repo, ctx.tenantId, fields);

      const item = await repo.insert(ctx.tenantId, fields);
      audit.record(this.kind.entityType, item.id, 'CREATE', { ...fields });
      return item;
    });

    this.deps.auditSink.dispatch(audit.drain());

    this.deps.logger.info({
      msg: `${this.flow('create')}.success`,
      flow: this.flow('create'),
      requestId: ctx.requestId,
      tenantId: ctx.tenantId,
      id: created.id,
    });

    return toView(created, ctx.tenantId);
  }

  async update(
    ctx: ActingContext,
    id: string,
    patch: Partial<TFields>,
  ): Promise<ReferenceView<TFields>> {
    this.deps.logger.info({
      msg: `${this.flow('update')}.start`,
      flow: this.flow('update'),
      requestId: ctx.requestId,
      tenantId: ctx.tenantId,
      id,
    });

    const audit = new AuditWriter(ctx);

    const updated = await this.deps.uow.transaction(async (repos) => {
      const repo = this.repo(repos);
      const existing = await repo.findById(id);
      assertEditableByTenant(existing, ctx.tenantId, this.kind.label);

      await this.assertUnique(repo, ctx.tenantId, patch, existing.id);

      const item = await repo.update(existing.id, patch);
      audit.record(this.kind.entityType, item.id, 'UPDATE', { ...patch });
      return item;
    });

    this.deps.auditSink.dispatch(audit.drain());

    return toView(updated, ctx.tenantId);
  }

  async delete(ctx: ActingContext, id: string): Promise<void> {
    this.deps.logger.info({
      msg: `${this.flow('delete')}.start`,
      flow: this.flow('delete'),
      requestId: ctx.requestId,
      tenantId: ctx.tenantId,
      id,
    });

    const audit = new AuditWriter(ctx);

    await this.deps.uow.transaction(async (repos) => {
      const repo = this.repo(repos);
      const existing = await repo.findById(id);
      assertEditableByTenant(existing, ctx.tenantId, this.kind.label);

      const released = await this.releaseLinks(repos, existing);
      await repo.delete(existing.id);

      audit.record(this.kind.entityType, existing.id, 'DELETE', {
        name: existing.name,
        ...released,
      });
    });

    this.deps.auditSink.dispatch(audit.drain());
  }
}

export class MaterialService extends ReferenceLibraryService<MaterialFields, MaterialUniqueField> {
  constructor(deps: ReferenceServiceDeps) {
    super(deps, { entityType: 'Material', label: 'material', uniqueFields: ['code', 'name'] });
  }

  protected repo(repos: Repos) {
    return repos.materials;
  }

  protected countLinks(repos: Repos, id: string): Promise<number> {
    return repos.versionChildren.countMaterialLinks(id);
  }
}

export class CertificationService extends ReferenceLibraryService<
  CertificationFields,
  CertificationUniqueField
> {
  constructor(deps: ReferenceServiceDeps) {
    super(deps, { entityType: 'Certification', label: 'certification', uniqueFields: ['code'] });
  }

  protected repo(repos: Repos) {
    return repos.certifications;
  }

  protected countLinks(repos: Repos, id: string): Promise<number> {
    return repos.versionChildren.countCertificationLinks(id);
  }
}

export class MaterialDefinitionService extends ReferenceLibraryService<
  MaterialDefinitionFields,
  MaterialDefinitionUniqueField
> {
  constructor(deps: ReferenceServiceDeps) {
    super(deps, {
      entityType: 'MaterialDefinition',
      label: 'material definition',
      uniqueFields: ['code'],
    });
  }

  protected repo(repos: Repos) {
    return repos.materialDefinitions;
  }

  protected countLinks(repos: Repos, id: string): Promise<number> {
    return repos.versionChildren.countMaterialDefinitionLinks(id);
  }
}

/** Deleting a definition detaches the certificates that used it instead of refusing. */
export class CertificateDefinitionService extends ReferenceLibraryService<
  CertificateDefinitionFields,
  CertificateDefinitionUniqueField
> {
  constructor(deps: ReferenceServiceDeps) {
    super(deps, {
      entityType: 'CertificateDefinition',
      label: 'certificate definition',
      uniqueFields: ['name'],
    });
  }

  protected repo(repos: Repos) {
    return repos.certificateDefinitions;
  }

  protected async releaseLinks(
    repos: Repos,
    item: ReferenceItem<CertificateDefinitionFields>,
  ): Promise<AuditChanges> {
    const unlinkedVersionCertificationIds =
      await repos.versionChildren.unlinkCertificateDefinition(item.id);
    return { unlinkedVersionCertificationIds };
  }
}
