/**
 * backend/test/helpers/inmem-persistence.ts
 *
 * WHY:
 * - E2E specs run the real app (routes, services, flows, policies) without Postgres.
 * - Implements every repository port in `Repos` over plain arrays, with the same
 *   ordering, defaults and FK side effects as the Kysely implementations.
 *
 * RULES:
 * - A unit of work snapshots all tables; a throw inside `work` restores the snapshot.
 * - Rows are copied on the way in and on the way out (no shared references).
 * - Timestamps come from a strictly increasing clock so "latest" ordering is stable.
 */

import { randomUUID } from 'node:crypto';

import type { UnitOfWork } from '../../src/shared/db/unit-of-work';
import type { Repos } from '../../src/modules/_shared/persistence/repos';
import type { ReferenceRepo } from '../../src/modules/references/dal/reference.repo';
import type { ReferenceItem } from '../../src/modules/references/reference.types';
import type {
  CertificateDefinitionFields,
  CertificationFields,
  MaterialDefinitionFields,
  MaterialFields,
} from '../../src/modules/references/reference.types';
import type { Tenant } from '../../src/modules/tenants/tenant.types';
import type { User } from '../../src/modules/users/user.types';
import type { Membership } from '../../src/modules/memberships/membership.types';
import type {
  SupplierProfile,
  TenantConnection,
} from '../../src/modules/connections/connection.types';
import type {
  Product,
  ProductMedia,
  ProductVersion,
  VersionCertification,
  VersionMaterial,
  VersionSupplier,
} from '../../src/modules/products/product.types';
import {
  OPEN_CONTRIBUTION_STATUSES,
  type CollaborationComment,
  type ContributionRequest,
  type SupplierArtifact,
} from '../../src/modules/contributions/contribution.types';

export type InMemTables = {
  tenants: Tenant[];
  users: User[];
  memberships: Membership[];
  connections: TenantConnection[];
  supplierProfiles: SupplierProfile[];
  materials: ReferenceItem<MaterialFields>[];
  certifications: ReferenceItem<CertificationFields>[];
  certificateDefinitions: ReferenceItem<CertificateDefinitionFields>[];
  materialDefinitions: ReferenceItem<MaterialDefinitionFields>[];
  products: Product[];
  productMedia: ProductMedia[];
  productVersions: ProductVersion[];
  versionMaterials: VersionMaterial[];
  versionSuppliers: VersionSupplier[];
  versionCertifications: VersionCertification[];
  contributionRequests: ContributionRequest[];
  comments: CollaborationComment[];
  supplierArtifacts: SupplierArtifact[];
};

function emptyTables(): InMemTables {
  return {
    tenants: [],
    users: [],
    memberships: [],
    connections: [],
    supplierProfiles: [],
    materials: [],
    certifications: [],
    certificateDefinitions: [],
    materialDefinitions: [],
    products: [],
    productMedia: [],
    productVersions: [],
    versionMaterials: [],
    versionSuppliers: [],
    versionCertifications: [],
    contributionRequests: [],
    comments: [],
    supplierArtifacts: [],
  };
}

export class InMemDatabase {
  tables: InMemTables = emptyTables();
  private lastTime = 0;

  /** Strictly increasing timestamps. */
  now(): Date {
    const t = Math.max(Date.now(), this.lastTime + 1);
    this.lastTime = t;
    return new Date(t);
  }
}

type Row = { id: string };

function copy<T>(row: T): T {
  return structuredClone(row);
}

function byTime<T>(pick: (row: T) => Date, direction: 'asc' | 'desc' = 'asc') {
  return (a: T, b: T) => {
    const diff = pick(a).getTime() - pick(b).getTime();
    return direction === 'asc' ? diff : -diff;
  };
}

function byName<T extends { name: string }>(a: T, b: T): number {
  return a.name < b.name ? -1 : a.name > b.name ? 1 : 0;
}

function requireRow<T extends Row>(rows: T[], id: string, table: string): T {
  const row = rows.find((r) => r.id === id);
  if (!row) throw new Error(`${table}: no row ${id}`);
  return row;
}

function patchRow<T extends Row>(rows: T[], id: string, table: string, patch: object): T {
  const row = requireRow(rows, id, table);
  for (const [key, value] of Object.entries(patch)) {
    if (value !== undefined) Reflect.set(row, key, value);
  }
  return row;
}

function sameText(a: string | null, b: string): boolean {
  return a !== null && a.toLowerCase() === b.toLowerCase();
}

class InMemReferenceRepo<TFields extends { name: string }>
  implements ReferenceRepo<TFields, string>
{
  constructor(
    private readonly db: InMemDatabase,
    private readonly rows: () => ReferenceItem<TFields>[],
  ) {}

  async listVisible(tenantId: string): Promise<ReferenceItem<TFields>[]> {
    return this.rows()
      .filter((r) => r.tenantId === null || r.tenantId === tenantId)
      .map(copy)
      .sort(byName);
  }

  async listSystem(): Promise<ReferenceItem<TFields>[]> {
    return this.rows()
      .filter((r) => r.tenantId === null)
      .map(copy)
      .sort(byName);
  }

  async findById(id: string): Promise<ReferenceItem<TFields> | undefined> {
    const row = this.rows().find((r) => r.id === id);
    return row ? copy(row) : undefined;
  }

  async findVisibleByField(
    tenantId: string,
    field: string,
    value: string,
    excludeId?: string,
  ): Promise<ReferenceItem<TFields> | undefined> {
    const row = this.rows().find((r) => {
      const current: unknown = Reflect.get(r, field);
      return (
        (r.tenantId === null || r.tenantId === tenantId) &&
        r.id !== excludeId &&
        typeof current === 'string' &&
        sameText(current, value)
      );
    });
    return row ? copy(row) : undefined;
  }

  async insert(tenantId: string | null, fields: TFields): Promise<ReferenceItem<TFields>> {
    const now = this.db.now();
    const row: ReferenceItem<TFields> = {
      ...fields,
      id: randomUUID(),
      tenantId,
      createdAt: now,
      updatedAt: now,
    };
    this.rows().push(row);
    return copy(row);
  }

  async update(id: string, patch: Partial<TFields>): Promise<ReferenceItem<TFields>> {
    const row = patchRow(this.rows(), id, 'reference', patch);
    row.updatedAt = this.db.now();
    return copy(row);
  }

  async delete(id: string): Promise<void> {
    const rows = this.rows();
    const index = rows.findIndex((r) => r.id === id);
    if (index >= 0) rows.splice(index, 1);
  }
}

export function createInMemRepos(db: InMemDatabase): Repos {
  const t = () => db.tables;

  return {
    tenants: {
      async findById(id) {
        const row = t().tenants.find((r) => r.id === id);
        return row ? copy(row) : undefined;
      },
      async findManyByIds(ids) {
        return t()
          .tenants.filter((r) => ids.includes(r.id))
          .map(copy);
      },
      async findBySlug(slug) {
        const row = t().tenants.find((r) => r.slug === slug.toLowerCase());
        return row ? copy(row) : undefined;
      },
      async findByName(name) {
        const row = t().tenants.find((r) => sameText(r.name, name));
        return row ? copy(row) : undefined;
      },
      async slugExists(slug) {
        return t().tenants.some((r) => r.slug === slug);
      },
      async insert(input) {
        const now = db.now();
        const row: Tenant = {
          ...input,
          id: randomUUID(),
          status: 'ACTIVE',
          createdAt: now,
          updatedAt: now,
        };
        t().tenants.push(row);
        return copy(row);
      },
      async search(params) {
        const q = params.query.trim().toLowerCase();
        return t()
          .tenants.filter(
            (r) =>
              params.types.includes(r.type) &&
              r.status === 'ACTIVE' &&
              r.id !== params.excludeTenantId &&
              (r.name.toLowerCase().includes(q) || r.slug.toLowerCase().includes(q)),
          )
          .sort(byName)
          .slice(0, params.limit)
          .map(copy);
      },
    },

    users: {
      async findById(id) {
        const row = t().users.find((r) => r.id === id);
        return row ? copy(row) : undefined;
      },
      async findByEmail(email) {
        const row = t().users.find((r) => r.email === email.toLowerCase());
        return row ? copy(row) : undefined;
      },
      async insert(input) {
        const now = db.now();
        const row: User = {
          ...input,
          email: input.email.toLowerCase(),
          id: randomUUID(),
          isActive: true,
          createdAt: now,
          updatedAt: now,
        };
        t().users.push(row);
        return copy(row);
      },
    },

    memberships: {
      async findById(id) {
        const row = t().memberships.find((r) => r.id === id);
        return row ? copy(row) : undefined;
      },
      async findForUserAndTenant(userId, tenantId) {
        const row = t().memberships.find((r) => r.userId === userId && r.tenantId === tenantId);
        return row ? copy(row) : undefined;
      },
      async listForUser(userId) {
        return t()
          .memberships.filter((r) => r.userId === userId)
          .sort(byTime((r) => r.createdAt))
          .map(copy);
      },
      async insert(input) {
        const now = db.now();
        const row: Membership = { ...input, id: randomUUID(), createdAt: now, updatedAt: now };
        t().memberships.push(row);
        return copy(row);
      },
    },

    connections: {
      async findById(id) {
        const row = t().connections.find((r) => r.id === id);
        return row ? copy(row) : undefined;
      },
      async findByTokenHash(tokenHash) {
        const row = t().connections.find((r) => r.invitationTokenHash === tokenHash);
        return row ? copy(row) : undefined;
      },
      async findOpenToTarget(requesterTenantId, target) {
        const row = t().connections.find(
          (r) =>
            r.requesterTenantId === requesterTenantId &&
            r.status !== 'DISCONNECTED' &&
            ('tenantId' in target
              ? r.targetTenantId === target.tenantId
              : r.invitationEmail === target.email),
        );
        return row ? copy(row) : undefined;
      },
      async listPendingForTarget(targetTenantId) {
        return t()
          .connections.filter((r) => r.targetTenantId === targetTenantId && r.status === 'PENDING')
          .sort(byTime((r) => r.lastInvitedAt, 'desc'))
          .map(copy);
      },
      async listUnlinkedPendingByEmail(email) {
        return t()
          .connections.filter(
            (r) => r.invitationEmail === email && r.targetTenantId === null && r.status === 'PENDING',
          )
          .map(copy);
      },
      async insert(input) {
        const now = db.now();
        const row: TenantConnection = {
          ...input,
          id: randomUUID(),
          status: 'PENDING',
          retryCount: 0,
          createdAt: now,
          updatedAt: now,
        };
        t().connections.push(row);
        return copy(row);
      },
      async update(id, patch) {
        const row = patchRow(t().connections, id, 'tenant_connections', patch);
        row.updatedAt = db.now();
        return copy(row);
      },
      async delete(id) {
        t().connections = t().connections.filter((r) => r.id !== id);
        for (const profile of t().supplierProfiles) {
          if (profile.connectionId === id) profile.connectionId = null;
        }
      },
    },

    supplierProfiles: {
      async findById(id) {
        const row = t().supplierProfiles.find((r) => r.id === id);
        return row ? copy(row) : undefined;
      },
      async findByConnectionId(connectionId) {
        const row = t().supplierProfiles.find((r) => r.connectionId === connectionId);
        return row ? copy(row) : undefined;
      },
      async findByName(tenantId, name, excludeId) {
        const row = t().supplierProfiles.find(
          (r) => r.tenantId === tenantId && r.id !== excludeId && sameText(r.name, name),
        );
        return row ? copy(row) : undefined;
      },
      async listForTenant(tenantId) {
        return t()
          .supplierProfiles.filter((r) => r.tenantId === tenantId)
          .sort(byName)
          .map(copy);
      },
      async insert(input) {
        const now = db.now();
        const row: SupplierProfile = {
          ...input,
          id: randomUUID(),
          connectionStatus: null,
          retryCount: 0,
          invitationEmail: null,
          supplierTenantId: null,
          slug: null,
          createdAt: now,
          updatedAt: now,
        };
        t().supplierProfiles.push(row);
        return copy(row);
      },
      async updateOwnFields(id, patch) {
        const row = patchRow(t().supplierProfiles, id, 'supplier_profiles', patch);
        row.updatedAt = db.now();
        return copy(row);
      },
      async applySync(connectionId, fields) {
        for (const row of t().supplierProfiles) {
          if (row.connectionId !== connectionId) continue;
          Object.assign(row, fields, { updatedAt: db.now() });
        }
      },
      async delete(id) {
        t().supplierProfiles = t().supplierProfiles.filter((r) => r.id !== id);
        for (const request of t().contributionRequests) {
          if (request.supplierProfileId === id) request.supplierProfileId = null;
        }
        for (const supplier of t().versionSuppliers) {
          if (supplier.supplierProfileId === id) supplier.supplierProfileId = null;
        }
      },
    },

    materials: new InMemReferenceRepo(db, () => t().materials),
    certifications: new InMemReferenceRepo(db, () => t().certifications),
    certificateDefinitions: new InMemReferenceRepo(db, () => t().certificateDefinitions),
    materialDefinitions: new InMemReferenceRepo(db, () => t().materialDefinitions),

    products: {
      async findById(id) {
        const row = t().products.find((r) => r.id === id);
        return row ? copy(row) : undefined;
      },
      async findBySku(tenantId, sku, excludeId) {
        const row = t().products.find(
          (r) => r.tenantId === tenantId && r.id !== excludeId && sameText(r.sku, sku),
        );
        return row ? copy(row) : undefined;
      },
      async listForTenant(tenantId) {
        return t()
          .products.filter((r) => r.tenantId === tenantId)
          .sort(byTime((r) => r.createdAt, 'desc'))
          .map(copy);
      },
      async insert(input) {
        const now = db.now();
        const row: Product = {
          ...input,
          id: randomUUID(),
          lifecycleStatus: 'ACTIVE',
          createdAt: now,
          updatedAt: now,
        };
        t().products.push(row);
        return copy(row);
      },
      async update(id, patch) {
        const row = patchRow(t().products, id, 'products', patch);
        row.updatedAt = db.now();
        return copy(row);
      },
    },

    productMedia: {
      async findById(id) {
        const row = t().productMedia.find((r) => r.id === id);
        return row ? copy(row) : undefined;
      },
      async listForProduct(productId) {
        return t()
          .productMedia.filter((r) => r.productId === productId && !r.isDeleted)
          .sort((a, b) => a.displayOrder - b.displayOrder || a.createdAt.getTime() - b.createdAt.getTime())
          .map(copy);
      },
      async listMainForProducts(productIds) {
        return t()
          .productMedia.filter((r) => productIds.includes(r.productId) && r.isMain && !r.isDeleted)
          .map(copy);
      },
      async insert(input) {
        const row: ProductMedia = {
          ...input,
          id: randomUUID(),
          isDeleted: false,
          createdAt: db.now(),
        };
        t().productMedia.push(row);
        return copy(row);
      },
      async clearMain(productId) {
        for (const row of t().productMedia) {
          if (row.productId === productId && row.isMain) row.isMain = false;
        }
      },
      async update(id, patch) {
        return copy(patchRow(t().productMedia, id, 'product_media', patch));
      },
    },

    productVersions: {
      async findById(id) {
        const row = t().productVersions.find((r) => r.id === id);
        return row ? copy(row) : undefined;
      },
      async findLatest(productId) {
        const [row] = t()
          .productVersions.filter((r) => r.productId === productId)
          .sort((a, b) => b.versionSequence - a.versionSequence || b.revision - a.revision);
        return row ? copy(row) : undefined;
      },
      async listForProduct(productId) {
        return t()
          .productVersions.filter((r) => r.productId === productId)
          .sort((a, b) => b.versionSequence - a.versionSequence || b.revision - a.revision)
          .map(copy);
      },
      async listForProducts(productIds) {
        return t()
          .productVersions.filter((r) => productIds.includes(r.productId))
          .map(copy);
      },
      async insert(input) {
        const now = db.now();
        const row: ProductVersion = { ...input, id: randomUUID(), createdAt: now, updatedAt: now };
        t().productVersions.push(row);
        return copy(row);
      },
      async update(id, patch) {
        const row = patchRow(t().productVersions, id, 'product_versions', patch);
        row.updatedAt = db.now();
        return copy(row);
      },
    },

    versionChildren: {
      async list(versionId) {
        const bySort = (a: { sortOrder: number }, b: { sortOrder: number }) =>
          a.sortOrder - b.sortOrder;
        return {
          materials: t()
            .versionMaterials.filter((r) => r.versionId === versionId)
            .sort(bySort)
            .map(copy),
          suppliers: t()
            .versionSuppliers.filter((r) => r.versionId === versionId)
            .sort(bySort)
            .map(copy),
          certifications: t()
            .versionCertifications.filter((r) => r.versionId === versionId)
            .sort(bySort)
            .map(copy),
        };
      },
      async replace(versionId, children) {
        const tables = t();
        tables.versionMaterials = tables.versionMaterials.filter((r) => r.versionId !== versionId);
        tables.versionSuppliers = tables.versionSuppliers.filter((r) => r.versionId !== versionId);
        tables.versionCertifications = tables.versionCertifications.filter(
          (r) => r.versionId !== versionId,
        );

        const materials = children.materials.map((m, sortOrder) => ({
          ...copy(m),
          id: randomUUID(),
          versionId,
          sortOrder,
        }));
        const suppliers = children.suppliers.map((s, sortOrder) => ({
          ...copy(s),
          id: randomUUID(),
          versionId,
          sortOrder,
        }));
        const certifications = children.certifications.map((c, sortOrder) => ({
          ...copy(c),
          id: randomUUID(),
          versionId,
          sortOrder,
        }));

        tables.versionMaterials.push(...materials);
        tables.versionSuppliers.push(...suppliers);
        tables.versionCertifications.push(...certifications);

        return {
          materials: materials.map(copy),
          suppliers: suppliers.map(copy),
          certifications: certifications.map(copy),
        };
      },
      async countMaterialLinks(materialId) {
        return t().versionMaterials.filter((r) => r.materialId === materialId).length;
      },
      async countMaterialDefinitionLinks(materialDefinitionId) {
        return t().versionMaterials.filter((r) => r.materialDefinitionId === materialDefinitionId)
          .length;
      },
      async countCertificationLinks(certificationId) {
        return t().versionCertifications.filter((r) => r.certificationId === certificationId)
          .length;
      },
      async unlinkCertificateDefinition(certificateDefinitionId) {
        const touched: string[] = [];
        for (const row of t().versionCertifications) {
          if (row.certificateDefinitionId !== certificateDefinitionId) continue;
          row.certificateDefinitionId = null;
          touched.push(row.id);
        }
        return touched;
      },
    },

    contributionRequests: {
      async findById(id) {
        const row = t().contributionRequests.find((r) => r.id === id);
        return row ? copy(row) : undefined;
      },
      async findOpenForVersion(versionId) {
        const row = t().contributionRequests.find(
          (r) => r.currentVersionId === versionId && OPEN_CONTRIBUTION_STATUSES.includes(r.status),
        );
        return row ? copy(row) : undefined;
      },
      async findLatestForVersion(versionId) {
        const [row] = t()
          .contributionRequests.filter((r) => r.currentVersionId === versionId)
          .sort(byTime((r) => r.createdAt, 'desc'));
        return row ? copy(row) : undefined;
      },
      async listForSupplier(supplierTenantId) {
        return t()
          .contributionRequests.filter((r) => r.supplierTenantId === supplierTenantId)
          .sort(byTime((r) => r.updatedAt, 'desc'))
          .map(copy);
      },
      async listForBrand(brandTenantId, statuses) {
        return t()
          .contributionRequests.filter(
            (r) => r.brandTenantId === brandTenantId && statuses.includes(r.status),
          )
          .sort(byTime((r) => r.updatedAt, 'desc'))
          .map(copy);
      },
      async insert(input) {
        const now = db.now();
        const row: ContributionRequest = {
          ...input,
          id: randomUUID(),
          status: 'SENT',
          createdAt: now,
          updatedAt: now,
        };
        t().contributionRequests.push(row);
        return copy(row);
      },
      async update(id, patch) {
        const row = patchRow(t().contributionRequests, id, 'contribution_requests', patch);
        row.updatedAt = db.now();
        return copy(row);
      },
    },

    comments: {
      async insert(input) {
        const row: CollaborationComment = { ...input, id: randomUUID(), createdAt: db.now() };
        t().comments.push(row);
        return copy(row);
      },
      async listForRequest(requestId) {
        return t()
          .comments.filter((r) => r.requestId === requestId)
          .sort(byTime((r) => r.createdAt))
          .map(copy);
      },
    },

    supplierArtifacts: {
      async insert(input) {
        const row: SupplierArtifact = { ...input, id: randomUUID(), createdAt: db.now() };
        t().supplierArtifacts.push(row);
        return copy(row);
      },
    },
  };
}

export class InMemUnitOfWork implements UnitOfWork<Repos> {
  constructor(readonly db: InMemDatabase = new InMemDatabase()) {}

  async transaction<T>(work: (repos: Repos) => Promise<T>): Promise<T> {
    const snapshot = structuredClone(this.db.tables);
    try {
      return await work(createInMemRepos(this.db));
    } catch (err) {
      this.db.tables = snapshot;
      throw err;
    }
  }
}
