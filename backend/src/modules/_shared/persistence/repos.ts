/**
 * src/modules/_shared/persistence/repos.ts
 *
 * WHY:
 * - The persistence gateway: every repository port the services use, bundled so one
 *   UnitOfWork hands a workflow all of them bound to ONE transaction.
 * - createSqlRepos is the only place that knows the Kysely implementations.
 *
 * RULES:
 * - Services depend on `Repos` (ports), never on Sql* classes.
 * - Tests provide the same shape from an in-memory store.
 */

import type { Db, DbExecutor } from '../../../shared/db/db';
import { KyselyUnitOfWork, type UnitOfWork } from '../../../shared/db/unit-of-work';

import { SqlTenantRepo, type TenantRepo } from '../../tenants/dal/tenant.repo';
import { SqlUserRepo, type UserRepo } from '../../users/dal/user.repo';
import { SqlMembershipRepo, type MembershipRepo } from '../../memberships/dal/membership.repo';

import { SqlConnectionRepo, type ConnectionRepo } from '../../connections/dal/connection.repo';
import {
  SqlSupplierProfileRepo,
  type SupplierProfileRepo,
} from '../../connections/dal/supplier-profile.repo';

import type { ReferenceRepo } from '../../references/dal/reference.repo';
import { SqlMaterialRepo } from '../../references/dal/material.repo';
import { SqlCertificationRepo } from '../../references/dal/certification.repo';
import { SqlCertificateDefinitionRepo } from '../../references/dal/certificate-definition.repo';
import { SqlMaterialDefinitionRepo } from '../../references/dal/material-definition.repo';
import type {
  CertificateDefinitionFields,
  CertificateDefinitionUniqueField,
  CertificationFields,
  CertificationUniqueField,
  MaterialDefinitionFields,
  MaterialDefinitionUniqueField,
  MaterialFields,
  MaterialUniqueField,
} from '../../references/reference.types';

import {
  SqlProductMediaRepo,
  SqlProductRepo,
  type ProductMediaRepo,
  type ProductRepo,
} from '../../products/dal/product.repo';
import {
  SqlProductVersionRepo,
  SqlVersionChildrenRepo,
  type ProductVersionRepo,
  type VersionChildrenRepo,
} from '../../products/dal/product-version.repo';

import {
  SqlCommentRepo,
  SqlContributionRequestRepo,
  SqlSupplierArtifactRepo,
  type CommentRepo,
  type ContributionRequestRepo,
  type SupplierArtifactRepo,
} from '../../contributions/dal/contribution.repo';

export type Repos = {
  tenants: TenantRepo;
  users: UserRepo;
  memberships: MembershipRepo;

  connections: ConnectionRepo;
  supplierProfiles: SupplierProfileRepo;

  materials: ReferenceRepo<MaterialFields, MaterialUniqueField>;
  certifications: ReferenceRepo<CertificationFields, CertificationUniqueField>;
  certificateDefinitions: ReferenceRepo<
    CertificateDefinitionFields,
    CertificateDefinitionUniqueField
  >;
  materialDefinitions: ReferenceRepo<MaterialDefinitionFields, MaterialDefinitionUniqueField>;

  products: ProductRepo;
  productMedia: ProductMediaRepo;
  productVersions: ProductVersionRepo;
  versionChildren: VersionChildrenRepo;

  contributionRequests: ContributionRequestRepo;
  comments: CommentRepo;
  supplierArtifacts: SupplierArtifactRepo;
};

export type AppUnitOfWork = UnitOfWork<Repos>;

export function createSqlRepos(db: DbExecutor): Repos {
  return {
    tenants: new SqlTenantRepo(db),
    users: new SqlUserRepo(db),
    memberships: new SqlMembershipRepo(db),

    connections: new SqlConnectionRepo(db),
    supplierProfiles: new SqlSupplierProfileRepo(db),

    materials: new SqlMaterialRepo(db),
    certifications: new SqlCertificationRepo(db),
    certificateDefinitions: new SqlCertificateDefinitionRepo(db),
    materialDefinitions: new SqlMaterialDefinitionRepo(db),

    products: new SqlProductRepo(db),
    productMedia: new SqlProductMediaRepo(db),
    productVersions: new SqlProductVersionRepo(db),
    versionChildren: new SqlVersionChildrenRepo(db),

    contributionRequests: new SqlContributionRequestRepo(db),
    comments: new SqlCommentRepo(db),
    supplierArtifacts: new SqlSupplierArtifactRepo(db),
  };
}

export function createSqlUnitOfWork(db: Db): AppUnitOfWork {
  return new KyselyUnitOfWork(db, createSqlRepos);
}
