/**
 * backend/src/modules/products/dal/product-version.repo.ts
 *
 * WHY:
 * - Persistence ports for product versions and their child collections
 *   + Kysely implementations.
 *
 * RULES:
 * - No transactions started here (UnitOfWork owns tx).
 * - No AppError.
 * - replaceChildren = delete every child row of the version, then insert the given
 *   lists in order (sort_order = list index). Callers run it inside one unit of work.
 * - Link counters/unlink serve the reference library's delete rules.
 */

import type { Updateable } from 'kysely';
import type { DbExecutor } from '../../../shared/db/db';
import type { ProductVersionsTable } from '../../../shared/db/tables';
import {
  toProductVersion,
  toVersionCertification,
  toVersionMaterial,
  toVersionSupplier,
} from '../product.queries';
import type {
  NewProductVersion,
  ProductVersion,
  VersionChildren,
  VersionChildrenInput,
  VersionPatch,
} from '../product.types';

export interface ProductVersionRepo {
  findById(id: string): Promise<ProductVersion | undefined>;
  findLatest(productId: string): Promise<ProductVersion | undefined>;
  listForProduct(productId: string): Promise<ProductVersion[]>;
  listForProducts(productIds: readonly string[]): Promise<ProductVersion[]>;
  insert(input: NewProductVersion): Promise<ProductVersion>;
  update(id: string, patch: VersionPatch): Promise<ProductVersion>;
}

export interface VersionChildrenRepo {
  list(versionId: string): Promise<VersionChildren>;
  replace(versionId: string, children: VersionChildrenInput): Promise<VersionChildren>;

  countMaterialLinks(materialId: string): Promise<number>;
  countMaterialDefinitionLinks(materialDefinitionId: string): Promise<number>;
  countCertificationLinks(certificationId: string): Promise<number>;
  /** Nulls certificate_definition_id on every linking row; returns the touched row ids. */
  unlinkCertificateDefinition(certificateDefinitionId: string): Promise<string[]>;
}

function toVersionUpdate(patch: VersionPatch): Updateable<ProductVersionsTable> {
  const values: Updateable<ProductVersionsTable> = { updated_at: new Date() };

  if (patch.versionName !== undefined) values.version_name = patch.versionName;
  if (patch.status !== undefined) values.status = patch.status;
  if (patch.productName !== undefined) values.product_name = patch.productName;
  if (patch.category !== undefined) values.category = patch.category;
  if (patch.description !== undefined) values.description = patch.description;
  if (patch.manufacturingCountry !== undefined) {
    values.manufacturing_country = patch.manufacturingCountry;
  }
  if (patch.totalCarbonFootprintKg !== undefined) {
    values.total_carbon_footprint_kg = patch.totalCarbonFootprintKg;
  }
  if (patch.totalWaterUsageLiters !== undefined) {
    values.total_water_usage_liters = patch.totalWaterUsageLiters;
  }
  if (patch.totalEnergyMj !== undefined) values.total_energy_mj = patch.totalEnergyMj;
  if (patch.recyclingInstructions !== undefined) {
    values.recycling_instructions = patch.recyclingInstructions;
  }
  if (patch.recyclabilityClass !== undefined) {
    values.recyclability_class = patch.recyclabilityClass;
  }

  return values;
}

export class SqlProductVersionRepo implements ProductVersionRepo {
  constructor(private readonly db: DbExecutor) {}

  async findById(id: string): Promise<ProductVersion | undefined> {
    const row = await this.db
      .selectFrom('product_versions')
      .selectAll()
      .where('id', '=', id)
      .executeTakeFirst();
    return row ? toProductVersion(row) : undefined;
  }

  async findLatest(productId: string): Promise<ProductVersion | undefined> {
    const row = await this.db
      .selectFrom('product_versions')
      .selectAll()
      .where('product_id', '=', productId)
      .orderBy('version_sequence', 'desc')
      .orderBy('revision', 'desc')
      .limit(1)
      .executeTakeFirst();
    return row ? toProductVersion(row) : undefined;
  }

  async listForProduct(productId: string): Promise<ProductVersion[]> {
    const rows = await this.db
      .selectFrom('product_versions')
      .selectAll()
      .where('product_id', '=', productId)
      .orderBy('version_sequence', 'desc')
      .orderBy('revision', 'desc')
      .execute();
    return rows.map(toProductVersion);
  }

  async listForProducts(productIds: readonly string[]): Promise<ProductVersion[]> {
    if (productIds.length === 0) return [];
    const rows = await this.db
      .selectFrom('product_versions')
      .selectAll()
      .where('product_id', 'in', [...productIds])
      .execute();
    return rows.map(toProductVersion);
  }

  async insert(input: NewProductVersion): Promise<ProductVersion> {
    const row = await this.db
      .insertInto('product_versions')
      .values({
        product_id: input.productId,
        tenant_id: input.tenantId,
        version_sequence: input.versionSequence,
        revision: input.revision,
        version_name: input.versionName,
        status: input.status,
        parent_version_id: input.parentVersionId,
        product_name: input.productName,
        category: input.category,
        description: input.description,
        manufacturing_country: input.manufacturingCountry,
        total_carbon_footprint_kg: input.totalCarbonFootprintKg,
        total_water_usage_liters: input.totalWaterUsageLiters,
        total_energy_mj: input.totalEnergyMj,
        recycling_instructions: input.recyclingInstructions,
        recyclability_class: input.recyclabilityClass,
      })
      .returningAll()
      .executeTakeFirstOrThrow();
    return toProductVersion(row);
  }

  async update(id: string, patch: VersionPatch): Promise<ProductVersion> {
    const row = await this.db
      .updateTable('product_versions')
      .set(toVersionUpdate(patch))
      .where('id', '=', id)
      .returningAll()
      .executeTakeFirstOrThrow();
    return toProductVersion(row);
  }
}

export class SqlVersionChildrenRepo implements VersionChildrenRepo {
  constructor(private readonly db: DbExecutor) {}

  async list(versionId: string): Promise<VersionChildren> {
    const [materials, suppliers, certifications] = await Promise.all([
      this.db
        .selectFrom('version_materials')
        .selectAll()
        .where('version_id', '=', versionId)
        .orderBy('sort_order')
        .execute(),
      this.db
        .selectFrom('version_suppliers')
        .selectAll()
        .where('version_id', '=', versionId)
        .orderBy('sort_order')
        .execute(),
      this.db
        .selectFrom('version_certifications')
        .selectAll()
        .where('version_id', '=', versionId)
        .orderBy('sort_order')
        .execute(),
    ]);

    return {
      materials: materials.map(toVersionMaterial),
      suppliers: suppliers.map(toVersionSupplier),
      certifications: certifications.map(toVersionCertification),
    };
  }

  async replace(versionId: string, children: VersionChildrenInput): Promise<VersionChildren> {
    await this.db.deleteFrom('version_materials').where('version_id', '=', versionId).execute();
    await this.db.deleteFrom('version_suppliers').where('version_id', '=', versionId).execute();
    await this.db
      .deleteFrom('version_certifications')
      .where('version_id', '=', versionId)
      .execute();

    if (children.materials.length > 0) {
      await this.db
        .insertInto('version_materials')
        .values(
          children.materials.map((m, index) => ({
            version_id: versionId,
            material_id: m.materialId,
            material_definition_id: m.materialDefinitionId,
            name: m.name,
            percentage: m.percentage,
            origin_country: m.originCountry,
            transport_method: m.transportMethod,
            sort_order: index,
          })),
        )
        .execute();
    }

    if (children.suppliers.length > 0) {
      await this.db
        .insertInto('version_suppliers')
        .values(
          children.suppliers.map((s, index) => ({
            version_id: versionId,
            supplier_profile_id: s.supplierProfileId,
            name: s.name,
            role: s.role,
            country: s.country,
            sort_order: index,
          })),
        )
        .execute();
    }

    if (children.certifications.length > 0) {
      await this.db
        .insertInto('version_certifications')
        .values(
          children.certifications.map((c, index) => ({
            version_id: versionId,
            certification_id: c.certificationId,
            certificate_definition_id: c.certificateDefinitionId,
            name: c.name,
            file_url: c.fileUrl,
            file_name: c.fileName,
            file_type: c.fileType,
            source_artifact_id: c.sourceArtifactId,
            valid_until: c.validUntil,
            reference_number: c.referenceNumber,
            sort_order: index,
          })),
        )
        .execute();
    }

    return this.list(versionId);
  }

  async countMaterialLinks(materialId: string): Promise<number> {
    const row = await this.db
      .selectFrom('version_materials')
      .select((eb) => eb.fn.countAll<string>().as('count'))
      .where('material_id', '=', materialId)
      .executeTakeFirstOrThrow();
    return Number(row.count);
  }

  async countMaterialDefinitionLinks(materialDefinitionId: string): Promise<number> {
    const row = await this.db
      .selectFrom('version_materials')
      .select((eb) => eb.fn.countAll<string>().as('count'))
      .where('material_definition_id', '=', materialDefinitionId)
      .executeTakeFirstOrThrow();
    return Number(row.count);
  }

  async countCertificationLinks(certificationId: string): Promise<number> {
    const row = await this.db
      .selectFrom('version_certifications')
      .select((eb) => eb.fn.countAll<string>().as('count'))
      .where('certification_id', '=', certificationId)
      .executeTakeFirstOrThrow();
    return Number(row.count);
  }

  async unlinkCertificateDefinition(certificateDefinitionId: string): Promise<string[]> {
    const rows = await this.db
      .updateTable('version_certifications')
      .set({ certificate_definition_id: null })
      .where('certificate_definition_id', '=', certificateDefinitionId)
      .returning('id')
      .execute();
    return rows.map((r) => r.id);
  }
}
