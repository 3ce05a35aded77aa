/**
 * src/shared/db/migrations/0004_products.ts
 *
 * WHY:
 * - products (brand-owned identity), product_media, product_versions and the three
 *   child collections owned by a version.
 *
 * RULES:
 * - Child rows cascade with their version (full-replace deletes them explicitly anyway).
 * - Library links are nullable: unlink-then-delete sets them to NULL.
 * - At most one non-deleted main image per product (partial unique index).
 */

import { Kysely, sql } from 'kysely';

export async function up(db: Kysely<unknown>): Promise<void> {
  await db.schema
    .createTable('products')
    .addColumn('id', 'uuid', (col) => col.primaryKey().defaultTo(sql`gen_random_uuid()`))
    .addColumn('tenant_id', 'uuid', (col) =>
      col.notNull().references('tenants.id').onDelete('cascade'),
    )
    .addColumn('sku', 'text', (col) => col.notNull())
    .addColumn('gtin', 'text')
    .addColumn('name', 'text', (col) => col.notNull())
    .addColumn('category', 'text', (col) => col.notNull())
    .addColumn('description', 'text')
    .addColumn('lifecycle_status', 'text', (col) => col.notNull().defaultTo('ACTIVE'))
    .addColumn('created_at', 'timestamptz', (col) => col.notNull().defaultTo(sql`now()`))
    .addColumn('updated_at', 'timestamptz', (col) => col.notNull().defaultTo(sql`now()`))
    .addUniqueConstraint('products_tenant_sku_unique', ['tenant_id', 'sku'])
    .execute();

  await db.schema
    .createTable('product_media')
    .addColumn('id', 'uuid', (col) => col.primaryKey().defaultTo(sql`gen_random_uuid()`))
    .addColumn('product_id', 'uuid', (col) =>
      col.notNull().references('products.id').onDelete('cascade'),
    )
    .addColumn('file_url', 'text', (col) => col.notNull())
    .addColumn('file_name', 'text')
    .addColumn('content_type', 'text')
    .addColumn('is_main', 'boolean', (col) => col.notNull().defaultTo(false))
    .addColumn('display_order', 'integer', (col) => col.notNull().defaultTo(0))
    .addColumn('is_deleted', 'boolean', (col) => col.notNull().defaultTo(false))
    .addColumn('created_at', 'timestamptz', (col) => col.notNull().defaultTo(sql`now()`))
    .execute();

  await sql`
    CREATE UNIQUE INDEX product_media_one_main_idx
      ON product_media (product_id)
      WHERE is_main AND NOT is_deleted;
  `.execute(db);

  await db.schema
    .createTable('product_versions')
    .addColumn('id', 'uuid', (col) => col.primaryKey().defaultTo(sql`gen_random_uuid()`))
    .addColumn('product_id', 'uuid', (col) =>
      col.notNull().references('products.id').onDelete('cascade'),
    )
    .addColumn('tenant_id', 'uuid', (col) =>
      col.notNull().references('tenants.id').onDelete('cascade'),
    )
    .addColumn('version_sequence', 'integer', (col) => col.notNull())
    .addColumn('revision', 'integer', (col) => col.notNull())
    .addColumn('version_name', 'text', (col) => col.notNull())
    .addColumn('status', 'text', (col) => col.notNull())
    .addColumn('parent_version_id', 'uuid', (col) =>
      col.references('product_versions.id').onDelete('set null'),
    )
    .addColumn('product_name', 'text', (col) => col.notNull())
    .addColumn('category', 'text', (col) => col.notNull())
    .addColumn('description', 'text')
    .addColumn('manufacturing_country', 'text')
    .addColumn('total_carbon_footprint_kg', 'double precision')
    .addColumn('total_water_usage_liters', 'double precision')
    .addColumn('total_energy_mj', 'double precision')
    .addColumn('recycling_instructions', 'text')
    .addColumn('recyclability_class', 'text')
    .addColumn('created_at', 'timestamptz', (col) => col.notNull().defaultTo(sql`now()`))
    .addColumn('updated_at', 'timestamptz', (col) => col.notNull().defaultTo(sql`now()`))
    .addUniqueConstraint('product_versions_sequence_revision_unique', [
      'product_id',
      'version_sequence',
      'revision',
    ])
    .execute();

  await sql`
    ALTER TABLE product_versions
      ADD CONSTRAINT product_versions_status_check
      CHECK (status IN ('WORKING_DRAFT','SUBMITTED','APPROVED','REVISION_REQUIRED','REJECTED','CANCELLED'));
  `.execute(db);

  await db.schema
    .createTable('version_materials')
    .addColumn('id', 'uuid', (col) => col.primaryKey().defaultTo(sql`gen_random_uuid()`))
    .addColumn('version_id', 'uuid', (col) =>
      col.notNull().references('product_versions.id').onDelete('cascade'),
    )
    .addColumn('material_id', 'uuid', (col) => col.references('materials.id'))
    .addColumn('material_definition_id', 'uuid', (col) =>
      col.references('material_definitions.id'),
    )
    .addColumn('name', 'text', (col) => col.notNull())
    .addColumn('percentage', 'double precision', (col) => col.notNull())
    .addColumn('origin_country', 'text', (col) => col.notNull())
    .addColumn('transport_method', 'text')
    .addColumn('sort_order', 'integer', (col) => col.notNull().defaultTo(0))
    .addColumn('created_at', 'timestamptz', (col) => col.notNull().defaultTo(sql`now()`))
    .execute();

  await db.schema
    .createTable('version_suppliers')
    .addColumn('id', 'uuid', (col) => col.primaryKey().defaultTo(sql`gen_random_uuid()`))
    .addColumn('version_id', 'uuid', (col) =>
      col.notNull().references('product_versions.id').onDelete('cascade'),
    )
    .addColumn('supplier_profile_id', 'uuid', (col) =>
      col.references('supplier_profiles.id').onDelete('set null'),
    )
    .addColumn('name', 'text', (col) => col.notNull())
    .addColumn('role', 'text', (col) => col.notNull())
    .addColumn('country', 'text', (col) => col.notNull())
    .addColumn('sort_order', 'integer', (col) => col.notNull().defaultTo(0))
    .addColumn('created_at', 'timestamptz', (col) => col.notNull().defaultTo(sql`now()`))
    .execute();

  await db.schema
    .createTable('version_certifications')
    .addColumn('id', 'uuid', (col) => col.primaryKey().defaultTo(sql`gen_random_uuid()`))
    .addColumn('version_id', 'uuid', (col) =>
      col.notNull().references('product_versions.id').onDelete('cascade'),
    )
    .addColumn('certification_id', 'uuid', (col) => col.references('certifications.id'))
    .addColumn('certificate_definition_id', 'uuid', (col) =>
      col.references('certificate_definitions.id'),
    )
    .addColumn('name', 'text', (col) => col.notNull())
    .addColumn('file_url', 'text', (col) => col.notNull())
    .addColumn('file_name', 'text', (col) => col.notNull())
    .addColumn('file_type', 'text', (col) => col.notNull())
    .addColumn('source_artifact_id', 'uuid')
    .addColumn('valid_until', 'date')
    .addColumn('reference_number', 'text')
    .addColumn('sort_order', 'integer', (col) => col.notNull().defaultTo(0))
    .addColumn('created_at', 'timestamptz', (col) => col.notNull().defaultTo(sql`now()`))
    .execute();

  for (const table of ['version_materials', 'version_suppliers', 'version_certifications']) {
    await db.schema
      .createIndex(`${table}_version_id_idx`)
      .on(table)
      .column('version_id')
      .execute();
  }
}

export async function down(db: Kysely<unknown>): Promise<void> {
  await db.schema.dropTable('version_certifications').ifExists().execute();
  await db.schema.dropTable('version_suppliers').ifExists().execute();
  await db.schema.dropTable('version_materials').ifExists().execute();
  await db.schema.dropTable('product_versions').ifExists().execute();
  await db.schema.dropTable('product_media').ifExists().execute();
  await db.schema.dropTable('products').ifExists().execute();
}
