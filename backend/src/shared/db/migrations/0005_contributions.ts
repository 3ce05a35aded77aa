/**
 * src/shared/db/migrations/0005_contributions.ts
 *
 * WHY:
 * - contribution_requests: Brand ↔ Supplier ↔ ProductVersion handshake.
 * - collaboration_comments: request thread (rejection reasons included).
 * - supplier_artifacts: the supplier's file vault (uploaded certificates).
 *
 * RULES:
 * - At most one non-terminal request per current version (partial unique index).
 */

import { Kysely, sql } from 'kysely';

export async function up(db: Kysely<unknown>): Promise<void> {
  await db.schema
    .createTable('supplier_artifacts')
    .addColumn('id', 'uuid', (col) => col.primaryKey().defaultTo(sql`gen_random_uuid()`))
    .addColumn('tenant_id', 'uuid', (col) =>
      col.notNull().references('tenants.id').onDelete('cascade'),
    )
    .addColumn('kind', 'text', (col) => col.notNull())
    .addColumn('file_name', 'text', (col) => col.notNull())
    .addColumn('file_url', 'text', (col) => col.notNull())
    .addColumn('content_type', 'text', (col) => col.notNull())
    .addColumn('size_bytes', 'integer', (col) => col.notNull())
    .addColumn('created_at', 'timestamptz', (col) => col.notNull().defaultTo(sql`now()`))
    .execute();

  await sql`
    ALTER TABLE version_certifications
      ADD CONSTRAINT version_certifications_source_artifact_fk
      FOREIGN KEY (source_artifact_id) REFERENCES supplier_artifacts(id) ON DELETE SET NULL;
  `.execute(db);

  await db.schema
    .createTable('contribution_requests')
    .addColumn('id', 'uuid', (col) => col.primaryKey().defaultTo(sql`gen_random_uuid()`))
    .addColumn('brand_tenant_id', 'uuid', (col) =>
      col.notNull().references('tenants.id').onDelete('cascade'),
    )
    .addColumn('supplier_tenant_id', 'uuid', (col) =>
      col.notNull().references('tenants.id').onDelete('cascade'),
    )
    .addColumn('supplier_profile_id', 'uuid', (col) =>
      col.references('supplier_profiles.id').onDelete('set null'),
    )
    .addColumn('product_id', 'uuid', (col) =>
      col.notNull().references('products.id').onDelete('cascade'),
    )
    .addColumn('initial_version_id', 'uuid', (col) =>
      col.notNull().references('product_versions.id'),
    )
    .addColumn('current_version_id', 'uuid', (col) =>
      col.notNull().references('product_versions.id'),
    )
    .addColumn('status', 'text', (col) => col.notNull())
    .addColumn('due_date', 'timestamptz')
    .addColumn('request_note', 'text')
    .addColumn('created_by_user_id', 'uuid', (col) => col.notNull().references('users.id'))
    .addColumn('created_at', 'timestamptz', (col) => col.notNull().defaultTo(sql`now()`))
    .addColumn('updated_at', 'timestamptz', (col) => col.notNull().defaultTo(sql`now()`))
    .execute();

  await sql`
    ALTER TABLE contribution_requests
      ADD CONSTRAINT contribution_requests_status_check
      CHECK (status IN ('SENT','IN_PROGRESS','SUBMITTED','CHANGES_REQUESTED','COMPLETED','DECLINED','CANCELLED'));
  `.execute(db);

  await sql`
    CREATE UNIQUE INDEX contribution_requests_one_active_per_version_idx
      ON contribution_requests (current_version_id)
      WHERE status IN ('SENT','IN_PROGRESS','SUBMITTED','CHANGES_REQUESTED');
  `.execute(db);

  await db.schema
    .createIndex('contribution_requests_supplier_idx')
    .on('contribution_requests')
    .columns(['supplier_tenant_id', 'status'])
    .execute();

  await db.schema
    .createIndex('contribution_requests_brand_idx')
    .on('contribution_requests')
    .columns(['brand_tenant_id', 'status'])
    .execute();

  await db.schema
    .createTable('collaboration_comments')
    .addColumn('id', 'uuid', (col) => col.primaryKey().defaultTo(sql`gen_random_uuid()`))
    .addColumn('request_id', 'uuid', (col) =>
      col.notNull().references('contribution_requests.id').onDelete('cascade'),
    )
    .addColumn('author_user_id', 'uuid', (col) => col.notNull().references('users.id'))
    .addColumn('author_tenant_id', 'uuid', (col) => col.notNull().references('tenants.id'))
    .addColumn('body', 'text', (col) => col.notNull())
    .addColumn('is_rejection_reason', 'boolean', (col) => col.notNull().defaultTo(false))
    .addColumn('created_at', 'timestamptz', (col) => col.notNull().defaultTo(sql`now()`))
    .execute();

  await db.schema
    .createIndex('collaboration_comments_request_idx')
    .on('collaboration_comments')
    .column('request_id')
    .execute();
}

export async function down(db: Kysely<unknown>): Promise<void> {
  await db.schema.dropTable('collaboration_comments').ifExists().execute();
  await db.schema.dropTable('contribution_requests').ifExists().execute();
  await sql`
    ALTER TABLE version_certifications
      DROP CONSTRAINT IF EXISTS version_certifications_source_artifact_fk;
  `.execute(db);
  await db.schema.dropTable('supplier_artifacts').ifExists().execute();
}
