/**
 * src/shared/db/migrations/0003_connections.ts
 *
 * WHY:
 * - tenant_connections: Brand ↔ Supplier handshake (source of truth for status).
 * - supplier_profiles: the Brand's address book, 1:1 with a connection, carrying
 *   denormalized connection fields for list views.
 *
 * RULES:
 * - Only the hash of an invitation token is stored.
 * - Deleting a profile deletes its connection (handled in the service, same tx).
 */

import { Kysely, sql } from 'kysely';

export async function up(db: Kysely<unknown>): Promise<void> {
  await db.schema
    .createTable('tenant_connections')
    .addColumn('id', 'uuid', (col) => col.primaryKey().defaultTo(sql`gen_random_uuid()`))
    .addColumn('requester_tenant_id', 'uuid', (col) =>
      col.notNull().references('tenants.id').onDelete('cascade'),
    )
    .addColumn('target_tenant_id', 'uuid', (col) =>
      col.references('tenants.id').onDelete('set null'),
    )
    .addColumn('invitation_email', 'text')
    .addColumn('status', 'text', (col) => col.notNull())
    .addColumn('invitation_token_hash', 'text', (col) => col.unique())
    .addColumn('request_note', 'text')
    .addColumn('retry_count', 'integer', (col) => col.notNull().defaultTo(0))
    .addColumn('last_invited_at', 'timestamptz', (col) => col.notNull().defaultTo(sql`now()`))
    .addColumn('created_at', 'timestamptz', (col) => col.notNull().defaultTo(sql`now()`))
    .addColumn('updated_at', 'timestamptz', (col) => col.notNull().defaultTo(sql`now()`))
    .execute();

  await sql`
    ALTER TABLE tenant_connections
      ADD CONSTRAINT tenant_connections_status_check
      CHECK (status IN ('PENDING','ACTIVE','REJECTED','SUSPENDED','DISCONNECTED'));
  `.execute(db);

  await sql`
    ALTER TABLE tenant_connections
      ADD CONSTRAINT tenant_connections_retry_count_check
      CHECK (retry_count >= 0);
  `.execute(db);

  await sql`
    ALTER TABLE tenant_connections
      ADD CONSTRAINT tenant_connections_target_check
      CHECK (target_tenant_id IS NOT NULL OR invitation_email IS NOT NULL);
  `.execute(db);

  await db.schema
    .createIndex('tenant_connections_target_status_idx')
    .on('tenant_connections')
    .columns(['target_tenant_id', 'status'])
    .execute();

  await db.schema
    .createIndex('tenant_connections_invitation_email_idx')
    .on('tenant_connections')
    .column('invitation_email')
    .execute();

  await db.schema
    .createTable('supplier_profiles')
    .addColumn('id', 'uuid', (col) => col.primaryKey().defaultTo(sql`gen_random_uuid()`))
    .addColumn('tenant_id', 'uuid', (col) =>
      col.notNull().references('tenants.id').onDelete('cascade'),
    )
    .addColumn('connection_id', 'uuid', (col) =>
      col.unique().references('tenant_connections.id').onDelete('set null'),
    )
    .addColumn('name', 'text', (col) => col.notNull())
    .addColumn('description', 'text')
    .addColumn('location_country', 'text')
    .addColumn('contact_name', 'text')
    .addColumn('contact_email', 'text')
    .addColumn('supplier_tenant_id', 'uuid', (col) =>
      col.references('tenants.id').onDelete('set null'),
    )
    .addColumn('slug', 'text')
    .addColumn('invitation_email', 'text')
    .addColumn('connection_status', 'text')
    .addColumn('retry_count', 'integer', (col) => col.notNull().defaultTo(0))
    .addColumn('created_at', 'timestamptz', (col) => col.notNull().defaultTo(sql`now()`))
    .addColumn('updated_at', 'timestamptz', (col) => col.notNull().defaultTo(sql`now()`))
    .addUniqueConstraint('supplier_profiles_tenant_name_unique', ['tenant_id', 'name'])
    .execute();
}

export async function down(db: Kysely<unknown>): Promise<void> {
  await db.schema.dropTable('supplier_profiles').ifExists().execute();
  await db.schema.dropTable('tenant_connections').ifExists().execute();
}
