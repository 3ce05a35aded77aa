import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { randomUUID } from 'node:crypto';
import { buildTestApp } from '../helpers/build-test-app';
import {
  readJson,
  signup,
  type ErrorResponseBody,
  type TestSession,
} from '../helpers/e2e-session';

/**
 * E2E tests for the reference library: System Global rows (read-only, seeded)
 * alongside each organization's Custom Library.
 */

type ReferenceRow = {
  id: string;
  tenantId: string | null;
  name: string;
  code?: string;
  owner: 'SYSTEM' | 'TENANT';
  isEditable: boolean;
};

describe('references', () => {
  let ctx: Awaited<ReturnType<typeof buildTestApp>>;
  let brand: TestSession;

  beforeEach(async () => {
    ctx = await buildTestApp({ seed: { enabled: true } });
    brand = await signup(ctx.app, { accountType: 'BRAND' });
  });

  afterEach(async () => {
    await ctx.close();
  });

  async function createMaterial(session: TestSession, payload: Record<string, unknown>) {
    return ctx.app.inject({
      method: 'POST',
      url: '/references/materials',
      headers: { cookie: session.cookie },
      payload,
    });
  }

  async function listMaterials(session: TestSession): Promise<ReferenceRow[]> {
    const res = await ctx.app.inject({
      method: 'GET',
      url: '/references/materials',
      headers: { cookie: session.cookie },
    });
    expect(res.statusCode).toBe(200);
    return readJson<{ items: ReferenceRow[] }>(res).items;
  }

  it('lists System Global rows as read-only and own rows as editable', async () => {
    const created = await createMaterial(brand, { name: 'Bamboo Viscose', code: 'CV-BAM' });
    expect(created.statusCode).toBe(201);
    expect(readJson<ReferenceRow>(created)).toMatchObject({
      tenantId: brand.tenantId,
      owner: 'TENANT',
      isEditable: true,
    });

    const items = await listMaterials(brand);
    const system = items.find((m) => m.code === 'CO-ORG');
    expect(system).toMatchObject({ tenantId: null, owner: 'SYSTEM', isEditable: false });
    expect(items.some((m) => m.code === 'CV-BAM')).toBe(true);
  });

  it('refuses to modify a System Global row', async () => {
    const system = (await listMaterials(brand)).find((m) => m.code === 'CO-ORG');
    if (!system) throw new Error('seeded material missing');

    const res = await ctx.app.inject({
      method: 'PATCH',
      url: `/references/materials/${system.id}`,
      headers: { cookie: brand.cookie },
      payload: { name: 'Mine now' },
    });

    expect(res.statusCode).toBe(403);
    expect(readJson<ErrorResponseBody>(res).error.message).toBe(
      'This material belongs to the System Global Library and cannot be modified.',
    );

    const del = await ctx.app.inject({
      method: 'DELETE',
      url: `/references/materials/${system.id}`,
      headers: { cookie: brand.cookie },
    });
    expect(del.statusCode).toBe(403);
  });

  it('names the library that already holds a duplicate', async () => {
    const systemClash = await createMaterial(brand, { name: 'My Cotton', code: 'co-org' });
    expect(systemClash.statusCode).toBe(409);
    expect(readJson<ErrorResponseBody>(systemClash).error.message).toBe(
      'A material with code "co-org" already exists in the System Global Library.',
    );

    await createMaterial(brand, { name: 'Bamboo Viscose', code: 'CV-BAM' });
    const ownClash = await createMaterial(brand, { name: 'bamboo viscose', code: 'CV-BAM-2' });
    expect(ownClash.statusCode).toBe(409);
    expect(readJson<ErrorResponseBody>(ownClash).error.message).toBe(
      'A material with name "bamboo viscose" already exists in Your Custom Library.',
    );
  });

  it('keeps custom libraries apart', async () => {
    const other = await signup(ctx.app, { accountType: 'SUPPLIER' });

    const mine = readJson<ReferenceRow>(
      await createMaterial(brand, { name: 'Bamboo Viscose', code: 'CV-BAM' }),
    );

    expect((await listMaterials(other)).some((m) => m.id === mine.id)).toBe(false);

    // Same key is free in another organization's library
    const theirs = await createMaterial(other, { name: 'Bamboo Viscose', code: 'CV-BAM' });
    expect(theirs.statusCode).toBe(201);

    const res = await ctx.app.inject({
      method: 'PATCH',
      url: `/references/materials/${mine.id}`,
      headers: { cookie: other.cookie },
      payload: { name: 'Stolen' },
    });
    expect(res.statusCode).toBe(404);
    expect(readJson<ErrorResponseBody>(res).error.message).toBe('Material not found.');
  });

  it('updates and deletes an unused own row', async () => {
    const mine = readJson<ReferenceRow>(
      await createMaterial(brand, { name: 'Bamboo Viscose', code: 'CV-BAM' }),
    );

    const updated = await ctx.app.inject({
      method: 'PATCH',
      url: `/references/materials/${mine.id}`,
      headers: { cookie: brand.cookie },
      payload: { materialType: 'Regenerated fibre' },
    });
    expect(updated.statusCode).toBe(200);
    expect(updated.json()).toMatchObject({ name: 'Bamboo Viscose', materialType: 'Regenerated fibre' });

    const del = await ctx.app.inject({
      method: 'DELETE',
      url: `/references/materials/${mine.id}`,
      headers: { cookie: brand.cookie },
    });
    expect(del.statusCode).toBe(204);
    expect((await listMaterials(brand)).some((m) => m.id === mine.id)).toBe(false);
  });

  it('refuses to delete a material a product version uses', async () => {
    const mine = readJson<ReferenceRow>(
      await createMaterial(brand, { name: 'Bamboo Viscose', code: 'CV-BAM' }),
    );
    ctx.infra.uow.db.tables.versionMaterials.push({
      id: randomUUID(),
      versionId: randomUUID(),
      sortOrder: 0,
      materialId: mine.id,
      materialDefinitionId: null,
      name: 'Bamboo Viscose',
      percentage: 100,
      originCountry: 'CN',
      transportMethod: null,
    });

    const res = await ctx.app.inject({
      method: 'DELETE',
      url: `/references/materials/${mine.id}`,
      headers: { cookie: brand.cookie },
    });

    expect(res.statusCode).toBe(409);
    expect(readJson<ErrorResponseBody>(res).error.message).toBe(
      'This material is used by 1 product version entry and cannot be deleted.',
    );
  });

  it('detaches certificates when their definition is deleted', async () => {
    const created = await ctx.app.inject({
      method: 'POST',
      url: '/references/certificate-definitions',
      headers: { cookie: brand.cookie },
      payload: { name: 'Mill Audit', category: 'Social' },
    });
    expect(created.statusCode).toBe(201);
    const definition = readJson<ReferenceRow>(created);

    const certificateRowId = randomUUID();
    ctx.infra.uow.db.tables.versionCertifications.push({
      id: certificateRowId,
      versionId: randomUUID(),
      sortOrder: 0,
      certificationId: null,
      certificateDefinitionId: definition.id,
      name: 'Mill Audit 2026',
      fileUrl: 'http://files.test/audit.pdf',
      fileName: 'audit.pdf',
      fileType: 'application/pdf',
      sourceArtifactId: null,
      validUntil: null,
      referenceNumber: null,
    });

    const del = await ctx.app.inject({
      method: 'DELETE',
      url: `/references/certificate-definitions/${definition.id}`,
      headers: { cookie: brand.cookie },
    });
    expect(del.statusCode).toBe(204);

    const row = ctx.infra.uow.db.tables.versionCertifications.find(
      (c) => c.id === certificateRowId,
    );
    expect(row?.certificateDefinitionId).toBeNull();
  });

  it('validates material definitions, including the numeric footprint', async () => {
    const bad = await ctx.app.inject({
      method: 'POST',
      url: '/references/material-definitions',
      headers: { cookie: brand.cookie },
      payload: { name: 'Heavy denim', code: 'MD-DEN', defaultCarbonFootprint: -1 },
    });
    expect(bad.statusCode).toBe(400);

    const ok = await ctx.app.inject({
      method: 'POST',
      url: '/references/material-definitions',
      headers: { cookie: brand.cookie },
      payload: { name: 'Heavy denim', code: 'MD-DEN', defaultCarbonFootprint: 8.5 },
    });
    expect(ok.statusCode).toBe(201);
    expect(ok.json()).toMatchObject({ code: 'MD-DEN', defaultCarbonFootprint: 8.5, materialType: null });
  });
});
