import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { buildTestApp } from '../helpers/build-test-app';
import {
  readJson,
  signup,
  type ErrorResponseBody,
  type TestSession,
} from '../helpers/e2e-session';

/**
 * E2E tests for products: creation with the first working draft, media, version edits
 * and the start of a new generation.
 */

type MediaBody = {
  id: string;
  fileUrl: string;
  contentType: string | null;
  isMain: boolean;
  displayOrder: number;
};

type VersionBody = {
  id: string;
  versionSequence: number;
  revision: number;
  versionName: string;
  status: string;
  parentVersionId: string | null;
  totalCarbonFootprintKg: number | null;
  materials: unknown[];
  suppliers: unknown[];
  certifications: unknown[];
};

type ProductDetailBody = {
  id: string;
  sku: string;
  tenantId: string;
  latestVersion: VersionBody | null;
  versions: { id: string; versionSequence: number; revision: number; status: string }[];
  media: MediaBody[];
  contributionStatus: string | null;
};

describe('products', () => {
  let ctx: Awaited<ReturnType<typeof buildTestApp>>;
  let brand: TestSession;

  beforeEach(async () => {
    ctx = await buildTestApp();
    brand = await signup(ctx.app, { accountType: 'BRAND' });
  });

  afterEach(async () => {
    await ctx.close();
  });

  async function createProduct(session: TestSession, payload: Record<string, unknown>) {
    return ctx.app.inject({
      method: 'POST',
      url: '/products',
      headers: { cookie: session.cookie },
      payload,
    });
  }

  async function getProduct(productId: string, session: TestSession = brand) {
    return ctx.app.inject({
      method: 'GET',
      url: `/products/${productId}`,
      headers: { cookie: session.cookie },
    });
  }

  it('creates the product with a first working draft and its images', async () => {
    const res = await createProduct(brand, {
      sku: 'TEE-001',
      name: 'Organic Tee',
      category: 'Apparel',
      images: [
        { fileUrl: 'https://cdn.test/front.png' },
        { fileUrl: 'https://cdn.test/back.jpg', isMain: true },
      ],
    });

    expect(res.statusCode).toBe(201);
    const body = readJson<ProductDetailBody>(res);
    expect(body.sku).toBe('TEE-001');
    expect(body.tenantId).toBe(brand.tenantId);
    expect(body.latestVersion).toMatchObject({
      versionSequence: 1,
      revision: 1,
      versionName: 'Version 1',
      status: 'WORKING_DRAFT',
      parentVersionId: null,
      materials: [],
      suppliers: [],
      certifications: [],
    });
    expect(body.versions).toHaveLength(1);
    expect(body.contributionStatus).toBeNull();

    expect(body.media.map((m) => [m.fileUrl, m.isMain, m.displayOrder, m.contentType])).toEqual([
      ['https://cdn.test/front.png', false, 0, 'image/png'],
      ['https://cdn.test/back.jpg', true, 1, 'image/jpeg'],
    ]);
  });

  it('lists products with their main image and latest version', async () => {
    await createProduct(brand, {
      sku: 'TEE-001',
      name: 'Organic Tee',
      category: 'Apparel',
      images: [{ fileUrl: 'https://cdn.test/front.png' }],
    });

    const res = await ctx.app.inject({
      method: 'GET',
      url: '/products',
      headers: { cookie: brand.cookie },
    });

    expect(res.statusCode).toBe(200);
    const { products } = readJson<{
      products: { sku: string; mainImageUrl: string | null; latestVersion: { status: string } }[];
    }>(res);
    expect(products).toHaveLength(1);
    expect(products[0]).toMatchObject({
      sku: 'TEE-001',
      mainImageUrl: 'https://cdn.test/front.png',
      latestVersion: { status: 'WORKING_DRAFT' },
    });
  });

  it('refuses a SKU the organization already uses', async () => {
    await createProduct(brand, { sku: 'TEE-001', name: 'Tee', category: 'Apparel' });

    const res = await createProduct(brand, { sku: 'TEE-001', name: 'Other', category: 'Apparel' });

    expect(res.statusCode).toBe(409);
    expect(readJson<ErrorResponseBody>(res).error.message).toBe(
      'A product with SKU "TEE-001" already exists.',
    );

    const otherBrand = await signup(ctx.app, { accountType: 'BRAND' });
    const elsewhere = await createProduct(otherBrand, {
      sku: 'TEE-001',
      name: 'Tee',
      category: 'Apparel',
    });
    expect(elsewhere.statusCode).toBe(201);
  });

  it('only brand-capable organizations create products', async () => {
    const supplier = await signup(ctx.app, { accountType: 'SUPPLIER' });

    const res = await createProduct(supplier, { sku: 'X-1', name: 'X', category: 'Apparel' });

    expect(res.statusCode).toBe(403);
    expect(readJson<ErrorResponseBody>(res).error.message).toBe(
      'Only brand organizations can perform this action.',
    );
  });

  it('hides products of other organizations', async () => {
    const product = readJson<ProductDetailBody>(
      await createProduct(brand, { sku: 'TEE-001', name: 'Tee', category: 'Apparel' }),
    );
    const other = await signup(ctx.app, { accountType: 'HYBRID' });

    const res = await getProduct(product.id, other);

    expect(res.statusCode).toBe(404);
    expect(readJson<ErrorResponseBody>(res).error.message).toBe('Product not found.');
  });

  it('edits the working draft, then starts the next generation once it is closed', async () => {
    const product = readJson<ProductDetailBody>(
      await createProduct(brand, { sku: 'TEE-001', name: 'Tee', category: 'Apparel' }),
    );
    const draftId = product.latestVersion?.id ?? '';

    const edited = await ctx.app.inject({
      method: 'PATCH',
      url: `/products/${product.id}/versions/${draftId}`,
      headers: { cookie: brand.cookie },
      payload: { totalCarbonFootprintKg: 3.5, manufacturingCountry: 'pt' },
    });
    expect(edited.statusCode).toBe(200);
    expect(edited.json()).toMatchObject({ totalCarbonFootprintKg: 3.5, manufacturingCountry: 'PT' });

    const tooEarly = await ctx.app.inject({
      method: 'POST',
      url: `/products/${product.id}/versions`,
      headers: { cookie: brand.cookie },
      payload: {},
    });
    expect(tooEarly.statusCode).toBe(409);
    expect(readJson<ErrorResponseBody>(tooEarly).error.message).toBe(
      'A new version can only be started once the latest one is closed (it is WORKING_DRAFT).',
    );

    const stored = ctx.infra.uow.db.tables.productVersions.find((v) => v.id === draftId);
    if (!stored) throw new Error('draft missing');
    stored.status = 'APPROVED';

    const next = await ctx.app.inject({
      method: 'POST',
      url: `/products/${product.id}/versions`,
      headers: { cookie: brand.cookie },
      payload: { versionName: 'Autumn' },
    });
    expect(next.statusCode).toBe(201);

    const detail = readJson<ProductDetailBody>(next);
    expect(detail.latestVersion).toMatchObject({
      versionSequence: 2,
      revision: 1,
      versionName: 'Autumn',
      status: 'WORKING_DRAFT',
      parentVersionId: draftId,
      totalCarbonFootprintKg: 3.5,
    });
    expect(detail.versions.map((v) => [v.versionSequence, v.status])).toEqual([
      [2, 'WORKING_DRAFT'],
      [1, 'APPROVED'],
    ]);

    const frozen = await ctx.app.inject({
      method: 'PATCH',
      url: `/products/${product.id}/versions/${draftId}`,
      headers: { cookie: brand.cookie },
      payload: { totalCarbonFootprintKg: 1 },
    });
    expect(frozen.statusCode).toBe(409);
    expect(readJson<ErrorResponseBody>(frozen).error.message).toBe(
      'A APPROVED version cannot be edited.',
    );
  });

  it('manages media: first image becomes main, main can move, deletes are soft', async () => {
    const product = readJson<ProductDetailBody>(
      await createProduct(brand, { sku: 'TEE-001', name: 'Tee', category: 'Apparel' }),
    );

    const first = await ctx.app.inject({
      method: 'POST',
      url: `/products/${product.id}/media`,
      headers: { cookie: brand.cookie },
      payload: { fileUrl: 'https://cdn.test/one.webp' },
    });
    expect(first.statusCode).toBe(201);
    const one = readJson<MediaBody>(first);
    expect(one).toMatchObject({ isMain: true, displayOrder: 0, contentType: 'image/webp' });

    const two = readJson<MediaBody>(
      await ctx.app.inject({
        method: 'POST',
        url: `/products/${product.id}/media`,
        headers: { cookie: brand.cookie },
        payload: { fileUrl: 'https://cdn.test/two', contentType: 'image/avif' },
      }),
    );
    expect(two).toMatchObject({ isMain: false, displayOrder: 1, contentType: 'image/avif' });

    const moved = await ctx.app.inject({
      method: 'POST',
      url: `/products/${product.id}/media/${two.id}/main`,
      headers: { cookie: brand.cookie },
    });
    expect(moved.statusCode).toBe(200);

    const removed = await ctx.app.inject({
      method: 'DELETE',
      url: `/products/${product.id}/media/${one.id}`,
      headers: { cookie: brand.cookie },
    });
    expect(removed.statusCode).toBe(204);

    const detail = readJson<ProductDetailBody>(await getProduct(product.id));
    expect(detail.media.map((m) => [m.id, m.isMain])).toEqual([[two.id, true]]);

    const again = await ctx.app.inject({
      method: 'DELETE',
      url: `/products/${product.id}/media/${one.id}`,
      headers: { cookie: brand.cookie },
    });
    expect(again.statusCode).toBe(404);
  });
});
