/**
 * src/modules/products/product.service.ts
 *
 * WHY:
 * - Brand-side product aggregate: product identity, its version history and its media.
 * - Only place in the module that opens units of work.
 *
 * RULES:
 * - Another tenant's product is NOT_FOUND, exactly like a missing one.
 * - A brand edits only a WORKING_DRAFT that no open contribution request drives.
 * - At most one non-deleted main image per product; a new main clears the old one
 *   in the same unit of work.
 * - Audit dispatched after commit.
 */

import type { Logger } from '../../shared/logger/logger';
import type { ActingContext } from '../../shared/http/require-auth-context';
import type { AuditSink } from '../../shared/audit/audit.sink';
import { AuditWriter } from '../../shared/audit/audit.writer';
import { resolveUrlContentType } from '../../shared/storage/content-type';
import type { AppUnitOfWork, Repos } from '../_shared/persistence/repos';

import {
  assertBrandCapable,
  assertTenantExists,
} from '../tenants/policies/tenant-capability.policy';

import { ProductErrors } from './product.errors';
import {
  auditMediaChanged,
  auditProductCreated,
  auditProductUpdated,
  auditVersionCloned,
  auditVersionUpdated,
} from './product.audit';
import type {
  Product,
  ProductDetail,
  ProductListItem,
  ProductMedia,
  ProductVersion,
} from './product.types';
import type {
  CreateProductInput,
  MediaInput,
  UpdateProductInput,
  UpdateVersionInput,
} from './product.schemas';
import {
  assertBrandCanEditVersion,
  assertCanStartNextVersion,
  pickLatestVersion,
} from './policies/version-state.policy';
import { cloneForNextSequence } from './helpers/clone-version';

export type ProductServiceDeps = {
  uow: AppUnitOfWork;
  logger: Logger;
  auditSink: AuditSink;
};

/** Index of the image that becomes main: the first flagged one, else the first one. */
export function pickMainImageIndex(images: readonly Pick<MediaInput, 'isMain'>[]): number {
  if (images.length === 0) return -1;
  const flagged = images.findIndex((img) => img.isMain === true);
  return flagged === -1 ? 0 : flagged;
}

function toMediaRow(input: MediaInput) {
  return {
    fileUrl: input.fileUrl,
    fileName: input.fileName ?? null,
    contentType: input.contentType ?? resolveUrlContentType(input.fileUrl),
  };
}

export class ProductService {
  constructor(private readonly deps: ProductServiceDeps) {}

  private async loadOwnProduct(
    repos: Repos,
    ctx: ActingContext,
    productId: string,
  ): Promise<Product> {
    const product = await repos.products.findById(productId);
    if (!product || product.tenantId !== ctx.tenantId) {
      throw ProductErrors.productNotFound({ productId });
    }
    return product;
  }

  private async loadOwnMedia(
    repos: Repos,
    product: Product,
    mediaId: string,
  ): Promise<ProductMedia> {
    const media = await repos.productMedia.findById(mediaId);
    if (!media || media.productId !== product.id || media.isDeleted) {
      throw ProductErrors.mediaNotFound({ mediaId });
    }
    return media;
  }

  private async buildDetail(repos: Repos, product: Product): Promise<ProductDetail> {
    const versions = await repos.productVersions.listForProduct(product.id);
    const latest = pickLatestVersion(versions);
    const media = await repos.productMedia.listForProduct(product.id);

    let latestVersion: ProductDetail['latestVersion'] = null;
    let contributionStatus: string | null = null;

    if (latest) {
      const children = await repos.versionChildren.list(latest.id);
      latestVersion = { ...latest, ...children };

      const request = await repos.contributionRequests.findLatestForVersion(latest.id);
      contributionStatus = request?.status ?? null;
    }

    return {
      ...product,
      latestVersion,
      versions: versions.map((v) => ({
        id: v.id,
        versionSequence: v.versionSequence,
        revision: v.revision,
        versionName: v.versionName,
        status: v.status,
        parentVersionId: v.parentVersionId,
        createdAt: v.createdAt,
      })),
      media,
      contributionStatus,
    };
  }

  async createProduct(ctx: ActingContext, input: CreateProductInput): Promise<ProductDetail> {
    this.deps.logger.info({
      msg: 'products.create.start',
      flow: 'products.create',
      requestId: ctx.requestId,
      tenantId: ctx.tenantId,
    });

    const audit = new AuditWriter(ctx);

    const detail = await this.deps.uow.transaction(async (repos) => {
      const tenant = await repos.tenants.findById(ctx.tenantId);
      assertTenantExists(tenant, ctx.tenantId);
      assertBrandCapable(tenant);

      if (await repos.products.findBySku(ctx.tenantId, input.sku)) {
        throw ProductErrors.skuTaken(input.sku);
      }

      const product = await repos.products.insert({
        tenantId: ctx.tenantId,
        sku: input.sku,
        gtin: input.gtin ?? null,
        name: input.name,
        category: input.category,
        description: input.description ?? null,
      });

      const version = await repos.productVersions.insert({
        productId: product.id,
        tenantId: ctx.tenantId,
        versionSequence: 1,
        revision: 1,
        versionName: input.versionName ?? 'Version 1',
        status: 'WORKING_DRAFT',
        parentVersionId: null,
        productName: product.name,
        category: product.category,
        description: product.description,
        manufacturingCountry: null,
        totalCarbonFootprintKg: null,
        totalWaterUsageLiters: null,
        totalEnergyMj: null,
        recyclingInstructions: null,
        recyclabilityClass: null,
      });

      const images = input.images ?? [];
      const mainIndex = pickMainImageIndex(images);
      const media: ProductMedia[] = [];
      for (const [i, image] of images.entries()) {
        media.push(
          await repos.productMedia.insert({
            productId: product.id,
            ...toMediaRow(image),
            isMain: i === mainIndex,
            displayOrder: i,
          }),
        );
      }

      auditProductCreated(audit, { product, version, media });
      return this.buildDetail(repos, product);
    });

    this.deps.auditSink.dispatch(audit.drain());

    this.deps.logger.info({
      msg: 'products.create.success',
      flow: 'products.create',
      requestId: ctx.requestId,
      tenantId: ctx.tenantId,
      productId: detail.id,
    });

    return detail;
  }

  async listProducts(ctx: ActingContext): Promise<ProductListItem[]> {
    return this.deps.uow.transaction(async (repos) => {
      const products = await repos.products.listForTenant(ctx.tenantId);
      const ids = products.map((p) => p.id);

      const versions = await repos.productVersions.listForProducts(ids);
      const mainImages = await repos.productMedia.listMainForProducts(ids);

      const versionsByProduct = new Map<string, ProductVersion[]>();
      for (const v of versions) {
        const list = versionsByProduct.get(v.productId) ?? [];
        list.push(v);
        versionsByProduct.set(v.productId, list);
      }
      const mainByProduct = new Map(mainImages.map((m) => [m.productId, m.fileUrl]));

      return products.map((product) => {
        const latest = pickLatestVersion(versionsByProduct.get(product.id) ?? []);
        return {
          ...product,
          latestVersion: latest
            ? {
                id: latest.id,
                versionSequence: latest.versionSequence,
                revision: latest.revision,
                versionName: latest.versionName,
                status: latest.status,
              }
            : null,
          mainImageUrl: mainByProduct.get(product.id) ?? null,
        };
      });
    });
  }

  async getProduct(ctx: ActingContext, productId: string): Promise<ProductDetail> {
    return this.deps.uow.transaction(async (repos) => {
      const product = await this.loadOwnProduct(repos, ctx, productId);
      return this.buildDetail(repos, product);
    });
  }

  async updateProduct(
    ctx: ActingContext,
    productId: string,
    input: UpdateProductInput,
  ): Promise<Product> {
    const audit = new AuditWriter(ctx);

    const product = await this.deps.uow.transaction(async (repos) => {
      await this.loadOwnProduct(repos, ctx, productId);
      const updated = await repos.products.update(productId, input);

      auditProductUpdated(audit, { productId, changes: input });
      return updated;
    });

    this.deps.auditSink.dispatch(audit.drain());

    this.deps.logger.info({
      msg: 'products.update.success',
      flow: 'products.update',
      requestId: ctx.requestId,
      tenantId: ctx.tenantId,
      productId,
    });

    return product;
  }

  /** Metadata and footprint edits by the brand, on its own working draft only. */
  async updateVersion(
    ctx: ActingContext,
    productId: string,
    versionId: string,
    input: UpdateVersionInput,
  ): Promise<ProductVersion> {
    const audit = new AuditWriter(ctx);

    const version = await this.deps.uow.transaction(async (repos) => {
      await this.loadOwnProduct(repos, ctx, productId);

      const current = await repos.productVersions.findById(versionId);
      if (!current || current.productId !== productId) {
        throw ProductErrors.versionNotFound({ versionId });
      }

      const open = await repos.contributionRequests.findOpenForVersion(current.id);
      assertBrandCanEditVersion(current, open !== undefined);

      const updated = await repos.productVersions.update(current.id, input);
      auditVersionUpdated(audit, { versionId: current.id, changes: input });
      return updated;
    });

    this.deps.auditSink.dispatch(audit.drain());

    this.deps.logger.info({
      msg: 'products.update_version.success',
      flow: 'products.update_version',
      requestId: ctx.requestId,
      tenantId: ctx.tenantId,
      productId,
      versionId,
    });

    return version;
  }

  /** Starts the next generation from a closed latest version. */
  async createNextVersion(
    ctx: ActingContext,
    productId: string,
    input: { versionName?: string },
  ): Promise<ProductDetail> {
    this.deps.logger.info({
      msg: 'products.next_version.start',
      flow: 'products.next_version',
      requestId: ctx.requestId,
      tenantId: ctx.tenantId,
      productId,
    });

    const audit = new AuditWriter(ctx);

    const detail = await this.deps.uow.transaction(async (repos) => {
      const product = await this.loadOwnProduct(repos, ctx, productId);

      const latest = await repos.productVersions.findLatest(product.id);
      if (!latest) throw ProductErrors.versionNotFound({ productId });
      assertCanStartNextVersion(latest);

      const children = await repos.versionChildren.list(latest.id);
      const clone = cloneForNextSequence(latest, children, input.versionName);

      const created = await repos.productVersions.insert(clone.version);
      await repos.versionChildren.replace(created.id, clone.children);

      auditVersionCloned(audit, { source: latest, clone: created, children: clone.children });
      return this.buildDetail(repos, product);
    });

    this.deps.auditSink.dispatch(audit.drain());

    this.deps.logger.info({
      msg: 'products.next_version.success',
      flow: 'products.next_version',
      requestId: ctx.requestId,
      tenantId: ctx.tenantId,
      productId,
      versionId: detail.latestVersion?.id,
    });

    return detail;
  }

  async addMedia(ctx: ActingContext, productId: string, input: MediaInput): Promise<ProductMedia> {
    const audit = new AuditWriter(ctx);

    const media = await this.deps.uow.transaction(async (repos) => {
      const product = await this.loadOwnProduct(repos, ctx, productId);
      const existing = await repos.productMedia.listForProduct(product.id);

      const makeMain = input.isMain === true || !existing.some((m) => m.isMain);
      if (makeMain) await repos.productMedia.clearMain(product.id);

      const displayOrder = existing.reduce((max, m) => Math.max(max, m.displayOrder + 1), 0);
      const created = await repos.productMedia.insert({
        productId: product.id,
        ...toMediaRow(input),
        isMain: makeMain,
        displayOrder,
      });

      auditMediaChanged(audit, { media: created, action: 'CREATE' });
      return created;
    });

    this.deps.auditSink.dispatch(audit.drain());
    return media;
  }

  async setMainMedia(ctx: ActingContext, productId: string, mediaId: string): Promise<ProductMedia> {
    const audit = new AuditWriter(ctx);

    const media = await this.deps.uow.transaction(async (repos) => {
      const product = await this.loadOwnProduct(repos, ctx, productId);
      await this.loadOwnMedia(repos, product, mediaId);

      await repos.productMedia.clearMain(product.id);
      const updated = await repos.productMedia.update(mediaId, { isMain: true });

      auditMediaChanged(audit, { media: updated, action: 'UPDATE', reason: 'set_main' });
      return updated;
    });

    this.deps.auditSink.dispatch(audit.drain());
    return media;
  }

  /** Soft delete. Deleting the main image leaves the product without one. */
  async deleteMedia(ctx: ActingContext, productId: string, mediaId: string): Promise<void> {
    const audit = new AuditWriter(ctx);

    await this.deps.uow.transaction(async (repos) => {
      const product = await this.loadOwnProduct(repos, ctx, productId);
      await this.loadOwnMedia(repos, product, mediaId);

      const deleted = await repos.productMedia.update(mediaId, { isDeleted: true, isMain: false });
      auditMediaChanged(audit, { media: deleted, action: 'DELETE' });
    });

    this.deps.auditSink.dispatch(audit.drain());
  }
}
