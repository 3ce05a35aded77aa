/**
 * backend/src/modules/products/dal/product.repo.ts
 *
 * WHY:
 * - Persistence ports for products and product media + Kysely implementations.
 *
 * RULES:
 * - No transactions started here (UnitOfWork owns tx).
 * - No AppError.
 * - SKU lookups are per tenant and case-insensitive.
 * - Media lists exclude soft-deleted rows.
 */

import type { Updateable } from 'kysely';
import type { DbExecutor } from '../../../shared/db/db';
import type { ProductMediaTable, ProductsTable } from '../../../shared/db/tables';
import { toProduct, toProductMedia } from '../product.queries';
import type {
  NewProduct,
  NewProductMedia,
  Product,
  ProductMedia,
  ProductPatch,
} from '../product.types';

export interface ProductRepo {
  findById(id: string): Promise<Product | undefined>;
  findBySku(tenantId: string, sku: string, excludeId?: string): Promise<Product | undefined>;
  listForTenant(tenantId: string): Promise<Product[]>;
  insert(input: NewProduct): Promise<Product>;
  update(id: string, patch: ProductPatch): Promise<Product>;
}

export type MediaPatch = Partial<Pick<ProductMedia, 'isMain' | 'isDeleted'>>;

export interface ProductMediaRepo {
  findById(id: string): Promise<ProductMedia | undefined>;
  listForProduct(productId: string): Promise<ProductMedia[]>;
  listMainForProducts(productIds: readonly string[]): Promise<ProductMedia[]>;
  insert(input: NewProductMedia): Promise<ProductMedia>;
  clearMain(productId: string): Promise<void>;
  update(id: string, patch: MediaPatch): Promise<ProductMedia>;
}

function toProductUpdate(patch: ProductPatch): Updateable<ProductsTable> {
  const values: Updateable<ProductsTable> = { updated_at: new Date() };
  if (patch.gtin !== undefined) values.gtin = patch.gtin;
  if (patch.name !== undefined) values.name = patch.name;
  if (patch.category !== undefined) values.category = patch.category;
  if (patch.description !== undefined) values.description = patch.description;
  if (patch.lifecycleStatus !== undefined) values.lifecycle_status = patch.lifecycleStatus;
  return values;
}

export class SqlProductRepo implements ProductRepo {
  constructor(private readonly db: DbExecutor) {}

  async findById(id: string): Promise<Product | undefined> {
    const row = await this.db
      .selectFrom('products')
      .selectAll()
      .where('id', '=', id)
      .executeTakeFirst();
    return row ? toProduct(row) : undefined;
  }

  async findBySku(tenantId: string, sku: string, excludeId?: string): Promise<Product | undefined> {
    let query = this.db
      .selectFrom('products')
      .selectAll()
      .where('tenant_id', '=', tenantId)
      .where((eb) => eb(eb.fn<string>('lower', ['sku']), '=', sku.toLowerCase()));

    if (excludeId) query = query.where('id', '!=', excludeId);

    const row = await query.executeTakeFirst();
    return row ? toProduct(row) : undefined;
  }

  async listForTenant(tenantId: string): Promise<Product[]> {
    const rows = await this.db
      .selectFrom('products')
      .selectAll()
      .where('tenant_id', '=', tenantId)
      .orderBy('created_at', 'desc')
      .execute();
    return rows.map(toProduct);
  }

  async insert(input: NewProduct): Promise<Product> {
    const row = await this.db
      .insertInto('products')
      .values({
        tenant_id: input.tenantId,
        sku: input.sku,
        gtin: input.gtin,
        name: input.name,
        category: input.category,
        description: input.description,
      })
      .returningAll()
      .executeTakeFirstOrThrow();
    return toProduct(row);
  }

  async update(id: string, patch: ProductPatch): Promise<Product> {
    const row = await this.db
      .updateTable('products')
      .set(toProductUpdate(patch))
      .where('id', '=', id)
      .returningAll()
      .executeTakeFirstOrThrow();
    return toProduct(row);
  }
}

export class SqlProductMediaRepo implements ProductMediaRepo {
  constructor(private readonly db: DbExecutor) {}

  async findById(id: string): Promise<ProductMedia | undefined> {
    const row = await this.db
      .selectFrom('product_media')
      .selectAll()
      .where('id', '=', id)
      .executeTakeFirst();
    return row ? toProductMedia(row) : undefined;
  }

  async listForProduct(productId: string): Promise<ProductMedia[]> {
    const rows = await this.db
      .selectFrom('product_media')
      .selectAll()
      .where('product_id', '=', productId)
      .where('is_deleted', '=', false)
      .orderBy('display_order')
      .orderBy('created_at')
      .execute();
    return rows.map(toProductMedia);
  }

  async listMainForProducts(productIds: readonly string[]): Promise<ProductMedia[]> {
    if (productIds.length === 0) return [];
    const rows = await this.db
      .selectFrom('product_media')
      .selectAll()
      .where('product_id', 'in', [...productIds])
      .where('is_main', '=', true)
      .where('is_deleted', '=', false)
      .execute();
    return rows.map(toProductMedia);
  }

  async insert(input: NewProductMedia): Promise<ProductMedia> {
    const row = await this.db
      .insertInto('product_media')
      .values({
        product_id: input.productId,
        file_url: input.fileUrl,
        file_name: input.fileName,
        content_type: input.contentType,
        is_main: input.isMain,
        display_order: input.displayOrder,
      })
      .returningAll()
      .executeTakeFirstOrThrow();
    return toProductMedia(row);
  }

  async clearMain(productId: string): Promise<void> {
    await this.db
      .updateTable('product_media')
      .set({ is_main: false })
      .where('product_id', '=', productId)
      .where('is_main', '=', true)
      .execute();
  }

  async update(id: string, patch: MediaPatch): Promise<ProductMedia> {
    const values: Updateable<ProductMediaTable> = {};
    if (patch.isMain !== undefined) values.is_main = patch.isMain;
    if (patch.isDeleted !== undefined) values.is_deleted = patch.isDeleted;

    const row = await this.db
      .updateTable('product_media')
      .set(values)
      .where('id', '=', id)
      .returningAll()
      .executeTakeFirstOrThrow();
    return toProductMedia(row);
  }
}
