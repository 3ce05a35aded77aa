/**
 * src/modules/products/product.audit.ts
 *
 * WHY:
 * - Typed audit helpers for products, versions and media.
 *
 * RULES:
 * - No DB access (records into AuditWriter).
 * - Child collections are summarized by counts, never copied into changes.
 */

import type { AuditAction } from '../../shared/audit/audit.types';
import type { AuditWriter } from '../../shared/audit/audit.writer';
import type { Product, ProductMedia, ProductVersion, VersionChildrenInput } from './product.types';

export function auditProductCreated(
  writer: AuditWriter,
  data: { product: Product; version: ProductVersion; media: ProductMedia[] },
): void {
  writer.record('Product', data.product.id, 'CREATE', {
    sku: data.product.sku,
    name: data.product.name,
    mediaCount: data.media.length,
  });
  writer.record('ProductVersion', data.version.id, 'CREATE', {
    productId: data.product.id,
    versionSequence: data.version.versionSequence,
    revision: data.version.revision,
  });
}

export function auditProductUpdated(
  writer: AuditWriter,
  data: { productId: string; changes: Record<string, unknown> },
): void {
  writer.record('Product', data.productId, 'UPDATE', data.changes);
}

export function auditVersionUpdated(
  writer: AuditWriter,
  data: { versionId: string; changes: Record<string, unknown> },
): void {
  writer.record('ProductVersion', data.versionId, 'UPDATE', data.changes);
}

export function auditVersionCloned(
  writer: AuditWriter,
  data: { source: ProductVersion; clone: ProductVersion; children: VersionChildrenInput },
): void {
  writer.record('ProductVersion', data.clone.id, 'CREATE', {
    parentVersionId: data.source.id,
    versionSequence: data.clone.versionSequence,
    revision: data.clone.revision,
    materials: data.children.materials.length,
    suppliers: data.children.suppliers.length,
    certifications: data.children.certifications.length,
  });
}

export function auditMediaChanged(
  writer: AuditWriter,
  data: { media: ProductMedia; action: AuditAction; reason?: string },
): void {
  writer.record('ProductMedia', data.media.id, data.action, {
    productId: data.media.productId,
    isMain: data.media.isMain,
    ...(data.reason ? { reason: data.reason } : {}),
  });
}
