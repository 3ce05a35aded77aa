/**
 * src/modules/contributions/helpers/merge-draft-scalars.ts
 *
 * WHY:
 * - Draft saves patch the version's footprint scalars without wiping what the supplier
 *   did not send.
 *
 * RULES:
 * - Pure.
 * - Only non-null provided values are applied; null and missing both mean "keep".
 */

import type { VersionPatch, VersionScalars } from '../../products/product.types';

export type DraftScalars = { [K in keyof VersionScalars]?: VersionScalars[K] | undefined };

const SCALAR_KEYS = [
  'manufacturingCountry',
  'totalCarbonFootprintKg',
  'totalWaterUsageLiters',
  'totalEnergyMj',
  'recyclingInstructions',
  'recyclabilityClass',
] as const satisfies readonly (keyof VersionScalars)[];

export function mergeDraftScalars(input: DraftScalars): VersionPatch {
  const patch: VersionPatch = {};

  if (input.manufacturingCountry != null) patch.manufacturingCountry = input.manufacturingCountry;
  if (input.totalCarbonFootprintKg != null) {
    patch.totalCarbonFootprintKg = input.totalCarbonFootprintKg;
  }
  if (input.totalWaterUsageLiters != null) {
    patch.totalWaterUsageLiters = input.totalWaterUsageLiters;
  }
  if (input.totalEnergyMj != null) patch.totalEnergyMj = input.totalEnergyMj;
  if (input.recyclingInstructions != null) {
    patch.recyclingInstructions = input.recyclingInstructions;
  }
  if (input.recyclabilityClass != null) patch.recyclabilityClass = input.recyclabilityClass;

  return patch;
}

export function hasScalarChanges(patch: VersionPatch): boolean {
  return SCALAR_KEYS.some((key) => patch[key] !== undefined);
}
