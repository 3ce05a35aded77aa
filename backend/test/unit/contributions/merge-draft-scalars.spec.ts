import { describe, it, expect } from 'vitest';
import {
  hasScalarChanges,
  mergeDraftScalars,
} from '../../../src/modules/contributions/helpers/merge-draft-scalars';

describe('mergeDraftScalars', () => {
  it('keeps only the values that were sent', () => {
    const patch = mergeDraftScalars({
      manufacturingCountry: 'PT',
      totalCarbonFootprintKg: 12.5,
      totalWaterUsageLiters: null,
      recyclingInstructions: undefined,
    });

    expect(patch).toEqual({ manufacturingCountry: 'PT', totalCarbonFootprintKg: 12.5 });
  });

  it('keeps zero as a real value', () => {
    expect(mergeDraftScalars({ totalEnergyMj: 0 })).toEqual({ totalEnergyMj: 0 });
  });
});

describe('hasScalarChanges', () => {
  it('is false for an empty patch', () => {
    expect(hasScalarChanges(mergeDraftScalars({ manufacturingCountry: null }))).toBe(false);
  });

  it('is true once any scalar is set', () => {
    expect(hasScalarChanges({ recyclabilityClass: 'A' })).toBe(true);
  });
});
