import { describe, it, expect } from 'vitest';
import { bandIndices, formatBand, interpolateLinear, nearestIndex, uniqueBands, uniqueSorted } from './sampling';

describe('sampling', () => {
  const grid = [1.0, 1.5, 2.0, 2.5, 3.0];

  it('selects samples inside a closed band', () => {
    expect(bandIndices(grid, { minGHz: 1.5, maxGHz: 2.5 })).toEqual([1, 2, 3]);
    expect(bandIndices(grid, { minGHz: 3.1, maxGHz: 4 })).toEqual([]);
  });

  it('finds the nearest sample, lower frequency on a tie', () => {
    expect(nearestIndex(grid, 2.1)).toBe(2);
    expect(nearestIndex(grid, 1.25)).toBe(0);
    expect(nearestIndex([], 1)).toBe(-1);
  });

  it('interpolates without extrapolating', () => {
    expect(interpolateLinear([0, 10], [0, 20], 2.5)).toBe(5);
    expect(interpolateLinear([0, 10], [0, 20], 10)).toBe(20);
    expect(interpolateLinear([0, 10], [0, 20], 0)).toBe(0);
    expect(interpolateLinear([0, 10], [0, 20], 11)).toBeNull();
    expect(interpolateLinear([], [], 0)).toBeNull();
  });

  it('deduplicates bands and numbers', () => {
    const band = { minGHz: 1, maxGHz: 2 };
    expect(uniqueBands([band, { minGHz: 1, maxGHz: 2 }, { minGHz: 1, maxGHz: 3 }])).toEqual([
      band,
      { minGHz: 1, maxGHz: 3 },
    ]);
    expect(uniqueSorted([3, -7, 3, 0])).toEqual([-7, 0, 3]);
  });

  it('formats a band', () => {
    expect(formatBand({ minGHz: 2.4, maxGHz: 2.5 })).toBe('2.4-2.5 GHz');
  });
});
