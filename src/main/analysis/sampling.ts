/**
 * Frequency-grid helpers: band selection, nearest-sample lookup and
 * bounded linear interpolation.
 */
import type { FrequencyRange } from '@shared/types/dut.types';

/** Indices of samples inside the closed band [minGHz, maxGHz] */
export function bandIndices(frequencyGHz: ArrayLike<number>, band: FrequencyRange): number[] {
  const indices: number[] = [];
  for (let i = 0; i < frequencyGHz.length; i++) {
    const f = frequencyGHz[i];
    if (f >= band.minGHz && f <= band.maxGHz) indices.push(i);
  }
  return indices;
}

/**
 * Index of the sample nearest to the target frequency; ties go to the lower
 * frequency. Returns -1 for an empty grid.
 */
export function nearestIndex(frequencyGHz: ArrayLike<number>, targetGHz: number): number {
  let best = -1;
  let bestDistance = Infinity;
  for (let i = 0; i < frequencyGHz.length; i++) {
    const distance = Math.abs(frequencyGHz[i] - targetGHz);
    if (distance < bestDistance) {
      best = i;
      bestDistance = distance;
    }
  }
  return best;
}

/**
 * Linear interpolation of y at x over ascending xs.
 * Returns null outside [xs[0], xs[n-1]]; never extrapolates.
 */
export function interpolateLinear(xs: ArrayLike<number>, ys: ArrayLike<number>, x: number): number | null {
  const n = xs.length;
  if (n === 0 || x < xs[0] || x > xs[n - 1]) return null;

  for (let i = 0; i < n - 1; i++) {
    if (x === xs[i]) return ys[i];
    if (x < xs[i + 1]) {
      const t = (x - xs[i]) / (xs[i + 1] - xs[i]);
      return ys[i] + t * (ys[i + 1] - ys[i]);
    }
  }
  return ys[n - 1];
}

/** Same band, compared on both edges */
export function sameBand(a: FrequencyRange, b: FrequencyRange): boolean {
  return a.minGHz === b.minGHz && a.maxGHz === b.maxGHz;
}

/** Distinct bands in first-seen order */
export function uniqueBands(bands: FrequencyRange[]): FrequencyRange[] {
  const result: FrequencyRange[] = [];
  for (const band of bands) {
    if (!result.some((b) => sameBand(b, band))) result.push(band);
  }
  return result;
}

/** Distinct numbers in ascending order */
export function uniqueSorted(values: number[]): number[] {
  return [...new Set(values)].sort((a, b) => a - b);
}

/** "2.4-2.5 GHz" */
export function formatBand(band: FrequencyRange): string {
  return `${band.minGHz}-${band.maxGHz} GHz`;
}
