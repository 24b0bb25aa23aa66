import { describe, it, expect } from 'vitest';
import {
  magnitudeToDb,
  dbToMagnitude,
  polarToComplex,
  complexMagnitude,
  complexPhaseDeg,
  vswrFromGamma,
  returnLossDb,
  approxEqual,
} from './rfMath';

describe('magnitudeToDb / dbToMagnitude', () => {
  it('converts 0.1 to -20 dB', () => {
    expect(magnitudeToDb(0.1)).toBeCloseTo(-20, 12);
  });

  it('converts 20 dB to 10x', () => {
    expect(dbToMagnitude(20)).toBeCloseTo(10, 12);
  });

  it('returns -Infinity for zero magnitude', () => {
    expect(magnitudeToDb(0)).toBe(-Infinity);
  });
});

describe('polar/complex conversion', () => {
  it('maps 90 degrees onto the imaginary axis', () => {
    const c = polarToComplex(2, 90);
    expect(c.re).toBeCloseTo(0, 12);
    expect(c.im).toBeCloseTo(2, 12);
  });

  it('recovers magnitude and phase', () => {
    const c = polarToComplex(0.5, -135);
    expect(complexMagnitude(c.re, c.im)).toBeCloseTo(0.5, 12);
    expect(complexPhaseDeg(c.re, c.im)).toBeCloseTo(-135, 10);
  });
});

describe('vswrFromGamma', () => {
  it('is 1 for a matched port', () => {
    expect(vswrFromGamma(0)).toBe(1);
  });

  it('is 2 for |Γ| = 1/3', () => {
    expect(vswrFromGamma(1 / 3)).toBeCloseTo(2, 12);
  });

  it('is monotonically increasing on [0, 1)', () => {
    let previous = vswrFromGamma(0);
    for (let g = 0.01; g < 1; g += 0.01) {
      const current = vswrFromGamma(g);
      expect(current).toBeGreaterThan(previous);
      previous = current;
    }
  });

  it('is infinite at |Γ| = 1', () => {
    expect(vswrFromGamma(1)).toBe(Infinity);
  });
});

describe('returnLossDb', () => {
  it('is 20 dB for |Γ| = 0.1', () => {
    expect(returnLossDb(0.1)).toBeCloseTo(20, 12);
  });
});

describe('approxEqual', () => {
  it('accepts values within relative tolerance', () => {
    expect(approxEqual(1e9, 1e9 + 0.5)).toBe(true);
  });

  it('rejects values outside tolerance', () => {
    expect(approxEqual(1, 1.001)).toBe(false);
  });
});
