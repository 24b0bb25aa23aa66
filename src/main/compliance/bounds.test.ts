import { describe, it, expect } from 'vitest';
import { formatBounds, hasBound, judge, makeBounds } from './bounds';

describe('judge', () => {
  const gain = { min: 10, max: 20 };

  it('passes inside a two-sided window with room to both bounds', () => {
    const result = judge(15, gain);
    expect(result.status).toBe('pass');
    expect(result.margin).toBe(5);
    expect(result.checks.min).toEqual({ limit: 10, margin: 5, satisfied: true });
    expect(result.checks.max).toEqual({ limit: 20, margin: 5, satisfied: true });
  });

  it('fails above the window with a negative margin to the max bound only', () => {
    const result = judge(25, gain);
    expect(result.status).toBe('fail');
    expect(result.margin).toBe(-5);
    expect(result.checks.max).toEqual({ limit: 20, margin: -5, satisfied: false });
    expect(result.checks.min).toEqual({ limit: 10, margin: 15, satisfied: true });
  });

  it('treats bounds as inclusive', () => {
    expect(judge(20, gain)).toMatchObject({ status: 'pass', margin: 0 });
    expect(judge(10, gain)).toMatchObject({ status: 'pass', margin: 0 });
  });

  it('applies a single comparison for one-sided bounds', () => {
    const result = judge(1.2, { max: 1.5 });
    expect(result.status).toBe('pass');
    expect(result.margin).toBeCloseTo(0.3, 12);
    expect(result.checks.min).toBeUndefined();
  });

  it('gives infinite margins for an infinite value', () => {
    expect(judge(Infinity, { max: 2 })).toMatchObject({ status: 'fail', margin: -Infinity });
    expect(judge(Infinity, { min: 12 })).toMatchObject({ status: 'pass', margin: Infinity });
  });
});

describe('bounds helpers', () => {
  it('keeps only defined limits', () => {
    expect(makeBounds(undefined, 3)).toEqual({ max: 3 });
    expect(makeBounds(undefined, undefined)).toEqual({});
    expect(hasBound({})).toBe(false);
    expect(hasBound({ min: 0 })).toBe(true);
  });

  it('formats bounds', () => {
    expect(formatBounds({ min: 10, max: 20 })).toBe('[10, 20]');
    expect(formatBounds({ min: 12 })).toBe('≥ 12');
    expect(formatBounds({ max: 1.5 })).toBe('≤ 1.5');
  });
});
