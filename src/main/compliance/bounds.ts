import type { BoundCheck, Bounds } from '@shared/types/compliance.types';

export interface BoundsJudgement {
  status: 'pass' | 'fail';
  margin: number;
  checks: { min?: BoundCheck; max?: BoundCheck };
}

/** Bounds with only the defined limits kept */
export function makeBounds(min: number | undefined, max: number | undefined): Bounds {
  const bounds: Bounds = {};
  if (min !== undefined) bounds.min = min;
  if (max !== undefined) bounds.max = max;
  return bounds;
}

export function hasBound(bounds: Bounds): boolean {
  return bounds.min !== undefined || bounds.max !== undefined;
}

/**
 * Compare a value against inclusive bounds.
 *
 * Margin is room remaining: value - min and max - value, the overall margin
 * being the smaller one. An infinite value yields ±Infinity margins.
 * Callers must check `hasBound` first; with no limit the margin is Infinity.
 */
export function judge(value: number, bounds: Bounds): BoundsJudgement {
  const checks: BoundsJudgement['checks'] = {};
  if (bounds.min !== undefined) {
    const margin = value - bounds.min;
    checks.min = { limit: bounds.min, margin, satisfied: margin >= 0 };
  }
  if (bounds.max !== undefined) {
    const margin = bounds.max - value;
    checks.max = { limit: bounds.max, margin, satisfied: margin >= 0 };
  }

  const margin = Math.min(checks.min?.margin ?? Infinity, checks.max?.margin ?? Infinity);
  const pass = (checks.min?.satisfied ?? true) && (checks.max?.satisfied ?? true);
  return { status: pass ? 'pass' : 'fail', margin, checks };
}

/** "[10, 20]", "≥ 12", "≤ 1.5" */
export function formatBounds(bounds: Bounds): string {
  if (bounds.min !== undefined && bounds.max !== undefined) return `[${bounds.min}, ${bounds.max}]`;
  if (bounds.min !== undefined) return `≥ ${bounds.min}`;
  if (bounds.max !== undefined) return `≤ ${bounds.max}`;
  return 'unbounded';
}
