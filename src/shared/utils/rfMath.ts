/**
 * Small RF conversion helpers shared by the parser, the writer and the analyzers.
 */

const DEG_PER_RAD = 180 / Math.PI;

/** 20·log10 of a linear voltage magnitude. 0 → -Infinity */
export function magnitudeToDb(magnitude: number): number {
  return 20 * Math.log10(magnitude);
}

export function dbToMagnitude(db: number): number {
  return Math.pow(10, db / 20);
}

export function polarToComplex(magnitude: number, angleDeg: number): { re: number; im: number } {
  const rad = angleDeg / DEG_PER_RAD;
  return { re: magnitude * Math.cos(rad), im: magnitude * Math.sin(rad) };
}

export function complexMagnitude(re: number, im: number): number {
  return Math.hypot(re, im);
}

export function complexPhaseDeg(re: number, im: number): number {
  return Math.atan2(im, re) * DEG_PER_RAD;
}

/**
 * VSWR from a reflection coefficient magnitude.
 * Returns Infinity for |Γ| >= 1 (open, short or active reflection).
 */
export function vswrFromGamma(gammaMagnitude: number): number {
  if (gammaMagnitude >= 1) return Infinity;
  return (1 + gammaMagnitude) / (1 - gammaMagnitude);
}

/** Return loss in dB (positive for a passive port) */
export function returnLossDb(gammaMagnitude: number): number {
  return -magnitudeToDb(gammaMagnitude);
}

/** Relative closeness check used by round-trip comparisons */
export function approxEqual(a: number, b: number, relTol = 1e-9, absTol = 1e-12): boolean {
  return Math.abs(a - b) <= Math.max(absTol, relTol * Math.max(Math.abs(a), Math.abs(b)));
}
