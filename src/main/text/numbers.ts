const DECIMAL_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

/**
 * Parses a plain decimal or exponent literal.
 * Rejects hex, "Infinity", empty strings and anything Number() would coerce.
 */
export function parseDecimal(token: string): number | null {
  const trimmed = token.trim();
  return DECIMAL_PATTERN.test(trimmed) ? Number(trimmed) : null;
}
