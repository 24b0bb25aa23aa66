/**
 * Constants for Touchstone (.sNp) parsing and writing.
 *
 * References:
 * - Touchstone File Format Specification, version 1.1 (IBIS Open Forum)
 */

import type { FrequencyUnit, TouchstoneFormat, TouchstoneOptions } from '@shared/types/measurement.types';

/** Option line prefix */
export const OPTION_LINE_PREFIX = '#';

/** Comment marker; everything after it on a line is ignored */
export const COMMENT_MARKER = '!';

/** Option line tokens, upper-cased for case-insensitive lookup */
export const FREQUENCY_UNIT_TOKENS: Record<string, FrequencyUnit> = {
  HZ: 'Hz',
  KHZ: 'kHz',
  MHZ: 'MHz',
  GHZ: 'GHz',
};

export const FORMAT_TOKENS: Record<string, TouchstoneFormat> = {
  MA: 'MA',
  DB: 'DB',
  RI: 'RI',
};

/** Network parameter types a v1 option line may name; only S is supported */
export const PARAMETER_TOKENS = {
  SUPPORTED: 'S',
  UNSUPPORTED: ['Y', 'Z', 'H', 'G'],
} as const;

/** Reference impedance keyword, followed by the value in ohms */
export const REFERENCE_TOKEN = 'R';

export const DEFAULT_TOUCHSTONE_OPTIONS: Readonly<TouchstoneOptions> = {
  frequencyUnit: 'GHz',
  format: 'MA',
  referenceOhms: 50,
};

/** `.s1p` … `.s4p`, case-insensitive */
export const TOUCHSTONE_EXTENSION_PATTERN = /\.s([1-4])p$/i;

/**
 * Bench filename convention: YYYYMMDD_L<lot>_<PRI|RED>_SN<serial>[_<HG|LG>].sNp
 */
export const FILENAME_PATTERN = /^(\d{8})_(L\d{4,6})_(PRI|RED)_(SN\d+)(?:_(HG|LG))?\.s([1-4])p$/i;
