/**
 * Constants for bench CSV logs (power/linearity and noise figure).
 */

import type { ToneMode } from '@shared/types/measurement.types';

/** Bench logs hold one sweep set at each of three carrier frequencies */
export const DEFAULT_EXPECTED_FREQUENCY_COUNT = 3;

/** Power/linearity frequency column is logged in MHz */
export const MHZ_PER_GHZ = 1000;

/**
 * Mode spellings after lower-casing and dropping everything but letters,
 * so "Single Tone", "single-tone" and "SINGLE_TONE" all match.
 */
export const MODE_ALIASES: Record<string, ToneMode> = {
  singletone: 'single_tone',
  single: 'single_tone',
  twotone: 'two_tone',
  two: 'two_tone',
};

/**
 * With frequencyUnit 'auto', noise figure frequencies above this value are
 * taken as MHz, otherwise GHz.
 */
export const NF_AUTO_MHZ_THRESHOLD = 100;
