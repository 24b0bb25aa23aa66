/**
 * Constants for S-parameter, power/linearity and noise figure analysis.
 * Every tunable here can be overridden per session through EngineOptions.
 */

import type { EngineOptions } from '@shared/types/analysis.types';
import { DEFAULT_NF_COLUMN_MAPPING } from '@shared/constants';
import { DEFAULT_EXPECTED_FREQUENCY_COUNT } from '../csv/constants';

// ---- S-Parameters ----

/**
 * Maximum distance between a requested spot-gain frequency and the nearest
 * native sample. 5 MHz covers the usual 1-10 MHz VNA step.
 */
export const FREQUENCY_OFFSET_TOLERANCE_GHZ = 0.005;

// ---- Power / Linearity ----

/**
 * Gain deviation from the first (lowest-power) point still counted as linear.
 * Bench power meters repeat to about ±0.1 dB.
 */
export const LINEAR_REGION_TOLERANCE_DB = 0.25;

/** A line fit through fewer points than this is not trusted */
export const MIN_LINEAR_POINTS = 3;

/** P1dB: compression relative to the linear fit */
export const COMPRESSION_THRESHOLD_DB = 1.0;

// ---- Defaults ----

export const DEFAULT_ENGINE_OPTIONS: Readonly<EngineOptions> = {
  frequencyOffsetToleranceGHz: FREQUENCY_OFFSET_TOLERANCE_GHZ,
  linearRegionToleranceDb: LINEAR_REGION_TOLERANCE_DB,
  minLinearPoints: MIN_LINEAR_POINTS,
  compressionThresholdDb: COMPRESSION_THRESHOLD_DB,
  expectedPowerFrequencyCount: DEFAULT_EXPECTED_FREQUENCY_COUNT,
  noiseFigureColumns: DEFAULT_NF_COLUMN_MAPPING,
};

/** Defaults overlaid with the given overrides */
export function resolveEngineOptions(overrides: Partial<EngineOptions> = {}): EngineOptions {
  return { ...DEFAULT_ENGINE_OPTIONS, ...overrides };
}
