import type { TestKind, TestStage } from './types/dut.types';
import type { FrequencyUnit, NoiseFigureColumnMapping } from './types/measurement.types';

export const TEST_STAGES: readonly TestStage[] = ['board_bringup', 'sit', 'test_campaign'] as const;

export const TEST_STAGE_DISPLAY_NAMES: Record<TestStage, string> = {
  board_bringup: 'Board Bring-up',
  sit: 'SIT',
  test_campaign: 'Test Campaign',
};

export const DEFAULT_TEST_STAGE: TestStage = 'board_bringup';

export const TEST_KINDS: readonly TestKind[] = ['s_parameters', 'power_linearity', 'noise_figure'] as const;

export const TEST_KIND_DISPLAY_NAMES: Record<TestKind, string> = {
  s_parameters: 'S-Parameters',
  power_linearity: 'Power / Linearity',
  noise_figure: 'Noise Figure',
};

/** Units per GHz; a value in the given unit divided by this is in GHz */
export const UNITS_PER_GHZ: Record<FrequencyUnit, number> = {
  Hz: 1e9,
  kHz: 1e6,
  MHz: 1e3,
  GHz: 1,
};

export const LOG_LEVELS = {
  ERROR: 'error',
  WARN: 'warn',
  INFO: 'info',
  DEBUG: 'debug'
} as const;

/** Exact, case-sensitive header names of a power/linearity CSV */
export const POWER_LINEARITY_COLUMNS = {
  SERIAL_NUMBER: 'Serial Number',
  TEMP: 'Temp',
  FREQUENCY: 'Frequency',
  CHAIN: 'Chain',
  TIMESTAMP: 'Timestamp',
  POWER_LEVEL: 'Power Level (dBm)',
  MODE: 'Mode',
  POWER_METER: 'Power Meter (dBm)',
  THERMISTOR: 'Thermister Calc (C)',
  MARKERS: [
    'Marker 1 (dBm)',
    'Marker 2 (dBm)',
    'Marker 3 (dBm)',
    'Marker 4 (dBm)',
    'Marker 5 (dBm)',
    'Marker 6 (dBm)',
  ],
} as const;

export const REQUIRED_POWER_LINEARITY_COLUMNS: readonly string[] = [
  POWER_LINEARITY_COLUMNS.SERIAL_NUMBER,
  POWER_LINEARITY_COLUMNS.TEMP,
  POWER_LINEARITY_COLUMNS.FREQUENCY,
  POWER_LINEARITY_COLUMNS.CHAIN,
  POWER_LINEARITY_COLUMNS.TIMESTAMP,
  POWER_LINEARITY_COLUMNS.POWER_LEVEL,
  POWER_LINEARITY_COLUMNS.MODE,
  POWER_LINEARITY_COLUMNS.POWER_METER,
  POWER_LINEARITY_COLUMNS.THERMISTOR,
  ...POWER_LINEARITY_COLUMNS.MARKERS,
];

/**
 * Noise figure CSV layout is not fixed by the bench software yet;
 * callers override this per session.
 */
export const DEFAULT_NF_COLUMN_MAPPING: NoiseFigureColumnMapping = {
  frequency: 'Frequency',
  noiseFigure: 'Noise Figure',
  serialNumber: 'Serial Number',
  chain: 'Chain',
  frequencyUnit: 'auto',
};
