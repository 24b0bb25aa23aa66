/**
 * Types for derived metrics.
 *
 * Metrics are stage-independent: they only depend on measurement data and
 * on where the DUT configuration asks to measure.
 */

import type { FrequencyRange, TestKind } from './dut.types';
import type { NoiseFigureColumnMapping } from './measurement.types';

export type MetricKind =
  | 'gain_min'
  | 'gain_max'
  | 'flatness'
  | 'wideband_flatness'
  | 'subband_gain_min'
  | 'subband_gain_max'
  | 'gain_at_frequency'
  | 'vswr_max'
  | 'return_loss_min'
  | 'oob_rejection'
  | 'p1db'
  | 'p1db_worst_case'
  | 'pout_at_pin'
  | 'im3_at_pin'
  | 'im3_worst_case'
  | 'im5_worst_case'
  | 'nf_worst_case';

/** A numeric result, or the sentinel for an unbounded quantity such as VSWR at |Γ| = 1 */
export type MetricValue = { kind: 'scalar'; value: number } | { kind: 'infinite' };

export interface MetricProvenance {
  /** Source filenames */
  sources: string[];
  /** Trace or sweep labels within the sources, e.g. "S21" or "PRI @ 2.400 GHz two-tone" */
  traces: string[];
  /** Short description of how the value was computed */
  method: string;
}

/** Nearest-sample lookup for a requirement defined at a nominal frequency */
export interface FrequencyOffset {
  requestedGHz: number;
  actualGHz: number;
  offsetGHz: number;
}

/** Curve backing a metric, for presentation layers */
export interface MetricCurve {
  xLabel: string;
  yLabel: string;
  x: number[];
  y: number[];
}

export interface MetricBase {
  /** Unique within a run */
  id: string;
  /** Human label, e.g. "PRI_HG S21 Gain min" */
  name: string;
  kind: MetricKind;
  testKind: TestKind;
  unit: 'dB' | 'dBm' | 'dBc' | 'ratio';
  provenance: MetricProvenance;
  /** Window the metric was computed over */
  band?: FrequencyRange;
  /** Frequency the metric refers to (spot gain, power sweep frequency, NF worst case) */
  frequencyGHz?: number;
  /** Input power point for pout_at_pin / im3_at_pin */
  pinDbm?: number;
  offset?: FrequencyOffset;
  /** Additional named values, e.g. output-referred P1dB */
  annotations?: Record<string, number>;
  curve?: MetricCurve;
}

export interface MeasuredMetric extends MetricBase {
  status: 'measured';
  value: MetricValue;
}

export interface IndeterminateMetric extends MetricBase {
  status: 'indeterminate';
  reason: string;
}

export type Metric = MeasuredMetric | IndeterminateMetric;

/** Per-session overrides of the analysis and evaluation tunables */
export interface EngineOptions {
  /** Spot-gain lookups further than this from the nearest sample are indeterminate */
  frequencyOffsetToleranceGHz: number;
  /** Maximum gain deviation from the first sweep point inside the linear region */
  linearRegionToleranceDb: number;
  /** Fewer linear points than this makes P1dB indeterminate */
  minLinearPoints: number;
  /** Compression defining the P1dB point */
  compressionThresholdDb: number;
  /** Distinct frequencies a complete power/linearity file holds */
  expectedPowerFrequencyCount: number;
  noiseFigureColumns: NoiseFigureColumnMapping;
}
