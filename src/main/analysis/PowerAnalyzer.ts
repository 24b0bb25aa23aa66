/**
 * Power/linearity analysis: P1dB compression, Pout and IM3 at requested
 * input powers, and worst-case IM3/IM5 from two-tone sweeps.
 *
 * Single-tone sweeps feed P1dB and Pout; two-tone sweeps feed IM3 and IM5.
 * IM3 is expressed as a carrier-to-intermod ratio in dBc (larger is better).
 */
import type { EngineOptions, Metric, MetricBase, MetricKind } from '@shared/types/analysis.types';
import type { DutConfig } from '@shared/types/dut.types';
import type { Chain, PowerLinearityFile, PowerLinearityRecord, PowerSweep } from '@shared/types/measurement.types';
import { FilenameParser } from '../touchstone/FilenameParser';
import { DEFAULT_ENGINE_OPTIONS } from './constants';
import { collectMeasurementPoints } from './measurementPoints';
import { interpolateLinear } from './sampling';
import { indeterminate, measured, metricNumber } from './metricFactory';

export type P1dbOptions = Pick<EngineOptions, 'linearRegionToleranceDb' | 'minLinearPoints' | 'compressionThresholdDb'>;

export type P1dbResult =
  | {
      found: true;
      /** Input-referred P1dB */
      pinDbm: number;
      /** Output power at the compression point */
      poutDbm: number;
      smallSignalGainDb: number;
      linearPoints: number;
    }
  | { found: false; reason: string };

/**
 * Locate the compression point of a single-tone sweep.
 *
 * The linear region is the run of lowest-power points whose gain stays
 * within the tolerance of the first point's gain. A least-squares line
 * through it predicts the uncompressed output; P1dB is the first input
 * power where prediction minus measurement reaches the threshold,
 * interpolated between samples.
 *
 * @param pinDbm - Ascending input powers
 * @param poutDbm - Output powers, same length
 */
export function findP1db(
  pinDbm: ArrayLike<number>,
  poutDbm: ArrayLike<number>,
  options: P1dbOptions = DEFAULT_ENGINE_OPTIONS
): P1dbResult {
  const n = pinDbm.length;
  if (n < options.minLinearPoints) {
    return { found: false, reason: `sweep has ${n} points, at least ${options.minLinearPoints} needed` };
  }

  const firstGain = poutDbm[0] - pinDbm[0];
  let linearPoints = 1;
  while (
    linearPoints < n &&
    Math.abs(poutDbm[linearPoints] - pinDbm[linearPoints] - firstGain) <= options.linearRegionToleranceDb
  ) {
    linearPoints++;
  }
  if (linearPoints < options.minLinearPoints) {
    return {
      found: false,
      reason: `linear region has ${linearPoints} points, at least ${options.minLinearPoints} needed`,
    };
  }

  const { slope, intercept } = fitLine(pinDbm, poutDbm, linearPoints);
  const compression = (i: number): number => slope * pinDbm[i] + intercept - poutDbm[i];

  let previous = compression(0);
  let maxCompression = previous;
  for (let i = 1; i < n; i++) {
    const current = compression(i);
    if (current >= options.compressionThresholdDb) {
      const t = (options.compressionThresholdDb - previous) / (current - previous);
      return {
        found: true,
        pinDbm: pinDbm[i - 1] + t * (pinDbm[i] - pinDbm[i - 1]),
        poutDbm: poutDbm[i - 1] + t * (poutDbm[i] - poutDbm[i - 1]),
        smallSignalGainDb: firstGain,
        linearPoints,
      };
    }
    maxCompression = Math.max(maxCompression, current);
    previous = current;
  }

  return {
    found: false,
    reason: `no ${options.compressionThresholdDb} dB compression within the sweep (max ${maxCompression.toFixed(2)} dB)`,
  };
}

/** Least-squares line through the first `count` points */
function fitLine(x: ArrayLike<number>, y: ArrayLike<number>, count: number): { slope: number; intercept: number } {
  let sumX = 0;
  let sumY = 0;
  for (let i = 0; i < count; i++) {
    sumX += x[i];
    sumY += y[i];
  }
  const meanX = sumX / count;
  const meanY = sumY / count;

  let sxy = 0;
  let sxx = 0;
  for (let i = 0; i < count; i++) {
    sxy += (x[i] - meanX) * (y[i] - meanY);
    sxx += (x[i] - meanX) * (x[i] - meanX);
  }
  const slope = sxx > 0 ? sxy / sxx : 0;
  return { slope, intercept: meanY - slope * meanX };
}

/** Carrier-to-IM3 ratio of one two-tone record, worse sideband */
export function im3Dbc(record: PowerLinearityRecord): number {
  const [m1, m2, m3, m4] = record.markersDbm;
  return Math.min(m1 - m3, m2 - m4);
}

/** Carrier-to-IM5 ratio of one two-tone record, worse sideband */
export function im5Dbc(record: PowerLinearityRecord): number {
  const [m1, m2, , , m5, m6] = record.markersDbm;
  return Math.min(m1 - m5, m2 - m6);
}

/**
 * Compute every power/linearity metric for one file.
 */
export function analyzePowerLinearity(
  file: PowerLinearityFile,
  dut: DutConfig,
  options: P1dbOptions = DEFAULT_ENGINE_OPTIONS
): Metric[] {
  const metrics: Metric[] = [];
  const { pinPointsDbm } = collectMeasurementPoints(dut);
  const p1dbByChain = new Map<Chain, Metric[]>();

  for (const sweep of file.sweeps) {
    const pins = sweep.records.map((r) => r.pinDbm);
    const describeMetric = sweepDescriber(file, sweep);

    if (sweep.mode === 'single_tone') {
      const pouts = sweep.records.map((r) => r.powerMeterDbm);
      const p1db = p1dbMetric(describeMetric, pins, pouts, options);
      metrics.push(p1db);
      const chainMetrics = p1dbByChain.get(sweep.chain) ?? [];
      chainMetrics.push(p1db);
      p1dbByChain.set(sweep.chain, chainMetrics);

      for (const pinDbm of pinPointsDbm) {
        metrics.push(pointMetric(describeMetric, 'pout_at_pin', 'dBm', pins, pouts, pinDbm));
      }
    } else {
      const im3 = sweep.records.map(im3Dbc);
      const im5 = sweep.records.map(im5Dbc);
      metrics.push(worstCaseMetric(describeMetric, 'im3_worst_case', pins, im3));
      metrics.push(worstCaseMetric(describeMetric, 'im5_worst_case', pins, im5));

      for (const pinDbm of pinPointsDbm) {
        metrics.push(pointMetric(describeMetric, 'im3_at_pin', 'dBc', pins, im3, pinDbm));
      }
    }
  }

  const chains = [...new Set(file.sweeps.map((s) => s.chain))];
  for (const chain of chains) {
    metrics.push(...missingSweepMetrics(file, chain, pinPointsDbm));
    metrics.push(p1dbWorstCase(file, chain, p1dbByChain.get(chain) ?? []));
  }

  return metrics;
}

type PowerMetricKind = Extract<MetricKind, 'p1db' | 'pout_at_pin' | 'im3_at_pin' | 'im3_worst_case' | 'im5_worst_case'>;

type SweepDescriber = (kind: PowerMetricKind, unit: MetricBase['unit'], method: string, pinDbm?: number) => MetricBase;

const KIND_NAMES: Record<PowerMetricKind | 'p1db_worst_case', string> = {
  p1db: 'P1dB',
  p1db_worst_case: 'P1dB worst case',
  pout_at_pin: 'Pout',
  im3_at_pin: 'IM3',
  im3_worst_case: 'IM3 worst case',
  im5_worst_case: 'IM5 worst case',
};

type SweepKey = Pick<PowerSweep, 'frequencyGHz' | 'chain' | 'mode'>;

function sweepLabel(sweep: SweepKey): string {
  return `${sweep.chain} @ ${sweep.frequencyGHz} GHz ${sweep.mode === 'single_tone' ? 'single-tone' : 'two-tone'}`;
}

function sweepDescriber(file: PowerLinearityFile, sweep: SweepKey): SweepDescriber {
  const base = FilenameParser.basename(file.sourceFile);
  const label = sweepLabel(sweep);
  return (kind, unit, method, pinDbm) => ({
    id: `${base}:${sweep.chain}:${sweep.frequencyGHz}:${kind}${pinDbm === undefined ? '' : `@${pinDbm}dBm`}`,
    name: `${label} ${KIND_NAMES[kind]}${pinDbm === undefined ? '' : ` @ Pin ${pinDbm} dBm`}`,
    kind,
    testKind: 'power_linearity',
    unit,
    frequencyGHz: sweep.frequencyGHz,
    pinDbm,
    provenance: { sources: [file.sourceFile], traces: [label], method },
  });
}

function p1dbMetric(describeMetric: SweepDescriber, pins: number[], pouts: number[], options: P1dbOptions): Metric {
  const base = {
    ...describeMetric('p1db', 'dBm', 'input power at 1 dB compression from a least-squares linear-region fit'),
    curve: { xLabel: 'Pin (dBm)', yLabel: 'Pout (dBm)', x: pins, y: pouts },
  };
  const result = findP1db(pins, pouts, options);
  if (!result.found) return indeterminate(base, result.reason);
  return measured(
    {
      ...base,
      annotations: {
        outputP1dbDbm: result.poutDbm,
        smallSignalGainDb: result.smallSignalGainDb,
        linearPoints: result.linearPoints,
      },
    },
    result.pinDbm
  );
}

function pointMetric(
  describeMetric: SweepDescriber,
  kind: 'pout_at_pin' | 'im3_at_pin',
  unit: MetricBase['unit'],
  pins: number[],
  values: number[],
  pinDbm: number
): Metric {
  const base = describeMetric(kind, unit, 'linear interpolation between sweep points', pinDbm);
  const value = interpolateLinear(pins, values, pinDbm);
  if (value === null) {
    const range = pins.length > 0 ? `${pins[0]} to ${pins[pins.length - 1]} dBm` : 'empty';
    return indeterminate(base, `Pin ${pinDbm} dBm outside the swept range (${range})`);
  }
  return measured(base, value);
}

function worstCaseMetric(
  describeMetric: SweepDescriber,
  kind: 'im3_worst_case' | 'im5_worst_case',
  pins: number[],
  values: number[]
): Metric {
  const base = {
    ...describeMetric(kind, 'dBc', 'minimum carrier-to-intermod ratio over the sweep, worse sideband'),
    curve: { xLabel: 'Pin (dBm)', yLabel: `${kind === 'im3_worst_case' ? 'IM3' : 'IM5'} (dBc)`, x: pins, y: values },
  };
  if (values.length === 0) return indeterminate(base, 'empty sweep');
  return measured(base, Math.min(...values));
}

/**
 * Indeterminate Pin-point metrics for every file frequency where the chain
 * has no sweep of the mode the point is read from.
 */
function missingSweepMetrics(file: PowerLinearityFile, chain: Chain, pinPointsDbm: number[]): Metric[] {
  const metrics: Metric[] = [];
  for (const frequencyGHz of file.frequenciesGHz) {
    for (const mode of ['single_tone', 'two_tone'] as const) {
      if (file.sweeps.some((s) => s.chain === chain && s.frequencyGHz === frequencyGHz && s.mode === mode)) continue;
      const key: SweepKey = { frequencyGHz, chain, mode };
      const describeMetric = sweepDescriber(file, key);
      const kind = mode === 'single_tone' ? 'pout_at_pin' : 'im3_at_pin';
      for (const pinDbm of pinPointsDbm) {
        const base = describeMetric(kind, kind === 'pout_at_pin' ? 'dBm' : 'dBc', 'no sweep', pinDbm);
        metrics.push(indeterminate(base, `no ${sweepLabel(key)} sweep`));
      }
    }
  }
  return metrics;
}

/**
 * Minimum P1dB over the file's frequencies for one chain. Indeterminate when
 * the file does not hold the full frequency set, the chain misses a
 * single-tone sweep at any of them, or any P1dB is indeterminate.
 */
function p1dbWorstCase(file: PowerLinearityFile, chain: Chain, p1dbs: Metric[]): Metric {
  const source = FilenameParser.basename(file.sourceFile);
  const base: MetricBase = {
    id: `${source}:${chain}:p1db_worst_case`,
    name: `${chain} ${KIND_NAMES.p1db_worst_case}`,
    kind: 'p1db_worst_case',
    testKind: 'power_linearity',
    unit: 'dBm',
    provenance: {
      sources: [file.sourceFile],
      traces: p1dbs.flatMap((m) => m.provenance.traces),
      method: 'minimum P1dB over the file frequencies',
    },
  };

  if (!file.structurallyComplete) {
    return indeterminate(base, `file holds ${file.frequenciesGHz.length} frequencies; the worst case needs the full set`);
  }
  const missing = file.frequenciesGHz.filter((f) => !p1dbs.some((m) => m.frequencyGHz === f));
  if (missing.length > 0) {
    return indeterminate(base, `no single-tone sweep for ${chain} at ${missing.join(', ')} GHz`);
  }

  let worst: { value: number; frequencyGHz?: number } | null = null;
  for (const metric of p1dbs) {
    const value = metricNumber(metric);
    if (value === null) {
      return indeterminate(base, `P1dB indeterminate at ${metric.frequencyGHz} GHz`);
    }
    if (worst === null || value < worst.value) {
      worst = { value, frequencyGHz: metric.frequencyGHz };
    }
  }
  return worst === null ? indeterminate(base, 'no P1dB values') : measured({ ...base, frequencyGHz: worst.frequencyGHz }, worst.value);
}
