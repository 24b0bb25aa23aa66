/**
 * S-parameter analysis: Gain, flatness, sub-band and spot gain, VSWR,
 * return loss and out-of-band rejection from a parsed Touchstone network.
 *
 * Transmission traces are S{out}{in} for every configured output/input pair;
 * reflection traces are S{p}{p} for every port of the network.
 */
import type { Metric, MetricBase, MetricKind } from '@shared/types/analysis.types';
import type { DutConfig, FrequencyRange } from '@shared/types/dut.types';
import type { SParameterTrace, TouchstoneNetwork } from '@shared/types/measurement.types';
import { returnLossDb, vswrFromGamma } from '@shared/utils/rfMath';
import { getTrace } from '../touchstone/TouchstoneParser';
import { FilenameParser } from '../touchstone/FilenameParser';
import { collectMeasurementPoints } from './measurementPoints';
import { bandIndices, formatBand, nearestIndex } from './sampling';
import { indeterminate, measured } from './metricFactory';

const GAIN_CURVE_LABELS = { xLabel: 'Frequency (GHz)', yLabel: 'Gain (dB)' };

/** Display label of a network: "PRI_HG SN0042", or the filename */
export function networkLabel(network: TouchstoneNetwork): string {
  const meta = network.metadata;
  if (!meta) return FilenameParser.basename(network.sourceFile);
  return `${meta.chain}${meta.gainVariant ? `_${meta.gainVariant}` : ''} ${meta.serialNumber}`;
}

/**
 * Compute every S-parameter metric for one network.
 */
export function analyzeSParameters(network: TouchstoneNetwork, dut: DutConfig): Metric[] {
  const metrics: Metric[] = [];
  const points = collectMeasurementPoints(dut);

  for (const output of dut.ports.outputPorts) {
    for (const input of dut.ports.inputPorts) {
      if (output === input) continue;
      const trace = getTrace(network, output, input);
      const context = createContext(network, `S${output}${input}`, trace);
      if (!trace) {
        const reason = `S${output}${input} not present in a ${network.numPorts}-port file`;
        for (const kind of ['gain_min', 'gain_max', 'flatness'] as const) {
          metrics.push(indeterminate({ ...context.base(kind, 'dB', 'trace lookup'), band: dut.operationalRange }, reason));
        }
        continue;
      }
      metrics.push(...analyzeGain(context, trace, dut));
      for (const band of points.subBands) {
        metrics.push(...analyzeSubBand(context, trace, band));
      }
      for (const frequencyGHz of points.gainPointsGHz) {
        metrics.push(analyzeGainPoint(context, trace, frequencyGHz));
      }
      metrics.push(...analyzeOutOfBand(context, trace, dut, points.outOfBandWindows));
    }
  }

  for (let port = 1; port <= network.numPorts; port++) {
    const trace = getTrace(network, port, port);
    if (trace) {
      metrics.push(...analyzeReflection(createContext(network, trace.parameter, trace), trace, dut.operationalRange));
    }
  }

  return metrics;
}

type SParameterMetricKind = Extract<
  MetricKind,
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
>;

interface TraceContext {
  /** Metric descriptor for this trace; `detail` disambiguates ids and names */
  base(kind: SParameterMetricKind, unit: MetricBase['unit'], method: string, detail?: string): MetricBase;
}

function createContext(network: TouchstoneNetwork, parameter: string, trace: SParameterTrace | undefined): TraceContext {
  const file = FilenameParser.basename(network.sourceFile);
  const label = networkLabel(network);
  return {
    base(kind, unit, method, detail) {
      return {
        id: `${file}:${parameter}:${kind}${detail ? `@${detail}` : ''}`,
        name: `${label} ${parameter} ${KIND_NAMES[kind]}${detail ? ` @ ${detail}` : ''}`,
        kind,
        testKind: 's_parameters',
        unit,
        provenance: {
          sources: [network.sourceFile],
          traces: trace ? [trace.parameter] : [parameter],
          method,
        },
      };
    },
  };
}

const KIND_NAMES: Record<SParameterMetricKind, string> = {
  gain_min: 'Gain min',
  gain_max: 'Gain max',
  flatness: 'Flatness',
  wideband_flatness: 'Wideband flatness',
  subband_gain_min: 'Sub-band gain min',
  subband_gain_max: 'Sub-band gain max',
  gain_at_frequency: 'Gain',
  vswr_max: 'VSWR max',
  return_loss_min: 'Return loss min',
  oob_rejection: 'Out-of-band rejection',
};

function gainStats(trace: SParameterTrace, indices: number[]): { min: number; max: number; x: number[]; y: number[] } {
  let min = Infinity;
  let max = -Infinity;
  const x: number[] = [];
  const y: number[] = [];
  for (const i of indices) {
    const g = trace.magnitudeDb[i];
    if (g < min) min = g;
    if (g > max) max = g;
    x.push(trace.frequencyGHz[i]);
    y.push(g);
  }
  return { min, max, x, y };
}

function analyzeGain(context: TraceContext, trace: SParameterTrace, dut: DutConfig): Metric[] {
  const band = dut.operationalRange;
  const indices = bandIndices(trace.frequencyGHz, band);
  const minBase = { ...context.base('gain_min', 'dB', 'minimum |S| dB over the operational band'), band };
  const maxBase = { ...context.base('gain_max', 'dB', 'maximum |S| dB over the operational band'), band };
  const flatBase = { ...context.base('flatness', 'dB', 'gain max - gain min over the operational band'), band };
  const wideBase = {
    ...context.base('wideband_flatness', 'dB', 'gain max - gain min over the wideband range'),
    band: dut.widebandRange,
  };

  const metrics: Metric[] = [];
  if (indices.length === 0) {
    const reason = `no samples in the operational band ${formatBand(band)}`;
    metrics.push(indeterminate(minBase, reason), indeterminate(maxBase, reason), indeterminate(flatBase, reason));
  } else {
    const stats = gainStats(trace, indices);
    const curve = { ...GAIN_CURVE_LABELS, x: stats.x, y: stats.y };
    metrics.push(
      measured({ ...minBase, curve }, stats.min),
      measured({ ...maxBase, curve }, stats.max),
      measured(flatBase, stats.max - stats.min)
    );
  }

  const wideIndices = bandIndices(trace.frequencyGHz, dut.widebandRange);
  if (wideIndices.length === 0) {
    metrics.push(indeterminate(wideBase, `no samples in the wideband range ${formatBand(dut.widebandRange)}`));
  } else {
    const stats = gainStats(trace, wideIndices);
    metrics.push(measured(wideBase, stats.max - stats.min));
  }
  return metrics;
}

function analyzeSubBand(context: TraceContext, trace: SParameterTrace, band: FrequencyRange): Metric[] {
  const detail = formatBand(band);
  const minBase = { ...context.base('subband_gain_min', 'dB', 'minimum |S| dB over the sub-band', detail), band };
  const maxBase = { ...context.base('subband_gain_max', 'dB', 'maximum |S| dB over the sub-band', detail), band };
  const indices = bandIndices(trace.frequencyGHz, band);
  if (indices.length === 0) {
    const reason = `no samples in sub-band ${detail}`;
    return [indeterminate(minBase, reason), indeterminate(maxBase, reason)];
  }
  const stats = gainStats(trace, indices);
  return [measured(minBase, stats.min), measured(maxBase, stats.max)];
}

function analyzeGainPoint(context: TraceContext, trace: SParameterTrace, frequencyGHz: number): Metric {
  const i = nearestIndex(trace.frequencyGHz, frequencyGHz);
  const base = context.base('gain_at_frequency', 'dB', 'nearest native sample, not interpolated', `${frequencyGHz} GHz`);
  const actualGHz = trace.frequencyGHz[i];
  return measured(
    {
      ...base,
      frequencyGHz,
      offset: { requestedGHz: frequencyGHz, actualGHz, offsetGHz: Math.abs(actualGHz - frequencyGHz) },
    },
    trace.magnitudeDb[i]
  );
}

/**
 * Rejection = worst in-band gain - highest gain inside the window.
 * Without configured windows the wideband remainder below and above the
 * operational band is used, excluding the band edges.
 */
function analyzeOutOfBand(
  context: TraceContext,
  trace: SParameterTrace,
  dut: DutConfig,
  windows: FrequencyRange[]
): Metric[] {
  const op = dut.operationalRange;
  const wide = dut.widebandRange;
  const freqs = trace.frequencyGHz;

  const selections: Array<{ band: FrequencyRange; indices: number[] }> =
    windows.length > 0
      ? windows.map((band) => ({ band, indices: bandIndices(freqs, band) }))
      : defaultWindows(freqs, op, wide);

  const inBand = bandIndices(freqs, op);
  const inBandMin = inBand.length > 0 ? gainStats(trace, inBand).min : null;

  return selections.map(({ band, indices }) => {
    const detail = formatBand(band);
    const base = {
      ...context.base('oob_rejection', 'dB', 'worst in-band gain - highest window gain', detail),
      band,
    };
    if (indices.length === 0) return indeterminate(base, `no samples in out-of-band window ${detail}`);
    if (inBandMin === null) return indeterminate(base, `no samples in the operational band ${formatBand(op)}`);
    return measured(base, inBandMin - gainStats(trace, indices).max);
  });
}

function defaultWindows(
  freqs: Float64Array,
  op: FrequencyRange,
  wide: FrequencyRange
): Array<{ band: FrequencyRange; indices: number[] }> {
  const result: Array<{ band: FrequencyRange; indices: number[] }> = [];
  if (wide.minGHz < op.minGHz) {
    const indices: number[] = [];
    freqs.forEach((f, i) => {
      if (f >= wide.minGHz && f < op.minGHz) indices.push(i);
    });
    result.push({ band: { minGHz: wide.minGHz, maxGHz: op.minGHz }, indices });
  }
  if (wide.maxGHz > op.maxGHz) {
    const indices: number[] = [];
    freqs.forEach((f, i) => {
      if (f > op.maxGHz && f <= wide.maxGHz) indices.push(i);
    });
    result.push({ band: { minGHz: op.maxGHz, maxGHz: wide.maxGHz }, indices });
  }
  return result;
}

function analyzeReflection(context: TraceContext, trace: SParameterTrace, band: FrequencyRange): Metric[] {
  const vswrBase = { ...context.base('vswr_max', 'ratio', '(1+|Γ|)/(1-|Γ|) at the worst in-band |Γ|'), band };
  const rlBase = { ...context.base('return_loss_min', 'dB', '-20·log10 of the worst in-band |Γ|'), band };
  const indices = bandIndices(trace.frequencyGHz, band);
  if (indices.length === 0) {
    const reason = `no samples in the operational band ${formatBand(band)}`;
    return [indeterminate(vswrBase, reason), indeterminate(rlBase, reason)];
  }

  let worst = 0;
  let worstIndex = indices[0];
  for (const i of indices) {
    if (trace.magnitude[i] > worst) {
      worst = trace.magnitude[i];
      worstIndex = i;
    }
  }
  const frequencyGHz = trace.frequencyGHz[worstIndex];
  return [
    measured({ ...vswrBase, frequencyGHz }, vswrFromGamma(worst)),
    measured({ ...rlBase, frequencyGHz }, returnLossDb(worst)),
  ];
}
