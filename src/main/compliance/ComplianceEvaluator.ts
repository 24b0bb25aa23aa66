/**
 * Compliance evaluation: turns stage-independent metrics into verdicts
 * against the active stage's requirements.
 *
 * Scalar families (operational-band gain, flatness, VSWR, P1dB worst case,
 * NF worst case) always yield a verdict, indeterminate when the bound is not
 * defined. Windowed and point families (sub-band gain, spot gain,
 * out-of-band rejection, Pin points) only yield verdicts for the windows and
 * points the active stage names. Informational metrics (wideband flatness,
 * return loss, per-frequency P1dB, IM3/IM5 worst case) get no verdict.
 */
import type { EngineOptions, Metric, MetricBase, MetricKind } from '@shared/types/analysis.types';
import type {
  Bounds,
  ComplianceEvaluation,
  TestKindResult,
  Verdict,
  VerdictCounts,
  VerdictStatus,
} from '@shared/types/compliance.types';
import type {
  DutConfig,
  FrequencyRange,
  NoiseFigureRequirements,
  PowerLinearityRequirements,
  SParameterRequirements,
  TestKind,
  TestStage,
} from '@shared/types/dut.types';
import { TEST_STAGE_DISPLAY_NAMES } from '@shared/constants';
import { ConfigurationError } from '../utils/errors';
import { logger } from '../utils/logger';
import { DEFAULT_ENGINE_OPTIONS } from '../analysis/constants';
import { indeterminate, metricNumber, toIndeterminate } from '../analysis/metricFactory';
import { formatBand, sameBand } from '../analysis/sampling';
import { formatBounds, hasBound, judge, makeBounds } from './bounds';
import { resolveRequirementSection } from './RequirementResolver';
import { METRIC_KIND_UNITS } from './constants';

export type EvaluationOptions = Pick<EngineOptions, 'frequencyOffsetToleranceGHz'>;

/**
 * Evaluate metrics against one stage.
 *
 * A ConfigurationError for one test kind rejects that kind only; every other
 * enabled kind is still evaluated.
 */
export function evaluateCompliance(
  metrics: readonly Metric[],
  dut: DutConfig,
  stage: TestStage,
  options: EvaluationOptions = DEFAULT_ENGINE_OPTIONS
): ComplianceEvaluation {
  const testKinds: TestKindResult[] = [];

  for (const testKind of dut.enabledTests) {
    const kindMetrics = metrics.filter((m) => m.testKind === testKind);
    try {
      const verdicts = evaluateTestKind(kindMetrics, dut, stage, testKind, options);
      testKinds.push({ testKind, outcome: 'evaluated', ...aggregateVerdicts(verdicts), verdicts });
    } catch (error) {
      if (!(error instanceof ConfigurationError)) throw error;
      logger.warn(`Rejected ${testKind} for ${dut.name}: ${error.message}`);
      testKinds.push({ testKind, outcome: 'rejected', error: { code: 'CONFIGURATION_ERROR', message: error.message } });
    }
  }

  const verdicts = testKinds.flatMap((r) => (r.outcome === 'evaluated' ? r.verdicts : []));
  const overall = overallStatus(testKinds);
  logger.debug(`Evaluated ${dut.name} at ${TEST_STAGE_DISPLAY_NAMES[stage]}: ${verdicts.length} verdicts, ${overall}`);
  return { stage, verdicts, testKinds, overall };
}

function evaluateTestKind(
  metrics: Metric[],
  dut: DutConfig,
  stage: TestStage,
  testKind: TestKind,
  options: EvaluationOptions
): Verdict[] {
  switch (testKind) {
    case 's_parameters':
      return evaluateSParameters(metrics, resolveRequirementSection(dut, stage, testKind), options);
    case 'power_linearity':
      return evaluatePowerLinearity(metrics, resolveRequirementSection(dut, stage, testKind));
    case 'noise_figure':
      return evaluateNoiseFigure(metrics, resolveRequirementSection(dut, stage, testKind));
  }
}

/**
 * Any fail → fail; otherwise any indeterminate, or no verdicts at all →
 * indeterminate; otherwise pass.
 */
export function aggregateVerdicts(verdicts: readonly Verdict[]): { status: VerdictStatus; counts: VerdictCounts } {
  const counts: VerdictCounts = { pass: 0, fail: 0, indeterminate: 0 };
  for (const verdict of verdicts) counts[verdict.status]++;

  let status: VerdictStatus = 'pass';
  if (counts.fail > 0) status = 'fail';
  else if (counts.indeterminate > 0 || verdicts.length === 0) status = 'indeterminate';
  return { status, counts };
}

/** A rejected test kind counts as indeterminate */
export function overallStatus(results: readonly TestKindResult[]): VerdictStatus {
  const statuses = results.map((r) => (r.outcome === 'evaluated' ? r.status : 'indeterminate'));
  if (statuses.includes('fail')) return 'fail';
  if (statuses.includes('indeterminate') || statuses.length === 0) return 'indeterminate';
  return 'pass';
}

/**
 * Verdict for one metric against one set of bounds.
 * Indeterminate metrics propagate without comparison.
 */
export function verdictFor(metric: Metric, bounds: Bounds, boundName: string): Verdict {
  const testKind = metric.testKind;
  const value = metricNumber(metric);
  if (metric.status === 'indeterminate' || value === null) {
    return {
      status: 'indeterminate',
      testKind,
      metric,
      bounds,
      reason: metric.status === 'indeterminate' ? metric.reason : 'no value',
    };
  }
  if (!hasBound(bounds)) {
    return { status: 'indeterminate', testKind, metric, bounds: null, reason: `${boundName} is not defined` };
  }
  const { status, margin, checks } = judge(value, bounds);
  return { status, testKind, metric, bounds, margin, checks };
}

function placeholderMetric(
  testKind: TestKind,
  kind: MetricKind,
  label: string,
  reason: string,
  extra: Partial<Pick<MetricBase, 'band' | 'frequencyGHz' | 'pinDbm'>> = {}
): Metric {
  return indeterminate(
    {
      id: `missing:${kind}${extra.band ? `@${formatBand(extra.band)}` : ''}${
        extra.frequencyGHz !== undefined ? `@${extra.frequencyGHz}GHz` : ''
      }${extra.pinDbm !== undefined ? `@${extra.pinDbm}dBm` : ''}`,
      name: label,
      kind,
      testKind,
      unit: METRIC_KIND_UNITS[kind],
      provenance: { sources: [], traces: [], method: 'no metric available' },
      ...extra,
    },
    reason
  );
}

/**
 * Scalar family: a verdict for every metric of the kind, or one
 * indeterminate verdict on a placeholder when there is none.
 */
function scalarVerdicts(
  metrics: Metric[],
  testKind: TestKind,
  kind: MetricKind,
  label: string,
  bounds: Bounds,
  boundName: string
): Verdict[] {
  const matching = metrics.filter((m) => m.kind === kind);
  if (matching.length === 0) {
    const metric = placeholderMetric(testKind, kind, label, `no ${label} metric; no usable measurement file`);
    return [verdictFor(metric, bounds, boundName)];
  }
  return matching.map((m) => verdictFor(m, bounds, boundName));
}

/** Windowed/point family: verdicts for the metrics matching one requirement entry */
function entryVerdicts(
  matching: Metric[],
  placeholder: () => Metric,
  bounds: Bounds,
  boundName: string
): Verdict[] {
  if (matching.length === 0) return [verdictFor(placeholder(), bounds, boundName)];
  return matching.map((m) => verdictFor(m, bounds, boundName));
}

function evaluateSParameters(
  metrics: Metric[],
  section: SParameterRequirements,
  options: EvaluationOptions
): Verdict[] {
  const testKind = 's_parameters';
  const gainBounds = makeBounds(section.gainMinDb, section.gainMaxDb);
  const verdicts: Verdict[] = [
    ...scalarVerdicts(metrics, testKind, 'gain_min', 'Gain min', gainBounds, 'gain bound'),
    ...scalarVerdicts(metrics, testKind, 'gain_max', 'Gain max', gainBounds, 'gain bound'),
    ...scalarVerdicts(metrics, testKind, 'flatness', 'Flatness', makeBounds(undefined, section.flatnessMaxDb), 'flatness max'),
    ...scalarVerdicts(metrics, testKind, 'vswr_max', 'VSWR max', makeBounds(undefined, section.vswrMax), 'VSWR max'),
  ];

  for (const entry of section.gainSubBands ?? []) {
    const bounds = makeBounds(entry.gainMinDb, entry.gainMaxDb);
    for (const kind of ['subband_gain_min', 'subband_gain_max'] as const) {
      verdicts.push(
        ...entryVerdicts(
          metrics.filter((m) => m.kind === kind && m.band !== undefined && sameBand(m.band, entry.band)),
          () => missingWindow(testKind, kind, kind === 'subband_gain_min' ? 'Sub-band gain min' : 'Sub-band gain max', entry.band),
          bounds,
          `sub-band gain bound for ${formatBand(entry.band)}`
        )
      );
    }
  }

  for (const entry of section.gainPoints ?? []) {
    const bounds = makeBounds(entry.gainMinDb, entry.gainMaxDb);
    const matching = metrics
      .filter((m) => m.kind === 'gain_at_frequency' && m.offset?.requestedGHz === entry.frequencyGHz)
      .map((m) => withinOffsetTolerance(m, options.frequencyOffsetToleranceGHz));
    verdicts.push(
      ...entryVerdicts(
        matching,
        () =>
          placeholderMetric(testKind, 'gain_at_frequency', `Gain @ ${entry.frequencyGHz} GHz`, 'no S-parameter data for the spot frequency', {
            frequencyGHz: entry.frequencyGHz,
          }),
        bounds,
        `gain bound at ${entry.frequencyGHz} GHz`
      )
    );
  }

  for (const entry of section.outOfBand ?? []) {
    verdicts.push(
      ...entryVerdicts(
        metrics.filter((m) => m.kind === 'oob_rejection' && m.band !== undefined && sameBand(m.band, entry.band)),
        () => missingWindow(testKind, 'oob_rejection', 'Out-of-band rejection', entry.band),
        makeBounds(entry.rejectionDb, undefined),
        `rejection for ${formatBand(entry.band)}`
      )
    );
  }

  return verdicts;
}

function missingWindow(testKind: TestKind, kind: MetricKind, label: string, band: FrequencyRange): Metric {
  const detail = formatBand(band);
  return placeholderMetric(testKind, kind, `${label} @ ${detail}`, `no S-parameter data for window ${detail}`, { band });
}

/** A spot-gain metric looked up too far from the requested frequency becomes indeterminate */
function withinOffsetTolerance(metric: Metric, toleranceGHz: number): Metric {
  const offset = metric.offset;
  if (metric.status === 'indeterminate' || !offset || offset.offsetGHz <= toleranceGHz) return metric;
  return toIndeterminate(
    metric,
    `nearest sample ${offset.actualGHz} GHz is ${offset.offsetGHz.toFixed(4)} GHz from ${offset.requestedGHz} GHz (tolerance ${toleranceGHz} GHz)`
  );
}

function evaluatePowerLinearity(metrics: Metric[], section: PowerLinearityRequirements): Verdict[] {
  const testKind = 'power_linearity';
  const verdicts: Verdict[] = scalarVerdicts(
    metrics,
    testKind,
    'p1db_worst_case',
    'P1dB worst case',
    makeBounds(section.p1dbMinDbm, undefined),
    'P1dB min'
  );

  for (const entry of section.pinPoutIm3 ?? []) {
    const points = [
      { kind: 'pout_at_pin' as const, label: 'Pout', min: entry.poutMinDbm },
      { kind: 'im3_at_pin' as const, label: 'IM3', min: entry.im3MinDbc },
    ];
    for (const point of points) {
      if (point.min === undefined) continue;
      verdicts.push(
        ...entryVerdicts(
          metrics.filter((m) => m.kind === point.kind && m.pinDbm === entry.pinDbm),
          () =>
            placeholderMetric(
              testKind,
              point.kind,
              `${point.label} @ Pin ${entry.pinDbm} dBm`,
              `no ${point.kind === 'pout_at_pin' ? 'single-tone' : 'two-tone'} sweep data`,
              { pinDbm: entry.pinDbm }
            ),
          makeBounds(point.min, undefined),
          `${point.label} min at Pin ${entry.pinDbm} dBm`
        )
      );
    }
  }
  return verdicts;
}

function evaluateNoiseFigure(metrics: Metric[], section: NoiseFigureRequirements): Verdict[] {
  return scalarVerdicts(
    metrics,
    'noise_figure',
    'nf_worst_case',
    'NF worst case',
    makeBounds(undefined, section.nfMaxDb),
    'NF max'
  );
}

/** One-line description of a verdict for logs */
export function describeVerdict(verdict: Verdict): string {
  if (verdict.status === 'indeterminate') return `${verdict.metric.name}: indeterminate (${verdict.reason})`;
  return `${verdict.metric.name}: ${verdict.status} ${formatBounds(verdict.bounds)} margin ${verdict.margin}`;
}
