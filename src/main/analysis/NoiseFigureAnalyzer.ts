/**
 * Noise figure analysis: Worst case (envelope maximum) over every trace
 * inside the operational band.
 */
import type { Metric, MetricBase } from '@shared/types/analysis.types';
import type { DutConfig } from '@shared/types/dut.types';
import type { NoiseFigureFile } from '@shared/types/measurement.types';
import { indeterminate, measured } from './metricFactory';
import { bandIndices, formatBand } from './sampling';

export function analyzeNoiseFigure(files: NoiseFigureFile[], dut: DutConfig): Metric {
  const band = dut.operationalRange;
  const traces = files.flatMap((f) => f.traces);
  const base: MetricBase = {
    id: 'noise_figure:nf_worst_case',
    name: 'NF worst case',
    kind: 'nf_worst_case',
    testKind: 'noise_figure',
    unit: 'dB',
    band,
    provenance: {
      sources: files.map((f) => f.sourceFile),
      traces: traces.map((t) => t.id),
      method: 'envelope maximum over all traces within the operational band',
    },
  };

  let worst: { nfDb: number; frequencyGHz: number; traceId: string } | null = null;
  for (const trace of traces) {
    for (const i of bandIndices(trace.frequencyGHz, band)) {
      if (worst === null || trace.nfDb[i] > worst.nfDb) {
        worst = { nfDb: trace.nfDb[i], frequencyGHz: trace.frequencyGHz[i], traceId: trace.id };
      }
    }
  }

  if (worst === null) {
    return indeterminate(base, `no noise figure samples in the operational band ${formatBand(band)}`);
  }
  return measured(
    {
      ...base,
      frequencyGHz: worst.frequencyGHz,
      provenance: { ...base.provenance, traces: [worst.traceId] },
    },
    worst.nfDb
  );
}
