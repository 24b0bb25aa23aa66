import { describe, it, expect, vi } from 'vitest';
import type { Metric, MetricKind } from '@shared/types/analysis.types';
import { analyzeSParameters, networkLabel } from './SParameterAnalyzer';
import { metricNumber } from './metricFactory';
import { TouchstoneParser } from '../touchstone/TouchstoneParser';
import { buildTwoPortTouchstone } from '../test/measurementFactory';
import { BOARD_BRINGUP_REQUIREMENTS, createDutConfig } from '../test/dutFactory';

vi.mock('../utils/logger', () => ({
  logger: { info: vi.fn(), warn: vi.fn(), error: vi.fn(), debug: vi.fn() },
}));

const NETWORK_TEXT = buildTwoPortTouchstone([
  { freqGHz: 2.0, s11Db: -20, s21Db: 5, s22Db: -20 },
  { freqGHz: 2.2, s11Db: -20, s21Db: 8, s22Db: -20 },
  { freqGHz: 2.4, s11Db: -20, s21Db: 20, s22Db: -20 },
  { freqGHz: 2.45, s11Db: -20, s21Db: 21, s22Db: -10 },
  { freqGHz: 2.5, s11Db: -20, s21Db: 19.5, s22Db: -20 },
  { freqGHz: 2.7, s11Db: -20, s21Db: 6, s22Db: -20 },
  { freqGHz: 3.0, s11Db: -20, s21Db: 3, s22Db: -20 },
]);

const network = TouchstoneParser.parse('20240315_L123456_PRI_SN0042.s2p', NETWORK_TEXT).network;

function find(metrics: Metric[], kind: MetricKind, parameter = 'S21', index = 0): Metric {
  const matches = metrics.filter((m) => m.kind === kind && m.provenance.traces[0] === parameter);
  const metric = matches[index];
  if (!metric) throw new Error(`no ${kind} metric for ${parameter}`);
  return metric;
}

describe('analyzeSParameters', () => {
  describe('operational band gain', () => {
    const metrics = analyzeSParameters(
      network,
      createDutConfig({ requirements: { board_bringup: BOARD_BRINGUP_REQUIREMENTS } })
    );

    it('reports gain min, max and flatness over the operational band only', () => {
      expect(metricNumber(find(metrics, 'gain_min'))).toBe(19.5);
      expect(metricNumber(find(metrics, 'gain_max'))).toBe(21);
      expect(metricNumber(find(metrics, 'flatness'))).toBe(1.5);
    });

    it('attaches the in-band gain curve', () => {
      expect(find(metrics, 'gain_min').curve?.x).toEqual([2.4, 2.45, 2.5]);
      expect(find(metrics, 'gain_min').curve?.y).toEqual([20, 21, 19.5]);
    });

    it('reports wideband flatness over the full wideband range', () => {
      expect(metricNumber(find(metrics, 'wideband_flatness'))).toBe(18);
    });

    it('names metrics after the filename metadata', () => {
      expect(networkLabel(network)).toBe('PRI SN0042');
      expect(find(metrics, 'gain_min').name).toBe('PRI SN0042 S21 Gain min');
      expect(find(metrics, 'gain_min').id).toBe('20240315_L123456_PRI_SN0042.s2p:S21:gain_min');
    });

    it('defaults out-of-band windows to the wideband remainder', () => {
      const below = find(metrics, 'oob_rejection', 'S21', 0);
      const above = find(metrics, 'oob_rejection', 'S21', 1);
      expect(below.band).toEqual({ minGHz: 2.0, maxGHz: 2.4 });
      expect(metricNumber(below)).toBe(11.5);
      expect(above.band).toEqual({ minGHz: 2.5, maxGHz: 3.0 });
      expect(metricNumber(above)).toBe(13.5);
    });

    it('computes VSWR and return loss for every port', () => {
      expect(metricNumber(find(metrics, 'vswr_max', 'S11'))).toBeCloseTo(1.1 / 0.9, 10);
      expect(metricNumber(find(metrics, 'vswr_max', 'S22'))).toBeCloseTo(1.9249505911, 8);
      expect(find(metrics, 'vswr_max', 'S22').frequencyGHz).toBe(2.45);
      expect(metricNumber(find(metrics, 'return_loss_min', 'S22'))).toBeCloseTo(10, 10);
    });

    it('does not produce transmission metrics for reflection traces', () => {
      expect(metrics.filter((m) => m.kind === 'gain_min')).toHaveLength(1);
    });
  });

  describe('requirement-driven measurement points', () => {
    const dut = createDutConfig();
    dut.requirements.test_campaign = {
      stage: 'test_campaign',
      sParameters: { outOfBand: [{ band: { minGHz: 3.5, maxGHz: 4.0 }, rejectionDb: 30 }] },
    };
    const metrics = analyzeSParameters(network, dut);

    it('computes sub-band gain for every sub-band named by any stage', () => {
      const min = find(metrics, 'subband_gain_min');
      expect(min.band).toEqual({ minGHz: 2.4, maxGHz: 2.45 });
      expect(metricNumber(min)).toBe(20);
      expect(metricNumber(find(metrics, 'subband_gain_max'))).toBe(21);
    });

    it('uses the nearest native sample for spot gain and records the offset', () => {
      const spot = find(metrics, 'gain_at_frequency');
      expect(metricNumber(spot)).toBe(21);
      expect(spot.offset?.requestedGHz).toBe(2.46);
      expect(spot.offset?.actualGHz).toBe(2.45);
      expect(spot.offset?.offsetGHz).toBeCloseTo(0.01, 12);
    });

    it('uses configured out-of-band windows instead of the default', () => {
      const windows = metrics.filter((m) => m.kind === 'oob_rejection');
      expect(windows).toHaveLength(2);
      expect(metricNumber(windows[0])).toBe(13.5);
    });

    it('makes a window without samples indeterminate', () => {
      const empty = metrics.filter((m) => m.kind === 'oob_rejection')[1];
      expect(empty.status).toBe('indeterminate');
      expect(empty.status === 'indeterminate' && empty.reason).toBe('no samples in out-of-band window 3.5-4 GHz');
    });
  });

  it('reports an infinite VSWR for a total reflection', () => {
    const text = buildTwoPortTouchstone([
      { freqGHz: 2.4, s11Db: 0, s21Db: 20, s22Db: -20 },
      { freqGHz: 2.5, s11Db: -20, s21Db: 20, s22Db: -20 },
    ]);
    const metrics = analyzeSParameters(TouchstoneParser.parse('open.s2p', text).network, createDutConfig());
    const vswr = find(metrics, 'vswr_max', 'S11');
    expect(vswr.status === 'measured' && vswr.value).toEqual({ kind: 'infinite' });
    expect(metricNumber(vswr)).toBe(Infinity);
  });

  it('makes gain metrics indeterminate when the band has no samples', () => {
    const dut = createDutConfig({ operationalRange: { minGHz: 5, maxGHz: 6 }, widebandRange: { minGHz: 4, maxGHz: 7 } });
    const metrics = analyzeSParameters(network, dut);
    const gainMin = find(metrics, 'gain_min');
    expect(gainMin.status).toBe('indeterminate');
    expect(gainMin.status === 'indeterminate' && gainMin.reason).toBe('no samples in the operational band 5-6 GHz');
  });

  it('makes transmission metrics indeterminate when the file lacks the configured ports', () => {
    const oneport = TouchstoneParser.parse('refl.s1p', '# GHz S DB R 50\n2.4 -20 0\n2.5 -20 0\n').network;
    const metrics = analyzeSParameters(oneport, createDutConfig());
    const gainMin = metrics.find((m) => m.kind === 'gain_min');
    expect(gainMin?.status).toBe('indeterminate');
    expect(gainMin?.status === 'indeterminate' && gainMin.reason).toBe('S21 not present in a 1-port file');
  });
});
