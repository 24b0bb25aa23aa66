import { describe, it, expect, vi, beforeEach } from 'vitest';
import type { MeasurementFile } from '@shared/types/measurement.types';
import type { TestKindResult } from '@shared/types/compliance.types';
import { ComplianceSession, runEvaluation } from './ComplianceSession';
import { DutConfigManager } from '../config/DutConfigManager';
import { TouchstoneParser } from '../touchstone/TouchstoneParser';
import { ConfigurationError, StaleConfigurationError } from '../utils/errors';
import { metricNumber } from '../analysis/metricFactory';
import { buildCompletePowerCsv, buildFlatTwoPort, buildNoiseFigureCsv } from '../test/measurementFactory';
import { createDutConfig } from '../test/dutFactory';

vi.mock('../utils/logger', () => ({
  logger: { info: vi.fn(), warn: vi.fn(), error: vi.fn(), debug: vi.fn() },
}));

const NETWORK = buildFlatTwoPort(2.0, 3.0, 0.05, 20);

const FILES: MeasurementFile[] = [
  { filename: '20240315_L123456_PRI_SN0042.s2p', content: NETWORK },
  { filename: '20240315_L123456_RED_SN0042.s2p', content: NETWORK },
  { filename: 'power.csv', content: buildCompletePowerCsv() },
  {
    filename: 'nf.csv',
    content: buildNoiseFigureCsv([
      { frequency: 2400, nfDb: 1.2 },
      { frequency: 2450, nfDb: 1.4 },
      { frequency: 2500, nfDb: 1.3 },
    ]),
  },
];

function kindResult(results: TestKindResult[], testKind: string): TestKindResult {
  const result = results.find((r) => r.testKind === testKind);
  if (!result) throw new Error(`no result for ${testKind}`);
  return result;
}

describe('ComplianceSession', () => {
  describe('evaluation', () => {
    let session: ComplianceSession;

    beforeEach(async () => {
      session = new ComplianceSession(createDutConfig());
      await session.load(FILES);
    });

    it('passes board bring-up', () => {
      const report = session.evaluate('board_bringup');
      expect(report.dutName).toBe('LNA-2G4');
      expect(report.stage).toBe('board_bringup');
      expect(report.overall).toBe('pass');
      expect(report.warnings).toEqual([]);
      expect(report.fileErrors).toEqual([]);
      expect(report.cancelled).toBe(false);

      // 2 networks x (gain min, gain max, flatness, S11 VSWR, S22 VSWR)
      expect(kindResult(report.testKinds, 's_parameters')).toMatchObject({
        outcome: 'evaluated',
        status: 'pass',
        counts: { pass: 10, fail: 0, indeterminate: 0 },
      });
      // P1dB worst case, Pout and IM3 at -7 dBm for three frequencies
      expect(kindResult(report.testKinds, 'power_linearity')).toMatchObject({
        status: 'pass',
        counts: { pass: 7, fail: 0, indeterminate: 0 },
      });
      expect(kindResult(report.testKinds, 'noise_figure')).toMatchObject({
        status: 'pass',
        counts: { pass: 1, fail: 0, indeterminate: 0 },
      });
    });

    it('stamps each report with a fresh run id and timestamp', () => {
      const first = session.evaluate('board_bringup');
      const second = session.evaluate('board_bringup');
      expect(first.runId).toMatch(/^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/);
      expect(second.runId).not.toBe(first.runId);
      expect(new Date(first.createdAt).toISOString()).toBe(first.createdAt);
    });

    it('switches stage without re-parsing', () => {
      const parse = vi.spyOn(TouchstoneParser, 'parse');
      const bringup = session.evaluate('board_bringup');
      const sit = session.evaluate('sit');

      expect(parse).not.toHaveBeenCalled();
      parse.mockRestore();

      expect(sit.metrics.map((m) => m.id)).toEqual(bringup.metrics.map((m) => m.id));
      expect(sit.overall).toBe('fail');
      expect(kindResult(sit.testKinds, 'power_linearity')).toMatchObject({
        status: 'fail',
        counts: { pass: 0, fail: 7, indeterminate: 0 },
      });
      // 1.4 dB against a 1.5 dB limit
      const nf = kindResult(sit.testKinds, 'noise_figure');
      const verdict = nf.outcome === 'evaluated' ? nf.verdicts[0] : undefined;
      expect(verdict?.status).toBe('pass');
      expect(verdict && verdict.status !== 'indeterminate' ? verdict.margin : null).toBeCloseTo(0.1, 9);
    });

    it('rejects every test kind for a stage without requirements', () => {
      const report = session.evaluate('test_campaign');
      expect(report.overall).toBe('indeterminate');
      expect(report.verdicts).toEqual([]);
      expect(report.testKinds.map((r) => r.outcome)).toEqual(['rejected', 'rejected', 'rejected']);
    });

    it('computes the noise figure worst case over all loaded files', () => {
      const nf = session.metrics.find((m) => m.kind === 'nf_worst_case');
      expect(nf && metricNumber(nf)).toBe(1.4);
    });

    it('computes the noise figure worst case once per load', async () => {
      const first = session.evaluate('board_bringup').metrics.find((m) => m.kind === 'nf_worst_case');
      const second = session.evaluate('sit').metrics.find((m) => m.kind === 'nf_worst_case');
      expect(second).toBe(first);

      await session.load([{ filename: 'nf_red.csv', content: buildNoiseFigureCsv([{ frequency: 2450, nfDb: 1.6, chain: 'RED' }]) }]);
      const updated = session.metrics.find((m) => m.kind === 'nf_worst_case');
      expect(updated).not.toBe(first);
      expect(updated && metricNumber(updated)).toBe(1.6);
    });
  });

  describe('file errors', () => {
    it('records unusable files and evaluates the rest', async () => {
      const session = new ComplianceSession(createDutConfig());
      const result = await session.load([
        FILES[0],
        { filename: 'notes.txt', content: 'hello' },
        { filename: '20240315_L123456_RED_SN0042.s2p', content: '# GHz S DB R 50\n' },
        FILES[2],
      ]);

      expect(result).toEqual({ loaded: 2, failed: 2, cancelled: false });
      const report = session.evaluate('board_bringup');
      expect(report.fileErrors).toEqual([
        {
          file: 'notes.txt',
          code: 'PARSE_ERROR',
          message: 'notes.txt: Unsupported file type; expected .s1p to .s4p or .csv',
          line: undefined,
        },
        {
          file: '20240315_L123456_RED_SN0042.s2p',
          code: 'PARSE_ERROR',
          message: '20240315_L123456_RED_SN0042.s2p: No data rows',
          line: undefined,
        },
      ]);
      expect(kindResult(report.testKinds, 's_parameters')).toMatchObject({ status: 'pass' });
      expect(kindResult(report.testKinds, 'power_linearity')).toMatchObject({ status: 'pass' });
      expect(report.warnings.map((w) => w.code)).toEqual(['incomplete_file_set']);
    });

    it('refuses a file loaded twice', async () => {
      const session = new ComplianceSession(createDutConfig());
      await session.load([FILES[0]]);
      const result = await session.load([FILES[0]]);
      expect(result).toEqual({ loaded: 0, failed: 1, cancelled: false });
      expect(session.evaluate('board_bringup').fileErrors[0]).toEqual({
        file: '20240315_L123456_PRI_SN0042.s2p',
        code: 'DUPLICATE_FILE',
        message: '20240315_L123456_PRI_SN0042.s2p: already loaded in this session',
      });
    });

    it('refuses a second file with the same name from another directory', async () => {
      const session = new ComplianceSession(createDutConfig());
      const result = await session.load([
        { filename: 'run1/20240315_L123456_PRI_SN0042.s2p', content: NETWORK },
        { filename: 'run2/20240315_L123456_PRI_SN0042.s2p', content: NETWORK },
      ]);
      expect(result).toEqual({ loaded: 1, failed: 1, cancelled: false });

      const report = session.evaluate('board_bringup');
      expect(report.fileErrors).toEqual([
        {
          file: 'run2/20240315_L123456_PRI_SN0042.s2p',
          code: 'DUPLICATE_FILE',
          message: 'run2/20240315_L123456_PRI_SN0042.s2p: file name already loaded from run1/20240315_L123456_PRI_SN0042.s2p',
        },
      ]);
      const ids = report.metrics.map((m) => m.id);
      expect(new Set(ids).size).toBe(ids.length);
    });

    it('leaves noise figure indeterminate without a noise figure file', async () => {
      const session = new ComplianceSession(createDutConfig());
      await session.load(FILES.slice(0, 3));
      const nf = kindResult(session.evaluate('board_bringup').testKinds, 'noise_figure');
      expect(nf).toMatchObject({ status: 'indeterminate', counts: { pass: 0, fail: 0, indeterminate: 1 } });
    });
  });

  describe('cancellation', () => {
    it('stops between files and keeps partial results', async () => {
      const controller = new AbortController();
      const session = new ComplianceSession(createDutConfig());
      const progress: string[] = [];

      const result = await session.load(FILES, {
        signal: controller.signal,
        onProgress: ({ filename }) => {
          progress.push(filename);
          controller.abort();
        },
      });

      expect(result).toEqual({ loaded: 1, failed: 0, cancelled: true });
      expect(progress).toEqual(['20240315_L123456_PRI_SN0042.s2p']);

      const report = session.evaluate('board_bringup');
      expect(report.cancelled).toBe(true);
      expect(report.metrics.some((m) => m.provenance.sources.includes('20240315_L123456_PRI_SN0042.s2p'))).toBe(true);
      expect(kindResult(report.testKinds, 'power_linearity')).toMatchObject({ status: 'indeterminate' });
    });

    it('loads nothing when already aborted', async () => {
      const controller = new AbortController();
      controller.abort();
      const session = new ComplianceSession(createDutConfig());
      expect(await session.load(FILES, { signal: controller.signal })).toEqual({
        loaded: 0,
        failed: 0,
        cancelled: true,
      });
    });

    it('reports progress for every file with several workers', async () => {
      const session = new ComplianceSession(createDutConfig());
      const completed: number[] = [];
      const result = await session.load(FILES, { concurrency: 3, onProgress: (p) => completed.push(p.completed) });
      expect(result).toEqual({ loaded: 4, failed: 0, cancelled: false });
      expect(completed).toEqual([1, 2, 3, 4]);
    });
  });

  describe('configuration snapshot', () => {
    it('is isolated from later edits to the caller object', async () => {
      const dut = createDutConfig();
      const session = new ComplianceSession(dut);
      dut.operationalRange.maxGHz = 2.9;
      expect(session.dut.operationalRange.maxGHz).toBe(2.5);
      expect(Object.isFrozen(session.dut.operationalRange)).toBe(true);
    });

    it('goes stale when the managed record changes', async () => {
      const manager = new DutConfigManager();
      await manager.createConfig(createDutConfig());
      const session = ComplianceSession.fromManager(manager, 'LNA-2G4');
      await session.load(FILES);
      expect(session.isStale).toBe(false);

      await manager.updateConfig('LNA-2G4', { partNumber: 'PN-2002' });

      expect(session.isStale).toBe(true);
      expect(() => session.evaluate('board_bringup')).toThrow(StaleConfigurationError);
    });

    it('goes stale when the managed record is deleted', async () => {
      const manager = new DutConfigManager();
      await manager.createConfig(createDutConfig());
      const session = ComplianceSession.fromManager(manager, 'LNA-2G4');
      await manager.deleteConfig('LNA-2G4');
      expect(session.isStale).toBe(true);
    });

    it('requires an existing record', () => {
      expect(() => ComplianceSession.fromManager(new DutConfigManager(), 'missing')).toThrow(ConfigurationError);
    });

    it('applies engine option overrides', () => {
      const session = new ComplianceSession(createDutConfig(), { engine: { frequencyOffsetToleranceGHz: 0.02 } });
      expect(session.options.frequencyOffsetToleranceGHz).toBe(0.02);
      expect(session.options.minLinearPoints).toBe(3);
    });
  });
});

describe('runEvaluation', () => {
  it('loads and evaluates in one call', async () => {
    const report = await runEvaluation(createDutConfig(), FILES, 'sit');
    expect(report.stage).toBe('sit');
    expect(report.overall).toBe('fail');
    expect(report.fileErrors).toEqual([]);
  });
});
