/**
 * ComplianceSession
 *
 * Ties parsing, analysis and evaluation together for one DUT configuration.
 * Files are parsed and analyzed once; `evaluate` can then be called for any
 * stage without re-parsing. The configuration is snapshotted (deep-frozen)
 * when the session starts.
 */

import { v4 as uuidv4 } from 'uuid';
import type { EngineOptions, Metric } from '@shared/types/analysis.types';
import type { EvaluationReport } from '@shared/types/compliance.types';
import type { DutConfig, TestStage } from '@shared/types/dut.types';
import type {
  FileError,
  MeasurementFile,
  NoiseFigureFile,
  RunWarning,
  TouchstoneNetwork,
} from '@shared/types/measurement.types';
import { TEST_STAGE_DISPLAY_NAMES } from '@shared/constants';
import { ConfigurationError, ParseError, StaleConfigurationError } from '../utils/errors';
import { logger } from '../utils/logger';
import { deepFreeze } from '../utils/deepFreeze';
import { resolveEngineOptions } from '../analysis/constants';
import { analyzeSParameters } from '../analysis/SParameterAnalyzer';
import { analyzePowerLinearity } from '../analysis/PowerAnalyzer';
import { analyzeNoiseFigure } from '../analysis/NoiseFigureAnalyzer';
import { evaluateCompliance } from '../compliance/ComplianceEvaluator';
import { FilenameParser } from '../touchstone/FilenameParser';
import type { DutConfigManager } from '../config/DutConfigManager';
import { ingestFile } from './FileIngestor';
import type { IngestedFile } from './FileIngestor';
import { checkFileSet } from './FileSetValidator';

export interface SessionOptions {
  /** Overrides of the analysis and evaluation tunables */
  engine?: Partial<EngineOptions>;
  /** Manager the configuration came from; changes to the record make the session stale */
  configManager?: DutConfigManager;
}

export interface LoadProgress {
  completed: number;
  total: number;
  filename: string;
}

export interface LoadOptions {
  /** Checked between files; files already processed are kept */
  signal?: AbortSignal;
  onProgress?: (progress: LoadProgress) => void;
  /** Files in flight at once */
  concurrency?: number;
}

export interface LoadResult {
  loaded: number;
  failed: number;
  cancelled: boolean;
}

function yieldToEventLoop(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}

export class ComplianceSession {
  readonly dut: Readonly<DutConfig>;
  readonly options: Readonly<EngineOptions>;

  private manager: DutConfigManager | null;
  private revision: number | null;

  private networks: TouchstoneNetwork[] = [];
  private noiseFigureFiles: NoiseFigureFile[] = [];
  private fileMetrics: Metric[] = [];
  private fileWarnings: RunWarning[] = [];
  private fileErrors: FileError[] = [];
  /** Loaded file path by base name; metric ids are built from the base name */
  private filenames = new Map<string, string>();
  private noiseFigureMetric: Metric | null;
  private cancelled = false;

  constructor(dut: DutConfig, options: SessionOptions = {}) {
    this.dut = deepFreeze(structuredClone(dut));
    this.options = deepFreeze(structuredClone(resolveEngineOptions(options.engine)));
    this.manager = options.configManager ?? null;
    this.revision = this.manager ? this.manager.getRevision(dut.name) : null;
    this.noiseFigureMetric = this.analyzeNoiseFigureFiles();
  }

  /**
   * Session over a record held by a configuration manager
   * @throws ConfigurationError when the record does not exist
   */
  static fromManager(manager: DutConfigManager, name: string, engine?: Partial<EngineOptions>): ComplianceSession {
    const dut = manager.getConfig(name);
    if (!dut) {
      throw new ConfigurationError(`DUT configuration "${name}" not found`, name);
    }
    return new ComplianceSession(dut, { engine, configManager: manager });
  }

  /** True once the DUT record changed in the manager after the snapshot */
  get isStale(): boolean {
    if (!this.manager) return false;
    return this.manager.getRevision(this.dut.name) !== this.revision;
  }

  /** Every metric computed so far; NF worst case is computed over all NF files */
  get metrics(): Metric[] {
    return this.noiseFigureMetric ? [...this.fileMetrics, this.noiseFigureMetric] : [...this.fileMetrics];
  }

  /**
   * Parse and analyze files, one at a time per worker.
   *
   * A file that cannot be parsed is recorded as a file error; the other
   * files proceed. Aborting stops between files and keeps what was done.
   */
  async load(files: readonly MeasurementFile[], options: LoadOptions = {}): Promise<LoadResult> {
    const { signal, onProgress } = options;
    const concurrency = Math.max(1, Math.floor(options.concurrency ?? 1));
    const errorsBefore = this.fileErrors.length;
    const noiseFigureFilesBefore = this.noiseFigureFiles.length;
    let next = 0;
    let completed = 0;
    let aborted = false;

    const worker = async (): Promise<void> => {
      for (;;) {
        await yieldToEventLoop();
        if (next >= files.length) return;
        if (signal?.aborted) {
          aborted = true;
          return;
        }
        const file = files[next++];
        this.processFile(file);
        completed++;
        onProgress?.({ completed, total: files.length, filename: file.filename });
      }
    };

    await Promise.all(Array.from({ length: Math.min(concurrency, Math.max(files.length, 1)) }, worker));

    if (aborted) this.cancelled = true;
    if (this.noiseFigureFiles.length !== noiseFigureFilesBefore) {
      this.noiseFigureMetric = this.analyzeNoiseFigureFiles();
    }
    const failed = this.fileErrors.length - errorsBefore;
    const result = { loaded: completed - failed, failed, cancelled: aborted };
    logger.info(
      `Session ${this.dut.name}: loaded ${result.loaded}/${files.length} files, ${failed} failed${aborted ? ', cancelled' : ''}`
    );
    return result;
  }

  /**
   * Evaluate everything loaded so far against one stage.
   * @throws StaleConfigurationError when the DUT record changed since the session started
   */
  evaluate(stage: TestStage): EvaluationReport {
    if (this.isStale) {
      throw new StaleConfigurationError(this.dut.name);
    }

    const metrics = this.metrics;
    const evaluation = evaluateCompliance(metrics, this.dut, stage, this.options);
    const warnings = [...this.fileWarnings, ...checkFileSet(this.networks, this.dut)];

    logger.info(
      `Session ${this.dut.name} at ${TEST_STAGE_DISPLAY_NAMES[stage]}: ${evaluation.overall} ` +
        `(${evaluation.verdicts.length} verdicts, ${warnings.length} warnings, ${this.fileErrors.length} file errors)`
    );

    return {
      runId: uuidv4(),
      dutName: this.dut.name,
      stage,
      createdAt: new Date().toISOString(),
      metrics,
      verdicts: evaluation.verdicts,
      testKinds: evaluation.testKinds,
      overall: evaluation.overall,
      warnings,
      fileErrors: [...this.fileErrors],
      cancelled: this.cancelled,
    };
  }

  private analyzeNoiseFigureFiles(): Metric | null {
    if (this.noiseFigureFiles.length === 0 && !this.dut.enabledTests.includes('noise_figure')) return null;
    return analyzeNoiseFigure(this.noiseFigureFiles, this.dut);
  }

  private processFile(file: MeasurementFile): void {
    const base = FilenameParser.basename(file.filename);
    const loaded = this.filenames.get(base);
    if (loaded !== undefined) {
      this.fileErrors.push({
        file: file.filename,
        code: 'DUPLICATE_FILE',
        message:
          loaded === file.filename
            ? `${file.filename}: already loaded in this session`
            : `${file.filename}: file name already loaded from ${loaded}`,
      });
      logger.warn(`Skipping ${file.filename}: ${base} already loaded`);
      return;
    }

    let ingested: IngestedFile;
    try {
      ingested = ingestFile(file, this.options);
    } catch (error) {
      if (!(error instanceof ParseError)) throw error;
      this.fileErrors.push({ file: error.file, code: error.code ?? 'PARSE_ERROR', message: error.message, line: error.line });
      logger.warn(`Failed to parse ${file.filename}: ${error.message}`);
      return;
    }

    this.filenames.set(base, file.filename);
    this.fileWarnings.push(...ingested.warnings);
    switch (ingested.kind) {
      case 'touchstone':
        this.networks.push(ingested.network);
        this.fileMetrics.push(...analyzeSParameters(ingested.network, this.dut));
        break;
      case 'power_linearity':
        this.fileMetrics.push(...analyzePowerLinearity(ingested.file, this.dut, this.options));
        break;
      case 'noise_figure':
        this.noiseFigureFiles.push(ingested.file);
        break;
    }
  }
}

/**
 * One-shot run: load every file, then evaluate one stage.
 */
export async function runEvaluation(
  dut: DutConfig,
  files: readonly MeasurementFile[],
  stage: TestStage,
  options: SessionOptions & LoadOptions = {}
): Promise<EvaluationReport> {
  const session = new ComplianceSession(dut, options);
  await session.load(files, options);
  return session.evaluate(stage);
}
