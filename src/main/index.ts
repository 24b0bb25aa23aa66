/**
 * RF compliance evaluation engine: public API.
 */

export type * from '@shared/types/dut.types';
export type * from '@shared/types/measurement.types';
export type * from '@shared/types/analysis.types';
export type * from '@shared/types/compliance.types';
export {
  TEST_STAGES,
  TEST_STAGE_DISPLAY_NAMES,
  DEFAULT_TEST_STAGE,
  TEST_KINDS,
  TEST_KIND_DISPLAY_NAMES,
} from '@shared/constants';
export { magnitudeToDb, dbToMagnitude, vswrFromGamma, returnLossDb } from '@shared/utils/rfMath';

export {
  ComplianceEngineError,
  ParseError,
  ConfigurationError,
  StaleConfigurationError,
  getErrorMessage,
} from './utils/errors';
export { logger } from './utils/logger';

// Parsers
export { TouchstoneParser, getTrace } from './touchstone/TouchstoneParser';
export type { TouchstoneParseResult } from './touchstone/TouchstoneParser';
export { TouchstoneWriter } from './touchstone/TouchstoneWriter';
export type { TouchstoneWriteOptions } from './touchstone/TouchstoneWriter';
export { FilenameParser } from './touchstone/FilenameParser';
export { PowerLinearityParser } from './csv/PowerLinearityParser';
export type { PowerLinearityParseOptions, PowerLinearityParseResult } from './csv/PowerLinearityParser';
export { NoiseFigureParser } from './csv/NoiseFigureParser';
export type { NoiseFigureParseResult } from './csv/NoiseFigureParser';

// Analysis
export { DEFAULT_ENGINE_OPTIONS, resolveEngineOptions } from './analysis/constants';
export { analyzeSParameters } from './analysis/SParameterAnalyzer';
export { analyzePowerLinearity, findP1db } from './analysis/PowerAnalyzer';
export type { P1dbOptions, P1dbResult } from './analysis/PowerAnalyzer';
export { analyzeNoiseFigure } from './analysis/NoiseFigureAnalyzer';
export { metricNumber } from './analysis/metricFactory';

// Evaluation
export { evaluateCompliance, aggregateVerdicts, overallStatus, describeVerdict } from './compliance/ComplianceEvaluator';
export type { EvaluationOptions } from './compliance/ComplianceEvaluator';
export { formatBounds } from './compliance/bounds';

// Configuration records
export { validateDutConfig } from './config/DutConfigValidator';
export { DutConfigManager } from './config/DutConfigManager';
export type { DutConfigChange, DutConfigChangeEvent } from './config/DutConfigManager';
export { DutConfigStorage } from './config/DutConfigStorage';

// Sessions
export { ComplianceSession, runEvaluation } from './session/ComplianceSession';
export type { SessionOptions, LoadOptions, LoadProgress, LoadResult } from './session/ComplianceSession';
export { detectFileKind, ingestFile } from './session/FileIngestor';
export type { IngestedFile, IngestOptions } from './session/FileIngestor';
export { checkFileSet, expectedRoles } from './session/FileSetValidator';
