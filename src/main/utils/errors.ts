import type { TestKind, TestStage } from '@shared/types/dut.types';

export class ComplianceEngineError extends Error {
  constructor(
    message: string,
    public code?: string,
    public details?: unknown
  ) {
    super(message);
    this.name = 'ComplianceEngineError';
  }
}

/**
 * Fatal, file-scoped: the file cannot be used at all.
 * Other files of the same run are unaffected.
 */
export class ParseError extends ComplianceEngineError {
  constructor(
    message: string,
    public file: string,
    public line?: number
  ) {
    super(line !== undefined ? `${file}:${line}: ${message}` : `${file}: ${message}`, 'PARSE_ERROR', {
      file,
      line,
    });
    this.name = 'ParseError';
  }
}

/**
 * Fatal, run-scoped: a DUT record is unusable, or an enabled test kind has
 * no requirements for the active stage.
 */
export class ConfigurationError extends ComplianceEngineError {
  constructor(
    message: string,
    public dutName?: string,
    public testKind?: TestKind,
    public stage?: TestStage
  ) {
    super(message, 'CONFIGURATION_ERROR', { dutName, testKind, stage });
    this.name = 'ConfigurationError';
  }
}

/** The DUT record changed after the session took its snapshot */
export class StaleConfigurationError extends ComplianceEngineError {
  constructor(dutName: string) {
    super(`Configuration for "${dutName}" changed during the session; start a new session`, 'STALE_CONFIGURATION', {
      dutName,
    });
    this.name = 'StaleConfigurationError';
  }
}

export function isError(error: unknown): error is Error {
  return error instanceof Error;
}

export function getErrorMessage(error: unknown): string {
  if (isError(error)) {
    return error.message;
  }
  return String(error);
}
