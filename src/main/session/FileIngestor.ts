/**
 * Measurement file dispatch: picks the parser from the extension and, for
 * CSV files, from the header row.
 */
import type { EngineOptions } from '@shared/types/analysis.types';
import type {
  MeasurementFile,
  MeasurementFileKind,
  NoiseFigureFile,
  PowerLinearityFile,
  RunWarning,
  TouchstoneNetwork,
} from '@shared/types/measurement.types';
import { POWER_LINEARITY_COLUMNS } from '@shared/constants';
import { ParseError } from '../utils/errors';
import { LineReader } from '../text/LineReader';
import { TOUCHSTONE_EXTENSION_PATTERN } from '../touchstone/constants';
import { TouchstoneParser } from '../touchstone/TouchstoneParser';
import { PowerLinearityParser } from '../csv/PowerLinearityParser';
import { NoiseFigureParser } from '../csv/NoiseFigureParser';
import { DEFAULT_ENGINE_OPTIONS } from '../analysis/constants';

const CSV_EXTENSION_PATTERN = /\.csv$/i;

/** Columns whose presence marks a power/linearity log */
const POWER_SIGNATURE_COLUMNS: readonly string[] = [POWER_LINEARITY_COLUMNS.POWER_LEVEL, POWER_LINEARITY_COLUMNS.MODE];

export type IngestOptions = Pick<EngineOptions, 'expectedPowerFrequencyCount' | 'noiseFigureColumns'>;

export type IngestedFile =
  | { kind: 'touchstone'; filename: string; network: TouchstoneNetwork; warnings: RunWarning[] }
  | { kind: 'power_linearity'; filename: string; file: PowerLinearityFile; warnings: RunWarning[] }
  | { kind: 'noise_figure'; filename: string; file: NoiseFigureFile; warnings: RunWarning[] };

/**
 * Which parser a file goes to. An explicit `kind` wins; `.sNp` is Touchstone;
 * `.csv` is power/linearity when the header carries its signature columns,
 * noise figure otherwise.
 *
 * @throws ParseError for an unsupported extension
 */
export function detectFileKind(file: MeasurementFile): MeasurementFileKind {
  if (file.kind) return file.kind;
  if (TOUCHSTONE_EXTENSION_PATTERN.test(file.filename)) return 'touchstone';
  if (CSV_EXTENSION_PATTERN.test(file.filename)) {
    const header = readHeaderNames(file.content);
    return POWER_SIGNATURE_COLUMNS.every((column) => header.includes(column)) ? 'power_linearity' : 'noise_figure';
  }
  throw new ParseError('Unsupported file type; expected .s1p to .s4p or .csv', file.filename);
}

/** Column names of the first non-blank line, unquoted and trimmed */
function readHeaderNames(content: string | Uint8Array): string[] {
  const reader = new LineReader(content);
  let line = reader.readLine();
  while (line !== null && line.trim().length === 0) {
    line = reader.readLine();
  }
  if (line === null) return [];
  return line.split(',').map((name) => name.trim().replace(/^"(.*)"$/, '$1').trim());
}

/**
 * Parse one measurement file.
 *
 * @throws ParseError when the file cannot be used at all
 */
export function ingestFile(file: MeasurementFile, options: IngestOptions = DEFAULT_ENGINE_OPTIONS): IngestedFile {
  const kind = detectFileKind(file);
  switch (kind) {
    case 'touchstone': {
      const { network, warnings } = TouchstoneParser.parse(file.filename, file.content);
      return { kind, filename: file.filename, network, warnings };
    }
    case 'power_linearity': {
      const result = PowerLinearityParser.parse(file.filename, file.content, {
        expectedFrequencyCount: options.expectedPowerFrequencyCount,
      });
      return { kind, filename: file.filename, file: result.file, warnings: result.warnings };
    }
    case 'noise_figure': {
      const result = NoiseFigureParser.parse(file.filename, file.content, options.noiseFigureColumns);
      return { kind, filename: file.filename, file: result.file, warnings: result.warnings };
    }
  }
}
