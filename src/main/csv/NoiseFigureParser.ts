import type {
  Chain,
  NoiseFigureColumnMapping,
  NoiseFigureFile,
  NoiseFigureTrace,
  RunWarning,
} from '@shared/types/measurement.types';
import { DEFAULT_NF_COLUMN_MAPPING, UNITS_PER_GHZ } from '@shared/constants';
import { ParseError } from '../utils/errors';
import { logger } from '../utils/logger';
import { parseDecimal } from '../text/numbers';
import { FilenameParser } from '../touchstone/FilenameParser';
import { CsvReader } from './CsvReader';
import { MHZ_PER_GHZ, NF_AUTO_MHZ_THRESHOLD } from './constants';

export interface NoiseFigureParseResult {
  file: NoiseFigureFile;
  warnings: RunWarning[];
}

interface NoiseFigureSample {
  frequencyGHz: number;
  nfDb: number;
  line: number;
}

interface TraceBuilder {
  chain: Chain | null;
  serialNumber: string | null;
  temperature: string | null;
  samples: NoiseFigureSample[];
}

/**
 * Parser for noise figure CSV logs with a caller-supplied column mapping.
 * Produces one trace per chain found in the file.
 */
export class NoiseFigureParser {
  /** @throws ParseError for a missing mapped column, duplicate frequencies or no usable rows */
  static parse(
    filename: string,
    content: string | Uint8Array,
    mapping: NoiseFigureColumnMapping = DEFAULT_NF_COLUMN_MAPPING
  ): NoiseFigureParseResult {
    const table = CsvReader.parse(content, filename);
    const columns = CsvReader.columnIndex(table.header);

    const frequencyIndex = columns.get(mapping.frequency);
    const nfIndex = columns.get(mapping.noiseFigure);
    if (frequencyIndex === undefined || nfIndex === undefined) {
      const missing = [mapping.frequency, mapping.noiseFigure].filter((name) => !columns.has(name));
      throw new ParseError(`Missing mapped columns: ${missing.join(', ')}`, filename);
    }

    const optionalIndex = (name: string | undefined): number | undefined =>
      name === undefined ? undefined : columns.get(name);
    const chainIndex = optionalIndex(mapping.chain);
    const serialIndex = optionalIndex(mapping.serialNumber);
    const temperatureIndex = optionalIndex(mapping.temperature);

    const warnings: RunWarning[] = [];
    const builders = new Map<string, TraceBuilder>();
    const dropRow = (line: number, reason: string): void => {
      warnings.push({ code: 'malformed_row', message: `Row dropped: ${reason}`, severity: 'warning', file: filename, line });
    };

    for (const row of table.rows) {
      if (row.fields.length !== table.header.length) {
        dropRow(row.line, `expected ${table.header.length} fields, found ${row.fields.length}`);
        continue;
      }

      const rawFrequency = parseDecimal(row.fields[frequencyIndex]);
      const nfDb = parseDecimal(row.fields[nfIndex]);
      if (rawFrequency === null || nfDb === null) {
        dropRow(row.line, 'non-numeric frequency or noise figure');
        continue;
      }

      let chain: Chain | null = null;
      if (chainIndex !== undefined) {
        const value = row.fields[chainIndex].trim().toUpperCase();
        if (value === 'PRI' || value === 'RED') {
          chain = value;
        } else if (value.length > 0) {
          dropRow(row.line, `unknown chain "${row.fields[chainIndex].trim()}"`);
          continue;
        }
      }

      const key = chain ?? '';
      let builder = builders.get(key);
      if (!builder) {
        builder = { chain, serialNumber: null, temperature: null, samples: [] };
        builders.set(key, builder);
      }
      if (builder.serialNumber === null) {
        builder.serialNumber = NoiseFigureParser.optionalText(row.fields, serialIndex);
      }
      if (builder.temperature === null) {
        builder.temperature = NoiseFigureParser.optionalText(row.fields, temperatureIndex);
      }
      builder.samples.push({
        frequencyGHz: NoiseFigureParser.toGHz(rawFrequency, mapping.frequencyUnit),
        nfDb,
        line: row.line,
      });
    }

    if (builders.size === 0) {
      throw new ParseError('No data rows', filename);
    }

    const traces = [...builders.values()]
      .sort((a, b) => (a.chain ?? '').localeCompare(b.chain ?? ''))
      .map((builder) => NoiseFigureParser.buildTrace(filename, builder));

    logger.debug(`Parsed ${filename}: ${traces.length} noise figure traces, ${warnings.length} warnings`);
    return { file: { sourceFile: filename, traces }, warnings };
  }

  /** Converts a frequency column value to GHz */
  static toGHz(value: number, unit: NoiseFigureColumnMapping['frequencyUnit']): number {
    if (unit === 'auto') {
      return value > NF_AUTO_MHZ_THRESHOLD ? value / MHZ_PER_GHZ : value;
    }
    return value / UNITS_PER_GHZ[unit];
  }

  private static optionalText(fields: string[], index: number | undefined): string | null {
    if (index === undefined) return null;
    const value = fields[index].trim();
    return value.length > 0 ? value : null;
  }

  private static buildTrace(filename: string, builder: TraceBuilder): NoiseFigureTrace {
    const samples = [...builder.samples].sort((a, b) => a.frequencyGHz - b.frequencyGHz || a.line - b.line);
    for (let i = 1; i < samples.length; i++) {
      if (samples[i].frequencyGHz === samples[i - 1].frequencyGHz) {
        throw new ParseError(`Duplicate frequency ${samples[i].frequencyGHz} GHz`, filename, samples[i].line);
      }
    }

    const base = FilenameParser.basename(filename);
    return {
      id: builder.chain ? `${base}:${builder.chain}` : base,
      sourceFile: filename,
      chain: builder.chain,
      serialNumber: builder.serialNumber,
      temperature: builder.temperature,
      frequencyGHz: Float64Array.from(samples, (s) => s.frequencyGHz),
      nfDb: Float64Array.from(samples, (s) => s.nfDb),
    };
  }
}
