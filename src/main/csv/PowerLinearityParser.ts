import type {
  Chain,
  PowerLinearityFile,
  PowerLinearityRecord,
  PowerSweep,
  RunWarning,
  ToneMode,
} from '@shared/types/measurement.types';
import { POWER_LINEARITY_COLUMNS, REQUIRED_POWER_LINEARITY_COLUMNS } from '@shared/constants';
import { ParseError } from '../utils/errors';
import { logger } from '../utils/logger';
import { parseDecimal } from '../text/numbers';
import { CsvReader } from './CsvReader';
import type { CsvRow } from './CsvReader';
import { DEFAULT_EXPECTED_FREQUENCY_COUNT, MHZ_PER_GHZ, MODE_ALIASES } from './constants';

export interface PowerLinearityParseOptions {
  /** Distinct frequencies a complete file holds */
  expectedFrequencyCount?: number;
}

export interface PowerLinearityParseResult {
  file: PowerLinearityFile;
  warnings: RunWarning[];
}

/** Thrown for one row; caught and turned into a RowWarning */
class RowError extends Error {}

/**
 * Parser for bench power/linearity CSV logs (single-tone and two-tone sweeps).
 *
 * Each row is parsed independently: a malformed row is dropped with one
 * warning and the rest of the file is kept.
 */
export class PowerLinearityParser {
  /** @throws ParseError when a required column is missing */
  static parse(
    filename: string,
    content: string | Uint8Array,
    options: PowerLinearityParseOptions = {}
  ): PowerLinearityParseResult {
    const expectedFrequencyCount = options.expectedFrequencyCount ?? DEFAULT_EXPECTED_FREQUENCY_COUNT;
    const table = CsvReader.parse(content, filename);
    const columns = CsvReader.columnIndex(table.header);

    const missing = REQUIRED_POWER_LINEARITY_COLUMNS.filter((name) => !columns.has(name));
    if (missing.length > 0) {
      throw new ParseError(`Missing required columns: ${missing.join(', ')}`, filename);
    }

    const warnings: RunWarning[] = [];
    const records: PowerLinearityRecord[] = [];

    for (const row of table.rows) {
      try {
        records.push(PowerLinearityParser.parseRow(row, table.header.length, columns));
      } catch (error) {
        if (!(error instanceof RowError)) throw error;
        warnings.push({
          code: 'malformed_row',
          message: `Row dropped: ${error.message}`,
          severity: 'warning',
          file: filename,
          line: row.line,
        });
      }
    }

    const sweeps = PowerLinearityParser.groupSweeps(records, filename, warnings);
    const frequenciesGHz = [...new Set(records.map((r) => r.frequencyGHz))].sort((a, b) => a - b);
    const structurallyComplete = frequenciesGHz.length === expectedFrequencyCount;

    if (!structurallyComplete) {
      warnings.push({
        code: 'frequency_count',
        message: `Expected ${expectedFrequencyCount} distinct frequencies, found ${frequenciesGHz.length}; file marked incomplete`,
        severity: 'warning',
        file: filename,
      });
    }

    logger.debug(
      `Parsed ${filename}: ${records.length} records, ${sweeps.length} sweeps, ${warnings.length} warnings`
    );

    return {
      file: {
        sourceFile: filename,
        records: sweeps.flatMap((s) => s.records),
        sweeps,
        frequenciesGHz,
        structurallyComplete,
      },
      warnings,
    };
  }

  /** Normalizes "Single Tone", "single-tone", "TWO_TONE", ... */
  static normalizeMode(value: string): ToneMode | null {
    const key = value.toLowerCase().replace(/[^a-z]/g, '');
    return MODE_ALIASES[key] ?? null;
  }

  private static parseRow(row: CsvRow, fieldCount: number, columns: Map<string, number>): PowerLinearityRecord {
    if (row.fields.length !== fieldCount) {
      throw new RowError(`expected ${fieldCount} fields, found ${row.fields.length}`);
    }

    const text = (column: string): string => {
      const index = columns.get(column);
      return index === undefined ? '' : row.fields[index].trim();
    };
    const number = (column: string): number => {
      const value = parseDecimal(text(column));
      if (value === null) {
        throw new RowError(`non-numeric "${column}" value "${text(column)}"`);
      }
      return value;
    };

    const mode = PowerLinearityParser.normalizeMode(text(POWER_LINEARITY_COLUMNS.MODE));
    if (mode === null) {
      throw new RowError(`unknown mode "${text(POWER_LINEARITY_COLUMNS.MODE)}"`);
    }

    const chain = PowerLinearityParser.toChain(text(POWER_LINEARITY_COLUMNS.CHAIN));
    if (chain === null) {
      throw new RowError(`unknown chain "${text(POWER_LINEARITY_COLUMNS.CHAIN)}"`);
    }

    const [m1, m2, m3, m4, m5, m6] = POWER_LINEARITY_COLUMNS.MARKERS.map((column) => number(column));

    return {
      serialNumber: text(POWER_LINEARITY_COLUMNS.SERIAL_NUMBER),
      temperature: text(POWER_LINEARITY_COLUMNS.TEMP),
      frequencyGHz: number(POWER_LINEARITY_COLUMNS.FREQUENCY) / MHZ_PER_GHZ,
      chain,
      timestamp: text(POWER_LINEARITY_COLUMNS.TIMESTAMP),
      pinDbm: number(POWER_LINEARITY_COLUMNS.POWER_LEVEL),
      mode,
      powerMeterDbm: number(POWER_LINEARITY_COLUMNS.POWER_METER),
      thermistorTempC: number(POWER_LINEARITY_COLUMNS.THERMISTOR),
      markersDbm: [m1, m2, m3, m4, m5, m6],
      line: row.line,
    };
  }

  private static toChain(value: string): Chain | null {
    const upper = value.toUpperCase();
    if (upper === 'PRI' || upper === 'RED') return upper;
    return null;
  }

  /**
   * Group records by (frequency, chain, mode), ordered by input power.
   * A repeated input power within one sweep is dropped as a malformed row.
   */
  private static groupSweeps(records: PowerLinearityRecord[], filename: string, warnings: RunWarning[]): PowerSweep[] {
    const groups = new Map<string, PowerSweep>();

    for (const record of records) {
      const key = `${record.frequencyGHz}|${record.chain}|${record.mode}`;
      let sweep = groups.get(key);
      if (!sweep) {
        sweep = { frequencyGHz: record.frequencyGHz, chain: record.chain, mode: record.mode, records: [] };
        groups.set(key, sweep);
      }
      sweep.records.push(record);
    }

    const sweeps = [...groups.values()];
    for (const sweep of sweeps) {
      sweep.records.sort((a, b) => a.pinDbm - b.pinDbm || a.line - b.line);
      sweep.records = sweep.records.filter((record, i, sorted) => {
        if (i === 0 || sorted[i - 1].pinDbm !== record.pinDbm) return true;
        warnings.push({
          code: 'malformed_row',
          message: `Row dropped: repeated input power ${record.pinDbm} dBm in the ${record.chain} ${record.mode} sweep at ${record.frequencyGHz} GHz`,
          severity: 'warning',
          file: filename,
          line: record.line,
        });
        return false;
      });
    }

    return sweeps.sort(
      (a, b) => a.frequencyGHz - b.frequencyGHz || a.chain.localeCompare(b.chain) || a.mode.localeCompare(b.mode)
    );
  }
}
