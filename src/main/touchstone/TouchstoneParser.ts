import type { PortCount } from '@shared/types/dut.types';
import type {
  RunWarning,
  SParameterTrace,
  TouchstoneFormat,
  TouchstoneNetwork,
  TouchstoneOptions,
} from '@shared/types/measurement.types';
import { complexMagnitude, complexPhaseDeg, dbToMagnitude, magnitudeToDb, polarToComplex } from '@shared/utils/rfMath';
import { UNITS_PER_GHZ } from '@shared/constants';
import { ParseError } from '../utils/errors';
import { logger } from '../utils/logger';
import { LineReader } from '../text/LineReader';
import { parseDecimal } from '../text/numbers';
import { OptionLineParser } from './OptionLineParser';
import { FilenameParser } from './FilenameParser';
import {
  COMMENT_MARKER,
  OPTION_LINE_PREFIX,
  TOUCHSTONE_EXTENSION_PATTERN,
} from './constants';

export interface TouchstoneParseResult {
  network: TouchstoneNetwork;
  warnings: RunWarning[];
}

/** One frequency point as read from the file, before normalization */
interface RawRecord {
  values: number[];
  line: number;
}

/**
 * Touchstone v1 parser for 1- to 4-port S-parameter files.
 *
 * Handles:
 * - Port count from the file extension
 * - Option line in any token order, defaults GHz / S / MA / R 50
 * - Full-line and trailing "!" comments
 * - Multi-line records for 3- and 4-port files
 * - Normalization of every value to re/im, magnitude, phase and dB
 */
export class TouchstoneParser {
  /**
   * Parse a Touchstone file.
   *
   * @param filename - Used for the port count, filename metadata and error context
   * @throws ParseError when the file cannot be used at all
   */
  static parse(filename: string, content: string | Uint8Array): TouchstoneParseResult {
    const numPorts = TouchstoneParser.portCountFromFilename(filename);
    const warnings: RunWarning[] = [];
    const reader = new LineReader(content);

    let options: TouchstoneOptions | null = null;
    const records: RawRecord[] = [];
    const valuesPerRecord = 1 + 2 * numPorts * numPorts;
    let pending: RawRecord | null = null;

    while (!reader.eof) {
      const lineNumber = reader.lineNumber;
      const raw = reader.readLine();
      if (raw === null) break;

      const line = TouchstoneParser.stripComment(raw).trim();
      if (line.length === 0) continue;

      if (line.startsWith(OPTION_LINE_PREFIX)) {
        if (options === null) {
          options = OptionLineParser.parse(line, filename, lineNumber);
        } else {
          warnings.push({
            code: 'ignored_option_line',
            message: `Additional option line ignored`,
            severity: 'info',
            file: filename,
            line: lineNumber,
          });
        }
        continue;
      }

      if (options === null) {
        throw new ParseError('Data row before the option line', filename, lineNumber);
      }

      const values = TouchstoneParser.parseNumbers(line, filename, lineNumber);

      if (numPorts <= 2) {
        TouchstoneParser.checkRecordLength(values.length, valuesPerRecord, numPorts, filename, lineNumber);
        records.push({ values, line: lineNumber });
        continue;
      }

      // 3- and 4-port records span several lines; an odd token count starts one
      if (values.length % 2 === 1) {
        if (pending) {
          TouchstoneParser.checkRecordLength(pending.values.length, valuesPerRecord, numPorts, filename, pending.line);
          records.push(pending);
        }
        pending = { values, line: lineNumber };
      } else {
        if (!pending) {
          throw new ParseError('Continuation line without a preceding frequency', filename, lineNumber);
        }
        pending.values.push(...values);
        if (pending.values.length > valuesPerRecord) {
          TouchstoneParser.checkRecordLength(pending.values.length, valuesPerRecord, numPorts, filename, lineNumber);
        }
      }
    }

    if (pending) {
      TouchstoneParser.checkRecordLength(pending.values.length, valuesPerRecord, numPorts, filename, pending.line);
      records.push(pending);
    }

    if (options === null || records.length === 0) {
      throw new ParseError('No data rows', filename);
    }

    const metadata = FilenameParser.parse(filename);
    if (!metadata) {
      warnings.push({
        code: 'filename_metadata',
        message: `Filename does not follow YYYYMMDD_LXXXXXX_PRI|RED_SNxxxx[_HG|LG].sNp; identity fields unavailable`,
        severity: 'warning',
        file: filename,
      });
    }

    const network = TouchstoneParser.buildNetwork(filename, numPorts, options, records, metadata);
    logger.debug(`Parsed ${filename}: ${numPorts}-port, ${records.length} points, ${options.format} ${options.frequencyUnit}`);
    return { network, warnings };
  }

  /** Port count from `.s1p` … `.s4p` */
  static portCountFromFilename(filename: string): PortCount {
    const match = TOUCHSTONE_EXTENSION_PATTERN.exec(filename);
    switch (match?.[1]) {
      case '1':
        return 1;
      case '2':
        return 2;
      case '3':
        return 3;
      case '4':
        return 4;
      default:
        throw new ParseError('Unsupported extension; expected .s1p to .s4p', filename);
    }
  }

  /**
   * 1-based (output, input) port pair of the k-th complex value in a record.
   * 2-port files list S11 S21 S12 S22; larger networks are row-major.
   */
  static portPairAt(k: number, numPorts: number): [number, number] {
    if (numPorts === 2) {
      return [(k % 2) + 1, Math.floor(k / 2) + 1];
    }
    return [Math.floor(k / numPorts) + 1, (k % numPorts) + 1];
  }

  private static stripComment(line: string): string {
    const idx = line.indexOf(COMMENT_MARKER);
    return idx === -1 ? line : line.substring(0, idx);
  }

  private static parseNumbers(line: string, file: string, lineNumber: number): number[] {
    const tokens = line.split(/\s+/);
    const values: number[] = new Array(tokens.length);
    for (let i = 0; i < tokens.length; i++) {
      const value = parseDecimal(tokens[i]);
      if (value === null) {
        throw new ParseError(`Non-numeric value "${tokens[i]}"`, file, lineNumber);
      }
      values[i] = value;
    }
    return values;
  }

  private static checkRecordLength(
    actual: number,
    expected: number,
    numPorts: number,
    file: string,
    lineNumber: number
  ): void {
    if (actual < expected) {
      throw new ParseError(
        `Record has ${actual} values; a ${numPorts}-port record needs ${expected}`,
        file,
        lineNumber
      );
    }
    if (actual > expected) {
      throw new ParseError(
        `Column count ${actual} is inconsistent with a ${numPorts}-port file (${expected} values per record)`,
        file,
        lineNumber
      );
    }
  }

  private static buildNetwork(
    sourceFile: string,
    numPorts: PortCount,
    options: TouchstoneOptions,
    records: RawRecord[],
    metadata: TouchstoneNetwork['metadata']
  ): TouchstoneNetwork {
    const count = records.length;
    const unitsPerGHz = UNITS_PER_GHZ[options.frequencyUnit];
    const frequencyGHz = new Float64Array(count);

    for (let r = 0; r < count; r++) {
      const raw = records[r].values[0];
      if (r > 0 && raw <= records[r - 1].values[0]) {
        throw new ParseError('Frequency is not strictly increasing', sourceFile, records[r].line);
      }
      frequencyGHz[r] = raw / unitsPerGHz;
    }

    const traces: SParameterTrace[] = new Array(numPorts * numPorts);
    for (let k = 0; k < numPorts * numPorts; k++) {
      const portPair = TouchstoneParser.portPairAt(k, numPorts);
      const trace = TouchstoneParser.createTrace(sourceFile, portPair, frequencyGHz, options.format, metadata);
      for (let r = 0; r < count; r++) {
        TouchstoneParser.storeValue(
          trace,
          r,
          options.format,
          records[r].values[1 + 2 * k],
          records[r].values[2 + 2 * k]
        );
      }
      traces[(portPair[0] - 1) * numPorts + (portPair[1] - 1)] = trace;
    }

    return { sourceFile, numPorts, options, metadata, frequencyGHz, traces };
  }

  private static createTrace(
    sourceFile: string,
    portPair: [number, number],
    frequencyGHz: Float64Array,
    sourceFormat: TouchstoneFormat,
    metadata: TouchstoneNetwork['metadata']
  ): SParameterTrace {
    const n = frequencyGHz.length;
    return {
      parameter: `S${portPair[0]}${portPair[1]}`,
      portPair,
      frequencyGHz,
      re: new Float64Array(n),
      im: new Float64Array(n),
      magnitude: new Float64Array(n),
      phaseDeg: new Float64Array(n),
      magnitudeDb: new Float64Array(n),
      sourceFile,
      sourceFormat,
      metadata,
    };
  }

  private static storeValue(trace: SParameterTrace, i: number, format: TouchstoneFormat, a: number, b: number): void {
    switch (format) {
      case 'MA': {
        const c = polarToComplex(a, b);
        trace.re[i] = c.re;
        trace.im[i] = c.im;
        trace.magnitude[i] = a;
        trace.phaseDeg[i] = b;
        trace.magnitudeDb[i] = magnitudeToDb(a);
        break;
      }
      case 'DB': {
        const magnitude = dbToMagnitude(a);
        const c = polarToComplex(magnitude, b);
        trace.re[i] = c.re;
        trace.im[i] = c.im;
        trace.magnitude[i] = magnitude;
        trace.phaseDeg[i] = b;
        trace.magnitudeDb[i] = a;
        break;
      }
      case 'RI': {
        const magnitude = complexMagnitude(a, b);
        trace.re[i] = a;
        trace.im[i] = b;
        trace.magnitude[i] = magnitude;
        trace.phaseDeg[i] = complexPhaseDeg(a, b);
        trace.magnitudeDb[i] = magnitudeToDb(magnitude);
        break;
      }
    }
  }
}

/** Trace for S{output}{input}, or undefined when the ports are out of range */
export function getTrace(network: TouchstoneNetwork, outputPort: number, inputPort: number): SParameterTrace | undefined {
  if (outputPort < 1 || inputPort < 1 || outputPort > network.numPorts || inputPort > network.numPorts) {
    return undefined;
  }
  return network.traces[(outputPort - 1) * network.numPorts + (inputPort - 1)];
}
