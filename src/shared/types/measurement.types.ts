/**
 * Types for parsed measurement data: Touchstone networks, power/linearity
 * CSV records and noise figure traces.
 */

import type { PortCount } from './dut.types';

/** Touchstone data format token */
export type TouchstoneFormat = 'MA' | 'DB' | 'RI';

/** Touchstone frequency unit token */
export type FrequencyUnit = 'Hz' | 'kHz' | 'MHz' | 'GHz';

/** Signal chain designation */
export type Chain = 'PRI' | 'RED';

/** Gain variant designation */
export type GainVariant = 'HG' | 'LG';

/** Identity fields parsed from a conforming measurement filename */
export interface FileMetadata {
  /** YYYYMMDD */
  dateCode: string;
  /** Lot / part code, e.g. "L123456" */
  lotCode: string;
  chain: Chain;
  /** e.g. "SN0042" */
  serialNumber: string;
  gainVariant: GainVariant | null;
}

/** Parsed "# ..." option line */
export interface TouchstoneOptions {
  frequencyUnit: FrequencyUnit;
  format: TouchstoneFormat;
  referenceOhms: number;
}

/**
 * One S-parameter entry over frequency.
 * Struct-of-arrays; every array has the same length as frequencyGHz.
 */
export interface SParameterTrace {
  /** e.g. "S21" */
  parameter: string;
  /** [output port, input port], 1-based */
  portPair: [number, number];
  frequencyGHz: Float64Array;
  re: Float64Array;
  im: Float64Array;
  /** Linear magnitude |S| */
  magnitude: Float64Array;
  phaseDeg: Float64Array;
  /** 20·log10|S| */
  magnitudeDb: Float64Array;
  sourceFile: string;
  sourceFormat: TouchstoneFormat;
  metadata: FileMetadata | null;
}

/** Parsed Touchstone file */
export interface TouchstoneNetwork {
  sourceFile: string;
  numPorts: PortCount;
  options: TouchstoneOptions;
  metadata: FileMetadata | null;
  frequencyGHz: Float64Array;
  /** n² traces in row-major order (S11, S12, ..., Snn) */
  traces: SParameterTrace[];
}

export type ToneMode = 'single_tone' | 'two_tone';

/** One row of a power/linearity CSV */
export interface PowerLinearityRecord {
  serialNumber: string;
  temperature: string;
  frequencyGHz: number;
  chain: Chain;
  timestamp: string;
  pinDbm: number;
  mode: ToneMode;
  powerMeterDbm: number;
  thermistorTempC: number;
  /** Marker 1..6 in dBm (index 0 = Marker 1) */
  markersDbm: [number, number, number, number, number, number];
  /** 1-based line number in the source file */
  line: number;
}

/** Records sharing (frequency, chain, mode), ordered by pinDbm ascending */
export interface PowerSweep {
  frequencyGHz: number;
  chain: Chain;
  mode: ToneMode;
  records: PowerLinearityRecord[];
}

export interface PowerLinearityFile {
  sourceFile: string;
  records: PowerLinearityRecord[];
  sweeps: PowerSweep[];
  /** Distinct frequencies found, ascending */
  frequenciesGHz: number[];
  /** False when the file does not hold the expected number of frequencies */
  structurallyComplete: boolean;
}

/** Logical field → column name mapping for noise figure CSV files */
export interface NoiseFigureColumnMapping {
  frequency: string;
  noiseFigure: string;
  serialNumber?: string;
  chain?: string;
  temperature?: string;
  /** Unit of the frequency column; 'auto' treats values above 100 as MHz */
  frequencyUnit: FrequencyUnit | 'auto';
}

/** Scalar noise figure over frequency */
export interface NoiseFigureTrace {
  /** Label used for traceability, e.g. "nf_pri.csv:PRI" */
  id: string;
  sourceFile: string;
  chain: Chain | null;
  serialNumber: string | null;
  /** Bench temperature label from the first row that carries one */
  temperature: string | null;
  frequencyGHz: Float64Array;
  nfDb: Float64Array;
}

export interface NoiseFigureFile {
  sourceFile: string;
  traces: NoiseFigureTrace[];
}

/** Raw measurement file handed to the engine */
export interface MeasurementFile {
  filename: string;
  content: string | Uint8Array;
  /** Skips content sniffing for CSV files */
  kind?: MeasurementFileKind;
}

export type MeasurementFileKind = 'touchstone' | 'power_linearity' | 'noise_figure';

/** Warning raised while reading files or evaluating a run */
export interface RunWarning {
  code:
    | 'filename_metadata'
    | 'malformed_row'
    | 'frequency_count'
    | 'incomplete_file_set'
    | 'duplicate_file_role'
    | 'ignored_option_line';
  message: string;
  severity: 'info' | 'warning';
  file?: string;
  line?: number;
}

/** A file that could not be processed */
export interface FileError {
  file: string;
  code: string;
  message: string;
  line?: number;
}
