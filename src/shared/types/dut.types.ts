/**
 * DUT configuration and per-stage requirement types.
 *
 * All frequencies are in GHz, power levels in dBm, gains and ratios in dB.
 */

/** Test stage a requirement set applies to */
export type TestStage = 'board_bringup' | 'sit' | 'test_campaign';

/** Kind of measurement a DUT can have enabled */
export type TestKind = 's_parameters' | 'power_linearity' | 'noise_figure';

/** Closed frequency interval in GHz */
export interface FrequencyRange {
  minGHz: number;
  maxGHz: number;
}

/** Number of RF ports supported by the Touchstone parser */
export type PortCount = 1 | 2 | 3 | 4;

export interface PortTopology {
  numPorts: PortCount;
  /** 1-based port numbers used as inputs */
  inputPorts: number[];
  /** 1-based port numbers used as outputs */
  outputPorts: number[];
}

/** Gain bounds over one frequency sub-band */
export interface GainSubBandRequirement {
  band: FrequencyRange;
  gainMinDb?: number;
  gainMaxDb?: number;
}

/** Gain bounds at a nominal frequency (evaluated at the nearest sample) */
export interface GainPointRequirement {
  frequencyGHz: number;
  gainMinDb?: number;
  gainMaxDb?: number;
}

/** Minimum rejection inside an out-of-band window */
export interface OutOfBandRequirement {
  band: FrequencyRange;
  /** Minimum in-band-to-window gain difference in dB */
  rejectionDb: number;
}

/**
 * One point of the Pin-Pout-IM3 tolerance curve.
 * IM3 is a carrier-to-intermod ratio, so larger is better.
 */
export interface PinPoutIm3Requirement {
  pinDbm: number;
  poutMinDbm?: number;
  im3MinDbc?: number;
}

export interface SParameterRequirements {
  gainMinDb?: number;
  gainMaxDb?: number;
  gainSubBands?: GainSubBandRequirement[];
  gainPoints?: GainPointRequirement[];
  flatnessMaxDb?: number;
  vswrMax?: number;
  outOfBand?: OutOfBandRequirement[];
}

export interface PowerLinearityRequirements {
  p1dbMinDbm?: number;
  pinPoutIm3?: PinPoutIm3Requirement[];
}

export interface NoiseFigureRequirements {
  nfMaxDb?: number;
}

/** Requirements for one DUT at one test stage, split by test kind */
export interface RequirementSet {
  stage: TestStage;
  sParameters?: SParameterRequirements;
  powerLinearity?: PowerLinearityRequirements;
  noiseFigure?: NoiseFigureRequirements;
}

/** Complete DUT configuration record */
export interface DutConfig {
  /** Device type name, unique key in the configuration store */
  name: string;
  partNumber?: string;
  operationalRange: FrequencyRange;
  widebandRange: FrequencyRange;
  ports: PortTopology;
  enabledTests: TestKind[];
  /** Device ships in high-gain and low-gain variants */
  hgLgVariant: boolean;
  requirements: Partial<Record<TestStage, RequirementSet>>;
}

/** Fields accepted when updating a stored DUT configuration */
export type DutConfigUpdateInput = Partial<Omit<DutConfig, 'name'>>;

/** Lightweight listing entry */
export interface DutConfigMetadata {
  name: string;
  partNumber?: string;
  enabledTests: TestKind[];
  stages: TestStage[];
  revision: number;
}
