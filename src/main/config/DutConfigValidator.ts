/**
 * DUT configuration validation.
 *
 * Accepts records of unknown shape (JSON from an external store) and returns
 * a typed DutConfig, or throws one ConfigurationError listing every problem.
 */

import type {
  DutConfig,
  FrequencyRange,
  GainPointRequirement,
  GainSubBandRequirement,
  NoiseFigureRequirements,
  OutOfBandRequirement,
  PinPoutIm3Requirement,
  PortCount,
  PortTopology,
  PowerLinearityRequirements,
  RequirementSet,
  SParameterRequirements,
  TestKind,
  TestStage,
} from '@shared/types/dut.types';
import { TEST_KINDS, TEST_STAGES } from '@shared/constants';
import { ConfigurationError } from '../utils/errors';

/** VSWR is 1 for a perfect match and grows from there */
const MIN_VSWR = 1;

type UnknownRecord = Record<string, unknown>;

function isRecord(value: unknown): value is UnknownRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isTestKind(value: unknown): value is TestKind {
  return TEST_KINDS.some((kind) => kind === value);
}

function isTestStage(value: unknown): value is TestStage {
  return TEST_STAGES.some((stage) => stage === value);
}

function isPortCount(value: unknown): value is PortCount {
  return value === 1 || value === 2 || value === 3 || value === 4;
}

/** Collects problems with their path, e.g. "requirements.sit.sParameters.vswrMax" */
class Problems {
  readonly list: string[] = [];

  add(path: string, message: string): void {
    this.list.push(`${path} ${message}`);
  }

  number(record: UnknownRecord, key: string, path: string): number | undefined {
    const value = record[key];
    if (value === undefined) return undefined;
    if (typeof value !== 'number' || !Number.isFinite(value)) {
      this.add(`${path}.${key}`, 'must be a finite number');
      return undefined;
    }
    return value;
  }

  requiredNumber(record: UnknownRecord, key: string, path: string): number | undefined {
    if (record[key] === undefined) {
      this.add(`${path}.${key}`, 'is required');
      return undefined;
    }
    return this.number(record, key, path);
  }

  array(record: UnknownRecord, key: string, path: string): unknown[] | undefined {
    const value = record[key];
    if (value === undefined) return undefined;
    if (!Array.isArray(value)) {
      this.add(`${path}.${key}`, 'must be an array');
      return undefined;
    }
    return value;
  }

  record(value: unknown, path: string): UnknownRecord | undefined {
    if (!isRecord(value)) {
      this.add(path, 'must be an object');
      return undefined;
    }
    return value;
  }
}

function readRange(value: unknown, path: string, problems: Problems): FrequencyRange | undefined {
  const record = problems.record(value, path);
  if (!record) return undefined;
  const minGHz = problems.requiredNumber(record, 'minGHz', path);
  const maxGHz = problems.requiredNumber(record, 'maxGHz', path);
  if (minGHz === undefined || maxGHz === undefined) return undefined;
  if (minGHz < 0) problems.add(`${path}.minGHz`, 'must not be negative');
  if (minGHz >= maxGHz) {
    problems.add(path, `must have minGHz below maxGHz (got ${minGHz}-${maxGHz})`);
    return undefined;
  }
  return { minGHz, maxGHz };
}

function readBoundPair(
  record: UnknownRecord,
  minKey: string,
  maxKey: string,
  path: string,
  problems: Problems
): { min?: number; max?: number } {
  const min = problems.number(record, minKey, path);
  const max = problems.number(record, maxKey, path);
  if (min !== undefined && max !== undefined && min > max) {
    problems.add(path, `has ${minKey} ${min} above ${maxKey} ${max}`);
  }
  return { min, max };
}

function readPorts(value: unknown, problems: Problems): PortTopology | undefined {
  const path = 'ports';
  const record = problems.record(value, path);
  if (!record) return undefined;

  const numPorts = record.numPorts;
  if (!isPortCount(numPorts)) {
    problems.add(`${path}.numPorts`, 'must be 1, 2, 3 or 4');
    return undefined;
  }

  const readList = (key: 'inputPorts' | 'outputPorts'): number[] => {
    const list = problems.array(record, key, path);
    if (!list || list.length === 0) {
      if (list) problems.add(`${path}.${key}`, 'must not be empty');
      else problems.add(`${path}.${key}`, 'is required');
      return [];
    }
    const ports: number[] = [];
    list.forEach((port, i) => {
      if (typeof port !== 'number' || !Number.isInteger(port) || port < 1 || port > numPorts) {
        problems.add(`${path}.${key}[${i}]`, `must be a port number between 1 and ${numPorts}`);
      } else {
        ports.push(port);
      }
    });
    return ports;
  };

  return { numPorts, inputPorts: readList('inputPorts'), outputPorts: readList('outputPorts') };
}

function readSParameters(value: unknown, path: string, problems: Problems): SParameterRequirements | undefined {
  const record = problems.record(value, path);
  if (!record) return undefined;

  const gain = readBoundPair(record, 'gainMinDb', 'gainMaxDb', path, problems);
  const section: SParameterRequirements = { gainMinDb: gain.min, gainMaxDb: gain.max };

  const flatnessMaxDb = problems.number(record, 'flatnessMaxDb', path);
  if (flatnessMaxDb !== undefined && flatnessMaxDb < 0) problems.add(`${path}.flatnessMaxDb`, 'must not be negative');
  section.flatnessMaxDb = flatnessMaxDb;

  const vswrMax = problems.number(record, 'vswrMax', path);
  if (vswrMax !== undefined && vswrMax < MIN_VSWR) problems.add(`${path}.vswrMax`, `must be at least ${MIN_VSWR}`);
  section.vswrMax = vswrMax;

  const subBands = problems.array(record, 'gainSubBands', path);
  if (subBands) {
    const gainSubBands: GainSubBandRequirement[] = [];
    section.gainSubBands = gainSubBands;
    subBands.forEach((entry, i) => {
      const entryPath = `${path}.gainSubBands[${i}]`;
      const item = problems.record(entry, entryPath);
      if (!item) return;
      const band = readRange(item.band, `${entryPath}.band`, problems);
      const bounds = readBoundPair(item, 'gainMinDb', 'gainMaxDb', entryPath, problems);
      if (band) {
        gainSubBands.push({ band, gainMinDb: bounds.min, gainMaxDb: bounds.max });
      }
    });
  }

  const points = problems.array(record, 'gainPoints', path);
  if (points) {
    const gainPoints: GainPointRequirement[] = [];
    section.gainPoints = gainPoints;
    points.forEach((entry, i) => {
      const entryPath = `${path}.gainPoints[${i}]`;
      const item = problems.record(entry, entryPath);
      if (!item) return;
      const frequencyGHz = problems.requiredNumber(item, 'frequencyGHz', entryPath);
      const bounds = readBoundPair(item, 'gainMinDb', 'gainMaxDb', entryPath, problems);
      if (frequencyGHz !== undefined) {
        gainPoints.push({ frequencyGHz, gainMinDb: bounds.min, gainMaxDb: bounds.max });
      }
    });
  }

  const windows = problems.array(record, 'outOfBand', path);
  if (windows) {
    const outOfBand: OutOfBandRequirement[] = [];
    section.outOfBand = outOfBand;
    windows.forEach((entry, i) => {
      const entryPath = `${path}.outOfBand[${i}]`;
      const item = problems.record(entry, entryPath);
      if (!item) return;
      const band = readRange(item.band, `${entryPath}.band`, problems);
      const rejectionDb = problems.requiredNumber(item, 'rejectionDb', entryPath);
      if (band && rejectionDb !== undefined) {
        outOfBand.push({ band, rejectionDb });
      }
    });
  }

  return section;
}

function readPowerLinearity(value: unknown, path: string, problems: Problems): PowerLinearityRequirements | undefined {
  const record = problems.record(value, path);
  if (!record) return undefined;

  const section: PowerLinearityRequirements = { p1dbMinDbm: problems.number(record, 'p1dbMinDbm', path) };
  const points = problems.array(record, 'pinPoutIm3', path);
  if (points) {
    const seen = new Set<number>();
    const pinPoutIm3: PinPoutIm3Requirement[] = [];
    section.pinPoutIm3 = pinPoutIm3;
    points.forEach((entry, i) => {
      const entryPath = `${path}.pinPoutIm3[${i}]`;
      const item = problems.record(entry, entryPath);
      if (!item) return;
      const pinDbm = problems.requiredNumber(item, 'pinDbm', entryPath);
      const poutMinDbm = problems.number(item, 'poutMinDbm', entryPath);
      const im3MinDbc = problems.number(item, 'im3MinDbc', entryPath);
      if (pinDbm === undefined) return;
      if (seen.has(pinDbm)) {
        problems.add(`${entryPath}.pinDbm`, `repeats ${pinDbm} dBm`);
        return;
      }
      seen.add(pinDbm);
      pinPoutIm3.push({ pinDbm, poutMinDbm, im3MinDbc });
    });
  }
  return section;
}

function readNoiseFigure(value: unknown, path: string, problems: Problems): NoiseFigureRequirements | undefined {
  const record = problems.record(value, path);
  if (!record) return undefined;
  return { nfMaxDb: problems.number(record, 'nfMaxDb', path) };
}

function readRequirementSet(stage: TestStage, value: unknown, problems: Problems): RequirementSet | undefined {
  const path = `requirements.${stage}`;
  const record = problems.record(value, path);
  if (!record) return undefined;
  if (record.stage !== undefined && record.stage !== stage) {
    problems.add(`${path}.stage`, `must match its key "${stage}"`);
  }

  const set: RequirementSet = { stage };
  if (record.sParameters !== undefined) set.sParameters = readSParameters(record.sParameters, `${path}.sParameters`, problems);
  if (record.powerLinearity !== undefined) {
    set.powerLinearity = readPowerLinearity(record.powerLinearity, `${path}.powerLinearity`, problems);
  }
  if (record.noiseFigure !== undefined) set.noiseFigure = readNoiseFigure(record.noiseFigure, `${path}.noiseFigure`, problems);
  return set;
}

/**
 * Validate a DUT configuration record.
 *
 * Requirement sections may be absent; a missing section for an enabled test
 * kind is reported at evaluation time, for the stage being evaluated.
 *
 * @throws ConfigurationError listing every problem found
 */
export function validateDutConfig(input: unknown): DutConfig {
  const problems = new Problems();
  const record = problems.record(input, 'config');
  if (!record) {
    throw new ConfigurationError(`Invalid DUT configuration: ${problems.list.join('; ')}`);
  }

  const name = typeof record.name === 'string' ? record.name.trim() : '';
  if (name.length === 0) problems.add('name', 'must be a non-empty string');

  let partNumber: string | undefined;
  if (record.partNumber !== undefined) {
    if (typeof record.partNumber === 'string') partNumber = record.partNumber;
    else problems.add('partNumber', 'must be a string');
  }

  const operationalRange = readRange(record.operationalRange, 'operationalRange', problems);
  const widebandRange = readRange(record.widebandRange, 'widebandRange', problems);
  if (
    operationalRange &&
    widebandRange &&
    (widebandRange.minGHz > operationalRange.minGHz || widebandRange.maxGHz < operationalRange.maxGHz)
  ) {
    problems.add('widebandRange', 'must contain the operational range');
  }

  const ports = readPorts(record.ports, problems);

  const enabledTests: TestKind[] = [];
  const rawTests: unknown = record.enabledTests;
  if (!Array.isArray(rawTests)) {
    problems.add('enabledTests', 'must be an array');
  } else {
    const kinds: unknown[] = rawTests;
    for (const kind of kinds) {
      if (!isTestKind(kind)) problems.add('enabledTests', `has unknown test kind "${String(kind)}"`);
      else if (enabledTests.includes(kind)) problems.add('enabledTests', `repeats "${kind}"`);
      else enabledTests.push(kind);
    }
  }

  const hgLgVariant = record.hgLgVariant ?? false;
  if (typeof hgLgVariant !== 'boolean') problems.add('hgLgVariant', 'must be a boolean');

  const requirements: DutConfig['requirements'] = {};
  const rawRequirements = record.requirements ?? {};
  if (!isRecord(rawRequirements)) {
    problems.add('requirements', 'must be an object keyed by test stage');
  } else {
    for (const [key, value] of Object.entries(rawRequirements)) {
      if (!isTestStage(key)) {
        problems.add('requirements', `has unknown test stage "${key}"`);
        continue;
      }
      requirements[key] = readRequirementSet(key, value, problems);
    }
  }

  if (problems.list.length > 0 || !operationalRange || !widebandRange || !ports || typeof hgLgVariant !== 'boolean') {
    const label = name.length > 0 ? ` "${name}"` : '';
    throw new ConfigurationError(`Invalid DUT configuration${label}: ${problems.list.join('; ')}`, name || undefined);
  }

  return { name, partNumber, operationalRange, widebandRange, ports, enabledTests, hgLgVariant, requirements };
}
