/**
 * DUT configuration fixtures for tests.
 *
 * A 2.4-2.5 GHz two-port amplifier (input port 1, output port 2) with every
 * test kind enabled; board bring-up is looser than SIT on every bound.
 */

import type { DutConfig, RequirementSet } from '@shared/types/dut.types';

export const BOARD_BRINGUP_REQUIREMENTS: RequirementSet = {
  stage: 'board_bringup',
  sParameters: {
    gainMinDb: 15,
    gainMaxDb: 25,
    flatnessMaxDb: 3,
    vswrMax: 2.5,
  },
  powerLinearity: {
    p1dbMinDbm: -5,
    pinPoutIm3: [{ pinDbm: -7, poutMinDbm: 10, im3MinDbc: 40 }],
  },
  noiseFigure: { nfMaxDb: 2.5 },
};

export const SIT_REQUIREMENTS: RequirementSet = {
  stage: 'sit',
  sParameters: {
    gainMinDb: 19,
    gainMaxDb: 22,
    gainSubBands: [{ band: { minGHz: 2.4, maxGHz: 2.45 }, gainMinDb: 20, gainMaxDb: 21 }],
    gainPoints: [{ frequencyGHz: 2.46, gainMinDb: 20 }],
    flatnessMaxDb: 1,
    vswrMax: 1.5,
    outOfBand: [{ band: { minGHz: 2.7, maxGHz: 3.0 }, rejectionDb: 12 }],
  },
  powerLinearity: {
    p1dbMinDbm: 1,
    pinPoutIm3: [{ pinDbm: -7, poutMinDbm: 14, im3MinDbc: 45 }],
  },
  noiseFigure: { nfMaxDb: 1.5 },
};

export function createDutConfig(overrides: Partial<DutConfig> = {}): DutConfig {
  return {
    name: 'LNA-2G4',
    partNumber: 'PN-1001',
    operationalRange: { minGHz: 2.4, maxGHz: 2.5 },
    widebandRange: { minGHz: 2.0, maxGHz: 3.0 },
    ports: { numPorts: 2, inputPorts: [1], outputPorts: [2] },
    enabledTests: ['s_parameters', 'power_linearity', 'noise_figure'],
    hgLgVariant: false,
    requirements: {
      board_bringup: BOARD_BRINGUP_REQUIREMENTS,
      sit: SIT_REQUIREMENTS,
    },
    ...overrides,
  };
}
