import { describe, it, expect } from 'vitest';
import type { TouchstoneNetwork } from '@shared/types/measurement.types';
import { checkFileSet, expectedRoles, fileRole } from './FileSetValidator';
import { TouchstoneParser } from '../touchstone/TouchstoneParser';
import { buildFlatTwoPort } from '../test/measurementFactory';
import { createDutConfig } from '../test/dutFactory';

const CONTENT = buildFlatTwoPort(2.0, 3.0, 0.5, 20);

function network(filename: string): TouchstoneNetwork {
  return TouchstoneParser.parse(filename, CONTENT).network;
}

describe('FileSetValidator', () => {
  it('expects PRI and RED, split by gain variant for HG/LG parts', () => {
    expect(expectedRoles(createDutConfig())).toEqual(['PRI', 'RED']);
    expect(expectedRoles(createDutConfig({ hgLgVariant: true }))).toEqual(['PRI_HG', 'PRI_LG', 'RED_HG', 'RED_LG']);
  });

  it('ignores the gain variant for parts without one', () => {
    const metadata = { dateCode: '20240315', lotCode: 'L1234', chain: 'RED' as const, serialNumber: 'SN1', gainVariant: 'HG' as const };
    expect(fileRole(metadata, false)).toBe('RED');
    expect(fileRole(metadata, true)).toBe('RED_HG');
  });

  it('accepts a complete set', () => {
    const networks = [network('20240315_L1234_PRI_SN1.s2p'), network('20240315_L1234_RED_SN1.s2p')];
    expect(checkFileSet(networks, createDutConfig())).toEqual([]);
  });

  it('warns about missing roles', () => {
    const dut = createDutConfig({ hgLgVariant: true });
    expect(checkFileSet([network('20240315_L1234_PRI_SN1_HG.s2p')], dut)).toEqual([
      {
        code: 'incomplete_file_set',
        message: 'Missing Touchstone files for PRI_LG, RED_HG, RED_LG; LNA-2G4 expects PRI_HG, PRI_LG, RED_HG, RED_LG',
        severity: 'warning',
      },
    ]);
  });

  it('warns about several files for one role', () => {
    const networks = [
      network('20240315_L1234_PRI_SN1.s2p'),
      network('runs/20240316_L1234_PRI_SN1.s2p'),
      network('20240315_L1234_RED_SN1.s2p'),
    ];
    expect(checkFileSet(networks, createDutConfig())).toEqual([
      {
        code: 'duplicate_file_role',
        message: '2 Touchstone files for PRI: 20240315_L1234_PRI_SN1.s2p, 20240316_L1234_PRI_SN1.s2p',
        severity: 'warning',
      },
    ]);
  });

  it('leaves out files without filename metadata', () => {
    const warnings = checkFileSet([network('amplifier.s2p')], createDutConfig());
    expect(warnings.map((w) => w.code)).toEqual(['incomplete_file_set']);
  });

  it('does nothing when S-parameters are not enabled', () => {
    expect(checkFileSet([], createDutConfig({ enabledTests: ['noise_figure'] }))).toEqual([]);
  });
});
