import { describe, it, expect } from 'vitest';
import { FilenameParser } from './FilenameParser';

describe('FilenameParser', () => {
  it('parses a conforming HG filename', () => {
    expect(FilenameParser.parse('20240315_L123456_PRI_SN0042_HG.s2p')).toEqual({
      dateCode: '20240315',
      lotCode: 'L123456',
      chain: 'PRI',
      serialNumber: 'SN0042',
      gainVariant: 'HG',
    });
  });

  it('treats the gain variant as optional', () => {
    const meta = FilenameParser.parse('20240315_L1234_RED_SN7.s1p');
    expect(meta?.chain).toBe('RED');
    expect(meta?.gainVariant).toBeNull();
  });

  it('is case-insensitive and normalizes to upper case', () => {
    expect(FilenameParser.parse('20240315_l123456_red_sn0042_lg.S2P')).toEqual({
      dateCode: '20240315',
      lotCode: 'L123456',
      chain: 'RED',
      serialNumber: 'SN0042',
      gainVariant: 'LG',
    });
  });

  it('ignores directory components', () => {
    expect(FilenameParser.parse('runs/day1/20240315_L1234_PRI_SN1.s2p')?.serialNumber).toBe('SN1');
    expect(FilenameParser.parse('C:\\runs\\20240315_L1234_PRI_SN1.s2p')?.serialNumber).toBe('SN1');
  });

  it('returns null for non-conforming names', () => {
    expect(FilenameParser.parse('amplifier.s2p')).toBeNull();
    expect(FilenameParser.parse('20240315_L12_PRI_SN1.s2p')).toBeNull();
    expect(FilenameParser.parse('20240315_L1234_AUX_SN1.s2p')).toBeNull();
    expect(FilenameParser.parse('20240315_L1234_PRI_SN1.csv')).toBeNull();
  });

  it('rejects impossible dates', () => {
    expect(FilenameParser.parse('20241315_L1234_PRI_SN1.s2p')).toBeNull();
    expect(FilenameParser.parse('20240300_L1234_PRI_SN1.s2p')).toBeNull();
  });
});
