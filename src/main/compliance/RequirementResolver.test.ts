import { describe, it, expect } from 'vitest';
import { resolveRequirementSection } from './RequirementResolver';
import { ConfigurationError } from '../utils/errors';
import { BOARD_BRINGUP_REQUIREMENTS, createDutConfig } from '../test/dutFactory';

describe('resolveRequirementSection', () => {
  it('returns the section of the active stage', () => {
    const section = resolveRequirementSection(createDutConfig(), 'sit', 'noise_figure');
    expect(section.nfMaxDb).toBe(1.5);
  });

  it('throws when the stage has no requirement set', () => {
    expect(() => resolveRequirementSection(createDutConfig(), 'test_campaign', 's_parameters')).toThrow(
      'DUT "LNA-2G4" has no requirements for stage Test Campaign; S-Parameters cannot be evaluated'
    );
  });

  it('throws when the set has no section for the test kind', () => {
    const dut = createDutConfig({
      requirements: { board_bringup: { ...BOARD_BRINGUP_REQUIREMENTS, noiseFigure: undefined } },
    });
    try {
      resolveRequirementSection(dut, 'board_bringup', 'noise_figure');
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigurationError);
      if (!(error instanceof ConfigurationError)) return;
      expect(error.message).toBe(
        'DUT "LNA-2G4" enables Noise Figure but the Board Bring-up requirements have no section for it'
      );
      expect(error.testKind).toBe('noise_figure');
      expect(error.stage).toBe('board_bringup');
      expect(error.code).toBe('CONFIGURATION_ERROR');
    }
  });
});
