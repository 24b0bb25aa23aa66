import type {
  DutConfig,
  NoiseFigureRequirements,
  PowerLinearityRequirements,
  RequirementSet,
  SParameterRequirements,
  TestKind,
  TestStage,
} from '@shared/types/dut.types';
import { TEST_KIND_DISPLAY_NAMES, TEST_STAGE_DISPLAY_NAMES } from '@shared/constants';
import { ConfigurationError } from '../utils/errors';

/** Requirement section type for each test kind */
export interface RequirementSections {
  s_parameters: SParameterRequirements;
  power_linearity: PowerLinearityRequirements;
  noise_figure: NoiseFigureRequirements;
}

const SECTION_ACCESSORS: { [K in TestKind]: (set: RequirementSet) => RequirementSections[K] | undefined } = {
  s_parameters: (set) => set.sParameters,
  power_linearity: (set) => set.powerLinearity,
  noise_figure: (set) => set.noiseFigure,
};

/**
 * The active stage's requirement section for one test kind.
 *
 * @throws ConfigurationError when the stage has no requirement set, or the
 * set has no section for the test kind
 */
export function resolveRequirementSection<K extends TestKind>(
  dut: DutConfig,
  stage: TestStage,
  testKind: K
): RequirementSections[K] {
  const set = dut.requirements[stage];
  const stageName = TEST_STAGE_DISPLAY_NAMES[stage];
  if (!set) {
    throw new ConfigurationError(
      `DUT "${dut.name}" has no requirements for stage ${stageName}; ${TEST_KIND_DISPLAY_NAMES[testKind]} cannot be evaluated`,
      dut.name,
      testKind,
      stage
    );
  }

  const section = SECTION_ACCESSORS[testKind](set);
  if (section === undefined) {
    throw new ConfigurationError(
      `DUT "${dut.name}" enables ${TEST_KIND_DISPLAY_NAMES[testKind]} but the ${stageName} requirements have no section for it`,
      dut.name,
      testKind,
      stage
    );
  }
  return section;
}
