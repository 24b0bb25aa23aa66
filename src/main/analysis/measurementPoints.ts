import type { DutConfig, FrequencyRange, RequirementSet } from '@shared/types/dut.types';
import { uniqueBands, uniqueSorted } from './sampling';

/**
 * Where metrics must be computed: every window, spot frequency and Pin
 * point named by any stage. Bounds play no part here, so metrics computed
 * from these points serve every stage.
 */
export interface MeasurementPoints {
  subBands: FrequencyRange[];
  gainPointsGHz: number[];
  outOfBandWindows: FrequencyRange[];
  pinPointsDbm: number[];
}

export function collectMeasurementPoints(dut: DutConfig): MeasurementPoints {
  const sets = Object.values(dut.requirements).filter((set): set is RequirementSet => set !== undefined);

  return {
    subBands: uniqueBands(sets.flatMap((s) => (s.sParameters?.gainSubBands ?? []).map((r) => r.band))),
    gainPointsGHz: uniqueSorted(sets.flatMap((s) => (s.sParameters?.gainPoints ?? []).map((r) => r.frequencyGHz))),
    outOfBandWindows: uniqueBands(sets.flatMap((s) => (s.sParameters?.outOfBand ?? []).map((r) => r.band))),
    pinPointsDbm: uniqueSorted(sets.flatMap((s) => (s.powerLinearity?.pinPoutIm3 ?? []).map((r) => r.pinDbm))),
  };
}
