import type { MetricBase, MetricKind } from '@shared/types/analysis.types';

/** Unit of each metric kind, used for placeholder metrics */
export const METRIC_KIND_UNITS: Record<MetricKind, MetricBase['unit']> = {
  gain_min: 'dB',
  gain_max: 'dB',
  flatness: 'dB',
  wideband_flatness: 'dB',
  subband_gain_min: 'dB',
  subband_gain_max: 'dB',
  gain_at_frequency: 'dB',
  vswr_max: 'ratio',
  return_loss_min: 'dB',
  oob_rejection: 'dB',
  p1db: 'dBm',
  p1db_worst_case: 'dBm',
  pout_at_pin: 'dBm',
  im3_at_pin: 'dBc',
  im3_worst_case: 'dBc',
  im5_worst_case: 'dBc',
  nf_worst_case: 'dB',
};
