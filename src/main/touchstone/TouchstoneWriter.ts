import type { FrequencyUnit, TouchstoneFormat, TouchstoneNetwork } from '@shared/types/measurement.types';
import { UNITS_PER_GHZ } from '@shared/constants';
import { TouchstoneParser } from './TouchstoneParser';

export interface TouchstoneWriteOptions {
  format?: TouchstoneFormat;
  frequencyUnit?: FrequencyUnit;
  /** Comment lines emitted before the option line (without the "!") */
  comments?: string[];
}

/** dB value written for a zero magnitude, which has no finite dB form */
const DB_FLOOR = -400;

/**
 * Serializes a parsed network back to Touchstone v1 text.
 * Numbers are written in their shortest exact decimal form.
 */
export class TouchstoneWriter {
  static write(network: TouchstoneNetwork, options: TouchstoneWriteOptions = {}): string {
    const format = options.format ?? network.options.format;
    const unit = options.frequencyUnit ?? network.options.frequencyUnit;
    const unitsPerGHz = UNITS_PER_GHZ[unit];
    const n = network.numPorts;
    const lines: string[] = [];

    for (const comment of options.comments ?? []) {
      lines.push(`! ${comment}`);
    }
    lines.push(`# ${unit} S ${format} R ${network.options.referenceOhms}`);

    for (let r = 0; r < network.frequencyGHz.length; r++) {
      const freq = String(network.frequencyGHz[r] * unitsPerGHz);
      const pairs: string[] = [];
      for (let k = 0; k < n * n; k++) {
        const [out, inp] = TouchstoneParser.portPairAt(k, n);
        pairs.push(TouchstoneWriter.formatValue(network, (out - 1) * n + (inp - 1), r, format));
      }

      if (n <= 2) {
        lines.push([freq, ...pairs].join(' '));
      } else {
        // One matrix row per line; the frequency leads the first
        for (let row = 0; row < n; row++) {
          const rowValues = pairs.slice(row * n, (row + 1) * n).join(' ');
          lines.push(row === 0 ? `${freq} ${rowValues}` : rowValues);
        }
      }
    }

    return lines.join('\n') + '\n';
  }

  private static formatValue(network: TouchstoneNetwork, traceIndex: number, i: number, format: TouchstoneFormat): string {
    const trace = network.traces[traceIndex];
    switch (format) {
      case 'MA':
        return `${trace.magnitude[i]} ${trace.phaseDeg[i]}`;
      case 'DB': {
        const db = Number.isFinite(trace.magnitudeDb[i]) ? trace.magnitudeDb[i] : DB_FLOOR;
        return `${db} ${trace.phaseDeg[i]}`;
      }
      case 'RI':
        return `${trace.re[i]} ${trace.im[i]}`;
    }
  }
}
