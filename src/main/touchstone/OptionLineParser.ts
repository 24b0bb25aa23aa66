import type { TouchstoneOptions } from '@shared/types/measurement.types';
import { ParseError } from '../utils/errors';
import {
  DEFAULT_TOUCHSTONE_OPTIONS,
  FORMAT_TOKENS,
  FREQUENCY_UNIT_TOKENS,
  OPTION_LINE_PREFIX,
  PARAMETER_TOKENS,
  REFERENCE_TOKEN,
} from './constants';

/**
 * Parses a Touchstone option line ("# GHz S MA R 50").
 * Tokens are case-insensitive and may appear in any order; omitted tokens
 * keep their defaults.
 */
export class OptionLineParser {
  static parse(line: string, file: string, lineNumber: number): TouchstoneOptions {
    const options: TouchstoneOptions = { ...DEFAULT_TOUCHSTONE_OPTIONS };
    const body = line.trim().substring(OPTION_LINE_PREFIX.length);
    const tokens = body.split(/\s+/).filter((t) => t.length > 0);

    for (let i = 0; i < tokens.length; i++) {
      const token = tokens[i].toUpperCase();

      const unit = FREQUENCY_UNIT_TOKENS[token];
      if (unit) {
        options.frequencyUnit = unit;
        continue;
      }

      const format = FORMAT_TOKENS[token];
      if (format) {
        options.format = format;
        continue;
      }

      if (token === PARAMETER_TOKENS.SUPPORTED) continue;

      if (OptionLineParser.isUnsupportedParameter(token)) {
        throw new ParseError(`Unsupported network parameter type "${tokens[i]}"; only S-parameters are supported`, file, lineNumber);
      }

      if (token === REFERENCE_TOKEN) {
        const value = tokens[i + 1];
        const ohms = value === undefined ? NaN : Number(value);
        if (!Number.isFinite(ohms) || ohms <= 0) {
          throw new ParseError(`Invalid reference impedance "${value ?? ''}"`, file, lineNumber);
        }
        options.referenceOhms = ohms;
        i++;
        continue;
      }

      throw new ParseError(`Unrecognized option token "${tokens[i]}"`, file, lineNumber);
    }

    return options;
  }

  private static isUnsupportedParameter(token: string): boolean {
    return PARAMETER_TOKENS.UNSUPPORTED.some((p) => p === token);
  }
}
