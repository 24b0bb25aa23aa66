import type { Chain, FileMetadata, GainVariant } from '@shared/types/measurement.types';
import { FILENAME_PATTERN } from './constants';

/**
 * Extracts bench identity fields from a Touchstone filename.
 * Matching is case-insensitive; tokens are normalized to upper case.
 */
export class FilenameParser {
  /** Returns null when the name does not follow the bench convention */
  static parse(filename: string): FileMetadata | null {
    const match = FILENAME_PATTERN.exec(FilenameParser.basename(filename));
    if (!match) return null;

    const [, dateCode, lotCode, chain, serialNumber, gainVariant] = match;
    if (!FilenameParser.isValidDate(dateCode)) return null;

    return {
      dateCode,
      lotCode: lotCode.toUpperCase(),
      chain: FilenameParser.toChain(chain),
      serialNumber: serialNumber.toUpperCase(),
      gainVariant: gainVariant ? FilenameParser.toGainVariant(gainVariant) : null,
    };
  }

  /** Strips any directory part, POSIX or Windows separators */
  static basename(filename: string): string {
    const parts = filename.split(/[\\/]/);
    return parts[parts.length - 1];
  }

  private static isValidDate(dateCode: string): boolean {
    const month = parseInt(dateCode.substring(4, 6), 10);
    const day = parseInt(dateCode.substring(6, 8), 10);
    return month >= 1 && month <= 12 && day >= 1 && day <= 31;
  }

  private static toChain(token: string): Chain {
    return token.toUpperCase() === 'RED' ? 'RED' : 'PRI';
  }

  private static toGainVariant(token: string): GainVariant {
    return token.toUpperCase() === 'LG' ? 'LG' : 'HG';
  }
}
