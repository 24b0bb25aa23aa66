import type { DutConfig } from '@shared/types/dut.types';
import type { FileMetadata, RunWarning, TouchstoneNetwork } from '@shared/types/measurement.types';
import { FilenameParser } from '../touchstone/FilenameParser';

/** Touchstone roles a DUT's file set must cover */
export function expectedRoles(dut: DutConfig): string[] {
  return dut.hgLgVariant ? ['PRI_HG', 'PRI_LG', 'RED_HG', 'RED_LG'] : ['PRI', 'RED'];
}

/** "PRI_HG" for HG/LG DUTs, "PRI" otherwise */
export function fileRole(metadata: FileMetadata, hgLgVariant: boolean): string {
  return hgLgVariant && metadata.gainVariant ? `${metadata.chain}_${metadata.gainVariant}` : metadata.chain;
}

/**
 * Check the Touchstone file set of a run: every role present once.
 * Gaps and duplicates are warnings; files without filename metadata have no
 * role and are left out.
 */
export function checkFileSet(networks: readonly TouchstoneNetwork[], dut: DutConfig): RunWarning[] {
  if (!dut.enabledTests.includes('s_parameters')) return [];

  const byRole = new Map<string, string[]>();
  for (const network of networks) {
    if (!network.metadata) continue;
    const role = fileRole(network.metadata, dut.hgLgVariant);
    byRole.set(role, [...(byRole.get(role) ?? []), FilenameParser.basename(network.sourceFile)]);
  }

  const warnings: RunWarning[] = [];
  const expected = expectedRoles(dut);
  const missing = expected.filter((role) => !byRole.has(role));
  if (missing.length > 0) {
    warnings.push({
      code: 'incomplete_file_set',
      message: `Missing Touchstone files for ${missing.join(', ')}; ${dut.name} expects ${expected.join(', ')}`,
      severity: 'warning',
    });
  }

  for (const [role, files] of byRole) {
    if (files.length > 1) {
      warnings.push({
        code: 'duplicate_file_role',
        message: `${files.length} Touchstone files for ${role}: ${files.join(', ')}`,
        severity: 'warning',
      });
    }
  }
  return warnings;
}
