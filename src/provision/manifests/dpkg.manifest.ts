/**
 * Installed-software scan over the dpkg database (package name and summary)
 */

import { exec } from '../../utils/exec.js';
import { matchesWildcard } from '../../utils/wildcard.js';
import type { InstalledSoftwareManifest } from '../types.js';

export interface DpkgEntry {
  packageName: string;
  status: string;
  summary: string;
}

/**
 * Lines of `${Package}\t${Status}\t${binary:Summary}`
 */
export function parseDpkgEntries(output: string): DpkgEntry[] {
  return output
    .split('\n')
    .filter(line => line.trim().length > 0)
    .map(line => {
      const [packageName = '', status = '', summary = ''] = line.split('\t');
      return { packageName: packageName.trim(), status: status.trim(), summary: summary.trim() };
    });
}

export class DpkgManifest implements InstalledSoftwareManifest {
  readonly name = 'dpkg database';

  constructor(private readonly commandTimeoutMs: number) {}

  async matches(pattern: string): Promise<boolean> {
    const result = await exec('dpkg-query', ['-W', '-f=${Package}\t${Status}\t${binary:Summary}\n'], {
      timeout: this.commandTimeoutMs,
    });
    if (result.code !== 0) {
      throw new Error(`dpkg-query exited with code ${result.code}: ${result.stderr}`);
    }

    return parseDpkgEntries(result.stdout)
      .filter(entry => entry.status === 'install ok installed')
      .some(entry => matchesWildcard(entry.packageName, pattern) || matchesWildcard(entry.summary, pattern));
  }
}
