/**
 * Installed-software scan over the Windows uninstall keys
 */

import { exec } from '../../utils/exec.js';
import { isCommandNotFound } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';
import { matchesWildcard } from '../../utils/wildcard.js';
import type { InstalledSoftwareManifest } from '../types.js';

export const UNINSTALL_KEYS = [
  'HKLM\\SOFTWARE\\Microsoft\\Windows\\CurrentVersion\\Uninstall',
  'HKLM\\SOFTWARE\\WOW6432Node\\Microsoft\\Windows\\CurrentVersion\\Uninstall',
  'HKCU\\SOFTWARE\\Microsoft\\Windows\\CurrentVersion\\Uninstall',
];

/**
 * Pull DisplayName values out of `reg query ... /s /v DisplayName` output:
 *
 *     DisplayName    REG_SZ    Git
 */
export function parseDisplayNames(output: string): string[] {
  const names: string[] = [];
  for (const line of output.split(/\r?\n/)) {
    const match = line.match(/^\s*DisplayName\s+REG_\w+\s+(.+?)\s*$/);
    if (match) {
      names.push(match[1]);
    }
  }
  return names;
}

export class WindowsRegistryManifest implements InstalledSoftwareManifest {
  readonly name = 'uninstall registry';

  constructor(
    private readonly commandTimeoutMs: number,
    private readonly keys: string[] = UNINSTALL_KEYS
  ) {}

  async matches(pattern: string): Promise<boolean> {
    const names = await this.displayNames();
    return names.some(name => matchesWildcard(name, pattern));
  }

  async displayNames(): Promise<string[]> {
    const names: string[] = [];
    let scanned = 0;

    for (const key of this.keys) {
      try {
        const result = await exec('reg', ['query', key, '/s', '/v', 'DisplayName'], {
          timeout: this.commandTimeoutMs,
        });
        // reg exits 1 when the key or value is absent; that key just contributes nothing
        if (result.code === 0) {
          names.push(...parseDisplayNames(result.stdout));
          scanned++;
        }
      } catch (error) {
        if (isCommandNotFound(error)) {
          throw new Error('reg.exe is not available');
        }
        logger.debug(`Scanning ${key} failed`, error);
      }
    }

    if (scanned === 0) {
      throw new Error('none of the uninstall keys could be read');
    }
    return names;
  }
}
