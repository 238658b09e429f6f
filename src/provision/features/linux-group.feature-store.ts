/**
 * Linux group membership for the invoking (sudo) user, e.g. the docker group.
 * The feature id is the group name.
 */

import { exec } from '../../utils/exec.js';
import { getErrorMessage } from '../../utils/errors.js';
import type { FeatureResult, FeatureSpec, FeatureStore } from '../types.js';

export class LinuxGroupFeatureStore implements FeatureStore {
  /**
   * @param user - account to add; normally SUDO_USER. Without one there is nothing to do.
   */
  constructor(
    private readonly user: string | undefined,
    private readonly commandTimeoutMs: number
  ) {}

  async enable(feature: FeatureSpec): Promise<FeatureResult> {
    const group = feature.id;
    if (!this.user) {
      return { feature, status: 'skipped', rebootRequired: false, detail: 'not run through sudo; no user to add' };
    }

    try {
      const exists = await exec('getent', ['group', group], { timeout: this.commandTimeoutMs });
      if (exists.code !== 0) {
        return { feature, status: 'skipped', rebootRequired: false, detail: `group ${group} does not exist` };
      }

      const groups = await exec('id', ['-nG', this.user], { timeout: this.commandTimeoutMs });
      if (groups.code === 0 && groups.stdout.split(/\s+/).includes(group)) {
        return { feature, status: 'already-enabled', rebootRequired: false };
      }

      const result = await exec('usermod', ['-aG', group, this.user], { timeout: this.commandTimeoutMs });
      if (result.code !== 0) {
        return {
          feature,
          status: 'failed',
          rebootRequired: false,
          detail: `usermod exited with code ${result.code}: ${result.stderr}`,
        };
      }

      return {
        feature,
        status: 'enabled',
        rebootRequired: true,
        detail: `${this.user} added to ${group}; log out and back in for it to take effect`,
      };
    } catch (error) {
      return { feature, status: 'failed', rebootRequired: false, detail: getErrorMessage(error) };
    }
  }
}
