/**
 * Windows optional features through DISM
 */

import { exec } from '../../utils/exec.js';
import { getErrorMessage } from '../../utils/errors.js';
import type { FeatureResult, FeatureSpec, FeatureStore } from '../types.js';

/** DISM: success, restart required */
export const ERROR_SUCCESS_REBOOT_REQUIRED = 3010;

export type DismFeatureState = 'enabled' | 'enable-pending' | 'disabled' | 'unknown';

/**
 * Read the "State : Enabled" line of `dism /get-featureinfo /English`
 */
export function parseFeatureState(output: string): DismFeatureState {
  const match = output.match(/^\s*State\s*:\s*(.+?)\s*$/im);
  if (!match) {
    return 'unknown';
  }
  const state = match[1].toLowerCase();
  if (state === 'enabled') return 'enabled';
  if (state === 'enable pending') return 'enable-pending';
  if (state.startsWith('disabled')) return 'disabled';
  return 'unknown';
}

export class DismFeatureStore implements FeatureStore {
  constructor(
    private readonly commandTimeoutMs: number,
    private readonly installTimeoutMs: number
  ) {}

  async enable(feature: FeatureSpec): Promise<FeatureResult> {
    try {
      const info = await exec(
        'dism.exe',
        ['/online', '/get-featureinfo', `/featurename:${feature.id}`, '/English'],
        { timeout: this.commandTimeoutMs }
      );
      const state = info.code === 0 ? parseFeatureState(info.stdout) : 'unknown';

      if (state === 'enabled') {
        return { feature, status: 'already-enabled', rebootRequired: false };
      }
      if (state === 'enable-pending') {
        return { feature, status: 'already-enabled', rebootRequired: true, detail: 'enable pending a restart' };
      }

      const result = await exec(
        'dism.exe',
        ['/online', '/enable-feature', `/featurename:${feature.id}`, '/all', '/norestart', '/English'],
        { timeout: this.installTimeoutMs }
      );

      if (result.code === 0) {
        return { feature, status: 'enabled', rebootRequired: false };
      }
      if (result.code === ERROR_SUCCESS_REBOOT_REQUIRED) {
        return { feature, status: 'enabled', rebootRequired: true, detail: 'restart required' };
      }
      return {
        feature,
        status: 'failed',
        rebootRequired: false,
        detail: `dism exited with code ${result.code}: ${result.stdout || result.stderr}`,
      };
    } catch (error) {
      return { feature, status: 'failed', rebootRequired: false, detail: getErrorMessage(error) };
    }
  }
}
