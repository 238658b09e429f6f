/**
 * snap adapter (Ubuntu)
 */

import { exec } from '../../utils/exec.js';
import { commandExists } from '../../utils/which.js';
import type { InstallOptions, InstallResult, PackageManager, QueryResult } from '../types.js';

export interface SnapOptions {
  installTimeoutMs: number;
  /** Snaps that need --classic confinement */
  classicSnaps?: string[];
}

export class SnapPackageManager implements PackageManager {
  readonly name = 'snap' as const;
  readonly binary = 'snap';

  constructor(private readonly options: SnapOptions) {}

  async isAvailable(): Promise<boolean> {
    return commandExists('snap');
  }

  async query(id: string, timeoutMs: number): Promise<QueryResult> {
    const result = await exec('snap', ['list', id], { timeout: timeoutMs });
    return { code: result.code, output: [result.stdout, result.stderr].filter(Boolean).join('\n') };
  }

  async install(id: string, _options: InstallOptions): Promise<InstallResult> {
    const args = ['install', id];
    if (this.options.classicSnaps?.includes(id)) {
      args.push('--classic');
    }

    const result = await exec('snap', args, { timeout: this.options.installTimeoutMs });
    return {
      success: result.code === 0,
      output: result.code === 0 ? result.stdout : result.stderr || result.stdout,
    };
  }
}
