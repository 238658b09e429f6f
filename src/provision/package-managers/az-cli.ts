/**
 * Azure CLI as an installer for its own add-on tools (`az bicep install`)
 */

import { exec } from '../../utils/exec.js';
import { commandExists } from '../../utils/which.js';
import type { InstallOptions, InstallResult, PackageManager, QueryResult } from '../types.js';

export class AzCliPackageManager implements PackageManager {
  readonly name = 'az-cli' as const;
  readonly binary = 'az';

  constructor(private readonly installTimeoutMs: number) {}

  async isAvailable(): Promise<boolean> {
    return commandExists('az');
  }

  async query(id: string, timeoutMs: number): Promise<QueryResult> {
    const result = await exec('az', [id, 'version'], {
      timeout: timeoutMs,
      shell: process.platform === 'win32',
    });
    return { code: result.code, output: [result.stdout, result.stderr].filter(Boolean).join('\n') };
  }

  async install(id: string, _options: InstallOptions): Promise<InstallResult> {
    const result = await exec('az', [id, 'install'], {
      timeout: this.installTimeoutMs,
      shell: process.platform === 'win32',
    });
    return {
      success: result.code === 0,
      output: result.code === 0 ? result.stdout : result.stderr || result.stdout,
    };
  }
}
