/**
 * winget adapter (Windows)
 */

import { exec } from '../../utils/exec.js';
import { commandExists } from '../../utils/which.js';
import type { InstallOptions, InstallResult, PackageManager, QueryResult } from '../types.js';

const COMMON_FLAGS = ['--exact', '--accept-source-agreements', '--disable-interactivity'];

/**
 * winget exit codes that mean the package is already in place
 */
export const ALREADY_INSTALLED_CODES = new Set([
  0x8a15002b, // APPINSTALLER_CLI_ERROR_UPDATE_NOT_APPLICABLE
  0x8a150061, // APPINSTALLER_CLI_ERROR_PACKAGE_ALREADY_INSTALLED
]);

/**
 * Node reports Windows HRESULT exit codes as signed or unsigned depending on the path;
 * compare them as unsigned 32-bit values
 */
export function toUnsignedExitCode(code: number): number {
  return code >>> 0;
}

export function isInstallSuccess(code: number): boolean {
  return code === 0 || ALREADY_INSTALLED_CODES.has(toUnsignedExitCode(code));
}

export class WingetPackageManager implements PackageManager {
  readonly name = 'winget' as const;
  readonly binary = 'winget';

  constructor(private readonly installTimeoutMs: number) {}

  async isAvailable(): Promise<boolean> {
    return commandExists('winget');
  }

  async query(id: string, timeoutMs: number): Promise<QueryResult> {
    const result = await exec('winget', ['list', '--id', id, ...COMMON_FLAGS], { timeout: timeoutMs });
    return { code: result.code, output: [result.stdout, result.stderr].filter(Boolean).join('\n') };
  }

  async install(id: string, options: InstallOptions): Promise<InstallResult> {
    const first = await this.runInstall(id, options.machineWide);
    if (first.success || !options.machineWide) {
      return first;
    }

    // Some packages ship only per-user installers
    if (/no applicable installer/i.test(first.output)) {
      return this.runInstall(id, false);
    }
    return first;
  }

  private async runInstall(id: string, machineWide: boolean): Promise<InstallResult> {
    const args = [
      'install',
      '--id', id,
      '--silent',
      '--accept-package-agreements',
      ...COMMON_FLAGS,
    ];
    if (machineWide) {
      args.push('--scope', 'machine');
    }

    const result = await exec('winget', args, { timeout: this.installTimeoutMs });
    const output = [result.stdout, result.stderr].filter(Boolean).join('\n');
    return { success: isInstallSuccess(result.code), output };
  }
}
