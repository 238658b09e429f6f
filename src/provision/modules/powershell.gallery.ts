/**
 * PowerShell module listing and installation through pwsh / Windows PowerShell
 */

import { exec, type ExecResult } from '../../utils/exec.js';
import { ConfigurationError, ProbeError } from '../../utils/errors.js';
import { commandExists } from '../../utils/which.js';
import type { InstallResult, InstalledModule, ModuleGallery } from '../types.js';

const MODULE_NAME_PATTERN = /^[A-Za-z0-9][A-Za-z0-9._-]*$/;
const FIELD_SEPARATOR = '|';

export interface PowerShellGalleryOptions {
  /** 'pwsh' for PowerShell 7, 'powershell' for Windows PowerShell 5.1 */
  shell: string;
  commandTimeoutMs: number;
  installTimeoutMs: number;
}

function assertModuleName(name: string): void {
  if (!MODULE_NAME_PATTERN.test(name)) {
    throw new ConfigurationError(`Invalid PowerShell module name: "${name}"`);
  }
}

export function buildListScript(name: string): string {
  assertModuleName(name);
  return (
    `Get-Module -ListAvailable -Name '${name}' | ForEach-Object { ` +
    `"$($_.Name)${FIELD_SEPARATOR}$($_.Version)${FIELD_SEPARATOR}$($_.ModuleBase)" }`
  );
}

export function buildInstallScript(name: string, allUsers: boolean): string {
  assertModuleName(name);
  const scope = allUsers ? 'AllUsers' : 'CurrentUser';
  return [
    "$ErrorActionPreference = 'Stop'",
    'Set-PSRepository -Name PSGallery -InstallationPolicy Trusted',
    `Install-Module -Name '${name}' -Scope ${scope} -Force -AllowClobber -Confirm:$false`,
  ].join('; ');
}

/**
 * Parse `Name|Version|ModuleBase` lines; anything else is noise from profiles or warnings
 */
export function parseModuleList(output: string): InstalledModule[] {
  const modules: InstalledModule[] = [];
  for (const line of output.split(/\r?\n/)) {
    const parts = line.trim().split(FIELD_SEPARATOR);
    if (parts.length !== 3 || parts.some(part => part.length === 0)) {
      continue;
    }
    const [name, version, path] = parts;
    modules.push({ name, version, path });
  }
  return modules;
}

export class PowerShellGallery implements ModuleGallery {
  constructor(private readonly options: PowerShellGalleryOptions) {}

  get shell(): string {
    return this.options.shell;
  }

  async isAvailable(): Promise<boolean> {
    return commandExists(this.options.shell);
  }

  async list(name: string): Promise<InstalledModule[]> {
    const result = await this.runScript(buildListScript(name), this.options.commandTimeoutMs);
    if (result.code !== 0) {
      throw new ProbeError('module-gallery', `${this.options.shell} exited with code ${result.code}: ${result.stderr}`);
    }
    return parseModuleList(result.stdout);
  }

  async install(name: string, options: { allUsers: boolean }): Promise<InstallResult> {
    const result = await this.runScript(buildInstallScript(name, options.allUsers), this.options.installTimeoutMs);
    return {
      success: result.code === 0,
      output: result.code === 0 ? result.stdout : result.stderr || result.stdout,
    };
  }

  private runScript(script: string, timeout: number): Promise<ExecResult> {
    return exec(this.options.shell, ['-NoProfile', '-NonInteractive', '-Command', script], { timeout });
  }
}
