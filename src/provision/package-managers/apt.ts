/**
 * apt / dpkg adapter (Ubuntu)
 */

import { chmod, mkdir, writeFile } from 'fs/promises';
import path from 'path';
import { exec } from '../../utils/exec.js';
import { EnvironmentError } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';
import { commandExists } from '../../utils/which.js';
import type { AptRepository, InstallOptions, InstallResult, PackageManager, QueryResult } from '../types.js';

export const BASELINE_PACKAGES = [
  'curl',
  'wget',
  'gnupg',
  'lsb-release',
  'ca-certificates',
  'software-properties-common',
  'apt-transport-https',
];

const NONINTERACTIVE_ENV = { DEBIAN_FRONTEND: 'noninteractive' };

export interface AptOptions {
  commandTimeoutMs: number;
  installTimeoutMs: number;
  upgradeSystem: boolean;
  baselinePackages?: string[];
  keyringDir?: string;
  sourcesDir?: string;
}

/**
 * `deb [arch=amd64 signed-by=/etc/apt/keyrings/docker.gpg] https://... jammy stable`
 */
export function buildSourceLine(repo: AptRepository, arch: string, codename: string, keyringPath: string): string {
  const url = repo.url.replace('{codename}', codename);
  const suite = repo.suite.replace('{codename}', codename);
  return `deb [arch=${arch} signed-by=${keyringPath}] ${url} ${suite} ${repo.component}`;
}

/**
 * dpkg-query prints a status line even for removed packages; only
 * "install ok installed" counts
 */
export function isInstalledStatus(output: string): boolean {
  return output.split('\n').some(line => line.trim().startsWith('install ok installed'));
}

export class AptPackageManager implements PackageManager {
  readonly name = 'apt' as const;
  readonly binary = 'apt-get';

  private readonly keyringDir: string;
  private readonly sourcesDir: string;
  private readonly configuredRepositories = new Set<string>();

  constructor(private readonly options: AptOptions) {
    this.keyringDir = options.keyringDir ?? '/etc/apt/keyrings';
    this.sourcesDir = options.sourcesDir ?? '/etc/apt/sources.list.d';
  }

  async isAvailable(): Promise<boolean> {
    return (await commandExists('apt-get')) && (await commandExists('dpkg-query'));
  }

  async prepare(): Promise<void> {
    await this.runAptGet(['update', '-y'], 'refresh package lists');

    if (this.options.upgradeSystem) {
      await this.runAptGet(['upgrade', '-y'], 'upgrade the system');
    }

    const baseline = this.options.baselinePackages ?? BASELINE_PACKAGES;
    if (baseline.length > 0) {
      await this.runAptGet(['install', '-y', ...baseline], 'install baseline packages');
    }
  }

  async query(id: string, timeoutMs: number): Promise<QueryResult> {
    const result = await exec('dpkg-query', ['-W', '-f=${Status}\t${Package}\n', id], { timeout: timeoutMs });
    const output = [result.stdout, result.stderr].filter(Boolean).join('\n');

    if (result.code === 0 && !isInstalledStatus(result.stdout)) {
      return { code: 1, output };
    }
    return { code: result.code, output };
  }

  async install(id: string, options: InstallOptions): Promise<InstallResult> {
    const tool = options.tool;

    if (tool?.aptRepository) {
      await this.ensureRepository(tool.aptRepository);
    }

    const packages = [id, ...(tool?.companionPackages ?? [])];
    const result = await exec('apt-get', ['install', '-y', ...packages], {
      timeout: this.options.installTimeoutMs,
      env: NONINTERACTIVE_ENV,
    });

    return {
      success: result.code === 0,
      output: result.code === 0 ? result.stdout : result.stderr || result.stdout,
    };
  }

  /**
   * Import the repository key and write its .list file, then refresh the index.
   * Done at most once per repository per run.
   */
  async ensureRepository(repo: AptRepository): Promise<void> {
    if (this.configuredRepositories.has(repo.name)) {
      return;
    }

    const timeout = this.options.commandTimeoutMs;
    const arch = (await exec('dpkg', ['--print-architecture'], { timeout })).stdout.trim();
    const codename = (await exec('lsb_release', ['-cs'], { timeout })).stdout.trim();
    if (!arch || !codename) {
      throw new Error(`could not determine architecture/codename for the ${repo.name} repository`);
    }

    const keyringPath = path.join(this.keyringDir, `${repo.name}.gpg`);
    await mkdir(this.keyringDir, { recursive: true });

    logger.debug(`Adding apt repository ${repo.name}`, { keyUrl: repo.keyUrl, arch, codename });
    const keyResult = await exec(
      'bash',
      ['-c', `curl -fsSL "$KEY_URL" | gpg --dearmor --yes -o "$KEYRING"`],
      { timeout, env: { KEY_URL: repo.keyUrl, KEYRING: keyringPath } }
    );
    if (keyResult.code !== 0) {
      throw new Error(`could not import the ${repo.name} signing key: ${keyResult.stderr || keyResult.stdout}`);
    }
    await chmod(keyringPath, 0o644);

    const listPath = path.join(this.sourcesDir, `${repo.name}.list`);
    await writeFile(listPath, `${buildSourceLine(repo, arch, codename, keyringPath)}\n`, 'utf-8');

    const update = await exec('apt-get', ['update', '-y'], {
      timeout: this.options.installTimeoutMs,
      env: NONINTERACTIVE_ENV,
    });
    if (update.code !== 0) {
      throw new Error(`apt-get update failed after adding ${repo.name}: ${update.stderr || update.stdout}`);
    }

    this.configuredRepositories.add(repo.name);
  }

  private async runAptGet(args: string[], purpose: string): Promise<void> {
    logger.debug(`apt-get ${args.join(' ')}`);
    const result = await exec('apt-get', args, {
      timeout: this.options.installTimeoutMs,
      env: NONINTERACTIVE_ENV,
    });
    if (result.code !== 0) {
      throw new EnvironmentError(
        `apt-get could not ${purpose} (exit ${result.code})`,
        result.stderr || result.stdout
      );
    }
  }
}
