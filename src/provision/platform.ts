/**
 * Platform detection and per-platform adapter wiring
 */

import type { DevprovConfigOptions, PlatformName } from '../env/types.js';
import { EnvironmentError } from '../utils/errors.js';
import { commandExists } from '../utils/which.js';
import { MACHINE_MODULE_PATHS, getFeatures, getModules, getTools } from './catalog.js';
import { DismFeatureStore } from './features/dism.feature-store.js';
import { LinuxGroupFeatureStore } from './features/linux-group.feature-store.js';
import { DpkgManifest } from './manifests/dpkg.manifest.js';
import { WindowsRegistryManifest } from './manifests/windows-registry.manifest.js';
import { PowerShellGallery } from './modules/powershell.gallery.js';
import { AptPackageManager } from './package-managers/apt.js';
import { AzCliPackageManager } from './package-managers/az-cli.js';
import { SnapPackageManager } from './package-managers/snap.js';
import { WingetPackageManager } from './package-managers/winget.js';
import type { PlatformProfile } from './types.js';

export interface ProfileOptions {
  /** Verification passes do not need root */
  requireRoot: boolean;
}

/**
 * Map the running OS onto a supported profile
 */
export function detectPlatform(platform: NodeJS.Platform = process.platform): PlatformName {
  if (platform === 'win32') {
    return 'windows';
  }
  if (platform === 'linux') {
    return 'ubuntu';
  }
  throw new EnvironmentError(
    `Unsupported platform: ${platform}`,
    'devprov provisions Ubuntu (apt/snap) and Windows (winget) machines'
  );
}

export function isRootUser(): boolean {
  return typeof process.getuid === 'function' && process.getuid() === 0;
}

export function createUbuntuProfile(
  config: DevprovConfigOptions,
  options: ProfileOptions
): PlatformProfile {
  return {
    name: 'ubuntu',
    displayName: 'Ubuntu',
    primaryManager: 'apt',
    managers: {
      apt: new AptPackageManager({
        commandTimeoutMs: config.commandTimeoutMs,
        installTimeoutMs: config.installTimeoutMs,
        upgradeSystem: config.upgradeSystem,
      }),
      snap: new SnapPackageManager({
        installTimeoutMs: config.installTimeoutMs,
        classicSnaps: ['powershell'],
      }),
      'az-cli': new AzCliPackageManager(config.installTimeoutMs),
    },
    requiredManagers: ['apt'],
    manifest: new DpkgManifest(config.commandTimeoutMs),
    gallery: new PowerShellGallery({
      shell: 'pwsh',
      commandTimeoutMs: config.commandTimeoutMs,
      installTimeoutMs: config.installTimeoutMs,
    }),
    featureStore: new LinuxGroupFeatureStore(process.env.SUDO_USER, config.commandTimeoutMs),
    tools: getTools('ubuntu'),
    modules: getModules(MACHINE_MODULE_PATHS.linux),
    features: getFeatures('ubuntu'),
    galleryInstalledByTools: true,
    async preflight() {
      if (options.requireRoot && !isRootUser()) {
        throw new EnvironmentError('Please run this command with sudo or as root.', 'sudo devprov setup');
      }
    },
  };
}

/**
 * PowerShell 7 is preferred for module work; Windows PowerShell keeps its own module root
 */
export async function createWindowsProfile(config: DevprovConfigOptions): Promise<PlatformProfile> {
  const hasPwsh = await commandExists('pwsh');
  const shell = hasPwsh ? 'pwsh' : 'powershell';
  const moduleRoot = hasPwsh ? MACHINE_MODULE_PATHS.pwshWindows : MACHINE_MODULE_PATHS.windowsPowerShell;

  return {
    name: 'windows',
    displayName: 'Windows',
    primaryManager: 'winget',
    managers: {
      winget: new WingetPackageManager(config.installTimeoutMs),
    },
    requiredManagers: ['winget'],
    manifest: new WindowsRegistryManifest(config.commandTimeoutMs),
    gallery: new PowerShellGallery({
      shell,
      commandTimeoutMs: config.commandTimeoutMs,
      installTimeoutMs: config.installTimeoutMs,
    }),
    featureStore: new DismFeatureStore(config.commandTimeoutMs, config.installTimeoutMs),
    tools: getTools('windows'),
    modules: getModules(moduleRoot),
    features: getFeatures('windows'),
  };
}

export async function createPlatformProfile(
  config: DevprovConfigOptions,
  options: ProfileOptions
): Promise<PlatformProfile> {
  const platform = config.platform ?? detectPlatform();
  return platform === 'windows'
    ? createWindowsProfile(config)
    : createUbuntuProfile(config, options);
}
