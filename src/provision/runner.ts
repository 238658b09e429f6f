/**
 * Top-level provisioning run
 *
 * Phases run strictly in order: environment checks, package-manager
 * preparation, tools, OS features, PowerShell modules. Each tool, feature
 * and module is isolated: its failure becomes a FAIL entry and the run moves
 * on. Only an EnvironmentError stops the run.
 */

import { EnvironmentError, InstallError, getErrorMessage } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import { filterTools } from './catalog.js';
import { LocalCommandProbe } from './probes/local-command.probe.js';
import { PackageManagerQueryProbe } from './probes/package-manager.probe.js';
import { RegistryScanProbe } from './probes/registry-scan.probe.js';
import { featureEntry, installFailureEntry, moduleEntry, toolEntry } from './report.js';
import { InstallationStateResolver } from './resolver.js';
import type {
  PackageManager,
  PlatformProfile,
  RunMode,
  RunSummary,
  StatusEntry,
  ToolSpec,
} from './types.js';

export interface RunOptions {
  mode: RunMode;
  queryTimeoutMs: number;
  commandTimeoutMs: number;
  /** Tool ids to include; empty means all */
  tools: string[];
  skipModules: boolean;
  skipFeatures: boolean;
}

/**
 * Progress callbacks; the CLI drives spinners from these
 */
export interface RunReporter {
  onPhase?(title: string): void;
  onItemStart?(name: string): void;
  onItemDone?(entry: StatusEntry): void;
}

export function managerLookup(profile: PlatformProfile): (tool: ToolSpec) => PackageManager | undefined {
  return (tool) => profile.managers[tool.packageManager ?? profile.primaryManager];
}

export function createResolver(profile: PlatformProfile, options: Pick<RunOptions, 'queryTimeoutMs' | 'commandTimeoutMs'>): InstallationStateResolver {
  return new InstallationStateResolver({
    probes: [
      new LocalCommandProbe(options.commandTimeoutMs),
      new PackageManagerQueryProbe(managerLookup(profile)),
      new RegistryScanProbe(profile.manifest),
    ],
    managerFor: managerLookup(profile),
    gallery: profile.gallery,
    queryTimeoutMs: options.queryTimeoutMs,
  });
}

const MODULE_HOST_HINT = 'Install PowerShell 7 first or re-run with --skip-modules.';

/**
 * Fail fast when the installers themselves are missing
 */
export async function checkEnvironment(
  profile: PlatformProfile,
  options: Pick<RunOptions, 'mode' | 'skipModules'> = { mode: 'verify', skipModules: true }
): Promise<void> {
  if (profile.preflight) {
    await profile.preflight();
  }

  for (const name of profile.requiredManagers) {
    const manager = profile.managers[name];
    if (!manager || !(await manager.isAvailable())) {
      throw new EnvironmentError(
        `${manager?.binary ?? name} is not available on this ${profile.displayName} machine`,
        name === 'winget'
          ? 'Install "App Installer" from the Microsoft Store to get winget.'
          : `Make sure ${manager?.binary ?? name} is on PATH.`
      );
    }
  }

  const needsGallery = options.mode === 'install' && !options.skipModules && profile.modules.length > 0;
  if (needsGallery && !profile.galleryInstalledByTools && !(await profile.gallery.isAvailable())) {
    throw new EnvironmentError(
      `${profile.gallery.shell} is not available, so PowerShell modules cannot be installed`,
      MODULE_HOST_HINT
    );
  }
}

async function prepareManagers(profile: PlatformProfile): Promise<void> {
  for (const manager of Object.values(profile.managers)) {
    if (!manager?.prepare) continue;
    try {
      await manager.prepare();
    } catch (error) {
      if (error instanceof EnvironmentError) throw error;
      throw new EnvironmentError(`${manager.name} preparation failed: ${getErrorMessage(error)}`);
    }
  }
}

export async function runProvisioning(
  profile: PlatformProfile,
  options: RunOptions,
  reporter: RunReporter = {}
): Promise<RunSummary> {
  const entries: StatusEntry[] = [];
  // Folded from every feature result; nothing else can request a reboot
  let rebootNeeded = false;

  const record = (entry: StatusEntry): void => {
    entries.push(entry);
    reporter.onItemDone?.(entry);
  };

  await checkEnvironment(profile, options);

  const tools = filterTools(profile.tools, options.tools);
  const resolver = createResolver(profile, options);

  if (options.mode === 'install') {
    reporter.onPhase?.('Preparing package managers');
    await prepareManagers(profile);
  }

  reporter.onPhase?.(options.mode === 'install' ? 'Installing developer tools' : 'Checking developer tools');
  for (const tool of tools) {
    reporter.onItemStart?.(tool.friendlyName);
    try {
      const result = options.mode === 'install'
        ? await resolver.ensureInstalled(tool)
        : await resolver.resolve(tool);
      record(toolEntry(result, options.mode));
    } catch (error) {
      if (error instanceof EnvironmentError) throw error;
      if (error instanceof InstallError) {
        logger.debug(error.message);
        record(installFailureEntry(tool.friendlyName, 'tool', error.message));
      } else {
        record(toolEntry({
          tool,
          status: 'check-needed',
          source: 'none',
          detail: getErrorMessage(error),
        }, options.mode));
      }
    }
  }

  if (options.mode === 'install' && !options.skipFeatures) {
    reporter.onPhase?.('Enabling OS features');
    for (const feature of profile.features) {
      reporter.onItemStart?.(feature.friendlyName);
      try {
        const result = await profile.featureStore.enable(feature);
        rebootNeeded = rebootNeeded || result.rebootRequired;
        record(featureEntry(result));
      } catch (error) {
        record(installFailureEntry(feature.friendlyName, 'feature', getErrorMessage(error)));
      }
    }
  }

  if (!options.skipModules) {
    reporter.onPhase?.(options.mode === 'install' ? 'Installing PowerShell modules' : 'Checking PowerShell modules');
    const galleryAvailable = await profile.gallery.isAvailable();

    for (const module of profile.modules) {
      if (!galleryAvailable) {
        // Still missing after the tools phase: keep the run's results instead of aborting
        record(options.mode === 'install'
          ? installFailureEntry(module.name, 'module', `${profile.gallery.shell} not available. ${MODULE_HOST_HINT}`)
          : { name: module.name, category: 'module', level: 'WARN', detail: `${profile.gallery.shell} not available` });
        continue;
      }

      reporter.onItemStart?.(module.name);
      try {
        const result = options.mode === 'install'
          ? await resolver.ensureModule(module)
          : await resolver.resolveModule(module);
        record(moduleEntry(result, options.mode));
      } catch (error) {
        record(installFailureEntry(module.name, 'module', getErrorMessage(error)));
      }
    }
  }

  const failed = entries.filter(e => e.level === 'FAIL').length;
  return {
    platform: profile.name,
    mode: options.mode,
    entries,
    rebootNeeded,
    failed,
    exitCode: failed > 0 ? 1 : 0,
  };
}
