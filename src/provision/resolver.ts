/**
 * Installation-state resolver
 *
 * Decides whether a tool is present by running its probes in order
 * (local command, package-manager query, installed-software manifest) and
 * stopping at the first positive answer. Probe failures never escape: they
 * degrade to "inconclusive" and the next probe runs.
 */

import { ConfigurationError, InstallError, getErrorMessage } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import { normalizePathSeparators } from '../utils/paths.js';
import { highestVersion } from '../utils/version-utils.js';
import type {
  InstallResult,
  InstalledModule,
  ModuleGallery,
  ModuleResolutionResult,
  ModuleSpec,
  PackageManager,
  Probe,
  ProbeOutcome,
  ResolutionResult,
  ToolSpec,
} from './types.js';

export interface ResolverOptions {
  probes: Probe[];
  managerFor: (tool: ToolSpec) => PackageManager | undefined;
  gallery?: ModuleGallery;
  queryTimeoutMs: number;
}

/**
 * A tool must be discoverable either by package id or by command
 */
export function validateToolSpec(tool: ToolSpec): void {
  if (tool.candidateIds.length === 0 && !tool.localCommand) {
    throw new ConfigurationError(`${tool.friendlyName}: needs at least one candidate id or a local command`);
  }
}

function isUnderPath(modulePath: string, fragment: string): boolean {
  const haystack = normalizePathSeparators(modulePath).toLowerCase();
  const needle = normalizePathSeparators(fragment).toLowerCase();
  return haystack.includes(needle);
}

export class InstallationStateResolver {
  private readonly probes: Probe[];
  private readonly managerFor: (tool: ToolSpec) => PackageManager | undefined;
  private readonly gallery?: ModuleGallery;
  private readonly queryTimeoutMs: number;

  constructor(options: ResolverOptions) {
    this.probes = options.probes;
    this.managerFor = options.managerFor;
    this.gallery = options.gallery;
    this.queryTimeoutMs = options.queryTimeoutMs;
  }

  async resolve(tool: ToolSpec, timeoutMs: number = this.queryTimeoutMs): Promise<ResolutionResult> {
    validateToolSpec(tool);

    for (const probe of this.probes) {
      let outcome: ProbeOutcome;
      try {
        outcome = await probe.run(tool, timeoutMs);
      } catch (error) {
        logger.debug(`${probe.source} probe threw for ${tool.friendlyName}`, { error: getErrorMessage(error) });
        continue;
      }

      if (outcome.kind === 'installed') {
        logger.debug(`${tool.friendlyName}: installed (${probe.source})`, { detail: outcome.detail ?? null });
        return {
          tool,
          status: 'installed',
          source: probe.source,
          ...(outcome.detail !== undefined ? { detail: outcome.detail } : {}),
        };
      }

      logger.debug(`${tool.friendlyName}: ${probe.source} inconclusive`, { reason: outcome.reason ?? null });
    }

    return { tool, status: 'not-installed', source: 'none' };
  }

  /**
   * Resolve, install the first candidate that installs cleanly, then confirm once.
   * Throws InstallError when nothing could be installed or the tool is still missing.
   */
  async ensureInstalled(tool: ToolSpec): Promise<ResolutionResult> {
    const current = await this.resolve(tool);
    if (current.status === 'installed') {
      return current;
    }

    const manager = this.managerFor(tool);
    if (!manager) {
      throw new InstallError(tool.friendlyName, 'no package manager is configured for it');
    }
    if (tool.candidateIds.length === 0) {
      throw new InstallError(tool.friendlyName, 'no package id to install');
    }

    const failures: string[] = [];
    let installedId: string | undefined;

    for (const id of tool.candidateIds) {
      logger.debug(`Installing ${tool.friendlyName} via ${manager.name}`, { id });
      try {
        const result = await manager.install(id, { machineWide: true, tool });
        if (result.success) {
          installedId = id;
          break;
        }
        failures.push(`${id}: ${result.output || 'install reported failure'}`);
      } catch (error) {
        failures.push(`${id}: ${getErrorMessage(error)}`);
      }
      logger.debug(`Candidate ${id} failed for ${tool.friendlyName}`);
    }

    if (!installedId) {
      throw new InstallError(tool.friendlyName, `every candidate failed (${failures.join('; ')})`);
    }

    const confirmed = await this.resolve(tool);
    if (confirmed.status !== 'installed') {
      throw new InstallError(tool.friendlyName, `${manager.name} installed ${installedId} but it is still not detected`);
    }
    return confirmed;
  }

  async resolveModule(module: ModuleSpec): Promise<ModuleResolutionResult> {
    const installed = await this.listModule(module.name);
    const paths = installed.map(m => m.path);

    if (installed.length === 0) {
      return { module, status: 'not-installed', source: 'none', paths };
    }

    const machineWide = installed.filter(m => isUnderPath(m.path, module.expectedPathFragment));
    if (machineWide.length === 0) {
      const version = highestVersion(installed.map(m => m.version));
      return {
        module,
        status: 'installed-wrong-scope',
        source: 'module-gallery',
        detail: `${version ? `${version} ` : ''}not under ${module.expectedPathFragment} (found: ${paths.join(', ')})`,
        paths,
      };
    }

    const version = highestVersion(machineWide.map(m => m.version));
    return {
      module,
      status: 'installed',
      source: 'module-gallery',
      ...(version ? { detail: version } : {}),
      paths,
    };
  }

  /**
   * Install a missing module for all users and confirm.
   * A copy in the wrong scope is reported as-is rather than reinstalled.
   */
  async ensureModule(module: ModuleSpec): Promise<ModuleResolutionResult> {
    const current = await this.resolveModule(module);
    if (current.status !== 'not-installed') {
      return current;
    }

    const gallery = this.requireGallery();
    let result: InstallResult;
    try {
      result = await gallery.install(module.name, { allUsers: true });
    } catch (error) {
      throw new InstallError(module.name, getErrorMessage(error));
    }
    if (!result.success) {
      throw new InstallError(module.name, result.output || 'Install-Module reported failure');
    }

    const confirmed = await this.resolveModule(module);
    if (confirmed.status === 'not-installed') {
      throw new InstallError(module.name, 'Install-Module succeeded but the module is still not listed');
    }
    return confirmed;
  }

  private async listModule(name: string): Promise<InstalledModule[]> {
    const gallery = this.requireGallery();
    try {
      return await gallery.list(name);
    } catch (error) {
      logger.debug(`Listing module ${name} failed`, { error: getErrorMessage(error) });
      return [];
    }
  }

  private requireGallery(): ModuleGallery {
    if (!this.gallery) {
      throw new ConfigurationError('No module gallery configured');
    }
    return this.gallery;
  }
}
