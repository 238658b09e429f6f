/**
 * Step 3: look for a display name in the installed-software manifest
 */

import { ProbeError, getErrorMessage } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';
import type { InstalledSoftwareManifest, Probe, ProbeOutcome, ToolSpec } from '../types.js';

export class RegistryScanProbe implements Probe {
  readonly source = 'registry-scan' as const;

  constructor(private readonly manifest: InstalledSoftwareManifest) {}

  async run(tool: ToolSpec): Promise<ProbeOutcome> {
    if (!tool.registryNamePattern) {
      return { kind: 'inconclusive', reason: 'no registry pattern' };
    }

    try {
      if (await this.manifest.matches(tool.registryNamePattern)) {
        return { kind: 'installed' };
      }
      return { kind: 'inconclusive', reason: `no ${this.manifest.name} entry matches "${tool.registryNamePattern}"` };
    } catch (error) {
      const probeError = new ProbeError(this.source, `${this.manifest.name}: ${getErrorMessage(error)}`);
      logger.debug(probeError.message);
      return { kind: 'inconclusive', reason: probeError.message };
    }
  }
}
