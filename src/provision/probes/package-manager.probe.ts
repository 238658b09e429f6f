/**
 * Step 2: ask the package manager about each candidate id, time-bounded
 */

import { ProcessTimeoutError, ProbeError, getErrorMessage } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';
import type { PackageManager, Probe, ProbeOutcome, ToolSpec } from '../types.js';

export type ManagerLookup = (tool: ToolSpec) => PackageManager | undefined;

/**
 * Exit code 0 and the candidate id somewhere in the output
 */
export function isQueryHit(id: string, code: number, output: string): boolean {
  return code === 0 && output.toLowerCase().includes(id.toLowerCase());
}

export class PackageManagerQueryProbe implements Probe {
  readonly source = 'package-manager-query' as const;

  constructor(private readonly managerFor: ManagerLookup) {}

  async run(tool: ToolSpec, timeoutMs: number): Promise<ProbeOutcome> {
    const manager = this.managerFor(tool);
    if (!manager) {
      return { kind: 'inconclusive', reason: 'no package manager for this tool' };
    }
    if (tool.candidateIds.length === 0) {
      return { kind: 'inconclusive', reason: 'no candidate ids' };
    }

    for (const id of tool.candidateIds) {
      try {
        const result = await manager.query(id, timeoutMs);
        if (isQueryHit(id, result.code, result.output)) {
          return { kind: 'installed', detail: id };
        }
        logger.debug(`${manager.name} has no match for ${id}`, { code: result.code });
      } catch (error) {
        if (error instanceof ProcessTimeoutError) {
          // A stalled manager will stall for the remaining candidates as well
          logger.debug(`${manager.name} query for ${id} timed out after ${timeoutMs}ms`);
          return { kind: 'inconclusive', reason: `${manager.name} query timed out` };
        }
        const probeError = new ProbeError(this.source, `${manager.name} query for ${id}: ${getErrorMessage(error)}`);
        logger.debug(probeError.message);
      }
    }

    return { kind: 'inconclusive', reason: `${manager.name} lists none of ${tool.candidateIds.join(', ')}` };
  }
}
