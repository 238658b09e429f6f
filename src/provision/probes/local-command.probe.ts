/**
 * Step 1: ask the tool itself for its version
 */

import { exec } from '../../utils/exec.js';
import { ProcessTimeoutError, getErrorMessage, isCommandNotFound } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';
import type { Probe, ProbeOutcome, ToolSpec } from '../types.js';

export const DEFAULT_VERSION_ARGS = ['--version'];

/**
 * First non-empty line of a command's output, trimmed
 */
export function firstLine(output: string): string {
  return output
    .split(/\r?\n|\r/)
    .map(line => line.trim())
    .find(line => line.length > 0) ?? '';
}

export class LocalCommandProbe implements Probe {
  readonly source = 'local-command' as const;

  /**
   * @param commandTimeoutMs - limit for the version query; independent of the package-manager query timeout
   */
  constructor(private readonly commandTimeoutMs: number) {}

  async run(tool: ToolSpec): Promise<ProbeOutcome> {
    if (!tool.localCommand) {
      return { kind: 'inconclusive', reason: 'no local command' };
    }

    const args = tool.versionArgs ?? DEFAULT_VERSION_ARGS;
    try {
      const result = await exec(tool.localCommand, args, {
        timeout: this.commandTimeoutMs,
        // .cmd shims (code, az) only start through cmd.exe
        shell: process.platform === 'win32',
      });

      if (result.code !== 0) {
        return { kind: 'inconclusive', reason: `${tool.localCommand} exited with code ${result.code}` };
      }

      // Some tools (older python) print their version on stderr
      const detail = firstLine(result.stdout) || firstLine(result.stderr);
      return detail ? { kind: 'installed', detail } : { kind: 'installed' };
    } catch (error) {
      if (isCommandNotFound(error)) {
        return { kind: 'inconclusive', reason: `${tool.localCommand} not found on PATH` };
      }
      if (error instanceof ProcessTimeoutError) {
        return { kind: 'inconclusive', reason: error.message };
      }
      logger.debug(`Local command probe failed for ${tool.friendlyName}`, { error: getErrorMessage(error) });
      return { kind: 'inconclusive', reason: getErrorMessage(error) };
    }
  }
}
