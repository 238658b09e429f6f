/**
 * Cross-platform PATH lookup
 *
 * Uses 'where' on Windows, 'which' on Unix systems
 */

import os from 'os';
import { exec } from './exec.js';

// Full path to where.exe avoids spawning through a shell (DEP0190)
const WINDOWS_WHERE = 'C:\\Windows\\System32\\where.exe';

function lookupCommand(): string {
  return os.platform() === 'win32' ? WINDOWS_WHERE : 'which';
}

/**
 * Check if a command is available in PATH
 *
 * @param command - Command name to check (e.g., 'apt-get', 'winget', 'pwsh')
 */
export async function commandExists(command: string): Promise<boolean> {
  return (await getCommandPath(command)) !== null;
}

/**
 * Get the full path to a command, or null if it is not on PATH
 */
export async function getCommandPath(command: string): Promise<string | null> {
  try {
    const result = await exec(lookupCommand(), [command], { timeout: 10000 });
    if (result.code !== 0) {
      return null;
    }

    // 'where' can print several matches; split on any line ending
    const paths = result.stdout
      .split(/\r?\n|\r/)
      .map(p => p.trim())
      .filter(p => p);
    return paths[0] || null;
  } catch {
    return null;
  }
}
