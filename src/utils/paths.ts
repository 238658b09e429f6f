/**
 * Locations of devprov's own files
 */

import os from 'os';
import path from 'path';

export const CONFIG_FILE_NAME = 'devprov.config.json';

/**
 * Global devprov directory (~/.devprov), overridable with DEVPROV_HOME
 */
export function getDevprovHome(): string {
  return process.env.DEVPROV_HOME || path.join(os.homedir(), '.devprov');
}

export function getDevprovPath(...segments: string[]): string {
  return path.join(getDevprovHome(), ...segments);
}

/**
 * Convert Windows separators to forward slashes so paths compare the same on every platform
 */
export function normalizePathSeparators(value: string): string {
  return value.replace(/\\/g, '/');
}
