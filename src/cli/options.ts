/**
 * Translate commander flags into config overrides
 */

import type { PartialConfig, PlatformName } from '../env/types.js';
import { isPlatformName } from '../env/types.js';
import { ConfigurationError } from '../utils/errors.js';

export interface CommonCliOptions {
  tools?: string;
  skipModules?: boolean;
  platform?: string;
  debug?: boolean;
}

export interface SetupCliOptions extends CommonCliOptions {
  skipFeatures?: boolean;
  /** commander sets this to false for --no-upgrade */
  upgrade?: boolean;
  yes?: boolean;
}

export function parsePlatformOption(value: string): PlatformName {
  if (!isPlatformName(value)) {
    throw new ConfigurationError(`--platform must be "ubuntu" or "windows", got "${value}"`);
  }
  return value;
}

/**
 * Flags that were not given stay undefined so lower-priority config sources still apply
 */
export function toConfigOverrides(options: SetupCliOptions): PartialConfig {
  const overrides: PartialConfig = {};

  if (options.tools !== undefined) {
    overrides.tools = options.tools.split(',').map(t => t.trim()).filter(t => t.length > 0);
  }
  if (options.skipModules) overrides.skipModules = true;
  if (options.skipFeatures) overrides.skipFeatures = true;
  if (options.upgrade === false) overrides.upgradeSystem = false;
  if (options.debug) overrides.debug = true;

  if (options.platform !== undefined) {
    overrides.platform = parsePlatformOption(options.platform);
  }

  return overrides;
}
