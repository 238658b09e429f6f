/**
 * Configuration types for devprov
 */

export const PLATFORM_NAMES = ['ubuntu', 'windows'] as const;

export type PlatformName = (typeof PLATFORM_NAMES)[number];

export interface DevprovConfigOptions {
  /** Wall-clock limit for a single package-manager query */
  queryTimeoutMs: number;
  /** Limit applied to every other probe and helper command */
  commandTimeoutMs: number;
  /** Limit for a single install invocation */
  installTimeoutMs: number;
  /** Run a full system upgrade before installing (Ubuntu only) */
  upgradeSystem: boolean;
  skipModules: boolean;
  skipFeatures: boolean;
  /** Restrict the run to these tool ids; empty means all */
  tools: string[];
  /** Force a platform profile instead of detecting it */
  platform?: PlatformName;
  debug: boolean;
}

/**
 * Shape accepted from config files, env vars and CLI flags
 */
export type PartialConfig = Partial<DevprovConfigOptions>;

export function isPlatformName(value: unknown): value is PlatformName {
  return PLATFORM_NAMES.some(name => name === value);
}
