import * as fs from 'fs/promises';
import * as path from 'path';
import dotenv from 'dotenv';
import {
  DevprovConfigOptions,
  PartialConfig,
  isPlatformName,
} from '../env/types.js';
import { ConfigurationError } from './errors.js';
import { logger } from './logger.js';
import { CONFIG_FILE_NAME, getDevprovPath } from './paths.js';

export type { DevprovConfigOptions, PartialConfig };

export const DEFAULT_CONFIG: DevprovConfigOptions = {
  queryTimeoutMs: 8000,
  commandTimeoutMs: 30000,
  installTimeoutMs: 15 * 60 * 1000,
  upgradeSystem: true,
  skipModules: false,
  skipFeatures: false,
  tools: [],
  debug: false,
};

const LOCAL_CONFIG = path.join('.devprov', CONFIG_FILE_NAME);

function parseBoolean(value: string, key: string): boolean {
  const normalized = value.trim().toLowerCase();
  if (['1', 'true', 'yes', 'on'].includes(normalized)) return true;
  if (['0', 'false', 'no', 'off'].includes(normalized)) return false;
  throw new ConfigurationError(`${key} must be a boolean, got "${value}"`);
}

function parseTimeout(value: unknown, key: string): number {
  const parsed = typeof value === 'string' ? Number(value.trim()) : value;
  if (typeof parsed !== 'number' || !Number.isInteger(parsed) || parsed <= 0) {
    throw new ConfigurationError(`${key} must be a positive integer (milliseconds), got ${JSON.stringify(value)}`);
  }
  return parsed;
}

function parseList(value: string): string[] {
  return value.split(',').map(s => s.trim()).filter(s => s.length > 0);
}

/**
 * Unified configuration loader with priority system:
 * CLI args > Env vars > Project config > Global config > Defaults
 */
export class ConfigLoader {
  static async load(
    workingDir: string = process.cwd(),
    cliOverrides?: PartialConfig
  ): Promise<DevprovConfigOptions> {
    // 5. Built-in defaults (lowest priority)
    const config: DevprovConfigOptions = { ...DEFAULT_CONFIG, tools: [...DEFAULT_CONFIG.tools] };

    // 4. Global config (~/.devprov/devprov.config.json)
    const globalPath = getDevprovPath(CONFIG_FILE_NAME);
    Object.assign(config, await this.loadJsonConfig(globalPath));

    // 3. Project-local config (.devprov/devprov.config.json)
    Object.assign(config, await this.loadJsonConfig(path.join(workingDir, LOCAL_CONFIG)));

    // 2. Environment variables (load .env first if in project)
    const envPath = path.join(workingDir, '.env');
    try {
      await fs.access(envPath);
      dotenv.config({ path: envPath });
    } catch {
      // No .env file, that's fine
    }
    Object.assign(config, this.loadFromEnv());

    // 1. CLI arguments (highest priority)
    if (cliOverrides) {
      Object.assign(config, this.removeUndefined(cliOverrides));
    }

    return config;
  }

  /**
   * Load configuration from environment variables
   */
  static loadFromEnv(env: NodeJS.ProcessEnv = process.env): PartialConfig {
    const config: PartialConfig = {};

    if (env.DEVPROV_QUERY_TIMEOUT_MS) {
      config.queryTimeoutMs = parseTimeout(env.DEVPROV_QUERY_TIMEOUT_MS, 'DEVPROV_QUERY_TIMEOUT_MS');
    }
    if (env.DEVPROV_COMMAND_TIMEOUT_MS) {
      config.commandTimeoutMs = parseTimeout(env.DEVPROV_COMMAND_TIMEOUT_MS, 'DEVPROV_COMMAND_TIMEOUT_MS');
    }
    if (env.DEVPROV_INSTALL_TIMEOUT_MS) {
      config.installTimeoutMs = parseTimeout(env.DEVPROV_INSTALL_TIMEOUT_MS, 'DEVPROV_INSTALL_TIMEOUT_MS');
    }
    if (env.DEVPROV_UPGRADE_SYSTEM) {
      config.upgradeSystem = parseBoolean(env.DEVPROV_UPGRADE_SYSTEM, 'DEVPROV_UPGRADE_SYSTEM');
    }
    if (env.DEVPROV_SKIP_MODULES) {
      config.skipModules = parseBoolean(env.DEVPROV_SKIP_MODULES, 'DEVPROV_SKIP_MODULES');
    }
    if (env.DEVPROV_SKIP_FEATURES) {
      config.skipFeatures = parseBoolean(env.DEVPROV_SKIP_FEATURES, 'DEVPROV_SKIP_FEATURES');
    }
    if (env.DEVPROV_TOOLS) {
      config.tools = parseList(env.DEVPROV_TOOLS);
    }
    if (env.DEVPROV_PLATFORM) {
      if (!isPlatformName(env.DEVPROV_PLATFORM)) {
        throw new ConfigurationError(`DEVPROV_PLATFORM must be "ubuntu" or "windows", got "${env.DEVPROV_PLATFORM}"`);
      }
      config.platform = env.DEVPROV_PLATFORM;
    }
    if (env.DEVPROV_DEBUG) {
      config.debug = parseBoolean(env.DEVPROV_DEBUG, 'DEVPROV_DEBUG');
    }

    return config;
  }

  /**
   * Validate a parsed config file; unknown keys are ignored
   */
  static parseConfigObject(raw: unknown, source: string): PartialConfig {
    if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) {
      throw new ConfigurationError(`${source}: expected a JSON object`);
    }

    const config: PartialConfig = {};
    const entries = new Map<string, unknown>(Object.entries(raw));

    for (const key of ['queryTimeoutMs', 'commandTimeoutMs', 'installTimeoutMs'] as const) {
      if (entries.has(key)) {
        config[key] = parseTimeout(entries.get(key), `${source}: ${key}`);
      }
    }

    for (const key of ['upgradeSystem', 'skipModules', 'skipFeatures', 'debug'] as const) {
      if (entries.has(key)) {
        const value = entries.get(key);
        if (typeof value !== 'boolean') {
          throw new ConfigurationError(`${source}: ${key} must be a boolean`);
        }
        config[key] = value;
      }
    }

    if (entries.has('tools')) {
      const tools = entries.get('tools');
      if (!Array.isArray(tools) || !tools.every((t): t is string => typeof t === 'string')) {
        throw new ConfigurationError(`${source}: tools must be an array of tool ids`);
      }
      config.tools = tools;
    }

    if (entries.has('platform')) {
      const platform = entries.get('platform');
      if (!isPlatformName(platform)) {
        throw new ConfigurationError(`${source}: platform must be "ubuntu" or "windows"`);
      }
      config.platform = platform;
    }

    return config;
  }

  /**
   * Load JSON config file; a missing file yields an empty config
   */
  private static async loadJsonConfig(filePath: string): Promise<PartialConfig> {
    let content: string;
    try {
      content = await fs.readFile(filePath, 'utf-8');
    } catch {
      return {};
    }

    let raw: unknown;
    try {
      raw = JSON.parse(content);
    } catch (error) {
      throw new ConfigurationError(`${filePath}: invalid JSON (${error instanceof Error ? error.message : String(error)})`);
    }

    logger.debug(`Loaded config from ${filePath}`);
    return this.parseConfigObject(raw, filePath);
  }

  private static removeUndefined(config: PartialConfig): PartialConfig {
    const result: PartialConfig = {};
    for (const [key, value] of Object.entries(config)) {
      if (value !== undefined) {
        Object.assign(result, { [key]: value });
      }
    }
    return result;
  }
}
