/**
 * Library entry point
 */

export * from './provision/types.js';
export { InstallationStateResolver, validateToolSpec } from './provision/resolver.js';
export type { ResolverOptions } from './provision/resolver.js';
export { LocalCommandProbe } from './provision/probes/local-command.probe.js';
export { PackageManagerQueryProbe } from './provision/probes/package-manager.probe.js';
export { RegistryScanProbe } from './provision/probes/registry-scan.probe.js';
export { runProvisioning, createResolver, checkEnvironment } from './provision/runner.js';
export type { RunOptions, RunReporter } from './provision/runner.js';
export { createPlatformProfile, detectPlatform } from './provision/platform.js';
export { renderSummary } from './provision/report.js';
export * from './provision/catalog.js';
export { ConfigLoader, DEFAULT_CONFIG } from './utils/config.js';
export type { DevprovConfigOptions, PartialConfig, PlatformName } from './env/types.js';
export * from './utils/errors.js';
