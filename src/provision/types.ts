/**
 * Provisioning types: tool/module descriptions, probe outcomes and the
 * adapter interfaces for package managers, manifests, module galleries
 * and OS features.
 */

import type { PlatformName } from '../env/types.js';

export type PackageManagerName = 'apt' | 'snap' | 'winget' | 'az-cli';

/**
 * Signed third-party apt source needed before a package can be installed
 */
export interface AptRepository {
  /** Base name for the keyring and .list files */
  name: string;
  keyUrl: string;
  /** Source URL; {codename} is replaced with `lsb_release -cs` */
  url: string;
  suite: string;
  component: string;
}

export interface ToolSpec {
  /** Stable key used by --tools filters */
  id: string;
  friendlyName: string;
  /** Package ids in preference order */
  candidateIds: string[];
  localCommand?: string;
  versionArgs?: string[];
  /** Wildcard pattern (`*`, `?`) matched against installed-software display names */
  registryNamePattern?: string;
  /** Adapter used to query/install candidates; defaults to the platform's primary manager */
  packageManager?: PackageManagerName;
  aptRepository?: AptRepository;
  /** Extra packages installed together with the chosen candidate */
  companionPackages?: string[];
}

export type ResolutionStatus = 'installed' | 'not-installed' | 'installed-wrong-scope' | 'check-needed';

export type ResolutionSource = 'local-command' | 'package-manager-query' | 'registry-scan' | 'none';

export interface ResolutionResult {
  tool: ToolSpec;
  status: ResolutionStatus;
  source: ResolutionSource;
  detail?: string;
}

export interface ModuleSpec {
  name: string;
  /** Path fragment that identifies the machine-wide (AllUsers) module directory */
  expectedPathFragment: string;
}

export interface InstalledModule {
  name: string;
  version: string;
  path: string;
}

export interface ModuleResolutionResult {
  module: ModuleSpec;
  status: Exclude<ResolutionStatus, 'check-needed'>;
  source: 'module-gallery' | 'none';
  detail?: string;
  paths: string[];
}

export type ProbeOutcome =
  | { kind: 'installed'; detail?: string }
  | { kind: 'inconclusive'; reason?: string };

/**
 * One signal source for installation state
 */
export interface Probe {
  readonly source: Exclude<ResolutionSource, 'none'>;
  run(tool: ToolSpec, timeoutMs: number): Promise<ProbeOutcome>;
}

export interface QueryResult {
  code: number;
  output: string;
}

export interface InstallResult {
  success: boolean;
  output: string;
}

export interface InstallOptions {
  machineWide: boolean;
  tool?: ToolSpec;
}

export interface PackageManager {
  readonly name: PackageManagerName;
  /** Binary whose absence is an environment failure */
  readonly binary: string;
  isAvailable(): Promise<boolean>;
  /** One-time setup before the first install (index refresh, baseline packages) */
  prepare?(): Promise<void>;
  /** Rejects with ProcessTimeoutError when the query outlives timeoutMs */
  query(id: string, timeoutMs: number): Promise<QueryResult>;
  install(id: string, options: InstallOptions): Promise<InstallResult>;
}

export interface InstalledSoftwareManifest {
  readonly name: string;
  matches(pattern: string): Promise<boolean>;
}

export interface ModuleGallery {
  readonly shell: string;
  isAvailable(): Promise<boolean>;
  list(name: string): Promise<InstalledModule[]>;
  install(name: string, options: { allUsers: boolean }): Promise<InstallResult>;
}

export interface FeatureSpec {
  id: string;
  friendlyName: string;
}

export type FeatureStatus = 'enabled' | 'already-enabled' | 'skipped' | 'failed';

export interface FeatureResult {
  feature: FeatureSpec;
  status: FeatureStatus;
  rebootRequired: boolean;
  detail?: string;
}

export interface FeatureStore {
  enable(feature: FeatureSpec): Promise<FeatureResult>;
}

/**
 * Everything a run needs for one operating system
 */
export interface PlatformProfile {
  name: PlatformName;
  displayName: string;
  primaryManager: PackageManagerName;
  managers: Partial<Record<PackageManagerName, PackageManager>>;
  /** Managers whose binaries must exist before any work starts */
  requiredManagers: PackageManagerName[];
  manifest: InstalledSoftwareManifest;
  gallery: ModuleGallery;
  featureStore: FeatureStore;
  tools: ToolSpec[];
  modules: ModuleSpec[];
  features: FeatureSpec[];
  /**
   * The module host is itself one of the tools (pwsh on Ubuntu), so it may only
   * appear during the tools phase and cannot be required up front
   */
  galleryInstalledByTools?: boolean;
  /** Extra checks before any work, e.g. root privileges */
  preflight?(): Promise<void>;
}

export type StatusLevel = 'OK' | 'WARN' | 'FAIL';

export interface StatusEntry {
  name: string;
  category: 'tool' | 'module' | 'feature';
  level: StatusLevel;
  detail?: string;
}

export interface RunSummary {
  platform: PlatformName;
  mode: RunMode;
  entries: StatusEntry[];
  rebootNeeded: boolean;
  failed: number;
  exitCode: number;
}

export type RunMode = 'install' | 'verify';
