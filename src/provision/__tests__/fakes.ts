/**
 * In-memory stand-ins for the package manager, manifest, module gallery and
 * feature store interfaces
 */

import { ProcessTimeoutError } from '../../utils/errors.js';
import { matchesWildcard } from '../../utils/wildcard.js';
import type {
  FeatureResult,
  FeatureSpec,
  FeatureStore,
  InstallOptions,
  InstallResult,
  InstalledModule,
  InstalledSoftwareManifest,
  ModuleGallery,
  PackageManager,
  PackageManagerName,
  PlatformProfile,
  QueryResult,
  ToolSpec,
} from '../types.js';

export class FakePackageManager implements PackageManager {
  readonly binary: string;
  available = true;
  /** Never answer; reject with ProcessTimeoutError once timeoutMs elapses */
  stallQueries = false;
  readonly installed = new Set<string>();
  readonly failingInstalls = new Set<string>();
  /** Installs that report success but leave nothing behind */
  readonly phantomInstalls = new Set<string>();
  readonly queries: string[] = [];
  readonly installs: Array<{ id: string; options: InstallOptions }> = [];
  prepared = 0;

  constructor(readonly name: PackageManagerName = 'winget') {
    this.binary = name;
  }

  async isAvailable(): Promise<boolean> {
    return this.available;
  }

  async prepare(): Promise<void> {
    this.prepared++;
  }

  query(id: string, timeoutMs: number): Promise<QueryResult> {
    this.queries.push(id);
    if (this.stallQueries) {
      return new Promise((_resolve, reject) => {
        setTimeout(() => reject(new ProcessTimeoutError(`${this.name} list ${id}`, timeoutMs)), timeoutMs);
      });
    }
    if (this.installed.has(id)) {
      return Promise.resolve({ code: 0, output: `Name  Id  Version\nTool  ${id}  1.0.0` });
    }
    return Promise.resolve({ code: 1, output: 'No installed package found matching input criteria.' });
  }

  async install(id: string, options: InstallOptions): Promise<InstallResult> {
    this.installs.push({ id, options });
    if (this.failingInstalls.has(id)) {
      return { success: false, output: `installer for ${id} failed` };
    }
    if (!this.phantomInstalls.has(id)) {
      this.installed.add(id);
    }
    return { success: true, output: '' };
  }
}

export class FakeManifest implements InstalledSoftwareManifest {
  readonly name = 'fake manifest';
  scans = 0;

  constructor(public displayNames: string[] = []) {}

  async matches(pattern: string): Promise<boolean> {
    this.scans++;
    return this.displayNames.some(name => matchesWildcard(name, pattern));
  }
}

export class FakeGallery implements ModuleGallery {
  readonly shell = 'pwsh';
  available = true;
  failInstall = false;
  readonly installs: Array<{ name: string; allUsers: boolean }> = [];

  constructor(
    public modules: InstalledModule[] = [],
    private readonly installRoot = '/usr/local/share/powershell/Modules'
  ) {}

  async isAvailable(): Promise<boolean> {
    return this.available;
  }

  async list(name: string): Promise<InstalledModule[]> {
    return this.modules.filter(m => m.name === name);
  }

  async install(name: string, options: { allUsers: boolean }): Promise<InstallResult> {
    this.installs.push({ name, allUsers: options.allUsers });
    if (this.failInstall) {
      return { success: false, output: 'PSGallery unreachable' };
    }
    this.modules.push({ name, version: '1.0.0', path: `${this.installRoot}/${name}/1.0.0` });
    return { success: true, output: '' };
  }
}

export class FakeFeatureStore implements FeatureStore {
  readonly enabled: string[] = [];

  constructor(private readonly results: Record<string, Omit<FeatureResult, 'feature'>> = {}) {}

  async enable(feature: FeatureSpec): Promise<FeatureResult> {
    this.enabled.push(feature.id);
    const result = this.results[feature.id] ?? { status: 'already-enabled', rebootRequired: false };
    return { feature, ...result };
  }
}

export function toolSpec(overrides: Partial<ToolSpec> & Pick<ToolSpec, 'friendlyName'>): ToolSpec {
  return {
    id: overrides.friendlyName.toLowerCase().replace(/\s+/g, '-'),
    candidateIds: [],
    ...overrides,
  };
}

export interface FakeProfile extends PlatformProfile {
  manager: FakePackageManager;
  fakeManifest: FakeManifest;
  fakeGallery: FakeGallery;
  fakeFeatures: FakeFeatureStore;
}

export function fakeProfile(tools: ToolSpec[], overrides: Partial<PlatformProfile> = {}): FakeProfile {
  const manager = new FakePackageManager('winget');
  const manifest = new FakeManifest();
  const gallery = new FakeGallery();
  const featureStore = new FakeFeatureStore();

  return {
    name: 'windows',
    displayName: 'Windows',
    primaryManager: 'winget',
    managers: { winget: manager },
    requiredManagers: ['winget'],
    manifest,
    gallery,
    featureStore,
    tools,
    modules: [],
    features: [],
    ...overrides,
    manager,
    fakeManifest: manifest,
    fakeGallery: gallery,
    fakeFeatures: featureStore,
  };
}
