/**
 * Tools, PowerShell modules and OS features provisioned on each platform
 */

import type { PlatformName } from '../env/types.js';
import { ConfigurationError } from '../utils/errors.js';
import type { AptRepository, FeatureSpec, ModuleSpec, ToolSpec } from './types.js';

const MICROSOFT_KEY = 'https://packages.microsoft.com/keys/microsoft.asc';

const REPOSITORIES = {
  githubCli: {
    name: 'githubcli-archive-keyring',
    keyUrl: 'https://cli.github.com/packages/githubcli-archive-keyring.gpg',
    url: 'https://cli.github.com/packages',
    suite: 'stable',
    component: 'main',
  },
  vscode: {
    name: 'vscode',
    keyUrl: MICROSOFT_KEY,
    url: 'https://packages.microsoft.com/repos/code',
    suite: 'stable',
    component: 'main',
  },
  azureCli: {
    name: 'azure-cli',
    keyUrl: MICROSOFT_KEY,
    url: 'https://packages.microsoft.com/repos/azure-cli/',
    suite: '{codename}',
    component: 'main',
  },
  docker: {
    name: 'docker',
    keyUrl: 'https://download.docker.com/linux/ubuntu/gpg',
    url: 'https://download.docker.com/linux/ubuntu',
    suite: '{codename}',
    component: 'stable',
  },
} satisfies Record<string, AptRepository>;

export const UBUNTU_TOOLS: ToolSpec[] = [
  {
    id: 'git',
    friendlyName: 'Git',
    candidateIds: ['git'],
    localCommand: 'git',
    versionArgs: ['--version'],
    registryNamePattern: 'git',
  },
  {
    id: 'python',
    friendlyName: 'Python 3',
    candidateIds: ['python3'],
    localCommand: 'python3',
    versionArgs: ['--version'],
    registryNamePattern: 'python3',
    companionPackages: ['python3-pip', 'python3-venv'],
  },
  {
    id: 'gh',
    friendlyName: 'GitHub CLI',
    candidateIds: ['gh'],
    localCommand: 'gh',
    versionArgs: ['--version'],
    registryNamePattern: 'gh',
    aptRepository: REPOSITORIES.githubCli,
  },
  {
    id: 'vscode',
    friendlyName: 'VS Code',
    candidateIds: ['code'],
    localCommand: 'code',
    versionArgs: ['--version'],
    registryNamePattern: 'code',
    aptRepository: REPOSITORIES.vscode,
  },
  {
    id: 'az',
    friendlyName: 'Azure CLI',
    candidateIds: ['azure-cli'],
    localCommand: 'az',
    versionArgs: ['--version'],
    registryNamePattern: 'azure-cli',
    aptRepository: REPOSITORIES.azureCli,
  },
  {
    // Installed by the Azure CLI into its own directory, so not on PATH
    id: 'bicep',
    friendlyName: 'Bicep CLI',
    candidateIds: ['bicep'],
    packageManager: 'az-cli',
  },
  {
    id: 'pwsh',
    friendlyName: 'PowerShell 7',
    candidateIds: ['powershell'],
    localCommand: 'pwsh',
    versionArgs: ['--version'],
    registryNamePattern: 'powershell*',
    packageManager: 'snap',
  },
  {
    id: 'docker',
    friendlyName: 'Docker Engine',
    candidateIds: ['docker-ce'],
    localCommand: 'docker',
    versionArgs: ['--version'],
    registryNamePattern: 'docker-ce',
    aptRepository: REPOSITORIES.docker,
    companionPackages: ['docker-ce-cli', 'containerd.io', 'docker-buildx-plugin', 'docker-compose-plugin'],
  },
];

export const WINDOWS_TOOLS: ToolSpec[] = [
  {
    id: 'git',
    friendlyName: 'Git',
    candidateIds: ['Git.Git'],
    localCommand: 'git',
    versionArgs: ['--version'],
    registryNamePattern: 'Git',
  },
  {
    id: 'python',
    friendlyName: 'Python 3',
    candidateIds: ['Python.Python.3.12', 'Python.Python.3.11'],
    localCommand: 'python',
    versionArgs: ['--version'],
    registryNamePattern: 'Python 3.*',
  },
  {
    id: 'gh',
    friendlyName: 'GitHub CLI',
    candidateIds: ['GitHub.cli'],
    localCommand: 'gh',
    versionArgs: ['--version'],
    registryNamePattern: 'GitHub CLI',
  },
  {
    id: 'vscode',
    friendlyName: 'VS Code',
    candidateIds: ['Microsoft.VisualStudioCode'],
    localCommand: 'code',
    versionArgs: ['--version'],
    registryNamePattern: 'Microsoft Visual Studio Code*',
  },
  {
    id: 'az',
    friendlyName: 'Azure CLI',
    candidateIds: ['Microsoft.AzureCLI'],
    localCommand: 'az',
    versionArgs: ['--version'],
    registryNamePattern: 'Microsoft Azure CLI*',
  },
  {
    id: 'bicep',
    friendlyName: 'Bicep CLI',
    candidateIds: ['Microsoft.Bicep'],
    localCommand: 'bicep',
    versionArgs: ['--version'],
    registryNamePattern: 'Bicep*',
  },
  {
    id: 'pwsh',
    friendlyName: 'PowerShell 7',
    candidateIds: ['Microsoft.PowerShell'],
    localCommand: 'pwsh',
    versionArgs: ['--version'],
    registryNamePattern: 'PowerShell 7*',
  },
  {
    id: 'docker',
    friendlyName: 'Docker Desktop',
    candidateIds: ['Docker.DockerDesktop'],
    localCommand: 'docker',
    versionArgs: ['--version'],
    registryNamePattern: 'Docker Desktop',
  },
];

export const POWERSHELL_MODULES = ['Az', 'Microsoft.Graph', 'PnP.PowerShell'];

/**
 * AllUsers module directories
 */
export const MACHINE_MODULE_PATHS = {
  linux: '/usr/local/share/powershell/Modules',
  pwshWindows: 'Program Files\\PowerShell\\Modules',
  windowsPowerShell: 'Program Files\\WindowsPowerShell\\Modules',
} as const;

export const UBUNTU_FEATURES: FeatureSpec[] = [
  { id: 'docker', friendlyName: 'docker group membership' },
];

export const WINDOWS_FEATURES: FeatureSpec[] = [
  { id: 'Microsoft-Windows-Subsystem-Linux', friendlyName: 'Windows Subsystem for Linux' },
  { id: 'VirtualMachinePlatform', friendlyName: 'Virtual Machine Platform' },
  { id: 'Containers', friendlyName: 'Containers' },
];

export function getTools(platform: PlatformName): ToolSpec[] {
  return platform === 'windows' ? WINDOWS_TOOLS : UBUNTU_TOOLS;
}

export function getFeatures(platform: PlatformName): FeatureSpec[] {
  return platform === 'windows' ? WINDOWS_FEATURES : UBUNTU_FEATURES;
}

export function getModules(expectedPathFragment: string): ModuleSpec[] {
  return POWERSHELL_MODULES.map(name => ({ name, expectedPathFragment }));
}

/**
 * Keep only the requested tool ids, in catalog order. Empty selection keeps everything.
 */
export function filterTools(tools: ToolSpec[], ids: string[]): ToolSpec[] {
  if (ids.length === 0) {
    return tools;
  }

  const known = new Set(tools.map(t => t.id));
  const unknown = ids.filter(id => !known.has(id));
  if (unknown.length > 0) {
    throw new ConfigurationError(
      `Unknown tool(s): ${unknown.join(', ')}. Available tools: ${[...known].join(', ')}`
    );
  }

  const wanted = new Set(ids);
  return tools.filter(t => wanted.has(t.id));
}
