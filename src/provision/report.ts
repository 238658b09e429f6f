/**
 * Status entries (OK / WARN / FAIL) and the printed summary
 */

import chalk from 'chalk';
import type {
  FeatureResult,
  ModuleResolutionResult,
  ResolutionResult,
  RunMode,
  RunSummary,
  StatusEntry,
  StatusLevel,
} from './types.js';

const SOURCE_LABELS: Record<ResolutionResult['source'], string> = {
  'local-command': 'on PATH',
  'package-manager-query': 'package manager',
  'registry-scan': 'installed software list',
  none: 'not found',
};

export function toolEntry(result: ResolutionResult, mode: RunMode): StatusEntry {
  const name = result.tool.friendlyName;

  switch (result.status) {
    case 'installed':
      return {
        name,
        category: 'tool',
        level: 'OK',
        detail: result.detail
          ? `${result.detail} (${SOURCE_LABELS[result.source]})`
          : SOURCE_LABELS[result.source],
      };
    case 'installed-wrong-scope':
      return { name, category: 'tool', level: 'WARN', detail: result.detail ?? 'installed for the current user only' };
    case 'check-needed':
      return { name, category: 'tool', level: 'WARN', detail: result.detail ?? 'could not determine status' };
    case 'not-installed':
      // A verification pass only reports; installing is what can fail
      return {
        name,
        category: 'tool',
        level: mode === 'verify' ? 'WARN' : 'FAIL',
        detail: 'not installed',
      };
  }
}

export function installFailureEntry(name: string, category: StatusEntry['category'], message: string): StatusEntry {
  return { name, category, level: 'FAIL', detail: message };
}

export function moduleEntry(result: ModuleResolutionResult, mode: RunMode): StatusEntry {
  const name = result.module.name;

  switch (result.status) {
    case 'installed':
      return { name, category: 'module', level: 'OK', detail: result.detail };
    case 'installed-wrong-scope':
      return { name, category: 'module', level: 'WARN', detail: result.detail };
    case 'not-installed':
      return {
        name,
        category: 'module',
        level: mode === 'verify' ? 'WARN' : 'FAIL',
        detail: 'not installed',
      };
  }
}

export function featureEntry(result: FeatureResult): StatusEntry {
  const name = result.feature.friendlyName;
  const levels: Record<FeatureResult['status'], StatusLevel> = {
    enabled: 'OK',
    'already-enabled': 'OK',
    skipped: 'WARN',
    failed: 'FAIL',
  };
  const defaultDetails: Partial<Record<FeatureResult['status'], string>> = {
    enabled: 'enabled',
    'already-enabled': 'already enabled',
  };
  const detail = result.detail ?? defaultDetails[result.status];

  return { name, category: 'feature', level: levels[result.status], ...(detail ? { detail } : {}) };
}

export function formatLevel(level: StatusLevel): string {
  switch (level) {
    case 'OK':
      return chalk.green('✓');
    case 'WARN':
      return chalk.yellow('⚠');
    case 'FAIL':
      return chalk.red('✗');
  }
}

export function formatEntryText(entry: StatusEntry): string {
  const detail = entry.detail ? ` ${chalk.dim(`- ${entry.detail}`)}` : '';
  return `${entry.name}${detail}`;
}

export function formatEntry(entry: StatusEntry): string {
  return `  ${formatLevel(entry.level)} ${formatEntryText(entry)}`;
}

const CATEGORY_TITLES: Record<StatusEntry['category'], string> = {
  tool: 'Developer tools',
  feature: 'OS features',
  module: 'PowerShell modules (AllUsers)',
};

export function renderSummary(summary: RunSummary): string {
  const lines: string[] = [chalk.bold('\nSummary:')];

  for (const category of ['tool', 'feature', 'module'] as const) {
    const entries = summary.entries.filter(e => e.category === category);
    if (entries.length === 0) continue;
    lines.push(chalk.bold(`${CATEGORY_TITLES[category]}:`));
    lines.push(...entries.map(formatEntry));
  }

  lines.push('');
  if (summary.rebootNeeded) {
    lines.push(chalk.yellow('⚠ A reboot (or log out / log in) is required for some changes to take effect.'));
  } else if (summary.mode === 'install') {
    lines.push(chalk.green('✓ No reboot required.'));
  }

  if (summary.failed > 0) {
    lines.push(chalk.red(`✗ ${summary.failed} item(s) failed.`));
  } else {
    const warnings = summary.entries.filter(e => e.level === 'WARN').length;
    lines.push(
      warnings > 0
        ? chalk.yellow(`⚠ Completed with ${warnings} warning(s).`)
        : chalk.green('✓ All checks passed!')
    );
  }

  return lines.join('\n');
}
