import { describe, it, expect, beforeAll } from 'vitest';
import chalk from 'chalk';
import { featureEntry, formatEntry, moduleEntry, renderSummary, toolEntry } from '../report.js';
import type { ModuleResolutionResult, ResolutionResult, RunSummary } from '../types.js';
import { toolSpec } from './fakes.js';

describe('report', () => {
  beforeAll(() => {
    chalk.level = 0;
  });

  const git = toolSpec({ friendlyName: 'Git', localCommand: 'git' });

  describe('toolEntry', () => {
    it('should show the version and where it was found', () => {
      expect(toolEntry({ tool: git, status: 'installed', source: 'local-command', detail: 'git version 2.40.0' }, 'install'))
        .toEqual({ name: 'Git', category: 'tool', level: 'OK', detail: 'git version 2.40.0 (on PATH)' });
    });

    it('should fall back to the source label without a detail', () => {
      expect(toolEntry({ tool: git, status: 'installed', source: 'registry-scan' }, 'verify').detail)
        .toBe('installed software list');
    });

    it('should grade a missing tool by mode', () => {
      const missing: ResolutionResult = { tool: git, status: 'not-installed', source: 'none' };

      expect(toolEntry(missing, 'verify').level).toBe('WARN');
      expect(toolEntry(missing, 'install').level).toBe('FAIL');
    });

    it('should warn when the status could not be determined', () => {
      expect(toolEntry({ tool: git, status: 'check-needed', source: 'none' }, 'install'))
        .toEqual({ name: 'Git', category: 'tool', level: 'WARN', detail: 'could not determine status' });
    });
  });

  describe('moduleEntry', () => {
    const module = { name: 'Az', expectedPathFragment: '/usr/local/share/powershell/Modules' };

    it('should warn on a wrong-scope module', () => {
      expect(moduleEntry({ module, status: 'installed-wrong-scope', source: 'module-gallery', detail: 'user scope', paths: [] }, 'install').level)
        .toBe('WARN');
    });

    it('should grade a missing module by mode', () => {
      const missing: ModuleResolutionResult = { module, status: 'not-installed', source: 'none', paths: [] };

      expect(moduleEntry(missing, 'verify').level).toBe('WARN');
      expect(moduleEntry(missing, 'install').level).toBe('FAIL');
    });
  });

  describe('featureEntry', () => {
    const feature = { id: 'Containers', friendlyName: 'Containers' };

    it('should map feature statuses to levels', () => {
      expect(featureEntry({ feature, status: 'enabled', rebootRequired: true }))
        .toEqual({ name: 'Containers', category: 'feature', level: 'OK', detail: 'enabled' });
      expect(featureEntry({ feature, status: 'skipped', rebootRequired: false, detail: 'no user' }))
        .toEqual({ name: 'Containers', category: 'feature', level: 'WARN', detail: 'no user' });
      expect(featureEntry({ feature, status: 'failed', rebootRequired: false }))
        .toEqual({ name: 'Containers', category: 'feature', level: 'FAIL' });
    });
  });

  describe('formatEntry', () => {
    it('should print the symbol, name and detail', () => {
      expect(formatEntry({ name: 'Git', category: 'tool', level: 'OK', detail: '2.40.0' })).toBe('  ✓ Git - 2.40.0');
      expect(formatEntry({ name: 'Az', category: 'module', level: 'FAIL' })).toBe('  ✗ Az');
    });
  });

  describe('renderSummary', () => {
    const base: RunSummary = {
      platform: 'windows',
      mode: 'install',
      entries: [],
      rebootNeeded: false,
      failed: 0,
      exitCode: 0,
    };

    it('should group entries by category and flag a reboot', () => {
      const output = renderSummary({
        ...base,
        rebootNeeded: true,
        entries: [
          { name: 'Git', category: 'tool', level: 'OK', detail: '2.40.0' },
          { name: 'Containers', category: 'feature', level: 'OK', detail: 'enabled' },
        ],
      });

      expect(output.split('\n')).toEqual([
        '',
        'Summary:',
        'Developer tools:',
        '  ✓ Git - 2.40.0',
        'OS features:',
        '  ✓ Containers - enabled',
        '',
        '⚠ A reboot (or log out / log in) is required for some changes to take effect.',
        '✓ All checks passed!',
      ]);
    });

    it('should count failures', () => {
      const output = renderSummary({
        ...base,
        entries: [{ name: 'Az', category: 'module', level: 'FAIL', detail: 'PSGallery unreachable' }],
        failed: 1,
        exitCode: 1,
      });

      expect(output.split('\n').slice(-2)).toEqual(['✓ No reboot required.', '✗ 1 item(s) failed.']);
    });

    it('should count warnings and omit the reboot line when verifying', () => {
      const output = renderSummary({
        ...base,
        mode: 'verify',
        entries: [{ name: 'Git', category: 'tool', level: 'WARN', detail: 'not installed' }],
      });

      expect(output.split('\n').slice(-2)).toEqual(['', '⚠ Completed with 1 warning(s).']);
    });
  });
});
