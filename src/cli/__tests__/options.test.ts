import { describe, it, expect } from 'vitest';
import { ConfigurationError } from '../../utils/errors.js';
import { parsePlatformOption, toConfigOverrides } from '../options.js';

describe('toConfigOverrides', () => {
  it('should leave flags that were not given undefined', () => {
    expect(toConfigOverrides({})).toEqual({});
  });

  it('should treat commander defaults for --no-upgrade correctly', () => {
    expect(toConfigOverrides({ upgrade: true })).toEqual({});
    expect(toConfigOverrides({ upgrade: false })).toEqual({ upgradeSystem: false });
  });

  it('should split the tool list and map the switches', () => {
    expect(toConfigOverrides({
      tools: 'git, gh,,pwsh',
      skipModules: true,
      skipFeatures: true,
      debug: true,
      platform: 'ubuntu',
      yes: true,
    })).toEqual({
      tools: ['git', 'gh', 'pwsh'],
      skipModules: true,
      skipFeatures: true,
      debug: true,
      platform: 'ubuntu',
    });
  });

  it('should reject an unknown platform', () => {
    expect(() => parsePlatformOption('fedora')).toThrow(ConfigurationError);
    expect(() => toConfigOverrides({ platform: 'macos' })).toThrow('--platform must be "ubuntu" or "windows", got "macos"');
  });
});
