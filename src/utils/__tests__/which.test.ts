/**
 * Tests for cross-platform command detection utilities
 * Validates path trimming for Windows \r\n line endings
 */

import { describe, it, expect, vi, afterEach } from 'vitest';
import { exec } from '../exec.js';
import { commandExists, getCommandPath } from '../which.js';

vi.mock('../exec.js', () => ({
  exec: vi.fn(),
}));

const execMock = vi.mocked(exec);

describe('getCommandPath', () => {
  afterEach(() => {
    vi.clearAllMocks();
  });

  it('should trim Windows-style line endings (\\r\\n)', async () => {
    execMock.mockResolvedValue({
      code: 0,
      stdout: 'C:\\Users\\test\\AppData\\Local\\Microsoft\\WindowsApps\\winget.exe\r\n',
      stderr: ''
    });

    const result = await getCommandPath('winget');

    expect(result).toBe('C:\\Users\\test\\AppData\\Local\\Microsoft\\WindowsApps\\winget.exe');
  });

  it('should return the first of several matches from where.exe', async () => {
    execMock.mockResolvedValue({
      code: 0,
      stdout: 'C:\\Program Files\\PowerShell\\7\\pwsh.exe\r\nC:\\Users\\test\\pwsh.exe\r\n',
      stderr: ''
    });

    const result = await getCommandPath('pwsh');

    expect(result).toBe('C:\\Program Files\\PowerShell\\7\\pwsh.exe');
  });

  it('should handle mixed and old Mac line endings', async () => {
    execMock.mockResolvedValueOnce({ code: 0, stdout: '/usr/bin/python3\r\n/usr/local/bin/python3\n', stderr: '' });
    execMock.mockResolvedValueOnce({ code: 0, stdout: '/usr/bin/git\r/usr/local/bin/git\r', stderr: '' });

    expect(await getCommandPath('python3')).toBe('/usr/bin/python3');
    expect(await getCommandPath('git')).toBe('/usr/bin/git');
  });

  it('should filter out empty lines', async () => {
    execMock.mockResolvedValue({
      code: 0,
      stdout: '\r\n\r\nC:\\Windows\\System32\\reg.exe\r\n\r\n',
      stderr: ''
    });

    expect(await getCommandPath('reg')).toBe('C:\\Windows\\System32\\reg.exe');
  });

  it('should return null when command not found', async () => {
    execMock.mockResolvedValue({
      code: 1,
      stdout: '',
      stderr: 'INFO: Could not find files for the given pattern(s).'
    });

    expect(await getCommandPath('nonexistent')).toBeNull();
  });

  it('should return null on execution error', async () => {
    execMock.mockRejectedValue(new Error('Command failed'));

    expect(await getCommandPath('test')).toBeNull();
  });

  it('should bound the lookup with a timeout', async () => {
    execMock.mockResolvedValue({ code: 0, stdout: '/usr/bin/apt-get', stderr: '' });

    await getCommandPath('apt-get');

    expect(execMock).toHaveBeenCalledWith(expect.any(String), ['apt-get'], { timeout: 10000 });
  });
});

describe('commandExists', () => {
  afterEach(() => {
    vi.clearAllMocks();
  });

  it('should return true when command exists', async () => {
    execMock.mockResolvedValue({ code: 0, stdout: '/usr/bin/snap\n', stderr: '' });

    expect(await commandExists('snap')).toBe(true);
  });

  it('should return false when command not found', async () => {
    execMock.mockResolvedValue({ code: 1, stdout: '', stderr: '' });

    expect(await commandExists('nonexistent')).toBe(false);
  });

  it('should return false on execution error', async () => {
    execMock.mockRejectedValue(new Error('Command failed'));

    expect(await commandExists('test')).toBe(false);
  });
});
