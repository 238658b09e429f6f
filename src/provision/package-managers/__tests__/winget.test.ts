import { describe, it, expect, vi, afterEach } from 'vitest';
import { exec } from '../../../utils/exec.js';
import { WingetPackageManager, isInstallSuccess, toUnsignedExitCode } from '../winget.js';
import { toolSpec } from '../../__tests__/fakes.js';

vi.mock('../../../utils/exec.js', () => ({
  exec: vi.fn(),
}));

const execMock = vi.mocked(exec);

describe('WingetPackageManager', () => {
  const winget = new WingetPackageManager(900000);
  const tool = toolSpec({ friendlyName: 'Git', candidateIds: ['Git.Git'] });

  afterEach(() => {
    vi.clearAllMocks();
  });

  describe('exit codes', () => {
    it('should treat signed and unsigned HRESULTs alike', () => {
      expect(toUnsignedExitCode(-1978335189)).toBe(0x8a15002b);
      expect(isInstallSuccess(-1978335189)).toBe(true);
      expect(isInstallSuccess(0x8a150061)).toBe(true);
      expect(isInstallSuccess(0)).toBe(true);
      expect(isInstallSuccess(1)).toBe(false);
    });
  });

  describe('query', () => {
    it('should list by exact id and join both streams', async () => {
      execMock.mockResolvedValue({ code: 0, stdout: 'Name Id Version\nGit Git.Git 2.45.1', stderr: '' });

      const result = await winget.query('Git.Git', 8000);

      expect(execMock).toHaveBeenCalledWith(
        'winget',
        ['list', '--id', 'Git.Git', '--exact', '--accept-source-agreements', '--disable-interactivity'],
        { timeout: 8000 }
      );
      expect(result).toEqual({ code: 0, output: 'Name Id Version\nGit Git.Git 2.45.1' });
    });
  });

  describe('install', () => {
    it('should install silently at machine scope', async () => {
      execMock.mockResolvedValue({ code: 0, stdout: 'Successfully installed', stderr: '' });

      const result = await winget.install('Git.Git', { machineWide: true, tool });

      expect(result).toEqual({ success: true, output: 'Successfully installed' });
      expect(execMock).toHaveBeenCalledWith(
        'winget',
        [
          'install', '--id', 'Git.Git', '--silent', '--accept-package-agreements',
          '--exact', '--accept-source-agreements', '--disable-interactivity',
          '--scope', 'machine',
        ],
        { timeout: 900000 }
      );
    });

    it('should count an already-installed exit code as success', async () => {
      execMock.mockResolvedValue({ code: 0x8a150061, stdout: 'Found an existing package already installed.', stderr: '' });

      const result = await winget.install('Git.Git', { machineWide: true, tool });

      expect(result.success).toBe(true);
    });

    it('should retry without a scope when only per-user installers exist', async () => {
      execMock
        .mockResolvedValueOnce({ code: 0x8a150010, stdout: 'No applicable installer found; see logs for more details.', stderr: '' })
        .mockResolvedValueOnce({ code: 0, stdout: 'Successfully installed', stderr: '' });

      const result = await winget.install('Microsoft.VisualStudioCode', { machineWide: true });

      expect(result.success).toBe(true);
      expect(execMock).toHaveBeenCalledTimes(2);
      expect(execMock.mock.calls[1]?.[1]).not.toContain('--scope');
    });

    it('should not retry other failures', async () => {
      execMock.mockResolvedValue({ code: 1, stdout: '', stderr: 'Installer failed with exit code: 1603' });

      const result = await winget.install('Docker.DockerDesktop', { machineWide: true });

      expect(result).toEqual({ success: false, output: 'Installer failed with exit code: 1603' });
      expect(execMock).toHaveBeenCalledTimes(1);
    });
  });
});
