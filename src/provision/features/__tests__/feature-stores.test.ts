import { describe, it, expect, vi, afterEach } from 'vitest';
import { exec, type ExecResult } from '../../../utils/exec.js';
import { DismFeatureStore, parseFeatureState } from '../dism.feature-store.js';
import { LinuxGroupFeatureStore } from '../linux-group.feature-store.js';

vi.mock('../../../utils/exec.js', () => ({
  exec: vi.fn(),
}));

const execMock = vi.mocked(exec);
const result = (code: number, stdout = '', stderr = ''): ExecResult => ({ code, stdout, stderr });

describe('DismFeatureStore', () => {
  const store = new DismFeatureStore(30000, 900000);
  const wsl = { id: 'Microsoft-Windows-Subsystem-Linux', friendlyName: 'Windows Subsystem for Linux' };

  afterEach(() => {
    vi.clearAllMocks();
  });

  it('should read the feature state', () => {
    expect(parseFeatureState('Feature Name : Containers\r\nState : Enabled\r\n')).toBe('enabled');
    expect(parseFeatureState('State : Enable Pending')).toBe('enable-pending');
    expect(parseFeatureState('State : Disabled with Payload Removed')).toBe('disabled');
    expect(parseFeatureState('Error: 740')).toBe('unknown');
  });

  it('should not re-enable an enabled feature', async () => {
    execMock.mockResolvedValue(result(0, 'State : Enabled'));

    expect(await store.enable(wsl)).toEqual({ feature: wsl, status: 'already-enabled', rebootRequired: false });
    expect(execMock).toHaveBeenCalledTimes(1);
  });

  it('should carry a pending enable as a reboot request', async () => {
    execMock.mockResolvedValue(result(0, 'State : Enable Pending'));

    expect(await store.enable(wsl)).toEqual({
      feature: wsl,
      status: 'already-enabled',
      rebootRequired: true,
      detail: 'enable pending a restart',
    });
  });

  it('should map exit code 3010 to a reboot request', async () => {
    execMock
      .mockResolvedValueOnce(result(0, 'State : Disabled'))
      .mockResolvedValueOnce(result(3010, 'The operation completed successfully.'));

    expect(await store.enable(wsl)).toEqual({ feature: wsl, status: 'enabled', rebootRequired: true, detail: 'restart required' });
    expect(execMock).toHaveBeenLastCalledWith(
      'dism.exe',
      ['/online', '/enable-feature', '/featurename:Microsoft-Windows-Subsystem-Linux', '/all', '/norestart', '/English'],
      { timeout: 900000 }
    );
  });

  it('should report other exit codes as failed', async () => {
    execMock
      .mockResolvedValueOnce(result(0, 'State : Disabled'))
      .mockResolvedValueOnce(result(50, 'Error: 50'));

    expect(await store.enable(wsl)).toEqual({
      feature: wsl,
      status: 'failed',
      rebootRequired: false,
      detail: 'dism exited with code 50: Error: 50',
    });
  });

  it('should turn a spawn failure into a failed result', async () => {
    execMock.mockRejectedValue(new Error('spawn dism.exe ENOENT'));

    const outcome = await store.enable(wsl);

    expect(outcome.status).toBe('failed');
    expect(outcome.detail).toBe('spawn dism.exe ENOENT');
  });
});

describe('LinuxGroupFeatureStore', () => {
  const docker = { id: 'docker', friendlyName: 'docker group membership' };

  afterEach(() => {
    vi.clearAllMocks();
  });

  it('should skip when there is no invoking user', async () => {
    const outcome = await new LinuxGroupFeatureStore(undefined, 30000).enable(docker);

    expect(outcome).toEqual({ feature: docker, status: 'skipped', rebootRequired: false, detail: 'not run through sudo; no user to add' });
    expect(execMock).not.toHaveBeenCalled();
  });

  it('should skip when the group does not exist', async () => {
    execMock.mockResolvedValue(result(2));

    const outcome = await new LinuxGroupFeatureStore('dev', 30000).enable(docker);

    expect(outcome.status).toBe('skipped');
    expect(outcome.detail).toBe('group docker does not exist');
  });

  it('should report an existing membership', async () => {
    execMock
      .mockResolvedValueOnce(result(0, 'docker:x:999:dev'))
      .mockResolvedValueOnce(result(0, 'dev adm sudo docker'));

    const outcome = await new LinuxGroupFeatureStore('dev', 30000).enable(docker);

    expect(outcome).toEqual({ feature: docker, status: 'already-enabled', rebootRequired: false });
  });

  it('should add the user and ask for a new login', async () => {
    execMock
      .mockResolvedValueOnce(result(0, 'docker:x:999:'))
      .mockResolvedValueOnce(result(0, 'dev adm sudo'))
      .mockResolvedValueOnce(result(0));

    const outcome = await new LinuxGroupFeatureStore('dev', 30000).enable(docker);

    expect(outcome).toEqual({
      feature: docker,
      status: 'enabled',
      rebootRequired: true,
      detail: 'dev added to docker; log out and back in for it to take effect',
    });
    expect(execMock).toHaveBeenLastCalledWith('usermod', ['-aG', 'docker', 'dev'], { timeout: 30000 });
  });

  it('should report a failed usermod', async () => {
    execMock
      .mockResolvedValueOnce(result(0, 'docker:x:999:'))
      .mockResolvedValueOnce(result(0, 'dev'))
      .mockResolvedValueOnce(result(1, '', 'usermod: Permission denied.'));

    const outcome = await new LinuxGroupFeatureStore('dev', 30000).enable(docker);

    expect(outcome.status).toBe('failed');
    expect(outcome.detail).toBe('usermod exited with code 1: usermod: Permission denied.');
  });
});
