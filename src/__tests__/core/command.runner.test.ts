import * as os from 'os';
import * as path from 'path';
import type { SimpleGitOptions } from 'simple-git';
import { GitCommandRunner } from '../../core/command.runner';
import { PreconditionFailedError, ToolUnavailableError } from '../../errors/repository.error';
import { createTestLogger } from '../helpers/fake-runner';

interface VersionResult {
  installed: boolean;
  major: number;
  minor: number;
  patch: number;
}

const mockOptions: Array<Partial<SimpleGitOptions>> = [];
const mockRaw = jest.fn<Promise<string>, [string[]]>();
const mockVersion = jest.fn<Promise<VersionResult>, []>();
const mockConstruction: { failure: Error | null } = { failure: null };

jest.mock('simple-git', () => ({
  simpleGit: (options: Partial<SimpleGitOptions>) => {
    if (mockConstruction.failure) {
      throw mockConstruction.failure;
    }
    mockOptions.push(options);
    return { raw: mockRaw, version: mockVersion };
  },
}));

function failWith(exitCode: number, stderr: string): Promise<string> {
  const options = mockOptions[mockOptions.length - 1];
  options?.errors?.(new Error(stderr), {
    exitCode,
    stdOut: [],
    stdErr: [Buffer.from(stderr, 'utf-8')],
  });
  return Promise.resolve('');
}

describe('GitCommandRunner', () => {
  const workingDir = os.tmpdir();
  let runner: GitCommandRunner;

  beforeEach(() => {
    mockOptions.length = 0;
    mockConstruction.failure = null;
    mockRaw.mockReset();
    mockVersion.mockReset();
    mockVersion.mockResolvedValue({ installed: true, major: 2, minor: 43, patch: 0 });
    runner = new GitCommandRunner('git', createTestLogger());
  });

  it('should resolve with stdout for a successful command', async () => {
    mockRaw.mockResolvedValue('main\n');

    const result = await runner.run(workingDir, ['symbolic-ref', '--short', '-q', 'HEAD']);

    expect(result).toEqual({ exitCode: 0, stdout: 'main\n', stderr: '' });
    expect(mockRaw).toHaveBeenCalledWith(['symbolic-ref', '--short', '-q', 'HEAD']);
    expect(mockOptions[mockOptions.length - 1]).toMatchObject({
      baseDir: workingDir,
      binary: 'git',
      maxConcurrentProcesses: 1,
      trimmed: false,
      unsafe: { allowUnsafeCustomBinary: true },
    });
  });

  it('should allow a configured binary path containing spaces', async () => {
    runner = new GitCommandRunner('/opt/my tools/git', createTestLogger());
    mockRaw.mockResolvedValue('');

    await runner.run(workingDir, ['status']);

    expect(mockOptions.map(options => options.binary)).toEqual(['/opt/my tools/git', '/opt/my tools/git']);
    expect(mockOptions.every(options => options.unsafe?.allowUnsafeCustomBinary === true)).toBe(true);
  });

  it('should map a rejected client configuration to ToolUnavailableError', async () => {
    mockConstruction.failure = new Error('Invalid value supplied for custom binary');

    await expect(runner.run(workingDir, ['status'])).rejects.toThrow(ToolUnavailableError);
    await expect(runner.run(workingDir, ['status'])).rejects.toThrow("Could not launch 'git'");
    expect(mockRaw).not.toHaveBeenCalled();
  });

  it('should resolve with the exit code and stderr of a failing command', async () => {
    mockRaw.mockImplementation(() => failWith(128, 'fatal: not a git repository\n'));

    const result = await runner.run(workingDir, ['status', '--porcelain']);

    expect(result).toEqual({ exitCode: 128, stdout: '', stderr: 'fatal: not a git repository\n' });
  });

  it('should throw ToolUnavailableError when the process cannot be spawned', async () => {
    mockRaw.mockImplementation(() => failWith(-2, 'spawn git ENOENT\n'));

    await expect(runner.run(workingDir, ['status'])).rejects.toThrow(ToolUnavailableError);
  });

  it('should throw ToolUnavailableError when git is not installed', async () => {
    mockVersion.mockResolvedValue({ installed: false, major: 0, minor: 0, patch: 0 });

    await expect(runner.run(workingDir, ['status'])).rejects.toThrow(
      "'git' is not installed or not in PATH",
    );
    expect(mockRaw).not.toHaveBeenCalled();
  });

  it('should check availability once per runner', async () => {
    mockRaw.mockResolvedValue('');

    await runner.run(workingDir, ['status']);
    await runner.run(workingDir, ['branch', '--list']);

    expect(mockVersion).toHaveBeenCalledTimes(1);
  });

  it('should check availability again after a failed version check', async () => {
    mockVersion.mockRejectedValueOnce(new Error('version check failed'));
    mockRaw.mockResolvedValue('');

    await expect(runner.run(workingDir, ['status'])).rejects.toThrow('version check failed');
    await expect(runner.run(workingDir, ['status'])).resolves.toEqual({
      exitCode: 0,
      stdout: '',
      stderr: '',
    });
    expect(mockVersion).toHaveBeenCalledTimes(2);
  });

  it('should refuse a working directory that does not exist', async () => {
    const missing = path.join(workingDir, 'repoforge-missing-dir-for-runner-test');

    await expect(runner.run(missing, ['status'])).rejects.toThrow(PreconditionFailedError);
    expect(mockVersion).not.toHaveBeenCalled();
  });
});
