import { simpleGit, SimpleGit, SimpleGitOptions } from 'simple-git';
import * as fs from 'fs-extra';
import { RawCommandResult } from '../types/operation.types';
import { PreconditionFailedError, ToolUnavailableError } from '../errors/repository.error';
import { Logger, logger as defaultLogger } from '../utils/logger.service';

/**
 * Runs the version-control tool. Resolves with the raw exit status for any
 * exit code; rejects only when the tool cannot be launched.
 */
export interface CommandRunner {
  run(workingDirectory: string, args: readonly string[]): Promise<RawCommandResult>;
}

/**
 * Exit status reported for a spawn failure (ENOENT)
 */
const SPAWN_FAILURE_EXIT_CODE = -2;

/**
 * CommandRunner backed by simple-git.
 *
 * simple-git rejects on non-zero exits by default; the `errors` handler below
 * records the exit code and stderr and clears the error so `raw()` resolves
 * with stdout instead. The binary comes from the user's own configuration, so
 * paths simple-git treats as unsafe (e.g. containing spaces) are allowed.
 */
export class GitCommandRunner implements CommandRunner {
  private readonly binary: string;
  private readonly logger: Logger;
  private availability: Promise<void> | null = null;

  constructor(binary = 'git', logger: Logger = defaultLogger) {
    this.binary = binary;
    this.logger = logger;
  }

  public async run(workingDirectory: string, args: readonly string[]): Promise<RawCommandResult> {
    if (!(await fs.pathExists(workingDirectory))) {
      throw new PreconditionFailedError(
        'WORKING_DIRECTORY_MISSING',
        `Working directory does not exist: ${workingDirectory}`,
      );
    }

    await this.ensureAvailable(workingDirectory);

    const captured: Omit<RawCommandResult, 'stdout'> = { exitCode: 0, stderr: '' };
    const git = this.createClient(workingDirectory, {
      maxConcurrentProcesses: 1,
      trimmed: false,
      errors: (_error, result) => {
        captured.exitCode = result.exitCode;
        captured.stderr = Buffer.concat(result.stdErr).toString('utf-8');
        return undefined;
      },
    });

    this.logger.debug(`$ ${this.binary} ${args.join(' ')}`, { cwd: workingDirectory });
    const stdout = await git.raw([...args]);

    if (captured.exitCode === SPAWN_FAILURE_EXIT_CODE) {
      throw new ToolUnavailableError(`Could not launch '${this.binary}'`, captured.stderr.trim());
    }

    return { exitCode: captured.exitCode, stdout, stderr: captured.stderr };
  }

  /**
   * Build a simple-git client; a rejected configuration means git cannot be launched
   */
  private createClient(baseDir: string, options: Partial<SimpleGitOptions> = {}): SimpleGit {
    try {
      return simpleGit({
        ...options,
        baseDir,
        binary: this.binary,
        unsafe: { allowUnsafeCustomBinary: true },
      });
    } catch (error) {
      throw new ToolUnavailableError(
        `Could not launch '${this.binary}'`,
        error instanceof Error ? error.message : String(error),
      );
    }
  }

  /**
   * Check the binary once per runner; a failed check is retried on the next call
   */
  private ensureAvailable(workingDirectory: string): Promise<void> {
    if (!this.availability) {
      this.availability = this.checkVersion(workingDirectory).catch((error: unknown) => {
        this.availability = null;
        throw error;
      });
    }
    return this.availability;
  }

  private async checkVersion(workingDirectory: string): Promise<void> {
    const version = await this.createClient(workingDirectory).version();
    if (!version.installed) {
      throw new ToolUnavailableError(
        `'${this.binary}' is not installed or not in PATH`,
        'Install git and make sure it is on your PATH',
      );
    }
    this.logger.debug(`Using ${this.binary} ${version.major}.${version.minor}.${version.patch}`);
  }
}
