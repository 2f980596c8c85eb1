import chalk from 'chalk';
import { BaseError } from './base.error';
import { ErrorKind, OperationResult } from '../types/operation.types';
import { LicenseGenerationResult } from '../types/license.types';
import { logger } from '../utils/logger.service';

/**
 * Suggestions keyed by precondition / classified reason code, or by ErrorKind
 */
const RECOVERY_HINTS: Record<string, string> = {
  [ErrorKind.TOOL_UNAVAILABLE]: 'Install git and make sure it is on your PATH',
  [ErrorKind.LICENSE_NOT_FOUND]: 'Run "repoforge license list" to see available licenses',
  [ErrorKind.CATALOG_LOAD_FAILED]: 'Fix the JSON in your license catalog file',
  NOT_INITIALIZED: 'Run "repoforge init" first',
  DIRECTORY_NOT_FOUND: 'Check the --cwd path or run "repoforge init" to create it',
  NOTHING_STAGED: 'Stage files with "repoforge add <path...>"',
  NOTHING_TO_COMMIT: 'Stage files with "repoforge add <path...>"',
  REMOTE_NOT_CONFIGURED: 'Add a remote with "git remote add origin <url>"',
  NO_COMMITS: 'Create a commit before pushing',
  BRANCH_EXISTS: 'Pick another name or check the branch out with "repoforge checkout"',
  BRANCH_NOT_FOUND: 'Run "repoforge branches" to see existing branches',
  MERGE_CONFLICT: 'Resolve the conflicts, then "repoforge add" and "repoforge commit"',
  UNMERGED_PATHS: 'Resolve the conflicts, then "repoforge add" and "repoforge commit"',
  IDENTITY_UNKNOWN: 'Run git config user.name "Your Name" and git config user.email "you@example.com"',
  LOCAL_CHANGES_OVERWRITTEN: 'Commit or stash your local changes first',
  REMOTE_REJECTED: 'Run "repoforge pull" and try again',
  AUTHENTICATION_FAILED: 'Check your credentials or SSH key for the remote',
  INDEX_LOCKED: 'Wait for the other git process to finish, or remove .git/index.lock',
};

export function recoveryHint(kind: ErrorKind | null, reason: string | null): string | undefined {
  return (reason ? RECOVERY_HINTS[reason] : undefined) ?? (kind ? RECOVERY_HINTS[kind] : undefined);
}

/**
 * Formats failures for the terminal
 */
export class ErrorHandler {
  /**
   * Print the tool's diagnostics and a recovery hint for a failed operation.
   * The failure message itself is printed by the caller.
   */
  public static reportOperation(result: OperationResult<unknown>): void {
    const diagnostic = result.stderr.trim();
    if (diagnostic && result.errorKind !== ErrorKind.PRECONDITION_FAILED) {
      logger.info(chalk.gray(diagnostic));
    }
    const hint = recoveryHint(result.errorKind, result.reason);
    if (hint) {
      logger.info(chalk.cyan(`💡 ${hint}`));
    }
  }

  /**
   * Print which steps of a failed license generation took effect
   */
  public static reportGeneration(result: LicenseGenerationResult): void {
    if (result.errorKind === ErrorKind.PARTIAL_SEQUENCE_FAILURE) {
      logger.info(`File written: ${result.fileWritten ? 'yes' : 'no'} (${result.filePath})`);
      logger.info(`Staged: ${result.staged ? 'yes' : 'no'}`);
    }
    const cause = result.stageResult;
    const hint = cause
      ? recoveryHint(cause.errorKind, cause.reason)
      : recoveryHint(result.errorKind, null);
    if (hint) {
      logger.info(chalk.cyan(`💡 ${hint}`));
    }
  }

  /**
   * Print an unexpected error and return the exit code to use
   */
  public static handleError(error: unknown, command?: string): number {
    const prefix = command ? `${command}: ` : '';
    if (error instanceof BaseError) {
      logger.error(`${prefix}${error.message}`);
      if (error.details) {
        logger.info(chalk.gray(error.details));
      }
      if (error.recoverable) {
        logger.info(chalk.cyan('💡 Fix the issue above and run the command again'));
      }
      return 1;
    }

    if (error instanceof Error) {
      logger.error(`${prefix}${error.message}`);
      logger.debug(error.stack ?? '');
      return 1;
    }

    logger.error(`${prefix}${String(error)}`);
    return 1;
  }
}
