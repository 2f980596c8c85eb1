#!/usr/bin/env node

import { Command, CommanderError } from 'commander';
import { readFileSync } from 'fs';
import { join, resolve } from 'path';
import { RepositoryCommand } from './commands/repository.command';
import { LicenseCommand } from './commands/license.command';
import { ErrorHandler } from './errors/error.handler';
import { logger, LogLevel } from './utils/logger.service';
import { FALLBACK_VERSION } from './types/config.types';
import { CommandOptions, CommandResult } from './types/operation.types';

type GlobalOptions = {
  verbose?: boolean;
  cwd?: string;
};

/**
 * Options shared by every subcommand
 */
function globalOptions(cli: Command): CommandOptions {
  const options = cli.opts<GlobalOptions>();
  return {
    verbose: options.verbose === true,
    workingDir: resolve(options.cwd ?? process.cwd()),
  };
}

/**
 * Print the outcome of a command and exit non-zero on failure
 */
function report(result: CommandResult, fallback: string): void {
  if (result.success) {
    logger.success(result.message || fallback);
    return;
  }
  logger.error(result.message || fallback);
  process.exit(result.exitCode);
}

/**
 * Run one subcommand with uniform error handling
 */
async function run(
  name: string,
  fallback: string,
  action: () => Promise<CommandResult>,
): Promise<void> {
  try {
    report(await action(), fallback);
  } catch (error) {
    handleError(error, name);
  }
}

function readVersion(): string {
  try {
    const packageJsonPath = join(__dirname, '..', 'package.json');
    const packageJson: unknown = JSON.parse(readFileSync(packageJsonPath, 'utf-8'));
    if (
      typeof packageJson === 'object' &&
      packageJson !== null &&
      'version' in packageJson &&
      typeof packageJson.version === 'string'
    ) {
      return packageJson.version;
    }
  } catch {
    logger.warn('Could not read package.json for version, using fallback');
  }
  return FALLBACK_VERSION;
}

function parseYear(value: string): number {
  return Number(value.trim());
}

function registerLicenseCommands(parent: Command): void {
  const licenseCmd = parent
    .command('license')
    .description('Browse the license catalog and generate LICENSE files (list|show|generate)');

  licenseCmd
    .command('list')
    .description('List available licenses')
    .action(async () => {
      await run('license list', 'Listed licenses', () => new LicenseCommand().list(globalOptions(parent)));
    });

  licenseCmd
    .command('show <id>')
    .description('Show a license template')
    .action(async (id: string) => {
      await run('license show', 'License shown', () =>
        new LicenseCommand().show(id, globalOptions(parent)),
      );
    });

  licenseCmd
    .command('generate <id>')
    .description('Write a LICENSE file to the repository root')
    .option('-a, --author <author>', 'Copyright holder', '')
    .option('-y, --year <year>', 'Copyright year (defaults to the current year)', parseYear)
    .option('--stage', 'Stage the license file after writing it')
    .option('--no-stage', 'Do not stage the license file')
    .action(async (id: string, options: { author: string; year?: number; stage?: boolean }) => {
      await run('license generate', 'License generated', () =>
        new LicenseCommand().generate(
          id,
          { author: options.author, year: options.year, stage: options.stage },
          globalOptions(parent),
        ),
      );
    });
}

/**
 * Build the command tree. Exit handling is overridden before any sub-command
 * is added so every sub-command inherits it and parse errors reach the caller
 * as CommanderError.
 */
export function createProgram(): Command {
  const program = new Command();

  program
    .name('repoforge')
    .description('Drive everyday git workflows and generate license files')
    .version(readVersion(), '-v, -V, --version', 'Output the current version')
    .option('--verbose', 'Show verbose output')
    .option('-C, --cwd <path>', 'Run as if started in <path>')
    .exitOverride()
    .on('option:verbose', () => {
      logger.setLevel(LogLevel.DEBUG);
      logger.debug('Verbose mode enabled');
    });

  program
    .command('init')
    .description('Initialize a repository in the working directory')
    .action(async () => {
      await run('init', 'Repository initialized', () => new RepositoryCommand().init(globalOptions(program)));
    });

  program
    .command('add <path...>')
    .description('Stage file(s) for the next commit')
    .action(async (paths: string[]) => {
      await run('add', 'Files staged', () => new RepositoryCommand().add(paths, globalOptions(program)));
    });

  program
    .command('commit')
    .description('Commit staged changes')
    .requiredOption('-m, --message <message>', 'Commit message')
    .action(async (options: { message: string }) => {
      await run('commit', 'Changes committed', () =>
        new RepositoryCommand().commit(options.message, globalOptions(program)),
      );
    });

  program
    .command('push')
    .description('Push the current branch to its remote')
    .option('-r, --remote <remote>', 'Remote to push to')
    .option('-b, --branch <branch>', 'Branch to push (defaults to the current branch)')
    .option('--no-set-upstream', 'Do not record the remote branch as upstream')
    .action(async (options: { remote?: string; branch?: string; setUpstream: boolean }) => {
      await run('push', 'Pushed', () =>
        new RepositoryCommand().push(
          { remote: options.remote, branch: options.branch, setUpstream: options.setUpstream },
          globalOptions(program),
        ),
      );
    });

  program
    .command('pull')
    .description('Fetch and integrate changes from a remote')
    .option('-r, --remote <remote>', 'Remote to pull from')
    .option('-b, --branch <branch>', 'Remote branch to pull (defaults to the current branch)')
    .action(async (options: { remote?: string; branch?: string }) => {
      await run('pull', 'Pulled', () =>
        new RepositoryCommand().pull(
          { remote: options.remote, branch: options.branch },
          globalOptions(program),
        ),
      );
    });

  program
    .command('branch <name>')
    .description('Create a branch and switch to it')
    .option('--no-checkout', 'Create the branch without switching to it')
    .action(async (name: string, options: { checkout: boolean }) => {
      await run('branch', 'Branch created', () =>
        new RepositoryCommand().branch(name, options.checkout, globalOptions(program)),
      );
    });

  program
    .command('merge <branch>')
    .description('Merge a branch into the current branch')
    .action(async (branch: string) => {
      await run('merge', 'Merged', () => new RepositoryCommand().merge(branch, globalOptions(program)));
    });

  program
    .command('checkout <branch>')
    .description('Switch to an existing branch')
    .action(async (branch: string) => {
      await run('checkout', 'Switched branch', () =>
        new RepositoryCommand().checkout(branch, globalOptions(program)),
      );
    });

  program
    .command('branches')
    .description('List local branches')
    .action(async () => {
      await run('branches', 'Listed branches', () => new RepositoryCommand().branches(globalOptions(program)));
    });

  program
    .command('status')
    .description('Show staged, modified and untracked files')
    .action(async () => {
      await run('status', 'Status retrieved', () => new RepositoryCommand().status(globalOptions(program)));
    });

  registerLicenseCommands(program);

  return program;
}

/**
 * Main CLI entry point
 */
async function main(): Promise<void> {
  try {
    await createProgram().parseAsync(process.argv);
  } catch (error) {
    if (error instanceof CommanderError) {
      // help and version exit with 0, usage errors with 1
      process.exit(error.exitCode);
    }
    throw error;
  }
}

/**
 * Print an unexpected error and exit
 */
function handleError(error: unknown, command?: string): void {
  process.exit(ErrorHandler.handleError(error, command));
}

if (require.main === module) {
  main().catch(error => handleError(error));
}
