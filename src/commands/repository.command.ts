import chalk from 'chalk';
import { RepoOrchestrator } from '../core/repo.orchestrator';
import { createOrchestrator } from './orchestrator.factory';
import { ErrorHandler } from '../errors/error.handler';
import { CommandOptions, CommandResult, OperationResult } from '../types/operation.types';
import { BranchListing, PullOptions, PushOptions, RepositoryStatus } from '../types/repository.types';
import { logger } from '../utils/logger.service';

/**
 * CLI entry points for repository actions
 */
export class RepositoryCommand {
  private readonly workingDir: string;
  private orchestrator: RepoOrchestrator | null;

  constructor(workingDir?: string, orchestrator?: RepoOrchestrator) {
    this.workingDir = workingDir || process.cwd();
    this.orchestrator = orchestrator ?? null;
  }

  public async init(options: CommandOptions = {}): Promise<CommandResult> {
    const orchestrator = await this.getOrchestrator(options);
    return this.toCommandResult(await orchestrator.init());
  }

  public async add(paths: string[], options: CommandOptions = {}): Promise<CommandResult> {
    const orchestrator = await this.getOrchestrator(options);
    return this.toCommandResult(await orchestrator.add(paths));
  }

  public async commit(message: string, options: CommandOptions = {}): Promise<CommandResult> {
    const orchestrator = await this.getOrchestrator(options);
    return this.toCommandResult(await orchestrator.commit(message));
  }

  public async push(push: PushOptions, options: CommandOptions = {}): Promise<CommandResult> {
    const orchestrator = await this.getOrchestrator(options);
    return this.toCommandResult(await orchestrator.push(push));
  }

  public async pull(pull: PullOptions, options: CommandOptions = {}): Promise<CommandResult> {
    const orchestrator = await this.getOrchestrator(options);
    return this.toCommandResult(await orchestrator.pull(pull));
  }

  public async branch(
    name: string,
    checkout: boolean,
    options: CommandOptions = {},
  ): Promise<CommandResult> {
    const orchestrator = await this.getOrchestrator(options);
    return this.toCommandResult(await orchestrator.createBranch(name, { checkout }));
  }

  public async merge(name: string, options: CommandOptions = {}): Promise<CommandResult> {
    const orchestrator = await this.getOrchestrator(options);
    return this.toCommandResult(await orchestrator.merge(name));
  }

  public async checkout(name: string, options: CommandOptions = {}): Promise<CommandResult> {
    const orchestrator = await this.getOrchestrator(options);
    return this.toCommandResult(await orchestrator.checkout(name));
  }

  public async branches(options: CommandOptions = {}): Promise<CommandResult> {
    const orchestrator = await this.getOrchestrator(options);
    const result = await orchestrator.listBranches();
    if (result.success && result.data) {
      this.printBranches(result.data);
    }
    return this.toCommandResult(result);
  }

  public async status(options: CommandOptions = {}): Promise<CommandResult> {
    const orchestrator = await this.getOrchestrator(options);
    const result = await orchestrator.status();
    if (result.success && result.data) {
      this.printStatus(result.data);
    }
    return this.toCommandResult(result);
  }

  private async getOrchestrator(options: CommandOptions): Promise<RepoOrchestrator> {
    if (!this.orchestrator) {
      this.orchestrator = await createOrchestrator(options.workingDir ?? this.workingDir, options);
    }
    return this.orchestrator;
  }

  private toCommandResult(result: OperationResult<unknown>): CommandResult {
    if (!result.success) {
      ErrorHandler.reportOperation(result);
    }
    return {
      success: result.success,
      message: result.message,
      exitCode: result.success ? 0 : 1,
    };
  }

  private printBranches(listing: BranchListing): void {
    if (listing.branches.length === 0) {
      return;
    }
    logger.info(chalk.bold('\nBranches:'));
    for (const branch of listing.branches) {
      logger.info(branch.current ? chalk.green(`* ${branch.name}`) : `  ${branch.name}`);
    }
  }

  private printStatus(status: RepositoryStatus): void {
    const sections: Array<[string, string[], (text: string) => string]> = [
      ['Staged', status.staged, chalk.green],
      ['Modified', status.modified, chalk.yellow],
      ['Untracked', status.untracked, chalk.gray],
      ['Conflicted', status.conflicted, chalk.red],
    ];
    for (const [title, files, colour] of sections) {
      if (files.length === 0) {
        continue;
      }
      logger.info(chalk.bold(`\n${title}:`));
      for (const file of files) {
        logger.info(colour(`  ${file}`));
      }
    }
  }
}
