import chalk from 'chalk';
import { RepoOrchestrator } from '../core/repo.orchestrator';
import { createOrchestrator } from './orchestrator.factory';
import { ErrorHandler } from '../errors/error.handler';
import { LicenseNotFoundError } from '../errors/license.error';
import { CommandOptions, CommandResult } from '../types/operation.types';
import { logger } from '../utils/logger.service';

export interface GenerateLicenseOptions {
  author: string;
  year?: number;
  stage?: boolean;
}

/**
 * CLI entry points for the license catalog
 */
export class LicenseCommand {
  private readonly workingDir: string;
  private orchestrator: RepoOrchestrator | null;

  constructor(workingDir?: string, orchestrator?: RepoOrchestrator) {
    this.workingDir = workingDir || process.cwd();
    this.orchestrator = orchestrator ?? null;
  }

  /**
   * List available licenses and any catalog problems
   */
  public async list(options: CommandOptions = {}): Promise<CommandResult> {
    const orchestrator = await this.getOrchestrator(options);
    const catalog = orchestrator.getCatalog();
    const entries = orchestrator.listLicenses();

    logger.info(chalk.bold('Available licenses:'));
    const width = Math.max(...entries.map(entry => entry.id.length));
    for (const entry of entries) {
      const origin = entry.source === 'external' ? chalk.gray(' (custom)') : '';
      logger.info(`  ${chalk.cyan(entry.id.padEnd(width))}  ${entry.name}${origin}`);
    }

    if (catalog.loadError) {
      logger.warn(catalog.loadError.message, catalog.loadError.details ?? '');
    }
    if (catalog.issues.length > 0) {
      logger.warn(`${catalog.issues.length} catalog entr${catalog.issues.length === 1 ? 'y was' : 'ies were'} skipped:`);
      for (const issue of catalog.issues) {
        logger.info(chalk.gray(`  ${issue.id}: ${issue.reason}`));
      }
    }

    return { success: true, message: `${entries.length} licenses available`, exitCode: 0 };
  }

  /**
   * Print one license template
   */
  public async show(licenseId: string, options: CommandOptions = {}): Promise<CommandResult> {
    const orchestrator = await this.getOrchestrator(options);
    try {
      const entry = orchestrator.getCatalog().lookup(licenseId);
      logger.info(chalk.bold(`${entry.name} (${entry.id})`));
      if (entry.spdxId) {
        logger.info(`SPDX: ${entry.spdxId}`);
      }
      logger.info(`Source: ${entry.source}`);
      logger.info(`Requires author: ${entry.requiresAuthor ? 'yes' : 'no'}`);
      logger.info('');
      logger.info(entry.template);
      return { success: true, message: `Showing ${entry.id}`, exitCode: 0 };
    } catch (error) {
      if (error instanceof LicenseNotFoundError) {
        return {
          success: false,
          message: error.details ? `${error.message}. ${error.details}` : error.message,
          exitCode: 1,
        };
      }
      throw error;
    }
  }

  /**
   * Render a license into the repository and optionally stage it
   */
  public async generate(
    licenseId: string,
    generate: GenerateLicenseOptions,
    options: CommandOptions = {},
  ): Promise<CommandResult> {
    const orchestrator = await this.getOrchestrator(options);
    const result = await orchestrator.generateLicense({
      licenseId,
      author: generate.author,
      year: generate.year,
      stage: generate.stage,
    });

    if (!result.success) {
      ErrorHandler.reportGeneration(result);
    }
    for (const warning of result.warnings) {
      logger.warn(warning);
    }

    return { success: result.success, message: result.message, exitCode: result.success ? 0 : 1 };
  }

  private async getOrchestrator(options: CommandOptions): Promise<RepoOrchestrator> {
    if (!this.orchestrator) {
      this.orchestrator = await createOrchestrator(options.workingDir ?? this.workingDir, options);
    }
    return this.orchestrator;
  }
}
