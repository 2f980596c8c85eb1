import * as path from 'path';
import * as fs from 'fs-extra';
import { RepositoryService } from './repository.service';
import { LicenseCatalog } from './license.catalog';
import { renderLicense } from './license.renderer';
import { GitCommandRunner } from './command.runner';
import { LicenseNotFoundError, LicenseRenderError } from '../errors/license.error';
import { ErrorKind, OperationResult } from '../types/operation.types';
import {
  LicenseEntry,
  LicenseGenerationOptions,
  LicenseGenerationResult,
  RenderedLicense,
  SequenceStep,
} from '../types/license.types';
import {
  BranchListing,
  CommitSummary,
  CreateBranchOptions,
  PullOptions,
  PushOptions,
  RepositoryHandle,
  RepositoryStatus,
} from '../types/repository.types';
import { DEFAULT_CONFIG, RepoForgeConfig } from '../types/config.types';
import { LogEvent, Logger, logger as defaultLogger } from '../utils/logger.service';

export interface RepoOrchestratorOptions {
  licenseFileName?: string;
  stageLicense?: boolean;
  /** Clock used for the default license year */
  now?: () => Date;
  logger?: Logger;
}

interface GenerationFields {
  success: boolean;
  errorKind?: ErrorKind | null;
  message: string;
  fileWritten?: boolean;
  staged?: boolean;
  failedStep?: SequenceStep | null;
  warnings?: string[];
  rendered?: RenderedLicense;
  stageResult?: OperationResult<string[]>;
}

/**
 * Facade used by the front end: every repository action plus license
 * generation. Owns no I/O of its own beyond writing the license file.
 */
export class RepoOrchestrator {
  private readonly repository: RepositoryService;
  private readonly catalog: LicenseCatalog;
  private readonly licenseFileName: string;
  private readonly stageLicense: boolean;
  private readonly now: () => Date;
  private readonly logger: Logger;

  constructor(
    repository: RepositoryService,
    catalog: LicenseCatalog,
    options: RepoOrchestratorOptions = {},
  ) {
    this.repository = repository;
    this.catalog = catalog;
    this.licenseFileName = options.licenseFileName ?? DEFAULT_CONFIG.licenseFileName;
    this.stageLicense = options.stageLicense ?? DEFAULT_CONFIG.stageLicense;
    this.now = options.now ?? ((): Date => new Date());
    this.logger = options.logger ?? defaultLogger;
  }

  /**
   * Wire the git-backed service and load the catalog for a working directory
   */
  public static async create(
    workingDir: string,
    config: RepoForgeConfig,
    catalogPath: string | undefined,
    logger: Logger = defaultLogger,
  ): Promise<RepoOrchestrator> {
    const runner = new GitCommandRunner(config.gitBinary, logger);
    const repository = new RepositoryService(
      workingDir,
      runner,
      { defaultRemote: config.defaultRemote, initialBranch: config.initialBranch },
      logger,
    );
    const catalog = await LicenseCatalog.load(catalogPath, logger);
    return new RepoOrchestrator(repository, catalog, {
      licenseFileName: config.licenseFileName,
      stageLicense: config.stageLicense,
      logger,
    });
  }

  public getCatalog(): LicenseCatalog {
    return this.catalog;
  }

  public init(): Promise<OperationResult<RepositoryHandle>> {
    return this.repository.init();
  }

  public add(filePaths: string[]): Promise<OperationResult<string[]>> {
    return this.repository.add(filePaths);
  }

  public commit(message: string): Promise<OperationResult<CommitSummary>> {
    return this.repository.commit(message);
  }

  public push(options?: PushOptions): Promise<OperationResult> {
    return this.repository.push(options);
  }

  public createBranch(branchName: string, options?: CreateBranchOptions): Promise<OperationResult> {
    return this.repository.createBranch(branchName, options);
  }

  public merge(branchName: string): Promise<OperationResult> {
    return this.repository.merge(branchName);
  }

  public pull(options?: PullOptions): Promise<OperationResult> {
    return this.repository.pull(options);
  }

  public checkout(branchName: string): Promise<OperationResult> {
    return this.repository.checkout(branchName);
  }

  public listBranches(): Promise<OperationResult<BranchListing>> {
    return this.repository.listBranches();
  }

  public status(): Promise<OperationResult<RepositoryStatus>> {
    return this.repository.status();
  }

  public listLicenses(): LicenseEntry[] {
    return this.catalog.list();
  }

  /**
   * Render a license, write it at the repository root and optionally stage it.
   *
   * Stops at the first failing step. Lookup and render failures leave the
   * filesystem untouched; a staging failure after the write, whether a failed
   * result or a thrown fault, is reported as PartialSequenceFailure with
   * `fileWritten: true`. Write errors propagate.
   */
  public async generateLicense(options: LicenseGenerationOptions): Promise<LicenseGenerationResult> {
    const filePath = path.join(this.repository.getWorkingDirectory(), this.licenseFileName);
    const stage = options.stage ?? this.stageLicense;
    const completedSteps: SequenceStep[] = [];

    const finish = (fields: GenerationFields): LicenseGenerationResult => {
      const result: LicenseGenerationResult = Object.freeze({
        success: fields.success,
        errorKind: fields.errorKind ?? null,
        message: fields.message,
        licenseId: fields.rendered?.licenseId ?? options.licenseId,
        filePath,
        fileWritten: fields.fileWritten ?? false,
        staged: fields.staged ?? false,
        completedSteps: Object.freeze([...completedSteps]),
        failedStep: fields.failedStep ?? null,
        warnings: Object.freeze([...(fields.warnings ?? [])]),
        rendered: fields.rendered,
        stageResult: fields.stageResult,
      });
      const event: LogEvent = {
        action: 'license-generate',
        params: { licenseId: options.licenseId, year: options.year, stage },
        outcome: result.success ? 'success' : (result.errorKind ?? 'failure'),
      };
      this.logger.debug(`license generate: ${result.message}`, event);
      return result;
    };

    let entry: LicenseEntry;
    try {
      entry = this.catalog.lookup(options.licenseId);
    } catch (error) {
      if (error instanceof LicenseNotFoundError) {
        return finish({
          success: false,
          errorKind: error.kind,
          message: error.details ? `${error.message}. ${error.details}` : error.message,
          failedStep: 'lookup',
        });
      }
      throw error;
    }
    completedSteps.push('lookup');

    let rendered: RenderedLicense;
    try {
      rendered = renderLicense(entry, options.author, options.year ?? this.now().getFullYear());
    } catch (error) {
      if (error instanceof LicenseRenderError) {
        return finish({
          success: false,
          errorKind: error.kind,
          message: error.message,
          failedStep: 'render',
        });
      }
      throw error;
    }
    completedSteps.push('render');

    const warnings: string[] = [];
    if (await fs.pathExists(filePath)) {
      warnings.push(`Replaced existing ${this.licenseFileName}`);
    }
    await fs.writeFile(filePath, rendered.text, 'utf-8');
    completedSteps.push('write');

    if (!stage) {
      return finish({
        success: true,
        message: `Generated ${entry.id} license at ${filePath}`,
        fileWritten: true,
        warnings,
        rendered,
      });
    }

    let stageResult: OperationResult<string[]>;
    try {
      stageResult = await this.repository.add([this.licenseFileName]);
    } catch (error) {
      this.logger.error(`Staging ${this.licenseFileName} failed`, error);
      return finish({
        success: false,
        errorKind: ErrorKind.PARTIAL_SEQUENCE_FAILURE,
        message: `Wrote ${filePath} but staging failed: ${error instanceof Error ? error.message : String(error)}`,
        fileWritten: true,
        staged: false,
        failedStep: 'stage',
        warnings,
        rendered,
      });
    }
    if (!stageResult.success) {
      return finish({
        success: false,
        errorKind: ErrorKind.PARTIAL_SEQUENCE_FAILURE,
        message: `Wrote ${filePath} but staging failed: ${stageResult.message}`,
        fileWritten: true,
        staged: false,
        failedStep: 'stage',
        warnings,
        rendered,
        stageResult,
      });
    }
    completedSteps.push('stage');

    return finish({
      success: true,
      message: `Generated ${entry.id} license at ${filePath} and staged it`,
      fileWritten: true,
      staged: true,
      warnings,
      rendered,
      stageResult,
    });
  }
}
