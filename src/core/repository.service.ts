import * as path from 'path';
import * as fs from 'fs-extra';
import { CommandRunner } from './command.runner';
import { classifyFailure } from './failure.classifier';
import {
  PreconditionFailedError,
  RepositoryProbeError,
  ToolUnavailableError,
} from '../errors/repository.error';
import { ErrorKind, OperationResult, RawCommandResult, RepositoryAction } from '../types/operation.types';
import {
  BranchInfo,
  BranchListing,
  CommitSummary,
  CreateBranchOptions,
  PullOptions,
  PushOptions,
  RepositoryHandle,
  RepositoryStatus,
} from '../types/repository.types';
import { DEFAULT_CONFIG, DEFAULT_PATHS } from '../types/config.types';
import { LogEvent, Logger, logger as defaultLogger } from '../utils/logger.service';

export interface RepositoryServiceOptions {
  defaultRemote?: string;
  initialBranch?: string | undefined;
}

interface ResultFields<T> {
  action: RepositoryAction;
  success: boolean;
  message: string;
  exitCode?: number | null;
  stdout?: string;
  stderr?: string;
  errorKind?: ErrorKind | null;
  reason?: string | null;
  warnings?: string[];
  data?: T;
}

interface SuccessDetails<T> {
  message: string;
  warnings?: string[];
  data?: T;
}

const CONFLICT_CODES = new Set(['DD', 'AU', 'UD', 'UA', 'DU', 'AA', 'UU']);

function buildResult<T = undefined>(fields: ResultFields<T>): OperationResult<T> {
  return Object.freeze({
    action: fields.action,
    success: fields.success,
    exitCode: fields.exitCode ?? null,
    stdout: fields.stdout ?? '',
    stderr: fields.stderr ?? '',
    errorKind: fields.errorKind ?? null,
    reason: fields.reason ?? null,
    message: fields.message,
    warnings: Object.freeze([...(fields.warnings ?? [])]),
    data: fields.data,
  });
}

function outputLines(output: string): string[] {
  return output
    .split('\n')
    .map(line => line.replace(/\r$/, ''))
    .filter(line => line.trim().length > 0);
}

/**
 * Observe a working directory. `isInitialized` only checks for the `.git`
 * entry; the tool itself is not consulted.
 */
export async function inspectRepository(workingDir: string): Promise<RepositoryHandle> {
  const absolutePath = path.resolve(workingDir);
  const exists = await fs.pathExists(absolutePath);
  const isInitialized = exists && (await fs.pathExists(path.join(absolutePath, DEFAULT_PATHS.gitDir)));
  return { path: absolutePath, exists, isInitialized };
}

/**
 * Parse `git branch --list` output. The current branch is moved to the front;
 * a detached HEAD line is dropped and leaves `current` null.
 */
export function parseBranchList(output: string): BranchListing {
  let current: string | null = null;
  const others: BranchInfo[] = [];

  for (const line of outputLines(output)) {
    const isCurrent = line.startsWith('*');
    const name = line.slice(2).trim();
    if (name.startsWith('(')) {
      continue;
    }
    if (isCurrent) {
      current = name;
    } else {
      others.push({ name, current: false });
    }
  }

  return {
    current,
    branches: current ? [{ name: current, current: true }, ...others] : others,
  };
}

/**
 * Parse `git status --porcelain` (v1) output
 */
export function parsePorcelainStatus(output: string): RepositoryStatus {
  const status: RepositoryStatus = {
    staged: [],
    modified: [],
    untracked: [],
    conflicted: [],
    isClean: true,
  };

  for (const line of outputLines(output)) {
    const code = line.slice(0, 2);
    const rawPath = line.slice(3);
    const arrow = rawPath.indexOf(' -> ');
    const filePath = arrow >= 0 ? rawPath.slice(arrow + 4) : rawPath;

    if (code === '??') {
      status.untracked.push(filePath);
    } else if (code === '!!') {
      continue;
    } else if (CONFLICT_CODES.has(code)) {
      status.conflicted.push(filePath);
    } else {
      if (code[0] !== ' ') {
        status.staged.push(filePath);
      }
      if (code[1] !== ' ') {
        status.modified.push(filePath);
      }
    }
  }

  status.isClean =
    status.staged.length === 0 &&
    status.modified.length === 0 &&
    status.untracked.length === 0 &&
    status.conflicted.length === 0;
  return status;
}

export function parseCommitSummary(output: string): CommitSummary {
  const match = /^\[(.+?)(?: \(root-commit\))? ([0-9a-f]{4,40})\]/m.exec(output);
  return match ? { branch: match[1] ?? null, hash: match[2] ?? null } : { branch: null, hash: null };
}

/**
 * Repository actions driven through a CommandRunner.
 *
 * Each action re-inspects the working directory, checks its preconditions
 * (running read-only probes where needed), invokes the tool once and turns
 * the outcome into an OperationResult. Expected failures never throw.
 */
export class RepositoryService {
  private readonly workingDir: string;
  private readonly runner: CommandRunner;
  private readonly defaultRemote: string;
  private readonly initialBranch: string | undefined;
  private readonly logger: Logger;

  constructor(
    workingDir: string,
    runner: CommandRunner,
    options: RepositoryServiceOptions = {},
    logger: Logger = defaultLogger,
  ) {
    this.workingDir = path.resolve(workingDir);
    this.runner = runner;
    this.defaultRemote = options.defaultRemote ?? DEFAULT_CONFIG.defaultRemote;
    this.initialBranch = options.initialBranch;
    this.logger = logger;
  }

  public getWorkingDirectory(): string {
    return this.workingDir;
  }

  public inspect(): Promise<RepositoryHandle> {
    return inspectRepository(this.workingDir);
  }

  /**
   * Initialize a repository, creating the directory when missing.
   * An existing repository is left alone and reported with a warning.
   */
  public async init(): Promise<OperationResult<RepositoryHandle>> {
    return this.execute('init', {}, async handle => {
      if (handle.isInitialized) {
        return buildResult({
          action: 'init',
          success: true,
          message: `Repository already initialized at ${handle.path}`,
          warnings: [`Repository already exists at ${handle.path}; nothing to do`],
          data: handle,
        });
      }

      await fs.ensureDir(handle.path);
      const args = this.initialBranch ? ['init', '-b', this.initialBranch] : ['init'];
      const result = await this.invoke<RepositoryHandle>('init', args, () => ({
        message: `Initialized git repository at ${handle.path}`,
      }));
      if (!result.success) {
        return result;
      }

      const observed = await this.inspect();
      if (!observed.isInitialized) {
        return buildResult({
          ...result,
          success: false,
          errorKind: ErrorKind.UNCLASSIFIED_TOOL_ERROR,
          message: `git init reported success but no repository was found at ${handle.path}`,
          warnings: [...result.warnings],
        });
      }
      return buildResult({ ...result, warnings: [...result.warnings], data: observed });
    });
  }

  /**
   * Stage files, given relative to the repository root
   */
  public async add(filePaths: string[]): Promise<OperationResult<string[]>> {
    return this.execute('add', { paths: filePaths }, async handle => {
      this.requireInitialized(handle);

      if (filePaths.length === 0) {
        throw new PreconditionFailedError('NO_PATHS', 'No files specified to add');
      }

      const relativePaths: string[] = [];
      const missing: string[] = [];
      for (const filePath of filePaths) {
        const absolute = path.resolve(handle.path, filePath);
        const relative = path.relative(handle.path, absolute);
        if (relative === '..' || relative.startsWith(`..${path.sep}`) || path.isAbsolute(relative)) {
          throw new PreconditionFailedError(
            'OUTSIDE_REPOSITORY',
            `Path is outside the repository: ${filePath}`,
          );
        }
        if (!(await fs.pathExists(absolute))) {
          missing.push(filePath);
        }
        relativePaths.push(relative === '' ? '.' : relative);
      }

      if (missing.length > 0) {
        throw new PreconditionFailedError(
          'PATH_NOT_FOUND',
          `File not found: ${missing.join(', ')}`,
        );
      }

      return this.invoke('add', ['add', '--', ...relativePaths], () => ({
        message: `Added ${relativePaths.length} file(s) to staging: ${relativePaths.join(', ')}`,
        data: relativePaths,
      }));
    });
  }

  /**
   * Commit staged changes
   */
  public async commit(message: string): Promise<OperationResult<CommitSummary>> {
    return this.execute('commit', { message }, async handle => {
      if (!message || !message.trim()) {
        throw new PreconditionFailedError('EMPTY_MESSAGE', 'Commit message cannot be empty');
      }
      this.requireInitialized(handle);

      const status = parsePorcelainStatus(await this.probe('commit', ['status', '--porcelain']));
      if (status.staged.length === 0) {
        throw new PreconditionFailedError(
          'NOTHING_STAGED',
          'Nothing is staged for commit; add files first',
        );
      }

      return this.invoke('commit', ['commit', '-m', message.trim()], raw => {
        const summary = parseCommitSummary(raw.stdout);
        return {
          message: summary.hash
            ? `Created commit ${summary.hash}: ${message.trim()}`
            : `Created commit: ${message.trim()}`,
          data: summary,
        };
      });
    });
  }

  /**
   * Push a branch (the current one by default) to a configured remote
   */
  public async push(options: PushOptions = {}): Promise<OperationResult> {
    const remote = options.remote ?? this.defaultRemote;
    const setUpstream = options.setUpstream ?? true;

    return this.execute('push', { remote, branch: options.branch, setUpstream }, async handle => {
      this.requireInitialized(handle);
      await this.requireRemote('push', remote);

      const branch = options.branch ?? (await this.readCurrentBranch());
      if (!branch) {
        throw new PreconditionFailedError(
          'NO_CURRENT_BRANCH',
          'Cannot determine the branch to push (HEAD is detached); name a branch explicitly',
        );
      }

      if (!(await this.refExists(`refs/heads/${branch}`))) {
        throw new PreconditionFailedError(
          'NO_COMMITS',
          `Branch '${branch}' has no commits to push`,
        );
      }

      const args = setUpstream ? ['push', '-u', remote, branch] : ['push', remote, branch];
      return this.invoke('push', args, () => ({ message: `Pushed ${branch} to ${remote}` }));
    });
  }

  /**
   * Create a branch and, unless told otherwise, switch to it
   */
  public async createBranch(
    branchName: string,
    options: CreateBranchOptions = {},
  ): Promise<OperationResult> {
    const checkout = options.checkout ?? true;

    return this.execute('branch-create', { branch: branchName, checkout }, async handle => {
      const name = this.requireBranchName(branchName);
      this.requireInitialized(handle);

      const listing = await this.readBranches('branch-create');
      if (listing.branches.some(branch => branch.name === name)) {
        throw new PreconditionFailedError(
          'BRANCH_EXISTS',
          `A branch named '${name}' already exists`,
        );
      }

      const args = checkout ? ['checkout', '-b', name] : ['branch', name];
      return this.invoke('branch-create', args, () => ({
        message: checkout ? `Created and switched to branch: ${name}` : `Created branch: ${name}`,
      }));
    });
  }

  /**
   * Merge another branch into the current branch
   */
  public async merge(branchName: string): Promise<OperationResult> {
    return this.execute('merge', { branch: branchName }, async handle => {
      const name = this.requireBranchName(branchName);
      this.requireInitialized(handle);

      const listing = await this.readBranches('merge');
      this.requireBranchExists(listing, name);
      if (listing.current === name) {
        throw new PreconditionFailedError(
          'SAME_BRANCH',
          `Cannot merge '${name}' into itself; check out another branch first`,
        );
      }

      return this.invoke('merge', ['merge', name], raw =>
        /already up to date/i.test(raw.stdout)
          ? { message: `Already up to date with ${name}` }
          : { message: `Merged branch: ${name}` },
      );
    });
  }

  /**
   * Pull from a configured remote; the current branch is used when none is named
   */
  public async pull(options: PullOptions = {}): Promise<OperationResult> {
    const remote = options.remote ?? this.defaultRemote;

    return this.execute('pull', { remote, branch: options.branch }, async handle => {
      this.requireInitialized(handle);
      await this.requireRemote('pull', remote);

      const branch = options.branch ?? (await this.readCurrentBranch());
      const args = branch ? ['pull', remote, branch] : ['pull', remote];
      return this.invoke('pull', args, () => ({
        message: branch ? `Pulled changes from ${remote}/${branch}` : `Pulled changes from ${remote}`,
      }));
    });
  }

  /**
   * Switch to an existing branch
   */
  public async checkout(branchName: string): Promise<OperationResult> {
    return this.execute('checkout', { branch: branchName }, async handle => {
      const name = this.requireBranchName(branchName);
      this.requireInitialized(handle);

      this.requireBranchExists(await this.readBranches('checkout'), name);

      return this.invoke('checkout', ['checkout', name], () => ({
        message: `Switched to branch: ${name}`,
      }));
    });
  }

  /**
   * List local branches, current branch first
   */
  public async listBranches(): Promise<OperationResult<BranchListing>> {
    return this.execute('branch-list', {}, async handle => {
      this.requireInitialized(handle);

      return this.invoke('branch-list', ['branch', '--list', '--no-color'], raw => {
        const listing = parseBranchList(raw.stdout);
        return {
          message:
            listing.branches.length > 0
              ? `Found branches: ${listing.branches.map(branch => branch.name).join(', ')}`
              : 'No branches yet',
          data: listing,
        };
      });
    });
  }

  /**
   * Working tree status
   */
  public async status(): Promise<OperationResult<RepositoryStatus>> {
    return this.execute('status', {}, async handle => {
      this.requireInitialized(handle);

      return this.invoke('status', ['status', '--porcelain'], raw => {
        const status = parsePorcelainStatus(raw.stdout);
        return {
          message: status.isClean
            ? 'Working tree clean'
            : `${status.staged.length} staged, ${status.modified.length} modified, ${status.untracked.length} untracked, ${status.conflicted.length} conflicted`,
          data: status,
        };
      });
    });
  }

  /**
   * Run one action body and convert expected failures into results
   */
  private async execute<T = undefined>(
    action: RepositoryAction,
    params: Record<string, unknown>,
    body: (handle: RepositoryHandle) => Promise<OperationResult<T>>,
  ): Promise<OperationResult<T>> {
    let result: OperationResult<T>;
    try {
      result = await body(await this.inspect());
    } catch (error) {
      result = this.toFailure<T>(action, error);
    }

    const event: LogEvent = {
      action,
      params,
      outcome: result.success ? 'success' : (result.errorKind ?? 'failure'),
    };
    this.logger.debug(`git ${action}: ${result.message}`, event);
    for (const warning of result.warnings) {
      this.logger.warn(warning);
    }
    return result;
  }

  private toFailure<T>(action: RepositoryAction, error: unknown): OperationResult<T> {
    if (error instanceof PreconditionFailedError) {
      return buildResult<T>({
        action,
        success: false,
        errorKind: error.kind,
        reason: error.precondition,
        message: error.message,
      });
    }

    if (error instanceof ToolUnavailableError) {
      return buildResult<T>({
        action,
        success: false,
        errorKind: error.kind,
        message: error.details ? `${error.message}: ${error.details}` : error.message,
      });
    }

    if (error instanceof RepositoryProbeError) {
      return this.classified<T>(action, error.result);
    }

    throw error;
  }

  private classified<T>(action: RepositoryAction, raw: RawCommandResult): OperationResult<T> {
    const classification = classifyFailure(action, raw);
    return buildResult<T>({
      action,
      success: false,
      exitCode: raw.exitCode,
      stdout: raw.stdout,
      stderr: raw.stderr,
      errorKind: classification.kind,
      reason: classification.reason,
      message: classification.message,
    });
  }

  /**
   * Invoke the tool for the action itself
   */
  private async invoke<T = undefined>(
    action: RepositoryAction,
    args: string[],
    onSuccess: (raw: RawCommandResult) => SuccessDetails<T>,
  ): Promise<OperationResult<T>> {
    const raw = await this.runner.run(this.workingDir, args);
    if (raw.exitCode !== 0) {
      return this.classified<T>(action, raw);
    }

    const details = onSuccess(raw);
    return buildResult<T>({
      action,
      success: true,
      exitCode: raw.exitCode,
      stdout: raw.stdout,
      stderr: raw.stderr,
      message: details.message,
      warnings: details.warnings ?? [],
      data: details.data,
    });
  }

  /**
   * Read-only query used by a precondition; a non-zero exit aborts the action
   */
  private async probe(action: RepositoryAction, args: string[]): Promise<string> {
    const raw = await this.runner.run(this.workingDir, args);
    if (raw.exitCode !== 0) {
      throw new RepositoryProbeError(action, args, raw);
    }
    return raw.stdout;
  }

  private async readBranches(action: RepositoryAction): Promise<BranchListing> {
    return parseBranchList(await this.probe(action, ['branch', '--list', '--no-color']));
  }

  /**
   * Current branch name, or null when HEAD is detached
   */
  private async readCurrentBranch(): Promise<string | null> {
    const raw = await this.runner.run(this.workingDir, ['symbolic-ref', '--short', '-q', 'HEAD']);
    const name = raw.stdout.trim();
    return raw.exitCode === 0 && name ? name : null;
  }

  private async refExists(ref: string): Promise<boolean> {
    const raw = await this.runner.run(this.workingDir, ['rev-parse', '--verify', '-q', ref]);
    return raw.exitCode === 0;
  }

  private async requireRemote(action: RepositoryAction, remote: string): Promise<void> {
    const remotes = outputLines(await this.probe(action, ['remote'])).map(line => line.trim());
    if (!remotes.includes(remote)) {
      throw new PreconditionFailedError(
        'REMOTE_NOT_CONFIGURED',
        remotes.length > 0
          ? `Remote '${remote}' is not configured (configured: ${remotes.join(', ')})`
          : `Remote '${remote}' is not configured; no remotes are set up`,
      );
    }
  }

  private requireInitialized(handle: RepositoryHandle): void {
    if (!handle.exists) {
      throw new PreconditionFailedError(
        'DIRECTORY_NOT_FOUND',
        `Directory does not exist: ${handle.path}`,
      );
    }
    if (!handle.isInitialized) {
      throw new PreconditionFailedError('NOT_INITIALIZED', `Not a git repository: ${handle.path}`);
    }
  }

  private requireBranchName(branchName: string): string {
    const name = branchName ? branchName.trim() : '';
    if (!name) {
      throw new PreconditionFailedError('EMPTY_BRANCH_NAME', 'Branch name cannot be empty');
    }
    if (name.startsWith('-')) {
      throw new PreconditionFailedError(
        'INVALID_BRANCH_NAME',
        `Branch name cannot start with '-': ${name}`,
      );
    }
    return name;
  }

  private requireBranchExists(listing: BranchListing, name: string): void {
    if (!listing.branches.some(branch => branch.name === name)) {
      throw new PreconditionFailedError('BRANCH_NOT_FOUND', `Branch '${name}' does not exist`);
    }
  }
}
