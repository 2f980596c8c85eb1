/**
 * User-facing failure taxonomy shared by repository and license operations
 */
export enum ErrorKind {
  TOOL_UNAVAILABLE = 'ToolUnavailable',
  PRECONDITION_FAILED = 'PreconditionFailed',
  CLASSIFIED_TOOL_ERROR = 'ClassifiedToolError',
  UNCLASSIFIED_TOOL_ERROR = 'UnclassifiedToolError',
  CATALOG_ENTRY_INVALID = 'CatalogEntryInvalid',
  CATALOG_LOAD_FAILED = 'CatalogLoadFailed',
  LICENSE_NOT_FOUND = 'LicenseNotFound',
  PARTIAL_SEQUENCE_FAILURE = 'PartialSequenceFailure',
}

/**
 * Repository actions the front end can request
 */
export type RepositoryAction =
  | 'init'
  | 'add'
  | 'commit'
  | 'push'
  | 'branch-create'
  | 'merge'
  | 'pull'
  | 'checkout'
  | 'branch-list'
  | 'status';

/**
 * Output of one external tool invocation, before interpretation
 */
export interface RawCommandResult {
  exitCode: number;
  stdout: string;
  stderr: string;
}

/**
 * Outcome of one repository action
 */
export interface OperationResult<T = undefined> {
  readonly action: RepositoryAction;
  readonly success: boolean;
  /** null when the action stopped before any process ran */
  readonly exitCode: number | null;
  readonly stdout: string;
  readonly stderr: string;
  readonly errorKind: ErrorKind | null;
  /** Pattern code for classified tool failures and failed preconditions */
  readonly reason: string | null;
  readonly message: string;
  readonly warnings: readonly string[];
  readonly data?: T;
}

/**
 * Front-end facing result shape used by CLI commands
 */
export interface CommandResult {
  success: boolean;
  message?: string;
  exitCode: number;
}

export interface CommandOptions {
  verbose?: boolean;
  workingDir?: string;
}
