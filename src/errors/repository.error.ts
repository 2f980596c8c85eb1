import { BaseError } from './base.error';
import { ErrorKind, RawCommandResult, RepositoryAction } from '../types/operation.types';

/**
 * The external version-control tool could not be launched
 */
export class ToolUnavailableError extends BaseError {
  public readonly code = 'TOOL_UNAVAILABLE';
  public readonly recoverable = false;
  public readonly kind = ErrorKind.TOOL_UNAVAILABLE;
}

/**
 * A precondition checked before invoking the tool was not met
 */
export class PreconditionFailedError extends BaseError {
  public readonly code = 'PRECONDITION_FAILED';
  public readonly recoverable = true;
  public readonly kind = ErrorKind.PRECONDITION_FAILED;
  /** Short identifier of the precondition, e.g. `NOTHING_STAGED` */
  public readonly precondition: string;

  constructor(precondition: string, message: string, details?: string) {
    super(message, details);
    this.precondition = precondition;
  }
}

/**
 * A state probe run on behalf of an action exited non-zero
 */
export class RepositoryProbeError extends BaseError {
  public readonly code = 'REPOSITORY_PROBE_FAILED';
  public readonly recoverable = true;
  public readonly action: RepositoryAction;
  public readonly args: readonly string[];
  public readonly result: RawCommandResult;

  constructor(action: RepositoryAction, args: readonly string[], result: RawCommandResult) {
    super(`git ${args.join(' ')} exited with code ${result.exitCode}`, result.stderr.trim());
    this.action = action;
    this.args = args;
    this.result = result;
  }
}
