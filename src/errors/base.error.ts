/**
 * Base class for every error raised by repoforge.
 *
 * `code` is a stable machine-readable identifier, `recoverable` tells the CLI
 * whether retrying after user action makes sense, and `details` carries the
 * underlying diagnostic (usually the tool's stderr).
 */
export abstract class BaseError extends Error {
  public abstract readonly code: string;
  public abstract readonly recoverable: boolean;
  public readonly details: string | undefined;

  constructor(message: string, details?: string) {
    super(message);
    this.name = new.target.name;
    this.details = details;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}
