import { BaseError } from './base.error';
import { ErrorKind } from '../types/operation.types';

/**
 * Requested license identifier is absent from the merged catalog
 */
export class LicenseNotFoundError extends BaseError {
  public readonly code = 'LICENSE_NOT_FOUND';
  public readonly recoverable = true;
  public readonly kind = ErrorKind.LICENSE_NOT_FOUND;
  public readonly licenseId: string;

  constructor(licenseId: string, available: readonly string[] = []) {
    super(
      `License '${licenseId}' is not available`,
      available.length > 0 ? `Available licenses: ${available.join(', ')}` : undefined,
    );
    this.licenseId = licenseId;
  }
}

/**
 * External catalog file exists but cannot be read or parsed as a whole
 */
export class CatalogLoadFailedError extends BaseError {
  public readonly code = 'CATALOG_LOAD_FAILED';
  public readonly recoverable = true;
  public readonly kind = ErrorKind.CATALOG_LOAD_FAILED;
  public readonly catalogPath: string;

  constructor(catalogPath: string, details?: string) {
    super(`Failed to load license catalog ${catalogPath}; using built-in licenses only`, details);
    this.catalogPath = catalogPath;
  }
}

/**
 * One external catalog entry failed validation
 */
export class CatalogEntryInvalidError extends BaseError {
  public readonly code = 'CATALOG_ENTRY_INVALID';
  public readonly recoverable = true;
  public readonly kind = ErrorKind.CATALOG_ENTRY_INVALID;
  public readonly licenseId: string;

  constructor(licenseId: string, reason: string) {
    super(`Skipping license catalog entry '${licenseId}': ${reason}`, reason);
    this.licenseId = licenseId;
  }
}

/**
 * Render inputs rejected (bad year, missing author)
 */
export class LicenseRenderError extends BaseError {
  public readonly code = 'LICENSE_RENDER_ERROR';
  public readonly recoverable = true;
  public readonly kind = ErrorKind.PRECONDITION_FAILED;
}
