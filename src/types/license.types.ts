import { ErrorKind, OperationResult } from './operation.types';

export type LicenseSource = 'builtin' | 'external';

/**
 * One license template in the merged catalog
 */
export interface LicenseEntry {
  readonly id: string;
  readonly name: string;
  /** Body text containing `{year}` and `{author}` placeholders */
  readonly template: string;
  readonly requiresAuthor: boolean;
  readonly spdxId?: string;
  readonly source: LicenseSource;
}

export interface RenderedLicense {
  readonly licenseId: string;
  readonly text: string;
  readonly year: number;
  readonly author: string;
}

/**
 * Recorded problem with a single external catalog entry
 */
export interface CatalogIssue {
  readonly id: string;
  readonly reason: string;
}

export interface LicenseGenerationOptions {
  licenseId: string;
  author: string;
  /** Defaults to the current calendar year */
  year?: number;
  /** Stage the written file (defaults to the configured `stageLicense`) */
  stage?: boolean;
}

export type SequenceStep = 'lookup' | 'render' | 'write' | 'stage';

/**
 * Outcome of the render → write → stage sequence
 */
export interface LicenseGenerationResult {
  readonly success: boolean;
  readonly errorKind: ErrorKind | null;
  readonly message: string;
  readonly licenseId: string;
  readonly filePath: string;
  readonly fileWritten: boolean;
  readonly staged: boolean;
  readonly completedSteps: readonly SequenceStep[];
  readonly failedStep: SequenceStep | null;
  readonly warnings: readonly string[];
  readonly rendered?: RenderedLicense;
  readonly stageResult?: OperationResult<string[]>;
}
