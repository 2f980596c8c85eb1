import * as path from 'path';
import * as fs from 'fs-extra';
import { ZodError } from 'zod';
import builtinLicenses from '../data/builtin-licenses.json';
import { CatalogIssue, LicenseEntry, LicenseSource } from '../types/license.types';
import { LicenseCatalogFileSchema, LicenseEntrySchema } from '../types/config.schema';
import { CatalogEntryInvalidError, CatalogLoadFailedError, LicenseNotFoundError } from '../errors/license.error';
import { findUnknownPlaceholders } from './license.renderer';
import { Logger, logger as defaultLogger } from '../utils/logger.service';

type EntryValidation = { entry: LicenseEntry } | { reason: string };

function catalogKey(id: string): string {
  return id.trim().toLowerCase();
}

/**
 * Validate one raw catalog record. Optional fields missing from an override
 * fall back to the entry it replaces; the template never does.
 */
function validateEntry(
  id: string,
  raw: unknown,
  source: LicenseSource,
  fallback?: LicenseEntry,
): EntryValidation {
  const trimmedId = id.trim();
  if (!trimmedId) {
    return { reason: 'identifier cannot be empty' };
  }

  const parsed = LicenseEntrySchema.safeParse(raw);
  if (!parsed.success) {
    return {
      reason: parsed.error.issues
        .map(issue => `${issue.path.join('.') || 'entry'}: ${issue.message}`)
        .join('; '),
    };
  }

  const unknown = findUnknownPlaceholders(parsed.data.text);
  if (unknown.length > 0) {
    return {
      reason: `unknown placeholder(s): ${unknown.map(token => `{${token}}`).join(', ')}`,
    };
  }

  return {
    entry: Object.freeze({
      id: trimmedId,
      name: parsed.data.name ?? fallback?.name ?? trimmedId,
      template: parsed.data.text,
      requiresAuthor: parsed.data.requiresAuthor ?? fallback?.requiresAuthor ?? true,
      spdxId: parsed.data.spdxId ?? fallback?.spdxId,
      source,
    }),
  };
}

function describeLoadFailure(error: unknown): string {
  if (error instanceof ZodError) {
    return 'Catalog must be a JSON object mapping license identifiers to entries';
  }
  if (error instanceof SyntaxError) {
    return `Invalid JSON: ${error.message}`;
  }
  return error instanceof Error ? error.message : String(error);
}

function loadBuiltinEntries(): Map<string, LicenseEntry> {
  const entries = new Map<string, LicenseEntry>();
  for (const [id, raw] of Object.entries(builtinLicenses)) {
    const validation = validateEntry(id, raw, 'builtin');
    if ('reason' in validation) {
      throw new Error(`Built-in license '${id}' is invalid: ${validation.reason}`);
    }
    entries.set(catalogKey(id), validation.entry);
  }
  return entries;
}

/**
 * Merged, read-only set of license templates.
 *
 * Lookup is case-insensitive. External entries replace built-ins with the
 * same identifier; invalid external entries are skipped and recorded in
 * `issues`; an unreadable catalog file is recorded in `loadError` and the
 * built-ins stay available.
 */
export class LicenseCatalog {
  private readonly entries: ReadonlyMap<string, LicenseEntry>;
  public readonly issues: readonly CatalogIssue[];
  public readonly loadError: CatalogLoadFailedError | null;
  public readonly externalPath: string | null;

  private constructor(
    entries: Map<string, LicenseEntry>,
    issues: CatalogIssue[],
    loadError: CatalogLoadFailedError | null,
    externalPath: string | null,
  ) {
    this.entries = entries;
    this.issues = Object.freeze([...issues]);
    this.loadError = loadError;
    this.externalPath = externalPath;
    Object.freeze(this);
  }

  /**
   * Catalog containing only the built-in licenses
   */
  public static builtin(): LicenseCatalog {
    return new LicenseCatalog(loadBuiltinEntries(), [], null, null);
  }

  /**
   * Load built-ins and merge the optional external catalog file
   */
  public static async load(
    externalPath?: string,
    logger: Logger = defaultLogger,
  ): Promise<LicenseCatalog> {
    const entries = loadBuiltinEntries();
    if (!externalPath) {
      return new LicenseCatalog(entries, [], null, null);
    }

    const resolvedPath = path.resolve(externalPath);
    if (!(await fs.pathExists(resolvedPath))) {
      logger.debug(`No license catalog at ${resolvedPath}; using built-in licenses`);
      return new LicenseCatalog(entries, [], null, null);
    }

    let records: Record<string, unknown>;
    try {
      const content = await fs.readFile(resolvedPath, 'utf-8');
      records = LicenseCatalogFileSchema.parse(JSON.parse(content));
    } catch (error) {
      const loadError = new CatalogLoadFailedError(resolvedPath, describeLoadFailure(error));
      logger.error(loadError.message, loadError.details);
      return new LicenseCatalog(entries, [], loadError, resolvedPath);
    }

    const issues: CatalogIssue[] = [];
    const seen = new Set<string>();
    for (const [id, raw] of Object.entries(records)) {
      const key = catalogKey(id);
      if (seen.has(key)) {
        issues.push({ id, reason: `duplicate identifier (case-insensitive) '${id}'` });
        continue;
      }
      seen.add(key);

      const replaced = entries.get(key);
      const validation = validateEntry(id, raw, 'external', replaced);
      if ('reason' in validation) {
        issues.push({ id, reason: validation.reason });
        continue;
      }

      if (replaced) {
        logger.debug(`License '${id}' from ${resolvedPath} overrides built-in '${replaced.id}'`);
      }
      entries.set(key, validation.entry);
    }

    for (const issue of issues) {
      logger.warn(new CatalogEntryInvalidError(issue.id, issue.reason).message);
    }
    logger.debug(`Loaded license catalog from ${resolvedPath} (${entries.size} licenses)`);

    return new LicenseCatalog(entries, issues, null, resolvedPath);
  }

  /**
   * @throws LicenseNotFoundError when the identifier is not in the catalog
   */
  public lookup(id: string): LicenseEntry {
    const entry = this.entries.get(catalogKey(id));
    if (!entry) {
      throw new LicenseNotFoundError(id, this.ids());
    }
    return entry;
  }

  public has(id: string): boolean {
    return this.entries.has(catalogKey(id));
  }

  /**
   * Entries sorted by identifier
   */
  public list(): LicenseEntry[] {
    return [...this.entries.entries()]
      .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
      .map(([, entry]) => entry);
  }

  public ids(): string[] {
    return this.list().map(entry => entry.id);
  }

  public get size(): number {
    return this.entries.size;
  }
}
