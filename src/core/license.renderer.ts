import { LicenseEntry, RenderedLicense } from '../types/license.types';
import { LicenseRenderError } from '../errors/license.error';

/**
 * `{name}` is kept as an alias of `{author}` for catalogs written in that style
 */
export const RECOGNIZED_PLACEHOLDERS = ['year', 'author', 'name'] as const;

const PLACEHOLDER_PATTERN = /\{([A-Za-z_][A-Za-z0-9_]*)\}/g;

function isRecognized(token: string): boolean {
  return RECOGNIZED_PLACEHOLDERS.some(name => name === token);
}

/**
 * Placeholder tokens in a template that the renderer does not know
 */
export function findUnknownPlaceholders(template: string): string[] {
  const unknown = new Set<string>();
  for (const match of template.matchAll(PLACEHOLDER_PATTERN)) {
    const token = match[1];
    if (token !== undefined && !isRecognized(token)) {
      unknown.add(token);
    }
  }
  return [...unknown];
}

/**
 * Substitute year and author into a license template.
 *
 * Pure and single-pass: the author is inserted verbatim, and placeholder-like
 * text inside it is never expanded. The year is written as plain ASCII digits.
 */
export function renderLicense(entry: LicenseEntry, author: string, year: number): RenderedLicense {
  if (!Number.isInteger(year) || year < 1000 || year > 9999) {
    throw new LicenseRenderError(`Year must be a four-digit integer, got ${year}`);
  }

  if (entry.requiresAuthor && !author.trim()) {
    throw new LicenseRenderError(
      `License '${entry.id}' requires an author/organization name`,
    );
  }

  const yearText = String(year);
  const text = entry.template.replace(PLACEHOLDER_PATTERN, (token: string, key: string) => {
    switch (key) {
      case 'year':
        return yearText;
      case 'author':
      case 'name':
        return author;
      default:
        return token;
    }
  });

  return Object.freeze({ licenseId: entry.id, text, year, author });
}
