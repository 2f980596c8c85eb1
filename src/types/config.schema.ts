import { z } from 'zod';

export const LogLevelNameSchema = z.enum(['none', 'error', 'warn', 'info', 'debug']);

/**
 * Schema for `repoforge.config.json`. Every key is optional; missing keys fall
 * back to DEFAULT_CONFIG.
 */
export const RepoForgeConfigFileSchema = z
  .object({
    catalogPath: z.string().min(1, 'catalogPath cannot be empty'),
    licenseFileName: z
      .string()
      .min(1, 'licenseFileName cannot be empty')
      .refine(name => !/[\\/]/.test(name), 'licenseFileName must be a plain file name'),
    stageLicense: z.boolean(),
    defaultRemote: z.string().min(1, 'defaultRemote cannot be empty'),
    initialBranch: z.string().min(1, 'initialBranch cannot be empty'),
    gitBinary: z.string().min(1, 'gitBinary cannot be empty'),
    logLevel: LogLevelNameSchema,
  })
  .partial()
  .strict();

export type RepoForgeConfigFile = z.infer<typeof RepoForgeConfigFileSchema>;

/**
 * Fields of one license catalog entry. Unknown keys are ignored so catalogs
 * can carry extra metadata.
 */
export const LicenseEntrySchema = z.object({
  name: z.string().trim().min(1, 'name cannot be empty').optional(),
  text: z
    .string({ required_error: 'text is required', invalid_type_error: 'text must be a string' })
    .refine(text => text.trim().length > 0, 'text cannot be empty'),
  requiresAuthor: z.boolean().optional(),
  spdxId: z.string().trim().min(1, 'spdxId cannot be empty').optional(),
});

export type LicenseEntryFields = z.infer<typeof LicenseEntrySchema>;

/**
 * Top-level shape of a catalog file: identifier → entry. Entries stay
 * `unknown` here and are validated one by one.
 */
export const LicenseCatalogFileSchema = z.record(z.string(), z.unknown());
