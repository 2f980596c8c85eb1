/**
 * Project-level settings, read from `repoforge.config.json` when present
 */
export interface RepoForgeConfig {
  /** Path of the optional user license catalog, relative to the working directory */
  catalogPath: string;
  /** File name written at the repository root by license generation */
  licenseFileName: string;
  /** Stage the generated license file by default */
  stageLicense: boolean;
  defaultRemote: string;
  /** Passed to `git init -b` when set */
  initialBranch?: string | undefined;
  gitBinary: string;
  logLevel: LogLevelName;
}

export type LogLevelName = 'none' | 'error' | 'warn' | 'info' | 'debug';

export const DEFAULT_CONFIG: RepoForgeConfig = {
  catalogPath: 'licenses.json',
  licenseFileName: 'LICENSE',
  stageLicense: true,
  defaultRemote: 'origin',
  gitBinary: 'git',
  logLevel: 'info',
};

export const DEFAULT_PATHS = {
  config: 'repoforge.config.json',
  gitDir: '.git',
} as const;

export const LOG_LEVEL_ENV = 'REPOFORGE_LOG_LEVEL';

export const FALLBACK_VERSION = '1.0.0';
