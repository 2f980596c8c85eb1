import path from 'path';
import * as fs from 'fs-extra';
import { ZodError, ZodIssue } from 'zod';
import { DEFAULT_CONFIG, DEFAULT_PATHS, LOG_LEVEL_ENV, RepoForgeConfig } from '../types/config.types';
import {
  LogLevelNameSchema,
  RepoForgeConfigFile,
  RepoForgeConfigFileSchema,
} from '../types/config.schema';
import { BaseError } from '../errors/base.error';

/**
 * Configuration management errors
 */
export class ConfigError extends BaseError {
  public readonly code = 'CONFIG_ERROR';
  public readonly recoverable = true;
}

export class ConfigValidationError extends BaseError {
  public readonly code = 'CONFIG_VALIDATION_ERROR';
  public readonly recoverable = true;
}

/**
 * Loads `repoforge.config.json` from the working directory. The file is
 * optional; every missing key takes its default.
 */
export class ConfigManager {
  private readonly workingDir: string;
  private readonly configPath: string;
  private readonly env: NodeJS.ProcessEnv;
  private cachedConfig?: RepoForgeConfig | undefined;

  constructor(workingDir: string, env: NodeJS.ProcessEnv = process.env) {
    this.workingDir = path.resolve(workingDir);
    this.configPath = path.join(this.workingDir, DEFAULT_PATHS.config);
    this.env = env;
  }

  public getConfigPath(): string {
    return this.configPath;
  }

  public async exists(): Promise<boolean> {
    return fs.pathExists(this.configPath);
  }

  /**
   * Load configuration, applying defaults and the log level override
   */
  public async load(): Promise<RepoForgeConfig> {
    if (this.cachedConfig) {
      return this.cachedConfig;
    }

    let fileConfig: RepoForgeConfigFile = {};
    if (await this.exists()) {
      try {
        const content = await fs.readFile(this.configPath, 'utf-8');
        fileConfig = RepoForgeConfigFileSchema.parse(JSON.parse(content));
      } catch (error) {
        if (error instanceof ZodError) {
          const messages = error.issues.map(
            (issue: ZodIssue) => `${issue.path.join('.') || 'config'}: ${issue.message}`,
          );
          throw new ConfigValidationError(
            `Configuration file ${this.configPath} is invalid`,
            messages.join('; '),
          );
        }
        throw new ConfigError(
          `Failed to load configuration from ${this.configPath}`,
          error instanceof Error ? error.message : String(error),
        );
      }
    }

    const config: RepoForgeConfig = { ...DEFAULT_CONFIG, ...fileConfig };

    const envLevel = LogLevelNameSchema.safeParse(this.env[LOG_LEVEL_ENV]?.trim().toLowerCase());
    if (envLevel.success) {
      config.logLevel = envLevel.data;
    }

    this.cachedConfig = config;
    return config;
  }

  /**
   * Absolute path of the user license catalog
   */
  public resolveCatalogPath(config: RepoForgeConfig): string {
    return path.resolve(this.workingDir, config.catalogPath);
  }
}
