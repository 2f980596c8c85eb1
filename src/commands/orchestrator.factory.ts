import { ConfigManager } from '../core/config.manager';
import { RepoOrchestrator } from '../core/repo.orchestrator';
import { CommandOptions } from '../types/operation.types';
import { LogLevel, logger, parseLogLevel } from '../utils/logger.service';

/**
 * Load project configuration and build the orchestrator for a working
 * directory. `--verbose` always wins over the configured log level.
 */
export async function createOrchestrator(
  workingDir: string,
  options: CommandOptions = {},
): Promise<RepoOrchestrator> {
  const configManager = new ConfigManager(workingDir);
  const config = await configManager.load();

  logger.setLevel(options.verbose ? LogLevel.DEBUG : (parseLogLevel(config.logLevel) ?? LogLevel.INFO));

  return RepoOrchestrator.create(
    workingDir,
    config,
    configManager.resolveCatalogPath(config),
    logger,
  );
}
