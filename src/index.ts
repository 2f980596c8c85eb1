/**
 * RepoForge
 *
 * Drives a local git installation for everyday repository workflows and
 * renders license files from a built-in or user-supplied catalog.
 */

export * from './commands/repository.command';
export * from './commands/license.command';
export * from './commands/orchestrator.factory';
export * from './core/command.runner';
export * from './core/config.manager';
export * from './core/failure.classifier';
export * from './core/license.catalog';
export * from './core/license.renderer';
export * from './core/repo.orchestrator';
export * from './core/repository.service';
export * from './types/config.types';
export * from './types/config.schema';
export * from './types/license.types';
export * from './types/operation.types';
export * from './types/repository.types';
export * from './errors/base.error';
export * from './errors/error.handler';
export * from './errors/license.error';
export * from './errors/repository.error';
export * from './utils/logger.service';
