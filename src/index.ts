/**
 * anvil
 *
 * Keeps application configuration in a private git repository. Every push goes
 * to a fresh timestamped branch after a privacy check, a change check and an
 * explicit confirmation.
 */

export * from './commands/init.command';
export * from './commands/push.command';
export * from './commands/pull.command';
export * from './commands/status.command';
export * from './core/command.runner';
export * from './core/config.manager';
export * from './core/filesystem.service';
export * from './core/working-copy.service';
export * from './core/privacy.service';
export * from './core/change-detector.service';
export * from './core/diff-summary.service';
export * from './core/sync.orchestrator';
export * from './types/config.types';
export * from './types/config.schema';
export * from './types/sync.types';
export * from './errors/base.error';
export * from './errors/command.error';
export * from './errors/filesystem.error';
export * from './errors/sync.error';
export * from './errors/enhanced.error-handler';
export * from './utils/branch-name';
export * from './utils/repository-url';
