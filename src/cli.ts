#!/usr/bin/env node

import { program } from 'commander';
import { readFileSync } from 'fs';
import { join } from 'path';
import { InitCommand } from './commands/init.command';
import { PushCommand } from './commands/push.command';
import { PullCommand } from './commands/pull.command';
import { StatusCommand } from './commands/status.command';
import { EnhancedErrorHandler } from './errors/enhanced.error-handler';
import { logger, LogLevel } from './utils/logger.service';
import { CommandResult, FALLBACK_VERSION } from './types/config.types';

/**
 * Read the package version, falling back when package.json is not beside dist/
 */
function readVersion(): string {
  try {
    const packageJson: unknown = JSON.parse(
      readFileSync(join(__dirname, '..', 'package.json'), 'utf-8'),
    );
    if (
      typeof packageJson === 'object' &&
      packageJson !== null &&
      'version' in packageJson &&
      typeof packageJson.version === 'string'
    ) {
      return packageJson.version;
    }
  } catch {
    logger.warn('Could not read package.json for version, using fallback');
  }
  return FALLBACK_VERSION;
}

/**
 * Main CLI entry point
 */
async function main(): Promise<void> {
  program
    .name('anvil')
    .description('Sync application configuration to a private git repository')
    .version(readVersion(), '-v, -V, --version', 'Output the current version')
    .option('--verbose', 'Show verbose output')
    .on('option:verbose', () => {
      logger.setLevel(LogLevel.DEBUG);
      logger.debug('Verbose mode enabled');
    });

  // Initialize command
  program
    .command('init')
    .description('Create the settings file')
    .option('-r, --repo <repository>', 'Configuration repository (owner/name or URL)')
    .option('-b, --branch <branch>', 'Tracked branch', 'main')
    .option('--force', 'Overwrite existing settings')
    .action(async options => {
      try {
        const result = await new InitCommand().execute({
          repo: options.repo,
          branch: options.branch,
          force: options.force,
          verbose: program.opts()['verbose'],
        });
        finish(result, 'init', 'anvil initialized');
      } catch (error) {
        handleError(error, 'init');
      }
    });

  // Push command
  program
    .command('push [app]')
    .description('Push an application configuration (or the anvil settings) to a new branch')
    .option('-y, --yes', 'Skip the confirmation prompt')
    .action(async (app: string | undefined, options) => {
      try {
        const result = await new PushCommand().execute(app, {
          yes: options.yes,
          verbose: program.opts()['verbose'],
        });
        finish(result, 'push', 'Configuration pushed');
      } catch (error) {
        handleError(error, 'push');
      }
    });

  // Pull command
  program
    .command('pull [target]')
    .description('Copy a target from the repository into ~/.anvil/temp for review')
    .action(async (target: string | undefined) => {
      try {
        const result = await new PullCommand().execute(target, {
          verbose: program.opts()['verbose'],
        });
        finish(result, 'pull', 'Configuration pulled');
      } catch (error) {
        handleError(error, 'pull');
      }
    });

  // Status command
  program
    .command('status')
    .description('Show settings and working copy status')
    .action(async () => {
      try {
        const result = await new StatusCommand().execute({ verbose: program.opts()['verbose'] });
        finish(result, 'status');
      } catch (error) {
        handleError(error, 'status');
      }
    });

  // Global error handler - only override for actual errors, not help/version
  program.exitOverride(err => {
    if (
      err.code === 'commander.version' ||
      err.code === 'commander.helpDisplayed' ||
      err.code === 'commander.help'
    ) {
      process.exit(0);
    }
    process.exit(1);
  });

  await program.parseAsync(process.argv);
}

/**
 * Report a command result and set the exit code
 */
function finish(result: CommandResult, command: string, successMessage?: string): void {
  if (result.success) {
    const message = result.message || successMessage;
    if (message && command !== 'status') {
      logger.success(message);
    }
    return;
  }

  if (result.exitCode === 0) {
    logger.warn(result.message || `${command} did not complete`);
    return;
  }

  if (result.error) {
    EnhancedErrorHandler.handleError(result.error, EnhancedErrorHandler.createContext(command, process.argv.slice(3)));
  } else {
    logger.error(result.message || `${command} failed`);
  }
  process.exit(result.exitCode);
}

/**
 * Handle errors with enhanced formatting and recovery suggestions
 */
function handleError(error: unknown, command?: string): void {
  const context = EnhancedErrorHandler.createContext(command, process.argv.slice(3), process.cwd());
  EnhancedErrorHandler.handleError(error, context);
  process.exit(1);
}

if (require.main === module) {
  main().catch(handleError);
}
