import * as path from 'path';
import chalk from 'chalk';
import { ANVIL_TARGET, CommandOptions, CommandResult, CONFIG_FILE } from '../types/config.types';
import { SettingsManager } from '../core/config.manager';
import { SyncOrchestrator } from '../core/sync.orchestrator';
import { BaseError } from '../errors/base.error';
import { logger } from '../utils/logger.service';
import { ConsoleProgressReporter } from '../utils/progress.reporter';

export interface PullCommandDependencies {
  settingsManager?: SettingsManager | undefined;
  orchestrator?: SyncOrchestrator | undefined;
  env?: NodeJS.ProcessEnv | undefined;
}

/**
 * Copy a target from the tracked branch into the temp directory for review.
 * Nothing in the operator's live configuration is overwritten.
 */
export class PullCommand {
  private readonly settingsManager: SettingsManager;
  private readonly orchestrator: SyncOrchestrator;
  private readonly env: NodeJS.ProcessEnv;

  constructor(dependencies: PullCommandDependencies = {}) {
    this.settingsManager = dependencies.settingsManager || new SettingsManager();
    this.orchestrator =
      dependencies.orchestrator || new SyncOrchestrator({ progress: new ConsoleProgressReporter() });
    this.env = dependencies.env || process.env;
  }

  public async execute(
    targetName: string = ANVIL_TARGET,
    options: CommandOptions = {},
  ): Promise<CommandResult> {
    try {
      const settings = await this.settingsManager.load();
      for (const warning of this.settingsManager.getWarnings(settings)) {
        logger.warn(warning);
      }

      const handle = this.settingsManager.resolveHandle(settings, this.env);
      const record = await this.orchestrator.pullTarget(
        handle,
        targetName,
        this.settingsManager.getTempDir(),
      );

      if (targetName === ANVIL_TARGET && record.files.includes(CONFIG_FILE)) {
        const restored = await this.settingsManager.restoreGitIdentity(
          path.join(record.destinationPath, CONFIG_FILE),
          settings,
        );
        if (restored) {
          logger.info('Masked git identity replaced with your local values');
        }
      }

      logger.info(chalk.bold(`Files in ${record.destinationPath}:`));
      for (const file of record.files) {
        logger.info(`   ${file}`);
      }
      if (options.verbose) {
        logger.debug(`${record.files.length} file(s) copied`);
      }

      return {
        success: true,
        message: `Pulled ${targetName} to ${record.destinationPath}`,
        data: record,
        exitCode: 0,
      };
    } catch (error) {
      if (error instanceof BaseError) {
        return {
          success: false,
          message: error.message,
          error,
          exitCode: 1,
        };
      }

      return {
        success: false,
        message: `Failed to pull ${targetName}`,
        error: error instanceof Error ? error : new Error(String(error)),
        exitCode: 1,
      };
    }
  }
}
