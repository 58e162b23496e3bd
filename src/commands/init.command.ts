import chalk from 'chalk';
import { CommandOptions, CommandResult } from '../types/config.types';
import { SettingsManager } from '../core/config.manager';
import { BaseError } from '../errors/base.error';
import { logger } from '../utils/logger.service';

export interface InitOptions extends CommandOptions {
  repo?: string | undefined;
  branch?: string | undefined;
  force?: boolean | undefined;
}

/**
 * Write the initial settings file
 */
export class InitCommand {
  private readonly settingsManager: SettingsManager;

  constructor(settingsManager?: SettingsManager) {
    this.settingsManager = settingsManager || new SettingsManager();
  }

  public async execute(options: InitOptions = {}): Promise<CommandResult> {
    try {
      if ((await this.settingsManager.exists()) && !options.force) {
        return {
          success: false,
          message: `Settings already exist at ${this.settingsManager.getSettingsPath()}. Use --force to overwrite them.`,
          exitCode: 1,
        };
      }

      const settings = await this.settingsManager.create({
        configRepo: options.repo,
        branch: options.branch,
      });

      logger.info(`Settings written to ${chalk.cyan(this.settingsManager.getSettingsPath())}`);
      logger.info('');
      logger.info(chalk.bold('Next steps:'));
      if (!settings.github.configRepo) {
        logger.info('   • Set github.configRepo to your private repository (e.g. username/dotfiles)');
      }
      logger.info('   • Add the applications to sync under "configs", e.g. "nvim": "~/.config/nvim"');
      logger.info(`   • Export ${settings.github.tokenEnvVar} or set git.sshKeyPath for authentication`);

      return {
        success: true,
        message: 'anvil initialized',
        data: settings,
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
        message: 'Failed to initialize settings',
        error: error instanceof Error ? error : new Error(String(error)),
        exitCode: 1,
      };
    }
  }
}
