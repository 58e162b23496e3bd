import chalk from 'chalk';
import { CommandOptions, CommandResult } from '../types/config.types';
import { ChangeReport, DiffPreview, PushOutcome, SyncTarget } from '../types/sync.types';
import { SettingsManager } from '../core/config.manager';
import { SyncOrchestrator } from '../core/sync.orchestrator';
import { BaseError } from '../errors/base.error';
import { logger } from '../utils/logger.service';
import { ConsoleProgressReporter } from '../utils/progress.reporter';
import { Prompt, TerminalPrompt } from '../utils/prompt.service';

export interface PushCommandDependencies {
  settingsManager?: SettingsManager | undefined;
  orchestrator?: SyncOrchestrator | undefined;
  prompt?: Prompt | undefined;
  env?: NodeJS.ProcessEnv | undefined;
}

/**
 * Push one application's configuration, or the settings file itself when no
 * application is named, to a new branch of the configuration repository
 */
export class PushCommand {
  private readonly settingsManager: SettingsManager;
  private readonly orchestrator: SyncOrchestrator;
  private readonly prompt: Prompt;
  private readonly env: NodeJS.ProcessEnv;

  constructor(dependencies: PushCommandDependencies = {}) {
    this.settingsManager = dependencies.settingsManager || new SettingsManager();
    this.orchestrator =
      dependencies.orchestrator || new SyncOrchestrator({ progress: new ConsoleProgressReporter() });
    this.prompt = dependencies.prompt || new TerminalPrompt();
    this.env = dependencies.env || process.env;
  }

  public async execute(appName?: string, options: CommandOptions = {}): Promise<CommandResult> {
    try {
      const settings = await this.settingsManager.load();
      for (const warning of this.settingsManager.getWarnings(settings)) {
        logger.warn(warning);
      }

      const handle = this.settingsManager.resolveHandle(settings, this.env);
      const target = appName
        ? await this.settingsManager.buildAppTarget(settings, appName)
        : await this.settingsManager.buildSettingsTarget(settings);

      logger.debug(`Pushing ${target.localSourcePath} to ${target.repoRelativePath}`);

      let outcome: PushOutcome;
      try {
        outcome = await this.orchestrator.pushTarget(handle, target, (t, report, preview) =>
          this.confirm(t, report, preview, options),
        );
      } finally {
        if (!appName) {
          await this.settingsManager.removeSanitizedCopy();
        }
      }

      return this.toResult(outcome);
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
        message: 'Failed to push configuration',
        error: error instanceof Error ? error : new Error(String(error)),
        exitCode: 1,
      };
    }
  }

  private async confirm(
    target: SyncTarget,
    report: ChangeReport,
    preview: DiffPreview | undefined,
    options: CommandOptions,
  ): Promise<boolean> {
    this.displayPreview(target, report, preview);

    if (options.yes) {
      logger.debug('Confirmation skipped (--yes)');
      return true;
    }

    return await this.prompt.confirm(
      `Do you want to push your ${target.targetName} configurations to the repository?`,
    );
  }

  private displayPreview(
    target: SyncTarget,
    report: ChangeReport,
    preview: DiffPreview | undefined,
  ): void {
    logger.info('');
    if (report.isNewTarget) {
      logger.info(
        chalk.bold(`New configuration '${target.targetName}' (${report.changedFileCount} file(s))`),
      );
    }

    if (preview) {
      logger.info(chalk.bold('Changes to be pushed:'));
      logger.info(preview.stat);
      if (preview.fullDiff) {
        logger.info('');
        logger.info(preview.fullDiff.trimEnd());
      }
    } else {
      logger.info(`${report.changedFileCount} file(s) differ from the repository`);
    }

    if (report.remoteOnlyPaths.length > 0) {
      logger.warn(
        `${report.remoteOnlyPaths.length} file(s) exist only in the repository and will be kept: ${report.remoteOnlyPaths.join(', ')}`,
      );
    }
    logger.info('');
  }

  private toResult(outcome: PushOutcome): CommandResult {
    switch (outcome.status) {
      case 'no-changes':
        return {
          success: true,
          message: `${outcome.targetName} configuration is up-to-date, nothing to push`,
          data: outcome,
          exitCode: 0,
        };

      case 'cancelled':
        return {
          success: false,
          message: 'Push cancelled by user',
          data: outcome,
          exitCode: 0,
        };

      case 'pushed': {
        const { record } = outcome;
        logger.info(chalk.bold('Pushed files:'));
        for (const file of record.filesCommitted) {
          logger.info(`   ${chalk.green('+')} ${file}`);
        }
        logger.info(`Branch: ${chalk.cyan(record.branchName)}`);
        logger.info(`Commit: ${record.commitMessage}`);
        logger.info(`Repository: ${record.repositoryUrl}`);
        logger.info(chalk.gray('Open a pull request to merge the branch when you are ready.'));

        return {
          success: true,
          message: `Configuration pushed to branch ${record.branchName}`,
          data: outcome,
          exitCode: 0,
        };
      }
    }
  }
}
