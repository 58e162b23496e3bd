import chalk from 'chalk';
import { CommandOptions, CommandResult } from '../types/config.types';
import { RepositoryHandle } from '../types/sync.types';
import { CommandRunner } from '../core/command.runner';
import { SettingsManager } from '../core/config.manager';
import { FileSystemService } from '../core/filesystem.service';
import { WorkingCopyService } from '../core/working-copy.service';
import { BaseError, errorMessage } from '../errors/base.error';
import { logger } from '../utils/logger.service';
import { resolveDisplayUrl } from '../utils/repository-url';

export interface WorkingCopyStatus {
  present: boolean;
  branch?: string | undefined;
  clean?: boolean | undefined;
}

export interface StatusReport {
  gitVersion?: string | undefined;
  repository: string;
  trackedBranch: string;
  localClonePath: string;
  authentication: 'token' | 'ssh-key' | 'ssh-agent';
  workingCopy: WorkingCopyStatus;
  configs: Array<{ name: string; path: string; present: boolean }>;
  warnings: string[];
}

export interface StatusCommandDependencies {
  settingsManager?: SettingsManager | undefined;
  runner?: CommandRunner | undefined;
  fileSystem?: FileSystemService | undefined;
  workingCopyFactory?: ((handle: RepositoryHandle) => WorkingCopyService) | undefined;
  env?: NodeJS.ProcessEnv | undefined;
}

/**
 * Read-only overview of the settings and the working copy
 */
export class StatusCommand {
  private readonly settingsManager: SettingsManager;
  private readonly runner: CommandRunner;
  private readonly fileSystem: FileSystemService;
  private readonly workingCopyFactory: (handle: RepositoryHandle) => WorkingCopyService;
  private readonly env: NodeJS.ProcessEnv;

  constructor(dependencies: StatusCommandDependencies = {}) {
    this.fileSystem = dependencies.fileSystem || new FileSystemService();
    this.settingsManager =
      dependencies.settingsManager || new SettingsManager(undefined, this.fileSystem);
    this.runner = dependencies.runner || new CommandRunner(10_000);
    this.workingCopyFactory =
      dependencies.workingCopyFactory ||
      (handle => new WorkingCopyService(handle, { fileSystem: this.fileSystem }));
    this.env = dependencies.env || process.env;
  }

  public async execute(_options: CommandOptions = {}): Promise<CommandResult> {
    try {
      const settings = await this.settingsManager.load();
      const handle = this.settingsManager.resolveHandle(settings, this.env);

      const report: StatusReport = {
        gitVersion: await this.getGitVersion(),
        repository: resolveDisplayUrl(handle.remoteIdentifier),
        trackedBranch: handle.trackedBranch,
        localClonePath: handle.localClonePath,
        authentication: handle.authToken ? 'token' : handle.sshKeyPath ? 'ssh-key' : 'ssh-agent',
        workingCopy: await this.getWorkingCopyStatus(this.workingCopyFactory(handle)),
        configs: await this.getConfigs(settings.configs),
        warnings: this.settingsManager.getWarnings(settings),
      };

      this.displayStatus(report, settings.github.tokenEnvVar);

      return {
        success: true,
        message: 'Status retrieved successfully',
        data: report,
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
        message: 'Failed to get status',
        error: error instanceof Error ? error : new Error(String(error)),
        exitCode: 1,
      };
    }
  }

  private async getGitVersion(): Promise<string | undefined> {
    try {
      const result = await this.runner.run('git', ['--version']);
      return result.succeeded ? result.stdout.trim() : undefined;
    } catch (error) {
      logger.debug(`git --version failed: ${errorMessage(error)}`);
      return undefined;
    }
  }

  private async getWorkingCopyStatus(workingCopy: WorkingCopyService): Promise<WorkingCopyStatus> {
    if (!(await workingCopy.isRepository())) {
      return { present: false };
    }
    return {
      present: true,
      branch: await workingCopy.currentBranch(),
      clean: await workingCopy.isClean(),
    };
  }

  private async getConfigs(
    configs: Record<string, string>,
  ): Promise<Array<{ name: string; path: string; present: boolean }>> {
    const entries = Object.entries(configs).sort(([a], [b]) => a.localeCompare(b));
    return await Promise.all(
      entries.map(async ([name, configPath]) => ({
        name,
        path: configPath,
        present: await this.fileSystem.pathExists(this.settingsManager.expandConfigPath(configPath)),
      })),
    );
  }

  private displayStatus(report: StatusReport, tokenEnvVar: string): void {
    logger.info(chalk.bold('Configuration repository'));
    logger.info(`   Repository:   ${report.repository}`);
    logger.info(`   Branch:       ${report.trackedBranch}`);
    logger.info(`   Working copy: ${report.localClonePath}`);

    const auth =
      report.authentication === 'token'
        ? `token from $${tokenEnvVar}`
        : report.authentication === 'ssh-key'
          ? 'SSH key'
          : 'SSH (default key / agent)';
    logger.info(`   Auth:         ${auth}`);
    logger.info(`   Git:          ${report.gitVersion ?? chalk.red('not found')}`);

    logger.info('');
    if (!report.workingCopy.present) {
      logger.info(chalk.gray('Working copy not cloned yet; it is created on the first push or pull'));
    } else {
      const state = report.workingCopy.clean ? chalk.green('clean') : chalk.yellow('dirty');
      logger.info(`Working copy on ${chalk.cyan(report.workingCopy.branch ?? 'unknown')} (${state})`);
    }

    logger.info('');
    logger.info(chalk.bold('Configured applications'));
    if (report.configs.length === 0) {
      logger.info(chalk.gray('   none, add entries under "configs" in settings.json'));
    }
    for (const config of report.configs) {
      const marker = config.present ? chalk.green('✓') : chalk.red('✗');
      logger.info(`   ${marker} ${config.name}: ${config.path}`);
    }

    for (const warning of report.warnings) {
      logger.warn(warning);
    }
  }
}
