import * as os from 'os';
import * as path from 'path';
import { ZodError, ZodIssue } from 'zod';
import {
  AnvilSettings,
  ANVIL_TARGET,
  CONFIG_DIR_NAME,
  CONFIG_FILE,
  DEFAULT_PATHS,
  DEFAULT_SETTINGS,
  REDACTED_EMAIL,
  REDACTED_SSH_KEY_PATH,
  REDACTED_USERNAME,
  REMOTE_SETTINGS_PATH,
} from '../types/config.types';
import { AnvilSettingsSchema } from '../types/config.schema';
import { RepositoryHandle, SyncTarget } from '../types/sync.types';
import { FileSystemService } from './filesystem.service';
import { BaseError, errorMessage } from '../errors/base.error';
import { InvalidTargetError } from '../errors/sync.error';
import { expandHome, isValidTargetName } from '../utils/path.utils';

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

export class NotInitializedError extends BaseError {
  public readonly code = 'NOT_INITIALIZED';
  public readonly recoverable = true;
}

/**
 * Deep copy of the settings with the git identity masked, safe to push
 */
export function sanitizeSettings(settings: AnvilSettings): AnvilSettings {
  return {
    ...settings,
    github: { ...settings.github },
    configs: { ...settings.configs },
    git: {
      username: REDACTED_USERNAME,
      email: REDACTED_EMAIL,
      sshKeyPath: REDACTED_SSH_KEY_PATH,
    },
  };
}

/**
 * Directory holding settings, temp copies and (by default) the working copy.
 * `ANVIL_HOME` overrides `~/.anvil`.
 */
export function resolveConfigDir(env: NodeJS.ProcessEnv = process.env): string {
  const override = env['ANVIL_HOME'];
  if (override && override.trim()) {
    return path.resolve(expandHome(override.trim()));
  }
  return path.join(os.homedir(), CONFIG_DIR_NAME);
}

/**
 * Loads and saves `settings.json` and turns it into the values the sync core
 * consumes: a `RepositoryHandle` and per-application `SyncTarget`s.
 */
export class SettingsManager {
  private readonly configDir: string;
  private readonly settingsPath: string;
  private readonly fileSystem: FileSystemService;
  private cachedSettings?: AnvilSettings | undefined;

  constructor(configDir: string = resolveConfigDir(), fileSystem?: FileSystemService) {
    this.configDir = configDir;
    this.settingsPath = path.join(configDir, CONFIG_FILE);
    this.fileSystem = fileSystem || new FileSystemService();
  }

  /**
   * Create the initial settings file
   */
  public async create(overrides: {
    configRepo?: string | undefined;
    branch?: string | undefined;
  } = {}): Promise<AnvilSettings> {
    const settings: AnvilSettings = {
      ...DEFAULT_SETTINGS,
      github: {
        ...DEFAULT_SETTINGS.github,
        localPath: path.join(this.configDir, DEFAULT_PATHS.workingCopy),
        ...(overrides.configRepo ? { configRepo: overrides.configRepo } : {}),
        ...(overrides.branch ? { branch: overrides.branch } : {}),
      },
      git: { ...DEFAULT_SETTINGS.git },
      configs: {},
    };

    await this.save(settings);
    return settings;
  }

  /**
   * Load settings from file
   */
  public async load(): Promise<AnvilSettings> {
    if (this.cachedSettings) {
      return this.cachedSettings;
    }

    if (!(await this.exists())) {
      throw new NotInitializedError(
        `Settings file not found at ${this.settingsPath}. Run 'anvil init' first.`,
      );
    }

    let raw: unknown;
    try {
      raw = JSON.parse(await this.fileSystem.readFile(this.settingsPath));
    } catch (error) {
      throw new ConfigError('Failed to load settings', errorMessage(error));
    }

    const settings = this.validate(raw);
    this.cachedSettings = settings;
    return settings;
  }

  /**
   * Save settings to file
   */
  public async save(settings: AnvilSettings): Promise<void> {
    const validated = this.validate(settings);
    try {
      await this.fileSystem.writeFileAtomic(this.settingsPath, `${JSON.stringify(validated, null, 2)}\n`);
    } catch (error) {
      throw new ConfigError('Failed to save settings', errorMessage(error));
    }
    this.cachedSettings = validated;
  }

  public async exists(): Promise<boolean> {
    return (await this.fileSystem.kindOf(this.settingsPath)) === 'file';
  }

  public getSettingsPath(): string {
    return this.settingsPath;
  }

  /**
   * Where pulled targets are copied for review
   */
  public getTempDir(): string {
    return path.join(this.configDir, DEFAULT_PATHS.temp);
  }

  /**
   * Resolve the repository handle. The token is read from the environment
   * variable named in the settings and is never stored.
   */
  public resolveHandle(settings: AnvilSettings, env: NodeJS.ProcessEnv = process.env): RepositoryHandle {
    const { github, git } = settings;
    if (!github.configRepo.trim()) {
      throw new ConfigError(
        `github.configRepo is not configured. Edit ${this.settingsPath} and set it to your repository (e.g. 'username/dotfiles')`,
      );
    }

    const token = github.tokenEnvVar ? env[github.tokenEnvVar] : undefined;
    return {
      remoteIdentifier: github.configRepo.trim(),
      trackedBranch: github.branch,
      localClonePath: path.resolve(expandHome(github.localPath)),
      authToken: token && token.trim() ? token.trim() : undefined,
      sshKeyPath: git.sshKeyPath ? expandHome(git.sshKeyPath) : undefined,
      committerName: git.username || undefined,
      committerEmail: git.email || undefined,
    };
  }

  /**
   * Non-fatal configuration issues worth telling the operator about
   */
  public getWarnings(settings: AnvilSettings): string[] {
    const warnings: string[] = [];
    if (settings.github.branch !== 'main' && settings.github.branch !== 'master') {
      warnings.push(
        `You're using branch '${settings.github.branch}'. Make sure this branch exists in your repository.`,
      );
    }
    if (!settings.git.username || !settings.git.email) {
      warnings.push(
        `Git identity is incomplete. Consider setting git.username and git.email in ${CONFIG_FILE}`,
      );
    }
    return warnings;
  }

  /**
   * Sync target for a configured application. Directories map to `<app>/`,
   * single files to `<app>/<file name>`.
   */
  public async buildAppTarget(settings: AnvilSettings, appName: string): Promise<SyncTarget> {
    if (!isValidTargetName(appName)) {
      throw new InvalidTargetError(appName, 'push');
    }
    if (appName === ANVIL_TARGET) {
      throw new ConfigError(`'${ANVIL_TARGET}' is reserved for the settings file; run 'anvil push' without an app name`);
    }

    const configured = settings.configs[appName];
    if (!configured) {
      throw new ConfigError(
        `App '${appName}' is not configured. Add its local path under "configs" in ${this.settingsPath}`,
      );
    }

    const localSourcePath = this.expandConfigPath(configured);
    const kind = await this.fileSystem.kindOf(localSourcePath);
    return {
      targetName: appName,
      localSourcePath,
      repoRelativePath: kind === 'file' ? `${appName}/${path.basename(localSourcePath)}` : appName,
    };
  }

  /**
   * Absolute local path of a `configs` entry
   */
  public expandConfigPath(configPath: string): string {
    return path.resolve(expandHome(configPath));
  }

  /**
   * Write a sanitized copy of the settings and return the target that pushes it.
   * The caller removes the copy with `removeSanitizedCopy` afterwards.
   */
  public async buildSettingsTarget(settings: AnvilSettings): Promise<SyncTarget> {
    const sanitizedPath = path.join(this.configDir, DEFAULT_PATHS.sanitized, CONFIG_FILE);
    await this.fileSystem.writeFileAtomic(
      sanitizedPath,
      `${JSON.stringify(sanitizeSettings(settings), null, 2)}\n`,
    );
    return {
      targetName: ANVIL_TARGET,
      localSourcePath: sanitizedPath,
      repoRelativePath: REMOTE_SETTINGS_PATH,
    };
  }

  public async removeSanitizedCopy(): Promise<void> {
    await this.fileSystem.remove(path.join(this.configDir, DEFAULT_PATHS.sanitized));
  }

  /**
   * Replace masked git identity values in a pulled settings file with the local
   * ones. Returns true when the file was rewritten.
   */
  public async restoreGitIdentity(pulledSettingsPath: string, local: AnvilSettings): Promise<boolean> {
    let pulled: AnvilSettings;
    try {
      pulled = this.validate(JSON.parse(await this.fileSystem.readFile(pulledSettingsPath)));
    } catch (error) {
      if (error instanceof BaseError) {
        throw error;
      }
      throw new ConfigError('Failed to parse pulled settings', errorMessage(error));
    }

    const restored = { ...pulled.git };
    let changed = false;
    if (restored.username === REDACTED_USERNAME) {
      restored.username = local.git.username;
      changed = true;
    }
    if (restored.email === REDACTED_EMAIL) {
      restored.email = local.git.email;
      changed = true;
    }
    if (restored.sshKeyPath === REDACTED_SSH_KEY_PATH) {
      restored.sshKeyPath = local.git.sshKeyPath;
      changed = true;
    }

    if (changed) {
      await this.fileSystem.writeFileAtomic(
        pulledSettingsPath,
        `${JSON.stringify({ ...pulled, git: restored }, null, 2)}\n`,
      );
    }
    return changed;
  }

  private validate(raw: unknown): AnvilSettings {
    try {
      return AnvilSettingsSchema.parse(raw);
    } catch (error) {
      if (error instanceof ZodError) {
        const messages = error.issues.map(
          (issue: ZodIssue) => `${issue.path.join('.') || 'settings'}: ${issue.message}`,
        );
        throw new ConfigValidationError(`Settings are invalid: ${messages.join(', ')}`, error.message);
      }
      throw error;
    }
  }
}
