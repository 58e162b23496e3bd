/**
 * Remote repository section of the settings file
 */
export interface GitHubSettings {
  /** `owner/name` or a full clone URL */
  configRepo: string;
  branch: string;
  /** Where the working copy lives; `~` is expanded */
  localPath: string;
  /** Name of the environment variable holding the access token */
  tokenEnvVar: string;
}

/**
 * Committer identity and SSH key
 */
export interface GitIdentitySettings {
  username: string;
  email: string;
  sshKeyPath: string;
}

export interface AnvilSettings {
  version: string;
  github: GitHubSettings;
  git: GitIdentitySettings;
  /** Application name to local config path */
  configs: Record<string, string>;
}

/**
 * Command execution options
 */
export interface CommandOptions {
  verbose?: boolean | undefined;
  yes?: boolean | undefined;
}

/**
 * Command execution result
 */
export interface CommandResult {
  success: boolean;
  message?: string | undefined;
  data?: unknown;
  error?: Error | undefined;
  exitCode: number;
}

export const CURRENT_CONFIG_VERSION = '1.0.0';
export const FALLBACK_VERSION = '0.0.0';

/** Reserved target name for the tool's own settings */
export const ANVIL_TARGET = 'anvil';

export const CONFIG_DIR_NAME = '.anvil';
export const CONFIG_FILE = 'settings.json';

/** Repo-relative location of the synced settings file */
export const REMOTE_SETTINGS_PATH = `${ANVIL_TARGET}/${CONFIG_FILE}`;

export const PUSH_BRANCH_PREFIX = 'config-push';
export const PUSH_COMMIT_PREFIX = 'anvil[push]';

export const DEFAULT_GIT_TIMEOUT_MS = 5 * 60 * 1000;
export const DEFAULT_PROBE_TIMEOUT_MS = 15 * 1000;

/** Largest single-file change (insertions + deletions) shown as a full diff */
export const FULL_DIFF_LINE_LIMIT = 50;

export const REDACTED_USERNAME = 'REDACTED_USERNAME';
export const REDACTED_EMAIL = 'REDACTED_EMAIL';
export const REDACTED_SSH_KEY_PATH = 'REDACTED_SSH_KEY_PATH';

export const DEFAULT_PATHS = {
  workingCopy: 'dotfiles',
  temp: 'temp',
  sanitized: 'temp/.sanitized',
} as const;

export const DEFAULT_SETTINGS: AnvilSettings = {
  version: CURRENT_CONFIG_VERSION,
  github: {
    configRepo: '',
    branch: 'main',
    localPath: `~/${CONFIG_DIR_NAME}/${DEFAULT_PATHS.workingCopy}`,
    tokenEnvVar: 'GITHUB_TOKEN',
  },
  git: {
    username: '',
    email: '',
    sshKeyPath: '',
  },
  configs: {},
};
