import chalk from 'chalk';
import { BaseError, errorMessage } from './base.error';
import {
  BranchConfigurationError,
  RepositoryAccessError,
  RepositoryAccessReason,
  SecurityBlockedError,
} from './sync.error';
import { logger } from '../utils/logger.service';
import { resolveWebUrl } from '../utils/repository-url';

export interface ErrorContext {
  command?: string | undefined;
  args: string[];
  workingDir: string;
}

export interface FormattedError {
  title: string;
  /** Underlying tool diagnostic, shown verbatim */
  details?: string | undefined;
  suggestions: string[];
}

const ACCESS_SUGGESTIONS: Record<RepositoryAccessReason, string[]> = {
  BRANCH_NOT_FOUND: ['Check github.branch in your settings'],
  BRANCH_EXISTS: ['Branch names are unique per minute; wait a minute and run the push again'],
  AUTHENTICATION: [
    'Export the token named by github.tokenEnvVar, or set git.sshKeyPath to a key with access',
    'Verify the repository name in github.configRepo',
  ],
  NETWORK: ['Check your network connection and run the command again'],
  CONFLICT: [
    'The local tracked branch has diverged from the remote',
    'Delete the local working copy (github.localPath) so it is re-cloned on the next run',
  ],
  REJECTED: ['The remote rejected the push; check branch protection rules and try again'],
  TIMEOUT: ['The git operation timed out; check your connection and run the command again'],
  UNKNOWN: [],
};

const CODE_SUGGESTIONS: Record<string, string[]> = {
  NOT_INITIALIZED: ["Run 'anvil init --repo <owner/name>' to create the settings file"],
  CONFIG_ERROR: ['Review your settings.json'],
  CONFIG_VALIDATION_ERROR: ['Fix the listed fields in settings.json'],
  FILE_NOT_FOUND: ['Check the configured local path exists'],
  PERMISSION_DENIED: ['Check file permissions of the configured path'],
  TARGET_NOT_FOUND: ["Push the target first with 'anvil push <app>'"],
  INVALID_TARGET: ['Pass the name of a top-level directory of the config repository, such as nvim'],
  COMMAND_SPAWN_FAILED: ['Make sure git is installed and on your PATH'],
  COMMAND_TIMEOUT: ['Check your connection and run the command again'],
};

/**
 * Turns errors into an actionable message with recovery suggestions
 */
export class EnhancedErrorHandler {
  public static createContext(
    command?: string,
    args: string[] = [],
    workingDir: string = process.cwd(),
  ): ErrorContext {
    return { command, args, workingDir };
  }

  public static format(error: unknown): FormattedError {
    if (error instanceof SecurityBlockedError) {
      return {
        title: error.message,
        details: error.details,
        suggestions: EnhancedErrorHandler.securitySuggestions(error),
      };
    }

    if (error instanceof BranchConfigurationError) {
      return { title: error.message, details: error.details, suggestions: error.remediation };
    }

    if (error instanceof RepositoryAccessError) {
      return {
        title: error.message,
        details: error.details,
        suggestions: ACCESS_SUGGESTIONS[error.reason],
      };
    }

    if (error instanceof BaseError) {
      return {
        title: error.message,
        details: error.details,
        suggestions: CODE_SUGGESTIONS[error.code] ?? [],
      };
    }

    return { title: errorMessage(error), suggestions: [] };
  }

  public static handleError(error: unknown, context: ErrorContext): void {
    const formatted = EnhancedErrorHandler.format(error);

    logger.error(formatted.title);
    if (formatted.details) {
      logger.info(chalk.gray(formatted.details.trim()));
    }
    if (formatted.suggestions.length > 0) {
      logger.info('');
      logger.info(chalk.bold('💡 Suggestions:'));
      for (const suggestion of formatted.suggestions) {
        logger.info(`   • ${suggestion}`);
      }
    }

    if (context.command) {
      logger.debug(`Command: ${context.command} ${context.args.join(' ')}`.trim());
    }
    logger.debug(`Working directory: ${context.workingDir}`);
    if (error instanceof BaseError) {
      logger.debug(JSON.stringify(error.toJSON()));
    }
  }

  private static securitySuggestions(error: SecurityBlockedError): string[] {
    if (error.reason === 'AUTHENTICATION_FAILED') {
      return [
        'anvil only pushes configuration to private repositories',
        'Configure authentication (token environment variable or SSH key) before pushing',
      ];
    }

    const webUrl = resolveWebUrl(error.repository);
    return [
      'Configuration files can contain API keys, paths and personal information',
      webUrl
        ? `Make the repository private: ${webUrl}/settings → Danger Zone → Change repository visibility`
        : 'Make the repository private',
      'anvil will never push configuration data to a public repository',
    ];
  }
}
