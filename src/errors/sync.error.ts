import { BaseError } from './base.error';

/**
 * Error taxonomy of the configuration-sync subsystem
 */
export type SyncErrorKind =
  | 'RepositoryAccess'
  | 'BranchConfiguration'
  | 'SecurityBlocked'
  | 'NoChanges'
  | 'FileSystem'
  | 'TargetNotFound'
  | 'InvalidTarget';

/**
 * Structured sync error: an explicit kind, the operation that failed, and the
 * chain of workflow steps it bubbled through.
 */
export abstract class SyncError extends BaseError {
  public abstract readonly kind: SyncErrorKind;
  public readonly operation: string;
  public readonly context: string[] = [];

  constructor(message: string, operation: string, details?: string) {
    super(message, details);
    this.operation = operation;
  }

  /**
   * Record the workflow step this error passed through
   */
  public withContext(step: string): this {
    this.context.push(step);
    return this;
  }
}

/**
 * Why a git network or working-copy operation failed
 */
export type RepositoryAccessReason =
  | 'BRANCH_NOT_FOUND'
  | 'BRANCH_EXISTS'
  | 'AUTHENTICATION'
  | 'NETWORK'
  | 'CONFLICT'
  | 'REJECTED'
  | 'TIMEOUT'
  | 'UNKNOWN';

export class RepositoryAccessError extends SyncError {
  public readonly code = 'REPOSITORY_ACCESS_ERROR';
  public readonly recoverable = true;
  public readonly kind = 'RepositoryAccess';
  public readonly reason: RepositoryAccessReason;

  constructor(
    message: string,
    operation: string,
    reason: RepositoryAccessReason = 'UNKNOWN',
    details?: string,
  ) {
    super(message, operation, details);
    this.reason = reason;
  }
}

/**
 * The configured tracked branch does not exist on the remote
 */
export class BranchConfigurationError extends SyncError {
  public readonly code = 'BRANCH_CONFIGURATION_ERROR';
  public readonly recoverable = true;
  public readonly kind = 'BranchConfiguration';
  public readonly branch: string;
  public readonly localClonePath: string;

  constructor(branch: string, localClonePath: string, operation: string, details?: string) {
    super(
      `Branch Configuration Error: branch '${branch}' was not found in the configuration repository`,
      operation,
      details,
    );
    this.branch = branch;
    this.localClonePath = localClonePath;
  }

  /**
   * Remediation lines shown to the operator
   */
  public get remediation(): string[] {
    return [
      `Update github.branch in your settings to a branch that exists (currently '${this.branch}')`,
      `Or delete the local repository at ${this.localClonePath}; it will be re-cloned with the configured branch`,
    ];
  }
}

export type SecurityBlockReason = 'PUBLIC_REPOSITORY' | 'AUTHENTICATION_FAILED';

/**
 * Push refused by the privacy gate. Never bypassable.
 */
export class SecurityBlockedError extends SyncError {
  public readonly code = 'SECURITY_BLOCKED';
  public readonly recoverable = false;
  public readonly kind = 'SecurityBlocked';
  public readonly reason: SecurityBlockReason;
  public readonly repository: string;

  constructor(reason: SecurityBlockReason, repository: string, details?: string) {
    super(
      reason === 'PUBLIC_REPOSITORY'
        ? `SECURITY BLOCK: repository '${repository}' is public. Configuration push denied`
        : `SECURITY BLOCK: cannot verify privacy of '${repository}' - authentication failed`,
      'verify-privacy',
      details,
    );
    this.reason = reason;
    this.repository = repository;
  }
}

/**
 * Control-flow signal: nothing staged, so there is nothing to commit
 */
export class NoChangesError extends SyncError {
  public readonly code = 'NO_CHANGES';
  public readonly recoverable = true;
  public readonly kind = 'NoChanges';

  constructor(operation = 'commit') {
    super('No changes to commit', operation);
  }
}

/**
 * Requested target directory is not present in the working copy
 */
export class TargetNotFoundError extends SyncError {
  public readonly code = 'TARGET_NOT_FOUND';
  public readonly recoverable = false;
  public readonly kind = 'TargetNotFound';
  public readonly targetName: string;

  constructor(targetName: string, repository: string) {
    super(`Directory '${targetName}' does not exist in repository ${repository}`, 'pull');
    this.targetName = targetName;
  }
}

/**
 * Target name that would resolve outside its own top-level directory
 */
export class InvalidTargetError extends SyncError {
  public readonly code = 'INVALID_TARGET';
  public readonly recoverable = false;
  public readonly kind = 'InvalidTarget';
  public readonly targetName: string;

  constructor(targetName: string, operation: string) {
    super(
      `Invalid target name '${targetName}': use a single directory name of letters, digits, ".", "_" or "-", other than ".", ".." and ".git"`,
      operation,
    );
    this.targetName = targetName;
  }
}
