/**
 * Identifies the remote configuration repository and the operator's access to it.
 * Exactly one working copy exists per handle, at `localClonePath`.
 */
export interface RepositoryHandle {
  /** `owner/name` shorthand, a full URL, or a local path */
  remoteIdentifier: string;
  /** Branch treated as the canonical upstream, e.g. `main` */
  trackedBranch: string;
  /** Absolute path of the persistent working copy */
  localClonePath: string;
  /** Tried before SSH key material when present */
  authToken?: string | undefined;
  sshKeyPath?: string | undefined;
  committerName?: string | undefined;
  committerEmail?: string | undefined;
}

/**
 * Subject of one push operation. Built fresh per invocation.
 */
export interface SyncTarget {
  targetName: string;
  localSourcePath: string;
  /** Path inside the working copy, POSIX separators, no leading slash */
  repoRelativePath: string;
}

/**
 * Outcome of comparing a local source against its working-copy counterpart
 */
export interface ChangeReport {
  hasChanges: boolean;
  isNewTarget: boolean;
  changedFileCount: number;
  insertionCount: number;
  deletionCount: number;
  /** Paths (relative to the target) that exist only in the working copy */
  remoteOnlyPaths: string[];
}

/**
 * Operator-facing preview of the staged change
 */
export interface DiffPreview {
  stat: string;
  fileCount: number;
  insertions: number;
  deletions: number;
  /** Present only for a single small file */
  fullDiff?: string | undefined;
}

export interface PushRecord {
  branchName: string;
  commitMessage: string;
  filesCommitted: string[];
  repositoryUrl: string;
}

export interface NoChangesOutcome {
  status: 'no-changes';
  targetName: string;
}

export interface CancelledOutcome {
  status: 'cancelled';
  targetName: string;
}

export interface PushedOutcome {
  status: 'pushed';
  record: PushRecord;
  report: ChangeReport;
  preview?: DiffPreview | undefined;
}

export type PushOutcome = PushedOutcome | NoChangesOutcome | CancelledOutcome;

export interface PullRecord {
  targetName: string;
  destinationPath: string;
  files: string[];
}

/**
 * Workflow stages reported through the progress seam
 */
export type SyncStage =
  | 'verify-privacy'
  | 'prepare-repository'
  | 'detect-changes'
  | 'preview'
  | 'confirm'
  | 'branch'
  | 'stage'
  | 'commit'
  | 'push'
  | 'cleanup'
  | 'copy';

/**
 * Optional observer for orchestrator progress. The core never writes to the
 * console itself; the command layer supplies a reporter backed by the logger.
 */
export interface SyncProgressReporter {
  stage(stage: SyncStage, message: string): void;
  info?(message: string): void;
  warn?(message: string): void;
}

/**
 * Yes/no gate consulted before anything is branched or pushed
 */
export type ConfirmCallback = (
  target: SyncTarget,
  report: ChangeReport,
  preview: DiffPreview | undefined,
) => Promise<boolean> | boolean;
