import * as path from 'path';
import { simpleGit, SimpleGit, CheckRepoActions } from 'simple-git';
import { FileSystemService } from './filesystem.service';
import { errorMessage } from '../errors/base.error';
import {
  NoChangesError,
  RepositoryAccessError,
  RepositoryAccessReason,
  SyncError,
} from '../errors/sync.error';
import { RepositoryHandle } from '../types/sync.types';
import { DEFAULT_GIT_TIMEOUT_MS } from '../types/config.types';
import {
  authorizationHeader,
  redactCredentials,
  resolveDisplayUrl,
  resolveRemoteUrl,
} from '../utils/repository-url';
import { toRepoRelative } from '../utils/path.utils';
import { gitProcessEnvironment } from '../utils/git-env';

const FAILURE_SIGNATURES: Array<[RepositoryAccessReason, RegExp]> = [
  ['TIMEOUT', /timeout reached|timed out after/i],
  [
    'BRANCH_NOT_FOUND',
    /Remote branch .+ not found in upstream|couldn't find remote ref|did not match any file\(s\) known to git|invalid reference:/i,
  ],
  ['BRANCH_EXISTS', /a branch named .+ already exists/i],
  [
    'AUTHENTICATION',
    /Authentication failed|Permission denied \(publickey|could not read (Username|Password)|Repository not found|returned error: 40[13]/i,
  ],
  ['REJECTED', /\[rejected\]|failed to push some refs|\[remote rejected\]/i],
  ['CONFLICT', /Not possible to fast-forward|diverging branches|CONFLICT|would be overwritten by merge/i],
  ['NETWORK', /Could not resolve host|unable to access|Connection (refused|timed out|reset)|Could not read from remote/i],
];

/**
 * Map git's diagnostic output to a structured failure reason
 */
export function classifyGitFailure(output: string): RepositoryAccessReason {
  for (const [reason, signature] of FAILURE_SIGNATURES) {
    if (signature.test(output)) {
      return reason;
    }
  }
  return 'UNKNOWN';
}

export interface WorkingCopyOptions {
  fileSystem?: FileSystemService | undefined;
  timeoutMs?: number | undefined;
}

/**
 * Sole owner of the persistent working copy at `localClonePath`.
 *
 * Every mutation of the clone (branch, index, working tree) goes through this
 * service so cleanup has a single authoritative actor. Git runs with the clone
 * as an explicit base directory; the process cwd is never touched.
 */
export class WorkingCopyService {
  private readonly handle: RepositoryHandle;
  private readonly localPath: string;
  private readonly fileSystem: FileSystemService;
  private readonly timeoutMs: number;

  constructor(handle: RepositoryHandle, options: WorkingCopyOptions = {}) {
    this.handle = { ...handle };
    this.localPath = path.resolve(handle.localClonePath);
    this.fileSystem = options.fileSystem || new FileSystemService();
    this.timeoutMs = options.timeoutMs ?? DEFAULT_GIT_TIMEOUT_MS;
  }

  public getLocalPath(): string {
    return this.localPath;
  }

  public getRepositoryUrl(): string {
    return resolveDisplayUrl(this.handle.remoteIdentifier);
  }

  /**
   * Absolute path of a repo-relative path inside the working copy
   */
  public resolve(repoRelativePath: string): string {
    return path.join(this.localPath, toRepoRelative(repoRelativePath));
  }

  /**
   * Check if the working copy exists and is a repository root
   */
  public async isRepository(): Promise<boolean> {
    if (!(await this.fileSystem.pathExists(this.localPath))) {
      return false;
    }
    try {
      return await this.createGit(this.localPath).checkIsRepo(CheckRepoActions.IS_REPO_ROOT);
    } catch {
      return false;
    }
  }

  /**
   * Clone the tracked branch when no working copy exists yet, otherwise point
   * `origin` at the token-free remote URL. Returns true when a clone was performed.
   */
  public async ensureCloned(): Promise<boolean> {
    if (await this.isRepository()) {
      await this.run('set-remote', 'Failed to update the origin URL', git =>
        git.remote(['set-url', 'origin', resolveRemoteUrl(this.handle)]),
      );
      return false;
    }

    const parentDir = path.dirname(this.localPath);
    await this.fileSystem.ensureDir(parentDir);

    try {
      await this.createGit(parentDir).clone(resolveRemoteUrl(this.handle), this.localPath, [
        '--branch',
        this.handle.trackedBranch,
      ]);
      return true;
    } catch (error) {
      throw this.toAccessError('clone', `Failed to clone ${this.getRepositoryUrl()}`, error);
    }
  }

  public async checkoutTracked(): Promise<void> {
    await this.run('checkout-tracked', `Failed to checkout branch ${this.handle.trackedBranch}`, git =>
      git.checkout(this.handle.trackedBranch),
    );
  }

  /**
   * Fast-forward the tracked branch. Conflicts are never resolved here.
   */
  public async pullLatest(): Promise<void> {
    await this.run('pull', `Failed to pull latest changes for ${this.handle.trackedBranch}`, git =>
      git.pull('origin', this.handle.trackedBranch, ['--ff-only']),
    );
  }

  /**
   * Drop staged and unstaged edits and untracked files, so the working copy
   * matches the last commit of the current branch.
   */
  public async ensureClean(): Promise<void> {
    await this.run('ensure-clean', 'Failed to reset working copy to a clean state', async git => {
      await git.reset(['--hard', 'HEAD']);
      await git.raw(['clean', '-fd']);
    });
  }

  public async createAndCheckoutBranch(branchName: string): Promise<void> {
    if (!branchName.trim()) {
      throw new RepositoryAccessError('Branch name cannot be empty', 'create-branch');
    }

    const branches = await this.listLocalBranches();
    if (branches.includes(branchName)) {
      throw new RepositoryAccessError(
        `Branch ${branchName} already exists in the working copy`,
        'create-branch',
        'BRANCH_EXISTS',
      );
    }

    await this.run('create-branch', `Failed to create branch ${branchName}`, git =>
      git.checkoutLocalBranch(branchName),
    );
  }

  /**
   * Mirror-merge a local file or directory into the working copy
   */
  public async mirrorInto(localSourcePath: string, repoRelativePath: string): Promise<void> {
    await this.fileSystem.mirror(localSourcePath, this.resolve(repoRelativePath));
  }

  public async stagePath(repoRelativePath: string): Promise<void> {
    await this.run('stage', `Failed to stage ${repoRelativePath}`, git =>
      git.raw(['add', '-A', '--', toRepoRelative(repoRelativePath)]),
    );
  }

  public async stageAll(): Promise<void> {
    await this.run('stage', 'Failed to stage changes', git => git.raw(['add', '-A']));
  }

  /**
   * Commit the index. Throws `NoChangesError` instead of creating an empty commit.
   */
  public async commit(message: string): Promise<string> {
    if (!message.trim()) {
      throw new RepositoryAccessError('Commit message cannot be empty', 'commit');
    }

    return await this.run('commit', 'Failed to commit changes', async git => {
      const staged = await git.diff(['--cached', '--name-only']);
      if (!staged.trim()) {
        throw new NoChangesError('commit');
      }
      const result = await git.commit(message.trim());
      return result.commit;
    });
  }

  public async pushCurrentBranch(branchName: string): Promise<void> {
    await this.run('push', `Failed to push branch ${branchName}`, git =>
      git.push('origin', branchName, ['--set-upstream']),
    );
  }

  /**
   * Return to a clean tracked branch from any state. Safe to call repeatedly
   * and when nothing was ever staged.
   */
  public async cleanupStagedChanges(): Promise<void> {
    if (!(await this.isRepository())) {
      return;
    }

    await this.run('cleanup', 'Failed to clean up staged changes', async git => {
      await git.reset(['--hard', 'HEAD']);
      await git.raw(['clean', '-fd']);
      await git.checkout(this.handle.trackedBranch);
    });
  }

  /**
   * Delete a local branch that holds no commits beyond the tracked branch.
   * Returns true when the branch was deleted.
   */
  public async deleteBranchIfEmpty(branchName: string): Promise<boolean> {
    return await this.run('delete-branch', `Failed to delete branch ${branchName}`, async git => {
      const branches = await git.branchLocal();
      if (!branches.all.includes(branchName) || branches.current === branchName) {
        return false;
      }
      const ahead = await git.raw(['rev-list', '--count', `${this.handle.trackedBranch}..${branchName}`]);
      if (ahead.trim() !== '0') {
        return false;
      }
      await git.raw(['branch', '-D', branchName]);
      return true;
    });
  }

  /**
   * `git diff --cached` for one path, in the given format
   */
  public async diffStaged(
    repoRelativePath: string,
    format: 'stat' | 'numstat' | 'patch',
  ): Promise<string> {
    const args = ['--cached'];
    if (format !== 'patch') {
      args.push(`--${format}`);
    }
    args.push('--', toRepoRelative(repoRelativePath));

    return await this.run('diff', `Failed to diff ${repoRelativePath}`, git => git.diff(args));
  }

  /**
   * Files under a repo-relative path, relative to the repository root
   */
  public async listCommittedFiles(repoRelativePath: string): Promise<string[]> {
    const relative = toRepoRelative(repoRelativePath);
    const absolute = this.resolve(relative);
    const kind = await this.fileSystem.kindOf(absolute);

    if (kind === 'file') {
      return [relative];
    }
    if (kind === undefined) {
      return [];
    }
    const files = await this.fileSystem.listFiles(absolute);
    return files.map(file => `${relative}/${file}`);
  }

  public async currentBranch(): Promise<string> {
    return await this.run('current-branch', 'Failed to get current branch', async git =>
      (await git.revparse(['--abbrev-ref', 'HEAD'])).trim(),
    );
  }

  public async headCommit(): Promise<string> {
    return await this.run('head', 'Failed to resolve HEAD', async git =>
      (await git.revparse(['HEAD'])).trim(),
    );
  }

  public async listLocalBranches(): Promise<string[]> {
    return await this.run('list-branches', 'Failed to list branches', async git =>
      (await git.branchLocal()).all,
    );
  }

  /**
   * True when there are no staged, unstaged or untracked changes
   */
  public async isClean(): Promise<boolean> {
    return await this.run('status', 'Failed to get working copy status', async git =>
      (await git.status()).isClean(),
    );
  }

  private async run<T>(
    operation: string,
    message: string,
    action: (git: SimpleGit) => Promise<T>,
  ): Promise<T> {
    if (!(await this.fileSystem.pathExists(this.localPath))) {
      throw new RepositoryAccessError(
        `Working copy not found at ${this.localPath}`,
        operation,
        'UNKNOWN',
      );
    }

    try {
      return await action(this.createGit(this.localPath));
    } catch (error) {
      throw this.toAccessError(operation, message, error);
    }
  }

  private toAccessError(operation: string, message: string, error: unknown): SyncError {
    if (error instanceof SyncError) {
      return error;
    }
    const details = redactCredentials(errorMessage(error));
    return new RepositoryAccessError(message, operation, classifyGitFailure(details), details);
  }

  private createGit(baseDir: string): SimpleGit {
    const config: string[] = [];
    if (this.handle.committerName) {
      config.push(`user.name=${this.handle.committerName}`);
    }
    if (this.handle.committerEmail) {
      config.push(`user.email=${this.handle.committerEmail}`);
    }
    const header = authorizationHeader(this.handle);
    if (header) {
      config.push(`http.https://github.com/.extraheader=${header}`);
    }

    return simpleGit({
      baseDir,
      binary: 'git',
      maxConcurrentProcesses: 1,
      trimmed: false,
      config,
      timeout: { block: this.timeoutMs },
      unsafe: { allowUnsafeSshCommand: true },
    }).env(gitProcessEnvironment(this.handle));
  }
}
