import * as path from 'path';
import { ChangeDetectorService } from './change-detector.service';
import { DiffSummaryService } from './diff-summary.service';
import { FileSystemService } from './filesystem.service';
import { PrivacyGateService } from './privacy.service';
import { WorkingCopyService } from './working-copy.service';
import { errorMessage } from '../errors/base.error';
import {
  BranchConfigurationError,
  InvalidTargetError,
  NoChangesError,
  RepositoryAccessError,
  SyncError,
  TargetNotFoundError,
} from '../errors/sync.error';
import {
  ChangeReport,
  ConfirmCallback,
  PullRecord,
  PushOutcome,
  RepositoryHandle,
  SyncProgressReporter,
  SyncStage,
  SyncTarget,
} from '../types/sync.types';
import { PUSH_BRANCH_PREFIX, PUSH_COMMIT_PREFIX } from '../types/config.types';
import { timestampedName } from '../utils/branch-name';
import { isStrictlyInside, isValidTargetName, toRepoRelative } from '../utils/path.utils';

export interface SyncOrchestratorOptions {
  fileSystem?: FileSystemService | undefined;
  privacyGate?: PrivacyGateService | undefined;
  detector?: ChangeDetectorService | undefined;
  summarizer?: DiffSummaryService | undefined;
  /** Builds the working-copy manager for a handle */
  workingCopyFactory?: ((handle: RepositoryHandle) => WorkingCopyService) | undefined;
  progress?: SyncProgressReporter | undefined;
  clock?: (() => Date) | undefined;
  timeoutMs?: number | undefined;
}

const silentProgress: SyncProgressReporter = {
  stage: () => undefined,
};

/**
 * Root of the configuration-sync workflow.
 *
 * Push: privacy gate → repository readiness → change detection → preview →
 * confirmation → branch → stage → commit → push. Once the working copy has been
 * touched, a cancel or failure always returns it to a clean tracked branch.
 */
export class SyncOrchestrator {
  private readonly fileSystem: FileSystemService;
  private readonly privacyGate: PrivacyGateService;
  private readonly detector: ChangeDetectorService;
  private readonly summarizer: DiffSummaryService;
  private readonly workingCopyFactory: (handle: RepositoryHandle) => WorkingCopyService;
  private readonly progress: SyncProgressReporter;
  private readonly clock: () => Date;

  constructor(options: SyncOrchestratorOptions = {}) {
    const fileSystem = options.fileSystem || new FileSystemService();
    this.fileSystem = fileSystem;
    this.privacyGate = options.privacyGate || new PrivacyGateService();
    this.detector = options.detector || new ChangeDetectorService(fileSystem);
    this.summarizer = options.summarizer || new DiffSummaryService();
    this.workingCopyFactory =
      options.workingCopyFactory ||
      (handle => new WorkingCopyService(handle, { fileSystem, timeoutMs: options.timeoutMs }));
    this.progress = options.progress || silentProgress;
    this.clock = options.clock || (() => new Date());
  }

  /**
   * Push one target to a fresh timestamped branch
   */
  public async pushTarget(
    handle: RepositoryHandle,
    target: SyncTarget,
    confirm: ConfirmCallback,
  ): Promise<PushOutcome> {
    const workingCopy = this.workingCopyFactory(handle);
    const repoRelativePath = toRepoRelative(target.repoRelativePath);
    const repoPath = this.resolveInside(workingCopy, repoRelativePath, 'push');

    this.notify('verify-privacy', `Verifying privacy of ${handle.remoteIdentifier}`);
    await this.privacyGate.assertPrivate(handle);

    this.notify('prepare-repository', `Preparing working copy at ${workingCopy.getLocalPath()}`);
    await this.prepareRepository(workingCopy, handle, true);

    this.notify('detect-changes', `Comparing ${target.localSourcePath} with ${repoRelativePath}`);
    let report: ChangeReport;
    try {
      report = await this.detector.detect(target.localSourcePath, repoPath);
    } catch (error) {
      throw this.annotate(error, 'detect-changes');
    }

    if (!report.hasChanges) {
      this.progress.info?.(`Local ${target.targetName} configuration matches the repository`);
      return { status: 'no-changes', targetName: target.targetName };
    }

    if (report.isNewTarget) {
      this.progress.info?.(`New target '${target.targetName}' will be added to the repository`);
    }

    try {
      this.notify('preview', 'Analyzing changes');
      const preview = await this.summarizer.summarize(workingCopy, target, message =>
        this.progress.warn?.(`Unable to generate diff preview: ${message}`),
      );
      if (preview) {
        report = { ...report, insertionCount: preview.insertions, deletionCount: preview.deletions };
      }

      this.notify('confirm', 'Requesting confirmation');
      if (!(await confirm(target, report, preview))) {
        this.notify('cleanup', 'Push cancelled, restoring working copy');
        await workingCopy.cleanupStagedChanges();
        return { status: 'cancelled', targetName: target.targetName };
      }

      const branchName = timestampedName(PUSH_BRANCH_PREFIX, this.clock());
      this.notify('branch', `Creating branch ${branchName}`);
      await workingCopy.createAndCheckoutBranch(branchName);

      this.notify('stage', `Copying ${target.localSourcePath} into ${repoRelativePath}`);
      await workingCopy.mirrorInto(target.localSourcePath, repoRelativePath);
      await workingCopy.stageAll();

      const commitMessage = `${PUSH_COMMIT_PREFIX}: ${target.targetName}`;
      this.notify('commit', commitMessage);
      try {
        await workingCopy.commit(commitMessage);
      } catch (error) {
        if (error instanceof NoChangesError) {
          this.notify('cleanup', 'Nothing to commit, restoring working copy');
          await workingCopy.cleanupStagedChanges();
          await workingCopy.deleteBranchIfEmpty(branchName);
          return { status: 'no-changes', targetName: target.targetName };
        }
        throw error;
      }

      this.notify('push', `Pushing ${branchName}`);
      await workingCopy.pushCurrentBranch(branchName);

      return {
        status: 'pushed',
        report,
        preview,
        record: {
          branchName,
          commitMessage,
          filesCommitted: await this.enumerateCommittedFiles(workingCopy, target),
          repositoryUrl: workingCopy.getRepositoryUrl(),
        },
      };
    } catch (error) {
      await this.cleanupAfterFailure(workingCopy);
      throw this.annotate(error, 'push-target');
    }
  }

  /**
   * Copy a directory of the tracked branch to `destinationRoot/<targetName>`
   * for review, replacing any previous copy.
   */
  public async pullTarget(
    handle: RepositoryHandle,
    targetName: string,
    destinationRoot: string,
  ): Promise<PullRecord> {
    const workingCopy = this.workingCopyFactory(handle);
    if (!isValidTargetName(targetName)) {
      throw new InvalidTargetError(targetName, 'pull');
    }
    const source = this.resolveInside(workingCopy, targetName, 'pull');
    const destinationPath = path.join(destinationRoot, targetName);
    if (!isStrictlyInside(destinationRoot, destinationPath)) {
      throw new InvalidTargetError(targetName, 'pull');
    }

    this.notify('prepare-repository', `Preparing working copy at ${workingCopy.getLocalPath()}`);
    await this.prepareRepository(workingCopy, handle, false);

    if ((await this.fileSystem.kindOf(source)) !== 'directory') {
      throw new TargetNotFoundError(targetName, handle.remoteIdentifier);
    }

    this.notify('copy', `Copying ${targetName} to ${destinationPath}`);
    await this.fileSystem.replaceWithCopy(source, destinationPath);

    return {
      targetName,
      destinationPath,
      files: await this.fileSystem.listFiles(destinationPath),
    };
  }

  /**
   * ensureCloned → checkoutTracked → pullLatest (→ ensureClean).
   * A missing tracked branch becomes a `BranchConfigurationError`.
   */
  private async prepareRepository(
    workingCopy: WorkingCopyService,
    handle: RepositoryHandle,
    clean: boolean,
  ): Promise<void> {
    const steps: Array<[string, () => Promise<unknown>]> = [
      ['clone', () => workingCopy.ensureCloned()],
      ['checkout-tracked', () => workingCopy.checkoutTracked()],
      ['pull', () => workingCopy.pullLatest()],
    ];
    if (clean) {
      steps.push(['ensure-clean', () => workingCopy.ensureClean()]);
    }

    for (const [step, action] of steps) {
      try {
        await action();
      } catch (error) {
        if (error instanceof RepositoryAccessError && error.reason === 'BRANCH_NOT_FOUND') {
          throw new BranchConfigurationError(
            handle.trackedBranch,
            workingCopy.getLocalPath(),
            step,
            error.details,
          ).withContext('prepare-repository');
        }
        throw this.annotate(error, 'prepare-repository');
      }
    }
  }

  /**
   * Absolute path of a repo-relative path whose top-level directory is a valid
   * target name and which stays inside the working copy
   */
  private resolveInside(workingCopy: WorkingCopyService, repoRelativePath: string, operation: string): string {
    const [topLevel = ''] = repoRelativePath.split('/');
    const resolved = workingCopy.resolve(repoRelativePath);
    if (!isValidTargetName(topLevel) || !isStrictlyInside(workingCopy.getLocalPath(), resolved)) {
      throw new InvalidTargetError(repoRelativePath, operation);
    }
    return resolved;
  }

  private async enumerateCommittedFiles(
    workingCopy: WorkingCopyService,
    target: SyncTarget,
  ): Promise<string[]> {
    const fallback = [`${target.targetName}/`];
    try {
      const files = await workingCopy.listCommittedFiles(target.repoRelativePath);
      return files.length > 0 ? files : fallback;
    } catch {
      return fallback;
    }
  }

  /**
   * Restore the tracked branch; a failing cleanup must not mask the original error
   */
  private async cleanupAfterFailure(workingCopy: WorkingCopyService): Promise<void> {
    this.notify('cleanup', 'Restoring working copy after failure');
    try {
      await workingCopy.cleanupStagedChanges();
    } catch (cleanupError) {
      this.progress.warn?.(`Failed to clean up staged changes: ${errorMessage(cleanupError)}`);
    }
  }

  private annotate(error: unknown, step: string): unknown {
    return error instanceof SyncError ? error.withContext(step) : error;
  }

  private notify(stage: SyncStage, message: string): void {
    this.progress.stage(stage, message);
  }
}
