import * as path from 'path';
import * as fs from 'fs-extra';
import { SyncOrchestrator } from '../../core/sync.orchestrator';
import { PrivacyGateService } from '../../core/privacy.service';
import { WorkingCopyService } from '../../core/working-copy.service';
import {
  BranchConfigurationError,
  InvalidTargetError,
  RepositoryAccessError,
  SecurityBlockedError,
  TargetNotFoundError,
} from '../../errors/sync.error';
import { ConfirmCallback, SyncStage, SyncTarget } from '../../types/sync.types';
import { createGitFixture, FIXED_BRANCH, FIXED_NOW, GitFixture } from '../helpers/git-fixture';

describe('SyncOrchestrator (real git)', () => {
  let fixture: GitFixture;
  let privacyGate: PrivacyGateService;
  let stages: SyncStage[];
  let orchestrator: SyncOrchestrator;

  const setup = async (seed?: Record<string, string>): Promise<void> => {
    fixture = await createGitFixture(seed);
    privacyGate = new PrivacyGateService();
    stages = [];
    orchestrator = new SyncOrchestrator({
      privacyGate,
      clock: () => FIXED_NOW,
      progress: { stage: stage => stages.push(stage) },
    });
  };

  const appTarget = (name = 'app-x'): SyncTarget => ({
    targetName: name,
    localSourcePath: path.join(fixture.sourcesPath, name),
    repoRelativePath: name,
  });

  const writeSource = async (relative: string, content: string): Promise<void> => {
    await fs.outputFile(path.join(fixture.sourcesPath, relative), content);
  };

  afterEach(async () => {
    jest.restoreAllMocks();
    await fixture.cleanup();
  });

  describe('pushTarget', () => {
    it('should push a new target to a timestamped branch', async () => {
      await setup();
      await writeSource('app-x/init.lua', 'vim.opt.number = true\n');
      const confirm = jest.fn<ReturnType<ConfirmCallback>, Parameters<ConfirmCallback>>(() => true);

      const outcome = await orchestrator.pushTarget(fixture.handle, appTarget(), confirm);

      expect(outcome.status).toBe('pushed');
      if (outcome.status !== 'pushed') {
        return;
      }
      expect(outcome.record).toEqual({
        branchName: FIXED_BRANCH,
        commitMessage: 'anvil[push]: app-x',
        filesCommitted: ['app-x/init.lua'],
        repositoryUrl: fixture.remotePath,
      });
      expect(outcome.report).toMatchObject({
        hasChanges: true,
        isNewTarget: true,
        changedFileCount: 1,
        insertionCount: 1,
        deletionCount: 0,
      });

      expect(confirm).toHaveBeenCalledTimes(1);
      const [, , preview] = confirm.mock.calls[0];
      expect(preview?.fileCount).toBe(1);
      expect(preview?.fullDiff).toContain('+vim.opt.number = true');

      const { git } = await fixture.inspect();
      expect(await git.show([`origin/${FIXED_BRANCH}:app-x/init.lua`])).toBe('vim.opt.number = true\n');
      expect((await git.raw(['log', '-1', '--format=%s', `origin/${FIXED_BRANCH}`])).trim()).toBe(
        'anvil[push]: app-x',
      );
      expect(stages).toEqual([
        'verify-privacy',
        'prepare-repository',
        'detect-changes',
        'preview',
        'confirm',
        'branch',
        'stage',
        'commit',
        'push',
      ]);
    });

    it('should report no changes without creating a branch', async () => {
      await setup({ 'app-x/init.lua': 'set number\n' });
      await writeSource('app-x/init.lua', 'set number\n');
      const confirm = jest.fn(() => true);

      const outcome = await orchestrator.pushTarget(fixture.handle, appTarget(), confirm);

      expect(outcome).toEqual({ status: 'no-changes', targetName: 'app-x' });
      expect(confirm).not.toHaveBeenCalled();
      expect(stages).toEqual(['verify-privacy', 'prepare-repository', 'detect-changes']);

      const { git } = await fixture.inspect();
      expect(await git.raw(['ls-remote', '--heads', 'origin'])).not.toContain('config-push');
    });

    it('should report no changes for an empty new target', async () => {
      await setup();
      await fs.ensureDir(path.join(fixture.sourcesPath, 'app-x', 'empty'));

      const outcome = await orchestrator.pushTarget(fixture.handle, appTarget(), () => true);

      expect(outcome).toEqual({ status: 'no-changes', targetName: 'app-x' });
    });

    it('should restore a clean tracked branch when the operator declines', async () => {
      await setup({ 'app-x/init.lua': 'old\n' });
      await writeSource('app-x/init.lua', 'new\n');

      const outcome = await orchestrator.pushTarget(fixture.handle, appTarget(), () => false);

      expect(outcome).toEqual({ status: 'cancelled', targetName: 'app-x' });

      const workingCopy = new WorkingCopyService(fixture.handle);
      expect(await workingCopy.currentBranch()).toBe('main');
      expect(await workingCopy.isClean()).toBe(true);
      expect(await workingCopy.listLocalBranches()).toEqual(['main']);
      expect(await fs.readFile(path.join(fixture.clonePath, 'app-x', 'init.lua'), 'utf8')).toBe('old\n');

      const { git } = await fixture.inspect();
      expect(await git.raw(['ls-remote', '--heads', 'origin'])).not.toContain('config-push');
    });

    it('should block a public repository before touching the working copy', async () => {
      await setup();
      await writeSource('app-x/init.lua', 'new\n');
      jest
        .spyOn(privacyGate, 'assertPrivate')
        .mockRejectedValue(new SecurityBlockedError('PUBLIC_REPOSITORY', 'octo/dotfiles'));
      const confirm = jest.fn(() => true);

      await expect(orchestrator.pushTarget(fixture.handle, appTarget(), confirm)).rejects.toBeInstanceOf(
        SecurityBlockedError,
      );

      expect(confirm).not.toHaveBeenCalled();
      expect(await fs.pathExists(fixture.clonePath)).toBe(false);
    });

    it('should clean up and rethrow when the push fails', async () => {
      await setup({ 'app-x/init.lua': 'old\n' });
      await writeSource('app-x/init.lua', 'new\n');
      jest
        .spyOn(WorkingCopyService.prototype, 'pushCurrentBranch')
        .mockRejectedValue(new RepositoryAccessError('Failed to push branch', 'push', 'REJECTED'));

      const error = await orchestrator
        .pushTarget(fixture.handle, appTarget(), () => true)
        .catch((caught: unknown) => caught);

      expect(error).toBeInstanceOf(RepositoryAccessError);
      if (error instanceof RepositoryAccessError) {
        expect(error.reason).toBe('REJECTED');
        expect(error.context).toEqual(['push-target']);
      }
      expect(stages[stages.length - 1]).toBe('cleanup');

      const workingCopy = new WorkingCopyService(fixture.handle);
      expect(await workingCopy.currentBranch()).toBe('main');
      expect(await workingCopy.isClean()).toBe(true);
      expect(await fs.readFile(path.join(fixture.clonePath, 'app-x', 'init.lua'), 'utf8')).toBe('old\n');
    });

    it('should keep files that exist only in the repository', async () => {
      await setup({ 'app-x/init.lua': 'a\n', 'app-x/legacy.lua': 'old\n' });
      await writeSource('app-x/init.lua', 'b\n');
      const confirm = jest.fn<ReturnType<ConfirmCallback>, Parameters<ConfirmCallback>>(() => true);

      const outcome = await orchestrator.pushTarget(fixture.handle, appTarget(), confirm);

      expect(outcome.status).toBe('pushed');
      const [, report] = confirm.mock.calls[0];
      expect(report.isNewTarget).toBe(false);
      expect(report.changedFileCount).toBe(1);
      expect(report.remoteOnlyPaths).toEqual(['legacy.lua']);

      const { git } = await fixture.inspect();
      expect(await git.show([`origin/${FIXED_BRANCH}:app-x/init.lua`])).toBe('b\n');
      expect(await git.show([`origin/${FIXED_BRANCH}:app-x/legacy.lua`])).toBe('old\n');
    });

    it('should drop the empty push branch when the copy stages nothing', async () => {
      await setup({ 'app-x/init.lua': 'same\n', 'app-x/legacy.lua': 'old\n' });
      await writeSource('app-x/init.lua', 'same\n');
      const confirm = jest.fn(() => true);

      const first = await orchestrator.pushTarget(fixture.handle, appTarget(), confirm);
      const second = await orchestrator.pushTarget(fixture.handle, appTarget(), confirm);

      expect(first).toEqual({ status: 'no-changes', targetName: 'app-x' });
      expect(second).toEqual({ status: 'no-changes', targetName: 'app-x' });
      expect(confirm).toHaveBeenCalledTimes(2);

      const workingCopy = new WorkingCopyService(fixture.handle);
      expect(await workingCopy.currentBranch()).toBe('main');
      expect(await workingCopy.isClean()).toBe(true);
      expect(await workingCopy.listLocalBranches()).toEqual(['main']);
    });

    it('should refuse a target inside the git directory before any repository work', async () => {
      await setup();
      await writeSource('hooks/pre-commit', '#!/bin/sh\n');
      const confirm = jest.fn(() => true);
      const target: SyncTarget = {
        targetName: 'hooks',
        localSourcePath: path.join(fixture.sourcesPath, 'hooks'),
        repoRelativePath: '.git/hooks',
      };

      await expect(orchestrator.pushTarget(fixture.handle, target, confirm)).rejects.toBeInstanceOf(
        InvalidTargetError,
      );

      expect(confirm).not.toHaveBeenCalled();
      expect(stages).toEqual([]);
      expect(await fs.pathExists(fixture.clonePath)).toBe(false);
    });

    it('should push a single file target below its application directory', async () => {
      await setup();
      await writeSource('starship.toml', 'add_newline = false\n');
      const target: SyncTarget = {
        targetName: 'starship',
        localSourcePath: path.join(fixture.sourcesPath, 'starship.toml'),
        repoRelativePath: 'starship/starship.toml',
      };

      const outcome = await orchestrator.pushTarget(fixture.handle, target, () => true);

      expect(outcome.status === 'pushed' && outcome.record.filesCommitted).toEqual([
        'starship/starship.toml',
      ]);
    });

    it('should translate a missing tracked branch into a branch configuration error', async () => {
      await setup();
      await writeSource('app-x/init.lua', 'new\n');
      const handle = { ...fixture.handle, trackedBranch: 'develop' };

      const error = await orchestrator.pushTarget(handle, appTarget(), () => true).catch((caught: unknown) => caught);

      expect(error).toBeInstanceOf(BranchConfigurationError);
      if (error instanceof BranchConfigurationError) {
        expect(error.branch).toBe('develop');
        expect(error.message).toBe(
          "Branch Configuration Error: branch 'develop' was not found in the configuration repository",
        );
        expect(error.context).toEqual(['prepare-repository']);
        expect(error.remediation[1]).toContain(fixture.clonePath);
      }
    });
  });

  describe('pullTarget', () => {
    it('should copy a target directory for review', async () => {
      await setup({ 'nvim/init.lua': 'set\n', 'nvim/lua/plugins.lua': 'return {}\n' });
      const destinationRoot = path.join(fixture.root, 'temp');

      const record = await orchestrator.pullTarget(fixture.handle, 'nvim', destinationRoot);

      expect(record).toEqual({
        targetName: 'nvim',
        destinationPath: path.join(destinationRoot, 'nvim'),
        files: ['init.lua', 'lua/plugins.lua'],
      });
      expect(await fs.readFile(path.join(destinationRoot, 'nvim', 'init.lua'), 'utf8')).toBe('set\n');
    });

    it('should pick up commits made on the remote since the last run', async () => {
      await setup({ 'nvim/init.lua': 'set\n' });
      const destinationRoot = path.join(fixture.root, 'temp');
      await orchestrator.pullTarget(fixture.handle, 'nvim', destinationRoot);

      const { git, dir } = await fixture.inspect();
      await fs.outputFile(path.join(dir, 'nvim', 'keymaps.lua'), 'map\n');
      await git.add('.');
      await git.commit('add keymaps');
      await git.push('origin', 'main');

      const record = await orchestrator.pullTarget(fixture.handle, 'nvim', destinationRoot);

      expect(record.files).toEqual(['init.lua', 'keymaps.lua']);
    });

    it.each(['..', '.', '.git', 'nvim/lua'])(
      'should reject the target name %s without touching the settings directory',
      async targetName => {
        await setup({ 'nvim/init.lua': 'set\n' });
        const anvilHome = path.dirname(fixture.clonePath);
        const settingsPath = path.join(anvilHome, 'settings.json');
        await fs.outputFile(settingsPath, '{}\n');
        await orchestrator.pullTarget(fixture.handle, 'nvim', path.join(anvilHome, 'temp'));

        await expect(
          orchestrator.pullTarget(fixture.handle, targetName, path.join(anvilHome, 'temp')),
        ).rejects.toBeInstanceOf(InvalidTargetError);

        expect(await fs.readFile(settingsPath, 'utf8')).toBe('{}\n');
        expect(await new WorkingCopyService(fixture.handle).isRepository()).toBe(true);
      },
    );

    it('should fail for a target the repository does not have', async () => {
      await setup();

      await expect(
        orchestrator.pullTarget(fixture.handle, 'zsh', path.join(fixture.root, 'temp')),
      ).rejects.toBeInstanceOf(TargetNotFoundError);
    });
  });
});
