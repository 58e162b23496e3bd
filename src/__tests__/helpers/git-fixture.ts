import * as path from 'path';
import * as os from 'os';
import * as fs from 'fs-extra';
import { simpleGit, SimpleGit } from 'simple-git';
import { RepositoryHandle } from '../../types/sync.types';
import { gitProcessEnvironment } from '../../utils/git-env';

export interface GitFixture {
  root: string;
  /** Bare repository standing in for the remote */
  remotePath: string;
  /** Where the working copy under test is cloned */
  clonePath: string;
  /** Local configuration sources */
  sourcesPath: string;
  handle: RepositoryHandle;
  /** Scratch clone used to inspect or change the remote */
  inspect(): Promise<{ git: SimpleGit; dir: string }>;
  cleanup(): Promise<void>;
}

const IDENTITY = { name: 'Test User', email: 'test@example.com' };

/**
 * Bare remote seeded with one commit on `main`, plus empty clone and source dirs
 */
export async function createGitFixture(
  seed: Record<string, string> = { 'README.md': '# configs\n' },
): Promise<GitFixture> {
  const root = await fs.mkdtemp(path.join(os.tmpdir(), 'anvil-git-'));
  const remotePath = path.join(root, 'remote.git');
  const clonePath = path.join(root, 'home', '.anvil', 'dotfiles');
  const sourcesPath = path.join(root, 'sources');
  await fs.ensureDir(sourcesPath);

  const git = (baseDir: string = root): SimpleGit => simpleGit(baseDir).env(gitProcessEnvironment({}));

  await git().raw(['init', '--bare', remotePath]);
  await git(remotePath).raw(['symbolic-ref', 'HEAD', 'refs/heads/main']);

  let scratchCount = 0;
  const inspect = async (): Promise<{ git: SimpleGit; dir: string }> => {
    const dir = path.join(root, `scratch-${scratchCount++}`);
    await git().clone(remotePath, dir);
    const scratch = git(dir);
    await scratch.addConfig('user.name', IDENTITY.name);
    await scratch.addConfig('user.email', IDENTITY.email);
    return { git: scratch, dir };
  };

  const seedDir = path.join(root, 'seed');
  await fs.ensureDir(seedDir);
  const seedGit = git(seedDir);
  await seedGit.init();
  await seedGit.raw(['symbolic-ref', 'HEAD', 'refs/heads/main']);
  await seedGit.addConfig('user.name', IDENTITY.name);
  await seedGit.addConfig('user.email', IDENTITY.email);
  for (const [relative, content] of Object.entries(seed)) {
    await fs.outputFile(path.join(seedDir, relative), content);
  }
  await seedGit.add('.');
  await seedGit.commit('seed');
  await seedGit.push(remotePath, 'main');

  return {
    root,
    remotePath,
    clonePath,
    sourcesPath,
    handle: {
      remoteIdentifier: remotePath,
      trackedBranch: 'main',
      localClonePath: clonePath,
      committerName: IDENTITY.name,
      committerEmail: IDENTITY.email,
    },
    inspect,
    cleanup: () => fs.remove(root),
  };
}

/**
 * Fixed clock for deterministic branch names: 5 March 2025, 14:30 local time
 */
export const FIXED_NOW = new Date(2025, 2, 5, 14, 30);
export const FIXED_BRANCH = 'config-push-05032025-1430';
