import * as path from 'path';
import { FileSystemService, TreeIndex } from './filesystem.service';
import { ChangeReport } from '../types/sync.types';
import { FileNotFoundError } from '../errors/filesystem.error';

/**
 * Compares a local source (file or directory) with its counterpart in the
 * working copy: path structure and byte content only.
 */
export class ChangeDetectorService {
  private readonly fileSystem: FileSystemService;

  constructor(fileSystem?: FileSystemService) {
    this.fileSystem = fileSystem || new FileSystemService();
  }

  /**
   * @param localSourcePath - absolute path of the local file or directory
   * @param repoTargetPath - absolute path of the counterpart inside the working copy
   */
  public async detect(localSourcePath: string, repoTargetPath: string): Promise<ChangeReport> {
    const repoKind = await this.fileSystem.kindOf(repoTargetPath);

    if (repoKind === undefined) {
      return await this.detectNewTarget(localSourcePath);
    }

    const localKind = await this.fileSystem.kindOf(localSourcePath);
    if (localKind === undefined) {
      throw new FileNotFoundError(
        `Local config path not found: ${localSourcePath}`,
        'detect-changes',
        localSourcePath,
      );
    }

    if (localKind !== repoKind) {
      return this.report(true, false, localKind === 'file' ? 1 : await this.countFiles(localSourcePath), []);
    }

    if (localKind === 'file') {
      const changed = !(await this.fileSystem.filesEqual(localSourcePath, repoTargetPath));
      return this.report(changed, false, changed ? 1 : 0, []);
    }

    return await this.compareTrees(localSourcePath, repoTargetPath);
  }

  private async detectNewTarget(localSourcePath: string): Promise<ChangeReport> {
    if (!(await this.fileSystem.hasContent(localSourcePath))) {
      return this.report(false, true, 0, []);
    }
    const kind = await this.fileSystem.kindOf(localSourcePath);
    const fileCount = kind === 'directory' ? await this.countFiles(localSourcePath) : 1;
    return this.report(true, true, fileCount, []);
  }

  private async compareTrees(localDir: string, repoDir: string): Promise<ChangeReport> {
    const [localIndex, repoIndex] = await Promise.all([
      this.fileSystem.indexTree(localDir),
      this.fileSystem.indexTree(repoDir),
    ]);

    let hasChanges = localIndex.size !== repoIndex.size;
    let changedFileCount = 0;

    for (const [relative, localKind] of localIndex) {
      const repoKind = repoIndex.get(relative);

      if (repoKind === undefined) {
        hasChanges = true;
        if (localKind === 'file') {
          changedFileCount++;
        }
        continue;
      }

      if (repoKind !== localKind) {
        hasChanges = true;
        changedFileCount++;
        continue;
      }

      if (localKind === 'file') {
        const equal = await this.fileSystem.filesEqual(
          path.join(localDir, relative),
          path.join(repoDir, relative),
        );
        if (!equal) {
          hasChanges = true;
          changedFileCount++;
        }
      }
    }

    return this.report(hasChanges, false, changedFileCount, this.remoteOnly(localIndex, repoIndex));
  }

  private remoteOnly(localIndex: TreeIndex, repoIndex: TreeIndex): string[] {
    return [...repoIndex.keys()].filter(relative => !localIndex.has(relative)).sort();
  }

  private async countFiles(dir: string): Promise<number> {
    return (await this.fileSystem.listFiles(dir)).length;
  }

  private report(
    hasChanges: boolean,
    isNewTarget: boolean,
    changedFileCount: number,
    remoteOnlyPaths: string[],
  ): ChangeReport {
    return {
      hasChanges,
      isNewTarget,
      changedFileCount,
      insertionCount: 0,
      deletionCount: 0,
      remoteOnlyPaths,
    };
  }
}
