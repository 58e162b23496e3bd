import * as path from 'path';
import * as fs from 'fs-extra';
import { errnoCode, errorMessage } from '../errors/base.error';
import { FileNotFoundError, FileSystemError, PermissionError } from '../errors/filesystem.error';
import { toPosix } from '../utils/path.utils';

export type EntryKind = 'file' | 'directory';

/**
 * Relative path (POSIX separators) to entry kind, for one tree
 */
export type TreeIndex = Map<string, EntryKind>;

/**
 * File system operations used by the sync workflow.
 *
 * Symbolic links are followed; permission bits are never inspected.
 */
export class FileSystemService {
  public async pathExists(targetPath: string): Promise<boolean> {
    return await fs.pathExists(targetPath);
  }

  /**
   * Kind of the entry at `targetPath`, or undefined when nothing is there
   */
  public async kindOf(targetPath: string): Promise<EntryKind | undefined> {
    try {
      const stats = await fs.stat(targetPath);
      return stats.isDirectory() ? 'directory' : 'file';
    } catch (error) {
      if (this.isNotFound(error)) {
        return undefined;
      }
      throw this.wrap(error, 'stat', targetPath);
    }
  }

  public async readFile(filePath: string): Promise<string> {
    try {
      return await fs.readFile(filePath, 'utf8');
    } catch (error) {
      throw this.wrap(error, 'read', filePath);
    }
  }

  public async readBuffer(filePath: string): Promise<Buffer> {
    try {
      return await fs.readFile(filePath);
    } catch (error) {
      throw this.wrap(error, 'read', filePath);
    }
  }

  /**
   * Write through a temp file and rename so readers never see a partial file
   */
  public async writeFileAtomic(filePath: string, content: string): Promise<void> {
    const tempPath = `${filePath}.${process.pid}.tmp`;
    try {
      await fs.ensureDir(path.dirname(filePath));
      await fs.writeFile(tempPath, content, 'utf8');
      await fs.move(tempPath, filePath, { overwrite: true });
    } catch (error) {
      await fs.remove(tempPath);
      throw this.wrap(error, 'write', filePath);
    }
  }

  public async ensureDir(dirPath: string): Promise<void> {
    try {
      await fs.ensureDir(dirPath);
    } catch (error) {
      throw this.wrap(error, 'mkdir', dirPath);
    }
  }

  public async remove(targetPath: string): Promise<void> {
    try {
      await fs.remove(targetPath);
    } catch (error) {
      throw this.wrap(error, 'remove', targetPath);
    }
  }

  /**
   * A source has content when it is a non-empty file, or a directory holding
   * at least one file somewhere below it.
   */
  public async hasContent(sourcePath: string): Promise<boolean> {
    const kind = await this.kindOf(sourcePath);
    if (kind === undefined) {
      return false;
    }
    if (kind === 'file') {
      const stats = await fs.stat(sourcePath);
      return stats.size > 0;
    }

    const index = await this.indexTree(sourcePath);
    for (const entryKind of index.values()) {
      if (entryKind === 'file') {
        return true;
      }
    }
    return false;
  }

  /**
   * Recursively index a directory. The root itself is not included.
   */
  public async indexTree(rootDir: string): Promise<TreeIndex> {
    const index: TreeIndex = new Map();

    const walk = async (dir: string): Promise<void> => {
      let entries: string[];
      try {
        entries = await fs.readdir(dir);
      } catch (error) {
        throw this.wrap(error, 'walk', dir);
      }

      for (const entry of entries) {
        const absolute = path.join(dir, entry);
        const relative = toPosix(path.relative(rootDir, absolute));
        const kind = await this.kindOf(absolute);
        if (kind === undefined) {
          // dangling symlink
          continue;
        }
        index.set(relative, kind);
        if (kind === 'directory') {
          await walk(absolute);
        }
      }
    };

    await walk(rootDir);
    return index;
  }

  /**
   * Sorted list of files below `rootDir`, relative and POSIX formatted
   */
  public async listFiles(rootDir: string): Promise<string[]> {
    const index = await this.indexTree(rootDir);
    return [...index.entries()]
      .filter(([, kind]) => kind === 'file')
      .map(([relative]) => relative)
      .sort();
  }

  public async filesEqual(first: string, second: string): Promise<boolean> {
    const [a, b] = await Promise.all([this.readBuffer(first), this.readBuffer(second)]);
    return a.equals(b);
  }

  /**
   * Mirror-merge `source` onto `destination`: files are added or overwritten,
   * files that exist only in the destination are kept.
   */
  public async mirror(source: string, destination: string): Promise<void> {
    try {
      await fs.ensureDir(path.dirname(destination));
      await fs.copy(source, destination, { overwrite: true, dereference: true });
    } catch (error) {
      throw this.wrap(error, 'copy', source);
    }
  }

  /**
   * Replace `destination` with a fresh copy of `source`
   */
  public async replaceWithCopy(source: string, destination: string): Promise<void> {
    await this.remove(destination);
    await this.mirror(source, destination);
  }

  private isNotFound(error: unknown): boolean {
    return errnoCode(error) === 'ENOENT';
  }

  private wrap(error: unknown, operation: string, targetPath: string): FileSystemError {
    if (error instanceof FileSystemError) {
      return error;
    }
    const code = errnoCode(error);
    const message = errorMessage(error);
    if (code === 'ENOENT') {
      return new FileNotFoundError(`Path not found: ${targetPath}`, operation, targetPath, message);
    }
    if (code === 'EACCES' || code === 'EPERM') {
      return new PermissionError(`Permission denied: ${targetPath}`, operation, targetPath, message);
    }
    return new FileSystemError(`Failed to ${operation} ${targetPath}`, operation, targetPath, message);
  }
}
