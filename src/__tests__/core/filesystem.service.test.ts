import * as path from 'path';
import * as os from 'os';
import * as fs from 'fs-extra';
import { FileSystemService } from '../../core/filesystem.service';
import { FileNotFoundError } from '../../errors/filesystem.error';

describe('FileSystemService', () => {
  let tempDir: string;
  let fileSystem: FileSystemService;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'anvil-fs-'));
    fileSystem = new FileSystemService();
  });

  afterEach(async () => {
    await fs.remove(tempDir);
  });

  describe('kindOf', () => {
    it('should distinguish files, directories and missing paths', async () => {
      await fs.outputFile(path.join(tempDir, 'a.txt'), 'a');

      expect(await fileSystem.kindOf(path.join(tempDir, 'a.txt'))).toBe('file');
      expect(await fileSystem.kindOf(tempDir)).toBe('directory');
      expect(await fileSystem.kindOf(path.join(tempDir, 'missing'))).toBeUndefined();
    });
  });

  describe('hasContent', () => {
    it('should require a non-empty file', async () => {
      await fs.outputFile(path.join(tempDir, 'empty'), '');
      await fs.outputFile(path.join(tempDir, 'full'), 'x');

      expect(await fileSystem.hasContent(path.join(tempDir, 'empty'))).toBe(false);
      expect(await fileSystem.hasContent(path.join(tempDir, 'full'))).toBe(true);
    });

    it('should look for files at any depth of a directory', async () => {
      await fs.ensureDir(path.join(tempDir, 'hollow', 'a', 'b'));
      await fs.outputFile(path.join(tempDir, 'deep', 'a', 'b', 'c.txt'), '');

      expect(await fileSystem.hasContent(path.join(tempDir, 'hollow'))).toBe(false);
      expect(await fileSystem.hasContent(path.join(tempDir, 'deep'))).toBe(true);
    });
  });

  describe('listFiles', () => {
    it('should list nested files sorted with POSIX separators', async () => {
      await fs.outputFile(path.join(tempDir, 'z.txt'), 'z');
      await fs.outputFile(path.join(tempDir, 'lua', 'opts.lua'), 'o');
      await fs.outputFile(path.join(tempDir, 'init.lua'), 'i');

      expect(await fileSystem.listFiles(tempDir)).toEqual(['init.lua', 'lua/opts.lua', 'z.txt']);
    });

    it('should skip dangling symlinks', async () => {
      await fs.outputFile(path.join(tempDir, 'kept.txt'), 'k');
      await fs.symlink(path.join(tempDir, 'nowhere'), path.join(tempDir, 'dangling'));

      expect(await fileSystem.listFiles(tempDir)).toEqual(['kept.txt']);
    });
  });

  describe('mirror', () => {
    it('should overwrite matching files and keep destination-only files', async () => {
      const source = path.join(tempDir, 'source');
      const destination = path.join(tempDir, 'repo', 'nvim');
      await fs.outputFile(path.join(source, 'init.lua'), 'new');
      await fs.outputFile(path.join(destination, 'init.lua'), 'old');
      await fs.outputFile(path.join(destination, 'legacy.lua'), 'legacy');

      await fileSystem.mirror(source, destination);

      expect(await fs.readFile(path.join(destination, 'init.lua'), 'utf8')).toBe('new');
      expect(await fs.readFile(path.join(destination, 'legacy.lua'), 'utf8')).toBe('legacy');
    });

    it('should copy a single file into a missing parent directory', async () => {
      await fs.outputFile(path.join(tempDir, 'starship.toml'), 's');

      await fileSystem.mirror(path.join(tempDir, 'starship.toml'), path.join(tempDir, 'repo', 'starship', 'starship.toml'));

      expect(await fs.readFile(path.join(tempDir, 'repo', 'starship', 'starship.toml'), 'utf8')).toBe('s');
    });
  });

  describe('replaceWithCopy', () => {
    it('should drop files from a previous copy', async () => {
      const source = path.join(tempDir, 'source');
      const destination = path.join(tempDir, 'review');
      await fs.outputFile(path.join(source, 'a.txt'), 'a');
      await fs.outputFile(path.join(destination, 'stale.txt'), 'stale');

      await fileSystem.replaceWithCopy(source, destination);

      expect(await fileSystem.listFiles(destination)).toEqual(['a.txt']);
    });
  });

  describe('writeFileAtomic', () => {
    it('should create parent directories and leave no temp file behind', async () => {
      const target = path.join(tempDir, 'nested', 'settings.json');

      await fileSystem.writeFileAtomic(target, '{}\n');

      expect(await fs.readFile(target, 'utf8')).toBe('{}\n');
      expect(await fs.readdir(path.dirname(target))).toEqual(['settings.json']);
    });
  });

  describe('errors', () => {
    it('should map ENOENT to FileNotFoundError with the path', async () => {
      const missing = path.join(tempDir, 'missing.txt');

      const error = await fileSystem.readFile(missing).catch((caught: unknown) => caught);

      expect(error).toBeInstanceOf(FileNotFoundError);
      if (error instanceof FileNotFoundError) {
        expect(error.path).toBe(missing);
        expect(error.operation).toBe('read');
        expect(error.code).toBe('FILE_NOT_FOUND');
      }
    });
  });
});
