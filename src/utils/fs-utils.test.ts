import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import {
  collectFiles,
  listDirectoriesAtDepth,
  readJsonFile,
  readLines,
  readText,
  writeFileAtomic,
} from './fs-utils';

describe('fs-utils', () => {
  let tempDir: string;

  const touch = (relativePath: string, contents = 'x'): string => {
    const fullPath = path.join(tempDir, relativePath);
    fs.mkdirSync(path.dirname(fullPath), { recursive: true });
    fs.writeFileSync(fullPath, contents);
    return fullPath;
  };

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'pbak-fs-utils-test-'));
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  describe('readJsonFile', () => {
    it('should return undefined for a missing file', async () => {
      await expect(readJsonFile(path.join(tempDir, 'none.json'))).resolves.toBeUndefined();
    });

    it('should parse an existing file', async () => {
      const file = touch('config.json', '{"a":1}');
      await expect(readJsonFile(file)).resolves.toEqual({ a: 1 });
    });

    it('should reject invalid JSON', async () => {
      const file = touch('broken.json', '{"a":');
      await expect(readJsonFile(file)).rejects.toThrow(SyntaxError);
    });
  });

  describe('writeFileAtomic', () => {
    it('should replace the file and leave no temporary file behind', async () => {
      const file = touch('store.jsonl', 'old\n');

      await writeFileAtomic(file, 'new\n');

      expect(fs.readFileSync(file, 'utf8')).toBe('new\n');
      expect(fs.readdirSync(tempDir)).toEqual(['store.jsonl']);
    });
  });

  describe('readText', () => {
    it('should keep a missing final newline visible', async () => {
      const file = touch('log.jsonl', 'a\n{"torn"');
      await expect(readText(file)).resolves.toBe('a\n{"torn"');
    });

    it('should read a missing file as empty', async () => {
      await expect(readText(path.join(tempDir, 'missing'))).resolves.toBe('');
    });
  });

  describe('readLines', () => {
    it('should drop blank lines', async () => {
      const file = touch('log.jsonl', 'a\n\nb\n');
      await expect(readLines(file)).resolves.toEqual(['a', 'b']);
    });

    it('should read a missing file as empty', async () => {
      await expect(readLines(path.join(tempDir, 'missing'))).resolves.toEqual([]);
    });
  });

  describe('collectFiles', () => {
    it('should walk in sorted order and skip hidden entries', async () => {
      touch('b/2.jpg');
      touch('a/1.jpg');
      touch('a/._1.jpg');
      touch('.Trashes/old.jpg');
      touch('c.jpg');

      const files = await collectFiles(tempDir);

      expect(files).toEqual([
        path.join(tempDir, 'a', '1.jpg'),
        path.join(tempDir, 'b', '2.jpg'),
        path.join(tempDir, 'c.jpg'),
      ]);
    });

    it('should include hidden entries when asked', async () => {
      touch('a/._1.jpg');

      const files = await collectFiles(tempDir, { skipHidden: false });

      expect(files).toEqual([path.join(tempDir, 'a', '._1.jpg')]);
    });
  });

  describe('listDirectoriesAtDepth', () => {
    it('should list only directories at the requested depth', async () => {
      touch('2024/05/02/a.jpg');
      touch('2024/05/01/b.jpg');
      touch('2023/12/31/c.jpg');
      touch('2024/stray.jpg');

      const dirs = await listDirectoriesAtDepth(tempDir, 3);

      expect(dirs).toEqual([
        path.join(tempDir, '2023', '12', '31'),
        path.join(tempDir, '2024', '05', '01'),
        path.join(tempDir, '2024', '05', '02'),
      ]);
    });
  });
});
