/**
 * Tests for NodeFileSystemAdapter
 */

import { promises as fs } from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';
import { NodeFileSystemAdapter } from '../node-fs-adapter';

describe('NodeFileSystemAdapter', () => {
  let adapter: NodeFileSystemAdapter;
  let testDir: string;

  beforeEach(async () => {
    adapter = new NodeFileSystemAdapter();
    testDir = await fs.mkdtemp(join(tmpdir(), 'node-fs-adapter-test-'));
  });

  afterEach(async () => {
    await fs.rm(testDir, { recursive: true, force: true });
  });

  describe('exists', () => {
    it('should report files and directories', async () => {
      await fs.writeFile(join(testDir, 'a.txt'), 'content');

      expect(await adapter.exists(join(testDir, 'a.txt'))).toBe(true);
      expect(await adapter.exists(testDir)).toBe(true);
      expect(await adapter.exists(join(testDir, 'missing.txt'))).toBe(false);
    });
  });

  describe('mkdir', () => {
    it('should create nested directories and tolerate existing ones', async () => {
      const dirPath = join(testDir, 'a', 'b', 'c');

      await adapter.mkdir(dirPath);
      await adapter.mkdir(dirPath);

      expect((await fs.stat(dirPath)).isDirectory()).toBe(true);
    });
  });

  describe('writeFile / readFile', () => {
    it('should round-trip bytes and create the parent directory', async () => {
      const filePath = join(testDir, 'images', 'photo1.jpg');
      const data = new Uint8Array([0xff, 0xd8, 0xff, 0x00, 0x10]);

      await adapter.writeFile(filePath, data);

      expect(await adapter.readFile(filePath)).toEqual(data);
    });

    it('should replace an existing file and leave no temp files behind', async () => {
      const filePath = join(testDir, 'manifest.txt');
      await adapter.writeFile(filePath, new TextEncoder().encode('first'));
      await adapter.writeFile(filePath, new TextEncoder().encode('second'));

      expect(await fs.readFile(filePath, 'utf-8')).toBe('second');
      expect(await fs.readdir(testDir)).toEqual(['manifest.txt']);
    });

    it('should not create the file when the signal is already aborted', async () => {
      const filePath = join(testDir, 'aborted.txt');
      const controller = new AbortController();
      controller.abort();

      await expect(
        adapter.writeFile(filePath, new TextEncoder().encode('x'), { signal: controller.signal })
      ).rejects.toThrow();

      expect(await fs.readdir(testDir)).toEqual([]);
    });

    it('should reject reading a missing file with ENOENT', async () => {
      await expect(adapter.readFile(join(testDir, 'missing'))).rejects.toMatchObject({ code: 'ENOENT' });
    });
  });

  describe('deleteFile', () => {
    it('should remove the file', async () => {
      const filePath = join(testDir, 'gone.txt');
      await fs.writeFile(filePath, 'x');

      await adapter.deleteFile(filePath);

      expect(await adapter.exists(filePath)).toBe(false);
    });
  });

  describe('listFiles', () => {
    it('should list entry names', async () => {
      await fs.writeFile(join(testDir, 'b.txt'), 'x');
      await fs.mkdir(join(testDir, 'a'));

      expect((await adapter.listFiles(testDir)).sort()).toEqual(['a', 'b.txt']);
    });
  });

  describe('rename', () => {
    it('should move a directory with its contents', async () => {
      const from = join(testDir, 'active', 'slug');
      const to = join(testDir, 'expired', 'slug');
      await fs.mkdir(from, { recursive: true });
      await fs.writeFile(join(from, 'manifest.txt'), 'm');
      await fs.mkdir(join(testDir, 'expired'));

      await adapter.rename(from, to);

      expect(await fs.readFile(join(to, 'manifest.txt'), 'utf-8')).toBe('m');
      expect(await adapter.exists(from)).toBe(false);
    });

    it('should refuse to replace an existing target', async () => {
      const from = join(testDir, 'one');
      const to = join(testDir, 'two');
      await fs.mkdir(from);
      await fs.mkdir(to);

      await expect(adapter.rename(from, to)).rejects.toMatchObject({ code: 'EEXIST' });
      expect(await adapter.exists(from)).toBe(true);
    });
  });

  describe('stat', () => {
    it('should return size and directory flag', async () => {
      await fs.writeFile(join(testDir, 'five.txt'), '12345');

      const fileStats = await adapter.stat(join(testDir, 'five.txt'));
      const dirStats = await adapter.stat(testDir);

      expect(fileStats.size).toBe(5);
      expect(fileStats.isDirectory).toBe(false);
      expect(dirStats.isDirectory).toBe(true);
    });
  });

  describe('path helpers', () => {
    it('should join and take the base name', () => {
      expect(adapter.joinPath('/alerts', '38.7_-9.1', 'active')).toBe('/alerts/38.7_-9.1/active');
      expect(adapter.basename('/alerts/38.7_-9.1/active/slug')).toBe('slug');
    });
  });
});
