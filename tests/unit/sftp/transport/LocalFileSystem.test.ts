import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import { mkdir, mkdtemp, readFile, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import * as path from 'path';
import { NodeLocalFileSystem } from '../../../../src/sftp/transport/LocalFileSystem.js';

describe('NodeLocalFileSystem', () => {
  const fileSystem = new NodeLocalFileSystem();
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(tmpdir(), 'local-fs-'));
    await writeFile(path.join(dir, 'file.txt'), 'content');
    await mkdir(path.join(dir, 'folder'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('should tell files from folders', async () => {
    await expect(fileSystem.exists(path.join(dir, 'folder'))).resolves.toBe(true);
    await expect(fileSystem.exists(path.join(dir, 'none'))).resolves.toBe(false);
    await expect(fileSystem.isReadableFile(path.join(dir, 'file.txt'))).resolves.toBe(true);
    await expect(fileSystem.isReadableFile(path.join(dir, 'folder'))).resolves.toBe(false);
    await expect(fileSystem.isDirectory(path.join(dir, 'folder'))).resolves.toBe(true);
    await expect(fileSystem.isDirectory(path.join(dir, 'file.txt'))).resolves.toBe(false);
  });

  it('should create nested folders', async () => {
    await fileSystem.mkdirs(path.join(dir, 'a', 'b'));

    await expect(fileSystem.isDirectory(path.join(dir, 'a', 'b'))).resolves.toBe(true);
  });

  it('should rename and remove files', async () => {
    await fileSystem.rename(path.join(dir, 'file.txt'), path.join(dir, 'moved.txt'));
    expect(await readFile(path.join(dir, 'moved.txt'), 'utf8')).toBe('content');

    await fileSystem.remove(path.join(dir, 'moved.txt'));
    await expect(fileSystem.exists(path.join(dir, 'moved.txt'))).resolves.toBe(false);
  });

  it('should ignore removing a missing file', async () => {
    await expect(fileSystem.remove(path.join(dir, 'none'))).resolves.toBeUndefined();
  });
});
