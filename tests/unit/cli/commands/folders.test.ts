/**
 * Folder commands - mkdir, rmdir, rm-files, mv-files
 */

import { describe, it, expect, beforeEach, afterEach, jest } from '@jest/globals';

jest.mock('ora', () => ({
  __esModule: true,
  default: () => ({
    start: jest.fn().mockReturnThis(),
    stop: jest.fn(),
  }),
}));

jest.mock('chalk', () => {
  const passthrough = (...args: unknown[]) => args[0];
  const makeChain = (): unknown =>
    new Proxy(passthrough, {
      get: (_target, prop) => (typeof prop === 'symbol' ? undefined : makeChain()),
      apply: (_target, _thisArg, args) => args[0],
    });
  return { __esModule: true, default: makeChain() };
});

import { CliHarness } from '../../../helpers/CliHarness.js';

describe('folder commands', () => {
  let cli: CliHarness;

  beforeEach(() => {
    cli = new CliHarness().capture();
    cli.factory.store.addFile('/data/a.csv', 'aa');
    cli.factory.store.addFile('/data/b.csv', 'bbb');
    cli.factory.store.addFile('/data/c.txt', 'c');
    cli.factory.store.addFile('/data/sub/d.txt', 'd');
  });

  afterEach(() => {
    jest.restoreAllMocks();
    process.exitCode = undefined;
  });

  it('mkdir should create the folder and its parents', async () => {
    await cli.run('mkdir', '/x/y');

    expect(cli.stdout).toEqual(['✔ Created /x/y']);
    expect(cli.factory.store.isFolder('/x/y')).toBe(true);
  });

  it('rmdir should delete the folder with its content', async () => {
    await cli.run('--json', 'rmdir', '/data');

    expect(cli.json()).toEqual({ success: true, message: 'Deleted /data' });
    expect(cli.factory.store.paths()).toEqual(['/']);
  });

  it('rmdir should report a missing folder', async () => {
    await cli.run('rmdir', '/missing');

    expect(cli.stderr).toEqual(['✖ Failed to delete folder', 'Remote folder not found: /missing']);
    expect(process.exitCode).toBe(1);
  });

  it('rm-files should delete the matching files', async () => {
    await cli.run('rm-files', '/data', '*.csv');

    expect(cli.stdout).toEqual(['✔ Deleted 2 file(s) in /data']);
    expect(cli.factory.store.namesIn('/data')).toEqual(['c.txt', 'sub']);
  });

  it('mv-files should move the matching files, creating the target', async () => {
    await cli.run('--create-dirs', 'mv-files', '/data', '/archive/2026', '*.txt');

    expect(cli.stdout).toEqual(['✔ Moved 1 file(s) from /data to /archive/2026']);
    expect(cli.factory.store.namesIn('/archive/2026')).toEqual(['c.txt']);
  });
});
