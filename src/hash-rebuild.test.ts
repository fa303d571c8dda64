/**
 * Tests for hash-rebuild.ts
 */

import fs from 'node:fs';
import path from 'node:path';
import { PreconditionError } from './utils/errors';
import {
  createDedupStore,
  DEDUP_STORE_FILENAME,
} from './core/dedup/dedup-store';
import { UNKNOWN_ORIGIN } from './interfaces/dedup';
import { rebuildHashes } from './hash-rebuild';
import {
  createFakeLock,
  createTempTree,
  createTestConfig,
  fixedClock,
  sha256,
  silenceLogger,
  TempTree,
} from '../test-config/mocks/test-helpers';

describe('rebuildHashes', () => {
  let tree: TempTree;
  let restoreLogger: () => void;

  const storePath = () => path.join(tree.root, 'state', DEDUP_STORE_FILENAME);
  const archived = (relativePath: string) =>
    path.join(tree.root, 'Volumes', 'PhotoSSD', 'full_dump', relativePath);

  beforeEach(() => {
    tree = createTempTree('rehash');
    tree.file('Volumes/PhotoSSD/full_dump/2024/05/01/IMG_1.ARW', 'one');
    tree.file('Volumes/PhotoSSD/full_dump/2024/05/01/IMG_2.ARW', 'two');
    tree.file('Volumes/PhotoSSD/full_dump/2024/05/02/COPY.ARW', 'one');
    restoreLogger = silenceLogger();
  });

  afterEach(() => {
    restoreLogger();
    tree.cleanup();
  });

  it('should index every archived file once and report duplicates', async () => {
    const lock = createFakeLock();

    const result = await rebuildHashes(
      { config: createTestConfig(tree) },
      { ...lock, now: fixedClock('2024-06-01T12:00:00.000Z'), isTTY: false },
    );

    expect(result).toEqual({
      files: 3,
      indexed: 2,
      duplicates: [archived('2024/05/02/COPY.ARW')],
      unreadable: [],
    });
    const store = createDedupStore(storePath());
    await store.load();
    expect(store.records()).toEqual([
      {
        digest: sha256('one'),
        sourcePath: UNKNOWN_ORIGIN,
        destPath: archived('2024/05/01/IMG_1.ARW'),
        recordedAt: '2024-06-01T12:00:00.000Z',
        size: 3,
      },
      {
        digest: sha256('two'),
        sourcePath: UNKNOWN_ORIGIN,
        destPath: archived('2024/05/01/IMG_2.ARW'),
        recordedAt: '2024-06-01T12:00:00.000Z',
        size: 3,
      },
    ]);
    expect(lock.acquireLock).toHaveBeenCalledWith(path.join(tree.root, 'state'), 'rehash');
    expect(lock.releaseLock).toHaveBeenCalledTimes(1);
  });

  it('should only count files in dry-run mode', async () => {
    const lock = createFakeLock();

    const result = await rebuildHashes(
      { config: createTestConfig(tree), dryRun: true },
      lock,
    );

    expect(result).toEqual({ files: 3, indexed: 0, duplicates: [], unreadable: [] });
    expect(fs.existsSync(storePath())).toBe(false);
    expect(lock.acquireLock).not.toHaveBeenCalled();
  });

  it('should leave the store alone when the archive is empty', async () => {
    tree.dir('Volumes/Blank/full_dump');
    const lock = createFakeLock();

    const result = await rebuildHashes(
      { config: createTestConfig(tree), ssd: 'Blank' },
      lock,
    );

    expect(result).toEqual({ files: 0, indexed: 0, duplicates: [], unreadable: [] });
    expect(fs.existsSync(storePath())).toBe(false);
    expect(lock.acquireLock).not.toHaveBeenCalled();
  });

  it('should need an archive folder', async () => {
    tree.dir('Volumes/Blank');

    await expect(
      rebuildHashes(
        { config: createTestConfig(tree), ssd: 'Blank' },
        createFakeLock(),
      ),
    ).rejects.toThrow(
      new PreconditionError(
        `No full_dump directory at ${path.join(tree.root, 'Volumes', 'Blank', 'full_dump')}`,
      ),
    );
  });
});
