/**
 * Tests for photo-upload.ts
 */

import fs from 'node:fs';
import path from 'node:path';
import { ConfigError, PreconditionError } from './utils/errors';
import {
  createUploadStateStore,
  UPLOAD_STATE_FILENAME,
} from './core/upload/upload-state';
import type { CommandRunner } from './core/process/command-runner';
import {
  parseUnitKey,
  uploadPhotos,
  UploadDependencies,
  UploadMode,
} from './photo-upload';
import {
  createFakeLock,
  createFakeRunner,
  createTempTree,
  createTestConfig,
  fixedClock,
  silenceLogger,
  TempTree,
} from '../test-config/mocks/test-helpers';

const NOW = '2024-06-01T12:00:00.000Z';

describe('uploadPhotos', () => {
  let tree: TempTree;
  let restoreLogger: () => void;

  const archive = () => path.join(tree.root, 'Volumes', 'PhotoSSD', 'full_dump');
  const unitPath = (key: string) => path.join(archive(), ...key.split('/'));
  const statePath = () => path.join(tree.root, 'state', UPLOAD_STATE_FILENAME);

  beforeEach(() => {
    tree = createTempTree('upload');
    tree.file('Volumes/PhotoSSD/full_dump/2024/05/01/IMG_0001.ARW');
    tree.file('Volumes/PhotoSSD/full_dump/2024/05/01/IMG_0002.ARW');
    tree.file('Volumes/PhotoSSD/full_dump/2024/05/02/IMG_0003.ARW');
    tree.file('Volumes/PhotoSSD/full_dump/2024/05/03/IMG_0004.ARW');
    tree.dir('state');
    restoreLogger = silenceLogger();
  });

  afterEach(() => {
    restoreLogger();
    tree.cleanup();
  });

  const run = (
    mode: UploadMode,
    dependencies: UploadDependencies,
    extra: { date?: string; dryRun?: boolean } = {},
    configOverrides: Record<string, unknown> = {},
  ) =>
    uploadPhotos(
      { config: createTestConfig(tree, configOverrides), mode, ...extra },
      { ...createFakeLock(), now: fixedClock(NOW), ...dependencies },
    );

  const loadState = async () => {
    const store = createUploadStateStore(statePath());
    await store.load();
    return store;
  };

  const seedState = async (
    entries: Array<[string, 'uploaded' | 'failed' | 'in_progress']>,
  ) => {
    const store = await loadState();
    for (const [key, status] of entries) {
      await store.mark(key, status, 1, status === 'failed' ? '1' : '');
    }
  };

  const uploadedPaths = (calls: Array<{ args: string[] }>) =>
    calls.map((call) => call.args.at(-1));

  it('should upload every pending folder in key order and record each outcome', async () => {
    const { run: runner, calls } = createFakeRunner();

    const result = await run('all', { runner });

    expect(result).toMatchObject({ uploaded: 3, failed: 0 });
    expect(uploadedPaths(calls)).toEqual([
      unitPath('2024/05/01'),
      unitPath('2024/05/02'),
      unitPath('2024/05/03'),
    ]);
    const state = await loadState();
    expect(state.getRecord('2024/05/01')).toEqual({
      status: 'uploaded',
      unitKey: '2024/05/01',
      timestamp: NOW,
      fileCount: 2,
      exitIndicator: '0',
    });
    expect(state.countByStatus('uploaded')).toBe(3);
  });

  it('should record a failing folder and retry exactly that one', async () => {
    const first = createFakeRunner([2]);

    const result = await run('all', { runner: first.run });

    expect(result).toMatchObject({ uploaded: 2, failed: 1 });
    expect((await loadState()).getRecord('2024/05/01')).toEqual({
      status: 'failed',
      unitKey: '2024/05/01',
      timestamp: NOW,
      fileCount: 2,
      exitIndicator: '2',
    });

    const retry = createFakeRunner();
    const retried = await run('retry-failed', { runner: retry.run });

    expect(retried.selected.map((unit) => unit.key)).toEqual(['2024/05/01']);
    expect((await loadState()).statusOf('2024/05/01')).toBe('uploaded');
  });

  it('should retry interrupted folders and skip ones no longer archived', async () => {
    await seedState([
      ['2024/05/02', 'in_progress'],
      ['2099/01/01', 'failed'],
      ['2024/05/03', 'uploaded'],
    ]);

    const result = await run('retry-failed', { runner: createFakeRunner().run });

    expect(result.selected.map((unit) => unit.key)).toEqual(['2024/05/02']);
  });

  it('should leave uploaded folders out of --all but not out of --force', async () => {
    await seedState([['2024/05/01', 'uploaded']]);

    const all = await run('all', { runner: createFakeRunner().run });
    const forced = await run('force', { runner: createFakeRunner().run });

    expect(all.selected.map((unit) => unit.key)).toEqual([
      '2024/05/02',
      '2024/05/03',
    ]);
    expect(forced.selected.map((unit) => unit.key)).toEqual([
      '2024/05/01',
      '2024/05/02',
      '2024/05/03',
    ]);
  });

  describe('date mode', () => {
    it('should upload the one folder asked for', async () => {
      const { run: runner, calls } = createFakeRunner();

      const result = await run('date', { runner }, { date: '2024-05-02' });

      expect(result.selected).toEqual([
        { key: '2024/05/02', path: unitPath('2024/05/02') },
      ]);
      expect(uploadedPaths(calls)).toEqual([unitPath('2024/05/02')]);
    });

    it('should fail on a folder that does not exist', async () => {
      await expect(
        run('date', { runner: createFakeRunner().run }, { date: '2024/01/01' }),
      ).rejects.toThrow(
        new PreconditionError(`Folder not found: ${unitPath('2024/01/01')}`),
      );
    });

    it('should reject a malformed date', async () => {
      await expect(
        run('date', { runner: createFakeRunner().run }, { date: '24/5/2' }),
      ).rejects.toBeInstanceOf(ConfigError);
    });
  });

  it('should pass --dry-run and leave the state untouched', async () => {
    const { run: runner, calls } = createFakeRunner();

    const result = await run('all', { runner }, { dryRun: true });

    expect(result.uploaded).toBe(3);
    expect(calls.every((call) => call.args.includes('--dry-run'))).toBe(true);
    expect(fs.existsSync(statePath())).toBe(false);
  });

  it('should stop when the upload tool cannot be started', async () => {
    const runner: CommandRunner = jest.fn(async () => ({
      exitCode: 127,
      error: 'spawn immich-go ENOENT',
    }));
    const lock = createFakeLock();

    await expect(run('all', { runner, ...lock })).rejects.toThrow(
      new PreconditionError(
        'Could not run immich-go: spawn immich-go ENOENT. Is it installed and on your PATH?',
      ),
    );
    expect(runner).toHaveBeenCalledTimes(1);
    expect((await loadState()).getRecord('2024/05/01')).toMatchObject({
      status: 'failed',
      exitIndicator: '127',
    });
    expect(lock.releaseLock).toHaveBeenCalledTimes(1);
  });

  it('should need the server details before uploading', async () => {
    const { run: runner } = createFakeRunner();
    const lock = createFakeLock();

    await expect(
      run('all', { runner, ...lock }, {}, { server: '', apiKey: '' }),
    ).rejects.toBeInstanceOf(ConfigError);
    expect(runner).not.toHaveBeenCalled();
    expect(lock.acquireLock).not.toHaveBeenCalled();
  });

  it('should only list pending folders without server details or the lock', async () => {
    await seedState([['2024/05/01', 'uploaded']]);
    const { run: runner } = createFakeRunner();
    const lock = createFakeLock();

    const result = await run('list', { runner, ...lock }, {}, { server: '', apiKey: '' });

    expect(result.selected.map((unit) => unit.key)).toEqual([
      '2024/05/02',
      '2024/05/03',
    ]);
    expect(runner).not.toHaveBeenCalled();
    expect(lock.acquireLock).not.toHaveBeenCalled();
  });

  it('should fail when the archive folder is missing', async () => {
    tree.dir('Volumes/Empty');

    await expect(
      uploadPhotos(
        { config: createTestConfig(tree, { ssdVolume: 'Empty' }), mode: 'all' },
        { runner: createFakeRunner().run, ...createFakeLock() },
      ),
    ).rejects.toThrow(
      new PreconditionError(
        `No full_dump directory found at ${path.join(tree.root, 'Volumes', 'Empty', 'full_dump')}`,
      ),
    );
  });
});

describe('parseUnitKey', () => {
  it('should accept slashes or dashes', () => {
    expect(parseUnitKey('2024/05/01')).toBe('2024/05/01');
    expect(parseUnitKey('2024-05-01')).toBe('2024/05/01');
    expect(parseUnitKey('2024/05/01/')).toBe('2024/05/01');
  });

  it('should refuse anything else', () => {
    expect(() => parseUnitKey('../etc')).toThrow(
      new ConfigError("Invalid date '../etc'. Use YYYY/MM/DD."),
    );
  });
});
