/**
 * Tests for the store lock
 */

import fs from 'node:fs';
import path from 'node:path';
import { PreconditionError } from './errors';
import { acquireLock, getLockPath, readLockHolder, releaseLock } from './lock';
import { createTempTree, TempTree } from '../../test-config/mocks/test-helpers';

describe('store lock', () => {
  let tree: TempTree;
  let stateDir: string;
  let lockPath: string;

  beforeEach(() => {
    tree = createTempTree('lock');
    stateDir = tree.dir('state');
    lockPath = getLockPath(stateDir);
  });

  afterEach(() => {
    releaseLock();
    jest.restoreAllMocks();
    tree.cleanup();
  });

  const processGone = () =>
    jest.spyOn(process, 'kill').mockImplementation(() => {
      throw Object.assign(new Error('no such process'), { code: 'ESRCH' });
    });

  it('should record the holding command in a private lock file', () => {
    acquireLock(stateDir, 'dump');

    expect(lockPath).toBe(path.join(stateDir, 'pbak.lock'));
    expect(fs.statSync(lockPath).mode & 0o777).toBe(0o600);
    expect(readLockHolder(lockPath)).toEqual({
      pid: process.pid,
      command: 'dump',
      startedAt: expect.any(String),
    });

    releaseLock();
    expect(fs.existsSync(lockPath)).toBe(false);
  });

  it('should let the holder take the lock again', () => {
    acquireLock(stateDir, 'dump');

    expect(() => acquireLock(stateDir, 'sync')).not.toThrow();
    expect(readLockHolder(lockPath)?.command).toBe('dump');
  });

  it('should name the running command that holds the lock', () => {
    fs.writeFileSync(
      lockPath,
      JSON.stringify({ pid: 424242, command: 'upload', startedAt: '2024-06-01T12:00:00.000Z' }),
    );
    jest.spyOn(process, 'kill').mockImplementation(() => true);

    expect(() => acquireLock(stateDir, 'rehash')).toThrow(
      new PreconditionError(
        'Another pbak upload is in progress (PID: 424242 since 2024-06-01T12:00:00.000Z). ' +
          `Delete ${lockPath} if that process is no longer running.`,
      ),
    );
    expect(readLockHolder(lockPath)?.pid).toBe(424242);
  });

  it('should take over a lock whose process has exited', () => {
    fs.writeFileSync(
      lockPath,
      JSON.stringify({ pid: 424242, command: 'upload', startedAt: '2024-06-01T12:00:00.000Z' }),
    );
    processGone();

    acquireLock(stateDir, 'rehash');

    expect(readLockHolder(lockPath)).toMatchObject({ pid: process.pid, command: 'rehash' });
  });

  it('should accept a lock file holding a bare PID', () => {
    fs.writeFileSync(lockPath, '424242\n');

    expect(readLockHolder(lockPath)).toEqual({
      pid: 424242,
      command: 'unknown',
      startedAt: '',
    });
  });

  it('should replace an unreadable lock file', () => {
    fs.writeFileSync(lockPath, '{"pid":');

    acquireLock(stateDir, 'sync');

    expect(readLockHolder(lockPath)?.command).toBe('sync');
  });

  it('should leave a lock taken over by another process in place', () => {
    acquireLock(stateDir, 'dump');
    fs.writeFileSync(
      lockPath,
      JSON.stringify({ pid: 424242, command: 'sync', startedAt: '2024-06-01T12:00:00.000Z' }),
    );

    releaseLock();

    expect(fs.existsSync(lockPath)).toBe(true);
  });

  it('should install a single exit hook across runs', () => {
    acquireLock(stateDir, 'dump');
    releaseLock();
    const before = process.listenerCount('exit');

    acquireLock(stateDir, 'upload');
    releaseLock();

    expect(process.listenerCount('exit')).toBe(before);
  });
});
