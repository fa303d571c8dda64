import fs from 'node:fs';
import path from 'node:path';
import { z } from 'zod';
import { PreconditionError } from './errors';

const LOCK_FILENAME = 'pbak.lock';
const MAX_TAKEOVER_ATTEMPTS = 3;

/**
 * Commands that write to the dedup or upload store.
 */
export type StoreCommand = 'dump' | 'upload' | 'rehash' | 'sync';

const LockHolderSchema = z.object({
  pid: z.number().int().positive(),
  command: z.string(),
  startedAt: z.string(),
});

export type LockHolder = z.infer<typeof LockHolderSchema>;

let heldLockPath: string | null = null;
let exitHookInstalled = false;

const errnoCode = (error: unknown): string | undefined =>
  error instanceof Error && 'code' in error && typeof error.code === 'string'
    ? error.code
    : undefined;

export function getLockPath(stateDir: string): string {
  return path.join(stateDir, LOCK_FILENAME);
}

/**
 * Who holds the lock file, or null when it is missing or unreadable.
 * A bare PID, as older lock files hold, is accepted too.
 */
export function readLockHolder(lockPath: string): LockHolder | null {
  let text: string;
  try {
    text = fs.readFileSync(lockPath, 'utf8').trim();
  } catch (error) {
    if (errnoCode(error) === 'ENOENT') {
      return null;
    }
    throw error;
  }

  if (/^\d+$/.test(text)) {
    return { pid: Number.parseInt(text, 10), command: 'unknown', startedAt: '' };
  }
  try {
    const parsed = LockHolderSchema.safeParse(JSON.parse(text));
    return parsed.success ? parsed.data : null;
  } catch {
    return null;
  }
}

function isRunning(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch (error) {
    return errnoCode(error) === 'EPERM';
  }
}

function writeLockFile(lockPath: string, command: StoreCommand): boolean {
  const holder: LockHolder = {
    pid: process.pid,
    command,
    startedAt: new Date().toISOString(),
  };
  try {
    fs.writeFileSync(lockPath, JSON.stringify(holder) + '\n', {
      flag: 'wx',
      mode: 0o600,
    });
    return true;
  } catch (error) {
    if (errnoCode(error) === 'EEXIST') {
      return false;
    }
    throw error;
  }
}

function removeOwnLock(): void {
  const lockPath = heldLockPath;
  heldLockPath = null;
  if (!lockPath) {
    return;
  }
  const holder = readLockHolder(lockPath);
  if (holder && holder.pid !== process.pid) {
    return;
  }
  fs.rmSync(lockPath, { force: true });
}

function installExitHook(): void {
  if (exitHookInstalled) {
    return;
  }
  process.once('exit', () => {
    try {
      removeOwnLock();
    } catch {
      // Nothing can be reported once the process is exiting
    }
  });
  exitHookInstalled = true;
}

/**
 * Take the exclusive lock that serializes writers of the dedup and upload
 * stores. A lock left by a process that is no longer running is taken over.
 */
export function acquireLock(stateDir: string, command: StoreCommand): void {
  const lockPath = getLockPath(stateDir);
  if (heldLockPath === lockPath) {
    return;
  }
  installExitHook();

  for (let attempt = 0; attempt < MAX_TAKEOVER_ATTEMPTS; attempt++) {
    if (writeLockFile(lockPath, command)) {
      heldLockPath = lockPath;
      return;
    }

    const holder = readLockHolder(lockPath);
    if (holder && holder.pid !== process.pid && isRunning(holder.pid)) {
      const since = holder.startedAt ? ` since ${holder.startedAt}` : '';
      throw new PreconditionError(
        `Another pbak ${holder.command} is in progress (PID: ${holder.pid}${since}). ` +
          `Delete ${lockPath} if that process is no longer running.`,
      );
    }
    fs.rmSync(lockPath, { force: true });
  }

  throw new PreconditionError(`Could not take the lock at ${lockPath}. Try again.`);
}

export function releaseLock(): void {
  removeOwnLock();
}
