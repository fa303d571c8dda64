import fs from 'node:fs';
import * as logger from './utils/logger';
import { PreconditionError, RemoteFailureError, ConfigError } from './utils/errors';
import { isDirectory } from './utils/fs-utils';
import { acquireLock, releaseLock } from './utils/lock';
import {
  requireVolume,
  requireWritable,
  selectVolumeName,
} from './utils/volume';
import { archiveRoot, PbakConfig } from './core/config/config';
import {
  createMirrorPropagator,
  MirrorResult,
} from './core/mirror/mirror-propagator';
import { CommandRunner } from './core/process/command-runner';

export interface MirrorSyncOptions {
  config: PbakConfig;
  from?: string;
  to?: string;
  dryRun?: boolean;
  quiet?: boolean;
  verbose?: boolean;
}

export interface MirrorSyncDependencies {
  runner?: CommandRunner;
  acquireLock?: typeof acquireLock;
  releaseLock?: typeof releaseLock;
}

/**
 * Copy archive files missing on the mirror volume. Callers hold the lock.
 */
export async function runMirrorSync(
  options: MirrorSyncOptions,
  dependencies: MirrorSyncDependencies = {},
): Promise<MirrorResult> {
  const { config } = options;
  const verbosity = logger.resolveVerbosity(options);
  const dryRun = options.dryRun ?? false;

  const fromName = selectVolumeName(
    options.from,
    config.ssdVolume,
    'primary SSD',
    '--from',
  );
  const toName = selectVolumeName(
    options.to,
    config.mirrorVolume,
    'mirror SSD',
    '--to',
  );
  if (fromName === toName) {
    throw new ConfigError(
      `Primary and mirror must be different volumes (both are '${fromName}').`,
    );
  }

  logger.header('SSD Sync: Primary -> Mirror', verbosity);

  await requireVolume(config.volumesRoot, fromName);
  const mirrorMount = await requireVolume(config.volumesRoot, toName);
  await requireWritable(mirrorMount, `Volume '${toName}'`);

  const source = archiveRoot(config, fromName);
  const destination = archiveRoot(config, toName);
  if (!(await isDirectory(source))) {
    throw new PreconditionError(
      `No full_dump directory on primary (${source}).`,
    );
  }
  if (!dryRun) {
    await fs.promises.mkdir(destination, { recursive: true });
  }

  logger.info(`Source: ${source}`, verbosity);
  logger.info(`Mirror: ${destination}`, verbosity);
  if (dryRun) {
    logger.warning('[DRY RUN] No files will be copied.', verbosity);
  }

  const mirror = createMirrorPropagator({
    runner: dependencies.runner,
    verbosity,
  });
  const result = await mirror.propagate(source, destination, { dryRun });

  if (!result.success) {
    throw new RemoteFailureError(
      'rsync',
      result.exitCode,
      result.error
        ? `rsync could not run: ${result.error}`
        : `rsync exited with code ${result.exitCode}`,
    );
  }
  logger.success('Sync complete.', verbosity);
  return result;
}

/**
 * `pbak sync`: one-way additive sync of the primary archive to the mirror.
 */
export async function syncMirror(
  options: MirrorSyncOptions,
  dependencies: MirrorSyncDependencies = {},
): Promise<MirrorResult> {
  const lock = dependencies.acquireLock ?? acquireLock;
  const unlock = dependencies.releaseLock ?? releaseLock;

  lock(options.config.stateDir, 'sync');
  try {
    return await runMirrorSync(options, dependencies);
  } finally {
    unlock();
  }
}
