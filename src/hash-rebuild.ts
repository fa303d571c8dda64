import path from 'node:path';
import * as logger from './utils/logger';
import { PreconditionError } from './utils/errors';
import { collectFiles, isDirectory } from './utils/fs-utils';
import { acquireLock, releaseLock } from './utils/lock';
import { requireVolume, selectVolumeName } from './utils/volume';
import { archiveRoot, PbakConfig } from './core/config/config';
import {
  createDedupStore,
  DEDUP_STORE_FILENAME,
} from './core/dedup/dedup-store';
import { createHasher } from './core/hash/hasher';
import {
  createProgressTracker,
  withProgress,
} from './core/progress/progress-tracker';

export interface RehashOptions {
  config: PbakConfig;
  ssd?: string;
  dryRun?: boolean;
  quiet?: boolean;
  verbose?: boolean;
}

export interface RehashDependencies {
  now?: () => Date;
  isTTY?: boolean;
  acquireLock?: typeof acquireLock;
  releaseLock?: typeof releaseLock;
}

export interface RehashResult {
  files: number;
  indexed: number;
  duplicates: string[];
  unreadable: string[];
}

/**
 * `pbak rehash`: rebuild the dedup store from what is on the SSD.
 */
export async function rebuildHashes(
  options: RehashOptions,
  dependencies: RehashDependencies = {},
): Promise<RehashResult> {
  const { config } = options;
  const verbosity = logger.resolveVerbosity(options);
  const lock = dependencies.acquireLock ?? acquireLock;
  const unlock = dependencies.releaseLock ?? releaseLock;

  const ssdName = selectVolumeName(options.ssd, config.ssdVolume, 'SSD', '--ssd');
  logger.header('Rebuild Hash Database', verbosity);

  await requireVolume(config.volumesRoot, ssdName);
  const archive = archiveRoot(config, ssdName);
  if (!(await isDirectory(archive))) {
    throw new PreconditionError(`No full_dump directory at ${archive}`);
  }

  const files = await collectFiles(archive, { skipHidden: false });
  if (files.length === 0) {
    logger.warning(
      `No files under ${archive}; the hash database was left unchanged.`,
      verbosity,
    );
    return { files: 0, indexed: 0, duplicates: [], unreadable: [] };
  }

  if (options.dryRun) {
    logger.warning(
      `[DRY RUN] Would hash ${files.length} file(s) under ${archive} and replace the store.`,
      verbosity,
    );
    return { files: files.length, indexed: 0, duplicates: [], unreadable: [] };
  }

  lock(config.stateDir, 'rehash');
  try {
    const store = createDedupStore(
      path.join(config.stateDir, DEDUP_STORE_FILENAME),
      { verbosity, now: dependencies.now },
    );
    await store.load();

    const progress = createProgressTracker('Hashing', verbosity, {
      isTTY: dependencies.isTTY,
    });
    progress.initialize(files.length);
    const hasher = createHasher({
      workers: config.hashWorkers,
      verbosity,
      onProgress: () => progress.recordSuccess(),
    });

    const rebuilt = await withProgress(progress, () =>
      store.rebuild(archive, hasher),
    );

    logger.success(
      `Indexed ${rebuilt.indexed} file(s) into ${store.storePath}`,
      verbosity,
    );
    if (rebuilt.duplicates.length > 0) {
      logger.warning(
        `${rebuilt.duplicates.length} file(s) duplicate content already indexed`,
        verbosity,
      );
    }
    if (rebuilt.unreadable.length > 0) {
      logger.error(`${rebuilt.unreadable.length} file(s) could not be read`);
    }

    return { files: files.length, ...rebuilt };
  } finally {
    unlock();
  }
}
