import fs from 'node:fs';
import path from 'node:path';
import * as logger from './utils/logger';
import { PreconditionError, formatError } from './utils/errors';
import { fileSize, isDirectory, walkFiles } from './utils/fs-utils';
import { humanSize } from './utils/format';
import { acquireLock, releaseLock } from './utils/lock';
import {
  availableBytes,
  isVolumeMounted,
  requireVolume,
  requireWritable,
  selectVolumeName,
} from './utils/volume';
import { archiveRoot, PbakConfig, sourceRoot } from './core/config/config';
import {
  createDedupStore,
  DEDUP_STORE_FILENAME,
} from './core/dedup/dedup-store';
import { createHasher } from './core/hash/hasher';
import { scanFiles } from './core/ingest/file-scanner';
import { createBucketKeyResolver } from './core/ingest/bucket-key';
import { createCopyEngine, CopySummary } from './core/copy/copy-engine';
import {
  createProgressTracker,
  withProgress,
} from './core/progress/progress-tracker';
import { CommandRunner } from './core/process/command-runner';
import { MetadataExtractor } from './interfaces/ingest';
import { runMirrorSync } from './mirror-sync';

export interface DumpOptions {
  config: PbakConfig;
  sd?: string;
  ssd?: string;
  dryRun?: boolean;
  ignoreSpace?: boolean;
  quiet?: boolean;
  verbose?: boolean;
}

export interface DumpDependencies {
  runner?: CommandRunner;
  extractor?: MetadataExtractor;
  availableBytes?: (dirPath: string) => Promise<number>;
  now?: () => Date;
  /** Progress bars are drawn only on a terminal */
  isTTY?: boolean;
  acquireLock?: typeof acquireLock;
  releaseLock?: typeof releaseLock;
}

export type MirrorStatus = 'synced' | 'skipped' | 'failed';

export interface DumpResult {
  scanned: number;
  totalBytes: number;
  copy: CopySummary;
  mirror: MirrorStatus;
}

async function hasAnyFile(root: string): Promise<boolean> {
  if (!(await isDirectory(root))) {
    return false;
  }
  const next = await walkFiles(root).next();
  return next.done !== true;
}

/**
 * `pbak dump`: copy new photos from the SD card into the dated archive,
 * then bring the mirror SSD up to date when it is plugged in.
 */
export async function dumpPhotos(
  options: DumpOptions,
  dependencies: DumpDependencies = {},
): Promise<DumpResult> {
  const { config } = options;
  const verbosity = logger.resolveVerbosity(options);
  const dryRun = options.dryRun ?? false;
  const lock = dependencies.acquireLock ?? acquireLock;
  const unlock = dependencies.releaseLock ?? releaseLock;
  const freeSpace = dependencies.availableBytes ?? availableBytes;
  const progressOptions = { isTTY: dependencies.isTTY };

  const sdName = selectVolumeName(options.sd, config.sdVolume, 'SD card', '--sd');
  const ssdName = selectVolumeName(options.ssd, config.ssdVolume, 'SSD', '--ssd');

  logger.header('Photo Dump: SD -> SSD', verbosity);

  await requireVolume(config.volumesRoot, sdName);
  const source = sourceRoot(config, sdName);
  if (!(await isDirectory(source))) {
    throw new PreconditionError(`DCIM directory not found at ${source}`);
  }

  const ssdMount = await requireVolume(config.volumesRoot, ssdName);
  await requireWritable(ssdMount, `Volume '${ssdName}'`);
  const archive = archiveRoot(config, ssdName);
  if (!dryRun) {
    await fs.promises.mkdir(archive, { recursive: true });
  }

  lock(config.stateDir, 'dump');
  try {
    const store = createDedupStore(
      path.join(config.stateDir, DEDUP_STORE_FILENAME),
      { verbosity, now: dependencies.now },
    );
    await store.load();

    if (store.count === 0 && (await hasAnyFile(archive))) {
      logger.warning(
        `The dedup store is empty but ${archive} already holds files. ` +
          `Run 'pbak rehash' first or those files may be copied again.`,
        verbosity,
      );
    }

    logger.info(`Scanning ${source}...`, verbosity);
    const files: string[] = [];
    let totalBytes = 0;
    for await (const file of scanFiles(source, {
      include: config.dumpInclude,
      exclude: config.dumpExclude,
    })) {
      files.push(file);
      totalBytes += await fileSize(file);
    }
    logger.info(
      `Found ${files.length} file(s) on '${sdName}' (${humanSize(totalBytes)})`,
      verbosity,
    );

    if (!dryRun) {
      const free = await freeSpace(ssdMount);
      if (free < totalBytes) {
        const message =
          `Not enough free space on '${ssdName}': ` +
          `need up to ${humanSize(totalBytes)}, ${humanSize(free)} available.`;
        if (!options.ignoreSpace) {
          throw new PreconditionError(`${message} Use --ignore-space to continue anyway.`);
        }
        logger.warning(message, verbosity);
      }
    }

    const hashProgress = createProgressTracker('Hashing', verbosity, progressOptions);
    hashProgress.initialize(files.length);
    const hasher = createHasher({
      workers: config.hashWorkers,
      verbosity,
      onProgress: () => hashProgress.recordSuccess(),
    });
    logger.verbose(`Hashing with ${hasher.workers} worker(s)`, verbosity);

    const digests = await withProgress(hashProgress, () =>
      hasher.digestBatch(files),
    );

    const copyProgress = createProgressTracker('Copying', verbosity, progressOptions);
    copyProgress.initialize(files.length);
    const engine = createCopyEngine({
      store,
      hasher,
      bucketKeys: createBucketKeyResolver({
        extractor: dependencies.extractor,
        now: dependencies.now,
        verbosity,
      }),
      archiveRoot: archive,
      dryRun,
      verbosity,
      onFileDone: (outcome) => {
        copyProgress.setCurrentItem(path.basename(outcome.sourcePath));
        if (outcome.status === 'error') {
          copyProgress.recordFailure();
        } else {
          copyProgress.recordSuccess();
        }
      },
    });

    const copy = await withProgress(copyProgress, () =>
      engine.copyAll(files, digests),
    );

    logger.header('Summary', verbosity);
    if (dryRun) {
      logger.info(`Would copy: ${copy.planned} file(s)`, verbosity);
    } else {
      logger.success(
        `Copied: ${copy.copied} file(s) (${humanSize(copy.copiedBytes)})`,
        verbosity,
      );
    }
    logger.info(`Skipped (already archived): ${copy.skipped}`, verbosity);
    if (copy.errors > 0) {
      logger.error(`Errors: ${copy.errors} file(s) could not be copied`);
    }
    logger.dim(`Dedup store: ${store.count} record(s)`, verbosity);

    const mirror = await syncMirrorAfterDump(
      options,
      ssdName,
      archive,
      dependencies.runner,
    );

    return { scanned: files.length, totalBytes, copy, mirror };
  } finally {
    unlock();
  }
}

async function syncMirrorAfterDump(
  options: DumpOptions,
  ssdName: string,
  archive: string,
  runner: CommandRunner | undefined,
): Promise<MirrorStatus> {
  const { config } = options;
  const verbosity = logger.resolveVerbosity(options);
  const mirrorName = config.mirrorVolume;

  if (!mirrorName || mirrorName === ssdName) {
    return 'skipped';
  }
  if (!(await isVolumeMounted(config.volumesRoot, mirrorName))) {
    logger.dim(`Mirror volume '${mirrorName}' not mounted, skipping sync.`, verbosity);
    return 'skipped';
  }
  if (!(await isDirectory(archive))) {
    return 'skipped';
  }

  try {
    await runMirrorSync(
      {
        config,
        from: ssdName,
        to: mirrorName,
        dryRun: options.dryRun,
        quiet: options.quiet,
        verbose: options.verbose,
      },
      { runner },
    );
    return 'synced';
  } catch (error) {
    logger.error(`Mirror sync failed: ${formatError(error)}`);
    return 'failed';
  }
}
