import path from 'node:path';
import * as logger from './utils/logger';
import { ConfigError, PreconditionError } from './utils/errors';
import { collectFiles, isDirectory } from './utils/fs-utils';
import { acquireLock, releaseLock } from './utils/lock';
import { requireVolume, selectVolumeName } from './utils/volume';
import { archiveRoot, PbakConfig } from './core/config/config';
import {
  createUploadStateStore,
  UPLOAD_STATE_FILENAME,
  UploadStateStore,
} from './core/upload/upload-state';
import { createUploadClient, UPLOAD_TOOL } from './core/upload/upload-client';
import {
  CommandRunner,
  SPAWN_FAILURE_EXIT_CODE,
} from './core/process/command-runner';
import { TransferUnit } from './interfaces/upload';

/**
 * `list` only shows what is pending; every other mode uploads.
 */
export type UploadMode = 'list' | 'all' | 'date' | 'retry-failed' | 'force';

export interface UploadOptions {
  config: PbakConfig;
  mode: UploadMode;
  /** Bucket key for `date` mode, YYYY/MM/DD or YYYY-MM-DD */
  date?: string;
  ssd?: string;
  dryRun?: boolean;
  quiet?: boolean;
  verbose?: boolean;
}

export interface UploadDependencies {
  runner?: CommandRunner;
  now?: () => Date;
  acquireLock?: typeof acquireLock;
  releaseLock?: typeof releaseLock;
}

export interface UnitUploadResult {
  key: string;
  fileCount: number;
  success: boolean;
  exitCode: number;
  logFile: string;
}

export interface UploadRunResult {
  mode: UploadMode;
  selected: TransferUnit[];
  results: UnitUploadResult[];
  uploaded: number;
  failed: number;
}

const UNIT_KEY_PATTERN = /^\d{4}\/\d{2}\/\d{2}$/;

export function parseUnitKey(value: string): string {
  const key = value.trim().replace(/-/g, '/').replace(/\/+$/, '');
  if (!UNIT_KEY_PATTERN.test(key)) {
    throw new ConfigError(`Invalid date '${value}'. Use YYYY/MM/DD.`);
  }
  return key;
}

async function countFiles(dir: string): Promise<number> {
  return (await collectFiles(dir, { skipHidden: false })).length;
}

async function selectUnits(
  options: UploadOptions,
  store: UploadStateStore,
  archive: string,
  verbosity: number,
): Promise<TransferUnit[]> {
  switch (options.mode) {
    case 'force':
      logger.warning(
        `Force mode: ignoring upload state, ${UPLOAD_TOOL} skips what the server already has.`,
        verbosity,
      );
      return store.listUnits(archive);

    case 'date': {
      if (!options.date) {
        throw new ConfigError('--date needs a folder such as 2024/05/01.');
      }
      const key = parseUnitKey(options.date);
      const dir = path.join(archive, ...key.split('/'));
      if (!(await isDirectory(dir))) {
        throw new PreconditionError(`Folder not found: ${dir}`);
      }
      return [{ key, path: dir }];
    }

    case 'retry-failed': {
      const units = new Map(
        (await store.listUnits(archive)).map((unit) => [unit.key, unit]),
      );
      const keys = [...store.listFailed(), ...store.listInterrupted()].sort();
      const selected: TransferUnit[] = [];
      for (const key of keys) {
        const unit = units.get(key);
        if (unit) {
          selected.push(unit);
        } else {
          logger.warning(`Skipping ${key}: no longer in the archive`, verbosity);
        }
      }
      return selected;
    }

    case 'all':
    case 'list':
      return store.listPending(archive);
  }
}

async function showPending(
  store: UploadStateStore,
  pending: TransferUnit[],
  verbosity: number,
): Promise<void> {
  if (pending.length === 0) {
    logger.success('Every folder is uploaded.', verbosity);
    return;
  }

  logger.info(`${pending.length} folder(s) waiting for upload:`, verbosity);
  for (const unit of pending) {
    const status = store.statusOf(unit.key);
    const tag =
      status === 'failed'
        ? logger.red(' [failed]')
        : status === 'in_progress'
          ? logger.yellow(' [interrupted]')
          : '';
    logger.always(`  ${unit.key} (${await countFiles(unit.path)} files)${tag}`);
  }
  logger.dim(
    '  Upload with: pbak upload --all, --date YYYY/MM/DD or --retry-failed',
    verbosity,
  );
}

/**
 * `pbak upload`: hand archive folders to immich-go one at a time and
 * record the outcome of each.
 */
export async function uploadPhotos(
  options: UploadOptions,
  dependencies: UploadDependencies = {},
): Promise<UploadRunResult> {
  const { config, mode } = options;
  const verbosity = logger.resolveVerbosity(options);
  const dryRun = options.dryRun ?? false;
  const lock = dependencies.acquireLock ?? acquireLock;
  const unlock = dependencies.releaseLock ?? releaseLock;

  // Listing needs no server; every other mode fails here before touching state
  const client =
    mode === 'list'
      ? undefined
      : createUploadClient({
          config,
          runner: dependencies.runner,
          now: dependencies.now,
          verbosity,
        });

  const ssdName = selectVolumeName(options.ssd, config.ssdVolume, 'SSD', '--ssd');
  logger.header('Photo Upload: SSD -> Immich', verbosity);

  await requireVolume(config.volumesRoot, ssdName);
  const archive = archiveRoot(config, ssdName);
  if (!(await isDirectory(archive))) {
    throw new PreconditionError(`No full_dump directory found at ${archive}`);
  }

  const store = createUploadStateStore(
    path.join(config.stateDir, UPLOAD_STATE_FILENAME),
    { verbosity, now: dependencies.now },
  );

  if (!client) {
    await store.load();
    const pending = await store.listPending(archive);
    await showPending(store, pending, verbosity);
    return { mode, selected: pending, results: [], uploaded: 0, failed: 0 };
  }

  lock(config.stateDir, 'upload');
  try {
    await store.load();
    const selected = await selectUnits(options, store, archive, verbosity);
    const results: UnitUploadResult[] = [];

    if (selected.length === 0) {
      logger.info('Nothing to upload.', verbosity);
      return { mode, selected, results, uploaded: 0, failed: 0 };
    }

    if (dryRun) {
      logger.warning(
        `[DRY RUN] ${UPLOAD_TOOL} will run in dry-run mode. Upload state is left unchanged.`,
        verbosity,
      );
    }
    logger.info(
      `Uploading ${selected.length} folder(s) to ${client.server}`,
      verbosity,
    );

    for (const unit of selected) {
      const fileCount = await countFiles(unit.path);
      logger.info(`Uploading ${unit.key} (${fileCount} files)...`, verbosity);
      if (!dryRun) {
        await store.mark(unit.key, 'in_progress', fileCount);
      }

      const attempt = await client.upload(unit.path, unit.key, { dryRun });
      results.push({
        key: unit.key,
        fileCount,
        success: attempt.success,
        exitCode: attempt.exitCode,
        logFile: attempt.logFile,
      });

      if (attempt.success) {
        if (!dryRun) {
          await store.mark(unit.key, 'uploaded', fileCount, '0');
        }
        logger.success(`Done: ${unit.key}`, verbosity);
        continue;
      }

      if (!dryRun) {
        await store.mark(unit.key, 'failed', fileCount, String(attempt.exitCode));
      }
      logger.error(`Failed: ${unit.key} (exit code ${attempt.exitCode})`);
      logger.warning(`  Log file: ${attempt.logFile}`, verbosity);

      if (attempt.exitCode === SPAWN_FAILURE_EXIT_CODE && attempt.error) {
        throw new PreconditionError(
          `Could not run ${UPLOAD_TOOL}: ${attempt.error}. Is it installed and on your PATH?`,
        );
      }
    }

    const uploaded = results.filter((result) => result.success).length;
    const failed = results.length - uploaded;

    logger.header('Summary', verbosity);
    logger.success(`Uploaded: ${uploaded} folder(s)`, verbosity);
    if (failed > 0) {
      logger.error(`Failed:   ${failed} folder(s)`);
      logger.dim('  Retry with: pbak upload --retry-failed', verbosity);
    }

    return { mode, selected, results, uploaded, failed };
  } finally {
    unlock();
  }
}
