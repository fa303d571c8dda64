import fs from 'node:fs';
import path from 'node:path';
import * as logger from '../../utils/logger';
import {
  CollisionExhaustedError,
  IOError,
  IntegrityError,
  formatError,
} from '../../utils/errors';
import { humanSize } from '../../utils/format';
import { DedupStore } from '../dedup/dedup-store';
import { Hasher } from '../hash/hasher';
import { BucketKeyResolver } from '../ingest/bucket-key';

export type CopyOutcome =
  | {
      status: 'copied';
      sourcePath: string;
      destPath: string;
      digest: string;
      size: number;
    }
  | {
      status: 'skipped';
      sourcePath: string;
      digest: string;
      existingPath: string | undefined;
    }
  | {
      status: 'planned';
      sourcePath: string;
      destPath: string;
      digest: string;
      size: number;
    }
  | { status: 'error'; sourcePath: string; error: Error };

export interface CopySummary {
  copied: number;
  skipped: number;
  planned: number;
  errors: number;
  copiedBytes: number;
  outcomes: CopyOutcome[];
}

export interface CopyEngineOptions {
  store: DedupStore;
  hasher: Pick<Hasher, 'digest'>;
  bucketKeys: BucketKeyResolver;
  archiveRoot: string;
  dryRun?: boolean;
  verbosity?: number;
  /** Called after every file with its outcome. */
  onFileDone?: (outcome: CopyOutcome) => void;
}

function splitName(filePath: string): { baseName: string; ext: string } {
  const ext = path.extname(filePath);
  return { baseName: path.basename(filePath, ext), ext };
}

async function removeQuietly(filePath: string): Promise<void> {
  await fs.promises.rm(filePath, { force: true });
}

/**
 * Copies new content into the dated archive tree. Every copy is written
 * exclusively, re-hashed, and only then recorded in the dedup store.
 */
export function createCopyEngine(options: CopyEngineOptions) {
  const { store, hasher, bucketKeys, archiveRoot } = options;
  const dryRun = options.dryRun ?? false;
  const verbosity = options.verbosity ?? logger.Verbosity.Normal;

  // Dry runs record nothing, so planned copies are tracked here
  const plannedByDigest = new Map<string, string>();
  const plannedDestinations = new Set<string>();

  const copyPreservingMetadata = async (
    sourcePath: string,
    destPath: string,
  ): Promise<void> => {
    try {
      await fs.promises.mkdir(path.dirname(destPath), { recursive: true });
      await fs.promises.copyFile(
        sourcePath,
        destPath,
        fs.constants.COPYFILE_EXCL,
      );
    } catch (error) {
      throw new IOError(
        sourcePath,
        `Failed to copy ${sourcePath} -> ${destPath}: ${formatError(error)}`,
        { cause: error },
      );
    }

    try {
      const stats = await fs.promises.stat(sourcePath);
      await fs.promises.chmod(destPath, stats.mode & 0o7777);
      await fs.promises.utimes(destPath, stats.atime, stats.mtime);
    } catch (error) {
      await removeQuietly(destPath);
      throw new IOError(
        destPath,
        `Failed to preserve metadata on ${destPath}: ${formatError(error)}`,
        { cause: error },
      );
    }
  };

  const verifyCopy = async (
    sourcePath: string,
    destPath: string,
    expected: string,
  ): Promise<void> => {
    let actual: string;
    try {
      actual = await hasher.digest(destPath);
    } catch (error) {
      await removeQuietly(destPath);
      throw error;
    }
    if (actual !== expected) {
      await removeQuietly(destPath);
      throw new IntegrityError(sourcePath, destPath, expected, actual);
    }
  };

  const runSteps = async (
    sourcePath: string,
    precomputedDigest: string | undefined,
  ): Promise<CopyOutcome> => {
    const digest = precomputedDigest ?? (await hasher.digest(sourcePath));

    if (store.exists(digest) || plannedByDigest.has(digest)) {
      logger.verbose(`Skipping (duplicate): ${sourcePath}`, verbosity);
      return {
        status: 'skipped',
        sourcePath,
        digest,
        existingPath:
          store.recordedDestination(digest) ?? plannedByDigest.get(digest),
      };
    }

    const bucketKey = await bucketKeys.bucketKeyFor(sourcePath);
    const destDir = path.join(archiveRoot, ...bucketKey.split('/'));
    const { baseName, ext } = splitName(sourcePath);
    const destPath = await store.resolveCollisionFreeName(
      destDir,
      baseName,
      ext,
      (candidate) => plannedDestinations.has(candidate),
    );
    const { size } = await fs.promises.stat(sourcePath);

    if (dryRun) {
      plannedByDigest.set(digest, destPath);
      plannedDestinations.add(destPath);
      logger.info(
        `[dry-run] Would copy: ${sourcePath} -> ${destPath} (${humanSize(size)})`,
        verbosity,
      );
      return { status: 'planned', sourcePath, destPath, digest, size };
    }

    await copyPreservingMetadata(sourcePath, destPath);
    await verifyCopy(sourcePath, destPath, digest);
    await store.add(digest, sourcePath, destPath, size);

    logger.verbose(`Copied: ${sourcePath} -> ${destPath}`, verbosity);
    return { status: 'copied', sourcePath, destPath, digest, size };
  };

  /**
   * Run one file through hash, dedup check, copy, verify and record.
   * Failures are returned as an error outcome, never thrown.
   */
  const processFile = async (
    sourcePath: string,
    precomputedDigest?: string,
  ): Promise<CopyOutcome> => {
    try {
      return await runSteps(sourcePath, precomputedDigest);
    } catch (error) {
      const failure = error instanceof Error ? error : new Error(String(error));
      if (
        failure instanceof IntegrityError ||
        failure instanceof CollisionExhaustedError
      ) {
        logger.error(failure.message);
      } else {
        logger.error(`Failed to copy ${sourcePath}: ${failure.message}`);
      }
      return { status: 'error', sourcePath, error: failure };
    }
  };

  /**
   * Process files one after another in the given order. A failing file is
   * counted and the run continues.
   */
  const copyAll = async (
    files: readonly string[],
    digests: ReadonlyMap<string, string> = new Map(),
  ): Promise<CopySummary> => {
    const summary: CopySummary = {
      copied: 0,
      skipped: 0,
      planned: 0,
      errors: 0,
      copiedBytes: 0,
      outcomes: [],
    };

    for (const file of files) {
      const outcome = await processFile(file, digests.get(file));
      summary.outcomes.push(outcome);

      switch (outcome.status) {
        case 'copied':
          summary.copied++;
          summary.copiedBytes += outcome.size;
          break;
        case 'skipped':
          summary.skipped++;
          break;
        case 'planned':
          summary.planned++;
          break;
        case 'error':
          summary.errors++;
          break;
      }
      options.onFileDone?.(outcome);
    }

    return summary;
  };

  return { processFile, copyAll };
}

export type CopyEngine = ReturnType<typeof createCopyEngine>;
