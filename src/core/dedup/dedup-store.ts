import fs from 'node:fs';
import path from 'node:path';
import { z } from 'zod';
import * as logger from '../../utils/logger';
import {
  CollisionExhaustedError,
  StateCorruptionError,
} from '../../utils/errors';
import {
  collectFiles,
  fileSize,
  pathExists,
  readText,
  splitLines,
  writeFileAtomic,
} from '../../utils/fs-utils';
import { ContentRecord, UNKNOWN_ORIGIN } from '../../interfaces/dedup';
import { DIGEST_PATTERN, Hasher } from '../hash/hasher';

export const DEDUP_STORE_FILENAME = 'hashes.jsonl';
export const MAX_COLLISION_ATTEMPTS = 9999;

export interface DedupStoreOptions {
  verbosity?: number;
  now?: () => Date;
}

const ContentRecordSchema = z.object({
  digest: z.string().regex(DIGEST_PATTERN),
  sourcePath: z.string(),
  destPath: z.string().min(1),
  recordedAt: z.string(),
  size: z.number().int().nonnegative(),
});

function parseRecord(line: string): ContentRecord | null {
  let value: unknown;
  try {
    value = JSON.parse(line);
  } catch {
    return null;
  }
  const result = ContentRecordSchema.safeParse(value);
  return result.success ? result.data : null;
}

function serializeRecord(record: ContentRecord): string {
  return JSON.stringify({
    digest: record.digest,
    sourcePath: record.sourcePath,
    destPath: record.destPath,
    recordedAt: record.recordedAt,
    size: record.size,
  });
}

/**
 * Content-addressed index of everything already archived, persisted as an
 * append-only JSON Lines log and held in memory as two exact-match indexes.
 */
export function createDedupStore(
  storePath: string,
  options: DedupStoreOptions = {},
) {
  const verbosity = options.verbosity ?? logger.Verbosity.Normal;
  const now = options.now ?? (() => new Date());

  const byDigest = new Map<string, ContentRecord>();
  const byDestination = new Map<string, string>();
  let malformedLines: number[] = [];
  // Set when the log ends mid-line, as after an interrupted append
  let tornTail = false;

  const normalizeDest = (destPath: string): string => path.resolve(destPath);

  const index = (record: ContentRecord): boolean => {
    if (byDigest.has(record.digest)) {
      return false;
    }
    const dest = normalizeDest(record.destPath);
    if (byDestination.has(dest)) {
      return false;
    }
    byDigest.set(record.digest, record);
    byDestination.set(dest, record.digest);
    return true;
  };

  const load = async (): Promise<number> => {
    byDigest.clear();
    byDestination.clear();
    malformedLines = [];

    const text = await readText(storePath);
    tornTail = text.length > 0 && !text.endsWith('\n');
    const lines = splitLines(text);
    lines.forEach((line, lineIndex) => {
      const record = parseRecord(line);
      if (!record || !index(record)) {
        malformedLines.push(lineIndex + 1);
      }
    });

    if (malformedLines.length > 0) {
      logger.warning(
        `Ignored ${malformedLines.length} unreadable line(s) in ${storePath}. Run 'pbak verify' for details.`,
        verbosity,
      );
    }
    logger.verbose(
      `Loaded dedup store with ${byDigest.size} records from ${storePath}`,
      verbosity,
    );
    return byDigest.size;
  };

  const exists = (digest: string): boolean => byDigest.has(digest);

  const recordedDestination = (digest: string): string | undefined =>
    byDigest.get(digest)?.destPath;

  const destinationExists = async (destPath: string): Promise<boolean> => {
    if (byDestination.has(normalizeDest(destPath))) {
      return true;
    }
    return pathExists(destPath);
  };

  /**
   * First of `base.ext`, `base_2.ext`, `base_3.ext`, ... that is neither
   * recorded nor present on disk. `isReserved` marks further names as taken.
   */
  const resolveCollisionFreeName = async (
    destDir: string,
    baseName: string,
    ext: string,
    isReserved: (candidate: string) => boolean = () => false,
  ): Promise<string> => {
    const suffix = ext === '' || ext.startsWith('.') ? ext : `.${ext}`;
    const isTaken = async (candidate: string): Promise<boolean> =>
      isReserved(candidate) || (await destinationExists(candidate));

    const first = path.join(destDir, `${baseName}${suffix}`);
    if (!(await isTaken(first))) {
      return first;
    }

    for (let counter = 2; counter <= MAX_COLLISION_ATTEMPTS; counter++) {
      const candidate = path.join(destDir, `${baseName}_${counter}${suffix}`);
      if (!(await isTaken(candidate))) {
        return candidate;
      }
    }

    throw new CollisionExhaustedError(
      destDir,
      `${baseName}${suffix}`,
      MAX_COLLISION_ATTEMPTS,
    );
  };

  /**
   * Record verified content. Call only after the destination has been
   * written and re-hashed.
   */
  const add = async (
    digest: string,
    sourcePath: string,
    destPath: string,
    size: number,
  ): Promise<ContentRecord> => {
    const known = byDigest.get(digest);
    if (known) {
      logger.verbose(
        `Digest ${digest} already recorded at ${known.destPath}`,
        verbosity,
      );
      return known;
    }
    if (byDestination.has(normalizeDest(destPath))) {
      throw new StateCorruptionError(
        storePath,
        `Destination ${destPath} is already recorded for different content`,
      );
    }

    const record: ContentRecord = {
      digest,
      sourcePath,
      destPath,
      recordedAt: now().toISOString(),
      size,
    };
    const separator = tornTail ? '\n' : '';
    await fs.promises.appendFile(
      storePath,
      separator + serializeRecord(record) + '\n',
      { encoding: 'utf8', mode: 0o600 },
    );
    tornTail = false;
    index(record);
    return record;
  };

  /**
   * Replace the whole store with records hashed from the files under `root`.
   * Dot-files are indexed too. The previous log is kept as `<store>.bak`;
   * an empty `root` leaves the store untouched.
   */
  const rebuild = async (
    root: string,
    hasher: Hasher,
  ): Promise<{ indexed: number; duplicates: string[]; unreadable: string[] }> => {
    const files = await collectFiles(root, { skipHidden: false });
    if (files.length === 0) {
      logger.warning(
        `No files under ${root}; keeping the existing store.`,
        verbosity,
      );
      return { indexed: 0, duplicates: [], unreadable: [] };
    }
    logger.info(`Found ${files.length} files to hash under ${root}`, verbosity);

    const { digests, failed } = await hasher.digestAll(files);

    const rebuilt: ContentRecord[] = [];
    const seen = new Set<string>();
    const duplicates: string[] = [];
    const recordedAt = now().toISOString();

    for (const file of files) {
      const digest = digests.get(file);
      if (!digest) {
        continue;
      }
      if (seen.has(digest)) {
        duplicates.push(file);
        continue;
      }
      seen.add(digest);
      rebuilt.push({
        digest,
        sourcePath: UNKNOWN_ORIGIN,
        destPath: file,
        recordedAt,
        size: await fileSize(file),
      });
    }

    if ((await fileSize(storePath)) > 0) {
      await fs.promises.copyFile(storePath, `${storePath}.bak`);
      logger.dim(`  Existing store backed up to ${storePath}.bak`, verbosity);
    }

    const contents = rebuilt.map((r) => serializeRecord(r) + '\n').join('');
    await writeFileAtomic(storePath, contents);

    byDigest.clear();
    byDestination.clear();
    malformedLines = [];
    tornTail = false;
    rebuilt.forEach(index);

    for (const duplicate of duplicates) {
      logger.warning(`Duplicate content in archive: ${duplicate}`, verbosity);
    }
    for (const file of failed.keys()) {
      logger.error(`Could not hash ${file}`);
    }

    return {
      indexed: rebuilt.length,
      duplicates,
      unreadable: [...failed.keys()],
    };
  };

  const validate = (): { malformedLines: number[] } => ({
    malformedLines: [...malformedLines],
  });

  const records = (): ContentRecord[] => [...byDigest.values()];

  const sizeBytes = (): Promise<number> => fileSize(storePath);

  return {
    load,
    exists,
    recordedDestination,
    destinationExists,
    resolveCollisionFreeName,
    add,
    rebuild,
    validate,
    records,
    sizeBytes,
    get count() {
      return byDigest.size;
    },
    storePath,
  };
}

export type DedupStore = ReturnType<typeof createDedupStore>;
