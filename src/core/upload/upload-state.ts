import path from 'node:path';
import { z } from 'zod';
import * as logger from '../../utils/logger';
import {
  isDirectory,
  listDirectoriesAtDepth,
  readLines,
  writeFileAtomic,
} from '../../utils/fs-utils';
import {
  TransferUnit,
  UploadStateRecord,
  UploadStatus,
  UploadSummary,
} from '../../interfaces/upload';

export const UPLOAD_STATE_FILENAME = 'uploads.jsonl';

/** Buckets live at YYYY/MM/DD below the archive root. */
export const UNIT_DEPTH = 3;

export interface UploadStateOptions {
  verbosity?: number;
  now?: () => Date;
}

const UploadStateRecordSchema = z.object({
  status: z.enum(['in_progress', 'uploaded', 'failed']),
  unitKey: z.string().min(1),
  timestamp: z.string(),
  fileCount: z.number().int().nonnegative(),
  exitIndicator: z.string(),
});

function parseRecord(line: string): UploadStateRecord | null {
  let value: unknown;
  try {
    value = JSON.parse(line);
  } catch {
    return null;
  }
  const result = UploadStateRecordSchema.safeParse(value);
  return result.success ? result.data : null;
}

function serializeRecord(record: UploadStateRecord): string {
  return JSON.stringify({
    status: record.status,
    unitKey: record.unitKey,
    timestamp: record.timestamp,
    fileCount: record.fileCount,
    exitIndicator: record.exitIndicator,
  });
}

/**
 * Bucket key of a unit directory, always "/"-separated.
 */
export function unitKeyFor(archiveRoot: string, unitDir: string): string {
  return path.relative(archiveRoot, unitDir).split(path.sep).join('/');
}

/**
 * Last known upload status of every unit, one current record per key.
 * Each change rewrites the whole log through a temporary file.
 */
export function createUploadStateStore(
  storePath: string,
  options: UploadStateOptions = {},
) {
  const verbosity = options.verbosity ?? logger.Verbosity.Normal;
  const now = options.now ?? (() => new Date());

  // Insertion order is write order: an upsert moves the key to the end
  const records = new Map<string, UploadStateRecord>();
  let malformedLines: number[] = [];

  const load = async (): Promise<number> => {
    records.clear();
    malformedLines = [];

    const lines = await readLines(storePath);
    lines.forEach((line, lineIndex) => {
      const record = parseRecord(line);
      if (!record) {
        malformedLines.push(lineIndex + 1);
        return;
      }
      records.delete(record.unitKey);
      records.set(record.unitKey, record);
    });

    if (malformedLines.length > 0) {
      logger.warning(
        `Ignored ${malformedLines.length} unreadable line(s) in ${storePath}. Run 'pbak verify' for details.`,
        verbosity,
      );
    }
    logger.verbose(
      `Loaded upload state for ${records.size} folder(s) from ${storePath}`,
      verbosity,
    );
    return records.size;
  };

  const persist = async (): Promise<void> => {
    const contents = [...records.values()]
      .map((record) => serializeRecord(record) + '\n')
      .join('');
    await writeFileAtomic(storePath, contents);
  };

  /**
   * Replace the record for `unitKey` with a new one.
   */
  const mark = async (
    unitKey: string,
    status: UploadStatus,
    fileCount: number,
    exitIndicator: string = '',
  ): Promise<UploadStateRecord> => {
    const record: UploadStateRecord = {
      status,
      unitKey,
      timestamp: now().toISOString(),
      fileCount,
      exitIndicator,
    };
    records.delete(unitKey);
    records.set(unitKey, record);
    await persist();
    logger.verbose(`Marked ${unitKey} as ${status}`, verbosity);
    return record;
  };

  const getRecord = (unitKey: string): UploadStateRecord | undefined =>
    records.get(unitKey);

  const statusOf = (unitKey: string): UploadStatus | 'pending' =>
    records.get(unitKey)?.status ?? 'pending';

  /**
   * Every bucket folder under the archive root, sorted by key.
   */
  const listUnits = async (archiveRoot: string): Promise<TransferUnit[]> => {
    if (!(await isDirectory(archiveRoot))) {
      return [];
    }
    const dirs = await listDirectoriesAtDepth(archiveRoot, UNIT_DEPTH);
    return dirs.map((dir) => ({ key: unitKeyFor(archiveRoot, dir), path: dir }));
  };

  const listPending = async (archiveRoot: string): Promise<TransferUnit[]> => {
    const units = await listUnits(archiveRoot);
    return units.filter((unit) => statusOf(unit.key) !== 'uploaded');
  };

  const keysWithStatus = (status: UploadStatus): string[] =>
    [...records.values()]
      .filter((record) => record.status === status)
      .map((record) => record.unitKey)
      .sort();

  const listFailed = (): string[] => keysWithStatus('failed');

  /** Attempts that started but never recorded an outcome. */
  const listInterrupted = (): string[] => keysWithStatus('in_progress');

  const countByStatus = (status: UploadStatus): number =>
    keysWithStatus(status).length;

  const filesByStatus = (status: UploadStatus): number =>
    [...records.values()]
      .filter((record) => record.status === status)
      .reduce((total, record) => total + record.fileCount, 0);

  const summary = (): UploadSummary => {
    const totals = (status: UploadStatus) => ({
      units: countByStatus(status),
      files: filesByStatus(status),
    });
    return {
      in_progress: totals('in_progress'),
      uploaded: totals('uploaded'),
      failed: totals('failed'),
    };
  };

  const validate = (): { malformedLines: number[] } => ({
    malformedLines: [...malformedLines],
  });

  return {
    load,
    mark,
    getRecord,
    statusOf,
    listUnits,
    listPending,
    listFailed,
    listInterrupted,
    countByStatus,
    filesByStatus,
    summary,
    validate,
    get count() {
      return records.size;
    },
    storePath,
  };
}

export type UploadStateStore = ReturnType<typeof createUploadStateStore>;
