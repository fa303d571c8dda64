import path from 'node:path';
import * as logger from './utils/logger';
import { pathExists } from './utils/fs-utils';
import { requireVolume } from './utils/volume';
import { archiveRoot, PbakConfig } from './core/config/config';
import {
  createDedupStore,
  DEDUP_STORE_FILENAME,
} from './core/dedup/dedup-store';
import {
  createUploadStateStore,
  UPLOAD_STATE_FILENAME,
} from './core/upload/upload-state';
import { createHasher } from './core/hash/hasher';
import {
  createProgressTracker,
  withProgress,
} from './core/progress/progress-tracker';
import { ContentRecord } from './interfaces/dedup';

export interface VerifyOptions {
  config: PbakConfig;
  ssd?: string;
  quiet?: boolean;
  verbose?: boolean;
}

export interface VerifyDependencies {
  isTTY?: boolean;
}

export interface DigestMismatch {
  path: string;
  expected: string;
  actual: string;
}

export interface VerifyReport {
  checked: number;
  ok: number;
  missing: string[];
  mismatched: DigestMismatch[];
  unreadable: string[];
  malformed: { dedup: number[]; uploads: number[] };
}

export function countProblems(report: VerifyReport): number {
  return (
    report.missing.length +
    report.mismatched.length +
    report.unreadable.length +
    report.malformed.dedup.length +
    report.malformed.uploads.length
  );
}

const isInside = (root: string, filePath: string): boolean => {
  const relative = path.relative(root, filePath);
  return relative !== '' && !relative.startsWith('..') && !path.isAbsolute(relative);
};

/**
 * `pbak verify`: re-hash every archived file against its record and check
 * both stores for lines that could not be read.
 */
export async function verifyArchive(
  options: VerifyOptions,
  dependencies: VerifyDependencies = {},
): Promise<VerifyReport> {
  const { config } = options;
  const verbosity = logger.resolveVerbosity(options);

  logger.header('Verify Archive', verbosity);

  const store = createDedupStore(
    path.join(config.stateDir, DEDUP_STORE_FILENAME),
    { verbosity },
  );
  await store.load();
  const uploads = createUploadStateStore(
    path.join(config.stateDir, UPLOAD_STATE_FILENAME),
    { verbosity },
  );
  await uploads.load();

  let records: ContentRecord[] = store.records();
  const ssdName = options.ssd ?? config.ssdVolume;
  if (ssdName) {
    await requireVolume(config.volumesRoot, ssdName);
    const archive = archiveRoot(config, ssdName);
    records = records.filter((record) => isInside(archive, record.destPath));
    logger.info(`Checking ${records.length} record(s) under ${archive}`, verbosity);
  } else {
    logger.info(`Checking all ${records.length} record(s)`, verbosity);
  }

  const missing: string[] = [];
  const present: ContentRecord[] = [];
  for (const record of records) {
    if (await pathExists(record.destPath)) {
      present.push(record);
    } else {
      missing.push(record.destPath);
    }
  }

  const progress = createProgressTracker('Verifying', verbosity, {
    isTTY: dependencies.isTTY,
  });
  progress.initialize(present.length);
  const hasher = createHasher({
    workers: config.hashWorkers,
    verbosity,
    onProgress: () => progress.recordSuccess(),
  });
  const { digests, failed } = await withProgress(progress, () =>
    hasher.digestAll(present.map((record) => record.destPath)),
  );

  const mismatched: DigestMismatch[] = [];
  for (const record of present) {
    const actual = digests.get(record.destPath);
    if (actual !== undefined && actual !== record.digest) {
      mismatched.push({ path: record.destPath, expected: record.digest, actual });
    }
  }

  const report: VerifyReport = {
    checked: records.length,
    ok: present.length - mismatched.length - failed.size,
    missing,
    mismatched,
    unreadable: [...failed.keys()],
    malformed: {
      dedup: store.validate().malformedLines,
      uploads: uploads.validate().malformedLines,
    },
  };

  printReport(report, store.storePath, uploads.storePath, verbosity);
  return report;
}

function printReport(
  report: VerifyReport,
  dedupPath: string,
  uploadsPath: string,
  verbosity: number,
): void {
  for (const file of report.missing) {
    logger.error(`Missing: ${file}`);
  }
  for (const mismatch of report.mismatched) {
    logger.error(
      `Hash mismatch: ${mismatch.path} (recorded ${mismatch.expected}, found ${mismatch.actual})`,
    );
  }
  for (const file of report.unreadable) {
    logger.error(`Unreadable: ${file}`);
  }
  const malformed: Array<[string, number[]]> = [
    [dedupPath, report.malformed.dedup],
    [uploadsPath, report.malformed.uploads],
  ];
  for (const [storePath, lines] of malformed) {
    if (lines.length > 0) {
      logger.warning(
        `${storePath}: unreadable line(s) ${lines.join(', ')}`,
        verbosity,
      );
    }
  }

  logger.header('Summary', verbosity);
  logger.success(`${report.ok} of ${report.checked} file(s) verified`, verbosity);
  const problems = countProblems(report);
  if (problems > 0) {
    logger.error(`${problems} problem(s) found`);
    if (report.malformed.dedup.length > 0 || report.mismatched.length > 0) {
      logger.dim('  Rebuild the hash database with: pbak rehash', verbosity);
    }
  }
}
