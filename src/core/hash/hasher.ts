import fs from 'node:fs';
import crypto from 'node:crypto';
import * as logger from '../../utils/logger';
import { IOError, formatError } from '../../utils/errors';
import { getOptimalConcurrency } from '../../utils/env-utils';
import { processPool } from '../pool/work-pool';

export const DIGEST_ALGORITHM = 'sha256';
export const DIGEST_PATTERN = /^[0-9a-f]{64}$/;

export interface HasherOptions {
  /** Pool size for batch hashing; defaults to the CPU count. */
  workers?: number;
  verbosity?: number;
  onProgress?: (hashed: number, total: number) => void;
}

export function createHasher(options: HasherOptions = {}) {
  const verbosity = options.verbosity ?? logger.Verbosity.Normal;
  const workers = getOptimalConcurrency(options.workers);

  const digest = (filePath: string): Promise<string> => {
    return new Promise((resolve, reject) => {
      const hash = crypto.createHash(DIGEST_ALGORITHM);
      const stream = fs.createReadStream(filePath);

      stream.on('error', (error) => {
        reject(
          new IOError(filePath, `Cannot read ${filePath}: ${error.message}`, {
            cause: error,
          }),
        );
      });
      stream.on('data', (chunk) => hash.update(chunk));
      stream.on('end', () => resolve(hash.digest('hex')));
    });
  };

  /**
   * Hash many files in parallel. Files that fail are left out of the map;
   * the caller re-hashes them one at a time.
   */
  const digestBatch = async (
    filePaths: readonly string[],
  ): Promise<Map<string, string>> => {
    const digests = new Map<string, string>();
    const results = await processPool(filePaths, digest, {
      maxConcurrency: workers,
      onSettled: (_result, settled) =>
        options.onProgress?.(settled, filePaths.length),
    });

    for (const result of results) {
      if (result.success) {
        digests.set(result.item, result.value);
      } else {
        logger.verbose(
          `Batch hash failed for ${result.item}: ${formatError(result.error)}`,
          verbosity,
        );
      }
    }
    return digests;
  };

  /**
   * Batch hashing followed by a sequential retry of whatever the batch missed.
   * Files that still cannot be read are returned in `failed`.
   */
  const digestAll = async (
    filePaths: readonly string[],
  ): Promise<{ digests: Map<string, string>; failed: Map<string, Error> }> => {
    const digests = await digestBatch(filePaths);
    const failed = new Map<string, Error>();

    for (const filePath of filePaths) {
      if (digests.has(filePath)) {
        continue;
      }
      try {
        digests.set(filePath, await digest(filePath));
      } catch (error) {
        failed.set(
          filePath,
          error instanceof Error ? error : new Error(String(error)),
        );
      }
    }
    return { digests, failed };
  };

  return { digest, digestBatch, digestAll, workers };
}

export type Hasher = ReturnType<typeof createHasher>;
