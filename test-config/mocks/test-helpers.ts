/**
 * Shared Test Helpers
 *
 * Fakes return the same shape as the real factories, so they can be
 * injected without type casting.
 */

import crypto from 'node:crypto';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import * as logger from '../../src/utils/logger';
import { parseConfig, PbakConfig } from '../../src/core/config/config';
import type {
  CommandResult,
  CommandRunner,
} from '../../src/core/process/command-runner';
import type {
  CaptureMetadata,
  MetadataExtractor,
} from '../../src/interfaces/ingest';

export const sha256 = (contents: string | Buffer): string =>
  crypto.createHash('sha256').update(contents).digest('hex');

/**
 * Temporary directory with helpers to lay out files inside it
 */
export function createTempTree(prefix: string) {
  const root = fs.mkdtempSync(path.join(os.tmpdir(), `pbak-${prefix}-`));

  const file = (
    relativePath: string,
    contents: string | Buffer = relativePath,
    mtime?: Date,
  ): string => {
    const fullPath = path.join(root, relativePath);
    fs.mkdirSync(path.dirname(fullPath), { recursive: true });
    fs.writeFileSync(fullPath, contents);
    if (mtime) {
      fs.utimesSync(fullPath, mtime, mtime);
    }
    return fullPath;
  };

  const dir = (relativePath: string): string => {
    const fullPath = path.join(root, relativePath);
    fs.mkdirSync(fullPath, { recursive: true });
    return fullPath;
  };

  const cleanup = (): void => {
    fs.rmSync(root, { recursive: true, force: true });
  };

  return { root, file, dir, cleanup };
}

export type TempTree = ReturnType<typeof createTempTree>;

/**
 * Mute every logger output function for the duration of a test
 */
export function silenceLogger(): () => void {
  const spies = [
    jest.spyOn(logger, 'info').mockImplementation(() => {}),
    jest.spyOn(logger, 'success').mockImplementation(() => {}),
    jest.spyOn(logger, 'warning').mockImplementation(() => {}),
    jest.spyOn(logger, 'verbose').mockImplementation(() => {}),
    jest.spyOn(logger, 'dim').mockImplementation(() => {}),
    jest.spyOn(logger, 'header').mockImplementation(() => {}),
    jest.spyOn(logger, 'error').mockImplementation(() => {}),
    jest.spyOn(logger, 'always').mockImplementation(() => {}),
  ];
  return () => spies.forEach((spy) => spy.mockRestore());
}

export interface RecordedCommand {
  command: string;
  args: string[];
}

/**
 * Command runner that records invocations and answers from a queue of
 * exit codes (0 once the queue is empty).
 */
export function createFakeRunner(exitCodes: number[] = []) {
  const calls: RecordedCommand[] = [];
  const queue = [...exitCodes];

  const run: CommandRunner = jest.fn(
    async (command: string, args: string[]): Promise<CommandResult> => {
      calls.push({ command, args });
      return { exitCode: queue.shift() ?? 0 };
    },
  );

  return { run, calls };
}

/**
 * Metadata extractor answering from a table keyed by file name
 */
export function createFakeExtractor(
  table: Record<string, Partial<CaptureMetadata>> = {},
): MetadataExtractor {
  return jest.fn(async (filePath: string): Promise<CaptureMetadata> => {
    const entry = table[path.basename(filePath)] ?? {};
    return {
      captureDate: entry.captureDate ?? null,
      createDate: entry.createDate ?? null,
      modifyDate: entry.modifyDate ?? null,
    };
  });
}

export const fixedClock = (iso: string) => () => new Date(iso);

/**
 * Configuration rooted in a temporary tree: volumes under `<root>/Volumes`,
 * state under `<root>/state`.
 */
export function createTestConfig(
  tree: TempTree,
  overrides: Record<string, unknown> = {},
): PbakConfig {
  return parseConfig(
    {
      server: 'https://photos.example.test',
      apiKey: 'test-secret',
      sdVolume: 'EOS_DIGITAL',
      ssdVolume: 'PhotoSSD',
      volumesRoot: tree.dir('Volumes'),
      hashWorkers: 2,
      ...overrides,
    },
    tree.dir('state'),
  );
}

export function createFakeLock() {
  return { acquireLock: jest.fn(), releaseLock: jest.fn() };
}
