import fs from 'node:fs';
import path from 'node:path';
import * as logger from '../../utils/logger';
import { maskSecret } from '../../utils/format';
import { PbakConfig, requireServerConfig } from '../config/config';
import {
  CommandRunner,
  isToolAvailable,
  runCommand,
} from '../process/command-runner';

export const UPLOAD_TOOL = 'immich-go';

export interface UploadClientOptions {
  config: PbakConfig;
  runner?: CommandRunner;
  now?: () => Date;
  verbosity?: number;
}

export interface UploadAttempt {
  success: boolean;
  exitCode: number;
  logFile: string;
  error?: string;
}

/** Local time as YYYYmmdd-HHMMSS */
export function logTimestamp(date: Date): string {
  const pad = (n: number) => String(n).padStart(2, '0');
  return (
    `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}-` +
    `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
  );
}

/**
 * Hands one archive folder at a time to immich-go, which does the network
 * transfer and its own server-side duplicate detection.
 */
export function createUploadClient(options: UploadClientOptions) {
  const { config } = options;
  const { server, apiKey } = requireServerConfig(config);
  const runner = options.runner ?? runCommand;
  const now = options.now ?? (() => new Date());
  const verbosity = options.verbosity ?? logger.Verbosity.Normal;
  const logDir = path.join(config.stateDir, 'logs');

  const logFileFor = (unitKey: string): string =>
    path.join(
      logDir,
      `upload-${logTimestamp(now())}-${unitKey.split('/').join('-')}.log`,
    );

  const buildArgs = (
    unitDir: string,
    logFile: string,
    dryRun: boolean,
    key: string = apiKey,
  ): string[] => {
    const args = [
      'upload',
      'from-folder',
      `--server=${server}`,
      `--api-key=${key}`,
      '--recursive',
    ];
    if (config.uploadInclude.length > 0) {
      args.push(`--include-extensions=${config.uploadInclude.join(',')}`);
    }
    if (config.uploadExclude.length > 0) {
      args.push(`--exclude-extensions=${config.uploadExclude.join(',')}`);
    }
    if (config.pauseJobs) {
      args.push('--pause-immich-jobs');
    }
    args.push(`--concurrent-tasks=${config.concurrentTasks}`);
    args.push(`--log-file=${logFile}`);
    if (dryRun) {
      args.push('--dry-run');
    }
    args.push(unitDir);
    return args;
  };

  const upload = async (
    unitDir: string,
    unitKey: string,
    { dryRun = false }: { dryRun?: boolean } = {},
  ): Promise<UploadAttempt> => {
    await fs.promises.mkdir(logDir, { recursive: true, mode: 0o700 });
    const logFile = logFileFor(unitKey);

    logger.verbose(
      `Running: ${UPLOAD_TOOL} ${buildArgs(unitDir, logFile, dryRun, maskSecret(apiKey)).join(' ')}`,
      verbosity,
    );
    const result = await runner(UPLOAD_TOOL, buildArgs(unitDir, logFile, dryRun));

    return {
      success: result.exitCode === 0,
      exitCode: result.exitCode,
      logFile,
      ...(result.error ? { error: result.error } : {}),
    };
  };

  const isAvailable = (): Promise<boolean> =>
    isToolAvailable(UPLOAD_TOOL, ['version'], runner);

  return { upload, buildArgs, logFileFor, isAvailable, server };
}

export type UploadClient = ReturnType<typeof createUploadClient>;
