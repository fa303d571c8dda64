import path from 'node:path';
import * as logger from './utils/logger';
import { isDirectory } from './utils/fs-utils';
import { humanSize, maskSecret } from './utils/format';
import { isVolumeMounted } from './utils/volume';
import { archiveRoot, PbakConfig } from './core/config/config';
import {
  createDedupStore,
  DEDUP_STORE_FILENAME,
} from './core/dedup/dedup-store';
import {
  createUploadStateStore,
  UPLOAD_STATE_FILENAME,
} from './core/upload/upload-state';
import { UPLOAD_TOOL } from './core/upload/upload-client';
import { MIRROR_TOOL } from './core/mirror/mirror-propagator';
import {
  CommandRunner,
  isToolAvailable,
  runCommand,
} from './core/process/command-runner';
import { UploadSummary } from './interfaces/upload';

export interface StatusOptions {
  config: PbakConfig;
  version: string;
  quiet?: boolean;
  verbose?: boolean;
}

export interface StatusDependencies {
  runner?: CommandRunner;
}

export interface VolumeState {
  label: string;
  name: string | undefined;
  mounted: boolean;
}

export interface StatusReport {
  server: string | undefined;
  apiKey: string;
  volumes: VolumeState[];
  dedup: { records: number; sizeBytes: number };
  uploads: UploadSummary;
  /** Undefined when the SSD archive is not reachable */
  pending: number | undefined;
  tools: Record<string, boolean>;
}

const row = (label: string, value: string): string =>
  `  ${label.padEnd(24)} ${value}`;

/**
 * `pbak status`: read-only overview of configuration, volumes and both stores.
 */
export async function showStatus(
  options: StatusOptions,
  dependencies: StatusDependencies = {},
): Promise<StatusReport> {
  const { config } = options;
  const verbosity = logger.resolveVerbosity(options);
  const runner = dependencies.runner ?? runCommand;

  const volume = async (
    label: string,
    name: string | undefined,
  ): Promise<VolumeState> => ({
    label,
    name,
    mounted: await isVolumeMounted(config.volumesRoot, name),
  });
  const volumes = [
    await volume('SD card', config.sdVolume),
    await volume('SSD', config.ssdVolume),
    await volume('Mirror SSD', config.mirrorVolume),
  ];

  const dedup = createDedupStore(
    path.join(config.stateDir, DEDUP_STORE_FILENAME),
    { verbosity },
  );
  await dedup.load();
  const uploads = createUploadStateStore(
    path.join(config.stateDir, UPLOAD_STATE_FILENAME),
    { verbosity },
  );
  await uploads.load();

  let pending: number | undefined;
  if (config.ssdVolume) {
    const archive = archiveRoot(config, config.ssdVolume);
    if (await isDirectory(archive)) {
      pending = (await uploads.listPending(archive)).length;
    }
  }

  const tools: Record<string, boolean> = {
    [UPLOAD_TOOL]: await isToolAvailable(UPLOAD_TOOL, ['version'], runner),
    [MIRROR_TOOL]: await isToolAvailable(MIRROR_TOOL, ['--version'], runner),
  };

  const report: StatusReport = {
    server: config.server,
    apiKey: maskSecret(config.apiKey),
    volumes,
    dedup: { records: dedup.count, sizeBytes: await dedup.sizeBytes() },
    uploads: uploads.summary(),
    pending,
    tools,
  };

  printReport(report, options.version, verbosity);
  return report;
}

function printReport(
  report: StatusReport,
  version: string,
  verbosity: number,
): void {
  if (verbosity === logger.Verbosity.Quiet) {
    return;
  }

  logger.header(`pbak v${version} Status`, verbosity);
  logger.always(row('Immich server:', report.server ?? '<not set>'));
  logger.always(row('API key:', report.apiKey));
  for (const volume of report.volumes) {
    const state = volume.mounted
      ? logger.green('mounted')
      : logger.gray('not mounted');
    logger.always(row(`${volume.label}:`, `${volume.name ?? '<not set>'} (${state})`));
  }

  logger.always('');
  logger.always(
    row(
      'Backup database:',
      `${report.dedup.records} files (${humanSize(report.dedup.sizeBytes)})`,
    ),
  );

  const { uploaded, failed, in_progress: interrupted } = report.uploads;
  logger.always('');
  logger.always(row('Uploaded:', `${uploaded.units} folder(s), ${uploaded.files} files`));
  logger.always(row('Failed:', `${failed.units} folder(s), ${failed.files} files`));
  if (interrupted.units > 0) {
    logger.always(
      row('Interrupted:', `${interrupted.units} folder(s), ${interrupted.files} files`),
    );
  }
  if (report.pending !== undefined) {
    logger.always(row('Pending upload:', `${report.pending} folder(s)`));
  }

  logger.always('');
  for (const [tool, available] of Object.entries(report.tools)) {
    logger.always(
      row(`${tool}:`, available ? logger.green('found') : logger.red('not found')),
    );
  }
}
