#!/usr/bin/env node

import { parseArgs } from 'node:util';
import packageJson from './package.json';
import { dumpPhotos, DumpOptions } from './src/photo-dump';
import { uploadPhotos, UploadMode, UploadOptions } from './src/photo-upload';
import { showStatus } from './src/backup-status';
import { rebuildHashes, RehashOptions } from './src/hash-rebuild';
import { syncMirror, MirrorSyncOptions } from './src/mirror-sync';
import { countProblems, verifyArchive, VerifyOptions } from './src/archive-verify';
import { loadConfig, PbakConfig } from './src/core/config/config';
import { getStateDir } from './src/utils/state-dir';
import { ConfigError, formatError } from './src/utils/errors';
import { bold, red } from './src/utils/logger';

const VERSION = packageJson.version || 'unknown';

const GLOBAL_OPTIONS = {
  'dry-run': { type: 'boolean' },
  verbose: { type: 'boolean' },
  quiet: { type: 'boolean' },
  help: { type: 'boolean', short: 'h' },
  version: { type: 'boolean', short: 'v' },
} as const;

interface GlobalFlags {
  dryRun?: boolean;
  verbose?: boolean;
  quiet?: boolean;
}

type Without<T> = Omit<T, 'config'>;

export type ParsedCommand =
  | { kind: 'help' }
  | { kind: 'version' }
  | { kind: 'dump'; options: Without<DumpOptions> }
  | { kind: 'upload'; options: Without<UploadOptions> }
  | { kind: 'status'; options: Omit<GlobalFlags, 'dryRun'> }
  | { kind: 'rehash'; options: Without<RehashOptions> }
  | { kind: 'sync'; options: Without<MirrorSyncOptions> }
  | { kind: 'verify'; options: Without<VerifyOptions> };

const COMMANDS = ['dump', 'upload', 'status', 'rehash', 'sync', 'verify'] as const;
type CommandName = (typeof COMMANDS)[number];

function isCommand(value: string): value is CommandName {
  return COMMANDS.some((command) => command === value);
}

function globalFlags(values: {
  'dry-run'?: boolean;
  verbose?: boolean;
  quiet?: boolean;
}): GlobalFlags {
  return {
    dryRun: values['dry-run'],
    verbose: values.verbose,
    quiet: values.quiet,
  };
}

function selectUploadMode(values: {
  all?: boolean;
  date?: string;
  'retry-failed'?: boolean;
  force?: boolean;
}): UploadMode {
  const modes: UploadMode[] = [];
  if (values.all) modes.push('all');
  if (values.date !== undefined) modes.push('date');
  if (values['retry-failed']) modes.push('retry-failed');
  if (values.force) modes.push('force');

  if (modes.length > 1) {
    throw new ConfigError(
      'Choose only one of --all, --date, --retry-failed or --force.',
    );
  }
  return modes[0] ?? 'list';
}

function parseCommandArgs(name: CommandName, args: string[]): ParsedCommand {
  switch (name) {
    case 'dump': {
      const { values } = parseArgs({
        args,
        options: {
          ...GLOBAL_OPTIONS,
          sd: { type: 'string' },
          ssd: { type: 'string' },
          'ignore-space': { type: 'boolean' },
        },
      });
      if (values.help) return { kind: 'help' };
      return {
        kind: 'dump',
        options: {
          ...globalFlags(values),
          sd: values.sd,
          ssd: values.ssd,
          ignoreSpace: values['ignore-space'],
        },
      };
    }

    case 'upload': {
      const { values } = parseArgs({
        args,
        options: {
          ...GLOBAL_OPTIONS,
          ssd: { type: 'string' },
          date: { type: 'string' },
          all: { type: 'boolean' },
          'retry-failed': { type: 'boolean' },
          force: { type: 'boolean' },
        },
      });
      if (values.help) return { kind: 'help' };
      return {
        kind: 'upload',
        options: {
          ...globalFlags(values),
          mode: selectUploadMode(values),
          date: values.date,
          ssd: values.ssd,
        },
      };
    }

    case 'status': {
      const { values } = parseArgs({ args, options: GLOBAL_OPTIONS });
      if (values.help) return { kind: 'help' };
      return {
        kind: 'status',
        options: { verbose: values.verbose, quiet: values.quiet },
      };
    }

    case 'rehash': {
      const { values } = parseArgs({
        args,
        options: { ...GLOBAL_OPTIONS, ssd: { type: 'string' } },
      });
      if (values.help) return { kind: 'help' };
      return { kind: 'rehash', options: { ...globalFlags(values), ssd: values.ssd } };
    }

    case 'verify': {
      const { values } = parseArgs({
        args,
        options: { ...GLOBAL_OPTIONS, ssd: { type: 'string' } },
      });
      if (values.help) return { kind: 'help' };
      return {
        kind: 'verify',
        options: { verbose: values.verbose, quiet: values.quiet, ssd: values.ssd },
      };
    }

    case 'sync': {
      const { values } = parseArgs({
        args,
        options: {
          ...GLOBAL_OPTIONS,
          from: { type: 'string' },
          to: { type: 'string' },
        },
      });
      if (values.help) return { kind: 'help' };
      return {
        kind: 'sync',
        options: { ...globalFlags(values), from: values.from, to: values.to },
      };
    }
  }
}

/**
 * Split the command word from the flags. Global flags may come before it.
 */
export function parseCommand(argv: string[]): ParsedCommand {
  const index = argv.findIndex((arg) => !arg.startsWith('-'));
  const rest = index === -1 ? argv : [...argv.slice(0, index), ...argv.slice(index + 1)];

  try {
    if (index === -1) {
      const { values } = parseArgs({ args: rest, options: GLOBAL_OPTIONS });
      return values.version && !values.help ? { kind: 'version' } : { kind: 'help' };
    }

    const name = argv[index];
    if (!isCommand(name)) {
      throw new ConfigError(`Unknown command '${name}'. Run 'pbak --help' for usage.`);
    }
    return parseCommandArgs(name, rest);
  } catch (error) {
    if (error instanceof ConfigError) {
      throw error;
    }
    throw new ConfigError(formatError(error));
  }
}

function showHelp() {
  console.log(`
${bold(`pbak v${VERSION} - Photo backup: SD card -> SSD archive -> Immich`)}

${bold('Usage: pbak <command> [options]')}

${bold('Commands:')}
  dump                    Copy new photos from the SD card into the SSD archive
    --sd <name>           SD card volume (default: configured sdVolume)
    --ssd <name>          SSD volume (default: configured ssdVolume)
    --ignore-space        Continue even if the SSD looks too full
  upload                  Upload archive folders to Immich with immich-go
    --ssd <name>          SSD volume
    --all                 Upload every folder not yet uploaded
    --date <YYYY/MM/DD>   Upload one folder
    --retry-failed        Retry failed and interrupted folders
    --force               Upload every folder again
                          (without a mode, lists the pending folders)
  status                  Show configuration, volumes and upload progress
  rehash                  Rebuild the hash database from the SSD archive
    --ssd <name>          SSD volume
  sync                    Copy archive files missing on the mirror SSD
    --from <name>         Primary SSD volume (default: ssdVolume)
    --to <name>           Mirror SSD volume (default: mirrorVolume)
  verify                  Re-hash archived files and check both stores
    --ssd <name>          Only check records on this SSD

${bold('Global Options:')}
  --dry-run               Show what would happen without changing anything
  --quiet                 Show minimal output
  --verbose               Show detailed output
  --help, -h              Show this help message
  --version, -v           Show version information

${bold('Examples:')}
  pbak dump
  pbak dump --sd EOS_DIGITAL --dry-run
  pbak upload --all
  pbak upload --date 2024/05/01
  pbak sync --to PhotoSSD-Mirror
`);
}

function showVersion() {
  console.log(`pbak v${VERSION}`);
}

/**
 * Run a parsed command and turn its result into an exit code.
 */
async function execute(
  command: Exclude<ParsedCommand, { kind: 'help' } | { kind: 'version' }>,
  config: PbakConfig,
): Promise<number> {
  switch (command.kind) {
    case 'dump': {
      const result = await dumpPhotos({ config, ...command.options });
      return result.copy.errors > 0 || result.mirror === 'failed' ? 1 : 0;
    }
    case 'upload': {
      const result = await uploadPhotos({ config, ...command.options });
      return result.failed > 0 ? 1 : 0;
    }
    case 'status':
      await showStatus({ config, version: VERSION, ...command.options });
      return 0;
    case 'rehash': {
      const result = await rebuildHashes({ config, ...command.options });
      return result.unreadable.length > 0 ? 1 : 0;
    }
    case 'sync':
      await syncMirror({ config, ...command.options });
      return 0;
    case 'verify': {
      const report = await verifyArchive({ config, ...command.options });
      return countProblems(report) > 0 ? 1 : 0;
    }
  }
}

export interface CliDependencies {
  getStateDir?: () => string;
  loadConfig?: (stateDir: string) => Promise<PbakConfig>;
}

export async function main(
  argv: string[],
  dependencies: CliDependencies = {},
): Promise<number> {
  const resolveStateDir = dependencies.getStateDir ?? (() => getStateDir());
  const readConfig = dependencies.loadConfig ?? ((dir: string) => loadConfig(dir));

  try {
    const command = parseCommand(argv);
    if (command.kind === 'help') {
      showHelp();
      return 0;
    }
    if (command.kind === 'version') {
      showVersion();
      return 0;
    }

    const config = await readConfig(resolveStateDir());
    return await execute(command, config);
  } catch (error: unknown) {
    console.error(red(`Error: ${formatError(error)}`));
    return 1;
  }
}

if (require.main === module) {
  main(process.argv.slice(2)).then(
    (code) => {
      process.exitCode = code;
    },
    (error: unknown) => {
      console.error(red(`Error: ${formatError(error)}`));
      process.exitCode = 1;
    },
  );
}
