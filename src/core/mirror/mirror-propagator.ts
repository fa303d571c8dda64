import * as logger from '../../utils/logger';
import {
  CommandRunner,
  isToolAvailable,
  runCommand,
} from '../process/command-runner';

export const MIRROR_TOOL = 'rsync';

export interface MirrorResult {
  success: boolean;
  exitCode: number;
  error?: string;
}

export interface MirrorPropagatorOptions {
  runner?: CommandRunner;
  verbosity?: number;
}

/** A trailing slash makes rsync copy the contents, not the directory. */
function asContentsPath(dir: string): string {
  return dir.endsWith('/') ? dir : `${dir}/`;
}

/**
 * One-way additive replication of the archive. Existing mirror files are
 * never deleted or overwritten, so a converged mirror copies nothing.
 */
export function createMirrorPropagator(options: MirrorPropagatorOptions = {}) {
  const runner = options.runner ?? runCommand;
  const verbosity = options.verbosity ?? logger.Verbosity.Normal;

  const buildArgs = (
    primaryRoot: string,
    mirrorRoot: string,
    dryRun: boolean,
  ): string[] => {
    const args = ['-a', '--ignore-existing'];
    if (verbosity >= logger.Verbosity.Normal) {
      args.push('-v', '--progress');
    }
    if (dryRun) {
      args.push('--dry-run');
    }
    args.push(asContentsPath(primaryRoot), asContentsPath(mirrorRoot));
    return args;
  };

  const propagate = async (
    primaryRoot: string,
    mirrorRoot: string,
    { dryRun = false }: { dryRun?: boolean } = {},
  ): Promise<MirrorResult> => {
    const args = buildArgs(primaryRoot, mirrorRoot, dryRun);
    logger.verbose(`Running: ${MIRROR_TOOL} ${args.join(' ')}`, verbosity);

    const result = await runner(MIRROR_TOOL, args, {
      stdio: verbosity >= logger.Verbosity.Normal ? 'inherit' : 'ignore',
    });
    return {
      success: result.exitCode === 0,
      exitCode: result.exitCode,
      ...(result.error ? { error: result.error } : {}),
    };
  };

  const isAvailable = (): Promise<boolean> =>
    isToolAvailable(MIRROR_TOOL, ['--version'], runner);

  return { propagate, buildArgs, isAvailable };
}

export type MirrorPropagator = ReturnType<typeof createMirrorPropagator>;
