import fs from 'node:fs';
import path from 'node:path';
import { ConfigError, PreconditionError } from './errors';
import { isDirectory } from './fs-utils';

export function volumePath(volumesRoot: string, name: string): string {
  return path.join(volumesRoot, name);
}

export async function isVolumeMounted(
  volumesRoot: string,
  name: string | undefined,
): Promise<boolean> {
  if (!name) {
    return false;
  }
  return isDirectory(volumePath(volumesRoot, name));
}

/**
 * The volume named on the command line, else the configured one.
 */
export function selectVolumeName(
  override: string | undefined,
  configured: string | undefined,
  role: string,
  flag: string,
): string {
  const name = override ?? configured;
  if (!name) {
    throw new ConfigError(
      `No ${role} volume given. Use ${flag} <name> or set it in the configuration.`,
    );
  }
  return name;
}

/**
 * Resolve a named volume, failing when it is not mounted.
 */
export async function requireVolume(
  volumesRoot: string,
  name: string,
): Promise<string> {
  const mountPoint = volumePath(volumesRoot, name);
  if (!(await isDirectory(mountPoint))) {
    throw new PreconditionError(
      `Volume '${name}' is not mounted (${mountPoint} not found).`,
    );
  }
  return mountPoint;
}

export async function requireWritable(dirPath: string, label: string): Promise<void> {
  try {
    await fs.promises.access(dirPath, fs.constants.W_OK);
  } catch {
    throw new PreconditionError(`${label} is not writable (${dirPath}).`);
  }
}

export async function availableBytes(dirPath: string): Promise<number> {
  const stats = await fs.promises.statfs(dirPath);
  return stats.bavail * stats.bsize;
}
