import os from 'node:os';
import path from 'node:path';
import fs from 'node:fs';

/**
 * Resolve (and create) the directory holding configuration, stores and logs.
 */
export function getStateDir(env: NodeJS.ProcessEnv = process.env): string {
  const configHome =
    env.XDG_CONFIG_HOME && env.XDG_CONFIG_HOME.trim().length > 0
      ? env.XDG_CONFIG_HOME
      : path.join(os.homedir(), '.config');
  const dir = path.join(configHome, 'pbak');
  if (!fs.existsSync(dir)) {
    fs.mkdirSync(dir, { recursive: true, mode: 0o700 });
  }
  const stats = fs.statSync(dir);
  if (!stats.isDirectory()) {
    throw new Error(`State path is not a directory: ${dir}`);
  }
  fs.chmodSync(dir, 0o700);
  return dir;
}
