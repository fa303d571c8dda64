/**
 * File system helpers shared by the stores and the scanners
 */

import fs from 'node:fs';
import path from 'node:path';

/**
 * Parse a JSON file, or return undefined when it does not exist.
 * Invalid JSON is an error: a damaged config must not silently reset.
 */
export async function readJsonFile(filePath: string): Promise<unknown> {
  let data: string;
  try {
    data = await fs.promises.readFile(filePath, 'utf8');
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
      return undefined;
    }
    throw error;
  }
  return JSON.parse(data);
}

/**
 * Replace a file's contents through a temporary sibling and a rename,
 * so readers see either the old or the new file and never a partial one.
 */
export async function writeFileAtomic(
  filePath: string,
  contents: string,
  mode: number = 0o600,
): Promise<void> {
  const tmpPath = `${filePath}.tmp-${process.pid}`;
  await fs.promises.writeFile(tmpPath, contents, { encoding: 'utf8', mode });
  try {
    await fs.promises.rename(tmpPath, filePath);
  } catch (error) {
    await fs.promises.rm(tmpPath, { force: true });
    throw error;
  }
}

/**
 * Read a text file. A missing file reads as empty.
 */
export async function readText(filePath: string): Promise<string> {
  try {
    return await fs.promises.readFile(filePath, 'utf8');
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
      return '';
    }
    throw error;
  }
}

export function splitLines(text: string): string[] {
  return text.split('\n').filter((line) => line.trim().length > 0);
}

/**
 * Read a line-oriented log. A missing file reads as empty.
 */
export async function readLines(filePath: string): Promise<string[]> {
  return splitLines(await readText(filePath));
}

export async function fileSize(filePath: string): Promise<number> {
  try {
    const stats = await fs.promises.stat(filePath);
    return stats.size;
  } catch {
    return 0;
  }
}

export async function pathExists(filePath: string): Promise<boolean> {
  try {
    await fs.promises.access(filePath);
    return true;
  } catch {
    return false;
  }
}

export async function isDirectory(dirPath: string): Promise<boolean> {
  try {
    const stats = await fs.promises.stat(dirPath);
    return stats.isDirectory();
  } catch {
    return false;
  }
}

export interface WalkOptions {
  skipHidden?: boolean;
}

/**
 * Yield every regular file under `root` in sorted, depth-first order.
 * Each call starts a fresh walk.
 */
export async function* walkFiles(
  root: string,
  options: WalkOptions = {},
): AsyncGenerator<string> {
  const skipHidden = options.skipHidden ?? true;
  const entries = await fs.promises.readdir(root, { withFileTypes: true });
  entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));

  for (const entry of entries) {
    if (skipHidden && entry.name.startsWith('.')) {
      continue;
    }
    const fullPath = path.join(root, entry.name);
    if (entry.isDirectory()) {
      yield* walkFiles(fullPath, options);
    } else if (entry.isFile()) {
      yield fullPath;
    }
  }
}

export async function collectFiles(
  root: string,
  options: WalkOptions = {},
): Promise<string[]> {
  const files: string[] = [];
  for await (const file of walkFiles(root, options)) {
    files.push(file);
  }
  return files;
}

/**
 * Directories exactly `depth` levels below `root`, sorted by relative path.
 */
export async function listDirectoriesAtDepth(
  root: string,
  depth: number,
): Promise<string[]> {
  let level: string[] = [root];
  for (let i = 0; i < depth; i++) {
    const next: string[] = [];
    for (const dir of level) {
      const entries = await fs.promises.readdir(dir, { withFileTypes: true });
      for (const entry of entries) {
        if (entry.isDirectory() && !entry.name.startsWith('.')) {
          next.push(path.join(dir, entry.name));
        }
      }
    }
    level = next;
  }
  return level.sort();
}
