import path from 'node:path';
import { walkFiles } from '../../utils/fs-utils';
import { normalizeExtension } from '../config/config';
import { ExtensionFilter } from '../../interfaces/ingest';

/**
 * Whether a file name passes the filter. Include is applied first (when
 * non-empty), exclude second, so a conflict always excludes.
 */
export function matchesExtensionFilter(
  filePath: string,
  filter: ExtensionFilter,
): boolean {
  const ext = path.extname(filePath).toLowerCase();
  const include = filter.include.map(normalizeExtension);
  const exclude = filter.exclude.map(normalizeExtension);

  if (include.length > 0 && !include.includes(ext)) {
    return false;
  }
  if (exclude.length > 0 && exclude.includes(ext)) {
    return false;
  }
  return true;
}

/**
 * Lazily yield the files under `root` that pass the extension filter,
 * in sorted directory order. Hidden entries are skipped.
 */
export async function* scanFiles(
  root: string,
  filter: ExtensionFilter,
): AsyncGenerator<string> {
  for await (const filePath of walkFiles(path.resolve(root))) {
    if (matchesExtensionFilter(filePath, filter)) {
      yield filePath;
    }
  }
}
