/**
 * Dedup store related interfaces and types
 */

/** Source path recorded for content indexed by a rebuild. */
export const UNKNOWN_ORIGIN = 'unknown-origin';

/**
 * One archived piece of content. Created once, never edited.
 */
export interface ContentRecord {
  digest: string;
  /** Advisory only; UNKNOWN_ORIGIN after a rebuild */
  sourcePath: string;
  destPath: string;
  recordedAt: string;
  size: number;
}
