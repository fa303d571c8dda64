/**
 * Transfer ingest related interfaces and types
 */

/**
 * Extension filter applied while scanning a source tree.
 * Extensions are compared lower-cased with a leading dot.
 */
export interface ExtensionFilter {
  include: readonly string[];
  exclude: readonly string[];
}

/**
 * A date candidate as read from a file: an EXIF string such as
 * "2024:05:01 10:00:00", a Date, or null when absent.
 */
export type RawDate = string | Date | null;

/**
 * Timestamps available for a file, most trusted first
 */
export interface CaptureMetadata {
  captureDate: RawDate;
  createDate: RawDate;
  /** Filesystem modification time */
  modifyDate: Date | null;
}

export type MetadataExtractor = (filePath: string) => Promise<CaptureMetadata>;

/**
 * Calendar date of a bucket, month and day 1-based
 */
export interface BucketDate {
  year: number;
  month: number;
  day: number;
}
