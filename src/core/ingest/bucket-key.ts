import * as logger from '../../utils/logger';
import {
  BucketDate,
  MetadataExtractor,
  RawDate,
} from '../../interfaces/ingest';
import { extractCaptureMetadata } from './metadata-extractor';

const MIN_YEAR = 1900;
const EXIF_DATE_PATTERN = /^(\d{4})[:-](\d{2})[:-](\d{2})/;

export interface BucketKeyOptions {
  extractor?: MetadataExtractor;
  now?: () => Date;
  verbosity?: number;
}

function daysInMonth(year: number, month: number): number {
  return new Date(Date.UTC(year, month, 0)).getUTCDate();
}

/**
 * Reject zeroed sentinels ("0000:00:00") and impossible calendar dates.
 */
export function isPlausibleDate(date: BucketDate): boolean {
  return (
    Number.isInteger(date.year) &&
    date.year >= MIN_YEAR &&
    date.month >= 1 &&
    date.month <= 12 &&
    date.day >= 1 &&
    date.day <= daysInMonth(date.year, date.month)
  );
}

/**
 * Calendar date of a raw timestamp, or null when it is missing or unusable.
 * EXIF strings are wall-clock values and are read as written; Date values
 * use the local calendar.
 */
export function parseBucketDate(value: RawDate): BucketDate | null {
  let date: BucketDate;

  if (value instanceof Date) {
    if (Number.isNaN(value.getTime())) {
      return null;
    }
    date = {
      year: value.getFullYear(),
      month: value.getMonth() + 1,
      day: value.getDate(),
    };
  } else if (typeof value === 'string') {
    const match = EXIF_DATE_PATTERN.exec(value.trim());
    if (!match) {
      return null;
    }
    date = {
      year: Number(match[1]),
      month: Number(match[2]),
      day: Number(match[3]),
    };
  } else {
    return null;
  }

  return isPlausibleDate(date) ? date : null;
}

export function formatBucketKey(date: BucketDate): string {
  const pad = (n: number) => String(n).padStart(2, '0');
  return `${date.year}/${pad(date.month)}/${pad(date.day)}`;
}

/**
 * Resolve the `YYYY/MM/DD` bucket of a file from its capture date, then its
 * creation date, then its modification time, then today's UTC date.
 */
export function createBucketKeyResolver(options: BucketKeyOptions = {}) {
  const extractor = options.extractor ?? extractCaptureMetadata;
  const now = options.now ?? (() => new Date());
  const verbosity = options.verbosity ?? logger.Verbosity.Normal;

  const bucketKeyFor = async (filePath: string): Promise<string> => {
    const metadata = await extractor(filePath);
    const candidates: Array<[string, RawDate]> = [
      ['capture date', metadata.captureDate],
      ['creation date', metadata.createDate],
      ['modification time', metadata.modifyDate],
    ];

    for (const [label, value] of candidates) {
      const date = parseBucketDate(value);
      if (date) {
        return formatBucketKey(date);
      }
      logger.verbose(`No usable ${label} for ${filePath}`, verbosity);
    }

    const today = now();
    logger.verbose(`Falling back to today's date for ${filePath}`, verbosity);
    return formatBucketKey({
      year: today.getUTCFullYear(),
      month: today.getUTCMonth() + 1,
      day: today.getUTCDate(),
    });
  };

  return { bucketKeyFor };
}

export type BucketKeyResolver = ReturnType<typeof createBucketKeyResolver>;
