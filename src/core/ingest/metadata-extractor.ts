import fs from 'node:fs';
import * as exifr from 'exifr';
import { CaptureMetadata, RawDate } from '../../interfaces/ingest';

const EXIF_TAGS = ['DateTimeOriginal', 'CreateDate'];

function toRawDate(value: unknown): RawDate {
  if (typeof value === 'string' || value instanceof Date) {
    return value;
  }
  return null;
}

async function readExifDates(
  filePath: string,
): Promise<{ captureDate: RawDate; createDate: RawDate }> {
  try {
    // Unrevived values keep the camera's wall-clock string untouched
    const data: unknown = await exifr.parse(filePath, {
      pick: EXIF_TAGS,
      reviveValues: false,
    });
    if (typeof data !== 'object' || data === null) {
      return { captureDate: null, createDate: null };
    }
    return {
      captureDate: toRawDate(Reflect.get(data, 'DateTimeOriginal')),
      createDate: toRawDate(Reflect.get(data, 'CreateDate')),
    };
  } catch {
    // Videos and damaged headers carry no readable EXIF
    return { captureDate: null, createDate: null };
  }
}

async function readModifyDate(filePath: string): Promise<Date | null> {
  try {
    const stats = await fs.promises.stat(filePath);
    return stats.mtime;
  } catch {
    return null;
  }
}

/**
 * Best-effort timestamps for a file. Never throws: missing values are null.
 */
export async function extractCaptureMetadata(
  filePath: string,
): Promise<CaptureMetadata> {
  const [exif, modifyDate] = await Promise.all([
    readExifDates(filePath),
    readModifyDate(filePath),
  ]);
  return { ...exif, modifyDate };
}
