/**
 * Upload tracking related interfaces and types
 */

/** Pending is never stored: it is the absence of a record. */
export type UploadStatus = 'in_progress' | 'uploaded' | 'failed';

export interface UploadStateRecord {
  status: UploadStatus;
  /** Bucket key such as "2024/05/01" */
  unitKey: string;
  timestamp: string;
  fileCount: number;
  /** Empty while in progress, otherwise the client's exit code */
  exitIndicator: string;
}

/**
 * A dated archive folder, the unit of upload tracking
 */
export interface TransferUnit {
  key: string;
  path: string;
}

export interface StatusTotals {
  units: number;
  files: number;
}

export type UploadSummary = Record<UploadStatus, StatusTotals>;
