import os from 'node:os';

/**
 * Number of hashing workers: the requested count when it is a positive
 * integer, otherwise one per CPU.
 */
export function getOptimalConcurrency(requested?: number): number {
  if (requested !== undefined && Number.isInteger(requested) && requested > 0) {
    return requested;
  }
  return Math.max(1, os.cpus().length);
}
