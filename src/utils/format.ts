const KB = 1024;
const MB = KB * 1024;
const GB = MB * 1024;

/**
 * Human-readable size with one truncated decimal, e.g. "1.5 GB".
 */
export function humanSize(bytes: number): string {
  const units: Array<[number, string]> = [
    [GB, 'GB'],
    [MB, 'MB'],
    [KB, 'KB'],
  ];
  for (const [unit, label] of units) {
    if (bytes >= unit) {
      const whole = Math.floor(bytes / unit);
      const tenth = Math.floor(((bytes % unit) * 10) / unit);
      return `${whole}.${tenth} ${label}`;
    }
  }
  return `${bytes} B`;
}

/**
 * Shows only the first characters of a secret.
 */
export function maskSecret(secret: string | undefined, visible: number = 8): string {
  if (!secret) {
    return '<not set>';
  }
  return `${secret.slice(0, visible)}...`;
}
