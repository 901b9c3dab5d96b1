/**
 * Pure utility functions shared across codedrop packages.
 */

/** Generate a random ID (nanoid-style, no deps) */
export function generateId(length = 21): string {
  const chars = 'ABCDEFGHIJKLMNOPQRSTUVWXYZabcdefghijklmnopqrstuvwxyz0123456789_-';
  const bytes = crypto.getRandomValues(new Uint8Array(length));
  let id = '';
  for (let i = 0; i < length; i++) {
    id += chars[(bytes[i] ?? 0) & 63];
  }
  return id;
}

/** Truncate a string to a max length, adding ellipsis */
export function truncate(str: string, maxLength: number): string {
  if (str.length <= maxLength) return str;
  return str.slice(0, maxLength - 3) + '...';
}

/**
 * Human-readable byte count using binary units.
 *
 *   formatBytes(512)       -> "512 B"
 *   formatBytes(1536)      -> "1.5 KB"
 *   formatBytes(5242880)   -> "5.0 MB"
 */
export function formatBytes(bytes: number): string {
  if (bytes < 1024) return `${bytes} B`;
  const units = ['KB', 'MB', 'GB', 'TB'];
  let value = bytes / 1024;
  let unit = 0;
  while (value >= 1024 && unit < units.length - 1) {
    value /= 1024;
    unit++;
  }
  return `${value.toFixed(1)} ${units[unit]}`;
}
