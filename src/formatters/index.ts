const KB = 1024;
const MB = KB * 1024;
const GB = MB * 1024;

/**
 * Format a byte count for progress logs.
 *
 * @example formatBytes(500) → "500 B"
 * @example formatBytes(1536) → "1.5 KB"
 * @example formatBytes(1572864) → "1.5 MB"
 */
export function formatBytes(bytes: number): string {
  if (bytes < KB) return `${bytes} B`;
  if (bytes < MB) return `${(bytes / KB).toFixed(1)} KB`;
  if (bytes < GB) return `${(bytes / MB).toFixed(1)} MB`;
  return `${(bytes / GB).toFixed(2)} GB`;
}

/**
 * Count with a singular or plural noun.
 *
 * @example pluralize(1, "mod") → "1 mod"
 * @example pluralize(3, "mod") → "3 mods"
 */
export function pluralize(count: number, noun: string): string {
  return `${count} ${noun}${count === 1 ? "" : "s"}`;
}
