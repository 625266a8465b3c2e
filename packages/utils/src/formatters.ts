/**
 * Utility functions for formatting data
 */

/**
 * Zero-pad a non-negative integer, e.g. padNumber(7, 3) -> "007"
 */
export function padNumber(value: number, width: number = 3): string {
  return Math.trunc(value).toString().padStart(width, '0');
}

/**
 * Directory/filename label for a brightness level, e.g. 30 -> "Light_030"
 */
export function formatLightLabel(brightness: number): string {
  return `Light_${padNumber(brightness, 3)}`;
}

/**
 * Make a user supplied name safe to use as a single path segment.
 * Path separators and characters rejected by common filesystems become "_".
 */
export function sanitizePathSegment(value: string): string {
  return value
    .trim()
    .replace(/[\\/:*?"<>|\x00-\x1f]/g, '_')
    .replace(/^\.+$/, '_');
}

/**
 * Format a duration in milliseconds, e.g. 1530 -> "1.53s"
 */
export function formatDuration(ms: number): string {
  if (ms < 1000) return `${ms}ms`;
  return `${Math.round(ms / 10) / 100}s`;
}
