/**
 * Formatting utilities for durations, sizes and scores.
 */

/**
 * Format a duration given in milliseconds.
 * Switches unit at one minute and one hour: `2.50 s`, `1.5 min`, `1.25 hr`.
 */
export function formatDuration(ms: number): string {
  const seconds = ms / 1000;
  if (seconds >= 3600) {
    return `${(seconds / 3600).toFixed(2)} hr`;
  }
  if (seconds >= 60) {
    return `${(seconds / 60).toFixed(1)} min`;
  }
  return `${seconds.toFixed(2)} s`;
}

const SIZE_UNITS = ['B', 'KiB', 'MiB', 'GiB'];

/**
 * Format a byte count with a binary unit: `512 B`, `1.5 KiB`.
 */
export function formatBytes(bytes: number): string {
  let value = bytes;
  let unit = 0;
  while (value >= 1024 && unit < SIZE_UNITS.length - 1) {
    value /= 1024;
    unit++;
  }
  return unit === 0 ? `${value} B` : `${value.toFixed(1)} ${SIZE_UNITS[unit]}`;
}

/**
 * Format a score with at most one decimal place.
 */
export function formatScore(score: number): string {
  return Number.isInteger(score) ? String(score) : score.toFixed(1);
}

/**
 * Pluralize a noun for a count: `1 file`, `2 files`.
 */
export function pluralize(count: number, noun: string, plural = `${noun}s`): string {
  return `${count} ${count === 1 ? noun : plural}`;
}
