/**
 * Shared formatting utilities for the seedtier UI
 *
 * These functions provide consistent formatting across CLI output and
 * components for bytes, scores, rates and durations.
 */

/**
 * Formats bytes into a human-readable string with appropriate units.
 *
 * @param bytes - The number of bytes to format
 * @returns Formatted string (e.g., "3.1 GB", "256 KB", "0 B")
 */
export function formatBytes(bytes: number): string {
  if (bytes <= 0 || !Number.isFinite(bytes)) return '0 B';

  const units = ['B', 'KB', 'MB', 'GB', 'TB', 'PB'];
  const base = 1024;

  const exponent = Math.floor(Math.log(bytes) / Math.log(base));
  const unitIndex = Math.min(exponent, units.length - 1);

  const value = bytes / Math.pow(base, unitIndex);

  if (unitIndex === 0) {
    return `${Math.round(value)} ${units[unitIndex]}`;
  }

  return `${value.toFixed(1)} ${units[unitIndex]}`;
}

/**
 * Formats a score with thousands grouping and at most one decimal.
 *
 * @returns Formatted string (e.g., "60,000", "1,234.5")
 */
export function formatScore(score: number): string {
  const rounded = Math.round(score * 10) / 10;
  const [whole, fraction] = rounded.toFixed(1).split('.');
  const grouped = whole.replace(/\B(?=(\d{3})+(?!\d))/g, ',');
  return fraction === '0' ? grouped : `${grouped}.${fraction}`;
}

/**
 * Formats seconds into a human-readable duration string.
 *
 * @param seconds - The number of seconds
 * @returns Formatted string (e.g., "12m 30s", "1h 30m", "2d 5h 12m")
 */
export function formatDuration(seconds: number): string {
  if (seconds < 0) {
    return '0s';
  }

  const secs = Math.floor(seconds % 60);
  const mins = Math.floor((seconds / 60) % 60);
  const hours = Math.floor((seconds / 3600) % 24);
  const days = Math.floor(seconds / 86400);

  const parts: string[] = [];

  if (days > 0) {
    parts.push(`${days}d`);
  }
  if (hours > 0) {
    parts.push(`${hours}h`);
  }
  if (mins > 0) {
    parts.push(`${mins}m`);
  }
  if (secs > 0 || parts.length === 0) {
    parts.push(`${secs}s`);
  }

  return parts.join(' ');
}

/**
 * Truncates text to a maximum length, adding ellipsis if needed.
 *
 * @param text - The text to truncate
 * @param maxLength - Maximum length including ellipsis
 * @returns Truncated string
 */
export function truncateText(text: string, maxLength: number): string {
  if (text.length <= maxLength) {
    return text;
  }
  return text.slice(0, maxLength - 1) + '…'; // ellipsis
}

/**
 * Formats an operation budget, where Infinity means unlimited.
 */
export function formatBudget(budget: number): string {
  return Number.isFinite(budget) ? String(budget) : 'unlimited';
}
