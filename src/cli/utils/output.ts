/**
 * CLI output utilities for seedtier commands.
 *
 * Provides shared formatting and output helpers for consistent
 * command-line output across all CLI commands.
 *
 * @module cli/utils/output
 */

import {
  formatBytes,
  formatBudget,
  formatDuration,
  formatScore,
  truncateText,
} from '../../ui/utils/format.js';

// Re-export formatting utilities for convenience
export { formatBytes, formatBudget, formatDuration, formatScore, truncateText };

// =============================================================================
// Status Colors and Formatting
// =============================================================================

/**
 * ANSI color codes for terminal output
 */
export const ansiColors = {
  reset: '\x1b[0m',
  bold: '\x1b[1m',
  dim: '\x1b[2m',

  // Foreground colors
  red: '\x1b[31m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  blue: '\x1b[34m',
  magenta: '\x1b[35m',
  cyan: '\x1b[36m',
  white: '\x1b[37m',
  gray: '\x1b[90m',
} as const;

/**
 * Apply ANSI color to text
 */
export function colorize(text: string, color: string): string {
  return `${color}${text}${ansiColors.reset}`;
}

// =============================================================================
// Table Formatting
// =============================================================================

/**
 * Column definition for table formatting
 */
export interface TableColumn {
  /** Column header text */
  header: string;
  /** Column width */
  width: number;
  /** Alignment: 'left' | 'right' | 'center' */
  align?: 'left' | 'right' | 'center';
}

/**
 * Pad text to a fixed width with alignment
 */
export function padText(
  text: string,
  width: number,
  align: 'left' | 'right' | 'center' = 'left'
): string {
  const truncated = text.length > width ? truncateText(text, width) : text;
  const padding = width - truncated.length;

  if (padding <= 0) return truncated;

  switch (align) {
    case 'right':
      return ' '.repeat(padding) + truncated;
    case 'center': {
      const leftPad = Math.floor(padding / 2);
      const rightPad = padding - leftPad;
      return ' '.repeat(leftPad) + truncated + ' '.repeat(rightPad);
    }
    default:
      return truncated + ' '.repeat(padding);
  }
}

/**
 * Format a table header row
 */
export function formatTableHeader(columns: TableColumn[]): string {
  const headerParts = columns.map((col) =>
    padText(col.header, col.width, col.align)
  );
  const header = headerParts.join(' | ');
  const separator = columns.map((col) => '-'.repeat(col.width)).join('-+-');
  return `${header}\n${separator}`;
}

/**
 * Format a table row
 */
export function formatTableRow(
  values: string[],
  columns: TableColumn[]
): string {
  const cells = values.map((val, i) => {
    const col = columns[i];
    return padText(val, col.width, col.align);
  });
  return cells.join(' | ');
}

// =============================================================================
// Message Formatting
// =============================================================================

/**
 * Format a success message
 */
export function successMessage(message: string): string {
  return colorize(`[OK] ${message}`, ansiColors.green);
}

/**
 * Format an error message
 */
export function errorMessage(message: string): string {
  return colorize(`[ERROR] ${message}`, ansiColors.red);
}

/**
 * Format an info message
 */
export function infoMessage(message: string): string {
  return colorize(`[INFO] ${message}`, ansiColors.cyan);
}

/**
 * Format a warning message
 */
export function warnMessage(message: string): string {
  return colorize(`[WARN] ${message}`, ansiColors.yellow);
}

// =============================================================================
// Key-Value Display
// =============================================================================

/**
 * Format a key-value pair for display
 */
export function formatKeyValue(
  key: string,
  value: string,
  keyWidth: number = 15
): string {
  return `${colorize(padText(key + ':', keyWidth), ansiColors.dim)} ${value}`;
}

/**
 * Format multiple key-value pairs as a block
 */
export function formatInfoBlock(
  pairs: Array<[string, string]>,
  keyWidth: number = 15
): string {
  return pairs
    .map(([key, value]) => formatKeyValue(key, value, keyWidth))
    .join('\n');
}
