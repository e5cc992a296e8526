/**
 * Structured logger for the seedtier engine.
 *
 * Every line carries an ISO timestamp, a level, a message and optional
 * key=value fields so the full decision trail can be reconstructed from
 * the log alone. Lines go to the console and, when configured, are also
 * appended to a log file.
 *
 * @module engine/logger
 */

import { appendFile, mkdir } from 'fs/promises';
import { dirname } from 'path';
import type { LogLevel } from './types.js';
import { expandPath } from '../utils/platform.js';

// =============================================================================
// Types
// =============================================================================

/** Values allowed in structured fields */
export type LogValue = string | number | boolean | null | undefined;

export type LogFields = Record<string, LogValue>;

export interface LoggerOptions {
  /** Minimum level written (default: info) */
  level?: LogLevel;

  /** Append lines to this file as well */
  file?: string | null;

  /** Fields bound to every line */
  fields?: LogFields;

  /** Line sink, defaults to console */
  write?: (level: LogLevel, line: string) => void;

  /** Clock, defaults to Date.now */
  now?: () => number;
}

/** Log file state shared by a logger and its children */
interface FileState {
  ready: Promise<void> | null;
  failed: boolean;
}

// =============================================================================
// Constants
// =============================================================================

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

// =============================================================================
// Helpers
// =============================================================================

/**
 * Render a field value, quoting strings that contain whitespace or quotes
 */
function formatValue(value: LogValue): string {
  if (value === null || value === undefined) return '-';
  if (typeof value !== 'string') return String(value);
  if (value === '' || /[\s"=]/.test(value)) {
    return JSON.stringify(value);
  }
  return value;
}

/**
 * Format fields as `key=value` pairs, skipping undefined values
 */
export function formatFields(fields: LogFields): string {
  return Object.entries(fields)
    .filter(([, value]) => value !== undefined)
    .map(([key, value]) => `${key}=${formatValue(value)}`)
    .join(' ');
}

function consoleWrite(level: LogLevel, line: string): void {
  if (level === 'error') {
    console.error(line);
  } else if (level === 'warn') {
    console.warn(line);
  } else {
    console.log(line);
  }
}

// =============================================================================
// Logger Class
// =============================================================================

/**
 * Level-filtered structured logger
 *
 * @example
 * ```typescript
 * const logger = new Logger({ level: 'info', file: '~/.seedtier/seedtier.log' });
 * const cycleLog = logger.child({ cycle: 3 });
 * cycleLog.info('would promote', { id: 'abc', score: 60000 });
 * // [2024-01-01T00:00:00.000Z] INFO would promote cycle=3 id=abc score=60000
 * ```
 */
export class Logger {
  private readonly level: LogLevel;
  private readonly file: string | null;
  private readonly fields: LogFields;
  private readonly write: (level: LogLevel, line: string) => void;
  private readonly now: () => number;

  /** Shared between a logger and its children so the failure is reported once */
  private readonly fileState: FileState;

  constructor(options: LoggerOptions = {}, fileState?: FileState) {
    this.level = options.level ?? 'info';
    this.file = options.file ? expandPath(options.file) : null;
    this.fields = options.fields ?? {};
    this.write = options.write ?? consoleWrite;
    this.now = options.now ?? Date.now;
    this.fileState = fileState ?? { ready: null, failed: false };
  }

  /**
   * Create a logger that adds the given fields to every line
   */
  child(fields: LogFields): Logger {
    return new Logger(
      {
        level: this.level,
        file: this.file,
        fields: { ...this.fields, ...fields },
        write: this.write,
        now: this.now,
      },
      this.fileState
    );
  }

  debug(message: string, fields?: LogFields): void {
    this.log('debug', message, fields);
  }

  info(message: string, fields?: LogFields): void {
    this.log('info', message, fields);
  }

  warn(message: string, fields?: LogFields): void {
    this.log('warn', message, fields);
  }

  error(message: string, fields?: LogFields): void {
    this.log('error', message, fields);
  }

  /**
   * Whether lines at this level are written
   */
  isEnabled(level: LogLevel): boolean {
    return LEVEL_ORDER[level] >= LEVEL_ORDER[this.level];
  }

  /**
   * Wait until all pending file writes have settled
   */
  async flush(): Promise<void> {
    if (this.fileState.ready) {
      await this.fileState.ready;
    }
  }

  private log(level: LogLevel, message: string, fields?: LogFields): void {
    if (!this.isEnabled(level)) {
      return;
    }

    const rendered = formatFields({ ...this.fields, ...fields });
    const timestamp = new Date(this.now()).toISOString();
    const line = `[${timestamp}] ${level.toUpperCase()} ${message}${rendered ? ` ${rendered}` : ''}`;

    this.write(level, line);

    if (this.file && !this.fileState.failed) {
      this.appendToFile(this.file, line);
    }
  }

  /**
   * Serialize appends so lines keep their order in the file
   */
  private appendToFile(file: string, line: string): void {
    const previous = this.fileState.ready ?? mkdir(dirname(file), { recursive: true }).then(() => undefined);
    this.fileState.ready = previous
      .then(() => appendFile(file, line + '\n'))
      .catch((err: unknown) => {
        if (!this.fileState.failed) {
          this.fileState.failed = true;
          console.error(`Log file ${file} is not writable: ${(err as Error).message}`);
        }
      });
  }
}

/**
 * Logger that discards every line, for callers that do not care
 */
export function createSilentLogger(): Logger {
  return new Logger({ level: 'error', write: () => undefined });
}
