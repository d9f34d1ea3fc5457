/**
 * Logger for benchquiet
 *
 * Used by the quiescing core for progress and failure lines. Supports
 * human-readable and JSON output modes.
 */

import type { BenchquietError } from '../core/errors.js';

/**
 * Output mode for the logger
 */
export type OutputMode = 'human' | 'json' | 'silent';

/**
 * Log level for messages
 */
export type LogLevel = 'info' | 'success' | 'warning' | 'error';

/**
 * Host step kinds the core reports
 */
export type StepKind = 'probe' | 'stop' | 'start' | 'skip' | 'wait' | 'flag';

/**
 * A single recorded log line (JSON mode)
 */
export interface LogEntry {
  level: LogLevel;
  message: string;
  code?: string;
}

const STEP_SYMBOLS: Record<StepKind, string> = {
  probe: '?',
  stop: '⏹',
  start: '▶',
  skip: '·',
  wait: '⏳',
  flag: '⚑',
};

/**
 * Logger class supporting human-readable, JSON and silent modes.
 *
 * Human mode prints each line as it goes. JSON mode collects
 * entries so the CLI can attach them to its single JSON document. Silent
 * mode drops everything.
 */
export class Logger {
  private readonly mode: OutputMode;
  private readonly entries: LogEntry[] = [];

  constructor(mode: OutputMode = 'human') {
    this.mode = mode;
  }

  private record(level: LogLevel, message: string, code?: string): void {
    if (this.mode === 'json') {
      this.entries.push(code ? { level, message, code } : { level, message });
    }
  }

  success(message: string): void {
    if (this.mode === 'human') {
      console.log(`✓ ${message}`);
    }
    this.record('success', message);
  }

  /**
   * Log an error. The optional error supplies a code and a suggested fix.
   */
  error(message: string, error?: BenchquietError): void {
    if (this.mode === 'human') {
      console.error(`✗ ${message}`);
      if (error?.suggestion) {
        console.error(`  Fix: ${error.suggestion}`);
      }
    }
    this.record('error', message, error?.code);
  }

  info(message: string): void {
    if (this.mode === 'human') {
      console.log(message);
    }
    this.record('info', message);
  }

  warning(message: string): void {
    if (this.mode === 'human') {
      console.warn(`⚠ ${message}`);
    }
    this.record('warning', message);
  }

  /**
   * Log one host step, e.g. `⏹ stop: WSearch, SysMain`.
   */
  step(kind: StepKind, description: string): void {
    if (this.mode === 'human') {
      console.log(`${STEP_SYMBOLS[kind]} ${kind}: ${description}`);
    }
    this.record('info', `${kind}: ${description}`);
  }

  /**
   * Entries collected in JSON mode.
   */
  getEntries(): LogEntry[] {
    return this.entries;
  }
}

/**
 * Global logger instance.
 *
 * Core components default to it; the CLI replaces it per command.
 */
export let logger = new Logger();

/**
 * Create and set a new logger with the specified mode.
 */
export function configureLogger(mode: OutputMode): Logger {
  logger = new Logger(mode);
  return logger;
}
