/**
 * Error Types for benchquiet
 *
 * Custom error classes with error codes for structured error handling in
 * the CLI layer. The quiescing core itself reports through results, not
 * exceptions.
 */

import type { CancelReason } from './types.js';

/**
 * Error codes for all benchquiet errors
 */
export type ErrorCode =
  | 'CONFIG_NOT_FOUND'
  | 'CONFIG_INVALID_YAML'
  | 'CONFIG_VALIDATION_FAILED'
  | 'SNAPSHOT_NOT_FOUND'
  | 'SNAPSHOT_CORRUPTED'
  | 'SNAPSHOT_EXISTS'
  | 'SNAPSHOT_WRITE_FAILED'
  | 'PRECONDITION_FAILED'
  | 'PERMISSION_DENIED'
  | 'HOST_ERROR'
  | 'OPERATION_CANCELLED';

/**
 * Mapping of error codes to exit codes
 */
export const EXIT_CODES: Record<ErrorCode, number> = {
  CONFIG_NOT_FOUND: 1,
  CONFIG_INVALID_YAML: 1,
  CONFIG_VALIDATION_FAILED: 1,
  SNAPSHOT_NOT_FOUND: 1,
  SNAPSHOT_CORRUPTED: 2,
  SNAPSHOT_EXISTS: 1,
  SNAPSHOT_WRITE_FAILED: 2,
  PRECONDITION_FAILED: 3,
  PERMISSION_DENIED: 3,
  HOST_ERROR: 2,
  OPERATION_CANCELLED: 3,
};

/**
 * Base error class for all benchquiet errors.
 */
export class BenchquietError extends Error {
  constructor(
    message: string,
    public readonly code: ErrorCode,
    public readonly suggestion?: string
  ) {
    super(message);
    this.name = 'BenchquietError';
    Object.setPrototypeOf(this, BenchquietError.prototype);
  }

  get exitCode(): number {
    return EXIT_CODES[this.code];
  }

  /**
   * Format the error for display.
   */
  format(): string {
    let output = `Error: ${this.message}`;
    if (this.suggestion) {
      output += `\n\nFix: ${this.suggestion}`;
    }
    return output;
  }
}

/**
 * Error for configuration-related issues.
 */
export class ConfigError extends BenchquietError {
  constructor(
    message: string,
    code: 'CONFIG_NOT_FOUND' | 'CONFIG_INVALID_YAML' | 'CONFIG_VALIDATION_FAILED',
    suggestion?: string,
    public readonly path?: string,
    public readonly validationErrors?: Array<{
      path: string;
      message: string;
    }>
  ) {
    super(message, code, suggestion);
    this.name = 'ConfigError';
    Object.setPrototypeOf(this, ConfigError.prototype);
  }

  override format(): string {
    let output = super.format();
    if (this.validationErrors && this.validationErrors.length > 0) {
      output += '\n\nValidation errors:';
      for (const error of this.validationErrors) {
        output += `\n  - ${error.path}: ${error.message}`;
      }
    }
    return output;
  }
}

/**
 * Error for snapshot-file issues.
 */
export class SnapshotError extends BenchquietError {
  constructor(
    message: string,
    code: 'SNAPSHOT_NOT_FOUND' | 'SNAPSHOT_CORRUPTED' | 'SNAPSHOT_EXISTS' | 'SNAPSHOT_WRITE_FAILED',
    suggestion?: string,
    public readonly snapshotPath?: string
  ) {
    super(message, code, suggestion);
    this.name = 'SnapshotError';
    Object.setPrototypeOf(this, SnapshotError.prototype);
  }
}

/**
 * Exit code for a cancelled disable/enable.
 */
export function getCancelExitCode(reason: CancelReason): number {
  return EXIT_CODES[reason === 'guard-refused' ? 'PRECONDITION_FAILED' : 'OPERATION_CANCELLED'];
}

/**
 * Check if an error is a BenchquietError.
 */
export function isBenchquietError(error: unknown): error is BenchquietError {
  return error instanceof BenchquietError;
}

/**
 * Get the exit code for any error.
 */
export function getExitCode(error: unknown): number {
  if (isBenchquietError(error)) {
    return error.exitCode;
  }
  return 2;
}

/**
 * Message of any thrown value.
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
