/**
 * CLI Output Layer
 *
 * Consistent output formatting for CLI commands in both human-readable
 * and JSON modes.
 */

import type { BenchquietError, ErrorCode } from '../core/errors.js';
import type {
  CancelReason,
  QuiescePlan,
  RestoreReport,
  Snapshot,
} from '../core/types.js';
import type { ResolvedConfig } from '../config/types.js';
import type { SnapshotFile } from '../state/types.js';
import { formatValidationErrors } from '../config/validator.js';
import type { LogEntry, Logger } from '../lib/logger.js';

// =============================================================================
// Output Types
// =============================================================================

/**
 * Standard output format for --json mode
 */
export interface CommandResult {
  success: boolean;
  command: string;
  data?: unknown;
  cancelled?: { reason: CancelReason; message: string };
  error?: ErrorOutput;
  summary?: Record<string, number>;
  log?: LogEntry[];
}

/**
 * Error output format for JSON mode
 */
export interface ErrorOutput {
  code: ErrorCode | string;
  message: string;
  suggestion?: string;
  details?: Record<string, unknown>;
}

/**
 * Output mode for the formatter
 */
export type OutputMode = 'human' | 'json';

function yesNo(value: boolean): string {
  return value ? 'yes' : 'no';
}

function plural(count: number, noun: 'service' | 'process'): string {
  return `${count} ${noun}${count === 1 ? '' : noun === 'process' ? 'es' : 's'}`;
}

/**
 * CLI-specific output formatter.
 *
 * In JSON mode, output is collected and emitted as a single JSON object
 * at flush, together with the core's log entries.
 */
export class OutputFormatter {
  private readonly mode: OutputMode;
  private readonly result: CommandResult;
  private indentLevel: number = 0;
  private logger: Logger | null = null;

  constructor(command: string, options: { json?: boolean } = {}) {
    this.mode = options.json ? 'json' : 'human';
    this.result = {
      success: true,
      command,
    };
  }

  /**
   * Attach the logger whose entries go into the JSON document.
   */
  attachLogger(logger: Logger): void {
    this.logger = logger;
  }

  // ===========================================================================
  // Basic Output Methods
  // ===========================================================================

  indent(): void {
    this.indentLevel++;
  }

  dedent(): void {
    if (this.indentLevel > 0) {
      this.indentLevel--;
    }
  }

  private getIndent(): string {
    return '  '.repeat(this.indentLevel);
  }

  success(message: string): void {
    if (this.mode === 'human') {
      console.log(`${this.getIndent()}✓ ${message}`);
    }
  }

  error(message: string, error?: BenchquietError): void {
    this.result.success = false;

    if (this.mode === 'human') {
      console.error(`${this.getIndent()}✗ ${message}`);
      if (error?.suggestion) {
        console.error(`${this.getIndent()}  Fix: ${error.suggestion}`);
      }
    }

    this.result.error = {
      code: error?.code ?? 'UNKNOWN',
      message,
      suggestion: error?.suggestion,
    };
  }

  info(message: string): void {
    if (this.mode === 'human') {
      console.log(`${this.getIndent()}${message}`);
    }
  }

  warning(message: string): void {
    if (this.mode === 'human') {
      console.warn(`${this.getIndent()}⚠ ${message}`);
    }
  }

  newline(): void {
    if (this.mode === 'human') {
      console.log();
    }
  }

  /**
   * Print a table of data.
   */
  table(headers: string[], rows: string[][]): void {
    if (this.mode !== 'human') {
      return;
    }

    const widths = headers.map((h, i) =>
      Math.max(h.length, ...rows.map((r) => (r[i] ?? '').length))
    );
    const line = (cells: string[]): string =>
      cells.map((cell, i) => cell.padEnd(widths[i] ?? 0)).join('  ').trimEnd();

    console.log(`${this.getIndent()}${line(headers)}`);
    for (const row of rows) {
      console.log(`${this.getIndent()}${line(row)}`);
    }
  }

  // ===========================================================================
  // Validate Output
  // ===========================================================================

  validationSuccess(config: ResolvedConfig): void {
    if (this.mode === 'human') {
      this.success('Configuration valid');
      this.indent();
      this.info(`Services: ${config.catalog.services.length} (${config.catalog.services.join(', ') || 'none'})`);
      this.info(`Processes: ${config.catalog.processes.length} (${config.catalog.processes.join(', ') || 'none'})`);
      this.info(`Snapshot: ${config.snapshotPath}`);
      this.dedent();
    }

    this.result.summary = {
      services: config.catalog.services.length,
      processes: config.catalog.processes.length,
    };
  }

  validationError(errors: Array<{ path: string; message: string }>): void {
    this.result.success = false;

    if (this.mode === 'human') {
      this.error('Configuration invalid');
      this.newline();
      console.log(formatValidationErrors(errors));
    }

    this.result.error = {
      code: 'CONFIG_VALIDATION_FAILED',
      message: 'Configuration validation failed',
      details: { errors },
    };
  }

  // ===========================================================================
  // Quiesce Output
  // ===========================================================================

  /**
   * Print what disable would do.
   */
  planSummary(plan: QuiescePlan): void {
    if (this.mode === 'human') {
      this.info(`Task Scheduler flag: ${plan.schedulerFlag}`);
      this.newline();
      this.table(
        ['SERVICE', 'EXISTS', 'RUNNING'],
        plan.services.map((s) => [s.name, yesNo(s.existed), yesNo(s.wasRunning)])
      );
      this.newline();
      this.table(
        ['PROCESS', 'EXISTS', 'SUSPENDED', 'PATH'],
        plan.processes.map((p) => [p.name, yesNo(p.existed), yesNo(p.wasSuspended), p.executablePath ?? '-'])
      );
      this.newline();
      this.info(
        `Plan: stop ${plural(plan.servicesToStop.length, 'service')} and ${plural(plan.processesToStop.length, 'process')}.`
      );
      if (plan.slowTeardown) {
        this.info('Includes the post-stop wait for the slow-teardown service.');
      }
    }

    this.result.data = plan;
    this.result.summary = {
      services: plan.servicesToStop.length,
      processes: plan.processesToStop.length,
    };
  }

  /**
   * Print the stored or freshly taken snapshot.
   */
  snapshotSummary(snapshot: Snapshot): void {
    const servicesStopped = snapshot.services.filter((s) => s.wasRunning).length;
    const processesStopped = snapshot.processes.filter((p) => p.existed && !p.wasSuspended).length;

    if (this.mode === 'human') {
      this.info(`Snapshot ${snapshot.id} (${snapshot.createdAt})`);
      this.indent();
      this.info(`${plural(servicesStopped, 'service')} and ${plural(processesStopped, 'process')} to restore.`);
      for (const s of snapshot.services.filter((r) => r.wasRunning)) {
        this.info(`service ${s.name}`);
      }
      for (const p of snapshot.processes.filter((r) => r.existed && !r.wasSuspended)) {
        this.info(`process ${p.name}${p.executablePath ? ` (${p.executablePath})` : ''}`);
      }
      this.dedent();
    }

    this.result.data = snapshot;
    this.result.summary = {
      services: servicesStopped,
      processes: processesStopped,
    };
  }

  /**
   * Print what enable restored.
   */
  restoreSummary(report: RestoreReport): void {
    if (this.mode === 'human') {
      this.newline();
      this.info(
        `Done. ${plural(report.servicesStarted.length, 'service')} and ${plural(report.processesLaunched.length, 'process')} started.`
      );
      if (report.scheduler.requiresRestart) {
        this.warning(report.scheduler.message);
      }
    }

    this.result.data = report;
    this.result.summary = {
      services: report.servicesStarted.length,
      processes: report.processesLaunched.length,
      skipped: report.skipped.length,
    };
  }

  /**
   * Report a snapshot that was taken but could not be stored. The host is
   * already quiesced, so the envelope is printed for the operator to keep.
   */
  unsavedSnapshot(file: SnapshotFile, error: BenchquietError): void {
    this.error(error.message, error);
    if (this.mode === 'human') {
      console.log(JSON.stringify(file, null, 2));
    }
    this.result.data = file;
  }

  /**
   * Report a cancelled disable/enable. Not an error, but not a success.
   */
  cancelled(reason: CancelReason, message: string): void {
    this.result.success = false;
    if (this.mode === 'human') {
      console.error(`${this.getIndent()}⏸ Cancelled (${reason}): ${message}`);
    }
    this.result.cancelled = { reason, message };
  }

  // ===========================================================================
  // JSON Output
  // ===========================================================================

  getResult(): CommandResult {
    return this.result;
  }

  /**
   * In JSON mode, print the collected document. Human output was printed inline.
   */
  flush(): void {
    if (this.mode === 'json') {
      const entries = this.logger?.getEntries() ?? [];
      const document = entries.length > 0 ? { ...this.result, log: entries } : this.result;
      console.log(JSON.stringify(document, null, 2));
    }
  }
}

/**
 * Create an OutputFormatter from CLI options.
 */
export function createOutput(
  command: string,
  options: { json?: boolean }
): OutputFormatter {
  return new OutputFormatter(command, options);
}
