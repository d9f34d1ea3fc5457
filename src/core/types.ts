/**
 * Core Types for benchquiet
 *
 * Records captured before quiescing, the snapshot passed from disable to
 * enable, and the result types every public operation returns.
 */

import type { ProbeResult } from '../host/types.js';

/**
 * Service state captured before stopping
 */
export interface ServiceRecord {
  readonly name: string;
  readonly existed: boolean;
  /** Sole driver of whether the service is started again */
  readonly wasRunning: boolean;
}

/**
 * Process state captured before stopping
 */
export interface ProcessRecord {
  readonly name: string;
  readonly existed: boolean;
  /** Suspended processes are never stopped or relaunched */
  readonly wasSuspended: boolean;
  /** Resolved only for existing processes; needed to relaunch */
  readonly executablePath: string | null;
}

/**
 * Everything enable() needs to undo a disable().
 *
 * Single use: once enable() has consumed it, it is rejected.
 */
export interface Snapshot {
  readonly id: string;
  /** ISO timestamp */
  readonly createdAt: string;
  /** Short hash of the catalog the snapshot was taken against */
  readonly catalogHash: string;
  readonly services: readonly ServiceRecord[];
  /** In catalog order */
  readonly processes: readonly ProcessRecord[];
}

/**
 * Why an operation stopped without doing its work
 */
export type CancelReason =
  | 'guard-refused'
  | 'pending-restart'
  | 'unknown-scheduler-flag'
  | 'scheduler-write-failed'
  | 'snapshot-consumed'
  | 'catalog-mismatch';

/**
 * Outcome of disable()/enable(). Callers must check `status`.
 */
export type QuiesceResult<T> =
  | { status: 'ok'; value: T }
  | { status: 'cancelled'; reason: CancelReason; message: string };

/**
 * Build an ok result.
 */
export function ok<T>(value: T): QuiesceResult<T> {
  return { status: 'ok', value };
}

/**
 * Build a cancelled result.
 */
export function cancelled<T>(reason: CancelReason, message: string): QuiesceResult<T> {
  return { status: 'cancelled', reason, message };
}

/**
 * Probe results other than `present` count as negative.
 */
export function isPresent(result: ProbeResult): boolean {
  return result === 'present';
}

/**
 * Result of the precondition guard
 */
export type GuardResult =
  | { passed: true }
  | {
      passed: false;
      reason: 'too-soon-after-logon' | 'logon-unknown' | 'not-elevated';
      message: string;
      suggestion: string;
      /** Whole minutes left before the warm-up window closes */
      waitMinutes?: number;
    };

/**
 * Persisted state of the scheduled-task runner
 */
export type SchedulerState = 'enabled' | 'disabled' | 'unknown';

/**
 * Outcome of a scheduler toggle.
 *
 * `requiresRestart` is set whenever the persisted flag and the live service
 * disagree; no amount of waiting in this session reconciles them.
 */
export interface SchedulerOutcome {
  /** Persisted state after the call */
  state: SchedulerState;
  /** Whether this call wrote the flag */
  changed: boolean;
  requiresRestart: boolean;
  message: string;
}

/**
 * A process the restorer decided not to relaunch
 */
export interface SkippedProcess {
  name: string;
  reason: 'did-not-exist' | 'was-suspended' | 'no-executable-path' | 'already-running';
}

/**
 * What enable() did
 */
export interface RestoreReport {
  /** Services included in the start request */
  servicesStarted: string[];
  /** Processes the launch batch actually started, in catalog order */
  processesLaunched: string[];
  skipped: SkippedProcess[];
  scheduler: SchedulerOutcome;
}

/**
 * What disable() would stop right now
 */
export interface QuiescePlan {
  services: ServiceRecord[];
  processes: ProcessRecord[];
  /** Service names that would be stopped */
  servicesToStop: string[];
  /** Process names that would be force-stopped, in catalog order */
  processesToStop: string[];
  /** Whether the slow-teardown delay would apply */
  slowTeardown: boolean;
  schedulerFlag: SchedulerState;
}
