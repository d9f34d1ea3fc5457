/**
 * Precondition Guard
 *
 * Decides whether it is safe to touch host state at all. Nothing here
 * mutates the host, and nothing is retried.
 */

import type { Clock, HostControl } from '../host/types.js';
import type { GuardResult } from './types.js';

/**
 * Default warm-up window after logon
 */
export const DEFAULT_WARMUP_MINUTES = 5;

const MINUTE_MS = 60_000;

/**
 * Phrase a whole number of minutes, e.g. "1 minute" or "3 minutes".
 */
export function formatMinutes(minutes: number): string {
  return `${minutes} minute${minutes === 1 ? '' : 's'}`;
}

/**
 * Whole minutes still to wait, rounded up.
 *
 * @param lastLogon - Last logon time of the current user
 * @param now - Current time
 * @param warmupMinutes - Length of the warm-up window
 * @returns 0 when the window has passed
 */
export function remainingWarmupMinutes(lastLogon: Date, now: Date, warmupMinutes: number): number {
  const remainingMs = lastLogon.getTime() + warmupMinutes * MINUTE_MS - now.getTime();
  return remainingMs > 0 ? Math.ceil(remainingMs / MINUTE_MS) : 0;
}

export class PreconditionGuard {
  constructor(
    private readonly host: HostControl,
    private readonly clock: Clock,
    private readonly warmupMinutes: number = DEFAULT_WARMUP_MINUTES
  ) {}

  /**
   * Check both preconditions: the warm-up window has passed and the
   * process is elevated. Fails closed on anything it cannot confirm.
   */
  async check(): Promise<GuardResult> {
    const lastLogon = await this.host.getLastLogonTime();
    if (lastLogon === null) {
      return {
        passed: false,
        reason: 'logon-unknown',
        message: 'Could not determine when the current user logged on.',
        suggestion: 'Check that Get-LocalUser works for the current account, then retry.',
      };
    }

    const waitMinutes = remainingWarmupMinutes(lastLogon, this.clock.now(), this.warmupMinutes);
    if (waitMinutes > 0) {
      return {
        passed: false,
        reason: 'too-soon-after-logon',
        message: `Background services are still settling after logon. Please wait ${formatMinutes(waitMinutes)} and try again.`,
        suggestion: `Retry in ${formatMinutes(waitMinutes)}.`,
        waitMinutes,
      };
    }

    if (!(await this.host.isElevated())) {
      return {
        passed: false,
        reason: 'not-elevated',
        message: 'Administrator rights are required to stop and start services.',
        suggestion: 'Run the command from an elevated (Run as administrator) terminal.',
      };
    }

    return { passed: true };
  }
}
