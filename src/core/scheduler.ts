/**
 * Scheduler Toggle
 *
 * Flips the persisted start mode of the scheduled-task runner. The live
 * service only follows the flag after a host restart, so every transition
 * reports a pending state instead of a finished one.
 */

import type { HostControl } from '../host/types.js';
import { logger as defaultLogger, type Logger } from '../lib/logger.js';
import { errorMessage } from './errors.js';
import { isPresent, type SchedulerOutcome, type SchedulerState } from './types.js';

/**
 * Start-mode values of the runner's registry flag
 */
export const SCHEDULER_FLAG = {
  /** Delayed automatic start */
  enabled: 2,
  disabled: 4,
} as const;

/**
 * Map a raw flag value to a scheduler state.
 */
export function toSchedulerState(value: number | null): SchedulerState {
  if (value === SCHEDULER_FLAG.enabled) return 'enabled';
  if (value === SCHEDULER_FLAG.disabled) return 'disabled';
  return 'unknown';
}

export class SchedulerToggle {
  constructor(
    private readonly host: HostControl,
    private readonly logger: Logger = defaultLogger
  ) {}

  /**
   * Current persisted state.
   */
  async read(): Promise<SchedulerState> {
    return toSchedulerState(await this.host.readSchedulerFlag());
  }

  /**
   * Move the flag to disabled.
   *
   * Proceeding is only safe when the flag is already disabled and the
   * runner is no longer running, i.e. a restart has happened since.
   */
  async disable(): Promise<SchedulerOutcome> {
    return this.transition('disabled');
  }

  /**
   * Move the flag back to delayed automatic start.
   */
  async enable(): Promise<SchedulerOutcome> {
    return this.transition('enabled');
  }

  private async transition(target: 'enabled' | 'disabled'): Promise<SchedulerOutcome> {
    const raw = await this.host.readSchedulerFlag();
    const current = toSchedulerState(raw);

    if (current === 'unknown') {
      const message = `Task Scheduler start mode is ${raw === null ? 'unreadable' : `set to unexpected value ${raw}`}; leaving it untouched.`;
      this.logger.warning(message);
      return { state: 'unknown', changed: false, requiresRestart: false, message };
    }

    if (current === target) {
      // The flag is right; the live service must agree before we call it done.
      const probe = await this.host.isSchedulerRunning();
      if (probe === 'unknown') {
        this.logger.warning('Could not tell whether Task Scheduler is running; treating it as stopped.');
      }
      const running = isPresent(probe);
      const settled = target === 'enabled' ? running : !running;
      if (settled) {
        return {
          state: current,
          changed: false,
          requiresRestart: false,
          message: `Task Scheduler is ${target}.`,
        };
      }
      const message =
        target === 'disabled'
          ? 'Task Scheduler is set to shut down. Restart required.'
          : 'Task Scheduler is set to start. Restart required.';
      this.logger.warning(message);
      return { state: current, changed: false, requiresRestart: true, message };
    }

    this.logger.step('flag', `Task Scheduler -> ${target}`);
    try {
      await this.host.writeSchedulerFlag(SCHEDULER_FLAG[target]);
    } catch (error) {
      const message = `Failed to update Task Scheduler start mode: ${errorMessage(error)}`;
      this.logger.error(message);
      return { state: current, changed: false, requiresRestart: false, message };
    }

    const message = `Task Scheduler settings updated. Restart required.`;
    this.logger.warning(message);
    return { state: target, changed: true, requiresRestart: true, message };
  }
}
