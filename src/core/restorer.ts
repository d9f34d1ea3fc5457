/**
 * Restorer
 *
 * Brings back exactly what a snapshot says was active: services that were
 * running, then processes that existed and were not suspended, then the
 * scheduler flag.
 */

import type { HostControl, LaunchResponse, ProcessLaunch } from '../host/types.js';
import { logger as defaultLogger, type Logger } from '../lib/logger.js';
import { errorMessage } from './errors.js';
import type { SchedulerToggle } from './scheduler.js';
import type { ServiceInventory } from './services.js';
import {
  isPresent,
  type ProcessRecord,
  type RestoreReport,
  type SkippedProcess,
  type Snapshot,
} from './types.js';

/**
 * Reason a record can never be relaunched, independent of live state.
 */
export function staticSkipReason(record: ProcessRecord): SkippedProcess['reason'] | null {
  if (!record.existed) return 'did-not-exist';
  if (record.wasSuspended) return 'was-suspended';
  if (record.executablePath === null) return 'no-executable-path';
  return null;
}

export class Restorer {
  constructor(
    private readonly host: HostControl,
    private readonly services: ServiceInventory,
    private readonly scheduler: SchedulerToggle,
    private readonly logger: Logger = defaultLogger
  ) {}

  async restore(snapshot: Snapshot): Promise<RestoreReport> {
    const servicesStarted = await this.services.restart(snapshot.services);
    const { launched, skipped } = await this.restartProcesses(snapshot.processes);
    const scheduler = await this.scheduler.enable();

    return {
      servicesStarted,
      processesLaunched: launched,
      skipped,
      scheduler,
    };
  }

  /**
   * Relaunch processes in catalog order as a single batch.
   */
  private async restartProcesses(
    records: readonly ProcessRecord[]
  ): Promise<{ launched: string[]; skipped: SkippedProcess[] }> {
    const launches: ProcessLaunch[] = [];
    const skipped: SkippedProcess[] = [];

    for (const record of records) {
      const reason = staticSkipReason(record);
      if (reason !== null || record.executablePath === null) {
        skipped.push({ name: record.name, reason: reason ?? 'no-executable-path' });
        continue;
      }

      // An earlier restart may have brought this one back already.
      if (isPresent(await this.host.processExists(record.name))) {
        this.logger.step('skip', `${record.name} (already running)`);
        skipped.push({ name: record.name, reason: 'already-running' });
        continue;
      }

      launches.push({ name: record.name, executablePath: record.executablePath });
    }

    if (launches.length === 0) {
      return { launched: [], skipped };
    }

    this.logger.step('start', launches.map((launch) => launch.name).join(', '));
    let response: LaunchResponse;
    try {
      response = await this.host.startProcesses(launches);
    } catch (error) {
      this.logger.error(`Failed to relaunch processes: ${errorMessage(error)}`);
      return { launched: [], skipped };
    }

    const failed = new Set(response.failed.map((failure) => failure.name));
    for (const failure of response.failed) {
      this.logger.error(`Failed to relaunch ${failure.name}: ${failure.message}`);
    }
    for (const launch of launches) {
      if (!response.started.includes(launch.name) && !failed.has(launch.name)) {
        // Brought up by an earlier entry of the same batch.
        this.logger.step('skip', `${launch.name} (already running)`);
        skipped.push({ name: launch.name, reason: 'already-running' });
      }
    }
    return {
      launched: launches.map((launch) => launch.name).filter((name) => response.started.includes(name)),
      skipped,
    };
  }
}
