/**
 * Process Inventory
 *
 * Records which catalog processes exist, whether they are suspended and
 * where their executables live, then force-stops the active ones.
 *
 * Catalog order is kept throughout: several entries are helpers of one
 * vendor service family, and stopping them out of order leaves members of
 * the family running.
 */

import type { HostControl } from '../host/types.js';
import { logger as defaultLogger, type Logger } from '../lib/logger.js';
import { errorMessage } from './errors.js';
import { isPresent, type ProcessRecord } from './types.js';

/**
 * Names of existing, non-suspended processes, in record order.
 */
export function activeProcessNames(records: readonly ProcessRecord[]): string[] {
  return records
    .filter((record) => record.existed && !record.wasSuspended)
    .map((record) => record.name);
}

export class ProcessInventory {
  constructor(
    private readonly host: HostControl,
    private readonly logger: Logger = defaultLogger
  ) {}

  /**
   * Probe every catalog process in order.
   */
  async snapshot(catalog: readonly string[]): Promise<ProcessRecord[]> {
    const records: ProcessRecord[] = [];
    for (const name of catalog) {
      const existed = isPresent(await this.host.processExists(name));
      if (!existed) {
        records.push({ name, existed, wasSuspended: false, executablePath: null });
        continue;
      }

      const wasSuspended = isPresent(await this.host.isProcessSuspended(name));
      const executablePath = await this.host.getProcessPath(name);
      if (executablePath === null) {
        this.logger.warning(`Could not resolve the executable of ${name}; it will not be relaunched.`);
      }
      records.push({ name, existed, wasSuspended, executablePath });
    }
    return records;
  }

  /**
   * Snapshot the catalog, then force-stop every existing process that is
   * not suspended. Suspended processes are left alone: their dormancy was
   * not caused by us and killing them can lose application state.
   */
  async snapshotAndStop(catalog: readonly string[]): Promise<ProcessRecord[]> {
    const records = await this.snapshot(catalog);

    for (const record of records) {
      if (record.wasSuspended) {
        this.logger.step('skip', `${record.name} (suspended)`);
      }
    }

    const active = activeProcessNames(records);
    if (active.length === 0) {
      this.logger.info('No catalog processes are running.');
      return records;
    }

    this.logger.step('stop', active.join(', '));
    try {
      await this.host.stopProcesses(active);
    } catch (error) {
      this.logger.error(`Failed to stop processes: ${errorMessage(error)}`);
    }
    return records;
  }
}
