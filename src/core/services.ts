/**
 * Service Inventory
 *
 * Records which catalog services exist and run, stops the running ones in
 * one batch, and starts them again from a snapshot.
 */

import type { Clock, HostControl } from '../host/types.js';
import type { SlowTeardown } from '../config/types.js';
import { logger as defaultLogger, type Logger } from '../lib/logger.js';
import { errorMessage } from './errors.js';
import { isPresent, type ServiceRecord } from './types.js';

/**
 * Default service with a long asynchronous teardown
 */
export const DEFAULT_SLOW_TEARDOWN: SlowTeardown = {
  service: 'WSearch',
  delaySeconds: 90,
};

/**
 * Options for constructing a ServiceInventory
 */
export interface ServiceInventoryOptions {
  /** Service to wait on after stopping; null for no wait */
  slowTeardown?: SlowTeardown | null;
  logger?: Logger;
}

export class ServiceInventory {
  private readonly slowTeardown: SlowTeardown | null;
  private readonly logger: Logger;

  constructor(
    private readonly host: HostControl,
    private readonly clock: Clock,
    options: ServiceInventoryOptions = {}
  ) {
    this.slowTeardown =
      options.slowTeardown === undefined ? DEFAULT_SLOW_TEARDOWN : options.slowTeardown;
    this.logger = options.logger ?? defaultLogger;
  }

  /**
   * Probe every catalog service. The running probe is only issued for
   * services that exist.
   */
  async snapshot(catalog: readonly string[]): Promise<ServiceRecord[]> {
    const records: ServiceRecord[] = [];
    for (const name of catalog) {
      const existed = isPresent(await this.host.serviceExists(name));
      const wasRunning = existed && isPresent(await this.host.isServiceRunning(name));
      records.push({ name, existed, wasRunning });
    }
    return records;
  }

  /**
   * Snapshot the catalog, then stop exactly the services found running.
   */
  async snapshotAndStop(catalog: readonly string[]): Promise<ServiceRecord[]> {
    const records = await this.snapshot(catalog);
    const running = records.filter((record) => record.wasRunning).map((record) => record.name);

    if (running.length === 0) {
      this.logger.info('No catalog services are running.');
      return records;
    }

    this.logger.step('stop', running.join(', '));
    try {
      await this.host.stopServices(running);
    } catch (error) {
      this.logger.error(`Failed to stop services: ${errorMessage(error)}`);
    }

    if (this.slowTeardown && running.includes(this.slowTeardown.service)) {
      this.logger.step(
        'wait',
        `${this.slowTeardown.delaySeconds}s for ${this.slowTeardown.service} to finish tearing down`
      );
      await this.clock.sleep(this.slowTeardown.delaySeconds * 1000);
    }

    return records;
  }

  /**
   * Start every service that existed and was running when the snapshot was
   * taken.
   *
   * @returns Names included in the start request
   */
  async restart(records: readonly ServiceRecord[]): Promise<string[]> {
    const toStart = records
      .filter((record) => record.existed && record.wasRunning)
      .map((record) => record.name);
    if (toStart.length === 0) {
      return [];
    }

    this.logger.step('start', toStart.join(', '));
    try {
      await this.host.startServices(toStart);
    } catch (error) {
      this.logger.error(`Failed to start services: ${errorMessage(error)}`);
    }
    return toStart;
  }
}
