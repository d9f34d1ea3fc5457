/**
 * Quiescer
 *
 * The paired disable/enable entry points. disable() stops the catalog and
 * hands back a snapshot; enable() consumes it and restores the host.
 * Neither throws for host failures: every refusal comes back as a
 * cancelled result and every failed mutation as a log line.
 */

import { randomUUID } from 'node:crypto';

import type { Clock, HostControl } from '../host/types.js';
import type { Catalog, SlowTeardown } from '../config/types.js';
import { computeCatalogHash } from '../lib/hash.js';
import { logger as defaultLogger, type Logger } from '../lib/logger.js';
import { DEFAULT_WARMUP_MINUTES, PreconditionGuard } from './guard.js';
import { SchedulerToggle } from './scheduler.js';
import { DEFAULT_SLOW_TEARDOWN, ServiceInventory } from './services.js';
import { ProcessInventory, activeProcessNames } from './processes.js';
import { Restorer } from './restorer.js';
import {
  cancelled,
  ok,
  type QuiescePlan,
  type QuiesceResult,
  type RestoreReport,
  type SchedulerOutcome,
  type Snapshot,
} from './types.js';

/**
 * Options for constructing a Quiescer
 */
export interface QuiescerOptions {
  host: HostControl;
  clock: Clock;
  catalog: Catalog;
  /** Default: WSearch, 90 seconds. null disables the wait */
  slowTeardown?: SlowTeardown | null;
  /** Default: 5 */
  warmupMinutes?: number;
  logger?: Logger;
}

/**
 * Map a scheduler outcome that blocks disable() to a cancelled result.
 */
function schedulerCancellation(outcome: SchedulerOutcome): QuiesceResult<Snapshot> | null {
  if (outcome.state === 'unknown') {
    return cancelled('unknown-scheduler-flag', outcome.message);
  }
  if (outcome.requiresRestart) {
    return cancelled('pending-restart', outcome.message);
  }
  if (outcome.state !== 'disabled') {
    return cancelled('scheduler-write-failed', outcome.message);
  }
  return null;
}

export class Quiescer {
  private readonly clock: Clock;
  private readonly catalog: Catalog;
  private readonly catalogHash: string;
  private readonly slowTeardown: SlowTeardown | null;
  private readonly logger: Logger;
  private readonly guard: PreconditionGuard;
  private readonly scheduler: SchedulerToggle;
  private readonly services: ServiceInventory;
  private readonly processes: ProcessInventory;
  private readonly restorer: Restorer;
  private readonly consumed = new Set<string>();

  constructor(options: QuiescerOptions) {
    this.clock = options.clock;
    this.catalog = options.catalog;
    this.catalogHash = computeCatalogHash(options.catalog);
    this.slowTeardown =
      options.slowTeardown === undefined ? DEFAULT_SLOW_TEARDOWN : options.slowTeardown;
    this.logger = options.logger ?? defaultLogger;

    this.guard = new PreconditionGuard(
      options.host,
      options.clock,
      options.warmupMinutes ?? DEFAULT_WARMUP_MINUTES
    );
    this.scheduler = new SchedulerToggle(options.host, this.logger);
    this.services = new ServiceInventory(options.host, options.clock, {
      slowTeardown: this.slowTeardown,
      logger: this.logger,
    });
    this.processes = new ProcessInventory(options.host, this.logger);
    this.restorer = new Restorer(options.host, this.services, this.scheduler, this.logger);
  }

  /**
   * Stop the catalog and return the snapshot needed to undo it.
   *
   * Cancelled when the guard refuses or when the scheduler flag is not yet
   * in effect; in the latter case the flag may have just been written and a
   * host restart is needed before running again.
   */
  async disable(): Promise<QuiesceResult<Snapshot>> {
    const guard = await this.guard.check();
    if (!guard.passed) {
      this.logger.warning(guard.message);
      return cancelled('guard-refused', guard.message);
    }

    const outcome = await this.scheduler.disable();
    const blocked = schedulerCancellation(outcome);
    if (blocked) {
      return blocked;
    }

    const createdAt = this.clock.now().toISOString();
    const services = await this.services.snapshotAndStop(this.catalog.services);
    const processes = await this.processes.snapshotAndStop(this.catalog.processes);

    return ok({
      id: randomUUID(),
      createdAt,
      catalogHash: this.catalogHash,
      services,
      processes,
    });
  }

  /**
   * Restore what a snapshot recorded, then flip the scheduler back.
   *
   * A scheduler change that still needs a restart does not fail the call;
   * it is reported in `value.scheduler`.
   */
  async enable(snapshot: Snapshot): Promise<QuiesceResult<RestoreReport>> {
    if (this.consumed.has(snapshot.id)) {
      return cancelled('snapshot-consumed', `Snapshot ${snapshot.id} has already been restored.`);
    }
    if (snapshot.catalogHash !== this.catalogHash) {
      return cancelled(
        'catalog-mismatch',
        `Snapshot ${snapshot.id} was taken with a different catalog (${snapshot.catalogHash}, expected ${this.catalogHash}).`
      );
    }

    const guard = await this.guard.check();
    if (!guard.passed) {
      this.logger.warning(guard.message);
      return cancelled('guard-refused', guard.message);
    }

    this.consumed.add(snapshot.id);
    return ok(await this.restorer.restore(snapshot));
  }

  /**
   * Report what disable() would stop, without changing anything.
   */
  async plan(): Promise<QuiescePlan> {
    const services = await this.services.snapshot(this.catalog.services);
    const processes = await this.processes.snapshot(this.catalog.processes);
    const servicesToStop = services.filter((s) => s.wasRunning).map((s) => s.name);

    return {
      services,
      processes,
      servicesToStop,
      processesToStop: activeProcessNames(processes),
      slowTeardown: this.slowTeardown !== null && servicesToStop.includes(this.slowTeardown.service),
      schedulerFlag: await this.scheduler.read(),
    };
  }
}
