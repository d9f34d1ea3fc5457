/**
 * PowerShell Host Control
 *
 * Production HostControl backed by PowerShell. Query failures collapse to
 * `unknown`/`null`; mutation failures propagate as HostError.
 */

import { setTimeout as delay } from 'node:timers/promises';

import { PowerShellExecutor, type PowerShellExecutorOptions } from './executor.js';
import type { Clock, HostControl, LaunchResponse, ProbeResult, ProcessLaunch } from './types.js';
import {
  buildSetRegistryValueScript,
  buildStartProcessesScript,
  buildStartServicesScript,
  buildStopProcessesScript,
  buildStopServicesScript,
} from './commands.js';
import {
  checkElevation,
  getLastLogon,
  getProcess,
  getRegistryValue,
  getService,
} from './queries.js';

/**
 * Where the scheduler start-mode flag lives and which service it controls
 */
export interface SchedulerLocation {
  /** Service name of the scheduled-task runner */
  service: string;
  /** Registry key holding the start-mode value */
  registryPath: string;
  /** Registry value name */
  valueName: string;
}

/**
 * Options for constructing a PowerShellHostControl
 */
export interface PowerShellHostControlOptions extends PowerShellExecutorOptions {
  scheduler: SchedulerLocation;
  /** Existing executor to reuse instead of building one */
  executor?: PowerShellExecutor;
}

/**
 * Turn a boolean query into a probe result, mapping failures to `unknown`.
 */
async function probe(query: () => Promise<boolean>): Promise<ProbeResult> {
  try {
    return (await query()) ? 'present' : 'absent';
  } catch {
    return 'unknown';
  }
}

export class PowerShellHostControl implements HostControl {
  private readonly executor: PowerShellExecutor;
  private readonly scheduler: SchedulerLocation;

  constructor(options: PowerShellHostControlOptions) {
    this.executor =
      options.executor ??
      new PowerShellExecutor({ powershellPath: options.powershellPath, verbose: options.verbose });
    this.scheduler = options.scheduler;
  }

  async getLastLogonTime(): Promise<Date | null> {
    try {
      return await getLastLogon(this.executor);
    } catch {
      return null;
    }
  }

  async isElevated(): Promise<boolean> {
    try {
      return await checkElevation(this.executor);
    } catch {
      return false;
    }
  }

  async readSchedulerFlag(): Promise<number | null> {
    try {
      return await getRegistryValue(
        this.executor,
        this.scheduler.registryPath,
        this.scheduler.valueName
      );
    } catch {
      return null;
    }
  }

  async writeSchedulerFlag(value: number): Promise<void> {
    await this.executor.executeVoid(
      buildSetRegistryValueScript(this.scheduler.registryPath, this.scheduler.valueName, value)
    );
  }

  async isSchedulerRunning(): Promise<ProbeResult> {
    return this.isServiceRunning(this.scheduler.service);
  }

  async serviceExists(name: string): Promise<ProbeResult> {
    return probe(async () => (await getService(this.executor, name)).exists);
  }

  async isServiceRunning(name: string): Promise<ProbeResult> {
    return probe(async () => (await getService(this.executor, name)).status === 'Running');
  }

  async stopServices(names: readonly string[]): Promise<void> {
    await this.executor.executeVoid(buildStopServicesScript(names), { timeout: 180000 });
  }

  async startServices(names: readonly string[]): Promise<void> {
    await this.executor.executeVoid(buildStartServicesScript(names), { timeout: 180000 });
  }

  async processExists(name: string): Promise<ProbeResult> {
    return probe(async () => (await getProcess(this.executor, name)).exists);
  }

  async isProcessSuspended(name: string): Promise<ProbeResult> {
    return probe(async () => (await getProcess(this.executor, name)).suspended);
  }

  async getProcessPath(name: string): Promise<string | null> {
    try {
      return (await getProcess(this.executor, name)).path;
    } catch {
      return null;
    }
  }

  async stopProcesses(names: readonly string[]): Promise<void> {
    await this.executor.executeVoid(buildStopProcessesScript(names));
  }

  async startProcesses(launches: readonly ProcessLaunch[]): Promise<LaunchResponse> {
    const result = await this.executor.execute<LaunchResponse>(buildStartProcessesScript(launches), {
      kind: 'mutate',
    });
    return {
      started: result?.started ?? [],
      failed: result?.failed ?? [],
    };
  }
}

/**
 * Clock backed by the real wall clock and timers.
 */
export const systemClock: Clock = {
  now: () => new Date(),
  sleep: (ms: number) => delay(ms),
};
