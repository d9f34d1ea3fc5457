/**
 * In-process HostControl and Clock for tests.
 *
 * Services and processes live in maps; every call is recorded so tests can
 * assert exactly which probes and mutations were issued.
 */

import type {
  Clock,
  HostControl,
  LaunchResponse,
  ProbeResult,
  ProcessLaunch,
} from '../../src/host/types.js';

export interface FakeService {
  running: boolean;
}

export interface FakeProcess {
  running: boolean;
  suspended?: boolean;
  path?: string | null;
  /** Other processes that start when this one is launched */
  spawns?: string[];
}

export interface FakeHostOptions {
  services?: Record<string, FakeService>;
  processes?: Record<string, FakeProcess>;
  schedulerFlag?: number | null;
  schedulerRunning?: boolean;
  lastLogon?: Date | null;
  elevated?: boolean;
}

export interface HostCall {
  op: string;
  args: unknown[];
}

const MUTATIONS = new Set([
  'writeSchedulerFlag',
  'stopServices',
  'startServices',
  'stopProcesses',
  'startProcesses',
]);

export const FIXED_NOW = new Date('2026-03-02T10:00:00.000Z');

export class FakeHost implements HostControl {
  readonly services: Map<string, FakeService>;
  readonly processes: Map<string, FakeProcess>;
  schedulerFlag: number | null;
  schedulerRunning: boolean;
  lastLogon: Date | null;
  elevated: boolean;

  readonly calls: HostCall[] = [];
  /** Process names actually started by startProcesses, in order */
  readonly launched: string[] = [];
  /** Names whose probes fail (reported as unknown) */
  readonly failingProbes = new Set<string>();
  /** Mutation ops that throw */
  readonly failingMutations = new Set<string>();
  /** Process names whose launch fails inside the batch */
  readonly failingLaunches = new Set<string>();

  constructor(options: FakeHostOptions = {}) {
    this.services = new Map(Object.entries(options.services ?? {}));
    this.processes = new Map(Object.entries(options.processes ?? {}));
    this.schedulerFlag = options.schedulerFlag === undefined ? 4 : options.schedulerFlag;
    this.schedulerRunning = options.schedulerRunning ?? false;
    this.lastLogon =
      options.lastLogon === undefined ? new Date(FIXED_NOW.getTime() - 60 * 60_000) : options.lastLogon;
    this.elevated = options.elevated ?? true;
  }

  private record(op: string, ...args: unknown[]): void {
    this.calls.push({ op, args });
    if (MUTATIONS.has(op) && this.failingMutations.has(op)) {
      throw new Error(`${op} failed`);
    }
  }

  mutations(): HostCall[] {
    return this.calls.filter((call) => MUTATIONS.has(call.op));
  }

  callsTo(op: string): HostCall[] {
    return this.calls.filter((call) => call.op === op);
  }

  runningServices(): string[] {
    return [...this.services].filter(([, s]) => s.running).map(([name]) => name).sort();
  }

  runningProcesses(): string[] {
    return [...this.processes].filter(([, p]) => p.running).map(([name]) => name).sort();
  }

  private probe(name: string, value: boolean): ProbeResult {
    if (this.failingProbes.has(name)) return 'unknown';
    return value ? 'present' : 'absent';
  }

  async getLastLogonTime(): Promise<Date | null> {
    this.record('getLastLogonTime');
    return this.lastLogon;
  }

  async isElevated(): Promise<boolean> {
    this.record('isElevated');
    return this.elevated;
  }

  async readSchedulerFlag(): Promise<number | null> {
    this.record('readSchedulerFlag');
    return this.schedulerFlag;
  }

  async writeSchedulerFlag(value: number): Promise<void> {
    this.record('writeSchedulerFlag', value);
    this.schedulerFlag = value;
  }

  async isSchedulerRunning(): Promise<ProbeResult> {
    this.record('isSchedulerRunning');
    return this.probe('Schedule', this.schedulerRunning);
  }

  async serviceExists(name: string): Promise<ProbeResult> {
    this.record('serviceExists', name);
    return this.probe(name, this.services.has(name));
  }

  async isServiceRunning(name: string): Promise<ProbeResult> {
    this.record('isServiceRunning', name);
    return this.probe(name, this.services.get(name)?.running === true);
  }

  async stopServices(names: readonly string[]): Promise<void> {
    this.record('stopServices', [...names]);
    for (const name of names) {
      const service = this.services.get(name);
      if (service) service.running = false;
    }
  }

  async startServices(names: readonly string[]): Promise<void> {
    this.record('startServices', [...names]);
    for (const name of names) {
      const service = this.services.get(name);
      if (service) service.running = true;
    }
  }

  async processExists(name: string): Promise<ProbeResult> {
    this.record('processExists', name);
    return this.probe(name, this.processes.get(name)?.running === true);
  }

  async isProcessSuspended(name: string): Promise<ProbeResult> {
    this.record('isProcessSuspended', name);
    return this.probe(name, this.processes.get(name)?.suspended === true);
  }

  async getProcessPath(name: string): Promise<string | null> {
    this.record('getProcessPath', name);
    if (this.failingProbes.has(name)) return null;
    const proc = this.processes.get(name);
    if (!proc?.running) return null;
    return proc.path === undefined ? `C:\\Program Files\\Vendor\\${name}.exe` : proc.path;
  }

  async stopProcesses(names: readonly string[]): Promise<void> {
    this.record('stopProcesses', [...names]);
    for (const name of names) {
      const proc = this.processes.get(name);
      if (proc) proc.running = false;
    }
  }

  async startProcesses(launches: readonly ProcessLaunch[]): Promise<LaunchResponse> {
    this.record('startProcesses', launches.map((launch) => ({ ...launch })));
    const response: LaunchResponse = { started: [], failed: [] };
    for (const launch of launches) {
      const proc = this.processes.get(launch.name);
      if (proc?.running) continue;
      if (!proc || this.failingLaunches.has(launch.name)) {
        response.failed.push({ name: launch.name, message: `cannot find ${launch.executablePath}` });
        continue;
      }
      proc.running = true;
      response.started.push(launch.name);
      this.launched.push(launch.name);
      for (const child of proc.spawns ?? []) {
        const spawned = this.processes.get(child);
        if (spawned) spawned.running = true;
      }
    }
    return response;
  }
}

export class FakeClock implements Clock {
  readonly sleeps: number[] = [];

  constructor(private current: Date = FIXED_NOW) {}

  now(): Date {
    return this.current;
  }

  async sleep(ms: number): Promise<void> {
    this.sleeps.push(ms);
    this.current = new Date(this.current.getTime() + ms);
  }
}
