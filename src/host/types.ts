/**
 * Host Control Types
 *
 * The capability interface the quiescing core runs against, plus the
 * JSON shapes the PowerShell scripts print.
 */

/**
 * Outcome of a single host query.
 *
 * `unknown` means the query itself failed. Callers treat it as `absent`.
 */
export type ProbeResult = 'present' | 'absent' | 'unknown';

/**
 * A process to relaunch from its recorded executable.
 */
export interface ProcessLaunch {
  /** Process name as listed in the catalog (no .exe) */
  name: string;
  /** Absolute path of the executable recorded at snapshot time */
  executablePath: string;
}

/**
 * Everything the core needs from the operating system.
 *
 * Probes never throw: a failing query yields `unknown` (or `null` for
 * value reads). Mutations throw on failure and are caught by the caller.
 */
export interface HostControl {
  /** Last logon time of the current user, or null when it cannot be read */
  getLastLogonTime(): Promise<Date | null>;
  /** Whether the current process runs with administrator rights */
  isElevated(): Promise<boolean>;

  /** Raw value of the scheduler start-mode flag, or null when unreadable */
  readSchedulerFlag(): Promise<number | null>;
  writeSchedulerFlag(value: number): Promise<void>;
  /** Whether the scheduler runner service is currently running */
  isSchedulerRunning(): Promise<ProbeResult>;

  serviceExists(name: string): Promise<ProbeResult>;
  isServiceRunning(name: string): Promise<ProbeResult>;
  stopServices(names: readonly string[]): Promise<void>;
  startServices(names: readonly string[]): Promise<void>;

  processExists(name: string): Promise<ProbeResult>;
  /** Present when every thread of every instance waits on a suspend request */
  isProcessSuspended(name: string): Promise<ProbeResult>;
  getProcessPath(name: string): Promise<string | null>;
  /** Force-stop every instance of each named process, in order */
  stopProcesses(names: readonly string[]): Promise<void>;
  /**
   * Launch processes in order as one batch. An entry is skipped when an
   * instance of it is already running at the moment its turn comes; one
   * failed launch does not stop the rest.
   */
  startProcesses(launches: readonly ProcessLaunch[]): Promise<LaunchResponse>;
}

/**
 * Wall-clock access, injectable for tests.
 */
export interface Clock {
  now(): Date;
  sleep(ms: number): Promise<void>;
}

/**
 * Response of the last-logon script
 */
export interface LastLogonResponse {
  /** ISO timestamp, or null when the account has no recorded logon */
  lastLogon: string | null;
}

/**
 * Response of the elevation script
 */
export interface ElevationResponse {
  elevated: boolean;
}

/**
 * Response of the scheduler flag script
 */
export interface RegistryValueResponse {
  value: number | null;
}

/**
 * Response of the service query script
 */
export interface ServiceStatusResponse {
  exists: boolean;
  /** ServiceControllerStatus as a string: Running, Stopped, StartPending... */
  status: string | null;
}

/**
 * An entry of the launch batch that failed to start
 */
export interface LaunchFailure {
  name: string;
  message: string;
}

/**
 * Response of the launch script. Entries in neither list were already
 * running when their turn came.
 */
export interface LaunchResponse {
  started: string[];
  failed: LaunchFailure[];
}

/**
 * Response of the process query script
 */
export interface ProcessStatusResponse {
  exists: boolean;
  suspended: boolean;
  path: string | null;
}
