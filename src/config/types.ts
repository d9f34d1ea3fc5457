/**
 * Configuration Types for benchquiet
 *
 * These types represent the YAML configuration structure and the resolved
 * configuration with defaults applied.
 */

// =============================================================================
// YAML Input Types
// =============================================================================

/**
 * Root configuration object parsed from benchquiet.yaml
 */
export interface BenchquietConfig {
  /** Service names to stop while quiesced */
  services: string[];
  /** Process names to force-stop, in stop/restart order */
  processes: string[];
  scheduler?: SchedulerConfig;
  guard?: GuardConfig;
  /** Service whose stop triggers a long background teardown; null disables the wait */
  slow_teardown?: SlowTeardownConfig | null;
  settings?: SettingsConfig;
}

/**
 * Location of the scheduled-task runner and its start-mode flag
 */
export interface SchedulerConfig {
  /** Default: Schedule */
  service?: string;
  /** Default: HKLM:\SYSTEM\CurrentControlSet\Services\Schedule */
  registry_path?: string;
  /** Default: Start */
  value_name?: string;
}

/**
 * Precondition guard tuning
 */
export interface GuardConfig {
  /** Minutes after logon before probing is trusted. Default: 5 */
  warmup_minutes?: number;
}

/**
 * Fixed wait after stopping one particular service
 */
export interface SlowTeardownConfig {
  /** Default: WSearch */
  service?: string;
  /** Default: 90 */
  delay_seconds?: number;
}

/**
 * Optional global settings
 */
export interface SettingsConfig {
  /** Where the snapshot is kept between disable and enable. Default: .benchquiet/snapshot.json next to the config */
  snapshot_path?: string;
}

// =============================================================================
// Resolved Types
// =============================================================================

/**
 * Names of services and processes of interest. Process order is significant.
 */
export interface Catalog {
  readonly services: readonly string[];
  readonly processes: readonly string[];
}

/**
 * Service whose stop must be followed by a blocking delay
 */
export interface SlowTeardown {
  service: string;
  delaySeconds: number;
}

/**
 * Fully resolved configuration ready for execution
 */
export interface ResolvedConfig {
  catalog: Catalog;
  scheduler: {
    service: string;
    registryPath: string;
    valueName: string;
  };
  guard: {
    warmupMinutes: number;
  };
  slowTeardown: SlowTeardown | null;
  /** Absolute path of the snapshot file */
  snapshotPath: string;
  /** Absolute path to the YAML config file */
  configPath: string;
}
