/**
 * Configuration Resolver
 *
 * Applies defaults and expands paths to produce a fully resolved
 * configuration ready for execution.
 */

import { dirname, resolve } from 'node:path';

import { DEFAULT_WARMUP_MINUTES } from '../core/guard.js';
import { DEFAULT_SLOW_TEARDOWN } from '../core/services.js';
import { expandPath, getDefaultSnapshotPath } from '../lib/paths.js';
import type { BenchquietConfig, ResolvedConfig, SlowTeardown } from './types.js';

/**
 * Default values when not specified in config
 */
export const DEFAULTS = {
  scheduler: {
    service: 'Schedule',
    registryPath: 'HKLM:\\SYSTEM\\CurrentControlSet\\Services\\Schedule',
    valueName: 'Start',
  },
  warmupMinutes: DEFAULT_WARMUP_MINUTES,
  slowTeardown: DEFAULT_SLOW_TEARDOWN,
} as const;

/**
 * Resolve the slow-teardown block. An explicit null turns the wait off.
 */
function resolveSlowTeardown(config: BenchquietConfig): SlowTeardown | null {
  if (config.slow_teardown === null) {
    return null;
  }
  return {
    service: config.slow_teardown?.service ?? DEFAULTS.slowTeardown.service,
    delaySeconds: config.slow_teardown?.delay_seconds ?? DEFAULTS.slowTeardown.delaySeconds,
  };
}

/**
 * Resolve a validated configuration.
 *
 * @param config - Validated configuration from YAML
 * @param configPath - Path to the configuration file
 */
export function resolveConfig(config: BenchquietConfig, configPath: string): ResolvedConfig {
  const absoluteConfigPath = resolve(configPath);
  const basePath = dirname(absoluteConfigPath);

  const snapshotPath = config.settings?.snapshot_path
    ? expandPath(config.settings.snapshot_path, basePath)
    : getDefaultSnapshotPath(absoluteConfigPath);

  return {
    catalog: {
      services: [...config.services],
      processes: [...config.processes],
    },
    scheduler: {
      service: config.scheduler?.service ?? DEFAULTS.scheduler.service,
      registryPath: config.scheduler?.registry_path ?? DEFAULTS.scheduler.registryPath,
      valueName: config.scheduler?.value_name ?? DEFAULTS.scheduler.valueName,
    },
    guard: {
      warmupMinutes: config.guard?.warmup_minutes ?? DEFAULTS.warmupMinutes,
    },
    slowTeardown: resolveSlowTeardown(config),
    snapshotPath,
    configPath: absoluteConfigPath,
  };
}
