/**
 * Shared command plumbing: config loading, quiescer wiring, error exits.
 */

import { resolve } from 'node:path';

import { loadYamlFile, ConfigLoadError } from '../config/loader.js';
import { validateConfig } from '../config/validator.js';
import { resolveConfig } from '../config/resolver.js';
import type { ResolvedConfig } from '../config/types.js';
import {
  BenchquietError,
  ConfigError,
  errorMessage,
  getExitCode,
  isBenchquietError,
} from '../core/errors.js';
import { Quiescer } from '../core/quiescer.js';
import { HostError, PowerShellHostControl, systemClock } from '../host/index.js';
import { configureLogger } from '../lib/logger.js';
import type { OutputFormatter } from './output.js';

/**
 * Options shared by every command
 */
export interface CommandOptions {
  json?: boolean;
  verbose?: boolean;
}

/**
 * Load, validate and resolve a config file.
 *
 * @returns The resolved config, or null after printing validation errors
 * @throws ConfigLoadError if the file cannot be read or parsed
 */
export async function loadConfig(
  file: string,
  output: OutputFormatter
): Promise<ResolvedConfig | null> {
  const configPath = resolve(file);
  const raw = await loadYamlFile(configPath);
  const validation = validateConfig(raw);

  if (!validation.valid) {
    output.validationError(validation.errors);
    return null;
  }

  return resolveConfig(validation.config, configPath);
}

/**
 * Build a quiescer against the real host, logging through a logger in the
 * same mode as the command output.
 */
export function createQuiescer(
  config: ResolvedConfig,
  options: CommandOptions,
  output: OutputFormatter
): Quiescer {
  const logger = configureLogger(options.json ? 'json' : 'human');
  output.attachLogger(logger);

  const host = new PowerShellHostControl({
    scheduler: config.scheduler,
    verbose: options.verbose,
  });

  return new Quiescer({
    host,
    clock: systemClock,
    catalog: config.catalog,
    slowTeardown: config.slowTeardown,
    warmupMinutes: config.guard.warmupMinutes,
    logger,
  });
}

/**
 * Map any thrown value to a BenchquietError, when it has a known meaning.
 */
export function toBenchquietError(error: unknown): BenchquietError | null {
  if (isBenchquietError(error)) {
    return error;
  }
  if (error instanceof ConfigLoadError) {
    return new ConfigError(
      error.message,
      error.reason === 'invalid-yaml' ? 'CONFIG_INVALID_YAML' : 'CONFIG_NOT_FOUND',
      'Ensure the configuration file exists, is readable and is valid YAML.',
      error.filePath
    );
  }
  if (error instanceof HostError) {
    return error.code === 'ACCESS_DENIED'
      ? new BenchquietError(
          `PowerShell failed (${error.code}): ${error.message}`,
          'PERMISSION_DENIED',
          'Run the command from an elevated (Run as administrator) terminal.'
        )
      : new BenchquietError(`PowerShell failed (${error.code}): ${error.message}`, 'HOST_ERROR');
  }
  return null;
}

/**
 * Report an error and exit with its exit code.
 */
export function handleError(output: OutputFormatter, error: unknown): never {
  const known = toBenchquietError(error);
  if (known) {
    output.error(known.message, known);
  } else {
    output.error(errorMessage(error));
  }

  output.flush();
  process.exit(getExitCode(known ?? error));
}
