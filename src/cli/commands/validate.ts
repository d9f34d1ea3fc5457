/**
 * Validate Command Handler
 *
 * Validates a configuration file against the schema without touching the
 * host or needing administrator rights.
 */

import { resolve } from 'node:path';

import { loadYamlFile } from '../../config/loader.js';
import { validateConfig } from '../../config/validator.js';
import { resolveConfig } from '../../config/resolver.js';
import { createOutput } from '../output.js';
import { handleError } from '../context.js';

/**
 * Options for the validate command
 */
export interface ValidateCommandOptions {
  json?: boolean;
}

/**
 * Execute the validate command.
 *
 * Warns (without failing) when the catalog is empty or when the default
 * slow-teardown service is not part of it.
 *
 * @param file - Path to the configuration file
 */
export async function validateCommand(
  file: string,
  options: ValidateCommandOptions
): Promise<void> {
  const output = createOutput('validate', options);

  try {
    const configPath = resolve(file);
    output.info(`Validating configuration: ${file}`);

    const validation = validateConfig(await loadYamlFile(configPath));
    if (!validation.valid) {
      output.validationError(validation.errors);
      output.flush();
      process.exit(1);
    }

    const config = resolveConfig(validation.config, configPath);
    output.validationSuccess(config);

    const warnings: string[] = [];
    if (config.catalog.services.length === 0 && config.catalog.processes.length === 0) {
      warnings.push('The catalog is empty; disable will only toggle the Task Scheduler.');
    }
    if (config.slowTeardown && !config.catalog.services.includes(config.slowTeardown.service)) {
      warnings.push(`${config.slowTeardown.service} is not in the service catalog, so its teardown wait never applies.`);
    }
    if (warnings.length > 0) {
      output.newline();
      for (const warning of warnings) {
        output.warning(warning);
      }
    }

    output.flush();
    process.exit(0);
  } catch (error) {
    handleError(output, error);
  }
}
