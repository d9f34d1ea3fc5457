/**
 * Configuration Loader
 *
 * Reads the YAML catalog file from disk.
 */

import { readFile } from 'node:fs/promises';
import yaml from 'js-yaml';

/**
 * Error thrown when the configuration file cannot be read or parsed
 */
export class ConfigLoadError extends Error {
  constructor(
    message: string,
    public readonly filePath: string,
    public readonly reason: 'not-found' | 'unreadable' | 'invalid-yaml',
    public override readonly cause?: Error
  ) {
    super(message);
    this.name = 'ConfigLoadError';
  }
}

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}

/**
 * Load and parse a YAML configuration file.
 *
 * An empty file parses to an empty object so that validation reports the
 * missing keys instead of a type error on `undefined`.
 *
 * @returns Parsed content, still unvalidated
 * @throws ConfigLoadError if the file cannot be read or is not valid YAML
 */
export async function loadYamlFile(filePath: string): Promise<unknown> {
  let content: string;

  try {
    content = await readFile(filePath, 'utf-8');
  } catch (error) {
    const code = isErrnoException(error) ? error.code : undefined;
    const cause = error instanceof Error ? error : undefined;
    if (code === 'ENOENT') {
      throw new ConfigLoadError(`Configuration file not found: ${filePath}`, filePath, 'not-found', cause);
    }
    throw new ConfigLoadError(
      code === 'EACCES'
        ? `Permission denied reading configuration file: ${filePath}`
        : `Failed to read configuration file: ${filePath}`,
      filePath,
      'unreadable',
      cause
    );
  }

  try {
    return yaml.load(content) ?? {};
  } catch (error) {
    const message = error instanceof yaml.YAMLException ? error.message : String(error);
    throw new ConfigLoadError(
      `Invalid YAML syntax in ${filePath}: ${message}`,
      filePath,
      'invalid-yaml',
      error instanceof Error ? error : undefined
    );
  }
}
