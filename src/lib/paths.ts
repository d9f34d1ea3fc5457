/**
 * Path Utilities
 *
 * Path expansion for configuration values and the default snapshot location.
 */

import { homedir } from 'node:os';
import { dirname, isAbsolute, join, resolve } from 'node:path';

/**
 * Name of the directory kept next to the config file
 */
export const STATE_DIR_NAME = '.benchquiet';

/**
 * Expand `~`, `%VAR%` and `$VAR`, then resolve relative paths against a base.
 *
 * Unset variables expand to the empty string.
 */
export function expandPath(inputPath: string, basePath: string): string {
  let expanded = inputPath.startsWith('~')
    ? join(homedir(), inputPath.slice(1))
    : inputPath;

  expanded = expanded
    .replace(/%([^%]+)%/g, (_, varName: string) => process.env[varName] ?? '')
    .replace(/\$([A-Za-z_][A-Za-z0-9_]*)/g, (_, varName: string) => process.env[varName] ?? '');

  return isAbsolute(expanded) ? expanded : resolve(basePath, expanded);
}

/**
 * Default snapshot location for a config file.
 *
 * @returns `<config dir>/.benchquiet/snapshot.json`
 */
export function getDefaultSnapshotPath(configPath: string): string {
  return join(dirname(resolve(configPath)), STATE_DIR_NAME, 'snapshot.json');
}
