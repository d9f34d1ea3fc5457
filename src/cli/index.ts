#!/usr/bin/env node
import { program } from 'commander';
import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { dirname, join } from 'node:path';

import { validateCommand } from './commands/validate.js';
import { planCommand } from './commands/plan.js';
import { disableCommand } from './commands/disable.js';
import { enableCommand } from './commands/enable.js';
import { statusCommand } from './commands/status.js';

/**
 * Find package.json by walking up from this file; the depth differs between
 * running from src/ and from dist/src/.
 */
function readVersion(): string {
  let dir = dirname(fileURLToPath(import.meta.url));
  for (let i = 0; i < 4; i++) {
    try {
      const pkg: { version?: unknown } = JSON.parse(readFileSync(join(dir, 'package.json'), 'utf-8'));
      if (typeof pkg.version === 'string') {
        return pkg.version;
      }
    } catch {
      // not at this level
    }
    dir = dirname(dir);
  }
  return '0.0.0';
}

const VERBOSE_DESC = 'Print PowerShell scripts before execution';

program
  .name('benchquiet')
  .description('Quiesce background services and processes around a benchmark run on Windows')
  .version(readVersion())
  .option('--verbose', VERBOSE_DESC);

/**
 * Merge the global --verbose flag into command-level options, so it works
 * both before and after the subcommand name.
 */
function withGlobalOpts<T extends { verbose?: boolean }>(opts: T): T {
  const globalOpts = program.opts<{ verbose?: boolean }>();
  return { ...opts, verbose: opts.verbose === true || globalOpts.verbose === true };
}

program
  .command('validate <file>')
  .description('Validate a catalog configuration file')
  .option('--json', 'Output as JSON')
  .action(validateCommand);

program
  .command('plan <file>')
  .description('Show what disable would stop, without changing anything')
  .option('--json', 'Output as JSON')
  .option('--verbose', VERBOSE_DESC)
  .action((file: string, opts: { json?: boolean; verbose?: boolean }) => planCommand(file, withGlobalOpts(opts)));

program
  .command('disable <file>')
  .description('Stop catalog services and processes and save a snapshot')
  .option('--json', 'Output as JSON')
  .option('--verbose', VERBOSE_DESC)
  .action((file: string, opts: { json?: boolean; verbose?: boolean }) => disableCommand(file, withGlobalOpts(opts)));

program
  .command('enable <file>')
  .description('Restore what the saved snapshot recorded')
  .option('--json', 'Output as JSON')
  .option('--verbose', VERBOSE_DESC)
  .action((file: string, opts: { json?: boolean; verbose?: boolean }) => enableCommand(file, withGlobalOpts(opts)));

program
  .command('status <file>')
  .description('Show the saved snapshot, if any')
  .option('--json', 'Output as JSON')
  .action(statusCommand);

await program.parseAsync();
