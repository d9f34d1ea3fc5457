/**
 * Plan Command Handler
 *
 * Probes the catalog and shows what `disable` would stop. Read-only: no
 * service, process or registry value is changed, and no elevation is needed
 * beyond what the probes themselves require.
 */

import { createOutput } from '../output.js';
import { createQuiescer, handleError, loadConfig, type CommandOptions } from '../context.js';

/**
 * Execute the plan command.
 *
 * @param file - Path to the configuration file
 */
export async function planCommand(file: string, options: CommandOptions): Promise<void> {
  const output = createOutput('plan', options);

  try {
    const config = await loadConfig(file, output);
    if (!config) {
      output.flush();
      process.exit(1);
    }

    const quiescer = createQuiescer(config, options, output);
    output.info('Probing services and processes...');
    output.newline();

    output.planSummary(await quiescer.plan());

    output.flush();
    process.exit(0);
  } catch (error) {
    handleError(output, error);
  }
}
