/**
 * Enable Command Handler
 *
 * Restores the host from the snapshot `disable` stored, then deletes the
 * snapshot so it cannot be replayed.
 */

import { getCancelExitCode } from '../../core/errors.js';
import { SnapshotStore } from '../../state/manager.js';
import { createOutput } from '../output.js';
import { createQuiescer, handleError, loadConfig, type CommandOptions } from '../context.js';

/**
 * Execute the enable command.
 *
 * The snapshot survives a cancelled run (guard refusal, catalog mismatch)
 * so enable can be retried.
 *
 * @param file - Path to the configuration file
 */
export async function enableCommand(file: string, options: CommandOptions): Promise<void> {
  const output = createOutput('enable', options);

  try {
    const config = await loadConfig(file, output);
    if (!config) {
      output.flush();
      process.exit(1);
    }

    const store = new SnapshotStore(config.snapshotPath, config.configPath);
    const stored = await store.load();

    const quiescer = createQuiescer(config, options, output);
    const result = await quiescer.enable(stored.snapshot);

    if (result.status === 'cancelled') {
      output.cancelled(result.reason, result.message);
      output.flush();
      process.exit(getCancelExitCode(result.reason));
    }

    await store.consume();
    output.restoreSummary(result.value);

    output.flush();
    process.exit(0);
  } catch (error) {
    handleError(output, error);
  }
}
