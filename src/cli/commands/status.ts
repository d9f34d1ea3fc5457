/**
 * Status Command Handler
 *
 * Shows whether a snapshot is waiting to be restored and what it holds.
 * Reads only the snapshot file; the host is not queried.
 */

import { computeCatalogHash } from '../../lib/hash.js';
import { SnapshotStore } from '../../state/manager.js';
import { createOutput } from '../output.js';
import { handleError, loadConfig, type CommandOptions } from '../context.js';

/**
 * Execute the status command.
 *
 * @param file - Path to the configuration file
 */
export async function statusCommand(
  file: string,
  options: Pick<CommandOptions, 'json'>
): Promise<void> {
  const output = createOutput('status', options);

  try {
    const config = await loadConfig(file, output);
    if (!config) {
      output.flush();
      process.exit(1);
    }

    const store = new SnapshotStore(config.snapshotPath, config.configPath);
    if (!(await store.exists())) {
      output.info('Host is not quiesced: no snapshot is stored.');
      output.flush();
      process.exit(0);
    }

    const stored = await store.load();
    output.info(`Host is quiesced (snapshot saved ${stored.savedAt}).`);
    output.snapshotSummary(stored.snapshot);
    if (stored.snapshot.catalogHash !== computeCatalogHash(config.catalog)) {
      output.warning('The catalog has changed since this snapshot was taken; enable will refuse it.');
    }

    output.flush();
    process.exit(0);
  } catch (error) {
    handleError(output, error);
  }
}
