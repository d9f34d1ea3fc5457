/**
 * Disable Command Handler
 *
 * Quiesces the host before a benchmark run and stores the snapshot that
 * `enable` needs to undo it.
 */

import { getCancelExitCode, isBenchquietError } from '../../core/errors.js';
import type { Snapshot } from '../../core/types.js';
import { SnapshotStore } from '../../state/manager.js';
import { createOutput, type OutputFormatter } from '../output.js';
import { createQuiescer, handleError, loadConfig, type CommandOptions } from '../context.js';

/**
 * Store the snapshot of a host that has just been quiesced.
 *
 * On a failed write the snapshot is handed to the output instead of being
 * dropped, since it is the only record of what enable must restore.
 *
 * @returns Whether the snapshot was stored
 */
export async function saveSnapshot(
  store: SnapshotStore,
  snapshot: Snapshot,
  output: OutputFormatter
): Promise<boolean> {
  try {
    await store.save(snapshot);
    return true;
  } catch (error) {
    if (!isBenchquietError(error)) {
      throw error;
    }
    output.unsavedSnapshot(store.createFile(snapshot), error);
    return false;
  }
}

/**
 * Execute the disable command.
 *
 * Exit codes: 0 quiesced, 1 config or snapshot-file error, 2 quiesced but
 * the snapshot could not be written, 3 cancelled (guard refused or a
 * restart is pending).
 *
 * @param file - Path to the configuration file
 */
export async function disableCommand(file: string, options: CommandOptions): Promise<void> {
  const output = createOutput('disable', options);

  try {
    const config = await loadConfig(file, output);
    if (!config) {
      output.flush();
      process.exit(1);
    }

    // Checked before touching the host so an unconsumed snapshot is never lost.
    const store = new SnapshotStore(config.snapshotPath, config.configPath);
    if (await store.exists()) {
      output.error(
        `A snapshot from an earlier disable is still stored at ${store.getSnapshotPath()}.`
      );
      output.info('Run `benchquiet enable <file>` first.');
      output.flush();
      process.exit(1);
    }

    const quiescer = createQuiescer(config, options, output);
    const result = await quiescer.disable();

    if (result.status === 'cancelled') {
      output.cancelled(result.reason, result.message);
      output.flush();
      process.exit(getCancelExitCode(result.reason));
    }

    if (!(await saveSnapshot(store, result.value, output))) {
      output.flush();
      process.exit(2);
    }
    output.newline();
    output.snapshotSummary(result.value);
    output.success(`Host quiesced. Snapshot saved to ${store.getSnapshotPath()}`);

    output.flush();
    process.exit(0);
  } catch (error) {
    handleError(output, error);
  }
}
