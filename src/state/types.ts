/**
 * State Types for benchquiet
 *
 * The snapshot file kept on disk between `disable` and `enable` runs.
 */

import type { Snapshot } from '../core/types.js';

/**
 * Root structure persisted as .benchquiet/snapshot.json
 */
export interface SnapshotFile {
  /** Schema version for migrations */
  version: 1;
  /** Absolute path of the config the snapshot was taken with */
  configPath: string;
  /** ISO timestamp of the write */
  savedAt: string;
  snapshot: Snapshot;
}
