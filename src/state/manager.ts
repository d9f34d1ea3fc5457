/**
 * Snapshot Store
 *
 * Keeps the snapshot produced by `disable` on disk until `enable` consumes
 * it. Writes are atomic (temp file, then rename) so an interrupted write
 * never leaves a half-written snapshot behind.
 */

import { mkdir, readFile, rename, rm, stat, writeFile } from 'node:fs/promises';
import { dirname, resolve } from 'node:path';

import type { ProcessRecord, ServiceRecord, Snapshot } from '../core/types.js';
import { SnapshotError, errorMessage } from '../core/errors.js';
import type { SnapshotFile } from './types.js';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isServiceRecord(value: unknown): value is ServiceRecord {
  return (
    isRecord(value) &&
    typeof value['name'] === 'string' &&
    typeof value['existed'] === 'boolean' &&
    typeof value['wasRunning'] === 'boolean' &&
    (value['existed'] === true || value['wasRunning'] === false)
  );
}

function isProcessRecord(value: unknown): value is ProcessRecord {
  return (
    isRecord(value) &&
    typeof value['name'] === 'string' &&
    typeof value['existed'] === 'boolean' &&
    typeof value['wasSuspended'] === 'boolean' &&
    (value['existed'] === true || value['wasSuspended'] === false) &&
    (value['executablePath'] === null || typeof value['executablePath'] === 'string')
  );
}

/**
 * Check that parsed JSON has the shape of a snapshot.
 */
export function isSnapshot(value: unknown): value is Snapshot {
  return (
    isRecord(value) &&
    typeof value['id'] === 'string' &&
    typeof value['createdAt'] === 'string' &&
    typeof value['catalogHash'] === 'string' &&
    Array.isArray(value['services']) &&
    value['services'].every(isServiceRecord) &&
    Array.isArray(value['processes']) &&
    value['processes'].every(isProcessRecord)
  );
}

function isSnapshotFile(value: unknown): value is SnapshotFile {
  return (
    isRecord(value) &&
    value['version'] === 1 &&
    typeof value['configPath'] === 'string' &&
    typeof value['savedAt'] === 'string' &&
    isSnapshot(value['snapshot'])
  );
}

export class SnapshotStore {
  private readonly snapshotPath: string;

  constructor(
    snapshotPath: string,
    private readonly configPath: string
  ) {
    this.snapshotPath = resolve(snapshotPath);
  }

  /**
   * Whether an unconsumed snapshot is on disk.
   */
  async exists(): Promise<boolean> {
    try {
      await stat(this.snapshotPath);
      return true;
    } catch {
      return false;
    }
  }

  /**
   * Read the stored snapshot file.
   *
   * @throws SnapshotError if there is none or it cannot be parsed
   */
  async load(): Promise<SnapshotFile> {
    let content: string;
    try {
      content = await readFile(this.snapshotPath, 'utf-8');
    } catch {
      throw new SnapshotError(
        `No snapshot found at ${this.snapshotPath}`,
        'SNAPSHOT_NOT_FOUND',
        'Run `benchquiet disable <file>` first; enable restores what disable recorded.',
        this.snapshotPath
      );
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(content);
    } catch {
      parsed = undefined;
    }
    if (!isSnapshotFile(parsed)) {
      throw new SnapshotError(
        `Snapshot file is corrupted: ${this.snapshotPath}`,
        'SNAPSHOT_CORRUPTED',
        'Inspect the file, restore services by hand if needed, then delete it.',
        this.snapshotPath
      );
    }
    return parsed;
  }

  /**
   * Wrap a snapshot in the on-disk envelope.
   */
  createFile(snapshot: Snapshot): SnapshotFile {
    return {
      version: 1,
      configPath: resolve(this.configPath),
      savedAt: new Date().toISOString(),
      snapshot,
    };
  }

  /**
   * Persist a snapshot. Refuses to overwrite one that has not been consumed,
   * since that would lose the record of what to restore.
   *
   * @throws SnapshotError if a snapshot is already stored or the write fails
   */
  async save(snapshot: Snapshot): Promise<SnapshotFile> {
    if (await this.exists()) {
      throw new SnapshotError(
        `A snapshot is already stored at ${this.snapshotPath}`,
        'SNAPSHOT_EXISTS',
        'Run `benchquiet enable <file>` to restore the host before disabling again.',
        this.snapshotPath
      );
    }

    const file = this.createFile(snapshot);
    const tempPath = `${this.snapshotPath}.tmp`;
    try {
      await mkdir(dirname(this.snapshotPath), { recursive: true });
      await writeFile(tempPath, JSON.stringify(file, null, 2), 'utf-8');
      await rename(tempPath, this.snapshotPath);
    } catch (error) {
      throw new SnapshotError(
        `Could not write snapshot to ${this.snapshotPath}: ${errorMessage(error)}`,
        'SNAPSHOT_WRITE_FAILED',
        `Save the snapshot printed below as ${this.snapshotPath}, then run \`benchquiet enable <file>\`.`,
        this.snapshotPath
      );
    }
    return file;
  }

  /**
   * Delete the stored snapshot once it has been consumed.
   */
  async consume(): Promise<void> {
    await rm(this.snapshotPath, { force: true });
  }

  getSnapshotPath(): string {
    return this.snapshotPath;
  }
}
