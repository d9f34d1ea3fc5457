/**
 * Unit tests for storing the disable snapshot
 */

import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert';
import { mkdir, rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { randomUUID } from 'node:crypto';

import { saveSnapshot } from '../../../src/cli/commands/disable.js';
import { createOutput } from '../../../src/cli/output.js';
import type { Snapshot } from '../../../src/core/types.js';
import { SnapshotStore } from '../../../src/state/manager.js';

const SNAPSHOT: Snapshot = {
  id: 'c0ffee00-0000-4000-8000-000000000002',
  createdAt: '2026-03-02T10:00:00.000Z',
  catalogHash: 'abcd1234',
  services: [{ name: 'WSearch', existed: true, wasRunning: true }],
  processes: [],
};

describe('saveSnapshot', () => {
  let dir: string;

  beforeEach(async () => {
    dir = join(tmpdir(), `benchquiet-disable-test-${randomUUID()}`);
    await mkdir(dir, { recursive: true });
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('should store the snapshot', async () => {
    const store = new SnapshotStore(join(dir, '.benchquiet', 'snapshot.json'), join(dir, 'bench.yaml'));
    const output = createOutput('disable', { json: true });

    assert.strictEqual(await saveSnapshot(store, SNAPSHOT, output), true);
    assert.deepStrictEqual((await store.load()).snapshot, SNAPSHOT);
    assert.strictEqual(output.getResult().success, true);
  });

  it('should hand the snapshot to the output when the write fails', async () => {
    // A file where the snapshot directory should be makes mkdir fail.
    const blocker = join(dir, 'blocker');
    await writeFile(blocker, 'not a directory', 'utf-8');
    const snapshotPath = join(blocker, 'snapshot.json');
    const store = new SnapshotStore(snapshotPath, join(dir, 'bench.yaml'));
    const output = createOutput('disable', { json: true });

    assert.strictEqual(await saveSnapshot(store, SNAPSHOT, output), false);

    const result = output.getResult();
    assert.strictEqual(result.success, false);
    assert.strictEqual(result.error?.code, 'SNAPSHOT_WRITE_FAILED');
    assert.strictEqual(
      result.error?.suggestion,
      `Save the snapshot printed below as ${snapshotPath}, then run \`benchquiet enable <file>\`.`
    );

    const data = result.data;
    assert.ok(typeof data === 'object' && data !== null && 'snapshot' in data && 'configPath' in data);
    assert.deepStrictEqual(data.snapshot, SNAPSHOT);
    assert.strictEqual(data.configPath, join(dir, 'bench.yaml'));
  });
});
