/**
 * Unit tests for the CLI output formatter (JSON mode)
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';

import { createOutput } from '../../../src/cli/output.js';
import { SnapshotError } from '../../../src/core/errors.js';
import type { RestoreReport, Snapshot } from '../../../src/core/types.js';

const SNAPSHOT: Snapshot = {
  id: 'snap-1',
  createdAt: '2026-03-02T10:00:00.000Z',
  catalogHash: 'abcd1234',
  services: [
    { name: 'WSearch', existed: true, wasRunning: true },
    { name: 'Spooler', existed: true, wasRunning: false },
  ],
  processes: [
    { name: 'Updater', existed: true, wasSuspended: false, executablePath: 'u.exe' },
    { name: 'Phone', existed: true, wasSuspended: true, executablePath: 'p.exe' },
  ],
};

describe('OutputFormatter', () => {
  it('should summarise a snapshot', () => {
    const output = createOutput('disable', { json: true });
    output.snapshotSummary(SNAPSHOT);

    const result = output.getResult();
    assert.strictEqual(result.success, true);
    assert.deepStrictEqual(result.summary, { services: 1, processes: 1 });
    assert.strictEqual(result.data, SNAPSHOT);
  });

  it('should summarise a restore', () => {
    const report: RestoreReport = {
      servicesStarted: ['WSearch'],
      processesLaunched: ['Updater'],
      skipped: [{ name: 'Phone', reason: 'was-suspended' }],
      scheduler: { state: 'enabled', changed: true, requiresRestart: true, message: 'restart' },
    };
    const output = createOutput('enable', { json: true });
    output.restoreSummary(report);

    assert.deepStrictEqual(output.getResult().summary, { services: 1, processes: 1, skipped: 1 });
  });

  it('should record a cancellation as unsuccessful', () => {
    const output = createOutput('disable', { json: true });
    output.cancelled('pending-restart', 'Task Scheduler settings updated. Restart required.');

    assert.deepStrictEqual(output.getResult(), {
      success: false,
      command: 'disable',
      cancelled: {
        reason: 'pending-restart',
        message: 'Task Scheduler settings updated. Restart required.',
      },
    });
  });

  it('should record an error with its code and fix', () => {
    const output = createOutput('enable', { json: true });
    output.error('No snapshot found', new SnapshotError('No snapshot found', 'SNAPSHOT_NOT_FOUND', 'Run disable first.'));

    assert.deepStrictEqual(output.getResult().error, {
      code: 'SNAPSHOT_NOT_FOUND',
      message: 'No snapshot found',
      suggestion: 'Run disable first.',
    });
  });

  it('should record validation errors as details', () => {
    const output = createOutput('validate', { json: true });
    const errors = [{ path: '/', message: "must have required property 'processes'" }];
    output.validationError(errors);

    assert.deepStrictEqual(output.getResult().error, {
      code: 'CONFIG_VALIDATION_FAILED',
      message: 'Configuration validation failed',
      details: { errors },
    });
  });
});
