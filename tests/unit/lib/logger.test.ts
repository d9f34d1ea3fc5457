/**
 * Unit tests for the logger
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';

import { BenchquietError } from '../../../src/core/errors.js';
import { Logger, configureLogger, logger } from '../../../src/lib/logger.js';

describe('Logger', () => {
  it('should collect entries in JSON mode', () => {
    const log = new Logger('json');
    log.info('No catalog services are running.');
    log.step('stop', 'WSearch, SysMain');
    log.warning('Task Scheduler settings updated. Restart required.');
    log.error('Failed to stop services: denied', new BenchquietError('denied', 'PERMISSION_DENIED'));

    assert.deepStrictEqual(log.getEntries(), [
      { level: 'info', message: 'No catalog services are running.' },
      { level: 'info', message: 'stop: WSearch, SysMain' },
      { level: 'warning', message: 'Task Scheduler settings updated. Restart required.' },
      { level: 'error', message: 'Failed to stop services: denied', code: 'PERMISSION_DENIED' },
    ]);
  });

  it('should record nothing in silent mode', () => {
    const log = new Logger('silent');
    log.success('done');
    log.step('wait', '90s for WSearch to finish tearing down');

    assert.deepStrictEqual(log.getEntries(), []);
  });

  it('should replace the global logger on configure', () => {
    const configured = configureLogger('silent');
    assert.strictEqual(logger, configured);
  });
});
