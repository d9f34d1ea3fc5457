/**
 * Unit tests for Configuration Resolver
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';
import { dirname, join, resolve } from 'node:path';
import { fileURLToPath } from 'node:url';

import { loadYamlFile } from '../../../src/config/loader.js';
import { DEFAULTS, resolveConfig } from '../../../src/config/resolver.js';
import type { BenchquietConfig } from '../../../src/config/types.js';
import { validateConfig } from '../../../src/config/validator.js';

const VALID_CONFIGS = fileURLToPath(new URL('../../fixtures/valid-configs', import.meta.url));

async function loadValid(file: string): Promise<{ config: BenchquietConfig; path: string }> {
  const path = join(VALID_CONFIGS, file);
  const result = validateConfig(await loadYamlFile(path));
  assert.ok(result.valid);
  return { config: result.config, path };
}

describe('resolveConfig', () => {
  it('should apply every default to a minimal catalog', async () => {
    const { config, path } = await loadValid('minimal.yaml');
    const resolved = resolveConfig(config, path);

    assert.deepStrictEqual(resolved, {
      catalog: { services: ['SysMain'], processes: [] },
      scheduler: {
        service: 'Schedule',
        registryPath: 'HKLM:\\SYSTEM\\CurrentControlSet\\Services\\Schedule',
        valueName: 'Start',
      },
      guard: { warmupMinutes: 5 },
      slowTeardown: { service: 'WSearch', delaySeconds: 90 },
      snapshotPath: join(VALID_CONFIGS, '.benchquiet', 'snapshot.json'),
      configPath: path,
    });
  });

  it('should take explicit values over defaults', async () => {
    const { config, path } = await loadValid('full.yaml');
    const resolved = resolveConfig(config, path);

    assert.deepStrictEqual(resolved.catalog.processes, ['VendorUpdater', 'VendorHelper']);
    assert.strictEqual(resolved.guard.warmupMinutes, 10);
    assert.deepStrictEqual(resolved.slowTeardown, { service: 'WSearch', delaySeconds: 120 });
    assert.strictEqual(resolved.snapshotPath, resolve(VALID_CONFIGS, 'state/snapshot.json'));
  });

  it('should switch the slow teardown off on an explicit null', async () => {
    const { config, path } = await loadValid('no-slow-teardown.yaml');

    assert.strictEqual(resolveConfig(config, path).slowTeardown, null);
  });

  it('should fill a partial slow-teardown block from the defaults', () => {
    const resolved = resolveConfig(
      { services: ['WSearch'], processes: [], slow_teardown: { delay_seconds: 30 } },
      'bench.yaml'
    );

    assert.deepStrictEqual(resolved.slowTeardown, { service: 'WSearch', delaySeconds: 30 });
  });

  it('should resolve a relative config path against the working directory', () => {
    const resolved = resolveConfig({ services: [], processes: [] }, 'bench.yaml');

    assert.strictEqual(resolved.configPath, resolve('bench.yaml'));
    assert.strictEqual(dirname(dirname(resolved.snapshotPath)), dirname(resolve('bench.yaml')));
  });

  it('should copy the catalog rather than share it', () => {
    const config: BenchquietConfig = { services: ['SysMain'], processes: [] };
    const resolved = resolveConfig(config, 'bench.yaml');
    config.services.push('WSearch');

    assert.deepStrictEqual(resolved.catalog.services, ['SysMain']);
  });

  it('should expose the scheduler defaults', () => {
    assert.strictEqual(DEFAULTS.scheduler.service, 'Schedule');
    assert.strictEqual(DEFAULTS.scheduler.valueName, 'Start');
  });
});
