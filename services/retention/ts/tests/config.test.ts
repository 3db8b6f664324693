/**
 * Configuration tests: environment settings and the YAML rules file
 *
 * Uses node:test + node:assert.
 */

import { after, before, describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { mkdir, mkdtemp, rm, writeFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { loadConfig, loadRules, validateConfig } from '../src/config.js';
import { ConfigurationError } from '../src/errors.js';

let dir = '';

async function writeRules(name: string, content: string): Promise<string> {
  const file = path.join(dir, name);
  await mkdir(path.dirname(file), { recursive: true });
  await writeFile(file, content, 'utf8');
  return file;
}

function instanceYaml(url: string): string {
  return ['instances:', '  - transmission:', `      url: ${url}`, ''].join('\n');
}

describe('loadRules', () => {
  before(async () => {
    dir = await mkdtemp(path.join(os.tmpdir(), 'seedsweep-config-'));
  });

  after(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('builds instances and policies from YAML', async () => {
    const file = await writeRules(
      'rules.yaml',
      `
instances:
  - transmission:
      url: http://localhost:9091/transmission/rpc
      user: admin
      password_env: TEST_TRANSMISSION_PASSWORD
      poll_interval: 60
    policies:
      - name: public
        trackers: [tracker.example.org]
        max_ratio: 1.0
        min_seeding_time: 1 hour
        max_seeding_time: 2 days
      - trackers: [other.example.org]
        max_file_count: 1
        max_seeding_time: 3600
        delete_data: false
`
    );

    const instances = await loadRules(file, { TEST_TRANSMISSION_PASSWORD: 'test-secret' });

    assert.equal(instances.length, 1);
    const [instance] = instances;
    assert.deepEqual(instance.transmission, {
      url: 'http://localhost:9091/transmission/rpc',
      user: 'admin',
      password: 'test-secret',
      pollIntervalMs: 60_000,
    });

    const [publicPolicy, unnamed] = instance.policies;
    assert.equal(publicPolicy.name, 'public');
    assert.equal(publicPolicy.deleteData, true);
    assert.deepEqual([...publicPolicy.precondition.trackers], ['tracker.example.org']);
    assert.equal(publicPolicy.condition.maxRatio, 1);
    assert.equal(publicPolicy.condition.minSeedingTimeMs, 3_600_000);
    assert.equal(publicPolicy.condition.maxSeedingTimeMs, 172_800_000);

    assert.equal(unnamed.name, null);
    assert.equal(unnamed.deleteData, false);
    assert.equal(unnamed.precondition.maxFileCount, 1);
    assert.equal(unnamed.condition.maxSeedingTimeMs, 3_600_000);
  });

  it('puts included instances first', async () => {
    await writeRules('shared/other.yaml', instanceYaml('http://other.example:9091/transmission/rpc'));
    const file = await writeRules(
      'main.yaml',
      ['include:', '  - shared/other.yaml', instanceYaml('http://main.example:9091/transmission/rpc')].join('\n')
    );

    const instances = await loadRules(file, {});

    assert.deepEqual(
      instances.map((instance) => instance.transmission.url),
      ['http://other.example:9091/transmission/rpc', 'http://main.example:9091/transmission/rpc']
    );
  });

  it('detects include cycles', async () => {
    const first = await writeRules('cycle-a.yaml', 'include: [cycle-b.yaml]\n');
    const second = await writeRules('cycle-b.yaml', 'include: [cycle-a.yaml]\n');

    await assert.rejects(loadRules(first, {}), {
      name: 'ConfigurationError',
      message: `Include cycle: ${first} -> ${second} -> ${first}`,
    });
  });

  it('treats an empty file as no instances', async () => {
    const file = await writeRules('empty.yaml', '');

    assert.deepEqual(await loadRules(file, {}), []);
  });

  it('rejects policies without thresholds', async () => {
    const file = await writeRules(
      'no-threshold.yaml',
      `
instances:
  - transmission:
      url: http://localhost:9091/transmission/rpc
    policies:
      - name: everything
        trackers: [tracker.example.org]
`
    );

    await assert.rejects(loadRules(file, {}), (error: unknown) => {
      assert.ok(error instanceof ConfigurationError);
      assert.ok(error.message.startsWith(`${file}: instances.0: policy "everything": Set at least one of`));
      return true;
    });
  });

  it('reports durations that do not parse', async () => {
    const file = await writeRules(
      'bad-duration.yaml',
      `
instances:
  - transmission:
      url: http://localhost:9091/transmission/rpc
    policies:
      - trackers: [tracker.example.org]
        min_seeding_time: soon
`
    );

    await assert.rejects(loadRules(file, {}), {
      message: `${file}: instances.0: min_seeding_time: Invalid duration "soon": unexpected input at "soon"`,
    });
  });

  it('requires the password_env variable to be set', async () => {
    const file = await writeRules(
      'password-env.yaml',
      `
instances:
  - transmission:
      url: http://localhost:9091/transmission/rpc
      password_env: MISSING_PASSWORD
`
    );

    await assert.rejects(loadRules(file, {}), {
      message: `${file}: instances.0: environment variable MISSING_PASSWORD (password_env) is not set`,
    });
  });

  it('rejects unknown keys', async () => {
    const file = await writeRules(
      'typo.yaml',
      `
instances:
  - transmission:
      url: http://localhost:9091/transmission/rpc
      passwrd: test-secret
`
    );

    await assert.rejects(loadRules(file, {}), (error: unknown) => {
      assert.ok(error instanceof ConfigurationError);
      assert.ok(error.message.includes("Unrecognized key(s) in object: 'passwrd'"));
      return true;
    });
  });

  it('reports missing files', async () => {
    const file = path.join(dir, 'absent.yaml');

    await assert.rejects(loadRules(file, {}), (error: unknown) => {
      assert.ok(error instanceof ConfigurationError);
      assert.ok(error.message.startsWith(`loading ${file}: `));
      return true;
    });
  });
});

describe('loadConfig', () => {
  const saved = { ...process.env };

  after(() => {
    for (const key of ['SEEDSWEEP_CONFIG', 'SEEDSWEEP_TAKE_ACTION', 'SEEDSWEEP_METRICS_ADDR']) {
      const value = saved[key];
      if (value === undefined) {
        delete process.env[key];
      } else {
        process.env[key] = value;
      }
    }
  });

  it('reads the environment and lets overrides win', () => {
    process.env.SEEDSWEEP_CONFIG = '/etc/seedsweep/rules.yaml';
    process.env.SEEDSWEEP_TAKE_ACTION = 'false';
    process.env.SEEDSWEEP_METRICS_ADDR = '';

    assert.deepEqual(loadConfig({ take_action: true }), {
      rules_path: '/etc/seedsweep/rules.yaml',
      take_action: true,
      metrics_addr: undefined,
    });
  });

  it('parses the take action flag', () => {
    process.env.SEEDSWEEP_TAKE_ACTION = 'yes';
    process.env.SEEDSWEEP_METRICS_ADDR = ':9100';

    const config = loadConfig({ rules_path: 'rules.yaml' });

    assert.equal(config.rules_path, 'rules.yaml');
    assert.equal(config.take_action, true);
    assert.equal(config.metrics_addr, ':9100');
  });
});

describe('validateConfig', () => {
  it('requires a rules path', () => {
    assert.equal(validateConfig({ rules_path: '', take_action: false }), false);
  });

  it('requires a usable metrics address', () => {
    assert.equal(validateConfig({ rules_path: 'rules.yaml', take_action: false, metrics_addr: 'nope' }), false);
    assert.equal(validateConfig({ rules_path: 'rules.yaml', take_action: false, metrics_addr: '127.0.0.1:9100' }), true);
  });
});
