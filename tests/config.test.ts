import { describe, it, expect } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { fileURLToPath } from 'url';
import { DEFAULT_CONFIG, loadConfig, resolveConfig } from '../src/config.js';

describe('resolveConfig', () => {
  it('returns the defaults for an empty document', () => {
    expect(resolveConfig(null)).toEqual(DEFAULT_CONFIG);
    expect(resolveConfig({})).toEqual(DEFAULT_CONFIG);
  });

  it('merges partial sections over the defaults', () => {
    const config = resolveConfig({
      server: { port: 6000 },
      store: { driver: 'memory' },
      scheduler: { defaultStrategy: 'worst_fit' },
      logging: { format: 'json', file: 'logs/cp.log' },
    });

    expect(config.server).toEqual({ host: '0.0.0.0', port: 6000 });
    expect(config.store).toEqual({ driver: 'memory', path: 'data/cluster.db', resetOnStartup: true });
    expect(config.scheduler).toEqual({ defaultStrategy: 'worst_fit', scaleUpCpu: 4 });
    expect(config.logging).toEqual({ level: 'info', format: 'json', file: 'logs/cp.log' });
  });

  it('rejects invalid values with the offending key', () => {
    expect(() => resolveConfig({ server: { port: -1 } }))
      .toThrow('Invalid config: server.port must be a positive integer');
    expect(() => resolveConfig({ store: { driver: 'postgres' } }))
      .toThrow('Invalid config: store.driver has unsupported value "postgres"');
    expect(() => resolveConfig({ scheduler: { defaultStrategy: 'random' } }))
      .toThrow('Invalid config: scheduler.defaultStrategy has unsupported value "random"');
    expect(() => resolveConfig({ heartbeatSimulator: { enabled: 'yes' } }))
      .toThrow('Invalid config: heartbeatSimulator.enabled must be true or false');
    expect(() => resolveConfig({ rescheduler: 'often' }))
      .toThrow('Invalid config: rescheduler must be a mapping');
    expect(() => resolveConfig(['a']))
      .toThrow('Invalid config: document must be a mapping');
  });
});

describe('loadConfig', () => {
  it('loads the shipped default.yaml', async () => {
    const shipped = fileURLToPath(new URL('../config/default.yaml', import.meta.url));

    expect(await loadConfig(shipped)).toEqual(DEFAULT_CONFIG);
  });

  it('parses YAML from disk', async () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'control-plane-config-'));
    const file = path.join(dir, 'config.yaml');
    fs.writeFileSync(file, [
      'failureDetector:',
      '  heartbeatTimeoutMs: 5000',
      'heartbeatSimulator:',
      '  enabled: false',
    ].join('\n'));

    try {
      const config = await loadConfig(file);
      expect(config.failureDetector).toEqual({ intervalMs: 10000, heartbeatTimeoutMs: 5000 });
      expect(config.heartbeatSimulator).toEqual({ enabled: false, intervalMs: 5000 });
    } finally {
      fs.rmSync(dir, { recursive: true, force: true });
    }
  });
});
