import * as fs from 'fs/promises';
import { parse as parseYaml } from 'yaml';
import { isPlacementStrategy } from './cluster/placement.js';
import { PlacementStrategy } from './cluster/types.js';
import type { LoggingConfig } from './logger.js';
import type { StoreDriver } from './store/types.js';

export interface DaemonConfig {
  server: {
    host: string;
    port: number;
  };
  store: {
    driver: StoreDriver;
    path: string;
    resetOnStartup: boolean;
  };
  scheduler: {
    defaultStrategy: PlacementStrategy;
    scaleUpCpu: number;
  };
  failureDetector: {
    intervalMs: number;
    heartbeatTimeoutMs: number;
  };
  rescheduler: {
    intervalMs: number;
  };
  heartbeatSimulator: {
    enabled: boolean;
    intervalMs: number;
  };
  logging: LoggingConfig;
}

export const DEFAULT_CONFIG: DaemonConfig = {
  server: { host: '0.0.0.0', port: 50061 },
  store: { driver: 'sqlite', path: 'data/cluster.db', resetOnStartup: true },
  scheduler: { defaultStrategy: 'best_fit', scaleUpCpu: 4 },
  failureDetector: { intervalMs: 10000, heartbeatTimeoutMs: 30000 },
  rescheduler: { intervalMs: 15000 },
  heartbeatSimulator: { enabled: true, intervalMs: 5000 },
  logging: { level: 'info', format: 'text' },
};

type RawSection = Record<string, unknown>;

function isRecord(value: unknown): value is RawSection {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function section(raw: RawSection, key: string): RawSection {
  const value = raw[key];
  if (value === undefined || value === null) return {};
  if (!isRecord(value)) {
    throw new Error(`Invalid config: ${key} must be a mapping`);
  }
  return value;
}

function positiveInt(sec: RawSection, key: string, fallback: number, where: string): number {
  const value = sec[key];
  if (value === undefined) return fallback;
  if (typeof value !== 'number' || !Number.isInteger(value) || value <= 0) {
    throw new Error(`Invalid config: ${where}.${key} must be a positive integer`);
  }
  return value;
}

function str(sec: RawSection, key: string, fallback: string, where: string): string {
  const value = sec[key];
  if (value === undefined) return fallback;
  if (typeof value !== 'string' || value.length === 0) {
    throw new Error(`Invalid config: ${where}.${key} must be a non-empty string`);
  }
  return value;
}

function bool(sec: RawSection, key: string, fallback: boolean, where: string): boolean {
  const value = sec[key];
  if (value === undefined) return fallback;
  if (typeof value !== 'boolean') {
    throw new Error(`Invalid config: ${where}.${key} must be true or false`);
  }
  return value;
}

function oneOf<T extends string>(
  sec: RawSection,
  key: string,
  fallback: T,
  where: string,
  guard: (value: string) => value is T,
): T {
  const value = str(sec, key, fallback, where);
  if (!guard(value)) {
    throw new Error(`Invalid config: ${where}.${key} has unsupported value "${value}"`);
  }
  return value;
}

function isStoreDriver(value: string): value is StoreDriver {
  return value === 'memory' || value === 'sqlite';
}

function isLogFormat(value: string): value is LoggingConfig['format'] {
  return value === 'text' || value === 'json';
}

/** Validates a parsed YAML document and fills unset keys from DEFAULT_CONFIG. */
export function resolveConfig(raw: unknown): DaemonConfig {
  if (raw !== undefined && raw !== null && !isRecord(raw)) {
    throw new Error('Invalid config: document must be a mapping');
  }
  const doc: RawSection = isRecord(raw) ? raw : {};

  const d = DEFAULT_CONFIG;
  const server = section(doc, 'server');
  const store = section(doc, 'store');
  const scheduler = section(doc, 'scheduler');
  const failureDetector = section(doc, 'failureDetector');
  const rescheduler = section(doc, 'rescheduler');
  const simulator = section(doc, 'heartbeatSimulator');
  const logging = section(doc, 'logging');

  const file = logging.file;
  if (file !== undefined && file !== null && typeof file !== 'string') {
    throw new Error('Invalid config: logging.file must be a string');
  }

  return {
    server: {
      host: str(server, 'host', d.server.host, 'server'),
      port: positiveInt(server, 'port', d.server.port, 'server'),
    },
    store: {
      driver: oneOf(store, 'driver', d.store.driver, 'store', isStoreDriver),
      path: str(store, 'path', d.store.path, 'store'),
      resetOnStartup: bool(store, 'resetOnStartup', d.store.resetOnStartup, 'store'),
    },
    scheduler: {
      defaultStrategy: oneOf(scheduler, 'defaultStrategy', d.scheduler.defaultStrategy, 'scheduler', isPlacementStrategy),
      scaleUpCpu: positiveInt(scheduler, 'scaleUpCpu', d.scheduler.scaleUpCpu, 'scheduler'),
    },
    failureDetector: {
      intervalMs: positiveInt(failureDetector, 'intervalMs', d.failureDetector.intervalMs, 'failureDetector'),
      heartbeatTimeoutMs: positiveInt(
        failureDetector, 'heartbeatTimeoutMs', d.failureDetector.heartbeatTimeoutMs, 'failureDetector'),
    },
    rescheduler: {
      intervalMs: positiveInt(rescheduler, 'intervalMs', d.rescheduler.intervalMs, 'rescheduler'),
    },
    heartbeatSimulator: {
      enabled: bool(simulator, 'enabled', d.heartbeatSimulator.enabled, 'heartbeatSimulator'),
      intervalMs: positiveInt(simulator, 'intervalMs', d.heartbeatSimulator.intervalMs, 'heartbeatSimulator'),
    },
    logging: {
      level: str(logging, 'level', d.logging.level, 'logging'),
      format: oneOf(logging, 'format', d.logging.format, 'logging', isLogFormat),
      file: typeof file === 'string' ? file : undefined,
    },
  };
}

export async function loadConfig(filePath: string): Promise<DaemonConfig> {
  const content = await fs.readFile(filePath, 'utf-8');
  return resolveConfig(parseYaml(content));
}
