import { Logger } from 'winston';
import { MemoryStateStore } from './memory-store.js';
import { SqliteStateStore } from './sqlite-store.js';
import type { StateStore, StoreDriver } from './types.js';

export type { StateStore, StoreTransaction, StoreDriver } from './types.js';
export { MemoryStateStore } from './memory-store.js';
export { SqliteStateStore } from './sqlite-store.js';

export interface StoreOptions {
  driver: StoreDriver;
  path: string;
  resetOnStartup: boolean;
}

export function createStateStore(options: StoreOptions, logger: Logger): StateStore {
  if (options.driver === 'memory') {
    logger.info('Using in-memory state store');
    return new MemoryStateStore();
  }
  return new SqliteStateStore({
    path: options.path,
    logger,
    resetOnStartup: options.resetOnStartup,
  });
}
