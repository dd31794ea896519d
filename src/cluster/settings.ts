import { Logger } from 'winston';
import type { StateStore } from '../store/types.js';
import { parseStrategy } from './placement.js';
import { ClusterSettings, PlacementStrategy } from './types.js';

export interface SettingsManagerConfig {
  store: StateStore;
  logger: Logger;
  defaultStrategy?: PlacementStrategy;
}

export class SettingsManager {
  private config: SettingsManagerConfig;

  constructor(config: SettingsManagerConfig) {
    this.config = config;
  }

  getStrategy(): PlacementStrategy {
    return this.config.store.transaction((tx) => {
      const stored = tx.getSetting('strategy');
      return stored === undefined
        ? this.config.defaultStrategy ?? parseStrategy(undefined)
        : parseStrategy(stored);
    });
  }

  /** Stores the strategy; unrecognized names are stored as best_fit. */
  setStrategy(name: string): PlacementStrategy {
    const strategy = parseStrategy(name);
    this.config.store.transaction(tx => tx.putSetting('strategy', strategy));

    if (strategy !== name.trim().toLowerCase()) {
      this.config.logger.warn('Unrecognized placement strategy, using default', { requested: name, strategy });
    } else {
      this.config.logger.info('Placement strategy updated', { strategy });
    }
    return strategy;
  }

  getSettings(): ClusterSettings {
    return this.config.store.transaction(tx => ({
      strategy: this.getStrategy(),
      leader: tx.getSetting('leader') ?? null,
    }));
  }
}
