import type { StateStore } from '../store/types.js';
import { MetricsSnapshot } from './types.js';

export interface MetricsAggregatorConfig {
  store: StateStore;
}

export class MetricsAggregator {
  private config: MetricsAggregatorConfig;

  constructor(config: MetricsAggregatorConfig) {
    this.config = config;
  }

  // Nodes and pods are read in one transaction so the counts agree
  snapshot(): MetricsSnapshot {
    return this.config.store.transaction((tx) => {
      const nodes = tx.listNodes();
      const pods = tx.listPods();
      const healthy = nodes.filter(n => n.status === 'healthy');

      return {
        healthyNodes: healthy.length,
        totalFreeCpu: healthy.reduce((sum, n) => sum + n.availableCpu, 0),
        runningPods: pods.filter(p => p.status === 'running').length,
        totalNodes: nodes.length,
        pendingPods: pods.filter(p => p.status === 'pending').length,
      };
    });
  }
}
