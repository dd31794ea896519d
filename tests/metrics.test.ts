import { describe, it, expect, beforeEach } from 'vitest';
import { MemoryStateStore } from '../src/store/memory-store.js';
import { MetricsAggregator } from '../src/cluster/metrics.js';
import { NodeRegistry } from '../src/cluster/node-registry.js';
import { PodRegistry } from '../src/cluster/pod-registry.js';
import { PodScheduler } from '../src/cluster/scheduler.js';
import { createMockLogger } from './helpers.js';

describe('MetricsAggregator', () => {
  let store: MemoryStateStore;
  let metrics: MetricsAggregator;

  beforeEach(() => {
    store = new MemoryStateStore();
    metrics = new MetricsAggregator({ store });
  });

  it('reports zeros for an empty cluster', () => {
    expect(metrics.snapshot()).toEqual({
      healthyNodes: 0,
      totalFreeCpu: 0,
      runningPods: 0,
      totalNodes: 0,
      pendingPods: 0,
    });
  });

  it('counts free CPU on healthy nodes only', () => {
    const logger = createMockLogger();
    const nodes = new NodeRegistry({ store, logger });
    const pods = new PodRegistry({ store, logger });
    const scheduler = new PodScheduler({ store, logger });

    nodes.register('a', 8);
    nodes.register('b', 4);
    nodes.register('c', 6);
    pods.create('p1', 3);
    pods.create('p2', 5);
    pods.create('p3', 9);
    scheduler.place('p1', 3, 'first_fit');
    scheduler.place('p2', 5, 'first_fit');
    nodes.markUnhealthy('c');

    // a: 8 - 3 - 5 = 0, b: 4, c excluded
    expect(metrics.snapshot()).toEqual({
      healthyNodes: 2,
      totalFreeCpu: 4,
      runningPods: 2,
      totalNodes: 3,
      pendingPods: 1,
    });
  });
});
