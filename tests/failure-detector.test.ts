import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { MemoryStateStore } from '../src/store/memory-store.js';
import { FailureDetector, NodeFailure } from '../src/cluster/failure-detector.js';
import { NodeRegistry } from '../src/cluster/node-registry.js';
import { PodRegistry } from '../src/cluster/pod-registry.js';
import { PodScheduler } from '../src/cluster/scheduler.js';
import { createMockLogger } from './helpers.js';

describe('FailureDetector', () => {
  let store: MemoryStateStore;
  let nodes: NodeRegistry;
  let detector: FailureDetector;

  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date('2024-01-01T00:00:00Z'));
    const logger = createMockLogger();
    store = new MemoryStateStore();
    nodes = new NodeRegistry({ store, logger });
    detector = new FailureDetector({ store, logger });
  });

  afterEach(() => {
    detector.stop();
    vi.useRealTimers();
  });

  it('leaves nodes alone while heartbeats are fresh', () => {
    nodes.register('a', 4);
    vi.advanceTimersByTime(30000);

    expect(detector.sweep()).toEqual([]);
    expect(nodes.get('a')?.status).toBe('healthy');
  });

  it('marks a silent node unhealthy and evicts its pods', () => {
    const logger = createMockLogger();
    const pods = new PodRegistry({ store, logger });
    const scheduler = new PodScheduler({ store, logger });
    nodes.register('a', 4);
    pods.create('p1', 2);
    scheduler.place('p1', 2, 'best_fit');

    vi.advanceTimersByTime(30001);
    const failures = detector.sweep();

    expect(failures).toEqual([{ nodeId: 'a', silentForMs: 30001, evicted: [{ podId: 'p1', cpuRequest: 2 }] }]);
    expect(nodes.get('a')).toMatchObject({ status: 'unhealthy', availableCpu: 4 });
    expect(pods.get('p1')?.assignedNode).toBeNull();
  });

  it('does not report an already unhealthy node again', () => {
    nodes.register('a', 4);
    vi.advanceTimersByTime(30001);
    expect(detector.sweep()).toHaveLength(1);

    vi.advanceTimersByTime(10000);
    expect(detector.sweep()).toEqual([]);
  });

  it('runs every 10 seconds once started and emits nodeFailed', () => {
    const failed: NodeFailure[] = [];
    detector.on('nodeFailed', (failure: NodeFailure) => failed.push(failure));
    nodes.register('a', 4);
    detector.start();

    // Ticks at 10s, 20s and 30s see a node silent for at most 30s
    vi.advanceTimersByTime(30000);
    expect(failed).toEqual([]);

    vi.advanceTimersByTime(10000);
    expect(failed.map(f => [f.nodeId, f.silentForMs])).toEqual([['a', 40000]]);
  });

  it('stops ticking after stop()', () => {
    nodes.register('a', 4);
    detector.start();
    expect(detector.isRunning()).toBe(true);

    detector.stop();
    vi.advanceTimersByTime(60000);

    expect(detector.isRunning()).toBe(false);
    expect(nodes.get('a')?.status).toBe('healthy');
  });

  it('honours a custom heartbeat timeout', () => {
    const logger = createMockLogger();
    const fast = new FailureDetector({ store, logger, heartbeatTimeoutMs: 1000 });
    nodes.register('a', 4);
    vi.advanceTimersByTime(1001);

    expect(fast.sweep().map(f => f.nodeId)).toEqual(['a']);
  });
});
