import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { Logger } from 'winston';
import { MemoryStateStore } from '../src/store/memory-store.js';
import { NodeRegistry } from '../src/cluster/node-registry.js';
import { PodRegistry } from '../src/cluster/pod-registry.js';
import { PodScheduler } from '../src/cluster/scheduler.js';
import { Rescheduler } from '../src/cluster/rescheduler.js';
import { SettingsManager } from '../src/cluster/settings.js';
import { createMockLogger } from './helpers.js';

describe('Rescheduler', () => {
  let logger: Logger;
  let store: MemoryStateStore;
  let nodes: NodeRegistry;
  let pods: PodRegistry;
  let scheduler: PodScheduler;
  let settings: SettingsManager;
  let rescheduler: Rescheduler;

  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date('2024-01-01T00:00:00Z'));
    logger = createMockLogger();
    store = new MemoryStateStore();
    nodes = new NodeRegistry({ store, logger });
    pods = new PodRegistry({ store, logger });
    scheduler = new PodScheduler({ store, logger });
    settings = new SettingsManager({ store, logger });
    rescheduler = new Rescheduler({ store, logger, scheduler, settings });
  });

  afterEach(() => {
    rescheduler.stop();
    vi.useRealTimers();
  });

  it('moves evicted pods to a surviving node', () => {
    nodes.register('A', 4);
    nodes.register('B', 4);
    pods.create('p1', 2);
    expect(scheduler.place('p1', 2, 'first_fit')).toBe('A');

    nodes.markUnhealthy('A');
    const result = rescheduler.sweep();

    expect(result).toEqual({ strategy: 'best_fit', placed: [{ podId: 'p1', nodeId: 'B' }], stillPending: [] });
    expect(pods.get('p1')).toMatchObject({ assignedNode: 'B', status: 'running' });
    expect(nodes.get('B')?.availableCpu).toBe(2);
    expect(logger.info).toHaveBeenCalledWith('Rescheduled pod p1 to node B using best_fit', {
      podId: 'p1',
      nodeId: 'B',
      strategy: 'best_fit',
    });
  });

  it('uses the current cluster strategy', () => {
    nodes.register('A', 10);
    nodes.register('B', 4);
    pods.create('p1', 3);
    settings.setStrategy('worst_fit');

    expect(rescheduler.sweep().placed).toEqual([{ podId: 'p1', nodeId: 'A' }]);
  });

  it('keeps pods pending when nothing fits and retries them later', () => {
    nodes.register('A', 4);
    nodes.register('B', 4);
    pods.create('wide', 6);

    expect(rescheduler.sweep().stillPending).toEqual(['wide']);

    nodes.register('C', 8);
    expect(rescheduler.sweep().placed).toEqual([{ podId: 'wide', nodeId: 'C' }]);
  });

  it('runs every 15 seconds and emits podRescheduled', () => {
    const events: string[][] = [];
    rescheduler.on('podRescheduled', (podId: string, nodeId: string, strategy: string) =>
      events.push([podId, nodeId, strategy]));
    nodes.register('A', 4);
    pods.create('p1', 1);
    rescheduler.start();

    vi.advanceTimersByTime(14999);
    expect(events).toEqual([]);

    vi.advanceTimersByTime(1);
    expect(events).toEqual([['p1', 'A', 'best_fit']]);
  });

  it('survives a failing cycle and runs the next one', () => {
    nodes.register('A', 4);
    pods.create('p1', 1);
    const spy = vi.spyOn(scheduler, 'place').mockImplementationOnce(() => {
      throw new Error('store unavailable');
    });
    rescheduler.start();

    vi.advanceTimersByTime(15000);
    expect(logger.error).toHaveBeenCalledWith('Rescheduler cycle failed', { error: 'store unavailable', failures: 1 });
    expect(pods.get('p1')?.status).toBe('pending');

    vi.advanceTimersByTime(15000);
    expect(pods.get('p1')?.assignedNode).toBe('A');
    expect(spy).toHaveBeenCalledTimes(2);
  });
});
