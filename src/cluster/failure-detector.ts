import { EventEmitter } from 'events';
import { Logger } from 'winston';
import type { StateStore } from '../store/types.js';
import { PeriodicTask } from './periodic-task.js';
import { evictPodsFromNode } from './pod-registry.js';
import { EvictedPod } from './types.js';

export interface FailureDetectorConfig {
  store: StateStore;
  logger: Logger;
  intervalMs?: number;
  heartbeatTimeoutMs?: number;
}

export interface NodeFailure {
  nodeId: string;
  silentForMs: number;
  evicted: EvictedPod[];
}

/**
 * Marks healthy nodes whose last heartbeat is older than the timeout as
 * unhealthy and evicts their pods in the same transaction.
 *
 * Emits `nodeFailed` with a {@link NodeFailure} per transition.
 */
export class FailureDetector extends EventEmitter {
  private config: FailureDetectorConfig;
  private task: PeriodicTask;
  private heartbeatTimeoutMs: number;

  constructor(config: FailureDetectorConfig) {
    super();
    this.config = config;
    this.heartbeatTimeoutMs = config.heartbeatTimeoutMs ?? 30000;
    this.task = new PeriodicTask({
      name: 'Failure detector',
      intervalMs: config.intervalMs ?? 10000,
      logger: config.logger,
      run: () => {
        this.sweep();
      },
    });
  }

  start(): void {
    this.task.start();
  }

  stop(): void {
    this.task.stop();
  }

  isRunning(): boolean {
    return this.task.isRunning();
  }

  sweep(): NodeFailure[] {
    const failures = this.config.store.transaction((tx) => {
      const now = Date.now();
      const result: NodeFailure[] = [];

      for (const node of tx.listNodes()) {
        const silentForMs = now - node.lastHeartbeat;
        if (node.status !== 'healthy' || silentForMs <= this.heartbeatTimeoutMs) continue;

        tx.putNode({ ...node, status: 'unhealthy' });
        const evicted = evictPodsFromNode(tx, node.id);
        result.push({ nodeId: node.id, silentForMs, evicted });
      }

      return result;
    });

    for (const failure of failures) {
      this.config.logger.warn('Node failed', {
        nodeId: failure.nodeId,
        silentForMs: failure.silentForMs,
        evictedPods: failure.evicted.map(p => p.podId),
      });
      this.emit('nodeFailed', failure);
    }

    return failures;
  }
}
