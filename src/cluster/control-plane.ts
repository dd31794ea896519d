import { EventEmitter } from 'events';
import { randomUUID } from 'crypto';
import { Logger } from 'winston';
import type { StateStore } from '../store/types.js';
import { ControlPlaneError } from './errors.js';
import { FailureDetector, NodeFailure } from './failure-detector.js';
import { HeartbeatSimulator } from './heartbeat-simulator.js';
import { LeaderElector } from './leader.js';
import { MetricsAggregator } from './metrics.js';
import { NodeRegistry } from './node-registry.js';
import { parseStrategy } from './placement.js';
import { PodRegistry } from './pod-registry.js';
import { Rescheduler, RescheduleResult } from './rescheduler.js';
import { PodScheduler } from './scheduler.js';
import { SettingsManager } from './settings.js';
import {
  EvictedPod,
  MetricsSnapshot,
  NodeRecord,
  PlacementStrategy,
  PodRecord,
} from './types.js';

export interface ControlPlaneConfig {
  store: StateStore;
  logger: Logger;
  defaultStrategy?: PlacementStrategy;
  scaleUpCpu?: number;
  heartbeatTimeoutMs?: number;
  failureDetectionIntervalMs?: number;
  rescheduleIntervalMs?: number;
  heartbeatSimulator?: {
    enabled: boolean;
    intervalMs?: number;
  };
}

export interface LaunchResult {
  podId: string;
  nodeId: string;
  strategy: PlacementStrategy;
}

function assertPositiveInteger(field: string, value: number): void {
  if (!Number.isInteger(value) || value <= 0) {
    throw ControlPlaneError.invalidArgument(field, `expected a positive integer, got ${value}`);
  }
}

/**
 * Entry point for every external operation. Owns the registries, the
 * scheduler and the three background tasks, all sharing one store.
 *
 * Relays `nodeFailed`, `podRescheduled` and `leaderChanged`, and emits
 * `nodeAdded`, `nodeRemoved`, `podLaunched` and `podPending`.
 */
export class ControlPlane extends EventEmitter {
  private config: ControlPlaneConfig;
  private logger: Logger;
  private scaleUpCpu: number;

  private nodes: NodeRegistry;
  private pods: PodRegistry;
  private scheduler: PodScheduler;
  private settings: SettingsManager;
  private failureDetector: FailureDetector;
  private rescheduler: Rescheduler;
  private leaderElector: LeaderElector;
  private metrics: MetricsAggregator;
  private heartbeatSimulator: HeartbeatSimulator | null = null;

  private running = false;

  constructor(config: ControlPlaneConfig) {
    super();
    this.config = config;
    this.logger = config.logger;
    this.scaleUpCpu = config.scaleUpCpu ?? 4;

    const { store, logger } = config;
    this.nodes = new NodeRegistry({ store, logger });
    this.pods = new PodRegistry({ store, logger, livenessWindowMs: config.heartbeatTimeoutMs });
    this.scheduler = new PodScheduler({ store, logger });
    this.settings = new SettingsManager({ store, logger, defaultStrategy: config.defaultStrategy });
    this.failureDetector = new FailureDetector({
      store,
      logger,
      intervalMs: config.failureDetectionIntervalMs,
      heartbeatTimeoutMs: config.heartbeatTimeoutMs,
    });
    this.rescheduler = new Rescheduler({
      store,
      logger,
      scheduler: this.scheduler,
      settings: this.settings,
      intervalMs: config.rescheduleIntervalMs,
    });
    this.leaderElector = new LeaderElector({ store, logger });
    this.metrics = new MetricsAggregator({ store });

    if (config.heartbeatSimulator?.enabled) {
      this.heartbeatSimulator = new HeartbeatSimulator({
        registry: this.nodes,
        logger,
        intervalMs: config.heartbeatSimulator.intervalMs,
      });
    }

    this.failureDetector.on('nodeFailed', (failure: NodeFailure) => this.emit('nodeFailed', failure));
    this.rescheduler.on('podRescheduled', (podId: string, nodeId: string, strategy: PlacementStrategy) =>
      this.emit('podRescheduled', podId, nodeId, strategy));
    this.leaderElector.on('leaderChanged', (leader: string, previous: string) =>
      this.emit('leaderChanged', leader, previous));
  }

  start(): void {
    if (this.running) {
      this.logger.warn('Control plane already running');
      return;
    }

    this.failureDetector.start();
    this.rescheduler.start();
    this.heartbeatSimulator?.start();
    this.running = true;
    this.logger.info('Control plane started', { strategy: this.settings.getStrategy() });
  }

  stop(): void {
    this.heartbeatSimulator?.stop();
    this.rescheduler.stop();
    this.failureDetector.stop();
    this.running = false;
    this.logger.info('Control plane stopped');
  }

  isRunning(): boolean {
    return this.running;
  }

  // Nodes

  addNode(id: string, totalCpu: number): NodeRecord {
    assertPositiveInteger('cpu', totalCpu);
    const node = this.nodes.register(id, totalCpu);
    this.emit('nodeAdded', node);
    return node;
  }

  scaleUp(count: number): NodeRecord[] {
    assertPositiveInteger('count', count);

    const added = this.config.store.transaction((tx) => {
      const created: NodeRecord[] = [];
      while (created.length < count) {
        const id = `node-${randomUUID().slice(0, 8)}`;
        if (tx.getNode(id)) continue;
        created.push(this.nodes.register(id, this.scaleUpCpu));
      }
      return created;
    });

    this.logger.info('Scaled up cluster', { added: added.length, cpu: this.scaleUpCpu });
    for (const node of added) {
      this.emit('nodeAdded', node);
    }
    return added;
  }

  removeNode(id: string): EvictedPod[] {
    const evicted = this.nodes.remove(id);
    this.emit('nodeRemoved', id, evicted);
    return evicted;
  }

  heartbeat(nodeId: string): NodeRecord {
    return this.nodes.heartbeat(nodeId);
  }

  failNode(id: string): EvictedPod[] {
    const evicted = this.nodes.markUnhealthy(id);
    this.logger.warn(`Node ${id} has been manually marked as failed`, {
      nodeId: id,
      evictedPods: evicted.map(p => p.podId),
    });
    return evicted;
  }

  recoverNode(id: string): NodeRecord {
    const node = this.nodes.markHealthy(id);
    this.logger.info(`Node ${id} has been manually recovered`, { nodeId: id });
    return node;
  }

  listNodes(): NodeRecord[] {
    return this.nodes.list();
  }

  // Pods

  /**
   * Creates the pod and tries to place it in one transaction. When no single
   * node fits, the pod is kept pending for the rescheduler and
   * NO_FEASIBLE_NODE is thrown to the caller.
   */
  launchPod(id: string, cpuRequest: number, strategyOverride?: string): LaunchResult {
    assertPositiveInteger('cpu', cpuRequest);

    const { strategy, nodeId } = this.config.store.transaction(() => {
      const pod = this.pods.create(id, cpuRequest);
      const strategy = strategyOverride ? parseStrategy(strategyOverride) : this.settings.getStrategy();
      const nodeId = this.scheduler.place(pod.id, pod.cpuRequest, strategy);
      return { strategy, nodeId };
    });

    if (nodeId === null) {
      this.emit('podPending', id);
      throw new ControlPlaneError(
        'NO_FEASIBLE_NODE',
        `No single node has enough resources right now with ${strategy}`,
        { podId: id, cpuRequest, strategy },
      );
    }

    this.emit('podLaunched', { podId: id, nodeId, strategy });
    return { podId: id, nodeId, strategy };
  }

  listPods(): PodRecord[] {
    return this.pods.list();
  }

  // Cluster

  getLeader(): string {
    return this.leaderElector.resolveLeader();
  }

  getStrategy(): PlacementStrategy {
    return this.settings.getStrategy();
  }

  setStrategy(name: string): PlacementStrategy {
    return this.settings.setStrategy(name);
  }

  getMetrics(): MetricsSnapshot {
    return this.metrics.snapshot();
  }

  // Manual triggers for the background sweeps

  detectFailures(): NodeFailure[] {
    return this.failureDetector.sweep();
  }

  reschedulePending(): RescheduleResult {
    return this.rescheduler.sweep();
  }
}
