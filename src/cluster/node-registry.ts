import { Logger } from 'winston';
import type { StateStore } from '../store/types.js';
import { ControlPlaneError } from './errors.js';
import { evictPodsFromNode } from './pod-registry.js';
import { EvictedPod, NodeRecord } from './types.js';

export interface NodeRegistryConfig {
  store: StateStore;
  logger: Logger;
}

export class NodeRegistry {
  private config: NodeRegistryConfig;

  constructor(config: NodeRegistryConfig) {
    this.config = config;
  }

  register(id: string, totalCpu: number): NodeRecord {
    return this.config.store.transaction((tx) => {
      if (tx.getNode(id)) {
        throw ControlPlaneError.duplicateNode(id);
      }

      const node: NodeRecord = {
        id,
        totalCpu,
        availableCpu: totalCpu,
        lastHeartbeat: Date.now(),
        status: 'healthy',
      };
      tx.putNode(node);

      this.config.logger.info('Node added', { nodeId: id, cpu: totalCpu });
      return node;
    });
  }

  /**
   * Deletes a node. Pods still assigned to it are evicted in the same
   * transaction so no pod is left pointing at a missing node.
   */
  remove(id: string): EvictedPod[] {
    return this.config.store.transaction((tx) => {
      if (!tx.getNode(id)) {
        throw ControlPlaneError.nodeNotFound(id);
      }

      const evicted = evictPodsFromNode(tx, id);
      tx.deleteNode(id);

      this.config.logger.info('Node removed', { nodeId: id, evictedPods: evicted.length });
      return evicted;
    });
  }

  // A heartbeat resurrects an unhealthy node
  heartbeat(id: string): NodeRecord {
    return this.config.store.transaction((tx) => {
      const node = tx.getNode(id);
      if (!node) {
        throw ControlPlaneError.nodeNotFound(id);
      }

      const updated: NodeRecord = { ...node, lastHeartbeat: Date.now(), status: 'healthy' };
      tx.putNode(updated);

      if (node.status === 'unhealthy') {
        this.config.logger.info('Node recovered via heartbeat', { nodeId: id });
      } else {
        this.config.logger.debug('Heartbeat received', { nodeId: id });
      }
      return updated;
    });
  }

  markUnhealthy(id: string): EvictedPod[] {
    return this.config.store.transaction((tx) => {
      const node = tx.getNode(id);
      if (!node) {
        throw ControlPlaneError.nodeNotFound(id);
      }

      tx.putNode({ ...node, status: 'unhealthy' });
      return evictPodsFromNode(tx, id);
    });
  }

  markHealthy(id: string): NodeRecord {
    return this.config.store.transaction((tx) => {
      const node = tx.getNode(id);
      if (!node) {
        throw ControlPlaneError.nodeNotFound(id);
      }

      const updated: NodeRecord = { ...node, status: 'healthy', lastHeartbeat: Date.now() };
      tx.putNode(updated);
      return updated;
    });
  }

  /**
   * Refreshes every node's heartbeat timestamp without touching status.
   * Used by the heartbeat simulator.
   */
  heartbeatAll(): number {
    return this.config.store.transaction((tx) => {
      const now = Date.now();
      const nodes = tx.listNodes();
      for (const node of nodes) {
        tx.putNode({ ...node, lastHeartbeat: now });
      }
      return nodes.length;
    });
  }

  get(id: string): NodeRecord | undefined {
    return this.config.store.transaction(tx => tx.getNode(id));
  }

  list(): NodeRecord[] {
    return this.config.store.transaction(tx => tx.listNodes());
  }
}
