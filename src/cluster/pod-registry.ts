import { Logger } from 'winston';
import type { StateStore, StoreTransaction } from '../store/types.js';
import { ControlPlaneError } from './errors.js';
import { EvictedPod, PodRecord } from './types.js';

export interface PodRegistryConfig {
  store: StateStore;
  logger: Logger;
  livenessWindowMs?: number;
}

/**
 * Returns every pod on `nodeId` to pending and gives its CPU back to the
 * node. Must run inside the caller's transaction.
 */
export function evictPodsFromNode(tx: StoreTransaction, nodeId: string): EvictedPod[] {
  const pods = tx.listPodsOnNode(nodeId);
  if (pods.length === 0) return [];

  const node = tx.getNode(nodeId);
  let released = 0;

  for (const pod of pods) {
    tx.putPod({ ...pod, assignedNode: null, status: 'pending' });
    released += pod.cpuRequest;
  }

  if (node) {
    tx.putNode({
      ...node,
      availableCpu: Math.min(node.totalCpu, node.availableCpu + released),
    });
  }

  return pods.map(pod => ({ podId: pod.id, cpuRequest: pod.cpuRequest }));
}

export class PodRegistry {
  private config: PodRegistryConfig;
  private livenessWindowMs: number;

  constructor(config: PodRegistryConfig) {
    this.config = config;
    this.livenessWindowMs = config.livenessWindowMs ?? 30000;
  }

  /**
   * Inserts a pending pod after the cluster-wide admission check. The check
   * sums free CPU over nodes that heartbeated within the liveness window,
   * whatever their recorded status, so it can pass while no single node
   * fits the request.
   */
  create(id: string, cpuRequest: number): PodRecord {
    return this.config.store.transaction((tx) => {
      if (tx.getPod(id)) {
        throw ControlPlaneError.duplicatePod(id);
      }

      const now = Date.now();
      const admissibleCpu = tx.listNodes()
        .filter(n => now - n.lastHeartbeat <= this.livenessWindowMs)
        .reduce((sum, n) => sum + n.availableCpu, 0);

      if (admissibleCpu < cpuRequest) {
        throw new ControlPlaneError(
          'INSUFFICIENT_CLUSTER_CAPACITY',
          'Insufficient cluster-wide resources to schedule pod',
          { podId: id, cpuRequest, admissibleCpu },
        );
      }

      const pod: PodRecord = { id, cpuRequest, assignedNode: null, status: 'pending' };
      tx.putPod(pod);

      this.config.logger.info('Pod created', { podId: id, cpuRequest });
      return pod;
    });
  }

  get(id: string): PodRecord | undefined {
    return this.config.store.transaction(tx => tx.getPod(id));
  }

  list(): PodRecord[] {
    return this.config.store.transaction(tx => tx.listPods());
  }

  listPending(): PodRecord[] {
    return this.config.store.transaction(tx => tx.listPods().filter(p => p.assignedNode === null));
  }
}
