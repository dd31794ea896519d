import { Logger } from 'winston';
import type { StateStore } from '../store/types.js';
import { selectNode } from './placement.js';
import { PlacementStrategy } from './types.js';

export interface PodSchedulerConfig {
  store: StateStore;
  logger: Logger;
}

export class PodScheduler {
  private config: PodSchedulerConfig;

  constructor(config: PodSchedulerConfig) {
    this.config = config;
  }

  /**
   * Selects a healthy node for the pod, deducts its CPU and marks the pod
   * running, all inside one transaction. Returns the node id, or null when
   * no healthy node fits and the pod stays pending.
   */
  place(podId: string, cpuRequest: number, strategy: PlacementStrategy): string | null {
    return this.config.store.transaction((tx) => {
      const pod = tx.getPod(podId);
      if (!pod) {
        this.config.logger.warn('Cannot place unknown pod', { podId });
        return null;
      }
      if (pod.assignedNode !== null) {
        return pod.assignedNode;
      }

      const node = selectNode(tx.listNodes(), cpuRequest, strategy);
      if (!node) {
        this.config.logger.debug('No feasible node for pod', { podId, cpuRequest, strategy });
        return null;
      }

      tx.putNode({ ...node, availableCpu: node.availableCpu - cpuRequest });
      tx.putPod({ ...pod, assignedNode: node.id, status: 'running' });

      this.config.logger.info('Pod scheduled', { podId, nodeId: node.id, cpuRequest, strategy });
      return node.id;
    });
  }
}
