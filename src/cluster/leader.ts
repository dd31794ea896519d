import { EventEmitter } from 'events';
import { Logger } from 'winston';
import type { StateStore } from '../store/types.js';
import { NO_LEADER, NodeRecord } from './types.js';

export interface LeaderElectorConfig {
  store: StateStore;
  logger: Logger;
}

/**
 * Keeps the current leader while it exists and is healthy, otherwise picks
 * the healthy node with the lexicographically smallest id. Returns null
 * when no node is healthy.
 */
export function electLeader(nodes: readonly NodeRecord[], current: string | null): string | null {
  const healthy = nodes.filter(n => n.status === 'healthy');

  if (current !== null && healthy.some(n => n.id === current)) {
    return current;
  }

  let leader: string | null = null;
  for (const node of healthy) {
    if (leader === null || node.id < leader) {
      leader = node.id;
    }
  }
  return leader;
}

/**
 * Sticky leader selection over the stored node table. This is selection,
 * not consensus: there is no term and no quorum.
 *
 * Emits `leaderChanged` (newLeader, previousLeader).
 */
export class LeaderElector extends EventEmitter {
  private config: LeaderElectorConfig;

  constructor(config: LeaderElectorConfig) {
    super();
    this.config = config;
  }

  resolveLeader(): string {
    const { previous, leader } = this.config.store.transaction((tx) => {
      const stored = tx.getSetting('leader') ?? null;
      const elected = electLeader(tx.listNodes(), stored);

      if (elected === null) {
        tx.deleteSetting('leader');
      } else if (elected !== stored) {
        tx.putSetting('leader', elected);
      }
      return { previous: stored, leader: elected };
    });

    if (leader !== previous) {
      this.config.logger.info('Leader changed', { leader: leader ?? NO_LEADER, previous: previous ?? NO_LEADER });
      this.emit('leaderChanged', leader ?? NO_LEADER, previous ?? NO_LEADER);
    }

    return leader ?? NO_LEADER;
  }
}
