import { EventEmitter } from 'events';
import { Logger } from 'winston';
import type { StateStore } from '../store/types.js';
import { PeriodicTask } from './periodic-task.js';
import { PodScheduler } from './scheduler.js';
import { SettingsManager } from './settings.js';
import { PlacementStrategy } from './types.js';

export interface ReschedulerConfig {
  store: StateStore;
  logger: Logger;
  scheduler: PodScheduler;
  settings: SettingsManager;
  intervalMs?: number;
}

export interface RescheduleResult {
  strategy: PlacementStrategy;
  placed: Array<{ podId: string; nodeId: string }>;
  stillPending: string[];
}

/**
 * Retries every pending pod on each cycle using the current cluster
 * strategy. There is no backoff or attempt limit: a pod no single node can
 * hold is retried forever.
 *
 * Emits `podRescheduled` (podId, nodeId, strategy).
 */
export class Rescheduler extends EventEmitter {
  private config: ReschedulerConfig;
  private task: PeriodicTask;

  constructor(config: ReschedulerConfig) {
    super();
    this.config = config;
    this.task = new PeriodicTask({
      name: 'Rescheduler',
      intervalMs: config.intervalMs ?? 15000,
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

  sweep(): RescheduleResult {
    const result = this.config.store.transaction((tx) => {
      const strategy = this.config.settings.getStrategy();
      const pending = tx.listPods().filter(p => p.assignedNode === null);
      const outcome: RescheduleResult = { strategy, placed: [], stillPending: [] };

      for (const pod of pending) {
        const nodeId = this.config.scheduler.place(pod.id, pod.cpuRequest, strategy);
        if (nodeId) {
          outcome.placed.push({ podId: pod.id, nodeId });
        } else {
          outcome.stillPending.push(pod.id);
        }
      }

      return outcome;
    });

    for (const { podId, nodeId } of result.placed) {
      this.config.logger.info(`Rescheduled pod ${podId} to node ${nodeId} using ${result.strategy}`, {
        podId,
        nodeId,
        strategy: result.strategy,
      });
      this.emit('podRescheduled', podId, nodeId, result.strategy);
    }

    if (result.stillPending.length > 0) {
      this.config.logger.debug('Pods still pending after reschedule', { pods: result.stillPending });
    }

    return result;
  }
}
