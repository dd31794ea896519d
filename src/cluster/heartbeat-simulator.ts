import { Logger } from 'winston';
import { NodeRegistry } from './node-registry.js';
import { PeriodicTask } from './periodic-task.js';

export interface HeartbeatSimulatorConfig {
  registry: NodeRegistry;
  logger: Logger;
  intervalMs?: number;
}

// Stands in for node agents: refreshes every node's timestamp, never its status.
export class HeartbeatSimulator {
  private task: PeriodicTask;

  constructor(config: HeartbeatSimulatorConfig) {
    this.task = new PeriodicTask({
      name: 'Heartbeat simulator',
      intervalMs: config.intervalMs ?? 5000,
      logger: config.logger,
      run: () => {
        const refreshed = config.registry.heartbeatAll();
        config.logger.debug('Simulated heartbeats', { nodes: refreshed });
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
}
