import { Logger } from 'winston';
import { errorMessage } from './errors.js';

export interface PeriodicTaskConfig {
  name: string;
  intervalMs: number;
  logger: Logger;
  run: () => void;
}

/**
 * Fixed-period background job. A failing run is logged and the next tick
 * starts again from current state.
 */
export class PeriodicTask {
  private config: PeriodicTaskConfig;
  private interval: NodeJS.Timeout | null = null;
  private failures = 0;

  constructor(config: PeriodicTaskConfig) {
    this.config = config;
  }

  start(): void {
    if (this.interval) return;
    this.interval = setInterval(() => this.tick(), this.config.intervalMs);
    this.config.logger.info(`${this.config.name} started`, { intervalMs: this.config.intervalMs });
  }

  stop(): void {
    if (this.interval) {
      clearInterval(this.interval);
      this.interval = null;
      this.config.logger.info(`${this.config.name} stopped`);
    }
  }

  isRunning(): boolean {
    return this.interval !== null;
  }

  getFailureCount(): number {
    return this.failures;
  }

  tick(): boolean {
    try {
      this.config.run();
      return true;
    } catch (error) {
      this.failures++;
      this.config.logger.error(`${this.config.name} cycle failed`, {
        error: errorMessage(error),
        failures: this.failures,
      });
      return false;
    }
  }
}
