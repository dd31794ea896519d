#!/usr/bin/env node

import { EventEmitter } from 'events';
import * as fs from 'fs';
import { fileURLToPath } from 'url';
import { Command } from 'commander';
import winston from 'winston';

import { DaemonConfig, loadConfig } from './config.js';
import { createLogger } from './logger.js';
import { ControlPlane } from './cluster/control-plane.js';
import { errorMessage } from './cluster/errors.js';
import { NodeFailure } from './cluster/failure-detector.js';
import { createStateStore, StateStore } from './store/index.js';
import { GrpcServer } from './grpc/server.js';
import { createControlPlaneHandlers } from './grpc/handlers.js';

const DEFAULT_CONFIG_PATH = fileURLToPath(new URL('../config/default.yaml', import.meta.url));

/**
 * One control plane process: state store, control plane with its
 * background sweeps, and the gRPC server in front of it.
 */
export class ControlPlaneDaemon extends EventEmitter {
  private config: DaemonConfig;
  private logger: winston.Logger;

  private store: StateStore | null = null;
  private controlPlane: ControlPlane | null = null;
  private grpcServer: GrpcServer | null = null;

  private running = false;

  constructor(config: DaemonConfig, logger?: winston.Logger) {
    super();
    this.config = config;
    this.logger = logger ?? createLogger(config.logging);
  }

  async start(): Promise<void> {
    if (this.running) {
      this.logger.warn('Daemon already running');
      return;
    }

    this.store = createStateStore(this.config.store, this.logger);

    this.controlPlane = new ControlPlane({
      store: this.store,
      logger: this.logger,
      defaultStrategy: this.config.scheduler.defaultStrategy,
      scaleUpCpu: this.config.scheduler.scaleUpCpu,
      heartbeatTimeoutMs: this.config.failureDetector.heartbeatTimeoutMs,
      failureDetectionIntervalMs: this.config.failureDetector.intervalMs,
      rescheduleIntervalMs: this.config.rescheduler.intervalMs,
      heartbeatSimulator: this.config.heartbeatSimulator,
    });

    this.controlPlane.on('nodeFailed', (failure: NodeFailure) => this.emit('nodeFailed', failure));
    this.controlPlane.on('leaderChanged', (leader: string) => this.emit('leaderChanged', leader));

    this.grpcServer = new GrpcServer({
      host: this.config.server.host,
      port: this.config.server.port,
      logger: this.logger,
    });

    try {
      await this.grpcServer.loadProto();
      this.grpcServer.registerServices(createControlPlaneHandlers({
        logger: this.logger,
        controlPlane: this.controlPlane,
      }));
      await this.grpcServer.start();
    } catch (error) {
      this.store.close();
      this.store = null;
      throw error;
    }

    this.controlPlane.start();
    this.running = true;
    this.logger.info('Control plane daemon started', {
      port: this.grpcServer.getPort(),
      store: this.config.store.driver,
    });
    this.emit('started');
  }

  async stop(): Promise<void> {
    if (!this.running) {
      return;
    }

    this.logger.info('Stopping control plane daemon...');
    this.controlPlane?.stop();

    try {
      await this.grpcServer?.stop();
    } catch (error) {
      this.logger.error('Error stopping gRPC server', { error: errorMessage(error) });
    }

    this.store?.close();
    this.store = null;
    this.running = false;
    this.emit('stopped');
  }

  getPort(): number | null {
    return this.grpcServer?.getPort() ?? null;
  }

  isRunning(): boolean {
    return this.running;
  }
}

async function main(): Promise<void> {
  const program = new Command();

  program
    .name('binpackd')
    .description('Cluster control plane: node/pod tracking, bin-packing placement and failure detection')
    .version('0.1.0')
    .option('-c, --config <path>', 'Path to configuration file')
    .option('-p, --port <number>', 'gRPC port to listen on')
    .option('--store-path <path>', 'SQLite database file')
    .option('--memory', 'Keep cluster state in memory only')
    .option('-v, --verbose', 'Enable verbose logging')
    .parse(process.argv);

  const options = program.opts<{
    config?: string;
    port?: string;
    storePath?: string;
    memory?: boolean;
    verbose?: boolean;
  }>();

  const configPath = options.config ?? DEFAULT_CONFIG_PATH;
  if (!fs.existsSync(configPath)) {
    throw new Error(`Config file not found: ${configPath}`);
  }
  const config = await loadConfig(configPath);

  if (options.port) {
    const port = parseInt(options.port, 10);
    if (Number.isNaN(port) || port < 0) {
      throw new Error(`Invalid port: ${options.port}`);
    }
    config.server.port = port;
  }

  if (options.storePath) {
    config.store.path = options.storePath;
  }

  if (options.memory) {
    config.store.driver = 'memory';
  }

  if (options.verbose) {
    config.logging.level = 'debug';
  }

  const daemon = new ControlPlaneDaemon(config);

  const shutdown = (signal: string): void => {
    console.log(`\nReceived ${signal}, shutting down gracefully...`);
    daemon.stop()
      .then(() => process.exit(0))
      .catch((error) => {
        console.error('Shutdown failed:', errorMessage(error));
        process.exit(1);
      });
  };

  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));

  await daemon.start();
  console.log(`\nControl plane ready on ${config.server.host}:${daemon.getPort()}. Press Ctrl+C to exit.\n`);
}

export { ControlPlaneDaemon as default };

/**
 * True when `scriptPath` (normally `process.argv[1]`) resolves to the module
 * at `moduleUrl`. npm installs bins as symlinks, so both sides are resolved.
 */
export function isEntryPoint(scriptPath: string | undefined, moduleUrl: string): boolean {
  if (!scriptPath || !fs.existsSync(scriptPath)) {
    return false;
  }
  return fs.realpathSync(scriptPath) === fs.realpathSync(fileURLToPath(moduleUrl));
}

// Run if executed directly
if (isEntryPoint(process.argv[1], import.meta.url)) {
  main().catch((error) => {
    console.error('Fatal error:', errorMessage(error));
    process.exit(1);
  });
}
