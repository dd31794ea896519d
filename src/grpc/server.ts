import * as grpc from '@grpc/grpc-js';
import { EventEmitter } from 'events';
import net from 'net';
import { Logger } from 'winston';
import { loadControlPlaneService } from './proto.js';
import type { ControlPlaneHandlers } from './handlers.js';

export interface GrpcServerConfig {
  host: string;
  port: number;
  logger: Logger;
}

export class GrpcServer extends EventEmitter {
  private server: grpc.Server;
  private config: GrpcServerConfig;
  private service: grpc.ServiceClientConstructor | null = null;
  private started = false;
  private boundPort: number | null = null;

  constructor(config: GrpcServerConfig) {
    super();
    this.config = config;
    this.server = new grpc.Server({
      'grpc.keepalive_time_ms': 10000,
      'grpc.keepalive_timeout_ms': 5000,
      'grpc.keepalive_permit_without_calls': 1,
    });
  }

  async loadProto(): Promise<void> {
    this.service = await loadControlPlaneService();
  }

  registerServices(handlers: ControlPlaneHandlers): void {
    if (!this.service) {
      throw new Error('Proto not loaded. Call loadProto() first.');
    }
    this.server.addService(this.service.service, handlers);
    this.config.logger.info('Registered ControlPlaneService');
  }

  async start(): Promise<void> {
    // Port 0 asks the OS for a free port, nothing to check
    if (this.config.port !== 0 && await this.isPortInUse(this.config.port)) {
      this.config.logger.error('Port already in use', { port: this.config.port });
      throw new Error(
        `Port ${this.config.port} is already in use.\n\nUse a different port with: --port ${this.config.port + 1}`
      );
    }

    return new Promise((resolve, reject) => {
      const address = `${this.config.host}:${this.config.port}`;
      const credentials = grpc.ServerCredentials.createInsecure();

      this.server.bindAsync(address, credentials, (error, port) => {
        if (error) {
          this.config.logger.error('Failed to bind gRPC server', { error: error.message });
          reject(error);
          return;
        }

        this.started = true;
        this.boundPort = port;
        this.config.logger.info(`gRPC server listening on ${this.config.host}:${port}`, { port });
        this.emit('started', { host: this.config.host, port });
        resolve();
      });
    });
  }

  private async isPortInUse(port: number): Promise<boolean> {
    return new Promise((resolve) => {
      const probe = net.createServer();

      probe.once('error', (err: NodeJS.ErrnoException) => {
        resolve(err.code === 'EADDRINUSE');
      });

      probe.once('listening', () => {
        probe.close();
        resolve(false);
      });

      probe.listen(port, this.config.host);
    });
  }

  getPort(): number | null {
    return this.boundPort;
  }

  async stop(): Promise<void> {
    return new Promise((resolve) => {
      if (!this.started) {
        resolve();
        return;
      }

      this.server.tryShutdown(() => {
        this.started = false;
        this.config.logger.info('gRPC server stopped');
        this.emit('stopped');
        resolve();
      });
    });
  }
}
