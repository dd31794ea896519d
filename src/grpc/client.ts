import * as grpc from '@grpc/grpc-js';
import { EventEmitter } from 'events';
import { Logger } from 'winston';
import { loadControlPlaneService } from './proto.js';
import {
  AddNodeRequest,
  EmptyMessage,
  EvictionResponse,
  LaunchPodRequest,
  LaunchPodResponse,
  LeaderResponse,
  ListNodesResponse,
  ListPodsResponse,
  MetricsResponse,
  NodeIdRequest,
  NodeResponse,
  ScaleUpRequest,
  ScaleUpResponse,
  SetStrategyRequest,
  StrategyResponse,
} from './types.js';

export interface GrpcClientConfig {
  logger: Logger;
  defaultTimeoutMs?: number;
}

export interface ClientConnection {
  address: string;
  client: grpc.Client;
  connected: boolean;
  lastError?: Error;
}

export class GrpcClientPool extends EventEmitter {
  private config: GrpcClientConfig;
  private service: grpc.ServiceClientConstructor | null = null;
  private connections: Map<string, ClientConnection> = new Map();
  private defaultCredentials: grpc.ChannelCredentials;

  constructor(config: GrpcClientConfig) {
    super();
    this.config = config;
    this.defaultCredentials = grpc.credentials.createInsecure();
  }

  async loadProto(): Promise<void> {
    this.service = await loadControlPlaneService();
  }

  private ensureProtoLoaded(): grpc.ServiceClientConstructor {
    if (!this.service) {
      throw new Error('Proto not loaded. Call loadProto() first.');
    }
    return this.service;
  }

  getConnection(address: string): ClientConnection {
    let connection = this.connections.get(address);
    if (connection) {
      return connection;
    }

    const Service = this.ensureProtoLoaded();
    connection = {
      address,
      client: new Service(address, this.defaultCredentials, {
        'grpc.keepalive_time_ms': 10000,
        'grpc.keepalive_timeout_ms': 5000,
      }),
      connected: false,
    };

    this.connections.set(address, connection);
    this.config.logger.debug(`Created connection to ${address}`);

    return connection;
  }

  async waitForReady(address: string, timeoutMs: number = 5000): Promise<boolean> {
    const connection = this.getConnection(address);
    const deadline = Date.now() + timeoutMs;

    return new Promise((resolve) => {
      connection.client.waitForReady(deadline, (error) => {
        if (error) {
          connection.connected = false;
          connection.lastError = error;
          this.config.logger.warn(`Failed to connect to ${address}`, { error: error.message });
          resolve(false);
        } else {
          connection.connected = true;
          connection.lastError = undefined;
          this.config.logger.debug(`Connected to ${address}`);
          resolve(true);
        }
      });
    });
  }

  closeConnection(address: string): void {
    const connection = this.connections.get(address);
    if (connection) {
      connection.client.close();
      this.connections.delete(address);
      this.config.logger.debug(`Closed connection to ${address}`);
    }
  }

  closeAll(): void {
    for (const address of this.connections.keys()) {
      this.closeConnection(address);
    }
  }

  // Unary RPC with a deadline, serialized through the loaded service definition
  async call<TReq, TRes>(address: string, method: string, request: TReq, timeoutMs?: number): Promise<TRes> {
    const definition = this.ensureProtoLoaded().service[method];
    if (!definition) {
      throw new Error(`Unknown method: ${method}`);
    }

    const { client } = this.getConnection(address);
    const timeout = timeoutMs ?? this.config.defaultTimeoutMs ?? 10000;
    const deadline = new Date(Date.now() + timeout);

    return new Promise<TRes>((resolve, reject) => {
      client.makeUnaryRequest<TReq, TRes>(
        definition.path,
        definition.requestSerialize,
        definition.responseDeserialize,
        request,
        new grpc.Metadata(),
        { deadline },
        (error, response) => {
          if (error) {
            reject(error);
          } else if (response === undefined) {
            reject(new Error(`Empty response from ${method}`));
          } else {
            resolve(response);
          }
        },
      );
    });
  }
}

export class ControlPlaneClient {
  private pool: GrpcClientPool;
  private address: string;

  constructor(pool: GrpcClientPool, address: string) {
    this.pool = pool;
    this.address = address;
  }

  private call<TReq, TRes>(method: string, request: TReq): Promise<TRes> {
    return this.pool.call<TReq, TRes>(this.address, method, request);
  }

  async addNode(request: AddNodeRequest): Promise<NodeResponse> {
    return this.call<AddNodeRequest, NodeResponse>('AddNode', request);
  }

  async scaleUp(request: ScaleUpRequest): Promise<ScaleUpResponse> {
    return this.call<ScaleUpRequest, ScaleUpResponse>('ScaleUp', request);
  }

  async removeNode(request: NodeIdRequest): Promise<EvictionResponse> {
    return this.call<NodeIdRequest, EvictionResponse>('RemoveNode', request);
  }

  async heartbeat(request: NodeIdRequest): Promise<NodeResponse> {
    return this.call<NodeIdRequest, NodeResponse>('Heartbeat', request);
  }

  async failNode(request: NodeIdRequest): Promise<EvictionResponse> {
    return this.call<NodeIdRequest, EvictionResponse>('FailNode', request);
  }

  async recoverNode(request: NodeIdRequest): Promise<NodeResponse> {
    return this.call<NodeIdRequest, NodeResponse>('RecoverNode', request);
  }

  async listNodes(): Promise<ListNodesResponse> {
    return this.call<EmptyMessage, ListNodesResponse>('ListNodes', {});
  }

  async launchPod(request: LaunchPodRequest): Promise<LaunchPodResponse> {
    return this.call<LaunchPodRequest, LaunchPodResponse>('LaunchPod', request);
  }

  async listPods(): Promise<ListPodsResponse> {
    return this.call<EmptyMessage, ListPodsResponse>('ListPods', {});
  }

  async getLeader(): Promise<LeaderResponse> {
    return this.call<EmptyMessage, LeaderResponse>('GetLeader', {});
  }

  async setStrategy(request: SetStrategyRequest): Promise<StrategyResponse> {
    return this.call<SetStrategyRequest, StrategyResponse>('SetStrategy', request);
  }

  async getStrategy(): Promise<StrategyResponse> {
    return this.call<EmptyMessage, StrategyResponse>('GetStrategy', {});
  }

  async getMetrics(): Promise<MetricsResponse> {
    return this.call<EmptyMessage, MetricsResponse>('GetMetrics', {});
  }
}
