import * as grpc from '@grpc/grpc-js';
import { Logger } from 'winston';
import { ControlPlane } from '../cluster/control-plane.js';
import { ControlPlaneError, ControlPlaneErrorCode, errorMessage, isControlPlaneError } from '../cluster/errors.js';
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
  toWireEvicted,
  toWireMetrics,
  toWireNode,
  toWirePod,
} from './types.js';

export interface ServiceHandlersConfig {
  logger: Logger;
  controlPlane: ControlPlane;
}

export type ControlPlaneHandlers = {
  AddNode: grpc.handleUnaryCall<AddNodeRequest, NodeResponse>;
  ScaleUp: grpc.handleUnaryCall<ScaleUpRequest, ScaleUpResponse>;
  RemoveNode: grpc.handleUnaryCall<NodeIdRequest, EvictionResponse>;
  Heartbeat: grpc.handleUnaryCall<NodeIdRequest, NodeResponse>;
  FailNode: grpc.handleUnaryCall<NodeIdRequest, EvictionResponse>;
  RecoverNode: grpc.handleUnaryCall<NodeIdRequest, NodeResponse>;
  ListNodes: grpc.handleUnaryCall<EmptyMessage, ListNodesResponse>;
  LaunchPod: grpc.handleUnaryCall<LaunchPodRequest, LaunchPodResponse>;
  ListPods: grpc.handleUnaryCall<EmptyMessage, ListPodsResponse>;
  GetLeader: grpc.handleUnaryCall<EmptyMessage, LeaderResponse>;
  SetStrategy: grpc.handleUnaryCall<SetStrategyRequest, StrategyResponse>;
  GetStrategy: grpc.handleUnaryCall<EmptyMessage, StrategyResponse>;
  GetMetrics: grpc.handleUnaryCall<EmptyMessage, MetricsResponse>;
};

const STATUS_BY_CODE: Record<ControlPlaneErrorCode, grpc.status> = {
  DUPLICATE_NODE: grpc.status.ALREADY_EXISTS,
  DUPLICATE_POD: grpc.status.ALREADY_EXISTS,
  NODE_NOT_FOUND: grpc.status.NOT_FOUND,
  MISSING_FIELD: grpc.status.INVALID_ARGUMENT,
  INVALID_ARGUMENT: grpc.status.INVALID_ARGUMENT,
  INSUFFICIENT_CLUSTER_CAPACITY: grpc.status.RESOURCE_EXHAUSTED,
  NO_FEASIBLE_NODE: grpc.status.FAILED_PRECONDITION,
};

export function toStatusCode(error: unknown): grpc.status {
  return isControlPlaneError(error) ? STATUS_BY_CODE[error.code] : grpc.status.INTERNAL;
}

function requireText(value: string | undefined, field: string): string {
  if (value === undefined || value.trim().length === 0) {
    throw ControlPlaneError.missingField(field);
  }
  return value;
}

function requireId(value: string | undefined, field: string): string {
  const id = requireText(value, field);
  if (id !== id.trim()) {
    throw ControlPlaneError.invalidArgument(field, 'must not have leading or trailing whitespace');
  }
  return id;
}

function requireNumber(value: number | undefined, field: string): number {
  if (value === undefined) {
    throw ControlPlaneError.missingField(field);
  }
  return value;
}

/**
 * Wraps a synchronous control plane call: the result goes back on the
 * callback, domain errors are mapped to gRPC status codes.
 */
function unary<TReq, TRes>(
  method: string,
  logger: Logger,
  fn: (request: TReq) => TRes,
): grpc.handleUnaryCall<TReq, TRes> {
  return (call, callback) => {
    try {
      callback(null, fn(call.request));
    } catch (error) {
      const code = toStatusCode(error);
      if (code === grpc.status.INTERNAL) {
        logger.error(`${method} failed`, { error: errorMessage(error) });
      } else {
        logger.debug(`${method} rejected`, { error: errorMessage(error), code: grpc.status[code] });
      }
      callback({ code, details: errorMessage(error), message: errorMessage(error) });
    }
  };
}

export function createControlPlaneHandlers(config: ServiceHandlersConfig): ControlPlaneHandlers {
  const { logger, controlPlane } = config;

  return {
    AddNode: unary<AddNodeRequest, NodeResponse>('AddNode', logger, (req) => {
      const nodeId = requireId(req.node_id, 'node_id');
      const cpu = requireNumber(req.cpu, 'cpu');
      return { node: toWireNode(controlPlane.addNode(nodeId, cpu)) };
    }),

    ScaleUp: unary<ScaleUpRequest, ScaleUpResponse>('ScaleUp', logger, (req) => {
      const count = requireNumber(req.count, 'count');
      return { nodes: controlPlane.scaleUp(count).map(toWireNode) };
    }),

    RemoveNode: unary<NodeIdRequest, EvictionResponse>('RemoveNode', logger, (req) => {
      const nodeId = requireId(req.node_id, 'node_id');
      return { node_id: nodeId, evicted: toWireEvicted(controlPlane.removeNode(nodeId)) };
    }),

    Heartbeat: unary<NodeIdRequest, NodeResponse>('Heartbeat', logger, (req) => {
      const nodeId = requireId(req.node_id, 'node_id');
      return { node: toWireNode(controlPlane.heartbeat(nodeId)) };
    }),

    FailNode: unary<NodeIdRequest, EvictionResponse>('FailNode', logger, (req) => {
      const nodeId = requireId(req.node_id, 'node_id');
      return { node_id: nodeId, evicted: toWireEvicted(controlPlane.failNode(nodeId)) };
    }),

    RecoverNode: unary<NodeIdRequest, NodeResponse>('RecoverNode', logger, (req) => {
      const nodeId = requireId(req.node_id, 'node_id');
      return { node: toWireNode(controlPlane.recoverNode(nodeId)) };
    }),

    ListNodes: unary<EmptyMessage, ListNodesResponse>('ListNodes', logger, () => ({
      nodes: controlPlane.listNodes().map(toWireNode),
    })),

    LaunchPod: unary<LaunchPodRequest, LaunchPodResponse>('LaunchPod', logger, (req) => {
      const podId = requireId(req.pod_id, 'pod_id');
      const cpu = requireNumber(req.cpu, 'cpu');
      const override = req.strategy?.trim() ? req.strategy : undefined;
      const result = controlPlane.launchPod(podId, cpu, override);
      return { pod_id: result.podId, node_id: result.nodeId, strategy: result.strategy };
    }),

    ListPods: unary<EmptyMessage, ListPodsResponse>('ListPods', logger, () => ({
      pods: controlPlane.listPods().map(toWirePod),
    })),

    GetLeader: unary<EmptyMessage, LeaderResponse>('GetLeader', logger, () => ({
      leader: controlPlane.getLeader(),
    })),

    SetStrategy: unary<SetStrategyRequest, StrategyResponse>('SetStrategy', logger, (req) => {
      const name = requireText(req.strategy, 'strategy');
      return { strategy: controlPlane.setStrategy(name) };
    }),

    GetStrategy: unary<EmptyMessage, StrategyResponse>('GetStrategy', logger, () => ({
      strategy: controlPlane.getStrategy(),
    })),

    GetMetrics: unary<EmptyMessage, MetricsResponse>('GetMetrics', logger, () =>
      toWireMetrics(controlPlane.getMetrics())),
  };
}
