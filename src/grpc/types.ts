import { EvictedPod, MetricsSnapshot, NodeRecord, PodRecord } from '../cluster/types.js';

// Wire shapes as produced by proto-loader with keepCase and longs as strings.
// Request fields are optional: a client may omit any of them.

export interface WireNode {
  node_id: string;
  total_cpu: number;
  available_cpu: number;
  last_heartbeat: string;
  status: string;
}

export interface WirePod {
  pod_id: string;
  cpu_request: number;
  assigned_node: string;
  status: string;
}

export interface WireEvictedPod {
  pod_id: string;
  cpu_request: number;
}

export type EmptyMessage = Record<string, never>;

export interface AddNodeRequest {
  node_id?: string;
  cpu?: number;
}

export interface ScaleUpRequest {
  count?: number;
}

export interface NodeIdRequest {
  node_id?: string;
}

export interface LaunchPodRequest {
  pod_id?: string;
  cpu?: number;
  strategy?: string;
}

export interface SetStrategyRequest {
  strategy?: string;
}

export interface NodeResponse {
  node: WireNode;
}

export interface ScaleUpResponse {
  nodes: WireNode[];
}

export interface EvictionResponse {
  node_id: string;
  evicted: WireEvictedPod[];
}

export interface ListNodesResponse {
  nodes: WireNode[];
}

export interface LaunchPodResponse {
  pod_id: string;
  node_id: string;
  strategy: string;
}

export interface ListPodsResponse {
  pods: WirePod[];
}

export interface LeaderResponse {
  leader: string;
}

export interface StrategyResponse {
  strategy: string;
}

export interface MetricsResponse {
  healthy_nodes: number;
  total_free_cpu: string;
  running_pods: number;
  total_nodes: number;
  pending_pods: number;
}

export function toWireNode(node: NodeRecord): WireNode {
  return {
    node_id: node.id,
    total_cpu: node.totalCpu,
    available_cpu: node.availableCpu,
    last_heartbeat: String(node.lastHeartbeat),
    status: node.status,
  };
}

export function toWirePod(pod: PodRecord): WirePod {
  return {
    pod_id: pod.id,
    cpu_request: pod.cpuRequest,
    assigned_node: pod.assignedNode ?? '',
    status: pod.status,
  };
}

export function toWireEvicted(pods: EvictedPod[]): WireEvictedPod[] {
  return pods.map(p => ({ pod_id: p.podId, cpu_request: p.cpuRequest }));
}

export function toWireMetrics(metrics: MetricsSnapshot): MetricsResponse {
  return {
    healthy_nodes: metrics.healthyNodes,
    total_free_cpu: String(metrics.totalFreeCpu),
    running_pods: metrics.runningPods,
    total_nodes: metrics.totalNodes,
    pending_pods: metrics.pendingPods,
  };
}
