export type NodeStatus = 'healthy' | 'unhealthy';
export type PodStatus = 'pending' | 'running';
export type PlacementStrategy = 'first_fit' | 'best_fit' | 'worst_fit';

export const PLACEMENT_STRATEGIES: readonly PlacementStrategy[] = ['first_fit', 'best_fit', 'worst_fit'];
export const DEFAULT_STRATEGY: PlacementStrategy = 'best_fit';

// Reported by GetLeader when no healthy node exists
export const NO_LEADER = 'none';

export interface NodeRecord {
  id: string;
  totalCpu: number;
  availableCpu: number;
  lastHeartbeat: number;
  status: NodeStatus;
}

export interface PodRecord {
  id: string;
  cpuRequest: number;
  assignedNode: string | null;
  status: PodStatus;
}

export type SettingKey = 'strategy' | 'leader';

export interface ClusterSettings {
  strategy: PlacementStrategy;
  leader: string | null;
}

export interface MetricsSnapshot {
  healthyNodes: number;
  totalFreeCpu: number;
  runningPods: number;
  totalNodes: number;
  pendingPods: number;
}

export interface EvictedPod {
  podId: string;
  cpuRequest: number;
}
