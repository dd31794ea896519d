/**
 * Plain-text table rows for clusterctl. Rows are padded before any
 * colouring so column widths stay aligned.
 */

import type { WireNode, WirePod } from '../grpc/types.js';

const NODE_COLUMNS = { name: 18, status: 11, cpu: 12 };
const POD_COLUMNS = { name: 18, status: 10, cpu: 6 };

export function nodeHeader(): string {
  return '  ' + 'NAME'.padEnd(NODE_COLUMNS.name - 2) + 'STATUS'.padEnd(NODE_COLUMNS.status) +
    'CPU'.padEnd(NODE_COLUMNS.cpu) + 'LAST HEARTBEAT';
}

export function formatAge(lastHeartbeat: string | number, now: number = Date.now()): string {
  const ts = typeof lastHeartbeat === 'string' ? parseInt(lastHeartbeat, 10) : lastHeartbeat;
  if (Number.isNaN(ts) || ts <= 0) return '-';
  const seconds = Math.max(0, Math.floor((now - ts) / 1000));
  if (seconds < 60) return `${seconds}s ago`;
  const minutes = Math.floor(seconds / 60);
  if (minutes < 60) return `${minutes}m ago`;
  return `${Math.floor(minutes / 60)}h ago`;
}

// Leader rows are marked with "* "
export function nodeRow(node: WireNode, leader: string, now: number = Date.now()): string {
  const name = node.node_id === leader ? `* ${node.node_id}` : `  ${node.node_id}`;
  return [
    name.padEnd(NODE_COLUMNS.name),
    node.status.padEnd(NODE_COLUMNS.status),
    `${node.available_cpu}/${node.total_cpu}`.padEnd(NODE_COLUMNS.cpu),
    formatAge(node.last_heartbeat, now),
  ].join('');
}

export function podHeader(): string {
  return 'NAME'.padEnd(POD_COLUMNS.name) + 'STATUS'.padEnd(POD_COLUMNS.status) +
    'CPU'.padEnd(POD_COLUMNS.cpu) + 'NODE';
}

export function podRow(pod: WirePod): string {
  return [
    pod.pod_id.padEnd(POD_COLUMNS.name),
    pod.status.padEnd(POD_COLUMNS.status),
    String(pod.cpu_request).padEnd(POD_COLUMNS.cpu),
    pod.assigned_node || '-',
  ].join('');
}
