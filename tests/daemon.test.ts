import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as grpc from '@grpc/grpc-js';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { pathToFileURL } from 'url';
import { ControlPlaneDaemon, isEntryPoint } from '../src/index.js';
import { DEFAULT_CONFIG, DaemonConfig } from '../src/config.js';
import { ControlPlaneClient, GrpcClientPool } from '../src/grpc/client.js';
import { createMockLogger } from './helpers.js';

const config: DaemonConfig = {
  ...DEFAULT_CONFIG,
  server: { host: '127.0.0.1', port: 0 },
  store: { driver: 'memory', path: ':memory:', resetOnStartup: true },
  heartbeatSimulator: { enabled: false, intervalMs: 5000 },
};

describe('ControlPlaneDaemon over gRPC', () => {
  let daemon: ControlPlaneDaemon;
  let pool: GrpcClientPool;
  let client: ControlPlaneClient;

  beforeEach(async () => {
    const logger = createMockLogger();
    daemon = new ControlPlaneDaemon(config, logger);
    await daemon.start();

    pool = new GrpcClientPool({ logger });
    await pool.loadProto();
    client = new ControlPlaneClient(pool, `127.0.0.1:${daemon.getPort()}`);
  });

  afterEach(async () => {
    pool.closeAll();
    await daemon.stop();
  });

  it('binds an ephemeral port and stops cleanly', async () => {
    expect(daemon.isRunning()).toBe(true);
    expect(daemon.getPort()).toBeGreaterThan(0);

    await daemon.stop();
    expect(daemon.isRunning()).toBe(false);
  });

  it('adds nodes, places pods and reports status codes', async () => {
    const { node } = await client.addNode({ node_id: 'A', cpu: 10 });
    expect(node).toMatchObject({ node_id: 'A', total_cpu: 10, available_cpu: 10, status: 'healthy' });
    await client.addNode({ node_id: 'B', cpu: 4 });

    expect(await client.launchPod({ pod_id: 'p1', cpu: 3 }))
      .toEqual({ pod_id: 'p1', node_id: 'B', strategy: 'best_fit' });

    // 11 free in total, at most 10 on one node
    await expect(client.launchPod({ pod_id: 'wide', cpu: 11 })).rejects.toMatchObject({
      code: grpc.status.FAILED_PRECONDITION,
    });
    await expect(client.launchPod({ pod_id: 'huge', cpu: 12 })).rejects.toMatchObject({
      code: grpc.status.RESOURCE_EXHAUSTED,
    });
    await expect(client.launchPod({ pod_id: 'p2' })).rejects.toMatchObject({
      code: grpc.status.INVALID_ARGUMENT,
      details: 'Missing required field: cpu',
    });
    await expect(client.addNode({ node_id: 'A', cpu: 1 })).rejects.toMatchObject({
      code: grpc.status.ALREADY_EXISTS,
    });

    expect(await client.getMetrics()).toEqual({
      healthy_nodes: 2,
      total_free_cpu: '11',
      running_pods: 1,
      total_nodes: 2,
      pending_pods: 1,
    });
    expect(await client.getLeader()).toEqual({ leader: 'A' });
  });

  it('reports free CPU beyond the 32-bit range', async () => {
    await client.addNode({ node_id: 'big-1', cpu: 2000000000 });
    await client.addNode({ node_id: 'big-2', cpu: 2000000000 });

    const metrics = await client.getMetrics();
    expect(metrics.total_free_cpu).toBe('4000000000');
  });
});

describe('isEntryPoint', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'control-plane-bin-'));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('follows the symlink npm installs for a bin', () => {
    const target = path.join(dir, 'index.js');
    const link = path.join(dir, 'binpackd');
    fs.writeFileSync(target, '');
    fs.symlinkSync(target, link);

    expect(isEntryPoint(link, pathToFileURL(target).href)).toBe(true);
    expect(isEntryPoint(target, pathToFileURL(target).href)).toBe(true);
  });

  it('rejects other scripts and a missing argv entry', () => {
    const target = path.join(dir, 'index.js');
    const other = path.join(dir, 'other.js');
    fs.writeFileSync(target, '');
    fs.writeFileSync(other, '');

    expect(isEntryPoint(other, pathToFileURL(target).href)).toBe(false);
    expect(isEntryPoint(path.join(dir, 'missing.js'), pathToFileURL(target).href)).toBe(false);
    expect(isEntryPoint(undefined, pathToFileURL(target).href)).toBe(false);
  });
});
