import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { SqliteStateStore } from '../src/store/sqlite-store.js';
import { NodeRecord } from '../src/cluster/types.js';
import { createMockLogger } from './helpers.js';

const node = (id: string, cpu: number): NodeRecord => ({
  id,
  totalCpu: cpu,
  availableCpu: cpu,
  lastHeartbeat: 1700000000000,
  status: 'healthy',
});

describe('SqliteStateStore', () => {
  let dir: string;
  let dbPath: string;
  let store: SqliteStateStore;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'control-plane-test-'));
    dbPath = path.join(dir, 'nested', 'cluster.db');
    store = new SqliteStateStore({ path: dbPath, logger: createMockLogger() });
  });

  afterEach(() => {
    store.close();
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('creates the parent directory and round-trips records', () => {
    expect(fs.existsSync(dbPath)).toBe(true);

    store.transaction((tx) => {
      tx.putNode(node('a', 8));
      tx.putPod({ id: 'p1', cpuRequest: 3, assignedNode: 'a', status: 'running' });
      tx.putPod({ id: 'p2', cpuRequest: 1, assignedNode: null, status: 'pending' });
    });

    expect(store.transaction(tx => tx.getNode('a'))).toEqual(node('a', 8));
    expect(store.transaction(tx => tx.listPods())).toEqual([
      { id: 'p1', cpuRequest: 3, assignedNode: 'a', status: 'running' },
      { id: 'p2', cpuRequest: 1, assignedNode: null, status: 'pending' },
    ]);
  });

  it('keeps insertion order when a node is updated', () => {
    store.transaction((tx) => {
      tx.putNode(node('b', 1));
      tx.putNode(node('a', 2));
      tx.putNode({ ...node('b', 1), status: 'unhealthy' });
    });

    expect(store.transaction(tx => tx.listNodes().map(n => [n.id, n.status]))).toEqual([
      ['b', 'unhealthy'],
      ['a', 'healthy'],
    ]);
  });

  it('rolls back the outermost transaction on throw', () => {
    store.transaction(tx => tx.putNode(node('a', 4)));

    expect(() => store.transaction((tx) => {
      tx.putNode({ ...node('a', 4), availableCpu: 0 });
      store.transaction(inner => inner.putSetting('leader', 'a'));
      throw new Error('boom');
    })).toThrow('boom');

    expect(store.transaction(tx => tx.getNode('a'))?.availableCpu).toBe(4);
    expect(store.transaction(tx => tx.getSetting('leader'))).toBeUndefined();
  });

  it('rejects callbacks that return a promise', () => {
    expect(() => store.transaction(async () => 1)).toThrow('Transaction function cannot return a promise');
  });

  it('upserts and deletes settings', () => {
    store.transaction(tx => tx.putSetting('strategy', 'first_fit'));
    store.transaction(tx => tx.putSetting('strategy', 'worst_fit'));
    expect(store.transaction(tx => tx.getSetting('strategy'))).toBe('worst_fit');

    store.transaction(tx => tx.deleteSetting('strategy'));
    expect(store.transaction(tx => tx.getSetting('strategy'))).toBeUndefined();
  });

  it('keeps state across reopen unless resetOnStartup is set', () => {
    store.transaction(tx => tx.putNode(node('a', 4)));
    store.close();

    store = new SqliteStateStore({ path: dbPath, logger: createMockLogger() });
    expect(store.transaction(tx => tx.listNodes().map(n => n.id))).toEqual(['a']);
    store.close();

    store = new SqliteStateStore({ path: dbPath, logger: createMockLogger(), resetOnStartup: true });
    expect(store.transaction(tx => tx.listNodes())).toEqual([]);
  });

  it('supports an in-process database', () => {
    const memory = new SqliteStateStore({ path: ':memory:', logger: createMockLogger() });
    memory.transaction(tx => tx.putNode(node('x', 2)));
    expect(memory.transaction(tx => tx.deleteNode('x'))).toBe(true);
    expect(memory.transaction(tx => tx.deleteNode('x'))).toBe(false);
    memory.close();
  });
});
