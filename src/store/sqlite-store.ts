import Database, { type Database as DatabaseType, type Statement } from 'better-sqlite3';
import * as fs from 'fs';
import * as path from 'path';
import { Logger } from 'winston';
import type { NodeRecord, NodeStatus, PodRecord, PodStatus, SettingKey } from '../cluster/types.js';
import type { StateStore, StoreTransaction } from './types.js';
import { dropTables, runMigrations } from './migrations.js';

export interface SqliteStateStoreConfig {
  path: string;          // ':memory:' for an in-process database
  logger: Logger;
  resetOnStartup?: boolean;
}

interface NodeRow {
  id: string;
  total_cpu: number;
  available_cpu: number;
  last_heartbeat: number;
  status: string;
}

interface PodRow {
  id: string;
  cpu_request: number;
  assigned_node: string | null;
  status: string;
}

interface SettingRow {
  value: string;
}

interface Statements {
  getNode: Statement<[string], NodeRow>;
  listNodes: Statement<[], NodeRow>;
  upsertNode: Statement<[string, number, number, number, string]>;
  deleteNode: Statement<[string]>;
  getPod: Statement<[string], PodRow>;
  listPods: Statement<[], PodRow>;
  listPodsOnNode: Statement<[string], PodRow>;
  upsertPod: Statement<[string, number, string | null, string]>;
  getSetting: Statement<[string], SettingRow>;
  upsertSetting: Statement<[string, string]>;
  deleteSetting: Statement<[string]>;
}

function toNodeStatus(value: string): NodeStatus {
  return value === 'unhealthy' ? 'unhealthy' : 'healthy';
}

function toPodStatus(value: string): PodStatus {
  return value === 'running' ? 'running' : 'pending';
}

function rowToNode(row: NodeRow): NodeRecord {
  return {
    id: row.id,
    totalCpu: row.total_cpu,
    availableCpu: row.available_cpu,
    lastHeartbeat: row.last_heartbeat,
    status: toNodeStatus(row.status),
  };
}

function rowToPod(row: PodRow): PodRecord {
  return {
    id: row.id,
    cpuRequest: row.cpu_request,
    assignedNode: row.assigned_node,
    status: toPodStatus(row.status),
  };
}

export class SqliteStateStore implements StateStore {
  private db: DatabaseType;
  private logger: Logger;
  private statements: Statements;
  private tx: StoreTransaction;
  private depth = 0;

  constructor(config: SqliteStateStoreConfig) {
    this.logger = config.logger;

    if (config.path !== ':memory:') {
      fs.mkdirSync(path.dirname(config.path), { recursive: true });
    }

    this.db = new Database(config.path);
    this.db.pragma('journal_mode = WAL');
    this.db.pragma('synchronous = NORMAL');
    this.db.pragma('foreign_keys = ON');

    if (config.resetOnStartup) {
      dropTables(this.db);
      this.logger.info('Dropped existing cluster tables', { path: config.path });
    }
    runMigrations(this.db);

    this.statements = this.prepareStatements();
    this.tx = this.createTransaction();

    this.logger.info('SQLite state store opened', { path: config.path });
  }

  transaction<T>(fn: (tx: StoreTransaction) => T): T {
    if (this.depth > 0) {
      return fn(this.tx);
    }

    this.depth++;
    try {
      // better-sqlite3 rolls back when the wrapped function throws
      return this.db.transaction(() => {
        const result = fn(this.tx);
        if (result instanceof Promise) {
          throw new TypeError('Transaction function cannot return a promise');
        }
        return result;
      }).immediate();
    } finally {
      this.depth--;
    }
  }

  close(): void {
    this.db.close();
    this.logger.info('SQLite state store closed');
  }

  private prepareStatements(): Statements {
    return {
      getNode: this.db.prepare<[string], NodeRow>('SELECT * FROM nodes WHERE id = ?'),
      listNodes: this.db.prepare<[], NodeRow>('SELECT * FROM nodes ORDER BY rowid'),
      upsertNode: this.db.prepare<[string, number, number, number, string]>(`
        INSERT INTO nodes (id, total_cpu, available_cpu, last_heartbeat, status)
        VALUES (?, ?, ?, ?, ?)
        ON CONFLICT(id) DO UPDATE SET
          total_cpu = excluded.total_cpu,
          available_cpu = excluded.available_cpu,
          last_heartbeat = excluded.last_heartbeat,
          status = excluded.status
      `),
      deleteNode: this.db.prepare<[string]>('DELETE FROM nodes WHERE id = ?'),

      getPod: this.db.prepare<[string], PodRow>('SELECT * FROM pods WHERE id = ?'),
      listPods: this.db.prepare<[], PodRow>('SELECT * FROM pods ORDER BY rowid'),
      listPodsOnNode: this.db.prepare<[string], PodRow>(
        'SELECT * FROM pods WHERE assigned_node = ? ORDER BY rowid'
      ),
      upsertPod: this.db.prepare<[string, number, string | null, string]>(`
        INSERT INTO pods (id, cpu_request, assigned_node, status)
        VALUES (?, ?, ?, ?)
        ON CONFLICT(id) DO UPDATE SET
          cpu_request = excluded.cpu_request,
          assigned_node = excluded.assigned_node,
          status = excluded.status
      `),

      getSetting: this.db.prepare<[string], SettingRow>('SELECT value FROM settings WHERE key = ?'),
      upsertSetting: this.db.prepare<[string, string]>(`
        INSERT INTO settings (key, value) VALUES (?, ?)
        ON CONFLICT(key) DO UPDATE SET value = excluded.value
      `),
      deleteSetting: this.db.prepare<[string]>('DELETE FROM settings WHERE key = ?'),
    };
  }

  private createTransaction(): StoreTransaction {
    const s = this.statements;
    return {
      getNode: (id) => {
        const row = s.getNode.get(id);
        return row ? rowToNode(row) : undefined;
      },
      listNodes: () => s.listNodes.all().map(rowToNode),
      putNode: (node) => {
        s.upsertNode.run(node.id, node.totalCpu, node.availableCpu, node.lastHeartbeat, node.status);
      },
      deleteNode: (id) => s.deleteNode.run(id).changes > 0,

      getPod: (id) => {
        const row = s.getPod.get(id);
        return row ? rowToPod(row) : undefined;
      },
      listPods: () => s.listPods.all().map(rowToPod),
      listPodsOnNode: (nodeId) => s.listPodsOnNode.all(nodeId).map(rowToPod),
      putPod: (pod) => {
        s.upsertPod.run(pod.id, pod.cpuRequest, pod.assignedNode, pod.status);
      },

      getSetting: (key: SettingKey) => s.getSetting.get(key)?.value,
      putSetting: (key, value) => {
        s.upsertSetting.run(key, value);
      },
      deleteSetting: (key) => {
        s.deleteSetting.run(key);
      },
    };
  }
}
