import type { NodeRecord, PodRecord, SettingKey } from '../cluster/types.js';
import type { StateStore, StoreTransaction } from './types.js';

interface Tables {
  nodes: Map<string, NodeRecord>;
  pods: Map<string, PodRecord>;
  settings: Map<SettingKey, string>;
}

function cloneTables(tables: Tables): Tables {
  return {
    nodes: new Map(Array.from(tables.nodes, ([id, node]) => [id, { ...node }])),
    pods: new Map(Array.from(tables.pods, ([id, pod]) => [id, { ...pod }])),
    settings: new Map(tables.settings),
  };
}

/**
 * Map-backed store. Records are copied in and out so callers never hold a
 * live reference to stored state.
 */
export class MemoryStateStore implements StateStore {
  private tables: Tables = {
    nodes: new Map(),
    pods: new Map(),
    settings: new Map(),
  };
  private depth = 0;
  private readonly tx: StoreTransaction;

  constructor() {
    this.tx = this.createTransaction();
  }

  transaction<T>(fn: (tx: StoreTransaction) => T): T {
    if (this.depth > 0) {
      return this.invoke(fn);
    }

    const snapshot = cloneTables(this.tables);
    this.depth++;
    try {
      return this.invoke(fn);
    } catch (error) {
      this.tables = snapshot;
      throw error;
    } finally {
      this.depth--;
    }
  }

  close(): void {
    this.tables.nodes.clear();
    this.tables.pods.clear();
    this.tables.settings.clear();
  }

  private invoke<T>(fn: (tx: StoreTransaction) => T): T {
    const result = fn(this.tx);
    if (result instanceof Promise) {
      throw new TypeError('Transaction function cannot return a promise');
    }
    return result;
  }

  private createTransaction(): StoreTransaction {
    return {
      getNode: (id) => {
        const node = this.tables.nodes.get(id);
        return node ? { ...node } : undefined;
      },
      listNodes: () => Array.from(this.tables.nodes.values(), node => ({ ...node })),
      putNode: (node) => {
        this.tables.nodes.set(node.id, { ...node });
      },
      deleteNode: (id) => this.tables.nodes.delete(id),

      getPod: (id) => {
        const pod = this.tables.pods.get(id);
        return pod ? { ...pod } : undefined;
      },
      listPods: () => Array.from(this.tables.pods.values(), pod => ({ ...pod })),
      listPodsOnNode: (nodeId) => Array.from(this.tables.pods.values())
        .filter(pod => pod.assignedNode === nodeId)
        .map(pod => ({ ...pod })),
      putPod: (pod) => {
        this.tables.pods.set(pod.id, { ...pod });
      },

      getSetting: (key) => this.tables.settings.get(key),
      putSetting: (key, value) => {
        this.tables.settings.set(key, value);
      },
      deleteSetting: (key) => {
        this.tables.settings.delete(key);
      },
    };
  }
}
