import type { NodeRecord, PodRecord, SettingKey } from '../cluster/types.js';

/**
 * Exclusive-access handle to cluster state. Only valid inside the
 * `StateStore.transaction` callback that produced it.
 */
export interface StoreTransaction {
  getNode(id: string): NodeRecord | undefined;
  listNodes(): NodeRecord[];
  putNode(node: NodeRecord): void;
  deleteNode(id: string): boolean;

  getPod(id: string): PodRecord | undefined;
  listPods(): PodRecord[];
  listPodsOnNode(nodeId: string): PodRecord[];
  putPod(pod: PodRecord): void;

  getSetting(key: SettingKey): string | undefined;
  putSetting(key: SettingKey, value: string): void;
  deleteSetting(key: SettingKey): void;
}

export interface StateStore {
  /**
   * Runs `fn` inside the store's single critical section. Calls made from
   * within `fn` join the outer transaction. If `fn` throws, every write of
   * the outermost transaction is rolled back.
   */
  transaction<T>(fn: (tx: StoreTransaction) => T): T;
  close(): void;
}

export type StoreDriver = 'memory' | 'sqlite';
