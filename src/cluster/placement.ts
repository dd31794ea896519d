import { DEFAULT_STRATEGY, NodeRecord, PLACEMENT_STRATEGIES, PlacementStrategy } from './types.js';

export function isPlacementStrategy(value: string): value is PlacementStrategy {
  return PLACEMENT_STRATEGIES.some(strategy => strategy === value);
}

// Unrecognized names fall back to best_fit
export function parseStrategy(value: string | null | undefined): PlacementStrategy {
  const normalized = value?.trim().toLowerCase() ?? '';
  return isPlacementStrategy(normalized) ? normalized : DEFAULT_STRATEGY;
}

/**
 * Picks a node for a CPU request. Only healthy nodes are considered and
 * iteration order breaks ties: later candidates must be strictly better.
 */
export function selectNode(
  nodes: readonly NodeRecord[],
  cpuRequest: number,
  strategy: PlacementStrategy,
): NodeRecord | null {
  const feasible = nodes.filter(n => n.status === 'healthy' && n.availableCpu >= cpuRequest);

  switch (strategy) {
    case 'first_fit':
      return feasible[0] ?? null;

    case 'best_fit': {
      let best: NodeRecord | null = null;
      for (const node of feasible) {
        if (best === null || node.availableCpu < best.availableCpu) {
          best = node;
        }
      }
      return best;
    }

    case 'worst_fit': {
      let worst: NodeRecord | null = null;
      let maxLeftover = -1;
      for (const node of feasible) {
        const leftover = node.availableCpu - cpuRequest;
        if (leftover > maxLeftover) {
          maxLeftover = leftover;
          worst = node;
        }
      }
      return worst;
    }
  }
}
