export type PoolNodeState = 'active' | 'rogue' | 'unknown';

export interface WarmPoolOptions {
  total?: number;
  isolated?: number;
  weak?: number;
}

const isCount = (value: number) => Number.isInteger(value) && value >= 0;

/**
 * Status grid of the warm pool: `isolated` rogue nodes and `weak` unknown
 * nodes hidden among active ones, in a random order.
 */
export const generateWarmPoolGrid = (
  { total = 255, isolated = 7, weak = 5 }: WarmPoolOptions = {},
  random: () => number = Math.random,
): PoolNodeState[] => {
  if (!isCount(total) || !isCount(isolated) || !isCount(weak)) {
    throw new RangeError('warm pool counts must be non-negative integers');
  }
  if (isolated + weak > total) {
    throw new RangeError(`warm pool of ${total} cannot hold ${isolated + weak} flagged nodes`);
  }

  const nodes: PoolNodeState[] = [
    ...Array<PoolNodeState>(total - isolated - weak).fill('active'),
    ...Array<PoolNodeState>(isolated).fill('rogue'),
    ...Array<PoolNodeState>(weak).fill('unknown'),
  ];

  for (let i = nodes.length - 1; i > 0; i--) {
    const j = Math.floor(random() * (i + 1));
    [nodes[i], nodes[j]] = [nodes[j], nodes[i]];
  }
  return nodes;
};
