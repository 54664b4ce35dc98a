export type Adjacency = ReadonlyMap<number, ReadonlySet<number>>;

/** Undirected co-worker graph, one edge per pair of drivers on a trip. */
export function buildAdjacency(pairs: Iterable<readonly [number, number]>): Adjacency {
  const adjacency = new Map<number, Set<number>>();
  const link = (from: number, to: number) => {
    const neighbours = adjacency.get(from) ?? new Set<number>();
    neighbours.add(to);
    adjacency.set(from, neighbours);
  };

  for (const [a, b] of pairs) {
    if (a === b) continue;
    link(a, b);
    link(b, a);
  }
  return adjacency;
}

/** Every node reachable from `root`, excluding `root`, in ascending order. */
export function reachableFrom(adjacency: Adjacency, root: number): number[] {
  const visited = new Set<number>([root]);
  const queue = [root];

  for (let head = 0; head < queue.length; head++) {
    const node = queue[head];
    if (node === undefined) break;
    for (const next of adjacency.get(node) ?? []) {
      if (visited.has(next)) continue;
      visited.add(next);
      queue.push(next);
    }
  }

  visited.delete(root);
  return [...visited].sort((a, b) => a - b);
}
