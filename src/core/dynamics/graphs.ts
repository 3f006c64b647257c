import { SeededRandom } from '../../utils/random';
import { MalformedGameError } from '../../models/errors';

export type Topology = 'ring' | 'grid' | 'small_world' | 'scale_free' | 'random_erdos_renyi';

/** Undirected simple graph; neighbour lists are sorted and duplicate-free. */
export interface Graph {
  node_count: number;
  adjacency: number[][];
}

class GraphBuilder {
  private readonly sets: Set<number>[];

  constructor(readonly n: number) {
    this.sets = Array.from({ length: n }, () => new Set<number>());
  }

  connect(a: number, b: number): void {
    if (a === b) return;
    this.sets[a].add(b);
    this.sets[b].add(a);
  }

  disconnect(a: number, b: number): void {
    this.sets[a].delete(b);
    this.sets[b].delete(a);
  }

  has(a: number, b: number): boolean {
    return this.sets[a].has(b);
  }

  degree(a: number): number {
    return this.sets[a].size;
  }

  build(): Graph {
    return {
      node_count: this.n,
      adjacency: this.sets.map((s) => [...s].sort((x, y) => x - y)),
    };
  }
}

// ─── Topologies ─────────────────────────────────────────────────────────────────

function ring(n: number): Graph {
  const g = new GraphBuilder(n);
  for (let i = 0; i < n; i++) g.connect(i, (i + 1) % n);
  return g.build();
}

/** Square lattice of side ⌊√n⌋; leftover nodes continue the last rows. */
function grid(n: number): Graph {
  const g = new GraphBuilder(n);
  const side = Math.max(1, Math.floor(Math.sqrt(n)));
  for (let i = 0; i < n; i++) {
    const col = i % side;
    if (col + 1 < side && i + 1 < n) g.connect(i, i + 1);
    if (i + side < n) g.connect(i, i + side);
  }
  return g.build();
}

/** Watts–Strogatz: ring lattice with k = 4, each edge rewired with p = 0.1. */
function smallWorld(n: number, rng: SeededRandom, k = 4, p = 0.1): Graph {
  const g = new GraphBuilder(n);
  const edges: [number, number][] = [];
  for (let i = 0; i < n; i++) {
    for (let j = 1; j <= k / 2; j++) {
      const target = (i + j) % n;
      if (target !== i && !g.has(i, target)) {
        g.connect(i, target);
        edges.push([i, target]);
      }
    }
  }

  for (const [a, b] of edges) {
    if (!rng.chance(p)) continue;
    const candidate = rng.int(0, n - 1);
    if (candidate === a || g.has(a, candidate)) continue;
    g.disconnect(a, b);
    g.connect(a, candidate);
  }
  return g.build();
}

/** Barabási–Albert: a 3-node clique, then each new node attaches to m = 2. */
function scaleFree(n: number, rng: SeededRandom, m = 2): Graph {
  const g = new GraphBuilder(n);
  const seed = Math.min(3, n);
  for (let i = 0; i < seed; i++) {
    for (let j = i + 1; j < seed; j++) g.connect(i, j);
  }

  for (let node = seed; node < n; node++) {
    const degrees = Array.from({ length: node }, (_, j) => g.degree(j));
    const total = degrees.reduce((s, d) => s + d, 0);
    const targets = new Set<number>();

    while (targets.size < Math.min(m, node)) {
      if (total === 0) {
        targets.add(rng.int(0, node - 1));
        continue;
      }
      let r = rng.next() * total;
      let pick = node - 1;
      for (let j = 0; j < node; j++) {
        r -= degrees[j];
        if (r < 0) {
          pick = j;
          break;
        }
      }
      targets.add(pick);
    }
    for (const t of targets) g.connect(node, t);
  }
  return g.build();
}

/** G(n, p) with mean degree about 6. */
function erdosRenyi(n: number, rng: SeededRandom): Graph {
  const g = new GraphBuilder(n);
  const p = Math.min(1, 6 / n);
  for (let i = 0; i < n; i++) {
    for (let j = i + 1; j < n; j++) {
      if (rng.chance(p)) g.connect(i, j);
    }
  }
  return g.build();
}

export function buildGraph(topology: Topology, n: number, rng: SeededRandom): Graph {
  if (!Number.isInteger(n) || n < 1) {
    throw new MalformedGameError('A graph needs at least one node', { nodes: n });
  }
  switch (topology) {
    case 'ring':
      return ring(n);
    case 'grid':
      return grid(n);
    case 'small_world':
      return smallWorld(n, rng);
    case 'scale_free':
      return scaleFree(n, rng);
    case 'random_erdos_renyi':
      return erdosRenyi(n, rng);
  }
}

/** Each undirected edge once, as [lower, higher]. */
export function edgeList(graph: Graph): [number, number][] {
  const edges: [number, number][] = [];
  graph.adjacency.forEach((neighbours, a) => {
    for (const b of neighbours) {
      if (a < b) edges.push([a, b]);
    }
  });
  return edges;
}

export function graphFromAdjacency(adjacency: readonly (readonly number[])[]): Graph {
  const n = adjacency.length;
  const g = new GraphBuilder(n);
  adjacency.forEach((neighbours, a) => {
    for (const b of neighbours) {
      if (!Number.isInteger(b) || b < 0 || b >= n) {
        throw new MalformedGameError('Neighbour index out of range', { node: a, neighbour: b });
      }
      g.connect(a, b);
    }
  });
  return g.build();
}
