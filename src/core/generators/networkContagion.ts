import { z } from 'zod';
import { SeededRandom } from '../../utils/random';
import { buildGraph, edgeList, Topology } from '../dynamics/graphs';
import { contagionThreshold } from '../dynamics/contagion';
import { defineGenerator, intParam, numberParam, seedParam } from './generator';

const topologySchema = z.enum(['ring', 'grid', 'small_world', 'scale_free', 'random_erdos_renyi']);

export const networkContagion = defineGenerator({
  info: {
    id: 'network_contagion',
    name: 'Network Contagion',
    category: 'innovation',
    tier: 3,
    description: 'Agents on a graph play a coordination game with neighbours and adopt best responses.',
  },
  schema: z
    .object({
      n_nodes: intParam(2, 500, 100),
      topology: topologySchema.default('small_world'),
      initial_adopters: numberParam(0, 1, 0.1),
      rounds: intParam(1, 10_000, 50),
      payoff_AA: numberParam(-1000, 1000, 3),
      payoff_BB: numberParam(-1000, 1000, 4),
      payoff_AB: numberParam(-1000, 1000, 0),
      seed: seedParam(),
    })
    .strict(),
  generate: (params) => {
    const n = params.n_nodes;
    const topology: Topology = params.topology;
    const rng = new SeededRandom(params.seed);
    const graph = buildGraph(topology, n, rng);

    const adopters = rng.sampleIndices(n, Math.max(1, Math.floor(n * params.initial_adopters)));
    const initial = new Array<number>(n).fill(0);
    for (const node of adopters) initial[node] = 1;

    const matrix = [
      [params.payoff_AA, params.payoff_AB],
      [params.payoff_AB, params.payoff_BB],
    ];
    const threshold = contagionThreshold(matrix);

    return {
      kind: 'network',
      labels: ['A (incumbent)', 'B (innovation)'],
      graph,
      matrix,
      initial_strategies: initial,
      steps: params.rounds,
      analytics: {
        topology,
        edges: edgeList(graph).length,
        initial_adopters: adopters.length,
        ...(threshold === null ? {} : { predicted_threshold: threshold }),
      },
    };
  },
});
