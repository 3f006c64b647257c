import { z } from 'zod';
import { findEvolutionarilyStableStrategies, isEvolutionarilyStable } from '../dynamics/ess';
import { defineGenerator, intParam, numberParam } from './generator';

/**
 * Hawk–Dove payoffs to the row strategy:
 *
 *            Hawk        Dove
 *   Hawk  (V − C)/2       V
 *   Dove      0          V/2
 */
export function hawkDoveMatrix(value: number, cost: number): number[][] {
  return [
    [(value - cost) / 2, value],
    [0, value / 2],
  ];
}

export const essModule = defineGenerator({
  info: {
    id: 'ess_module',
    name: 'Evolutionary Stable Strategies',
    category: 'classical',
    tier: 1,
    description: 'Hawk–Dove population under replicator dynamics.',
  },
  schema: z
    .object({
      value: numberParam(0.01, 1000, 2),
      cost: numberParam(0.01, 1000, 4),
      initial_hawk_share: numberParam(0, 1, 0.1),
      steps: intParam(1, 100_000, 500),
    })
    .strict(),
  generate: ({ value, cost, initial_hawk_share: hawks, steps }, config) => {
    const matrix = hawkDoveMatrix(value, cost);
    const labels = ['Hawk', 'Dove'];
    const mixedShare = Math.min(1, value / cost);

    return {
      kind: 'replicator',
      labels,
      matrix,
      initial: [hawks, 1 - hawks],
      steps,
      analytics: {
        ess_hawk_share: mixedShare,
        pure_ess: findEvolutionarilyStableStrategies(matrix, config.tolerance).map((i) => labels[i]).join(',') || 'none',
        mixed_ess_stable: isEvolutionarilyStable(matrix, [mixedShare, 1 - mixedShare], config.tolerance),
      },
    };
  },
});
