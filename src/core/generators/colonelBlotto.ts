import { z } from 'zod';
import { IntractableGameError } from '../../models/errors';
import { buildPayoffModel } from '../payoffModel';
import { defineGenerator, intParam } from './generator';

/** Number of ways to place `troops` identical units on `fields` fields. */
export function compositionCount(troops: number, fields: number): number {
  // C(troops + fields − 1, fields − 1)
  let count = 1;
  for (let i = 1; i < fields; i++) {
    count = (count * (troops + i)) / i;
  }
  return Math.round(count);
}

/** Every allocation of `troops` over `fields`, lexicographically descending. */
export function compositions(troops: number, fields: number): number[][] {
  if (fields === 1) return [[troops]];
  const result: number[][] = [];
  for (let first = troops; first >= 0; first--) {
    for (const rest of compositions(troops - first, fields - 1)) {
      result.push([first, ...rest]);
    }
  }
  return result;
}

/** Battlefields won minus battlefields lost by the first allocation. */
export function blottoScore(a: readonly number[], b: readonly number[]): number {
  let score = 0;
  a.forEach((x, i) => {
    if (x > b[i]) score++;
    else if (x < b[i]) score--;
  });
  return score;
}

export const colonelBlotto = defineGenerator({
  info: {
    id: 'colonel_blotto',
    name: 'Colonel Blotto',
    category: 'underrated',
    tier: 2,
    description: 'Split troops across battlefields; the larger force takes each field.',
  },
  schema: z
    .object({
      n_battlefields: intParam(2, 6, 3),
      troops_p1: intParam(1, 50, 5),
      troops_p2: intParam(1, 50, 5),
    })
    .strict(),
  generate: ({ n_battlefields: fields, troops_p1, troops_p2 }, config) => {
    for (const [player, troops] of [
      [1, troops_p1],
      [2, troops_p2],
    ]) {
      const count = compositionCount(troops, fields);
      if (count > config.max_strategies_per_player) {
        throw new IntractableGameError('Allocation count exceeds the strategy ceiling', {
          player,
          allocations: count,
          max_strategies_per_player: config.max_strategies_per_player,
        });
      }
    }

    const first = compositions(troops_p1, fields);
    const second = compositions(troops_p2, fields);
    const label = (a: number[]): string => `(${a.join(',')})`;

    return {
      kind: 'normal_form',
      model: buildPayoffModel(
        {
          players: ['Colonel A', 'Colonel B'],
          strategy_sets: [first.map(label), second.map(label)],
          payoff_fn: ([i, j]) => {
            const score = blottoScore(first[i], second[j]);
            return [score, -score];
          },
        },
        config,
      ),
      analytics: {
        allocations_p1: first.length,
        allocations_p2: second.length,
        symmetric: troops_p1 === troops_p2,
      },
    };
  },
});
