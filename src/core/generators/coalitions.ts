import { z } from 'zod';
import { MalformedGameError } from '../../models/errors';
import { SeededRandom } from '../../utils/random';
import { roundTo } from '../numeric/exact';
import { buildCoalitionGame } from '../cooperative/coalitionGame';
import { defineGenerator, intParam, numberParam, seedParam } from './generator';

function playerLabels(n: number): string[] {
  return Array.from({ length: n }, (_, i) => `Player ${i + 1}`);
}

/** "4,3,2,1" → [4, 3, 2, 1]; empty means equal weights. */
export function parseWeights(raw: string, n: number): number[] {
  if (raw.trim() === '') return new Array<number>(n).fill(1);
  const weights = raw.split(',').map((w) => Number(w.trim()));
  if (weights.length !== n || weights.some((w) => !Number.isFinite(w) || w < 0)) {
    throw new MalformedGameError('Expected one non-negative weight per player', {
      weights: raw,
      players: n,
    });
  }
  return weights;
}

// ─── Coalition Formation ────────────────────────────────────────────────────────

export const coalitionFormation = defineGenerator({
  info: {
    id: 'coalition_formation',
    name: 'Coalition Formation',
    category: 'innovation',
    tier: 3,
    description: 'Transferable-utility games: who joins, and how is the surplus shared?',
  },
  schema: z
    .object({
      n_players: intParam(1, 24, 3),
      mode: z.enum(['unanimity', 'majority', 'weighted_voting', 'synergy']).default('unanimity'),
      total_value: numberParam(0, 1e6, 90),
      weights: z.string().default(''),
      quota: numberParam(0, 1e6, 0),
      synergy: numberParam(0, 1e6, 10),
    })
    .strict(),
  generate: ({ n_players: n, mode, total_value: total, weights: rawWeights, quota, synergy }, config) => {
    const weights = parseWeights(rawWeights, n);
    const weightSum = weights.reduce((s, w) => s + w, 0);
    // Default quota: strictly more than half the weight.
    const effectiveQuota = quota > 0 ? quota : weightSum / 2 + 1e-9;

    const value = (members: readonly number[]): number => {
      const size = members.length;
      if (size === 0) return 0;
      switch (mode) {
        case 'unanimity':
          return size === n ? total : 0;
        case 'majority':
          return size > n / 2 ? total : 0;
        case 'weighted_voting':
          return members.reduce((s, i) => s + weights[i], 0) >= effectiveQuota ? total : 0;
        case 'synergy':
          // Each member brings a share of the total; every pair adds a synergy bonus.
          return (total / n) * size + (synergy * size * (size - 1)) / 2;
      }
    };

    return {
      kind: 'cooperative',
      game: buildCoalitionGame(playerLabels(n), value, config),
      analytics: { mode, quota: mode === 'weighted_voting' ? effectiveQuota : 0 },
    };
  },
});

// ─── Multi-Agent Negotiation ────────────────────────────────────────────────────

export const multiAgentNegotiation = defineGenerator({
  info: {
    id: 'multi_agent_negotiation',
    name: 'Multi-Agent Negotiation',
    category: 'innovation',
    tier: 3,
    description: 'Agents with private valuations bargain over a bundle of items.',
  },
  schema: z
    .object({
      n_agents: intParam(2, 24, 4),
      n_items: intParam(1, 50, 5),
      patience: numberParam(0, 0.999, 0.95),
      seed: seedParam(),
    })
    .strict(),
  generate: ({ n_agents: n, n_items: items, patience, seed }, config) => {
    const rng = new SeededRandom(seed);
    const valuations = Array.from({ length: n }, () =>
      Array.from({ length: items }, () => roundTo(rng.range(1, 20), 2)),
    );

    // A coalition can assign each item to whichever member values it most.
    const value = (members: readonly number[]): number => {
      if (members.length === 0) return 0;
      let sum = 0;
      for (let item = 0; item < items; item++) {
        sum += Math.max(...members.map((i) => valuations[i][item]));
      }
      return sum;
    };

    const assignment = Array.from({ length: items }, (_, item) => {
      let best = 0;
      for (let i = 1; i < n; i++) {
        if (valuations[i][item] > valuations[best][item]) best = i;
      }
      return best;
    });

    return {
      kind: 'cooperative',
      game: buildCoalitionGame(playerLabels(n), value, config),
      analytics: {
        efficient_assignment: assignment,
        // Two-player alternating offers with common discount δ.
        rubinstein_proposer_share: 1 / (1 + patience),
        rubinstein_responder_share: patience / (1 + patience),
      },
    };
  },
});
