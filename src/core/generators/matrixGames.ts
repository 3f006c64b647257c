import { z } from 'zod';
import { MalformedGameError } from '../../models/errors';
import { buildBimatrixModel, buildPayoffModel } from '../payoffModel';
import { defineGenerator, intParam, numberParam } from './generator';

const TWO_PLAYERS: [string, string] = ['Player 1', 'Player 2'];

// ─── Prisoner's Dilemma ─────────────────────────────────────────────────────────

export const prisonersDilemma = defineGenerator({
  info: {
    id: 'prisoners_dilemma',
    name: "Prisoner's Dilemma",
    category: 'classical',
    tier: 1,
    description: 'Two players choose to cooperate or defect; defection dominates.',
  },
  schema: z
    .object({
      temptation: numberParam(-1000, 1000, 5),
      reward: numberParam(-1000, 1000, 3),
      punishment: numberParam(-1000, 1000, 1),
      sucker: numberParam(-1000, 1000, 0),
    })
    .strict(),
  generate: ({ temptation: t, reward: r, punishment: p, sucker: s }) => {
    if (!(t > r && r > p && p > s)) {
      throw new MalformedGameError('Payoffs must satisfy T > R > P > S', { t, r, p, s });
    }
    return {
      kind: 'normal_form',
      model: buildBimatrixModel(
        TWO_PLAYERS,
        ['Cooperate', 'Defect'],
        ['Cooperate', 'Defect'],
        [
          [r, s],
          [t, p],
        ],
        [
          [r, t],
          [s, p],
        ],
      ),
      analytics: {
        // Grim trigger sustains cooperation for discount factors at or above this.
        critical_discount_factor: (t - r) / (t - p),
        cooperation_surplus: 2 * r - 2 * p,
      },
    };
  },
});

// ─── Stag Hunt ──────────────────────────────────────────────────────────────────

export const stagHunt = defineGenerator({
  info: {
    id: 'stag_hunt',
    name: 'Stag Hunt',
    category: 'classical',
    tier: 1,
    description: 'Coordinate on the risky, rewarding stag or the safe hare.',
  },
  schema: z
    .object({
      stag_payoff: numberParam(-1000, 1000, 4),
      hare_payoff: numberParam(-1000, 1000, 3),
      failure_payoff: numberParam(-1000, 1000, 0),
    })
    .strict(),
  generate: ({ stag_payoff: stag, hare_payoff: hare, failure_payoff: fail }) => {
    if (!(stag > hare && hare > fail)) {
      throw new MalformedGameError('Payoffs must satisfy stag > hare > failure', {
        stag,
        hare,
        fail,
      });
    }
    const matrix = [
      [stag, fail],
      [hare, hare],
    ];
    return {
      kind: 'normal_form',
      model: buildBimatrixModel(TWO_PLAYERS, ['Stag', 'Hare'], ['Stag', 'Hare'], matrix, [
        [stag, hare],
        [fail, hare],
      ]),
      analytics: {
        mixed_stag_probability: (hare - fail) / (stag - fail),
        risk_dominant: stag - hare > hare - fail ? 'Stag' : 'Hare',
        payoff_dominant: 'Stag',
      },
    };
  },
});

// ─── Battle of the Sexes ────────────────────────────────────────────────────────

export const battleOfSexes = defineGenerator({
  info: {
    id: 'battle_of_sexes',
    name: 'Battle of the Sexes',
    category: 'classical',
    tier: 1,
    description: 'Both prefer to coordinate but disagree on where.',
  },
  schema: z
    .object({
      preferred_payoff: numberParam(0, 1000, 3),
      other_payoff: numberParam(0, 1000, 2),
      disagreement_payoff: numberParam(-1000, 1000, 0),
    })
    .strict(),
  generate: ({ preferred_payoff: a, other_payoff: b, disagreement_payoff: d }) => {
    if (!(a > d && b > d)) {
      throw new MalformedGameError('Coordination must beat disagreement', { a, b, d });
    }
    const rowProb = (a - d) / (a - d + (b - d));
    return {
      kind: 'normal_form',
      model: buildBimatrixModel(
        TWO_PLAYERS,
        ['Opera', 'Football'],
        ['Opera', 'Football'],
        [
          [a, d],
          [d, b],
        ],
        [
          [b, d],
          [d, a],
        ],
      ),
      analytics: {
        mixed_row_opera_probability: rowProb,
        mixed_column_opera_probability: 1 - rowProb,
      },
    };
  },
});

// ─── Matching Pennies ───────────────────────────────────────────────────────────

export const matchingPennies = defineGenerator({
  info: {
    id: 'matching_pennies',
    name: 'Matching Pennies',
    category: 'classical',
    tier: 1,
    description: 'Pure conflict: the matcher wins on a match, the mismatcher otherwise.',
  },
  schema: z.object({ stake: numberParam(0.01, 1000, 1) }).strict(),
  generate: ({ stake }) => {
    const a = [
      [stake, -stake],
      [-stake, stake],
    ];
    return {
      kind: 'normal_form',
      model: buildBimatrixModel(
        ['Matcher', 'Mismatcher'],
        ['Heads', 'Tails'],
        ['Heads', 'Tails'],
        a,
        a.map((row) => row.map((v) => -v)),
      ),
      analytics: { game_value: 0 },
    };
  },
});

// ─── Rock Paper Scissors ────────────────────────────────────────────────────────

export const rockPaperScissors = defineGenerator({
  info: {
    id: 'rock_paper_scissors',
    name: 'Rock Paper Scissors',
    category: 'classical',
    tier: 1,
    description: 'Cyclic dominance with a unique fully mixed equilibrium.',
  },
  schema: z
    .object({
      win: numberParam(-1000, 1000, 1),
      lose: numberParam(-1000, 1000, -1),
      tie: numberParam(-1000, 1000, 0),
    })
    .strict(),
  generate: ({ win, lose, tie }) => {
    if (!(win > tie && tie > lose)) {
      throw new MalformedGameError('Payoffs must satisfy win > tie > lose', { win, lose, tie });
    }
    const labels = ['Rock', 'Paper', 'Scissors'];
    // beats[i] is the strategy i defeats.
    const beats = [2, 0, 1];
    const outcome = (i: number, j: number): number =>
      i === j ? tie : beats[i] === j ? win : lose;

    const row = labels.map((_, i) => labels.map((__, j) => outcome(i, j)));
    const column = labels.map((_, i) => labels.map((__, j) => outcome(j, i)));
    return {
      kind: 'normal_form',
      model: buildBimatrixModel(TWO_PLAYERS, labels, labels, row, column),
      analytics: { zero_sum: win + lose === 0 && tie === 0 },
    };
  },
});

// ─── General Coordination ───────────────────────────────────────────────────────

export const coordinationGeneral = defineGenerator({
  info: {
    id: 'coordination_general',
    name: 'General Coordination Game',
    category: 'underrated',
    tier: 2,
    description: 'k conventions; matching pays, and later conventions pay a premium.',
  },
  schema: z
    .object({
      n_strategies: intParam(2, 10, 3),
      coordination_payoff: numberParam(-1000, 1000, 2),
      premium: numberParam(0, 1000, 1),
      miscoordination_payoff: numberParam(-1000, 1000, 0),
    })
    .strict(),
  generate: ({ n_strategies: k, coordination_payoff: base, premium, miscoordination_payoff: miss }) => {
    if (!(base > miss)) {
      throw new MalformedGameError('Coordination must pay more than miscoordination', {
        coordination_payoff: base,
        miscoordination_payoff: miss,
      });
    }
    const labels = Array.from({ length: k }, (_, i) => `Convention ${i + 1}`);
    const value = (i: number): number => base + i * premium;
    return {
      kind: 'normal_form',
      model: buildPayoffModel({
        players: TWO_PLAYERS,
        strategy_sets: [labels, labels],
        payoff_fn: ([i, j]) => (i === j ? [value(i), value(i)] : [miss, miss]),
      }),
      analytics: {
        pure_equilibria_count: k,
        payoff_dominant: labels[k - 1],
      },
    };
  },
});
