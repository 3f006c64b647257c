import { z } from 'zod';
import { MalformedGameError } from '../../models/errors';
import { Exact } from '../numeric/exact';
import { buildPayoffModel } from '../payoffModel';
import { defineGenerator, numberParam } from './generator';

type Signal = 'Educate' | 'Skip';
type Wage = 'High' | 'Low';

/** Type-contingent signalling plans, (high type, low type). */
const SENDER_PLANS: [Signal, Signal][] = [
  ['Educate', 'Educate'],
  ['Educate', 'Skip'],
  ['Skip', 'Educate'],
  ['Skip', 'Skip'],
];

/** Signal-contingent wage offers, (after Educate, after Skip). */
const RECEIVER_PLANS: [Wage, Wage][] = [
  ['High', 'High'],
  ['High', 'Low'],
  ['Low', 'High'],
  ['Low', 'Low'],
];

/**
 * Job-market signalling reduced to its induced normal form. Nature draws the
 * worker's type; the worker picks a signal per type, the employer a wage per
 * signal. Payoffs are expectations over the prior.
 */
export const bayesianSignaling = defineGenerator({
  info: {
    id: 'bayesian_signaling',
    name: 'Bayesian Signaling',
    category: 'underrated',
    tier: 2,
    description: 'A worker of hidden ability chooses costly education; the employer sets wages.',
  },
  schema: z
    .object({
      prior_high: numberParam(0, 1, 0.5),
      wage_high: numberParam(0, 1000, 2),
      wage_low: numberParam(0, 1000, 1),
      cost_high: numberParam(0, 1000, 0.5),
      cost_low: numberParam(0, 1000, 1.5),
    })
    .strict(),
  generate: ({ prior_high, wage_high, wage_low, cost_high, cost_low }, config) => {
    if (!(wage_high > wage_low)) {
      throw new MalformedGameError('High wage must exceed low wage', { wage_high, wage_low });
    }
    const types = [
      { prior: new Exact(prior_high), cost: cost_high, productivity: wage_high },
      { prior: new Exact(1).minus(prior_high), cost: cost_low, productivity: wage_low },
    ];

    const payoffs = (plan: [Signal, Signal], offer: [Wage, Wage]): number[] => {
      let worker = new Exact(0);
      let employer = new Exact(0);
      types.forEach((type, t) => {
        const signal = plan[t];
        const wage = (signal === 'Educate' ? offer[0] : offer[1]) === 'High' ? wage_high : wage_low;
        const cost = signal === 'Educate' ? type.cost : 0;
        worker = worker.plus(type.prior.times(new Exact(wage).minus(cost)));
        // Competitive employer: loses the squared gap between wage and productivity.
        const gap = new Exact(wage).minus(type.productivity);
        employer = employer.minus(type.prior.times(gap.pow(2)));
      });
      return [worker.toNumber(), employer.toNumber()];
    };

    return {
      kind: 'normal_form',
      model: buildPayoffModel(
        {
          players: ['Worker', 'Employer'],
          strategy_sets: [
            SENDER_PLANS.map(([h, l]) => `H:${h}/L:${l}`),
            RECEIVER_PLANS.map(([e, s]) => `Educate→${e}/Skip→${s}`),
          ],
          payoff_fn: ([i, j]) => payoffs(SENDER_PLANS[i], RECEIVER_PLANS[j]),
        },
        config,
      ),
      analytics: {
        separating_possible: cost_low > wage_high - wage_low && wage_high - wage_low > cost_high,
        pooling_wage: prior_high * wage_high + (1 - prior_high) * wage_low,
      },
    };
  },
});
