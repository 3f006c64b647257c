import Decimal from 'decimal.js';
import { z } from 'zod';
import { MalformedGameError } from '../../models/errors';
import { Exact } from '../numeric/exact';
import { buildPayoffModel } from '../payoffModel';
import { defineGenerator, formatNumber, intParam, numberParam } from './generator';

function playerLabels(prefix: string, n: number): string[] {
  return Array.from({ length: n }, (_, i) => `${prefix} ${i + 1}`);
}

function nonNegative(value: Decimal): Decimal {
  return value.isNegative() ? new Exact(0) : value;
}

// ─── Public Goods ───────────────────────────────────────────────────────────────

export const publicGoods = defineGenerator({
  info: {
    id: 'public_goods',
    name: 'Public Goods Game',
    category: 'classical',
    tier: 1,
    description: 'Contributions are multiplied and shared equally; free riding pays privately.',
  },
  schema: z
    .object({
      n_players: intParam(2, 6, 3),
      endowment: numberParam(1, 1000, 10),
      multiplier: numberParam(0.1, 20, 1.6),
      contribution_levels: intParam(2, 5, 3),
    })
    .strict(),
  generate: ({ n_players: n, endowment, multiplier, contribution_levels: levels }, config) => {
    const amounts = Array.from({ length: levels }, (_, i) =>
      new Exact(endowment).times(i).div(levels - 1),
    );
    const labels = amounts.map((a) => `Contribute ${formatNumber(a.toNumber())}`);

    const model = buildPayoffModel(
      {
        players: playerLabels('Player', n),
        strategy_sets: Array.from({ length: n }, () => labels),
        payoff_fn: (profile) => {
          const pot = profile.reduce((sum, s) => sum.plus(amounts[s]), new Exact(0));
          const share = pot.times(multiplier).div(n);
          return profile.map((s) => share.plus(endowment).minus(amounts[s]).toNumber());
        },
      },
      config,
    );

    const mpcr = multiplier / n;
    return {
      kind: 'normal_form',
      model,
      analytics: {
        marginal_per_capita_return: mpcr,
        nash_contribution: mpcr < 1 ? 0 : endowment,
        social_optimum_contribution: multiplier > 1 ? endowment : 0,
      },
    };
  },
});

// ─── Market Entry ───────────────────────────────────────────────────────────────

export const marketEntry = defineGenerator({
  info: {
    id: 'market_entry',
    name: 'Market Entry Game',
    category: 'underrated',
    tier: 2,
    description: 'Potential entrants split a fixed market; each pays a sunk entry cost.',
  },
  schema: z
    .object({
      n_potential: intParam(2, 10, 4),
      market_capacity: numberParam(1, 10_000, 40),
      entry_cost: numberParam(0, 10_000, 15),
    })
    .strict(),
  generate: ({ n_potential: n, market_capacity: capacity, entry_cost: cost }, config) => {
    const model = buildPayoffModel(
      {
        players: playerLabels('Firm', n),
        strategy_sets: Array.from({ length: n }, () => ['Stay out', 'Enter']),
        payoff_fn: (profile) => {
          const entrants = profile.filter((s) => s === 1).length;
          return profile.map((s) =>
            s === 1 ? new Exact(capacity).div(entrants).minus(cost).toNumber() : 0,
          );
        },
      },
      config,
    );

    const freeEntry = cost === 0 ? n : Math.min(n, Math.floor(capacity / cost));
    return {
      kind: 'normal_form',
      model,
      analytics: {
        free_entry_count: freeEntry,
        profit_per_entrant_at_free_entry:
          freeEntry === 0 ? 0 : new Exact(capacity).div(freeEntry).minus(cost).toNumber(),
      },
    };
  },
});

// ─── War of Attrition ───────────────────────────────────────────────────────────

export const warOfAttrition = defineGenerator({
  info: {
    id: 'war_of_attrition',
    name: 'War of Attrition',
    category: 'underrated',
    tier: 2,
    description: 'Both pay for every period the contest lasts; the last to quit takes the prize.',
  },
  schema: z
    .object({
      prize_value: numberParam(0.01, 1000, 10),
      cost_per_round: numberParam(0.01, 1000, 1),
      max_time: intParam(1, 9, 6),
    })
    .strict(),
  generate: ({ prize_value: prize, cost_per_round: cost, max_time: horizon }, config) => {
    const labels = Array.from({ length: horizon + 1 }, (_, t) => `Quit at ${t}`);
    const v = new Exact(prize);

    const model = buildPayoffModel(
      {
        players: ['Contestant 1', 'Contestant 2'],
        strategy_sets: [labels, labels],
        payoff_fn: ([t1, t2]) => {
          const spent = new Exact(cost).times(Math.min(t1, t2));
          if (t1 > t2) return [v.minus(spent).toNumber(), spent.neg().toNumber()];
          if (t2 > t1) return [spent.neg().toNumber(), v.minus(spent).toNumber()];
          const half = v.div(2).minus(spent).toNumber();
          return [half, half];
        },
      },
      config,
    );

    return {
      kind: 'normal_form',
      model,
      analytics: {
        // Symmetric equilibrium of the continuous-time game quits at this hazard rate.
        continuous_hazard_rate: cost / prize,
        expected_equilibrium_profit: 0,
      },
    };
  },
});

// ─── Auctions ───────────────────────────────────────────────────────────────────

export type AuctionFormat = 'first_price' | 'second_price' | 'all_pay';

/** Bidder payoffs with ties split evenly. */
export function auctionPayoffs(
  format: AuctionFormat,
  values: readonly [number, number],
  bids: readonly [number, number],
): [number, number] {
  const payoff = (self: 0 | 1): Decimal => {
    const other = self === 0 ? 1 : 0;
    const value = new Exact(values[self]);
    const own = new Exact(bids[self]);
    const rival = new Exact(bids[other]);
    const win = own.gt(rival) ? new Exact(1) : own.eq(rival) ? new Exact(0.5) : new Exact(0);

    switch (format) {
      case 'first_price':
        return win.times(value.minus(own));
      case 'second_price':
        return win.times(value.minus(rival));
      case 'all_pay':
        return win.times(value).minus(own);
    }
  };
  return [payoff(0).toNumber(), payoff(1).toNumber()];
}

export const auctionMechanisms = defineGenerator({
  info: {
    id: 'auction_mechanisms',
    name: 'Auction Mechanisms',
    category: 'underrated',
    tier: 2,
    description: 'Two bidders with known values on a discrete bid grid.',
  },
  schema: z
    .object({
      format: z.enum(['first_price', 'second_price', 'all_pay']).default('second_price'),
      value_1: numberParam(0, 10_000, 8),
      value_2: numberParam(0, 10_000, 6),
      bid_levels: intParam(2, 10, 9),
      bid_step: numberParam(0.01, 1000, 1),
    })
    .strict(),
  generate: ({ format, value_1, value_2, bid_levels, bid_step }, config) => {
    const bids = Array.from({ length: bid_levels }, (_, i) =>
      new Exact(bid_step).times(i).toNumber(),
    );
    const labels = bids.map((b) => `Bid ${formatNumber(b)}`);
    const values: [number, number] = [value_1, value_2];

    const model = buildPayoffModel(
      {
        players: ['Bidder 1', 'Bidder 2'],
        strategy_sets: [labels, labels],
        payoff_fn: ([i, j]) => auctionPayoffs(format, values, [bids[i], bids[j]]),
      },
      config,
    );

    return {
      kind: 'normal_form',
      model,
      analytics: {
        format,
        truthful_bidding_dominant: format === 'second_price',
        efficient_winner: value_1 >= value_2 ? 'Bidder 1' : 'Bidder 2',
        second_highest_value: Math.min(value_1, value_2),
      },
    };
  },
});

// ─── Cournot / Bertrand ─────────────────────────────────────────────────────────

export type CompetitionMode = 'cournot' | 'bertrand';

export interface LinearDemand {
  intercept: number;
  slope: number;
  marginal_cost: number;
}

/** Cournot profits for quantities under inverse demand P = max(0, a − bQ). */
export function cournotProfits(demand: LinearDemand, quantities: readonly number[]): number[] {
  const total = quantities.reduce((s, q) => s.plus(q), new Exact(0));
  const price = nonNegative(new Exact(demand.intercept).minus(total.times(demand.slope)));
  const margin = price.minus(demand.marginal_cost);
  return quantities.map((q) => margin.times(q).toNumber());
}

/**
 * Bertrand profits for homogeneous goods: the lowest price serves demand
 * Q = max(0, (a − p) / b), shared equally on ties.
 */
export function bertrandProfits(demand: LinearDemand, prices: readonly number[]): number[] {
  const lowest = Math.min(...prices);
  const winners = prices.filter((p) => p === lowest).length;
  const quantity = nonNegative(new Exact(demand.intercept).minus(lowest).div(demand.slope));
  return prices.map((p) =>
    p === lowest
      ? new Exact(p).minus(demand.marginal_cost).times(quantity).div(winners).toNumber()
      : 0,
  );
}

export const cournotBertrand = defineGenerator({
  info: {
    id: 'cournot_bertrand',
    name: 'Cournot vs Bertrand',
    category: 'underrated',
    tier: 2,
    description: 'Oligopoly competing in quantities or prices on a discrete grid.',
  },
  schema: z
    .object({
      mode: z.enum(['cournot', 'bertrand']).default('cournot'),
      n_firms: intParam(2, 4, 2),
      demand_intercept: numberParam(1, 10_000, 100),
      demand_slope: numberParam(0.01, 100, 1),
      marginal_cost: numberParam(0, 10_000, 10),
      levels: intParam(2, 10, 7),
      step: numberParam(0.01, 1000, 10),
    })
    .strict(),
  generate: (params, config) => {
    const { mode, n_firms: n, levels, step } = params;
    const demand: LinearDemand = {
      intercept: params.demand_intercept,
      slope: params.demand_slope,
      marginal_cost: params.marginal_cost,
    };
    if (!(demand.intercept > demand.marginal_cost)) {
      throw new MalformedGameError('Demand intercept must exceed marginal cost', {
        demand_intercept: demand.intercept,
        marginal_cost: demand.marginal_cost,
      });
    }

    // Quantities start at 0, prices at marginal cost.
    const start = mode === 'cournot' ? 0 : demand.marginal_cost;
    const actions = Array.from({ length: levels }, (_, i) =>
      new Exact(step).times(i).plus(start).toNumber(),
    );
    const labels = actions.map((x) => `${mode === 'cournot' ? 'q' : 'p'}=${formatNumber(x)}`);

    const model = buildPayoffModel(
      {
        players: playerLabels('Firm', n),
        strategy_sets: Array.from({ length: n }, () => labels),
        payoff_fn: (profile) => {
          const chosen = profile.map((s) => actions[s]);
          return mode === 'cournot' ? cournotProfits(demand, chosen) : bertrandProfits(demand, chosen);
        },
      },
      config,
    );

    const a = demand.intercept;
    const b = demand.slope;
    const c = demand.marginal_cost;
    const quantity = (a - c) / ((n + 1) * b);
    const price = a - b * n * quantity;
    return {
      kind: 'normal_form',
      model,
      analytics: {
        mode,
        cournot_quantity: quantity,
        cournot_price: price,
        cournot_profit: (price - c) * quantity,
        bertrand_price: c,
      },
    };
  },
});
