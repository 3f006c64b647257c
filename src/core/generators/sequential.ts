import { z } from 'zod';
import { GameTreeNode } from '../../models/types';
import { IntractableGameError, MalformedGameError } from '../../models/errors';
import { Exact } from '../numeric/exact';
import { buildGameTree, decision, terminal } from '../gameTree';
import { cournotProfits, LinearDemand } from './markets';
import { defineGenerator, formatNumber, grid, intParam, numberParam } from './generator';

// ─── Ultimatum ──────────────────────────────────────────────────────────────────

export const ultimatum = defineGenerator({
  info: {
    id: 'ultimatum',
    name: 'Ultimatum Game',
    category: 'classical',
    tier: 1,
    description: 'A proposer offers a split; the responder accepts it or both get nothing.',
  },
  schema: z
    .object({
      pie: numberParam(1, 1000, 10),
      step: numberParam(0.01, 1000, 1),
    })
    .strict(),
  generate: ({ pie, step }, config) => {
    const offers = grid(0, pie, step);
    if (offers.length > config.max_strategies_per_player) {
      throw new IntractableGameError('Offer grid is too fine', {
        offers: offers.length,
        max_strategies_per_player: config.max_strategies_per_player,
      });
    }

    const root = decision(
      0,
      'proposer',
      offers.map((offer) => {
        const keep = new Exact(pie).minus(offer).toNumber();
        return {
          action: `offer ${formatNumber(offer)}`,
          node: decision(1, `responder@${formatNumber(offer)}`, [
            { action: 'accept', node: terminal([keep, offer]) },
            { action: 'reject', node: terminal([0, 0]) },
          ]),
        };
      }),
    );

    return {
      kind: 'extensive_form',
      tree: buildGameTree(root, ['Proposer', 'Responder'], config),
      analytics: { subgame_perfect_offer: offers[0], pie },
    };
  },
});

// ─── Centipede ──────────────────────────────────────────────────────────────────

export const centipede = defineGenerator({
  info: {
    id: 'centipede',
    name: 'Centipede Game',
    category: 'classical',
    tier: 1,
    description: 'Alternating take-or-pass with a growing pot; induction unravels cooperation.',
  },
  schema: z
    .object({
      n_nodes: intParam(1, 100, 6),
      large: numberParam(0, 1e6, 4),
      small: numberParam(0, 1e6, 1),
      growth: numberParam(1, 10, 2),
    })
    .strict(),
  generate: ({ n_nodes: n, large, small, growth }, config) => {
    if (!(large > small)) {
      throw new MalformedGameError('The large pile must exceed the small pile', { large, small });
    }
    // Taking now must beat being taken from one node later.
    if (!(large > small * growth)) {
      throw new MalformedGameError('The large pile must exceed the small pile times growth', {
        large,
        small,
        growth,
      });
    }
    const split = (mover: number, t: number): number[] => {
      const factor = new Exact(growth).pow(t);
      const big = factor.times(large).toNumber();
      const little = factor.times(small).toNumber();
      return mover === 0 ? [big, little] : [little, big];
    };

    // Built from the last node backwards; passing at the end grows the pot once more.
    let node: GameTreeNode = terminal(split(n % 2, n));
    for (let t = n - 1; t >= 0; t--) {
      const mover = t % 2;
      node = decision(mover, `node ${t + 1}`, [
        { action: 'take', node: terminal(split(mover, t)) },
        { action: 'pass', node },
      ]);
    }

    return {
      kind: 'extensive_form',
      tree: buildGameTree(node, ['Player 1', 'Player 2'], config),
      analytics: { final_pot: split(n % 2, n).reduce((s, v) => s + v, 0) },
    };
  },
});

// ─── Stackelberg ────────────────────────────────────────────────────────────────

export const stackelberg = defineGenerator({
  info: {
    id: 'stackelberg',
    name: 'Stackelberg Competition',
    category: 'underrated',
    tier: 2,
    description: 'A leader commits to a quantity; the follower observes it and responds.',
  },
  schema: z
    .object({
      demand_intercept: numberParam(1, 10_000, 100),
      demand_slope: numberParam(0.01, 100, 1),
      marginal_cost: numberParam(0, 10_000, 10),
      step: numberParam(0.01, 1000, 5),
    })
    .strict(),
  generate: (params, config) => {
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
    // Beyond (a − c) / b no quantity can earn a positive margin.
    const quantities = grid(0, (demand.intercept - demand.marginal_cost) / demand.slope, params.step);
    if (quantities.length > config.max_strategies_per_player) {
      throw new IntractableGameError('Quantity grid is too fine', {
        quantities: quantities.length,
        max_strategies_per_player: config.max_strategies_per_player,
      });
    }

    const root = decision(
      0,
      'leader',
      quantities.map((ql) => ({
        action: `q=${formatNumber(ql)}`,
        node: decision(
          1,
          `follower@${formatNumber(ql)}`,
          quantities.map((qf) => ({
            action: `q=${formatNumber(qf)}`,
            node: terminal(cournotProfits(demand, [ql, qf])),
          })),
        ),
      })),
    );

    const span = (demand.intercept - demand.marginal_cost) / demand.slope;
    return {
      kind: 'extensive_form',
      tree: buildGameTree(root, ['Leader', 'Follower'], config),
      analytics: {
        continuous_leader_quantity: span / 2,
        continuous_follower_quantity: span / 4,
        cournot_quantity: span / 3,
      },
    };
  },
});

// ─── Supply Chain ───────────────────────────────────────────────────────────────

export const supplyChain = defineGenerator({
  info: {
    id: 'supply_chain',
    name: 'Supply Chain Pricing',
    category: 'underrated',
    tier: 2,
    description: 'A manufacturer sets a wholesale price, then a retailer sets the retail price.',
  },
  schema: z
    .object({
      demand_intercept: numberParam(1, 10_000, 100),
      demand_slope: numberParam(0.01, 100, 1),
      unit_cost: numberParam(0, 10_000, 10),
      price_step: numberParam(0.01, 1000, 10),
    })
    .strict(),
  generate: ({ demand_intercept: a, demand_slope: b, unit_cost: c, price_step: step }, config) => {
    const choke = a / b;
    if (!(choke > c)) {
      throw new MalformedGameError('Choke price must exceed unit cost', { choke_price: choke, unit_cost: c });
    }
    const prices = grid(c, choke, step);
    if (prices.length > config.max_strategies_per_player) {
      throw new IntractableGameError('Price grid is too fine', {
        prices: prices.length,
        max_strategies_per_player: config.max_strategies_per_player,
      });
    }

    const demandAt = (p: number) => {
      const q = new Exact(a).minus(new Exact(b).times(p));
      return q.isNegative() ? new Exact(0) : q;
    };

    const root = decision(
      0,
      'manufacturer',
      prices.map((w) => ({
        action: `w=${formatNumber(w)}`,
        node: decision(
          1,
          `retailer@${formatNumber(w)}`,
          prices
            .filter((p) => p >= w)
            .map((p) => {
              const q = demandAt(p);
              return {
                action: `p=${formatNumber(p)}`,
                node: terminal([
                  new Exact(w).minus(c).times(q).toNumber(),
                  new Exact(p).minus(w).times(q).toNumber(),
                ]),
              };
            }),
        ),
      })),
    );

    const wholesale = (choke + c) / 2;
    const retail = (choke + wholesale) / 2;
    const integrated = (choke + c) / 2;
    return {
      kind: 'extensive_form',
      tree: buildGameTree(root, ['Manufacturer', 'Retailer'], config),
      analytics: {
        continuous_wholesale_price: wholesale,
        continuous_retail_price: retail,
        integrated_retail_price: integrated,
        double_marginalization_markup: retail - integrated,
      },
    };
  },
});
