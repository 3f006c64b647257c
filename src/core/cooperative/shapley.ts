import Decimal from 'decimal.js';
import { SolverConfig } from '../../models/types';
import { InternalInconsistencyError } from '../../models/errors';
import { Exact, factorial } from '../numeric/exact';
import { CoalitionGame } from './coalitionGame';

function popcount(mask: number): number {
  let count = 0;
  for (let m = mask; m !== 0; m &= m - 1) count++;
  return count;
}

/**
 * Shapley value by the closed-form subset sum:
 *
 *   φᵢ = Σ_{S ⊆ N∖{i}} |S|!(n−|S|−1)!/n! · (v(S ∪ {i}) − v(S))
 *
 * Weights and sums are exact decimals; each φᵢ is rounded to a float once.
 * Σφᵢ must equal v(N) within `efficiency_tolerance`.
 */
export function computeShapleyValue(game: CoalitionGame, config: SolverConfig): number[] {
  const n = game.num_players;
  const nFactorial = factorial(n);
  const weights: Decimal[] = [];
  for (let s = 0; s < n; s++) {
    weights.push(factorial(s).mul(factorial(n - s - 1)).div(nFactorial));
  }

  const phi: number[] = [];
  let total = new Exact(0);
  for (let i = 0; i < n; i++) {
    const bit = 1 << i;
    let sum = new Exact(0);
    for (let mask = 0; mask <= game.grand_coalition; mask++) {
      if (mask & bit) continue;
      const marginal = new Exact(game.value(mask | bit)).minus(game.value(mask));
      if (!marginal.isZero()) sum = sum.plus(weights[popcount(mask)].mul(marginal));
    }
    total = total.plus(sum);
    phi.push(sum.toNumber());
  }

  const grand = game.grandCoalitionValue();
  const gap = total.minus(grand).abs().toNumber();
  if (gap > config.efficiency_tolerance) {
    throw new InternalInconsistencyError('Shapley value is not efficient', {
      allocated: total.toNumber(),
      grand_coalition_value: grand,
    });
  }
  return phi;
}
