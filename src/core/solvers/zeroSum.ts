import { Equilibrium, SolverConfig } from '../../models/types';
import { MalformedGameError, InternalInconsistencyError } from '../../models/errors';
import { PayoffModel } from '../payoffModel';
import { maximizeLinearProgram } from '../numeric/simplex';
import { assertTractable } from './pureEquilibria';

function normalize(weights: number[]): number[] {
  const clamped = weights.map((w) => Math.max(0, w));
  const total = clamped.reduce((s, w) => s + w, 0);
  return clamped.map((w) => w / total);
}

/**
 * Minimax solution of a two-player constant-sum game by linear programming.
 *
 * Row payoffs are shifted to be strictly positive, then the column player's
 * program  max Σy  s.t.  A'y ≤ 1, y ≥ 0  is solved; its optimum is 1/v' and
 * the row player's optimal strategy is read from the dual prices.
 * Player 2's value is `constant_sum - v`.
 */
export function solveZeroSum(model: PayoffModel, config: SolverConfig): Equilibrium {
  assertTractable(model, config);
  const total = model.constantSum(config.tolerance);
  if (total === null) {
    throw new MalformedGameError('Linear-programming solution requires a two-player constant-sum game', {
      players: model.num_players,
    });
  }

  const [a] = model.bimatrix();
  const m = a.length;
  const n = a[0].length;

  const lowest = Math.min(...a.map((row) => Math.min(...row)));
  const shift = lowest <= 0 ? 1 - lowest : 0;
  const shifted = a.map((row) => row.map((v) => v + shift));

  const lp = maximizeLinearProgram(
    new Array<number>(n).fill(1),
    shifted,
    new Array<number>(m).fill(1),
  );
  if (lp.status !== 'optimal' || lp.objective <= 0) {
    throw new InternalInconsistencyError('Minimax linear program did not reach an optimum', {
      status: lp.status,
      iterations: lp.iterations,
    });
  }

  const q = normalize(lp.x);
  const p = normalize(lp.dual);
  const value = 1 / lp.objective - shift;

  // Minimax duality: what the row player guarantees must equal what the
  // column player concedes.
  const rowGuarantee = Math.min(
    ...Array.from({ length: n }, (_, j) => a.reduce((s, row, i) => s + p[i] * row[j], 0)),
  );
  const columnGuarantee = Math.max(
    ...a.map((row) => row.reduce((s, v, j) => s + v * q[j], 0)),
  );
  const scale = Math.max(1, Math.abs(value));
  if (
    Math.abs(rowGuarantee - columnGuarantee) > config.tolerance * scale ||
    Math.abs(rowGuarantee - value) > config.tolerance * scale
  ) {
    throw new InternalInconsistencyError('Minimax values disagree', {
      row_guarantee: rowGuarantee,
      column_guarantee: columnGuarantee,
      value,
    });
  }

  const payoffs = model.expectedPayoffs([p, q]);
  return {
    type: 'mixed',
    profile: null,
    strategies: [p, q],
    payoffs,
    values: [value, total - value],
  };
}
