import { Equilibrium, SolverConfig } from '../../models/types';
import { MalformedGameError, IntractableGameError } from '../../models/errors';
import { PayoffModel } from '../payoffModel';
import { solveLinearSystem } from '../numeric/linearSystem';
import { assertTractable } from './pureEquilibria';

export interface SupportEnumerationOptions {
  /** Smallest support size tried. Default: 1. */
  min_support?: number;

  /** Keep searching after the first support size that yields equilibria. */
  all_supports?: boolean;
}

/** k-subsets of {0..n-1} in lexicographic order. */
export function* combinations(n: number, k: number): Generator<number[]> {
  if (k > n || k <= 0) return;
  const idx = Array.from({ length: k }, (_, i) => i);
  while (true) {
    yield [...idx];
    let i = k - 1;
    while (i >= 0 && idx[i] === n - k + i) i--;
    if (i < 0) return;
    idx[i]++;
    for (let j = i + 1; j < k; j++) idx[j] = idx[j - 1] + 1;
  }
}

/**
 * Solve for the mix over `mixSupport` that makes every strategy of the
 * opponent in `indifferentSupport` equally good. `payoff(r, c)` is the
 * opponent's payoff when it plays r against our c.
 */
function indifferenceMix(
  indifferentSupport: number[],
  mixSupport: number[],
  size: number,
  payoff: (r: number, c: number) => number,
): number[] | null {
  const k = mixSupport.length;
  // Unknowns: k probabilities followed by the common payoff.
  const rows: number[][] = indifferentSupport.map((r) => [
    ...mixSupport.map((c) => payoff(r, c)),
    -1,
  ]);
  rows.push([...new Array<number>(k).fill(1), 0]);
  const rhs = [...new Array<number>(k).fill(0), 1];

  const solution = solveLinearSystem(rows, rhs);
  if (solution === null) return null;

  const mix = new Array<number>(size).fill(0);
  mixSupport.forEach((c, i) => (mix[c] = solution[i]));
  return mix;
}

function cleanDistribution(mix: number[], tolerance: number): number[] | null {
  if (mix.some((x) => !Number.isFinite(x) || x < -tolerance)) return null;
  const clamped = mix.map((x) => (x < 0 ? 0 : x));
  const total = clamped.reduce((s, x) => s + x, 0);
  if (Math.abs(total - 1) > tolerance) return null;
  return clamped.map((x) => x / total);
}

function sameStrategies(a: number[][], b: number[][], tolerance: number): boolean {
  return a.every((mix, p) => mix.every((x, s) => Math.abs(x - b[p][s]) <= tolerance));
}

/**
 * Two-player support enumeration.
 *
 * Tries supports of equal size k = min_support..min(m, n) (so total support
 * size grows), solves the indifference equations for each pair and keeps
 * solutions that are probability vectors with no profitable deviation
 * outside the support. Stops after the first k that yields an equilibrium
 * unless `all_supports` is set. Degenerate games whose equilibria need
 * supports of unequal size are outside this search.
 */
export function findMixedEquilibria(
  model: PayoffModel,
  config: SolverConfig,
  options: SupportEnumerationOptions = {},
): Equilibrium[] {
  if (model.num_players !== 2) {
    throw new MalformedGameError('Support enumeration requires a two-player game', {
      players: model.num_players,
    });
  }
  assertTractable(model, config);

  const tol = config.tolerance;
  const [a, b] = model.bimatrix();
  const m = a.length;
  const n = a[0].length;
  const minSupport = Math.max(1, options.min_support ?? 1);

  const found: Equilibrium[] = [];
  let pairsTried = 0;

  for (let k = minSupport; k <= Math.min(m, n); k++) {
    const before = found.length;

    for (const rowSupport of combinations(m, k)) {
      for (const colSupport of combinations(n, k)) {
        pairsTried++;
        if (pairsTried > config.max_support_pairs) {
          throw new IntractableGameError('Support enumeration exceeded its ceiling', {
            support_pairs: pairsTried,
            max_support_pairs: config.max_support_pairs,
          });
        }

        // Column mix makes the row player indifferent over its support, and vice versa.
        const rawQ = indifferenceMix(rowSupport, colSupport, n, (r, c) => a[r][c]);
        const rawP = indifferenceMix(colSupport, rowSupport, m, (c, r) => b[r][c]);
        if (rawQ === null || rawP === null) continue;

        const q = cleanDistribution(rawQ, tol);
        const p = cleanDistribution(rawP, tol);
        if (q === null || p === null) continue;

        const rowValues = a.map((row) => row.reduce((s, v, j) => s + v * q[j], 0));
        const colValues = Array.from({ length: n }, (_, j) =>
          b.reduce((s, row, i) => s + p[i] * row[j], 0),
        );
        const rowPayoff = rowValues.reduce((s, v, i) => s + v * p[i], 0);
        const colPayoff = colValues.reduce((s, v, j) => s + v * q[j], 0);

        if (Math.max(...rowValues) > rowPayoff + tol) continue;
        if (Math.max(...colValues) > colPayoff + tol) continue;

        const strategies = [p, q];
        if (found.some((e) => sameStrategies(e.strategies, strategies, tol * 10))) continue;

        const pure = k === 1;
        found.push({
          type: pure ? 'pure' : 'mixed',
          profile: pure ? [rowSupport[0], colSupport[0]] : null,
          strategies,
          payoffs: [rowPayoff, colPayoff],
        });
      }
    }

    if (found.length > before && !options.all_supports) break;
  }

  return found;
}
