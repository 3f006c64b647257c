import { MixedStrategy, PayoffMatrix } from '../../models/types';
import { pureToMixed } from '../payoffModel';
import { validateSquareMatrix } from './replicator';

/** Expected payoff of mix x against mix y in a symmetric game. */
function against(matrix: PayoffMatrix, x: readonly number[], y: readonly number[]): number {
  let total = 0;
  matrix.forEach((row, i) => row.forEach((v, j) => (total += x[i] * v * y[j])));
  return total;
}

/**
 * Maynard Smith's conditions, checked against every pure mutant j:
 *
 * 1. x is a best response to itself: E(j, x) ≤ E(x, x)
 * 2. for each mutant doing equally well against x, x does strictly better
 *    against the mutant than the mutant does against itself:
 *    E(x, j) > E(j, j)
 */
export function isEvolutionarilyStable(
  matrix: PayoffMatrix,
  candidate: MixedStrategy,
  tolerance = 1e-9,
): boolean {
  const k = validateSquareMatrix(matrix);
  const self = against(matrix, candidate, candidate);

  for (let j = 0; j < k; j++) {
    const mutant = pureToMixed(j, k);
    if (candidate.every((x, i) => Math.abs(x - mutant[i]) <= tolerance)) continue;

    const mutantVsCandidate = against(matrix, mutant, candidate);
    if (mutantVsCandidate > self + tolerance) return false;

    if (Math.abs(mutantVsCandidate - self) <= tolerance) {
      const candidateVsMutant = against(matrix, candidate, mutant);
      const mutantVsMutant = matrix[j][j];
      if (!(candidateVsMutant > mutantVsMutant + tolerance)) return false;
    }
  }
  return true;
}

/** Indices of the pure strategies that are evolutionarily stable. */
export function findEvolutionarilyStableStrategies(matrix: PayoffMatrix, tolerance = 1e-9): number[] {
  const k = validateSquareMatrix(matrix);
  const stable: number[] = [];
  for (let i = 0; i < k; i++) {
    if (isEvolutionarilyStable(matrix, pureToMixed(i, k), tolerance)) stable.push(i);
  }
  return stable;
}
