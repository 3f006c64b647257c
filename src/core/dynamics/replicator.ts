import {
  MixedStrategy,
  PayoffMatrix,
  PopulationSnapshot,
  SolverConfig,
} from '../../models/types';
import {
  MalformedGameError,
  IntractableGameError,
  InternalInconsistencyError,
} from '../../models/errors';
import { validateMixedStrategy } from '../payoffModel';
import { runBoundedLoop } from './loop';

export interface ReplicatorInput {
  /** Symmetric game: payoff of strategy i against strategy j. */
  matrix: PayoffMatrix;
  initial: MixedStrategy;
  steps: number;
}

export interface ReplicatorRun {
  trajectory: PopulationSnapshot[];
  converged: boolean;
  steps: number;
}

export function validateSquareMatrix(matrix: PayoffMatrix): number {
  const k = matrix.length;
  if (k === 0 || matrix.some((row) => row.length !== k)) {
    throw new MalformedGameError('Payoff matrix must be square and non-empty', { rows: k });
  }
  if (matrix.some((row) => row.some((v) => !Number.isFinite(v)))) {
    throw new MalformedGameError('Payoff matrix contains a non-finite value');
  }
  return k;
}

/** Payoff of each strategy against the population `shares`. */
export function fitness(matrix: PayoffMatrix, shares: readonly number[]): number[] {
  return matrix.map((row) => row.reduce((s, v, j) => s + v * shares[j], 0));
}

/**
 * Discrete replicator update: each share grows in proportion to its fitness
 * over the population average, then the vector is renormalized.
 *
 * The update needs positive fitness, so a matrix with any entry ≤ 0 is
 * shifted to a minimum of 1 first. A constant shift leaves the rest points
 * and the direction of motion unchanged.
 */
export function replicatorStep(shares: readonly number[], matrix: PayoffMatrix): number[] {
  const lowest = Math.min(...matrix.map((row) => Math.min(...row)));
  const shift = lowest <= 0 ? 1 - lowest : 0;
  const shifted = shift === 0 ? matrix : matrix.map((row) => row.map((v) => v + shift));

  const f = fitness(shifted, shares);
  const average = shares.reduce((s, x, i) => s + x * f[i], 0);
  const next = shares.map((x, i) => (x * f[i]) / average);
  const total = next.reduce((s, x) => s + x, 0);
  return next.map((x) => x / total);
}

function snapshot(step: number, shares: number[], matrix: PayoffMatrix): PopulationSnapshot {
  const f = fitness(matrix, shares);
  return {
    kind: 'population',
    step,
    shares,
    average_payoff: shares.reduce((s, x, i) => s + x * f[i], 0),
  };
}

export function assertSimplex(shares: readonly number[], tolerance: number, step: number): void {
  const total = shares.reduce((s, x) => s + x, 0);
  if (shares.some((x) => !(x >= 0)) || Math.abs(total - 1) > tolerance) {
    throw new InternalInconsistencyError('Population left the simplex', { step, sum: total });
  }
}

/**
 * Replicator dynamics from `initial` for up to `steps` steps, stopping early
 * once the L1 change of a step falls below `dynamics.convergence_tolerance`.
 */
export function runReplicatorDynamics(input: ReplicatorInput, config: SolverConfig): ReplicatorRun {
  const k = validateSquareMatrix(input.matrix);
  validateMixedStrategy(input.initial, k, config.tolerance);
  if (input.steps > config.dynamics.max_steps) {
    throw new IntractableGameError('Requested steps exceed the dynamics ceiling', {
      steps: input.steps,
      max_steps: config.dynamics.max_steps,
    });
  }

  const loop = runBoundedLoop<PopulationSnapshot>({
    initial: snapshot(0, [...input.initial], input.matrix),
    step: (state, index) => {
      const shares = replicatorStep(state.shares, input.matrix);
      assertSimplex(shares, config.tolerance, index + 1);
      return snapshot(index + 1, shares, input.matrix);
    },
    max_steps: input.steps,
    converged: (history) => {
      const prev = history[history.length - 2];
      const last = history[history.length - 1];
      const change = last.shares.reduce((s, x, i) => s + Math.abs(x - prev.shares[i]), 0);
      return change < config.dynamics.convergence_tolerance;
    },
  });

  return { trajectory: loop.states, converged: loop.converged, steps: loop.steps };
}
