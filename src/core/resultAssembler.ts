import {
  BackwardInductionResult,
  ConvergenceDiagnostics,
  CooperativeSolution,
  Equilibrium,
  GameClass,
  GameFamily,
  SimulationResult,
  SolverConfig,
  Summary,
  TrajectorySnapshot,
} from '../models/types';
import { InternalInconsistencyError } from '../models/errors';
import { PayoffModel } from './payoffModel';
import { maxRegret, pureRegret } from './solvers/regret';
import { assertSimplex } from './dynamics/replicator';

export interface AssemblyInput {
  game_id: GameFamily;
  game_class: GameClass;
  equilibria: Equilibrium[];
  trajectory?: TrajectorySnapshot[];
  induction?: BackwardInductionResult;
  cooperative?: CooperativeSolution;
  convergence?: ConvergenceDiagnostics;
  summary: Summary;

  /** Date.now() when the request started. */
  started_at: number;
  player_labels?: string[];
  strategy_labels?: string[][];
}

function checkDistribution(vector: readonly number[], tolerance: number, where: string): void {
  const total = vector.reduce((s, x) => s + x, 0);
  if (vector.some((x) => !Number.isFinite(x) || x < -tolerance) || Math.abs(total - 1) > tolerance) {
    throw new InternalInconsistencyError('Reported strategy is not a probability vector', {
      where,
      sum: total,
    });
  }
}

/**
 * Exact equilibria must leave no player a profitable deviation. The allowed
 * regret scales with the magnitude of the payoffs.
 */
function checkEquilibrium(
  eq: Equilibrium,
  index: number,
  model: PayoffModel,
  config: SolverConfig,
): void {
  const scale = Math.max(1, ...eq.payoffs.map((v) => Math.abs(v)));
  const regret = eq.profile ? pureRegret(model, eq.profile) : maxRegret(model, eq.strategies);
  if (regret > config.tolerance * scale) {
    throw new InternalInconsistencyError('Reported equilibrium admits a profitable deviation', {
      equilibrium: index,
      type: eq.type,
      regret,
    });
  }
}

/**
 * Verify the invariants of a solved request and wrap it in the result
 * envelope. Any violation is a solver bug and raises
 * InternalInconsistencyError.
 */
export function assembleResult(
  input: AssemblyInput,
  config: SolverConfig,
  model?: PayoffModel,
): SimulationResult {
  input.equilibria.forEach((eq, i) => {
    eq.strategies.forEach((mix, p) => checkDistribution(mix, config.tolerance, `equilibrium ${i}, player ${p}`));
    if (!eq.payoffs.every((v) => Number.isFinite(v))) {
      throw new InternalInconsistencyError('Equilibrium payoff is not finite', { equilibrium: i });
    }
    if (model && eq.type !== 'approximate') checkEquilibrium(eq, i, model, config);
  });

  for (const snapshot of input.trajectory ?? []) {
    if (snapshot.kind === 'population') {
      assertSimplex(snapshot.shares, config.tolerance, snapshot.step);
    }
  }

  const result: SimulationResult = {
    game_id: input.game_id,
    game_class: input.game_class,
    equilibria: input.equilibria,
    summary: input.summary,
    metadata: {
      compute_time_ms: Date.now() - input.started_at,
    },
  };
  if (input.trajectory) result.trajectory = input.trajectory;
  if (input.induction) result.induction = input.induction;
  if (input.cooperative) result.cooperative = input.cooperative;
  if (input.convergence) result.convergence = input.convergence;
  if (input.player_labels) result.metadata.player_labels = input.player_labels;
  if (input.strategy_labels) result.metadata.strategy_labels = input.strategy_labels;
  return result;
}
