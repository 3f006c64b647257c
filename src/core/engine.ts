import {
  GameClass,
  GameFamily,
  GameInfo,
  GameSpec,
  SimulationRequest,
  SimulationResult,
  SolverConfig,
  Summary,
} from '../models/types';
import { NoConvergenceError } from '../models/errors';
import { createDefaultSolverConfig } from './configs';
import { getGenerator, getGameInfo, listGames } from './generatorFactory';
import { assembleResult } from './resultAssembler';
import { solveNormalForm } from './solvers/normalForm';
import { solveBackwardInduction } from './solvers/backwardInduction';
import { runReplicatorDynamics } from './dynamics/replicator';
import { runNetworkContagion } from './dynamics/contagion';
import { runReputationDynamics } from './dynamics/reputation';
import { solveCooperativeGame } from './cooperative/solve';
import { exactSum } from './numeric/exact';

const GAME_CLASS: Record<GameSpec['kind'], GameClass> = {
  normal_form: 'normal_form',
  extensive_form: 'extensive_form',
  replicator: 'evolutionary',
  network: 'network',
  reputation: 'repeated',
  cooperative: 'cooperative',
};

function mean(values: readonly number[]): number {
  return values.length === 0 ? 0 : exactSum(values) / values.length;
}

/**
 * Solve one request end to end:
 *
 *   1. Look up the generator for `game_id`
 *   2. Validate parameters and build the game
 *   3. Run the solver matching the game's kind
 *   4. Verify invariants and wrap the result
 *
 * Pure apart from the elapsed-time measurement; the config is never mutated.
 */
export function simulate(
  request: SimulationRequest,
  config: SolverConfig = createDefaultSolverConfig(),
): SimulationResult {
  const startedAt = Date.now();
  const generator = getGenerator(request.game_id);
  const spec = generator.build(request.params, config);
  const gameId: GameFamily = generator.id;
  const base = {
    game_id: gameId,
    game_class: GAME_CLASS[spec.kind],
    started_at: startedAt,
  };
  const analytics: Summary = spec.analytics ?? {};

  switch (spec.kind) {
    case 'normal_form': {
      const { model } = spec;
      const solution = solveNormalForm(model, config);
      if (config.strict_convergence && solution.convergence?.status === 'no_convergence') {
        throw new NoConvergenceError('Fictitious play did not converge', {
          game_id: gameId,
          iterations: solution.convergence.iterations,
          residual: solution.convergence.residual,
        });
      }
      return assembleResult(
        {
          ...base,
          equilibria: solution.equilibria,
          convergence: solution.convergence,
          summary: {
            ...analytics,
            equilibria_found: solution.equilibria.length,
            pure_equilibria: solution.equilibria.filter((e) => e.type === 'pure').length,
            methods: solution.methods.join(','),
          },
          player_labels: model.players.map((p) => p.label),
          strategy_labels: model.strategy_sets.map((s) => [...s]),
        },
        config,
        model,
      );
    }

    case 'extensive_form': {
      const induction = solveBackwardInduction(spec.tree, config.tolerance);
      return assembleResult(
        {
          ...base,
          equilibria: [{ type: 'pure', profile: null, strategies: [], payoffs: [...induction.payoffs] }],
          induction,
          summary: {
            ...analytics,
            subgame_perfect_payoffs: induction.payoffs,
            path_length: induction.path.length,
            tree_nodes: spec.tree.node_count,
          },
          player_labels: [...spec.tree.player_labels],
        },
        config,
      );
    }

    case 'replicator': {
      const run = runReplicatorDynamics(spec, config);
      const trajectory = run.trajectory;
      const last = trajectory[trajectory.length - 1];
      const prev = trajectory[Math.max(0, trajectory.length - 2)];
      return assembleResult(
        {
          ...base,
          equilibria: [],
          trajectory,
          convergence: {
            status: run.converged ? 'converged' : 'no_convergence',
            iterations: run.steps,
            residual: last.shares.reduce((s, x, i) => s + Math.abs(x - prev.shares[i]), 0),
          },
          summary: {
            ...analytics,
            final_shares: last.shares,
            final_average_payoff: last.average_payoff,
            steps: run.steps,
            converged: run.converged,
          },
          strategy_labels: [spec.labels],
        },
        config,
      );
    }

    case 'network': {
      const run = runNetworkContagion(spec, config);
      const last = run.trajectory[run.trajectory.length - 1];
      const switches = run.trajectory.reduce((s, snap) => s + snap.switches, 0);
      return assembleResult(
        {
          ...base,
          equilibria: [],
          trajectory: run.trajectory,
          summary: {
            ...analytics,
            final_adoption: last.adoption,
            fixed_point: run.converged,
            steps: run.steps,
            total_switches: switches,
            ...(last.adoption.length === 2 ? { cascade_occurred: last.adoption[1] > 0.5 } : {}),
          },
          strategy_labels: [spec.labels],
        },
        config,
      );
    }

    case 'reputation': {
      const trajectory = runReputationDynamics(spec, config);
      const last = trajectory[trajectory.length - 1];
      return assembleResult(
        {
          ...base,
          equilibria: [],
          trajectory,
          summary: {
            ...analytics,
            final_reputations: last.reputations,
            final_cooperation_rate: last.cooperation_rate,
            average_cooperation_rate: mean(trajectory.slice(1).map((s) => s.cooperation_rate)),
            cumulative_payoffs: last.cumulative_payoffs,
          },
          player_labels: spec.behaviours.map((b, i) => `Agent ${i + 1} (${b})`),
        },
        config,
      );
    }

    case 'cooperative': {
      const cooperative = solveCooperativeGame(spec.game, config);
      return assembleResult(
        {
          ...base,
          equilibria: [],
          cooperative,
          summary: {
            ...analytics,
            shapley_value: cooperative.shapley_value,
            grand_coalition_value: cooperative.grand_coalition_value,
            in_core: cooperative.core.in_core,
            superadditive: cooperative.superadditive,
          },
          player_labels: cooperative.players,
        },
        config,
      );
    }
  }
}

/**
 * Holds one read-only SolverConfig for repeated requests.
 */
export class SimulationEngine {
  readonly config: SolverConfig;

  constructor(config: SolverConfig = createDefaultSolverConfig()) {
    this.config = config;
  }

  simulate(request: SimulationRequest): SimulationResult {
    return simulate(request, this.config);
  }

  listGames(): GameInfo[] {
    return listGames();
  }

  getGameInfo(id: string): GameInfo {
    return getGameInfo(id);
  }
}
