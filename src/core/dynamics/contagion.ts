import { NetworkSnapshot, PayoffMatrix, SolverConfig } from '../../models/types';
import { MalformedGameError, IntractableGameError } from '../../models/errors';
import { Graph } from './graphs';
import { validateSquareMatrix } from './replicator';
import { runBoundedLoop } from './loop';

export interface ContagionInput {
  graph: Graph;

  /** Symmetric coordination game: payoff of strategy i against strategy j. */
  matrix: PayoffMatrix;
  initial_strategies: readonly number[];
  steps: number;
}

export interface ContagionRun {
  trajectory: NetworkSnapshot[];
  converged: boolean;
  steps: number;
}

function adoptionShares(strategies: readonly number[], k: number): number[] {
  const counts = new Array<number>(k).fill(0);
  for (const s of strategies) counts[s]++;
  return counts.map((c) => c / strategies.length);
}

/**
 * Best response of a node to the strategies its neighbours played last step.
 * An isolated node keeps its strategy. On ties the current strategy is kept
 * when it is among the maximizers, else the lowest index wins.
 */
export function nodeBestResponse(
  current: number,
  neighbourStrategies: readonly number[],
  matrix: PayoffMatrix,
  tolerance = 1e-9,
): number {
  if (neighbourStrategies.length === 0) return current;

  const values = matrix.map((row) => neighbourStrategies.reduce((s, j) => s + row[j], 0));
  const best = Math.max(...values);
  if (values[current] >= best - tolerance) return current;
  return values.findIndex((v) => v >= best - tolerance);
}

/**
 * Synchronous best-response dynamics on a graph. Every node updates against
 * the previous step's strategies; the run stops at a fixed point (a step with
 * no switches) or after `steps` steps.
 */
export function runNetworkContagion(input: ContagionInput, config: SolverConfig): ContagionRun {
  const k = validateSquareMatrix(input.matrix);
  const n = input.graph.node_count;
  if (input.initial_strategies.length !== n) {
    throw new MalformedGameError('One initial strategy is required per node', {
      nodes: n,
      received: input.initial_strategies.length,
    });
  }
  input.initial_strategies.forEach((s, node) => {
    if (!Number.isInteger(s) || s < 0 || s >= k) {
      throw new MalformedGameError('Initial strategy out of range', { node, strategy: s });
    }
  });
  if (input.steps > config.dynamics.max_steps) {
    throw new IntractableGameError('Requested steps exceed the dynamics ceiling', {
      steps: input.steps,
      max_steps: config.dynamics.max_steps,
    });
  }

  const initial: NetworkSnapshot = {
    kind: 'network',
    step: 0,
    strategies: [...input.initial_strategies],
    adoption: adoptionShares(input.initial_strategies, k),
    switches: 0,
  };

  const loop = runBoundedLoop<NetworkSnapshot>({
    initial,
    step: (state, index) => {
      let switches = 0;
      const strategies = state.strategies.map((current, node) => {
        const seen = input.graph.adjacency[node].map((nb) => state.strategies[nb]);
        const next = nodeBestResponse(current, seen, input.matrix, config.tolerance);
        if (next !== current) switches++;
        return next;
      });
      return {
        kind: 'network',
        step: index + 1,
        strategies,
        adoption: adoptionShares(strategies, k),
        switches,
      };
    },
    max_steps: input.steps,
    converged: (history) => history[history.length - 1].switches === 0,
  });

  return { trajectory: loop.states, converged: loop.converged, steps: loop.steps };
}

/**
 * Morris contagion threshold for a 2×2 coordination game with incumbent A
 * (index 0) and innovation B (index 1): B spreads through a node once more
 * than q of its neighbours play B. Null when the game has no threshold.
 */
export function contagionThreshold(matrix: PayoffMatrix): number | null {
  if (matrix.length !== 2) return null;
  const [[aa, ab], [ba, bb]] = matrix;
  const denominator = aa - ba + (bb - ab);
  if (denominator === 0) return null;
  return (aa - ba) / denominator;
}
