import { ConvergenceDiagnostics, Equilibrium, SolverConfig } from '../../models/types';
import { PayoffModel } from '../payoffModel';
import { runBoundedLoop } from '../dynamics/loop';
import { assertTractable } from './pureEquilibria';
import { maxRegret } from './regret';

interface PlayState {
  /** Times each player has played each strategy. */
  counts: number[][];
  rounds: number;
  /** Empirical mix after `rounds` rounds (uniform prior before any play). */
  empirical: number[][];
}

export interface FictitiousPlayResult {
  equilibrium: Equilibrium;
  convergence: ConvergenceDiagnostics;
}

function empiricalMix(counts: number[][], rounds: number): number[][] {
  if (rounds === 0) {
    return counts.map((row) => row.map(() => 1 / row.length));
  }
  return counts.map((row) => row.map((c) => c / rounds));
}

function maxMovement(a: number[][], b: number[][]): number {
  let worst = 0;
  a.forEach((row, p) => row.forEach((x, s) => (worst = Math.max(worst, Math.abs(x - b[p][s])))));
  return worst;
}

/**
 * One round: every player simultaneously plays its lowest-index best
 * response to the opponents' empirical mix.
 */
export function fictitiousPlayStep(model: PayoffModel, state: PlayState, tolerance: number): PlayState {
  const counts = state.counts.map((row) => [...row]);
  for (let p = 0; p < model.num_players; p++) {
    const [choice] = model.bestResponses(p, state.empirical, tolerance);
    counts[p][choice]++;
  }
  const rounds = state.rounds + 1;
  return { counts, rounds, empirical: empiricalMix(counts, rounds) };
}

/**
 * Fictitious play for games outside the exact two-player algorithms.
 *
 * Converged when the empirical distribution moved less than
 * `fictitious_play.tolerance` over the trailing `window` rounds. Otherwise
 * the last empirical mix is returned with status `no_convergence`. Either
 * way the equilibrium is tagged `approximate`.
 */
export function runFictitiousPlay(model: PayoffModel, config: SolverConfig): FictitiousPlayResult {
  assertTractable(model, config);
  const { max_rounds, window, tolerance } = config.fictitious_play;

  const counts = model.strategyCounts().map((size) => new Array<number>(size).fill(0));
  const initial: PlayState = { counts, rounds: 0, empirical: empiricalMix(counts, 0) };

  let residual = Infinity;
  const loop = runBoundedLoop<PlayState>({
    initial,
    step: (state) => fictitiousPlayStep(model, state, config.tolerance),
    max_steps: max_rounds,
    history_limit: window + 1,
    converged: (history) => {
      const latest = history[history.length - 1];
      if (history.length < window + 1 || latest.rounds <= window) return false;
      residual = maxMovement(history[0].empirical, latest.empirical);
      return residual <= tolerance;
    },
  });

  const mix = loop.final.empirical;
  const regret = maxRegret(model, mix);

  return {
    equilibrium: {
      type: 'approximate',
      profile: null,
      strategies: mix,
      payoffs: model.expectedPayoffs(mix),
    },
    convergence: {
      status: loop.converged ? 'converged' : 'no_convergence',
      iterations: loop.steps,
      residual: Number.isFinite(residual) ? residual : 1,
      max_regret: regret,
    },
  };
}
