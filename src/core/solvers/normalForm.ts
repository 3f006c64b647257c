import { ConvergenceDiagnostics, Equilibrium, SolverConfig } from '../../models/types';
import { PayoffModel } from '../payoffModel';
import { findPureEquilibria } from './pureEquilibria';
import { solveZeroSum } from './zeroSum';
import { findMixedEquilibria } from './supportEnumeration';
import { runFictitiousPlay } from './fictitiousPlay';

export type NormalFormMethod =
  | 'pure_enumeration'
  | 'linear_program'
  | 'support_enumeration'
  | 'fictitious_play';

export interface NormalFormSolution {
  equilibria: Equilibrium[];
  methods: NormalFormMethod[];
  convergence?: ConvergenceDiagnostics;
}

function isDuplicate(candidate: Equilibrium, existing: Equilibrium[], tolerance: number): boolean {
  return existing.some((e) =>
    e.strategies.every((mix, p) =>
      mix.every((x, s) => Math.abs(x - candidate.strategies[p][s]) <= tolerance),
    ),
  );
}

/**
 * Pick the algorithm family for a strategic-form game:
 *
 * - every game: exhaustive pure search
 * - two players, constant-sum: minimax linear program
 * - two players, general-sum: support enumeration over supports of size ≥ 2
 *   (size 1 is the pure search)
 * - more players: fictitious play, reported as approximate
 */
export function solveNormalForm(model: PayoffModel, config: SolverConfig): NormalFormSolution {
  const equilibria = findPureEquilibria(model, config);
  const methods: NormalFormMethod[] = ['pure_enumeration'];

  if (model.num_players === 2) {
    if (model.constantSum(config.tolerance) !== null) {
      const minimax = solveZeroSum(model, config);
      methods.push('linear_program');
      if (!isDuplicate(minimax, equilibria, config.tolerance * 10)) {
        equilibria.push(minimax);
      }
      return { equilibria, methods };
    }

    const counts = model.strategyCounts();
    if (Math.min(...counts) >= 2) {
      methods.push('support_enumeration');
      for (const eq of findMixedEquilibria(model, config, { min_support: 2 })) {
        if (!isDuplicate(eq, equilibria, config.tolerance * 10)) equilibria.push(eq);
      }
    }
    return { equilibria, methods };
  }

  if (model.num_players > 2) {
    const fp = runFictitiousPlay(model, config);
    methods.push('fictitious_play');
    if (!isDuplicate(fp.equilibrium, equilibria, config.fictitious_play.tolerance)) {
      equilibria.push(fp.equilibrium);
    }
    return { equilibria, methods, convergence: fp.convergence };
  }

  return { equilibria, methods };
}
