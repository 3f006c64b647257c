import { Equilibrium, SolverConfig, StrategyProfile } from '../../models/types';
import { IntractableGameError } from '../../models/errors';
import { PayoffModel, pureToMixed } from '../payoffModel';

/**
 * Reject games whose strategy space exceeds the configured ceilings.
 * Shared by the pure and the mixed searches.
 */
export function assertTractable(model: PayoffModel, config: SolverConfig): void {
  const counts = model.strategyCounts();
  const widest = Math.max(...counts);
  if (widest > config.max_strategies_per_player) {
    throw new IntractableGameError('Strategy count exceeds the per-player ceiling', {
      strategies: counts,
      max_strategies_per_player: config.max_strategies_per_player,
    });
  }
  if (model.profileCount() > config.max_profiles) {
    throw new IntractableGameError('Profile count exceeds enumeration ceiling', {
      profiles: model.profileCount(),
      max_profiles: config.max_profiles,
    });
  }
}

export function isPureNashEquilibrium(
  model: PayoffModel,
  profile: StrategyProfile,
  tolerance: number,
): boolean {
  for (let p = 0; p < model.num_players; p++) {
    if (!model.bestResponses(p, profile, tolerance).includes(profile[p])) {
      return false;
    }
  }
  return true;
}

export function pureEquilibrium(model: PayoffModel, profile: StrategyProfile): Equilibrium {
  const counts = model.strategyCounts();
  return {
    type: 'pure',
    profile: [...profile],
    strategies: profile.map((s, p) => pureToMixed(s, counts[p])),
    payoffs: [...model.payoff(profile)],
  };
}

/**
 * Exhaustive search: every profile in which each player's strategy is a best
 * response to the others. May return zero, one or many equilibria, in
 * profile order.
 */
export function findPureEquilibria(model: PayoffModel, config: SolverConfig): Equilibrium[] {
  assertTractable(model, config);

  const equilibria: Equilibrium[] = [];
  for (const profile of model.profiles()) {
    if (isPureNashEquilibrium(model, profile, config.tolerance)) {
      equilibria.push(pureEquilibrium(model, profile));
    }
  }
  return equilibria;
}
