import { MixedProfile, StrategyProfile } from '../../models/types';
import { PayoffModel } from '../payoffModel';

/** Largest gain any single player can get by deviating from `mixed`. */
export function maxRegret(model: PayoffModel, mixed: MixedProfile): number {
  let worst = 0;
  for (let p = 0; p < model.num_players; p++) {
    const values = model.expectedPayoffsByStrategy(p, mixed);
    const current = values.reduce((sum, v, s) => sum + v * mixed[p][s], 0);
    worst = Math.max(worst, Math.max(...values) - current);
  }
  return worst;
}

/**
 * Regret at a pure profile, from single-strategy deviations only
 * (O(players · strategies) lookups).
 */
export function pureRegret(model: PayoffModel, profile: StrategyProfile): number {
  let worst = 0;
  const deviation = [...profile];
  for (let p = 0; p < model.num_players; p++) {
    const current = model.payoff(profile)[p];
    for (let s = 0; s < model.strategy_sets[p].length; s++) {
      deviation[p] = s;
      worst = Math.max(worst, model.payoff(deviation)[p] - current);
    }
    deviation[p] = profile[p];
  }
  return worst;
}
