import { CooperativeSolution, SolverConfig } from '../../models/types';
import { CoalitionGame } from './coalitionGame';
import { computeShapleyValue } from './shapley';
import { checkCore, isSuperadditive } from './core';

export function solveCooperativeGame(game: CoalitionGame, config: SolverConfig): CooperativeSolution {
  const shapley = computeShapleyValue(game, config);
  return {
    players: [...game.players],
    shapley_value: shapley,
    grand_coalition_value: game.grandCoalitionValue(),
    superadditive: isSuperadditive(game, config.tolerance),
    core: checkCore(game, shapley, config.tolerance),
  };
}
