import { BlockingCoalition, CoreCheck } from '../../models/types';
import { MalformedGameError } from '../../models/errors';
import { CoalitionGame, membersOf } from './coalitionGame';

/**
 * Core membership of an allocation: it must be efficient and no coalition may
 * be worth more than what its members receive. Every blocking coalition is
 * reported with its surplus, largest first.
 */
export function checkCore(
  game: CoalitionGame,
  allocation: readonly number[],
  tolerance = 1e-9,
): CoreCheck {
  const n = game.num_players;
  if (allocation.length !== n) {
    throw new MalformedGameError('Allocation length does not match player count', {
      expected: n,
      received: allocation.length,
    });
  }

  const total = allocation.reduce((s, x) => s + x, 0);
  const efficient = Math.abs(total - game.grandCoalitionValue()) <= tolerance;

  const blocking: BlockingCoalition[] = [];
  for (const mask of game.coalitions()) {
    if (mask === game.grand_coalition) continue;
    const members = membersOf(mask, n);
    const allocated = members.reduce((s, i) => s + allocation[i], 0);
    const coalitionValue = game.value(mask);
    if (coalitionValue > allocated + tolerance) {
      blocking.push({
        members,
        coalition_value: coalitionValue,
        allocated,
        surplus: coalitionValue - allocated,
      });
    }
  }
  blocking.sort((a, b) => b.surplus - a.surplus);

  return {
    in_core: efficient && blocking.length === 0,
    efficient,
    blocking_coalitions: blocking,
  };
}

/** v(S ∪ T) ≥ v(S) + v(T) for every pair of disjoint coalitions. */
export function isSuperadditive(game: CoalitionGame, tolerance = 1e-9): boolean {
  const full = game.grand_coalition;
  for (let s = 1; s <= full; s++) {
    const rest = full & ~s;
    // Submasks t of the complement with t > s, so each pair is checked once.
    for (let t = rest; t > 0; t = (t - 1) & rest) {
      if (t < s) continue;
      if (game.value(s | t) < game.value(s) + game.value(t) - tolerance) return false;
    }
  }
  return true;
}
