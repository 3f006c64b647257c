import { SolverConfig } from '../../models/types';
import { MalformedGameError, IntractableGameError } from '../../models/errors';

/** Characteristic function over a member list (player indices, ascending). */
export type CoalitionValueFunction = (members: readonly number[]) => number;

export function membersOf(mask: number, n: number): number[] {
  const members: number[] = [];
  for (let i = 0; i < n; i++) {
    if (mask & (1 << i)) members.push(i);
  }
  return members;
}

export function maskOf(members: readonly number[]): number {
  return members.reduce((mask, i) => mask | (1 << i), 0);
}

/**
 * Transferable-utility game. Coalitions are bitmasks over player indices;
 * the value of every coalition is tabulated once at construction.
 */
export class CoalitionGame {
  readonly players: readonly string[];
  readonly num_players: number;
  private readonly values: readonly number[];

  constructor(players: readonly string[], values: readonly number[]) {
    this.players = Object.freeze([...players]);
    this.num_players = players.length;
    this.values = Object.freeze([...values]);
  }

  get grand_coalition(): number {
    return (1 << this.num_players) - 1;
  }

  value(mask: number): number {
    if (!Number.isInteger(mask) || mask < 0 || mask > this.grand_coalition) {
      throw new MalformedGameError('Coalition outside the player set', { mask });
    }
    return this.values[mask];
  }

  valueOf(members: readonly number[]): number {
    return this.value(maskOf(members));
  }

  grandCoalitionValue(): number {
    return this.values[this.grand_coalition];
  }

  *coalitions(): Generator<number> {
    for (let mask = 1; mask <= this.grand_coalition; mask++) yield mask;
  }
}

/**
 * Tabulate `value` over every coalition. v(∅) must be 0 and every value
 * finite; games above `max_coalition_players` are rejected before evaluation.
 */
export function buildCoalitionGame(
  players: readonly string[],
  value: CoalitionValueFunction,
  config: SolverConfig,
): CoalitionGame {
  const n = players.length;
  if (n === 0) {
    throw new MalformedGameError('A coalition game needs at least one player');
  }
  if (n > config.max_coalition_players) {
    throw new IntractableGameError('Player count exceeds the coalition ceiling', {
      players: n,
      max_coalition_players: config.max_coalition_players,
    });
  }

  const values: number[] = [];
  for (let mask = 0; mask < 1 << n; mask++) {
    const v = value(membersOf(mask, n));
    if (!Number.isFinite(v)) {
      throw new MalformedGameError('Coalition value is not finite', {
        members: membersOf(mask, n),
      });
    }
    values.push(v);
  }
  if (values[0] !== 0) {
    throw new MalformedGameError('The empty coalition must have value 0', { value: values[0] });
  }
  return new CoalitionGame(players, values);
}

/** Build from a table indexed by coalition bitmask. */
export function buildCoalitionGameFromTable(
  players: readonly string[],
  table: readonly number[],
  config: SolverConfig,
): CoalitionGame {
  if (table.length !== 1 << players.length) {
    throw new MalformedGameError('Value table must cover every coalition', {
      expected: 1 << players.length,
      received: table.length,
    });
  }
  return buildCoalitionGame(players, (members) => table[maskOf(members)], config);
}
