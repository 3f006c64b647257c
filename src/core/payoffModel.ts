import {
  Player,
  StrategyProfile,
  PayoffVector,
  MixedStrategy,
  MixedProfile,
  SolverConfig,
} from '../models/types';
import { MalformedGameError, IntractableGameError } from '../models/errors';

export interface PayoffModelInput {
  /** Player labels, in index order. */
  players: readonly string[];

  /** Ordered strategy labels per player. */
  strategy_sets: readonly (readonly string[])[];

  /** Payoff vector for a profile; called once per profile. */
  payoff_fn: (profile: StrategyProfile) => PayoffVector;
}

export function isPureProfile(profile: StrategyProfile | MixedProfile): profile is StrategyProfile {
  for (const entry of profile) {
    if (typeof entry !== 'number') return false;
  }
  return true;
}

/**
 * Immutable strategic-form game: players, strategy sets and a payoff entry for
 * every profile of the Cartesian product.
 *
 * Profiles are stored row-major with the last player varying fastest, so
 * index 0 is (0, 0, ..., 0) and the last index is every player's last strategy.
 */
export class PayoffModel {
  readonly players: readonly Player[];
  readonly strategy_sets: readonly (readonly string[])[];
  readonly num_players: number;

  private readonly table: readonly PayoffVector[];
  private readonly strides: readonly number[];

  /** Use `buildPayoffModel` — the constructor trusts its input. */
  constructor(
    players: readonly Player[],
    strategySets: readonly (readonly string[])[],
    table: readonly PayoffVector[],
  ) {
    this.players = Object.freeze(players.map((p) => Object.freeze({ ...p })));
    this.strategy_sets = Object.freeze(strategySets.map((s) => Object.freeze([...s])));
    this.num_players = players.length;
    this.table = Object.freeze(table.map((v) => Object.freeze([...v])));
    this.strides = computeStrides(this.strategyCounts());
  }

  strategyCounts(): number[] {
    return this.strategy_sets.map((s) => s.length);
  }

  profileCount(): number {
    return this.table.length;
  }

  /** Flat table index of a profile. Throws on out-of-range entries. */
  indexOf(profile: StrategyProfile): number {
    if (profile.length !== this.num_players) {
      throw new MalformedGameError('Profile length does not match player count', {
        expected: this.num_players,
        received: profile.length,
      });
    }
    let index = 0;
    for (let p = 0; p < this.num_players; p++) {
      const s = profile[p];
      if (!Number.isInteger(s) || s < 0 || s >= this.strategy_sets[p].length) {
        throw new MalformedGameError('Strategy index out of range', { player: p, strategy: s });
      }
      index += s * this.strides[p];
    }
    return index;
  }

  profileAt(index: number): number[] {
    const profile = new Array<number>(this.num_players);
    let rem = index;
    for (let p = 0; p < this.num_players; p++) {
      profile[p] = Math.floor(rem / this.strides[p]);
      rem -= profile[p] * this.strides[p];
    }
    return profile;
  }

  payoff(profile: StrategyProfile): PayoffVector {
    return this.table[this.indexOf(profile)];
  }

  *profiles(): Generator<number[]> {
    for (let i = 0; i < this.table.length; i++) {
      yield this.profileAt(i);
    }
  }

  /**
   * Expected payoff of each of `player`'s pure strategies when everyone else
   * plays according to `mixed` (the player's own entry is ignored).
   */
  expectedPayoffsByStrategy(player: number, mixed: MixedProfile): number[] {
    this.checkMixedProfile(mixed);
    const result = new Array<number>(this.strategy_sets[player].length).fill(0);
    this.forEachWeighted(mixed, player, (index, strategy, weight) => {
      result[strategy] += weight * this.table[index][player];
    });
    return result;
  }

  expectedPayoffForStrategy(player: number, strategy: number, mixed: MixedProfile): number {
    return this.expectedPayoffsByStrategy(player, mixed)[strategy];
  }

  /** Expected payoff vector when every player mixes independently. */
  expectedPayoffs(mixed: MixedProfile): number[] {
    this.checkMixedProfile(mixed);
    const result = new Array<number>(this.num_players).fill(0);
    this.forEachWeighted(mixed, -1, (index, _strategy, weight) => {
      const payoffs = this.table[index];
      for (let p = 0; p < this.num_players; p++) result[p] += weight * payoffs[p];
    });
    return result;
  }

  /**
   * Every strategy of `player` attaining the maximum payoff against
   * `opponents` (a full pure or mixed profile; the player's own entry is
   * ignored). Ascending order; all maximizers within `tolerance` are kept.
   */
  bestResponses(
    player: number,
    opponents: StrategyProfile | MixedProfile,
    tolerance = 1e-9,
  ): number[] {
    if (!Number.isInteger(player) || player < 0 || player >= this.num_players) {
      throw new MalformedGameError('Player index out of range', { player });
    }

    let values: number[];
    if (isPureProfile(opponents)) {
      const profile = [...opponents];
      values = this.strategy_sets[player].map((_, s) => {
        profile[player] = s;
        return this.payoff(profile)[player];
      });
    } else {
      values = this.expectedPayoffsByStrategy(player, opponents);
    }

    const best = Math.max(...values);
    const maximizers: number[] = [];
    values.forEach((v, s) => {
      if (v >= best - tolerance) maximizers.push(s);
    });
    return maximizers;
  }

  /**
   * For two-player games whose payoffs always add up to the same total,
   * returns that total; null otherwise.
   */
  constantSum(tolerance = 1e-9): number | null {
    if (this.num_players !== 2) return null;
    const total = this.table[0][0] + this.table[0][1];
    for (const v of this.table) {
      if (Math.abs(v[0] + v[1] - total) > tolerance) return null;
    }
    return total;
  }

  isZeroSum(tolerance = 1e-9): boolean {
    const total = this.constantSum(tolerance);
    return total !== null && Math.abs(total) <= tolerance;
  }

  /** Payoff matrices [A, B] of a two-player game, indexed [row][column]. */
  bimatrix(): [number[][], number[][]] {
    if (this.num_players !== 2) {
      throw new MalformedGameError('bimatrix() requires a two-player game', {
        players: this.num_players,
      });
    }
    const [m, n] = this.strategyCounts();
    const a: number[][] = [];
    const b: number[][] = [];
    for (let i = 0; i < m; i++) {
      a.push([]);
      b.push([]);
      for (let j = 0; j < n; j++) {
        const v = this.table[i * n + j];
        a[i].push(v[0]);
        b[i].push(v[1]);
      }
    }
    return [a, b];
  }

  /**
   * Visit, in table order, every profile with non-zero probability under
   * `mixed`. The `free` player (or none, with -1) contributes every strategy
   * at weight 1; `strategy` is its entry in the visited profile.
   */
  private forEachWeighted(
    mixed: MixedProfile,
    free: number,
    visit: (index: number, strategy: number, weight: number) => void,
  ): void {
    const n = this.num_players;
    const supports: number[][] = [];
    for (let q = 0; q < n; q++) {
      const support: number[] = [];
      this.strategy_sets[q].forEach((_, s) => {
        if (q === free || mixed[q][s] !== 0) support.push(s);
      });
      if (support.length === 0) return;
      supports.push(support);
    }

    // Odometer over the supports, last player fastest.
    const digits = new Array<number>(n).fill(0);
    for (;;) {
      let index = 0;
      let weight = 1;
      for (let q = 0; q < n; q++) {
        const s = supports[q][digits[q]];
        index += s * this.strides[q];
        if (q !== free) weight *= mixed[q][s];
      }
      visit(index, free >= 0 ? supports[free][digits[free]] : -1, weight);

      let q = n - 1;
      while (q >= 0 && ++digits[q] === supports[q].length) {
        digits[q] = 0;
        q--;
      }
      if (q < 0) return;
    }
  }

  private checkMixedProfile(mixed: MixedProfile): void {
    if (mixed.length !== this.num_players) {
      throw new MalformedGameError('Mixed profile length does not match player count', {
        expected: this.num_players,
        received: mixed.length,
      });
    }
    mixed.forEach((m, p) => {
      if (m.length !== this.strategy_sets[p].length) {
        throw new MalformedGameError('Mixed strategy length does not match strategy set', {
          player: p,
          expected: this.strategy_sets[p].length,
          received: m.length,
        });
      }
    });
  }
}

function computeStrides(counts: readonly number[]): number[] {
  const strides = new Array<number>(counts.length).fill(1);
  for (let p = counts.length - 2; p >= 0; p--) {
    strides[p] = strides[p + 1] * counts[p + 1];
  }
  return strides;
}

function validateShape(
  players: readonly string[],
  strategySets: readonly (readonly string[])[],
  config?: SolverConfig,
): number {
  if (players.length === 0) {
    throw new MalformedGameError('A game needs at least one player');
  }
  if (strategySets.length !== players.length) {
    throw new MalformedGameError('One strategy set is required per player', {
      players: players.length,
      strategy_sets: strategySets.length,
    });
  }
  strategySets.forEach((set, p) => {
    if (set.length === 0) {
      throw new MalformedGameError('Player has no strategies', { player: p, label: players[p] });
    }
  });

  const count = strategySets.reduce((product, set) => product * set.length, 1);
  if (config && count > config.max_profiles) {
    throw new IntractableGameError('Profile count exceeds enumeration ceiling', {
      profiles: count,
      max_profiles: config.max_profiles,
    });
  }
  return count;
}

function validatePayoffVector(vector: PayoffVector, numPlayers: number, index: number): void {
  if (vector.length !== numPlayers) {
    throw new MalformedGameError('Payoff vector length does not match player count', {
      profile_index: index,
      expected: numPlayers,
      received: vector.length,
    });
  }
  if (!vector.every((v) => Number.isFinite(v))) {
    throw new MalformedGameError('Payoff vector contains a non-finite value', {
      profile_index: index,
      payoffs: vector.map(String),
    });
  }
}

function toPlayers(labels: readonly string[]): Player[] {
  return labels.map((label, index) => ({ index, label }));
}

/**
 * Build a model by evaluating `payoff_fn` on every profile.
 * With a config, games above `max_profiles` are rejected before evaluation.
 */
export function buildPayoffModel(input: PayoffModelInput, config?: SolverConfig): PayoffModel {
  const count = validateShape(input.players, input.strategy_sets, config);
  const strides = computeStrides(input.strategy_sets.map((s) => s.length));

  const table: PayoffVector[] = [];
  const profile = new Array<number>(input.players.length);
  for (let i = 0; i < count; i++) {
    let rem = i;
    for (let p = 0; p < profile.length; p++) {
      profile[p] = Math.floor(rem / strides[p]);
      rem -= profile[p] * strides[p];
    }
    const vector = input.payoff_fn([...profile]);
    validatePayoffVector(vector, input.players.length, i);
    table.push(vector);
  }

  return new PayoffModel(toPlayers(input.players), input.strategy_sets, table);
}

/** Build a model from payoff vectors listed in row-major profile order. */
export function buildPayoffModelFromTable(
  players: readonly string[],
  strategySets: readonly (readonly string[])[],
  payoffs: readonly PayoffVector[],
  config?: SolverConfig,
): PayoffModel {
  const count = validateShape(players, strategySets, config);
  if (payoffs.length !== count) {
    throw new MalformedGameError('Payoff table does not cover every profile', {
      expected: count,
      received: payoffs.length,
    });
  }
  payoffs.forEach((v, i) => validatePayoffVector(v, players.length, i));
  return new PayoffModel(toPlayers(players), strategySets, payoffs);
}

/** Two-player model from row and column payoff matrices. */
export function buildBimatrixModel(
  players: readonly [string, string],
  rowStrategies: readonly string[],
  columnStrategies: readonly string[],
  rowPayoffs: readonly (readonly number[])[],
  columnPayoffs: readonly (readonly number[])[],
): PayoffModel {
  const checkMatrix = (matrix: readonly (readonly number[])[], name: string): void => {
    if (
      matrix.length !== rowStrategies.length ||
      matrix.some((row) => row.length !== columnStrategies.length)
    ) {
      throw new MalformedGameError(`${name} payoff matrix has the wrong shape`, {
        rows: rowStrategies.length,
        columns: columnStrategies.length,
      });
    }
  };
  checkMatrix(rowPayoffs, 'Row');
  checkMatrix(columnPayoffs, 'Column');

  return buildPayoffModel({
    players,
    strategy_sets: [rowStrategies, columnStrategies],
    payoff_fn: ([i, j]) => [rowPayoffs[i][j], columnPayoffs[i][j]],
  });
}

/** Non-negative and summing to 1 within `tolerance`. */
export function validateMixedStrategy(
  vector: MixedStrategy,
  size: number,
  tolerance: number,
): void {
  if (vector.length !== size) {
    throw new MalformedGameError('Mixed strategy has the wrong length', {
      expected: size,
      received: vector.length,
    });
  }
  if (vector.some((x) => !Number.isFinite(x) || x < 0)) {
    throw new MalformedGameError('Mixed strategy contains a negative or non-finite probability', {
      vector: [...vector],
    });
  }
  const total = vector.reduce((s, x) => s + x, 0);
  if (Math.abs(total - 1) > tolerance) {
    throw new MalformedGameError('Mixed strategy does not sum to 1', { sum: total });
  }
}

/** Degenerate distribution on `strategy`. */
export function pureToMixed(strategy: number, size: number): number[] {
  const v = new Array<number>(size).fill(0);
  v[strategy] = 1;
  return v;
}
