import { createDefaultSolverConfig, createTestSolverConfig } from '../src/core/configs';
import {
  buildCoalitionGame,
  buildCoalitionGameFromTable,
  maskOf,
  membersOf,
} from '../src/core/cooperative/coalitionGame';
import { computeShapleyValue } from '../src/core/cooperative/shapley';
import { checkCore, isSuperadditive } from '../src/core/cooperative/core';
import { solveCooperativeGame } from '../src/core/cooperative/solve';
import { IntractableGameError, MalformedGameError } from '../src/models/errors';

const config = createTestSolverConfig();

/** One left glove (player 0), two right gloves; a pair is worth 1. */
function gloveGame() {
  return buildCoalitionGame(
    ['Left', 'Right 1', 'Right 2'],
    (members) => (members.includes(0) && members.length >= 2 ? 1 : 0),
    config,
  );
}

describe('coalition masks', () => {
  test('membersOf / maskOf', () => {
    expect(membersOf(5, 3)).toEqual([0, 2]);
    expect(membersOf(0, 3)).toEqual([]);
    expect(maskOf([0, 2])).toBe(5);
  });
});

describe('buildCoalitionGame', () => {
  test('tabulates every coalition', () => {
    const game = gloveGame();
    expect(game.grand_coalition).toBe(7);
    expect(game.valueOf([1, 2])).toBe(0);
    expect(game.valueOf([0, 2])).toBe(1);
    expect([...game.coalitions()]).toEqual([1, 2, 3, 4, 5, 6, 7]);
  });

  test('ceiling is checked before the value function runs', () => {
    const players = Array.from({ length: 13 }, (_, i) => `P${i}`);
    const value = jest.fn(() => 0);
    expect(() => buildCoalitionGame(players, value, createDefaultSolverConfig())).toThrow(IntractableGameError);
    expect(value).not.toHaveBeenCalled();
  });

  test('no players → MalformedGameError', () => {
    expect(() => buildCoalitionGame([], () => 0, config)).toThrow(MalformedGameError);
  });

  test('empty coalition must be worth 0', () => {
    expect(() => buildCoalitionGame(['A'], () => 1, config)).toThrow(MalformedGameError);
  });

  test('non-finite value → MalformedGameError', () => {
    expect(() => buildCoalitionGame(['A', 'B'], (m) => (m.length === 2 ? NaN : 0), config)).toThrow(
      MalformedGameError,
    );
  });

  test('table must cover every coalition', () => {
    expect(() => buildCoalitionGameFromTable(['A', 'B'], [0, 1, 1], config)).toThrow(MalformedGameError);
    const game = buildCoalitionGameFromTable(['A', 'B'], [0, 1, 2, 4], config);
    expect(game.valueOf([1])).toBe(2);
    expect(game.grandCoalitionValue()).toBe(4);
  });

  test('coalition outside the player set → MalformedGameError', () => {
    expect(() => gloveGame().value(8)).toThrow(MalformedGameError);
  });
});

describe('computeShapleyValue', () => {
  test('glove game → (2/3, 1/6, 1/6)', () => {
    const phi = computeShapleyValue(gloveGame(), config);
    expect(phi[0]).toBeCloseTo(2 / 3, 12);
    expect(phi[1]).toBeCloseTo(1 / 6, 12);
    expect(phi[2]).toBeCloseTo(1 / 6, 12);
  });

  test('additive game pays each player its own worth', () => {
    const worth = [1.5, 2.25, 4];
    const game = buildCoalitionGame(['A', 'B', 'C'], (m) => m.reduce((s, i) => s + worth[i], 0), config);
    expect(computeShapleyValue(game, config)).toEqual(worth);
  });

  test('symmetric game on ten players splits evenly', () => {
    const players = Array.from({ length: 10 }, (_, i) => `P${i}`);
    const game = buildCoalitionGame(players, (m) => m.length * m.length, config);
    const phi = computeShapleyValue(game, config);
    for (const x of phi) expect(x).toBeCloseTo(10, 9);
  });

  test('large coalition values stay efficient to the absolute tolerance', () => {
    const grand = 1e12 + 1;
    const game = buildCoalitionGame(['A', 'B', 'C'], (m) => (m.length === 3 ? grand : 0), config);
    const phi = computeShapleyValue(game, config);
    expect(config.efficiency_tolerance).toBe(1e-9);
    for (const x of phi) expect(x).toBeCloseTo(grand / 3, 3);
  });
});

describe('core and superadditivity', () => {
  test('glove game: Shapley value is blocked by each left-right pair', () => {
    const game = gloveGame();
    const check = checkCore(game, computeShapleyValue(game, config));

    expect(check.efficient).toBe(true);
    expect(check.in_core).toBe(false);
    expect(check.blocking_coalitions.map((b) => b.members)).toEqual([
      [0, 1],
      [0, 2],
    ]);
    expect(check.blocking_coalitions[0].surplus).toBeCloseTo(1 / 6, 12);
  });

  test('glove game: the left glove taking everything is in the core', () => {
    expect(checkCore(gloveGame(), [1, 0, 0])).toEqual({
      in_core: true,
      efficient: true,
      blocking_coalitions: [],
    });
  });

  test('inefficient allocation is not in the core', () => {
    const check = checkCore(gloveGame(), [2, 0, 0]);
    expect(check.efficient).toBe(false);
    expect(check.in_core).toBe(false);
  });

  test('allocation of the wrong length → MalformedGameError', () => {
    expect(() => checkCore(gloveGame(), [1, 0])).toThrow(MalformedGameError);
  });

  test('isSuperadditive', () => {
    expect(isSuperadditive(gloveGame())).toBe(true);
    const subadditive = buildCoalitionGameFromTable(['A', 'B'], [0, 2, 2, 3], config);
    expect(isSuperadditive(subadditive)).toBe(false);
  });

  test('solveCooperativeGame bundles the analysis', () => {
    const game = buildCoalitionGameFromTable(['A', 'B'], [0, 2, 2, 3], config);
    const solution = solveCooperativeGame(game, config);

    expect(solution.players).toEqual(['A', 'B']);
    expect(solution.shapley_value).toEqual([1.5, 1.5]);
    expect(solution.grand_coalition_value).toBe(3);
    expect(solution.superadditive).toBe(false);
    expect(solution.core.in_core).toBe(false);
    expect(solution.core.blocking_coalitions.map((b) => b.members)).toEqual([[0], [1]]);
  });
});
