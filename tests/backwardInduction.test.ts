import { buildGameTree, chance, decision, terminal } from '../src/core/gameTree';
import { createTestSolverConfig } from '../src/core/configs';
import { solveBackwardInduction } from '../src/core/solvers/backwardInduction';
import { IntractableGameError, MalformedGameError } from '../src/models/errors';

const config = createTestSolverConfig();
const PLAYERS = ['P1', 'P2'];

describe('buildGameTree', () => {
  test('counts nodes and freezes the copy', () => {
    const root = decision(0, 'root', [
      { action: 'L', node: terminal([1, 0]) },
      { action: 'R', node: terminal([0, 1]) },
    ]);
    const tree = buildGameTree(root, PLAYERS, config);
    expect(tree.node_count).toBe(3);
    expect(tree.num_players).toBe(2);
    expect(Object.isFrozen(tree.root)).toBe(true);
    expect(tree.root).not.toBe(root);
  });

  test('rejects duplicate labels', () => {
    const root = decision(0, 'same', [{ action: 'a', node: decision(1, 'same', [{ action: 'b', node: terminal([0, 0]) }]) }]);
    expect(() => buildGameTree(root, PLAYERS, config)).toThrow(MalformedGameError);
  });

  test('rejects an owner outside the player range', () => {
    const root = decision(2, 'root', [{ action: 'a', node: terminal([0, 0]) }]);
    expect(() => buildGameTree(root, PLAYERS, config)).toThrow(MalformedGameError);
  });

  test('rejects a decision node without actions', () => {
    expect(() => buildGameTree(decision(0, 'root', []), PLAYERS, config)).toThrow(MalformedGameError);
  });

  test('rejects payoff vectors of the wrong length', () => {
    const root = decision(0, 'root', [{ action: 'a', node: terminal([1]) }]);
    expect(() => buildGameTree(root, PLAYERS, config)).toThrow(MalformedGameError);
  });

  test('rejects chance probabilities that do not sum to 1', () => {
    const root = chance('nature', [
      { label: 'up', probability: 0.5, node: terminal([0, 0]) },
      { label: 'down', probability: 0.4, node: terminal([0, 0]) },
    ]);
    expect(() => buildGameTree(root, PLAYERS, config)).toThrow(MalformedGameError);
  });

  test('node ceiling → IntractableGameError', () => {
    const tiny = createTestSolverConfig({ max_tree_nodes: 2 });
    const root = decision(0, 'root', [
      { action: 'a', node: terminal([0, 0]) },
      { action: 'b', node: terminal([0, 0]) },
    ]);
    expect(() => buildGameTree(root, PLAYERS, tiny)).toThrow(IntractableGameError);
  });
});

describe('solveBackwardInduction', () => {
  test('entry deterrence: the incumbent accommodates, so the entrant enters', () => {
    const root = decision(0, 'entrant', [
      { action: 'stay out', node: terminal([0, 4]) },
      {
        action: 'enter',
        node: decision(1, 'incumbent', [
          { action: 'fight', node: terminal([-1, -1]) },
          { action: 'accommodate', node: terminal([1, 1]) },
        ]),
      },
    ]);
    const result = solveBackwardInduction(buildGameTree(root, PLAYERS, config));

    expect(result.payoffs).toEqual([1, 1]);
    expect(result.path).toEqual([
      { player: 0, node_label: 'entrant', action: 'enter' },
      { player: 1, node_label: 'incumbent', action: 'accommodate' },
    ]);
    expect(result.plan).toEqual({ entrant: 'enter', incumbent: 'accommodate' });
  });

  test('ties go to the first child', () => {
    const root = decision(0, 'root', [
      { action: 'first', node: terminal([2, 0]) },
      { action: 'second', node: terminal([2, 5]) },
    ]);
    const result = solveBackwardInduction(buildGameTree(root, PLAYERS, config));
    expect(result.plan.root).toBe('first');
    expect(result.payoffs).toEqual([2, 0]);
  });

  test('the plan covers decision nodes off the equilibrium path', () => {
    const root = decision(0, 'root', [
      { action: 'safe', node: terminal([3, 0]) },
      {
        action: 'risky',
        node: decision(1, 'reply', [
          { action: 'punish', node: terminal([0, 1]) },
          { action: 'reward', node: terminal([5, 0]) },
        ]),
      },
    ]);
    const result = solveBackwardInduction(buildGameTree(root, PLAYERS, config));
    expect(result.path).toHaveLength(1);
    expect(result.plan).toEqual({ root: 'safe', reply: 'punish' });
  });

  test('chance nodes take expected values; the path follows the likeliest outcome', () => {
    const root = decision(0, 'root', [
      { action: 'sure', node: terminal([1, 0]) },
      {
        action: 'gamble',
        node: chance('coin', [
          { label: 'lose', probability: 0.25, node: terminal([0, 0]) },
          { label: 'win', probability: 0.75, node: terminal([2, 0]) },
        ]),
      },
    ]);
    const result = solveBackwardInduction(buildGameTree(root, PLAYERS, config));
    expect(result.payoffs[0]).toBeCloseTo(1.5, 12);
    expect(result.path).toEqual([
      { player: 0, node_label: 'root', action: 'gamble' },
      { player: 'chance', node_label: 'coin', action: 'win' },
    ]);
  });
});
