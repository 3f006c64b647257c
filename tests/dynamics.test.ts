import { createTestSolverConfig } from '../src/core/configs';
import {
  replicatorStep,
  runReplicatorDynamics,
  validateSquareMatrix,
} from '../src/core/dynamics/replicator';
import { findEvolutionarilyStableStrategies, isEvolutionarilyStable } from '../src/core/dynamics/ess';
import { buildGraph, edgeList, graphFromAdjacency } from '../src/core/dynamics/graphs';
import { contagionThreshold, nodeBestResponse, runNetworkContagion } from '../src/core/dynamics/contagion';
import { runReputationDynamics } from '../src/core/dynamics/reputation';
import { hawkDoveMatrix } from '../src/core/generators/evolutionary';
import { SeededRandom } from '../src/utils/random';
import { AgentBehaviour, ReputationSpec } from '../src/models/types';
import { IntractableGameError, MalformedGameError } from '../src/models/errors';

const config = createTestSolverConfig();

// ─── Replicator ─────────────────────────────────────────────────────────────────

describe('runReplicatorDynamics', () => {
  const hawkDove = hawkDoveMatrix(2, 4);

  test('hawk-dove settles at the mixed ESS V/C', () => {
    const run = runReplicatorDynamics({ matrix: hawkDove, initial: [0.1, 0.9], steps: 500 }, config);

    expect(run.converged).toBe(true);
    expect(run.steps).toBeLessThan(500);
    expect(run.trajectory[0].step).toBe(0);
    expect(run.trajectory[0].shares).toEqual([0.1, 0.9]);
    const last = run.trajectory[run.trajectory.length - 1];
    expect(last.step).toBe(run.steps);
    expect(last.shares[0]).toBeCloseTo(0.5, 6);
    // At the rest point both strategies earn 0.5.
    expect(last.average_payoff).toBeCloseTo(0.5, 6);
  });

  test('every snapshot stays on the simplex', () => {
    const run = runReplicatorDynamics({ matrix: hawkDove, initial: [0.9, 0.1], steps: 50 }, config);
    for (const snap of run.trajectory) {
      expect(snap.shares.every((x) => x >= 0)).toBe(true);
      expect(snap.shares[0] + snap.shares[1]).toBeCloseTo(1, 12);
    }
  });

  test('a monomorphic population is a rest point', () => {
    const run = runReplicatorDynamics({ matrix: hawkDove, initial: [1, 0], steps: 100 }, config);
    expect(run.converged).toBe(true);
    expect(run.steps).toBe(1);
    expect(run.trajectory).toHaveLength(2);
    expect(run.trajectory[1].shares).toEqual([1, 0]);
  });

  test('positive matrices are used without a shift', () => {
    // Fitness (2, 1) at equal shares: 0.5·2 / 1.5 = 2/3.
    const next = replicatorStep([0.5, 0.5], [
      [2, 2],
      [1, 1],
    ]);
    expect(next[0]).toBeCloseTo(2 / 3, 12);
    expect(next[1]).toBeCloseTo(1 / 3, 12);
  });

  test('non-square matrix → MalformedGameError', () => {
    expect(() => validateSquareMatrix([[1, 2]])).toThrow(MalformedGameError);
    expect(() => validateSquareMatrix([])).toThrow(MalformedGameError);
  });

  test('initial mix off the simplex → MalformedGameError', () => {
    expect(() => runReplicatorDynamics({ matrix: hawkDove, initial: [0.5, 0.6], steps: 10 }, config)).toThrow(
      MalformedGameError,
    );
  });

  test('steps above the ceiling → IntractableGameError', () => {
    expect(() => runReplicatorDynamics({ matrix: hawkDove, initial: [0.5, 0.5], steps: 1_001 }, config)).toThrow(
      IntractableGameError,
    );
  });
});

describe('evolutionary stability', () => {
  test('hawk-dove: no pure ESS, the V/C mix is stable', () => {
    const matrix = hawkDoveMatrix(2, 4);
    expect(findEvolutionarilyStableStrategies(matrix)).toEqual([]);
    expect(isEvolutionarilyStable(matrix, [0.5, 0.5])).toBe(true);
    expect(isEvolutionarilyStable(matrix, [0.25, 0.75])).toBe(false);
  });

  test("prisoner's dilemma: defection is the only ESS", () => {
    expect(
      findEvolutionarilyStableStrategies([
        [3, 0],
        [5, 1],
      ]),
    ).toEqual([1]);
  });

  test('pure coordination: both conventions are stable', () => {
    expect(
      findEvolutionarilyStableStrategies([
        [2, 0],
        [0, 1],
      ]),
    ).toEqual([0, 1]);
  });

  test('rock-paper-scissors: the uniform mix fails the second condition', () => {
    const rps = [
      [0, -1, 1],
      [1, 0, -1],
      [-1, 1, 0],
    ];
    expect(findEvolutionarilyStableStrategies(rps)).toEqual([]);
    expect(isEvolutionarilyStable(rps, [1 / 3, 1 / 3, 1 / 3])).toBe(false);
  });
});

// ─── Graphs ─────────────────────────────────────────────────────────────────────

describe('buildGraph', () => {
  test('ring links each node to its two neighbours', () => {
    const g = buildGraph('ring', 5, new SeededRandom(1));
    expect(g.adjacency[0]).toEqual([1, 4]);
    expect(g.adjacency[2]).toEqual([1, 3]);
    expect(edgeList(g)).toHaveLength(5);
  });

  test('grid of 9 is a 3×3 lattice', () => {
    const g = buildGraph('grid', 9, new SeededRandom(1));
    expect(g.adjacency[4]).toEqual([1, 3, 5, 7]);
    expect(g.adjacency[0]).toEqual([1, 3]);
    expect(g.adjacency[8]).toEqual([5, 7]);
  });

  test('small world rewiring keeps the edge count', () => {
    const g = buildGraph('small_world', 20, new SeededRandom(7));
    expect(edgeList(g)).toHaveLength(40);
  });

  test('scale free adds two edges per node after the seed clique', () => {
    const g = buildGraph('scale_free', 10, new SeededRandom(7));
    expect(edgeList(g)).toHaveLength(3 + 2 * 7);
  });

  test('Erdős–Rényi on few nodes is complete', () => {
    const g = buildGraph('random_erdos_renyi', 4, new SeededRandom(7));
    expect(edgeList(g)).toHaveLength(6);
  });

  test('adjacency is symmetric and reproducible from the seed', () => {
    const a = buildGraph('small_world', 30, new SeededRandom(99));
    const b = buildGraph('small_world', 30, new SeededRandom(99));
    expect(a).toEqual(b);
    a.adjacency.forEach((neighbours, node) => {
      for (const nb of neighbours) expect(a.adjacency[nb]).toContain(node);
      expect(neighbours).not.toContain(node);
    });
  });

  test('zero nodes → MalformedGameError', () => {
    expect(() => buildGraph('ring', 0, new SeededRandom(1))).toThrow(MalformedGameError);
  });

  test('graphFromAdjacency symmetrizes and validates', () => {
    expect(graphFromAdjacency([[1], []]).adjacency).toEqual([[1], [0]]);
    expect(() => graphFromAdjacency([[2], []])).toThrow(MalformedGameError);
  });
});

// ─── Network contagion ──────────────────────────────────────────────────────────

describe('runNetworkContagion', () => {
  const coordination = [
    [3, 0],
    [0, 4],
  ];

  test('two adjacent adopters take over a ring of six', () => {
    const graph = buildGraph('ring', 6, new SeededRandom(1));
    const run = runNetworkContagion(
      { graph, matrix: coordination, initial_strategies: [1, 1, 0, 0, 0, 0], steps: 20 },
      config,
    );

    expect(run.trajectory.map((s) => s.strategies)).toEqual([
      [1, 1, 0, 0, 0, 0],
      [1, 1, 1, 0, 0, 1],
      [1, 1, 1, 1, 1, 1],
      [1, 1, 1, 1, 1, 1],
    ]);
    expect(run.trajectory.map((s) => s.switches)).toEqual([0, 2, 2, 0]);
    expect(run.converged).toBe(true);
    expect(run.steps).toBe(3);
    expect(run.trajectory[3].adoption).toEqual([0, 1]);
  });

  test('nodeBestResponse keeps the current strategy on ties', () => {
    const identity = [
      [1, 0, 0],
      [0, 1, 0],
      [0, 0, 1],
    ];
    expect(nodeBestResponse(1, [0, 1], identity)).toBe(1);
    expect(nodeBestResponse(2, [0, 1], identity)).toBe(0);
    expect(nodeBestResponse(2, [], identity)).toBe(2);
  });

  test('contagionThreshold for a 2×2 coordination game', () => {
    expect(contagionThreshold(coordination)).toBeCloseTo(3 / 7, 12);
    expect(
      contagionThreshold([
        [0, 0, 0],
        [0, 0, 0],
        [0, 0, 0],
      ]),
    ).toBeNull();
  });

  test('bad initial strategies → MalformedGameError', () => {
    const graph = buildGraph('ring', 3, new SeededRandom(1));
    expect(() =>
      runNetworkContagion({ graph, matrix: coordination, initial_strategies: [0, 0], steps: 5 }, config),
    ).toThrow(MalformedGameError);
    expect(() =>
      runNetworkContagion({ graph, matrix: coordination, initial_strategies: [0, 2, 0], steps: 5 }, config),
    ).toThrow(MalformedGameError);
  });

  test('steps above the ceiling → IntractableGameError', () => {
    const graph = buildGraph('ring', 3, new SeededRandom(1));
    expect(() =>
      runNetworkContagion({ graph, matrix: coordination, initial_strategies: [0, 0, 1], steps: 1_001 }, config),
    ).toThrow(IntractableGameError);
  });
});

// ─── Reputation ─────────────────────────────────────────────────────────────────

function reputationSpec(behaviours: AgentBehaviour[], overrides: Partial<ReputationSpec> = {}): ReputationSpec {
  return {
    kind: 'reputation',
    behaviours,
    stage: { temptation: 5, reward: 3, punishment: 1, sucker: 0 },
    learning_rate: 0.5,
    trust_threshold: 0.5,
    initial_reputation: 0.5,
    rounds: 2,
    seed: 1,
    ...overrides,
  };
}

describe('runReputationDynamics', () => {
  test('a cooperator against a defector', () => {
    const snaps = runReputationDynamics(reputationSpec(['always_cooperate', 'always_defect']), config);

    expect(snaps).toHaveLength(3);
    expect(snaps[0]).toEqual({
      kind: 'reputation',
      round: 0,
      reputations: [0.5, 0.5],
      cooperation_rate: 0,
      cumulative_payoffs: [0, 0],
    });
    expect(snaps[1].reputations).toEqual([0.75, 0.25]);
    expect(snaps[1].cooperation_rate).toBe(0.5);
    expect(snaps[2].reputations).toEqual([0.875, 0.125]);
    expect(snaps[2].cumulative_payoffs).toEqual([0, 10]);
  });

  test('tit-for-tat retaliates from the second round', () => {
    const snaps = runReputationDynamics(reputationSpec(['tit_for_tat', 'always_defect']), config);
    expect(snaps[1].cumulative_payoffs).toEqual([0, 5]);
    expect(snaps[2].cumulative_payoffs).toEqual([1, 6]);
  });

  test('reputation-based agents stop trusting a defector once its score drops', () => {
    const snaps = runReputationDynamics(reputationSpec(['reputation_based', 'always_defect']), config);
    expect(snaps[2].cumulative_payoffs).toEqual([1, 6]);
    expect(snaps[2].cooperation_rate).toBe(0);
  });

  test('grim trigger and tit-for-tat cooperate throughout', () => {
    const snaps = runReputationDynamics(
      reputationSpec(['grim_trigger', 'tit_for_tat'], { rounds: 5 }),
      config,
    );
    expect(snaps.slice(1).every((s) => s.cooperation_rate === 1)).toBe(true);
    expect(snaps[5].cumulative_payoffs).toEqual([15, 15]);
  });

  test('random agents are reproducible from the seed', () => {
    const spec = reputationSpec(['random', 'random', 'tit_for_tat'], { rounds: 20, seed: 3 });
    expect(runReputationDynamics(spec, config)).toEqual(runReputationDynamics(spec, config));
  });

  test('invalid specs are rejected', () => {
    expect(() => runReputationDynamics(reputationSpec(['tit_for_tat']), config)).toThrow(MalformedGameError);
    expect(() =>
      runReputationDynamics(
        reputationSpec(['tit_for_tat', 'random'], {
          stage: { temptation: 3, reward: 3, punishment: 1, sucker: 0 },
        }),
        config,
      ),
    ).toThrow(MalformedGameError);
    expect(() =>
      runReputationDynamics(reputationSpec(['tit_for_tat', 'random'], { learning_rate: 0 }), config),
    ).toThrow(MalformedGameError);
    expect(() =>
      runReputationDynamics(reputationSpec(['tit_for_tat', 'random'], { rounds: 1_001 }), config),
    ).toThrow(IntractableGameError);
  });
});
