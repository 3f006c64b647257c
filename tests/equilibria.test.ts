import { buildBimatrixModel, buildPayoffModel } from '../src/core/payoffModel';
import { createTestSolverConfig } from '../src/core/configs';
import { findPureEquilibria, isPureNashEquilibrium } from '../src/core/solvers/pureEquilibria';
import { solveZeroSum } from '../src/core/solvers/zeroSum';
import { combinations, findMixedEquilibria } from '../src/core/solvers/supportEnumeration';
import { solveNormalForm } from '../src/core/solvers/normalForm';
import { maxRegret, pureRegret } from '../src/core/solvers/regret';
import { getGenerator } from '../src/core/generatorFactory';
import { IntractableGameError, MalformedGameError } from '../src/models/errors';

const config = createTestSolverConfig();

function bimatrix(a: number[][], b: number[][]) {
  const rows = a.map((_, i) => `r${i}`);
  const cols = a[0].map((_, j) => `c${j}`);
  return buildBimatrixModel(['Row', 'Column'], rows, cols, a, b);
}

const negate = (m: number[][]) => m.map((row) => row.map((v) => -v));

describe('findPureEquilibria', () => {
  test("prisoner's dilemma → (Defect, Defect) only", () => {
    const model = bimatrix(
      [
        [3, 0],
        [5, 1],
      ],
      [
        [3, 5],
        [0, 1],
      ],
    );
    const eqs = findPureEquilibria(model, config);
    expect(eqs).toHaveLength(1);
    expect(eqs[0].type).toBe('pure');
    expect(eqs[0].profile).toEqual([1, 1]);
    expect(eqs[0].payoffs).toEqual([1, 1]);
    expect(eqs[0].strategies).toEqual([
      [0, 1],
      [0, 1],
    ]);
  });

  test('matching pennies has none', () => {
    const a = [
      [1, -1],
      [-1, 1],
    ];
    expect(findPureEquilibria(bimatrix(a, negate(a)), config)).toEqual([]);
  });

  test('coordination game → both diagonal profiles, in profile order', () => {
    const a = [
      [2, 0],
      [0, 1],
    ];
    const eqs = findPureEquilibria(bimatrix(a, a), config);
    expect(eqs.map((e) => e.profile)).toEqual([
      [0, 0],
      [1, 1],
    ]);
  });

  test('weak best responses count', () => {
    const a = [
      [1, 1],
      [1, 1],
    ];
    expect(findPureEquilibria(bimatrix(a, a), config)).toHaveLength(4);
  });

  test('three players', () => {
    // Everyone is paid 1 only when all three match.
    const model = buildPayoffModel({
      players: ['A', 'B', 'C'],
      strategy_sets: [
        ['x', 'y'],
        ['x', 'y'],
        ['x', 'y'],
      ],
      payoff_fn: ([a, b, c]) => {
        const all = a === b && b === c ? 1 : 0;
        return [all, all, all];
      },
    });
    const eqs = findPureEquilibria(model, config);
    expect(eqs.map((e) => e.profile)).toEqual([
      [0, 0, 0],
      [1, 1, 1],
    ]);
    // The odd one out gains by joining the others.
    expect(isPureNashEquilibrium(model, [0, 0, 1], config.tolerance)).toBe(false);
  });

  test('101 strategies per player → IntractableGameError', () => {
    const labels = Array.from({ length: 101 }, (_, i) => `s${i}`);
    const model = buildPayoffModel({
      players: ['A', 'B'],
      strategy_sets: [labels, labels],
      payoff_fn: ([i, j]) => [i - j, j - i],
    });
    const strict = createTestSolverConfig({ max_profiles: 1_000_000 });
    expect(() => findPureEquilibria(model, strict)).toThrow(IntractableGameError);
  });
});

describe('solveZeroSum', () => {
  test('matching pennies → uniform mixing, value 0', () => {
    const a = [
      [1, -1],
      [-1, 1],
    ];
    const eq = solveZeroSum(bimatrix(a, negate(a)), config);
    expect(eq.type).toBe('mixed');
    expect(eq.strategies[0][0]).toBeCloseTo(0.5, 9);
    expect(eq.strategies[1][0]).toBeCloseTo(0.5, 9);
    expect(eq.values?.[0]).toBeCloseTo(0, 9);
    expect(eq.values?.[1]).toBeCloseTo(0, 9);
  });

  test('rock paper scissors → one third each', () => {
    const a = [
      [0, -1, 1],
      [1, 0, -1],
      [-1, 1, 0],
    ];
    const eq = solveZeroSum(bimatrix(a, negate(a)), config);
    for (const mix of eq.strategies) {
      for (const x of mix) expect(x).toBeCloseTo(1 / 3, 9);
    }
    expect(eq.values?.[0]).toBeCloseTo(0, 9);
  });

  test('asymmetric game value', () => {
    // Row mixes (1/2, 1/2), column (1/4, 3/4); value = 3/2
    const a = [
      [3, 1],
      [0, 2],
    ];
    const eq = solveZeroSum(bimatrix(a, negate(a)), config);
    expect(eq.strategies[0][0]).toBeCloseTo(0.5, 9);
    expect(eq.strategies[1][0]).toBeCloseTo(0.25, 9);
    expect(eq.values?.[0]).toBeCloseTo(1.5, 9);
    expect(maxRegret(bimatrix(a, negate(a)), eq.strategies)).toBeLessThan(1e-9);
  });

  test('constant-sum game reports both values', () => {
    const a = [
      [4, 2],
      [1, 3],
    ];
    const b = a.map((row) => row.map((v) => 5 - v));
    const eq = solveZeroSum(bimatrix(a, b), config);
    // Row p = (1/2, 1/2), column q = (1/4, 3/4), v = 2.5
    expect(eq.values?.[0]).toBeCloseTo(2.5, 9);
    expect(eq.values?.[1]).toBeCloseTo(2.5, 9);
    expect(eq.payoffs[0]).toBeCloseTo(2.5, 9);
  });

  test('saddle point game → pure minimax', () => {
    const a = [
      [2, 3],
      [1, 0],
    ];
    const eq = solveZeroSum(bimatrix(a, negate(a)), config);
    expect(eq.strategies[0][0]).toBeCloseTo(1, 9);
    expect(eq.strategies[1][0]).toBeCloseTo(1, 9);
    expect(eq.values?.[0]).toBeCloseTo(2, 9);
  });

  test('general-sum game → MalformedGameError', () => {
    const a = [
      [3, 0],
      [5, 1],
    ];
    expect(() => solveZeroSum(bimatrix(a, a), config)).toThrow(MalformedGameError);
  });

  test.each([
    [11, 78],
    [12, 91],
  ])('colonel blotto with %i troops on 3 fields (%i allocations each)', (troops, allocations) => {
    const spec = getGenerator('colonel_blotto').build(
      { troops_p1: troops, troops_p2: troops, n_battlefields: 3 },
      config,
    );
    if (spec.kind !== 'normal_form') throw new Error('expected a normal-form game');
    const model = spec.model;
    expect(model.strategyCounts()).toEqual([allocations, allocations]);

    const eq = solveZeroSum(model, config);
    const [p, q] = eq.strategies;
    const [a] = model.bimatrix();
    const rowGuarantee = Math.min(...a[0].map((_, j) => a.reduce((s, row, i) => s + p[i] * row[j], 0)));
    const columnGuarantee = Math.max(...a.map((row) => row.reduce((s, v, j) => s + v * q[j], 0)));

    // Symmetric zero-sum: value 0 for each side.
    expect(eq.values?.[0]).toBeCloseTo(0, 6);
    expect(eq.values?.[1]).toBeCloseTo(-(eq.values?.[0] ?? NaN), 9);
    expect(rowGuarantee).toBeCloseTo(columnGuarantee, 6);
    expect(maxRegret(model, eq.strategies)).toBeLessThan(1e-6);
  });
});

describe('combinations', () => {
  test('lexicographic k-subsets', () => {
    expect([...combinations(4, 2)]).toEqual([
      [0, 1],
      [0, 2],
      [0, 3],
      [1, 2],
      [1, 3],
      [2, 3],
    ]);
    expect([...combinations(3, 0)]).toEqual([]);
    expect([...combinations(2, 3)]).toEqual([]);
  });
});

describe('findMixedEquilibria', () => {
  const battle = {
    a: [
      [3, 0],
      [0, 2],
    ],
    b: [
      [2, 0],
      [0, 3],
    ],
  };

  test('battle of the sexes: two pure and one mixed with all supports', () => {
    const eqs = findMixedEquilibria(bimatrix(battle.a, battle.b), config, { all_supports: true });
    expect(eqs).toHaveLength(3);
    expect(eqs[0].profile).toEqual([0, 0]);
    expect(eqs[1].profile).toEqual([1, 1]);

    const mixed = eqs[2];
    expect(mixed.type).toBe('mixed');
    expect(mixed.strategies[0][0]).toBeCloseTo(0.6, 9);
    expect(mixed.strategies[1][0]).toBeCloseTo(0.4, 9);
    expect(mixed.payoffs[0]).toBeCloseTo(1.2, 9);
    expect(mixed.payoffs[1]).toBeCloseTo(1.2, 9);
  });

  test('stops after the first support size that yields equilibria', () => {
    const eqs = findMixedEquilibria(bimatrix(battle.a, battle.b), config);
    expect(eqs.map((e) => e.type)).toEqual(['pure', 'pure']);
  });

  test('min_support 2 skips the pure supports', () => {
    const eqs = findMixedEquilibria(bimatrix(battle.a, battle.b), config, { min_support: 2 });
    expect(eqs).toHaveLength(1);
    expect(eqs[0].profile).toBeNull();
  });

  test('every reported equilibrium has zero regret', () => {
    const a = [
      [3, 0, 2],
      [1, 2, 0],
      [0, 1, 3],
    ];
    const b = [
      [1, 2, 0],
      [3, 0, 1],
      [0, 2, 2],
    ];
    const model = bimatrix(a, b);
    for (const eq of findMixedEquilibria(model, config, { all_supports: true })) {
      expect(maxRegret(model, eq.strategies)).toBeLessThan(1e-5);
    }
  });

  test('support pair ceiling → IntractableGameError', () => {
    // 225 support pairs of size 2 alone.
    const labels = Array.from({ length: 6 }, (_, i) => i);
    const a = labels.map((i) => labels.map((j) => (i === j ? 1 : 0)));
    const b = labels.map((i) => labels.map((j) => (i === j ? 0 : 1)));
    const tiny = createTestSolverConfig({ max_support_pairs: 5 });
    expect(() => findMixedEquilibria(bimatrix(a, b), tiny, { min_support: 2 })).toThrow(
      IntractableGameError,
    );
  });

  test('requires two players', () => {
    const model = buildPayoffModel({
      players: ['A', 'B', 'C'],
      strategy_sets: [['x'], ['x'], ['x']],
      payoff_fn: () => [0, 0, 0],
    });
    expect(() => findMixedEquilibria(model, config)).toThrow(MalformedGameError);
  });
});

describe('solveNormalForm', () => {
  test('zero-sum game → pure search plus linear program', () => {
    const a = [
      [1, -1],
      [-1, 1],
    ];
    const solution = solveNormalForm(bimatrix(a, negate(a)), config);
    expect(solution.methods).toEqual(['pure_enumeration', 'linear_program']);
    expect(solution.equilibria).toHaveLength(1);
    expect(solution.equilibria[0].values?.[0]).toBeCloseTo(0, 9);
  });

  test('saddle point is not reported twice', () => {
    const a = [
      [2, 3],
      [1, 0],
    ];
    const solution = solveNormalForm(bimatrix(a, negate(a)), config);
    expect(solution.equilibria).toHaveLength(1);
    expect(solution.equilibria[0].type).toBe('pure');
  });

  test('general-sum two-player game → pure plus mixed', () => {
    const solution = solveNormalForm(
      bimatrix(
        [
          [3, 0],
          [0, 2],
        ],
        [
          [2, 0],
          [0, 3],
        ],
      ),
      config,
    );
    expect(solution.methods).toEqual(['pure_enumeration', 'support_enumeration']);
    expect(solution.equilibria.map((e) => e.type)).toEqual(['pure', 'pure', 'mixed']);
    expect(solution.convergence).toBeUndefined();
  });
});

describe('pureRegret', () => {
  test("prisoner's dilemma deviations", () => {
    const a = [
      [3, 0],
      [5, 1],
    ];
    const pd = bimatrix(a, [
      [3, 5],
      [0, 1],
    ]);
    expect(pureRegret(pd, [0, 0])).toBe(2);
    expect(pureRegret(pd, [0, 1])).toBe(1);
    expect(pureRegret(pd, [1, 1])).toBe(0);
    expect(pureRegret(pd, [1, 1])).toBe(maxRegret(pd, [[0, 1], [0, 1]]));
  });
});
