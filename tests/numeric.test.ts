import { solveLinearSystem } from '../src/core/numeric/linearSystem';
import { maximizeLinearProgram } from '../src/core/numeric/simplex';
import { exactSum, factorial, roundTo } from '../src/core/numeric/exact';

describe('solveLinearSystem', () => {
  test('solves a 2x2 system', () => {
    // 2x + y = 5, x - y = 1 → x = 2, y = 1
    const x = solveLinearSystem(
      [
        [2, 1],
        [1, -1],
      ],
      [5, 1],
    );
    expect(x).not.toBeNull();
    expect(x?.[0]).toBeCloseTo(2, 12);
    expect(x?.[1]).toBeCloseTo(1, 12);
  });

  test('needs pivoting when the leading entry is zero', () => {
    const x = solveLinearSystem(
      [
        [0, 1],
        [1, 0],
      ],
      [3, 4],
    );
    expect(x?.[0]).toBeCloseTo(4, 12);
    expect(x?.[1]).toBeCloseTo(3, 12);
  });

  test('singular matrix → null', () => {
    expect(
      solveLinearSystem(
        [
          [1, 2],
          [2, 4],
        ],
        [1, 2],
      ),
    ).toBeNull();
  });

  test('shape mismatch throws RangeError', () => {
    expect(() => solveLinearSystem([[1, 2]], [1])).toThrow(RangeError);
  });
});

describe('maximizeLinearProgram', () => {
  test('textbook program', () => {
    // max 3x + 5y  s.t.  x ≤ 4, 2y ≤ 12, 3x + 2y ≤ 18  → (2, 6), 36
    const lp = maximizeLinearProgram(
      [3, 5],
      [
        [1, 0],
        [0, 2],
        [3, 2],
      ],
      [4, 12, 18],
    );
    expect(lp.status).toBe('optimal');
    if (lp.status !== 'optimal') return;
    expect(lp.objective).toBeCloseTo(36, 9);
    expect(lp.x[0]).toBeCloseTo(2, 9);
    expect(lp.x[1]).toBeCloseTo(6, 9);
    // Shadow prices: 0, 1.5, 1
    expect(lp.dual[0]).toBeCloseTo(0, 9);
    expect(lp.dual[1]).toBeCloseTo(1.5, 9);
    expect(lp.dual[2]).toBeCloseTo(1, 9);
  });

  test('unbounded program', () => {
    const lp = maximizeLinearProgram([1, 1], [[1, -1]], [1]);
    expect(lp.status).toBe('unbounded');
  });

  test('negative right-hand side is rejected', () => {
    expect(() => maximizeLinearProgram([1], [[1]], [-1])).toThrow(RangeError);
  });
});

describe('exact helpers', () => {
  test('factorial', () => {
    expect(factorial(0).toNumber()).toBe(1);
    expect(factorial(5).toNumber()).toBe(120);
    expect(factorial(12).toNumber()).toBe(479001600);
  });

  test('exactSum avoids float drift', () => {
    expect(exactSum([0.1, 0.2])).toBe(0.3);
  });

  test('roundTo uses half-even', () => {
    expect(roundTo(2.345, 2)).toBe(2.34);
    expect(roundTo(2.355, 2)).toBe(2.36);
  });
});
