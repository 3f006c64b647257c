/**
 * Solve the dense square system `a · x = b` by Gaussian elimination with
 * partial pivoting. Returns null when the matrix is singular (a pivot falls
 * below `pivotTolerance` in absolute value). Inputs are not modified.
 */
export function solveLinearSystem(
  a: readonly (readonly number[])[],
  b: readonly number[],
  pivotTolerance = 1e-12,
): number[] | null {
  const n = b.length;
  if (a.length !== n || a.some((row) => row.length !== n)) {
    throw new RangeError(`solveLinearSystem expects a ${n}x${n} matrix`);
  }

  // Augmented working copy
  const m = a.map((row, i) => [...row, b[i]]);

  for (let col = 0; col < n; col++) {
    let pivotRow = col;
    for (let r = col + 1; r < n; r++) {
      if (Math.abs(m[r][col]) > Math.abs(m[pivotRow][col])) pivotRow = r;
    }
    if (Math.abs(m[pivotRow][col]) < pivotTolerance) return null;
    if (pivotRow !== col) [m[col], m[pivotRow]] = [m[pivotRow], m[col]];

    const pivot = m[col][col];
    for (let r = col + 1; r < n; r++) {
      const factor = m[r][col] / pivot;
      if (factor === 0) continue;
      for (let c = col; c <= n; c++) {
        m[r][c] -= factor * m[col][c];
      }
    }
  }

  const x = new Array<number>(n).fill(0);
  for (let r = n - 1; r >= 0; r--) {
    let sum = m[r][n];
    for (let c = r + 1; c < n; c++) sum -= m[r][c] * x[c];
    x[r] = sum / m[r][r];
  }
  return x;
}
