export type LinearProgramResult =
  | {
      status: 'optimal';
      /** Primal solution. */
      x: number[];
      /** Shadow prices of the ≤ constraints (solution of the dual). */
      dual: number[];
      objective: number;
      iterations: number;
    }
  | { status: 'unbounded'; iterations: number }
  | { status: 'iteration_limit'; iterations: number };

/**
 * Tableau simplex for
 *
 *   maximize c·x  subject to  A x ≤ b,  x ≥ 0,  with b ≥ 0
 *
 * so the slack basis is a feasible start. The most negative reduced cost
 * enters; after a run of degenerate pivots (no objective progress) Bland's
 * rule takes over until the objective moves again, which rules out cycling.
 */
export function maximizeLinearProgram(
  c: readonly number[],
  a: readonly (readonly number[])[],
  b: readonly number[],
  epsilon = 1e-10,
): LinearProgramResult {
  const rows = a.length;
  const cols = c.length;
  if (b.length !== rows || a.some((row) => row.length !== cols)) {
    throw new RangeError('maximizeLinearProgram: constraint shape mismatch');
  }
  if (b.some((v) => v < 0)) {
    throw new RangeError('maximizeLinearProgram: right-hand side must be non-negative');
  }

  const width = cols + rows + 1;
  const rhs = width - 1;

  // Constraint rows: [A | I | b]; objective row: [-c | 0 | 0]
  const tableau: number[][] = a.map((row, i) => {
    const line = new Array<number>(width).fill(0);
    row.forEach((v, j) => (line[j] = v));
    line[cols + i] = 1;
    line[rhs] = b[i];
    return line;
  });
  const objective = new Array<number>(width).fill(0);
  c.forEach((v, j) => (objective[j] = -v));

  const basis = Array.from({ length: rows }, (_, i) => cols + i);
  const maxIterations = 200 * (rows + cols) + 1000;
  const degenerateLimit = rows + cols;

  let degenerateRun = 0;
  let iterations = 0;
  for (; iterations < maxIterations; iterations++) {
    const useBland = degenerateRun >= degenerateLimit;
    let entering = -1;
    for (let j = 0; j < rhs; j++) {
      if (objective[j] >= -epsilon) continue;
      if (useBland) {
        entering = j;
        break;
      }
      if (entering === -1 || objective[j] < objective[entering]) entering = j;
    }
    if (entering === -1) {
      const x = new Array<number>(cols).fill(0);
      basis.forEach((v, i) => {
        if (v < cols) x[v] = tableau[i][rhs];
      });
      const dual = Array.from({ length: rows }, (_, i) => objective[cols + i]);
      return { status: 'optimal', x, dual, objective: objective[rhs], iterations };
    }

    let leaving = -1;
    let bestRatio = Infinity;
    for (let i = 0; i < rows; i++) {
      const coef = tableau[i][entering];
      if (coef <= epsilon) continue;
      const ratio = Math.max(0, tableau[i][rhs]) / coef;
      if (
        ratio < bestRatio - epsilon ||
        (Math.abs(ratio - bestRatio) <= epsilon && leaving !== -1 && basis[i] < basis[leaving])
      ) {
        bestRatio = ratio;
        leaving = i;
      }
    }
    if (leaving === -1) {
      return { status: 'unbounded', iterations };
    }

    degenerateRun = bestRatio <= epsilon ? degenerateRun + 1 : 0;
    pivot(tableau, objective, leaving, entering);
    basis[leaving] = entering;
  }

  return { status: 'iteration_limit', iterations };
}

function pivot(tableau: number[][], objective: number[], row: number, col: number): void {
  const pivotRow = tableau[row];
  const p = pivotRow[col];
  for (let j = 0; j < pivotRow.length; j++) pivotRow[j] /= p;

  const eliminate = (line: number[]): void => {
    const factor = line[col];
    if (factor === 0) return;
    for (let j = 0; j < line.length; j++) line[j] -= factor * pivotRow[j];
  };

  tableau.forEach((line, i) => {
    if (i !== row) eliminate(line);
  });
  eliminate(objective);
}
