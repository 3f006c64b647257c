import Decimal from 'decimal.js';

/** Private Decimal constructor: 40 significant digits, banker's rounding. */
export const Exact = Decimal.clone({ precision: 40, rounding: Decimal.ROUND_HALF_EVEN });

const factorials: Decimal[] = [new Exact(1)];

export function factorial(n: number): Decimal {
  for (let i = factorials.length; i <= n; i++) {
    factorials.push(factorials[i - 1].mul(i));
  }
  return factorials[n];
}

/** Sum of floats accumulated exactly, rounded once at the end. */
export function exactSum(values: readonly number[]): number {
  return values.reduce((acc, v) => acc.plus(v), new Exact(0)).toNumber();
}

/** Round to `places` decimals, half-even. */
export function roundTo(value: number, places: number): number {
  return new Exact(value).toDecimalPlaces(places).toNumber();
}
