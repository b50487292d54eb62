/**
 * Descriptive statistics for metric windows and cross-sections
 */

/** Standard deviations below this are treated as zero. */
export const ZERO_TOLERANCE = 1e-12;

export function mean(values: readonly number[]): number {
  if (values.length === 0) return NaN;
  let sum = 0;
  for (const v of values) sum += v;
  return sum / values.length;
}

function sumSquaredDeviations(values: readonly number[], center: number): number {
  let total = 0;
  for (const v of values) total += (v - center) * (v - center);
  return total;
}

/** Divides by n. */
export function populationStdDev(values: readonly number[]): number {
  if (values.length === 0) return NaN;
  return Math.sqrt(sumSquaredDeviations(values, mean(values)) / values.length);
}

/** Divides by n - 1. */
export function sampleStdDev(values: readonly number[]): number {
  if (values.length < 2) return NaN;
  return Math.sqrt(sumSquaredDeviations(values, mean(values)) / (values.length - 1));
}

/** Ordinary least-squares slope of `ys` against their index 0..n-1. */
export function linearSlope(ys: readonly number[]): number {
  const n = ys.length;
  if (n < 2) return NaN;
  const xMean = (n - 1) / 2;
  const yMean = mean(ys);
  let numerator = 0;
  let denominator = 0;
  for (let i = 0; i < n; i++) {
    numerator += (i - xMean) * (ys[i] - yMean);
    denominator += (i - xMean) * (i - xMean);
  }
  return numerator / denominator;
}

/** ln(p[i] / p[i-1]) for consecutive prices. */
export function logReturns(prices: readonly number[]): number[] {
  const returns: number[] = [];
  for (let i = 1; i < prices.length; i++) {
    returns.push(Math.log(prices[i] / prices[i - 1]));
  }
  return returns;
}
