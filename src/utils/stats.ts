/**
 * Small numeric helpers shared by the calculators
 */

export function sum(values: readonly number[]): number {
  return values.reduce((total, value) => total + value, 0);
}

/**
 * Arithmetic mean, 0 for an empty list
 */
export function mean(values: readonly number[]): number {
  return values.length > 0 ? sum(values) / values.length : 0;
}

/**
 * Population standard deviation
 */
export function stdDev(values: readonly number[]): number {
  if (values.length === 0) {
    return 0;
  }
  const avg = mean(values);
  const variance = values.reduce((total, value) => total + Math.pow(value - avg, 2), 0) / values.length;
  return Math.sqrt(variance);
}

/**
 * Sample variance (n - 1 denominator), 0 below two values
 */
export function sampleVariance(values: readonly number[]): number {
  if (values.length < 2) {
    return 0;
  }
  const avg = mean(values);
  return values.reduce((total, value) => total + Math.pow(value - avg, 2), 0) / (values.length - 1);
}

/**
 * Least-squares slope of values against their index
 */
export function linearSlope(values: readonly number[]): number {
  const n = values.length;
  if (n < 2) {
    return 0;
  }

  const xMean = (n - 1) / 2;
  const yMean = mean(values);
  let numerator = 0;
  let denominator = 0;

  for (let i = 0; i < n; i++) {
    numerator += (i - xMean) * (values[i] - yMean);
    denominator += Math.pow(i - xMean, 2);
  }

  return denominator === 0 ? 0 : numerator / denominator;
}

/**
 * Percent change from previous to current; null when previous is 0 and current is not
 */
export function percentChange(current: number, previous: number): number | null {
  if (previous === 0) {
    return current === 0 ? 0 : null;
  }
  return round1(((current - previous) / Math.abs(previous)) * 100);
}

export function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value));
}

export function round1(value: number): number {
  return Math.round(value * 10) / 10;
}

/**
 * Replace NaN, infinities and negatives with 0
 */
export function nonNegative(value: number): number {
  return Number.isFinite(value) && value > 0 ? value : 0;
}
