import { mean, sampleVariance } from '../../utils/stats';

/**
 * Descriptive size of the gap between two group means.
 * A qualitative band only, not a hypothesis test.
 */
export type EffectSizeBand = 'none' | 'small' | 'medium' | 'large' | 'insufficient_data';

export interface EffectSize {
  /** |mean difference| / pooled standard deviation; null when undefined */
  value: number | null;
  band: EffectSizeBand;
}

export const MIN_GROUP_SIZE = 5;

export function pooledStdDev(a: readonly number[], b: readonly number[]): number {
  const degrees = a.length + b.length - 2;
  if (degrees <= 0) {
    return 0;
  }
  const pooled = ((a.length - 1) * sampleVariance(a) + (b.length - 1) * sampleVariance(b)) / degrees;
  return Math.sqrt(pooled);
}

export function effectSizeBand(value: number): EffectSizeBand {
  if (value < 0.2) {
    return 'none';
  }
  if (value < 0.5) {
    return 'small';
  }
  if (value < 0.8) {
    return 'medium';
  }
  return 'large';
}

/**
 * Needs five values per group. Two groups without spread
 * but with different means count as a large effect.
 */
export function calculateEffectSize(a: readonly number[], b: readonly number[]): EffectSize {
  if (a.length < MIN_GROUP_SIZE || b.length < MIN_GROUP_SIZE) {
    return { value: null, band: 'insufficient_data' };
  }

  const difference = Math.abs(mean(a) - mean(b));
  const pooled = pooledStdDev(a, b);

  if (pooled === 0) {
    return { value: null, band: difference === 0 ? 'none' : 'large' };
  }

  const value = difference / pooled;
  return { value: Math.round(value * 100) / 100, band: effectSizeBand(value) };
}
