const outlierMultiplier = 1.5; // Tukey's fence multiplier

/** @return mean of values */
export function average(values: readonly number[]): number {
  if (isConstant(values)) return values[0];
  const sum = values.reduce((a, b) => a + b, 0);
  return sum / values.length;
}

/** @return middle value, or mean of the two middle values for even lengths */
export function median(values: readonly number[]): number {
  const sorted = sortAscending(values);
  const n = sorted.length;
  if (n === 0) return 0;
  const mid = Math.floor(n / 2);
  return n % 2 === 1 ? sorted[mid] : (sorted[mid - 1] + sorted[mid]) / 2;
}

/** @return standard deviation with Bessel's correction */
export function standardDeviation(samples: readonly number[]): number {
  if (samples.length <= 1 || isConstant(samples)) return 0;
  const mean = average(samples);
  const variance =
    samples.reduce((sum, x) => sum + (x - mean) ** 2, 0) / (samples.length - 1);
  return Math.sqrt(variance);
}

/** @return relative standard deviation (coefficient of variation) */
export function coefficientOfVariation(samples: readonly number[]): number {
  const mean = average(samples);
  if (mean === 0) return 0;
  const stdDev = standardDeviation(samples);
  return stdDev / mean;
}

/**
 * Linear interpolation between adjacent order statistics.
 *
 * @param sortedValues ascending; not re-sorted here
 * @param p percentile in [0, 100]
 * @return 0 for an empty input
 */
export function percentile(sortedValues: readonly number[], p: number): number {
  const n = sortedValues.length;
  if (n === 0) return 0;
  if (n === 1) return sortedValues[0];

  const rank = (p / 100) * (n - 1);
  const lowerIndex = Math.floor(rank);
  const upperIndex = Math.min(lowerIndex + 1, n - 1);
  const weight = rank - lowerIndex;
  const lower = sortedValues[lowerIndex];
  const upper = sortedValues[upperIndex];
  return lower * (1 - weight) + upper * weight;
}

/** @return median absolute deviation for robust variability measure */
export function medianAbsoluteDeviation(samples: readonly number[]): number {
  const center = median(samples);
  const deviations = samples.map(x => Math.abs(x - center));
  return median(deviations);
}

/** @return outliers detected via Tukey's interquartile range method */
export function findOutliers(samples: readonly number[]): {
  rate: number;
  indices: number[];
} {
  if (samples.length === 0) return { rate: 0, indices: [] };
  const sorted = sortAscending(samples);
  const q1 = percentile(sorted, 25);
  const q3 = percentile(sorted, 75);
  const iqr = q3 - q1;
  const lowerBound = q1 - outlierMultiplier * iqr;
  const upperBound = q3 + outlierMultiplier * iqr;

  const indices = samples
    .map((v, i) => (v < lowerBound || v > upperBound ? i : -1))
    .filter(i => i >= 0);
  return { rate: indices.length / samples.length, indices };
}

/** @return ascending copy of values */
export function sortAscending(values: readonly number[]): number[] {
  return [...values].sort((a, b) => a - b);
}

/** @return true for a non-empty sample of one repeated value */
function isConstant(values: readonly number[]): boolean {
  return values.length > 0 && values.every(v => v === values[0]);
}
