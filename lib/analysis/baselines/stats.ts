export interface AmountStats {
  count: number;
  mean: number;
  stdDev: number;
  min: number;
  max: number;
}

/**
 * Count, mean, sample standard deviation (Bessel's correction, n - 1) and range.
 * A single sample has a standard deviation of 0. Returns null for no samples.
 */
export function summarizeAmounts(amounts: number[]): AmountStats | null {
  const count = amounts.length;
  if (count === 0) return null;

  let total = 0;
  let min = amounts[0];
  let max = amounts[0];
  for (const amount of amounts) {
    total += amount;
    if (amount < min) min = amount;
    if (amount > max) max = amount;
  }

  const mean = total / count;
  const squaredDeviations = amounts.reduce((sum, a) => sum + Math.pow(a - mean, 2), 0);
  const variance = count > 1 ? squaredDeviations / (count - 1) : 0;

  return {
    count,
    mean,
    stdDev: Math.sqrt(variance),
    min,
    max,
  };
}
