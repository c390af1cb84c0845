/**
 * Arithmetic mean, or undefined for an empty list.
 */
export function mean(values: readonly number[]): number | undefined {
  if (values.length === 0) {
    return undefined;
  }
  let sum = 0;
  for (const value of values) {
    sum += value;
  }
  return sum / values.length;
}

/**
 * Sample standard deviation (n - 1 denominator).
 *
 * @returns undefined for fewer than two values, where the statistic is not defined
 *
 * @example
 * sampleStandardDeviation([10, 20]) // 7.0710678...
 * sampleStandardDeviation([5]) // undefined
 */
export function sampleStandardDeviation(values: readonly number[]): number | undefined {
  const average = mean(values);
  if (average === undefined || values.length < 2) {
    return undefined;
  }
  let squares = 0;
  for (const value of values) {
    squares += (value - average) ** 2;
  }
  return Math.sqrt(squares / (values.length - 1));
}
