/**
 * Descriptive statistics for a list of numbers
 *
 * Sample variance (n - 1 denominator), matching what a statistics package
 * reports for a sample. A single value has variance 0.
 */

import { InvalidOperandError } from "../errors.ts";

export interface StatisticsResult {
  mean: number;
  median: number;
  /** Most frequent value, or null when no single value is most frequent */
  mode: number | null;
  min: number;
  max: number;
  range: number;
  variance: number;
  std_dev: number;
}

export function mean(numbers: readonly number[]): number {
  return numbers.reduce((a, b) => a + b, 0) / numbers.length;
}

export function median(numbers: readonly number[]): number {
  const sorted = [...numbers].sort((a, b) => a - b);
  const mid = Math.floor(sorted.length / 2);
  const upper = sorted[mid] ?? Number.NaN;
  if (sorted.length % 2 === 1) return upper;
  const lower = sorted[mid - 1] ?? Number.NaN;
  return (lower + upper) / 2;
}

/** Unique mode, null on ties (including when every value occurs once) */
export function mode(numbers: readonly number[]): number | null {
  const counts = new Map<number, number>();
  for (const n of numbers) {
    counts.set(n, (counts.get(n) ?? 0) + 1);
  }

  let best: number | null = null;
  let bestCount = 0;
  let tied = false;
  for (const [value, count] of counts) {
    if (count > bestCount) {
      best = value;
      bestCount = count;
      tied = false;
    } else if (count === bestCount) {
      tied = true;
    }
  }
  return tied ? null : best;
}

export function sampleVariance(numbers: readonly number[]): number {
  if (numbers.length < 2) return 0;
  const m = mean(numbers);
  const squares = numbers.reduce((sum, x) => sum + (x - m) ** 2, 0);
  return squares / (numbers.length - 1);
}

export function calculateStatistics(numbers: readonly number[]): StatisticsResult {
  if (numbers.length === 0) {
    throw new InvalidOperandError("Cannot calculate statistics on an empty list");
  }

  // No spread into Math.min/max: argument count is bounded by the stack
  const min = numbers.reduce((lo, x) => (x < lo ? x : lo));
  const max = numbers.reduce((hi, x) => (x > hi ? x : hi));
  const variance = sampleVariance(numbers);

  return {
    mean: mean(numbers),
    median: median(numbers),
    mode: mode(numbers),
    min,
    max,
    range: max - min,
    variance,
    std_dev: Math.sqrt(variance),
  };
}
