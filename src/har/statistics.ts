import { TIMING_QUANTITIES, type StatBlock, type TimingRecord, type TimingStatistics } from "./types.js";

const EMPTY_BLOCK: StatBlock = { count: 0, total: 0, average: 0, median: 0, min: 0, max: 0, stdDev: 0 };

/**
 * Descriptive statistics for a list of samples. Standard deviation uses the n-1 divisor
 * and is 0 for a single sample; an empty list yields an all-zero block.
 */
export function describe(values: readonly number[]): StatBlock {
  const count = values.length;
  if (count === 0) return { ...EMPTY_BLOCK };

  const sorted = [...values].sort((a, b) => a - b);
  const total = sorted.reduce((sum, value) => sum + value, 0);
  const average = total / count;

  const mid = Math.floor(count / 2);
  const median = count % 2 === 1 ? sorted[mid] : (sorted[mid - 1] + sorted[mid]) / 2;

  let stdDev = 0;
  if (count > 1) {
    const squares = sorted.reduce((sum, value) => sum + (value - average) ** 2, 0);
    stdDev = Math.sqrt(squares / (count - 1));
  }

  return {
    count,
    total,
    average,
    median,
    min: sorted[0],
    max: sorted[count - 1],
    stdDev,
  };
}

/**
 * Per-quantity statistics over the records whose value for that quantity is above zero.
 * Exclusion is per quantity, so a record can count towards DNS but not SSL.
 */
export function calculateStatistics(records: readonly TimingRecord[]): TimingStatistics {
  const stats: TimingStatistics = new Map();
  if (records.length === 0) return stats;

  for (const { key, field } of TIMING_QUANTITIES) {
    const values = records.map((record) => record[field]).filter((value) => value > 0);
    stats.set(key, describe(values));
  }
  return stats;
}
