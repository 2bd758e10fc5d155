import type { StatusDistribution, TimingRecord } from "./types.js";

export const DEFAULT_SLOWEST_LIMIT = 10;

/**
 * The `limit` slowest records by total time. Array.prototype.sort is stable, so equal
 * times keep their extraction order.
 */
export function slowestRequests(records: readonly TimingRecord[], limit = DEFAULT_SLOWEST_LIMIT): TimingRecord[] {
  return [...records].sort((a, b) => b.totalTime - a.totalTime).slice(0, Math.max(0, limit));
}

/**
 * Request counts per status code, ascending. Status 0 (no response status) is its own bucket.
 */
export function statusDistribution(records: readonly TimingRecord[]): StatusDistribution {
  const counts = new Map<number, number>();
  for (const record of records) {
    counts.set(record.status, (counts.get(record.status) ?? 0) + 1);
  }
  return [...counts.entries()].sort(([a], [b]) => a - b);
}
