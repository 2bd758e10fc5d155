/**
 * Shared types for HAR timing analysis.
 */

/** Network phases reported in a HAR entry's `timings` object. */
export const TIMING_PHASES = ["blocked", "dns", "connect", "send", "wait", "receive", "ssl"] as const;

export type TimingPhase = (typeof TIMING_PHASES)[number];

/** One normalized HTTP exchange. All durations are milliseconds; phases are never negative. */
export interface TimingRecord {
  url: string;
  method: string;
  status: number;
  totalTime: number;
  blocked: number;
  dns: number;
  connect: number;
  send: number;
  wait: number;
  receive: number;
  ssl: number;
}

export type TimingField = "totalTime" | TimingPhase;

export interface TimingQuantity {
  /** Key used in exported statistics. */
  key: string;
  field: TimingField;
  label: string;
}

/** The eight measured quantities, in report order. */
export const TIMING_QUANTITIES: readonly TimingQuantity[] = [
  { key: "total_time", field: "totalTime", label: "Total Time" },
  { key: "blocked", field: "blocked", label: "Blocked" },
  { key: "dns", field: "dns", label: "DNS Lookup" },
  { key: "connect", field: "connect", label: "TCP Connect" },
  { key: "send", field: "send", label: "Send Request" },
  { key: "wait", field: "wait", label: "Wait (TTFB)" },
  { key: "receive", field: "receive", label: "Download" },
  { key: "ssl", field: "ssl", label: "SSL/TLS" },
];

export interface StatBlock {
  count: number;
  total: number;
  average: number;
  median: number;
  min: number;
  max: number;
  stdDev: number;
}

/** Statistics keyed by quantity key, in TIMING_QUANTITIES order. Empty when nothing was extracted. */
export type TimingStatistics = Map<string, StatBlock>;

/** Status code / request count pairs, ascending by status. */
export type StatusDistribution = Array<[status: number, count: number]>;

/** Everything the renderers need, computed once per session. */
export interface AnalysisResult {
  sourceFile: string;
  totalRequests: number;
  statusDistribution: StatusDistribution;
  statistics: TimingStatistics;
  slowestLimit: number;
  slowest: TimingRecord[];
}
