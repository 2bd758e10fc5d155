/**
 * AnalysisSession — the records extracted from one HAR file, and the views computed from them.
 */

import { extractTimingRecords } from "./extractor.js";
import { loadHarDocument } from "./loader.js";
import { DEFAULT_SLOWEST_LIMIT, slowestRequests, statusDistribution } from "./ranking.js";
import { calculateStatistics } from "./statistics.js";
import type { AnalysisResult, StatusDistribution, TimingRecord, TimingStatistics } from "./types.js";

export class AnalysisSession {
  readonly sourceFile: string;
  readonly records: readonly TimingRecord[];

  constructor(sourceFile: string, records: readonly TimingRecord[]) {
    this.sourceFile = sourceFile;
    this.records = Object.freeze(records.map((record) => Object.freeze({ ...record })));
  }

  /** Load, validate and extract a HAR file. Throws HarAnalysisError on any fatal input problem. */
  static fromFile(harFile: string): AnalysisSession {
    const document = loadHarDocument(harFile);
    return new AnalysisSession(harFile, extractTimingRecords(document, harFile));
  }

  get totalRequests(): number {
    return this.records.length;
  }

  statistics(): TimingStatistics {
    return calculateStatistics(this.records);
  }

  slowest(limit = DEFAULT_SLOWEST_LIMIT): TimingRecord[] {
    return slowestRequests(this.records, limit);
  }

  statusDistribution(): StatusDistribution {
    return statusDistribution(this.records);
  }

  /**
   * Compute every view once. The text report and the export both render from this
   * snapshot.
   */
  analyze(slowestLimit = DEFAULT_SLOWEST_LIMIT): AnalysisResult {
    return {
      sourceFile: this.sourceFile,
      totalRequests: this.totalRequests,
      statusDistribution: this.statusDistribution(),
      statistics: this.statistics(),
      slowestLimit,
      slowest: this.slowest(slowestLimit),
    };
  }
}
