/**
 * Structured JSON export of an analysis.
 */

import { renameSync, rmSync, writeFileSync } from "node:fs";
import path from "node:path";
import { HarAnalysisError, toError } from "../errors.js";
import type { AnalysisResult } from "../har/types.js";

export interface ExportedStatBlock {
  count: number;
  total: number;
  average: number;
  median: number;
  min: number;
  max: number;
  std_dev: number;
}

export interface ExportedRequest {
  url: string;
  method: string;
  status: number;
  total_time_ms: number;
}

export interface ExportDocument {
  summary: {
    source_file: string;
    total_requests: number;
    status_distribution: Record<string, number>;
  };
  timing_statistics: Record<string, ExportedStatBlock>;
  slowest_requests: ExportedRequest[];
}

export function buildExportDocument(result: AnalysisResult): ExportDocument {
  const statusDistribution: Record<string, number> = {};
  for (const [status, count] of result.statusDistribution) {
    statusDistribution[String(status)] = count;
  }

  const timingStatistics: Record<string, ExportedStatBlock> = {};
  for (const [key, s] of result.statistics) {
    timingStatistics[key] = {
      count: s.count,
      total: s.total,
      average: s.average,
      median: s.median,
      min: s.min,
      max: s.max,
      std_dev: s.stdDev,
    };
  }

  return {
    summary: {
      source_file: result.sourceFile,
      total_requests: result.totalRequests,
      status_distribution: statusDistribution,
    },
    timing_statistics: timingStatistics,
    slowest_requests: result.slowest.map((record) => ({
      url: record.url,
      method: record.method,
      status: record.status,
      total_time_ms: record.totalTime,
    })),
  };
}

/**
 * Write the export document. The JSON goes to a temporary sibling first and is renamed
 * into place, so the destination is either absent/old or complete.
 */
export function writeExportDocument(result: AnalysisResult, outputFile: string): ExportDocument {
  const document = buildExportDocument(result);
  const tmpFile = path.join(path.dirname(outputFile), `.${path.basename(outputFile)}.${process.pid}.tmp`);
  try {
    writeFileSync(tmpFile, JSON.stringify(document, null, 2), "utf8");
    renameSync(tmpFile, outputFile);
  } catch (e) {
    rmSync(tmpFile, { force: true });
    throw new HarAnalysisError("export_failed", outputFile, `Error: Cannot write export file '${outputFile}': ${toError(e)}`, {
      cause: e,
    });
  }
  return document;
}
