/**
 * Human-readable report, fixed-width columns. All times in milliseconds.
 */

import { TIMING_QUANTITIES, type AnalysisResult } from "../har/types.js";
import { capString, formatMs } from "../utils.js";

const RULE = "=".repeat(80);
const LINE = "-".repeat(80);
const SHORT_LINE = "-".repeat(40);
const URL_MAX = 60;

export function renderReport(result: AnalysisResult): string {
  const lines: string[] = [
    "",
    RULE,
    "HAR File Analysis Summary",
    RULE,
    `File: ${result.sourceFile}`,
    `Total Requests: ${result.totalRequests}`,
    RULE,
    "",
    "HTTP Status Code Distribution:",
    SHORT_LINE,
  ];

  for (const [status, count] of result.statusDistribution) {
    lines.push(`  ${status}: ${count} requests`);
  }
  lines.push("");

  lines.push("Timing Statistics (all times in milliseconds):", LINE);
  lines.push(
    [
      "Phase".padEnd(15),
      "Count".padStart(8),
      "Average".padStart(12),
      "Median".padStart(12),
      "Min".padStart(12),
      "Max".padStart(12),
    ].join(" "),
  );
  lines.push(LINE);
  for (const { key, label } of TIMING_QUANTITIES) {
    const s = result.statistics.get(key);
    if (!s) continue;
    lines.push(
      [
        label.padEnd(15),
        String(s.count).padStart(8),
        formatMs(s.average, 12),
        formatMs(s.median, 12),
        formatMs(s.min, 12),
        formatMs(s.max, 12),
      ].join(" "),
    );
  }
  lines.push("");

  lines.push(`Top ${result.slowestLimit} Slowest Requests:`, LINE);
  result.slowest.forEach((record, i) => {
    const rank = String(i + 1).padStart(2);
    lines.push(
      `${rank}. [${record.status}] ${formatMs(record.totalTime, 8)}ms - ${record.method} ${capString(record.url, URL_MAX)}`,
    );
  });

  lines.push("", RULE, "");
  return lines.join("\n") + "\n";
}
