/**
 * HAR analysis tools — statistics, slowest requests, status distribution and JSON export.
 */

import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import { HarAnalysisError, toError } from "../errors.js";
import { AnalysisSession } from "../har/session.js";
import { DEFAULT_SLOWEST_LIMIT } from "../har/ranking.js";
import { buildExportDocument, writeExportDocument } from "../report/export.js";
import { truncateResult } from "../utils.js";

type ToolResult = { content: Array<{ type: "text"; text: string }> };

function textResult(text: string): ToolResult {
  return { content: [{ type: "text", text }] };
}

function errorResult(e: unknown): ToolResult {
  const detail = e instanceof HarAnalysisError ? { kind: e.kind, path: e.path } : { kind: "internal" };
  return textResult(JSON.stringify({ status: "error", error: toError(e), ...detail }));
}

export function registerAnalysisTools(server: McpServer): void {
  server.tool(
    "har_analyze",
    "Analyze a HAR file: per-phase timing statistics, status distribution and slowest requests.",
    {
      har_file: z.string().describe("Path to the HAR file"),
      top: z.number().int().positive().optional().default(DEFAULT_SLOWEST_LIMIT)
        .describe("Number of slowest requests to include (default: 10)"),
    },
    async ({ har_file, top }) => {
      try {
        const document = buildExportDocument(AnalysisSession.fromFile(har_file).analyze(top));
        return textResult(truncateResult(document.slowest_requests, (slowest, notice) => ({
          status: "success",
          ...document,
          slowest_requests: slowest,
          ...notice,
        })));
      } catch (e) {
        return errorResult(e);
      }
    },
  );

  server.tool(
    "har_slowest_requests",
    "List the slowest requests in a HAR file by total time, slowest first.",
    {
      har_file: z.string().describe("Path to the HAR file"),
      limit: z.number().int().positive().optional().default(DEFAULT_SLOWEST_LIMIT)
        .describe("Max requests to return (default: 10)"),
    },
    async ({ har_file, limit }) => {
      try {
        const session = AnalysisSession.fromFile(har_file);
        const items = session.slowest(limit).map((record) => ({
          url: record.url,
          method: record.method,
          status: record.status,
          total_time_ms: record.totalTime,
          timings: {
            blocked: record.blocked,
            dns: record.dns,
            connect: record.connect,
            ssl: record.ssl,
            send: record.send,
            wait: record.wait,
            receive: record.receive,
          },
        }));
        return textResult(truncateResult(items, (kept, notice) => ({
          status: "success",
          total: session.totalRequests,
          items: kept,
          ...notice,
        })));
      } catch (e) {
        return errorResult(e);
      }
    },
  );

  server.tool(
    "har_status_distribution",
    "Count the requests in a HAR file per HTTP status code (0 = no status).",
    {
      har_file: z.string().describe("Path to the HAR file"),
    },
    async ({ har_file }) => {
      try {
        const session = AnalysisSession.fromFile(har_file);
        return textResult(JSON.stringify({
          status: "success",
          total_requests: session.totalRequests,
          status_distribution: Object.fromEntries(session.statusDistribution()),
        }));
      } catch (e) {
        return errorResult(e);
      }
    },
  );

  server.tool(
    "har_export",
    "Analyze a HAR file and write the analysis as a JSON document.",
    {
      har_file: z.string().describe("Path to the HAR file"),
      output_file: z.string().describe("Destination path for the JSON export"),
      top: z.number().int().positive().optional().default(DEFAULT_SLOWEST_LIMIT)
        .describe("Number of slowest requests to include (default: 10)"),
    },
    async ({ har_file, output_file, top }) => {
      try {
        const result = AnalysisSession.fromFile(har_file).analyze(top);
        writeExportDocument(result, output_file);
        return textResult(JSON.stringify({ status: "success", output_file, total_requests: result.totalRequests }));
      } catch (e) {
        return errorResult(e);
      }
    },
  );
}
