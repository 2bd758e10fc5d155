/**
 * Analyzer options shared by the CLI and the MCP tools.
 */

import { z } from "zod";
import { DEFAULT_SLOWEST_LIMIT } from "./har/ranking.js";

export const analyzerConfigSchema = z.object({
  harFile: z.string().min(1, "HAR file path is required"),
  exportFile: z.string().min(1, "--export requires an output path").optional(),
  // Command-line values arrive as strings.
  top: z
    .union([z.number(), z.string().trim().min(1)])
    .default(DEFAULT_SLOWEST_LIMIT)
    .pipe(
      z.coerce
        .number({ invalid_type_error: "--top must be a number" })
        .int("--top must be an integer")
        .positive("--top must be a positive integer"),
    ),
});

export type AnalyzerConfigInput = z.input<typeof analyzerConfigSchema>;
export type AnalyzerConfig = z.output<typeof analyzerConfigSchema>;

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

export function resolveAnalyzerConfig(input: AnalyzerConfigInput): AnalyzerConfig {
  const parsed = analyzerConfigSchema.safeParse(input);
  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues.map((issue) => issue.message).join("; "));
  }
  return parsed.data;
}
