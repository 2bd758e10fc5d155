/**
 * Extractor — turns HAR entries into normalized TimingRecords.
 *
 * Only `log.entries` is checked structurally. Each entry is resolved on its own: a missing
 * or mistyped field falls back to its default and never affects neighbouring entries.
 */

import { z } from "zod";
import { HarAnalysisError } from "../errors.js";
import type { TimingRecord } from "./types.js";

const UNKNOWN = "unknown";

const harDocumentSchema = z.object({
  log: z.object({
    entries: z.array(z.unknown()),
  }),
});

function objectOrEmpty(value: unknown): unknown {
  return value !== null && typeof value === "object" && !Array.isArray(value) ? value : {};
}

// -1 is the HAR "not applicable" sentinel; it collapses to 0 along with anything else below zero.
const phase = z
  .number()
  .catch(0)
  .transform((value) => Math.max(0, value));

const harEntrySchema = z.preprocess(
  objectOrEmpty,
  z.object({
    request: z.preprocess(
      objectOrEmpty,
      z.object({
        url: z.string().catch(UNKNOWN),
        method: z.string().catch(UNKNOWN),
      }),
    ),
    response: z.preprocess(objectOrEmpty, z.object({ status: z.number().int().catch(0) })),
    time: z.number().catch(0),
    timings: z.preprocess(
      objectOrEmpty,
      z.object({
        blocked: phase,
        dns: phase,
        connect: phase,
        send: phase,
        wait: phase,
        receive: phase,
        ssl: phase,
      }),
    ),
  }),
);

/**
 * Normalize one raw HAR entry. Pure; never throws.
 */
export function toTimingRecord(entry: unknown): TimingRecord {
  const { request, response, time, timings } = harEntrySchema.parse(entry);
  return {
    url: request.url,
    method: request.method,
    status: response.status,
    totalTime: time,
    ...timings,
  };
}

/**
 * Check the document has `log.entries` and extract one record per entry, in order.
 */
export function extractTimingRecords(document: unknown, sourceFile = "<input>"): TimingRecord[] {
  const parsed = harDocumentSchema.safeParse(document);
  if (!parsed.success) {
    throw new HarAnalysisError("invalid_har", sourceFile, "Error: Invalid HAR file format (missing log.entries).");
  }
  return parsed.data.log.entries.map(toTimingRecord);
}
