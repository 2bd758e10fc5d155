/**
 * HAR loader — reads a capture from disk and parses it as JSON. All-or-nothing.
 */

import { readFileSync } from "node:fs";
import { HarAnalysisError, errorCode, toError } from "../errors.js";

export function loadHarDocument(harFile: string): unknown {
  let raw: string;
  try {
    raw = readFileSync(harFile, "utf8");
  } catch (e) {
    if (errorCode(e) === "ENOENT") {
      throw new HarAnalysisError("file_not_found", harFile, `Error: File '${harFile}' not found.`, { cause: e });
    }
    throw new HarAnalysisError("file_unreadable", harFile, `Error: Cannot read file '${harFile}': ${toError(e)}`, {
      cause: e,
    });
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (e) {
    throw new HarAnalysisError("invalid_json", harFile, `Error: Invalid JSON in HAR file: ${toError(e)}`, { cause: e });
  }
  return parsed;
}
