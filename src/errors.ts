/**
 * Error types shared by the CLI and the MCP tools.
 */

export type HarAnalysisErrorKind =
  | "file_not_found"
  | "file_unreadable"
  | "invalid_json"
  | "invalid_har"
  | "export_failed";

/**
 * Fatal analysis failure. Every kind aborts the run; the message is meant to be shown as-is.
 */
export class HarAnalysisError extends Error {
  readonly kind: HarAnalysisErrorKind;
  readonly path: string;

  constructor(kind: HarAnalysisErrorKind, path: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "HarAnalysisError";
    this.kind = kind;
    this.path = path;
  }
}

export function toError(e: unknown): string {
  if (e instanceof Error) return e.message;
  if (typeof e === "string") return e;
  try {
    return JSON.stringify(e);
  } catch {
    return String(e);
  }
}

export function errorCode(e: unknown): string | undefined {
  if (!e || typeof e !== "object" || !("code" in e)) return undefined;
  return typeof e.code === "string" ? e.code : undefined;
}
