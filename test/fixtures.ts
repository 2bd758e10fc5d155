import { mkdtempSync, writeFileSync } from "node:fs";
import path from "node:path";
import { tmpdir } from "node:os";

export interface EntryOptions {
  url?: string;
  method?: string;
  status?: number;
  time?: number;
  timings?: Record<string, number>;
}

export function harEntry(opts: EntryOptions): Record<string, unknown> {
  return {
    startedDateTime: "2026-01-01T00:00:00.000Z",
    request: { method: opts.method ?? "GET", url: opts.url ?? "https://example.com/", headers: [] },
    response: { status: opts.status ?? 200, statusText: "", headers: [] },
    time: opts.time ?? 0,
    timings: opts.timings ?? {},
  };
}

export function harDocument(entries: unknown[]): Record<string, unknown> {
  return { log: { version: "1.2", creator: { name: "unit-test", version: "0" }, entries } };
}

/** Three entries: statuses [200, 200, 404], total times [50, 150, 20]. */
export function threeEntryHar(): Record<string, unknown> {
  return harDocument([
    harEntry({
      url: "https://example.com/a",
      status: 200,
      time: 50,
      timings: { blocked: -1, dns: 10, connect: 20, send: 1, wait: 15, receive: 4, ssl: -1 },
    }),
    harEntry({
      url: "https://example.com/b",
      method: "POST",
      status: 200,
      time: 150,
      timings: { blocked: 2, dns: -1, connect: -1, send: 3, wait: 120, receive: 25, ssl: -1 },
    }),
    harEntry({
      url: "https://example.com/c",
      status: 404,
      time: 20,
      timings: { blocked: 0, dns: 0, connect: 0, send: 1, wait: 18, receive: 1, ssl: 0 },
    }),
  ]);
}

export function makeTempDir(): string {
  return mkdtempSync(path.join(tmpdir(), "har-timing-"));
}

export function writeTempFile(dir: string, name: string, content: string | object): string {
  const file = path.join(dir, name);
  writeFileSync(file, typeof content === "string" ? content : JSON.stringify(content), "utf8");
  return file;
}
