import { describe, it } from "node:test";
import assert from "node:assert/strict";
import { extractTimingRecords, toTimingRecord } from "../../src/har/extractor.js";
import { HarAnalysisError } from "../../src/errors.js";
import { harDocument, harEntry, threeEntryHar } from "../fixtures.js";

describe("toTimingRecord", () => {
  it("copies request, response and timing fields", () => {
    const record = toTimingRecord(harEntry({
      url: "https://example.com/api",
      method: "POST",
      status: 201,
      time: 87.5,
      timings: { blocked: 1, dns: 2, connect: 3, send: 4, wait: 5, receive: 6, ssl: 7 },
    }));
    assert.deepEqual(record, {
      url: "https://example.com/api",
      method: "POST",
      status: 201,
      totalTime: 87.5,
      blocked: 1,
      dns: 2,
      connect: 3,
      send: 4,
      wait: 5,
      receive: 6,
      ssl: 7,
    });
  });

  it("normalizes -1 phases to 0", () => {
    const record = toTimingRecord(harEntry({
      time: 10,
      timings: { blocked: -1, dns: -1, connect: -1, send: 0.5, wait: 9, receive: 0.5, ssl: -1 },
    }));
    assert.equal(record.blocked, 0);
    assert.equal(record.dns, 0);
    assert.equal(record.connect, 0);
    assert.equal(record.ssl, 0);
    assert.equal(record.wait, 9);
  });

  it("zeroes every phase when timings is missing but keeps entry time", () => {
    const record = toTimingRecord({ request: { url: "https://example.com/x", method: "GET" }, time: 42 });
    assert.equal(record.totalTime, 42);
    for (const phase of ["blocked", "dns", "connect", "send", "wait", "receive", "ssl"] as const) {
      assert.equal(record[phase], 0);
    }
  });

  it("fills defaults for an empty entry", () => {
    assert.deepEqual(toTimingRecord({}), {
      url: "unknown",
      method: "unknown",
      status: 0,
      totalTime: 0,
      blocked: 0,
      dns: 0,
      connect: 0,
      send: 0,
      wait: 0,
      receive: 0,
      ssl: 0,
    });
  });

  it("treats non-object entries and sections as empty", () => {
    assert.equal(toTimingRecord(null).url, "unknown");
    assert.equal(toTimingRecord("entry").method, "unknown");
    const record = toTimingRecord({ request: "GET /", response: [], timings: 5, time: 3 });
    assert.equal(record.url, "unknown");
    assert.equal(record.status, 0);
    assert.equal(record.dns, 0);
    assert.equal(record.totalTime, 3);
  });

  it("falls back per field when a value has the wrong type", () => {
    const record = toTimingRecord({
      request: { url: 42, method: "DELETE" },
      response: { status: "200" },
      time: "fast",
      timings: { dns: null, wait: "12", receive: 8 },
    });
    assert.equal(record.url, "unknown");
    assert.equal(record.method, "DELETE");
    assert.equal(record.status, 0);
    assert.equal(record.totalTime, 0);
    assert.equal(record.dns, 0);
    assert.equal(record.wait, 0);
    assert.equal(record.receive, 8);
  });
});

describe("extractTimingRecords", () => {
  it("produces one record per entry, in order", () => {
    const records = extractTimingRecords(threeEntryHar());
    assert.equal(records.length, 3);
    assert.deepEqual(records.map((r) => r.url), [
      "https://example.com/a",
      "https://example.com/b",
      "https://example.com/c",
    ]);
  });

  it("keeps malformed entries as default records", () => {
    const records = extractTimingRecords(harDocument([harEntry({ time: 5 }), 7, null, {}]));
    assert.equal(records.length, 4);
    assert.equal(records[0].totalTime, 5);
    assert.equal(records[1].url, "unknown");
    assert.equal(records[3].status, 0);
  });

  it("accepts an empty entries list", () => {
    assert.deepEqual(extractTimingRecords(harDocument([])), []);
  });

  it("rejects a document without log.entries", () => {
    assert.throws(
      () => extractTimingRecords({ log: { version: "1.2" } }, "capture.har"),
      (err: unknown) => err instanceof HarAnalysisError && err.kind === "invalid_har" && err.path === "capture.har",
    );
  });

  it("rejects a document without log", () => {
    assert.throws(() => extractTimingRecords({ entries: [] }), HarAnalysisError);
    assert.throws(() => extractTimingRecords([]), HarAnalysisError);
    assert.throws(() => extractTimingRecords(null), HarAnalysisError);
  });

  it("rejects entries that are not a list", () => {
    assert.throws(
      () => extractTimingRecords({ log: { entries: {} } }),
      { message: "Error: Invalid HAR file format (missing log.entries)." },
    );
  });
});
