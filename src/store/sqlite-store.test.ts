/**
 * Tests for the SQLite store.
 */

import { afterEach, beforeEach, describe, expect, it } from "vitest";
import type { FulltextRecord } from "../types.js";
import { formatTimestamp, parseTimestamp, SqliteStore } from "./sqlite-store.js";

function createRecord(overrides: Partial<FulltextRecord> = {}): FulltextRecord {
  return {
    doi: "10.1234/example",
    url: "https://example.com/a.pdf",
    error: null,
    statusCode: 200,
    content: Buffer.from("%PDF-1.4"),
    contentType: "pdf",
    lastChange: new Date(2024, 0, 2, 3, 4, 5, 678),
    ...overrides,
  };
}

describe("formatTimestamp", () => {
  it("writes local time with microseconds", () => {
    expect(formatTimestamp(new Date(2024, 0, 2, 3, 4, 5, 678))).toBe("2024-01-02 03:04:05.678000");
  });

  it("omits a zero fraction", () => {
    expect(formatTimestamp(new Date(2024, 11, 31, 23, 59, 59, 0))).toBe("2024-12-31 23:59:59");
  });
});

describe("parseTimestamp", () => {
  it("reads timestamps with and without a fraction", () => {
    expect(parseTimestamp("2024-01-02 03:04:05.678000")).toEqual(new Date(2024, 0, 2, 3, 4, 5, 678));
    expect(parseTimestamp("2024-12-31 23:59:59")).toEqual(new Date(2024, 11, 31, 23, 59, 59, 0));
  });
});

describe("SqliteStore", () => {
  let store: SqliteStore;

  beforeEach(() => {
    store = new SqliteStore(":memory:");
  });

  afterEach(async () => {
    await store.close();
  });

  it("stores and lists full texts", async () => {
    const record = createRecord();

    expect(await store.insert(record)).toBe(true);
    expect(await store.listFulltexts()).toEqual([record]);
  });

  it("keeps the first row for a (doi, url) pair", async () => {
    expect(await store.insert(createRecord())).toBe(true);
    expect(await store.insert(createRecord({ content: Buffer.from("%PDF-2.0") }))).toBe(false);

    const rows = await store.listFulltexts();
    expect(rows).toHaveLength(1);
    expect(rows[0]?.content?.toString()).toBe("%PDF-1.4");
  });

  it("stores several URLs for one DOI", async () => {
    await store.insert(createRecord());
    await store.insert(createRecord({ url: "https://example.com/a.xml", contentType: "xml" }));

    expect((await store.listFulltexts()).map((r) => r.url)).toEqual([
      "https://example.com/a.pdf",
      "https://example.com/a.xml",
    ]);
  });

  it("reports DOIs that already have a full text without error", async () => {
    await store.insert(createRecord());
    await store.insert(
      createRecord({
        doi: "10.1234/failed",
        error: "HTTP error: 404 Not Found",
        statusCode: 404,
        content: null,
        contentType: null,
      })
    );

    expect(await store.existingDois()).toEqual(new Set(["10.1234/example"]));
    expect((await store.listFulltexts()).map((r) => r.doi)).toEqual(["10.1234/example"]);
  });
});
