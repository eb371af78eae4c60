/**
 * SQLite-backed FulltextStore.
 *
 * Table layout (doi_fulltext) and timestamp format are shared with earlier
 * databases, so existing files can be resumed.
 */

import fs from "node:fs";
import path from "node:path";
import Database from "better-sqlite3";
import { z } from "zod";
import type { FulltextRecord } from "../types.js";
import type { FulltextStore } from "./types.js";

const DoiRowSchema = z.object({ doi: z.string() });

const FulltextRowSchema = z.object({
  doi: z.string(),
  url: z.string(),
  error: z.string().nullable(),
  status_code: z.number().int().nullable(),
  content: z.instanceof(Buffer).nullable(),
  content_type: z.string().nullable(),
  last_change: z.string(),
});

const TIMESTAMP_PATTERN = /^(\d{4})-(\d{2})-(\d{2})[ T](\d{2}):(\d{2}):(\d{2})(?:\.(\d{1,6}))?$/;

function pad(value: number, width = 2): string {
  return String(value).padStart(width, "0");
}

/**
 * Format a timestamp as `YYYY-MM-DD HH:MM:SS.ffffff` in local time.
 * The fraction is omitted when it is zero.
 */
export function formatTimestamp(date: Date): string {
  const day = `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
  const time = `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;
  const ms = date.getMilliseconds();
  return ms === 0 ? `${day} ${time}` : `${day} ${time}.${pad(ms * 1000, 6)}`;
}

/** Parse a timestamp written by formatTimestamp (or an ISO-like local time). */
export function parseTimestamp(value: string): Date {
  const match = TIMESTAMP_PATTERN.exec(value);
  if (!match) return new Date(value);
  const [, year, month, day, hours, minutes, seconds, fraction = "0"] = match;
  return new Date(
    Number(year),
    Number(month) - 1,
    Number(day),
    Number(hours),
    Number(minutes),
    Number(seconds),
    Math.floor(Number(fraction.padEnd(6, "0")) / 1000)
  );
}

export class SqliteStore implements FulltextStore {
  private readonly db: Database.Database;

  constructor(dbPath: string) {
    if (dbPath !== ":memory:") {
      fs.mkdirSync(path.dirname(path.resolve(dbPath)), { recursive: true });
    }
    this.db = new Database(dbPath);
    this.prepareTables();
  }

  async existingDois(): Promise<Set<string>> {
    const rows = this.db.prepare("select doi from doi_fulltext where error is null").all();
    return new Set(rows.map((row) => DoiRowSchema.parse(row).doi));
  }

  async insert(record: FulltextRecord): Promise<boolean> {
    const info = this.db
      .prepare(
        `
        insert into doi_fulltext (doi, url, error, status_code, content, content_type, last_change)
        values (@doi, @url, @error, @statusCode, @content, @contentType, @lastChange)
        on conflict (doi, url) do nothing
        `
      )
      .run({
        doi: record.doi,
        url: record.url,
        error: record.error,
        statusCode: record.statusCode,
        content: record.content,
        contentType: record.contentType,
        lastChange: formatTimestamp(record.lastChange),
      });
    return info.changes > 0;
  }

  async listFulltexts(): Promise<FulltextRecord[]> {
    const rows = this.db
      .prepare("select * from doi_fulltext where error is null order by rowid")
      .all();
    return rows.map((row) => {
      const parsed = FulltextRowSchema.parse(row);
      return {
        doi: parsed.doi,
        url: parsed.url,
        error: parsed.error,
        statusCode: parsed.status_code,
        content: parsed.content,
        contentType: parsed.content_type,
        lastChange: parseTimestamp(parsed.last_change),
      };
    });
  }

  async close(): Promise<void> {
    this.db.close();
  }

  private prepareTables(): void {
    // error says what went wrong, if anything (HTTP error, connection error, ...);
    // status_code is the HTTP status, including error statuses.
    this.db.exec(`
      create table if not exists doi_fulltext
      (
          doi text,
          url text,
          error text,
          status_code integer,
          content blob,
          content_type text,
          last_change timestamp,
          constraint doi_fulltext_pk primary key (doi, url)
      )
    `);
  }
}
