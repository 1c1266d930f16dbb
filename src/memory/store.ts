import Database from "better-sqlite3";
import { join } from "node:path";
import { z } from "zod";
import type { ImportantEvent, MemoryEntry } from "./types.js";

const MEMORY_SCHEMA = `
CREATE TABLE IF NOT EXISTS history (
  id              INTEGER PRIMARY KEY AUTOINCREMENT,
  role            TEXT NOT NULL CHECK(role IN ('assistant','user')),
  content         TEXT NOT NULL,
  username        TEXT,
  context_summary TEXT,
  recorded_at     TEXT NOT NULL
);

CREATE TABLE IF NOT EXISTS important_events (
  id          INTEGER PRIMARY KEY AUTOINCREMENT,
  type        TEXT NOT NULL,
  data        TEXT NOT NULL DEFAULT '{}',
  recorded_at TEXT NOT NULL
);
`;

const historyRowSchema = z.object({
  role: z.enum(["assistant", "user"]),
  content: z.string(),
  username: z.string().nullable(),
  context_summary: z.string().nullable(),
  recorded_at: z.string(),
});

const eventRowSchema = z.object({
  type: z.string(),
  data: z.string(),
  recorded_at: z.string(),
});

const eventDataSchema = z.record(z.unknown());

/**
 * SQLite mirror of the conversation window and the important-event log,
 * kept in `memory.db` under the state directory.
 */
export class MemoryStore {
  private readonly db: Database.Database;

  constructor(
    stateDir: string,
    private readonly windowSize: number,
  ) {
    this.db = new Database(join(stateDir, "memory.db"));
    this.db.pragma("journal_mode = WAL");
    this.db.exec(MEMORY_SCHEMA);
  }

  appendEntry(entry: MemoryEntry): void {
    this.db
      .prepare(
        `INSERT INTO history (role, content, username, context_summary, recorded_at)
         VALUES (?, ?, ?, ?, ?)`,
      )
      .run(entry.role, entry.content, entry.username ?? null, entry.contextSummary ?? null, entry.timestamp);
    this.db
      .prepare(
        `DELETE FROM history WHERE id NOT IN (
           SELECT id FROM history ORDER BY id DESC LIMIT ?
         )`,
      )
      .run(this.windowSize);
  }

  appendEvent(event: ImportantEvent): void {
    this.db
      .prepare("INSERT INTO important_events (type, data, recorded_at) VALUES (?, ?, ?)")
      .run(event.type, JSON.stringify(event.data), event.timestamp);
  }

  /** Window entries, oldest first. */
  loadEntries(): MemoryEntry[] {
    const rows = this.db
      .prepare(
        `SELECT role, content, username, context_summary, recorded_at FROM (
           SELECT * FROM history ORDER BY id DESC LIMIT ?
         ) ORDER BY id ASC`,
      )
      .all(this.windowSize);
    return rows.map((row) => {
      const r = historyRowSchema.parse(row);
      return {
        role: r.role,
        content: r.content,
        timestamp: r.recorded_at,
        ...(r.username !== null ? { username: r.username } : {}),
        ...(r.context_summary !== null ? { contextSummary: r.context_summary } : {}),
      };
    });
  }

  loadEvents(): ImportantEvent[] {
    const rows = this.db
      .prepare("SELECT type, data, recorded_at FROM important_events ORDER BY id ASC")
      .all();
    return rows.map((row) => {
      const r = eventRowSchema.parse(row);
      const data = eventDataSchema.safeParse(JSON.parse(r.data));
      return {
        type: r.type,
        timestamp: r.recorded_at,
        data: data.success ? data.data : {},
      };
    });
  }

  clear(): void {
    this.db.exec("DELETE FROM history; DELETE FROM important_events;");
  }

  isOpen(): boolean {
    return this.db.open;
  }

  close(): void {
    if (this.db.open) {
      this.db.close();
    }
  }
}
