import Database from "better-sqlite3";
import fs from "node:fs";
import path from "node:path";
import type { RecentFiles } from "../host/types.js";

export type RecentFileRecord = {
  path: string;
  openedAt: number;
};

type RecentFileRow = {
  path: string;
  opened_at: number;
};

export type SqliteRecentFilesOptions = {
  maxItems?: number;
  now?: () => number;
};

export class SqliteRecentFiles implements RecentFiles {
  private readonly db: Database.Database;
  private readonly maxItems: number;
  private readonly now: () => number;

  constructor(dbPath: string, opts: SqliteRecentFilesOptions = {}) {
    if (dbPath !== ":memory:") fs.mkdirSync(path.dirname(dbPath), { recursive: true });
    this.db = new Database(dbPath);
    this.db.pragma("journal_mode = WAL");
    this.maxItems = Math.max(1, opts.maxItems ?? 20);
    this.now = opts.now ?? Date.now;
    this.migrate();
  }

  private migrate(): void {
    this.db.exec(`
      create table if not exists recent_files (
        path text primary key,
        opened_at integer not null
      );

      create index if not exists idx_recent_files_opened_at on recent_files(opened_at desc);
    `);
  }

  add(file: string): void {
    const openedAt = this.now();
    const tx = this.db.transaction(() => {
      this.db
        .prepare(
          `insert into recent_files (path, opened_at) values (?, ?)
           on conflict(path) do update set opened_at = excluded.opened_at`,
        )
        .run(path.resolve(file), openedAt);
      this.db
        .prepare(
          `delete from recent_files where path not in (
             select path from recent_files order by opened_at desc, rowid desc limit ?
           )`,
        )
        .run(this.maxItems);
    });
    tx();
  }

  list(limit = this.maxItems): RecentFileRecord[] {
    const rows = this.db
      .prepare<[number], RecentFileRow>(
        `select path, opened_at from recent_files order by opened_at desc, rowid desc limit ?`,
      )
      .all(limit);
    return rows.map((r) => ({ path: r.path, openedAt: r.opened_at }));
  }

  clear(): void {
    this.db.prepare("delete from recent_files").run();
  }

  close(): void {
    this.db.close();
  }
}
