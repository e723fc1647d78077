import Database from "better-sqlite3";
import { drizzle, type BetterSQLite3Database } from "drizzle-orm/better-sqlite3";

import { createTables } from "./bootstrap";
import * as schema from "./schema";

export type HoaDatabase = BetterSQLite3Database<typeof schema>;

export type DatabaseHandle = {
  db: HoaDatabase;
  close: () => void;
};

/**
 * Open (or create) the SQLite file and make sure every table exists.
 * Pass ":memory:" for a throwaway database.
 */
export function openDatabase(filename: string): DatabaseHandle {
  const sqlite = new Database(filename);
  if (filename !== ":memory:") {
    sqlite.pragma("journal_mode = WAL");
  }
  // Cascading deletes depend on this; SQLite leaves it off per connection.
  sqlite.pragma("foreign_keys = ON");
  createTables(sqlite);

  return {
    db: drizzle(sqlite, { schema }),
    close: () => sqlite.close(),
  };
}
