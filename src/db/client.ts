import Database from "better-sqlite3";
import { drizzle } from "drizzle-orm/better-sqlite3";
import type { BetterSQLite3Database } from "drizzle-orm/better-sqlite3";
import * as schema from "./schema.js";
import { StorageError } from "../errors.js";

export type FareDatabase = BetterSQLite3Database<typeof schema>;

export interface DatabaseHandle {
  db: FareDatabase;
  close(): void;
}

const DDL = `
CREATE TABLE IF NOT EXISTS price_observations (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  origin TEXT NOT NULL,
  destination TEXT NOT NULL,
  outbound_date TEXT NOT NULL,
  return_date TEXT NOT NULL,
  stay_days INTEGER NOT NULL,
  outbound_month INTEGER NOT NULL,
  outbound_year INTEGER NOT NULL,
  price REAL NOT NULL,
  currency TEXT NOT NULL,
  carrier TEXT NOT NULL,
  observed_at TEXT NOT NULL
);

CREATE INDEX IF NOT EXISTS idx_price_obs_bucket
  ON price_observations (origin, destination, outbound_year, outbound_month);

CREATE TABLE IF NOT EXISTS claimed_deals (
  fingerprint TEXT PRIMARY KEY,
  origin TEXT NOT NULL,
  destination TEXT NOT NULL,
  outbound_date TEXT NOT NULL,
  return_date TEXT NOT NULL,
  carrier TEXT NOT NULL,
  currency TEXT NOT NULL,
  observed_price REAL NOT NULL,
  baseline_price REAL NOT NULL,
  discount_ratio REAL NOT NULL,
  observation_count INTEGER NOT NULL,
  claimed_at TEXT NOT NULL
);
`;

/** Opens (or creates) the SQLite file and makes sure both tables exist. Use ":memory:" in tests. */
export function openDatabase(path: string): DatabaseHandle {
  try {
    const sqlite = new Database(path);
    sqlite.pragma("journal_mode = WAL");
    sqlite.pragma("busy_timeout = 5000");
    sqlite.exec(DDL);

    return {
      db: drizzle(sqlite, { schema }),
      close: () => sqlite.close(),
    };
  } catch (err) {
    throw new StorageError(`open ${path}`, err);
  }
}
