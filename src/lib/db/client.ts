import { readFileSync } from "node:fs";

import Database from "better-sqlite3";
import { drizzle, type BetterSQLite3Database } from "drizzle-orm/better-sqlite3";

import { RecordStoreError } from "../../../engine/ai/errors";
import * as schema from "./schema";

export type PavewiseDatabase = BetterSQLite3Database<typeof schema>;

export type DatabaseHandle = {
  sqlite: Database.Database;
  db: PavewiseDatabase;
};

const SCHEMA_SQL_URL = new URL("./schema.sql", import.meta.url);

export function openDatabase(path: string): DatabaseHandle {
  try {
    const sqlite = new Database(path);
    sqlite.pragma("journal_mode = WAL");
    sqlite.pragma("foreign_keys = ON");
    sqlite.exec(readFileSync(SCHEMA_SQL_URL, "utf8"));
    return { sqlite, db: drizzle(sqlite, { schema }) };
  } catch (error) {
    throw new RecordStoreError(`Unable to open assessment database at ${path}`, error);
  }
}

/** Second connection for model-generated queries; file databases open read-only. */
export function openReadonlyConnection(handle: DatabaseHandle): Database.Database {
  if (handle.sqlite.memory) {
    return handle.sqlite;
  }
  return new Database(handle.sqlite.name, { readonly: true, fileMustExist: true });
}
