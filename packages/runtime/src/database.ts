import Database from "better-sqlite3";

/**
 * One connection shared by the snapshot and threshold stores.
 * ":memory:" gives a private throwaway database (tests).
 */
export function openDatabase(filename = "equistat.sqlite"): Database.Database {
  const db = new Database(filename);
  db.pragma("journal_mode = WAL");
  return db;
}
