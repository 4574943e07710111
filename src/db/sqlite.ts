import Database from "better-sqlite3";
import fs from "node:fs";
import path from "node:path";

export function openDb(dbPath: string) {
  if (dbPath !== ":memory:") {
    const storageDir = path.dirname(path.resolve(dbPath));
    if (!fs.existsSync(storageDir)) fs.mkdirSync(storageDir, { recursive: true });
  }

  const db = new Database(dbPath);
  db.pragma("journal_mode = WAL");
  db.pragma("foreign_keys = ON");
  return db;
}
