import Database from "better-sqlite3";
import path from "node:path";
import fs from "node:fs";

export const IN_MEMORY = ":memory:";

/** Open (or create) the mailbox database and bring its schema up to date */
export function openDatabase(file: string): Database.Database {
  if (file !== IN_MEMORY) {
    fs.mkdirSync(path.dirname(file), { recursive: true });
  }

  const db = new Database(file);
  db.pragma("journal_mode = WAL");
  db.pragma("foreign_keys = ON");
  db.pragma("busy_timeout = 5000");

  runMigrations(db);
  return db;
}

function runMigrations(db: Database.Database): void {
  db.exec(`
    CREATE TABLE IF NOT EXISTS clients (
      id BLOB PRIMARY KEY CHECK(length(id) = 16),
      name TEXT NOT NULL UNIQUE,
      public_key BLOB NOT NULL,
      last_seen INTEGER NOT NULL,
      created_at INTEGER NOT NULL
    );

    CREATE TABLE IF NOT EXISTS messages (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      recipient_id BLOB NOT NULL REFERENCES clients(id),
      sender_id BLOB NOT NULL REFERENCES clients(id),
      type INTEGER NOT NULL CHECK(type BETWEEN 0 AND 255),
      content BLOB NOT NULL,
      created_at INTEGER NOT NULL
    );

    CREATE INDEX IF NOT EXISTS idx_messages_recipient
      ON messages(recipient_id, id);

    CREATE INDEX IF NOT EXISTS idx_messages_created
      ON messages(created_at);
  `);
}
