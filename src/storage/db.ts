import Database from "better-sqlite3";
import { dirname } from "node:path";
import { ensureDir } from "../config/paths.js";

const SCHEMA_SQL = `
CREATE TABLE IF NOT EXISTS messages (
  id          INTEGER PRIMARY KEY AUTOINCREMENT,
  chat_id     TEXT NOT NULL,
  sender_id   TEXT NOT NULL,
  role        TEXT NOT NULL CHECK(role IN ('user','bot')),
  ts          INTEGER NOT NULL,
  content     TEXT NOT NULL,
  msg_type    TEXT NOT NULL CHECK(msg_type IN ('text','gif'))
);
CREATE INDEX IF NOT EXISTS idx_messages_chat ON messages(chat_id, ts);

CREATE TABLE IF NOT EXISTS conversations (
  chat_id      TEXT PRIMARY KEY,
  chat_kind    TEXT NOT NULL DEFAULT 'direct' CHECK(chat_kind IN ('direct','group')),
  summary      TEXT NOT NULL DEFAULT '',
  last_user_at INTEGER,
  last_bot_at  INTEGER,
  daily_count  INTEGER NOT NULL DEFAULT 0,
  daily_date   TEXT
);

CREATE TABLE IF NOT EXISTS plans (
  id          INTEGER PRIMARY KEY AUTOINCREMENT,
  chat_id     TEXT NOT NULL,
  send_at     INTEGER NOT NULL,
  text        TEXT NOT NULL,
  gif_tag     TEXT,
  status      TEXT NOT NULL CHECK(status IN ('pending','sent','canceled')),
  reason      TEXT NOT NULL DEFAULT '',
  confidence  REAL NOT NULL,
  created_at  INTEGER NOT NULL,
  updated_at  INTEGER NOT NULL
);
CREATE INDEX IF NOT EXISTS idx_plans_status_time ON plans(status, send_at);
CREATE INDEX IF NOT EXISTS idx_plans_chat_pending
  ON plans(chat_id, send_at) WHERE status = 'pending';
`;

export class StateDB {
  private db: Database.Database;

  constructor(path: string) {
    if (path !== ":memory:") ensureDir(dirname(path));
    this.db = new Database(path);
    this.db.pragma("journal_mode = WAL");
    this.db.pragma("busy_timeout = 5000");
    this.db.exec(SCHEMA_SQL);
    this.migrate();
  }

  /**
   * Forward-only migrations for existing databases.
   * Each migration is idempotent (checks before altering).
   */
  private migrate(): void {
    const columns = this.db
      .prepare<[], { name: string }>("PRAGMA table_info(conversations)")
      .all();
    if (columns.length > 0 && !columns.some((c) => c.name === "chat_kind")) {
      this.db.exec("ALTER TABLE conversations ADD COLUMN chat_kind TEXT NOT NULL DEFAULT 'direct'");
    }
  }

  raw(): Database.Database {
    return this.db;
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
