import Database from "better-sqlite3";
import * as fs from "fs";
import path from "path";

let db: Database.Database | undefined;

function dbPath(): string {
  return process.env.DB_PATH || path.join(process.cwd(), "data", "guarded-token.sqlite");
}

export function getDb(): Database.Database {
  if (!db) {
    const file = dbPath();
    if (file !== ":memory:") fs.mkdirSync(path.dirname(file), { recursive: true });
    db = new Database(file);
    db.pragma("journal_mode = WAL");
    db.pragma("foreign_keys = ON");
    initSchema(db);
  }
  return db;
}

export function closeDb(): void {
  if (db) {
    db.close();
    db = undefined;
  }
}

function initSchema(db: Database.Database): void {
  db.exec(`
    CREATE TABLE IF NOT EXISTS events (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      event_type TEXT NOT NULL,
      token TEXT NOT NULL,
      data TEXT NOT NULL,
      event_id TEXT NOT NULL UNIQUE,
      seq INTEGER NOT NULL,
      timestamp INTEGER NOT NULL,
      created_at TEXT DEFAULT (datetime('now'))
    );

    CREATE INDEX IF NOT EXISTS idx_events_type ON events(event_type);
    CREATE INDEX IF NOT EXISTS idx_events_token ON events(token);
    CREATE INDEX IF NOT EXISTS idx_events_timestamp ON events(timestamp);

    CREATE TABLE IF NOT EXISTS operations (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      operation TEXT NOT NULL,
      token TEXT NOT NULL,
      actor TEXT NOT NULL,
      amount TEXT,
      target TEXT,
      event_id TEXT NOT NULL UNIQUE,
      created_at TEXT DEFAULT (datetime('now'))
    );

    CREATE INDEX IF NOT EXISTS idx_ops_token ON operations(token);
    CREATE INDEX IF NOT EXISTS idx_ops_actor ON operations(actor);

    CREATE TABLE IF NOT EXISTS webhooks (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      url TEXT NOT NULL,
      events TEXT NOT NULL,
      active INTEGER NOT NULL DEFAULT 1,
      secret TEXT,
      created_at TEXT DEFAULT (datetime('now'))
    );
  `);
}

export interface EventRow {
  id: number;
  event_type: string;
  token: string;
  data: string;
  event_id: string;
  seq: number;
  timestamp: number;
  created_at: string;
}

export interface OperationRow {
  id: number;
  operation: string;
  token: string;
  actor: string;
  amount: string | null;
  target: string | null;
  event_id: string;
  created_at: string;
}

export function insertEvent(
  eventType: string,
  token: string,
  data: object,
  eventId: string,
  seq: number,
  timestamp: number
): void {
  const db = getDb();
  db.prepare(
    `INSERT OR IGNORE INTO events (event_type, token, data, event_id, seq, timestamp) VALUES (?, ?, ?, ?, ?, ?)`
  ).run(eventType, token, JSON.stringify(data), eventId, seq, timestamp);
}

export function insertOperation(
  operation: string,
  token: string,
  actor: string,
  eventId: string,
  amount?: string,
  target?: string
): void {
  const db = getDb();
  db.prepare(
    `INSERT OR IGNORE INTO operations (operation, token, actor, amount, target, event_id) VALUES (?, ?, ?, ?, ?, ?)`
  ).run(operation, token, actor, amount ?? null, target ?? null, eventId);
}

export function getEvents(token?: string, limit = 50, offset = 0): EventRow[] {
  const db = getDb();
  if (token) {
    return db
      .prepare<[string, number, number], EventRow>(`SELECT * FROM events WHERE token = ? ORDER BY id DESC LIMIT ? OFFSET ?`)
      .all(token, limit, offset);
  }
  return db.prepare<[number, number], EventRow>(`SELECT * FROM events ORDER BY id DESC LIMIT ? OFFSET ?`).all(limit, offset);
}

export function getOperations(token?: string, limit = 50, offset = 0): OperationRow[] {
  const db = getDb();
  if (token) {
    return db
      .prepare<[string, number, number], OperationRow>(`SELECT * FROM operations WHERE token = ? ORDER BY id DESC LIMIT ? OFFSET ?`)
      .all(token, limit, offset);
  }
  return db
    .prepare<[number, number], OperationRow>(`SELECT * FROM operations ORDER BY id DESC LIMIT ? OFFSET ?`)
    .all(limit, offset);
}
