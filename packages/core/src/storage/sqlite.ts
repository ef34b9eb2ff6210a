/**
 * Local state store using better-sqlite3.
 * Stores settings, audit events, schema snapshots and query history.
 */

import Database from 'better-sqlite3';
import { existsSync, mkdirSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { homedir } from 'node:os';
import { randomUUID } from 'node:crypto';
import type { SchemaSnapshot } from '../db/types.js';
import type { SnapshotStore, StoredSnapshot } from '../schema/cache.js';
import type { AuditLog } from '../power/execute.js';

// ── Schema migrations ────────────────────────────────────────────────

const MIGRATIONS: string[] = [
  // 0: migrations table (always runs first)
  `CREATE TABLE IF NOT EXISTS migrations (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    version INTEGER NOT NULL UNIQUE,
    applied_at TEXT NOT NULL DEFAULT (datetime('now'))
  )`,

  // 1: settings (key-value)
  `CREATE TABLE IF NOT EXISTS settings (
    key TEXT PRIMARY KEY,
    value TEXT
  )`,

  // 2: audit_events
  `CREATE TABLE IF NOT EXISTS audit_events (
    id TEXT PRIMARY KEY,
    seq INTEGER NOT NULL,
    at TEXT NOT NULL DEFAULT (datetime('now')),
    type TEXT NOT NULL,
    payload_json TEXT
  )`,

  // 3: schema_snapshots, one row per cache key
  `CREATE TABLE IF NOT EXISTS schema_snapshots (
    cache_key TEXT PRIMARY KEY,
    stored_at_ms INTEGER NOT NULL,
    snapshot_json TEXT NOT NULL
  )`,

  // 4: queries
  `CREATE TABLE IF NOT EXISTS queries (
    id TEXT PRIMARY KEY,
    seq INTEGER NOT NULL,
    session_id TEXT,
    asked_at TEXT NOT NULL,
    question TEXT NOT NULL,
    kind TEXT NOT NULL
  )`,

  // 5: runs
  `CREATE TABLE IF NOT EXISTS runs (
    id TEXT PRIMARY KEY,
    query_id TEXT NOT NULL,
    ran_at TEXT NOT NULL DEFAULT (datetime('now')),
    sanitized_sql TEXT,
    status TEXT NOT NULL,
    exec_ms INTEGER,
    row_count INTEGER,
    errors_json TEXT NOT NULL,
    FOREIGN KEY (query_id) REFERENCES queries(id)
  )`,
];

// ── Default DB path ──────────────────────────────────────────────────

export function defaultDbPath(): string {
  return join(homedir(), '.askdb', 'askdb.db');
}

export interface AuditEvent {
  id: string;
  at: string;
  type: string;
  payload: Record<string, unknown> | null;
}

type AuditRow = { id: string; at: string; type: string; payload_json: string | null };

type SnapshotRow = { stored_at_ms: number; snapshot_json: string };

function parsePayload(json: string | null): Record<string, unknown> | null {
  if (!json) return null;
  const value: unknown = JSON.parse(json);
  if (value === null || typeof value !== 'object' || Array.isArray(value)) return null;
  return { ...value };
}

function isSnapshot(value: unknown): value is SchemaSnapshot {
  if (value === null || typeof value !== 'object') return false;
  return (
    'tables' in value &&
    Array.isArray(value.tables) &&
    'views' in value &&
    Array.isArray(value.views) &&
    'relationships' in value &&
    Array.isArray(value.relationships)
  );
}

// ── LocalStore ───────────────────────────────────────────────────────

export class LocalStore implements SnapshotStore, AuditLog {
  private db: Database.Database;

  /** Pass `':memory:'` for a throwaway store. */
  constructor(dbPath: string) {
    if (dbPath !== ':memory:') {
      const dir = dirname(dbPath);
      if (!existsSync(dir)) {
        mkdirSync(dir, { recursive: true });
      }
    }

    this.db = new Database(dbPath);
    if (dbPath !== ':memory:') {
      this.db.pragma('journal_mode = WAL');
    }
    this.db.pragma('foreign_keys = ON');
  }

  /** Run all pending migrations */
  migrate(): void {
    this.db.exec(MIGRATIONS[0]);

    const applied = this.db.prepare<[], { version: number }>('SELECT version FROM migrations ORDER BY version').all();
    const appliedSet = new Set(applied.map((r) => r.version));

    const insert = this.db.prepare('INSERT INTO migrations (version) VALUES (?)');

    for (let i = 1; i < MIGRATIONS.length; i++) {
      if (!appliedSet.has(i)) {
        this.db.exec(MIGRATIONS[i]);
        insert.run(i);
      }
    }
  }

  // ── Settings ─────────────────────────────────────────────────────

  setSetting(key: string, value: string): void {
    this.db.prepare('INSERT OR REPLACE INTO settings (key, value) VALUES (?, ?)').run(key, value);
  }

  getSetting(key: string): string | null {
    const row = this.db.prepare<[string], { value: string | null }>('SELECT value FROM settings WHERE key = ?').get(key);
    return row?.value ?? null;
  }

  // ── Audit events ─────────────────────────────────────────────────

  logAudit(type: string, payload?: Record<string, unknown>): void {
    this.db
      .prepare(
        `INSERT INTO audit_events (id, seq, type, payload_json)
         VALUES (?, (SELECT COALESCE(MAX(seq), 0) + 1 FROM audit_events), ?, ?)`,
      )
      .run(randomUUID(), type, payload ? JSON.stringify(payload) : null);
  }

  /** Newest first. */
  listAuditEvents(opts?: { type?: string; limit?: number }): AuditEvent[] {
    const limit = opts?.limit ?? 50;
    const rows = opts?.type
      ? this.db
          .prepare<[string, number], AuditRow>(
            'SELECT id, at, type, payload_json FROM audit_events WHERE type = ? ORDER BY seq DESC LIMIT ?',
          )
          .all(opts.type, limit)
      : this.db
          .prepare<[number], AuditRow>('SELECT id, at, type, payload_json FROM audit_events ORDER BY seq DESC LIMIT ?')
          .all(limit);
    return rows.map((r) => ({ id: r.id, at: r.at, type: r.type, payload: parsePayload(r.payload_json) }));
  }

  // ── Schema snapshots ────────────────────────────────────────────

  saveSnapshot(key: string, snapshot: SchemaSnapshot, storedAtMs: number): void {
    this.db
      .prepare('INSERT OR REPLACE INTO schema_snapshots (cache_key, stored_at_ms, snapshot_json) VALUES (?, ?, ?)')
      .run(key, storedAtMs, JSON.stringify(snapshot));
  }

  /** A row that no longer parses is treated as missing. */
  loadSnapshot(key: string): StoredSnapshot | undefined {
    const row = this.db
      .prepare<[string], SnapshotRow>('SELECT stored_at_ms, snapshot_json FROM schema_snapshots WHERE cache_key = ?')
      .get(key);
    if (!row) return undefined;
    let snapshot: unknown;
    try {
      snapshot = JSON.parse(row.snapshot_json);
    } catch {
      return undefined;
    }
    return isSnapshot(snapshot) ? { snapshot, storedAtMs: row.stored_at_ms } : undefined;
  }

  // ── Lifecycle ────────────────────────────────────────────────────

  getDb(): Database.Database {
    return this.db;
  }

  close(): void {
    this.db.close();
  }
}
