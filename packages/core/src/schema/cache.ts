/**
 * Schema context cache with an explicit TTL per call.
 *
 * Snapshots live in a SnapshotStore (memory for tests and one-shot runs, the
 * LocalStore for the CLI). At most one refresh per cache instance is in flight;
 * concurrent callers share it.
 */

import type { SchemaSnapshot } from '../db/types.js';
import { buildSchemaContext } from './context.js';

export const DEFAULT_SCHEMA_TTL_SECONDS = 86_400;

export interface SchemaContextSource {
  /** `ttlSeconds = 0` forces a reload */
  getSchemaContext(ttlSeconds?: number): Promise<string>;
  refreshSchemaCache(): Promise<string>;
}

export interface StoredSnapshot {
  snapshot: SchemaSnapshot;
  storedAtMs: number;
}

export interface SnapshotStore {
  loadSnapshot(key: string): StoredSnapshot | undefined;
  saveSnapshot(key: string, snapshot: SchemaSnapshot, storedAtMs: number): void;
}

export class MemorySnapshotStore implements SnapshotStore {
  private readonly entries = new Map<string, StoredSnapshot>();

  loadSnapshot(key: string): StoredSnapshot | undefined {
    return this.entries.get(key);
  }

  saveSnapshot(key: string, snapshot: SchemaSnapshot, storedAtMs: number): void {
    this.entries.set(key, { snapshot, storedAtMs });
  }
}

export interface SchemaCacheOptions {
  /** Identifies the database, e.g. `postgres://host:port/db` */
  key: string;
  loader: () => Promise<SchemaSnapshot>;
  store?: SnapshotStore;
  now?: () => number;
}

export class SchemaCache implements SchemaContextSource {
  private readonly key: string;
  private readonly loader: () => Promise<SchemaSnapshot>;
  private readonly store: SnapshotStore;
  private readonly now: () => number;
  private inFlight: Promise<string> | null = null;

  constructor(opts: SchemaCacheOptions) {
    this.key = opts.key;
    this.loader = opts.loader;
    this.store = opts.store ?? new MemorySnapshotStore();
    this.now = opts.now ?? Date.now;
  }

  async getSchemaContext(ttlSeconds: number = DEFAULT_SCHEMA_TTL_SECONDS): Promise<string> {
    const entry = this.store.loadSnapshot(this.key);
    if (entry && !this.isStale(entry, ttlSeconds)) {
      return buildSchemaContext(entry.snapshot);
    }
    return this.refreshSchemaCache();
  }

  refreshSchemaCache(): Promise<string> {
    if (!this.inFlight) {
      this.inFlight = this.rebuild().finally(() => {
        this.inFlight = null;
      });
    }
    return this.inFlight;
  }

  /** Snapshot currently stored, without loading. */
  peek(): StoredSnapshot | undefined {
    return this.store.loadSnapshot(this.key);
  }

  private async rebuild(): Promise<string> {
    const snapshot = await this.loader();
    this.store.saveSnapshot(this.key, snapshot, this.now());
    return buildSchemaContext(snapshot);
  }

  private isStale(entry: StoredSnapshot, ttlSeconds: number): boolean {
    if (ttlSeconds <= 0) return true;
    if (entry.snapshot.tables.length === 0) return true;
    return this.now() - entry.storedAtMs > ttlSeconds * 1000;
  }
}
