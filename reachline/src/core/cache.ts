/**
 * SQLite cache for loaded tables and computed results.
 * Entries are JSON artifacts keyed by a hash of their inputs, each with an expiry.
 */
import Database from 'better-sqlite3';
import { createHash } from 'node:crypto';
import { mkdir, stat } from 'node:fs/promises';
import { dirname, resolve } from 'node:path';

// ============================================================================
// Types
// ============================================================================

export interface CacheEntryMetadata {
  key: string;
  kind: string;
  storedAt: number;
  expiresAt: number;
}

export interface CacheStats {
  entryCount: number;
  expiredCount: number;
  sizeBytes: number;
  kinds: Record<string, number>;
}

export interface ArtifactCacheOptions {
  /** Clock in epoch milliseconds */
  now?: () => number;
}

export type CacheKeyPart = string | number | boolean | null;

// ============================================================================
// Keys
// ============================================================================

export function cacheKey(parts: readonly CacheKeyPart[]): string {
  return createHash('sha256').update(JSON.stringify(parts)).digest('hex');
}

/**
 * Key for an artifact derived from a file: path, modification time and size,
 * plus any parameters that shaped the artifact.
 */
export async function fileCacheKey(
  path: string,
  params: readonly CacheKeyPart[] = []
): Promise<string> {
  const info = await stat(path);
  return cacheKey([resolve(path), info.mtimeMs, info.size, ...params]);
}

// ============================================================================
// Cache Implementation
// ============================================================================

export class ArtifactCache {
  private db: Database.Database;
  private readonly now: () => number;

  constructor(dbPath: string, options: ArtifactCacheOptions = {}) {
    this.db = new Database(dbPath);
    this.now = options.now ?? Date.now;
    this.init();
  }

  private init(): void {
    if (this.db.name !== ':memory:') {
      this.db.pragma('journal_mode = WAL');
    }

    this.db.exec(`
      CREATE TABLE IF NOT EXISTS artifacts (
        key TEXT PRIMARY KEY,
        kind TEXT NOT NULL,
        data TEXT NOT NULL,
        stored_at INTEGER NOT NULL,
        expires_at INTEGER NOT NULL
      );

      CREATE INDEX IF NOT EXISTS idx_artifacts_kind
        ON artifacts(kind);
    `);
  }

  /**
   * Read an artifact. Expired entries read as missing. Every call returns a
   * freshly parsed copy.
   */
  get<T>(key: string): T | undefined {
    const row = this.db
      .prepare(`SELECT data FROM artifacts WHERE key = ? AND expires_at > ?`)
      .get(key, this.now()) as { data: string } | undefined;

    if (!row) return undefined;
    return JSON.parse(row.data) as T;
  }

  getMetadata(key: string): CacheEntryMetadata | null {
    const row = this.db
      .prepare(`SELECT key, kind, stored_at, expires_at FROM artifacts WHERE key = ?`)
      .get(key) as
      | { key: string; kind: string; stored_at: number; expires_at: number }
      | undefined;

    if (!row) return null;

    return {
      key: row.key,
      kind: row.kind,
      storedAt: row.stored_at,
      expiresAt: row.expires_at,
    };
  }

  set<T>(key: string, kind: string, value: T, ttlMs: number): void {
    const storedAt = this.now();
    this.db
      .prepare(
        `INSERT INTO artifacts (key, kind, data, stored_at, expires_at)
         VALUES (?, ?, ?, ?, ?)
         ON CONFLICT(key) DO UPDATE SET
           kind = excluded.kind,
           data = excluded.data,
           stored_at = excluded.stored_at,
           expires_at = excluded.expires_at`
      )
      .run(key, kind, JSON.stringify(value), storedAt, storedAt + ttlMs);
  }

  /**
   * Return the cached artifact, or compute, store and return it.
   */
  getOrCompute<T>(key: string, kind: string, ttlMs: number, compute: () => T): T {
    const cached = this.get<T>(key);
    if (cached !== undefined) return cached;

    const value = compute();
    this.set(key, kind, value, ttlMs);
    return value;
  }

  async getOrLoad<T>(
    key: string,
    kind: string,
    ttlMs: number,
    load: () => Promise<T>
  ): Promise<T> {
    const cached = this.get<T>(key);
    if (cached !== undefined) return cached;

    const value = await load();
    this.set(key, kind, value, ttlMs);
    return value;
  }

  delete(key: string): void {
    this.db.prepare(`DELETE FROM artifacts WHERE key = ?`).run(key);
  }

  /**
   * Remove expired entries. Returns the number removed.
   */
  evictExpired(): number {
    const result = this.db
      .prepare(`DELETE FROM artifacts WHERE expires_at <= ?`)
      .run(this.now());
    return result.changes;
  }

  clearKind(kind: string): void {
    this.db.prepare(`DELETE FROM artifacts WHERE kind = ?`).run(kind);
  }

  getStats(): CacheStats {
    const now = this.now();
    const entryCount = (
      this.db.prepare(`SELECT COUNT(*) as count FROM artifacts`).get() as { count: number }
    ).count;

    const expiredCount = (
      this.db
        .prepare(`SELECT COUNT(*) as count FROM artifacts WHERE expires_at <= ?`)
        .get(now) as { count: number }
    ).count;

    const sizeBytes = (
      this.db
        .prepare(`SELECT page_count * page_size as size FROM pragma_page_count(), pragma_page_size()`)
        .get() as { size: number }
    ).size;

    const kindRows = this.db
      .prepare(`SELECT kind, COUNT(*) as count FROM artifacts GROUP BY kind`)
      .all() as { kind: string; count: number }[];

    const kinds: Record<string, number> = {};
    for (const row of kindRows) kinds[row.kind] = row.count;

    return { entryCount, expiredCount, sizeBytes, kinds };
  }

  close(): void {
    this.db.close();
  }
}

// ============================================================================
// Factory
// ============================================================================

const DEFAULT_CACHE_PATH = new URL('../../data/cache/artifacts.db', import.meta.url).pathname;

let defaultCache: ArtifactCache | null = null;

export async function getCache(dbPath: string = DEFAULT_CACHE_PATH): Promise<ArtifactCache> {
  if (defaultCache && dbPath === DEFAULT_CACHE_PATH) {
    return defaultCache;
  }

  if (dbPath !== ':memory:') {
    await mkdir(dirname(dbPath), { recursive: true });
  }

  const cache = new ArtifactCache(dbPath);

  if (dbPath === DEFAULT_CACHE_PATH) {
    defaultCache = cache;
  }

  return cache;
}
