/**
 * listsync Database Operations
 * SQLite state: unmapped entries and sync run history
 */

import Database from 'better-sqlite3';
import { mkdirSync, readFileSync } from 'fs';
import { join, dirname } from 'path';
import { fileURLToPath } from 'url';
import { randomUUID } from 'crypto';
import { config } from '../config.js';
import { registerCleanup } from '../utils/resilience.js';
import type { MediaKind, SyncDirection } from '../types.js';

const __dirname = dirname(fileURLToPath(import.meta.url));

let db: Database.Database | null = null;

/**
 * Initialize database connection and schema
 */
export function initDatabase(path: string = config.database.path): Database.Database {
  if (db) return db;

  try {
    if (path !== ':memory:') {
      mkdirSync(dirname(path), { recursive: true });
    }
    db = new Database(path);
    db.pragma('journal_mode = WAL');
    db.pragma('busy_timeout = 5000'); // Wait up to 5s if DB is locked

    // Run schema
    const schema = readFileSync(join(__dirname, 'schema.sql'), 'utf-8');
    db.exec(schema);

    // Register cleanup so DB closes on crash/signal
    registerCleanup(() => closeDatabase());

    console.log(`[Database] Initialized at ${path}`);
    return db;
  } catch (error) {
    console.error(`[Database] FATAL: Failed to initialize database at ${path}:`, error);
    throw error;
  }
}

/**
 * Get database instance
 */
export function getDb(): Database.Database {
  if (!db) {
    return initDatabase();
  }
  return db;
}

/**
 * Close database connection
 */
export function closeDatabase(): void {
  if (db) {
    db.close();
    db = null;
  }
}

// =============================================================================
// Unmapped Entries
// =============================================================================

export interface UnmappedEntry {
  anilistId: number;
  malId: number;
  title: string;
  mediaKind: MediaKind;
  direction: SyncDirection;
  reason: string;
}

interface UnmappedRow {
  anilist_id: number;
  mal_id: number;
  title: string;
  media_kind: MediaKind;
  direction: SyncDirection;
  reason: string;
}

/**
 * Replace the unmapped list for one kind/direction with the latest sync's.
 */
export function saveUnmappedEntries(mediaKind: MediaKind, direction: SyncDirection, entries: UnmappedEntry[]): void {
  const instance = getDb();
  const remove = instance.prepare<[MediaKind, SyncDirection]>(
    'DELETE FROM unmapped_entry WHERE media_kind = ? AND direction = ?'
  );
  const insert = instance.prepare<[number, number, string, MediaKind, SyncDirection, string]>(`
    INSERT INTO unmapped_entry (anilist_id, mal_id, title, media_kind, direction, reason)
    VALUES (?, ?, ?, ?, ?, ?)
  `);

  const replace = instance.transaction((rows: UnmappedEntry[]) => {
    remove.run(mediaKind, direction);
    for (const row of rows) {
      insert.run(row.anilistId, row.malId, row.title, mediaKind, direction, row.reason);
    }
  });
  replace(entries);
}

export function getUnmappedEntries(filter: { mediaKind?: MediaKind; direction?: SyncDirection } = {}): UnmappedEntry[] {
  const rows = getDb().prepare<{ kind: string | null; direction: string | null }, UnmappedRow>(`
    SELECT anilist_id, mal_id, title, media_kind, direction, reason
    FROM unmapped_entry
    WHERE (@kind IS NULL OR media_kind = @kind) AND (@direction IS NULL OR direction = @direction)
    ORDER BY media_kind, direction, title
  `).all({ kind: filter.mediaKind ?? null, direction: filter.direction ?? null });

  return rows.map(row => ({
    anilistId: row.anilist_id,
    malId: row.mal_id,
    title: row.title,
    mediaKind: row.media_kind,
    direction: row.direction,
    reason: row.reason,
  }));
}

export function clearUnmappedEntries(): number {
  return getDb().prepare('DELETE FROM unmapped_entry').run().changes;
}

// =============================================================================
// Sync Runs
// =============================================================================

export interface SyncRunRecord {
  id: string;
  mediaKind: MediaKind;
  direction: SyncDirection;
  dryRun: boolean;
  forceSync: boolean;
  truncated: boolean;
  total: number;
  updated: number;
  skipped: number;
  errors: number;
  dryRunCount: number;
  conflicts: number;
  startedAt: string;
  finishedAt: string;
}

interface SyncRunRow {
  id: string;
  media_kind: MediaKind;
  direction: SyncDirection;
  dry_run: number;
  force_sync: number;
  truncated: number;
  total: number;
  updated: number;
  skipped: number;
  errors: number;
  dry_run_count: number;
  conflicts: number;
  started_at: string;
  finished_at: string;
}

export function recordSyncRun(run: Omit<SyncRunRecord, 'id'>): string {
  const id = randomUUID();
  getDb().prepare<[
    string, string, string, number, number, number,
    number, number, number, number, number, number, string, string,
  ]>(`
    INSERT INTO sync_run (id, media_kind, direction, dry_run, force_sync, truncated,
                          total, updated, skipped, errors, dry_run_count, conflicts, started_at, finished_at)
    VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
  `).run(
    id, run.mediaKind, run.direction, run.dryRun ? 1 : 0, run.forceSync ? 1 : 0, run.truncated ? 1 : 0,
    run.total, run.updated, run.skipped, run.errors, run.dryRunCount, run.conflicts, run.startedAt, run.finishedAt,
  );
  return id;
}

export function getRecentRuns(limit = 10): SyncRunRecord[] {
  const rows = getDb().prepare<[number], SyncRunRow>(
    'SELECT * FROM sync_run ORDER BY finished_at DESC, rowid DESC LIMIT ?'
  ).all(limit);

  return rows.map(row => ({
    id: row.id,
    mediaKind: row.media_kind,
    direction: row.direction,
    dryRun: row.dry_run === 1,
    forceSync: row.force_sync === 1,
    truncated: row.truncated === 1,
    total: row.total,
    updated: row.updated,
    skipped: row.skipped,
    errors: row.errors,
    dryRunCount: row.dry_run_count,
    conflicts: row.conflicts,
    startedAt: row.started_at,
    finishedAt: row.finished_at,
  }));
}
