/**
 * Crosswalk Cache
 * Persistent lookup caches shared by every pass of a run.
 *
 * File format:
 *   { "entries": { "mal_anime_37341": { "data": { "anilist": 101206, "mal": 37341 }, "cachedAt": "..." } } }
 *
 * Negative lookups are cached too (both IDs null) so a missing mapping is
 * not re-requested on every run. Lookups and stores are synchronous map
 * operations; saves are serialised and only write when something changed.
 */

import { mkdir, readFile, writeFile } from 'fs/promises';
import { mkdirSync, writeFileSync } from 'fs';
import { dirname } from 'path';
import { z } from 'zod';
import { errorMessage } from '../errors.js';
import type { Catalog, MediaKind } from '../types.js';

const cacheFileSchema = z.object({
  entries: z.record(z.object({
    data: z.unknown(),
    cachedAt: z.string(),
  })),
});

interface CacheEntry<T> {
  data: T;
  cachedAt: string;
}

export interface JsonCacheOptions<T> {
  /** Validates each entry's data on load; invalid entries are dropped */
  schema: z.ZodType<T, z.ZodTypeDef, unknown>;
  /** Log prefix */
  label: string;
  /** Entries older than this read as misses. 0 = never expire. */
  maxAgeMs?: number;
}

/**
 * String-keyed JSON file cache. Subclasses build the keys.
 */
export class JsonCache<T> {
  private entries = new Map<string, CacheEntry<T>>();
  private dirty = false;
  private saving: Promise<void> = Promise.resolve();
  private readonly schema: z.ZodType<T, z.ZodTypeDef, unknown>;
  private readonly label: string;
  private readonly maxAgeMs: number;

  constructor(readonly path: string, options: JsonCacheOptions<T>) {
    this.schema = options.schema;
    this.label = options.label;
    this.maxAgeMs = options.maxAgeMs ?? 0;
  }

  get size(): number {
    return this.entries.size;
  }

  get isDirty(): boolean {
    return this.dirty;
  }

  protected read(key: string): T | undefined {
    const entry = this.entries.get(key);
    if (!entry) return undefined;
    if (this.maxAgeMs > 0 && Date.now() - Date.parse(entry.cachedAt) > this.maxAgeMs) {
      return undefined;
    }
    return entry.data;
  }

  protected write(key: string, data: T): void {
    this.entries.set(key, { data, cachedAt: new Date().toISOString() });
    this.dirty = true;
  }

  /**
   * Load the cache file. A missing or unreadable file leaves the cache
   * empty; the run continues without it.
   */
  async load(): Promise<void> {
    let raw: string;
    try {
      raw = await readFile(this.path, 'utf-8');
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') return;
      console.warn(`[${this.label}] Could not read ${this.path}: ${errorMessage(error)} (starting empty)`);
      return;
    }

    let parsed: z.SafeParseReturnType<unknown, z.infer<typeof cacheFileSchema>>;
    try {
      parsed = cacheFileSchema.safeParse(JSON.parse(raw));
    } catch (error) {
      console.warn(`[${this.label}] Could not parse ${this.path}: ${errorMessage(error)} (starting empty)`);
      return;
    }
    if (!parsed.success) {
      console.warn(`[${this.label}] Ignoring malformed cache file ${this.path}`);
      return;
    }

    const entries = new Map<string, CacheEntry<T>>();
    for (const [key, entry] of Object.entries(parsed.data.entries)) {
      const data = this.schema.safeParse(entry.data);
      if (data.success) entries.set(key, { data: data.data, cachedAt: entry.cachedAt });
    }
    this.entries = entries;
    this.dirty = false;
  }

  /**
   * Write the cache if it changed since the last load/save. Concurrent
   * callers queue behind the write in progress.
   */
  save(): Promise<void> {
    const next = this.saving.then(() => this.writeIfDirty());
    // A failed write must not wedge later saves
    this.saving = next.catch(() => undefined);
    return next;
  }

  /** Synchronous flush for crash/signal cleanup handlers */
  saveSync(): void {
    if (!this.dirty) return;
    mkdirSync(dirname(this.path), { recursive: true });
    writeFileSync(this.path, JSON.stringify(this.snapshot(), null, 2));
    this.dirty = false;
  }

  private async writeIfDirty(): Promise<void> {
    if (!this.dirty) return;
    const body = JSON.stringify(this.snapshot(), null, 2);
    this.dirty = false;
    try {
      await mkdir(dirname(this.path), { recursive: true });
      await writeFile(this.path, body);
    } catch (error) {
      this.dirty = true;
      throw error;
    }
  }

  private snapshot(): { entries: Record<string, CacheEntry<T>> } {
    return { entries: Object.fromEntries(this.entries) };
  }
}

// =============================================================================
// ID pairs
// =============================================================================

const cachedIdsSchema = z.object({
  anilist: z.number().int().nullable(),
  mal: z.number().int().nullable(),
});

export type CachedIds = z.infer<typeof cachedIdsSchema>;

export function cacheKey(catalog: Catalog, kind: MediaKind, id: number): string {
  return `${catalog}_${kind}_${id}`;
}

export class CrosswalkCache extends JsonCache<CachedIds> {
  constructor(path: string) {
    super(path, { schema: cachedIdsSchema, label: 'CrosswalkCache' });
  }

  /** undefined = never looked up; a CachedIds with nulls = known miss */
  get(catalog: Catalog, kind: MediaKind, id: number): CachedIds | undefined {
    return this.read(cacheKey(catalog, kind, id));
  }

  set(catalog: Catalog, kind: MediaKind, id: number, data: CachedIds): void {
    this.write(cacheKey(catalog, kind, id), data);
  }
}
