/**
 * anime-offline-database crosswalk
 *
 * Reads a local copy of manami-project's anime-offline-database JSON
 * (https://github.com/manami-project/anime-offline-database) and indexes the
 * MAL <-> AniList pairs found in each entry's source URLs. Anime only.
 */

import { readFile } from 'fs/promises';
import { z } from 'zod';
import { errorMessage } from '../errors.js';
import type { Catalog, MediaKind } from '../types.js';
import type { CrosswalkProvider } from './provider.js';

const MAL_PREFIX = 'https://myanimelist.net/anime/';
const ANILIST_PREFIX = 'https://anilist.co/anime/';

const offlineEntrySchema = z.object({
  sources: z.array(z.string()),
  title: z.string().optional(),
  type: z.string().optional(),
});

const offlineFileSchema = z.object({
  lastUpdate: z.string().optional(),
  data: z.array(offlineEntrySchema),
});

export type OfflineEntry = z.infer<typeof offlineEntrySchema>;

/**
 * "https://myanimelist.net/anime/1535" with the MAL prefix -> 1535.
 * Anything else after the prefix (paths, junk) is rejected.
 */
export function extractIdFromUrl(url: string, prefix: string): number | null {
  if (!url.startsWith(prefix)) return null;
  const rest = url.slice(prefix.length);
  if (!/^\d+$/.test(rest)) return null;
  const id = Number(rest);
  return id > 0 ? id : null;
}

export class OfflineDatabase implements CrosswalkProvider {
  readonly name = 'OfflineDatabase';
  readonly kinds: readonly MediaKind[] = ['anime'];
  readonly networked = false;

  private readonly malToAniList = new Map<number, number>();
  private readonly aniListToMal = new Map<number, number>();

  constructor(readonly lastUpdate: string | null = null) {}

  static fromEntries(entries: OfflineEntry[], lastUpdate: string | null = null): OfflineDatabase {
    const db = new OfflineDatabase(lastUpdate);
    for (const entry of entries) {
      db.index(entry);
    }
    return db;
  }

  get size(): number {
    return this.malToAniList.size;
  }

  getAniListId(malId: number): number | null {
    return this.malToAniList.get(malId) ?? null;
  }

  getMalId(anilistId: number): number | null {
    return this.aniListToMal.get(anilistId) ?? null;
  }

  async lookup(from: Catalog, kind: MediaKind, id: number): Promise<number | null> {
    if (kind !== 'anime') return null;
    return from === 'mal' ? this.getAniListId(id) : this.getMalId(id);
  }

  private index(entry: OfflineEntry): void {
    let malId: number | null = null;
    let anilistId: number | null = null;
    for (const url of entry.sources) {
      malId ??= extractIdFromUrl(url, MAL_PREFIX);
      anilistId ??= extractIdFromUrl(url, ANILIST_PREFIX);
    }
    if (malId !== null && anilistId !== null) {
      this.malToAniList.set(malId, anilistId);
      this.aniListToMal.set(anilistId, malId);
    }
  }
}

/**
 * Load the database file. Returns null when no path is configured or the
 * file cannot be read, which leaves the strategy out of the chain.
 */
export async function loadOfflineDatabase(path: string): Promise<OfflineDatabase | null> {
  if (!path) return null;

  try {
    const raw = await readFile(path, 'utf-8');
    const parsed = offlineFileSchema.safeParse(JSON.parse(raw));
    if (!parsed.success) {
      console.warn(`[OfflineDatabase] ${path} is not an anime-offline-database file, skipping`);
      return null;
    }
    const db = OfflineDatabase.fromEntries(parsed.data.data, parsed.data.lastUpdate ?? null);
    console.log(`[OfflineDatabase] Loaded ${db.size} MAL/AniList pairs (updated ${db.lastUpdate ?? 'unknown'})`);
    return db;
  } catch (error) {
    console.warn(`[OfflineDatabase] Could not load ${path}: ${errorMessage(error)}`);
    return null;
  }
}
