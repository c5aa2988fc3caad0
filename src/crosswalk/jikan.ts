/**
 * Jikan (unofficial MAL REST API)
 * https://api.jikan.moe/v4
 *
 * GET /manga/{malId}              -> { "data": { "mal_id": 2, "title": "...", ... } }
 * GET /manga?q={query}            -> { "data": [ ... ] }
 * GET /users/{name}/favorites     -> { "data": { "anime": [{ "mal_id": 1 }], "manga": [...] } }
 *
 * Used for manga, which the ID crosswalks cover poorly: a title search
 * finds the MAL ID of an AniList manga, and a MAL ID lookup returns the
 * titles to match against the user's AniList list. Also reads a MAL
 * user's public favourites.
 */

import { z } from 'zod';
import { config } from '../config.js';
import { normalizeTitle, titlesMatch } from '../matching/titles.js';
import { ServiceHttp } from '../utils/http.js';
import type { TitleSet } from '../types.js';
import { JsonCache } from './cache.js';

const mangaSchema = z.object({
  mal_id: z.number().int(),
  title: z.string().nullish(),
  title_english: z.string().nullish(),
  title_japanese: z.string().nullish(),
  title_synonyms: z.array(z.string()).nullish(),
  chapters: z.number().int().nullish(),
  volumes: z.number().int().nullish(),
});

const mangaResponseSchema = z.object({ data: mangaSchema });
const searchResponseSchema = z.object({ data: z.array(mangaSchema) });
const favoritesResponseSchema = z.object({
  data: z.object({
    anime: z.array(z.object({ mal_id: z.number().int() })).default([]),
    manga: z.array(z.object({ mal_id: z.number().int() })).default([]),
  }),
});

const jikanMangaSchema = z.object({
  malId: z.number().int(),
  title: z.string(),
  titleEnglish: z.string(),
  titleJapanese: z.string(),
  synonyms: z.array(z.string()),
  chapters: z.number().int(),
  volumes: z.number().int(),
});

export type JikanManga = z.infer<typeof jikanMangaSchema>;

export interface MalFavorites {
  anime: Set<number>;
  manga: Set<number>;
}

function toJikanManga(data: z.infer<typeof mangaSchema>): JikanManga {
  return {
    malId: data.mal_id,
    title: data.title ?? '',
    titleEnglish: data.title_english ?? '',
    titleJapanese: data.title_japanese ?? '',
    synonyms: data.title_synonyms ?? [],
    chapters: data.chapters ?? 0,
    volumes: data.volumes ?? 0,
  };
}

// =============================================================================
// Title matching
// =============================================================================

/** Every non-empty title Jikan knows for the manga */
export function jikanTitles(manga: JikanManga): string[] {
  return [manga.titleEnglish, manga.titleJapanese, manga.title, ...manga.synonyms].filter(title => title !== '');
}

/** Some title of the entry matches some title of the Jikan record */
export function matchesJikanManga(manga: JikanManga, titles: TitleSet): boolean {
  const known = jikanTitles(manga);
  return [titles.english, titles.native, titles.romaji]
    .filter(title => title !== '')
    .some(title => known.some(other => titlesMatch(title, other)));
}

/** Romaji first, then English; the same normalised query is sent once */
export function searchQueries(titles: TitleSet): string[] {
  const seen = new Set<string>();
  const queries: string[] = [];
  for (const title of [titles.romaji, titles.english]) {
    const normalized = normalizeTitle(title);
    if (!normalized || seen.has(normalized)) continue;
    seen.add(normalized);
    queries.push(title);
  }
  return queries;
}

// =============================================================================
// Cache
// =============================================================================

/**
 * Manga records and search results. A lookup that found nothing is stored
 * as an empty list.
 */
export class JikanCache extends JsonCache<JikanManga[]> {
  constructor(path: string, maxAgeMs = config.crosswalk.jikan.cacheMaxAgeMs) {
    super(path, { schema: z.array(jikanMangaSchema), label: 'JikanCache', maxAgeMs });
  }

  /** undefined = not cached (or expired); null = known miss */
  getManga(malId: number): JikanManga | null | undefined {
    const cached = this.read(`manga_${malId}`);
    if (cached === undefined) return undefined;
    return cached[0] ?? null;
  }

  setManga(malId: number, manga: JikanManga | null): void {
    this.write(`manga_${malId}`, manga ? [manga] : []);
  }

  getSearch(query: string): JikanManga[] | undefined {
    return this.read(`search_${normalizeTitle(query)}`);
  }

  setSearch(query: string, results: JikanManga[]): void {
    this.write(`search_${normalizeTitle(query)}`, results);
  }
}

// =============================================================================
// Client
// =============================================================================

export interface JikanClientOptions {
  baseUrl?: string;
  cache?: JikanCache | null;
  requestsPerSecond?: number;
  maxRetries?: number;
  timeout?: number;
}

export class JikanClient {
  readonly name = 'JikanApi';

  private readonly baseUrl: string;
  private readonly cache: JikanCache | null;
  private readonly http: ServiceHttp;

  constructor(options: JikanClientOptions = {}) {
    this.baseUrl = (options.baseUrl ?? config.crosswalk.jikan.baseUrl).replace(/\/+$/, '');
    this.cache = options.cache ?? null;
    this.http = new ServiceHttp({
      name: 'JikanApi',
      requestsPerSecond: options.requestsPerSecond ?? config.rateLimit.jikan,
      maxRetries: options.maxRetries ?? config.http.maxRetries,
      timeout: options.timeout ?? config.http.timeout,
    });
  }

  /** null when Jikan has no manga with this ID */
  async getManga(malId: number, signal?: AbortSignal): Promise<JikanManga | null> {
    if (malId <= 0) return null;

    const cached = this.cache?.getManga(malId);
    if (cached !== undefined) return cached;

    const response = await this.http.request(`${this.baseUrl}/manga/${malId}`, { signal, allowStatus: [404] });
    if (response.status === 404) {
      this.cache?.setManga(malId, null);
      return null;
    }

    const body: unknown = await response.json();
    const parsed = mangaResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new Error(`JikanApi returned an unexpected response for manga ${malId}`);
    }
    const manga = toJikanManga(parsed.data.data);
    this.cache?.setManga(malId, manga);
    return manga;
  }

  async searchManga(query: string, signal?: AbortSignal): Promise<JikanManga[]> {
    if (query.trim() === '') return [];

    const cached = this.cache?.getSearch(query);
    if (cached) return cached;

    const params = new URLSearchParams({ q: query });
    const response = await this.http.request(`${this.baseUrl}/manga?${params.toString()}`, { signal, allowStatus: [404] });
    if (response.status === 404) return [];

    const body: unknown = await response.json();
    const parsed = searchResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new Error(`JikanApi returned an unexpected search response for "${query}"`);
    }
    const results = parsed.data.data.map(toJikanManga);
    this.cache?.setSearch(query, results);
    return results;
  }

  /**
   * MAL IDs of a user's favourite anime and manga. Public profile data,
   * no token needed. Not cached; favourites change between runs.
   */
  async getUserFavorites(username: string, signal?: AbortSignal): Promise<MalFavorites> {
    if (!username) {
      throw new Error('username cannot be empty');
    }

    const url = `${this.baseUrl}/users/${encodeURIComponent(username)}/favorites`;
    const response = await this.http.request(url, { signal, allowStatus: [404] });
    if (response.status === 404) {
      throw new Error(`user ${username} not found or profile is private`);
    }

    const body: unknown = await response.json();
    const parsed = favoritesResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new Error(`JikanApi returned an unexpected favorites response for ${username}`);
    }
    return {
      anime: new Set(parsed.data.data.anime.map(favorite => favorite.mal_id)),
      manga: new Set(parsed.data.data.manga.map(favorite => favorite.mal_id)),
    };
  }
}
