/**
 * Hato crosswalk
 * https://hato.malupdaterosx.moe
 *
 * GET /api/mappings/{mal|anilist}/{anime|manga}/{id}
 *   -> { "data": { "anilist_id": 1, "mal_id": 2, ... } }
 *
 * Covers both anime and manga.
 */

import { z } from 'zod';
import { config } from '../config.js';
import { ServiceHttp } from '../utils/http.js';
import type { Catalog, MediaKind } from '../types.js';
import type { CrosswalkCache } from './cache.js';
import type { CrosswalkProvider } from './provider.js';

const hatoResponseSchema = z.object({
  data: z.object({
    anilist_id: z.number().int().nullable().optional(),
    mal_id: z.number().int().nullable().optional(),
  }).nullable().optional(),
});

export interface HatoClientOptions {
  baseUrl?: string;
  cache?: CrosswalkCache | null;
  requestsPerSecond?: number;
  maxRetries?: number;
  timeout?: number;
}

export class HatoClient implements CrosswalkProvider {
  readonly name = 'HatoApi';
  readonly kinds: readonly MediaKind[] = ['anime', 'manga'];
  readonly networked = true;

  private readonly baseUrl: string;
  private readonly cache: CrosswalkCache | null;
  private readonly http: ServiceHttp;

  constructor(options: HatoClientOptions = {}) {
    this.baseUrl = (options.baseUrl ?? config.crosswalk.hato.baseUrl).replace(/\/+$/, '');
    this.cache = options.cache ?? null;
    this.http = new ServiceHttp({
      name: 'HatoApi',
      requestsPerSecond: options.requestsPerSecond ?? config.rateLimit.hato,
      maxRetries: options.maxRetries ?? config.http.maxRetries,
      timeout: options.timeout ?? config.http.timeout,
    });
  }

  async lookup(from: Catalog, kind: MediaKind, id: number, signal?: AbortSignal): Promise<number | null> {
    const cached = this.cache?.get(from, kind, id);
    if (cached) {
      return from === 'mal' ? cached.anilist : cached.mal;
    }

    const url = `${this.baseUrl}/api/mappings/${from}/${kind}/${id}`;
    const response = await this.http.request(url, { signal, allowStatus: [404] });

    let anilist: number | null = null;
    let mal: number | null = null;
    if (response.status !== 404) {
      const body: unknown = await response.json();
      const parsed = hatoResponseSchema.safeParse(body);
      if (!parsed.success) {
        throw new Error(`HatoApi returned an unexpected response for ${from} ${kind} ${id}`);
      }
      anilist = parsed.data.data?.anilist_id ?? null;
      mal = parsed.data.data?.mal_id ?? null;
    }

    // Cache the whole pair; a miss is stored with the other side null
    this.cache?.set(from, kind, id, from === 'mal'
      ? { mal: id, anilist }
      : { anilist: id, mal });
    return from === 'mal' ? anilist : mal;
  }
}
