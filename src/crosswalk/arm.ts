/**
 * ARM (Anime Relations Mapper) crosswalk
 * https://arm.haglund.dev
 *
 * GET /api/v2/ids?source=myanimelist&id=N&include=anilist
 * GET /api/v2/ids?source=anilist&id=N&include=myanimelist
 *
 * 404 or a null field means the pair is unknown. Anime only.
 */

import { z } from 'zod';
import { config } from '../config.js';
import { ServiceHttp } from '../utils/http.js';
import type { Catalog, MediaKind } from '../types.js';
import type { CrosswalkCache } from './cache.js';
import type { CrosswalkProvider } from './provider.js';

const armResponseSchema = z.object({
  anilist: z.number().int().nullable().optional(),
  myanimelist: z.number().int().nullable().optional(),
}).nullable();

const ARM_SOURCE: Record<Catalog, string> = {
  mal: 'myanimelist',
  anilist: 'anilist',
};

export interface ArmClientOptions {
  baseUrl?: string;
  cache?: CrosswalkCache | null;
  requestsPerSecond?: number;
  maxRetries?: number;
  timeout?: number;
}

export class ArmClient implements CrosswalkProvider {
  readonly name = 'ArmApi';
  readonly kinds: readonly MediaKind[] = ['anime'];
  readonly networked = true;

  private readonly baseUrl: string;
  private readonly cache: CrosswalkCache | null;
  private readonly http: ServiceHttp;

  constructor(options: ArmClientOptions = {}) {
    this.baseUrl = (options.baseUrl ?? config.crosswalk.arm.baseUrl).replace(/\/+$/, '');
    this.cache = options.cache ?? null;
    this.http = new ServiceHttp({
      name: 'ArmApi',
      requestsPerSecond: options.requestsPerSecond ?? config.rateLimit.arm,
      maxRetries: options.maxRetries ?? config.http.maxRetries,
      timeout: options.timeout ?? config.http.timeout,
    });
  }

  async lookup(from: Catalog, kind: MediaKind, id: number, signal?: AbortSignal): Promise<number | null> {
    if (kind !== 'anime') return null;
    const to: Catalog = from === 'mal' ? 'anilist' : 'mal';

    const cached = this.cache?.get(from, kind, id);
    if (cached) {
      return cached[to];
    }

    const url = `${this.baseUrl}/api/v2/ids?source=${ARM_SOURCE[from]}&id=${id}&include=${ARM_SOURCE[to]}`;
    const response = await this.http.request(url, { signal, allowStatus: [404] });

    let found: number | null = null;
    if (response.status !== 404) {
      const body: unknown = await response.json();
      const parsed = armResponseSchema.safeParse(body);
      if (!parsed.success) {
        throw new Error(`ArmApi returned an unexpected response for ${from} ${id}`);
      }
      found = (to === 'anilist' ? parsed.data?.anilist : parsed.data?.myanimelist) ?? null;
    }

    this.cache?.set(from, kind, id, from === 'mal'
      ? { mal: id, anilist: found }
      : { anilist: id, mal: found });
    return found;
  }
}
