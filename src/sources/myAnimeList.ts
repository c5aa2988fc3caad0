/**
 * MyAnimeList Source
 * REST v2 client for reading a user's lists, looking titles up and writing
 * list entries.
 *
 * API docs: https://myanimelist.net/apiconfig/references/api/v2
 * - Lists:  GET /users/@me/{animelist|mangalist}  (paged via paging.next)
 * - Lookup: GET /{anime|manga}/{id}, GET /{anime|manga}?q=
 * - Write:  PATCH /{anime|manga}/{id}/my_list_status  (form encoded)
 *
 * MAL cannot look titles up by AniList ID, so this service has no
 * foreign-ID lookup.
 */

import { z } from 'zod';
import { config } from '../config.js';
import { ServiceHttp } from '../utils/http.js';
import type { Catalog, MediaEntry, MediaKind, TargetId } from '../types.js';
import type { DestinationService } from './service.js';
import { fromMalStatus, normalizeMalDate, toMalStatus } from './status.js';

const PAGE_LIMIT = 1000;
const SEARCH_LIMIT = 10;
/** MAL rejects q longer than this */
const MAX_QUERY_LENGTH = 64;

const ANIME_FIELDS = 'id,title,alternative_titles,num_episodes,media_type';
const MANGA_FIELDS = 'id,title,alternative_titles,num_chapters,num_volumes,media_type';

// =============================================================================
// Response Schemas
// =============================================================================

const nodeSchema = z.object({
  id: z.number().int(),
  title: z.string(),
  alternative_titles: z.object({
    en: z.string().optional(),
    ja: z.string().optional(),
  }).optional(),
  num_episodes: z.number().int().optional(),
  num_chapters: z.number().int().optional(),
  num_volumes: z.number().int().optional(),
});

const listStatusSchema = z.object({
  status: z.enum(['watching', 'reading', 'completed', 'on_hold', 'dropped', 'plan_to_watch', 'plan_to_read']).optional(),
  score: z.number().int().optional(),
  num_episodes_watched: z.number().int().optional(),
  num_chapters_read: z.number().int().optional(),
  num_volumes_read: z.number().int().optional(),
  is_rewatching: z.boolean().optional(),
  is_rereading: z.boolean().optional(),
  num_times_rewatched: z.number().int().optional(),
  num_times_reread: z.number().int().optional(),
  start_date: z.string().optional(),
  finish_date: z.string().optional(),
});

const listPageSchema = z.object({
  data: z.array(z.object({ node: nodeSchema, list_status: listStatusSchema.optional() })),
  paging: z.object({ next: z.string().optional() }).optional(),
});

const searchPageSchema = z.object({
  data: z.array(z.object({ node: nodeSchema })),
});

type MalNode = z.infer<typeof nodeSchema>;
type MalListStatus = z.infer<typeof listStatusSchema>;

// =============================================================================
// Conversion
// =============================================================================

export function toMediaEntry(kind: MediaKind, node: MalNode, list?: MalListStatus): MediaEntry {
  const repeating = kind === 'anime' ? list?.is_rewatching ?? false : list?.is_rereading ?? false;
  const base = {
    ids: { anilist: 0, mal: node.id },
    titles: {
      english: node.alternative_titles?.en ?? '',
      native: node.alternative_titles?.ja ?? '',
      romaji: node.title,
    },
    status: fromMalStatus(list?.status, repeating),
    score: list?.score ?? 0,
    startedAt: normalizeMalDate(list?.start_date),
    finishedAt: normalizeMalDate(list?.finish_date),
    repeats: (kind === 'anime' ? list?.num_times_rewatched : list?.num_times_reread) ?? 0,
  };

  if (kind === 'anime') {
    return {
      ...base,
      kind: 'anime',
      episodes: node.num_episodes ?? 0,
      progress: list?.num_episodes_watched ?? 0,
    };
  }
  return {
    ...base,
    kind: 'manga',
    chapters: node.num_chapters ?? 0,
    volumes: node.num_volumes ?? 0,
    progress: list?.num_chapters_read ?? 0,
    progressVolumes: list?.num_volumes_read ?? 0,
  };
}

/** Form fields for PATCH my_list_status */
export function toListStatusForm(source: MediaEntry): URLSearchParams {
  const form = new URLSearchParams();
  if (source.status) {
    const { status, repeating } = toMalStatus(source.status, source.kind);
    form.set('status', status);
    form.set(source.kind === 'anime' ? 'is_rewatching' : 'is_rereading', String(repeating));
  }
  form.set('score', String(source.score));
  if (source.kind === 'anime') {
    form.set('num_watched_episodes', String(source.progress));
    form.set('num_times_rewatched', String(source.repeats));
  } else {
    form.set('num_chapters_read', String(source.progress));
    form.set('num_volumes_read', String(source.progressVolumes));
    form.set('num_times_reread', String(source.repeats));
  }
  if (source.startedAt) form.set('start_date', source.startedAt);
  if (source.finishedAt) form.set('finish_date', source.finishedAt);
  return form;
}

// =============================================================================
// Client
// =============================================================================

export interface MyAnimeListClientOptions {
  apiUrl?: string;
  token?: string;
  clientId?: string;
  requestsPerSecond?: number;
  maxRetries?: number;
}

export class MyAnimeListClient {
  private readonly apiUrl: string;
  private readonly token: string;
  private readonly clientId: string;
  private readonly http: ServiceHttp;

  constructor(options: MyAnimeListClientOptions = {}) {
    this.apiUrl = (options.apiUrl ?? config.mal.apiUrl).replace(/\/+$/, '');
    this.token = options.token ?? config.mal.token;
    this.clientId = options.clientId ?? config.mal.clientId;
    this.http = new ServiceHttp({
      name: 'MyAnimeList',
      requestsPerSecond: options.requestsPerSecond ?? config.rateLimit.mal,
      maxRetries: options.maxRetries ?? config.http.maxRetries,
      timeout: config.http.timeout,
    });
  }

  private authHeaders(): Record<string, string> {
    if (this.token) return { Authorization: `Bearer ${this.token}` };
    if (this.clientId) return { 'X-MAL-CLIENT-ID': this.clientId };
    return {};
  }

  private fieldsFor(kind: MediaKind): string {
    return kind === 'anime' ? ANIME_FIELDS : MANGA_FIELDS;
  }

  /** The authenticated user's list, all pages */
  async fetchUserList(kind: MediaKind, signal?: AbortSignal): Promise<MediaEntry[]> {
    console.log(`[MyAnimeList] Fetching ${kind} list`);
    const fields = `list_status,${this.fieldsFor(kind)}`;
    let url: string | undefined = `${this.apiUrl}/users/@me/${kind}list?fields=${fields}&limit=${PAGE_LIMIT}&nsfw=true`;

    const entries: MediaEntry[] = [];
    while (url) {
      const page: z.infer<typeof listPageSchema> = await this.http.requestJson(url, listPageSchema, {
        headers: this.authHeaders(),
        signal,
      });
      for (const item of page.data) {
        entries.push(toMediaEntry(kind, item.node, item.list_status));
      }
      url = page.paging?.next;
    }

    console.log(`[MyAnimeList] ${entries.length} ${kind} entries`);
    return entries;
  }

  async getById(kind: MediaKind, id: number, signal?: AbortSignal): Promise<MediaEntry | null> {
    const url = `${this.apiUrl}/${kind}/${id}?fields=${this.fieldsFor(kind)}`;
    const response = await this.http.request(url, { headers: this.authHeaders(), signal, allowStatus: [404] });
    if (response.status === 404) return null;

    const body: unknown = await response.json();
    const parsed = nodeSchema.safeParse(body);
    if (!parsed.success) {
      throw new Error(`MyAnimeList returned an unexpected ${kind} ${id}`);
    }
    return toMediaEntry(kind, parsed.data);
  }

  async search(kind: MediaKind, title: string, signal?: AbortSignal): Promise<MediaEntry[]> {
    const query = encodeURIComponent(title.slice(0, MAX_QUERY_LENGTH));
    const url = `${this.apiUrl}/${kind}?q=${query}&limit=${SEARCH_LIMIT}&fields=${this.fieldsFor(kind)}&nsfw=true`;
    const page = await this.http.requestJson(url, searchPageSchema, { headers: this.authHeaders(), signal });
    return page.data.map(item => toMediaEntry(kind, item.node));
  }

  async updateListStatus(kind: MediaKind, id: TargetId, source: MediaEntry, signal?: AbortSignal): Promise<void> {
    if (!this.token) {
      throw new Error('MyAnimeList token is not configured (set MAL_TOKEN)');
    }
    await this.http.request(`${this.apiUrl}/${kind}/${id}/my_list_status`, {
      method: 'PATCH',
      headers: { ...this.authHeaders(), 'Content-Type': 'application/x-www-form-urlencoded' },
      body: toListStatusForm(source).toString(),
      signal,
    });
  }

  service(kind: MediaKind): MyAnimeListService {
    return new MyAnimeListService(this, kind);
  }
}

// =============================================================================
// Destination Service
// =============================================================================

export class MyAnimeListService implements DestinationService {
  readonly name: string;
  readonly catalog: Catalog = 'mal';

  constructor(private readonly client: MyAnimeListClient, readonly kind: MediaKind) {
    this.name = `MyAnimeList ${kind}`;
  }

  getById(id: TargetId, signal?: AbortSignal): Promise<MediaEntry | null> {
    return this.client.getById(this.kind, id, signal);
  }

  searchByTitle(title: string, signal?: AbortSignal): Promise<MediaEntry[]> {
    return this.client.search(this.kind, title, signal);
  }

  update(id: TargetId, source: MediaEntry, signal?: AbortSignal): Promise<void> {
    return this.client.updateListStatus(this.kind, id, source, signal);
  }
}
