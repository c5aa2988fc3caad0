/**
 * AniList Source
 * GraphQL client for reading a user's lists, looking titles up and writing
 * list entries.
 *
 * API docs: https://docs.anilist.co
 * - Lists:  MediaListCollection(userName, type)
 * - Lookup: Media(id) / Media(idMal) / Page.media(search)
 * - Write:  SaveMediaListEntry (needs a bearer token)
 * - Favourites: User(name).favourites, ToggleFavourite (needs a token)
 *
 * Scores are requested as POINT_10_DECIMAL whatever the user's own score
 * format is, then rounded half up.
 */

import { z } from 'zod';
import { config } from '../config.js';
import { ServiceHttp } from '../utils/http.js';
import type { Catalog, MediaEntry, MediaKind, TargetId } from '../types.js';
import type { DestinationService, ForeignIdLookup } from './service.js';
import {
  fromAniListStatus,
  fuzzyDateToString,
  roundScore,
  stringToFuzzyDate,
  toAniListStatus,
  type AniListStatus,
} from './status.js';

// =============================================================================
// Queries
// =============================================================================

const MEDIA_FIELDS = `
  id
  idMal
  type
  episodes
  chapters
  volumes
  title { english native romaji }
`;

const LIST_ENTRY_FIELDS = `
  status
  score(format: POINT_10_DECIMAL)
  progress
  progressVolumes
  repeat
  startedAt { year month day }
  completedAt { year month day }
`;

const LIST_QUERY = `
  query ($userName: String, $type: MediaType) {
    MediaListCollection(userName: $userName, type: $type) {
      lists { entries { ${LIST_ENTRY_FIELDS} media { ${MEDIA_FIELDS} } } }
    }
  }
`;

const MEDIA_BY_ID_QUERY = `
  query ($id: Int, $type: MediaType) {
    Media(id: $id, type: $type) { ${MEDIA_FIELDS} }
  }
`;

const MEDIA_BY_MAL_ID_QUERY = `
  query ($idMal: Int, $type: MediaType) {
    Media(idMal: $idMal, type: $type) { ${MEDIA_FIELDS} }
  }
`;

const SEARCH_QUERY = `
  query ($search: String, $type: MediaType) {
    Page(perPage: 10) { media(search: $search, type: $type) { ${MEDIA_FIELDS} } }
  }
`;

const SAVE_ENTRY_MUTATION = `
  mutation ($mediaId: Int, $status: MediaListStatus, $score: Float, $progress: Int,
            $progressVolumes: Int, $repeat: Int, $startedAt: FuzzyDateInput, $completedAt: FuzzyDateInput) {
    SaveMediaListEntry(mediaId: $mediaId, status: $status, score: $score, progress: $progress,
                       progressVolumes: $progressVolumes, repeat: $repeat,
                       startedAt: $startedAt, completedAt: $completedAt) {
      id
      status
    }
  }
`;

/** Favourites connection for one media type, one page at a time */
function favouritesQuery(kind: MediaKind): string {
  return `
    query ($userName: String, $page: Int) {
      User(name: $userName) {
        favourites { ${kind}(page: $page, perPage: 50) { pageInfo { hasNextPage } nodes { id } } }
      }
    }
  `;
}

const TOGGLE_FAVOURITE_MUTATION = `
  mutation ($animeId: Int, $mangaId: Int) {
    ToggleFavourite(animeId: $animeId, mangaId: $mangaId) { __typename }
  }
`;

// =============================================================================
// Response Schemas
// =============================================================================

const fuzzyDateSchema = z.object({
  year: z.number().nullable().optional(),
  month: z.number().nullable().optional(),
  day: z.number().nullable().optional(),
}).nullable().optional();

const mediaSchema = z.object({
  id: z.number().int(),
  idMal: z.number().int().nullable(),
  type: z.enum(['ANIME', 'MANGA']).nullable().optional(),
  episodes: z.number().int().nullable().optional(),
  chapters: z.number().int().nullable().optional(),
  volumes: z.number().int().nullable().optional(),
  title: z.object({
    english: z.string().nullable().optional(),
    native: z.string().nullable().optional(),
    romaji: z.string().nullable().optional(),
  }),
});

const statusSchema = z.enum(['CURRENT', 'PLANNING', 'COMPLETED', 'DROPPED', 'PAUSED', 'REPEATING']);

const listEntrySchema = z.object({
  status: statusSchema.nullable(),
  score: z.number().nullable(),
  progress: z.number().int().nullable(),
  progressVolumes: z.number().int().nullable().optional(),
  repeat: z.number().int().nullable().optional(),
  startedAt: fuzzyDateSchema,
  completedAt: fuzzyDateSchema,
  media: mediaSchema,
});

const errorsSchema = z.array(z.object({ message: z.string() })).optional();

const listResponseSchema = z.object({
  data: z.object({
    MediaListCollection: z.object({
      lists: z.array(z.object({ entries: z.array(listEntrySchema).nullable() })).nullable(),
    }).nullable(),
  }).nullable(),
  errors: errorsSchema,
});

const mediaResponseSchema = z.object({
  data: z.object({ Media: mediaSchema.nullable() }).nullable(),
  errors: errorsSchema,
});

const searchResponseSchema = z.object({
  data: z.object({
    Page: z.object({ media: z.array(mediaSchema).nullable() }).nullable(),
  }).nullable(),
  errors: errorsSchema,
});

const saveResponseSchema = z.object({
  data: z.object({
    SaveMediaListEntry: z.object({ id: z.number().int(), status: statusSchema.nullable() }).nullable(),
  }).nullable(),
  errors: errorsSchema,
});

const favouritesConnectionSchema = z.object({
  pageInfo: z.object({ hasNextPage: z.boolean().nullable() }).nullable(),
  nodes: z.array(z.object({ id: z.number().int() }).nullable()).nullable(),
}).nullable().optional();

const favouritesResponseSchema = z.object({
  data: z.object({
    User: z.object({
      favourites: z.object({
        anime: favouritesConnectionSchema,
        manga: favouritesConnectionSchema,
      }).nullable(),
    }).nullable(),
  }).nullable(),
  errors: errorsSchema,
});

const toggleFavouriteResponseSchema = z.object({
  data: z.object({ ToggleFavourite: z.object({}).passthrough().nullable() }).nullable(),
  errors: errorsSchema,
});

type AniListMedia = z.infer<typeof mediaSchema>;
type AniListListEntry = z.infer<typeof listEntrySchema>;

// =============================================================================
// Conversion
// =============================================================================

interface ListFields {
  status: AniListStatus | null;
  score: number | null;
  progress: number | null;
  progressVolumes?: number | null;
  repeat?: number | null;
  startedAt?: AniListListEntry['startedAt'];
  completedAt?: AniListListEntry['completedAt'];
}

const EMPTY_LIST_FIELDS: ListFields = { status: null, score: null, progress: null };

export function toMediaEntry(kind: MediaKind, media: AniListMedia, list: ListFields = EMPTY_LIST_FIELDS): MediaEntry {
  const base = {
    ids: { anilist: media.id, mal: media.idMal ?? 0 },
    titles: {
      english: media.title.english ?? '',
      native: media.title.native ?? '',
      romaji: media.title.romaji ?? '',
    },
    status: fromAniListStatus(list.status),
    score: roundScore(list.score ?? 0),
    startedAt: fuzzyDateToString(list.startedAt),
    finishedAt: fuzzyDateToString(list.completedAt),
    repeats: list.repeat ?? 0,
  };

  if (kind === 'anime') {
    return { ...base, kind: 'anime', episodes: media.episodes ?? 0, progress: list.progress ?? 0 };
  }
  return {
    ...base,
    kind: 'manga',
    chapters: media.chapters ?? 0,
    volumes: media.volumes ?? 0,
    progress: list.progress ?? 0,
    progressVolumes: list.progressVolumes ?? 0,
  };
}

function mediaType(kind: MediaKind): 'ANIME' | 'MANGA' {
  return kind === 'anime' ? 'ANIME' : 'MANGA';
}

// =============================================================================
// Client
// =============================================================================

export interface AniListClientOptions {
  apiUrl?: string;
  token?: string;
  requestsPerSecond?: number;
  maxRetries?: number;
}

export class AniListClient {
  private readonly apiUrl: string;
  private readonly token: string;
  private readonly http: ServiceHttp;

  constructor(options: AniListClientOptions = {}) {
    this.apiUrl = options.apiUrl ?? config.anilist.apiUrl;
    this.token = options.token ?? config.anilist.token;
    this.http = new ServiceHttp({
      name: 'AniList',
      requestsPerSecond: options.requestsPerSecond ?? config.rateLimit.anilist,
      maxRetries: options.maxRetries ?? config.http.maxRetries,
      timeout: config.http.timeout,
    });
  }

  /**
   * POST a GraphQL document. AniList answers a missing Media with HTTP 404,
   * which is returned as a normal body with data.Media = null.
   */
  private async graphql<T extends z.ZodTypeAny>(
    query: string,
    variables: Record<string, unknown>,
    schema: T,
    signal?: AbortSignal,
  ): Promise<z.infer<T>> {
    const headers: Record<string, string> = {
      'Content-Type': 'application/json',
      Accept: 'application/json',
    };
    if (this.token) headers.Authorization = `Bearer ${this.token}`;

    return this.http.requestJson(this.apiUrl, schema, {
      method: 'POST',
      headers,
      body: JSON.stringify({ query, variables }),
      signal,
      allowStatus: [404],
    });
  }

  async fetchUserList(userName: string, kind: MediaKind, signal?: AbortSignal): Promise<MediaEntry[]> {
    console.log(`[AniList] Fetching ${kind} list for ${userName}`);
    const response = await this.graphql(LIST_QUERY, { userName, type: mediaType(kind) }, listResponseSchema, signal);
    if (response.errors?.length) {
      throw new Error(`AniList list query failed: ${response.errors.map(e => e.message).join('; ')}`);
    }

    const entries: MediaEntry[] = [];
    for (const list of response.data?.MediaListCollection?.lists ?? []) {
      for (const entry of list.entries ?? []) {
        entries.push(toMediaEntry(kind, entry.media, entry));
      }
    }
    console.log(`[AniList] ${entries.length} ${kind} entries`);
    return entries;
  }

  async getMedia(kind: MediaKind, id: number, signal?: AbortSignal): Promise<MediaEntry | null> {
    const response = await this.graphql(MEDIA_BY_ID_QUERY, { id, type: mediaType(kind) }, mediaResponseSchema, signal);
    const media = response.data?.Media;
    return media ? toMediaEntry(kind, media) : null;
  }

  async getMediaByMalId(kind: MediaKind, idMal: number, signal?: AbortSignal): Promise<MediaEntry | null> {
    const response = await this.graphql(MEDIA_BY_MAL_ID_QUERY, { idMal, type: mediaType(kind) }, mediaResponseSchema, signal);
    const media = response.data?.Media;
    return media ? toMediaEntry(kind, media) : null;
  }

  async search(kind: MediaKind, title: string, signal?: AbortSignal): Promise<MediaEntry[]> {
    const response = await this.graphql(SEARCH_QUERY, { search: title, type: mediaType(kind) }, searchResponseSchema, signal);
    if (response.errors?.length) {
      throw new Error(`AniList search failed: ${response.errors.map(e => e.message).join('; ')}`);
    }
    return (response.data?.Page?.media ?? []).map(media => toMediaEntry(kind, media));
  }

  async saveEntry(mediaId: TargetId, source: MediaEntry, signal?: AbortSignal): Promise<void> {
    if (!this.token) {
      throw new Error('AniList token is not configured (set ANILIST_TOKEN)');
    }
    if (!source.status) {
      throw new Error(`Cannot save AniList entry ${mediaId} without a status`);
    }

    const variables: Record<string, unknown> = {
      mediaId,
      status: toAniListStatus(source.status),
      score: source.score,
      progress: source.progress,
      repeat: source.repeats,
      startedAt: stringToFuzzyDate(source.startedAt),
      completedAt: stringToFuzzyDate(source.finishedAt),
    };
    if (source.kind === 'manga') {
      variables.progressVolumes = source.progressVolumes;
    }

    const response = await this.graphql(SAVE_ENTRY_MUTATION, variables, saveResponseSchema, signal);
    if (response.errors?.length || !response.data?.SaveMediaListEntry) {
      const detail = response.errors?.map(e => e.message).join('; ') ?? 'no entry returned';
      throw new Error(`AniList SaveMediaListEntry failed for ${mediaId}: ${detail}`);
    }
  }

  /** AniList IDs of the user's favourite anime or manga */
  async fetchFavouriteIds(userName: string, kind: MediaKind, signal?: AbortSignal): Promise<Set<number>> {
    const ids = new Set<number>();
    for (let page = 1; ; page++) {
      const response = await this.graphql(favouritesQuery(kind), { userName, page }, favouritesResponseSchema, signal);
      if (response.errors?.length) {
        throw new Error(`AniList favourites query failed: ${response.errors.map(e => e.message).join('; ')}`);
      }
      const connection = response.data?.User?.favourites?.[kind];
      for (const node of connection?.nodes ?? []) {
        if (node) ids.add(node.id);
      }
      if (!connection?.pageInfo?.hasNextPage) break;
    }
    console.log(`[AniList] ${ids.size} favourite ${kind}`);
    return ids;
  }

  /** Flips the favourite flag; callers only use it to add */
  async toggleFavourite(kind: MediaKind, mediaId: TargetId, signal?: AbortSignal): Promise<void> {
    if (!this.token) {
      throw new Error('AniList token is not configured (set ANILIST_TOKEN)');
    }
    const variables = kind === 'anime' ? { animeId: mediaId } : { mangaId: mediaId };
    const response = await this.graphql(TOGGLE_FAVOURITE_MUTATION, variables, toggleFavouriteResponseSchema, signal);
    if (response.errors?.length || !response.data?.ToggleFavourite) {
      const detail = response.errors?.map(e => e.message).join('; ') ?? 'no favourites returned';
      throw new Error(`AniList ToggleFavourite failed for ${kind} ${mediaId}: ${detail}`);
    }
  }

  service(kind: MediaKind): AniListService {
    return new AniListService(this, kind);
  }
}

// =============================================================================
// Destination Service
// =============================================================================

export class AniListService implements DestinationService, ForeignIdLookup {
  readonly name: string;
  readonly catalog: Catalog = 'anilist';
  readonly foreignCatalog: Catalog = 'mal';

  constructor(private readonly client: AniListClient, readonly kind: MediaKind) {
    this.name = `AniList ${kind}`;
  }

  getById(id: TargetId, signal?: AbortSignal): Promise<MediaEntry | null> {
    return this.client.getMedia(this.kind, id, signal);
  }

  searchByTitle(title: string, signal?: AbortSignal): Promise<MediaEntry[]> {
    return this.client.search(this.kind, title, signal);
  }

  getByForeignId(malId: number, signal?: AbortSignal): Promise<MediaEntry | null> {
    return this.client.getMediaByMalId(this.kind, malId, signal);
  }

  update(id: TargetId, source: MediaEntry, signal?: AbortSignal): Promise<void> {
    return this.client.saveEntry(id, source, signal);
  }
}
