/**
 * listsync Configuration
 * AniList <-> MyAnimeList list synchronisation
 */

import type { SyncDirection } from './types.js';

function envFlag(name: string, fallback: boolean): boolean {
  const value = process.env[name];
  if (value === undefined || value === '') return fallback;
  return value === '1' || value.toLowerCase() === 'true';
}

export const config = {
  // AniList (GraphQL)
  anilist: {
    apiUrl: process.env.ANILIST_API_URL || 'https://graphql.anilist.co',
    token: process.env.ANILIST_TOKEN || '',
    username: process.env.ANILIST_USERNAME || '',
  },

  // MyAnimeList (REST v2)
  mal: {
    apiUrl: process.env.MAL_API_URL || 'https://api.myanimelist.net/v2',
    token: process.env.MAL_TOKEN || '',
    clientId: process.env.MAL_CLIENT_ID || '',
    username: process.env.MAL_USERNAME || '',
  },

  // ID crosswalk providers
  crosswalk: {
    offlineDatabasePath: process.env.OFFLINE_DB_PATH || '',
    arm: {
      enabled: envFlag('ARM_ENABLED', true),
      baseUrl: process.env.ARM_BASE_URL || 'https://arm.haglund.dev',
    },
    hato: {
      enabled: envFlag('HATO_ENABLED', true),
      baseUrl: process.env.HATO_BASE_URL || 'https://hato.malupdaterosx.moe',
    },
    // Manga title lookups; off by default, turned on by favourites sync
    jikan: {
      enabled: envFlag('JIKAN_ENABLED', false),
      baseUrl: process.env.JIKAN_BASE_URL || 'https://api.jikan.moe/v4',
      cacheMaxAgeMs: 7 * 24 * 60 * 60 * 1000,
    },
  },

  // Favourites: MAL -> AniList adds, AniList -> MAL reports only
  favorites: {
    enabled: envFlag('FAVORITES_ENABLED', false),
  },

  // Watch mode (hours between runs)
  watch: {
    intervalHours: Number(process.env.WATCH_INTERVAL_HOURS) || 24,
    minIntervalHours: 1,
    maxIntervalHours: 168,
  },

  // Crosswalk caches (JSON files)
  cache: {
    dir: process.env.LISTSYNC_CACHE_DIR || './data/cache',
  },

  // Sync state (unmapped entries, run history)
  database: {
    path: process.env.LISTSYNC_DB_PATH || './data/listsync.db',
  },

  // Manual mappings + ignore list
  mappings: {
    path: process.env.LISTSYNC_MAPPINGS_PATH || './data/mappings.yaml',
  },

  // Rate limiting (requests per second)
  rateLimit: {
    anilist: 0.5,          // 30 req/min (degraded limit)
    mal: 2,
    arm: 5,
    hato: 2,
    jikan: 2,              // Jikan allows 3 req/s
  },

  http: {
    timeout: 15000,
    maxRetries: 3,
  },

  verbose: envFlag('LISTSYNC_VERBOSE', false),
};

export type Config = typeof config;

// =============================================================================
// Run Options
// =============================================================================

/**
 * Flags that hold for one run. Passed explicitly to the resolver and the
 * updater, never read from module state.
 */
export interface RunOptions {
  direction: SyncDirection;
  /** Skip matching; write to the source's own declared foreign ID */
  forceSync: boolean;
  /** Resolve and record, never write to the destination */
  dryRun: boolean;
  verbose: boolean;
}

export function createRunOptions(overrides: Partial<RunOptions> = {}): RunOptions {
  return {
    direction: 'anilist-to-mal',
    forceSync: false,
    dryRun: false,
    verbose: config.verbose,
    ...overrides,
  };
}
