/**
 * Sync Runner
 * Wires clients, crosswalk providers, mappings and the state database
 * together and runs one Updater per (direction, kind), then the optional
 * favourites step. watch() repeats whole runs on an interval.
 */

import { join } from 'path';
import { config, type RunOptions } from '../config.js';
import { ArmClient } from '../crosswalk/arm.js';
import { CrosswalkCache } from '../crosswalk/cache.js';
import { HatoClient } from '../crosswalk/hato.js';
import { JikanCache, JikanClient, type MalFavorites } from '../crosswalk/jikan.js';
import { loadOfflineDatabase, type OfflineDatabase } from '../crosswalk/offlineDatabase.js';
import type { CrosswalkProvider } from '../crosswalk/provider.js';
import { recordSyncRun, saveUnmappedEntries } from '../database/db.js';
import { CancellationError, errorMessage } from '../errors.js';
import { buildStrategyChain } from '../resolver/chain.js';
import { AniListClient } from '../sources/anilist.js';
import { MyAnimeListClient } from '../sources/myAnimeList.js';
import type { DestinationService } from '../sources/service.js';
import type { MediaEntry, MediaKind, SyncDirection } from '../types.js';
import { registerCleanup, sleep } from '../utils/resilience.js';
import { FavoritesSync } from './favorites.js';
import { loadMappings, type MappingsConfig } from './mappings.js';
import { SyncReport } from './report.js';
import { Updater, type UpdaterResult } from './updater.js';

export interface PassSummary {
  direction: SyncDirection;
  kind: MediaKind;
  result: UpdaterResult;
}

export interface SyncRequest {
  directions: SyncDirection[];
  kinds: MediaKind[];
  options: Omit<RunOptions, 'direction'>;
  signal: AbortSignal;
  /** Sync favourites after each pass (turns the Jikan client on) */
  favorites?: boolean;
}

export interface SyncOutcome {
  passes: PassSummary[];
  report: SyncReport;
  /** A pass was cut short by cancellation */
  cancelled: boolean;
}

export class SyncRunner {
  private readonly anilist: AniListClient;
  private readonly mal: MyAnimeListClient;
  private readonly armCache: CrosswalkCache;
  private readonly hatoCache: CrosswalkCache;
  private readonly jikanCache: JikanCache;
  private readonly jikan: JikanClient;
  private mappings: MappingsConfig | null = null;
  private offlineDatabase: OfflineDatabase | null = null;
  private initialized = false;

  constructor(clients: { anilist?: AniListClient; mal?: MyAnimeListClient; jikan?: JikanClient } = {}) {
    this.anilist = clients.anilist ?? new AniListClient();
    this.mal = clients.mal ?? new MyAnimeListClient();
    this.armCache = new CrosswalkCache(join(config.cache.dir, 'arm-cache.json'));
    this.hatoCache = new CrosswalkCache(join(config.cache.dir, 'hato-cache.json'));
    this.jikanCache = new JikanCache(join(config.cache.dir, 'jikan-cache.json'));
    this.jikan = clients.jikan ?? new JikanClient({ cache: this.jikanCache });
  }

  private async init(): Promise<void> {
    if (this.initialized) return;
    this.initialized = true;

    await Promise.all([this.armCache.load(), this.hatoCache.load(), this.jikanCache.load()]);
    // Lookups are expensive; keep what we have even on a crash
    registerCleanup(() => {
      this.armCache.saveSync();
      this.hatoCache.saveSync();
      this.jikanCache.saveSync();
    });

    this.mappings = await loadMappings(config.mappings.path);
    this.offlineDatabase = await loadOfflineDatabase(config.crosswalk.offlineDatabasePath);
  }

  private crosswalks(): CrosswalkProvider[] {
    const providers: CrosswalkProvider[] = [];
    if (this.offlineDatabase) providers.push(this.offlineDatabase);
    if (config.crosswalk.arm.enabled) providers.push(new ArmClient({ cache: this.armCache }));
    if (config.crosswalk.hato.enabled) providers.push(new HatoClient({ cache: this.hatoCache }));
    return providers;
  }

  private destination(direction: SyncDirection, kind: MediaKind): DestinationService {
    return direction === 'anilist-to-mal' ? this.mal.service(kind) : this.anilist.service(kind);
  }

  private async fetchLists(
    direction: SyncDirection,
    kind: MediaKind,
    signal: AbortSignal,
  ): Promise<{ sources: MediaEntry[]; targets: MediaEntry[] }> {
    if (!config.anilist.username) {
      throw new Error('ANILIST_USERNAME is not configured');
    }
    const [anilistEntries, malEntries] = await Promise.all([
      this.anilist.fetchUserList(config.anilist.username, kind, signal),
      this.mal.fetchUserList(kind, signal),
    ]);
    return direction === 'anilist-to-mal'
      ? { sources: anilistEntries, targets: malEntries }
      : { sources: malEntries, targets: anilistEntries };
  }

  async run(request: SyncRequest): Promise<SyncOutcome> {
    await this.init();

    const report = new SyncReport();
    const passes: PassSummary[] = [];
    let cancelled = false;
    const favorites = request.favorites ?? config.favorites.enabled;
    const jikanEnabled = favorites || config.crosswalk.jikan.enabled;
    // One MAL favourites read per run, shared by every pass
    let malFavorites: Promise<MalFavorites> | null = null;
    const loadMalFavorites = (): Promise<MalFavorites> => {
      if (!config.mal.username) {
        return Promise.reject(new Error('MAL_USERNAME is not configured'));
      }
      const pending = malFavorites ?? this.jikan.getUserFavorites(config.mal.username, request.signal);
      malFavorites = pending;
      return pending;
    };

    try {
      for (const direction of request.directions) {
        for (const kind of request.kinds) {
          if (request.signal.aborted) {
            cancelled = true;
            break;
          }

          const options: RunOptions = { ...request.options, direction };
          const service = this.destination(direction, kind);
          const chain = buildStrategyChain({
            kind,
            service,
            mappings: this.mappings,
            crosswalks: this.crosswalks(),
            jikan: jikanEnabled ? this.jikan : null,
          });

          const startedAt = new Date().toISOString();
          const { sources, targets } = await this.fetchLists(direction, kind, request.signal);
          const updater = new Updater({
            kind,
            options,
            chain,
            service,
            report,
            mappings: this.mappings,
            signal: request.signal,
          });
          const result = await updater.run(sources, targets);
          passes.push({ direction, kind, result });

          const summary = result.statistics.summary();
          recordSyncRun({
            mediaKind: kind,
            direction,
            dryRun: options.dryRun,
            forceSync: options.forceSync,
            truncated: result.truncated,
            total: summary.total,
            updated: summary.updated,
            skipped: summary.skipped,
            errors: summary.errors,
            dryRunCount: summary.dryRun,
            conflicts: result.conflicts.length,
            startedAt,
            finishedAt: new Date().toISOString(),
          });
          // A cut-short pass has not seen every entry; keep the previous list
          if (!result.truncated) {
            saveUnmappedEntries(kind, direction, result.unmapped);
          }

          if (result.truncated) {
            cancelled = true;
            break;
          }

          if (favorites) {
            const anilistEntries = direction === 'anilist-to-mal' ? sources : targets;
            await this.syncFavorites(direction, kind, anilistEntries, options, report, loadMalFavorites, request.signal);
          }
        }
        if (cancelled) break;
      }
    } catch (error) {
      if (!(error instanceof CancellationError) && !request.signal.aborted) throw error;
      cancelled = true;
    } finally {
      await Promise.all([this.armCache.save(), this.hatoCache.save(), this.jikanCache.save()]);
    }

    return { passes, report, cancelled };
  }

  /**
   * MAL -> AniList adds missing AniList favourites; AniList -> MAL only
   * reports. A failed favourites read is logged and does not fail the run.
   */
  private async syncFavorites(
    direction: SyncDirection,
    kind: MediaKind,
    anilistEntries: MediaEntry[],
    options: RunOptions,
    report: SyncReport,
    loadMalFavorites: () => Promise<MalFavorites>,
    signal: AbortSignal,
  ): Promise<void> {
    try {
      const [anilist, mal] = await Promise.all([
        this.anilist.fetchFavouriteIds(config.anilist.username, kind, signal),
        loadMalFavorites(),
      ]);
      const sets = { anilist, mal: mal[kind] };
      const favoritesSync = new FavoritesSync(this.anilist, options);
      const result = direction === 'mal-to-anilist'
        ? await favoritesSync.addToAniList(anilistEntries, sets, signal)
        : favoritesSync.reportMismatches(anilistEntries, sets);
      report.addFavorites(result);
    } catch (error) {
      if (error instanceof CancellationError || signal.aborted) throw error;
      console.warn(`[Favorites] Skipped ${direction} ${kind}: ${errorMessage(error)}`);
    }
  }

  /**
   * Run now (when immediate) and then every intervalMs until the signal
   * fires. Errors of scheduled runs are logged and the loop goes on.
   */
  async watch(request: SyncRequest, schedule: WatchOptions, onOutcome: (outcome: SyncOutcome) => void): Promise<number> {
    return watchLoop(async () => onOutcome(await this.run(request)), { ...schedule, signal: request.signal });
  }
}

// =============================================================================
// Watch mode
// =============================================================================

export interface WatchOptions {
  intervalMs: number;
  /** Sync once before the first interval */
  immediate: boolean;
}

const HOUR_MS = 60 * 60 * 1000;

/** Hours to ms, within the configured bounds */
export function watchIntervalMs(hours: number): number {
  const { minIntervalHours, maxIntervalHours } = config.watch;
  if (!Number.isFinite(hours) || hours < minIntervalHours) {
    throw new Error(`interval must be at least ${minIntervalHours}h (got ${hours}h)`);
  }
  if (hours > maxIntervalHours) {
    throw new Error(`interval must be at most ${maxIntervalHours}h (got ${hours}h)`);
  }
  return hours * HOUR_MS;
}

/**
 * Calls run on an interval until the signal fires. The immediate run's
 * error propagates; later errors are logged. Resolves with the number of
 * runs started.
 */
export async function watchLoop(
  run: () => Promise<void>,
  options: WatchOptions & { signal: AbortSignal },
): Promise<number> {
  const { intervalMs, immediate, signal } = options;
  let runs = 0;

  if (immediate) {
    console.log('[Watch] Running initial sync');
    runs++;
    await run();
    console.log('[Watch] Initial sync completed, starting watch mode');
  } else {
    console.log(`[Watch] Starting watch mode: sync every ${Math.round(intervalMs / 60000)}m`);
  }

  while (!signal.aborted) {
    await sleep(intervalMs, signal);
    if (signal.aborted) break;

    console.log('[Watch] Running scheduled sync');
    runs++;
    try {
      await run();
      console.log('[Watch] Sync completed');
    } catch (error) {
      if (signal.aborted) break;
      console.error(`[Watch] Sync error: ${errorMessage(error)}`);
    }
  }

  console.log('[Watch] Watch mode stopped');
  return runs;
}
