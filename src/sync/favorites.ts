/**
 * Favourites sync
 *
 * MAL has no API for writing favourites, so only MAL -> AniList writes:
 * a title favourited on MAL but not on AniList is added on AniList.
 * Favourites present only on AniList are left alone. AniList -> MAL
 * reports the differences and writes nothing.
 *
 * Works on the user's AniList list; entries without a MAL ID are skipped.
 */

import { CancellationError, errorMessage, throwIfCancelled } from '../errors.js';
import { logDebug } from '../utils/log.js';
import { displayTitle, type MediaEntry, type MediaKind, type TargetId } from '../types.js';

export interface FavoriteMismatch {
  title: string;
  anilistId: number;
  malId: number;
  mediaKind: MediaKind;
  onAniList: boolean;
  onMal: boolean;
}

export interface FavoritesResult {
  added: number;
  /** Already in sync, no MAL ID, or only favourited on AniList */
  skipped: number;
  errors: number;
  mismatches: FavoriteMismatch[];
}

export interface FavoriteSets {
  /** AniList IDs */
  anilist: ReadonlySet<number>;
  /** MAL IDs */
  mal: ReadonlySet<number>;
}

export interface FavouriteWriter {
  toggleFavourite(kind: MediaKind, mediaId: TargetId, signal?: AbortSignal): Promise<void>;
}

function emptyResult(): FavoritesResult {
  return { added: 0, skipped: 0, errors: 0, mismatches: [] };
}

export class FavoritesSync {
  constructor(
    private readonly writer: FavouriteWriter,
    private readonly options: { dryRun: boolean; verbose: boolean },
  ) {}

  async addToAniList(entries: MediaEntry[], favorites: FavoriteSets, signal: AbortSignal): Promise<FavoritesResult> {
    const result = emptyResult();
    const { dryRun, verbose } = this.options;

    for (const entry of entries) {
      const title = displayTitle(entry);
      if (entry.ids.mal <= 0) {
        logDebug(verbose, `[Favorites] Skipping ${entry.kind} "${title}" (no MAL ID)`);
        result.skipped++;
        continue;
      }

      const onMal = favorites.mal.has(entry.ids.mal);
      const onAniList = favorites.anilist.has(entry.ids.anilist);
      if (!onMal || onAniList) {
        if (onAniList && !onMal) {
          logDebug(verbose, `[Favorites] ${entry.kind} "${title}" is favourited on AniList but not MAL (not removed)`);
        }
        result.skipped++;
        continue;
      }

      if (dryRun) {
        console.log(`[Favorites] [dry run] Would add ${entry.kind} "${title}" (MAL ${entry.ids.mal}, AniList ${entry.ids.anilist}) to AniList favourites`);
        result.added++;
        continue;
      }

      throwIfCancelled(signal, 'during favourites sync');
      try {
        await this.writer.toggleFavourite(entry.kind, entry.ids.anilist, signal);
      } catch (error) {
        if (error instanceof CancellationError) throw error;
        if (signal.aborted) throw new CancellationError('during favourites sync');
        console.warn(`[Favorites] Failed to add ${entry.kind} "${title}": ${errorMessage(error)}`);
        result.errors++;
        continue;
      }

      console.log(`[Favorites] Added ${entry.kind} "${title}" to AniList favourites`);
      result.added++;
    }

    return result;
  }

  reportMismatches(entries: MediaEntry[], favorites: FavoriteSets): FavoritesResult {
    const result = emptyResult();

    for (const entry of entries) {
      if (entry.ids.mal <= 0) continue;
      const onMal = favorites.mal.has(entry.ids.mal);
      const onAniList = favorites.anilist.has(entry.ids.anilist);
      if (onMal === onAniList) continue;

      const mismatch: FavoriteMismatch = {
        title: displayTitle(entry),
        anilistId: entry.ids.anilist,
        malId: entry.ids.mal,
        mediaKind: entry.kind,
        onAniList,
        onMal,
      };
      result.mismatches.push(mismatch);
      console.log(`[Favorites] ${mismatch.mediaKind} "${mismatch.title}" is only on ${onAniList ? 'AniList' : 'MAL'}`);
    }

    return result;
  }
}
