/**
 * Entry-level comparisons used by the title-based strategies, the
 * deduplicator and the updater.
 */

import { titlesMatch } from './titles.js';
import {
  foreignId,
  type AnimeEntry,
  type MediaEntry,
  type SyncDirection,
  type TitleSet,
} from '../types.js';

/** Source episode count at or below which an entry may be a special or movie */
export const SPECIAL_EPISODE_CEILING = 1;

/** Target episode count above which a special-sized source is rejected */
export const SERIES_EPISODE_FLOOR = 4;

function titleVariants(titles: TitleSet): string[] {
  return [titles.english, titles.native, titles.romaji].filter(title => title !== '');
}

// =============================================================================
// Titles
// =============================================================================

/** Any non-empty title variant pair is byte-identical. */
export function identicalTitle(a: MediaEntry, b: MediaEntry): boolean {
  const right = titleVariants(b.titles);
  return titleVariants(a.titles).some(title => right.includes(title));
}

/** Any non-empty title variant pair is equal ignoring case. */
export function identicalTitleIgnoreCase(a: MediaEntry, b: MediaEntry): boolean {
  const right = titleVariants(b.titles).map(title => title.toLowerCase());
  return titleVariants(a.titles).some(title => right.includes(title.toLowerCase()));
}

/**
 * Titles match on some variant pair. Episode counts are not compared here;
 * shouldRejectCandidate owns that check.
 */
export function sameTitle(source: MediaEntry, target: MediaEntry): boolean {
  const targetTitles = titleVariants(target.titles);
  return titleVariants(source.titles).some(title =>
    targetTitles.some(other => titlesMatch(title, other))
  );
}

/**
 * Same media kind, and either the same destination ID, matching titles,
 * or (manga only) identical chapter and volume totals.
 */
export function sameKindAndTitle(source: MediaEntry, target: MediaEntry, direction: SyncDirection): boolean {
  if (source.kind !== target.kind) return false;

  const sourceForeign = foreignId(source, direction);
  if (sourceForeign > 0 && sourceForeign === foreignId(target, direction)) return true;

  if (sameTitle(source, target)) return true;

  if (source.kind === 'manga' && target.kind === 'manga') {
    return source.chapters === target.chapters && source.volumes === target.volumes;
  }
  return false;
}

// =============================================================================
// False-positive detection
// =============================================================================

/**
 * Heuristic for a special/OVA/movie matched against a main series: a
 * 0/1-episode source against a target of more than four episodes, or a
 * source without a MAL ID against a target that has one. Equal MAL IDs or an
 * identical title clear both. Returns the reason, or null.
 */
export function likelySpecialMismatch(source: AnimeEntry, target: AnimeEntry): string | null {
  if (source.ids.mal > 0 && source.ids.mal === target.ids.mal) return null;
  if (identicalTitle(source, target)) return null;

  if (source.ids.mal === 0 && target.ids.mal > 0) {
    return 'different titles (source has no MAL ID, target has different MAL ID)';
  }
  if (source.episodes <= SPECIAL_EPISODE_CEILING && target.episodes > SERIES_EPISODE_FLOOR) {
    return 'episode count mismatch (special vs series)';
  }
  return null;
}

export interface Rejection {
  reason: string;
  detail: string;
}

/**
 * Why a title-matched candidate must not be accepted, or null.
 */
export function shouldRejectCandidate(
  source: MediaEntry,
  candidate: MediaEntry,
  direction: SyncDirection,
): Rejection | null {
  const sourceForeign = foreignId(source, direction);
  const candidateId = foreignId(candidate, direction);
  if (sourceForeign > 0 && candidateId > 0 && sourceForeign !== candidateId) {
    return { reason: 'ID mismatch', detail: `(${sourceForeign} vs ${candidateId})` };
  }

  if (source.kind === 'anime' && candidate.kind === 'anime') {
    const special = likelySpecialMismatch(source, candidate);
    if (special) {
      return { reason: special, detail: `(${source.episodes} vs ${candidate.episodes})` };
    }
  }

  return null;
}

// =============================================================================
// Progress
// =============================================================================

/**
 * The destination already reflects the source: nothing to write.
 */
export function sameProgress(source: MediaEntry, target: MediaEntry): boolean {
  if (source.status !== target.status) return false;
  if (source.score !== target.score) return false;

  if (source.kind === 'manga' && target.kind === 'manga') {
    return source.progress === target.progress && source.progressVolumes === target.progressVolumes;
  }
  if (source.kind !== 'anime' || target.kind !== 'anime') return false;

  const progressEqual = source.progress === target.progress;
  if (source.episodes === target.episodes) return progressEqual;
  // One side doesn't know the total yet
  if (source.episodes === 0 || target.episodes === 0) return progressEqual;
  if (progressEqual) return true;

  // Catalogs split some shows differently; compare episodes left to watch
  return source.episodes - source.progress === target.episodes - target.progress;
}
