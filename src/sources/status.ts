/**
 * Status, score and date conversions between the two catalogs and the
 * shared entry model.
 */

import type { ListStatus, MediaKind } from '../types.js';

// =============================================================================
// AniList
// =============================================================================

export type AniListStatus = 'CURRENT' | 'PLANNING' | 'COMPLETED' | 'DROPPED' | 'PAUSED' | 'REPEATING';

const FROM_ANILIST: Record<AniListStatus, ListStatus> = {
  CURRENT: 'current',
  PLANNING: 'planning',
  COMPLETED: 'completed',
  DROPPED: 'dropped',
  PAUSED: 'paused',
  REPEATING: 'repeating',
};

const TO_ANILIST: Record<ListStatus, AniListStatus> = {
  current: 'CURRENT',
  planning: 'PLANNING',
  completed: 'COMPLETED',
  dropped: 'DROPPED',
  paused: 'PAUSED',
  repeating: 'REPEATING',
};

export function fromAniListStatus(status: AniListStatus | null | undefined): ListStatus | null {
  return status ? FROM_ANILIST[status] : null;
}

export function toAniListStatus(status: ListStatus): AniListStatus {
  return TO_ANILIST[status];
}

// =============================================================================
// MyAnimeList
// =============================================================================

export type MalAnimeStatus = 'watching' | 'completed' | 'on_hold' | 'dropped' | 'plan_to_watch';
export type MalMangaStatus = 'reading' | 'completed' | 'on_hold' | 'dropped' | 'plan_to_read';
export type MalStatus = MalAnimeStatus | MalMangaStatus;

/**
 * MAL has no repeating status: a rewatch is completed + is_rewatching.
 */
export function fromMalStatus(status: MalStatus | null | undefined, repeating: boolean): ListStatus | null {
  switch (status) {
    case 'watching':
    case 'reading':
      return 'current';
    case 'completed':
      return repeating ? 'repeating' : 'completed';
    case 'on_hold':
      return 'paused';
    case 'dropped':
      return 'dropped';
    case 'plan_to_watch':
    case 'plan_to_read':
      return 'planning';
    default:
      return null;
  }
}

export function toMalStatus(status: ListStatus, kind: MediaKind): { status: MalStatus; repeating: boolean } {
  switch (status) {
    case 'current':
      return { status: kind === 'anime' ? 'watching' : 'reading', repeating: false };
    case 'planning':
      return { status: kind === 'anime' ? 'plan_to_watch' : 'plan_to_read', repeating: false };
    case 'completed':
      return { status: 'completed', repeating: false };
    case 'repeating':
      return { status: 'completed', repeating: true };
    case 'paused':
      return { status: 'on_hold', repeating: false };
    case 'dropped':
      return { status: 'dropped', repeating: false };
  }
}

// =============================================================================
// Scores & Dates
// =============================================================================

/**
 * 0-10 decimal score to MAL's integer scale, clamped, rounding half up
 * (8.5 -> 9).
 */
export function roundScore(score: number): number {
  const clamped = Math.min(10, Math.max(0, score));
  return Math.floor(clamped + 0.5);
}

export interface FuzzyDate {
  year?: number | null;
  month?: number | null;
  day?: number | null;
}

/** Complete AniList fuzzy date -> YYYY-MM-DD; partial dates are dropped. */
export function fuzzyDateToString(date: FuzzyDate | null | undefined): string | null {
  if (!date?.year || !date.month || !date.day) return null;
  const pad = (value: number) => String(value).padStart(2, '0');
  return `${date.year}-${pad(date.month)}-${pad(date.day)}`;
}

export function stringToFuzzyDate(date: string | null): FuzzyDate | null {
  if (!date) return null;
  const match = /^(\d{4})-(\d{2})-(\d{2})$/.exec(date);
  if (!match) return null;
  return { year: Number(match[1]), month: Number(match[2]), day: Number(match[3]) };
}

/** MAL dates may be YYYY, YYYY-MM or YYYY-MM-DD; only full dates are kept. */
export function normalizeMalDate(date: string | null | undefined): string | null {
  return date && /^\d{4}-\d{2}-\d{2}$/.test(date) ? date : null;
}
