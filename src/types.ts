/**
 * listsync Type Definitions
 */

// =============================================================================
// Catalogs & Directions
// =============================================================================

export type Catalog = 'anilist' | 'mal';

export type MediaKind = 'anime' | 'manga';

/**
 * anilist-to-mal reads the AniList list and writes MAL ("forward"),
 * mal-to-anilist does the opposite ("reverse").
 */
export type SyncDirection = 'anilist-to-mal' | 'mal-to-anilist';

export function sourceCatalog(direction: SyncDirection): Catalog {
  return direction === 'anilist-to-mal' ? 'anilist' : 'mal';
}

export function destinationCatalog(direction: SyncDirection): Catalog {
  return direction === 'anilist-to-mal' ? 'mal' : 'anilist';
}

export function otherCatalog(catalog: Catalog): Catalog {
  return catalog === 'anilist' ? 'mal' : 'anilist';
}

// =============================================================================
// List Entries
// =============================================================================

/**
 * Status vocabulary shared by both catalogs. MAL has no "repeating" status;
 * it is expressed there as completed + is_rewatching.
 */
export type ListStatus = 'current' | 'planning' | 'completed' | 'dropped' | 'paused' | 'repeating';

/** IDs of one title in both catalogs. 0 means unknown. */
export interface CatalogIds {
  anilist: number;
  mal: number;
}

/** Title variants. Empty string means the catalog had none. */
export interface TitleSet {
  english: string;
  native: string;
  romaji: string;
}

interface BaseEntry {
  ids: CatalogIds;
  titles: TitleSet;
  /** null when the entry is not on the user's list (e.g. a search result) */
  status: ListStatus | null;
  /** 0-10, 0 = unscored */
  score: number;
  startedAt: string | null;   // YYYY-MM-DD
  finishedAt: string | null;  // YYYY-MM-DD
  repeats: number;
}

export interface AnimeEntry extends BaseEntry {
  kind: 'anime';
  episodes: number;           // 0 = unknown / airing
  progress: number;           // episodes watched
}

export interface MangaEntry extends BaseEntry {
  kind: 'manga';
  chapters: number;
  volumes: number;
  progress: number;           // chapters read
  progressVolumes: number;
}

export type MediaEntry = AnimeEntry | MangaEntry;

/** Destination-catalog ID. */
export type TargetId = number;

/** The user's destination list, keyed by destination-catalog ID. */
export type KnownTargets = ReadonlyMap<TargetId, MediaEntry>;

// =============================================================================
// Resolution Results
// =============================================================================

export interface ResolvedMapping {
  source: MediaEntry;
  targetId: TargetId;
  /** null only for force-sync mappings whose target is not on the user's list */
  target: MediaEntry | null;
  strategyName: string;
  /** Position in the chain; lower wins. Force-sync mappings use -1. */
  strategyIndex: number;
}

export interface Conflict {
  loser: MediaEntry;
  winner: MediaEntry;
  targetId: TargetId;
  target: MediaEntry | null;
  loserStrategy: string;
  winnerStrategy: string;
}

export interface UnresolvedSource {
  source: MediaEntry;
  reason: string;
}

// =============================================================================
// Entry Helpers
// =============================================================================

/** Display title: English, then native, then romaji. */
export function displayTitle(entry: MediaEntry): string {
  return entry.titles.english || entry.titles.native || entry.titles.romaji;
}

/** The entry's ID in the catalog it is being synced from. */
export function originId(entry: MediaEntry, direction: SyncDirection): number {
  return entry.ids[sourceCatalog(direction)];
}

/**
 * The entry's ID in the destination catalog: for a source this is its
 * already-known foreign ID, for a target it is its key.
 */
export function foreignId(entry: MediaEntry, direction: SyncDirection): TargetId {
  return entry.ids[destinationCatalog(direction)];
}

export function describeEntry(entry: MediaEntry): string {
  const counts = entry.kind === 'anime'
    ? `${entry.progress}/${entry.episodes} eps`
    : `${entry.progress}/${entry.chapters} ch, ${entry.progressVolumes}/${entry.volumes} vol`;
  return `"${displayTitle(entry)}" (AniList: ${entry.ids.anilist}, MAL: ${entry.ids.mal}, ${entry.status ?? 'no status'}, ${counts}, score ${entry.score})`;
}
