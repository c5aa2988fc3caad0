/**
 * Test builders and in-process fakes
 */

import { createRunOptions, type RunOptions } from '../src/config.js';
import type { StrategyContext } from '../src/resolver/strategy.js';
import type { DestinationService, ForeignIdLookup } from '../src/sources/service.js';
import { SyncReport } from '../src/sync/report.js';
import type {
  AnimeEntry,
  Catalog,
  MangaEntry,
  MediaEntry,
  MediaKind,
  TargetId,
  TitleSet,
} from '../src/types.js';

type EntryOverrides<T> = Partial<Omit<T, 'titles'>> & { titles?: Partial<TitleSet> };

export function anime(overrides: EntryOverrides<AnimeEntry> = {}): AnimeEntry {
  const { titles, ...rest } = overrides;
  return {
    kind: 'anime',
    ids: { anilist: 0, mal: 0 },
    status: 'completed',
    score: 0,
    startedAt: null,
    finishedAt: null,
    repeats: 0,
    episodes: 12,
    progress: 12,
    ...rest,
    titles: { english: '', native: '', romaji: '', ...titles },
  };
}

export function manga(overrides: EntryOverrides<MangaEntry> = {}): MangaEntry {
  const { titles, ...rest } = overrides;
  return {
    kind: 'manga',
    ids: { anilist: 0, mal: 0 },
    status: 'current',
    score: 0,
    startedAt: null,
    finishedAt: null,
    repeats: 0,
    chapters: 100,
    volumes: 10,
    progress: 50,
    progressVolumes: 5,
    ...rest,
    titles: { english: '', native: '', romaji: '', ...titles },
  };
}

export function knownTargets(...entries: Array<[TargetId, MediaEntry]>): Map<TargetId, MediaEntry> {
  return new Map(entries);
}

export function makeContext(overrides: Partial<RunOptions> = {}, signal: AbortSignal = new AbortController().signal): StrategyContext & { report: SyncReport } {
  return {
    options: createRunOptions({ verbose: false, ...overrides }),
    signal,
    report: new SyncReport(),
  };
}

/**
 * Destination catalog backed by plain maps. Calls are recorded so tests
 * can assert on what was looked up and written.
 */
export class FakeService implements DestinationService {
  readonly name = 'Fake';
  readonly byId = new Map<TargetId, MediaEntry>();
  readonly searchResults = new Map<string, MediaEntry[]>();
  readonly updates: Array<{ id: TargetId; source: MediaEntry }> = [];
  readonly failUpdatesFor = new Set<TargetId>();
  searchError: Error | null = null;

  constructor(readonly catalog: Catalog = 'mal', readonly kind: MediaKind = 'anime') {}

  async getById(id: TargetId): Promise<MediaEntry | null> {
    return this.byId.get(id) ?? null;
  }

  async searchByTitle(title: string): Promise<MediaEntry[]> {
    if (this.searchError) throw this.searchError;
    return this.searchResults.get(title) ?? [];
  }

  async update(id: TargetId, source: MediaEntry): Promise<void> {
    if (this.failUpdatesFor.has(id)) throw new Error(`update rejected for ${id}`);
    this.updates.push({ id, source });
  }
}

/** AniList-side fake: can also look entries up by MAL ID. */
export class FakeForeignService extends FakeService implements ForeignIdLookup {
  readonly foreignCatalog: Catalog = 'mal';
  readonly byForeignId = new Map<number, MediaEntry>();
  readonly foreignLookups: number[] = [];

  constructor(kind: MediaKind = 'anime') {
    super('anilist', kind);
  }

  async getByForeignId(id: number): Promise<MediaEntry | null> {
    this.foreignLookups.push(id);
    return this.byForeignId.get(id) ?? null;
  }
}
