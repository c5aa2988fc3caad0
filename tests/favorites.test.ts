/**
 * Favourites sync tests
 */

import { describe, it, expect } from 'vitest';
import { CancellationError, HttpError } from '../src/errors.js';
import { FavoritesSync, type FavoriteSets, type FavouriteWriter } from '../src/sync/favorites.js';
import { SyncReport } from '../src/sync/report.js';
import type { MediaKind, TargetId } from '../src/types.js';
import { manga } from './helpers.js';

class FakeWriter implements FavouriteWriter {
  readonly toggled: Array<{ kind: MediaKind; id: TargetId }> = [];
  readonly failFor = new Set<TargetId>();

  async toggleFavourite(kind: MediaKind, mediaId: TargetId): Promise<void> {
    if (this.failFor.has(mediaId)) {
      throw new HttpError('AniList', 500, 'Internal Server Error');
    }
    this.toggled.push({ kind, id: mediaId });
  }
}

const entries = [
  manga({ ids: { anilist: 1, mal: 11 }, titles: { english: 'Only On MAL' } }),
  manga({ ids: { anilist: 2, mal: 12 }, titles: { english: 'Only On AniList' } }),
  manga({ ids: { anilist: 3, mal: 13 }, titles: { english: 'Both' } }),
  manga({ ids: { anilist: 4, mal: 0 }, titles: { english: 'No MAL ID' } }),
  manga({ ids: { anilist: 5, mal: 15 }, titles: { english: 'Neither' } }),
];

const favorites: FavoriteSets = { anilist: new Set([2, 3]), mal: new Set([11, 13]) };

const signal = new AbortController().signal;

describe('FavoritesSync.addToAniList', () => {
  it('adds favourites that are only on MAL', async () => {
    const writer = new FakeWriter();
    const result = await new FavoritesSync(writer, { dryRun: false, verbose: false }).addToAniList(entries, favorites, signal);

    expect(result).toEqual({ added: 1, skipped: 4, errors: 0, mismatches: [] });
    expect(writer.toggled).toEqual([{ kind: 'manga', id: 1 }]);
  });

  it('writes nothing on a dry run', async () => {
    const writer = new FakeWriter();
    const result = await new FavoritesSync(writer, { dryRun: true, verbose: false }).addToAniList(entries, favorites, signal);

    expect(result.added).toBe(1);
    expect(writer.toggled).toEqual([]);
  });

  it('counts a failed write and carries on', async () => {
    const writer = new FakeWriter();
    writer.failFor.add(1);
    const result = await new FavoritesSync(writer, { dryRun: false, verbose: false }).addToAniList(entries, favorites, signal);

    expect(result).toEqual({ added: 0, skipped: 4, errors: 1, mismatches: [] });
  });

  it('stops once the run is cancelled', async () => {
    const controller = new AbortController();
    controller.abort();

    await expect(new FavoritesSync(new FakeWriter(), { dryRun: false, verbose: false })
      .addToAniList(entries, favorites, controller.signal)).rejects.toBeInstanceOf(CancellationError);
  });
});

describe('FavoritesSync.reportMismatches', () => {
  it('lists entries favourited on one side only', () => {
    const writer = new FakeWriter();
    const result = new FavoritesSync(writer, { dryRun: false, verbose: false }).reportMismatches(entries, favorites);

    expect(result.mismatches).toEqual([
      { title: 'Only On MAL', anilistId: 1, malId: 11, mediaKind: 'manga', onAniList: false, onMal: true },
      { title: 'Only On AniList', anilistId: 2, malId: 12, mediaKind: 'manga', onAniList: true, onMal: false },
    ]);
    expect(writer.toggled).toEqual([]);
  });

  it('feeds the sync report', () => {
    const report = new SyncReport();
    const sync = new FavoritesSync(new FakeWriter(), { dryRun: false, verbose: false });

    report.addFavorites(sync.reportMismatches(entries, favorites));
    report.addFavorites({ added: 2, skipped: 0, errors: 0, mismatches: [] });

    expect(report.favoritesAdded).toBe(2);
    expect(report.favoriteMismatches.map(mismatch => mismatch.title)).toEqual(['Only On MAL', 'Only On AniList']);
  });
});
