/**
 * Match strategy tests
 */

import { describe, it, expect } from 'vitest';
import { CancellationError, HttpError } from '../src/errors.js';
import type { JikanManga } from '../src/crosswalk/jikan.js';
import type { CrosswalkProvider } from '../src/crosswalk/provider.js';
import { ApiSearchStrategy } from '../src/resolver/strategies/apiSearch.js';
import { CrosswalkStrategy } from '../src/resolver/strategies/crosswalk.js';
import { ExactIdStrategy } from '../src/resolver/strategies/exactId.js';
import { ForeignIdSearchStrategy } from '../src/resolver/strategies/foreignIdSearch.js';
import { JikanStrategy, type MangaTitleLookup } from '../src/resolver/strategies/jikan.js';
import { ManualMappingStrategy, type ManualMappingLookup } from '../src/resolver/strategies/manualMapping.js';
import { TitleStrategy } from '../src/resolver/strategies/title.js';
import type { Catalog, MediaKind } from '../src/types.js';
import { anime, FakeForeignService, FakeService, knownTargets, makeContext, manga } from './helpers.js';

function abortedSignal(): AbortSignal {
  const controller = new AbortController();
  controller.abort();
  return controller.signal;
}

function manualMappings(pairs: Array<[number, number]>): ManualMappingLookup {
  return {
    manualMappingCount: pairs.length,
    getManualMalId: (anilistId) => pairs.find(([al]) => al === anilistId)?.[1] ?? null,
    getManualAniListId: (malId) => pairs.find(([, mal]) => mal === malId)?.[0] ?? null,
  };
}

class FakeProvider implements CrosswalkProvider {
  readonly lookups: Array<{ from: Catalog; id: number }> = [];

  constructor(
    readonly name: string,
    private readonly mapping: Map<number, number>,
    readonly kinds: readonly MediaKind[] = ['anime'],
    readonly networked = true,
    private readonly failure: Error | null = null,
  ) {}

  async lookup(from: Catalog, _kind: MediaKind, id: number): Promise<number | null> {
    this.lookups.push({ from, id });
    if (this.failure) throw this.failure;
    return this.mapping.get(id) ?? null;
  }
}

describe('ExactIdStrategy', () => {
  const strategy = new ExactIdStrategy();

  it('finds the target by the declared MAL ID', async () => {
    const target = anime({ ids: { anilist: 0, mal: 5 } });
    const outcome = await strategy.attempt(anime({ ids: { anilist: 1, mal: 5 } }), knownTargets([5, target]), makeContext());
    expect(outcome).toEqual({ found: true, target });
  });

  it('uses the AniList ID in reverse', async () => {
    const target = anime({ ids: { anilist: 7, mal: 0 } });
    const outcome = await strategy.attempt(
      anime({ ids: { anilist: 7, mal: 3 } }),
      knownTargets([7, target]),
      makeContext({ direction: 'mal-to-anilist' }),
    );
    expect(outcome).toEqual({ found: true, target });
  });

  it('declines without a declared ID', async () => {
    const outcome = await strategy.attempt(anime(), knownTargets([5, anime()]), makeContext());
    expect(outcome).toEqual({ found: false });
  });

  it('declines when the ID is not on the list', async () => {
    const outcome = await strategy.attempt(anime({ ids: { anilist: 1, mal: 5 } }), knownTargets(), makeContext());
    expect(outcome).toEqual({ found: false });
  });
});

describe('ManualMappingStrategy', () => {
  it('is disabled without mappings', () => {
    expect(new ManualMappingStrategy(null).enabled).toBe(false);
    expect(new ManualMappingStrategy(manualMappings([])).enabled).toBe(false);
    expect(new ManualMappingStrategy(manualMappings([[1, 2]])).enabled).toBe(true);
  });

  it('maps AniList to MAL when the target is on the list', async () => {
    const strategy = new ManualMappingStrategy(manualMappings([[100, 200]]));
    const target = anime({ ids: { anilist: 0, mal: 200 } });
    const outcome = await strategy.attempt(anime({ ids: { anilist: 100, mal: 0 } }), knownTargets([200, target]), makeContext());
    expect(outcome).toEqual({ found: true, target });
  });

  it('declines quietly when the mapped ID is not on the list', async () => {
    const strategy = new ManualMappingStrategy(manualMappings([[100, 200]]));
    const outcome = await strategy.attempt(anime({ ids: { anilist: 100, mal: 0 } }), knownTargets(), makeContext());
    expect(outcome).toEqual({ found: false });
  });

  it('maps MAL to AniList in reverse', async () => {
    const strategy = new ManualMappingStrategy(manualMappings([[100, 200]]));
    const target = anime({ ids: { anilist: 100, mal: 0 } });
    const outcome = await strategy.attempt(
      anime({ ids: { anilist: 0, mal: 200 } }),
      knownTargets([100, target]),
      makeContext({ direction: 'mal-to-anilist' }),
    );
    expect(outcome).toEqual({ found: true, target });
  });
});

describe('CrosswalkStrategy', () => {
  it('takes its name from the provider and is enabled per kind', () => {
    const provider = new FakeProvider('ArmApi', new Map());
    expect(new CrosswalkStrategy(provider, 'anime').name).toBe('ArmApi');
    expect(new CrosswalkStrategy(provider, 'anime').enabled).toBe(true);
    expect(new CrosswalkStrategy(provider, 'manga').enabled).toBe(false);
  });

  it('looks the source ID up and returns the existing entry', async () => {
    const provider = new FakeProvider('ArmApi', new Map([[21, 9]]));
    const target = anime({ ids: { anilist: 0, mal: 9 } });
    const outcome = await new CrosswalkStrategy(provider, 'anime')
      .attempt(anime({ ids: { anilist: 21, mal: 0 } }), knownTargets([9, target]), makeContext());

    expect(outcome).toEqual({ found: true, target });
    expect(provider.lookups).toEqual([{ from: 'anilist', id: 21 }]);
  });

  it('declines when the mapped entry is not on the list', async () => {
    const provider = new FakeProvider('ArmApi', new Map([[21, 9]]));
    const outcome = await new CrosswalkStrategy(provider, 'anime')
      .attempt(anime({ ids: { anilist: 21, mal: 0 } }), knownTargets(), makeContext());
    expect(outcome).toEqual({ found: false });
  });

  it('treats a provider failure as no mapping', async () => {
    const provider = new FakeProvider('HatoApi', new Map(), ['anime'], true, new Error('503'));
    const outcome = await new CrosswalkStrategy(provider, 'anime')
      .attempt(anime({ ids: { anilist: 21, mal: 0 } }), knownTargets(), makeContext());
    expect(outcome).toEqual({ found: false });
  });

  it('stops before a network lookup once cancelled', async () => {
    const provider = new FakeProvider('ArmApi', new Map([[21, 9]]));
    const attempt = new CrosswalkStrategy(provider, 'anime')
      .attempt(anime({ ids: { anilist: 21, mal: 0 } }), knownTargets(), makeContext({}, abortedSignal()));

    await expect(attempt).rejects.toThrow(CancellationError);
    await expect(attempt).rejects.toThrow('context cancelled during ArmApi lookup');
    expect(provider.lookups).toEqual([]);
  });

  it('still consults a local provider after cancellation', async () => {
    const provider = new FakeProvider('OfflineDatabase', new Map([[21, 9]]), ['anime'], false);
    const target = anime({ ids: { anilist: 0, mal: 9 } });
    const outcome = await new CrosswalkStrategy(provider, 'anime')
      .attempt(anime({ ids: { anilist: 21, mal: 0 } }), knownTargets([9, target]), makeContext({}, abortedSignal()));
    expect(outcome).toEqual({ found: true, target });
  });
});

function jikanManga(malId: number, overrides: Partial<JikanManga> = {}): JikanManga {
  return { malId, title: '', titleEnglish: '', titleJapanese: '', synonyms: [], chapters: 0, volumes: 0, ...overrides };
}

class FakeJikan implements MangaTitleLookup {
  readonly byId = new Map<number, JikanManga>();
  readonly searches = new Map<string, JikanManga[]>();
  readonly queries: string[] = [];
  failure: Error | null = null;

  async getManga(malId: number): Promise<JikanManga | null> {
    if (this.failure) throw this.failure;
    return this.byId.get(malId) ?? null;
  }

  async searchManga(query: string): Promise<JikanManga[]> {
    if (this.failure) throw this.failure;
    this.queries.push(query);
    return this.searches.get(query) ?? [];
  }
}

describe('JikanStrategy', () => {
  it('is enabled for manga with a client only', () => {
    expect(new JikanStrategy(new FakeJikan(), 'manga').enabled).toBe(true);
    expect(new JikanStrategy(new FakeJikan(), 'anime').enabled).toBe(false);
    expect(new JikanStrategy(null, 'manga').enabled).toBe(false);
  });

  it('takes the first search result whose titles match', async () => {
    const jikan = new FakeJikan();
    jikan.searches.set('Berserk', [jikanManga(99, { title: 'Something Else' }), jikanManga(2, { title: 'Berserk' })]);
    const target = manga({ ids: { anilist: 0, mal: 2 }, titles: { romaji: 'Berserk' } });

    const outcome = await new JikanStrategy(jikan, 'manga').attempt(
      manga({ ids: { anilist: 30002, mal: 0 }, titles: { romaji: 'Berserk', english: 'Berserk' } }),
      knownTargets([2, target]),
      makeContext(),
    );

    expect(outcome).toEqual({ found: true, target });
    expect(jikan.queries).toEqual(['Berserk']);
  });

  it('falls back to the English title query', async () => {
    const jikan = new FakeJikan();
    jikan.searches.set('Demon Slayer', [
      jikanManga(96792, { title: 'Kimetsu no Yaiba', titleEnglish: 'Demon Slayer: Kimetsu no Yaiba', synonyms: ['Demon Slayer'] }),
    ]);
    const target = manga({ ids: { anilist: 0, mal: 96792 }, titles: { romaji: 'Kimetsu no Yaiba' } });

    const outcome = await new JikanStrategy(jikan, 'manga').attempt(
      manga({ ids: { anilist: 87216, mal: 0 }, titles: { romaji: 'Kimetsu no Yaiba Gaiden', english: 'Demon Slayer' } }),
      knownTargets([96792, target]),
      makeContext(),
    );

    expect(outcome).toEqual({ found: true, target });
    expect(jikan.queries).toEqual(['Kimetsu no Yaiba Gaiden', 'Demon Slayer']);
  });

  it('does not match a MAL ID missing from the list', async () => {
    const jikan = new FakeJikan();
    jikan.searches.set('Berserk', [jikanManga(2, { title: 'Berserk' })]);

    const outcome = await new JikanStrategy(jikan, 'manga').attempt(
      manga({ ids: { anilist: 30002, mal: 0 }, titles: { romaji: 'Berserk' } }),
      knownTargets(),
      makeContext(),
    );

    expect(outcome).toEqual({ found: false });
  });

  it('leaves sources that already carry the foreign ID alone', async () => {
    const jikan = new FakeJikan();
    const outcome = await new JikanStrategy(jikan, 'manga').attempt(
      manga({ ids: { anilist: 30002, mal: 2 }, titles: { romaji: 'Berserk' } }),
      knownTargets(),
      makeContext(),
    );

    expect(outcome).toEqual({ found: false });
    expect(jikan.queries).toEqual([]);
  });

  it('matches the Jikan titles of a MAL entry against the AniList list', async () => {
    const jikan = new FakeJikan();
    jikan.byId.set(2, jikanManga(2, { title: 'Berserk', titleJapanese: 'ベルセルク' }));
    const other = manga({ ids: { anilist: 30001, mal: 0 }, titles: { native: 'ワンピース' } });
    const target = manga({ ids: { anilist: 30002, mal: 0 }, titles: { native: 'ベルセルク' } });

    const outcome = await new JikanStrategy(jikan, 'manga').attempt(
      manga({ ids: { anilist: 0, mal: 2 }, titles: { romaji: 'Berserk' } }),
      knownTargets([30001, other], [30002, target]),
      makeContext({ direction: 'mal-to-anilist' }),
    );

    expect(outcome).toEqual({ found: true, target });
  });

  it('treats a lookup failure as no match', async () => {
    const jikan = new FakeJikan();
    jikan.failure = new HttpError('JikanApi', 503, 'Service Unavailable');

    const outcome = await new JikanStrategy(jikan, 'manga').attempt(
      manga({ ids: { anilist: 30002, mal: 0 }, titles: { romaji: 'Berserk' } }),
      knownTargets(),
      makeContext(),
    );

    expect(outcome).toEqual({ found: false });
  });

  it('throws once the run is cancelled', async () => {
    await expect(new JikanStrategy(new FakeJikan(), 'manga').attempt(
      manga({ ids: { anilist: 30002, mal: 0 }, titles: { romaji: 'Berserk' } }),
      knownTargets(),
      makeContext({}, abortedSignal()),
    )).rejects.toBeInstanceOf(CancellationError);
  });
});

describe('TitleStrategy', () => {
  const strategy = new TitleStrategy();

  it('prefers an exact display-title match', async () => {
    const upper = anime({ ids: { anilist: 0, mal: 1 }, titles: { english: 'NARUTO' }, episodes: 220 });
    const exact = anime({ ids: { anilist: 0, mal: 2 }, titles: { english: 'Naruto' }, episodes: 220 });
    const source = anime({ titles: { english: 'Naruto' }, episodes: 220 });

    const outcome = await strategy.attempt(source, knownTargets([1, upper], [2, exact]), makeContext());
    expect(outcome).toEqual({ found: true, target: exact });
  });

  it('falls back to a fuzzy title match', async () => {
    const target = anime({ ids: { anilist: 457, mal: 457 }, titles: { romaji: 'Mushishi (TV)' } });
    const source = anime({ ids: { anilist: 0, mal: 457 }, titles: { english: 'Mushi-shi', romaji: 'Mushishi' } });

    const outcome = await strategy.attempt(source, knownTargets([457, target]), makeContext({ direction: 'mal-to-anilist' }));
    expect(outcome).toEqual({ found: true, target });
  });

  it('records a warning for a rejected candidate', async () => {
    const source = anime({ ids: { anilist: 1, mal: 10 }, titles: { english: 'Show' } });
    const candidate = anime({ ids: { anilist: 0, mal: 3 }, titles: { english: 'show' } });
    const context = makeContext();

    const outcome = await strategy.attempt(source, knownTargets([3, candidate]), context);

    expect(outcome).toEqual({ found: false });
    expect(context.report.warnings).toEqual([
      { title: 'Show', reason: 'ID mismatch', detail: '(10 vs 3)', mediaKind: 'anime' },
    ]);
  });

  it.each([
    { label: '12 vs 13 episodes', sourceEpisodes: 12, targetEpisodes: 13, found: true },
    { label: '24 vs 25 episodes', sourceEpisodes: 24, targetEpisodes: 25, found: true },
    { label: '2 vs 13 episodes', sourceEpisodes: 2, targetEpisodes: 13, found: true },
    { label: '0 vs 4 episodes', sourceEpisodes: 0, targetEpisodes: 4, found: true },
    { label: 'unknown counts on both sides', sourceEpisodes: 0, targetEpisodes: 0, found: true },
    { label: '1 vs 13 episodes', sourceEpisodes: 1, targetEpisodes: 13, found: false },
    { label: '0 vs 5 episodes', sourceEpisodes: 0, targetEpisodes: 5, found: false },
  ])('fuzzy match at $label: found=$found', async ({ sourceEpisodes, targetEpisodes, found }) => {
    const source = anime({ ids: { anilist: 0, mal: 500 }, titles: { english: 'Test Anime (Movie)' }, episodes: sourceEpisodes });
    const target = anime({ ids: { anilist: 900, mal: 0 }, titles: { english: 'Test Anime' }, episodes: targetEpisodes });
    const context = makeContext({ direction: 'mal-to-anilist' });

    const outcome = await strategy.attempt(source, knownTargets([900, target]), context);

    expect(outcome).toEqual(found ? { found: true, target } : { found: false });
    expect(context.report.warnings).toEqual(found ? [] : [{
      title: 'Test Anime (Movie)',
      reason: 'episode count mismatch (special vs series)',
      detail: `(${sourceEpisodes} vs ${targetEpisodes})`,
      mediaKind: 'anime',
    }]);
  });

  it('rejects a titled variant without a MAL ID against a catalogued series', async () => {
    const source = anime({ ids: { anilist: 7, mal: 0 }, titles: { native: 'テストアニメ (新作映画)' }, episodes: 1 });
    const target = anime({ ids: { anilist: 0, mal: 12345 }, titles: { native: 'テストアニメ' }, episodes: 13 });
    const context = makeContext();

    expect(await strategy.attempt(source, knownTargets([12345, target]), context)).toEqual({ found: false });
    expect(context.report.warnings).toEqual([{
      title: 'テストアニメ (新作映画)',
      reason: 'different titles (source has no MAL ID, target has different MAL ID)',
      detail: '(1 vs 13)',
      mediaKind: 'anime',
    }]);
  });

  it('matches identical titles at 12 vs 13 episodes without a MAL ID', async () => {
    const source = anime({ ids: { anilist: 7, mal: 0 }, titles: { english: 'Test Anime' }, episodes: 12 });
    const target = anime({ ids: { anilist: 0, mal: 12345 }, titles: { english: 'Test Anime' }, episodes: 13 });

    expect(await strategy.attempt(source, knownTargets([12345, target]), makeContext())).toEqual({ found: true, target });
  });

  it('does not treat a blank title as an exact match', async () => {
    const untitled = anime({ ids: { anilist: 0, mal: 8 }, episodes: 24 });
    const source = anime({ ids: { anilist: 3, mal: 0 }, episodes: 1 });

    expect(await strategy.attempt(source, knownTargets([8, untitled]), makeContext())).toEqual({ found: false });
  });

  it('only considers entries of the same kind', async () => {
    const other = manga({ ids: { anilist: 0, mal: 4 }, titles: { english: 'Berserk' } });
    const outcome = await strategy.attempt(anime({ titles: { english: 'Berserk' } }), knownTargets([4, other]), makeContext());
    expect(outcome).toEqual({ found: false });
  });
});

describe('ForeignIdSearchStrategy', () => {
  it('is disabled for a destination without foreign-ID lookup', () => {
    expect(new ForeignIdSearchStrategy(new FakeService('mal')).enabled).toBe(false);
    expect(new ForeignIdSearchStrategy(new FakeForeignService()).enabled).toBe(true);
  });

  it('returns the user\'s existing entry over the fetched one', async () => {
    const service = new FakeForeignService();
    service.byForeignId.set(37341, anime({ ids: { anilist: 101206, mal: 37341 }, status: null }));
    const existing = anime({ ids: { anilist: 101206, mal: 37341 }, status: 'current', progress: 3 });

    const outcome = await new ForeignIdSearchStrategy(service).attempt(
      anime({ ids: { anilist: 0, mal: 37341 } }),
      knownTargets([101206, existing]),
      makeContext({ direction: 'mal-to-anilist' }),
    );

    expect(outcome).toEqual({ found: true, target: existing });
    expect(service.foreignLookups).toEqual([37341]);
  });

  it('returns the fetched entry when it is not on the list', async () => {
    const service = new FakeForeignService();
    const fetched = anime({ ids: { anilist: 101206, mal: 37341 }, status: null });
    service.byForeignId.set(37341, fetched);

    const outcome = await new ForeignIdSearchStrategy(service).attempt(
      anime({ ids: { anilist: 0, mal: 37341 } }),
      knownTargets(),
      makeContext({ direction: 'mal-to-anilist' }),
    );
    expect(outcome).toEqual({ found: true, target: fetched });
  });

  it('ignores a result of another kind', async () => {
    const service = new FakeForeignService();
    service.byForeignId.set(2, manga({ ids: { anilist: 30002, mal: 2 } }));

    const outcome = await new ForeignIdSearchStrategy(service).attempt(
      anime({ ids: { anilist: 0, mal: 2 } }),
      knownTargets(),
      makeContext({ direction: 'mal-to-anilist' }),
    );
    expect(outcome).toEqual({ found: false });
  });

  it('checks cancellation first', async () => {
    const service = new FakeForeignService();
    const attempt = new ForeignIdSearchStrategy(service).attempt(
      anime({ ids: { anilist: 0, mal: 2 } }),
      knownTargets(),
      makeContext({ direction: 'mal-to-anilist' }, abortedSignal()),
    );
    await expect(attempt).rejects.toThrow('context cancelled during foreign ID search');
    expect(service.foreignLookups).toEqual([]);
  });
});

describe('ApiSearchStrategy', () => {
  it('fetches by the declared destination ID', async () => {
    const service = new FakeService('mal');
    const fetched = anime({ ids: { anilist: 0, mal: 5 }, status: null });
    service.byId.set(5, fetched);

    const outcome = await new ApiSearchStrategy(service)
      .attempt(anime({ ids: { anilist: 1, mal: 5 } }), knownTargets(), makeContext());
    expect(outcome).toEqual({ found: true, target: fetched });
  });

  it('declines when the declared ID does not exist', async () => {
    const outcome = await new ApiSearchStrategy(new FakeService('mal'))
      .attempt(anime({ ids: { anilist: 1, mal: 5 } }), knownTargets(), makeContext());
    expect(outcome).toEqual({ found: false });
  });

  it('searches by title when no ID is known', async () => {
    const service = new FakeService('mal');
    const found = anime({ ids: { anilist: 0, mal: 329 }, titles: { romaji: 'Planetes' }, episodes: 26 });
    service.searchResults.set('Planetes', [found]);

    const outcome = await new ApiSearchStrategy(service)
      .attempt(anime({ titles: { english: 'Planetes' }, episodes: 26 }), knownTargets(), makeContext());
    expect(outcome).toEqual({ found: true, target: found });
  });

  it('rejects an existing entry that fails the false-positive checks', async () => {
    const service = new FakeService('mal');
    service.searchResults.set('Planetes', [anime({ ids: { anilist: 0, mal: 329 }, titles: { romaji: 'Planetes' } })]);
    const existing = anime({ ids: { anilist: 0, mal: 329 }, titles: { romaji: 'Planetes' }, episodes: 1 });
    const context = makeContext();

    const outcome = await new ApiSearchStrategy(service)
      .attempt(anime({ titles: { english: 'Planetes' }, episodes: 26 }), knownTargets([329, existing]), context);

    expect(outcome).toEqual({ found: false });
    expect(context.report.warnings).toEqual([
      { title: 'Planetes', reason: 'episode count mismatch', detail: '(26 vs 1)', mediaKind: 'anime' },
    ]);
  });

  it('skips results of a different kind', async () => {
    const service = new FakeService('mal');
    service.searchResults.set('Berserk', [manga({ ids: { anilist: 0, mal: 2 }, titles: { romaji: 'Berserk' } })]);

    const outcome = await new ApiSearchStrategy(service)
      .attempt(anime({ titles: { english: 'Berserk' } }), knownTargets(), makeContext());
    expect(outcome).toEqual({ found: false });
  });

  it('lets a search failure propagate', async () => {
    const service = new FakeService('mal');
    service.searchError = new Error('search unavailable');
    const attempt = new ApiSearchStrategy(service)
      .attempt(anime({ titles: { english: 'Anything' } }), knownTargets(), makeContext());
    await expect(attempt).rejects.toThrow('search unavailable');
  });

  it('checks cancellation first', async () => {
    const attempt = new ApiSearchStrategy(new FakeService('mal'))
      .attempt(anime({ titles: { english: 'Anything' } }), knownTargets(), makeContext({}, abortedSignal()));
    await expect(attempt).rejects.toThrow('context cancelled during API search');
  });
});
