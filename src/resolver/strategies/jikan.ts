/**
 * Jikan strategy (manga only). Forward: search Jikan by the AniList
 * titles, take the first result whose titles match, and look its MAL ID up
 * on the user's list. Reverse: fetch the MAL entry's titles from Jikan and
 * match them against the user's AniList list.
 */

import { CancellationError, errorMessage, throwIfCancelled } from '../../errors.js';
import { matchesJikanManga, searchQueries, type JikanManga } from '../../crosswalk/jikan.js';
import { logDebug } from '../../utils/log.js';
import { displayTitle, type KnownTargets, type MediaEntry, type MediaKind } from '../../types.js';
import { existingTarget, NOT_FOUND, type MatchOutcome, type MatchStrategy, type StrategyContext } from '../strategy.js';

/** The two Jikan lookups the strategy needs */
export interface MangaTitleLookup {
  getManga(malId: number, signal?: AbortSignal): Promise<JikanManga | null>;
  searchManga(query: string, signal?: AbortSignal): Promise<JikanManga[]>;
}

export class JikanStrategy implements MatchStrategy {
  readonly name = 'JikanApi';
  readonly enabled: boolean;

  constructor(private readonly jikan: MangaTitleLookup | null, kind: MediaKind) {
    this.enabled = jikan !== null && kind === 'manga';
  }

  async attempt(source: MediaEntry, knownTargets: KnownTargets, context: StrategyContext): Promise<MatchOutcome> {
    if (!this.jikan || source.kind !== 'manga') return NOT_FOUND;

    const checkpoint = `during ${this.name} lookup`;
    throwIfCancelled(context.signal, checkpoint);

    try {
      if (context.options.direction === 'anilist-to-mal') {
        if (source.ids.mal > 0) return NOT_FOUND;
        return await this.findMalTarget(this.jikan, source, knownTargets, context);
      }
      if (source.ids.anilist > 0 || source.ids.mal <= 0) return NOT_FOUND;
      return await this.findAniListTarget(this.jikan, source, knownTargets, context);
    } catch (error) {
      if (error instanceof CancellationError) throw error;
      if (context.signal.aborted) throw new CancellationError(checkpoint);
      // Jikan is best effort, like the crosswalks
      logDebug(context.options.verbose, `[Resolver] ${this.name} error: ${errorMessage(error)}`);
      return NOT_FOUND;
    }
  }

  private async findMalTarget(
    jikan: MangaTitleLookup,
    source: MediaEntry,
    knownTargets: KnownTargets,
    context: StrategyContext,
  ): Promise<MatchOutcome> {
    for (const query of searchQueries(source.titles)) {
      const results = await jikan.searchManga(query, context.signal);
      const match = results.find(result => matchesJikanManga(result, source.titles));
      if (match) {
        logDebug(context.options.verbose, `[Resolver] ${this.name}: "${displayTitle(source)}" -> MAL ${match.malId}`);
        return existingTarget(knownTargets, match.malId, context, this.name);
      }
    }
    logDebug(context.options.verbose, `[Resolver] ${this.name}: no match for "${displayTitle(source)}"`);
    return NOT_FOUND;
  }

  private async findAniListTarget(
    jikan: MangaTitleLookup,
    source: MediaEntry,
    knownTargets: KnownTargets,
    context: StrategyContext,
  ): Promise<MatchOutcome> {
    const manga = await jikan.getManga(source.ids.mal, context.signal);
    if (!manga) return NOT_FOUND;

    for (const target of knownTargets.values()) {
      if (target.kind === 'manga' && matchesJikanManga(manga, target.titles)) {
        logDebug(context.options.verbose, `[Resolver] ${this.name}: MAL ${manga.malId} -> "${displayTitle(target)}" (AniList ${target.ids.anilist})`);
        return { found: true, target };
      }
    }
    logDebug(context.options.verbose, `[Resolver] ${this.name}: MAL ${manga.malId} (${manga.title}) not on the list`);
    return NOT_FOUND;
  }
}
