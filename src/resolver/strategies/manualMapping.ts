/**
 * Manual-mapping strategy: operator-supplied AniList <-> MAL pairs from
 * the mappings file, for titles the automatic strategies get wrong.
 */

import { logDebug } from '../../utils/log.js';
import type { KnownTargets, MediaEntry } from '../../types.js';
import { existingTarget, NOT_FOUND, type MatchOutcome, type MatchStrategy, type StrategyContext } from '../strategy.js';

export interface ManualMappingLookup {
  readonly manualMappingCount: number;
  getManualMalId(anilistId: number): number | null;
  getManualAniListId(malId: number): number | null;
}

export class ManualMappingStrategy implements MatchStrategy {
  readonly name = 'ManualMapping';
  readonly enabled: boolean;

  constructor(private readonly mappings: ManualMappingLookup | null) {
    this.enabled = mappings !== null && mappings.manualMappingCount > 0;
  }

  async attempt(source: MediaEntry, knownTargets: KnownTargets, context: StrategyContext): Promise<MatchOutcome> {
    if (!this.mappings) return NOT_FOUND;

    const mappedId = context.options.direction === 'anilist-to-mal'
      ? (source.ids.anilist > 0 ? this.mappings.getManualMalId(source.ids.anilist) : null)
      : (source.ids.mal > 0 ? this.mappings.getManualAniListId(source.ids.mal) : null);
    if (mappedId === null) return NOT_FOUND;

    logDebug(context.options.verbose, `[Resolver] Manual mapping points to ID ${mappedId}`);
    return existingTarget(knownTargets, mappedId, context, 'Manual mapping');
  }
}
