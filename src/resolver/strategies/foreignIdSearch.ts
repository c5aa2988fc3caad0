/**
 * Foreign-ID search: ask the destination catalog for the entry carrying
 * the source's ID (AniList can look titles up by MAL ID).
 */

import { throwIfCancelled } from '../../errors.js';
import { supportsForeignIdLookup, type DestinationService, type ForeignIdLookup } from '../../sources/service.js';
import { logDebug } from '../../utils/log.js';
import { foreignId, type KnownTargets, type MediaEntry } from '../../types.js';
import { NOT_FOUND, type MatchOutcome, type MatchStrategy, type StrategyContext } from '../strategy.js';

export class ForeignIdSearchStrategy implements MatchStrategy {
  readonly name = 'ForeignIdSearch';
  readonly enabled: boolean;
  private readonly lookup: ForeignIdLookup | null;

  constructor(service: DestinationService) {
    this.lookup = supportsForeignIdLookup(service) ? service : null;
    this.enabled = this.lookup !== null;
  }

  async attempt(source: MediaEntry, knownTargets: KnownTargets, context: StrategyContext): Promise<MatchOutcome> {
    throwIfCancelled(context.signal, 'during foreign ID search');
    if (!this.lookup) return NOT_FOUND;

    const id = source.ids[this.lookup.foreignCatalog];
    if (id <= 0) return NOT_FOUND;

    const result = await this.lookup.getByForeignId(id, context.signal);
    if (!result || result.kind !== source.kind) {
      logDebug(context.options.verbose, `[Resolver] Foreign ID search: nothing for ${this.lookup.foreignCatalog} ${id}`);
      return NOT_FOUND;
    }

    // Prefer the user's own entry: it carries their progress
    const existing = knownTargets.get(foreignId(result, context.options.direction));
    if (existing) {
      logDebug(context.options.verbose, `[Resolver] Foreign ID search matched existing entry`);
      return { found: true, target: existing };
    }
    return { found: true, target: result };
  }
}
