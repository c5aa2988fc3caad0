/**
 * API search: last resort. Fetch by destination ID when the source knows
 * it, otherwise search the destination catalog by title.
 */

import { sameKindAndTitle, shouldRejectCandidate } from '../../matching/entries.js';
import { throwIfCancelled } from '../../errors.js';
import type { DestinationService } from '../../sources/service.js';
import { logDebug } from '../../utils/log.js';
import { displayTitle, foreignId, type KnownTargets, type MediaEntry } from '../../types.js';
import { NOT_FOUND, type MatchOutcome, type MatchStrategy, type StrategyContext } from '../strategy.js';

export class ApiSearchStrategy implements MatchStrategy {
  readonly name = 'ApiSearch';
  readonly enabled = true;

  constructor(private readonly service: DestinationService) {}

  async attempt(source: MediaEntry, knownTargets: KnownTargets, context: StrategyContext): Promise<MatchOutcome> {
    throwIfCancelled(context.signal, 'during API search');

    const { direction, verbose } = context.options;
    const id = foreignId(source, direction);
    if (id > 0) {
      const fetched = await this.service.getById(id, context.signal);
      if (!fetched) return NOT_FOUND;
      return { found: true, target: knownTargets.get(id) ?? fetched };
    }

    const title = displayTitle(source);
    const results = await this.service.searchByTitle(title, context.signal);
    for (const result of results) {
      const existing = knownTargets.get(foreignId(result, direction));
      if (existing) {
        const rejection = shouldRejectCandidate(source, existing, direction);
        if (rejection) {
          context.report.addWarning(title, rejection.reason, rejection.detail, source.kind);
          continue;
        }
        if (!sameKindAndTitle(source, existing, direction)) continue;
        logDebug(verbose, `[Resolver] API search matched existing entry "${displayTitle(existing)}"`);
        return { found: true, target: existing };
      }

      if (sameKindAndTitle(source, result, direction)) {
        logDebug(verbose, `[Resolver] API search matched "${displayTitle(result)}"`);
        return { found: true, target: result };
      }
      logDebug(verbose, `[Resolver] API search: type mismatch for "${displayTitle(result)}", skipping`);
    }

    return NOT_FOUND;
  }
}
