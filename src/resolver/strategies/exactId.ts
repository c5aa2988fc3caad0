/**
 * Exact-ID strategy: the source already knows its destination ID.
 */

import { logDebug } from '../../utils/log.js';
import { foreignId, type KnownTargets, type MediaEntry } from '../../types.js';
import { NOT_FOUND, type MatchOutcome, type MatchStrategy, type StrategyContext } from '../strategy.js';

export class ExactIdStrategy implements MatchStrategy {
  readonly name = 'ExactId';
  readonly enabled = true;

  async attempt(source: MediaEntry, knownTargets: KnownTargets, context: StrategyContext): Promise<MatchOutcome> {
    const id = foreignId(source, context.options.direction);
    if (id <= 0) return NOT_FOUND;

    const target = knownTargets.get(id);
    if (!target) return NOT_FOUND;

    logDebug(context.options.verbose, `[Resolver] Found target by ID ${id}`);
    return { found: true, target };
  }
}
