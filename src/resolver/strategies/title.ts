/**
 * Title strategy: match against the user's destination list by title.
 *
 * Candidates are scanned in title order. An exact display-title match wins
 * outright; otherwise the first fuzzy match that survives the
 * false-positive checks is taken.
 */

import { sameTitle, shouldRejectCandidate } from '../../matching/entries.js';
import { logDebug } from '../../utils/log.js';
import { displayTitle, type KnownTargets, type MediaEntry } from '../../types.js';
import { NOT_FOUND, type MatchOutcome, type MatchStrategy, type StrategyContext } from '../strategy.js';

function byDisplayTitle(a: MediaEntry, b: MediaEntry): number {
  const left = displayTitle(a);
  const right = displayTitle(b);
  if (left < right) return -1;
  if (left > right) return 1;
  return 0;
}

export class TitleStrategy implements MatchStrategy {
  readonly name = 'Title';
  readonly enabled = true;

  async attempt(source: MediaEntry, knownTargets: KnownTargets, context: StrategyContext): Promise<MatchOutcome> {
    const { direction, verbose } = context.options;
    const title = displayTitle(source);
    const candidates = [...knownTargets.values()]
      .filter(candidate => candidate.kind === source.kind)
      .sort(byDisplayTitle);

    // A blank title would pair with any untitled candidate
    const exact = title.trim() === '' ? undefined : candidates.find(candidate => displayTitle(candidate) === title);
    if (exact) {
      logDebug(verbose, `[Resolver] Found target by exact title: "${title}"`);
      return { found: true, target: exact };
    }

    for (const candidate of candidates) {
      if (!sameTitle(source, candidate)) continue;

      const rejection = shouldRejectCandidate(source, candidate, direction);
      if (rejection) {
        logDebug(verbose, `[Resolver] Rejected title match "${title}" -> "${displayTitle(candidate)}": ${rejection.reason}`);
        context.report.addWarning(title, rejection.reason, rejection.detail, source.kind);
        continue;
      }

      logDebug(verbose, `[Resolver] Found target by title: "${title}" -> "${displayTitle(candidate)}"`);
      return { found: true, target: candidate };
    }

    return NOT_FOUND;
  }
}
