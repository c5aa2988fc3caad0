/**
 * Deduplicator: when several sources resolved to the same destination
 * entry, keep one and record the rest as conflicts.
 */

import { identicalTitleIgnoreCase } from '../matching/entries.js';
import { displayTitle, type Conflict, type ResolvedMapping, type TargetId } from '../types.js';

export interface DeduplicationResult {
  kept: ResolvedMapping[];
  conflicts: Conflict[];
}

function exactTitle(mapping: ResolvedMapping): boolean {
  return mapping.target !== null && identicalTitleIgnoreCase(mapping.source, mapping.target);
}

function originKey(mapping: ResolvedMapping): number {
  // Either catalog's ID works as a stable tiebreak; prefer AniList's
  return mapping.source.ids.anilist || mapping.source.ids.mal;
}

/**
 * Winner ordering inside a group: lowest strategy index, then exact title
 * match with the target, then source ID, then source title.
 */
export function compareClaims(a: ResolvedMapping, b: ResolvedMapping): number {
  if (a.strategyIndex !== b.strategyIndex) return a.strategyIndex - b.strategyIndex;

  const aExact = exactTitle(a);
  const bExact = exactTitle(b);
  if (aExact !== bExact) return aExact ? -1 : 1;

  const aId = originKey(a);
  const bId = originKey(b);
  if (aId !== bId) return aId - bId;

  const aTitle = displayTitle(a.source);
  const bTitle = displayTitle(b.source);
  if (aTitle < bTitle) return -1;
  if (aTitle > bTitle) return 1;
  return 0;
}

/**
 * Groups keep the order in which their target first appeared; singletons
 * pass through untouched.
 */
export function deduplicateMappings(mappings: readonly ResolvedMapping[]): DeduplicationResult {
  const groups = new Map<TargetId, ResolvedMapping[]>();
  for (const mapping of mappings) {
    const group = groups.get(mapping.targetId);
    if (group) group.push(mapping);
    else groups.set(mapping.targetId, [mapping]);
  }

  const kept: ResolvedMapping[] = [];
  const conflicts: Conflict[] = [];

  for (const [targetId, group] of groups) {
    if (group.length === 1) {
      kept.push(group[0]);
      continue;
    }

    const [winner, ...losers] = [...group].sort(compareClaims);
    kept.push(winner);
    for (const loser of losers) {
      conflicts.push({
        loser: loser.source,
        winner: winner.source,
        targetId,
        target: winner.target ?? loser.target,
        loserStrategy: loser.strategyName,
        winnerStrategy: winner.strategyName,
      });
    }
  }

  return { kept, conflicts };
}
