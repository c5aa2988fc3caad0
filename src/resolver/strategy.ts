/**
 * Match strategy contract
 */

import type { RunOptions } from '../config.js';
import { logDebug } from '../utils/log.js';
import type { KnownTargets, MediaEntry, MediaKind } from '../types.js';

export type MatchOutcome =
  | { found: true; target: MediaEntry }
  | { found: false };

export const NOT_FOUND: MatchOutcome = { found: false };

/**
 * Where strategies send operator-facing warnings (rejected title matches).
 */
export interface WarningSink {
  addWarning(title: string, reason: string, detail: string, mediaKind: MediaKind): void;
}

export interface StrategyContext {
  options: RunOptions;
  /** Shared cancellation signal for the whole run */
  signal: AbortSignal;
  report: WarningSink;
}

/**
 * One way of finding the destination entry for a source entry.
 *
 * attempt() resolves { found: false } when it has nothing to offer and
 * throws when its underlying lookup fails; the chain tells the two apart.
 */
export interface MatchStrategy {
  readonly name: string;
  /** Fixed at construction; disabled strategies never enter the chain */
  readonly enabled: boolean;
  attempt(source: MediaEntry, knownTargets: KnownTargets, context: StrategyContext): Promise<MatchOutcome>;
}

/**
 * A crosswalk or manual mapping pointed at `targetId`; it only counts if
 * that entry is already on the user's destination list.
 */
export function existingTarget(
  knownTargets: KnownTargets,
  targetId: number,
  context: StrategyContext,
  via: string,
): MatchOutcome {
  const target = knownTargets.get(targetId);
  if (target) {
    return { found: true, target };
  }
  logDebug(context.options.verbose, `[Resolver] ${via} mapped to ID ${targetId} but not in user's list`);
  return NOT_FOUND;
}
