/**
 * Crosswalk strategy: one instance per ID crosswalk provider (offline
 * database, ARM, Hato). The mapped ID only counts if it is already on the
 * user's destination list.
 */

import { CancellationError, errorMessage, throwIfCancelled } from '../../errors.js';
import type { CrosswalkProvider } from '../../crosswalk/provider.js';
import { logDebug } from '../../utils/log.js';
import { sourceCatalog, type KnownTargets, type MediaEntry, type MediaKind } from '../../types.js';
import { existingTarget, NOT_FOUND, type MatchOutcome, type MatchStrategy, type StrategyContext } from '../strategy.js';

export class CrosswalkStrategy implements MatchStrategy {
  readonly name: string;
  readonly enabled: boolean;

  constructor(private readonly provider: CrosswalkProvider, kind: MediaKind) {
    this.name = provider.name;
    this.enabled = provider.kinds.includes(kind);
  }

  async attempt(source: MediaEntry, knownTargets: KnownTargets, context: StrategyContext): Promise<MatchOutcome> {
    if (!this.provider.kinds.includes(source.kind)) return NOT_FOUND;

    const from = sourceCatalog(context.options.direction);
    const id = source.ids[from];
    if (id <= 0) return NOT_FOUND;

    const checkpoint = `during ${this.name} lookup`;
    if (this.provider.networked) {
      throwIfCancelled(context.signal, checkpoint);
    }

    let mappedId: number | null;
    try {
      mappedId = await this.provider.lookup(from, source.kind, id, context.signal);
    } catch (error) {
      if (error instanceof CancellationError) throw error;
      if (context.signal.aborted) throw new CancellationError(checkpoint);
      // A crosswalk outage must not stop the rest of the chain
      logDebug(context.options.verbose, `[Resolver] ${this.name} error: ${errorMessage(error)}`);
      return NOT_FOUND;
    }

    if (mappedId === null) {
      logDebug(context.options.verbose, `[Resolver] ${this.name}: no mapping for ${from} ${id}`);
      return NOT_FOUND;
    }

    return existingTarget(knownTargets, mappedId, context, this.name);
  }
}
