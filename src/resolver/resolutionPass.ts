/**
 * Resolution pass: run the strategy chain over one list of sources,
 * then deduplicate.
 *
 * States: idle -> resolving -> deduplicating -> done. A pass runs once;
 * cancellation jumps to deduplicating with whatever resolved so far and
 * marks the result truncated.
 */

import type { RunOptions } from '../config.js';
import { CancellationError, errorMessage, throwIfCancelled } from '../errors.js';
import { logDebug } from '../utils/log.js';
import {
  displayTitle,
  foreignId,
  type Conflict,
  type KnownTargets,
  type MediaEntry,
  type ResolvedMapping,
  type UnresolvedSource,
} from '../types.js';
import type { StrategyChain } from './chain.js';
import { deduplicateMappings } from './deduplicate.js';
import type { WarningSink } from './strategy.js';

export type PassState = 'idle' | 'resolving' | 'deduplicating' | 'done';

export const FORCE_SYNC_STRATEGY = 'ForceSync';

export interface PassResult {
  kept: ResolvedMapping[];
  conflicts: Conflict[];
  unresolved: UnresolvedSource[];
  /** Cancelled before every source was visited */
  truncated: boolean;
}

export interface ResolutionPassOptions {
  chain: StrategyChain;
  options: RunOptions;
  signal: AbortSignal;
  report: WarningSink;
  /** Called before each source; used for progress output */
  onSource?: (source: MediaEntry, index: number, total: number) => void;
}

export class ResolutionPass {
  private currentState: PassState = 'idle';

  constructor(private readonly deps: ResolutionPassOptions) {}

  get state(): PassState {
    return this.currentState;
  }

  async run(sources: readonly MediaEntry[], knownTargets: KnownTargets): Promise<PassResult> {
    if (this.currentState !== 'idle') {
      throw new Error(`Resolution pass already ${this.currentState}`);
    }
    this.currentState = 'resolving';

    const { chain, options, signal, report, onSource } = this.deps;
    const context = { options, signal, report };
    const resolved: ResolvedMapping[] = [];
    const unresolved: UnresolvedSource[] = [];
    let truncated = false;

    for (const [index, source] of sources.entries()) {
      try {
        throwIfCancelled(signal, 'before next source');
        onSource?.(source, index, sources.length);

        if (options.forceSync) {
          const mapping = this.forceSyncMapping(source, knownTargets);
          if (mapping) resolved.push(mapping);
          else unresolved.push({ source, reason: 'no destination ID for force sync' });
          continue;
        }

        const match = await chain.resolve(source, knownTargets, context);
        resolved.push({
          source,
          targetId: foreignId(match.target, options.direction),
          target: match.target,
          strategyName: match.strategyName,
          strategyIndex: match.strategyIndex,
        });
      } catch (error) {
        if (error instanceof CancellationError) {
          console.warn(`[Resolver] Cancelled, stopping after ${index} of ${sources.length} entries`);
          truncated = true;
          break;
        }
        // StrategyFailureError / NoTargetFoundError: this source only
        logDebug(options.verbose, `[Resolver] ${errorMessage(error)}`);
        unresolved.push({ source, reason: errorMessage(error) });
      }
    }

    this.currentState = 'deduplicating';
    const { kept, conflicts } = deduplicateMappings(resolved);

    this.currentState = 'done';
    return { kept, conflicts, unresolved, truncated };
  }

  private forceSyncMapping(source: MediaEntry, knownTargets: KnownTargets): ResolvedMapping | null {
    const targetId = foreignId(source, this.deps.options.direction);
    if (targetId <= 0) {
      logDebug(this.deps.options.verbose, `[Resolver] Force sync: "${displayTitle(source)}" has no destination ID`);
      return null;
    }
    return {
      source,
      targetId,
      target: knownTargets.get(targetId) ?? null,
      strategyName: FORCE_SYNC_STRATEGY,
      strategyIndex: -1,
    };
  }
}
