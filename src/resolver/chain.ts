/**
 * Strategy chain: runs match strategies in priority order and stops at the
 * first that finds a target.
 */

import { CancellationError, NoTargetFoundError, StrategyFailureError } from '../errors.js';
import type { CrosswalkProvider } from '../crosswalk/provider.js';
import type { DestinationService } from '../sources/service.js';
import { logDebug } from '../utils/log.js';
import { displayTitle, type KnownTargets, type MediaEntry, type MediaKind } from '../types.js';
import type { MatchOutcome, MatchStrategy, StrategyContext } from './strategy.js';
import { ApiSearchStrategy } from './strategies/apiSearch.js';
import { CrosswalkStrategy } from './strategies/crosswalk.js';
import { ExactIdStrategy } from './strategies/exactId.js';
import { ForeignIdSearchStrategy } from './strategies/foreignIdSearch.js';
import { JikanStrategy, type MangaTitleLookup } from './strategies/jikan.js';
import { ManualMappingStrategy, type ManualMappingLookup } from './strategies/manualMapping.js';
import { TitleStrategy } from './strategies/title.js';

export interface ChainMatch {
  target: MediaEntry;
  strategyName: string;
  /** Position of the strategy in the chain; lower = higher priority */
  strategyIndex: number;
}

export class StrategyChain {
  /** Enabled strategies only; indices are fixed for the chain's lifetime */
  readonly strategies: readonly MatchStrategy[];

  constructor(strategies: MatchStrategy[]) {
    this.strategies = strategies.filter(strategy => strategy.enabled);
  }

  get names(): string[] {
    return this.strategies.map(strategy => strategy.name);
  }

  /**
   * Throws StrategyFailureError when a strategy's lookup fails,
   * NoTargetFoundError when every strategy declines, and CancellationError
   * (unwrapped) when the run is cancelled.
   */
  async resolve(source: MediaEntry, knownTargets: KnownTargets, context: StrategyContext): Promise<ChainMatch> {
    for (const [strategyIndex, strategy] of this.strategies.entries()) {
      let outcome: MatchOutcome;
      try {
        outcome = await strategy.attempt(source, knownTargets, context);
      } catch (error) {
        if (error instanceof CancellationError) throw error;
        if (context.signal.aborted) throw new CancellationError(`during ${strategy.name}`);
        throw new StrategyFailureError(strategy.name, error);
      }

      if (outcome.found) {
        logDebug(
          context.options.verbose,
          `[Resolver] "${displayTitle(source)}" -> "${displayTitle(outcome.target)}" via ${strategy.name}`,
        );
        return { target: outcome.target, strategyName: strategy.name, strategyIndex };
      }
    }

    throw new NoTargetFoundError(displayTitle(source));
  }
}

// =============================================================================
// Chain construction
// =============================================================================

export interface ChainDependencies {
  kind: MediaKind;
  service: DestinationService;
  mappings: ManualMappingLookup | null;
  /** Loaded providers, in priority order (offline database, ARM, Hato) */
  crosswalks: CrosswalkProvider[];
  /** Manga title lookups; null or absent leaves the Jikan strategy out */
  jikan?: MangaTitleLookup | null;
}

/**
 * Default priority order: exact ID, manual mappings, crosswalks, Jikan,
 * title, foreign-ID search, API search. Strategies without backing data are
 * constructed disabled and left out.
 */
export function buildStrategyChain(deps: ChainDependencies): StrategyChain {
  return new StrategyChain([
    new ExactIdStrategy(),
    new ManualMappingStrategy(deps.mappings),
    ...deps.crosswalks.map(provider => new CrosswalkStrategy(provider, deps.kind)),
    new JikanStrategy(deps.jikan ?? null, deps.kind),
    new TitleStrategy(),
    new ForeignIdSearchStrategy(deps.service),
    new ApiSearchStrategy(deps.service),
  ]);
}
