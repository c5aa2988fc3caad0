/**
 * Updater: one sync pass for one media kind in one direction.
 *
 * 1. filter + sort the source list (empty status and ignored entries out)
 * 2. resolve every source through the strategy chain, then deduplicate
 * 3. record conflicts and unresolved entries
 * 4. apply kept mappings to the destination (or record them, in dry-run)
 */

import type { RunOptions } from '../config.js';
import type { UnmappedEntry } from '../database/db.js';
import { errorMessage } from '../errors.js';
import { sameProgress } from '../matching/entries.js';
import type { StrategyChain } from '../resolver/chain.js';
import { ResolutionPass, type PassResult } from '../resolver/resolutionPass.js';
import type { DestinationService } from '../sources/service.js';
import { logDebug } from '../utils/log.js';
import {
  describeEntry,
  displayTitle,
  foreignId,
  type Conflict,
  type KnownTargets,
  type MediaEntry,
  type MediaKind,
  type ResolvedMapping,
  type TargetId,
} from '../types.js';
import type { MappingsConfig } from './mappings.js';
import type { ReportSink } from './report.js';
import { Statistics } from './statistics.js';

export const SKIP_IGNORED = 'in ignore list';
export const SKIP_UNMAPPED = 'unmapped';
export const SKIP_NO_CHANGES = 'no changes';
export const UNMAPPED_NOT_FOUND = 'no matching entry found on target service';

export interface UpdaterOptions {
  kind: MediaKind;
  options: RunOptions;
  chain: StrategyChain;
  service: DestinationService;
  report: ReportSink;
  /** Ignore list; null = nothing ignored */
  mappings: MappingsConfig | null;
  signal: AbortSignal;
}

export interface UpdaterResult {
  statistics: Statistics;
  unmapped: UnmappedEntry[];
  conflicts: Conflict[];
  kept: ResolvedMapping[];
  /** Stopped early by cancellation */
  truncated: boolean;
}

/** Status first, then display title: groups the progress output by status. */
export function sortSources(sources: readonly MediaEntry[]): MediaEntry[] {
  return [...sources].sort((a, b) => {
    const aStatus = a.status ?? '';
    const bStatus = b.status ?? '';
    if (aStatus !== bStatus) return aStatus < bStatus ? -1 : 1;
    const aTitle = displayTitle(a);
    const bTitle = displayTitle(b);
    if (aTitle === bTitle) return 0;
    return aTitle < bTitle ? -1 : 1;
  });
}

/**
 * "(MAL: 5114, AniList: 5114)" style detail for an applied update.
 */
export function updateDetail(source: MediaEntry, targetId: TargetId, options: RunOptions): string {
  let malId = source.ids.mal;
  let anilistId = source.ids.anilist;
  if (options.direction === 'mal-to-anilist') anilistId = targetId;
  else malId = targetId;

  if (malId > 0 && anilistId > 0) return `(MAL: ${malId}, AniList: ${anilistId})`;
  if (anilistId > 0) return `(AniList: ${anilistId})`;
  if (malId > 0) return `(MAL: ${malId})`;
  return `(ID: ${targetId})`;
}

export class Updater {
  private readonly statistics = new Statistics();
  private readonly unmapped: UnmappedEntry[] = [];
  private readonly prefix: string;

  constructor(private readonly deps: UpdaterOptions) {
    const direction = deps.options.direction === 'anilist-to-mal' ? 'AniList to MAL' : 'MAL to AniList';
    this.prefix = `${direction} ${deps.kind}`;
  }

  async run(sources: readonly MediaEntry[], targets: readonly MediaEntry[]): Promise<UpdaterResult> {
    const { options, chain, report, signal } = this.deps;

    const knownTargets = this.buildTargetMap(targets);
    const filtered = this.filterSources(sortSources(sources));
    console.log(`[${this.prefix}] ${filtered.length} entries to process (${chain.names.join(' → ')})`);

    const pass = new ResolutionPass({
      chain,
      options,
      signal,
      report,
      onSource: (source, index, total) =>
        logDebug(options.verbose, `[${this.prefix}] (${index + 1}/${total}) ${describeEntry(source)}`),
    });
    const result = await pass.run(filtered, knownTargets);

    this.recordUnresolved(result);
    this.recordConflicts(result.conflicts);
    const truncated = await this.applyMappings(result.kept) || result.truncated;

    return {
      statistics: this.statistics,
      unmapped: this.unmapped,
      conflicts: result.conflicts,
      kept: result.kept,
      truncated,
    };
  }

  private buildTargetMap(targets: readonly MediaEntry[]): KnownTargets {
    const map = new Map<TargetId, MediaEntry>();
    for (const target of targets) {
      const id = foreignId(target, this.deps.options.direction);
      if (id > 0) map.set(id, target);
    }
    return map;
  }

  private filterSources(sources: MediaEntry[]): MediaEntry[] {
    const { mappings, options } = this.deps;
    const filtered: MediaEntry[] = [];
    for (const source of sources) {
      if (source.status === null) {
        logDebug(options.verbose, `[${this.prefix}] Skipping entry with empty status: ${displayTitle(source)}`);
        continue;
      }
      // Ignored entries still count towards the total
      this.statistics.incrementTotal();
      if (mappings?.isIgnored(source, options.direction)) {
        logDebug(options.verbose, `[${this.prefix}] Ignoring entry: ${displayTitle(source)}`);
        this.statistics.recordSkip({ title: displayTitle(source), status: source.status, skipReason: SKIP_IGNORED });
        continue;
      }
      filtered.push(source);
    }
    return filtered;
  }

  private recordUnresolved(result: PassResult): void {
    const { report, kind, options } = this.deps;
    for (const { source, reason } of result.unresolved) {
      const title = displayTitle(source);
      this.statistics.recordSkip({ title, status: source.status, skipReason: SKIP_UNMAPPED });
      report.addUnresolved({ title, reason, mediaKind: kind, direction: options.direction });
      this.trackUnmapped(source, UNMAPPED_NOT_FOUND);
    }
  }

  private recordConflicts(conflicts: Conflict[]): void {
    const { report, kind } = this.deps;
    for (const conflict of conflicts) {
      const winnerTitle = displayTitle(conflict.winner);
      const reason = `duplicate: same target already matched by "${winnerTitle}" via ${conflict.winnerStrategy}`;
      const targetTitle = conflict.target ? displayTitle(conflict.target) : `ID ${conflict.targetId}`;

      this.statistics.recordSkip({ title: displayTitle(conflict.loser), status: conflict.loser.status, skipReason: reason });
      this.trackUnmapped(conflict.loser, reason);
      report.addConflict({
        loserTitle: displayTitle(conflict.loser),
        winnerTitle,
        targetTitle,
        loserStrategy: conflict.loserStrategy,
        winnerStrategy: conflict.winnerStrategy,
        mediaKind: kind,
      });
    }
  }

  /** Returns true when cancelled before every mapping was applied. */
  private async applyMappings(kept: ResolvedMapping[]): Promise<boolean> {
    const { options, service, signal } = this.deps;

    for (const mapping of kept) {
      if (signal.aborted) {
        console.warn(`[${this.prefix}] Cancelled before update`);
        return true;
      }

      const { source, target, targetId } = mapping;
      const title = displayTitle(source);

      if (target && sameProgress(source, target)) {
        logDebug(options.verbose, `[${this.prefix}] No changes needed for ${title}`);
        this.statistics.recordSkip({ title, status: source.status, skipReason: SKIP_NO_CHANGES });
        continue;
      }

      if (options.dryRun) {
        this.statistics.recordDryRun({ title, status: source.status, detail: 'dry run' });
        continue;
      }

      try {
        await service.update(targetId, source, signal);
        this.statistics.recordUpdate({ title, status: source.status, detail: updateDetail(source, targetId, options) });
      } catch (error) {
        logDebug(options.verbose, `[${this.prefix}] Error updating ${title}: ${errorMessage(error)}`);
        this.statistics.recordError({ title, status: source.status, error: errorMessage(error) });
      }
    }
    return false;
  }

  private trackUnmapped(source: MediaEntry, reason: string): void {
    this.unmapped.push({
      anilistId: source.ids.anilist,
      malId: source.ids.mal,
      title: displayTitle(source),
      mediaKind: this.deps.kind,
      direction: this.deps.options.direction,
      reason,
    });
  }
}
