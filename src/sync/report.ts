/**
 * Sync report: structured warnings collected during a run and printed at
 * the end.
 */

import type { WarningSink } from '../resolver/strategy.js';
import type { FavoriteMismatch, FavoritesResult } from './favorites.js';
import type { MediaKind, SyncDirection } from '../types.js';

export interface Warning {
  title: string;
  reason: string;
  detail: string;
  mediaKind: MediaKind;
}

export interface ConflictWarning {
  loserTitle: string;
  winnerTitle: string;
  targetTitle: string;
  loserStrategy: string;
  winnerStrategy: string;
  mediaKind: MediaKind;
}

export interface UnresolvedWarning {
  title: string;
  reason: string;
  mediaKind: MediaKind;
  direction: SyncDirection;
}

/**
 * Receives what the resolver could not settle on its own. The resolver
 * never formats text; printing is the CLI's job.
 */
export interface ReportSink extends WarningSink {
  addConflict(conflict: ConflictWarning): void;
  addUnresolved(entry: UnresolvedWarning): void;
}

export class SyncReport implements ReportSink {
  readonly warnings: Warning[] = [];
  readonly conflicts: ConflictWarning[] = [];
  readonly unresolved: UnresolvedWarning[] = [];
  readonly favoriteMismatches: FavoriteMismatch[] = [];
  favoritesAdded = 0;

  addWarning(title: string, reason: string, detail: string, mediaKind: MediaKind): void {
    this.warnings.push({ title, reason, detail, mediaKind });
  }

  addConflict(conflict: ConflictWarning): void {
    this.conflicts.push(conflict);
  }

  addUnresolved(entry: UnresolvedWarning): void {
    this.unresolved.push(entry);
  }

  addFavorites(result: FavoritesResult): void {
    this.favoritesAdded += result.added;
    this.favoriteMismatches.push(...result.mismatches);
  }

  hasWarnings(): boolean {
    return this.warnings.length > 0 || this.conflicts.length > 0;
  }
}
