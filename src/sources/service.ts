/**
 * Destination catalog service contract
 */

import type { Catalog, MediaEntry, MediaKind, TargetId } from '../types.js';

/**
 * One catalog, one media kind. Used by the search strategies and the
 * updater; every call takes the run's cancellation signal.
 */
export interface DestinationService {
  readonly name: string;
  readonly catalog: Catalog;
  readonly kind: MediaKind;
  /** null when the catalog has no such entry */
  getById(id: TargetId, signal?: AbortSignal): Promise<MediaEntry | null>;
  searchByTitle(title: string, signal?: AbortSignal): Promise<MediaEntry[]>;
  /** Write the source's status/progress/score to the destination entry */
  update(id: TargetId, source: MediaEntry, signal?: AbortSignal): Promise<void>;
}

/**
 * Catalogs that index the other catalog's IDs (AniList stores idMal).
 */
export interface ForeignIdLookup {
  /** The catalog whose IDs getByForeignId accepts */
  readonly foreignCatalog: Catalog;
  getByForeignId(id: number, signal?: AbortSignal): Promise<MediaEntry | null>;
}

export function supportsForeignIdLookup(
  service: DestinationService,
): service is DestinationService & ForeignIdLookup {
  return 'getByForeignId' in service && typeof service.getByForeignId === 'function'
    && 'foreignCatalog' in service;
}
