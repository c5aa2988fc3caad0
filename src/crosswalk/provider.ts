/**
 * ID crosswalk provider contract
 */

import type { Catalog, MediaKind } from '../types.js';

/**
 * Maps an ID in one catalog to the same title's ID in the other catalog.
 */
export interface CrosswalkProvider {
  readonly name: string;
  /** Media kinds this provider has data for */
  readonly kinds: readonly MediaKind[];
  /** Lookups may hit the network (cancellation is checked first) */
  readonly networked: boolean;
  /**
   * Resolves the other catalog's ID, or null when the provider has no
   * mapping. Throws on lookup failure.
   */
  lookup(from: Catalog, kind: MediaKind, id: number, signal?: AbortSignal): Promise<number | null>;
}
