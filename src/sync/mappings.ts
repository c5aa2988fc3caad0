/**
 * Manual mappings & ignore list (YAML)
 *
 *   manual_mappings:
 *     - anilist_id: 21
 *       mal_id: 21
 *       comment: One Piece
 *   ignore:
 *     anilist_ids: [12345]
 *     mal_ids: []
 *     titles: ["Some Special"]
 */

import { existsSync } from 'fs';
import { mkdir, readFile, writeFile } from 'fs/promises';
import { dirname } from 'path';
import { parse, stringify } from 'yaml';
import { z } from 'zod';
import type { ManualMappingLookup } from '../resolver/strategies/manualMapping.js';
import { displayTitle, sourceCatalog, type MediaEntry, type SyncDirection } from '../types.js';

const manualMappingSchema = z.object({
  anilist_id: z.number().int().positive(),
  mal_id: z.number().int().positive(),
  comment: z.string().optional(),
});

const mappingsFileSchema = z.object({
  manual_mappings: z.array(manualMappingSchema).default([]),
  ignore: z.object({
    anilist_ids: z.array(z.number().int()).default([]),
    mal_ids: z.array(z.number().int()).default([]),
    titles: z.array(z.string()).default([]),
  }).default({}),
}).nullish();

export interface ManualMapping {
  anilistId: number;
  malId: number;
  comment?: string;
}

export class MappingsConfig implements ManualMappingLookup {
  private manual: ManualMapping[] = [];
  private readonly ignoredAniListIds = new Set<number>();
  private readonly ignoredMalIds = new Set<number>();
  /** lowercased title -> title as written in the file */
  private readonly ignoredTitles = new Map<string, string>();

  get manualMappingCount(): number {
    return this.manual.length;
  }

  get manualMappings(): readonly ManualMapping[] {
    return this.manual;
  }

  get ignoreCount(): number {
    return this.ignoredAniListIds.size + this.ignoredMalIds.size + this.ignoredTitles.size;
  }

  getManualMalId(anilistId: number): number | null {
    return this.manual.find(mapping => mapping.anilistId === anilistId)?.malId ?? null;
  }

  getManualAniListId(malId: number): number | null {
    return this.manual.find(mapping => mapping.malId === malId)?.anilistId ?? null;
  }

  /**
   * Ignored by title (any case) or by its ID in the catalog it is read from.
   */
  isIgnored(source: MediaEntry, direction: SyncDirection): boolean {
    if (this.ignoredTitles.has(displayTitle(source).toLowerCase())) return true;
    const catalog = sourceCatalog(direction);
    const ids = catalog === 'anilist' ? this.ignoredAniListIds : this.ignoredMalIds;
    return ids.has(source.ids[catalog]);
  }

  /** Replaces any existing pair for the same AniList ID */
  addManualMapping(anilistId: number, malId: number, comment?: string): void {
    this.manual = this.manual.filter(mapping => mapping.anilistId !== anilistId);
    this.manual.push(comment ? { anilistId, malId, comment } : { anilistId, malId });
  }

  addIgnoreAniListId(id: number): void {
    this.ignoredAniListIds.add(id);
  }

  addIgnoreMalId(id: number): void {
    this.ignoredMalIds.add(id);
  }

  addIgnoreTitle(title: string): void {
    this.ignoredTitles.set(title.toLowerCase(), title);
  }

  toYaml(): string {
    return stringify({
      manual_mappings: this.manual.map(mapping => ({
        anilist_id: mapping.anilistId,
        mal_id: mapping.malId,
        ...(mapping.comment ? { comment: mapping.comment } : {}),
      })),
      ignore: {
        anilist_ids: [...this.ignoredAniListIds].sort((a, b) => a - b),
        mal_ids: [...this.ignoredMalIds].sort((a, b) => a - b),
        titles: [...this.ignoredTitles.values()],
      },
    });
  }

  static fromYaml(text: string): MappingsConfig {
    const parsed = mappingsFileSchema.safeParse(parse(text));
    if (!parsed.success) {
      const issues = parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
      throw new Error(`Invalid mappings file:\n${issues.join('\n')}`);
    }

    const mappings = new MappingsConfig();
    if (!parsed.data) return mappings;  // empty file

    for (const entry of parsed.data.manual_mappings) {
      mappings.addManualMapping(entry.anilist_id, entry.mal_id, entry.comment);
    }
    parsed.data.ignore.anilist_ids.forEach(id => mappings.addIgnoreAniListId(id));
    parsed.data.ignore.mal_ids.forEach(id => mappings.addIgnoreMalId(id));
    parsed.data.ignore.titles.forEach(title => mappings.addIgnoreTitle(title));
    return mappings;
  }
}

/** A missing file is an empty config. */
export async function loadMappings(path: string): Promise<MappingsConfig> {
  if (!existsSync(path)) {
    return new MappingsConfig();
  }
  const mappings = MappingsConfig.fromYaml(await readFile(path, 'utf-8'));
  console.log(`[Mappings] Loaded ${mappings.manualMappingCount} manual mappings, ${mappings.ignoreCount} ignore rules`);
  return mappings;
}

export async function saveMappings(path: string, mappings: MappingsConfig): Promise<void> {
  await mkdir(dirname(path), { recursive: true });
  await writeFile(path, mappings.toYaml());
}
