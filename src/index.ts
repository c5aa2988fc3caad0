/**
 * listsync - AniList <-> MyAnimeList list synchronisation
 * Resolves entries across both catalogs and copies list progress over
 */

import { initDatabase, closeDatabase, getRecentRuns, getUnmappedEntries, clearUnmappedEntries } from './database/db.js';
import { config } from './config.js';
import { errorMessage } from './errors.js';
import { listCircuits } from './circuitBreaker.js';
import { SyncRunner, watchIntervalMs, type PassSummary, type SyncOutcome, type SyncRequest } from './sync/runner.js';
import type { SyncReport } from './sync/report.js';
import { loadMappings, saveMappings } from './sync/mappings.js';
import { abortOnInterrupt, installProcessHandlers } from './utils/resilience.js';
import type { MediaKind, SyncDirection } from './types.js';

async function main() {
  const args = process.argv.slice(2);
  const command = args[0] || 'status';

  console.log('╔══════════════════════════════════════════════════════════════════╗');
  console.log('║                          LISTSYNC                                ║');
  console.log('║               AniList <-> MyAnimeList v0.1.0                     ║');
  console.log('╚══════════════════════════════════════════════════════════════════╝');
  console.log('');

  installProcessHandlers();
  initDatabase();

  switch (command) {
    case 'status':
      showStatus();
      break;

    case 'sync':
      await runSync(args.slice(1));
      break;

    case 'watch':
      await runWatch(args.slice(1));
      break;

    case 'unmapped':
      await runUnmapped(args.includes('--ignore-all'));
      break;

    case 'map': {
      const anilistId = parseInt(args[1] ?? '', 10);
      const malId = parseInt(args[2] ?? '', 10);
      if (!(anilistId > 0) || !(malId > 0)) {
        console.error('Usage: listsync map <anilistId> <malId> [comment]');
        process.exitCode = 1;
        break;
      }
      await runMap(anilistId, malId, args.slice(3).join(' ') || undefined);
      break;
    }

    case 'ignore': {
      const title = args.slice(1).join(' ');
      if (!title) {
        console.error('Usage: listsync ignore <title>');
        process.exitCode = 1;
        break;
      }
      await runIgnore(title);
      break;
    }

    default:
      console.log('Usage: listsync <command>');
      console.log('');
      console.log('Commands:');
      console.log('  status            Show recent runs and unmapped counts');
      console.log('  sync              Sync lists (AniList -> MAL by default)');
      console.log('  watch             Sync on an interval until interrupted');
      console.log('  unmapped          List entries the last sync could not resolve');
      console.log('  map <al> <mal>    Add a manual AniList/MAL ID mapping');
      console.log('  ignore <title>    Add a title to the ignore list');
      console.log('');
      console.log('Options:');
      console.log('  --reverse         Sync MAL -> AniList');
      console.log('  --both            Sync both directions');
      console.log('  --anime           Anime only');
      console.log('  --manga           Manga only');
      console.log('  --dry-run         Resolve and report, never write');
      console.log('  --force           Write to the ID each entry already declares, no matching');
      console.log('  --verbose         Per-entry progress output');
      console.log('  --favorites       Add MAL favourites on AniList (--reverse), report differences otherwise');
      console.log(`  --interval <h>    Hours between watch runs (${config.watch.minIntervalHours}-${config.watch.maxIntervalHours}, default ${config.watch.intervalHours})`);
      console.log('  --once            Watch: sync immediately, then start the interval');
      console.log('  --ignore-all      Move every unmapped entry to the ignore list (unmapped)');
      break;
  }

  closeDatabase();
}

// =============================================================================
// Commands
// =============================================================================

function showStatus() {
  console.log('📊 Sync Status');
  console.log('─'.repeat(50));

  const runs = getRecentRuns(10);
  if (runs.length === 0) {
    console.log('No sync runs yet');
  }
  for (const run of runs) {
    const flags = [run.dryRun && 'dry-run', run.forceSync && 'force', run.truncated && 'cancelled'].filter(Boolean);
    console.log(
      `${run.finishedAt}  ${run.direction.padEnd(15)} ${run.mediaKind.padEnd(6)} ` +
      `total ${run.total}, updated ${run.updated}, skipped ${run.skipped}, errors ${run.errors}, ` +
      `conflicts ${run.conflicts}${flags.length ? ` [${flags.join(', ')}]` : ''}`
    );
  }

  console.log('');
  console.log('❓ Unmapped Entries');
  console.log('─'.repeat(50));
  const counts = new Map<string, number>();
  for (const entry of getUnmappedEntries()) {
    const key = `${entry.direction} ${entry.mediaKind}`;
    counts.set(key, (counts.get(key) ?? 0) + 1);
  }
  if (counts.size === 0) console.log('None');
  for (const [key, count] of counts) {
    console.log(`  ${key}: ${count}`);
  }

  console.log('');
  console.log('🔌 Services');
  console.log('─'.repeat(50));
  console.log(`AniList:          ${config.anilist.apiUrl} (${config.anilist.token ? 'token set' : 'no token'})`);
  console.log(`MyAnimeList:      ${config.mal.apiUrl} (${config.mal.token ? 'token set' : 'no token'})`);
  console.log(`ARM:              ${config.crosswalk.arm.enabled ? config.crosswalk.arm.baseUrl : 'disabled'}`);
  console.log(`Hato:             ${config.crosswalk.hato.enabled ? config.crosswalk.hato.baseUrl : 'disabled'}`);
  console.log(`Offline database: ${config.crosswalk.offlineDatabasePath || 'not configured'}`);
  console.log(`Jikan:            ${config.crosswalk.jikan.enabled || config.favorites.enabled ? config.crosswalk.jikan.baseUrl : 'disabled'}`);
}

function parseSyncArgs(args: string[], signal: AbortSignal): SyncRequest {
  const directions: SyncDirection[] = args.includes('--both')
    ? ['anilist-to-mal', 'mal-to-anilist']
    : [args.includes('--reverse') ? 'mal-to-anilist' : 'anilist-to-mal'];

  let kinds: MediaKind[] = ['anime', 'manga'];
  if (args.includes('--anime') && !args.includes('--manga')) kinds = ['anime'];
  if (args.includes('--manga') && !args.includes('--anime')) kinds = ['manga'];

  const options = {
    forceSync: args.includes('--force'),
    dryRun: args.includes('--dry-run'),
    verbose: args.includes('--verbose') || config.verbose,
  };
  const favorites = args.includes('--favorites') || config.favorites.enabled;

  return { directions, kinds, options, signal, favorites };
}

function describeRequest({ directions, kinds, options, favorites }: SyncRequest): string {
  return `${directions.join(' + ')} (${kinds.join(', ')})` +
    `${options.dryRun ? ' [dry run]' : ''}${options.forceSync ? ' [force]' : ''}${favorites ? ' [favorites]' : ''}`;
}

async function runSync(args: string[]) {
  const controller = new AbortController();
  abortOnInterrupt(controller);
  const request = parseSyncArgs(args, controller.signal);

  console.log(`🔄 Sync ${describeRequest(request)}`);
  console.log('─'.repeat(60));

  const runner = new SyncRunner();
  const outcome = await runner.run(request);
  printOutcome(outcome);

  if (outcome.cancelled) {
    console.log('');
    console.log('⚠️  Sync was cancelled; results above are partial');
    process.exitCode = 130;
  }
}

async function runWatch(args: string[]) {
  const flag = args.indexOf('--interval');
  const hours = flag >= 0 ? Number(args[flag + 1]) : config.watch.intervalHours;
  let intervalMs: number;
  try {
    intervalMs = watchIntervalMs(hours);
  } catch (error) {
    console.error(`❌ ${errorMessage(error)}`);
    process.exitCode = 1;
    return;
  }

  const controller = new AbortController();
  abortOnInterrupt(controller);
  const request = parseSyncArgs(args, controller.signal);

  console.log(`👀 Watch ${describeRequest(request)} every ${hours}h`);
  console.log('─'.repeat(60));

  const runner = new SyncRunner();
  const runs = await runner.watch(request, { intervalMs, immediate: args.includes('--once') }, printOutcome);
  console.log(`Watch stopped after ${runs} runs`);
}

async function runUnmapped(ignoreAll: boolean) {
  const entries = getUnmappedEntries();
  console.log(`❓ ${entries.length} unmapped entries`);
  console.log('─'.repeat(60));
  for (const entry of entries) {
    const ids = [entry.anilistId > 0 && `AniList ${entry.anilistId}`, entry.malId > 0 && `MAL ${entry.malId}`].filter(Boolean);
    console.log(`  [${entry.direction} ${entry.mediaKind}] ${entry.title} (${ids.join(', ') || 'no IDs'}): ${entry.reason}`);
  }

  if (!ignoreAll || entries.length === 0) return;

  const mappings = await loadMappings(config.mappings.path);
  for (const entry of entries) {
    // Ignore by the ID of the catalog the entry was read from
    if (entry.direction === 'anilist-to-mal' && entry.anilistId > 0) mappings.addIgnoreAniListId(entry.anilistId);
    else if (entry.direction === 'mal-to-anilist' && entry.malId > 0) mappings.addIgnoreMalId(entry.malId);
    else mappings.addIgnoreTitle(entry.title);
  }
  await saveMappings(config.mappings.path, mappings);
  const cleared = clearUnmappedEntries();
  console.log('');
  console.log(`✅ Added ${cleared} entries to the ignore list (${config.mappings.path})`);
}

async function runMap(anilistId: number, malId: number, comment?: string) {
  const mappings = await loadMappings(config.mappings.path);
  mappings.addManualMapping(anilistId, malId, comment);
  await saveMappings(config.mappings.path, mappings);
  console.log(`✅ Mapped AniList ${anilistId} <-> MAL ${malId}${comment ? ` (${comment})` : ''}`);
}

async function runIgnore(title: string) {
  const mappings = await loadMappings(config.mappings.path);
  mappings.addIgnoreTitle(title);
  await saveMappings(config.mappings.path, mappings);
  console.log(`✅ Ignoring "${title}"`);
}

// =============================================================================
// Output
// =============================================================================

function printPass({ direction, kind, result }: PassSummary) {
  const summary = result.statistics.summary();
  console.log('');
  console.log(`📋 ${direction} ${kind}${result.truncated ? ' (cancelled)' : ''}`);
  console.log('─'.repeat(60));
  console.log(`Total:    ${summary.total}`);
  console.log(`Updated:  ${summary.updated}`);
  console.log(`Dry run:  ${summary.dryRun}`);
  console.log(`Skipped:  ${summary.skipped}`);
  console.log(`Errors:   ${summary.errors}`);

  for (const { reason, count } of result.statistics.skipReasons()) {
    console.log(`  ${reason}: ${count}`);
  }
  for (const update of result.statistics.updated) {
    console.log(`  ✅ ${update.title} ${update.detail ?? ''}`);
  }
  for (const error of result.statistics.errored) {
    console.log(`  ❌ ${error.title}: ${error.error ?? 'unknown error'}`);
  }
}

function printOutcome(outcome: SyncOutcome) {
  for (const pass of outcome.passes) {
    printPass(pass);
  }
  printReport(outcome.report);

  for (const circuit of listCircuits().filter(item => item.trips > 0)) {
    console.log(`⚡ ${circuit.name} circuit tripped ${circuit.trips}x (now ${circuit.state})`);
  }
}

function printReport(report: SyncReport) {
  if (report.conflicts.length > 0) {
    console.log('');
    console.log(`⚔️  ${report.conflicts.length} conflicts (same target claimed twice)`);
    for (const conflict of report.conflicts) {
      console.log(
        `  [${conflict.mediaKind}] "${conflict.loserTitle}" (${conflict.loserStrategy}) lost ` +
        `"${conflict.targetTitle}" to "${conflict.winnerTitle}" (${conflict.winnerStrategy})`
      );
    }
  }

  if (report.warnings.length > 0) {
    console.log('');
    console.log(`⚠️  ${report.warnings.length} rejected candidates`);
    for (const warning of report.warnings) {
      console.log(`  [${warning.mediaKind}] ${warning.title}: ${warning.reason} ${warning.detail}`);
    }
  }

  if (report.unresolved.length > 0) {
    console.log('');
    console.log(`❓ ${report.unresolved.length} unresolved (see 'listsync unmapped')`);
  }

  if (report.favoritesAdded > 0) {
    console.log('');
    console.log(`⭐ Favorites: +${report.favoritesAdded} added on AniList`);
  }
  if (report.favoriteMismatches.length > 0) {
    console.log('');
    console.log(`⭐ Favorites: ${report.favoriteMismatches.length} mismatches (AniList -> MAL, report only)`);
    for (const mismatch of report.favoriteMismatches) {
      console.log(`  [${mismatch.mediaKind}] ${mismatch.title}: only on ${mismatch.onAniList ? 'AniList' : 'MAL'}`);
    }
  }
}

// Call main
main().catch((error) => {
  console.error(error);
  closeDatabase();
  process.exit(1);
});
