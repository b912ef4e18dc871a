/**
 * Matches Sync Worker
 *
 * For every (competition, season) pair in the manifest, loads
 * matches/{competition_id}/{season_id}.json into the matches table.
 * Pairs are processed one after another; a pair that fails is recorded and
 * the loop moves on.
 */

import { syncLogger } from "../ingestion/utils/sync-logger";
import { loadManifest, resolveSeasons } from "../ingestion/resolver";
import { expectArray } from "../ingestion/sources/object-store";
import { normalizeMatch, type MatchRow } from "../_core/normalizers";
import type { IngestDeps, SyncResult } from "./deps";

export async function syncMatches(deps: IngestDeps): Promise<SyncResult> {
  const context = syncLogger.startSync("matches-sync");

  try {
    syncLogger.transition(context, "EnsuringSchema");
    await deps.store.ensureTable("matches");

    syncLogger.transition(context, "Resolving");
    const manifest = await loadManifest(deps.objects, deps.keys, deps.cache);
    const seasons = resolveSeasons(manifest, "matches-sync");
    console.log(`[matches-sync] Resolved ${seasons.length} competition/season pairs`);

    syncLogger.transition(context, "Loading");
    for (const { competitionId, seasonId } of seasons) {
      const key = deps.keys.matches(competitionId, seasonId);
      try {
        const cached = deps.cache?.matchLists.get(key);
        const data = cached ?? expectArray(key, await deps.objects.getJson(key));
        deps.cache?.matchLists.set(key, data);

        const rows: MatchRow[] = [];
        for (const raw of data) {
          context.recordsProcessed++;
          const row = normalizeMatch(raw, competitionId, seasonId);
          if (row) {
            rows.push(row);
          } else {
            context.recordsSkipped++;
          }
        }

        const written = await deps.store.withConnection((writer) => writer.insertMatches(rows));
        context.recordsInserted += written;
        context.recordsSkipped += rows.length - written;
        syncLogger.recordResource(context, { key, status: "success", rowsWritten: written });
        console.log(`[matches-sync] ${key}: ${written} new of ${data.length} matches`);
      } catch (error) {
        const errorMsg = error instanceof Error ? error.message : String(error);
        syncLogger.recordResource(context, { key, status: "failed", rowsWritten: 0, reason: errorMsg });
        console.error(`[matches-sync] Failed to load matches from ${key}:`, errorMsg);
      }
    }

    syncLogger.transition(context, "Completed");
    return { success: true, log: syncLogger.endSync(context, deps.objects.location) };
  } catch (error) {
    const errorMsg = error instanceof Error ? error.message : String(error);
    context.errors.push(`Fatal error: ${errorMsg}`);
    console.error("[matches-sync] Fatal error:", error);
    syncLogger.transition(context, "Failed");
    return { success: false, log: syncLogger.endSync(context, deps.objects.location), error: errorMsg };
  }
}
