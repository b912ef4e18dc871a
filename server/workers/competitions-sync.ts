/**
 * Competitions Sync Worker
 *
 * Loads the root manifest (competitions.json) into the competitions table.
 * One fetch, one batch insert; entries missing any of the five fields are
 * skipped and counted.
 */

import { syncLogger } from "../ingestion/utils/sync-logger";
import { loadManifest } from "../ingestion/resolver";
import { normalizeCompetition, type CompetitionRow } from "../_core/normalizers";
import { ResourceError } from "../ingestion/sources/object-store";
import type { IngestDeps, SyncResult } from "./deps";

export async function syncCompetitions(deps: IngestDeps): Promise<SyncResult> {
  const context = syncLogger.startSync("competitions-sync");
  const key = deps.keys.competitions();

  try {
    syncLogger.transition(context, "EnsuringSchema");
    await deps.store.ensureTable("competitions");

    syncLogger.transition(context, "Resolving");
    console.log(`[competitions-sync] Fetching ${key}...`);
    const manifest = await loadManifest(deps.objects, deps.keys, deps.cache);

    syncLogger.transition(context, "Loading");
    const rows: CompetitionRow[] = [];
    manifest.forEach((raw, position) => {
      context.recordsProcessed++;
      const row = normalizeCompetition(raw);
      if (!row) {
        context.recordsSkipped++;
        console.warn(`[competitions-sync] Entry ${position} is missing required fields. Skipping.`);
        return;
      }
      rows.push(row);
    });

    const written = await deps.store.withConnection((writer) => writer.insertCompetitions(rows));
    context.recordsInserted += written;
    // Rows already present are dropped by ON CONFLICT DO NOTHING
    context.recordsSkipped += rows.length - written;
    syncLogger.recordResource(context, { key, status: "success", rowsWritten: written });

    console.log(`[competitions-sync] Inserted ${written} of ${rows.length} competitions.`);
    syncLogger.transition(context, "Completed");
    return { success: true, log: syncLogger.endSync(context, deps.objects.location) };
  } catch (error) {
    const errorMsg = error instanceof Error ? error.message : String(error);
    if (error instanceof ResourceError) {
      context.resources.push({ key, status: "failed", rowsWritten: 0, reason: errorMsg });
    }
    context.errors.push(`Fatal error: ${errorMsg}`);
    console.error("[competitions-sync] Fatal error:", error);
    syncLogger.transition(context, "Failed");
    return { success: false, log: syncLogger.endSync(context, deps.objects.location), error: errorMsg };
  }
}
