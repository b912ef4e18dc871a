/**
 * Events Sync Worker
 *
 * Loads events/{match_id}.json for every resolved match with a bounded pool of
 * concurrent workers. Each unit of work holds its own database connection for
 * the fetch, normalize and single batch insert of one match. A match that fails
 * is logged with its id as soon as it fails and recorded; its siblings are
 * unaffected.
 */

import { syncLogger } from "../ingestion/utils/sync-logger";
import { ProgressTracker } from "../ingestion/utils/progress";
import { runPool } from "../ingestion/utils/worker-pool";
import { expectArray } from "../ingestion/sources/object-store";
import { normalizeEvent, type EventRow } from "../_core/normalizers";
import { resolveMatchTargets } from "./match-targets";
import type { IngestDeps, MatchJobOptions, SyncResult } from "./deps";

export const DEFAULT_EVENTS_CONCURRENCY = 8;

export async function syncEvents(deps: IngestDeps, options: MatchJobOptions = {}): Promise<SyncResult> {
  const context = syncLogger.startSync("events-sync");

  try {
    syncLogger.transition(context, "EnsuringSchema");
    await deps.store.ensureTable("events");

    syncLogger.transition(context, "Resolving");
    const targets = await resolveMatchTargets(deps, context, options);

    syncLogger.transition(context, "Loading");
    const concurrency = deps.concurrency > 0 ? deps.concurrency : DEFAULT_EVENTS_CONCURRENCY;
    const progress = new ProgressTracker("events-sync", targets.length);
    console.log(`[events-sync] Processing ${targets.length} matches with ${concurrency} workers`);

    const failures = await runPool(targets, concurrency, async ({ matchId }) => {
      const key = deps.keys.events(matchId);
      const { processed, skipped, written } = await deps.store.withConnection(async (writer) => {
        const data = expectArray(key, await deps.objects.getJson(key));
        const rows: EventRow[] = [];
        for (const raw of data) {
          const row = normalizeEvent(raw, matchId);
          if (row) rows.push(row);
        }
        return {
          processed: data.length,
          skipped: data.length - rows.length,
          written: await writer.insertEvents(rows),
        };
      });

      context.recordsProcessed += processed;
      context.recordsInserted += written;
      context.recordsSkipped += processed - written;
      syncLogger.recordResource(context, { key, matchId, status: "success", rowsWritten: written });
      progress.increment(`match ${matchId}: ${written} new events${skipped > 0 ? `, ${skipped} unreadable` : ""}`);
    }, ({ item: { matchId }, error }) => {
      // Rolled back with its unit of work
      const errorMsg = error instanceof Error ? error.message : String(error);
      syncLogger.recordResource(context, {
        key: deps.keys.events(matchId),
        matchId,
        status: "failed",
        rowsWritten: 0,
        reason: errorMsg,
      });
      console.error(`[events-sync] Failed to load events for match ${matchId}:`, errorMsg);
    });

    if (progress.count + failures.length !== targets.length) {
      throw new Error(`Events pool lost track of ${targets.length - progress.count - failures.length} matches`);
    }
    console.log(`[events-sync] Completed ${progress.count}/${targets.length} matches`);
    syncLogger.transition(context, "Completed");
    return { success: true, log: syncLogger.endSync(context, deps.objects.location) };
  } catch (error) {
    const errorMsg = error instanceof Error ? error.message : String(error);
    context.errors.push(`Fatal error: ${errorMsg}`);
    console.error("[events-sync] Fatal error:", error);
    syncLogger.transition(context, "Failed");
    return { success: false, log: syncLogger.endSync(context, deps.objects.location), error: errorMsg };
  }
}
