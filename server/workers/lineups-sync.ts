/**
 * Lineups Sync Worker
 *
 * Loads lineups/{match_id}.json for every resolved match, one match at a time,
 * reporting progress within each competition/season.
 */

import { syncLogger } from "../ingestion/utils/sync-logger";
import { ProgressTracker } from "../ingestion/utils/progress";
import { expectArray } from "../ingestion/sources/object-store";
import type { ResolvedMatch } from "../ingestion/resolver";
import { normalizeLineup } from "../_core/normalizers";
import { resolveMatchTargets } from "./match-targets";
import type { IngestDeps, MatchJobOptions, SyncResult } from "./deps";

function groupBySeason(matches: readonly ResolvedMatch[]): Map<string, ResolvedMatch[]> {
  const groups = new Map<string, ResolvedMatch[]>();
  for (const match of matches) {
    const scope = `${match.competitionId}/${match.seasonId}`;
    const group = groups.get(scope);
    if (group) {
      group.push(match);
    } else {
      groups.set(scope, [match]);
    }
  }
  return groups;
}

export async function syncLineups(deps: IngestDeps, options: MatchJobOptions = {}): Promise<SyncResult> {
  const context = syncLogger.startSync("lineups-sync");

  try {
    syncLogger.transition(context, "EnsuringSchema");
    await deps.store.ensureTable("lineups");

    syncLogger.transition(context, "Resolving");
    const targets = await resolveMatchTargets(deps, context, options);

    syncLogger.transition(context, "Loading");
    for (const [scope, group] of groupBySeason(targets)) {
      const progress = new ProgressTracker(`lineups-sync ${scope}`, group.length);

      for (const { matchId } of group) {
        const key = deps.keys.lineups(matchId);
        try {
          const teams = expectArray(key, await deps.objects.getJson(key));
          const rows = normalizeLineup(teams, matchId);
          context.recordsProcessed += rows.length;

          const written = await deps.store.withConnection((writer) => writer.insertLineups(rows));
          context.recordsInserted += written;
          context.recordsSkipped += rows.length - written;
          syncLogger.recordResource(context, { key, matchId, status: "success", rowsWritten: written });
        } catch (error) {
          const errorMsg = error instanceof Error ? error.message : String(error);
          syncLogger.recordResource(context, { key, matchId, status: "failed", rowsWritten: 0, reason: errorMsg });
          console.error(`[lineups-sync] Failed to load lineups for match ${matchId}:`, errorMsg);
        }
        progress.increment(`match ${matchId}`);
      }
    }

    syncLogger.transition(context, "Completed");
    return { success: true, log: syncLogger.endSync(context, deps.objects.location) };
  } catch (error) {
    const errorMsg = error instanceof Error ? error.message : String(error);
    context.errors.push(`Fatal error: ${errorMsg}`);
    console.error("[lineups-sync] Fatal error:", error);
    syncLogger.transition(context, "Failed");
    return { success: false, log: syncLogger.endSync(context, deps.objects.location), error: errorMsg };
  }
}
