import { loadManifest, resolveMatches, resolveSeasons, type ResolvedMatch } from "../ingestion/resolver";
import { syncLogger, type SyncContext } from "../ingestion/utils/sync-logger";
import type { IngestDeps, MatchJobOptions } from "./deps";

/**
 * Resolution step shared by the lineups and events jobs: manifest, then every
 * pair's match list. Unreadable match lists are recorded on the context.
 */
export async function resolveMatchTargets(
  deps: IngestDeps,
  context: SyncContext,
  options: MatchJobOptions = {}
): Promise<ResolvedMatch[]> {
  const label = context.workerName;
  const manifest = await loadManifest(deps.objects, deps.keys, deps.cache);
  const seasons = resolveSeasons(manifest, label);
  const { matches, unresolved } = await resolveMatches(deps.objects, deps.keys, seasons, {
    cache: deps.cache,
    label,
  });

  for (const result of unresolved) {
    syncLogger.recordResource(context, result);
  }

  const { onlyMatchIds, onlyMatchLists } = options;
  const targets = onlyMatchIds || onlyMatchLists
    ? matches.filter(
        (m) =>
          onlyMatchIds?.has(m.matchId) === true ||
          onlyMatchLists?.has(deps.keys.matches(m.competitionId, m.seasonId)) === true
      )
    : matches;
  console.log(
    `[${label}] Resolved ${targets.length} matches from ${seasons.length - unresolved.length}/${seasons.length} competition/season pairs`
  );
  return targets;
}
