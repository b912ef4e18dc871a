/**
 * Resource Resolver
 *
 * Expands the competitions manifest into the resources a job has to load:
 * one (competition, season) pair per manifest entry, and for match-level jobs
 * one entry per match found in each pair's match list.
 */

import { z } from "zod";
import { type ObjectStore, ResourceError, expectArray } from "./sources/object-store";
import type { ResourceKeys } from "./sources/resource-keys";
import { extractMatchId } from "../_core/normalizers";
import type { ResourceResult } from "./utils/sync-logger";

export interface SeasonRef {
  competitionId: number;
  seasonId: number;
}

export interface ResolvedMatch extends SeasonRef {
  matchId: number;
  match: unknown;
}

export interface MatchResolution {
  matches: ResolvedMatch[];
  /**
   * Pairs whose match list could not be read: `skipped` when it is missing or
   * malformed, `failed` when the store could not be reached.
   */
  unresolved: ResourceResult[];
}

/**
 * Per-process cache so several jobs in one run fetch the manifest and the
 * match lists once.
 */
export class ResolverCache {
  manifest: unknown[] | null = null;
  readonly matchLists = new Map<string, unknown[]>();
}

const seasonRefSchema = z.object({
  competition_id: z.number().int(),
  season_id: z.number().int(),
});

export async function loadManifest(
  store: ObjectStore,
  keys: ResourceKeys,
  cache?: ResolverCache
): Promise<unknown[]> {
  if (cache?.manifest) return cache.manifest;
  const key = keys.competitions();
  const manifest = expectArray(key, await store.getJson(key));
  if (cache) cache.manifest = manifest;
  return manifest;
}

/**
 * One pair per manifest entry, in manifest order. Entries without numeric ids
 * are dropped with a warning.
 */
export function resolveSeasons(manifest: readonly unknown[], label = "resolver"): SeasonRef[] {
  const seasons: SeasonRef[] = [];
  manifest.forEach((entry, position) => {
    const parsed = seasonRefSchema.safeParse(entry);
    if (!parsed.success) {
      console.warn(`[${label}] Manifest entry ${position} has no competition_id/season_id. Skipping.`);
      return;
    }
    seasons.push({ competitionId: parsed.data.competition_id, seasonId: parsed.data.season_id });
  });
  return seasons;
}

async function loadMatchList(
  store: ObjectStore,
  key: string,
  cache?: ResolverCache
): Promise<unknown[]> {
  const cached = cache?.matchLists.get(key);
  if (cached) return cached;
  const list = expectArray(key, await store.getJson(key));
  cache?.matchLists.set(key, list);
  return list;
}

/**
 * Fetches every pair's match list sequentially. A pair whose list is missing,
 * malformed or unreachable is reported and left out; the others still resolve.
 */
export async function resolveMatches(
  store: ObjectStore,
  keys: ResourceKeys,
  seasons: readonly SeasonRef[],
  options: { cache?: ResolverCache; label?: string } = {}
): Promise<MatchResolution> {
  const label = options.label ?? "resolver";
  const resolution: MatchResolution = { matches: [], unresolved: [] };

  for (const { competitionId, seasonId } of seasons) {
    const key = keys.matches(competitionId, seasonId);

    let list: unknown[];
    try {
      list = await loadMatchList(store, key, options.cache);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      const kind = error instanceof ResourceError ? error.kind : "unavailable";
      console.warn(`[${label}] Skipping competition ${competitionId} season ${seasonId} (${kind}): ${reason}`);
      resolution.unresolved.push({ key, status: kind === "unavailable" ? "failed" : "skipped", rowsWritten: 0, reason });
      continue;
    }

    for (const match of list) {
      const matchId = extractMatchId(match);
      if (matchId === null) {
        console.warn(`[${label}] Match entry without match_id in ${key}. Skipping.`);
        continue;
      }
      resolution.matches.push({ competitionId, seasonId, matchId, match });
    }
  }

  return resolution;
}
