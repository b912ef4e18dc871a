import { createResourceKeys } from "../../ingestion/sources/resource-keys";
import type { MemoryObjectStore } from "./memory-object-store";

export const keys = createResourceKeys("open-data/data/");

export function competition(competitionId: number, seasonId: number) {
  return {
    competition_id: competitionId,
    season_id: seasonId,
    country_name: "Testland",
    competition_name: `Competition ${competitionId}`,
    season_name: `Season ${seasonId}`,
  };
}

export function match(matchId: number, home = "Home FC", away = "Away FC") {
  return {
    match_id: matchId,
    match_date: "2020-03-01",
    home_team: { home_team_id: 1, home_team_name: home },
    away_team: { away_team_id: 2, away_team_name: away },
  };
}

export function event(index: number, typeName = "Pass") {
  const seconds = String(index % 60).padStart(2, "0");
  return { id: `evt-${index}`, index, timestamp: `00:00:${seconds}.000`, type: { id: 30, name: typeName } };
}

/**
 * Publishes a manifest, one match list per season and one events resource per
 * match (indexes 0..eventsPerMatch-1).
 */
export function publishSeasons(
  objects: MemoryObjectStore,
  seasons: { competitionId: number; seasonId: number; matchIds: number[] }[],
  eventsPerMatch = 3
) {
  objects.putJson(
    keys.competitions(),
    seasons.map((s) => competition(s.competitionId, s.seasonId))
  );
  for (const season of seasons) {
    objects.putJson(keys.matches(season.competitionId, season.seasonId), season.matchIds.map((id) => match(id)));
    for (const matchId of season.matchIds) {
      objects.putJson(keys.events(matchId), Array.from({ length: eventsPerMatch }, (_, i) => event(i)));
    }
  }
}
