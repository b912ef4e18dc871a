/**
 * Object keys of the open-data layout, relative to the configured prefix:
 *
 *   competitions.json
 *   matches/{competition_id}/{season_id}.json
 *   lineups/{match_id}.json
 *   events/{match_id}.json
 */
export interface ResourceKeys {
  competitions(): string;
  matches(competitionId: number, seasonId: number): string;
  lineups(matchId: number): string;
  events(matchId: number): string;
}

export function createResourceKeys(prefix: string): ResourceKeys {
  const base = prefix === "" || prefix.endsWith("/") ? prefix : `${prefix}/`;
  return {
    competitions: () => `${base}competitions.json`,
    matches: (competitionId, seasonId) => `${base}matches/${competitionId}/${seasonId}.json`,
    lineups: (matchId) => `${base}lineups/${matchId}.json`,
    events: (matchId) => `${base}events/${matchId}.json`,
  };
}
