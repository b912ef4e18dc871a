/**
 * Normalization layer for converting open-data JSON records into table rows
 *
 * Pure functions, no I/O. A normalizer returns null (or skips an entry) when a
 * required field is missing; callers count those as skipped records.
 */

import { z } from "zod";
import { parse, isValid, format } from "date-fns";

export interface CompetitionRow {
  competitionId: number;
  seasonId: number;
  countryName: string;
  competitionName: string;
  seasonName: string;
}

export interface MatchRow {
  matchId: number;
  competitionId: number;
  seasonId: number;
  matchDate: string | null;
  homeTeam: string;
  awayTeam: string;
}

export interface LineupRow {
  matchId: number;
  teamName: string;
  playerName: string;
}

export interface EventRow {
  matchId: number;
  index: number | null;
  timestamp: string | null;
  type: string | null;
}

const rawCompetitionSchema = z.object({
  competition_id: z.number().int(),
  season_id: z.number().int(),
  country_name: z.string(),
  competition_name: z.string(),
  season_name: z.string(),
});

const rawMatchSchema = z.object({
  match_id: z.number().int(),
  match_date: z.string().nullish(),
  home_team: z.object({ home_team_name: z.string() }),
  away_team: z.object({ away_team_name: z.string() }),
});

const rawLineupTeamSchema = z.object({
  team_name: z.string(),
  lineup: z.array(z.unknown()).catch([]),
});

const rawPlayerSchema = z.object({
  player_name: z.string(),
});

// Every field falls back to null instead of failing the record
const rawEventSchema = z.object({
  index: z.number().int().nullish().catch(null),
  timestamp: z.string().nullish().catch(null),
  type: z.object({ name: z.string().nullish().catch(null) }).nullish().catch(null),
});

const matchRefSchema = z.object({ match_id: z.number().int() });

const MATCH_DATE_FORMAT = "yyyy-MM-dd";

/**
 * Coerce a match date to yyyy-MM-dd; anything unparsable becomes null
 */
export function normalizeMatchDate(value: string | null | undefined): string | null {
  if (!value) return null;
  const parsed = parse(value.trim(), MATCH_DATE_FORMAT, new Date());
  return isValid(parsed) ? format(parsed, MATCH_DATE_FORMAT) : null;
}

export function normalizeCompetition(raw: unknown): CompetitionRow | null {
  const result = rawCompetitionSchema.safeParse(raw);
  if (!result.success) return null;
  const record = result.data;
  return {
    competitionId: record.competition_id,
    seasonId: record.season_id,
    countryName: record.country_name,
    competitionName: record.competition_name,
    seasonName: record.season_name,
  };
}

/**
 * competitionId/seasonId come from the match list the record was read from
 */
export function normalizeMatch(raw: unknown, competitionId: number, seasonId: number): MatchRow | null {
  const result = rawMatchSchema.safeParse(raw);
  if (!result.success) return null;
  const record = result.data;
  return {
    matchId: record.match_id,
    competitionId,
    seasonId,
    matchDate: normalizeMatchDate(record.match_date),
    homeTeam: record.home_team.home_team_name,
    awayTeam: record.away_team.away_team_name,
  };
}

/**
 * One row per player per team. Teams or players without a name are dropped.
 */
export function normalizeLineup(teams: readonly unknown[], matchId: number): LineupRow[] {
  const rows: LineupRow[] = [];
  for (const rawTeam of teams) {
    const team = rawLineupTeamSchema.safeParse(rawTeam);
    if (!team.success) continue;

    for (const rawPlayer of team.data.lineup) {
      const player = rawPlayerSchema.safeParse(rawPlayer);
      if (!player.success) continue;
      rows.push({ matchId, teamName: team.data.team_name, playerName: player.data.player_name });
    }
  }
  return rows;
}

/**
 * Returns null only when the entry is not a JSON object at all.
 */
export function normalizeEvent(raw: unknown, matchId: number): EventRow | null {
  const result = rawEventSchema.safeParse(raw);
  if (!result.success) return null;
  const record = result.data;
  return {
    matchId,
    index: record.index ?? null,
    timestamp: record.timestamp ?? null,
    type: record.type?.name ?? null,
  };
}

export function extractMatchId(raw: unknown): number | null {
  const result = matchRefSchema.safeParse(raw);
  return result.success ? result.data.match_id : null;
}
