import { pgTable, serial, text, integer, bigint, date, uniqueIndex } from "drizzle-orm/pg-core";

/**
 * Open football data - relational schema
 *
 * One table per ingested resource type. Rows are append-only: a re-run either
 * no-ops through a unique key or appends (lineups without LINEUPS_UNIQUE).
 *
 * Column names are snake_case because the tables are also created at run time
 * by the loader's CREATE TABLE IF NOT EXISTS statements.
 */

// ============================================================================
// COMPETITIONS (root manifest)
// ============================================================================

export const competitions = pgTable("competitions", {
  competitionId: integer("competition_id"),
  seasonId: integer("season_id"),
  countryName: text("country_name"),
  competitionName: text("competition_name"),
  seasonName: text("season_name"),
}, (table) => ({
  naturalKey: uniqueIndex("competitions_natural_key").on(table.competitionId, table.seasonId),
}));

export type Competition = typeof competitions.$inferSelect;

// ============================================================================
// MATCHES
// ============================================================================

export const matches = pgTable("matches", {
  matchId: bigint("match_id", { mode: "number" }).primaryKey(),
  competitionId: integer("competition_id"),
  seasonId: integer("season_id"),
  matchDate: date("match_date"), // yyyy-MM-dd
  homeTeam: text("home_team"),
  awayTeam: text("away_team"),
});

export type Match = typeof matches.$inferSelect;

// ============================================================================
// LINEUPS
// ============================================================================

// No unique key by default; see LINEUPS_UNIQUE in server/_core/env.ts
export const lineups = pgTable("lineups", {
  matchId: bigint("match_id", { mode: "number" }),
  teamName: text("team_name"),
  playerName: text("player_name"),
});

export type Lineup = typeof lineups.$inferSelect;

// ============================================================================
// EVENTS
// ============================================================================

export const events = pgTable("events", {
  id: serial("id").primaryKey(),
  matchId: bigint("match_id", { mode: "number" }),
  index: integer("index"), // position within the match's event stream
  timestamp: text("timestamp"), // match clock, HH:MM:SS.mmm, resets per period
  type: text("type"),
}, (table) => ({
  matchIndexUnique: uniqueIndex("events_match_index_unique").on(table.matchId, table.index),
}));

export type Event = typeof events.$inferSelect;
