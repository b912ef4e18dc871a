/**
 * Idempotent Bulk Loader
 *
 * Creates the four ingestion tables on first use and writes normalized rows as
 * multi-row INSERT statements. Competitions, matches and events are
 * conflict-tolerant (ON CONFLICT DO NOTHING on their unique key); lineups are a
 * plain insert unless the lineup natural key is enforced.
 */

import { Pool } from "pg";
import { drizzle, type NodePgQueryResultHKT } from "drizzle-orm/node-postgres";
import { sql } from "drizzle-orm";
import type { PgDatabase, PgQueryResultHKT } from "drizzle-orm/pg-core";
import { competitions, matches, lineups, events } from "../../drizzle/schema";
import type { CompetitionRow, MatchRow, LineupRow, EventRow } from "../_core/normalizers";
import { getDb } from "../db";

export type TableName = "competitions" | "matches" | "lineups" | "events";

export interface LoaderOptions {
  /** Enforce (match_id, team_name, player_name) uniqueness on lineups */
  lineupsUnique: boolean;
}

/**
 * Each method writes one batch and resolves to the number of rows that were
 * actually inserted (rows skipped by a conflict are not counted). A batch too
 * large for one statement is split; atomicity comes from the surrounding
 * unit of work.
 */
export interface RowWriter {
  insertCompetitions(rows: CompetitionRow[]): Promise<number>;
  insertMatches(rows: MatchRow[]): Promise<number>;
  insertLineups(rows: LineupRow[]): Promise<number>;
  insertEvents(rows: EventRow[]): Promise<number>;
}

export interface IngestStore {
  /** Create-if-absent, including the table's unique index. Idempotent. */
  ensureTable(table: TableName): Promise<void>;
  /**
   * Runs `work` as one transaction on a dedicated connection: everything it
   * writes commits together or not at all. The connection is released on
   * every exit path.
   */
  withConnection<T>(work: (writer: RowWriter) => Promise<T>): Promise<T>;
}

// Postgres caps a statement at 65535 bind parameters
const MAX_BIND_PARAMETERS = 65535;

/** Rows per INSERT for a table writing `columns` parameters per row */
export function maxRowsPerStatement(columns: number): number {
  return Math.floor(MAX_BIND_PARAMETERS / columns);
}

export function tableDdl(table: TableName, options: LoaderOptions): string[] {
  switch (table) {
    case "competitions":
      return [
        `CREATE TABLE IF NOT EXISTS competitions (
          competition_id INT,
          season_id INT,
          country_name TEXT,
          competition_name TEXT,
          season_name TEXT
        )`,
        `CREATE UNIQUE INDEX IF NOT EXISTS competitions_natural_key ON competitions (competition_id, season_id)`,
      ];
    case "matches":
      return [
        `CREATE TABLE IF NOT EXISTS matches (
          match_id BIGINT PRIMARY KEY,
          competition_id INT,
          season_id INT,
          match_date DATE,
          home_team TEXT,
          away_team TEXT
        )`,
      ];
    case "lineups": {
      const statements = [
        `CREATE TABLE IF NOT EXISTS lineups (
          match_id BIGINT,
          team_name TEXT,
          player_name TEXT
        )`,
      ];
      if (options.lineupsUnique) {
        statements.push(
          `CREATE UNIQUE INDEX IF NOT EXISTS lineups_natural_key ON lineups (match_id, team_name, player_name)`
        );
      }
      return statements;
    }
    case "events":
      // The unique index must exist before the first ON CONFLICT insert
      return [
        `CREATE TABLE IF NOT EXISTS events (
          id SERIAL PRIMARY KEY,
          match_id BIGINT,
          "index" INT,
          "timestamp" TEXT,
          "type" TEXT
        )`,
        `CREATE UNIQUE INDEX IF NOT EXISTS events_match_index_unique ON events (match_id, "index")`,
      ];
  }
}

export async function ensureTable<TQueryResult extends PgQueryResultHKT>(
  db: PgDatabase<TQueryResult>,
  table: TableName,
  options: LoaderOptions
): Promise<void> {
  for (const statement of tableDdl(table, options)) {
    await db.execute(sql.raw(statement));
  }
}

export class DrizzleRowWriter<TQueryResult extends PgQueryResultHKT> implements RowWriter {
  constructor(
    private readonly db: PgDatabase<TQueryResult>,
    private readonly options: LoaderOptions
  ) {}

  private async writeBatch<T>(
    rows: readonly T[],
    columns: number,
    write: (chunk: T[]) => Promise<number>
  ): Promise<number> {
    const size = maxRowsPerStatement(columns);
    let written = 0;
    for (let i = 0; i < rows.length; i += size) {
      written += await write(rows.slice(i, i + size));
    }
    return written;
  }

  insertCompetitions(rows: CompetitionRow[]): Promise<number> {
    return this.writeBatch(rows, 5, async (chunk) => {
      const inserted = await this.db
        .insert(competitions)
        .values(chunk)
        .onConflictDoNothing({ target: [competitions.competitionId, competitions.seasonId] })
        .returning({ competitionId: competitions.competitionId });
      return inserted.length;
    });
  }

  insertMatches(rows: MatchRow[]): Promise<number> {
    return this.writeBatch(rows, 6, async (chunk) => {
      const inserted = await this.db
        .insert(matches)
        .values(chunk)
        .onConflictDoNothing({ target: matches.matchId })
        .returning({ matchId: matches.matchId });
      return inserted.length;
    });
  }

  insertLineups(rows: LineupRow[]): Promise<number> {
    return this.writeBatch(rows, 3, async (chunk) => {
      if (this.options.lineupsUnique) {
        const inserted = await this.db
          .insert(lineups)
          .values(chunk)
          .onConflictDoNothing({ target: [lineups.matchId, lineups.teamName, lineups.playerName] })
          .returning({ matchId: lineups.matchId });
        return inserted.length;
      }
      const inserted = await this.db
        .insert(lineups)
        .values(chunk)
        .returning({ matchId: lineups.matchId });
      return inserted.length;
    });
  }

  insertEvents(rows: EventRow[]): Promise<number> {
    // id is generated, so four parameters per row
    return this.writeBatch(rows, 4, async (chunk) => {
      const inserted = await this.db
        .insert(events)
        .values(chunk)
        .onConflictDoNothing({ target: [events.matchId, events.index] })
        .returning({ id: events.id });
      return inserted.length;
    });
  }
}

/** A checked-out connection and the way to hand it back */
export interface LoaderConnection<TQueryResult extends PgQueryResultHKT> {
  db: PgDatabase<TQueryResult>;
  release(): void;
}

export class PostgresLoader<TQueryResult extends PgQueryResultHKT> implements IngestStore {
  private readonly ensured = new Set<TableName>();

  constructor(
    private readonly db: PgDatabase<TQueryResult>,
    private readonly connect: () => Promise<LoaderConnection<TQueryResult>>,
    private readonly options: LoaderOptions
  ) {}

  static fromPool(pool: Pool, options: LoaderOptions): PostgresLoader<NodePgQueryResultHKT> {
    return new PostgresLoader(
      getDb(pool),
      async () => {
        const client = await pool.connect();
        return { db: drizzle(client), release: () => client.release() };
      },
      options
    );
  }

  async ensureTable(table: TableName): Promise<void> {
    if (this.ensured.has(table)) return;
    await ensureTable(this.db, table, this.options);
    this.ensured.add(table);
  }

  async withConnection<T>(work: (writer: RowWriter) => Promise<T>): Promise<T> {
    const connection = await this.connect();
    try {
      await connection.db.execute(sql`BEGIN`);
      try {
        const result = await work(new DrizzleRowWriter(connection.db, this.options));
        await connection.db.execute(sql`COMMIT`);
        return result;
      } catch (error) {
        await connection.db.execute(sql`ROLLBACK`);
        throw error;
      }
    } finally {
      connection.release();
    }
  }
}
