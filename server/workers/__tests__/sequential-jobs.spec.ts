import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { syncCompetitions } from "../competitions-sync";
import { syncMatches } from "../matches-sync";
import { syncLineups } from "../lineups-sync";
import type { IngestDeps } from "../deps";
import { MemoryObjectStore } from "../../__tests__/helpers/memory-object-store";
import { MemoryIngestStore } from "../../__tests__/helpers/memory-ingest-store";
import { competition, keys, match, publishSeasons } from "../../__tests__/helpers/open-data";

function deps(objects: MemoryObjectStore, store: MemoryIngestStore): IngestDeps {
  return { objects, keys, store, concurrency: 8 };
}

beforeEach(() => {
  vi.spyOn(console, "log").mockImplementation(() => undefined);
  vi.spyOn(console, "warn").mockImplementation(() => undefined);
  vi.spyOn(console, "error").mockImplementation(() => undefined);
});

afterEach(() => {
  vi.restoreAllMocks();
});

describe("syncCompetitions", () => {
  it("writes the manifest in one batch and skips incomplete entries", async () => {
    const objects = new MemoryObjectStore().putJson(keys.competitions(), [
      competition(16, 4),
      { competition_id: 11, season_id: 90, country_name: "Spain" },
      competition(11, 90),
    ]);
    const store = new MemoryIngestStore();

    const result = await syncCompetitions(deps(objects, store));

    expect(result.success).toBe(true);
    expect(store.operations).toEqual(["ensure:competitions", "insert:competitions"]);
    expect(store.competitions.map((c) => [c.competitionId, c.seasonId])).toEqual([
      [16, 4],
      [11, 90],
    ]);
    expect(result.log.recordsProcessed).toBe(3);
    expect(result.log.recordsInserted).toBe(2);
    expect(result.log.recordsSkipped).toBe(1);
  });

  it("keeps existing rows on a second run", async () => {
    const objects = new MemoryObjectStore().putJson(keys.competitions(), [competition(16, 4)]);
    const store = new MemoryIngestStore();

    await syncCompetitions(deps(objects, store));
    const second = await syncCompetitions(deps(objects, store));

    expect(second.log.recordsInserted).toBe(0);
    expect(store.competitions).toHaveLength(1);
  });

  it("reports a missing manifest as a failed job", async () => {
    const result = await syncCompetitions(deps(new MemoryObjectStore(), new MemoryIngestStore()));

    expect(result.success).toBe(false);
    expect(result.log.resourcesFailed).toBe(1);
    expect(result.log.errors).toEqual(["Fatal error: Object open-data/data/competitions.json not found"]);
  });
});

describe("syncMatches", () => {
  it("loads each competition/season and continues past a missing one", async () => {
    const objects = new MemoryObjectStore();
    const store = new MemoryIngestStore();
    publishSeasons(objects, [
      { competitionId: 43, seasonId: 3, matchIds: [1, 2] },
      { competitionId: 55, seasonId: 43, matchIds: [] },
      { competitionId: 72, seasonId: 30, matchIds: [3] },
    ]);
    objects.failWith(keys.matches(55, 43), new Error("timeout"));

    const result = await syncMatches(deps(objects, store));

    expect(result.success).toBe(true);
    expect(store.matches).toEqual([
      { matchId: 1, competitionId: 43, seasonId: 3, matchDate: "2020-03-01", homeTeam: "Home FC", awayTeam: "Away FC" },
      { matchId: 2, competitionId: 43, seasonId: 3, matchDate: "2020-03-01", homeTeam: "Home FC", awayTeam: "Away FC" },
      { matchId: 3, competitionId: 72, seasonId: 30, matchDate: "2020-03-01", homeTeam: "Home FC", awayTeam: "Away FC" },
    ]);
    expect(result.log.resourcesSucceeded).toBe(2);
    expect(result.log.resourcesFailed).toBe(1);
    expect(result.log.errors).toEqual(["open-data/data/matches/55/43.json: timeout"]);
  });

  it("is idempotent on match_id", async () => {
    const objects = new MemoryObjectStore();
    const store = new MemoryIngestStore();
    publishSeasons(objects, [{ competitionId: 43, seasonId: 3, matchIds: [1, 2, 3] }]);

    await syncMatches(deps(objects, store));
    const second = await syncMatches(deps(objects, store));

    expect(store.matches).toHaveLength(3);
    expect(second.log.recordsInserted).toBe(0);
    expect(second.log.recordsSkipped).toBe(3);
  });

  it("skips a match without team objects but keeps its siblings", async () => {
    const objects = new MemoryObjectStore()
      .putJson(keys.competitions(), [competition(43, 3)])
      .putJson(keys.matches(43, 3), [match(1), { match_id: 2, match_date: "2020-03-02" }]);
    const store = new MemoryIngestStore();

    const result = await syncMatches(deps(objects, store));

    expect(store.matches.map((m) => m.matchId)).toEqual([1]);
    expect(result.log.recordsSkipped).toBe(1);
    expect(result.log.resourcesFailed).toBe(0);
  });
});

describe("syncLineups", () => {
  function publishLineups(objects: MemoryObjectStore, matchId: number) {
    objects.putJson(keys.lineups(matchId), [
      { team_id: 1, team_name: "Home FC", lineup: [{ player_name: "A. Keeper" }, { player_name: "B. Back" }] },
      { team_id: 2, team_name: "Away FC", lineup: [{ player_name: "C. Wing" }] },
    ]);
  }

  it("loads lineups match by match and reports progress per competition/season", async () => {
    const objects = new MemoryObjectStore();
    const store = new MemoryIngestStore();
    publishSeasons(objects, [
      { competitionId: 43, seasonId: 3, matchIds: [1, 2] },
      { competitionId: 72, seasonId: 30, matchIds: [3] },
    ]);
    publishLineups(objects, 1);
    publishLineups(objects, 3);

    const result = await syncLineups(deps(objects, store));

    expect(result.success).toBe(true);
    expect(store.lineups).toHaveLength(6);
    expect(result.log.resourcesSucceeded).toBe(2);
    expect(result.log.resources.find((r) => r.status === "failed")).toMatchObject({
      key: "open-data/data/lineups/2.json",
      matchId: 2,
    });
    expect(console.log).toHaveBeenCalledWith("[lineups-sync 43/3] 1/2 (50.0%) match 1");
    expect(console.log).toHaveBeenCalledWith("[lineups-sync 43/3] 2/2 (100.0%) match 2");
    expect(console.log).toHaveBeenCalledWith("[lineups-sync 72/30] 1/1 (100.0%) match 3");
  });

  it("appends duplicates on a re-run unless the natural key is enforced", async () => {
    const objects = new MemoryObjectStore();
    publishSeasons(objects, [{ competitionId: 43, seasonId: 3, matchIds: [1] }]);
    publishLineups(objects, 1);

    const plain = new MemoryIngestStore();
    await syncLineups(deps(objects, plain));
    await syncLineups(deps(objects, plain));
    expect(plain.lineups).toHaveLength(6);

    const unique = new MemoryIngestStore({ lineupsUnique: true });
    await syncLineups(deps(objects, unique));
    await syncLineups(deps(objects, unique));
    expect(unique.lineups).toHaveLength(3);
  });
});
