import { describe, it, expect, vi, afterEach } from "vitest";
import { loadManifest, resolveMatches, resolveSeasons, ResolverCache } from "../resolver";
import { ResourceError } from "../sources/object-store";
import { MemoryObjectStore } from "../../__tests__/helpers/memory-object-store";
import { competition, keys, match } from "../../__tests__/helpers/open-data";

afterEach(() => {
  vi.restoreAllMocks();
});

describe("resolveSeasons", () => {
  it("returns one pair per manifest entry in manifest order", () => {
    const seasons = resolveSeasons([competition(16, 4), competition(11, 90), competition(16, 1)]);
    expect(seasons).toEqual([
      { competitionId: 16, seasonId: 4 },
      { competitionId: 11, seasonId: 90 },
      { competitionId: 16, seasonId: 1 },
    ]);
  });

  it("drops entries without ids", () => {
    vi.spyOn(console, "warn").mockImplementation(() => undefined);
    expect(resolveSeasons([{ competition_name: "Nameless" }, competition(2, 27)])).toEqual([
      { competitionId: 2, seasonId: 27 },
    ]);
  });
});

describe("resolveMatches", () => {
  it("expands each pair's match list in order", async () => {
    const objects = new MemoryObjectStore()
      .putJson(keys.matches(16, 4), [match(101), match(102)])
      .putJson(keys.matches(11, 90), [match(201)]);

    const { matches, unresolved } = await resolveMatches(objects, keys, [
      { competitionId: 16, seasonId: 4 },
      { competitionId: 11, seasonId: 90 },
    ]);

    expect(matches.map((m) => [m.competitionId, m.seasonId, m.matchId])).toEqual([
      [16, 4, 101],
      [16, 4, 102],
      [11, 90, 201],
    ]);
    expect(unresolved).toEqual([]);
  });

  it("skips a pair whose match list is missing and keeps resolving the rest", async () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => undefined);
    const objects = new MemoryObjectStore()
      .putJson(keys.matches(16, 4), [match(101)])
      .putJson(keys.matches(2, 27), [match(301)]);

    const { matches, unresolved } = await resolveMatches(objects, keys, [
      { competitionId: 16, seasonId: 4 },
      { competitionId: 11, seasonId: 90 },
      { competitionId: 2, seasonId: 27 },
    ]);

    expect(matches.map((m) => m.matchId)).toEqual([101, 301]);
    expect(unresolved).toEqual([
      {
        key: "open-data/data/matches/11/90.json",
        status: "skipped",
        rowsWritten: 0,
        reason: "Object open-data/data/matches/11/90.json not found",
      },
    ]);
    expect(warn).toHaveBeenCalledTimes(1);
  });

  it("leaves out malformed and unreachable match lists, failing only the unreachable one", async () => {
    vi.spyOn(console, "warn").mockImplementation(() => undefined);
    const objects = new MemoryObjectStore()
      .putRaw(keys.matches(1, 1), "{not json")
      .putJson(keys.matches(1, 2), { match_id: 5 })
      .failWith(keys.matches(1, 3), new ResourceError(keys.matches(1, 3), "unavailable", "socket hang up"))
      .putJson(keys.matches(1, 4), [match(401)]);

    const { matches, unresolved } = await resolveMatches(objects, keys, [
      { competitionId: 1, seasonId: 1 },
      { competitionId: 1, seasonId: 2 },
      { competitionId: 1, seasonId: 3 },
      { competitionId: 1, seasonId: 4 },
    ]);

    expect(matches.map((m) => m.matchId)).toEqual([401]);
    expect(unresolved.map((s) => [s.key, s.status])).toEqual([
      ["open-data/data/matches/1/1.json", "skipped"],
      ["open-data/data/matches/1/2.json", "skipped"],
      ["open-data/data/matches/1/3.json", "failed"],
    ]);
  });

  it("reuses cached match lists across calls", async () => {
    const objects = new MemoryObjectStore().putJson(keys.matches(16, 4), [match(101)]);
    const cache = new ResolverCache();
    const seasons = [{ competitionId: 16, seasonId: 4 }];

    await resolveMatches(objects, keys, seasons, { cache });
    const second = await resolveMatches(objects, keys, seasons, { cache });

    expect(second.matches.map((m) => m.matchId)).toEqual([101]);
    expect(objects.requests).toEqual(["open-data/data/matches/16/4.json"]);
  });
});

describe("loadManifest", () => {
  it("requires the manifest to be an array", async () => {
    const objects = new MemoryObjectStore().putJson(keys.competitions(), { competitions: [] });
    await expect(loadManifest(objects, keys)).rejects.toThrow("Expected a JSON array in open-data/data/competitions.json");
  });

  it("fetches the manifest once per cache", async () => {
    const objects = new MemoryObjectStore().putJson(keys.competitions(), [competition(16, 4)]);
    const cache = new ResolverCache();
    await loadManifest(objects, keys, cache);
    await loadManifest(objects, keys, cache);
    expect(objects.requests).toEqual(["open-data/data/competitions.json"]);
  });
});
