import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { buildStandingsTable } from "@champions-pool/pool-engine";
import { SourceUnavailableError } from "./errors.js";
import { loadStandings, type StandingsSource } from "./standings-source.js";
import { StaticStandingsSource } from "./static-source.js";

const liveTable = buildStandingsTable([{ name: "Liverpool FC", points: 12 }]);
const fallbackTable = buildStandingsTable([{ name: "Liverpool", points: 10 }]);
const fallback: StandingsSource = { kind: "static", fetch: async () => fallbackTable };
const now = () => new Date("2025-01-01T00:00:00.000Z");

beforeEach(() => {
  vi.spyOn(console, "log").mockImplementation(() => {});
  vi.spyOn(console, "warn").mockImplementation(() => {});
});

afterEach(() => {
  vi.restoreAllMocks();
});

describe("loadStandings", () => {
  it("uses the primary source when it answers", async () => {
    const primary: StandingsSource = { kind: "api", fetch: async () => liveTable };

    expect(await loadStandings(primary, fallback, now)).toEqual({
      table: liveTable,
      source: "api",
      fallback: false,
      fetchedAt: "2025-01-01T00:00:00.000Z",
    });
  });

  it("falls back when the primary source is unavailable", async () => {
    const primary: StandingsSource = {
      kind: "api",
      fetch: async () => {
        throw new SourceUnavailableError("HTTP 500", "api");
      },
    };

    const snapshot = await loadStandings(primary, fallback, now);
    expect(snapshot.source).toBe("static");
    expect(snapshot.fallback).toBe(true);
    expect(snapshot.table).toEqual(fallbackTable);
    expect(console.warn).toHaveBeenCalledWith("Standings: api source unavailable: HTTP 500");
  });

  it("lets other failures through", async () => {
    const primary: StandingsSource = {
      kind: "html",
      fetch: async () => {
        throw new RangeError("bug");
      },
    };
    await expect(loadStandings(primary, fallback, now)).rejects.toThrow(RangeError);
  });

  it("rethrows when there is no fallback", async () => {
    const primary: StandingsSource = {
      kind: "api",
      fetch: async () => {
        throw new SourceUnavailableError("timeout", "api");
      },
    };
    await expect(loadStandings(primary, undefined, now)).rejects.toBeInstanceOf(SourceUnavailableError);
  });
});

describe("StaticStandingsSource", () => {
  it("serves the bundled example table in standings order", async () => {
    const table = await new StaticStandingsSource().fetch();

    expect(table).toHaveLength(20);
    expect(table.slice(0, 3).map((row) => [row.canonicalName, row.points])).toEqual([
      ["Manchester City", 13],
      ["Paris Saint-Germain", 12],
      ["Real Madrid", 12],
    ]);
  });

  it("reports a missing file as unavailable", async () => {
    await expect(new StaticStandingsSource("/nonexistent/standings.json").fetch()).rejects.toBeInstanceOf(
      SourceUnavailableError,
    );
  });
});
