import { describe, expect, it, vi } from "vitest";
import { ApiStandingsSource } from "./api-source.js";
import { ConfigurationMissingError, SourceUnavailableError } from "./errors.js";

const payload = {
  competition: { code: "CL", name: "UEFA Champions League" },
  standings: [
    {
      stage: "LEAGUE_STAGE",
      type: "TOTAL",
      group: null,
      table: [
        {
          position: 1,
          team: { name: "Liverpool FC", shortName: "Liverpool", tla: "LIV" },
          points: 12,
          goalDifference: 8,
          goalsFor: 10,
        },
        {
          position: 2,
          team: { name: "FC Barcelona", shortName: "Barça", tla: "FCB" },
          points: 12,
          goalDifference: 11,
          goalsFor: 15,
        },
        {
          position: 3,
          team: { name: "Arsenal FC", shortName: "Arsenal", tla: "ARS" },
          points: 10,
          goalDifference: 6,
          goalsFor: 9,
        },
      ],
    },
    {
      stage: "LEAGUE_STAGE",
      type: "HOME",
      group: null,
      table: [{ position: 1, team: { name: "Home Only FC" }, points: 30, goalDifference: 0, goalsFor: 0 }],
    },
  ],
};

const options = {
  baseUrl: "https://api.test/v4/",
  token: "test-token",
  competition: "CL",
  timeoutMs: 1000,
};

const respondWith = (response: Response) => vi.fn(async (_url: string, _init?: RequestInit) => response);

describe("ApiStandingsSource", () => {
  it("requests the competition standings with the auth token", async () => {
    const fetchImpl = respondWith(new Response(JSON.stringify(payload), { status: 200 }));
    await new ApiStandingsSource(options, fetchImpl).fetch();

    expect(fetchImpl).toHaveBeenCalledTimes(1);
    expect(fetchImpl.mock.calls[0][0]).toBe("https://api.test/v4/competitions/CL/standings");
    expect(fetchImpl.mock.calls[0][1]?.headers).toEqual({
      "X-Auth-Token": "test-token",
      Accept: "application/json",
    });
  });

  it("builds a sorted table from the TOTAL block", async () => {
    const fetchImpl = respondWith(new Response(JSON.stringify(payload), { status: 200 }));
    const table = await new ApiStandingsSource(options, fetchImpl).fetch();

    expect(table).toEqual([
      { canonicalName: "FC Barcelona", points: 12, tiebreakFields: [11, 15] },
      { canonicalName: "Liverpool FC", points: 12, tiebreakFields: [8, 10] },
      { canonicalName: "Arsenal FC", points: 10, tiebreakFields: [6, 9] },
    ]);
  });

  it("reports a non-2xx response as unavailable", async () => {
    const fetchImpl = respondWith(new Response("busy", { status: 503 }));
    await expect(new ApiStandingsSource(options, fetchImpl).fetch()).rejects.toThrow(
      "HTTP 503 from https://api.test/v4/competitions/CL/standings",
    );
  });

  it("reports network failures as unavailable", async () => {
    const fetchImpl = vi.fn(async (_url: string, _init?: RequestInit): Promise<Response> => {
      throw new TypeError("fetch failed");
    });
    const result = new ApiStandingsSource(options, fetchImpl).fetch();

    await expect(result).rejects.toBeInstanceOf(SourceUnavailableError);
    await expect(result).rejects.toThrow("Request to https://api.test/v4/competitions/CL/standings failed: fetch failed");
  });

  it("reports unparseable and unexpected payloads as unavailable", async () => {
    for (const body of ["not json", JSON.stringify({ teams: [] }), JSON.stringify({ standings: [] })]) {
      const fetchImpl = respondWith(new Response(body, { status: 200 }));
      await expect(new ApiStandingsSource(options, fetchImpl).fetch()).rejects.toBeInstanceOf(SourceUnavailableError);
    }
  });

  it("needs a token", () => {
    expect(() => new ApiStandingsSource({ ...options, token: undefined })).toThrow(ConfigurationMissingError);
  });
});
