import { describe, expect, it, vi } from "vitest";
import type { ResolvedAssignment } from "@champions-pool/shared";
import { aggregate, correctionNote, rankPositions } from "./aggregator.js";
import { SubstringScorer, type SimilarityScorer } from "./similarity.js";
import { buildStandingsTable } from "./standings-table.js";

const standings = buildStandingsTable([
  { name: "Real Madrid", points: 12 },
  { name: "Arsenal", points: 11 },
  { name: "Liverpool", points: 10 },
  { name: "Napoli", points: 10 },
]);

describe("aggregate", () => {
  it("sums the points of both teams", () => {
    const [result] = aggregate(standings, { A: ["Real Madrid", "Liverpool"] });

    expect(result.participantId).toBe("A");
    expect(result.totalPoints).toBe(22);
    expect(result.breakdown).toBe("Real Madrid: 12 pts | Liverpool: 10 pts");
    expect(result.notes).toEqual([]);
  });

  it("records an unknown team as an unresolved zero-point entry", () => {
    const [result] = aggregate(standings, { B: ["Unknown FC", "Liverpool"] }, {}, 60);

    expect(result.perTeam[0]).toEqual({ inputLabel: "Unknown FC", resolvedName: null, score: 0, points: 0 });
    expect(result.totalPoints).toBe(10);
    expect(result.breakdown).toBe("Unknown FC: not found | Liverpool: 10 pts");
    expect(result.notes).toEqual(["not found: Unknown FC"]);
  });

  it("notes corrections that scored below 100", () => {
    const [result] = aggregate(standings, { C: ["Liverpol", "Napoli"] });
    const [corrected] = result.perTeam;

    expect(corrected.resolvedName).toBe("Liverpool");
    expect(corrected.score).toBeLessThan(100);
    expect(result.notes).toEqual([`Liverpol -> Liverpool (${corrected.score}%)`]);
    expect(result.totalPoints).toBe(20);
  });

  it("orders by total descending, then participant id ascending", () => {
    const results = aggregate(standings, {
      Zoe: ["Real Madrid", "Liverpool"],
      Bob: ["Arsenal", "Napoli"],
      Carl: ["Napoli", "Liverpool"],
      Ana: ["Arsenal", "Liverpool"],
    });

    expect(results.map((r) => [r.participantId, r.totalPoints])).toEqual([
      ["Zoe", 22],
      ["Ana", 21],
      ["Bob", 21],
      ["Carl", 20],
    ]);
  });

  it("keeps the total equal to the sum of its teams", () => {
    const results = aggregate(standings, {
      A: ["Real Madrid", "Unknown FC"],
      B: ["Arsenal", "Napoli"],
    });
    for (const result of results) {
      expect(result.totalPoints).toBe(result.perTeam.reduce((sum, team) => sum + team.points, 0));
    }
  });

  it("returns the same output for the same input", () => {
    const participants = { A: ["Real Madrid", "Liverpol"], B: ["Arsenal", "Unknown FC"] } as const;
    expect(aggregate(standings, participants)).toEqual(aggregate(standings, participants));
  });

  it("accepts a participant list and a substring scorer", () => {
    const table = buildStandingsTable([{ name: "FC Internazionale Milano", points: 9 }]);
    const [result] = aggregate(table, [{ id: "Carlos", teamLabels: ["Inter", "Bayern"] }], {}, 60, new SubstringScorer());

    expect(result.perTeam.map((team) => team.resolvedName)).toEqual(["FC Internazionale Milano", null]);
    expect(result.totalPoints).toBe(9);
  });

  it("treats a label named like an object built-in as unknown", () => {
    const [result] = aggregate(standings, { A: ["constructor", "Liverpool"] });

    expect(result.perTeam[0]).toEqual({ inputLabel: "constructor", resolvedName: null, score: 0, points: 0 });
    expect(result.totalPoints).toBe(10);
    expect(result.notes).toEqual(["not found: constructor"]);
  });

  it("records a label whose scoring fails as unresolved", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    const failing: SimilarityScorer = {
      name: "fuzzy",
      score: () => {
        throw new Error("scorer down");
      },
    };

    const [result] = aggregate(standings, { A: ["Real Madrid", "Liverpol"] }, {}, 60, failing);

    expect(result.perTeam).toEqual([
      { inputLabel: "Real Madrid", resolvedName: null, score: 0, points: 0 },
      { inputLabel: "Liverpol", resolvedName: null, score: 0, points: 0 },
    ]);
    expect(result.totalPoints).toBe(0);
    expect(result.notes).toEqual(["not found: Real Madrid", "not found: Liverpol"]);
    expect(warn).toHaveBeenCalledWith('Resolver: Could not resolve "Liverpol" for A: scorer down');
    warn.mockRestore();
  });

  it("returns nothing for an empty pool", () => {
    expect(aggregate(standings, {})).toEqual([]);
  });
});

describe("rankPositions", () => {
  const make = (participantId: string, totalPoints: number): ResolvedAssignment => ({
    participantId,
    perTeam: [],
    totalPoints,
    breakdown: "",
    notes: [],
  });

  it("shares positions between equal totals", () => {
    const ranked = rankPositions([make("Zoe", 22), make("Ana", 21), make("Bob", 21), make("Carl", 20)]);
    expect(ranked.map((r) => r.position)).toEqual([1, 2, 2, 4]);
  });
});

describe("correctionNote", () => {
  it("stays silent for exact hits", () => {
    expect(correctionNote({ inputLabel: "Napoli", resolvedName: "Napoli", score: 100, points: 10 })).toBeNull();
  });
});
