// src/standings-table.ts
import type { StandingsRow, StandingsTable } from "@champions-pool/shared";
import { cleanTeamName, stripTrailingParenthetical } from "./team-name-utils.js";

/** A row as a source hands it over, before cleaning. */
export interface RawStandingsRow {
  name: string;
  points?: number | null;
  tiebreakFields?: readonly number[];
}

function toPoints(points: number | null | undefined): number {
  if (typeof points !== "number" || !Number.isFinite(points) || points < 0) return 0;
  return Math.floor(points);
}

export function compareStandingsRows(a: StandingsRow, b: StandingsRow): number {
  if (a.points !== b.points) return b.points - a.points;
  const length = Math.max(a.tiebreakFields.length, b.tiebreakFields.length);
  for (let i = 0; i < length; i++) {
    const diff = (b.tiebreakFields[i] ?? 0) - (a.tiebreakFields[i] ?? 0);
    if (diff !== 0) return diff;
  }
  return 0;
}

/**
 * Builds a fresh, frozen standings table: names cleaned, duplicates dropped
 * (first occurrence wins), sorted by points then tiebreak fields, all
 * descending. Equal rows keep their source order.
 */
export function buildStandingsTable(rows: readonly RawStandingsRow[]): StandingsTable {
  const seen = new Set<string>();
  const table: StandingsRow[] = [];

  for (const row of rows) {
    const canonicalName = stripTrailingParenthetical(cleanTeamName(row.name));
    if (!canonicalName || seen.has(canonicalName)) continue;
    seen.add(canonicalName);
    table.push(
      Object.freeze({
        canonicalName,
        points: toPoints(row.points),
        tiebreakFields: Object.freeze((row.tiebreakFields ?? []).filter((value) => Number.isFinite(value))),
      }),
    );
  }

  table.sort(compareStandingsRows);
  return Object.freeze(table);
}

export function pointsByTeam(table: StandingsTable): Map<string, number> {
  return new Map(table.map((row) => [row.canonicalName, row.points]));
}

export function canonicalNames(table: StandingsTable): string[] {
  return table.map((row) => row.canonicalName);
}
