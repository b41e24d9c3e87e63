// src/standings-source.ts
import type { StandingsSnapshot, StandingsSourceKind, StandingsTable } from "@champions-pool/shared";
import { SourceUnavailableError } from "./errors.js";

export interface StandingsSource {
  readonly kind: StandingsSourceKind;
  /** Rejects with SourceUnavailableError when the source cannot deliver a table. */
  fetch(): Promise<StandingsTable>;
}

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

/**
 * Fetches from the primary source and falls back to the secondary one
 * (normally the bundled example table) when the primary is unavailable.
 * Anything other than SourceUnavailableError propagates.
 */
export async function loadStandings(
  primary: StandingsSource,
  fallback?: StandingsSource,
  now: () => Date = () => new Date(),
): Promise<StandingsSnapshot> {
  try {
    const table = await primary.fetch();
    console.log(`Standings: Loaded ${table.length} rows from the ${primary.kind} source.`);
    return { table, source: primary.kind, fallback: false, fetchedAt: now().toISOString() };
  } catch (error) {
    if (!(error instanceof SourceUnavailableError) || !fallback || fallback === primary) {
      throw error;
    }
    console.warn(`Standings: ${primary.kind} source unavailable: ${error.message}`);
    console.warn(`Standings: Using the ${fallback.kind} table as fallback.`);
    const table = await fallback.fetch();
    return { table, source: fallback.kind, fallback: true, fetchedAt: now().toISOString() };
  }
}
