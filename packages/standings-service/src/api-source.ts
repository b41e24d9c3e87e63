// src/api-source.ts
import { z } from "zod";
import type { StandingsTable } from "@champions-pool/shared";
import { buildStandingsTable, type RawStandingsRow } from "@champions-pool/pool-engine";
import { ConfigurationMissingError, SourceUnavailableError, describeError } from "./errors.js";
import type { FetchLike, StandingsSource } from "./standings-source.js";

// Subset of the football-data.org v4 /competitions/{code}/standings payload.
const tableEntrySchema = z.object({
  position: z.number().nullish(),
  team: z.object({
    name: z.string(),
    shortName: z.string().nullish(),
    tla: z.string().nullish(),
  }),
  points: z.number().nullish(),
  goalDifference: z.number().nullish(),
  goalsFor: z.number().nullish(),
});

const standingsResponseSchema = z.object({
  standings: z.array(
    z.object({
      stage: z.string().nullish(),
      type: z.string().nullish(),
      group: z.string().nullish(),
      table: z.array(tableEntrySchema),
    }),
  ),
});

export type StandingsResponse = z.infer<typeof standingsResponseSchema>;

export interface ApiSourceOptions {
  baseUrl: string;
  token: string | undefined;
  competition: string;
  timeoutMs: number;
}

/** Collects TOTAL blocks (one per group, or a single league table). */
export function rowsFromResponse(response: StandingsResponse): RawStandingsRow[] {
  const totals = response.standings.filter((block) => !block.type || block.type === "TOTAL");
  return totals.flatMap((block) =>
    block.table.map((entry) => ({
      name: entry.team.name,
      points: entry.points,
      tiebreakFields: [entry.goalDifference ?? 0, entry.goalsFor ?? 0],
    })),
  );
}

export class ApiStandingsSource implements StandingsSource {
  readonly kind = "api";
  private readonly token: string;

  constructor(
    private readonly options: ApiSourceOptions,
    private readonly fetchImpl: FetchLike = fetch,
  ) {
    if (!options.token) {
      throw new ConfigurationMissingError("STANDINGS_API_TOKEN is required for the api standings source.");
    }
    this.token = options.token;
  }

  get url(): string {
    const base = this.options.baseUrl.replace(/\/$/, "");
    return `${base}/competitions/${encodeURIComponent(this.options.competition)}/standings`;
  }

  async fetch(): Promise<StandingsTable> {
    const url = this.url;
    let response: Response;
    try {
      response = await this.fetchImpl(url, {
        headers: { "X-Auth-Token": this.token, Accept: "application/json" },
        signal: AbortSignal.timeout(this.options.timeoutMs),
      });
    } catch (error) {
      throw new SourceUnavailableError(`Request to ${url} failed: ${describeError(error)}`, this.kind, {
        cause: error,
      });
    }

    if (!response.ok) {
      throw new SourceUnavailableError(`HTTP ${response.status} from ${url}`, this.kind);
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch (error) {
      throw new SourceUnavailableError(`Unparseable payload from ${url}: ${describeError(error)}`, this.kind, {
        cause: error,
      });
    }

    const parsed = standingsResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new SourceUnavailableError(`Unexpected payload shape from ${url}`, this.kind, { cause: parsed.error });
    }

    const rows = rowsFromResponse(parsed.data);
    if (rows.length === 0) {
      throw new SourceUnavailableError(`No standings rows in response from ${url}`, this.kind);
    }
    return buildStandingsTable(rows);
  }
}
