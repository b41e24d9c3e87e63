// src/static-source.ts
import fs from "node:fs/promises";
import { fileURLToPath } from "node:url";
import { z } from "zod";
import type { StandingsTable } from "@champions-pool/shared";
import { buildStandingsTable } from "@champions-pool/pool-engine";
import { SourceUnavailableError, describeError } from "./errors.js";
import type { StandingsSource } from "./standings-source.js";

export const EXAMPLE_STANDINGS_FILE = fileURLToPath(new URL("../data/example-standings.json", import.meta.url));

const exampleSchema = z.array(
  z.object({
    name: z.string(),
    points: z.number().nullish(),
    tiebreakFields: z.array(z.number()).optional(),
  }),
);

/** Serves a table from a JSON file; by default the bundled example standings. */
export class StaticStandingsSource implements StandingsSource {
  readonly kind = "static";

  constructor(private readonly filePath: string = EXAMPLE_STANDINGS_FILE) {}

  async fetch(): Promise<StandingsTable> {
    let raw: unknown;
    try {
      raw = JSON.parse(await fs.readFile(this.filePath, "utf8"));
    } catch (error) {
      throw new SourceUnavailableError(`Could not read ${this.filePath}: ${describeError(error)}`, this.kind, {
        cause: error,
      });
    }

    const parsed = exampleSchema.safeParse(raw);
    if (!parsed.success) {
      throw new SourceUnavailableError(`Unexpected table format in ${this.filePath}`, this.kind, {
        cause: parsed.error,
      });
    }
    return buildStandingsTable(parsed.data);
  }
}
