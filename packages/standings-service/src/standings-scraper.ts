// src/standings-scraper.ts
import * as cheerio from "cheerio";
import type { StandingsTable } from "@champions-pool/shared";
import { buildStandingsTable, type RawStandingsRow } from "@champions-pool/pool-engine";
import { SourceUnavailableError, describeError } from "./errors.js";
import type { FetchLike, StandingsSource } from "./standings-source.js";

const USER_AGENT = "Mozilla/5.0 (compatible; ChampionsPoolBot/1.0)";
const HAS_LETTER = /\p{L}/u;

export interface ScraperOptions {
  pageUrl: string;
  timeoutMs: number;
}

/**
 * Extracts team/points pairs from every <table> on a standings page.
 * Per row (header row skipped): the team is the first cell containing a
 * letter, the points are the last cell containing a digit.
 */
export function parseStandingsHtml(html: string): RawStandingsRow[] {
  const $ = cheerio.load(html);
  const rows: RawStandingsRow[] = [];

  $("table").each((_, table) => {
    $(table)
      .find("tr")
      .slice(1)
      .each((_, tr) => {
        const cells = $(tr)
          .find("td, th")
          .map((_, cell) => $(cell).text().replace(/\s+/g, " ").trim())
          .get();
        if (cells.length === 0) return;

        const team = cells.find((cell) => HAS_LETTER.test(cell));
        if (!team) return;

        const numeric = cells.filter((cell) => /\d/.test(cell)).map((cell) => cell.replace(/[^0-9]/g, ""));
        const lastNumber = numeric[numeric.length - 1];
        const points = lastNumber ? Number.parseInt(lastNumber, 10) : null;
        rows.push({ name: team, points });
      });
  });

  return rows;
}

export class HtmlStandingsSource implements StandingsSource {
  readonly kind = "html";

  constructor(
    private readonly options: ScraperOptions,
    private readonly fetchImpl: FetchLike = fetch,
  ) {}

  async fetch(): Promise<StandingsTable> {
    const { pageUrl, timeoutMs } = this.options;
    console.log(`Scraping: Fetching standings page ${pageUrl}...`);

    let html: string;
    try {
      const response = await this.fetchImpl(pageUrl, {
        headers: { "User-Agent": USER_AGENT, Accept: "text/html,application/xhtml+xml" },
        signal: AbortSignal.timeout(timeoutMs),
      });
      if (!response.ok) {
        throw new SourceUnavailableError(`HTTP ${response.status} from ${pageUrl}`, this.kind);
      }
      html = await response.text();
    } catch (error) {
      if (error instanceof SourceUnavailableError) throw error;
      throw new SourceUnavailableError(`Request to ${pageUrl} failed: ${describeError(error)}`, this.kind, {
        cause: error,
      });
    }

    const rows = parseStandingsHtml(html);
    if (rows.length === 0) {
      throw new SourceUnavailableError(`Could not extract standings from ${pageUrl} (unexpected page structure).`, this.kind);
    }
    console.log(`Scraping: Extracted ${rows.length} rows.`);
    return buildStandingsTable(rows);
  }
}
