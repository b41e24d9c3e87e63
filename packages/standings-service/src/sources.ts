// src/sources.ts
import type { AppConfig } from "./config.js";
import { ApiStandingsSource } from "./api-source.js";
import { HtmlStandingsSource } from "./standings-scraper.js";
import { StaticStandingsSource } from "./static-source.js";
import type { FetchLike, StandingsSource } from "./standings-source.js";

/** Picks the primary source named by STANDINGS_SOURCE. */
export function createStandingsSource(config: AppConfig, fetchImpl: FetchLike = fetch): StandingsSource {
  switch (config.source) {
    case "api":
      return new ApiStandingsSource(
        {
          baseUrl: config.api.baseUrl,
          token: config.api.token,
          competition: config.api.competition,
          timeoutMs: config.requestTimeoutMs,
        },
        fetchImpl,
      );
    case "html":
      return new HtmlStandingsSource({ pageUrl: config.pageUrl, timeoutMs: config.requestTimeoutMs }, fetchImpl);
    case "static":
      return new StaticStandingsSource();
  }
}
