// src/index.ts
import dotenv from "dotenv";
import { createScorer } from "@champions-pool/pool-engine";
import { loadConfig, loadPoolConfig } from "./config.js";
import { describeError } from "./errors.js";
import { createApp, startServer } from "./server.js";
import { StandingsCache } from "./standings-cache.js";
import { loadStandings } from "./standings-source.js";
import { createStandingsSource } from "./sources.js";
import { StaticStandingsSource } from "./static-source.js";

// Load environment variables from .env file FIRST
dotenv.config();

async function main(): Promise<void> {
  const config = loadConfig();
  const pool = await loadPoolConfig(config.participantsFile);
  console.log(`Loaded ${Object.keys(pool.participants).length} participants from ${config.participantsFile}.`);

  const primary = createStandingsSource(config);
  const fallback = new StaticStandingsSource();
  const cache = new StandingsCache({
    load: () => loadStandings(primary, fallback),
    cacheDir: config.cacheDir,
    refreshIntervalMs: config.refreshIntervalMs,
  });

  // Initialize the cache BEFORE starting the server
  await cache.initialize();
  console.log("Cache initialization complete. Starting server...");

  const app = createApp({
    cache,
    pool,
    scorer: createScorer(config.matchStrategy),
    matchThreshold: config.matchThreshold,
  });
  startServer(app, config.port, () => cache.stop());
}

main().catch((error) => {
  console.error(`Failed to start: ${describeError(error)}`);
  process.exit(1);
});
