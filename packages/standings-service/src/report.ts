// src/report.ts
//
// Console entry point: `npm -w packages/standings-service run report`
import dotenv from "dotenv";
import { createScorer } from "@champions-pool/pool-engine";
import { loadConfig, loadPoolConfig } from "./config.js";
import { runConsoleReport } from "./console-report.js";
import { describeError } from "./errors.js";
import { loadStandings } from "./standings-source.js";
import { createStandingsSource } from "./sources.js";
import { StaticStandingsSource } from "./static-source.js";

dotenv.config();

async function main(): Promise<void> {
  const config = loadConfig();
  const pool = await loadPoolConfig(config.participantsFile);
  const snapshot = await loadStandings(createStandingsSource(config), new StaticStandingsSource());

  await runConsoleReport({
    snapshot,
    participants: pool.participants,
    aliases: pool.aliases,
    threshold: config.matchThreshold,
    scorer: createScorer(config.matchStrategy),
    csvOutput: config.csvOutput,
  });
}

main().catch((error) => {
  console.error(`Report failed: ${describeError(error)}`);
  process.exit(1);
});
