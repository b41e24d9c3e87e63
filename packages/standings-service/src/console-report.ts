// src/console-report.ts
import type { Aliases, RankedAssignment, StandingsSnapshot, TeamLabels } from "@champions-pool/shared";
import { aggregate, rankPositions, type SimilarityScorer } from "@champions-pool/pool-engine";
import { formatRankingTable, formatStandingsTable, writeRankingCsv } from "./report-format.js";

export interface ConsoleReportOptions {
  snapshot: StandingsSnapshot;
  participants: Readonly<Record<string, TeamLabels>>;
  aliases: Aliases;
  threshold: number;
  scorer: SimilarityScorer;
  csvOutput: string;
  log?: (line: string) => void;
}

/**
 * Console mode: prints the top of the standings and the pool ranking,
 * then writes the ranking CSV.
 */
export async function runConsoleReport(options: ConsoleReportOptions): Promise<RankedAssignment[]> {
  const log = options.log ?? ((line: string) => console.log(line));
  const { snapshot } = options;

  const ranking = rankPositions(
    aggregate(snapshot.table, options.participants, options.aliases, options.threshold, options.scorer),
  );

  log("Champions Pool - console mode");
  log(`Standings (${snapshot.source}${snapshot.fallback ? ", fallback" : ""}):`);
  log(formatStandingsTable(snapshot.table, 10));
  log("");
  log("Ranking:");
  log(formatRankingTable(ranking));

  const notes = ranking.flatMap((entry) => entry.notes.map((note) => `  ${entry.participantId}: ${note}`));
  if (notes.length > 0) {
    log("");
    log("Name corrections:");
    notes.forEach((note) => log(note));
  }

  await writeRankingCsv(options.csvOutput, ranking);
  log("");
  log(`Ranking saved to '${options.csvOutput}'`);
  return ranking;
}
