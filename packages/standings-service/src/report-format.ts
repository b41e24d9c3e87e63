// src/report-format.ts
import fs from "node:fs/promises";
import path from "node:path";
import type { RankedAssignment, StandingsTable } from "@champions-pool/shared";

export const CSV_HEADER = ["Position", "Participant", "Teams", "Total Pts"] as const;

// Left-aligned columns separated by two spaces; the last column is not padded.
export function formatColumns(rows: readonly (readonly string[])[]): string {
  const widths: number[] = [];
  for (const row of rows) {
    row.forEach((cell, i) => {
      widths[i] = Math.max(widths[i] ?? 0, cell.length);
    });
  }
  return rows
    .map((row) => row.map((cell, i) => (i === row.length - 1 ? cell : cell.padEnd(widths[i]))).join("  "))
    .join("\n");
}

export function formatStandingsTable(table: StandingsTable, limit = 10): string {
  return formatColumns([
    ["Team", "Pts"],
    ...table.slice(0, limit).map((row) => [row.canonicalName, String(row.points)]),
  ]);
}

export function formatRankingTable(ranking: readonly RankedAssignment[]): string {
  return formatColumns([
    ["#", "Participant", "Pts", "Teams"],
    ...ranking.map((entry) => [String(entry.position), entry.participantId, String(entry.totalPoints), entry.breakdown]),
  ]);
}

export function escapeCsvField(value: string): string {
  return /[",\r\n]/.test(value) ? `"${value.replace(/"/g, '""')}"` : value;
}

export function formatRankingCsv(ranking: readonly RankedAssignment[]): string {
  const lines = [
    CSV_HEADER.join(","),
    ...ranking.map((entry) =>
      [String(entry.position), entry.participantId, entry.breakdown, String(entry.totalPoints)]
        .map(escapeCsvField)
        .join(","),
    ),
  ];
  return `${lines.join("\n")}\n`;
}

export async function writeRankingCsv(filePath: string, ranking: readonly RankedAssignment[]): Promise<void> {
  await fs.mkdir(path.dirname(filePath), { recursive: true });
  await fs.writeFile(filePath, formatRankingCsv(ranking), "utf8");
}
